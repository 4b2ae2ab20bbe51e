import { getAppEnv } from "@/lib/env";
import { appendProbe, probeHealth } from "@/lib/healthMonitor";
import { handleRouteError, jsonOk } from "@/lib/http";
import { logger } from "@/lib/logger";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

export async function POST() {
  try {
    const env = getAppEnv();
    const result = await probeHealth(env.API_BASE_URL);
    appendProbe(env.HEALTH_LOG_PATH, result);
    if (result.status === "down") logger.warn("Health probe failed", { error: result.error });
    return jsonOk(result);
  } catch (e: unknown) {
    return handleRouteError(e, "POST /api/ops/probe");
  }
}
