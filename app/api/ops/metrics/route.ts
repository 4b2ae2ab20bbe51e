import { getAppEnv } from "@/lib/env";
import { computeMetrics, healthAlert, incidentSummary, readWindow, uptimeTier } from "@/lib/healthMonitor";
import { handleRouteError, jsonError, jsonOk } from "@/lib/http";
import { formatZodIssues, OpsMetricsQuerySchema, queryObject } from "@/lib/schema";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

const DEFAULT_WINDOW_MINUTES = 60;

export async function GET(req: Request) {
  const parsed = OpsMetricsQuerySchema.safeParse(queryObject(new URL(req.url), ["window"]));
  if (!parsed.success) {
    return jsonError("VALIDATION_ERROR", "Invalid query parameters", formatZodIssues(parsed.error));
  }

  try {
    const windowMinutes = parsed.data.window ?? DEFAULT_WINDOW_MINUTES;
    const now = new Date();
    const rows = readWindow(getAppEnv().HEALTH_LOG_PATH, windowMinutes, now);
    const metrics = computeMetrics(rows, now);
    return jsonOk({
      windowMinutes,
      metrics,
      alert: healthAlert(metrics),
      tier: uptimeTier(metrics.uptimePct),
      incidents: incidentSummary(rows, now),
      rows,
    });
  } catch (e: unknown) {
    return handleRouteError(e, "GET /api/ops/metrics");
  }
}
