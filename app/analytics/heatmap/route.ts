import { buildHeatmap } from "@/lib/analytics";
import { getDatabase } from "@/lib/database";
import { getAppEnv } from "@/lib/env";
import { handleRouteError, jsonError, jsonOk } from "@/lib/http";
import { formatZodIssues, HeatmapQuerySchema, queryObject } from "@/lib/schema";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

export async function GET(req: Request) {
  const parsed = HeatmapQuerySchema.safeParse(queryObject(new URL(req.url), ["window_minutes"]));
  if (!parsed.success) {
    return jsonError("VALIDATION_ERROR", "Invalid query parameters", formatZodIssues(parsed.error));
  }

  try {
    const windowMinutes = parsed.data.window_minutes ?? getAppEnv().HEATMAP_WINDOW_MINUTES;
    return jsonOk(await buildHeatmap(getDatabase(), windowMinutes));
  } catch (e: unknown) {
    return handleRouteError(e, "GET /analytics/heatmap");
  }
}
