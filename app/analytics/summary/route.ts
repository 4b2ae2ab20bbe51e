import { buildSummary } from "@/lib/analytics";
import { getDatabase } from "@/lib/database";
import { handleRouteError, jsonOk } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

export async function GET() {
  try {
    return jsonOk(await buildSummary(getDatabase()));
  } catch (e: unknown) {
    return handleRouteError(e, "GET /analytics/summary");
  }
}
