import { getDatabase } from "@/lib/database";
import { handleRouteError, jsonError, jsonOk } from "@/lib/http";
import { listRoomViews } from "@/lib/rooms";
import { formatZodIssues, queryObject, RoomQuerySchema } from "@/lib/schema";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

export async function GET(req: Request) {
  const parsed = RoomQuerySchema.safeParse(queryObject(new URL(req.url), ["block", "type", "capacity"]));
  if (!parsed.success) {
    return jsonError("VALIDATION_ERROR", "Invalid query parameters", formatZodIssues(parsed.error));
  }

  try {
    const { block, type, capacity } = parsed.data;
    const rooms = await listRoomViews(getDatabase(), { block, type, minCapacity: capacity });
    return jsonOk(rooms);
  } catch (e: unknown) {
    return handleRouteError(e, "GET /rooms/all");
  }
}
