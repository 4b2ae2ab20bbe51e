import { NextResponse } from "next/server";

import { buildHeatmap } from "@/lib/analytics";
import { auditLog, clientIp } from "@/lib/auditLog";
import { getDatabase } from "@/lib/database";
import { getAppEnv } from "@/lib/env";
import { buildRoomsWorkbook } from "@/lib/export";
import { handleRouteError, jsonError } from "@/lib/http";
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
    const env = getAppEnv();
    const db = getDatabase();
    const { block, type, capacity } = parsed.data;

    const [rooms, heatmap] = await Promise.all([
      listRoomViews(db, { block, type, minCapacity: capacity }),
      buildHeatmap(db, env.HEATMAP_WINDOW_MINUTES),
    ]);
    const buf = buildRoomsWorkbook(rooms, heatmap, { partial: env.OCCUPANCY_THRESHOLD, full: env.FULL_THRESHOLD });

    auditLog({ action: "EXPORT", ip: clientIp(req), target: "rooms.xlsx", details: { rows: rooms.length } });

    return new NextResponse(new Uint8Array(buf), {
      status: 200,
      headers: {
        "content-type": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
        "content-disposition": 'attachment; filename="campus_rooms.xlsx"',
      },
    });
  } catch (e: unknown) {
    return handleRouteError(e, "GET /api/admin/export");
  }
}
