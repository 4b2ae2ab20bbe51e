import { auditLog, clientIp } from "@/lib/auditLog";
import { CSV_UPLOAD_MAX_BYTES } from "@/lib/constants";
import { getDatabase } from "@/lib/database";
import { getAppEnv } from "@/lib/env";
import { handleRouteError, jsonError, jsonOk } from "@/lib/http";
import { populateFromCsvFiles, populateFromCsvText } from "@/lib/populate";
import { seedFilePaths } from "@/lib/seed";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const revalidate = 0;

/**
 * Full reload of rooms + timetable (history is cleared).
 * - multipart/form-data with `rooms` and `timetable` files → uploaded CSVs
 * - anything else → the CSVs under SEED_DIR
 */
export async function POST(req: Request) {
  const isMultipart = (req.headers.get("content-type") ?? "").startsWith("multipart/form-data");

  try {
    const db = getDatabase();
    if (!isMultipart) {
      const files = seedFilePaths(getAppEnv().SEED_DIR);
      const result = await populateFromCsvFiles(db, files.roomsPath, files.timetablePath);
      auditLog({ action: "CSV_RELOAD", ip: clientIp(req), target: "seed-dir", details: result });
      return jsonOk({ loaded: true, source: "seed-dir", ...result });
    }

    const form = await req.formData();
    const rooms = form.get("rooms");
    const timetable = form.get("timetable");
    if (rooms === null || typeof rooms === "string" || timetable === null || typeof timetable === "string") {
      return jsonError("VALIDATION_ERROR", "Both `rooms` and `timetable` CSV files are required");
    }
    if (rooms.size > CSV_UPLOAD_MAX_BYTES || timetable.size > CSV_UPLOAD_MAX_BYTES) {
      return jsonError("PAYLOAD_TOO_LARGE", `Each CSV must be at most ${CSV_UPLOAD_MAX_BYTES} bytes`);
    }

    const result = await populateFromCsvText(db, await rooms.text(), await timetable.text());
    auditLog({
      action: "CSV_RELOAD",
      ip: clientIp(req),
      target: "upload",
      details: { ...result, roomsFile: rooms.name, timetableFile: timetable.name },
    });
    return jsonOk({ loaded: true, source: "upload", ...result });
  } catch (e: unknown) {
    return handleRouteError(e, "POST /admin/load_csv");
  }
}
