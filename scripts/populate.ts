/**
 * Loads rooms.csv + timetable.csv into DATABASE_PATH (full reload).
 *
 *   npm run populate -- --dir data
 */

import { parseArgs } from "node:util";

import { getDatabase } from "@/lib/database";
import { getAppEnv } from "@/lib/env";
import { logger } from "@/lib/logger";
import { populateFromCsvFiles } from "@/lib/populate";
import { seedFilePaths } from "@/lib/seed";

async function main() {
  const { values } = parseArgs({ options: { dir: { type: "string" } } });
  const files = seedFilePaths(values.dir ?? getAppEnv().SEED_DIR);

  const db = getDatabase();
  try {
    const result = await populateFromCsvFiles(db, files.roomsPath, files.timetablePath);
    console.log(`loaded ${result.rooms} rooms, ${result.timetable} timetable entries`);
  } finally {
    db.close();
  }
}

main().catch((e: unknown) => {
  logger.error("Populate failed", { error: e instanceof Error ? e.message : String(e) });
  process.exitCode = 1;
});
