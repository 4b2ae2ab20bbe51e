/**
 * Server startup: sample CSVs → store → simulator.
 * Called once per Node process from instrumentation.ts.
 */

import fs from "fs";

import { getDatabase } from "./database";
import { getAppEnv } from "./env";
import { logger } from "./logger";
import { populateFromCsvFiles } from "./populate";
import { seedFilePaths, writeSeedFiles } from "./seed";
import { startSimulator } from "./simulator";

let booted = false;

export async function bootstrap() {
  if (booted) return;
  booted = true;

  const env = getAppEnv();
  const db = getDatabase();
  const files = seedFilePaths(env.SEED_DIR);

  if (env.SEED_ON_START && (!fs.existsSync(files.roomsPath) || !fs.existsSync(files.timetablePath))) {
    const written = writeSeedFiles(env.SEED_DIR, env.SEED);
    logger.info("Generated sample CSVs", { ...written, seed: env.SEED });
  }

  const populate =
    env.POPULATE_ON_START === "always" ||
    (env.POPULATE_ON_START === "if-empty" && (await db.countRooms()) === 0);

  if (populate) {
    await populateFromCsvFiles(db, files.roomsPath, files.timetablePath);
  }

  if (env.SIMULATOR_ENABLED) {
    startSimulator(db, {
      intervalMs: env.SIMULATOR_INTERVAL_MS,
      sampleSize: env.SIMULATOR_SAMPLE_SIZE,
      maxDelta: env.SIMULATOR_MAX_DELTA,
    });
  }
}
