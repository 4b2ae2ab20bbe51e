/**
 * Writes rooms.csv + timetable.csv for the demo campus.
 *
 *   npm run seed -- --seed 42 --out-dir data
 */

import { parseArgs } from "node:util";

import { getAppEnv } from "@/lib/env";
import { logger } from "@/lib/logger";
import { writeSeedFiles } from "@/lib/seed";

function main() {
  const env = getAppEnv();
  const { values } = parseArgs({
    options: {
      seed: { type: "string" },
      "out-dir": { type: "string" },
    },
  });

  const seed = values.seed === undefined ? env.SEED : Number(values.seed);
  if (!Number.isInteger(seed) || seed < 0) {
    throw new Error(`--seed must be a non-negative integer, got "${values.seed}"`);
  }

  const result = writeSeedFiles(values["out-dir"] ?? env.SEED_DIR, seed);
  logger.info("Sample data written", { seed, ...result });
  console.log(`rooms: ${result.rooms} → ${result.roomsPath}`);
  console.log(`timetable: ${result.timetable} → ${result.timetablePath}`);
}

try {
  main();
} catch (e: unknown) {
  logger.error("Sample data generation failed", { error: e instanceof Error ? e.message : String(e) });
  process.exitCode = 1;
}
