import fs from "fs";
import os from "os";
import path from "path";

import { bootstrap } from "@/lib/bootstrap";
import { SqliteDatabase } from "@/lib/database";
import { resetAppEnv } from "@/lib/env";
import { getSimulator } from "@/lib/simulator";

describe("bootstrap", () => {
  const savedEnv = { ...process.env };
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "campus-boot-"));
    process.env.SEED_DIR = dir;
    process.env.SEED = "42";
    process.env.SEED_ON_START = "true";
    process.env.POPULATE_ON_START = "if-empty";
    process.env.SIMULATOR_ENABLED = "false";
    resetAppEnv();
    globalThis.__campusDatabase = new SqliteDatabase(":memory:", { threshold: 30 });
  });

  afterEach(() => {
    globalThis.__campusDatabase?.close();
    globalThis.__campusDatabase = undefined;
    process.env = { ...savedEnv };
    resetAppEnv();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("generates the sample CSVs, loads them once and leaves the simulator off", async () => {
    await bootstrap();
    await bootstrap();

    expect(fs.existsSync(path.join(dir, "rooms.csv"))).toBe(true);
    expect(fs.existsSync(path.join(dir, "timetable.csv"))).toBe(true);
    expect(await globalThis.__campusDatabase?.countRooms()).toBe(721);
    expect(getSimulator()).toBeNull();
  });
});
