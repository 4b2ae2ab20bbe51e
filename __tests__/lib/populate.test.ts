import fs from "fs";
import os from "os";
import path from "path";

import type { SqliteDatabase } from "@/lib/database";
import { SeedFilesMissingError, ValidationError } from "@/lib/errors";
import {
  parseRoomsCsv,
  parseTimetableCsv,
  populateFromCsvFiles,
  populateFromCsvText,
} from "@/lib/populate";
import { writeSeedFiles } from "@/lib/seed";
import { seededDatabase } from "../fixtures";

const ROOMS_HEADER = "room_id,block,capacity,type,AC,lat,lon,amenities";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e: unknown) {
    return e;
  }
  throw new Error("expected an error");
}

describe("parseRoomsCsv", () => {
  it("reads rows and applies defaults to blank cells", () => {
    const rooms = parseRoomsCsv(
      [ROOMS_HEADER, 'A-101,A,40,lecture,Yes,12.5,80.25,"projector,whiteboard"', "X-1,,,,,,,"].join("\n")
    );
    expect(rooms).toEqual([
      { roomId: "A-101", block: "A", capacity: 40, type: "lecture", ac: "Yes", lat: 12.5, lon: 80.25, amenities: "projector,whiteboard" },
      { roomId: "X-1", block: "Unknown", capacity: 0, type: "lecture", ac: "No", lat: 0, lon: 0, amenities: "" },
    ]);
  });

  it("accepts rows that leave off trailing cells", () => {
    const rooms = parseRoomsCsv(`${ROOMS_HEADER}\nA-1,A,40,lecture,Yes,1,2\nA-2,B\n`);
    expect(rooms).toEqual([
      { roomId: "A-1", block: "A", capacity: 40, type: "lecture", ac: "Yes", lat: 1, lon: 2, amenities: "" },
      { roomId: "A-2", block: "B", capacity: 0, type: "lecture", ac: "No", lat: 0, lon: 0, amenities: "" },
    ]);
  });

  it("still rejects rows with extra cells", () => {
    expect(() => parseRoomsCsv(`${ROOMS_HEADER}\nA-1,A,40,lecture,Yes,1,2,,extra\n`)).toThrow("rooms.csv: malformed CSV");
  });

  it("trims header names", () => {
    const rooms = parseRoomsCsv(" room_id , block \nA-1,A\n");
    expect(rooms[0]).toMatchObject({ roomId: "A-1", block: "A", capacity: 0 });
  });

  it("reports invalid rows with their line numbers", () => {
    const err = caught(() =>
      parseRoomsCsv([ROOMS_HEADER, "A-1,A,40,lecture,Yes,1,2,", "A-2,A,many,lecture,Yes,1,2,", "A-1,A,10,lab,No,1,2,"].join("\n"))
    );

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({
      message: "rooms.csv: 2 invalid row(s)",
      details: {
        issues: [
          { line: 3, message: expect.stringContaining("capacity") },
          { line: 4, message: "duplicate room_id A-1" },
        ],
      },
    });
  });

  it("requires room_id", () => {
    expect(() => parseRoomsCsv([ROOMS_HEADER, ",A,40,lecture,Yes,1,2,"].join("\n"))).toThrow("rooms.csv: 1 invalid row(s)");
  });
});

describe("parseTimetableCsv", () => {
  const known = new Set(["A-101"]);

  it("normalises day names and fills defaults", () => {
    const entries = parseTimetableCsv("room_id,day,slot,course\nA-101,monday,3,CS101\nA-101,FRI,,\n", known);
    expect(entries).toEqual([
      { roomId: "A-101", day: "Mon", slot: 3, course: "CS101" },
      { roomId: "A-101", day: "Fri", slot: 0, course: "-" },
    ]);
  });

  it("rejects bad days, out-of-range slots and unknown rooms", () => {
    const err = caught(() =>
      parseTimetableCsv("room_id,day,slot,course\nA-101,Xyz,1,CS101\nA-101,Mon,10,CS101\nZ-9,Mon,1,CS101\n", known)
    );

    expect(err).toMatchObject({
      code: "VALIDATION_ERROR",
      message: "timetable.csv: 3 invalid row(s)",
      details: {
        issues: [
          { line: 2, message: expect.stringContaining("day") },
          { line: 3, message: expect.stringContaining("slot") },
          { line: 4, message: "unknown room_id Z-9" },
        ],
      },
    });
  });
});

describe("populate", () => {
  let db: SqliteDatabase;
  let dir: string;

  beforeEach(async () => {
    db = await seededDatabase();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "campus-populate-"));
  });

  afterEach(() => {
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("replaces the store from CSV text", async () => {
    const result = await populateFromCsvText(
      db,
      `${ROOMS_HEADER}\nC-1,C,10,lab,No,1,2,\n`,
      "room_id,day,slot,course\nC-1,Wed,4,ENG101\n"
    );

    expect(result).toEqual({ rooms: 1, timetable: 1 });
    expect((await db.listRooms()).map((r) => r.roomId)).toEqual(["C-1"]);
    expect(await db.findBookedRoomIds("Wed", 4)).toEqual(new Set(["C-1"]));
  });

  it("leaves the store untouched when a file is invalid", async () => {
    await expect(
      populateFromCsvText(db, `${ROOMS_HEADER}\nC-1,C,10,lab,No,1,2,\n`, "room_id,day,slot,course\nQ-1,Wed,4,ENG101\n")
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await db.countRooms()).toBe(4);
  });

  it("fails with SeedFilesMissingError when the files are absent", async () => {
    const rooms = path.join(dir, "rooms.csv");
    const timetable = path.join(dir, "timetable.csv");

    await expect(populateFromCsvFiles(db, rooms, timetable)).rejects.toMatchObject({
      code: "SEED_FILES_MISSING",
      missing: [rooms, timetable],
    });
    await expect(populateFromCsvFiles(db, rooms, timetable)).rejects.toBeInstanceOf(SeedFilesMissingError);
  });

  it("loads the generated sample files", async () => {
    const files = writeSeedFiles(dir, 42);
    const result = await populateFromCsvFiles(db, files.roomsPath, files.timetablePath);

    expect(result).toEqual({ rooms: 721, timetable: 27720 });
    expect(await db.countRooms()).toBe(721);
  });
});
