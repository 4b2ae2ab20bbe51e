/**
 * CSV → store loader
 *
 * Always a full reload: history, timetable and rooms are cleared first.
 * Rows are validated with zod; the first bad rows are reported with their CSV
 * line numbers and nothing is written.
 */

import fs from "fs";
import * as Papa from "papaparse";
import { z } from "zod";

import { TIMETABLE } from "./constants";
import type { Database } from "./database";
import { SeedFilesMissingError, ValidationError } from "./errors";
import { logger } from "./logger";
import type { CampusData } from "./seed";
import { isDayName } from "./timetable";
import type { DayName, RoomSeed, TimetableSeed } from "./types";

const MAX_REPORTED_ISSUES = 20;

/** "" → undefined, so defaults apply to blank cells */
function blank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);
}

const RoomCsvRowSchema = z.object({
  room_id: z.string().trim().min(1, "room_id is required"),
  block: blank(z.string().trim().default("Unknown")),
  capacity: blank(z.coerce.number().int().min(0).default(0)),
  type: blank(z.string().trim().default("lecture")),
  AC: blank(z.string().trim().default("No")),
  lat: blank(z.coerce.number().finite().default(0)),
  lon: blank(z.coerce.number().finite().default(0)),
  amenities: blank(z.string().trim().default("")),
});

const DayCellSchema = z
  .string()
  .trim()
  .transform((v) => v.slice(0, 1).toUpperCase() + v.slice(1, 3).toLowerCase())
  .refine((v): v is DayName => isDayName(v), "day must be one of Mon..Sun");

const TimetableCsvRowSchema = z.object({
  room_id: z.string().trim().min(1, "room_id is required"),
  day: DayCellSchema,
  slot: blank(z.coerce.number().int().min(0).max(TIMETABLE.SLOTS_PER_DAY - 1).default(0)),
  course: blank(z.string().trim().default("-")),
});

type CsvIssue = { line: number; message: string };

function parseCsv(text: string, label: string): Record<string, string>[] {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });
  // short rows leave trailing cells undefined; the row schemas default them
  const errors = result.errors.filter((e) => e.code !== "TooFewFields");
  if (errors.length > 0) {
    throw new ValidationError(`${label}: malformed CSV`, {
      issues: errors.slice(0, MAX_REPORTED_ISSUES).map((e) => ({
        line: (e.row ?? 0) + 2,
        message: e.message,
      })),
    });
  }
  return result.data;
}

function fail(label: string, issues: CsvIssue[]): never {
  throw new ValidationError(`${label}: ${issues.length} invalid row(s)`, {
    issues: issues.slice(0, MAX_REPORTED_ISSUES),
  });
}

function describe(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "row"}: ${i.message}`).join("; ");
}

export function parseRoomsCsv(text: string): RoomSeed[] {
  const rows = parseCsv(text, "rooms.csv");
  const issues: CsvIssue[] = [];
  const seen = new Set<string>();
  const rooms: RoomSeed[] = [];

  rows.forEach((raw, i) => {
    const line = i + 2;
    const parsed = RoomCsvRowSchema.safeParse(raw);
    if (!parsed.success) {
      issues.push({ line, message: describe(parsed.error) });
      return;
    }
    const r = parsed.data;
    if (seen.has(r.room_id)) {
      issues.push({ line, message: `duplicate room_id ${r.room_id}` });
      return;
    }
    seen.add(r.room_id);
    rooms.push({
      roomId: r.room_id,
      block: r.block,
      capacity: r.capacity,
      type: r.type,
      ac: r.AC,
      lat: r.lat,
      lon: r.lon,
      amenities: r.amenities,
    });
  });

  if (issues.length > 0) fail("rooms.csv", issues);
  return rooms;
}

export function parseTimetableCsv(text: string, knownRoomIds: ReadonlySet<string>): TimetableSeed[] {
  const rows = parseCsv(text, "timetable.csv");
  const issues: CsvIssue[] = [];
  const entries: TimetableSeed[] = [];

  rows.forEach((raw, i) => {
    const line = i + 2;
    const parsed = TimetableCsvRowSchema.safeParse(raw);
    if (!parsed.success) {
      issues.push({ line, message: describe(parsed.error) });
      return;
    }
    const t = parsed.data;
    if (!knownRoomIds.has(t.room_id)) {
      issues.push({ line, message: `unknown room_id ${t.room_id}` });
      return;
    }
    entries.push({ roomId: t.room_id, day: t.day, slot: t.slot, course: t.course });
  });

  if (issues.length > 0) fail("timetable.csv", issues);
  return entries;
}

export function parseCampusCsv(roomsText: string, timetableText: string): CampusData {
  const rooms = parseRoomsCsv(roomsText);
  const timetable = parseTimetableCsv(timetableText, new Set(rooms.map((r) => r.roomId)));
  return { rooms, timetable };
}

export async function populateFromCsvText(db: Database, roomsText: string, timetableText: string) {
  const data = parseCampusCsv(roomsText, timetableText);
  return db.replaceAll(data.rooms, data.timetable);
}

export async function populateFromCsvFiles(db: Database, roomsPath: string, timetablePath: string) {
  const missing = [roomsPath, timetablePath].filter((p) => !fs.existsSync(p));
  if (missing.length > 0) throw new SeedFilesMissingError(missing);

  const result = await populateFromCsvText(
    db,
    fs.readFileSync(roomsPath, "utf-8"),
    fs.readFileSync(timetablePath, "utf-8")
  );
  logger.info("Populated store from CSV", { roomsPath, timetablePath, ...result });
  return result;
}
