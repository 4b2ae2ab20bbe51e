/**
 * Sample data generator
 *
 * Builds the demo campus (rooms + weekly timetable) from data/campus-layout.json.
 * Output depends only on the seed: the same seed always produces the same CSVs.
 */

import fs from "fs";
import path from "path";
import { Faker, en } from "@faker-js/faker";
import * as Papa from "papaparse";
import { z } from "zod";

import campusLayout from "@/data/campus-layout.json";
import { DAY_NAMES, TIMETABLE } from "./constants";
import type { RoomSeed, TimetableSeed } from "./types";

const RangeSchema = z.object({ from: z.number().int(), to: z.number().int() });
const FloorSchema = z.union([z.literal("G"), z.number().int().min(0).max(99)]);

const GroupSchema = z
  .object({
    type: z.string().min(1),
    floors: z.union([RangeSchema, z.array(FloorSchema)]).optional(),
    rooms: z.union([RangeSchema, z.array(z.number().int().min(1).max(99))]).optional(),
    /** explicit [floor, room] pairs instead of floors × rooms */
    placements: z.array(z.tuple([FloorSchema, z.number().int().min(1).max(99)])).optional(),
    capacity: z.number().int().min(0).optional(),
    /** per-room capacities, in generation order */
    capacities: z.array(z.number().int().min(0)).min(1).optional(),
    amenities: z.string().default(""),
  })
  .superRefine((g, ctx) => {
    if (!g.placements && !(g.floors && g.rooms)) {
      ctx.addIssue({ code: "custom", path: ["floors"], message: "either placements or floors + rooms is required" });
    }
    if (g.capacity === undefined && !g.capacities) {
      ctx.addIssue({ code: "custom", path: ["capacity"], message: "capacity or capacities is required" });
    }
  });

export const CampusLayoutSchema = z.object({
  jitterSpan: z.number().min(0),
  bookedFraction: z.number().gt(0).max(1),
  courses: z.array(z.string().min(1)).min(1),
  blocks: z.array(
    z.object({
      block: z.string().min(1),
      center: z.object({ lat: z.number(), lon: z.number() }),
      groups: z.array(GroupSchema).min(1),
    })
  ),
});

export type CampusLayout = z.infer<typeof CampusLayoutSchema>;
type LayoutGroup = z.infer<typeof GroupSchema>;
type Floor = z.infer<typeof FloorSchema>;

export function loadCampusLayout(): CampusLayout {
  return CampusLayoutSchema.parse(campusLayout);
}

function expand<T>(v: { from: number; to: number } | T[]): (number | T)[] {
  if (Array.isArray(v)) return v;
  const out: number[] = [];
  for (let i = v.from; i <= v.to; i++) out.push(i);
  return out;
}

function floorCode(floor: Floor): string {
  return floor === "G" ? "00" : String(floor).padStart(2, "0");
}

function placementsOf(group: LayoutGroup): [Floor, number][] {
  if (group.placements) return group.placements;
  const out: [Floor, number][] = [];
  for (const floor of expand(group.floors ?? [])) {
    for (const room of expand(group.rooms ?? [])) out.push([floor, room]);
  }
  return out;
}

export type CampusData = {
  rooms: RoomSeed[];
  timetable: TimetableSeed[];
};

export function generateCampus(seed: number, layout: CampusLayout = loadCampusLayout()): CampusData {
  const faker = new Faker({ locale: [en] });
  faker.seed(seed);

  const jitter = (center: number) =>
    Number((center + (faker.number.float({ min: 0, max: 1 }) * 2 - 1) * layout.jitterSpan).toFixed(6));

  const rooms: RoomSeed[] = [];
  for (const b of layout.blocks) {
    for (const group of b.groups) {
      placementsOf(group).forEach(([floor, room], idx) => {
        const capacity = group.capacities
          ? group.capacities[idx % group.capacities.length]
          : group.capacity ?? 0;
        rooms.push({
          roomId: `${b.block}-${floorCode(floor)}${String(room).padStart(2, "0")}`,
          block: b.block,
          capacity,
          type: group.type,
          ac: "Yes",
          lat: jitter(b.center.lat),
          lon: jitter(b.center.lon),
          amenities: group.amenities,
        });
      });
    }
  }

  // Every (day, slot) books the same share of lecture rooms
  const lectureIds = rooms.filter((r) => r.type === "lecture").map((r) => r.roomId);
  const perSlot = Math.max(1, Math.floor(lectureIds.length * layout.bookedFraction));
  const timetable: TimetableSeed[] = [];
  if (lectureIds.length > 0) {
    for (const day of DAY_NAMES) {
      for (let slot = 0; slot < TIMETABLE.SLOTS_PER_DAY; slot++) {
        for (const roomId of faker.helpers.shuffle(lectureIds).slice(0, perSlot)) {
          timetable.push({ roomId, day, slot, course: faker.helpers.arrayElement(layout.courses) });
        }
      }
    }
  }

  return { rooms, timetable };
}

// ─── CSV ───────────────────────────────────────────────────────────

export const ROOM_CSV_FIELDS = ["room_id", "block", "capacity", "type", "AC", "lat", "lon", "amenities"] as const;
export const TIMETABLE_CSV_FIELDS = ["room_id", "day", "slot", "course"] as const;

export function roomsToCsv(rooms: RoomSeed[]): string {
  return Papa.unparse({
    fields: [...ROOM_CSV_FIELDS],
    data: rooms.map((r) => [r.roomId, r.block, r.capacity, r.type, r.ac, r.lat.toFixed(6), r.lon.toFixed(6), r.amenities]),
  });
}

export function timetableToCsv(entries: TimetableSeed[]): string {
  return Papa.unparse({
    fields: [...TIMETABLE_CSV_FIELDS],
    data: entries.map((t) => [t.roomId, t.day, t.slot, t.course]),
  });
}

export type SeedFiles = {
  roomsPath: string;
  timetablePath: string;
};

export function seedFilePaths(dir: string): SeedFiles {
  const base = path.resolve(process.cwd(), dir);
  return {
    roomsPath: path.join(base, "rooms.csv"),
    timetablePath: path.join(base, "timetable.csv"),
  };
}

export function writeSeedFiles(dir: string, seed: number): SeedFiles & { rooms: number; timetable: number } {
  const files = seedFilePaths(dir);
  const data = generateCampus(seed);
  fs.mkdirSync(path.dirname(files.roomsPath), { recursive: true });
  fs.writeFileSync(files.roomsPath, roomsToCsv(data.rooms) + "\n", "utf-8");
  fs.writeFileSync(files.timetablePath, timetableToCsv(data.timetable) + "\n", "utf-8");
  return { ...files, rooms: data.rooms.length, timetable: data.timetable.length };
}
