import { SqliteDatabase } from "@/lib/database";
import type { RoomSeed, RoomView, TimetableSeed } from "@/lib/types";

/** Monday 2026-03-02, 10:30 UTC → day "Mon", slot 2 */
export const MONDAY_SLOT_2 = new Date("2026-03-02T10:30:00.000Z");

export const ROOMS: RoomSeed[] = [
  { roomId: "A-101", block: "A", capacity: 40, type: "lecture", ac: "Yes", lat: 12.0, lon: 80.0, amenities: "projector,whiteboard" },
  { roomId: "A-102", block: "A", capacity: 20, type: "lab", ac: "No", lat: 12.001, lon: 80.0, amenities: "whiteboard" },
  { roomId: "B-201", block: "B", capacity: 60, type: "lecture", ac: "Yes", lat: 12.01, lon: 80.01, amenities: "projector" },
  { roomId: "B-202", block: "B", capacity: 100, type: "auditorium", ac: "Yes", lat: 12.02, lon: 80.02, amenities: "" },
];

export const TIMETABLE: TimetableSeed[] = [
  { roomId: "A-101", day: "Mon", slot: 2, course: "CS101" },
  { roomId: "B-201", day: "Tue", slot: 0, course: "MATH201" },
];

export async function seededDatabase(threshold = 30): Promise<SqliteDatabase> {
  const db = new SqliteDatabase(":memory:", { threshold });
  await db.replaceAll(ROOMS, TIMETABLE);
  return db;
}

export function roomView(overrides: Partial<RoomView> & Pick<RoomView, "roomId">): RoomView {
  return {
    block: "A",
    capacity: 30,
    type: "lecture",
    ac: "Yes",
    lat: 12.0,
    lon: 80.0,
    amenities: "",
    occupancyLevel: 0,
    status: "free",
    updatedAt: null,
    booked: false,
    ...overrides,
  };
}

export function minutesBefore(at: Date, minutes: number): Date {
  return new Date(at.getTime() - minutes * 60_000);
}
