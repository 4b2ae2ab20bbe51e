/**
 * Room queries used by the API routes.
 *
 * Stored status only reflects the occupancy level; the timetable booking for
 * the current slot is merged in here, at read time.
 */

import { QUERY_LIMITS } from "./constants";
import type { Database } from "./database";
import { NotFoundError } from "./errors";
import { currentDaySlot, withSlotRange } from "./timetable";
import type { OccupancyRecord, Room, RoomDetail, RoomFilter, RoomView } from "./types";

async function bookedIdsAt(db: Database, now: Date): Promise<ReadonlySet<string>> {
  const { day, slot } = currentDaySlot(now);
  if (slot === null) return new Set<string>();
  return db.findBookedRoomIds(day, slot);
}

export async function withBooking(db: Database, rooms: Room[], now: Date = new Date()): Promise<RoomView[]> {
  const booked = await bookedIdsAt(db, now);
  return rooms.map((r) => ({ ...r, booked: booked.has(r.roomId) }));
}

export async function listRoomViews(db: Database, filter: RoomFilter = {}, now: Date = new Date()) {
  return withBooking(db, await db.listRooms(filter), now);
}

/**
 * Free = stored status "free" (level at or below the threshold) and no
 * timetable booking right now.
 */
export async function listFreeRooms(
  db: Database,
  filter: Pick<RoomFilter, "block" | "minCapacity"> = {},
  now: Date = new Date(),
  limit: number = QUERY_LIMITS.FREE_ROOMS
): Promise<RoomView[]> {
  const rooms = await listRoomViews(db, filter, now);
  return rooms.filter((r) => r.status === "free" && !r.booked).slice(0, limit);
}

export async function getRoomDetail(db: Database, roomId: string, now: Date = new Date()): Promise<RoomDetail> {
  const room = await db.getRoom(roomId);
  if (!room) throw new NotFoundError(`Room not found: ${roomId}`, { roomId });

  const [[view], timetable, occupancyHistory] = await Promise.all([
    withBooking(db, [room], now),
    db.getTimetable(roomId),
    db.getOccupancyHistory(roomId, QUERY_LIMITS.ROOM_HISTORY),
  ]);

  return { room: view, timetable: timetable.map(withSlotRange), occupancyHistory };
}

export async function checkIn(
  db: Database,
  roomId: string,
  occupancyLevel: number,
  now: Date = new Date()
): Promise<{ occupancyId: number; record: OccupancyRecord; room: RoomView }> {
  const result = await db.recordOccupancy(roomId, occupancyLevel, now);
  if (!result) throw new NotFoundError(`Room not found: ${roomId}`, { roomId });

  const [room] = await withBooking(db, [result.room], now);
  return { occupancyId: result.record.id, record: result.record, room };
}
