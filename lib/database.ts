/**
 * Data store
 *
 * `Database` is the only way the rest of the app touches persistence.
 * The implementation is SQLite (better-sqlite3): a file under DATABASE_PATH in
 * normal runs, an in-memory database when MOCK_MODE=true.
 */

import fs from "fs";
import path from "path";
import BetterSqlite3 from "better-sqlite3";

import { getAppEnv } from "./env";
import { logger } from "./logger";
import { clampLevel, statusForLevel } from "./occupancy";
import type {
  DayName,
  HeatmapCell,
  OccupancyRecord,
  Room,
  RoomFilter,
  RoomSeed,
  RoomStatus,
  TimetableSeed,
} from "./types";

/**
 * Small in-memory TTL cache.
 * Holds one value; `key` lets a caller tell whether the cached value answers
 * the question it is asking.
 */
class TtlCache<T> {
  private data: { key: string; value: T } | null = null;
  private expiresAt = 0;
  constructor(private ttlMs: number) {}

  get(key: string): T | null {
    if (this.data !== null && this.data.key === key && Date.now() < this.expiresAt) return this.data.value;
    return null;
  }
  set(key: string, value: T) {
    this.data = { key, value };
    this.expiresAt = Date.now() + this.ttlMs;
  }
  invalidate() {
    this.data = null;
    this.expiresAt = 0;
  }
}

export type OccupancyUpdate = {
  roomId: string;
  occupancyLevel: number;
};

export type SlotBookingCount = {
  day: DayName;
  slot: number;
  rooms: number;
};

export interface Database {
  // loading
  /** Clears history, timetable and rooms, then inserts the given rows (one transaction) */
  replaceAll(rooms: RoomSeed[], timetable: TimetableSeed[]): Promise<{ rooms: number; timetable: number }>;

  // rooms
  countRooms(): Promise<number>;
  listRooms(filter?: RoomFilter): Promise<Room[]>;
  getRoom(roomId: string): Promise<Room | null>;

  // timetable
  getTimetable(roomId: string): Promise<TimetableSeed[]>;
  findBookedRoomIds(day: DayName, slot: number): Promise<ReadonlySet<string>>;
  /** Distinct lecture rooms booked per (day, slot) */
  countLectureBookingsBySlot(): Promise<SlotBookingCount[]>;

  // occupancy
  getOccupancyHistory(roomId: string, limit: number): Promise<OccupancyRecord[]>;
  /** Updates the room and appends a history record; null when the room does not exist */
  recordOccupancy(roomId: string, level: number, at?: Date): Promise<{ record: OccupancyRecord; room: Room } | null>;
  /** Batch version of recordOccupancy for the simulator; unknown rooms are skipped */
  applyOccupancyUpdates(updates: OccupancyUpdate[], at?: Date): Promise<number>;
  averageOccupancyByBlock(sinceIso: string): Promise<HeatmapCell[]>;
  countRoomsWithHistory(): Promise<number>;
  listHistoryTimestampsSince(sinceIso: string): Promise<string[]>;

  close(): void;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS rooms (
  room_id         TEXT PRIMARY KEY,
  block           TEXT NOT NULL,
  capacity        INTEGER NOT NULL DEFAULT 0,
  type            TEXT NOT NULL DEFAULT 'lecture',
  ac              TEXT NOT NULL DEFAULT 'No',
  lat             REAL NOT NULL DEFAULT 0,
  lon             REAL NOT NULL DEFAULT 0,
  amenities       TEXT NOT NULL DEFAULT '',
  occupancy_level INTEGER NOT NULL DEFAULT 0 CHECK (occupancy_level BETWEEN 0 AND 100),
  status          TEXT NOT NULL DEFAULT 'free' CHECK (status IN ('free', 'occupied')),
  updated_at      TEXT
);
CREATE INDEX IF NOT EXISTS idx_rooms_block ON rooms (block);

CREATE TABLE IF NOT EXISTS timetables (
  id      INTEGER PRIMARY KEY AUTOINCREMENT,
  room_id TEXT NOT NULL REFERENCES rooms (room_id) ON DELETE CASCADE,
  day     TEXT NOT NULL,
  slot    INTEGER NOT NULL CHECK (slot BETWEEN 0 AND 9),
  course  TEXT NOT NULL DEFAULT '-'
);
CREATE INDEX IF NOT EXISTS idx_timetables_room ON timetables (room_id);
CREATE INDEX IF NOT EXISTS idx_timetables_day_slot ON timetables (day, slot);

CREATE TABLE IF NOT EXISTS occupancies (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  room_id         TEXT NOT NULL REFERENCES rooms (room_id) ON DELETE CASCADE,
  timestamp       TEXT NOT NULL,
  occupancy_level INTEGER NOT NULL CHECK (occupancy_level BETWEEN 0 AND 100)
);
CREATE INDEX IF NOT EXISTS idx_occupancies_room_ts ON occupancies (room_id, timestamp);
CREATE INDEX IF NOT EXISTS idx_occupancies_ts ON occupancies (timestamp);
`;

type RoomRow = {
  room_id: string;
  block: string;
  capacity: number;
  type: string;
  ac: string;
  lat: number;
  lon: number;
  amenities: string;
  occupancy_level: number;
  status: RoomStatus;
  updated_at: string | null;
};

type TimetableRow = {
  room_id: string;
  day: DayName;
  slot: number;
  course: string;
};

type OccupancyRow = {
  id: number;
  room_id: string;
  timestamp: string;
  occupancy_level: number;
};

function toRoom(row: RoomRow): Room {
  return {
    roomId: row.room_id,
    block: row.block,
    capacity: row.capacity,
    type: row.type,
    ac: row.ac,
    lat: row.lat,
    lon: row.lon,
    amenities: row.amenities,
    occupancyLevel: row.occupancy_level,
    status: row.status,
    updatedAt: row.updated_at,
  };
}

function toRecord(row: OccupancyRow): OccupancyRecord {
  return {
    id: row.id,
    roomId: row.room_id,
    timestamp: row.timestamp,
    occupancyLevel: row.occupancy_level,
  };
}

export type SqliteDatabaseOptions = {
  /** level > threshold → occupied */
  threshold: number;
};

export class SqliteDatabase implements Database {
  private db: BetterSqlite3.Database;
  private threshold: number;
  private bookedCache = new TtlCache<ReadonlySet<string>>(60_000);

  constructor(filename: string, options: SqliteDatabaseOptions) {
    this.db = new BetterSqlite3(filename);
    this.threshold = options.threshold;
    if (filename !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
    // the file may have been written under another threshold
    this.db
      .prepare<[number]>("UPDATE rooms SET status = CASE WHEN occupancy_level > ? THEN 'occupied' ELSE 'free' END")
      .run(this.threshold);
  }

  async replaceAll(rooms: RoomSeed[], timetable: TimetableSeed[]) {
    const insertRoom = this.db.prepare<RoomSeed>(
      `INSERT INTO rooms (room_id, block, capacity, type, ac, lat, lon, amenities)
       VALUES (@roomId, @block, @capacity, @type, @ac, @lat, @lon, @amenities)`
    );
    const insertEntry = this.db.prepare<TimetableSeed>(
      "INSERT INTO timetables (room_id, day, slot, course) VALUES (@roomId, @day, @slot, @course)"
    );

    const run = this.db.transaction(() => {
      this.db.exec("DELETE FROM occupancies; DELETE FROM timetables; DELETE FROM rooms;");
      for (const r of rooms) insertRoom.run(r);
      for (const t of timetable) insertEntry.run(t);
    });
    run();
    this.bookedCache.invalidate();

    logger.info("Store reloaded", { rooms: rooms.length, timetable: timetable.length });
    return { rooms: rooms.length, timetable: timetable.length };
  }

  async countRooms() {
    const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM rooms").get();
    return row?.n ?? 0;
  }

  async listRooms(filter: RoomFilter = {}) {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (filter.block) {
      where.push("block = ?");
      params.push(filter.block);
    }
    if (filter.type) {
      where.push("lower(type) = lower(?)");
      params.push(filter.type);
    }
    if (filter.minCapacity !== undefined) {
      where.push("capacity >= ?");
      params.push(filter.minCapacity);
    }
    const sql = `SELECT * FROM rooms ${where.length ? `WHERE ${where.join(" AND ")}` : ""} ORDER BY room_id`;
    return this.db.prepare<(string | number)[], RoomRow>(sql).all(...params).map(toRoom);
  }

  async getRoom(roomId: string) {
    const row = this.db.prepare<[string], RoomRow>("SELECT * FROM rooms WHERE room_id = ?").get(roomId);
    return row ? toRoom(row) : null;
  }

  async getTimetable(roomId: string) {
    return this.db
      .prepare<[string], TimetableRow>(
        `SELECT room_id, day, slot, course FROM timetables WHERE room_id = ?
         ORDER BY CASE day WHEN 'Mon' THEN 0 WHEN 'Tue' THEN 1 WHEN 'Wed' THEN 2 WHEN 'Thu' THEN 3
                            WHEN 'Fri' THEN 4 WHEN 'Sat' THEN 5 ELSE 6 END, slot`
      )
      .all(roomId)
      .map((r) => ({ roomId: r.room_id, day: r.day, slot: r.slot, course: r.course }));
  }

  async findBookedRoomIds(day: DayName, slot: number): Promise<ReadonlySet<string>> {
    const key = `${day}:${slot}`;
    const cached = this.bookedCache.get(key);
    if (cached) return cached;
    const rows = this.db
      .prepare<[DayName, number], { room_id: string }>("SELECT DISTINCT room_id FROM timetables WHERE day = ? AND slot = ?")
      .all(day, slot);
    const ids: ReadonlySet<string> = new Set(rows.map((r) => r.room_id));
    this.bookedCache.set(key, ids);
    return ids;
  }

  async countLectureBookingsBySlot() {
    return this.db
      .prepare<[], SlotBookingCount>(
        `SELECT t.day AS day, t.slot AS slot, COUNT(DISTINCT t.room_id) AS rooms
         FROM timetables t JOIN rooms r ON r.room_id = t.room_id
         WHERE lower(r.type) = 'lecture'
         GROUP BY t.day, t.slot`
      )
      .all();
  }

  async getOccupancyHistory(roomId: string, limit: number) {
    return this.db
      .prepare<[string, number], OccupancyRow>(
        "SELECT * FROM occupancies WHERE room_id = ? ORDER BY timestamp DESC, id DESC LIMIT ?"
      )
      .all(roomId, limit)
      .map(toRecord);
  }

  async recordOccupancy(roomId: string, level: number, at: Date = new Date()) {
    const occupancyLevel = clampLevel(level);
    const timestamp = at.toISOString();
    const status = statusForLevel(occupancyLevel, this.threshold);

    const run = this.db.transaction(() => {
      const updated = this.db
        .prepare<[number, RoomStatus, string, string]>(
          "UPDATE rooms SET occupancy_level = ?, status = ?, updated_at = ? WHERE room_id = ?"
        )
        .run(occupancyLevel, status, timestamp, roomId);
      if (updated.changes === 0) return null;

      const inserted = this.db
        .prepare<[string, string, number]>(
          "INSERT INTO occupancies (room_id, timestamp, occupancy_level) VALUES (?, ?, ?)"
        )
        .run(roomId, timestamp, occupancyLevel);
      const row = this.db.prepare<[string], RoomRow>("SELECT * FROM rooms WHERE room_id = ?").get(roomId);
      if (!row) return null;

      const record: OccupancyRecord = {
        id: Number(inserted.lastInsertRowid),
        roomId,
        timestamp,
        occupancyLevel,
      };
      return { record, room: toRoom(row) };
    });
    return run();
  }

  async applyOccupancyUpdates(updates: OccupancyUpdate[], at: Date = new Date()) {
    const timestamp = at.toISOString();
    const updateRoom = this.db.prepare<[number, RoomStatus, string, string]>(
      "UPDATE rooms SET occupancy_level = ?, status = ?, updated_at = ? WHERE room_id = ?"
    );
    const insertRecord = this.db.prepare<[string, string, number]>(
      "INSERT INTO occupancies (room_id, timestamp, occupancy_level) VALUES (?, ?, ?)"
    );

    const run = this.db.transaction((list: OccupancyUpdate[]) => {
      let written = 0;
      for (const u of list) {
        const level = clampLevel(u.occupancyLevel);
        const res = updateRoom.run(level, statusForLevel(level, this.threshold), timestamp, u.roomId);
        if (res.changes === 0) continue;
        insertRecord.run(u.roomId, timestamp, level);
        written += 1;
      }
      return written;
    });
    return run(updates);
  }

  async averageOccupancyByBlock(sinceIso: string) {
    const rows = this.db
      .prepare<[string], { block: string; avg: number | null; samples: number }>(
        `SELECT r.block AS block, AVG(o.occupancy_level) AS avg, COUNT(o.id) AS samples
         FROM rooms r
         LEFT JOIN occupancies o ON o.room_id = r.room_id AND o.timestamp >= ?
         GROUP BY r.block
         ORDER BY r.block`
      )
      .all(sinceIso);
    return rows.map((r) => ({ block: r.block, avgOccupancy: r.avg ?? 0, samples: r.samples }));
  }

  async countRoomsWithHistory() {
    const row = this.db
      .prepare<[], { n: number }>("SELECT COUNT(DISTINCT room_id) AS n FROM occupancies")
      .get();
    return row?.n ?? 0;
  }

  async listHistoryTimestampsSince(sinceIso: string) {
    return this.db
      .prepare<[string], { timestamp: string }>("SELECT timestamp FROM occupancies WHERE timestamp >= ? ORDER BY timestamp")
      .all(sinceIso)
      .map((r) => r.timestamp);
  }

  close() {
    this.db.close();
  }
}

declare global {
  // Survives Next.js dev reloads, which re-evaluate this module
  var __campusDatabase: Database | undefined;
}

/**
 * Database instance (singleton)
 *
 * @example
 * const db = getDatabase();
 * const rooms = await db.listRooms({ block: "UB" });
 */
export function getDatabase(): Database {
  if (globalThis.__campusDatabase) {
    return globalThis.__campusDatabase;
  }

  const env = getAppEnv();
  const options = { threshold: env.OCCUPANCY_THRESHOLD };

  if (env.MOCK_MODE) {
    globalThis.__campusDatabase = new SqliteDatabase(":memory:", options);
  } else {
    const file = path.resolve(process.cwd(), env.DATABASE_PATH);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    globalThis.__campusDatabase = new SqliteDatabase(file, options);
    logger.info("Opened database", { file });
  }
  return globalThis.__campusDatabase;
}
