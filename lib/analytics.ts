import { QUERY_LIMITS, TIMETABLE } from "./constants";
import type { Database } from "./database";
import type { AnalyticsSummary, BlockSummary, DayName, HeatmapCell } from "./types";

const MINUTE_MS = 60_000;

/** "2026-03-02T10:15:42.120Z" → "2026-03-02T10:15:00.000Z" */
export function minuteBucket(iso: string): string {
  const d = new Date(iso);
  d.setUTCSeconds(0, 0);
  return d.toISOString();
}

function pct(part: number, whole: number): number {
  return Math.round((part / Math.max(1, whole)) * 100);
}

function emptyCoverage(): Record<DayName, number[]> {
  const slots = () => new Array<number>(TIMETABLE.SLOTS_PER_DAY).fill(0);
  return { Mon: slots(), Tue: slots(), Wed: slots(), Thu: slots(), Fri: slots(), Sat: slots(), Sun: slots() };
}

/**
 * Mean occupancy per block over the last `windowMinutes`, from history
 * records (every block is listed, empty ones with 0 samples).
 */
export async function buildHeatmap(
  db: Database,
  windowMinutes: number,
  now: Date = new Date()
): Promise<HeatmapCell[]> {
  const since = new Date(now.getTime() - windowMinutes * MINUTE_MS).toISOString();
  return db.averageOccupancyByBlock(since);
}

export async function buildSummary(db: Database, now: Date = new Date()): Promise<AnalyticsSummary> {
  const rooms = await db.listRooms();

  // by block: current levels
  const blockMap = new Map<string, { rooms: number; capacity: number; levelSum: number }>();
  const types: Record<string, number> = {};
  let totalCapacity = 0;

  for (const r of rooms) {
    const key = r.block || "Unknown";
    const acc = blockMap.get(key) ?? { rooms: 0, capacity: 0, levelSum: 0 };
    acc.rooms += 1;
    acc.capacity += r.capacity;
    acc.levelSum += r.occupancyLevel;
    blockMap.set(key, acc);

    const type = r.type || "lecture";
    types[type] = (types[type] ?? 0) + 1;
    totalCapacity += r.capacity;
  }

  const blocks: BlockSummary[] = [...blockMap.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([block, v]) => ({
      block,
      rooms: v.rooms,
      capacity: v.capacity,
      avgOccupancy: Math.round(v.levelSum / Math.max(1, v.rooms)),
    }));

  // timetable coverage of lecture rooms, per day/slot
  const lectureRooms = rooms.filter((r) => (r.type || "lecture").toLowerCase() === "lecture").length;
  const timetableCoveragePct = emptyCoverage();
  for (const row of await db.countLectureBookingsBySlot()) {
    const slots = timetableCoveragePct[row.day];
    if (row.slot >= 0 && row.slot < slots.length) slots[row.slot] = pct(row.rooms, lectureRooms);
  }

  // insert rate
  const windowMinutes = QUERY_LIMITS.INSERT_RATE_WINDOW_MINUTES;
  const since = new Date(now.getTime() - windowMinutes * MINUTE_MS).toISOString();
  const insertsPerMinute: Record<string, number> = {};
  const recent = await db.listHistoryTimestampsSince(since);
  for (const ts of recent) {
    const bucket = minuteBucket(ts);
    insertsPerMinute[bucket] = (insertsPerMinute[bucket] ?? 0) + 1;
  }

  const roomsWithData = await db.countRoomsWithHistory();

  return {
    totalRooms: rooms.length,
    totalCapacity,
    blockCount: blocks.length,
    types,
    blocks,
    coverage: {
      roomsWithData,
      totalRooms: rooms.length,
      pct: pct(roomsWithData, rooms.length),
    },
    timetableCoveragePct,
    insertsLast5m: recent.length,
    insertsPerMinute,
    insertRatePerMinute: Math.round((recent.length / windowMinutes) * 100) / 100,
    generatedAt: now.toISOString(),
  };
}
