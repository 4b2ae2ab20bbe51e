import { OCCUPANCY } from "./constants";
import type { DisplayStatus, RoomStatus, StatusThresholds } from "./types";

export function clampLevel(level: number): number {
  if (!Number.isFinite(level)) return OCCUPANCY.MIN_LEVEL;
  return Math.min(OCCUPANCY.MAX_LEVEL, Math.max(OCCUPANCY.MIN_LEVEL, Math.round(level)));
}

export function statusForLevel(level: number, threshold: number = OCCUPANCY.DEFAULT_THRESHOLD): RoomStatus {
  return level > threshold ? "occupied" : "free";
}

/**
 * Dashboard status, in priority order:
 *  1) booked in the current slot → Full
 *  2) level >= fullThreshold → Full
 *  3) level > partialThreshold → Partial
 *  4) Free
 */
export function displayStatus(
  room: { occupancyLevel: number; booked?: boolean },
  thresholds: StatusThresholds = {
    partial: OCCUPANCY.DEFAULT_THRESHOLD,
    full: OCCUPANCY.DEFAULT_FULL_THRESHOLD,
  }
): DisplayStatus {
  if (room.booked) return "Full";
  if (room.occupancyLevel >= thresholds.full) return "Full";
  if (room.occupancyLevel > thresholds.partial) return "Partial";
  return "Free";
}

/** Uniform integer in [-maxDelta, maxDelta] */
export function randomDelta(maxDelta: number, random: () => number = Math.random): number {
  if (maxDelta <= 0) return 0;
  return Math.floor(random() * (2 * maxDelta + 1)) - maxDelta;
}

export function applyDelta(level: number, delta: number): number {
  return clampLevel(level + delta);
}
