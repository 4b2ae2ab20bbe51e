/**
 * Shared constants
 *
 * Server code reads thresholds from the environment (lib/env.ts); the values
 * here are the defaults the dashboards fall back to.
 */

import type { DayName } from "./types";

export const OCCUPANCY = {
  MIN_LEVEL: 0,
  MAX_LEVEL: 100,
  /** level > this → occupied / Partial */
  DEFAULT_THRESHOLD: 30,
  /** level >= this → Full */
  DEFAULT_FULL_THRESHOLD: 95,
} as const;

export const TIMETABLE = {
  SLOTS_PER_DAY: 10,
  FIRST_SLOT_HOUR: 8,
} as const;

export const DAY_NAMES: readonly DayName[] = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];

export const QUERY_LIMITS = {
  FREE_ROOMS: 100,
  ROOM_HISTORY: 50,
  INSERT_RATE_WINDOW_MINUTES: 5,
} as const;

/** Check-in posted by the user dashboard */
export const USER_CHECKIN_LEVEL = 1;

export const CSV_UPLOAD_MAX_BYTES = 5 * 1024 * 1024;

export const DEFAULT_CORS_ORIGINS = "http://localhost:3000,http://localhost:5173,http://127.0.0.1:5173";
