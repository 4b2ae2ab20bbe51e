import { DAY_NAMES, TIMETABLE } from "./constants";
import type { DayName, TimetableEntry, TimetableSeed } from "./types";

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

export function isDayName(v: string): v is DayName {
  return DAY_NAMES.some((d) => d === v);
}

/** slot 0 = 08:00-09:00 … slot 9 = 17:00-18:00 */
export function slotRange(slot: number): { startTime: string; endTime: string } {
  const start = TIMETABLE.FIRST_SLOT_HOUR + slot;
  return { startTime: `${pad2(start)}:00`, endTime: `${pad2(start + 1)}:00` };
}

export function withSlotRange(entry: TimetableSeed): TimetableEntry {
  return { ...entry, ...slotRange(entry.slot) };
}

/**
 * Current day/slot in UTC. `slot` is null outside teaching hours, in which
 * case no room counts as booked.
 */
export function currentDaySlot(now: Date = new Date()): { day: DayName; slot: number | null } {
  // getUTCDay: 0 = Sunday
  const day = DAY_NAMES[(now.getUTCDay() + 6) % 7];
  const slot = now.getUTCHours() - TIMETABLE.FIRST_SLOT_HOUR;
  return { day, slot: slot >= 0 && slot < TIMETABLE.SLOTS_PER_DAY ? slot : null };
}
