/**
 * Client-side helpers shared by the dashboards.
 * Pure functions over the room list returned by GET /rooms/all and the
 * analytics summary.
 */

import campusLayout from "@/data/campus-layout.json";
import { OCCUPANCY } from "./constants";
import { haversineMeters } from "./geo";
import { displayStatus } from "./occupancy";
import type { DisplayStatus, RoomView, StatusThresholds } from "./types";

export const DEFAULT_THRESHOLDS: StatusThresholds = {
  partial: OCCUPANCY.DEFAULT_THRESHOLD,
  full: OCCUPANCY.DEFAULT_FULL_THRESHOLD,
};

export const DISPLAY_STATUSES: readonly DisplayStatus[] = ["Free", "Partial", "Full"];

export type LatLon = { lat: number; lon: number };

export type LocationPreset = LatLon & { id: string; label: string };

/** One preset per block centre; "center" is computed from the rooms */
export const BLOCK_LOCATION_PRESETS: readonly LocationPreset[] = campusLayout.blocks.map((b) => ({
  id: b.block,
  label: `Block ${b.block}`,
  lat: b.center.lat,
  lon: b.center.lon,
}));

export function campusCenter(rooms: RoomView[]): LatLon | null {
  if (rooms.length === 0) return null;
  let lat = 0;
  let lon = 0;
  for (const r of rooms) {
    lat += r.lat;
    lon += r.lon;
  }
  return { lat: lat / rooms.length, lon: lon / rooms.length };
}

export function listBlocks(rooms: RoomView[]): string[] {
  return [...new Set(rooms.map((r) => r.block))].sort();
}

export function statusCounts(rooms: RoomView[], t: StatusThresholds = DEFAULT_THRESHOLDS) {
  const counts: Record<DisplayStatus, number> = { Free: 0, Partial: 0, Full: 0 };
  for (const r of rooms) counts[displayStatus(r, t)] += 1;
  return counts;
}

export function overviewMetrics(rooms: RoomView[], t: StatusThresholds = DEFAULT_THRESHOLDS) {
  const total = rooms.length;
  const sum = rooms.reduce((s, r) => s + r.occupancyLevel, 0);
  return {
    totalRooms: total,
    freeNow: statusCounts(rooms, t).Free,
    avgOccupancy: total ? Math.round(sum / total) : 0,
  };
}

export type AdminFilter = {
  block?: string;
  status?: DisplayStatus;
  minCapacity?: number;
};

export function filterAdminRooms(rooms: RoomView[], f: AdminFilter, t: StatusThresholds = DEFAULT_THRESHOLDS) {
  return rooms.filter(
    (r) =>
      (!f.block || r.block === f.block) &&
      (!f.status || displayStatus(r, t) === f.status) &&
      (!f.minCapacity || r.capacity >= f.minCapacity)
  );
}

export type UserSort = "distance" | "capacity" | "occupancy";

export type UserRoomQuery = {
  origin: LatLon;
  /** matches room id or amenities, case-insensitive */
  text?: string;
  block?: string;
  minCapacity?: number;
  sortBy: UserSort;
  maxResults: number;
};

export type RankedRoom = RoomView & { distanceM: number; display: DisplayStatus };

export function rankRooms(rooms: RoomView[], q: UserRoomQuery, t: StatusThresholds = DEFAULT_THRESHOLDS): RankedRoom[] {
  const text = q.text?.trim().toLowerCase() ?? "";

  const matched = rooms
    .filter((r) => !q.block || r.block === q.block)
    .filter((r) => !q.minCapacity || r.capacity >= q.minCapacity)
    .filter((r) => !text || r.roomId.toLowerCase().includes(text) || r.amenities.toLowerCase().includes(text))
    .map((r) => ({
      ...r,
      distanceM: haversineMeters(q.origin.lat, q.origin.lon, r.lat, r.lon),
      display: displayStatus(r, t),
    }));

  const compare: Record<UserSort, (a: RankedRoom, b: RankedRoom) => number> = {
    distance: (a, b) => a.distanceM - b.distanceM,
    capacity: (a, b) => b.capacity - a.capacity,
    occupancy: (a, b) => a.occupancyLevel - b.occupancyLevel,
  };

  return matched.sort(compare[q.sortBy]).slice(0, Math.max(0, q.maxResults));
}

/** Check-in is offered for rooms that still have space */
export function canCheckIn(status: DisplayStatus) {
  return status !== "Full";
}

export type InsertRate = {
  /** oldest minute first */
  points: { minute: string; inserts: number }[];
  total: number;
  avgPerMinute: number;
  peak: number;
};

/** Chart series and totals for `AnalyticsSummary.insertsPerMinute` */
export function insertRate(insertsPerMinute: Record<string, number>): InsertRate {
  const points = Object.entries(insertsPerMinute)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([minute, inserts]) => ({ minute, inserts }));
  const total = points.reduce((s, p) => s + p.inserts, 0);
  return {
    points,
    total,
    avgPerMinute: points.length ? Math.round((total / points.length) * 10) / 10 : 0,
    peak: points.reduce((m, p) => Math.max(m, p.inserts), 0),
  };
}

/** Newest first, each with a list key that stays unique when timestamps repeat */
export function newestFirst<T extends { timestamp: string }>(rows: T[]): (T & { key: string })[] {
  return rows
    .slice()
    .reverse()
    .map((r, i) => ({ ...r, key: `${i}-${r.timestamp}` }));
}
