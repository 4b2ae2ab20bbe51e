import { z } from "zod";
import { OCCUPANCY } from "./constants";

/**
 * Query string number: missing or blank → undefined.
 * z.coerce.number() alone would turn "" into 0.
 */
const OptionalQueryInt = (min: number, max: number) =>
  z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "" ? undefined : v ?? undefined),
    z.coerce.number().int().min(min).max(max).optional()
  );

const OptionalQueryText = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v ?? undefined),
  z.string().trim().max(64).optional()
);

export const CheckinInputSchema = z.object({
  occupancy_level: z
    .number({ required_error: "occupancy_level is required", invalid_type_error: "occupancy_level must be a number" })
    .int("occupancy_level must be an integer")
    .min(OCCUPANCY.MIN_LEVEL)
    .max(OCCUPANCY.MAX_LEVEL),
});

export const RoomQuerySchema = z.object({
  block: OptionalQueryText,
  type: OptionalQueryText,
  capacity: OptionalQueryInt(0, 100_000),
});

export const HeatmapQuerySchema = z.object({
  window_minutes: OptionalQueryInt(1, 10_080),
});

export const OpsMetricsQuerySchema = z.object({
  window: OptionalQueryInt(1, 10_080),
});

/** URLSearchParams → plain object; null for absent keys */
export function queryObject(url: URL, keys: readonly string[]): Record<string, string | null> {
  const out: Record<string, string | null> = {};
  for (const k of keys) out[k] = url.searchParams.get(k);
  return out;
}

export function formatZodIssues(err: z.ZodError) {
  return err.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

/** Admin "report occupancy" form (values, before they become a check-in body) */
export const OccupancyReportSchema = z.object({
  roomId: z.string().trim().min(1, "Pick a room"),
  occupancyLevel: z
    .number({ invalid_type_error: "Enter a number" })
    .int("Whole numbers only")
    .min(OCCUPANCY.MIN_LEVEL, "0 to 100")
    .max(OCCUPANCY.MAX_LEVEL, "0 to 100"),
});

export type OccupancyReportValues = z.infer<typeof OccupancyReportSchema>;
