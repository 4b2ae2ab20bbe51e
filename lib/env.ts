import { z } from "zod";
import { parseCorsOrigins } from "./cors";

/**
 * Environment configuration, validated once with zod.
 *
 * ✅ MOCK_MODE=true
 *  - the store runs on an in-memory SQLite database (tests, throwaway demos)
 *  - nothing is written under DATABASE_PATH
 */

/** "true"/"1"/"yes" → true, "false"/"0"/"no" → false, empty → default */
const EnvBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      const s = (v ?? "").trim().toLowerCase();
      if (!s) return fallback;
      if (s === "true" || s === "1" || s === "yes") return true;
      if (s === "false" || s === "0" || s === "no") return false;
      ctx.addIssue({ code: "custom", message: `expected a boolean, got "${v}"` });
      return z.NEVER;
    });

const EnvInt = (fallback: number, min: number, max: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? String(fallback) : v))
    .pipe(z.coerce.number().int().min(min).max(max));

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const AppEnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).optional(),
  MOCK_MODE: EnvBoolean(false),
  DATABASE_PATH: z.string().min(1).default("data/campus.db"),

  OCCUPANCY_THRESHOLD: EnvInt(30, 0, 100),
  FULL_THRESHOLD: EnvInt(95, 0, 100),

  SIMULATOR_ENABLED: EnvBoolean(true),
  SIMULATOR_INTERVAL_MS: EnvInt(4000, 100, 3_600_000),
  SIMULATOR_SAMPLE_SIZE: EnvInt(10, 0, 100_000),
  SIMULATOR_MAX_DELTA: EnvInt(15, 0, 100),

  SEED: EnvInt(42, 0, 2_147_483_647),
  SEED_DIR: z.string().min(1).default("data"),
  SEED_ON_START: EnvBoolean(true),
  POPULATE_ON_START: z.enum(["if-empty", "always", "never"]).default("if-empty"),

  HEATMAP_WINDOW_MINUTES: EnvInt(60, 1, 10_080),
  HEALTH_LOG_PATH: z.string().min(1).default("data/backend_health.csv"),
  API_BASE_URL: z.string().url().default("http://localhost:3000"),
  CORS_ORIGINS: z.string().optional().transform(parseCorsOrigins),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
}).superRefine((v, ctx) => {
  if (v.FULL_THRESHOLD <= v.OCCUPANCY_THRESHOLD) {
    ctx.addIssue({
      code: "custom",
      path: ["FULL_THRESHOLD"],
      message: "FULL_THRESHOLD must be greater than OCCUPANCY_THRESHOLD",
    });
  }
});

export type AppEnv = z.infer<typeof AppEnvSchema>;

export function parseAppEnv(source: Record<string, string | undefined>): AppEnv {
  const parsed = AppEnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment configuration:\n${parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("\n")}`
    );
  }
  return parsed.data;
}

let cached: AppEnv | null = null;

export function getAppEnv(): AppEnv {
  if (!cached) cached = parseAppEnv(process.env);
  return cached;
}

/** Tests change process.env between cases */
export function resetAppEnv() {
  cached = null;
}
