import { DEFAULT_CORS_ORIGINS } from "./constants";

/**
 * Comma-separated origin list → trimmed, non-empty entries.
 * Blank or missing input falls back to the local dashboard origins.
 *
 * Imported by middleware.ts, so keep this free of Node-only modules.
 */
export function parseCorsOrigins(raw: string | undefined): string[] {
  return (raw?.trim() ? raw : DEFAULT_CORS_ORIGINS)
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
