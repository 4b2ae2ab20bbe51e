/**
 * Backend health monitor (ops dashboard)
 *
 * Probes GET <apiBase>/health, appends each probe to a CSV log and computes
 * availability / latency metrics over a time window.
 */

import fs from "fs";
import path from "path";
import * as Papa from "papaparse";
import { logger } from "./logger";

export type ProbeStatus = "up" | "down";

export type ProbeResult = {
  timestamp: string;
  status: ProbeStatus;
  /** ms, 2 decimals */
  latencyMs: number | null;
  httpStatus: number | null;
  error: string | null;
};

export type HealthMetrics = {
  total: number;
  currentStatus: ProbeStatus | "unknown";
  currentLatencyMs: number | null;
  uptimePct: number;
  /** successful probes only */
  avgLatencyMs: number | null;
  errors: number;
  errorRatePct: number;
  lastDownAt: string | null;
  minLatencyMs: number | null;
  maxLatencyMs: number | null;
  p95LatencyMs: number | null;
  stdDevLatencyMs: number | null;
  recentUptimePct: number;
};

export type HealthAlert = "critical" | "warning" | "healthy" | "unknown";

export type UptimeTier = "EXCELLENT" | "GOOD" | "ATTENTION";

export type Incident = {
  timestamp: string;
  /** probe error, or "HTTP <status>" when the probe recorded none */
  error: string;
  httpStatus: number | null;
  latencyMs: number | null;
};

export type IncidentSummary = {
  /** newest first */
  recent: Incident[];
  last5m: number;
  last1h: number;
};

export const HEALTH_CSV_FIELDS = ["timestamp_iso", "status", "latency_ms", "http_status", "error"] as const;

const RECENT_WINDOW_MS = 5 * 60_000;
const HOUR_MS = 60 * 60_000;
const MAX_RECENT_INCIDENTS = 5;

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type ProbeOptions = {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  clock?: () => number;
};

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

export async function probeHealth(apiBase: string, options: ProbeOptions = {}): Promise<ProbeResult> {
  const { timeoutMs = 3000, fetchImpl = fetch, clock = () => performance.now() } = options;
  const url = `${apiBase.replace(/\/+$/, "")}/health`;
  const t0 = clock();

  try {
    const res = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
    return {
      timestamp: new Date().toISOString(),
      status: res.ok ? "up" : "down",
      latencyMs: round2(clock() - t0),
      httpStatus: res.status,
      error: res.ok ? null : `HTTP ${res.status}`,
    };
  } catch (e: unknown) {
    return {
      timestamp: new Date().toISOString(),
      status: "down",
      latencyMs: round2(clock() - t0),
      httpStatus: null,
      error: e instanceof Error ? e.message : String(e),
    };
  }
}

export function appendProbe(file: string, result: ProbeResult) {
  const isNew = !fs.existsSync(file);
  if (isNew) fs.mkdirSync(path.dirname(file), { recursive: true });

  const csv = Papa.unparse(
    {
      fields: [...HEALTH_CSV_FIELDS],
      data: [[
        result.timestamp,
        result.status,
        result.latencyMs === null ? "" : String(result.latencyMs),
        result.httpStatus === null ? "" : String(result.httpStatus),
        result.error ?? "",
      ]],
    },
    { header: isNew, newline: "\n" }
  );
  fs.appendFileSync(file, csv + "\n", "utf-8");
}

function optionalNumber(v: string | undefined): number | null {
  if (v === undefined || v.trim() === "") return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

/** Probes recorded in the last `minutes`, oldest first. Unparseable rows are skipped. */
export function readWindow(file: string, minutes: number, now: Date = new Date()): ProbeResult[] {
  if (!fs.existsSync(file)) return [];

  const parsed = Papa.parse<Record<string, string>>(fs.readFileSync(file, "utf-8"), {
    header: true,
    skipEmptyLines: true,
  });
  if (parsed.errors.length > 0) {
    logger.warn("Health log has malformed rows", { file, errors: parsed.errors.length });
  }

  const cutoff = now.getTime() - minutes * 60_000;
  const rows: ProbeResult[] = [];
  for (const row of parsed.data) {
    const ts = Date.parse(row.timestamp_iso ?? "");
    if (!Number.isFinite(ts) || ts < cutoff) continue;
    rows.push({
      timestamp: new Date(ts).toISOString(),
      status: row.status === "up" ? "up" : "down",
      latencyMs: optionalNumber(row.latency_ms),
      httpStatus: optionalNumber(row.http_status),
      error: row.error ? row.error : null,
    });
  }
  return rows;
}

/** Linear interpolation between closest ranks */
export function percentile(values: number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = values.slice().sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

/** Sample standard deviation; 0 for fewer than two values */
export function stdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function computeMetrics(rows: ProbeResult[], now: Date = new Date()): HealthMetrics {
  const total = rows.length;
  const last = rows.length > 0 ? rows[rows.length - 1] : null;

  const ups = rows.filter((r) => r.status === "up").length;
  const errors = total - ups;

  const successLatencies: number[] = [];
  const allLatencies: number[] = [];
  for (const r of rows) {
    if (r.latencyMs === null) continue;
    allLatencies.push(r.latencyMs);
    if (r.status === "up") successLatencies.push(r.latencyMs);
  }

  let lastDownAt: string | null = null;
  for (let i = rows.length - 1; i >= 0; i--) {
    if (rows[i].status === "down") {
      lastDownAt = rows[i].timestamp;
      break;
    }
  }

  const recentCutoff = now.getTime() - RECENT_WINDOW_MS;
  const recent = rows.filter((r) => Date.parse(r.timestamp) > recentCutoff);
  const recentUps = recent.filter((r) => r.status === "up").length;
  const p95 = percentile(allLatencies, 95);

  return {
    total,
    currentStatus: last ? last.status : "unknown",
    currentLatencyMs: last ? last.latencyMs : null,
    uptimePct: total ? round2((ups / total) * 100) : 0,
    avgLatencyMs: successLatencies.length
      ? round2(successLatencies.reduce((s, v) => s + v, 0) / successLatencies.length)
      : null,
    errors,
    errorRatePct: total ? round2((errors / total) * 100) : 0,
    lastDownAt,
    minLatencyMs: allLatencies.length ? Math.min(...allLatencies) : null,
    maxLatencyMs: allLatencies.length ? Math.max(...allLatencies) : null,
    p95LatencyMs: p95 === null ? null : round2(p95),
    stdDevLatencyMs: allLatencies.length ? round2(stdDev(allLatencies)) : null,
    recentUptimePct: recent.length ? round2((recentUps / recent.length) * 100) : 0,
  };
}

export function healthAlert(m: HealthMetrics): HealthAlert {
  if (m.currentStatus === "down") return "critical";
  if (m.recentUptimePct > 0 && m.recentUptimePct < 95) return "warning";
  if (m.currentStatus === "up") return "healthy";
  return "unknown";
}

export function uptimeTier(uptimePct: number): UptimeTier {
  if (uptimePct >= 99.9) return "EXCELLENT";
  if (uptimePct >= 99) return "GOOD";
  return "ATTENTION";
}

/** Down probes in the window: the latest few, plus counts over the last 5 minutes and hour */
export function incidentSummary(rows: ProbeResult[], now: Date = new Date()): IncidentSummary {
  const downs = rows
    .filter((r) => r.status === "down")
    .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp));
  const after = (ms: number) => downs.filter((r) => Date.parse(r.timestamp) > now.getTime() - ms).length;

  return {
    recent: downs.slice(0, MAX_RECENT_INCIDENTS).map((r) => ({
      timestamp: r.timestamp,
      error: r.error ?? `HTTP ${r.httpStatus ?? "unknown"}`,
      httpStatus: r.httpStatus,
      latencyMs: r.latencyMs,
    })),
    last5m: after(RECENT_WINDOW_MS),
    last1h: after(HOUR_MS),
  };
}
