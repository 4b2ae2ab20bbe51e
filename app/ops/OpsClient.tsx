"use client";

import { useCallback, useState } from "react";

import HealthCharts from "@/components/ops/HealthCharts";
import IncidentPanel from "@/components/ops/IncidentPanel";
import InsertRateChart from "@/components/ops/InsertRateChart";
import MetricTile from "@/components/MetricTile";
import Button from "@/components/ui/Button";
import Card from "@/components/ui/Card";
import Checkbox from "@/components/ui/Checkbox";
import { FieldLabel, Select } from "@/components/ui/Field";
import Notice from "@/components/ui/Notice";
import { SECTION_DESC, SECTION_TITLE } from "@/components/ui/presets";
import { apiGet, apiPostJson, errorMessage } from "@/lib/api-client";
import { DAY_NAMES } from "@/lib/constants";
import { newestFirst } from "@/lib/dashboard";
import type { HealthAlert, HealthMetrics, IncidentSummary, ProbeResult, UptimeTier } from "@/lib/healthMonitor";
import type { AnalyticsSummary } from "@/lib/types";
import { usePolling } from "@/lib/usePolling";

type MetricsResponse = {
  windowMinutes: number;
  metrics: HealthMetrics;
  alert: HealthAlert;
  tier: UptimeTier;
  incidents: IncidentSummary;
  rows: ProbeResult[];
};

const REFRESH_OPTIONS = [2, 5, 10, 30, 60];
const WINDOW_OPTIONS = [5, 15, 60, 120, 240];

const ALERTS: Record<HealthAlert, { variant: "danger" | "warn" | "success" | "info"; title: string; text: string }> = {
  critical: { variant: "danger", title: "Critical", text: "The backend is currently down." },
  warning: { variant: "warn", title: "Warning", text: "Availability dropped below 95% in the last 5 minutes." },
  healthy: { variant: "success", title: "Healthy", text: "All systems operational." },
  unknown: { variant: "info", title: "No data", text: "No probes recorded in this window yet." },
};

function ms(v: number | null, digits = 0) {
  return v === null ? "—" : `${v.toFixed(digits)} ms`;
}

export default function OpsClient() {
  const [autoProbe, setAutoProbe] = useState(true);
  const [refreshSec, setRefreshSec] = useState(5);
  const [windowMin, setWindowMin] = useState(60);
  const [showRaw, setShowRaw] = useState(false);
  const [alertsOn, setAlertsOn] = useState(true);
  const [probeError, setProbeError] = useState<string | null>(null);

  const load = useCallback(async () => {
    if (autoProbe) await apiPostJson<ProbeResult>("/api/ops/probe");
    const [health, summary] = await Promise.all([
      apiGet<MetricsResponse>(`/api/ops/metrics?window=${windowMin}`),
      apiGet<AnalyticsSummary>("/analytics/summary"),
    ]);
    return { health, summary };
  }, [autoProbe, windowMin]);

  const { data, error, loading, refresh } = usePolling(load, refreshSec * 1000, [load]);

  async function probeNow() {
    setProbeError(null);
    try {
      await apiPostJson<ProbeResult>("/api/ops/probe");
    } catch (e: unknown) {
      setProbeError(errorMessage(e));
    }
    await refresh();
  }

  const m = data?.health.metrics;
  const alert = data && alertsOn ? ALERTS[data.health.alert] : null;

  return (
    <div className="space-y-6">
      <Card>
        <div className="flex flex-wrap items-end gap-3">
          <Checkbox label="Auto probe on refresh" checked={autoProbe} onChange={(e) => setAutoProbe(e.target.checked)} />
          <div>
            <FieldLabel htmlFor="o-refresh">Auto refresh</FieldLabel>
            <Select id="o-refresh" value={refreshSec} onChange={(e) => setRefreshSec(Number(e.target.value))}>
              {REFRESH_OPTIONS.map((s) => (
                <option key={s} value={s}>{s} s</option>
              ))}
            </Select>
          </div>
          <div>
            <FieldLabel htmlFor="o-window">Metrics window</FieldLabel>
            <Select id="o-window" value={windowMin} onChange={(e) => setWindowMin(Number(e.target.value))}>
              {WINDOW_OPTIONS.map((w) => (
                <option key={w} value={w}>{w} min</option>
              ))}
            </Select>
          </div>
          {!autoProbe ? (
            <Button variant="outline" onClick={() => void probeNow()} disabled={loading}>
              Probe now
            </Button>
          ) : null}
          <Checkbox label="Enable status alerts" checked={alertsOn} onChange={(e) => setAlertsOn(e.target.checked)} />
          <Checkbox label="Show raw data" checked={showRaw} onChange={(e) => setShowRaw(e.target.checked)} />
        </div>
      </Card>

      {error || probeError ? (
        <Notice variant="danger" title="Dashboard request failed">
          {error ?? probeError}
        </Notice>
      ) : null}
      {alert ? (
        <Notice variant={alert.variant} title={alert.title}>
          {alert.text}
        </Notice>
      ) : null}

      {m ? (
        <>
          <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-5">
            <MetricTile label="Server" value={m.currentStatus === "up" ? "Live" : m.currentStatus === "down" ? "Down" : "Unknown"} />
            <MetricTile label="Current latency" value={ms(m.currentLatencyMs)} hint={`avg ${ms(m.avgLatencyMs)}`} />
            <MetricTile label="Uptime" value={`${m.uptimePct.toFixed(2)}%`} hint={`last 5 min ${m.recentUptimePct.toFixed(1)}%`} />
            <MetricTile label="Error rate" value={`${m.errorRatePct.toFixed(2)}%`} hint={`${m.errors} errors`} />
            <MetricTile
              label="Probes"
              value={m.total.toLocaleString()}
              hint={m.lastDownAt ? `last down ${new Date(m.lastDownAt).toLocaleTimeString()}` : "no downtime"}
            />
          </div>
          <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-4">
            <MetricTile label="Min latency" value={ms(m.minLatencyMs)} />
            <MetricTile label="Max latency" value={ms(m.maxLatencyMs)} />
            <MetricTile label="p95 latency" value={ms(m.p95LatencyMs)} />
            <MetricTile label="Std deviation" value={ms(m.stdDevLatencyMs, 1)} />
          </div>
        </>
      ) : null}

      {data && data.health.rows.length > 0 ? <HealthCharts rows={data.health.rows} p95={data.health.metrics.p95LatencyMs} /> : null}

      {data ? (
        <div className="grid gap-4 lg:grid-cols-3">
          <div className="lg:col-span-2">
            <InsertRateChart insertsPerMinute={data.summary.insertsPerMinute} />
          </div>
          <IncidentPanel incidents={data.health.incidents} tier={data.health.tier} uptimePct={data.health.metrics.uptimePct} />
        </div>
      ) : null}

      {data ? (
        <Card>
          <h2 className={SECTION_TITLE}>Data summary</h2>
          <p className={SECTION_DESC}>
            {data.summary.totalRooms} rooms in {data.summary.blockCount} blocks · {data.summary.totalCapacity.toLocaleString()} seats ·{" "}
            {data.summary.insertsLast5m} history records in the last 5 min ({data.summary.insertRatePerMinute}/min) ·{" "}
            {data.summary.coverage.pct}% of rooms have occupancy data
          </p>
          <div className="mt-4 overflow-x-auto rounded-xl border border-slate-200">
            <table className="w-full text-xs">
              <thead>
                <tr className="border-b border-slate-200 bg-slate-50 text-slate-700">
                  <th className="px-3 py-2 text-left font-semibold">Timetable coverage</th>
                  {Array.from({ length: 10 }, (_, i) => (
                    <th key={i} className="px-2 py-2 text-right font-semibold">{String(8 + i).padStart(2, "0")}:00</th>
                  ))}
                </tr>
              </thead>
              <tbody>
                {DAY_NAMES.map((d) => (
                  <tr key={d} className="border-b border-slate-100 last:border-0">
                    <td className="px-3 py-1.5 font-medium">{d}</td>
                    {data.summary.timetableCoveragePct[d].map((p, i) => (
                      <td key={i} className="px-2 py-1.5 text-right tabular-nums">{p}%</td>
                    ))}
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </Card>
      ) : null}

      {showRaw && data ? (
        <Card>
          <h2 className={SECTION_TITLE}>Raw probes</h2>
          <div className="mt-3 max-h-96 overflow-auto rounded-xl border border-slate-200">
            <table className="w-full text-xs">
              <thead>
                <tr className="border-b border-slate-200 bg-slate-50 text-left text-slate-700">
                  <th className="px-3 py-2">Time</th>
                  <th className="px-3 py-2">Status</th>
                  <th className="px-3 py-2 text-right">Latency</th>
                  <th className="px-3 py-2 text-right">HTTP</th>
                  <th className="px-3 py-2">Error</th>
                </tr>
              </thead>
              <tbody>
                {newestFirst(data.health.rows).map((r) => (
                  <tr key={r.key} className="border-b border-slate-100 last:border-0">
                    <td className="px-3 py-1.5">{new Date(r.timestamp).toLocaleTimeString()}</td>
                    <td className="px-3 py-1.5">{r.status}</td>
                    <td className="px-3 py-1.5 text-right">{ms(r.latencyMs, 2)}</td>
                    <td className="px-3 py-1.5 text-right">{r.httpStatus ?? "—"}</td>
                    <td className="px-3 py-1.5">{r.error ?? ""}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </Card>
      ) : null}
    </div>
  );
}
