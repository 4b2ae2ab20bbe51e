"use client";

import MetricTile from "@/components/MetricTile";
import Card from "@/components/ui/Card";
import Notice from "@/components/ui/Notice";
import type { IncidentSummary, UptimeTier } from "@/lib/healthMonitor";

const TIERS: Record<UptimeTier, { variant: "success" | "warn" | "danger"; label: string }> = {
  EXCELLENT: { variant: "success", label: "Excellent" },
  GOOD: { variant: "warn", label: "Good" },
  ATTENTION: { variant: "danger", label: "Attention needed" },
};

type Props = {
  incidents: IncidentSummary;
  tier: UptimeTier;
  uptimePct: number;
};

export default function IncidentPanel({ incidents, tier, uptimePct }: Props) {
  const t = TIERS[tier];

  return (
    <Card title="Incidents">
      <div className="space-y-4">
        <Notice variant={t.variant} title={t.label}>
          Uptime {uptimePct.toFixed(tier === "EXCELLENT" ? 3 : 2)}% in this window
        </Notice>

        <div className="grid grid-cols-2 gap-3">
          <MetricTile label="Last 5 min" value={incidents.last5m} />
          <MetricTile label="Last hour" value={incidents.last1h} />
        </div>

        {incidents.recent.length === 0 ? (
          <p className="text-sm text-slate-500">No incidents in the monitoring window.</p>
        ) : (
          <ol className="divide-y divide-slate-100 rounded-xl border border-slate-200 text-sm">
            {incidents.recent.map((i, idx) => (
              <li key={`${idx}-${i.timestamp}`} className="px-3 py-2">
                <div className="font-semibold tabular-nums">{new Date(i.timestamp).toLocaleString()}</div>
                <div className="text-slate-700">{i.error}</div>
                <div className="text-xs text-slate-500">
                  HTTP {i.httpStatus ?? "—"}
                  {i.latencyMs !== null ? ` · ${Math.round(i.latencyMs)} ms` : ""}
                </div>
              </li>
            ))}
          </ol>
        )}
      </div>
    </Card>
  );
}
