"use client";

import {
  Area,
  AreaChart,
  CartesianGrid,
  Line,
  LineChart,
  ReferenceLine,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";

import Card from "@/components/ui/Card";
import type { ProbeResult } from "@/lib/healthMonitor";

function timeLabel(iso: string) {
  return new Date(iso).toLocaleTimeString([], { hour: "2-digit", minute: "2-digit", second: "2-digit" });
}

export default function HealthCharts({ rows, p95 }: { rows: ProbeResult[]; p95: number | null }) {
  const data = rows.map((r) => ({
    time: timeLabel(r.timestamp),
    latency: r.latencyMs,
    up: r.status === "up" ? 1 : 0,
  }));

  return (
    <div className="grid gap-4 lg:grid-cols-2">
      <Card title="Response time">
        <div className="h-64 w-full">
          <ResponsiveContainer width="100%" height="100%">
            <LineChart data={data} margin={{ top: 10, right: 10, left: -10, bottom: 0 }}>
              <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
              <XAxis dataKey="time" tick={{ fill: "#64748b", fontSize: 10 }} minTickGap={30} />
              <YAxis tick={{ fill: "#64748b", fontSize: 10 }} unit=" ms" />
              <Tooltip />
              {p95 !== null ? (
                <ReferenceLine y={p95} stroke="#f59e0b" strokeDasharray="3 3" label={{ position: "right", value: "p95", fill: "#f59e0b", fontSize: 10 }} />
              ) : null}
              <Line type="monotone" dataKey="latency" stroke="rgb(37 99 235)" strokeWidth={2} dot={false} connectNulls isAnimationActive={false} />
            </LineChart>
          </ResponsiveContainer>
        </div>
      </Card>

      <Card title="Availability">
        <div className="h-64 w-full">
          <ResponsiveContainer width="100%" height="100%">
            <AreaChart data={data} margin={{ top: 10, right: 10, left: -20, bottom: 0 }}>
              <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
              <XAxis dataKey="time" tick={{ fill: "#64748b", fontSize: 10 }} minTickGap={30} />
              <YAxis domain={[0, 1]} ticks={[0, 1]} tick={{ fill: "#64748b", fontSize: 10 }} />
              <Tooltip />
              <Area type="stepAfter" dataKey="up" stroke="#16a34a" fill="#16a34a" fillOpacity={0.2} isAnimationActive={false} />
            </AreaChart>
          </ResponsiveContainer>
        </div>
      </Card>
    </div>
  );
}
