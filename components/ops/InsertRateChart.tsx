"use client";

import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import MetricTile from "@/components/MetricTile";
import Card from "@/components/ui/Card";
import { insertRate } from "@/lib/dashboard";

function minuteLabel(iso: string) {
  return new Date(iso).toLocaleTimeString([], { hour: "2-digit", minute: "2-digit" });
}

export default function InsertRateChart({ insertsPerMinute }: { insertsPerMinute: Record<string, number> }) {
  const rate = insertRate(insertsPerMinute);
  const data = rate.points.map((p) => ({ time: minuteLabel(p.minute), inserts: p.inserts }));

  return (
    <Card title="Occupancy inserts per minute" description="History records written by check-ins and the simulator.">
      {data.length === 0 ? (
        <p className="text-sm text-slate-500">No recent database activity.</p>
      ) : (
        <>
          <div className="h-64 w-full">
            <ResponsiveContainer width="100%" height="100%">
              <BarChart data={data} margin={{ top: 10, right: 10, left: -20, bottom: 0 }}>
                <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
                <XAxis dataKey="time" tick={{ fill: "#64748b", fontSize: 10 }} />
                <YAxis allowDecimals={false} tick={{ fill: "#64748b", fontSize: 10 }} />
                <Tooltip />
                <Bar dataKey="inserts" fill="#0ea5e9" isAnimationActive={false} />
              </BarChart>
            </ResponsiveContainer>
          </div>
          <div className="mt-3 grid gap-3 sm:grid-cols-3">
            <MetricTile label="Total inserts" value={rate.total.toLocaleString()} />
            <MetricTile label="Avg / min" value={rate.avgPerMinute.toFixed(1)} />
            <MetricTile label="Peak / min" value={rate.peak.toLocaleString()} />
          </div>
        </>
      )}
    </Card>
  );
}
