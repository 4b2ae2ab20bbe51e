"use client";

import { Bar, BarChart, CartesianGrid, Cell, Legend, Pie, PieChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import RoomMap, { STATUS_COLORS } from "@/components/RoomMap";
import Card from "@/components/ui/Card";
import { DISPLAY_STATUSES } from "@/lib/dashboard";
import type { DisplayStatus, HeatmapCell, RoomView, StatusThresholds } from "@/lib/types";

type Props = {
  rooms: RoomView[];
  counts: Record<DisplayStatus, number>;
  heatmap: HeatmapCell[];
  thresholds: StatusThresholds;
  windowMinutes: number;
};

export default function OccupancyCharts({ rooms, counts, heatmap, thresholds, windowMinutes }: Props) {
  const pieData = DISPLAY_STATUSES.map((s) => ({ name: s, value: counts[s] }));
  const barData = heatmap
    .map((h) => ({ block: h.block, avg: Math.round(h.avgOccupancy * 10) / 10, samples: h.samples }))
    .sort((a, b) => b.avg - a.avg);

  return (
    <div className="grid gap-4 lg:grid-cols-2">
      <Card title="Room status distribution">
        <div className="h-64 w-full">
          <ResponsiveContainer width="100%" height="100%">
            <PieChart>
              <Pie data={pieData} dataKey="value" nameKey="name" innerRadius="45%" outerRadius="80%" isAnimationActive={false}>
                {pieData.map((d) => (
                  <Cell key={d.name} fill={STATUS_COLORS[d.name]} />
                ))}
              </Pie>
              <Tooltip />
              <Legend />
            </PieChart>
          </ResponsiveContainer>
        </div>
      </Card>

      <Card title={`Average occupancy by block (last ${windowMinutes} min)`}>
        <div className="h-64 w-full">
          <ResponsiveContainer width="100%" height="100%">
            <BarChart data={barData} margin={{ top: 10, right: 10, left: -20, bottom: 0 }}>
              <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
              <XAxis dataKey="block" tick={{ fill: "#64748b", fontSize: 12 }} />
              <YAxis domain={[0, 100]} tick={{ fill: "#64748b", fontSize: 12 }} />
              <Tooltip />
              <Bar dataKey="avg" name="avg %" fill="rgb(37 99 235)" isAnimationActive={false} />
            </BarChart>
          </ResponsiveContainer>
        </div>
      </Card>

      <RoomMap className="lg:col-span-2" rooms={rooms} thresholds={thresholds} />
    </div>
  );
}
