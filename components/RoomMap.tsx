"use client";

import { CartesianGrid, Legend, ResponsiveContainer, Scatter, ScatterChart, Tooltip, XAxis, YAxis, ZAxis } from "recharts";

import Card from "@/components/ui/Card";
import { DISPLAY_STATUSES, type LatLon } from "@/lib/dashboard";
import { displayStatus } from "@/lib/occupancy";
import type { DisplayStatus, RoomView, StatusThresholds } from "@/lib/types";

export const STATUS_COLORS: Record<DisplayStatus, string> = {
  Free: "#10b981",
  Partial: "#f59e0b",
  Full: "#ef4444",
};

/** scatter is capped; the whole campus is ~700 points */
const MAX_MAP_POINTS = 1000;

type Props = {
  rooms: RoomView[];
  thresholds: StatusThresholds;
  /** drawn as a "You" marker */
  origin?: LatLon | null;
  title?: string;
  className?: string;
};

/** Rooms plotted by lon/lat, coloured by display status */
export default function RoomMap({ rooms, thresholds, origin, title = "Room locations", className }: Props) {
  const points = rooms.slice(0, MAX_MAP_POINTS).map((r) => ({
    lon: r.lon,
    lat: r.lat,
    roomId: r.roomId,
    level: r.occupancyLevel,
    status: displayStatus(r, thresholds),
  }));

  return (
    <Card className={className} title={title}>
      <div className="h-80 w-full">
        <ResponsiveContainer width="100%" height="100%">
          <ScatterChart margin={{ top: 10, right: 10, left: 10, bottom: 0 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis type="number" dataKey="lon" name="lon" domain={["auto", "auto"]} tick={{ fontSize: 10 }} />
            <YAxis type="number" dataKey="lat" name="lat" domain={["auto", "auto"]} tick={{ fontSize: 10 }} />
            <ZAxis type="number" dataKey="level" range={[20, 20]} name="occupancy %" />
            <Tooltip cursor={{ strokeDasharray: "3 3" }} />
            {DISPLAY_STATUSES.map((s) => (
              <Scatter
                key={s}
                name={s}
                data={points.filter((p) => p.status === s)}
                fill={STATUS_COLORS[s]}
                isAnimationActive={false}
              />
            ))}
            {origin ? (
              <Scatter
                name="You"
                data={[{ lon: origin.lon, lat: origin.lat, level: 0 }]}
                fill="rgb(37 99 235)"
                shape="star"
                isAnimationActive={false}
              />
            ) : null}
            <Legend />
          </ScatterChart>
        </ResponsiveContainer>
      </div>
    </Card>
  );
}
