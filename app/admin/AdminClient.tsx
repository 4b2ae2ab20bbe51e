"use client";

import { useCallback, useMemo, useState } from "react";

import CsvUploadForm from "@/components/admin/CsvUploadForm";
import OccupancyCharts from "@/components/admin/OccupancyCharts";
import OccupancyReportForm from "@/components/admin/OccupancyReportForm";
import MetricTile from "@/components/MetricTile";
import StatusBadge from "@/components/StatusBadge";
import ToastBanner, { type Toast } from "@/components/ToastBanner";
import Button from "@/components/ui/Button";
import Card from "@/components/ui/Card";
import { FieldLabel, Input, Select } from "@/components/ui/Field";
import Notice from "@/components/ui/Notice";
import { SECTION_DESC, SECTION_TITLE } from "@/components/ui/presets";
import { apiGet } from "@/lib/api-client";
import { DISPLAY_STATUSES, filterAdminRooms, listBlocks, overviewMetrics, statusCounts } from "@/lib/dashboard";
import { displayStatus } from "@/lib/occupancy";
import type { DisplayStatus, HeatmapCell, RoomView, StatusThresholds } from "@/lib/types";
import { usePolling } from "@/lib/usePolling";

const REFRESH_OPTIONS = [
  { ms: 5_000, label: "5 s" },
  { ms: 10_000, label: "10 s" },
  { ms: 30_000, label: "30 s" },
  { ms: 0, label: "Off" },
];
const ROW_OPTIONS = [10, 25, 50, 100];

function isDisplayStatus(v: string): v is DisplayStatus {
  return DISPLAY_STATUSES.some((s) => s === v);
}

type Props = {
  thresholds: StatusThresholds;
  heatmapWindowMinutes: number;
};

export default function AdminClient({ thresholds, heatmapWindowMinutes }: Props) {
  const [refreshMs, setRefreshMs] = useState(10_000);
  const [block, setBlock] = useState("");
  const [status, setStatus] = useState<DisplayStatus | "">("");
  const [minCapacity, setMinCapacity] = useState(0);
  const [rowsToShow, setRowsToShow] = useState(25);
  const [selected, setSelected] = useState<RoomView | null>(null);
  const [toast, setToast] = useState<Toast | null>(null);

  const load = useCallback(
    async () => {
      const [rooms, heatmap] = await Promise.all([
        apiGet<RoomView[]>("/rooms/all"),
        apiGet<HeatmapCell[]>(`/analytics/heatmap?window_minutes=${heatmapWindowMinutes}`),
      ]);
      return { rooms, heatmap };
    },
    [heatmapWindowMinutes]
  );
  const { data, error, loading, lastUpdated, refresh } = usePolling(load, refreshMs);

  const rooms = useMemo(() => data?.rooms ?? [], [data]);
  const blocks = useMemo(() => listBlocks(rooms), [rooms]);
  const metrics = useMemo(() => overviewMetrics(rooms, thresholds), [rooms, thresholds]);
  const counts = useMemo(() => statusCounts(rooms, thresholds), [rooms, thresholds]);
  const filtered = useMemo(
    () => filterAdminRooms(rooms, { block: block || undefined, status: status || undefined, minCapacity }, thresholds),
    [rooms, block, status, minCapacity, thresholds]
  );

  const onDone = useCallback(
    (t: Toast) => {
      setToast(t);
      if (t.type === "success") void refresh();
    },
    [refresh]
  );

  return (
    <div className="space-y-6">
      {toast ? <ToastBanner {...toast} onClose={() => setToast(null)} autoHideMs={5000} /> : null}
      {error ? (
        <Notice variant="danger" title="Could not reach the API">
          {error}
        </Notice>
      ) : null}

      <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-4">
        <MetricTile label="Total rooms" value={metrics.totalRooms.toLocaleString()} />
        <MetricTile label="Free now" value={metrics.freeNow.toLocaleString()} />
        <MetricTile label="Avg occupancy" value={`${metrics.avgOccupancy}%`} />
        <MetricTile
          label="Last refresh"
          value={lastUpdated ? lastUpdated.toLocaleTimeString() : "—"}
          hint={loading ? "Refreshing…" : undefined}
        />
      </div>

      <Card>
        <div className="flex flex-wrap items-end justify-between gap-3">
          <div>
            <h2 className={SECTION_TITLE}>Rooms</h2>
            <p className={SECTION_DESC}>
              Showing {Math.min(rowsToShow, filtered.length)} of {filtered.length} matching rooms
            </p>
          </div>
          <div className="flex flex-wrap items-end gap-2">
            <div>
              <FieldLabel htmlFor="refresh">Auto refresh</FieldLabel>
              <Select id="refresh" value={refreshMs} onChange={(e) => setRefreshMs(Number(e.target.value))}>
                {REFRESH_OPTIONS.map((o) => (
                  <option key={o.ms} value={o.ms}>{o.label}</option>
                ))}
              </Select>
            </div>
            <Button variant="outline" onClick={() => void refresh()} disabled={loading}>
              Refresh
            </Button>
            <a href="/api/admin/export" className="text-sm font-semibold text-[rgb(var(--brand-primary))] underline-offset-2 hover:underline">
              Export .xlsx
            </a>
          </div>
        </div>

        <div className="mt-4 grid gap-3 sm:grid-cols-4">
          <div>
            <FieldLabel htmlFor="f-block">Block</FieldLabel>
            <Select id="f-block" value={block} onChange={(e) => setBlock(e.target.value)}>
              <option value="">All</option>
              {blocks.map((b) => (
                <option key={b} value={b}>{b}</option>
              ))}
            </Select>
          </div>
          <div>
            <FieldLabel htmlFor="f-status">Status</FieldLabel>
            <Select
              id="f-status"
              value={status}
              onChange={(e) => setStatus(isDisplayStatus(e.target.value) ? e.target.value : "")}
            >
              <option value="">All</option>
              {DISPLAY_STATUSES.map((s) => (
                <option key={s} value={s}>{s}</option>
              ))}
            </Select>
          </div>
          <div>
            <FieldLabel htmlFor="f-cap">Min capacity</FieldLabel>
            <Input
              id="f-cap"
              type="number"
              min={0}
              value={minCapacity}
              onChange={(e) => setMinCapacity(Math.max(0, Number(e.target.value) || 0))}
            />
          </div>
          <div>
            <FieldLabel htmlFor="f-rows">Rows</FieldLabel>
            <Select id="f-rows" value={rowsToShow} onChange={(e) => setRowsToShow(Number(e.target.value))}>
              {ROW_OPTIONS.map((n) => (
                <option key={n} value={n}>{n}</option>
              ))}
            </Select>
          </div>
        </div>

        <div className="mt-4 overflow-x-auto rounded-xl border border-slate-200">
          <table className="w-full text-sm">
            <thead>
              <tr className="border-b border-slate-200 bg-slate-50 text-left text-slate-700">
                <th className="px-4 py-2 font-semibold">Room</th>
                <th className="px-4 py-2 font-semibold">Block</th>
                <th className="px-4 py-2 font-semibold">Type</th>
                <th className="px-4 py-2 text-right font-semibold">Capacity</th>
                <th className="px-4 py-2 text-right font-semibold">Occupancy</th>
                <th className="px-4 py-2 font-semibold">Status</th>
                <th className="px-4 py-2" />
              </tr>
            </thead>
            <tbody>
              {filtered.slice(0, rowsToShow).map((r) => (
                <tr key={r.roomId} className="border-b border-slate-100 last:border-0">
                  <td className="px-4 py-2 font-medium">{r.roomId}</td>
                  <td className="px-4 py-2">{r.block}</td>
                  <td className="px-4 py-2">{r.type}</td>
                  <td className="px-4 py-2 text-right">{r.capacity}</td>
                  <td className="px-4 py-2 text-right">{r.occupancyLevel}%</td>
                  <td className="px-4 py-2">
                    <StatusBadge status={displayStatus(r, thresholds)} />
                    {r.booked ? <span className="ml-2 text-xs text-slate-500">booked</span> : null}
                  </td>
                  <td className="px-4 py-2 text-right">
                    <Button variant="ghost" className="px-2 py-1 text-xs" onClick={() => setSelected(r)}>
                      Report
                    </Button>
                  </td>
                </tr>
              ))}
              {filtered.length === 0 ? (
                <tr>
                  <td colSpan={7} className="px-4 py-8 text-center text-slate-500">
                    {loading ? "Loading…" : "No rooms match the filters."}
                  </td>
                </tr>
              ) : null}
            </tbody>
          </table>
        </div>
      </Card>

      <Card title="Report occupancy" description="Writes a check-in for the room, as a sensor would.">
        <OccupancyReportForm selectedRoom={selected} onDone={onDone} />
      </Card>

      {data ? (
        <OccupancyCharts
          rooms={rooms}
          counts={counts}
          heatmap={data.heatmap}
          thresholds={thresholds}
          windowMinutes={heatmapWindowMinutes}
        />
      ) : null}

      <Card title="Load data" description="Upload rooms.csv and timetable.csv, or reload the generated sample.">
        <CsvUploadForm onDone={onDone} />
      </Card>
    </div>
  );
}
