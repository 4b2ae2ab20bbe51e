"use client";

import { useCallback, useMemo, useState } from "react";

import MetricTile from "@/components/MetricTile";
import RoomMap from "@/components/RoomMap";
import StatusBadge from "@/components/StatusBadge";
import ToastBanner, { type Toast } from "@/components/ToastBanner";
import Button from "@/components/ui/Button";
import Card from "@/components/ui/Card";
import { FieldLabel, Input, Select } from "@/components/ui/Field";
import Notice from "@/components/ui/Notice";
import { SECTION_TITLE } from "@/components/ui/presets";
import { apiGet, apiPostJson, errorMessage } from "@/lib/api-client";
import { USER_CHECKIN_LEVEL } from "@/lib/constants";
import {
  BLOCK_LOCATION_PRESETS,
  campusCenter,
  canCheckIn,
  listBlocks,
  overviewMetrics,
  rankRooms,
  type LatLon,
  type UserSort,
} from "@/lib/dashboard";
import type { RoomView, StatusThresholds } from "@/lib/types";
import { usePolling } from "@/lib/usePolling";

const SORTS: { id: UserSort; label: string }[] = [
  { id: "distance", label: "Distance" },
  { id: "capacity", label: "Capacity" },
  { id: "occupancy", label: "Occupancy" },
];

const REFRESH_MS = 15_000;

function isUserSort(v: string): v is UserSort {
  return SORTS.some((s) => s.id === v);
}

function formatDistance(m: number) {
  return m >= 1000 ? `${(m / 1000).toFixed(1)} km` : `${Math.round(m)} m`;
}

export default function UserClient({ thresholds }: { thresholds: StatusThresholds }) {
  const [preset, setPreset] = useState("center");
  const [custom, setCustom] = useState<LatLon>({ lat: 0, lon: 0 });
  const [text, setText] = useState("");
  const [block, setBlock] = useState("");
  const [minCapacity, setMinCapacity] = useState(0);
  const [sortBy, setSortBy] = useState<UserSort>("distance");
  const [maxResults, setMaxResults] = useState(10);
  const [pending, setPending] = useState<string | null>(null);
  const [toast, setToast] = useState<Toast | null>(null);

  const load = useCallback(() => apiGet<RoomView[]>("/rooms/all"), []);
  const { data, error, loading, refresh } = usePolling(load, REFRESH_MS);
  const rooms = useMemo(() => data ?? [], [data]);

  const center = useMemo(() => campusCenter(rooms), [rooms]);
  const origin: LatLon | null = useMemo(() => {
    if (preset === "custom") return custom;
    if (preset === "center") return center;
    return BLOCK_LOCATION_PRESETS.find((p) => p.id === preset) ?? center;
  }, [preset, custom, center]);

  const ranked = useMemo(
    () =>
      origin
        ? rankRooms(
            rooms,
            { origin, text, block: block || undefined, minCapacity, sortBy, maxResults },
            thresholds
          )
        : [],
    [rooms, origin, text, block, minCapacity, sortBy, maxResults, thresholds]
  );
  const metrics = useMemo(() => overviewMetrics(rooms, thresholds), [rooms, thresholds]);
  const blocks = useMemo(() => listBlocks(rooms), [rooms]);

  async function onCheckIn(roomId: string) {
    setPending(roomId);
    try {
      await apiPostJson(`/rooms/${encodeURIComponent(roomId)}/checkin`, { occupancy_level: USER_CHECKIN_LEVEL });
      setToast({ type: "success", message: `Checked in to ${roomId}` });
      await refresh();
    } catch (e: unknown) {
      setToast({ type: "error", message: `Check-in failed: ${errorMessage(e)}` });
    } finally {
      setPending(null);
    }
  }

  function onPresetChange(value: string) {
    // seed the custom inputs with the current origin so they start somewhere sensible
    if (value === "custom" && origin) setCustom(origin);
    setPreset(value);
  }

  return (
    <div className="space-y-6">
      {toast ? <ToastBanner {...toast} onClose={() => setToast(null)} autoHideMs={5000} /> : null}
      {error ? (
        <Notice variant="danger" title="Could not load rooms">
          {error}
        </Notice>
      ) : null}

      <div className="grid gap-4 sm:grid-cols-3">
        <MetricTile label="Total rooms" value={metrics.totalRooms.toLocaleString()} />
        <MetricTile label="Free now" value={metrics.freeNow.toLocaleString()} />
        <MetricTile label="Avg occupancy" value={`${metrics.avgOccupancy}%`} />
      </div>

      <Card>
        <div className="grid gap-3 md:grid-cols-6">
          <div className="md:col-span-2">
            <FieldLabel htmlFor="u-text">Search</FieldLabel>
            <Input id="u-text" value={text} onChange={(e) => setText(e.target.value)} placeholder="Room id or amenity, e.g. projector" />
          </div>
          <div>
            <FieldLabel htmlFor="u-loc">Your location</FieldLabel>
            <Select id="u-loc" value={preset} onChange={(e) => onPresetChange(e.target.value)}>
              <option value="center">Campus centre</option>
              {BLOCK_LOCATION_PRESETS.map((p) => (
                <option key={p.id} value={p.id}>{p.label}</option>
              ))}
              <option value="custom">Custom</option>
            </Select>
          </div>
          <div>
            <FieldLabel htmlFor="u-block">Block</FieldLabel>
            <Select id="u-block" value={block} onChange={(e) => setBlock(e.target.value)}>
              <option value="">All</option>
              {blocks.map((b) => (
                <option key={b} value={b}>{b}</option>
              ))}
            </Select>
          </div>
          <div>
            <FieldLabel htmlFor="u-cap">Min capacity</FieldLabel>
            <Input
              id="u-cap"
              type="number"
              min={0}
              value={minCapacity}
              onChange={(e) => setMinCapacity(Math.max(0, Number(e.target.value) || 0))}
            />
          </div>
          <div>
            <FieldLabel htmlFor="u-sort">Sort by</FieldLabel>
            <Select id="u-sort" value={sortBy} onChange={(e) => isUserSort(e.target.value) && setSortBy(e.target.value)}>
              {SORTS.map((s) => (
                <option key={s.id} value={s.id}>{s.label}</option>
              ))}
            </Select>
          </div>
        </div>

        {preset === "custom" ? (
          <div className="mt-3 grid gap-3 sm:grid-cols-2 md:w-1/2">
            <div>
              <FieldLabel htmlFor="u-lat">Latitude</FieldLabel>
              <Input
                id="u-lat"
                type="number"
                step="0.0001"
                value={custom.lat}
                onChange={(e) => setCustom({ ...custom, lat: Number(e.target.value) })}
              />
            </div>
            <div>
              <FieldLabel htmlFor="u-lon">Longitude</FieldLabel>
              <Input
                id="u-lon"
                type="number"
                step="0.0001"
                value={custom.lon}
                onChange={(e) => setCustom({ ...custom, lon: Number(e.target.value) })}
              />
            </div>
          </div>
        ) : null}

        <div className="mt-3 w-40">
          <FieldLabel htmlFor="u-max">Max results</FieldLabel>
          <Input
            id="u-max"
            type="number"
            min={1}
            max={200}
            value={maxResults}
            onChange={(e) => setMaxResults(Math.min(200, Math.max(1, Number(e.target.value) || 1)))}
          />
        </div>
      </Card>

      <div className="grid gap-4 lg:grid-cols-2">
        <Card>
          <h2 className={SECTION_TITLE}>Top matched rooms</h2>
          {ranked.length === 0 ? (
            <p className="mt-3 text-sm text-slate-500">{loading ? "Loading…" : "No rooms match your filters."}</p>
          ) : (
            <ul className="mt-3 divide-y divide-slate-100">
              {ranked.map((r) => (
                <li key={r.roomId} className="flex flex-wrap items-center justify-between gap-3 py-3">
                  <div className="min-w-0">
                    <div className="font-semibold">
                      {r.roomId} <span className="font-normal text-slate-500">· {r.block} · {r.capacity} seats</span>
                    </div>
                    {r.amenities ? <div className="text-xs text-slate-500">{r.amenities}</div> : null}
                    <div className="mt-1 flex items-center gap-2 text-sm">
                      <StatusBadge status={r.display} />
                      <span>{r.occupancyLevel}% occupied</span>
                    </div>
                  </div>
                  <div className="flex items-center gap-4">
                    <span className="text-sm font-semibold tabular-nums">{formatDistance(r.distanceM)}</span>
                    <Button
                      variant={canCheckIn(r.display) ? "primary" : "outline"}
                      disabled={!canCheckIn(r.display) || pending === r.roomId}
                      onClick={() => void onCheckIn(r.roomId)}
                    >
                      {canCheckIn(r.display) ? "Check in" : "Unavailable"}
                    </Button>
                  </div>
                </li>
              ))}
            </ul>
          )}
        </Card>

        <RoomMap title="Map" rooms={ranked} thresholds={thresholds} origin={origin} />
      </div>
    </div>
  );
}
