import * as XLSX from "xlsx";

import { displayStatus } from "./occupancy";
import type { HeatmapCell, RoomView, StatusThresholds } from "./types";

export function roomExportRows(rooms: RoomView[], thresholds: StatusThresholds) {
  return rooms.map((r) => ({
    room_id: r.roomId,
    block: r.block,
    type: r.type,
    capacity: r.capacity,
    AC: r.ac,
    amenities: r.amenities,
    lat: r.lat,
    lon: r.lon,
    occupancy_level: r.occupancyLevel,
    status: r.status,
    booked: r.booked ? "Yes" : "No",
    display_status: displayStatus(r, thresholds),
    updated_at: r.updatedAt ?? "",
  }));
}

/** Two sheets: current room states and the block heatmap */
export function buildRoomsWorkbook(rooms: RoomView[], heatmap: HeatmapCell[], thresholds: StatusThresholds): Buffer {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(roomExportRows(rooms, thresholds)), "rooms");
  XLSX.utils.book_append_sheet(
    wb,
    XLSX.utils.json_to_sheet(
      heatmap.map((h) => ({ block: h.block, avg_occupancy: Math.round(h.avgOccupancy * 100) / 100, samples: h.samples }))
    ),
    "heatmap"
  );
  return XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
}
