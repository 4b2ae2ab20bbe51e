import * as XLSX from "xlsx";

import { buildRoomsWorkbook, roomExportRows } from "@/lib/export";
import { roomView } from "../fixtures";

const thresholds = { partial: 30, full: 95 };

const rooms = [
  roomView({ roomId: "A-101", capacity: 40, amenities: "projector", occupancyLevel: 45, status: "occupied", updatedAt: "2026-03-02T10:00:00.000Z" }),
  roomView({ roomId: "A-102", booked: true }),
];

describe("roomExportRows", () => {
  it("flattens rooms into spreadsheet rows", () => {
    expect(roomExportRows(rooms, thresholds)).toEqual([
      {
        room_id: "A-101",
        block: "A",
        type: "lecture",
        capacity: 40,
        AC: "Yes",
        amenities: "projector",
        lat: 12,
        lon: 80,
        occupancy_level: 45,
        status: "occupied",
        booked: "No",
        display_status: "Partial",
        updated_at: "2026-03-02T10:00:00.000Z",
      },
      expect.objectContaining({ room_id: "A-102", booked: "Yes", display_status: "Full", updated_at: "" }),
    ]);
  });
});

describe("buildRoomsWorkbook", () => {
  it("writes a rooms sheet and a heatmap sheet", () => {
    const buf = buildRoomsWorkbook(rooms, [{ block: "A", avgOccupancy: 22.456, samples: 3 }], thresholds);
    const wb = XLSX.read(buf, { type: "buffer" });

    expect(wb.SheetNames).toEqual(["rooms", "heatmap"]);
    expect(XLSX.utils.sheet_to_json(wb.Sheets.rooms)).toHaveLength(2);
    expect(XLSX.utils.sheet_to_json(wb.Sheets.heatmap)).toEqual([{ block: "A", avg_occupancy: 22.46, samples: 3 }]);
  });
});
