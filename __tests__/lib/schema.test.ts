import {
  CheckinInputSchema,
  HeatmapQuerySchema,
  OccupancyReportSchema,
  RoomQuerySchema,
  formatZodIssues,
  queryObject,
} from "@/lib/schema";

describe("CheckinInputSchema", () => {
  it("accepts integer levels from 0 to 100", () => {
    expect(CheckinInputSchema.parse({ occupancy_level: 0 })).toEqual({ occupancy_level: 0 });
    expect(CheckinInputSchema.parse({ occupancy_level: 100 })).toEqual({ occupancy_level: 100 });
  });

  it.each([[-1], [101], [5.5], ["50"], [null]])("rejects %p", (value) => {
    expect(CheckinInputSchema.safeParse({ occupancy_level: value }).success).toBe(false);
  });

  it("names the missing field", () => {
    const result = CheckinInputSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toEqual([{ path: "occupancy_level", message: "occupancy_level is required" }]);
    }
  });
});

describe("query schemas", () => {
  it("reads room filters from the query string", () => {
    const url = new URL("http://localhost/rooms/all?block=%20UB%20&capacity=40&type=");
    expect(RoomQuerySchema.parse(queryObject(url, ["block", "type", "capacity"]))).toEqual({ block: "UB", capacity: 40 });
  });

  it("treats blank numbers as absent, not zero", () => {
    expect(RoomQuerySchema.parse({ capacity: "" }).capacity).toBeUndefined();
  });

  it("rejects non-numeric capacity", () => {
    expect(RoomQuerySchema.safeParse({ capacity: "abc" }).success).toBe(false);
  });

  it("bounds the heatmap window", () => {
    expect(HeatmapQuerySchema.parse({ window_minutes: "10080" })).toEqual({ window_minutes: 10080 });
    expect(HeatmapQuerySchema.parse({ window_minutes: null })).toEqual({});
    expect(HeatmapQuerySchema.safeParse({ window_minutes: "0" }).success).toBe(false);
  });
});

describe("OccupancyReportSchema", () => {
  it("requires a room and a level", () => {
    expect(OccupancyReportSchema.parse({ roomId: "A-101", occupancyLevel: 40 })).toEqual({ roomId: "A-101", occupancyLevel: 40 });

    const result = OccupancyReportSchema.safeParse({ roomId: " ", occupancyLevel: 120 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.message)).toEqual(["Pick a room", "0 to 100"]);
    }
  });
});
