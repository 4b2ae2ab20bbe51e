import fs from "fs";
import os from "os";
import path from "path";

import { SqliteDatabase } from "@/lib/database";
import { NotFoundError } from "@/lib/errors";
import { checkIn, getRoomDetail, listFreeRooms, listRoomViews } from "@/lib/rooms";
import { MONDAY_SLOT_2, ROOMS, TIMETABLE, seededDatabase } from "../fixtures";

const MONDAY_EARLY = new Date("2026-03-02T07:00:00.000Z");

describe("rooms", () => {
  let db: SqliteDatabase;

  beforeEach(async () => {
    db = await seededDatabase();
  });

  afterEach(() => {
    db.close();
  });

  describe("listRoomViews", () => {
    it("marks rooms booked in the current slot", async () => {
      const rooms = await listRoomViews(db, {}, MONDAY_SLOT_2);
      expect(rooms.filter((r) => r.booked).map((r) => r.roomId)).toEqual(["A-101"]);
    });

    it("books nothing outside teaching hours", async () => {
      const rooms = await listRoomViews(db, {}, MONDAY_EARLY);
      expect(rooms.some((r) => r.booked)).toBe(false);
    });
  });

  describe("listFreeRooms", () => {
    it("excludes rooms booked right now", async () => {
      const free = await listFreeRooms(db, {}, MONDAY_SLOT_2);
      expect(free.map((r) => r.roomId)).toEqual(["A-102", "B-201", "B-202"]);
    });

    it("includes the same room once its slot is over", async () => {
      const free = await listFreeRooms(db, {}, MONDAY_EARLY);
      expect(free.map((r) => r.roomId)).toEqual(["A-101", "A-102", "B-201", "B-202"]);
    });

    it("excludes rooms above the threshold", async () => {
      await db.recordOccupancy("B-201", 80, MONDAY_SLOT_2);
      await db.recordOccupancy("B-202", 30, MONDAY_SLOT_2);
      const free = await listFreeRooms(db, { block: "B" }, MONDAY_SLOT_2);
      expect(free.map((r) => r.roomId)).toEqual(["B-202"]);
    });

    it("re-bands stored status when the store is reopened under a new threshold", async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "campus-rooms-"));
      const file = path.join(dir, "campus.db");
      try {
        const first = new SqliteDatabase(file, { threshold: 30 });
        await first.replaceAll(ROOMS, TIMETABLE);
        await first.recordOccupancy("B-201", 50, MONDAY_SLOT_2);
        expect((await first.getRoom("B-201"))?.status).toBe("occupied");
        first.close();

        const reopened = new SqliteDatabase(file, { threshold: 60 });
        try {
          expect(await reopened.getRoom("B-201")).toMatchObject({ occupancyLevel: 50, status: "free" });
          const free = await listFreeRooms(reopened, { block: "B" }, MONDAY_SLOT_2);
          expect(free.map((r) => r.roomId)).toEqual(["B-201", "B-202"]);
        } finally {
          reopened.close();
        }
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it("applies the capacity filter and the limit", async () => {
      expect((await listFreeRooms(db, { minCapacity: 70 }, MONDAY_SLOT_2)).map((r) => r.roomId)).toEqual(["B-202"]);
      expect(await listFreeRooms(db, {}, MONDAY_SLOT_2, 1)).toHaveLength(1);
    });
  });

  describe("getRoomDetail", () => {
    it("returns the room with its timetable and history", async () => {
      await db.recordOccupancy("A-101", 12, MONDAY_SLOT_2);
      const detail = await getRoomDetail(db, "A-101", MONDAY_SLOT_2);

      expect(detail.room).toMatchObject({ roomId: "A-101", booked: true, occupancyLevel: 12 });
      expect(detail.timetable).toEqual([
        { roomId: "A-101", day: "Mon", slot: 2, course: "CS101", startTime: "10:00", endTime: "11:00" },
      ]);
      expect(detail.occupancyHistory.map((h) => h.occupancyLevel)).toEqual([12]);
    });

    it("throws NotFoundError for an unknown room", async () => {
      await expect(getRoomDetail(db, "Z-999")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("checkIn", () => {
    it("updates the room and returns the history id", async () => {
      const result = await checkIn(db, "B-201", 55, MONDAY_SLOT_2);

      expect(result.occupancyId).toBe(result.record.id);
      expect(result.occupancyId).toBeGreaterThan(0);
      expect(result.room).toMatchObject({ roomId: "B-201", occupancyLevel: 55, status: "occupied", booked: false });
    });

    it("throws NotFoundError for an unknown room", async () => {
      await expect(checkIn(db, "Z-999", 10)).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });
});
