import type { SqliteDatabase } from "@/lib/database";
import { OccupancySimulator, sampleItems } from "@/lib/simulator";
import { MONDAY_SLOT_2, seededDatabase } from "../fixtures";

/** Small deterministic [0, 1) source */
function lcg(seed: number) {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

describe("sampleItems", () => {
  it("returns every item when k is 0 or not smaller than the list", () => {
    expect(sampleItems([1, 2, 3], 0)).toEqual([1, 2, 3]);
    expect(sampleItems([1, 2, 3], 5)).toEqual([1, 2, 3]);
  });

  it("picks k distinct items", () => {
    expect(sampleItems([1, 2, 3, 4, 5], 2, () => 0)).toEqual([1, 2]);
    expect(sampleItems([1, 2, 3, 4, 5], 2, () => 0.999)).toEqual([5, 1]);
  });

  it("does not modify the input", () => {
    const items = [1, 2, 3, 4, 5];
    sampleItems(items, 3, () => 0.999);
    expect(items).toEqual([1, 2, 3, 4, 5]);
  });
});

describe("OccupancySimulator", () => {
  let db: SqliteDatabase;

  beforeEach(async () => {
    db = await seededDatabase();
  });

  afterEach(() => {
    db.close();
  });

  it("updates every room when the sample size is 0", async () => {
    const sim = new OccupancySimulator(db, { intervalMs: 1000, sampleSize: 0, maxDelta: 15, random: () => 0.999 });

    expect(await sim.tick(MONDAY_SLOT_2)).toBe(4);
    expect(sim.tickCount).toBe(1);
    expect((await db.listRooms()).map((r) => r.occupancyLevel)).toEqual([15, 15, 15, 15]);
    expect(await db.countRoomsWithHistory()).toBe(4);
  });

  it("touches only the sampled rooms", async () => {
    const sim = new OccupancySimulator(db, { intervalMs: 1000, sampleSize: 2, maxDelta: 15, random: () => 0.999 });

    expect(await sim.tick(MONDAY_SLOT_2)).toBe(2);
    expect(await db.countRoomsWithHistory()).toBe(2);
  });

  it("saturates at 100 and 0", async () => {
    const up = new OccupancySimulator(db, { intervalMs: 1000, sampleSize: 0, maxDelta: 15, random: () => 0.999 });
    for (let i = 0; i < 10; i++) await up.tick(MONDAY_SLOT_2);
    expect((await db.listRooms()).every((r) => r.occupancyLevel === 100 && r.status === "occupied")).toBe(true);

    const down = new OccupancySimulator(db, { intervalMs: 1000, sampleSize: 0, maxDelta: 15, random: () => 0 });
    for (let i = 0; i < 10; i++) await down.tick(MONDAY_SLOT_2);
    expect((await db.listRooms()).every((r) => r.occupancyLevel === 0 && r.status === "free")).toBe(true);
  });

  it("keeps levels in bounds under random walks", async () => {
    const sim = new OccupancySimulator(db, { intervalMs: 1000, sampleSize: 2, maxDelta: 15, random: lcg(7) });
    for (let i = 0; i < 50; i++) await sim.tick(MONDAY_SLOT_2);

    for (const room of await db.listRooms()) {
      expect(room.occupancyLevel).toBeGreaterThanOrEqual(0);
      expect(room.occupancyLevel).toBeLessThanOrEqual(100);
      expect(room.status).toBe(room.occupancyLevel > 30 ? "occupied" : "free");
    }
  });

  it("does nothing on an empty store", async () => {
    await db.replaceAll([], []);
    const sim = new OccupancySimulator(db, { intervalMs: 1000, sampleSize: 0, maxDelta: 15 });
    expect(await sim.tick()).toBe(0);
  });

  it("starts once and stops", () => {
    jest.useFakeTimers();
    try {
      const sim = new OccupancySimulator(db, { intervalMs: 1000, sampleSize: 0, maxDelta: 15 });
      sim.start();
      sim.start();
      expect(sim.isRunning).toBe(true);
      expect(jest.getTimerCount()).toBe(1);

      sim.stop();
      expect(sim.isRunning).toBe(false);
      expect(jest.getTimerCount()).toBe(0);
    } finally {
      jest.useRealTimers();
    }
  });
});
