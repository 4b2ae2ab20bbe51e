/**
 * Occupancy simulator
 *
 * Stands in for live sensor feeds: every tick a random sample of rooms gets a
 * random level change, which is written like a check-in (room row + history
 * record). Ticks never overlap; a failing tick is logged and the timer keeps
 * going.
 */

import type { Database, OccupancyUpdate } from "./database";
import { logger } from "./logger";
import { applyDelta, randomDelta } from "./occupancy";

export type SimulatorOptions = {
  intervalMs: number;
  /** rooms touched per tick; 0 = all rooms */
  sampleSize: number;
  /** delta is uniform in [-maxDelta, maxDelta] */
  maxDelta: number;
  /** [0, 1) source, Math.random by default */
  random?: () => number;
};

/** Picks `k` distinct items (partial Fisher-Yates). k <= 0 or k >= length → all items */
export function sampleItems<T>(items: readonly T[], k: number, random: () => number = Math.random): T[] {
  const pool = items.slice();
  if (k <= 0 || k >= pool.length) return pool;
  for (let i = 0; i < k; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, k);
}

export class OccupancySimulator {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private ticking = false;
  private random: () => number;
  private ticks = 0;

  constructor(private db: Database, private options: SimulatorOptions) {
    this.random = options.random ?? Math.random;
  }

  get isRunning() {
    return this.running;
  }

  get tickCount() {
    return this.ticks;
  }

  start() {
    if (this.running) return;
    this.running = true;
    logger.info("Occupancy simulator started", {
      intervalMs: this.options.intervalMs,
      sampleSize: this.options.sampleSize,
      maxDelta: this.options.maxDelta,
    });
    this.schedule();
  }

  stop() {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** One simulation step. Returns the number of rooms written. */
  async tick(now: Date = new Date()): Promise<number> {
    const rooms = await this.db.listRooms();
    if (rooms.length === 0) return 0;

    const updates: OccupancyUpdate[] = sampleItems(rooms, this.options.sampleSize, this.random).map((r) => ({
      roomId: r.roomId,
      occupancyLevel: applyDelta(r.occupancyLevel, randomDelta(this.options.maxDelta, this.random)),
    }));

    const written = await this.db.applyOccupancyUpdates(updates, now);
    this.ticks += 1;
    logger.debug("Simulator tick", { written });
    return written;
  }

  private schedule() {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      void this.runTick();
    }, this.options.intervalMs);
  }

  private async runTick() {
    if (this.ticking) return;
    this.ticking = true;
    try {
      await this.tick();
    } catch (e: unknown) {
      logger.error("Simulator tick failed", { error: e instanceof Error ? e.message : String(e) });
    } finally {
      this.ticking = false;
      this.schedule();
    }
  }
}

declare global {
  var __campusSimulator: OccupancySimulator | undefined;
}

export function getSimulator(): OccupancySimulator | null {
  return globalThis.__campusSimulator ?? null;
}

export function startSimulator(db: Database, options: SimulatorOptions): OccupancySimulator {
  const existing = globalThis.__campusSimulator;
  if (existing) {
    existing.start();
    return existing;
  }
  const sim = new OccupancySimulator(db, options);
  globalThis.__campusSimulator = sim;
  sim.start();
  return sim;
}
