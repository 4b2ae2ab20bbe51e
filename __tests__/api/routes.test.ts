import fs from "fs";
import os from "os";
import path from "path";
import * as XLSX from "xlsx";

import { GET as exportRooms } from "@/app/api/admin/export/route";
import { GET as opsMetrics } from "@/app/api/ops/metrics/route";
import { POST as opsProbe } from "@/app/api/ops/probe/route";
import { POST as loadCsv } from "@/app/admin/load_csv/route";
import { GET as heatmap } from "@/app/analytics/heatmap/route";
import { GET as summary } from "@/app/analytics/summary/route";
import { GET as health } from "@/app/health/route";
import { GET as allRooms } from "@/app/rooms/all/route";
import { GET as freeRooms } from "@/app/rooms/free/route";
import { POST as checkin } from "@/app/rooms/[id]/checkin/route";
import { GET as roomDetail } from "@/app/rooms/[id]/route";
import { resetAppEnv } from "@/lib/env";
import { appendProbe } from "@/lib/healthMonitor";
import { seededDatabase } from "../fixtures";

const BASE = "http://localhost:3000";

function get(pathname: string) {
  return new Request(`${BASE}${pathname}`);
}

function postJson(pathname: string, body: string) {
  return new Request(`${BASE}${pathname}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("API routes", () => {
  let dir: string;
  const savedEnv = { ...process.env };

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "campus-api-"));
    process.env.MOCK_MODE = "true";
    process.env.SEED_DIR = path.join(dir, "seed");
    process.env.HEALTH_LOG_PATH = path.join(dir, "health.csv");
    process.env.API_BASE_URL = "http://backend.test";
    resetAppEnv();

    globalThis.__campusDatabase?.close();
    globalThis.__campusDatabase = await seededDatabase();
  });

  afterEach(() => {
    globalThis.__campusDatabase?.close();
    globalThis.__campusDatabase = undefined;
    process.env = { ...savedEnv };
    resetAppEnv();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("GET /health answers ok", async () => {
    const res = await health();
    expect(res.status).toBe(200);
    expect((await res.json()).data.status).toBe("ok");
  });

  describe("rooms", () => {
    it("GET /rooms/all filters by block", async () => {
      const res = await allRooms(get("/rooms/all?block=A"));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.ok).toBe(true);
      expect(body.data.map((r: { roomId: string }) => r.roomId)).toEqual(["A-101", "A-102"]);
    });

    it("GET /rooms/all rejects a bad capacity", async () => {
      const res = await allRooms(get("/rooms/all?capacity=abc"));
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ ok: false, code: "VALIDATION_ERROR" });
    });

    it("GET /rooms/free applies the capacity filter", async () => {
      const res = await freeRooms(get("/rooms/free?capacity=70"));
      const body = await res.json();
      expect(body.data.map((r: { roomId: string }) => r.roomId)).toEqual(["B-202"]);
    });

    it("GET /rooms/:id returns the detail or 404", async () => {
      const ok = await roomDetail(get("/rooms/A-102"), { params: { id: "A-102" } });
      expect(ok.status).toBe(200);
      expect((await ok.json()).data.room.roomId).toBe("A-102");

      const missing = await roomDetail(get("/rooms/Z-9"), { params: { id: "Z-9" } });
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ ok: false, code: "NOT_FOUND", message: "Room not found: Z-9", details: { roomId: "Z-9" } });
    });

    it("GET /rooms/:id takes the id as already decoded", async () => {
      const res = await roomDetail(get("/rooms/100%25"), { params: { id: "100%" } });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        ok: false,
        code: "NOT_FOUND",
        message: "Room not found: 100%",
        details: { roomId: "100%" },
      });
    });
  });

  describe("POST /rooms/:id/checkin", () => {
    it("records the level", async () => {
      const res = await checkin(postJson("/rooms/B-201/checkin", JSON.stringify({ occupancy_level: 55 })), {
        params: { id: "B-201" },
      });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.data.occupancyId).toBeGreaterThan(0);
      expect(body.data.room).toMatchObject({ roomId: "B-201", occupancyLevel: 55, status: "occupied" });
    });

    it("rejects out-of-range levels and bodies that are not JSON", async () => {
      const bad = await checkin(postJson("/rooms/B-201/checkin", JSON.stringify({ occupancy_level: 101 })), {
        params: { id: "B-201" },
      });
      expect(bad.status).toBe(400);
      expect(await bad.json()).toMatchObject({ code: "VALIDATION_ERROR", message: "Invalid check-in" });

      const notJson = await checkin(postJson("/rooms/B-201/checkin", "nope"), { params: { id: "B-201" } });
      expect(notJson.status).toBe(400);
      expect(await notJson.json()).toMatchObject({ message: "Request body must be JSON" });
    });

    it("answers 404 for an unknown room", async () => {
      const res = await checkin(postJson("/rooms/Z-9/checkin", JSON.stringify({ occupancy_level: 10 })), {
        params: { id: "Z-9" },
      });
      expect(res.status).toBe(404);
    });

    it("answers with an envelope for ids containing a percent sign", async () => {
      const res = await checkin(postJson("/rooms/100%25/checkin", JSON.stringify({ occupancy_level: 10 })), {
        params: { id: "100%" },
      });
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ ok: false, code: "NOT_FOUND", message: "Room not found: 100%" });
    });
  });

  describe("analytics", () => {
    it("GET /analytics/heatmap lists every block", async () => {
      const res = await heatmap(get("/analytics/heatmap?window_minutes=30"));
      expect((await res.json()).data).toEqual([
        { block: "A", avgOccupancy: 0, samples: 0 },
        { block: "B", avgOccupancy: 0, samples: 0 },
      ]);
    });

    it("GET /analytics/heatmap rejects a zero window", async () => {
      expect((await heatmap(get("/analytics/heatmap?window_minutes=0"))).status).toBe(400);
    });

    it("GET /analytics/summary counts rooms", async () => {
      const body = await (await summary()).json();
      expect(body.data).toMatchObject({ totalRooms: 4, totalCapacity: 220, blockCount: 2 });
    });
  });

  describe("POST /admin/load_csv", () => {
    it("replaces the store from uploaded files", async () => {
      const form = new FormData();
      form.append("rooms", new Blob(["room_id,block,capacity\nC-1,C,10\nC-2,C,20\n"], { type: "text/csv" }), "rooms.csv");
      form.append("timetable", new Blob(["room_id,day,slot,course\nC-1,Thu,5,ENG101\n"], { type: "text/csv" }), "timetable.csv");

      const res = await loadCsv(new Request(`${BASE}/admin/load_csv`, { method: "POST", body: form }));
      expect(res.status).toBe(200);
      expect((await res.json()).data).toEqual({ loaded: true, source: "upload", rooms: 2, timetable: 1 });

      const rooms = await (await allRooms(get("/rooms/all"))).json();
      expect(rooms.data.map((r: { roomId: string }) => r.roomId)).toEqual(["C-1", "C-2"]);
    });

    it("requires both files", async () => {
      const form = new FormData();
      form.append("rooms", new Blob(["room_id\nC-1\n"]), "rooms.csv");

      const res = await loadCsv(new Request(`${BASE}/admin/load_csv`, { method: "POST", body: form }));
      expect(res.status).toBe(400);
    });

    it("reports invalid rows without touching the store", async () => {
      const form = new FormData();
      form.append("rooms", new Blob(["room_id,capacity\nC-1,-5\n"]), "rooms.csv");
      form.append("timetable", new Blob(["room_id,day,slot,course\n"]), "timetable.csv");

      const res = await loadCsv(new Request(`${BASE}/admin/load_csv`, { method: "POST", body: form }));
      const body = await res.json();
      expect(res.status).toBe(400);
      expect(body.details.issues[0].line).toBe(2);
      expect((await (await summary()).json()).data.totalRooms).toBe(4);
    });

    it("answers 409 when the seed files are missing", async () => {
      const res = await loadCsv(new Request(`${BASE}/admin/load_csv`, { method: "POST" }));
      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ ok: false, code: "SEED_FILES_MISSING" });
    });
  });

  describe("GET /api/admin/export", () => {
    it("returns an xlsx workbook", async () => {
      const res = await exportRooms(get("/api/admin/export?block=B"));
      expect(res.status).toBe(200);
      expect(res.headers.get("content-disposition")).toBe('attachment; filename="campus_rooms.xlsx"');

      const wb = XLSX.read(new Uint8Array(await res.arrayBuffer()), { type: "array" });
      expect(XLSX.utils.sheet_to_json(wb.Sheets.rooms)).toHaveLength(2);
    });
  });

  describe("ops", () => {
    it("POST /api/ops/probe probes the backend and logs the result", async () => {
      const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(new Response("{}", { status: 200 }));
      try {
        const res = await opsProbe();
        expect((await res.json()).data).toMatchObject({ status: "up", httpStatus: 200 });
        expect(fetchSpy).toHaveBeenCalledWith("http://backend.test/health", expect.anything());
        expect(fs.readFileSync(path.join(dir, "health.csv"), "utf-8").split("\n")[0]).toBe(
          "timestamp_iso,status,latency_ms,http_status,error"
        );
      } finally {
        fetchSpy.mockRestore();
      }
    });

    it("GET /api/ops/metrics summarises the log", async () => {
      const now = Date.now();
      for (const [agoMs, status] of [[120_000, "down"], [60_000, "up"]] as const) {
        appendProbe(path.join(dir, "health.csv"), {
          timestamp: new Date(now - agoMs).toISOString(),
          status,
          latencyMs: status === "up" ? 12 : null,
          httpStatus: status === "up" ? 200 : null,
          error: status === "up" ? null : "timeout",
        });
      }

      const body = await (await opsMetrics(get("/api/ops/metrics"))).json();
      expect(body.data.windowMinutes).toBe(60);
      expect(body.data.metrics).toMatchObject({ total: 2, errors: 1, uptimePct: 50, currentStatus: "up" });
      expect(body.data.alert).toBe("warning");
      expect(body.data.tier).toBe("ATTENTION");
      expect(body.data.incidents).toEqual({
        recent: [{ timestamp: new Date(now - 120_000).toISOString(), error: "timeout", httpStatus: null, latencyMs: null }],
        last5m: 1,
        last1h: 1,
      });
      expect(body.data.rows).toHaveLength(2);
    });
  });
});
