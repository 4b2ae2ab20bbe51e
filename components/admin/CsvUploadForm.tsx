"use client";

import { useState, type FormEvent } from "react";

import Button from "@/components/ui/Button";
import { FieldHelp, FieldLabel, Input } from "@/components/ui/Field";
import type { Toast } from "@/components/ToastBanner";
import { apiPostForm, apiPostJson, errorMessage } from "@/lib/api-client";

type LoadResult = { loaded: boolean; source: string; rooms: number; timetable: number };

/**
 * Reloads rooms + timetable. Clears occupancy history.
 */
export default function CsvUploadForm({ onDone }: { onDone: (toast: Toast) => void }) {
  const [busy, setBusy] = useState(false);

  const report = (r: LoadResult) =>
    onDone({ type: "success", message: `Loaded ${r.rooms} rooms and ${r.timetable} timetable entries (${r.source})` });

  async function onUpload(e: FormEvent<HTMLFormElement>) {
    e.preventDefault();
    setBusy(true);
    try {
      report(await apiPostForm<LoadResult>("/admin/load_csv", new FormData(e.currentTarget)));
    } catch (err: unknown) {
      onDone({ type: "error", message: `Upload failed: ${errorMessage(err)}` });
    } finally {
      setBusy(false);
    }
  }

  async function onReloadSeed() {
    setBusy(true);
    try {
      report(await apiPostJson<LoadResult>("/admin/load_csv"));
    } catch (err: unknown) {
      onDone({ type: "error", message: `Reload failed: ${errorMessage(err)}` });
    } finally {
      setBusy(false);
    }
  }

  return (
    <form onSubmit={onUpload} className="space-y-3">
      <div className="grid gap-3 sm:grid-cols-2">
        <div>
          <FieldLabel htmlFor="csv-rooms">rooms.csv</FieldLabel>
          <Input id="csv-rooms" name="rooms" type="file" accept=".csv,text/csv" required />
        </div>
        <div>
          <FieldLabel htmlFor="csv-timetable">timetable.csv</FieldLabel>
          <Input id="csv-timetable" name="timetable" type="file" accept=".csv,text/csv" required />
        </div>
      </div>
      <FieldHelp>Reloading replaces every room and timetable entry and clears occupancy history.</FieldHelp>
      <div className="flex flex-wrap gap-2">
        <Button type="submit" busy={busy} busyLabel="Loading…">Upload &amp; reload</Button>
        <Button variant="outline" onClick={() => void onReloadSeed()} disabled={busy}>
          Reload generated sample
        </Button>
      </div>
    </form>
  );
}
