import SiteHeader from "@/components/SiteHeader";
import { getAppEnv } from "@/lib/env";
import AdminClient from "./AdminClient";

export const dynamic = "force-dynamic";
export const revalidate = 0;

export const metadata = { title: "Admin" };

export default function AdminPage() {
  const env = getAppEnv();
  return (
    <div className="min-h-dvh bg-slate-50">
      <SiteHeader title="Admin dashboard" subtitle="Live occupancy, block analytics and data management" />
      <main className="mx-auto max-w-7xl px-4 py-6 sm:px-6 lg:px-8">
        <AdminClient
          thresholds={{ partial: env.OCCUPANCY_THRESHOLD, full: env.FULL_THRESHOLD }}
          heatmapWindowMinutes={env.HEATMAP_WINDOW_MINUTES}
        />
      </main>
    </div>
  );
}
