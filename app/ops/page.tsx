import SiteHeader from "@/components/SiteHeader";
import OpsClient from "./OpsClient";

export const dynamic = "force-dynamic";
export const revalidate = 0;

export const metadata = { title: "Ops" };

export default function OpsPage() {
  return (
    <div className="min-h-dvh bg-slate-50">
      <SiteHeader title="Backend operations" subtitle="Health probes, latency and data freshness" />
      <main className="mx-auto max-w-7xl px-4 py-6 sm:px-6 lg:px-8">
        <OpsClient />
      </main>
    </div>
  );
}
