import SiteHeader from "@/components/SiteHeader";
import { getAppEnv } from "@/lib/env";
import UserClient from "./UserClient";

export const dynamic = "force-dynamic";
export const revalidate = 0;

export const metadata = { title: "Find a room" };

export default function UserPage() {
  const env = getAppEnv();
  return (
    <div className="min-h-dvh bg-slate-50">
      <SiteHeader title="Find a study room" subtitle="Nearest rooms with space right now" />
      <main className="mx-auto max-w-7xl px-4 py-6 sm:px-6 lg:px-8">
        <UserClient thresholds={{ partial: env.OCCUPANCY_THRESHOLD, full: env.FULL_THRESHOLD }} />
      </main>
    </div>
  );
}
