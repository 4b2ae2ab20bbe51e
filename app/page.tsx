import SiteHeader from "@/components/SiteHeader";
import DashboardCard from "@/components/home/DashboardCard";
import { IconChart, IconPin, IconPulse } from "@/components/home/Icons";

export const dynamic = "force-dynamic";
export const revalidate = 0;

export default function Home() {
  return (
    <div className="flex min-h-screen flex-col bg-gray-50">
      <SiteHeader title="Campus occupancy" subtitle="Where is there a free room right now?" />

      <main className="mx-auto w-full max-w-7xl flex-1 px-4 pb-16 pt-8 sm:px-6 lg:px-8">
        <div className="grid gap-6 sm:grid-cols-2 lg:grid-cols-3">
          <DashboardCard
            title="Find a room"
            badge="Students"
            description={"Nearest rooms with space,\nsearch by amenity and check in"}
            icon={<IconPin />}
            href="/user"
            ctaLabel="Open"
            accentColor="emerald"
          />
          <DashboardCard
            title="Admin"
            badge="Facilities"
            description={"Live occupancy by block,\nreports and CSV reloads"}
            icon={<IconChart />}
            href="/admin"
            ctaLabel="Open"
            accentColor="blue"
          />
          <DashboardCard
            title="Ops"
            badge="Operations"
            description={"Backend health probes,\nlatency and data freshness"}
            icon={<IconPulse />}
            href="/ops"
            ctaLabel="Open"
            accentColor="violet"
          />
        </div>
      </main>
    </div>
  );
}
