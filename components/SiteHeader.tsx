import Link from "next/link";
import DashboardNav from "@/components/DashboardNav";

export default function SiteHeader({ title, subtitle }: { title: string; subtitle?: string }) {
  return (
    <header className="border-b bg-white">
      <div className="mx-auto max-w-7xl px-4 sm:px-6 lg:px-8">
        <div className="flex flex-wrap items-center justify-between gap-3 py-4">
          <Link href="/" className="flex items-center gap-2 text-sm font-bold tracking-tight text-slate-900">
            <span className="inline-block h-2.5 w-2.5 rounded-full bg-[rgb(var(--brand-accent))]" />
            Campus Occupancy
          </Link>
          <DashboardNav />
        </div>

        <div className="pb-4">
          <h1 className="text-2xl font-bold tracking-tight">{title}</h1>
          {subtitle ? <p className="mt-1 text-sm text-slate-600">{subtitle}</p> : null}
        </div>
      </div>
    </header>
  );
}
