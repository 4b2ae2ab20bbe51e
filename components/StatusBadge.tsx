import type { DisplayStatus } from "@/lib/types";

const STYLES: Record<DisplayStatus, string> = {
  Free: "border-emerald-200 bg-emerald-50 text-emerald-800",
  Partial: "border-amber-200 bg-amber-50 text-amber-800",
  Full: "border-red-200 bg-red-50 text-red-800",
};

export default function StatusBadge({ status }: { status: DisplayStatus }) {
  return (
    <span className={`inline-flex items-center rounded-full border px-2 py-0.5 text-xs font-semibold ${STYLES[status]}`}>
      {status}
    </span>
  );
}
