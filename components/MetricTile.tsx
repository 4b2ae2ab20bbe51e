import type { ReactNode } from "react";
import Card from "@/components/ui/Card";
import { METRIC_LABEL, METRIC_VALUE } from "@/components/ui/presets";
import { cn } from "@/lib/cn";

export default function MetricTile({
  label,
  value,
  hint,
  className,
}: {
  label: string;
  value: ReactNode;
  hint?: ReactNode;
  className?: string;
}) {
  return (
    <Card pad="sm" className={className}>
      <div className={METRIC_LABEL}>{label}</div>
      <div className={METRIC_VALUE}>{value}</div>
      {hint ? <div className={cn("mt-1 text-xs text-slate-500")}>{hint}</div> : null}
    </Card>
  );
}
