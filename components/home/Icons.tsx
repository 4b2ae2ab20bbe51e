import * as React from "react";
import { HOME_ICON_SVG, HOME_ICON_WRAP } from "@/components/ui/presets";

const C = {
  outline: "#0f172a",
  blue: "#2563eb",
  blueSoft: "#e9f3ff",
  mint: "#10b981",
  mintSoft: "#dbf6f1",
  orange: "#f59e0b",
  red: "#ef4444",
};

const OUT = { stroke: C.outline, strokeWidth: 3, strokeLinecap: "round" as const, strokeLinejoin: "round" as const, strokeOpacity: 0.85 };

function Wrap({ children }: { children: React.ReactNode }) {
  return <div className={`mx-auto ${HOME_ICON_WRAP}`}>{children}</div>;
}

export function IconChart() {
  return (
    <Wrap>
      <svg viewBox="0 0 64 64" className={HOME_ICON_SVG} aria-hidden="true">
        <rect x="8" y="8" width="48" height="48" rx="8" fill={C.blueSoft} {...OUT} />
        <rect x="17" y="34" width="7" height="14" rx="2" fill={C.mint} />
        <rect x="28.5" y="24" width="7" height="24" rx="2" fill={C.orange} />
        <rect x="40" y="16" width="7" height="32" rx="2" fill={C.red} />
      </svg>
    </Wrap>
  );
}

export function IconPin() {
  return (
    <Wrap>
      <svg viewBox="0 0 64 64" className={HOME_ICON_SVG} aria-hidden="true">
        <path d="M32 56s-16-15-16-28a16 16 0 0 1 32 0c0 13-16 28-16 28z" fill={C.mintSoft} {...OUT} />
        <circle cx="32" cy="28" r="6" fill={C.mint} {...OUT} />
      </svg>
    </Wrap>
  );
}

export function IconPulse() {
  return (
    <Wrap>
      <svg viewBox="0 0 64 64" className={HOME_ICON_SVG} aria-hidden="true">
        <rect x="8" y="12" width="48" height="40" rx="8" fill={C.blueSoft} {...OUT} />
        <polyline points="14,34 24,34 29,22 35,44 40,30 50,30" fill="none" {...OUT} stroke={C.blue} />
      </svg>
    </Wrap>
  );
}
