import type { ReactNode } from "react";
import Link from "next/link";
import { cn } from "@/lib/cn";
import {
  HOME_BADGE,
  HOME_BUTTON_BASE,
  HOME_BUTTON_PRIMARY,
  HOME_CARD_BASE,
  HOME_CARD_HOVER,
  HOME_DESC,
  HOME_TITLE,
} from "@/components/ui/presets";

type AccentColor = "blue" | "violet" | "emerald";

const ACCENT_STYLES: Record<AccentColor, { border: string; dot: string }> = {
  blue: { border: "border-t-blue-400", dot: "bg-blue-500" },
  violet: { border: "border-t-violet-400", dot: "bg-violet-500" },
  emerald: { border: "border-t-emerald-400", dot: "bg-emerald-500" },
};

type Props = {
  title: string;
  badge: string;
  description: string;
  icon: ReactNode;
  href: string;
  ctaLabel: string;
  accentColor: AccentColor;
};

export default function DashboardCard({ title, badge, description, icon, href, ctaLabel, accentColor }: Props) {
  const accent = ACCENT_STYLES[accentColor];

  return (
    <div
      className={cn(
        "flex flex-col items-center border-t-[3px] px-6 py-10 text-center",
        HOME_CARD_BASE,
        HOME_CARD_HOVER,
        accent.border
      )}
    >
      <div className="flex h-24 w-24 items-center justify-center">{icon}</div>

      <div className={cn(HOME_BADGE, "mt-5")}>
        <span className={cn("inline-block h-2 w-2 rounded-full", accent.dot)} />
        {badge}
      </div>

      <h2 className={cn(HOME_TITLE, "mt-4")}>{title}</h2>
      <p className={cn(HOME_DESC, "mt-3 min-h-[56px] whitespace-pre-line")}>{description}</p>

      <div className="mt-8">
        <Link href={href} className={cn(HOME_BUTTON_BASE, HOME_BUTTON_PRIMARY)}>
          {ctaLabel}
        </Link>
      </div>
    </div>
  );
}
