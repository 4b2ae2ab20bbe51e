"use client";

import type { ReactNode } from "react";
import { cn } from "@/lib/cn";
import { CARD_BASE, CARD_PAD, SECTION_DESC, SECTION_TITLE } from "@/components/ui/presets";

type Props = {
  children: ReactNode;
  className?: string;
  pad?: keyof typeof CARD_PAD;
  title?: ReactNode;
  description?: ReactNode;
};

/** Dashboard panel; `title` / `description` render the section header */
export default function Card({ children, className, pad = "md", title, description }: Props) {
  const hasHeader = Boolean(title || description);
  return (
    <section className={cn(CARD_BASE, CARD_PAD[pad], className)}>
      {title ? <h2 className={SECTION_TITLE}>{title}</h2> : null}
      {description ? <p className={SECTION_DESC}>{description}</p> : null}
      {hasHeader ? <div className="mt-3">{children}</div> : children}
    </section>
  );
}
