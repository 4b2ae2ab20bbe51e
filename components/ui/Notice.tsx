"use client";

import type { ReactNode } from "react";
import { cn } from "@/lib/cn";
import { CARD_PAD, NOTICE_BASE, NOTICE_VARIANT, type NoticeVariant } from "@/components/ui/presets";

type Props = {
  title?: ReactNode;
  children: ReactNode;
  className?: string;
  variant?: NoticeVariant;
};

export default function Notice({ title, children, className, variant = "info" }: Props) {
  return (
    <div
      role={variant === "danger" ? "alert" : "status"}
      className={cn(NOTICE_BASE, NOTICE_VARIANT[variant], CARD_PAD.sm, className)}
    >
      {title ? <div className="text-[14px] font-bold tracking-[-0.01em] text-slate-900">{title}</div> : null}
      <div className={cn(title ? "mt-1" : "", "text-sm leading-6 text-slate-700")}>{children}</div>
    </div>
  );
}
