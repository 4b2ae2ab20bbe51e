"use client";

import { useEffect } from "react";

import { cn } from "@/lib/cn";
import { NOTICE_BASE, NOTICE_VARIANT, CARD_PAD } from "@/components/ui/presets";

export type Toast = { type: "success" | "error"; message: string };

type Props = Toast & {
  onClose?: () => void;
  autoHideMs?: number;
};

/** Inline result banner for check-ins and CSV reloads */
export default function ToastBanner({ type, message, onClose, autoHideMs }: Props) {
  useEffect(() => {
    if (!autoHideMs || !onClose) return;
    const t = setTimeout(() => onClose(), autoHideMs);
    return () => clearTimeout(t);
  }, [autoHideMs, onClose]);

  return (
    <div
      className={cn(
        NOTICE_BASE,
        NOTICE_VARIANT[type === "success" ? "success" : "danger"],
        CARD_PAD.sm,
        "flex items-center justify-between"
      )}
      role="status"
      aria-live="polite"
    >
      <p className="text-sm">{message}</p>
      {onClose ? (
        <button
          type="button"
          onClick={onClose}
          className="rounded-md px-2 py-1 text-sm opacity-80 hover:opacity-100"
          aria-label="Close"
        >
          ×
        </button>
      ) : null}
    </div>
  );
}
