"use client";

import * as React from "react";
import { cn } from "@/lib/cn";
import { BUTTON_BASE, BUTTON_VARIANT, type ButtonVariant } from "@/components/ui/presets";

type Props = React.ButtonHTMLAttributes<HTMLButtonElement> & {
  variant?: ButtonVariant;
  /** disables the button and swaps the label while a request is in flight */
  busy?: boolean;
  busyLabel?: string;
};

const Button = React.forwardRef<HTMLButtonElement, Props>(
  ({ className, variant = "primary", type, busy = false, busyLabel = "Working…", disabled, children, ...props }, ref) => (
    <button
      ref={ref}
      type={type ?? "button"}
      disabled={disabled || busy}
      aria-busy={busy || undefined}
      className={cn(BUTTON_BASE, BUTTON_VARIANT[variant], className)}
      {...props}
    >
      {busy ? busyLabel : children}
    </button>
  )
);

Button.displayName = "Button";

export default Button;
