import * as React from "react";
import { cn } from "@/lib/cn";
import { FIELD_CONTROL_BASE, FIELD_HELP, FIELD_LABEL } from "@/components/ui/presets";

export function FieldLabel({ children, className, htmlFor }: { children: React.ReactNode; className?: string; htmlFor?: string }) {
  return (
    <label htmlFor={htmlFor} className={cn(FIELD_LABEL, className)}>
      {children}
    </label>
  );
}

export function FieldHelp({ children, tone = "muted" }: { children: React.ReactNode; tone?: "muted" | "error" }) {
  return (
    <p className={tone === "error" ? "mt-1 text-xs leading-4 font-semibold text-red-600" : FIELD_HELP} role={tone === "error" ? "alert" : undefined}>
      {children}
    </p>
  );
}

type ControlProps<T> = T & { className?: string };

export const Input = React.forwardRef<HTMLInputElement, ControlProps<React.InputHTMLAttributes<HTMLInputElement>>>(
  function Input({ className, ...props }, ref) {
    return <input ref={ref} className={cn(FIELD_CONTROL_BASE, className)} {...props} />;
  }
);

export const Select = React.forwardRef<HTMLSelectElement, ControlProps<React.SelectHTMLAttributes<HTMLSelectElement>>>(
  function Select({ className, ...props }, ref) {
    return <select ref={ref} className={cn(FIELD_CONTROL_BASE, className)} {...props} />;
  }
);
