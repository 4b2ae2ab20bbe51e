"use client";

import * as React from "react";
import { CHECKBOX_INPUT, CHECKBOX_TEXT, CHECKBOX_WRAP } from "@/components/ui/presets";
import { cn } from "@/lib/cn";

type Props = Omit<React.InputHTMLAttributes<HTMLInputElement>, "type"> & {
  label: React.ReactNode;
  containerClassName?: string;
};

const Checkbox = React.forwardRef<HTMLInputElement, Props>(
  ({ label, containerClassName, className, disabled, ...props }, ref) => {
    return (
      <label className={cn(CHECKBOX_WRAP, disabled && "opacity-70", containerClassName)}>
        <input ref={ref} type="checkbox" disabled={disabled} className={cn(CHECKBOX_INPUT, className)} {...props} />
        <span className={CHECKBOX_TEXT}>{label}</span>
      </label>
    );
  }
);
Checkbox.displayName = "Checkbox";

export default Checkbox;
