export type ClassValue = string | number | null | undefined | false | ClassValue[] | Record<string, boolean | undefined>;

/**
 * className combiner.
 * Falsy values are dropped, arrays are flattened, and object keys are kept
 * when their value is true: cn("a", ["b", false], { c: isActive }).
 */
export function cn(...values: ClassValue[]): string {
  const out: string[] = [];
  for (const v of values) {
    if (v === null || v === undefined || v === false || v === "") continue;
    if (Array.isArray(v)) {
      const nested = cn(...v);
      if (nested) out.push(nested);
    } else if (typeof v === "object") {
      for (const [cls, on] of Object.entries(v)) if (on) out.push(cls);
    } else {
      out.push(String(v));
    }
  }
  return out.join(" ");
}
