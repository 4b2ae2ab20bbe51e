/**
 * Audit trail for state-changing operator actions.
 *
 * - production: JSON on stdout
 * - development: one readable line
 */

export type AuditAction =
  | "CHECKIN"
  | "CSV_RELOAD"
  | "EXPORT";

export interface AuditEntry {
  action: AuditAction;
  ip?: string;
  target?: string;
  details?: Record<string, unknown>;
}

const isDev = process.env.NODE_ENV === "development";

export function clientIp(req: Request): string {
  return (
    req.headers.get("x-forwarded-for")?.split(",")[0]?.trim() ||
    req.headers.get("x-real-ip") ||
    "unknown"
  );
}

export function auditLog(entry: AuditEntry): void {
  if (process.env.NODE_ENV === "test") return;

  const record = {
    _type: "AUDIT",
    timestamp: new Date().toISOString(),
    action: entry.action,
    ip: entry.ip ?? "unknown",
    target: entry.target ?? "",
    ...entry.details,
  };

  if (isDev) {
    console.log(
      `[AUDIT] ${record.action} | target=${record.target} | ip=${record.ip}`,
      entry.details ? JSON.stringify(entry.details) : ""
    );
  } else {
    console.log(JSON.stringify(record));
  }
}
