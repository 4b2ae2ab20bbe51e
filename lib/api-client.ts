/**
 * Browser-side API calls used by the dashboards.
 * Same-origin paths; every response is an ApiResponse envelope.
 */

import type { ApiResponse } from "./api-response";

export class ApiRequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

async function unwrap<T>(res: Response): Promise<T> {
  const body: ApiResponse<T> | null = await res.json().catch(() => null);
  if (!body) throw new ApiRequestError(res.status, "UNKNOWN_ERROR", `HTTP ${res.status}`);
  if (!body.ok) throw new ApiRequestError(res.status, body.code, body.message);
  if (body.data === undefined) throw new ApiRequestError(res.status, "UNKNOWN_ERROR", "Empty response");
  return body.data;
}

export async function apiGet<T>(path: string): Promise<T> {
  return unwrap<T>(await fetch(path, { cache: "no-store" }));
}

export async function apiPostJson<T>(path: string, payload?: unknown): Promise<T> {
  return unwrap<T>(
    await fetch(path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: payload === undefined ? undefined : JSON.stringify(payload),
    })
  );
}

export async function apiPostForm<T>(path: string, form: FormData): Promise<T> {
  return unwrap<T>(await fetch(path, { method: "POST", body: form }));
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
