import { NextResponse } from "next/server";
import { error, HTTP_STATUS, success, type ApiErrorCode } from "./api-response";
import { AppError } from "./errors";
import { logger } from "./logger";

export function jsonOk<T>(data: T, status: number = HTTP_STATUS.SUCCESS) {
  return NextResponse.json(success(data), { status });
}

export function jsonError(code: ApiErrorCode, message: string, details?: unknown) {
  return NextResponse.json(error(code, message, details), { status: HTTP_STATUS[code] });
}

/**
 * Maps a thrown value to an error envelope.
 * AppError keeps its code; anything else is logged and answered with 500.
 */
export function handleRouteError(e: unknown, route: string) {
  if (e instanceof AppError) {
    if (e.code === "SERVER_ERROR") logger.error(e.message, { route });
    return jsonError(e.code, e.message, e.details);
  }
  logger.error("Unhandled route error", {
    route,
    error: e instanceof Error ? e.message : String(e),
  });
  return jsonError("SERVER_ERROR", "Internal server error");
}
