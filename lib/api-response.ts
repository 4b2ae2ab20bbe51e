/**
 * Standard API response shapes.
 *
 * Every endpoint answers with one of these envelopes.
 */

export type ApiSuccessResponse<T = unknown> = {
  ok: true;
  data?: T;
  message?: string;
};

export type ApiErrorCode =
  | "VALIDATION_ERROR"      // bad input
  | "NOT_FOUND"             // unknown room
  | "SEED_FILES_MISSING"    // CSV files not generated yet
  | "PAYLOAD_TOO_LARGE"     // upload over the limit
  | "SERVER_ERROR"
  | "UNKNOWN_ERROR";

export type ApiErrorResponse = {
  ok: false;
  code: ApiErrorCode;
  message: string;
  details?: unknown;
};

export type ApiResponse<T = unknown> = ApiSuccessResponse<T> | ApiErrorResponse;

export function success<T>(data?: T, message?: string): ApiSuccessResponse<T> {
  return {
    ok: true,
    ...(data !== undefined ? { data } : {}),
    ...(!message ? {} : { message })
  };
}

export function error(
  code: ApiErrorCode,
  message: string,
  details?: unknown
): ApiErrorResponse {
  return {
    ok: false,
    code,
    message,
    ...(details !== undefined ? { details } : {})
  };
}

export const HTTP_STATUS: Record<ApiErrorCode | "SUCCESS", number> = {
  SUCCESS: 200,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  SEED_FILES_MISSING: 409,
  PAYLOAD_TOO_LARGE: 413,
  SERVER_ERROR: 500,
  UNKNOWN_ERROR: 500
};
