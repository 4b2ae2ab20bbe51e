import type { ApiErrorCode } from "./api-response";

export class AppError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: unknown) {
    super("NOT_FOUND", message, details);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super("VALIDATION_ERROR", message, details);
  }
}

export class SeedFilesMissingError extends AppError {
  constructor(public readonly missing: string[]) {
    super("SEED_FILES_MISSING", `CSV files missing: ${missing.join(", ")}. Run the generator first.`, { missing });
  }
}
