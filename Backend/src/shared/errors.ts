// src/shared/errors.ts
// Error types that carry an HTTP status + machine code for the error middleware.

export class AppError extends Error {
  constructor(message: string, readonly status = 500, readonly code = "internal_error") {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, "bad_request");
  }
}

/** A call to Google CSE / the LLM API failed or timed out. Not retried. */
export class UpstreamError extends AppError {
  constructor(message: string, readonly upstreamStatus?: number, readonly url?: string, readonly body?: string) {
    super(message, 500, "upstream_error");
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
