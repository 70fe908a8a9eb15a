import type { AnalysisFailureKind } from "../types";

type ErrorOptions = { cause?: unknown };

/**
 * Base class for the failures of the AI path. Each subclass carries a fixed
 * `kind` so callers can switch on it instead of matching error classes.
 */
export abstract class AnalysisError extends Error {
  abstract readonly kind: Exclude<AnalysisFailureKind, "Unexpected">;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/* No credentials configured, or every attempt failed transiently. */
export class GatewayUnavailableError extends AnalysisError {
  readonly kind = "GatewayUnavailable" as const;

  constructor(
    message: string,
    readonly attempts: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/* The model's output did not have the expected shape. */
export class MalformedResponseError extends AnalysisError {
  readonly kind = "MalformedResponse" as const;
}

/* The provider rejected the request itself; retrying cannot help. */
export class PermanentRequestError extends AnalysisError {
  readonly kind = "PermanentRequestError" as const;

  constructor(
    message: string,
    readonly status: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * Narrows any thrown value to the failure kind it represents.
 */
export function toFailureKind(error: unknown): AnalysisFailureKind {
  return error instanceof AnalysisError ? error.kind : "Unexpected";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error raised by route handlers for client-facing failures (400, 404).
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}
