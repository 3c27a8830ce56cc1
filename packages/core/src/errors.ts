/**
 * Error taxonomy for the short URL core.
 *
 * - ValidationError: bad input; never retried
 * - ConflictError: code taken or version mismatch; retry with a new code or fresh state
 * - NotFoundError: unknown or inactive code (the lookup path returns a value instead)
 * - TransientInfrastructureError: cache/store/queue failure or timeout
 */

export type ShortUrlErrorCode =
  | "VALIDATION_FAILED"
  | "CONFLICT"
  | "NOT_FOUND"
  | "TRANSIENT_INFRASTRUCTURE";

export abstract class ShortUrlError extends Error {
  abstract readonly code: ShortUrlErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ShortUrlError {
  readonly code = "VALIDATION_FAILED";
  /** Field name to error messages */
  readonly details: Record<string, string[]>;

  constructor(details: Record<string, string[]>) {
    const fields = Object.keys(details).join(", ");
    super(`Validation failed: ${fields}`);
    this.details = details;
  }
}

export type ConflictReason = "short_code_taken" | "version_mismatch";

export class ConflictError extends ShortUrlError {
  readonly code = "CONFLICT";
  readonly reason: ConflictReason;
  readonly shortCode: string;

  constructor(reason: ConflictReason, shortCode: string, message?: string) {
    super(
      message ??
        (reason === "short_code_taken"
          ? `Short code '${shortCode}' is already taken`
          : `Short URL '${shortCode}' was modified concurrently`)
    );
    this.reason = reason;
    this.shortCode = shortCode;
  }
}

export type NotFoundReason = "unknown" | "inactive";

export class NotFoundError extends ShortUrlError {
  readonly code = "NOT_FOUND";
  readonly reason: NotFoundReason;
  readonly shortCode: string;

  constructor(shortCode: string, reason: NotFoundReason = "unknown") {
    super(
      reason === "unknown"
        ? `Short URL '${shortCode}' not found`
        : `Short URL '${shortCode}' is no longer accessible`
    );
    this.reason = reason;
    this.shortCode = shortCode;
  }
}

export type InfrastructureComponent = "cache" | "store" | "queue";

export class TransientInfrastructureError extends ShortUrlError {
  readonly code = "TRANSIENT_INFRASTRUCTURE";
  readonly component: InfrastructureComponent;

  constructor(component: InfrastructureComponent, message: string, cause?: unknown) {
    super(message, { cause });
    this.component = component;
  }
}

export function isShortUrlError(error: unknown): error is ShortUrlError {
  return error instanceof ShortUrlError;
}
