/**
 * Maps thrown errors to HTTP responses.
 */

import type { FastifyError } from "fastify";
import {
  ConflictError,
  NotFoundError,
  TransientInfrastructureError,
  ValidationError,
  isShortUrlError,
  type ShortUrlError,
} from "@snaplink/core";
import type { ApiError } from "@snaplink/shared";

export interface MappedError {
  statusCode: number;
  body: ApiError;
}

function mapShortUrlError(error: ShortUrlError): MappedError {
  if (error instanceof ValidationError) {
    return {
      statusCode: 400,
      body: { success: false, error: "Validation failed", errorCode: error.code, details: error.details },
    };
  }
  if (error instanceof ConflictError) {
    return { statusCode: 409, body: { success: false, error: error.message, errorCode: error.code } };
  }
  if (error instanceof NotFoundError) {
    return { statusCode: 404, body: { success: false, error: error.message, errorCode: error.code } };
  }
  if (error instanceof TransientInfrastructureError) {
    return {
      statusCode: 503,
      body: { success: false, error: "Service temporarily unavailable", errorCode: error.code },
    };
  }
  return { statusCode: 500, body: { success: false, error: "Internal server error", errorCode: error.code } };
}

function isFastifyClientError(error: unknown): error is FastifyError & { statusCode: number } {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

/**
 * @param exposeInternal - include the message of unexpected errors (non-production)
 */
export function mapError(error: unknown, exposeInternal = false): MappedError {
  if (isShortUrlError(error)) {
    return mapShortUrlError(error);
  }

  // Malformed JSON, oversized bodies, rate limiting
  if (isFastifyClientError(error)) {
    const errorCode = error.statusCode === 429 ? "RATE_LIMITED" : (error.code ?? "BAD_REQUEST");
    return { statusCode: error.statusCode, body: { success: false, error: error.message, errorCode } };
  }

  const message = exposeInternal && error instanceof Error ? error.message : "Internal server error";
  return { statusCode: 500, body: { success: false, error: message, errorCode: "INTERNAL" } };
}
