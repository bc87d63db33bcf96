/**
 * Global error handler, registered as Hono's onError.
 *
 * Reconciler and money errors keep their code and, for client faults,
 * their message. Any other error becomes INTERNAL_ERROR.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";

// =============================================================================
// Code → HTTP Status
// =============================================================================

const STATUS_MAP: Readonly<Record<ApiErrorCode, ContentfulStatusCode>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  INTERNAL_ERROR: 500,

  // ReconcilerError
  INVALID_CONFIG: 400,
  INVARIANT_VIOLATION: 500,

  // MoneyError
  INVALID_AMOUNT: 400,
  INVALID_DECIMALS: 400,
  INVALID_TOLERANCE: 400,
};

function isApiErrorCode(code: string): code is ApiErrorCode {
  return Object.prototype.hasOwnProperty.call(STATUS_MAP, code);
}

function codeOf(err: Error): ApiErrorCode {
  if ("code" in err && typeof err.code === "string" && isApiErrorCode(err.code)) {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

// =============================================================================
// Handler
// =============================================================================

export function handleError(err: Error, c: Context): Response {
  const code = codeOf(err);
  const status = STATUS_MAP[code];
  const message = status >= 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(code, message), status);
}
