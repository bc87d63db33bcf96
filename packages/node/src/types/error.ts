/**
 * Error envelope for API responses.
 *
 * Every failure leaves the service as
 * { error: { code, message, details? } }
 * where `code` is either a transport-level code raised by the HTTP layer
 * or the code of the reconciler or money error that was thrown.
 */

import type { MoneyErrorCode } from "@ledgerpair/money";
import type { ReconcilerErrorCode } from "@ledgerpair/reconciler";

/** Codes raised by the HTTP layer itself. */
export type HttpErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "PAYLOAD_TOO_LARGE"
  | "INTERNAL_ERROR";

/** Every code a client can see. */
export type ApiErrorCode = HttpErrorCode | ReconcilerErrorCode | MoneyErrorCode;

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details !== undefined
    ? { error: { code, message, details } }
    : { error: { code, message } };
}
