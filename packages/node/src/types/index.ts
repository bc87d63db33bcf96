/**
 * Type barrel — re-exports all public types from @ledgerpair/node.
 */

// DTOs
export { ReconcileSchema, ReconcileQuerySchema } from "./dto.js";
export type { ReconcileDto, ReconcileQuery } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, HttpErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedEnv, ValidatedQueryEnv } from "./api-contract.js";
