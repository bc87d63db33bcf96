/**
 * Request body size limit.
 *
 * Wraps hono's bodyLimit so oversized bodies get the standard error envelope.
 */

import type { MiddlewareHandler } from "hono";
import { bodyLimit } from "hono/body-limit";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

export function bodyLimitMiddleware(
  maxBytes: number = DEFAULT_MAX_BODY_BYTES,
): MiddlewareHandler<AppEnv> {
  return bodyLimit({
    maxSize: maxBytes,
    onError: (c) =>
      c.json(
        createErrorEnvelope(
          "PAYLOAD_TOO_LARGE",
          `Request body exceeds ${maxBytes} bytes`,
        ),
        413,
      ),
  });
}
