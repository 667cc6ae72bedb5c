/**
 * Global error handler.
 *
 * Route handlers throw `AliaspayError` subclasses (usually through
 * `unwrap`); this handler turns them into the error envelope. The HTTP
 * status follows the error's category:
 *
 *   validation 400 · authorization 401/403 · not_found 404
 *   conflict 409 · rail 502 · internal 500
 *
 * Only ADDRESS_MISMATCH answers 401; every other authorization failure
 * is a 403. Internal messages are never sent to the client.
 */

import type { Context, ErrorHandler, NotFoundHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { AliaspayError } from "@aliaspay/types";
import type { ErrorCategory, ErrorCode } from "@aliaspay/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Category → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500 | 502;

const CATEGORY_STATUS: Readonly<Record<ErrorCategory, ErrorStatus>> = {
  validation: 400,
  authorization: 403,
  not_found: 404,
  conflict: 409,
  rail: 502,
  internal: 500,
};

const CODE_STATUS: Readonly<Partial<Record<ErrorCode, ErrorStatus>>> = {
  ADDRESS_MISMATCH: 401,
};

export function statusFor(category: ErrorCategory, code: ErrorCode): ErrorStatus {
  return CODE_STATUS[code] ?? CATEGORY_STATUS[category];
}

// =============================================================================
// Handlers
// =============================================================================

export interface ErrorHandlerOptions {
  /** Called for every error answered with a 500 */
  readonly onInternalError?: ((err: unknown, c: Context<AppEnv>) => void) | undefined;
}

export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof AliaspayError) {
      const status = statusFor(err.category, err.code);
      if (status === 500) {
        options.onInternalError?.(err, c);
        return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
      }
      return c.json(createErrorEnvelope(err.code, err.message, err.details), status);
    }

    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
          issues: formatZodErrors(err),
        }),
        400,
      );
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    options.onInternalError?.(err, c);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

export const handleNotFound: NotFoundHandler<AppEnv> = (c) => {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
};
