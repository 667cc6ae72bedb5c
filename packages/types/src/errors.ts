/**
 * Error Taxonomy
 *
 * Every failure carries a category (which decides the HTTP status class)
 * and a stable machine-readable code. Domain steps return `Failure`
 * values; the boundary turns them into `AliaspayError` subclasses.
 */

import type { Result } from "./result.js";

// =============================================================================
// Categories & Codes
// =============================================================================

export type ErrorCategory =
  | "validation"
  | "conflict"
  | "authorization"
  | "not_found"
  | "rail"
  | "internal";

export type ValidationCode =
  | "INVALID_FORMAT"
  | "INVALID_ALIAS"
  | "INVALID_AMOUNT"
  | "UNSUPPORTED_CURRENCY"
  | "INVALID_SPLIT"
  | "INVALID_INTENT"
  | "LOW_CONFIDENCE"
  | "VALIDATION_ERROR";

export type ConflictCode =
  | "ALIAS_TAKEN"
  | "ADDRESS_ALREADY_ALIASED"
  | "DUPLICATE_TRANSACTION";

export type AuthorizationCode =
  | "ADDRESS_MISMATCH"
  | "INVALID_SIGNATURE"
  | "INTENT_REPLAYED"
  | "NOT_OWNER";

export type NotFoundCode =
  | "RECIPIENT_NOT_FOUND"
  | "ALIAS_NOT_FOUND"
  | "TRANSACTION_NOT_FOUND"
  | "SUBSCRIPTION_NOT_FOUND";

export type RailCode =
  | "RAIL_EXECUTION_FAILED"
  | "SETTLEMENT_NOT_RECORDED"
  | "INTENT_PARSER_UNAVAILABLE";

export type InternalCode = "INTERNAL_ERROR";

export type ErrorCode =
  | ValidationCode
  | ConflictCode
  | AuthorizationCode
  | NotFoundCode
  | RailCode
  | InternalCode;

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  "validation",
  "conflict",
  "authorization",
  "not_found",
  "rail",
  "internal",
];

export const ERROR_CODES: readonly ErrorCode[] = [
  "INVALID_FORMAT",
  "INVALID_ALIAS",
  "INVALID_AMOUNT",
  "UNSUPPORTED_CURRENCY",
  "INVALID_SPLIT",
  "INVALID_INTENT",
  "LOW_CONFIDENCE",
  "VALIDATION_ERROR",
  "ALIAS_TAKEN",
  "ADDRESS_ALREADY_ALIASED",
  "DUPLICATE_TRANSACTION",
  "ADDRESS_MISMATCH",
  "INVALID_SIGNATURE",
  "INTENT_REPLAYED",
  "NOT_OWNER",
  "RECIPIENT_NOT_FOUND",
  "ALIAS_NOT_FOUND",
  "TRANSACTION_NOT_FOUND",
  "SUBSCRIPTION_NOT_FOUND",
  "RAIL_EXECUTION_FAILED",
  "SETTLEMENT_NOT_RECORDED",
  "INTENT_PARSER_UNAVAILABLE",
  "INTERNAL_ERROR",
];

// =============================================================================
// Failure value
// =============================================================================

/**
 * A structured failure returned from a domain step.
 */
export interface Failure {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>> | undefined;
}

export function validationFailure(
  code: ValidationCode,
  message: string,
  details?: Record<string, unknown>,
): Failure {
  return { category: "validation", code, message, details };
}

export function conflictFailure(
  code: ConflictCode,
  message: string,
  details?: Record<string, unknown>,
): Failure {
  return { category: "conflict", code, message, details };
}

/**
 * The default message does not say which part of the check failed.
 */
export function authorizationFailure(
  code: AuthorizationCode,
  message: string = "Signature invalid or expired",
): Failure {
  return { category: "authorization", code, message };
}

export function notFoundFailure(
  code: NotFoundCode,
  message: string,
  details?: Record<string, unknown>,
): Failure {
  return { category: "not_found", code, message, details };
}

export function railFailure(
  code: RailCode,
  message: string,
  details?: Record<string, unknown>,
): Failure {
  return { category: "rail", code, message, details };
}

export function internalFailure(message: string): Failure {
  return { category: "internal", code: "INTERNAL_ERROR", message };
}

// =============================================================================
// Error classes
// =============================================================================

export class AliaspayError extends Error {
  public readonly category: ErrorCategory;
  public readonly code: ErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(failure: Failure) {
    super(failure.message);
    this.name = "AliaspayError";
    this.category = failure.category;
    this.code = failure.code;
    this.details = failure.details;
  }
}

export class ValidationError extends AliaspayError {
  constructor(failure: Failure) {
    super(failure);
    this.name = "ValidationError";
  }
}

export class ConflictError extends AliaspayError {
  constructor(failure: Failure) {
    super(failure);
    this.name = "ConflictError";
  }
}

export class AuthorizationError extends AliaspayError {
  constructor(failure: Failure) {
    super(failure);
    this.name = "AuthorizationError";
  }
}

export class NotFoundError extends AliaspayError {
  constructor(failure: Failure) {
    super(failure);
    this.name = "NotFoundError";
  }
}

export class RailError extends AliaspayError {
  constructor(failure: Failure) {
    super(failure);
    this.name = "RailError";
  }
}

export class InternalError extends AliaspayError {
  constructor(failure: Failure) {
    super(failure);
    this.name = "InternalError";
  }
}

/**
 * Convert a failure value into the error class of its category.
 */
export function toError(failure: Failure): AliaspayError {
  switch (failure.category) {
    case "validation":
      return new ValidationError(failure);
    case "conflict":
      return new ConflictError(failure);
    case "authorization":
      return new AuthorizationError(failure);
    case "not_found":
      return new NotFoundError(failure);
    case "rail":
      return new RailError(failure);
    case "internal":
      return new InternalError(failure);
  }
}

/**
 * Unwrap a successful result or throw the matching error class.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw toError(result.error);
  }
  return result.value;
}
