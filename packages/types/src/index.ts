/**
 * @aliaspay/types — Shared domain types for the Aliaspay stack.
 *
 * These types are used across all Aliaspay packages:
 * - Payment intents (single, subscription, split)
 * - Transactions and subscriptions
 * - Alias records
 * - Result values and the error taxonomy
 * - Address/alias canonicalization
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Result
export { ok, fail } from "./result.js";
export type { Ok, Fail, Result } from "./result.js";

// Errors
export {
  AliaspayError,
  ValidationError,
  ConflictError,
  AuthorizationError,
  NotFoundError,
  RailError,
  InternalError,
  toError,
  unwrap,
  validationFailure,
  conflictFailure,
  authorizationFailure,
  notFoundFailure,
  railFailure,
  internalFailure,
  ERROR_CATEGORIES,
  ERROR_CODES,
} from "./errors.js";
export type {
  ErrorCategory,
  ErrorCode,
  ValidationCode,
  ConflictCode,
  AuthorizationCode,
  NotFoundCode,
  RailCode,
  InternalCode,
  Failure,
} from "./errors.js";

// Address codec
export {
  normalizeAddress,
  normalizeAlias,
  displayAlias,
  toCanonicalAddress,
  toCanonicalAlias,
  sameAddress,
  isCanonicalAddress,
  isCanonicalAlias,
  ALIAS_MIN_LENGTH,
  ALIAS_MAX_LENGTH,
} from "./codec.js";
export type { CanonicalAddress, CanonicalAlias } from "./codec.js";

// Intent types
export { PAYMENT_TYPES, FREQUENCIES } from "./intent.js";
export type {
  PaymentType,
  Frequency,
  IntentParseError,
  SingleIntent,
  SubscriptionIntent,
  SplitRecipient,
  SplitIntent,
  PaymentIntent,
} from "./intent.js";

// Directory types
export type { AliasRecord, AliasMatch } from "./directory.js";

// Financial types
export { MULTIPLE_RECIPIENTS } from "./financial.js";
export type {
  Currency,
  CurrencySpec,
  TransactionPayee,
  Transaction,
  TransactionDraft,
  SubscriptionStatus,
  Subscription,
} from "./financial.js";

// Money
export {
  toBaseUnits,
  formatBaseUnits,
  amountToDecimal,
  parsePositiveAmount,
} from "./money.js";
export type { ParsedAmount } from "./money.js";

// Runtime type guards
export {
  isPaymentType,
  isFrequency,
  isAliasRecord,
  isTransaction,
  isSubscription,
  isErrorCategory,
  isErrorCode,
  isFailure,
} from "./guards.js";
