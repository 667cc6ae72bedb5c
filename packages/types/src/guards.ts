/**
 * Runtime Type Guards
 *
 * Narrowing functions for Aliaspay domain types. Used where data crosses
 * a trust boundary: records read back from a durable store, responses
 * from external collaborators.
 */

import { isCanonicalAddress, isCanonicalAlias } from "./codec.js";
import type { AliasRecord } from "./directory.js";
import type { ErrorCategory, ErrorCode, Failure } from "./errors.js";
import { ERROR_CATEGORIES, ERROR_CODES } from "./errors.js";
import type { Subscription, Transaction, TransactionPayee } from "./financial.js";
import { MULTIPLE_RECIPIENTS } from "./financial.js";
import type { Frequency, PaymentType } from "./intent.js";
import { FREQUENCIES, PAYMENT_TYPES } from "./intent.js";

const PAYMENT_TYPE_SET = new Set<string>(PAYMENT_TYPES);
const FREQUENCY_SET = new Set<string>(FREQUENCIES);
const SUBSCRIPTION_STATUSES = new Set<string>(["active", "cancelled"]);
const ERROR_CATEGORY_SET = new Set<string>(ERROR_CATEGORIES);
const ERROR_CODE_SET = new Set<string>(ERROR_CODES);

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isAddressValue(value: unknown): boolean {
  return typeof value === "string" && isCanonicalAddress(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

// =============================================================================
// Intent guards
// =============================================================================

export function isPaymentType(value: unknown): value is PaymentType {
  return typeof value === "string" && PAYMENT_TYPE_SET.has(value);
}

export function isFrequency(value: unknown): value is Frequency {
  return typeof value === "string" && FREQUENCY_SET.has(value);
}

// =============================================================================
// Directory guards
// =============================================================================

export function isAliasRecord(value: unknown): value is AliasRecord {
  if (!isObject(value)) return false;
  return (
    typeof value["alias"] === "string" &&
    isCanonicalAlias(value["alias"]) &&
    isAddressValue(value["address"]) &&
    typeof value["registeredAt"] === "string" &&
    typeof value["lastUsedAt"] === "string"
  );
}

// =============================================================================
// Financial guards
// =============================================================================

function isTransactionPayee(value: unknown): value is TransactionPayee {
  if (!isObject(value)) return false;
  return (
    isAddressValue(value["address"]) &&
    typeof value["alias"] === "string" &&
    isCanonicalAlias(value["alias"]) &&
    typeof value["shareBps"] === "number" &&
    typeof value["amount"] === "string"
  );
}

export function isTransaction(value: unknown): value is Transaction {
  if (!isObject(value)) return false;
  const to = value["toAddress"];
  const recipients = value["recipients"];
  return (
    typeof value["id"] === "string" &&
    typeof value["transactionHash"] === "string" &&
    typeof value["intentId"] === "string" &&
    isAddressValue(value["fromAddress"]) &&
    (to === MULTIPLE_RECIPIENTS || isAddressValue(to)) &&
    (recipients === undefined ||
      (Array.isArray(recipients) && recipients.every(isTransactionPayee))) &&
    typeof value["amount"] === "string" &&
    typeof value["currency"] === "string" &&
    isPaymentType(value["paymentType"]) &&
    typeof value["status"] === "string" &&
    isOptionalString(value["memo"]) &&
    isOptionalString(value["explorerUrl"]) &&
    typeof value["timestamp"] === "string" &&
    typeof value["sequence"] === "number"
  );
}

export function isSubscription(value: unknown): value is Subscription {
  if (!isObject(value)) return false;
  return (
    typeof value["id"] === "string" &&
    typeof value["intentId"] === "string" &&
    isAddressValue(value["fromAddress"]) &&
    isAddressValue(value["toAddress"]) &&
    typeof value["amount"] === "string" &&
    typeof value["currency"] === "string" &&
    isFrequency(value["frequency"]) &&
    typeof value["status"] === "string" &&
    SUBSCRIPTION_STATUSES.has(value["status"]) &&
    typeof value["startDate"] === "string" &&
    typeof value["nextPayment"] === "string" &&
    typeof value["createdAt"] === "string" &&
    isOptionalString(value["cancelledAt"]) &&
    isOptionalString(value["railSubscriptionId"])
  );
}

// =============================================================================
// Failure guards
// =============================================================================

export function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === "string" && ERROR_CATEGORY_SET.has(value);
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && ERROR_CODE_SET.has(value);
}

export function isFailure(value: unknown): value is Failure {
  if (!isObject(value)) return false;
  const details = value["details"];
  return (
    isErrorCategory(value["category"]) &&
    isErrorCode(value["code"]) &&
    typeof value["message"] === "string" &&
    (details === undefined || isObject(details))
  );
}
