/**
 * Guards for intent records read back from storage.
 */

import { isStructuredMessage } from "@aliaspay/authorizer";
import { isFailure, isPaymentType, isSubscription, isTransaction } from "@aliaspay/types";
import type { ExecutedOutcome, IntentRecord } from "./types.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isExecutedOutcome(value: unknown): value is ExecutedOutcome {
  if (!isObject(value) || !isPaymentType(value["paymentType"])) return false;
  if (value["status"] === "success") {
    const subscription = value["subscription"];
    return (
      isTransaction(value["transaction"]) &&
      (subscription === undefined || isSubscription(subscription))
    );
  }
  return value["status"] === "failed" && isFailure(value["failure"]);
}

export function isIntentRecord(value: unknown): value is IntentRecord {
  if (!isObject(value)) return false;
  const state = value["state"];
  const outcome = value["outcome"];
  return (
    typeof value["intentId"] === "string" &&
    typeof value["digest"] === "string" &&
    isStructuredMessage(value["message"]) &&
    (state === "executing" || state === "executed") &&
    (outcome === undefined || isExecutedOutcome(outcome)) &&
    typeof value["updatedAt"] === "string"
  );
}
