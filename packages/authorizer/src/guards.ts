/**
 * Guards for structured messages read back from storage.
 */

import { isCanonicalAddress, isCanonicalAlias, isPaymentType } from "@aliaspay/types";
import type { StructuredMessage } from "./messages.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isAddress(value: unknown): boolean {
  return typeof value === "string" && isCanonicalAddress(value);
}

function isRecipient(value: unknown): boolean {
  return isObject(value) && isAddress(value["to"]) && Number.isInteger(value["shareBps"]);
}

function isPaymentMessage(m: Record<string, unknown>): boolean {
  const recipients = m["recipients"];
  return (
    typeof m["intentId"] === "string" &&
    isPaymentType(m["paymentType"]) &&
    isAddress(m["from"]) &&
    Array.isArray(recipients) &&
    recipients.every(isRecipient) &&
    typeof m["amount"] === "string" &&
    /^\d+$/.test(m["amount"]) &&
    typeof m["currency"] === "string" &&
    typeof m["schedule"] === "string" &&
    typeof m["memo"] === "string"
  );
}

export function isStructuredMessage(value: unknown): value is StructuredMessage {
  if (!isObject(value)) return false;
  const m = value["message"];
  if (!isObject(m)) return false;

  switch (value["primaryType"]) {
    case "PaymentAuthorization":
      return isPaymentMessage(m);
    case "AliasRegistration":
    case "AliasDeletion":
      return typeof m["alias"] === "string" && isCanonicalAlias(m["alias"]) && isAddress(m["address"]);
    case "SubscriptionCancellation":
      return typeof m["id"] === "string" && isAddress(m["address"]);
    default:
      return false;
  }
}
