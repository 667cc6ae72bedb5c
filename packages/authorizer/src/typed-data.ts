/**
 * Conversion between structured messages and viem typed data.
 */

import { getAddress, recoverTypedDataAddress } from "viem";
import type { Address, Hex, LocalAccount, TypedDataDomain } from "viem";
import type { AuthorizationDomain, StructuredMessage } from "./messages.js";
import {
  ALIAS_DELETION_TYPES,
  ALIAS_REGISTRATION_TYPES,
  PAYMENT_AUTHORIZATION_TYPES,
  SUBSCRIPTION_CANCELLATION_TYPES,
} from "./messages.js";

/**
 * @throws if `verifyingContract` is not an address
 */
export function toTypedDataDomain(domain: AuthorizationDomain): TypedDataDomain {
  return {
    name: domain.name,
    version: domain.version,
    chainId: domain.chainId,
    verifyingContract: getAddress(domain.verifyingContract),
  };
}

/**
 * Recover the address that signed a structured message.
 *
 * @throws on malformed signatures or message values
 */
export function recoverSigner(
  domain: TypedDataDomain,
  structured: StructuredMessage,
  signature: Hex,
): Promise<Address> {
  switch (structured.primaryType) {
    case "PaymentAuthorization": {
      const m = structured.message;
      return recoverTypedDataAddress({
        domain,
        types: PAYMENT_AUTHORIZATION_TYPES,
        primaryType: "PaymentAuthorization",
        message: {
          intentId: m.intentId,
          paymentType: m.paymentType,
          from: getAddress(m.from),
          recipients: m.recipients.map((r) => ({ to: getAddress(r.to), shareBps: r.shareBps })),
          amount: BigInt(m.amount),
          currency: m.currency,
          schedule: m.schedule,
          memo: m.memo,
        },
        signature,
      });
    }
    case "AliasRegistration":
      return recoverTypedDataAddress({
        domain,
        types: ALIAS_REGISTRATION_TYPES,
        primaryType: "AliasRegistration",
        message: { alias: structured.message.alias, address: getAddress(structured.message.address) },
        signature,
      });
    case "AliasDeletion":
      return recoverTypedDataAddress({
        domain,
        types: ALIAS_DELETION_TYPES,
        primaryType: "AliasDeletion",
        message: { alias: structured.message.alias, address: getAddress(structured.message.address) },
        signature,
      });
    case "SubscriptionCancellation":
      return recoverTypedDataAddress({
        domain,
        types: SUBSCRIPTION_CANCELLATION_TYPES,
        primaryType: "SubscriptionCancellation",
        message: { id: structured.message.id, address: getAddress(structured.message.address) },
        signature,
      });
  }
}

/**
 * Sign a structured message with a local account.
 * Wallet-side counterpart of `recoverSigner`.
 */
export function signStructuredMessage(
  account: LocalAccount,
  domain: AuthorizationDomain,
  structured: StructuredMessage,
): Promise<Hex> {
  const typedDomain = toTypedDataDomain(domain);
  switch (structured.primaryType) {
    case "PaymentAuthorization": {
      const m = structured.message;
      return account.signTypedData({
        domain: typedDomain,
        types: PAYMENT_AUTHORIZATION_TYPES,
        primaryType: "PaymentAuthorization",
        message: {
          intentId: m.intentId,
          paymentType: m.paymentType,
          from: getAddress(m.from),
          recipients: m.recipients.map((r) => ({ to: getAddress(r.to), shareBps: r.shareBps })),
          amount: BigInt(m.amount),
          currency: m.currency,
          schedule: m.schedule,
          memo: m.memo,
        },
      });
    }
    case "AliasRegistration":
      return account.signTypedData({
        domain: typedDomain,
        types: ALIAS_REGISTRATION_TYPES,
        primaryType: "AliasRegistration",
        message: { alias: structured.message.alias, address: getAddress(structured.message.address) },
      });
    case "AliasDeletion":
      return account.signTypedData({
        domain: typedDomain,
        types: ALIAS_DELETION_TYPES,
        primaryType: "AliasDeletion",
        message: { alias: structured.message.alias, address: getAddress(structured.message.address) },
      });
    case "SubscriptionCancellation":
      return account.signTypedData({
        domain: typedDomain,
        types: SUBSCRIPTION_CANCELLATION_TYPES,
        primaryType: "SubscriptionCancellation",
        message: { id: structured.message.id, address: getAddress(structured.message.address) },
      });
  }
}
