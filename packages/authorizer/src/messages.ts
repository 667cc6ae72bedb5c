/**
 * Structured Messages
 *
 * The EIP-712 messages a wallet signs to authorize a payment, to prove
 * ownership of an address when registering or deleting an alias, and to
 * cancel a subscription it pays.
 *
 * Messages are held in a JSON-friendly form (base-unit amounts as
 * decimal strings) so they can be canonicalized and hashed; conversion
 * to viem's typed-data values happens at verification time.
 */

import type { CanonicalAddress, CanonicalAlias, Currency, PaymentType } from "@aliaspay/types";

// =============================================================================
// EIP-712 type definitions
// =============================================================================

export const PAYMENT_AUTHORIZATION_TYPES = {
  PaymentAuthorization: [
    { name: "intentId", type: "string" },
    { name: "paymentType", type: "string" },
    { name: "from", type: "address" },
    { name: "recipients", type: "Recipient[]" },
    { name: "amount", type: "uint256" },
    { name: "currency", type: "string" },
    { name: "schedule", type: "string" },
    { name: "memo", type: "string" },
  ],
  Recipient: [
    { name: "to", type: "address" },
    { name: "shareBps", type: "uint16" },
  ],
} as const;

export const ALIAS_REGISTRATION_TYPES = {
  AliasRegistration: [
    { name: "alias", type: "string" },
    { name: "address", type: "address" },
  ],
} as const;

export const ALIAS_DELETION_TYPES = {
  AliasDeletion: [
    { name: "alias", type: "string" },
    { name: "address", type: "address" },
  ],
} as const;

export const SUBSCRIPTION_CANCELLATION_TYPES = {
  SubscriptionCancellation: [
    { name: "id", type: "string" },
    { name: "address", type: "address" },
  ],
} as const;

// =============================================================================
// Message shapes
// =============================================================================

/**
 * Signing domain. Taken from service configuration.
 */
export interface AuthorizationDomain {
  readonly name: string;
  readonly version: string;
  readonly chainId: number;
  readonly verifyingContract: string;
}

export interface RecipientBinding {
  readonly address: CanonicalAddress;
  /** Share in basis points (10000 = 100%) */
  readonly shareBps: number;
}

/**
 * Everything a payment signature commits to.
 */
export interface AuthorizationBinding {
  readonly intentId: string;
  readonly paymentType: PaymentType;
  readonly from: CanonicalAddress;
  readonly recipients: readonly RecipientBinding[];
  /** Total in the currency's base units */
  readonly amount: bigint;
  readonly currency: Currency;
  /** `frequency@startDate` for subscriptions */
  readonly schedule?: string | undefined;
  readonly memo?: string | undefined;
}

export interface PaymentAuthorizationMessage {
  readonly intentId: string;
  readonly paymentType: PaymentType;
  readonly from: CanonicalAddress;
  readonly recipients: readonly { readonly to: CanonicalAddress; readonly shareBps: number }[];
  /** Base units as a decimal integer string */
  readonly amount: string;
  readonly currency: Currency;
  readonly schedule: string;
  /** Empty when the payment has no memo */
  readonly memo: string;
}

export interface AliasOwnershipMessage {
  /** Canonical alias, without `@` */
  readonly alias: CanonicalAlias;
  readonly address: CanonicalAddress;
}

export interface SubscriptionCancellationMessage {
  /** Subscription id (`sub_…`) */
  readonly id: string;
  readonly address: CanonicalAddress;
}

export type StructuredMessage =
  | { readonly primaryType: "PaymentAuthorization"; readonly message: PaymentAuthorizationMessage }
  | { readonly primaryType: "AliasRegistration"; readonly message: AliasOwnershipMessage }
  | { readonly primaryType: "AliasDeletion"; readonly message: AliasOwnershipMessage }
  | {
      readonly primaryType: "SubscriptionCancellation";
      readonly message: SubscriptionCancellationMessage;
    };

// =============================================================================
// Builders
// =============================================================================

export function buildAuthorizationMessage(binding: AuthorizationBinding): StructuredMessage {
  return {
    primaryType: "PaymentAuthorization",
    message: {
      intentId: binding.intentId,
      paymentType: binding.paymentType,
      from: binding.from,
      recipients: binding.recipients.map((r) => ({ to: r.address, shareBps: r.shareBps })),
      amount: binding.amount.toString(),
      currency: binding.currency,
      schedule: binding.schedule ?? "",
      memo: binding.memo ?? "",
    },
  };
}

export function buildRegistrationMessage(
  alias: CanonicalAlias,
  address: CanonicalAddress,
): StructuredMessage {
  return { primaryType: "AliasRegistration", message: { alias, address } };
}

export function buildDeletionMessage(
  alias: CanonicalAlias,
  address: CanonicalAddress,
): StructuredMessage {
  return { primaryType: "AliasDeletion", message: { alias, address } };
}

export function buildCancellationMessage(
  id: string,
  address: CanonicalAddress,
): StructuredMessage {
  return { primaryType: "SubscriptionCancellation", message: { id, address } };
}
