/**
 * Financial Types
 *
 * Transactions and subscriptions as recorded after settlement.
 *
 * Rules:
 * - All amounts are decimal strings
 * - Currency is always explicit
 * - Transactions are append-only by contract
 */

import type { CanonicalAddress, CanonicalAlias } from "./codec.js";
import type { Frequency, PaymentType } from "./intent.js";

/**
 * Currency symbol (e.g. "USDC").
 */
export type Currency = string;

/**
 * A supported currency and its precision.
 */
export interface CurrencySpec {
  readonly symbol: Currency;
  /** USDC = 6, ETH = 18 */
  readonly decimals: number;
}

/**
 * Placeholder recipient of a transaction that pays several addresses.
 */
export const MULTIPLE_RECIPIENTS = "multiple";

/**
 * One payee of a split transaction.
 */
export interface TransactionPayee {
  readonly address: CanonicalAddress;
  readonly alias: CanonicalAlias;
  /** Share in basis points (10000 = 100%) */
  readonly shareBps: number;
  readonly amount: string;
}

/**
 * An executed transfer as recorded in the ledger. Immutable.
 */
export interface Transaction {
  readonly id: string;
  readonly transactionHash: string;
  readonly intentId: string;
  readonly fromAddress: CanonicalAddress;
  readonly toAddress: CanonicalAddress | typeof MULTIPLE_RECIPIENTS;
  /** Present for splits */
  readonly recipients?: readonly TransactionPayee[] | undefined;
  readonly amount: string;
  readonly currency: Currency;
  readonly paymentType: PaymentType;
  /** Status as reported by the settlement rail */
  readonly status: string;
  readonly memo?: string | undefined;
  readonly explorerUrl?: string | undefined;
  /** ISO 8601 */
  readonly timestamp: string;
  /** Append position within the ledger (1-based) */
  readonly sequence: number;
}

/**
 * A transaction before the ledger assigns its id and position.
 */
export type TransactionDraft = Omit<Transaction, "id" | "sequence">;

export type SubscriptionStatus = "active" | "cancelled";

export interface Subscription {
  readonly id: string;
  readonly intentId: string;
  readonly fromAddress: CanonicalAddress;
  readonly toAddress: CanonicalAddress;
  readonly amount: string;
  readonly currency: Currency;
  readonly frequency: Frequency;
  readonly status: SubscriptionStatus;
  readonly startDate: string;
  readonly nextPayment: string;
  readonly createdAt: string;
  readonly cancelledAt?: string | undefined;
  /** Identifier the settlement rail gave the subscription, if any */
  readonly railSubscriptionId?: string | undefined;
}
