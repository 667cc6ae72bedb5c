/**
 * @aliaspay/dispatcher — Core types.
 *
 * A dispatch moves one payment intent through
 * received → recipients_resolved → authorized → executed,
 * or stops early as rejected without ever reaching the rail.
 */

import type { StructuredMessage } from "@aliaspay/authorizer";
import type {
  CanonicalAddress,
  CanonicalAlias,
  Currency,
  Failure,
  Frequency,
  PaymentIntent,
  PaymentType,
  Subscription,
  Transaction,
} from "@aliaspay/types";

// =============================================================================
// Requests
// =============================================================================

export interface DispatchRequest {
  /** Caller-supplied nonce; one signature authorizes one intentId once */
  readonly intentId: string;
  readonly intent: PaymentIntent;
  /** Address the request was authenticated as (X-Wallet-Address) */
  readonly authenticatedAddress: string;
  /** Address claimed in the request body */
  readonly claimedAddress: string;
  readonly signature: string;
}

// =============================================================================
// Resolution
// =============================================================================

export interface ResolvedRecipient {
  readonly alias: CanonicalAlias;
  readonly address: CanonicalAddress;
  /** Basis points (10000 = 100%) */
  readonly shareBps: number;
  /** Payout as a decimal string */
  readonly amount: string;
}

/**
 * An intent whose aliases have all been resolved to addresses.
 */
export interface ResolvedPayment {
  readonly paymentType: PaymentType;
  readonly amount: string;
  readonly units: bigint;
  readonly currency: Currency;
  readonly recipients: readonly ResolvedRecipient[];
  readonly memo?: string | undefined;
  /** Subscriptions only */
  readonly frequency?: Frequency | undefined;
  readonly startDate?: string | undefined;
}

// =============================================================================
// Rail instructions
// =============================================================================

export interface TransferInstruction {
  readonly kind: "transfer";
  readonly intentId: string;
  readonly from: CanonicalAddress;
  readonly to: CanonicalAddress;
  readonly amount: string;
  readonly currency: Currency;
  readonly memo?: string | undefined;
}

export interface SubscriptionInstruction {
  readonly kind: "subscription";
  readonly intentId: string;
  readonly from: CanonicalAddress;
  readonly to: CanonicalAddress;
  readonly amount: string;
  readonly currency: Currency;
  readonly frequency: Frequency;
  readonly startDate: string;
  readonly memo?: string | undefined;
}

export interface SplitPayout {
  readonly to: CanonicalAddress;
  readonly amount: string;
}

export interface SplitInstruction {
  readonly kind: "split";
  readonly intentId: string;
  readonly from: CanonicalAddress;
  readonly total: string;
  readonly currency: Currency;
  readonly payouts: readonly SplitPayout[];
  readonly memo?: string | undefined;
}

export type RailInstruction = TransferInstruction | SubscriptionInstruction | SplitInstruction;

export type RailResult =
  | {
      readonly ok: true;
      readonly transactionHash: string;
      readonly status: string;
      /** Rail-side identifier, if different from the hash */
      readonly reference?: string | undefined;
      /** Rail-side subscription identifier, for subscription instructions */
      readonly subscriptionId?: string | undefined;
    }
  | { readonly ok: false; readonly error: string };

/**
 * Executes funds movement. Implementations must honor `signal`.
 */
export interface SettlementRail {
  readonly name: string;
  initiateTransfer(
    instruction: RailInstruction,
    options: { readonly signal: AbortSignal },
  ): Promise<RailResult>;
}

// =============================================================================
// Outcomes
// =============================================================================

export type DispatchState =
  | "received"
  | "recipients_resolved"
  | "authorized"
  | "executed"
  | "rejected"
  | "replayed";

/**
 * Terminal outcome of an intent that reached the rail.
 */
export type ExecutedOutcome =
  | {
      readonly status: "success";
      readonly paymentType: PaymentType;
      readonly transaction: Transaction;
      readonly subscription?: Subscription | undefined;
    }
  | {
      readonly status: "failed";
      readonly paymentType: PaymentType;
      readonly failure: Failure;
    };

export interface DispatchResult {
  readonly outcome: ExecutedOutcome;
  /** True when the outcome was recorded by an earlier identical request */
  readonly replayed: boolean;
}

/**
 * Per-intent record used for idempotency and non-replay.
 */
export interface IntentRecord {
  readonly intentId: string;
  /** Digest of the authorization message */
  readonly digest: string;
  /** The authorization message that was signed; retries are verified against it */
  readonly message: StructuredMessage;
  readonly state: "executing" | "executed";
  readonly outcome?: ExecutedOutcome | undefined;
  readonly updatedAt: string;
}

// =============================================================================
// Logging
// =============================================================================

export interface DispatchEvent {
  readonly intentId: string;
  readonly state: DispatchState;
  readonly paymentType?: PaymentType | undefined;
  readonly code?: string | undefined;
  readonly message?: string | undefined;
}

export type DispatchLogFn = (event: DispatchEvent) => void;
