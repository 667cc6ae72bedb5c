/**
 * Payment Intent Types
 *
 * A payment intent is a structured description of a desired payment,
 * produced by an external parser (or typed by hand). Intents are closed
 * over three variants; the dispatcher matches on `type` exhaustively, so
 * adding a fourth variant is a compile-time change.
 *
 * Intents are immutable inputs. The core never edits one; it only
 * derives resolved addresses from it.
 */

/**
 * Discriminant of the three payment shapes.
 */
export type PaymentType = "single" | "subscription" | "split";

export const PAYMENT_TYPES: readonly PaymentType[] = ["single", "subscription", "split"];

/**
 * Recurrence of a subscription.
 */
export type Frequency = "daily" | "weekly" | "monthly" | "yearly";

export const FREQUENCIES: readonly Frequency[] = ["daily", "weekly", "monthly", "yearly"];

/**
 * Structured parse error reported by the intent parser.
 */
export interface IntentParseError {
  readonly code: string;
  readonly message: string;
}

interface IntentBase {
  /** Decimal string in the intent's currency (e.g. "50", "9.99") */
  readonly amount: string;

  /** Currency symbol (e.g. "USDC") */
  readonly currency: string;

  readonly memo?: string | undefined;

  /** Parser confidence in [0, 1] */
  readonly confidence: number;

  /** Present when the parser could not produce a usable intent */
  readonly error?: IntentParseError | undefined;
}

export interface SingleIntent extends IntentBase {
  readonly type: "single";
  /** Recipient alias as written (`@alice`) */
  readonly recipientAlias: string;
}

export interface SubscriptionIntent extends IntentBase {
  readonly type: "subscription";
  readonly recipientAlias: string;
  readonly frequency: Frequency;
  /** ISO 8601 date or date-time of the first installment; today when absent */
  readonly startDate?: string | undefined;
}

export interface SplitRecipient {
  readonly alias: string;
  /** Percentage of the total, e.g. 50 or 33.33 */
  readonly share: number;
}

export interface SplitIntent extends IntentBase {
  readonly type: "split";
  readonly recipients: readonly SplitRecipient[];
}

export type PaymentIntent = SingleIntent | SubscriptionIntent | SplitIntent;
