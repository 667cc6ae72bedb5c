/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * The wire format is snake_case. Each request DTO has a Zod schema and a
 * derived TypeScript type; response mappers turn domain records into
 * their wire shape.
 */

import { z } from "zod";
import {
  amountToDecimal,
  displayAlias,
  fail,
  ok,
  validationFailure,
} from "@aliaspay/types";
import { FULL_SHARE_BPS } from "@aliaspay/dispatcher";
import type {
  AliasRecord,
  Frequency,
  PaymentIntent,
  Result,
  SplitRecipient,
  Subscription,
  Transaction,
} from "@aliaspay/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const WireAmountSchema = z.union([z.number(), z.string().min(1)]);

export const FrequencySchema = z.enum(["daily", "weekly", "monthly", "yearly"]);

export const WireIntentErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});

/**
 * Payment intent as produced by the intent parser.
 */
export const WirePaymentIntentSchema = z.object({
  payment_type: z.enum(["single", "subscription", "split"]),
  intent: z.object({
    amount: WireAmountSchema.optional(),
    currency: z.string().optional(),
    recipient: z.object({ alias: z.string() }).optional(),
    memo: z.string().nullish(),
    subscription: z
      .object({
        frequency: FrequencySchema,
        start_date: z.string().optional(),
      })
      .optional(),
    recipients: z
      .array(
        z.object({
          alias: z.string(),
          share: z.number().optional(),
        }),
      )
      .optional(),
  }),
  confidence: z.number().min(0).max(1),
  requires_confirmation: z.boolean().optional(),
  confirmation_text: z.string().nullish(),
  error: WireIntentErrorSchema.nullish(),
});

export type WirePaymentIntent = z.infer<typeof WirePaymentIntentSchema>;

// =============================================================================
// Alias DTOs
// =============================================================================

export const RegisterAliasSchema = z.object({
  alias: z.string().min(1).max(64),
  address: z.string().min(1).max(64),
  signature: z.string().min(1),
});

export type RegisterAliasDto = z.infer<typeof RegisterAliasSchema>;

export const SearchAliasQuerySchema = z.object({
  query: z.string().default(""),
  limit: z.coerce.number().int().default(10),
});

// =============================================================================
// Payment DTOs
// =============================================================================

export const ProcessCommandSchema = z.object({
  text: z.string().min(1).max(500),
  user_id: z.string().optional(),
  timezone: z.string().default("UTC"),
});

export type ProcessCommandDto = z.infer<typeof ProcessCommandSchema>;

export const ExecutePaymentSchema = z.object({
  intent_id: z.string().min(1).max(128),
  payment_intent: WirePaymentIntentSchema,
  user_signature: z.string().min(1),
  user_address: z.string().min(1),
});

export type ExecutePaymentDto = z.infer<typeof ExecutePaymentSchema>;

export const PaymentMessageSchema = z.object({
  intent_id: z.string().min(1).max(128),
  payment_intent: WirePaymentIntentSchema,
  user_address: z.string().min(1),
});

export type PaymentMessageDto = z.infer<typeof PaymentMessageSchema>;

// =============================================================================
// History DTOs
// =============================================================================

/**
 * Bounds are applied by the ledger, which clamps rather than rejects.
 */
export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().default(50),
  offset: z.coerce.number().int().default(0),
});

// =============================================================================
// Wire → domain
// =============================================================================

function missing(field: string): Result<never> {
  return fail(validationFailure("INVALID_INTENT", `Intent is missing ${field}`));
}

/**
 * Recipients without any share split the amount evenly, in whole basis
 * points with the leftover points going one each to the first
 * recipients. A partial set of shares is passed through and rejected by
 * split validation.
 */
function splitRecipients(
  recipients: readonly { alias: string; share?: number | undefined }[],
): SplitRecipient[] {
  if (!recipients.every((r) => r.share === undefined)) {
    return recipients.map((r) => ({ alias: r.alias, share: r.share ?? 0 }));
  }
  const n = recipients.length;
  const base = Math.floor(FULL_SHARE_BPS / n);
  const leftover = FULL_SHARE_BPS - base * n;
  return recipients.map((r, i) => ({
    alias: r.alias,
    share: (base + (i < leftover ? 1 : 0)) / 100,
  }));
}

/**
 * Convert a parser intent into the domain union.
 *
 * An intent carrying a parser error is converted as-is so that the
 * dispatcher can reject it with the parser's message. Otherwise a missing
 * structural field is an INVALID_INTENT; a missing currency falls back
 * to `defaultCurrency`.
 */
export function toPaymentIntent(
  wire: WirePaymentIntent,
  defaultCurrency: string,
): Result<PaymentIntent> {
  const body = wire.intent;
  const error = wire.error ?? undefined;
  const base = {
    amount: body.amount !== undefined ? amountToDecimal(body.amount) : "",
    currency: body.currency ?? defaultCurrency,
    memo: body.memo ?? undefined,
    confidence: wire.confidence,
    error,
  };

  if (error === undefined && body.amount === undefined) {
    return missing("an amount");
  }

  switch (wire.payment_type) {
    case "single": {
      const alias = body.recipient?.alias;
      if (alias === undefined && error === undefined) return missing("a recipient");
      return ok({ ...base, type: "single", recipientAlias: alias ?? "" });
    }
    case "subscription": {
      const alias = body.recipient?.alias;
      const schedule = body.subscription;
      if (error === undefined) {
        if (alias === undefined) return missing("a recipient");
        if (schedule === undefined) return missing("a subscription schedule");
      }
      const frequency: Frequency = schedule?.frequency ?? "monthly";
      return ok({
        ...base,
        type: "subscription",
        recipientAlias: alias ?? "",
        frequency,
        startDate: schedule?.start_date,
      });
    }
    case "split": {
      const recipients = body.recipients;
      if (recipients === undefined && error === undefined) return missing("recipients");
      return ok({ ...base, type: "split", recipients: splitRecipients(recipients ?? []) });
    }
  }
}

// =============================================================================
// Domain → wire
// =============================================================================

export interface WireAliasRecord {
  readonly alias: string;
  readonly address: string;
  readonly registered_at: string;
  readonly last_used_at: string;
}

export function toWireAliasRecord(record: AliasRecord): WireAliasRecord {
  return {
    alias: displayAlias(record.alias),
    address: record.address,
    registered_at: record.registeredAt,
    last_used_at: record.lastUsedAt,
  };
}

export interface WirePayee {
  readonly alias: string;
  readonly address: string;
  /** Percentage of the total */
  readonly share: number;
  readonly amount: string;
}

export interface WireTransaction {
  readonly id: string;
  readonly transaction_hash: string;
  readonly intent_id: string;
  readonly from_address: string;
  readonly to_address: string;
  readonly recipients?: readonly WirePayee[];
  readonly amount: string;
  readonly currency: string;
  readonly payment_type: string;
  readonly status: string;
  readonly memo: string | null;
  readonly explorer_url: string | null;
  readonly timestamp: string;
  readonly sequence: number;
}

export function toWireTransaction(tx: Transaction): WireTransaction {
  const wire: WireTransaction = {
    id: tx.id,
    transaction_hash: tx.transactionHash,
    intent_id: tx.intentId,
    from_address: tx.fromAddress,
    to_address: tx.toAddress,
    amount: tx.amount,
    currency: tx.currency,
    payment_type: tx.paymentType,
    status: tx.status,
    memo: tx.memo ?? null,
    explorer_url: tx.explorerUrl ?? null,
    timestamp: tx.timestamp,
    sequence: tx.sequence,
  };
  if (tx.recipients === undefined) {
    return wire;
  }
  return {
    ...wire,
    recipients: tx.recipients.map((r) => ({
      alias: displayAlias(r.alias),
      address: r.address,
      share: r.shareBps / 100,
      amount: r.amount,
    })),
  };
}

export interface WireSubscription {
  readonly id: string;
  readonly intent_id: string;
  readonly from_address: string;
  readonly to_address: string;
  readonly amount: string;
  readonly currency: string;
  readonly frequency: string;
  readonly status: string;
  readonly start_date: string;
  readonly next_payment: string;
  readonly created_at: string;
  readonly cancelled_at: string | null;
  readonly rail_subscription_id: string | null;
}

export function toWireSubscription(sub: Subscription): WireSubscription {
  return {
    id: sub.id,
    intent_id: sub.intentId,
    from_address: sub.fromAddress,
    to_address: sub.toAddress,
    amount: sub.amount,
    currency: sub.currency,
    frequency: sub.frequency,
    status: sub.status,
    start_date: sub.startDate,
    next_payment: sub.nextPayment,
    created_at: sub.createdAt,
    cancelled_at: sub.cancelledAt ?? null,
    rail_subscription_id: sub.railSubscriptionId ?? null,
  };
}
