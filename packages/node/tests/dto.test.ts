/**
 * Tests for the wire DTOs and their conversions.
 */

import { describe, it, expect } from "vitest";
import { toCanonicalAddress, toCanonicalAlias } from "@aliaspay/types";
import type { Transaction } from "@aliaspay/types";
import { validateSplit } from "@aliaspay/dispatcher";
import {
  ExecutePaymentSchema,
  toPaymentIntent,
  toWireTransaction,
} from "../src/types/dto.js";
import type { WirePaymentIntent } from "../src/types/dto.js";

describe("toPaymentIntent", () => {
  it("converts a single payment and keeps numeric amounts as decimals", () => {
    const wire: WirePaymentIntent = {
      payment_type: "single",
      intent: { amount: 9.99, currency: "eurc", recipient: { alias: "@bob" }, memo: null },
      confidence: 0.7,
    };

    expect(toPaymentIntent(wire, "USDC")).toEqual({
      ok: true,
      value: {
        type: "single",
        amount: "9.99",
        currency: "eurc",
        memo: undefined,
        confidence: 0.7,
        error: undefined,
        recipientAlias: "@bob",
      },
    });
  });

  it("falls back to the default currency", () => {
    const result = toPaymentIntent(
      { payment_type: "single", intent: { amount: "5", recipient: { alias: "bob" } }, confidence: 1 },
      "USDC",
    );

    expect(result.ok ? result.value.currency : undefined).toBe("USDC");
  });

  it("converts a subscription with its schedule", () => {
    const result = toPaymentIntent(
      {
        payment_type: "subscription",
        intent: {
          amount: "10",
          recipient: { alias: "@alice" },
          subscription: { frequency: "weekly", start_date: "2026-04-01" },
        },
        confidence: 0.9,
      },
      "USDC",
    );

    expect(result.ok ? result.value : undefined).toMatchObject({
      type: "subscription",
      recipientAlias: "@alice",
      frequency: "weekly",
      startDate: "2026-04-01",
    });
  });

  it("leaves the start date unset when the schedule has none", () => {
    const result = toPaymentIntent(
      {
        payment_type: "subscription",
        intent: { amount: "10", recipient: { alias: "@alice" }, subscription: { frequency: "daily" } },
        confidence: 0.9,
      },
      "USDC",
    );

    expect(result.ok && result.value.type === "subscription" ? result.value.startDate : "unexpected").toBeUndefined();
  });

  it("requires a schedule for subscriptions", () => {
    const result = toPaymentIntent(
      {
        payment_type: "subscription",
        intent: { amount: "10", recipient: { alias: "@alice" } },
        confidence: 0.9,
      },
      "USDC",
    );

    expect(result.ok ? undefined : result.error).toMatchObject({
      code: "INVALID_INTENT",
      message: "Intent is missing a subscription schedule",
    });
  });

  it("requires recipients for splits", () => {
    const result = toPaymentIntent(
      { payment_type: "split", intent: { amount: "10" }, confidence: 0.9 },
      "USDC",
    );

    expect(result.ok ? undefined : result.error.message).toBe("Intent is missing recipients");
  });

  it("splits evenly when no share is given", () => {
    const result = toPaymentIntent(
      {
        payment_type: "split",
        intent: { amount: "10", recipients: [{ alias: "@a_1" }, { alias: "@b_2" }, { alias: "@c_3" }, { alias: "@d_4" }] },
        confidence: 0.9,
      },
      "USDC",
    );

    expect(result.ok && result.value.type === "split" ? result.value.recipients : undefined).toEqual([
      { alias: "@a_1", share: 25 },
      { alias: "@b_2", share: 25 },
      { alias: "@c_3", share: 25 },
      { alias: "@d_4", share: 25 },
    ]);
  });

  it("splits evenly into whole basis points summing to 100%", () => {
    const cases: Array<[number, number[]]> = [
      [3, [33.34, 33.33, 33.33]],
      [6, [16.67, 16.67, 16.67, 16.67, 16.66, 16.66]],
      [7, [14.29, 14.29, 14.29, 14.29, 14.28, 14.28, 14.28]],
      [12, [8.34, 8.34, 8.34, 8.34, 8.33, 8.33, 8.33, 8.33, 8.33, 8.33, 8.33, 8.33]],
    ];

    for (const [n, shares] of cases) {
      const aliases = Array.from({ length: n }, (_, i) => ({ alias: `@payee_${i + 1}` }));
      const result = toPaymentIntent(
        { payment_type: "split", intent: { amount: "10", recipients: aliases }, confidence: 0.9 },
        "USDC",
      );
      if (!result.ok || result.value.type !== "split") throw new Error(`expected a split for ${n}`);
      expect(result.value.recipients.map((r) => r.share)).toEqual(shares);

      const targets = validateSplit(result.value.recipients);
      expect(targets.ok).toBe(true);
      expect(targets.ok ? targets.value.reduce((sum, t) => sum + t.shareBps, 0) : 0).toBe(10000);
    }
  });

  it("gives a share of 0 to recipients missing one when others have shares", () => {
    const result = toPaymentIntent(
      {
        payment_type: "split",
        intent: { amount: "10", recipients: [{ alias: "@alice", share: 100 }, { alias: "@bob" }] },
        confidence: 0.9,
      },
      "USDC",
    );

    expect(result.ok && result.value.type === "split" ? result.value.recipients : undefined).toEqual([
      { alias: "@alice", share: 100 },
      { alias: "@bob", share: 0 },
    ]);
  });

  it("passes a parser error through without requiring fields", () => {
    const result = toPaymentIntent(
      {
        payment_type: "split",
        intent: {},
        confidence: 0.1,
        error: { code: "AMBIGUOUS", message: "Who is paid?" },
      },
      "USDC",
    );

    expect(result).toEqual({
      ok: true,
      value: {
        type: "split",
        amount: "",
        currency: "USDC",
        memo: undefined,
        confidence: 0.1,
        error: { code: "AMBIGUOUS", message: "Who is paid?" },
        recipients: [],
      },
    });
  });
});

describe("ExecutePaymentSchema", () => {
  it("rejects a confidence outside 0..1", () => {
    const parsed = ExecutePaymentSchema.safeParse({
      intent_id: "i-1",
      payment_intent: { payment_type: "single", intent: {}, confidence: 1.5 },
      user_signature: "0x00",
      user_address: "0x00",
    });

    expect(parsed.success).toBe(false);
    expect(parsed.success ? [] : parsed.error.issues.map((i) => i.path.join("."))).toEqual([
      "payment_intent.confidence",
    ]);
  });

  it("rejects an unknown payment type", () => {
    const parsed = ExecutePaymentSchema.safeParse({
      intent_id: "i-1",
      payment_intent: { payment_type: "refund", intent: {}, confidence: 0.5 },
      user_signature: "0x00",
      user_address: "0x00",
    });

    expect(parsed.success).toBe(false);
  });
});

describe("toWireTransaction", () => {
  it("renders split recipients with percentage shares", () => {
    const tx: Transaction = {
      id: "tx_1",
      transactionHash: "0x01",
      intentId: "i-1",
      fromAddress: toCanonicalAddress("0x1111111111111111111111111111111111111111"),
      toAddress: "multiple",
      recipients: [
        {
          alias: toCanonicalAlias("alice"),
          address: toCanonicalAddress("0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa"),
          shareBps: 3333,
          amount: "3.333",
        },
      ],
      amount: "10",
      currency: "USDC",
      paymentType: "split",
      status: "confirmed",
      memo: "dinner",
      timestamp: "2026-03-01T12:00:00.000Z",
      sequence: 7,
    };

    expect(toWireTransaction(tx)).toEqual({
      id: "tx_1",
      transaction_hash: "0x01",
      intent_id: "i-1",
      from_address: "0x1111111111111111111111111111111111111111",
      to_address: "multiple",
      recipients: [
        {
          alias: "@alice",
          address: "0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa",
          share: 33.33,
          amount: "3.333",
        },
      ],
      amount: "10",
      currency: "USDC",
      payment_type: "split",
      status: "confirmed",
      memo: "dinner",
      explorer_url: null,
      timestamp: "2026-03-01T12:00:00.000Z",
      sequence: 7,
    });
  });
});
