/**
 * Runtime type guard tests for @aliaspay/types
 *
 * Guards decide whether a record read back from storage is trusted.
 */

import { describe, it, expect } from "vitest";
import {
  isAliasRecord,
  isFrequency,
  isPaymentType,
  isSubscription,
  isFailure,
  isTransaction,
} from "../src/guards.js";

const ADDR = "0x1111111111111111111111111111111111111111";
const ADDR2 = "0x2222222222222222222222222222222222222222";

const TX = {
  id: "tx_0123456789abcdef",
  transactionHash: `0x${"ab".repeat(32)}`,
  intentId: "i1",
  fromAddress: ADDR,
  toAddress: ADDR2,
  amount: "50",
  currency: "USDC",
  paymentType: "single",
  status: "confirmed",
  timestamp: "2026-01-15T10:00:00.000Z",
  sequence: 1,
};

describe("isPaymentType / isFrequency", () => {
  it("accepts known values only", () => {
    expect(isPaymentType("split")).toBe(true);
    expect(isPaymentType("refund")).toBe(false);
    expect(isFrequency("weekly")).toBe(true);
    expect(isFrequency("hourly")).toBe(false);
  });
});

describe("isAliasRecord", () => {
  it("accepts a canonical record", () => {
    expect(
      isAliasRecord({
        alias: "alice",
        address: ADDR,
        registeredAt: "2026-01-15T10:00:00.000Z",
        lastUsedAt: "2026-01-15T10:00:00.000Z",
      }),
    ).toBe(true);
  });

  it("rejects a non-canonical alias or address", () => {
    const base = {
      registeredAt: "2026-01-15T10:00:00.000Z",
      lastUsedAt: "2026-01-15T10:00:00.000Z",
    };
    expect(isAliasRecord({ ...base, alias: "@alice", address: ADDR })).toBe(false);
    expect(isAliasRecord({ ...base, alias: "alice", address: ADDR.toUpperCase() })).toBe(false);
  });

  it("rejects null and arrays", () => {
    expect(isAliasRecord(null)).toBe(false);
    expect(isAliasRecord([])).toBe(false);
  });
});

describe("isTransaction", () => {
  it("accepts a single transfer", () => {
    expect(isTransaction(TX)).toBe(true);
  });

  it("accepts a split with recipients", () => {
    expect(
      isTransaction({
        ...TX,
        toAddress: "multiple",
        paymentType: "split",
        recipients: [{ address: ADDR2, alias: "bob", shareBps: 10000, amount: "50" }],
      }),
    ).toBe(true);
  });

  it("rejects a bad payee", () => {
    expect(
      isTransaction({
        ...TX,
        recipients: [{ address: ADDR2, alias: "@bob", shareBps: 10000, amount: "50" }],
      }),
    ).toBe(false);
  });

  it("rejects a numeric amount", () => {
    expect(isTransaction({ ...TX, amount: 50 })).toBe(false);
  });
});

describe("isSubscription", () => {
  const SUB = {
    id: "sub_1",
    intentId: "i2",
    fromAddress: ADDR,
    toAddress: ADDR2,
    amount: "9.99",
    currency: "USDC",
    frequency: "monthly",
    status: "active",
    startDate: "2026-02-01",
    nextPayment: "2026-02-01",
    createdAt: "2026-01-15T10:00:00.000Z",
  };

  it("accepts an active subscription", () => {
    expect(isSubscription(SUB)).toBe(true);
  });

  it("rejects an unknown status", () => {
    expect(isSubscription({ ...SUB, status: "paused" })).toBe(false);
  });

  it("accepts a rail subscription id and rejects a non-string one", () => {
    expect(isSubscription({ ...SUB, railSubscriptionId: "sim_sub_1" })).toBe(true);
    expect(isSubscription({ ...SUB, railSubscriptionId: 7 })).toBe(false);
  });
});

describe("isFailure", () => {
  it("accepts a known category and code", () => {
    expect(
      isFailure({ category: "rail", code: "RAIL_EXECUTION_FAILED", message: "down" }),
    ).toBe(true);
  });

  it("rejects an unknown code", () => {
    expect(isFailure({ category: "rail", code: "RAIL_ON_FIRE", message: "down" })).toBe(false);
  });
});
