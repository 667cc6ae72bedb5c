/**
 * CircleRail — settlement through the Circle wallets API.
 *
 * Each payout is one POST to `/user-controlled-wallets/transactions/transfer`
 * with bearer auth and an idempotency key derived from the intentId, so a
 * retried submission is deduplicated by Circle.
 *
 * - transfer: one payout
 * - split: one payout per recipient, in order; stops at the first failure
 * - subscription: settles the first installment and reports `active`
 *
 * HTTP failures are returned as `{ok: false}` with the response text.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import type { RailInstruction, RailResult, SettlementRail } from "../types.js";

export interface CircleRailConfig {
  readonly apiKey: string;
  /** e.g. "https://api.circle.com/v1/w3s" */
  readonly baseUrl: string;
  readonly entityId: string;
  /** Source wallet the transfers are drawn from */
  readonly walletId: string;
  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;
}

const TransferResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    txHash: z.string().optional(),
    status: z.string().optional(),
  }),
});

type Payout = { readonly to: string; readonly amount: string };

/**
 * Deterministic UUID-shaped key for payout `index` of `intentId`.
 */
export function idempotencyKey(intentId: string, index: number): string {
  const hex = createHash("sha256").update(`${intentId}:${index}`).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `4${hex.slice(13, 16)}`,
    `8${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

export class CircleRail implements SettlementRail {
  readonly name = "circle";

  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly entityId: string;
  private readonly walletId: string;
  private readonly fetchFn: typeof fetch;

  constructor(config: CircleRailConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.entityId = config.entityId;
    this.walletId = config.walletId;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async initiateTransfer(
    instruction: RailInstruction,
    options: { readonly signal: AbortSignal },
  ): Promise<RailResult> {
    const payouts: readonly Payout[] =
      instruction.kind === "split"
        ? instruction.payouts
        : [{ to: instruction.to, amount: instruction.amount }];

    const hashes: string[] = [];
    let lastStatus = "pending";
    for (const [index, payout] of payouts.entries()) {
      const result = await this.transfer(instruction, payout, index, options.signal);
      if (!result.ok) {
        const settled = hashes.length > 0 ? ` (settled before failure: ${hashes.join(", ")})` : "";
        return { ok: false, error: `${result.error}${settled}` };
      }
      hashes.push(result.transactionHash);
      lastStatus = result.status;
    }

    const [first] = hashes;
    if (first === undefined) {
      return { ok: false, error: "No payouts to submit" };
    }
    return {
      ok: true,
      transactionHash: first,
      status: instruction.kind === "subscription" ? "active" : lastStatus,
      reference: hashes.length > 1 ? hashes.join(",") : undefined,
    };
  }

  private async transfer(
    instruction: RailInstruction,
    payout: Payout,
    index: number,
    signal: AbortSignal,
  ): Promise<RailResult> {
    const response = await this.fetchFn(`${this.baseUrl}/user-controlled-wallets/transactions/transfer`, {
      method: "POST",
      headers: {
        "Authorization": `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
        "Accept": "application/json",
      },
      body: JSON.stringify({
        idempotencyKey: idempotencyKey(instruction.intentId, index),
        entityId: this.entityId,
        walletId: this.walletId,
        destinationAddress: payout.to,
        token: instruction.currency,
        amount: payout.amount,
        refId: instruction.intentId,
        fee: { type: "GAS" },
      }),
      signal,
    });

    const text = await response.text();
    if (!response.ok) {
      return { ok: false, error: `Circle API error ${response.status}: ${text}` };
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return { ok: false, error: `Circle API returned a non-JSON body: ${text}` };
    }
    const parsed = TransferResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, error: `Circle API returned an unexpected body: ${text}` };
    }

    const { id, txHash, status } = parsed.data.data;
    return {
      ok: true,
      transactionHash: txHash ?? id,
      status: status ?? "pending",
      reference: id,
    };
  }
}
