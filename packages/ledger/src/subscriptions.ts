/**
 * @aliaspay/ledger — SubscriptionBook.
 *
 * Subscriptions created when a subscription intent settles. Recurring
 * execution is not scheduled here; the book only records the agreement
 * and lets its owner cancel it.
 */

import { createHash } from "node:crypto";
import type { KeyValueStore } from "@aliaspay/store";
import type { CanonicalAddress, Subscription } from "@aliaspay/types";

export type SubscriptionDraft = Pick<
  Subscription,
  | "intentId"
  | "fromAddress"
  | "toAddress"
  | "amount"
  | "currency"
  | "frequency"
  | "startDate"
  | "railSubscriptionId"
>;

export type CancelOutcome = "cancelled" | "not_found" | "not_owner";

export interface SubscriptionBookOptions {
  readonly store: KeyValueStore<Subscription>;
  readonly now?: (() => Date) | undefined;
}

const SUB_PREFIX = "sub:";

export class SubscriptionBook {
  private readonly _store: KeyValueStore<Subscription>;
  private readonly _now: () => Date;

  constructor(options: SubscriptionBookOptions) {
    this._store = options.store;
    this._now = options.now ?? (() => new Date());
  }

  /**
   * Record an active subscription. The id is derived from the intent,
   * so one intent never yields two subscriptions.
   */
  async create(draft: SubscriptionDraft): Promise<Subscription> {
    const createdAt = this._now().toISOString();
    const id = `sub_${createHash("sha256")
      .update(`${draft.intentId}${draft.fromAddress}${draft.toAddress}`)
      .digest("hex")
      .slice(0, 16)}`;

    const existing = await this._store.get(`${SUB_PREFIX}${id}`);
    if (existing !== undefined) {
      return existing.value;
    }

    const subscription: Subscription = {
      ...draft,
      id,
      status: "active",
      nextPayment: draft.startDate,
      createdAt,
    };
    await this._store.put(`${SUB_PREFIX}${id}`, subscription);
    return subscription;
  }

  async get(id: string): Promise<Subscription | undefined> {
    return (await this._store.get(`${SUB_PREFIX}${id}`))?.value;
  }

  /**
   * Active subscriptions paid by `address`, oldest first.
   */
  async listActive(address: CanonicalAddress): Promise<Subscription[]> {
    return (await this._store.list(SUB_PREFIX))
      .map((e) => e.value)
      .filter((s) => s.status === "active" && s.fromAddress === address);
  }

  async cancel(id: string, requestingAddress: CanonicalAddress): Promise<CancelOutcome> {
    const entry = await this._store.get(`${SUB_PREFIX}${id}`);
    if (entry === undefined || entry.value.status !== "active") {
      return "not_found";
    }
    if (entry.value.fromAddress !== requestingAddress) {
      return "not_owner";
    }

    const result = await this._store.commit({
      checks: [{ key: entry.key, version: entry.version }],
      mutations: [
        {
          kind: "set",
          key: entry.key,
          value: { ...entry.value, status: "cancelled", cancelledAt: this._now().toISOString() },
        },
      ],
    });
    return result.committed ? "cancelled" : "not_found";
  }

  async count(): Promise<number> {
    return (await this._store.list(SUB_PREFIX)).length;
  }
}
