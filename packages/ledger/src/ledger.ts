/**
 * @aliaspay/ledger — TransactionLedger.
 *
 * Append-only record of executed transfers. Once a transaction is written
 * it is permanent; there is no update and no delete.
 *
 * API surface:
 * - append() — Record a transaction (duplicate hashes rejected)
 * - getByHash() / getById() — Point lookups
 * - history() — Paginated participant view, newest first
 * - count() — Total number of transactions
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { KeyedLock } from "@aliaspay/store";
import type { KeyValueStore } from "@aliaspay/store";
import { conflictFailure, fail, internalFailure, ok } from "@aliaspay/types";
import type {
  CanonicalAddress,
  Result,
  Transaction,
  TransactionDraft,
} from "@aliaspay/types";

export const DEFAULT_MAX_PAGE_SIZE = 100;

export interface TransactionLedgerOptions {
  readonly store: KeyValueStore<Transaction>;
  /** Upper bound for `history` page sizes. Default: 100 */
  readonly maxPageSize?: number | undefined;
}

export interface HistoryPage {
  readonly totalCount: number;
  /** Effective limit after clamping */
  readonly limit: number;
  readonly offset: number;
  readonly transactions: readonly Transaction[];
}

const TX_PREFIX = "tx:";
const HASH_PREFIX = "hash:";

function hashKey(hash: string): string {
  return `${HASH_PREFIX}${hash.trim().toLowerCase()}`;
}

function involves(tx: Transaction, address: CanonicalAddress): boolean {
  return (
    tx.fromAddress === address ||
    tx.toAddress === address ||
    (tx.recipients ?? []).some((r) => r.address === address)
  );
}

/**
 * Newest first; on equal timestamps the later append comes first.
 */
function newestFirst(a: Transaction, b: Transaction): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? 1 : -1;
  }
  return b.sequence - a.sequence;
}

export class TransactionLedger {
  private readonly _store: KeyValueStore<Transaction>;
  private readonly _maxPageSize: number;
  private readonly _lock = new KeyedLock();

  /** Highest sequence written, loaded lazily from the store */
  private _head: number | undefined;

  constructor(options: TransactionLedgerOptions) {
    this._store = options.store;
    this._maxPageSize = options.maxPageSize ?? DEFAULT_MAX_PAGE_SIZE;
  }

  // ─── Append (The Only Write Operation) ───────────────────────────────

  /**
   * Assign an id and sequence to `draft` and record it.
   *
   * Fails with DUPLICATE_TRANSACTION if the hash is already recorded.
   */
  append(draft: TransactionDraft): Promise<Result<Transaction>> {
    return this._lock.run("append", async () => {
      const sequence = (await this._loadHead()) + 1;
      const id = `tx_${createHash("sha256")
        .update(`${canonicalize(draft)}${draft.timestamp}${sequence}`)
        .digest("hex")
        .slice(0, 16)}`;
      const tx: Transaction = { ...draft, id, sequence };

      const result = await this._store.commit({
        checks: [
          { key: `${TX_PREFIX}${id}`, version: null },
          { key: hashKey(draft.transactionHash), version: null },
        ],
        mutations: [
          { kind: "set", key: `${TX_PREFIX}${id}`, value: tx },
          { kind: "set", key: hashKey(draft.transactionHash), value: tx },
        ],
      });

      if (!result.committed) {
        if (result.conflictKey === hashKey(draft.transactionHash)) {
          return fail(
            conflictFailure(
              "DUPLICATE_TRANSACTION",
              `Transaction ${draft.transactionHash} is already recorded`,
              { transactionHash: draft.transactionHash },
            ),
          );
        }
        return fail(internalFailure(`Transaction id ${id} collided`));
      }

      this._head = sequence;
      return ok(tx);
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  async getByHash(hash: string): Promise<Transaction | undefined> {
    return (await this._store.get(hashKey(hash)))?.value;
  }

  async getById(id: string): Promise<Transaction | undefined> {
    return (await this._store.get(`${TX_PREFIX}${id}`))?.value;
  }

  /**
   * Transactions where `address` is the payer, the payee or a split
   * recipient. `limit` is clamped to 1..maxPageSize; a negative offset
   * counts as 0.
   */
  async history(address: CanonicalAddress, limit: number, offset: number): Promise<HistoryPage> {
    const boundedLimit = Math.min(Math.max(Math.trunc(limit) || 1, 1), this._maxPageSize);
    const boundedOffset = Math.max(Math.trunc(offset) || 0, 0);

    const matching = (await this._all()).filter((tx) => involves(tx, address)).sort(newestFirst);

    return {
      totalCount: matching.length,
      limit: boundedLimit,
      offset: boundedOffset,
      transactions: matching.slice(boundedOffset, boundedOffset + boundedLimit),
    };
  }

  async count(): Promise<number> {
    return (await this._all()).length;
  }

  get maxPageSize(): number {
    return this._maxPageSize;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _all(): Promise<Transaction[]> {
    return (await this._store.list(TX_PREFIX)).map((e) => e.value);
  }

  private async _loadHead(): Promise<number> {
    if (this._head === undefined) {
      this._head = (await this._all()).reduce((max, tx) => Math.max(max, tx.sequence), 0);
    }
    return this._head;
  }
}
