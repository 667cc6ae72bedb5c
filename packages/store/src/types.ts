/**
 * @aliaspay/store — Core types.
 *
 * Defines a small versioned key-value interface that the directory,
 * ledger and dispatcher persist through.
 *
 * Design principles:
 * - Every write bumps a store-wide version counter
 * - Multi-key writes are atomic: all mutations apply or none do
 * - Concurrency control via expected versions (optimistic locking)
 * - `null` as an expected version means "key must not exist"
 */

// =============================================================================
// Entries
// =============================================================================

/**
 * A value as held by the store.
 */
export interface VersionedEntry<V> {
  readonly key: string;
  readonly value: V;
  /** Store-wide version at which this key was last written (1-based) */
  readonly version: number;
}

// =============================================================================
// Commits
// =============================================================================

/**
 * Precondition on a single key.
 *
 * - A number: the key must currently be at exactly this version
 * - null: the key must not exist
 */
export interface VersionCheck {
  readonly key: string;
  readonly version: number | null;
}

export type Mutation<V> =
  | { readonly kind: "set"; readonly key: string; readonly value: V }
  | { readonly kind: "delete"; readonly key: string };

export interface CommitRequest<V> {
  readonly checks: readonly VersionCheck[];
  readonly mutations: readonly Mutation<V>[];
}

export type CommitResult =
  | { readonly committed: true; readonly version: number }
  | { readonly committed: false; readonly conflictKey: string };

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode = "INVALID_KEY" | "EMPTY_COMMIT" | "WRITE_FAILED";

export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  public readonly key: string | undefined;

  constructor(code: StoreErrorCode, message: string, key?: string) {
    super(message);
    this.name = "StoreError";
    this.code = code;
    this.key = key;
  }
}

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Versioned key-value store.
 *
 * Invariants:
 * - A successful commit assigns one new version to every key it writes
 * - A failed check leaves the store untouched
 * - `list` returns entries in the order their keys were first written
 */
export interface KeyValueStore<V> {
  get(key: string): Promise<VersionedEntry<V> | undefined>;

  /**
   * All entries whose key starts with `prefix`.
   */
  list(prefix: string): Promise<readonly VersionedEntry<V>[]>;

  /** Unconditional write. Returns the new version. */
  put(key: string, value: V): Promise<number>;

  /** Unconditional delete. Returns whether the key existed. */
  delete(key: string): Promise<boolean>;

  /**
   * Apply all mutations if every check holds.
   *
   * @throws StoreError on an empty mutation list or invalid key
   */
  commit(request: CommitRequest<V>): Promise<CommitResult>;
}
