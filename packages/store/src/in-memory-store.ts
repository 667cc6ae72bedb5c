/**
 * @aliaspay/store — In-memory KeyValueStore implementation.
 *
 * Suitable for tests and short-lived processes; all state is lost on exit.
 * Checks and mutations run without an intervening await, so a commit is
 * atomic with respect to every other caller on the event loop.
 */

import type {
  CommitRequest,
  CommitResult,
  KeyValueStore,
  Mutation,
  VersionedEntry,
} from "./types.js";
import { StoreError } from "./types.js";

export class InMemoryKeyValueStore<V> implements KeyValueStore<V> {
  /** Current entries (Map preserves first-insertion order) */
  protected readonly _entries = new Map<string, VersionedEntry<V>>();

  /** Last assigned version */
  protected _version = 0;

  // ─── Read ───────────────────────────────────────────────────────────

  async get(key: string): Promise<VersionedEntry<V> | undefined> {
    return this._entries.get(key);
  }

  async list(prefix: string): Promise<readonly VersionedEntry<V>[]> {
    const result: VersionedEntry<V>[] = [];
    for (const [key, entry] of this._entries) {
      if (key.startsWith(prefix)) {
        result.push(entry);
      }
    }
    return result;
  }

  // ─── Write ──────────────────────────────────────────────────────────

  async put(key: string, value: V): Promise<number> {
    const result = this._commitSync({
      checks: [],
      mutations: [{ kind: "set", key, value }],
    });
    // No checks, so this commit cannot conflict
    return result.committed ? result.version : this._version;
  }

  async delete(key: string): Promise<boolean> {
    const existed = this._entries.has(key);
    if (existed) {
      this._commitSync({ checks: [], mutations: [{ kind: "delete", key }] });
    }
    return existed;
  }

  async commit(request: CommitRequest<V>): Promise<CommitResult> {
    return this._commitSync(request);
  }

  /** Number of keys currently held. */
  get size(): number {
    return this._entries.size;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Called with the mutations of a commit before they are applied.
   * Durable subclasses write them out here; throwing aborts the commit.
   */
  protected _persist(_version: number, _mutations: readonly Mutation<V>[]): void {
    // In-memory: nothing to persist
  }

  protected _apply(version: number, mutations: readonly Mutation<V>[]): void {
    for (const mutation of mutations) {
      if (mutation.kind === "set") {
        this._entries.set(mutation.key, {
          key: mutation.key,
          value: mutation.value,
          version,
        });
      } else {
        this._entries.delete(mutation.key);
      }
    }
    if (version > this._version) {
      this._version = version;
    }
  }

  private _commitSync(request: CommitRequest<V>): CommitResult {
    if (request.mutations.length === 0) {
      throw new StoreError("EMPTY_COMMIT", "Cannot commit zero mutations");
    }
    for (const mutation of request.mutations) {
      if (mutation.key.length === 0) {
        throw new StoreError("INVALID_KEY", "Key must be a non-empty string");
      }
    }

    for (const check of request.checks) {
      const current = this._entries.get(check.key);
      const currentVersion = current !== undefined ? current.version : null;
      if (currentVersion !== check.version) {
        return { committed: false, conflictKey: check.key };
      }
    }

    const version = this._version + 1;
    this._persist(version, request.mutations);
    this._apply(version, request.mutations);
    return { committed: true, version };
  }
}
