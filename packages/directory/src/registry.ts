/**
 * AliasRegistry
 *
 * Owns the bidirectional alias ↔ address mapping. Both directions live in
 * one KeyValueStore under `alias:<alias>` and `address:<address>`, and are
 * always written together in a single commit guarded by version checks:
 *
 * - An alias maps to at most one address, and an address owns at most one alias
 * - Of two concurrent registrations competing for a key, exactly one wins
 * - A failed registration or deletion leaves the store untouched
 *
 * Ownership is proven by an EIP-712 signature over `{alias, address}`.
 */

import type { KeyValueStore, VersionedEntry } from "@aliaspay/store";
import type { SignatureAuthorizer } from "@aliaspay/authorizer";
import {
  authorizationFailure,
  conflictFailure,
  displayAlias,
  fail,
  normalizeAddress,
  normalizeAlias,
  ok,
} from "@aliaspay/types";
import type {
  AliasMatch,
  AliasRecord,
  CanonicalAddress,
  CanonicalAlias,
  Result,
} from "@aliaspay/types";

// =============================================================================
// Types
// =============================================================================

export type DeleteOutcome = "deleted" | "not_found" | "not_owner" | "invalid_signature";

export interface SeedEntry {
  readonly alias: string;
  readonly address: string;
}

export interface AliasRegistryOptions {
  readonly store: KeyValueStore<AliasRecord>;
  readonly authorizer: SignatureAuthorizer;
  /** Clock override for tests */
  readonly now?: (() => Date) | undefined;
}

export const SEARCH_MAX_LIMIT = 50;

const ALIAS_PREFIX = "alias:";
const ADDRESS_PREFIX = "address:";

function aliasKey(alias: CanonicalAlias): string {
  return `${ALIAS_PREFIX}${alias}`;
}

function addressKey(address: CanonicalAddress): string {
  return `${ADDRESS_PREFIX}${address}`;
}

// =============================================================================
// Registry
// =============================================================================

export class AliasRegistry {
  private readonly _store: KeyValueStore<AliasRecord>;
  private readonly _authorizer: SignatureAuthorizer;
  private readonly _now: () => Date;

  constructor(options: AliasRegistryOptions) {
    this._store = options.store;
    this._authorizer = options.authorizer;
    this._now = options.now ?? (() => new Date());
  }

  // ─── Write ──────────────────────────────────────────────────────────

  /**
   * Register `alias` for `address`, proven by `proof`.
   */
  async register(alias: string, address: string, proof: string): Promise<Result<AliasRecord>> {
    const canonicalAlias = normalizeAlias(alias);
    if (!canonicalAlias.ok) return canonicalAlias;
    const canonicalAddress = normalizeAddress(address);
    if (!canonicalAddress.ok) return canonicalAddress;

    const message = this._authorizer.buildRegistrationMessage(
      canonicalAlias.value,
      canonicalAddress.value,
    );
    if (!(await this._authorizer.verify(message, proof, canonicalAddress.value))) {
      return fail(authorizationFailure("INVALID_SIGNATURE"));
    }

    return this._insert(canonicalAlias.value, canonicalAddress.value);
  }

  /**
   * Register trusted aliases without a proof. Pairs already registered
   * exactly as given are skipped; any other conflict fails the entry.
   *
   * @returns one result per entry, in order
   */
  async seed(entries: readonly SeedEntry[]): Promise<Result<AliasRecord>[]> {
    const results: Result<AliasRecord>[] = [];
    for (const entry of entries) {
      const canonicalAlias = normalizeAlias(entry.alias);
      const canonicalAddress = normalizeAddress(entry.address);
      if (!canonicalAlias.ok) {
        results.push(canonicalAlias);
        continue;
      }
      if (!canonicalAddress.ok) {
        results.push(canonicalAddress);
        continue;
      }

      const existing = await this.lookup(canonicalAlias.value);
      if (existing !== undefined && existing.address === canonicalAddress.value) {
        results.push(ok(existing));
        continue;
      }
      results.push(await this._insert(canonicalAlias.value, canonicalAddress.value));
    }
    return results;
  }

  /**
   * Remove an alias on behalf of its owner.
   *
   * Ownership is checked against the stored record, then the proof is
   * verified over `{alias, requestingAddress}`.
   */
  async delete(alias: string, requestingAddress: string, proof: string): Promise<DeleteOutcome> {
    const canonicalAlias = normalizeAlias(alias);
    if (!canonicalAlias.ok) return "not_found";

    const entry = await this._store.get(aliasKey(canonicalAlias.value));
    if (entry === undefined) return "not_found";

    const requester = normalizeAddress(requestingAddress);
    if (!requester.ok || requester.value !== entry.value.address) {
      return "not_owner";
    }

    const message = this._authorizer.buildDeletionMessage(canonicalAlias.value, requester.value);
    if (!(await this._authorizer.verify(message, proof, requester.value))) {
      return "invalid_signature";
    }

    const reverse = await this._store.get(addressKey(requester.value));
    const result = await this._store.commit({
      checks: [
        { key: aliasKey(canonicalAlias.value), version: entry.version },
        { key: addressKey(requester.value), version: reverse?.version ?? null },
      ],
      mutations: [
        { kind: "delete", key: aliasKey(canonicalAlias.value) },
        { kind: "delete", key: addressKey(requester.value) },
      ],
    });
    // Lost a race with another write to the same pair
    return result.committed ? "deleted" : "not_found";
  }

  // ─── Read ───────────────────────────────────────────────────────────

  /**
   * Address bound to `alias`. Refreshes `lastUsedAt` on a hit.
   */
  async resolve(alias: string): Promise<CanonicalAddress | undefined> {
    const canonicalAlias = normalizeAlias(alias);
    if (!canonicalAlias.ok) return undefined;

    const entry = await this._store.get(aliasKey(canonicalAlias.value));
    if (entry === undefined) return undefined;

    await this._touch(entry);
    return entry.value.address;
  }

  async reverseResolve(address: string): Promise<CanonicalAlias | undefined> {
    const canonicalAddress = normalizeAddress(address);
    if (!canonicalAddress.ok) return undefined;

    const entry = await this._store.get(addressKey(canonicalAddress.value));
    return entry?.value.alias;
  }

  /**
   * Record for `alias` without touching `lastUsedAt`.
   */
  async lookup(alias: string): Promise<AliasRecord | undefined> {
    const canonicalAlias = normalizeAlias(alias);
    if (!canonicalAlias.ok) return undefined;
    return (await this._store.get(aliasKey(canonicalAlias.value)))?.value;
  }

  /**
   * Aliases starting with `prefix` (a leading `@` is ignored), in
   * registration order. `limit` is clamped to 1..50.
   */
  async search(prefix: string, limit: number): Promise<AliasMatch[]> {
    const trimmed = prefix.trim().toLowerCase();
    const needle = trimmed.startsWith("@") ? trimmed.slice(1) : trimmed;
    const bounded = Math.min(Math.max(Math.trunc(limit) || 1, 1), SEARCH_MAX_LIMIT);

    const entries = await this._store.list(`${ALIAS_PREFIX}${needle}`);
    return entries
      .slice(0, bounded)
      .map((e) => ({ alias: displayAlias(e.value.alias), address: e.value.address }));
  }

  async count(): Promise<number> {
    return (await this._store.list(ALIAS_PREFIX)).length;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _insert(
    alias: CanonicalAlias,
    address: CanonicalAddress,
  ): Promise<Result<AliasRecord>> {
    const now = this._now().toISOString();
    const record: AliasRecord = { alias, address, registeredAt: now, lastUsedAt: now };

    const result = await this._store.commit({
      checks: [
        { key: aliasKey(alias), version: null },
        { key: addressKey(address), version: null },
      ],
      mutations: [
        { kind: "set", key: aliasKey(alias), value: record },
        { kind: "set", key: addressKey(address), value: record },
      ],
    });

    if (result.committed) {
      return ok(record);
    }
    if (result.conflictKey === aliasKey(alias)) {
      return fail(
        conflictFailure("ALIAS_TAKEN", `Alias ${displayAlias(alias)} is already registered`, {
          alias: displayAlias(alias),
        }),
      );
    }
    return fail(
      conflictFailure("ADDRESS_ALREADY_ALIASED", `Address ${address} already has an alias`, {
        address,
      }),
    );
  }

  /**
   * Refresh `lastUsedAt` on both keys. Skipped if the pair changed since
   * it was read.
   */
  private async _touch(entry: VersionedEntry<AliasRecord>): Promise<void> {
    const record: AliasRecord = { ...entry.value, lastUsedAt: this._now().toISOString() };
    const reverse = await this._store.get(addressKey(record.address));
    if (reverse === undefined) return;

    await this._store.commit({
      checks: [
        { key: entry.key, version: entry.version },
        { key: reverse.key, version: reverse.version },
      ],
      mutations: [
        { kind: "set", key: entry.key, value: record },
        { kind: "set", key: reverse.key, value: record },
      ],
    });
  }
}
