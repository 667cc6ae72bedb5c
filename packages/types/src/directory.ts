/**
 * Directory Types
 *
 * An alias is bound to exactly one address and an address owns at most
 * one alias. Both values are stored in canonical form.
 */

import type { CanonicalAddress, CanonicalAlias } from "./codec.js";

export interface AliasRecord {
  readonly alias: CanonicalAlias;
  readonly address: CanonicalAddress;
  /** ISO 8601 */
  readonly registeredAt: string;
  /** ISO 8601, refreshed on every successful resolve */
  readonly lastUsedAt: string;
}

/**
 * Search hit: display alias (`@alice`) and its address.
 */
export interface AliasMatch {
  readonly alias: string;
  readonly address: CanonicalAddress;
}
