/**
 * Address Codec
 *
 * Normalizes wallet addresses and aliases into canonical comparable form.
 * Every inbound address or alias passes through here before it is compared
 * or stored; the branded types make skipping this step a compile error.
 *
 * Canonical forms:
 * - Address: trimmed, lowercase, `0x` + 40 hex characters
 * - Alias:   trimmed, one leading `@` stripped, lowercase, [a-z0-9_]{3,20}
 */

import type { Result } from "./result.js";
import { ok, fail } from "./result.js";
import { validationFailure, ValidationError } from "./errors.js";

// =============================================================================
// Branded types
// =============================================================================

declare const canonicalAddressBrand: unique symbol;
declare const canonicalAliasBrand: unique symbol;

/** Lowercase `0x`-prefixed 20-byte hex address */
export type CanonicalAddress = string & { readonly [canonicalAddressBrand]: true };

/** Lowercase alias without the leading `@` */
export type CanonicalAlias = string & { readonly [canonicalAliasBrand]: true };

const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;
const ALIAS_PATTERN = /^[a-z0-9_]{3,20}$/;

export const ALIAS_MIN_LENGTH = 3;
export const ALIAS_MAX_LENGTH = 20;

// =============================================================================
// Guards
// =============================================================================

export function isCanonicalAddress(value: string): value is CanonicalAddress {
  return ADDRESS_PATTERN.test(value);
}

export function isCanonicalAlias(value: string): value is CanonicalAlias {
  return ALIAS_PATTERN.test(value);
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize a wallet address.
 */
export function normalizeAddress(address: string): Result<CanonicalAddress> {
  const lowered = address.trim().toLowerCase();
  if (lowered === "") {
    return fail(validationFailure("INVALID_FORMAT", "Address is empty"));
  }
  if (!isCanonicalAddress(lowered)) {
    return fail(
      validationFailure(
        "INVALID_FORMAT",
        `Address '${address.trim()}' is not a 0x-prefixed 20-byte hex address`,
      ),
    );
  }
  return ok(lowered);
}

/**
 * Normalize an alias. Accepts `@Alice`, `alice`, ` ALICE `.
 */
export function normalizeAlias(alias: string): Result<CanonicalAlias> {
  const trimmed = alias.trim();
  const stripped = trimmed.startsWith("@") ? trimmed.slice(1) : trimmed;
  const lowered = stripped.toLowerCase();
  if (!isCanonicalAlias(lowered)) {
    return fail(
      validationFailure(
        "INVALID_ALIAS",
        `Alias '${trimmed}' must be @ followed by ${ALIAS_MIN_LENGTH}-${ALIAS_MAX_LENGTH} letters, digits or underscores`,
      ),
    );
  }
  return ok(lowered);
}

/**
 * Render a canonical alias the way users type it.
 */
export function displayAlias(alias: CanonicalAlias): string {
  return `@${alias}`;
}

/**
 * Normalize an address or throw a ValidationError.
 * For trusted configuration and test fixtures.
 */
export function toCanonicalAddress(address: string): CanonicalAddress {
  const result = normalizeAddress(address);
  if (!result.ok) {
    throw new ValidationError(result.error);
  }
  return result.value;
}

/**
 * Normalize an alias or throw a ValidationError.
 */
export function toCanonicalAlias(alias: string): CanonicalAlias {
  const result = normalizeAlias(alias);
  if (!result.ok) {
    throw new ValidationError(result.error);
  }
  return result.value;
}

/**
 * Compare two raw addresses after normalization.
 * Malformed input never equals anything.
 */
export function sameAddress(a: string, b: string): boolean {
  const left = normalizeAddress(a);
  const right = normalizeAddress(b);
  return left.ok && right.ok && left.value === right.value;
}
