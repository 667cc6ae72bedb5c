/**
 * Split allocation.
 *
 * Shares arrive as percentages and are compared as integer basis points,
 * so 33.33 + 33.33 + 33.34 sums to exactly 10000. A total within ±1 bp of
 * 10000 is accepted.
 *
 * Payouts are computed in base units: each recipient gets the floor of
 * its proportional part, and the leftover units go one each to the first
 * recipients, so payouts always sum to the total.
 */

import { fail, normalizeAlias, ok, validationFailure } from "@aliaspay/types";
import type { CanonicalAlias, Result, SplitRecipient } from "@aliaspay/types";

export const FULL_SHARE_BPS = 10000;
export const SHARE_TOLERANCE_BPS = 1;

export interface SplitTarget {
  readonly alias: CanonicalAlias;
  readonly shareBps: number;
}

export function toBasisPoints(share: number): number {
  return Math.round(share * 100);
}

/**
 * Check a split's recipients before any of them is resolved.
 */
export function validateSplit(recipients: readonly SplitRecipient[]): Result<SplitTarget[]> {
  if (recipients.length < 2) {
    return fail(validationFailure("INVALID_SPLIT", "A split needs at least two recipients"));
  }

  const targets: SplitTarget[] = [];
  const seen = new Set<string>();
  for (const recipient of recipients) {
    const alias = normalizeAlias(recipient.alias);
    if (!alias.ok) return alias;
    if (seen.has(alias.value)) {
      return fail(
        validationFailure("INVALID_SPLIT", `Recipient @${alias.value} appears more than once`),
      );
    }
    seen.add(alias.value);

    const shareBps = toBasisPoints(recipient.share);
    if (!Number.isFinite(recipient.share) || shareBps <= 0) {
      return fail(
        validationFailure("INVALID_SPLIT", `Share for @${alias.value} must be positive`),
      );
    }
    targets.push({ alias: alias.value, shareBps });
  }

  const total = targets.reduce((sum, t) => sum + t.shareBps, 0);
  if (Math.abs(total - FULL_SHARE_BPS) > SHARE_TOLERANCE_BPS) {
    return fail(
      validationFailure("INVALID_SPLIT", `Split shares sum to ${total / 100}%, expected 100%`, {
        totalShare: total / 100,
      }),
    );
  }

  return ok(targets);
}

/**
 * Divide `total` base units by basis-point weights.
 */
export function allocateSplit(total: bigint, sharesBps: readonly number[]): bigint[] {
  const weightSum = BigInt(sharesBps.reduce((sum, s) => sum + s, 0));
  if (weightSum <= 0n) {
    return sharesBps.map(() => 0n);
  }

  const payouts = sharesBps.map((s) => (total * BigInt(s)) / weightSum);
  let remainder = total - payouts.reduce((sum, p) => sum + p, 0n);

  for (let i = 0; remainder > 0n; i = (i + 1) % payouts.length) {
    payouts[i] = (payouts[i] ?? 0n) + 1n;
    remainder -= 1n;
  }
  return payouts;
}
