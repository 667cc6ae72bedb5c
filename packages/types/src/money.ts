/**
 * Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint base units internally. Amounts cross the
 * wire as decimal strings (or JSON numbers that are turned into decimal
 * strings before anything else looks at them).
 *
 * Rules:
 * - No floating-point operations on amounts
 * - An amount may not carry more fractional digits than its currency
 * - Exponent notation is rejected
 */

import type { Result } from "./result.js";
import { ok, fail } from "./result.js";
import { validationFailure } from "./errors.js";

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parse a decimal string into base units.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 *
 * @returns undefined for malformed input or excess precision
 */
export function toBaseUnits(amount: string, decimals: number): bigint | undefined {
  const trimmed = amount.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  if (fracPart.length > decimals) {
    return undefined;
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Format base units as a decimal string without trailing zeros.
 *
 * 10050n with decimals=2 → "100.5"
 * 50000000n with decimals=6 → "50"
 */
export function formatBaseUnits(units: bigint, decimals: number): string {
  const negative = units < 0n;
  const abs = negative ? -units : units;

  if (decimals === 0) {
    return `${negative ? "-" : ""}${abs.toString()}`;
  }

  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, "");
  const body = fracPart === "" ? intPart : `${intPart}.${fracPart}`;

  return negative ? `-${body}` : body;
}

/**
 * Render a wire amount (JSON number or string) as a decimal string.
 *
 * Numbers go through `String()`, so 9.99 stays "9.99"; anything that
 * stringifies to exponent notation is returned as-is and then fails
 * the decimal check downstream.
 */
export function amountToDecimal(amount: number | string): string {
  return typeof amount === "number" ? String(amount) : amount.trim();
}

/**
 * A validated positive amount.
 */
export interface ParsedAmount {
  /** Decimal string without trailing zeros */
  readonly amount: string;
  /** Base units at the currency's precision */
  readonly units: bigint;
  readonly decimals: number;
}

/**
 * Validate a positive amount against a currency's precision.
 */
export function parsePositiveAmount(
  amount: number | string,
  decimals: number,
): Result<ParsedAmount> {
  const decimal = amountToDecimal(amount);
  const units = toBaseUnits(decimal, decimals);

  if (units === undefined) {
    return fail(
      validationFailure(
        "INVALID_AMOUNT",
        `Amount '${decimal}' is not a decimal with at most ${decimals} fractional digits`,
      ),
    );
  }
  if (units <= 0n) {
    return fail(validationFailure("INVALID_AMOUNT", "Amount must be positive"));
  }

  return ok({ amount: formatBaseUnits(units, decimals), units, decimals });
}
