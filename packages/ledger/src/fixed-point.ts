/**
 * @swapvault/ledger — Deterministic fixed-point arithmetic.
 *
 * All arithmetic is bigint and rounds toward zero unless asked otherwise.
 * Exchange rates are represented as mantissas: integers scaled by
 * `10^precision`, so a rate of 1.5 at precision 18 is 1.5e18.
 *
 * Rules:
 * - No floating-point operations
 * - Division by zero throws instead of producing a value
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

export type RoundingMode = "down" | "up";

/** Largest value an EVM-style uint256 can hold; used as an infinite allowance. */
export const MAX_UINT256 = (1n << 256n) - 1n;

/** Default exchange-rate precision (18 decimals). */
export const DEFAULT_PRECISION = 18;

/**
 * 10^exp as a bigint.
 */
export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) {
    throw new LedgerError("INVALID_AMOUNT", `pow10 exponent must be a non-negative integer, got ${String(exp)}`);
  }
  return 10n ** BigInt(exp);
}

/**
 * a * b / denom, rounded toward zero ("down") or away from zero ("up").
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denom: bigint,
  rounding: RoundingMode = "down",
): bigint {
  if (denom === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  const product = a * b;
  const quotient = product / denom;
  if (rounding === "down" || product % denom === 0n) {
    return quotient;
  }
  return quotient + 1n;
}

/**
 * Mantissa of `numerator / denominator` at the given scale.
 *
 * calculateMantissa(300n, 100n, 10n ** 18n) → 3_000000000000000000n
 */
export function calculateMantissa(
  numerator: bigint,
  denominator: bigint,
  scale: bigint,
): bigint {
  return mulDiv(numerator, scale, denominator);
}

/**
 * Apply a mantissa to an amount: floor(amount * mantissa / scale).
 */
export function multiplyByMantissa(
  amount: bigint,
  mantissa: bigint,
  scale: bigint,
): bigint {
  return mulDiv(amount, mantissa, scale);
}

/**
 * Parse a decimal string into a bigint scaled by `decimals`.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=18 → 100000000000000000000n
 */
export function parseUnits(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=18 → "0.000000000000000005"
 */
export function formatUnits(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Basis-point share of an amount, rounded down.
 */
export function bpsOf(amount: bigint, bps: number): bigint {
  if (!Number.isInteger(bps) || bps < 0 || bps > 10_000) {
    throw new LedgerError("INVALID_AMOUNT", `bps must be an integer in [0, 10000], got ${String(bps)}`);
  }
  return mulDiv(amount, BigInt(bps), 10_000n);
}
