/**
 * Exchange Rate Engine.
 *
 * Converts between deposit tokens and vault shares against the live pair
 * (total shares, backend balance). The rate is never stored: the backend
 * balance moves on its own as yield accrues or fees are charged, so every
 * conversion reads it fresh.
 *
 * Both directions go through an intermediate mantissa scaled by
 * 10^precision and floor twice. Round trips therefore lose a little and
 * never gain:
 *
 *   tokenToShares(sharesToToken(x)) ≤ x
 */

import { calculateMantissa, multiplyByMantissa, pow10 } from "@swapvault/ledger";
import { VaultError } from "./errors.js";

/** The live pair a conversion is priced against. */
export interface RateInputs {
  readonly totalShares: bigint;
  readonly backendBalance: bigint;
}

/**
 * 10^precision, for precision in 1..36.
 */
export function precisionScale(precision: number): bigint {
  if (!Number.isInteger(precision) || precision < 1 || precision > 36) {
    throw new VaultError(
      "INVALID_ARGUMENT",
      `Exchange rate precision must be an integer in 1..36, got ${String(precision)}`,
    );
  }
  return pow10(precision);
}

function assertNonNegative(amount: bigint, what: string): void {
  if (amount < 0n) {
    throw new VaultError("INVALID_ARGUMENT", `${what} must be non-negative, got ${amount.toString()}`);
  }
}

/**
 * Shares worth `tokens` at the current rate.
 *
 * - 0 tokens → 0 shares
 * - no shares yet → 1:1
 * - shares outstanding but an empty backend → BACKEND_BALANCE_DEPLETED
 *
 * A rate that floors to zero yields 0 shares; callers that mint or burn
 * treat that as a failure.
 */
export function tokenToShares(tokens: bigint, inputs: RateInputs, scale: bigint): bigint {
  assertNonNegative(tokens, "Token amount");
  if (tokens === 0n) {
    return 0n;
  }
  if (inputs.totalShares === 0n) {
    return tokens;
  }
  if (inputs.backendBalance === 0n) {
    throw new VaultError(
      "BACKEND_BALANCE_DEPLETED",
      `Cannot price ${tokens.toString()} tokens: ${inputs.totalShares.toString()} shares outstanding against an empty backend`,
      {
        details: {
          tokens: tokens.toString(),
          totalShares: inputs.totalShares.toString(),
        },
      },
    );
  }
  const mantissa = calculateMantissa(inputs.totalShares, inputs.backendBalance, scale);
  return multiplyByMantissa(tokens, mantissa, scale);
}

/**
 * Tokens redeemable for `shares` at the current rate.
 */
export function sharesToToken(shares: bigint, inputs: RateInputs, scale: bigint): bigint {
  assertNonNegative(shares, "Share amount");
  if (shares === 0n) {
    return 0n;
  }
  if (inputs.totalShares === 0n) {
    return shares;
  }
  const mantissa = calculateMantissa(inputs.backendBalance, inputs.totalShares, scale);
  return multiplyByMantissa(shares, mantissa, scale);
}

/**
 * Tokens per share as a mantissa; `scale` (1.0) when no shares exist.
 */
export function exchangeRateMantissa(inputs: RateInputs, scale: bigint): bigint {
  if (inputs.totalShares === 0n) {
    return scale;
  }
  return calculateMantissa(inputs.backendBalance, inputs.totalShares, scale);
}
