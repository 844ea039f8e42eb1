/**
 * @swapvault/ledger — Types for the share ledger.
 *
 * Rules:
 * - All amounts are bigint (no floating point)
 * - Balances are never negative
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@swapvault/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "CONSERVATION_VIOLATED"
  | "DIVISION_BY_ZERO";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Allowance granted by `owner` to `spender`.
 */
export interface AllowanceRecord {
  readonly owner: Address;
  readonly spender: Address;
  readonly amount: bigint;
}

/**
 * Complete ledger state at a point in time.
 * Used to roll back a failed operation and to inspect balances.
 */
export interface LedgerSnapshot {
  readonly totalSupply: bigint;
  readonly balances: ReadonlyMap<Address, bigint>;
  readonly allowances: readonly AllowanceRecord[];
}

/**
 * A single holder line, as returned by `holders()`.
 */
export interface HolderBalance {
  readonly account: Address;
  readonly balance: bigint;
}
