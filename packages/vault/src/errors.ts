/**
 * Vault errors and the error taxonomy.
 *
 * Every failure the vault raises itself is a VaultError. Failures from
 * the packages it builds on (ledger, runtime) keep their own classes;
 * `classifyError` maps all of them onto one of three kinds:
 *
 * - validation: the request was refused before anything changed
 * - invariant: a safety check caught an unexpected outcome mid-operation
 * - fatal: anything else, including errors thrown by collaborators
 */

import { LedgerError } from "@swapvault/ledger";
import { RuntimeError } from "@swapvault/runtime";

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode =
  | "INVALID_BACKEND"
  | "SAME_BACKEND"
  | "INCOMPATIBLE_DEPOSIT_TOKEN"
  | "NOT_OWNER"
  | "NOT_OWNER_OR_MANAGER"
  | "ZERO_ADDRESS"
  | "INVALID_ARGUMENT"
  | "YIELD_SOURCE_TOKEN_TRANSFER_NOT_ALLOWED"
  | "REDEEM_AMOUNT_MISMATCH"
  | "TRANSFER_AMOUNT_INFERIOR"
  | "SHARES_MUST_BE_NON_ZERO"
  | "BACKEND_BALANCE_DEPLETED"
  | "INVALID_MIGRATION_TRANSITION";

export interface VaultErrorOptions {
  /** Amounts and addresses involved, as strings */
  readonly details?: Readonly<Record<string, string>>;
  readonly cause?: unknown;
}

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly details: Readonly<Record<string, string>>;

  constructor(code: VaultErrorCode, message: string, options: VaultErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "VaultError";
    this.code = code;
    this.details = options.details ?? {};
  }
}

export function isVaultError(err: unknown): err is VaultError {
  return err instanceof VaultError;
}

// =============================================================================
// Taxonomy
// =============================================================================

export type ErrorKind = "validation" | "invariant" | "fatal";

export interface ClassifiedError {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly message: string;
}

const VALIDATION_CODES: ReadonlySet<string> = new Set([
  "INVALID_BACKEND",
  "SAME_BACKEND",
  "INCOMPATIBLE_DEPOSIT_TOKEN",
  "NOT_OWNER",
  "NOT_OWNER_OR_MANAGER",
  "ZERO_ADDRESS",
  "INVALID_ARGUMENT",
  "YIELD_SOURCE_TOKEN_TRANSFER_NOT_ALLOWED",
  "INSUFFICIENT_BALANCE",
  "INSUFFICIENT_ALLOWANCE",
  "INVALID_AMOUNT",
  "INVALID_ACCOUNT",
]);

const INVARIANT_CODES: ReadonlySet<string> = new Set([
  "REDEEM_AMOUNT_MISMATCH",
  "TRANSFER_AMOUNT_INFERIOR",
  "SHARES_MUST_BE_NON_ZERO",
  "BACKEND_BALANCE_DEPLETED",
  "POOL_DEPLETED",
  "INVALID_MIGRATION_TRANSITION",
  "REENTRANT_CALL",
]);

/**
 * Map any thrown value onto the vault's error taxonomy.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err instanceof VaultError || err instanceof LedgerError || err instanceof RuntimeError) {
    const kind: ErrorKind = VALIDATION_CODES.has(err.code)
      ? "validation"
      : INVARIANT_CODES.has(err.code)
        ? "invariant"
        : "fatal";
    return { kind, code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { kind: "fatal", code: "UNKNOWN", message: err.message };
  }
  return { kind: "fatal", code: "UNKNOWN", message: String(err) };
}
