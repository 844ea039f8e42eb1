/**
 * @swapvault/vault — Swappable Vault.
 *
 * A share-accounting vault over a pluggable, swappable yield source.
 *
 * Three subsystems:
 * - Shares: per-depositor balances via @swapvault/ledger
 * - Exchange rate: tokens ⇄ shares against the live backend balance
 * - Migration: validate → redeem → resupply → commit, all-or-nothing
 *
 * Design rules:
 * - The exchange rate is computed, never stored
 * - Share-ledger mutations precede every backend call
 * - A failed operation leaves no trace (atomic frames, rollback)
 * - Notifications are published only after commit
 */

export { SwappableVault } from "./swappable-vault.js";
export type { VaultState } from "./swappable-vault.js";

export {
  exchangeRateMantissa,
  precisionScale,
  sharesToToken,
  tokenToShares,
} from "./exchange-rate.js";
export type { RateInputs } from "./exchange-rate.js";

export {
  MigrationStateMachine,
  ensureAllowance,
  probeBackend,
  redeemAll,
  resupplyAll,
  validateCompatible,
  validateReplacement,
} from "./migration.js";
export type { MigrationContext, MigrationPhase, ProbedBackend, RedeemOutcome } from "./migration.js";

export { OwnerOrManager, requireCapability } from "./access-control.js";
export type { AccessState, Authority } from "./access-control.js";

export { VaultError, classifyError, isVaultError } from "./errors.js";
export type { ClassifiedError, ErrorKind, VaultErrorCode, VaultErrorOptions } from "./errors.js";

export { ConfigSchema, loadConfig } from "./config.js";
export type { VaultConfig } from "./config.js";

export { createLogger, silentLogger } from "./logger.js";

export type {
  HolderShares,
  SupplyReceipt,
  SwappableVaultInit,
  SwappableVaultOptions,
  VaultSnapshot,
} from "./types.js";
