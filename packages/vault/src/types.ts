/**
 * Vault types.
 */

import type { EventStore } from "@swapvault/event-store";
import type { YieldSource } from "@swapvault/runtime";
import type { Address } from "@swapvault/types";
import type { Logger } from "pino";
import type { MigrationPhase } from "./migration.js";

// =============================================================================
// Construction
// =============================================================================

/**
 * Fixed at initialization.
 */
export interface SwappableVaultInit {
  readonly backend: YieldSource | null | undefined;
  readonly owner: Address;
  readonly name: string;
  readonly symbol: string;
  /** Share decimals, 1..255 */
  readonly decimals: number;
}

export interface SwappableVaultOptions {
  /** Default: silent */
  readonly logger?: Logger;
  /** Where notifications go once an operation commits. Default: nowhere */
  readonly events?: EventStore;
  /** Decimals of the exchange-rate mantissa, 1..36. Default: 18 */
  readonly exchangeRatePrecision?: number;
  /** Default: allocated by the environment */
  readonly address?: Address;
  /** Event and correlation IDs. Default: random UUIDs */
  readonly idGenerator?: () => string;
}

// =============================================================================
// Results
// =============================================================================

export interface SupplyReceipt {
  /** Deposit tokens that actually reached the vault */
  readonly received: bigint;
  readonly shares: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface HolderShares {
  readonly account: Address;
  /** Decimal string */
  readonly shares: string;
}

/**
 * Serializable view of the vault. Amounts are decimal strings.
 */
export interface VaultSnapshot {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly depositToken: Address;
  readonly backend: Address;
  readonly owner: Address;
  readonly assetManager: Address;
  readonly totalShares: string;
  readonly backendBalance: string;
  readonly exchangeRate: string;
  readonly migrationPhase: MigrationPhase;
  readonly holders: readonly HolderShares[];
}
