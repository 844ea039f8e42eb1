/**
 * @swapvault/event-store — Vault event definitions.
 *
 * Naming convention: `vault.<entity>.<action>`
 *
 * Amounts are decimal strings (bigint does not survive JSON); addresses
 * are `0x` hex strings.
 */

import { isAddress, isRecord } from "@swapvault/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Types
// =============================================================================

export const VAULT_EVENTS = {
  INITIALIZED: "vault.initialized",
  BACKEND_SET: "vault.backend.set",
  FUNDS_TRANSFERRED: "vault.funds.transferred",
  BACKEND_SWAPPED: "vault.backend.swapped",
  ASSET_MANAGER_CHANGED: "vault.asset-manager.changed",
  ERC20_SWEPT: "vault.erc20.swept",
  OWNERSHIP_TRANSFERRED: "vault.ownership.transferred",
  TOKENS_SUPPLIED: "vault.tokens.supplied",
  TOKENS_REDEEMED: "vault.tokens.redeemed",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export interface VaultInitializedPayload {
  readonly backend: string;
  readonly depositToken: string;
  readonly decimals: number;
  readonly symbol: string;
  readonly name: string;
  readonly owner: string;
}

export interface BackendSetPayload {
  readonly previousBackend: string;
  readonly newBackend: string;
}

export interface FundsTransferredPayload {
  readonly fromBackend: string;
  readonly toBackend: string;
  readonly amount: string;
}

export interface BackendSwappedPayload {
  readonly previousBackend: string;
  readonly newBackend: string;
  readonly amount: string;
}

export interface AssetManagerChangedPayload {
  readonly previousManager: string;
  readonly newManager: string;
}

export interface Erc20SweptPayload {
  readonly from: string;
  readonly to: string;
  readonly amount: string;
  readonly token: string;
}

export interface OwnershipTransferredPayload {
  readonly previousOwner: string;
  readonly newOwner: string;
}

export interface TokensSuppliedPayload {
  readonly from: string;
  readonly beneficiary: string;
  readonly amount: string;
  readonly shares: string;
}

export interface TokensRedeemedPayload {
  readonly redeemer: string;
  readonly amount: string;
  readonly shares: string;
}

// =============================================================================
// Guards
// =============================================================================

function hasAddress(p: Record<string, unknown>, key: string): boolean {
  return isAddress(p[key]);
}

function hasAmount(p: Record<string, unknown>, key: string): boolean {
  const value = p[key];
  return typeof value === "string" && /^\d+$/.test(value);
}

function hasString(p: Record<string, unknown>, key: string): boolean {
  return typeof p[key] === "string";
}

// =============================================================================
// Schemas
// =============================================================================

export const VAULT_EVENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.INITIALIZED,
    version: 1,
    description: "The vault was bound to its first backend",
    source: "vault",
    validate: (p): p is VaultInitializedPayload =>
      isRecord(p) &&
      hasAddress(p, "backend") &&
      hasAddress(p, "depositToken") &&
      hasAddress(p, "owner") &&
      hasString(p, "symbol") &&
      hasString(p, "name") &&
      typeof p.decimals === "number",
  },
  {
    type: VAULT_EVENTS.BACKEND_SET,
    version: 1,
    description: "The backend pointer changed without moving funds",
    source: "vault",
    validate: (p): p is BackendSetPayload =>
      isRecord(p) && hasAddress(p, "previousBackend") && hasAddress(p, "newBackend"),
  },
  {
    type: VAULT_EVENTS.FUNDS_TRANSFERRED,
    version: 1,
    description: "Pooled funds moved from one backend to another",
    source: "vault",
    validate: (p): p is FundsTransferredPayload =>
      isRecord(p) &&
      hasAddress(p, "fromBackend") &&
      hasAddress(p, "toBackend") &&
      hasAmount(p, "amount"),
  },
  {
    type: VAULT_EVENTS.BACKEND_SWAPPED,
    version: 1,
    description: "Funds migrated and the backend pointer switched",
    source: "vault",
    validate: (p): p is BackendSwappedPayload =>
      isRecord(p) &&
      hasAddress(p, "previousBackend") &&
      hasAddress(p, "newBackend") &&
      hasAmount(p, "amount"),
  },
  {
    type: VAULT_EVENTS.ASSET_MANAGER_CHANGED,
    version: 1,
    description: "The owner delegated privileges to a new asset manager",
    source: "vault",
    validate: (p): p is AssetManagerChangedPayload =>
      isRecord(p) && hasAddress(p, "previousManager") && hasAddress(p, "newManager"),
  },
  {
    type: VAULT_EVENTS.ERC20_SWEPT,
    version: 1,
    description: "A stray token held by the vault was transferred out",
    source: "vault",
    validate: (p): p is Erc20SweptPayload =>
      isRecord(p) &&
      hasAddress(p, "from") &&
      hasAddress(p, "to") &&
      hasAddress(p, "token") &&
      hasAmount(p, "amount"),
  },
  {
    type: VAULT_EVENTS.OWNERSHIP_TRANSFERRED,
    version: 1,
    description: "Ownership moved to a new principal or was renounced",
    source: "vault",
    validate: (p): p is OwnershipTransferredPayload =>
      isRecord(p) && hasAddress(p, "previousOwner") && hasAddress(p, "newOwner"),
  },
  {
    type: VAULT_EVENTS.TOKENS_SUPPLIED,
    version: 1,
    description: "Deposit tokens were supplied and shares minted",
    source: "vault",
    validate: (p): p is TokensSuppliedPayload =>
      isRecord(p) &&
      hasAddress(p, "from") &&
      hasAddress(p, "beneficiary") &&
      hasAmount(p, "amount") &&
      hasAmount(p, "shares"),
  },
  {
    type: VAULT_EVENTS.TOKENS_REDEEMED,
    version: 1,
    description: "Shares were burned and deposit tokens paid out",
    source: "vault",
    validate: (p): p is TokensRedeemedPayload =>
      isRecord(p) && hasAddress(p, "redeemer") && hasAmount(p, "amount") && hasAmount(p, "shares"),
  },
];

/**
 * Catalog pre-populated with every vault event at version 1.
 */
export function createVaultCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of VAULT_EVENT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
