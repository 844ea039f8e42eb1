/**
 * Address Types
 *
 * Every participant in the vault system (depositors, the vault itself,
 * backends, tokens) is identified by a 20-byte hex address.
 *
 * Rules:
 * - Addresses are compared case-insensitively
 * - The zero address never holds value and never names a live contract
 */

/** A `0x`-prefixed, 40-hex-digit account or contract identifier. */
export type Address = string;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Canonical (lower-case) form of an address, used as a map key.
 */
export function normalizeAddress(address: Address): Address {
  return address.toLowerCase();
}

export function sameAddress(a: Address, b: Address): boolean {
  return normalizeAddress(a) === normalizeAddress(b);
}

export function isZeroAddress(address: Address): boolean {
  return sameAddress(address, ZERO_ADDRESS);
}

/**
 * Identity and display metadata of a fungible token.
 */
export interface TokenRef {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;
}
