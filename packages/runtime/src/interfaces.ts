/**
 * @swapvault/runtime — Capability interfaces.
 *
 * Every state-changing call names its caller explicitly. There is no
 * ambient `msg.sender`: the caller is whoever the invoking code says it
 * is, and each implementation enforces its own permissions against it.
 */

import type { Address, TokenRef } from "@swapvault/types";

/**
 * State that can be captured and put back.
 *
 * The environment checkpoints every registered participant when an atomic
 * frame opens and restores them all if the frame throws.
 */
export interface Journaled<S> {
  checkpoint(): S;
  restore(state: S): void;
}

/**
 * A fungible token with allowances.
 */
export interface FungibleToken extends TokenRef {
  totalSupply(): bigint;
  balanceOf(holder: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;

  /** Move `amount` from `caller` to `to`. */
  transfer(caller: Address, to: Address, amount: bigint): void;

  /** Move `amount` from `from` to `to`, spending `caller`'s allowance. */
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void;

  approve(caller: Address, spender: Address, amount: bigint): void;
}

/**
 * A place to park deposit tokens and earn on them.
 *
 * `address` doubles as the address of the backend's receipt token.
 */
export interface YieldSource {
  readonly address: Address;

  /** Token accepted by `supplyTokenTo`. Stable for the backend's lifetime. */
  depositToken(): Address;

  /** Deposit-token value of `holder`'s position. */
  balanceOfToken(holder: Address): bigint;

  /** Pull `amount` from `caller` (via allowance) and credit `beneficiary`. */
  supplyTokenTo(caller: Address, amount: bigint, beneficiary: Address): void;

  /** Redeem `amount` of `caller`'s position. Returns what was actually sent back. */
  redeemToken(caller: Address, amount: bigint): bigint;
}
