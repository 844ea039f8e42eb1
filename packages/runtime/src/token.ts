/**
 * @swapvault/runtime — Reference fungible token.
 *
 * A mintable token backed by a ShareLedger. An optional transfer fee,
 * in basis points, is burned from the sender on every transfer so that
 * the recipient receives less than the stated amount.
 */

import { bpsOf, LedgerError, ShareLedger } from "@swapvault/ledger";
import type { LedgerSnapshot } from "@swapvault/ledger";
import type { Address } from "@swapvault/types";
import type { ExecutionEnvironment } from "./environment.js";
import type { FungibleToken, Journaled } from "./interfaces.js";

export interface InMemoryTokenOptions {
  readonly symbol: string;
  readonly name?: string;
  /** Default: 18 */
  readonly decimals?: number;
  /** Fee burned on every transfer. Default: 0 */
  readonly transferFeeBps?: number;
  /** Default: allocated by the environment */
  readonly address?: Address;
}

export class InMemoryToken implements FungibleToken, Journaled<LedgerSnapshot> {
  readonly address: Address;
  readonly symbol: string;
  readonly name: string;
  readonly decimals: number;

  private readonly _ledger = new ShareLedger();
  private readonly _transferFeeBps: number;

  constructor(env: ExecutionEnvironment, options: InMemoryTokenOptions) {
    this.symbol = options.symbol;
    this.name = options.name ?? options.symbol;
    this.decimals = options.decimals ?? 18;
    this._transferFeeBps = options.transferFeeBps ?? 0;
    this.address = options.address ?? env.allocateAddress(`token:${options.symbol}`);
    env.register(this);
    env.registerToken(this);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this._ledger.totalSupply();
  }

  balanceOf(holder: Address): bigint {
    return this._ledger.balanceOf(holder);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._ledger.allowance(owner, spender);
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  transfer(caller: Address, to: Address, amount: bigint): void {
    this._move(caller, to, amount);
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this._ledger.spendAllowance(from, caller, amount);
    this._move(from, to, amount);
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this._ledger.approve(caller, spender, amount);
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  mint(to: Address, amount: bigint): void {
    this._ledger.mint(to, amount);
  }

  burn(from: Address, amount: bigint): void {
    this._ledger.burn(from, amount);
  }

  // ─── Journaled ───────────────────────────────────────────────────────

  checkpoint(): LedgerSnapshot {
    return this._ledger.snapshot();
  }

  restore(state: LedgerSnapshot): void {
    this._ledger.restore(state);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _move(from: Address, to: Address, amount: bigint): void {
    const balance = this._ledger.balanceOf(from);
    if (amount > balance) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `${this.symbol}: cannot transfer ${amount.toString()} from ${from}, balance is ${balance.toString()}`,
      );
    }
    const fee = bpsOf(amount, this._transferFeeBps);
    this._ledger.transfer(from, to, amount - fee);
    if (fee > 0n) {
      this._ledger.burn(from, fee);
    }
  }
}
