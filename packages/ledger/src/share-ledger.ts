/**
 * @swapvault/ledger — Share ledger.
 *
 * Per-account share balances for a mutable-supply token. Minting and
 * burning move the total supply; transfers never do.
 *
 * API surface:
 * - mint() / burn() — Change supply for one account
 * - transfer() — Move shares between accounts
 * - approve() / allowance() / spendAllowance() — Delegated spending
 * - balanceOf() / totalSupply() / holders() — Reads
 * - snapshot() / restore() — Roll back to an earlier state
 * - assertConserved() — Sum of balances equals total supply
 */

import { isZeroAddress, normalizeAddress } from "@swapvault/types";
import type { Address } from "@swapvault/types";
import { MAX_UINT256 } from "./fixed-point.js";
import type { AllowanceRecord, HolderBalance, LedgerSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Share balances keyed by normalized address.
 *
 * Accounts are implicit: every address holds zero until its first mint
 * or incoming transfer. Entries are never deleted.
 */
export class ShareLedger {
  private readonly _balances: Map<Address, bigint> = new Map();
  private readonly _allowances: Map<Address, Map<Address, bigint>> = new Map();
  private _totalSupply = 0n;

  // ─── Reads ───────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this._balances.get(normalizeAddress(account)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(normalizeAddress(owner))?.get(normalizeAddress(spender)) ?? 0n;
  }

  /**
   * Accounts with a non-zero balance, in first-credit order.
   */
  holders(): readonly HolderBalance[] {
    const result: HolderBalance[] = [];
    for (const [account, balance] of this._balances) {
      if (balance > 0n) {
        result.push({ account, balance });
      }
    }
    return result;
  }

  // ─── Supply Changes ──────────────────────────────────────────────────

  mint(account: Address, amount: bigint): void {
    assertAmount(amount);
    const key = assertAccount(account);
    this._balances.set(key, this.balanceOf(key) + amount);
    this._totalSupply += amount;
  }

  burn(account: Address, amount: bigint): void {
    assertAmount(amount);
    const key = assertAccount(account);
    const balance = this.balanceOf(key);
    if (amount > balance) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Cannot burn ${amount.toString()} from ${key}: balance is ${balance.toString()}`,
      );
    }
    this._balances.set(key, balance - amount);
    this._totalSupply -= amount;
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  transfer(from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    const source = assertAccount(from);
    const target = assertAccount(to);
    const balance = this.balanceOf(source);
    if (amount > balance) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Cannot transfer ${amount.toString()} from ${source}: balance is ${balance.toString()}`,
      );
    }
    this._balances.set(source, balance - amount);
    this._balances.set(target, this.balanceOf(target) + amount);
  }

  // ─── Allowances ──────────────────────────────────────────────────────

  approve(owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    const ownerKey = assertAccount(owner);
    const spenderKey = assertAccount(spender);
    let granted = this._allowances.get(ownerKey);
    if (granted === undefined) {
      granted = new Map();
      this._allowances.set(ownerKey, granted);
    }
    granted.set(spenderKey, amount);
  }

  /**
   * Consume part of an allowance. An allowance of MAX_UINT256 is
   * treated as infinite and left untouched.
   */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) {
      return;
    }
    if (amount > current) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Spender ${normalizeAddress(spender)} may spend ${current.toString()} of ${normalizeAddress(owner)}, requested ${amount.toString()}`,
      );
    }
    this.approve(owner, spender, current - amount);
  }

  // ─── Invariants ──────────────────────────────────────────────────────

  /**
   * Throws CONSERVATION_VIOLATED if balances no longer sum to the supply.
   */
  assertConserved(): void {
    let sum = 0n;
    for (const balance of this._balances.values()) {
      if (balance < 0n) {
        throw new LedgerError("CONSERVATION_VIOLATED", "Negative balance in ledger");
      }
      sum += balance;
    }
    if (sum !== this._totalSupply) {
      throw new LedgerError(
        "CONSERVATION_VIOLATED",
        `Balances sum to ${sum.toString()} but total supply is ${this._totalSupply.toString()}`,
      );
    }
  }

  // ─── Snapshot / Restore ──────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const allowances: AllowanceRecord[] = [];
    for (const [owner, granted] of this._allowances) {
      for (const [spender, amount] of granted) {
        allowances.push({ owner, spender, amount });
      }
    }
    return {
      totalSupply: this._totalSupply,
      balances: new Map(this._balances),
      allowances,
    };
  }

  restore(snapshot: LedgerSnapshot): void {
    this._balances.clear();
    for (const [account, balance] of snapshot.balances) {
      this._balances.set(account, balance);
    }
    this._allowances.clear();
    for (const record of snapshot.allowances) {
      let granted = this._allowances.get(record.owner);
      if (granted === undefined) {
        granted = new Map();
        this._allowances.set(record.owner, granted);
      }
      granted.set(record.spender, record.amount);
    }
    this._totalSupply = snapshot.totalSupply;
  }

  /**
   * Build a ledger from a snapshot.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): ShareLedger {
    const ledger = new ShareLedger();
    ledger.restore(snapshot);
    ledger.assertConserved();
    return ledger;
  }
}

// ─── Validation ──────────────────────────────────────────────────────────

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount.toString()}`);
  }
}

function assertAccount(account: Address): Address {
  if (isZeroAddress(account)) {
    throw new LedgerError("INVALID_ACCOUNT", "The zero address cannot hold shares");
  }
  return normalizeAddress(account);
}
