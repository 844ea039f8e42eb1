/**
 * @swapvault/runtime — Reference yield source.
 *
 * Pools one deposit token and tracks each depositor's claim as receipt
 * shares. Yield arrives by minting deposit tokens straight into the pool
 * (`accrueYield`), which raises the value of every receipt share. An
 * optional exit fee is withheld from each redemption.
 */

import { bpsOf, LedgerError, mulDiv, ShareLedger } from "@swapvault/ledger";
import type { LedgerSnapshot } from "@swapvault/ledger";
import type { Address } from "@swapvault/types";
import type { ExecutionEnvironment } from "./environment.js";
import { RuntimeError } from "./errors.js";
import type { Journaled, YieldSource } from "./interfaces.js";
import type { InMemoryToken } from "./token.js";

export interface InMemoryYieldSourceOptions {
  /** Used to derive the address. Default: "yield-source" */
  readonly label?: string;
  /** Withheld from every redemption. Default: 0 */
  readonly exitFeeBps?: number;
  readonly address?: Address;
}

export class InMemoryYieldSource implements YieldSource, Journaled<LedgerSnapshot> {
  readonly address: Address;

  protected readonly token: InMemoryToken;
  private readonly _receipts = new ShareLedger();
  private readonly _exitFeeBps: number;

  constructor(env: ExecutionEnvironment, token: InMemoryToken, options: InMemoryYieldSourceOptions = {}) {
    this.token = token;
    this._exitFeeBps = options.exitFeeBps ?? 0;
    this.address = options.address ?? env.allocateAddress(options.label ?? "yield-source");
    env.register(this);
  }

  depositToken(): Address {
    return this.token.address;
  }

  /** Deposit tokens held by the pool. */
  holdings(): bigint {
    return this.token.balanceOf(this.address);
  }

  receiptSharesOf(holder: Address): bigint {
    return this._receipts.balanceOf(holder);
  }

  balanceOfToken(holder: Address): bigint {
    const total = this._receipts.totalSupply();
    if (total === 0n) {
      return 0n;
    }
    return mulDiv(this._receipts.balanceOf(holder), this.holdings(), total);
  }

  supplyTokenTo(caller: Address, amount: bigint, beneficiary: Address): void {
    const before = this.holdings();
    const total = this._receipts.totalSupply();
    // Outstanding receipts over an empty pool have no price.
    if (total > 0n && before === 0n) {
      throw new RuntimeError(
        "POOL_DEPLETED",
        `Pool holds nothing against ${total.toString()} outstanding receipt shares`,
      );
    }
    this.token.transferFrom(this.address, caller, this.address, amount);
    const received = this.holdings() - before;

    const minted = total === 0n ? received : mulDiv(received, total, before);
    this._receipts.mint(beneficiary, minted);
  }

  redeemToken(caller: Address, amount: bigint): bigint {
    if (amount === 0n) {
      return 0n;
    }
    const holdings = this.holdings();
    if (amount > holdings) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Cannot redeem ${amount.toString()}: pool holds ${holdings.toString()}`,
      );
    }
    // Round the burn up so redemptions never drain other holders.
    const burned = mulDiv(amount, this._receipts.totalSupply(), holdings, "up");
    this._receipts.burn(caller, burned);

    const payout = amount - bpsOf(amount, this._exitFeeBps);
    this.token.transfer(this.address, caller, payout);
    return payout;
  }

  // ─── Simulation ──────────────────────────────────────────────────────

  /** Mint `amount` of new deposit tokens into the pool. */
  accrueYield(amount: bigint): void {
    this.token.mint(this.address, amount);
  }

  /** Destroy `amount` of the pool's deposit tokens. */
  slash(amount: bigint): void {
    this.token.burn(this.address, amount);
  }

  // ─── Journaled ───────────────────────────────────────────────────────

  checkpoint(): LedgerSnapshot {
    return this._receipts.snapshot();
  }

  restore(state: LedgerSnapshot): void {
    this._receipts.restore(state);
  }
}
