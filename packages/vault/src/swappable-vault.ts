/**
 * Swappable Vault.
 *
 * Pools deposits in one yield source ("backend") and tracks each
 * depositor's claim with a mutable-supply share token. The backend can be
 * replaced at runtime without touching anyone's shares: the pool's value
 * moves, the shares stay, and the exchange rate follows the new backend's
 * balance.
 *
 * Every mutating operation runs inside one atomic frame behind the
 * reentrancy guard. Share-ledger mutations happen before any backend
 * call; if anything after that fails, the frame puts everything back.
 *
 * API surface:
 * - supplyTokenTo() / redeemToken() — Deposit and withdraw
 * - balanceOfToken() / exchangeRate() — Valuation
 * - swapYieldSource() / setYieldSource() / transferFunds() — Migration
 * - transferERC20() / approveMaxAmount() — Asset recovery and allowance
 * - setAssetManager() / transferOwnership() / renounceOwnership() — Admin
 * - transfer() / transferFrom() / approve() — The share token itself
 */

import { randomUUID } from "node:crypto";
import { VAULT_EVENTS } from "@swapvault/event-store";
import type {
  AssetManagerChangedPayload,
  BackendSetPayload,
  BackendSwappedPayload,
  Erc20SweptPayload,
  EventStore,
  FundsTransferredPayload,
  OwnershipTransferredPayload,
  TokensRedeemedPayload,
  TokensSuppliedPayload,
  VaultEventType,
  VaultInitializedPayload,
} from "@swapvault/event-store";
import { DEFAULT_PRECISION, MAX_UINT256, ShareLedger } from "@swapvault/ledger";
import type { LedgerSnapshot } from "@swapvault/ledger";
import { ReentrancyGuard } from "@swapvault/runtime";
import type { ExecutionEnvironment, FungibleToken, Journaled, YieldSource } from "@swapvault/runtime";
import { isZeroAddress, sameAddress } from "@swapvault/types";
import type { Address, DomainEvent } from "@swapvault/types";
import type { Logger } from "pino";
import { OwnerOrManager, requireCapability } from "./access-control.js";
import type { AccessState } from "./access-control.js";
import { classifyError, VaultError } from "./errors.js";
import {
  exchangeRateMantissa,
  precisionScale,
  sharesToToken,
  tokenToShares,
} from "./exchange-rate.js";
import type { RateInputs } from "./exchange-rate.js";
import { silentLogger } from "./logger.js";
import {
  ensureAllowance,
  MigrationStateMachine,
  probeBackend,
  redeemAll,
  resupplyAll,
  validateCompatible,
  validateReplacement,
} from "./migration.js";
import type { MigrationContext, MigrationPhase } from "./migration.js";
import type {
  SupplyReceipt,
  SwappableVaultInit,
  SwappableVaultOptions,
  VaultSnapshot,
} from "./types.js";

/** Everything the vault puts back on rollback. */
export interface VaultState {
  readonly shares: LedgerSnapshot;
  readonly backend: YieldSource;
  readonly phase: MigrationPhase;
  readonly access: AccessState;
}

export class SwappableVault implements FungibleToken, YieldSource, Journaled<VaultState> {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  private readonly _env: ExecutionEnvironment;
  private readonly _shares = new ShareLedger();
  private readonly _access: OwnerOrManager;
  private readonly _migration: MigrationStateMachine;
  private readonly _guard: ReentrancyGuard;
  private readonly _depositToken: FungibleToken;
  private readonly _scale: bigint;
  private readonly _logger: Logger;
  private readonly _events: EventStore | undefined;
  private readonly _newId: () => string;
  private _backend: YieldSource;
  private _correlationId: string | undefined;

  constructor(
    env: ExecutionEnvironment,
    init: SwappableVaultInit,
    options: SwappableVaultOptions = {},
  ) {
    const { backend, depositToken } = probeBackend(init.backend);
    if (!Number.isInteger(init.decimals) || init.decimals < 1 || init.decimals > 255) {
      throw new VaultError(
        "INVALID_ARGUMENT",
        `Share decimals must be an integer in 1..255, got ${String(init.decimals)}`,
      );
    }
    this._access = new OwnerOrManager(init.owner);

    this._env = env;
    this._backend = backend;
    this._depositToken = env.token(depositToken);
    this._scale = precisionScale(options.exchangeRatePrecision ?? DEFAULT_PRECISION);
    this.name = init.name;
    this.symbol = init.symbol;
    this.decimals = init.decimals;
    this.address = options.address ?? env.allocateAddress(`vault:${init.symbol}`);
    this._events = options.events;
    this._newId = options.idGenerator ?? randomUUID;
    this._logger = (options.logger ?? silentLogger()).child({ vault: this.address });
    this._guard = new ReentrancyGuard(this.address);
    this._migration = new MigrationStateMachine(this._logger);

    env.registerToken(this);
    env.register(this);

    this._emit(init.owner, VAULT_EVENTS.INITIALIZED, {
      backend: backend.address,
      depositToken: this._depositToken.address,
      decimals: this.decimals,
      symbol: this.symbol,
      name: this.name,
      owner: init.owner,
    } satisfies VaultInitializedPayload);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  /** Stream the vault's notifications are appended to. */
  get streamId(): string {
    return `vault:${this.address}`;
  }

  get yieldSource(): YieldSource {
    return this._backend;
  }

  get owner(): Address {
    return this._access.owner;
  }

  get assetManager(): Address {
    return this._access.assetManager;
  }

  get migrationPhase(): MigrationPhase {
    return this._migration.phase;
  }

  depositToken(): Address {
    return this._depositToken.address;
  }

  /** Tokens per share, scaled by 10^precision. */
  exchangeRate(): bigint {
    return exchangeRateMantissa(this._rateInputs(), this._scale);
  }

  /** Deposit-token value of `holder`'s shares. */
  balanceOfToken(holder: Address): bigint {
    return sharesToToken(this._shares.balanceOf(holder), this._rateInputs(), this._scale);
  }

  snapshot(): VaultSnapshot {
    const inputs = this._rateInputs();
    return {
      address: this.address,
      name: this.name,
      symbol: this.symbol,
      decimals: this.decimals,
      depositToken: this._depositToken.address,
      backend: this._backend.address,
      owner: this._access.owner,
      assetManager: this._access.assetManager,
      totalShares: inputs.totalShares.toString(),
      backendBalance: inputs.backendBalance.toString(),
      exchangeRate: exchangeRateMantissa(inputs, this._scale).toString(),
      migrationPhase: this._migration.phase,
      holders: this._shares.holders().map((h) => ({
        account: h.account,
        shares: h.balance.toString(),
      })),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Share Token
  // ───────────────────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this._shares.totalSupply();
  }

  balanceOf(holder: Address): bigint {
    return this._shares.balanceOf(holder);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._shares.allowance(owner, spender);
  }

  transfer(caller: Address, to: Address, amount: bigint): void {
    this._shares.transfer(caller, to, amount);
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this._env.atomic(() => {
      this._shares.spendAllowance(from, caller, amount);
      this._shares.transfer(from, to, amount);
    });
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this._shares.approve(caller, spender, amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposit / Withdraw
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pull `amount` deposit tokens from `caller`, mint shares to
   * `beneficiary` for what actually arrived, and forward it to the backend.
   */
  supplyTokenTo(caller: Address, amount: bigint, beneficiary: Address): SupplyReceipt {
    return this._execute("supplyTokenTo", caller, () => {
      assertAmount(amount);
      const inputs = this._rateInputs();

      const before = this._depositToken.balanceOf(this.address);
      this._depositToken.transferFrom(this.address, caller, this.address, amount);
      const received = this._depositToken.balanceOf(this.address) - before;

      const shares = tokenToShares(received, inputs, this._scale);
      if (amount > 0n && shares === 0n) {
        throw new VaultError(
          "SHARES_MUST_BE_NON_ZERO",
          `Supplying ${received.toString()} tokens would mint no shares`,
          { details: { amount: amount.toString(), received: received.toString() } },
        );
      }
      this._shares.mint(beneficiary, shares);

      if (received > 0n) {
        ensureAllowance(this._depositToken, this.address, this._backend.address, received);
        this._backend.supplyTokenTo(this.address, received, this.address);
      }

      this._logger.debug(
        { caller, beneficiary, received: received.toString(), shares: shares.toString() },
        "supplied",
      );
      this._emit(caller, VAULT_EVENTS.TOKENS_SUPPLIED, {
        from: caller,
        beneficiary,
        amount: received.toString(),
        shares: shares.toString(),
      } satisfies TokensSuppliedPayload);
      return { received, shares };
    });
  }

  /**
   * Burn the shares worth `amount` deposit tokens from `caller`, redeem
   * exactly `amount` from the backend and pay it out.
   *
   * @returns the amount paid to `caller`
   */
  redeemToken(caller: Address, amount: bigint): bigint {
    return this._execute("redeemToken", caller, () => {
      assertAmount(amount);
      const shares = tokenToShares(amount, this._rateInputs(), this._scale);
      if (amount > 0n && shares === 0n) {
        throw new VaultError(
          "SHARES_MUST_BE_NON_ZERO",
          `Redeeming ${amount.toString()} tokens would burn no shares`,
          { details: { amount: amount.toString() } },
        );
      }
      this._shares.burn(caller, shares);

      const before = this._depositToken.balanceOf(this.address);
      const reported = amount === 0n ? 0n : this._backend.redeemToken(this.address, amount);
      const received = this._depositToken.balanceOf(this.address) - before;

      if (reported !== amount || received !== reported) {
        throw new VaultError(
          "REDEEM_AMOUNT_MISMATCH",
          `Asked backend for ${amount.toString()}, it reported ${reported.toString()} and sent ${received.toString()}`,
          {
            details: {
              requested: amount.toString(),
              reported: reported.toString(),
              received: received.toString(),
            },
          },
        );
      }
      this._depositToken.transfer(this.address, caller, received);

      this._logger.debug(
        { caller, amount: received.toString(), shares: shares.toString() },
        "redeemed",
      );
      this._emit(caller, VAULT_EVENTS.TOKENS_REDEEMED, {
        redeemer: caller,
        amount: received.toString(),
        shares: shares.toString(),
      } satisfies TokensRedeemedPayload);
      return received;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Migration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move the whole pool into `candidate` and make it the active backend.
   *
   * @returns the old backend's balance for the vault before the move
   */
  swapYieldSource(caller: Address, candidate: YieldSource | null | undefined): bigint {
    return this._execute("swapYieldSource", caller, () => {
      requireCapability(this._access, caller, "swap the yield source");
      const ctx = this._migrationContext();
      const previous = this._backend;

      this._migration.transition("validating");
      const next = validateReplacement(ctx, previous, candidate);

      this._migration.transition("redeeming");
      const outcome = redeemAll(ctx, previous);

      this._migration.transition("resupplying");
      const resupplied = resupplyAll(ctx, next);

      this._commitBackend(next);
      this._migration.transition("stable");

      this._logger.info(
        {
          from: previous.address,
          to: next.address,
          redeemed: outcome.received.toString(),
          resupplied: resupplied.toString(),
        },
        "yield source swapped",
      );
      this._emit(caller, VAULT_EVENTS.FUNDS_TRANSFERRED, {
        fromBackend: previous.address,
        toBackend: next.address,
        amount: outcome.queried.toString(),
      } satisfies FundsTransferredPayload);
      this._emit(caller, VAULT_EVENTS.BACKEND_SWAPPED, {
        previousBackend: previous.address,
        newBackend: next.address,
        amount: outcome.queried.toString(),
      } satisfies BackendSwappedPayload);
      return outcome.queried;
    });
  }

  /**
   * Point the vault at `candidate` without moving any funds.
   */
  setYieldSource(caller: Address, candidate: YieldSource | null | undefined): void {
    this._execute("setYieldSource", caller, () => {
      requireCapability(this._access, caller, "set the yield source");
      const previous = this._backend;

      this._migration.transition("validating");
      const next = validateReplacement(this._migrationContext(), previous, candidate);
      this._commitBackend(next);
      this._migration.transition("stable");

      this._logger.info({ from: previous.address, to: next.address }, "yield source set");
      this._emit(caller, VAULT_EVENTS.BACKEND_SET, {
        previousBackend: previous.address,
        newBackend: next.address,
      } satisfies BackendSetPayload);
    });
  }

  /**
   * Redeem the vault's whole position in `from` and supply everything
   * the vault holds into `to`. The active backend pointer is untouched.
   *
   * @returns the `from` backend's balance for the vault before the move
   */
  transferFunds(
    caller: Address,
    from: YieldSource | null | undefined,
    to: YieldSource | null | undefined,
  ): bigint {
    return this._execute("transferFunds", caller, () => {
      requireCapability(this._access, caller, "transfer funds");
      const ctx = this._migrationContext();

      this._migration.transition("validating");
      const source = validateCompatible(ctx, from);
      const target = validateCompatible(ctx, to);
      if (sameAddress(source.address, target.address)) {
        throw new VaultError("SAME_BACKEND", `Cannot transfer funds from ${source.address} to itself`);
      }

      this._migration.transition("redeeming");
      const outcome = redeemAll(ctx, source);

      this._migration.transition("resupplying");
      resupplyAll(ctx, target);
      this._migration.transition("stable");

      this._emit(caller, VAULT_EVENTS.FUNDS_TRANSFERRED, {
        fromBackend: source.address,
        toBackend: target.address,
        amount: outcome.queried.toString(),
      } satisfies FundsTransferredPayload);
      return outcome.queried;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Asset Recovery
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Send a token the vault happens to hold to `to`. The active backend's
   * receipt token can never leave this way.
   */
  transferERC20(caller: Address, token: FungibleToken, to: Address, amount: bigint): void {
    this._execute("transferERC20", caller, () => {
      requireCapability(this._access, caller, "transfer tokens");
      if (sameAddress(token.address, this._backend.address)) {
        throw new VaultError(
          "YIELD_SOURCE_TOKEN_TRANSFER_NOT_ALLOWED",
          `Token ${token.address} is the active yield source's receipt token`,
        );
      }
      if (isZeroAddress(to)) {
        throw new VaultError("ZERO_ADDRESS", "Cannot transfer tokens to the zero address");
      }
      token.transfer(this.address, to, amount);

      this._emit(caller, VAULT_EVENTS.ERC20_SWEPT, {
        from: this.address,
        to,
        amount: amount.toString(),
        token: token.address,
      } satisfies Erc20SweptPayload);
    });
  }

  /**
   * Give the active backend an unlimited allowance over the vault's
   * deposit tokens.
   */
  approveMaxAmount(caller: Address): void {
    this._execute("approveMaxAmount", caller, () => {
      requireCapability(this._access, caller, "approve the yield source");
      this._depositToken.approve(this.address, this._backend.address, MAX_UINT256);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  setAssetManager(caller: Address, manager: Address): void {
    this._execute("setAssetManager", caller, () => {
      const previous = this._access.setAssetManager(caller, manager);
      this._emit(caller, VAULT_EVENTS.ASSET_MANAGER_CHANGED, {
        previousManager: previous,
        newManager: manager,
      } satisfies AssetManagerChangedPayload);
    });
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this._execute("transferOwnership", caller, () => {
      const previous = this._access.transferOwnership(caller, newOwner);
      this._emit(caller, VAULT_EVENTS.OWNERSHIP_TRANSFERRED, {
        previousOwner: previous,
        newOwner,
      } satisfies OwnershipTransferredPayload);
    });
  }

  renounceOwnership(caller: Address): void {
    this._execute("renounceOwnership", caller, () => {
      const previous = this._access.renounceOwnership(caller);
      this._emit(caller, VAULT_EVENTS.OWNERSHIP_TRANSFERRED, {
        previousOwner: previous,
        newOwner: this._access.owner,
      } satisfies OwnershipTransferredPayload);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Journaled
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): VaultState {
    return {
      shares: this._shares.snapshot(),
      backend: this._backend,
      phase: this._migration.phase,
      access: this._access.state(),
    };
  }

  restore(state: VaultState): void {
    this._shares.restore(state.shares);
    this._backend = state.backend;
    this._migration.load(state.phase);
    this._access.load(state.access);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run one operation atomically behind the reentrancy guard. Failures
   * are logged with their taxonomy and rethrown unchanged.
   */
  private _execute<T>(operation: string, caller: Address, fn: () => T): T {
    try {
      return this._env.atomic(() =>
        this._guard.run(operation, () => {
          this._correlationId = this._newId();
          try {
            return fn();
          } finally {
            this._correlationId = undefined;
          }
        }),
      );
    } catch (err) {
      const { kind, code, message } = classifyError(err);
      this._logger.warn({ operation, caller, kind, code }, message);
      throw err;
    }
  }

  private _rateInputs(): RateInputs {
    return {
      totalShares: this._shares.totalSupply(),
      backendBalance: this._backend.balanceOfToken(this.address),
    };
  }

  private _migrationContext(): MigrationContext {
    return { vault: this.address, depositToken: this._depositToken, logger: this._logger };
  }

  /** Switch the pointer and revoke the old backend's allowance. */
  private _commitBackend(next: YieldSource): void {
    const previous = this._backend;
    this._backend = next;
    this._depositToken.approve(this.address, previous.address, 0n);
  }

  /** Queue a notification for publication when the operation commits. */
  private _emit(
    actor: Address,
    type: VaultEventType,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    const events = this._events;
    if (events === undefined) {
      return;
    }
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: this._newId(),
        timestamp: this._env.now(),
        actor,
        correlationId: this._correlationId ?? this._newId(),
        source: "vault",
      },
      payload,
    };
    // Runs after commit: a failing store or subscriber is logged, never rethrown.
    this._env.afterCommit(() => {
      try {
        events.append(this.streamId, [event]);
      } catch (err) {
        this._logger.error(
          { err, type, eventId: event.metadata.eventId },
          "notification delivery failed",
        );
      }
    });
  }
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new VaultError("INVALID_ARGUMENT", `Amount must be non-negative, got ${amount.toString()}`);
  }
}
