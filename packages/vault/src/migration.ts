/**
 * Backend Migration Protocol.
 *
 * Moving the pool from one backend to another runs through four phases:
 *
 *   stable → validating → redeeming → resupplying → stable
 *
 * and the pointer-only change takes the short path
 *
 *   stable → validating → stable
 *
 * Each step below is a plain function over a MigrationContext so that the
 * vault can compose them into its three migration operations. None of
 * them catches a failure: the vault's atomic frame unwinds the whole
 * operation, phase included.
 */

import { isAddress, isZeroAddress, sameAddress } from "@swapvault/types";
import type { Address } from "@swapvault/types";
import type { FungibleToken, YieldSource } from "@swapvault/runtime";
import type { Logger } from "pino";
import { VaultError } from "./errors.js";

// =============================================================================
// Phases
// =============================================================================

export type MigrationPhase = "stable" | "validating" | "redeeming" | "resupplying";

const VALID_TRANSITIONS: Record<MigrationPhase, readonly MigrationPhase[]> = {
  stable: ["validating"],
  validating: ["redeeming", "stable"],
  redeeming: ["resupplying"],
  resupplying: ["stable"],
};

export class MigrationStateMachine {
  private _phase: MigrationPhase = "stable";

  constructor(private readonly logger: Logger) {}

  get phase(): MigrationPhase {
    return this._phase;
  }

  transition(to: MigrationPhase): void {
    const allowed = VALID_TRANSITIONS[this._phase];
    if (!allowed.includes(to)) {
      throw new VaultError(
        "INVALID_MIGRATION_TRANSITION",
        `Cannot move migration from '${this._phase}' to '${to}'`,
        { details: { from: this._phase, to } },
      );
    }
    this.logger.info({ from: this._phase, to }, "migration phase");
    this._phase = to;
  }

  /** Put the phase back after a rollback. */
  load(phase: MigrationPhase): void {
    this._phase = phase;
  }
}

// =============================================================================
// Context
// =============================================================================

export interface MigrationContext {
  /** The vault: holder of backend positions and custodied tokens */
  readonly vault: Address;
  readonly depositToken: FungibleToken;
  readonly logger: Logger;
}

// =============================================================================
// Validate
// =============================================================================

export interface ProbedBackend {
  readonly backend: YieldSource;
  /** The deposit token the backend reports */
  readonly depositToken: Address;
}

/**
 * Ask a candidate backend for its deposit token.
 *
 * @throws VaultError INVALID_BACKEND for an absent backend, a zero or
 * malformed address, a probe that throws, or a malformed or zero answer
 */
export function probeBackend(candidate: YieldSource | null | undefined): ProbedBackend {
  if (candidate === null || candidate === undefined) {
    throw new VaultError("INVALID_BACKEND", "Backend is required");
  }
  if (!isAddress(candidate.address) || isZeroAddress(candidate.address)) {
    throw new VaultError("INVALID_BACKEND", `Backend address "${String(candidate.address)}" is not usable`);
  }

  let reported: unknown;
  try {
    reported = candidate.depositToken();
  } catch (cause) {
    throw new VaultError("INVALID_BACKEND", `Backend ${candidate.address} failed the deposit-token probe`, {
      details: { backend: candidate.address },
      cause,
    });
  }

  if (!isAddress(reported) || isZeroAddress(reported)) {
    throw new VaultError(
      "INVALID_BACKEND",
      `Backend ${candidate.address} reported an invalid deposit token: ${String(reported)}`,
      { details: { backend: candidate.address } },
    );
  }
  return { backend: candidate, depositToken: reported };
}

function assertCompatible(ctx: MigrationContext, probed: ProbedBackend): YieldSource {
  const { backend, depositToken } = probed;
  if (!sameAddress(depositToken, ctx.depositToken.address)) {
    throw new VaultError(
      "INCOMPATIBLE_DEPOSIT_TOKEN",
      `Backend ${backend.address} accepts ${depositToken}, vault accepts ${ctx.depositToken.address}`,
      { details: { backend: backend.address, expected: ctx.depositToken.address, actual: depositToken } },
    );
  }
  return backend;
}

/**
 * Probe `candidate` and check it accepts the vault's deposit token.
 */
export function validateCompatible(
  ctx: MigrationContext,
  candidate: YieldSource | null | undefined,
): YieldSource {
  return assertCompatible(ctx, probeBackend(candidate));
}

/**
 * Check that `candidate` can replace `current`.
 */
export function validateReplacement(
  ctx: MigrationContext,
  current: YieldSource,
  candidate: YieldSource | null | undefined,
): YieldSource {
  const probed = probeBackend(candidate);
  if (sameAddress(probed.backend.address, current.address)) {
    throw new VaultError("SAME_BACKEND", `Backend ${probed.backend.address} is already active`);
  }
  return assertCompatible(ctx, probed);
}

// =============================================================================
// Redeem
// =============================================================================

export interface RedeemOutcome {
  /** Backend's reported balance for the vault before redeeming */
  readonly queried: bigint;
  /** What the backend said it sent */
  readonly reported: bigint;
  /** What the vault's balance actually rose by */
  readonly received: bigint;
}

/**
 * Redeem the vault's whole position in `backend`.
 *
 * Exit fees and surplus are tolerated; receiving less than the backend
 * claims to have sent is not.
 */
export function redeemAll(ctx: MigrationContext, backend: YieldSource): RedeemOutcome {
  const queried = backend.balanceOfToken(ctx.vault);
  const before = ctx.depositToken.balanceOf(ctx.vault);
  const reported = queried === 0n ? 0n : backend.redeemToken(ctx.vault, queried);
  const received = ctx.depositToken.balanceOf(ctx.vault) - before;

  if (received < reported) {
    throw new VaultError(
      "TRANSFER_AMOUNT_INFERIOR",
      `Backend ${backend.address} reported ${reported.toString()} but the vault received ${received.toString()}`,
      {
        details: {
          backend: backend.address,
          reported: reported.toString(),
          received: received.toString(),
        },
      },
    );
  }
  if (reported < queried) {
    ctx.logger.warn(
      { backend: backend.address, queried: queried.toString(), reported: reported.toString() },
      "backend withheld part of the redemption",
    );
  }
  if (received > reported) {
    ctx.logger.info(
      { backend: backend.address, surplus: (received - reported).toString() },
      "redemption returned more than reported",
    );
  }
  return { queried, reported, received };
}

// =============================================================================
// Resupply
// =============================================================================

/**
 * Raise `spender`'s allowance over `owner`'s tokens to at least `amount`.
 */
export function ensureAllowance(
  token: FungibleToken,
  owner: Address,
  spender: Address,
  amount: bigint,
): void {
  if (token.allowance(owner, spender) < amount) {
    token.approve(owner, spender, amount);
  }
}

/**
 * Supply every deposit token the vault holds into `backend`.
 *
 * @returns the amount supplied (0 skips the backend call)
 */
export function resupplyAll(ctx: MigrationContext, backend: YieldSource): bigint {
  const amount = ctx.depositToken.balanceOf(ctx.vault);
  if (amount === 0n) {
    return 0n;
  }
  ensureAllowance(ctx.depositToken, ctx.vault, backend.address, amount);
  backend.supplyTokenTo(ctx.vault, amount, ctx.vault);
  return amount;
}
