/**
 * @swapvault/runtime — Execution environment.
 *
 * The all-or-nothing execution model the vault relies on. Operations run
 * inside `atomic()`: if anything throws, every registered participant
 * (tokens, backends, vaults) is put back exactly as it was when the
 * frame opened, and no notification queued during the frame is published.
 *
 * Frames nest. An inner failure that the outer frame catches unwinds
 * only the inner frame. Commit hooks run once the outermost frame returns.
 */

import { createHash } from "node:crypto";
import { normalizeAddress } from "@swapvault/types";
import type { Address } from "@swapvault/types";
import { RuntimeError } from "./errors.js";
import type { FungibleToken, Journaled } from "./interfaces.js";

/** Restores one participant to a captured state. */
type Restorer = () => void;

/** Captures one participant's state. */
type Checkpointer = () => Restorer;

export interface ExecutionEnvironmentOptions {
  /** Source of event timestamps. Default: wall clock */
  readonly clock?: () => string;
}

export class ExecutionEnvironment {
  private readonly _participants: Checkpointer[] = [];
  private readonly _tokens = new Map<Address, FungibleToken>();
  private readonly _pendingHooks: Array<() => void> = [];
  private readonly _clock: () => string;
  private _depth = 0;
  private _nonce = 0;

  constructor(options: ExecutionEnvironmentOptions = {}) {
    this._clock = options.clock ?? (() => new Date().toISOString());
  }

  // ─── Participants ────────────────────────────────────────────────────

  /**
   * Enrol a participant in rollback. A participant registered inside an
   * open frame is only checkpointed by frames opened after it.
   */
  register<S>(participant: Journaled<S>): void {
    this._participants.push(() => {
      const state = participant.checkpoint();
      return () => participant.restore(state);
    });
  }

  /** Number of participants enrolled in rollback. */
  get participantCount(): number {
    return this._participants.length;
  }

  // ─── Atomic Execution ────────────────────────────────────────────────

  get inFrame(): boolean {
    return this._depth > 0;
  }

  /**
   * Run `fn` as one indivisible step.
   *
   * Every queued commit hook runs, even after one of them throws. Hook
   * failures surface afterwards as a single AggregateError; by then the
   * frame's effects are already kept.
   *
   * @throws RuntimeError ASYNC_OPERATION if `fn` returns a promise
   */
  atomic<T>(fn: () => T): T {
    const result = this._frame(fn);
    if (this._depth === 0) {
      this._flush();
    }
    return result;
  }

  /**
   * Run `hook` once the current operation commits. Outside a frame the
   * hook runs immediately.
   */
  afterCommit(hook: () => void): void {
    if (this._depth === 0) {
      hook();
      return;
    }
    this._pendingHooks.push(hook);
  }

  now(): string {
    return this._clock();
  }

  // ─── Addresses ───────────────────────────────────────────────────────

  /**
   * A fresh address derived from `label` and a per-environment nonce.
   */
  allocateAddress(label: string): Address {
    this._nonce += 1;
    const digest = createHash("sha256").update(`${label}:${String(this._nonce)}`).digest("hex");
    return `0x${digest.slice(0, 40)}`;
  }

  // ─── Token Registry ──────────────────────────────────────────────────

  registerToken(token: FungibleToken): void {
    const key = normalizeAddress(token.address);
    if (this._tokens.has(key)) {
      throw new RuntimeError("DUPLICATE_REGISTRATION", `Token already registered at ${key}`);
    }
    this._tokens.set(key, token);
  }

  hasToken(address: Address): boolean {
    return this._tokens.has(normalizeAddress(address));
  }

  /**
   * @throws RuntimeError UNKNOWN_TOKEN if nothing is registered at `address`
   */
  token(address: Address): FungibleToken {
    const token = this._tokens.get(normalizeAddress(address));
    if (token === undefined) {
      throw new RuntimeError("UNKNOWN_TOKEN", `No token registered at ${normalizeAddress(address)}`);
    }
    return token;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _frame<T>(fn: () => T): T {
    const restorers = this._participants.map((take) => take());
    const hookMark = this._pendingHooks.length;
    this._depth += 1;

    try {
      const result = fn();
      if (isThenable(result)) {
        throw new RuntimeError("ASYNC_OPERATION", "Atomic operations must be synchronous");
      }
      return result;
    } catch (err) {
      for (const restore of restorers.reverse()) {
        restore();
      }
      this._pendingHooks.length = hookMark;
      throw err;
    } finally {
      this._depth -= 1;
    }
  }

  private _flush(): void {
    const hooks = this._pendingHooks.splice(0);
    const failures: unknown[] = [];
    for (const hook of hooks) {
      try {
        hook();
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(
        failures,
        `${String(failures.length)} commit hook(s) failed; the operation itself committed`,
      );
    }
  }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
