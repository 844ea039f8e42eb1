/**
 * @swapvault/runtime — Reentrancy guard.
 */

import { RuntimeError } from "./errors.js";

/**
 * Rejects a guarded call made while another guarded call on the same
 * guard is still running, such as a backend calling back into the vault
 * in the middle of a supply.
 */
export class ReentrancyGuard {
  private _active: string | undefined;

  constructor(private readonly owner: string) {}

  get locked(): boolean {
    return this._active !== undefined;
  }

  run<T>(label: string, fn: () => T): T {
    if (this._active !== undefined) {
      throw new RuntimeError(
        "REENTRANT_CALL",
        `${label} called on ${this.owner} while ${this._active} is in progress`,
      );
    }
    this._active = label;
    try {
      return fn();
    } finally {
      this._active = undefined;
    }
  }
}
