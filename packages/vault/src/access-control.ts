/**
 * Access control.
 *
 * One owner and, optionally, one asset manager delegated by the owner.
 * Administrative calls (manager delegation, ownership) are owner-only;
 * fund-moving privileged calls accept either principal.
 */

import { isZeroAddress, sameAddress, ZERO_ADDRESS } from "@swapvault/types";
import type { Address } from "@swapvault/types";
import { VaultError } from "./errors.js";

/**
 * Answers the one question privileged entry points ask.
 */
export interface Authority {
  isOwnerOrManager(caller: Address): boolean;
}

export interface AccessState {
  readonly owner: Address;
  readonly assetManager: Address;
}

export class OwnerOrManager implements Authority {
  private _owner: Address;
  private _assetManager: Address = ZERO_ADDRESS;

  constructor(owner: Address) {
    if (isZeroAddress(owner)) {
      throw new VaultError("ZERO_ADDRESS", "Owner cannot be the zero address");
    }
    this._owner = owner;
  }

  get owner(): Address {
    return this._owner;
  }

  /** ZERO_ADDRESS when no manager is set. */
  get assetManager(): Address {
    return this._assetManager;
  }

  isOwner(caller: Address): boolean {
    return !isZeroAddress(this._owner) && sameAddress(caller, this._owner);
  }

  isOwnerOrManager(caller: Address): boolean {
    return (
      this.isOwner(caller) ||
      (!isZeroAddress(this._assetManager) && sameAddress(caller, this._assetManager))
    );
  }

  /** @returns the previous manager */
  setAssetManager(caller: Address, manager: Address): Address {
    this._requireOwner(caller);
    if (isZeroAddress(manager)) {
      throw new VaultError("ZERO_ADDRESS", "Asset manager cannot be the zero address");
    }
    const previous = this._assetManager;
    this._assetManager = manager;
    return previous;
  }

  /** @returns the previous owner */
  transferOwnership(caller: Address, newOwner: Address): Address {
    this._requireOwner(caller);
    if (isZeroAddress(newOwner)) {
      throw new VaultError("ZERO_ADDRESS", "New owner cannot be the zero address");
    }
    const previous = this._owner;
    this._owner = newOwner;
    return previous;
  }

  /**
   * Give up ownership for good. The asset manager keeps its privileges.
   *
   * @returns the previous owner
   */
  renounceOwnership(caller: Address): Address {
    this._requireOwner(caller);
    const previous = this._owner;
    this._owner = ZERO_ADDRESS;
    return previous;
  }

  // ─── State ───────────────────────────────────────────────────────────

  state(): AccessState {
    return { owner: this._owner, assetManager: this._assetManager };
  }

  load(state: AccessState): void {
    this._owner = state.owner;
    this._assetManager = state.assetManager;
  }

  private _requireOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw new VaultError("NOT_OWNER", `${caller} is not the owner`);
    }
  }
}

/**
 * The single check every privileged vault operation goes through.
 */
export function requireCapability(authority: Authority, caller: Address, action: string): void {
  if (!authority.isOwnerOrManager(caller)) {
    throw new VaultError("NOT_OWNER_OR_MANAGER", `${caller} may not ${action}`, {
      details: { caller, action },
    });
  }
}
