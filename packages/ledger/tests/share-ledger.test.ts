/**
 * Tests for the share ledger.
 *
 * Covers:
 * - Mint / burn / transfer and supply accounting
 * - Allowances, including the infinite allowance
 * - Zero-address and negative-amount rejection
 * - Snapshot / restore
 * - Conservation check
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ZERO_ADDRESS } from "@swapvault/types";
import { ShareLedger } from "../src/share-ledger.js";
import { MAX_UINT256 } from "../src/fixed-point.js";
import { LedgerError } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function addr(n: number): string {
  return `0x${n.toString(16).padStart(40, "0")}`;
}

const ALICE = addr(0xa11ce);
const BOB = addr(0xb0b);
const CAROL = addr(0xca401);

function expectLedgerError(fn: () => void, code: string): void {
  try {
    fn();
    expect.unreachable("should have thrown");
  } catch (e) {
    expect(e).toBeInstanceOf(LedgerError);
    expect(e).toMatchObject({ code });
  }
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("ShareLedger", () => {
  let ledger: ShareLedger;

  beforeEach(() => {
    ledger = new ShareLedger();
  });

  describe("reads", () => {
    it("starts empty", () => {
      expect(ledger.totalSupply()).toBe(0n);
      expect(ledger.balanceOf(ALICE)).toBe(0n);
      expect(ledger.holders()).toEqual([]);
    });

    it("compares addresses case-insensitively", () => {
      ledger.mint("0x00000000000000000000000000000000000A11CE", 5n);
      expect(ledger.balanceOf("0x00000000000000000000000000000000000a11ce")).toBe(5n);
    });
  });

  describe("mint / burn", () => {
    it("mint increases balance and supply", () => {
      ledger.mint(ALICE, 100n);
      ledger.mint(BOB, 50n);
      expect(ledger.balanceOf(ALICE)).toBe(100n);
      expect(ledger.totalSupply()).toBe(150n);
    });

    it("burn decreases balance and supply", () => {
      ledger.mint(ALICE, 100n);
      ledger.burn(ALICE, 40n);
      expect(ledger.balanceOf(ALICE)).toBe(60n);
      expect(ledger.totalSupply()).toBe(60n);
    });

    it("burning more than the balance fails", () => {
      ledger.mint(ALICE, 10n);
      expectLedgerError(() => ledger.burn(ALICE, 11n), "INSUFFICIENT_BALANCE");
      expect(ledger.balanceOf(ALICE)).toBe(10n);
    });

    it("rejects negative amounts", () => {
      expectLedgerError(() => ledger.mint(ALICE, -1n), "INVALID_AMOUNT");
    });

    it("rejects the zero address", () => {
      expectLedgerError(() => ledger.mint(ZERO_ADDRESS, 1n), "INVALID_ACCOUNT");
    });

    it("allows zero-amount operations", () => {
      ledger.mint(ALICE, 0n);
      ledger.burn(ALICE, 0n);
      expect(ledger.totalSupply()).toBe(0n);
    });
  });

  describe("transfer", () => {
    it("moves shares without changing supply", () => {
      ledger.mint(ALICE, 100n);
      ledger.transfer(ALICE, BOB, 30n);
      expect(ledger.balanceOf(ALICE)).toBe(70n);
      expect(ledger.balanceOf(BOB)).toBe(30n);
      expect(ledger.totalSupply()).toBe(100n);
    });

    it("self-transfer leaves balances unchanged", () => {
      ledger.mint(ALICE, 100n);
      ledger.transfer(ALICE, ALICE, 100n);
      expect(ledger.balanceOf(ALICE)).toBe(100n);
    });

    it("fails when the sender is short", () => {
      ledger.mint(ALICE, 1n);
      expectLedgerError(() => ledger.transfer(ALICE, BOB, 2n), "INSUFFICIENT_BALANCE");
    });

    it("rejects transfer to the zero address", () => {
      ledger.mint(ALICE, 1n);
      expectLedgerError(() => ledger.transfer(ALICE, ZERO_ADDRESS, 1n), "INVALID_ACCOUNT");
    });
  });

  describe("allowances", () => {
    it("approve sets and overwrites", () => {
      ledger.approve(ALICE, BOB, 10n);
      expect(ledger.allowance(ALICE, BOB)).toBe(10n);
      ledger.approve(ALICE, BOB, 3n);
      expect(ledger.allowance(ALICE, BOB)).toBe(3n);
      expect(ledger.allowance(BOB, ALICE)).toBe(0n);
    });

    it("spendAllowance decrements", () => {
      ledger.approve(ALICE, BOB, 10n);
      ledger.spendAllowance(ALICE, BOB, 4n);
      expect(ledger.allowance(ALICE, BOB)).toBe(6n);
    });

    it("spending beyond the allowance fails", () => {
      ledger.approve(ALICE, BOB, 10n);
      expectLedgerError(() => ledger.spendAllowance(ALICE, BOB, 11n), "INSUFFICIENT_ALLOWANCE");
      expect(ledger.allowance(ALICE, BOB)).toBe(10n);
    });

    it("MAX_UINT256 is never decremented", () => {
      ledger.approve(ALICE, BOB, MAX_UINT256);
      ledger.spendAllowance(ALICE, BOB, 1_000n);
      expect(ledger.allowance(ALICE, BOB)).toBe(MAX_UINT256);
    });
  });

  describe("holders", () => {
    it("lists non-zero balances in first-credit order", () => {
      ledger.mint(BOB, 1n);
      ledger.mint(ALICE, 2n);
      ledger.mint(CAROL, 3n);
      ledger.burn(ALICE, 2n);
      expect(ledger.holders()).toEqual([
        { account: BOB, balance: 1n },
        { account: CAROL, balance: 3n },
      ]);
    });
  });

  describe("snapshot / restore", () => {
    it("restores balances, allowances and supply", () => {
      ledger.mint(ALICE, 100n);
      ledger.approve(ALICE, BOB, 7n);
      const snap = ledger.snapshot();

      ledger.transfer(ALICE, BOB, 50n);
      ledger.mint(CAROL, 5n);
      ledger.approve(ALICE, BOB, 0n);

      ledger.restore(snap);
      expect(ledger.balanceOf(ALICE)).toBe(100n);
      expect(ledger.balanceOf(BOB)).toBe(0n);
      expect(ledger.balanceOf(CAROL)).toBe(0n);
      expect(ledger.allowance(ALICE, BOB)).toBe(7n);
      expect(ledger.totalSupply()).toBe(100n);
    });

    it("snapshots are not affected by later mutations", () => {
      ledger.mint(ALICE, 1n);
      const snap = ledger.snapshot();
      ledger.mint(ALICE, 1n);
      expect(snap.balances.get(ALICE)).toBe(1n);
      expect(snap.totalSupply).toBe(1n);
    });

    it("fromSnapshot builds an equivalent ledger", () => {
      ledger.mint(ALICE, 9n);
      const copy = ShareLedger.fromSnapshot(ledger.snapshot());
      expect(copy.balanceOf(ALICE)).toBe(9n);
      expect(copy.totalSupply()).toBe(9n);
    });

    it("fromSnapshot rejects an unbalanced snapshot", () => {
      expectLedgerError(
        () =>
          ShareLedger.fromSnapshot({
            totalSupply: 10n,
            balances: new Map([[ALICE, 9n]]),
            allowances: [],
          }),
        "CONSERVATION_VIOLATED",
      );
    });
  });
});
