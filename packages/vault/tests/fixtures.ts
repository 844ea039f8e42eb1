/**
 * Shared fixtures for vault tests: principals, a wired-up environment and
 * misbehaving backends.
 */

import { expect, vi } from "vitest";
import { InMemoryEventStore } from "@swapvault/event-store";
import { ExecutionEnvironment, InMemoryToken, InMemoryYieldSource } from "@swapvault/runtime";
import type { Address } from "@swapvault/types";
import { pino } from "pino";
import type { Logger } from "pino";
import { SwappableVault } from "../src/swappable-vault.js";
import type { SwappableVaultOptions } from "../src/types.js";

// =============================================================================
// Principals
// =============================================================================

export function addr(n: number): Address {
  return `0x${n.toString(16).padStart(40, "0")}`;
}

export const OWNER = addr(0x0a);
export const MANAGER = addr(0x0b);
export const ALICE = addr(0xa11ce);
export const BOB = addr(0xb0b);

export const CLOCK = (): string => "2025-01-01T00:00:00.000Z";

/**
 * Run `fn`, expecting it to throw an error carrying `code`.
 *
 * @returns the caught error
 */
export function expectCode(fn: () => unknown, code: string): unknown {
  try {
    fn();
  } catch (e) {
    expect(e).toMatchObject({ code });
    return e;
  }
  return expect.unreachable(`expected ${code}`);
}

// =============================================================================
// Environment
// =============================================================================

export interface Fixture<B extends InMemoryYieldSource = InMemoryYieldSource> {
  readonly env: ExecutionEnvironment;
  readonly dai: InMemoryToken;
  readonly backend: B;
  readonly events: InMemoryEventStore;
  readonly vault: SwappableVault;
}

export interface FixtureOptions {
  readonly transferFeeBps?: number;
  readonly vault?: SwappableVaultOptions;
}

/**
 * A vault over the backend `makeBackend` builds. ALICE and BOB each hold
 * 1000 DAI and have approved the vault for all of it.
 */
export function setupWith<B extends InMemoryYieldSource>(
  makeBackend: (env: ExecutionEnvironment, dai: InMemoryToken) => B,
  options: FixtureOptions = {},
): Fixture<B> {
  const env = new ExecutionEnvironment({ clock: CLOCK });
  const dai = new InMemoryToken(env, { symbol: "DAI", transferFeeBps: options.transferFeeBps ?? 0 });
  const backend = makeBackend(env, dai);
  const events = new InMemoryEventStore({ clock: CLOCK });
  const vault = new SwappableVault(
    env,
    { backend, owner: OWNER, name: "Swappable DAI", symbol: "swDAI", decimals: 18 },
    { events, ...options.vault },
  );
  for (const holder of [ALICE, BOB]) {
    dai.mint(holder, 1000n);
    dai.approve(holder, vault.address, 1000n);
  }
  return { env, dai, backend, events, vault };
}

/** A vault over a plain in-memory backend labelled "backend-a". */
export function setup(options: FixtureOptions = {}): Fixture {
  return setupWith((env, dai) => new InMemoryYieldSource(env, dai, { label: "backend-a" }), options);
}

/** Sequential IDs: id-1, id-2, ... */
export function sequentialIds(): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `id-${String(n)}`;
  };
}

export function eventTypes(f: Fixture): string[] {
  return f.events.read(f.vault.streamId).map((e) => e.event.type);
}

// =============================================================================
// Log capture
// =============================================================================

export interface CapturedLogs {
  readonly logger: Logger;
  lines(): Array<Record<string, unknown>>;
}

/**
 * A real pino logger writing JSON lines into memory.
 */
export function captureLogs(level = "debug"): CapturedLogs {
  const write = vi.fn((_line: string) => undefined);
  const logger = pino({ level }, { write });
  return {
    logger,
    lines: () =>
      write.mock.calls.map(([line]) => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === "object" && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
      }),
  };
}

// =============================================================================
// Misbehaving backends
// =============================================================================

/** Reports one token more than it actually sends. */
export class OverReportingYieldSource extends InMemoryYieldSource {
  override redeemToken(caller: Address, amount: bigint): bigint {
    return super.redeemToken(caller, amount) + 1n;
  }
}

/** Calls back into a vault in the middle of a supply. */
export class ReentrantYieldSource extends InMemoryYieldSource {
  target: SwappableVault | undefined;

  override supplyTokenTo(caller: Address, amount: bigint, beneficiary: Address): void {
    super.supplyTokenTo(caller, amount, beneficiary);
    this.target?.redeemToken(ALICE, 1n);
  }
}

/** A deposit-token probe that throws. */
export class BrokenProbeYieldSource extends InMemoryYieldSource {
  override depositToken(): Address {
    throw new Error("probe failed");
  }
}

/** A deposit-token probe that answers with a fixed value. */
export class FixedProbeYieldSource extends InMemoryYieldSource {
  answer: Address = "not-an-address";

  override depositToken(): Address {
    return this.answer;
  }
}
