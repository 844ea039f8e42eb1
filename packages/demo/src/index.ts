#!/usr/bin/env node
/**
 * @swapvault/demo — Interactive CLI walkthrough.
 *
 * Runs one vault's life in your terminal:
 * boot -> deposit -> accrue yield -> swap backend -> redeem ->
 * refused call -> event log -> summary
 *
 * Uses the real packages over the in-memory runtime.
 */

import chalk from "chalk";
import { InMemoryEventStore } from "@swapvault/event-store";
import { formatUnits, parseUnits } from "@swapvault/ledger";
import { ExecutionEnvironment, InMemoryToken, InMemoryYieldSource } from "@swapvault/runtime";
import type { Address } from "@swapvault/types";
import { classifyError, createLogger, loadConfig, SwappableVault } from "@swapvault/vault";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function principal(n: number): Address {
  return `0x${n.toString(16).padStart(40, "0")}`;
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                   SWAPPABLE VAULT DEMO                   ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Shares stay put while the backend moves         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(50 - title.length));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

const TOTAL_STEPS = 8;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const DECIMALS = 18;
  const dai = (amount: string): bigint => parseUnits(amount, DECIMALS);
  const fmt = (amount: bigint): string => `${formatUnits(amount, DECIMALS)} DAI`;

  banner();
  console.log(chalk.gray("  Walk-through of a vault moving between two yield sources."));
  console.log(chalk.gray("  Every step uses the real vault — no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const OWNER = principal(0x0a);
  const ALICE = principal(0xa11ce);
  const BOB = principal(0xb0b);

  const env = new ExecutionEnvironment();
  const token = new InMemoryToken(env, { symbol: "DAI", name: "Dai Stablecoin", decimals: DECIMALS });
  const poolA = new InMemoryYieldSource(env, token, { label: "pool-a" });
  const poolB = new InMemoryYieldSource(env, token, { label: "pool-b", exitFeeBps: 10 });
  const events = new InMemoryEventStore();
  ok("Runtime initialized (DAI, pool A, pool B)");

  const vault = new SwappableVault(
    env,
    { backend: poolA, owner: OWNER, name: "Swappable DAI", symbol: "swDAI", decimals: config.SHARE_DECIMALS },
    { logger, events, exchangeRatePrecision: config.EXCHANGE_RATE_PRECISION },
  );
  ok(`Vault initialized (owner: ${OWNER.slice(0, 10)}...)`);
  info("address", vault.address);
  info("backend", poolA.address);

  await sleep(DELAY_MS);

  // ─── Step 2: Deposit ────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Deposit");

  for (const [who, amount] of [
    [ALICE, dai("1000")],
    [BOB, dai("500")],
  ] as const) {
    token.mint(who, amount);
    token.approve(who, vault.address, amount);
    const receipt = vault.supplyTokenTo(who, amount, who);
    ok(`${who.slice(0, 10)}... supplied ${fmt(receipt.received)} for ${formatUnits(receipt.shares, DECIMALS)} swDAI`);
  }
  info("total shares", formatUnits(vault.totalSupply(), DECIMALS));

  await sleep(DELAY_MS);

  // ─── Step 3: Accrue Yield ───────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Accrue Yield");

  poolA.accrueYield(dai("150"));
  ok(`Pool A earned ${fmt(dai("150"))}`);
  info("exchange rate", formatUnits(vault.exchangeRate(), config.EXCHANGE_RATE_PRECISION));
  info("alice", fmt(vault.balanceOfToken(ALICE)));
  info("bob", fmt(vault.balanceOfToken(BOB)));

  await sleep(DELAY_MS);

  // ─── Step 4: Swap Backend ───────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Swap Backend");

  const moved = vault.swapYieldSource(OWNER, poolB);
  ok(`Moved ${fmt(moved)} from pool A to pool B`);
  info("backend", vault.yieldSource.address);
  info("pool A holds", fmt(poolA.holdings()));
  info("pool B holds", fmt(poolB.holdings()));
  info("alice shares", formatUnits(vault.balanceOf(ALICE), DECIMALS));

  await sleep(DELAY_MS);

  // ─── Step 5: Redeem ─────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Redeem");

  // Pool B withholds an exit fee, which the vault refuses to absorb
  const wanted = vault.balanceOfToken(ALICE) / 2n;
  try {
    vault.redeemToken(ALICE, wanted);
    ok(`Alice redeemed ${fmt(wanted)}`);
  } catch (err) {
    const { kind, code } = classifyError(err);
    warn(`Redeem refused: ${code} (${kind})`);
    info("alice shares", `${formatUnits(vault.balanceOf(ALICE), DECIMALS)} (unchanged)`);
  }

  vault.swapYieldSource(OWNER, poolA);
  ok("Swapped back to pool A");
  const redeemed = vault.redeemToken(ALICE, wanted);
  ok(`Alice redeemed ${fmt(redeemed)}`);
  info("alice wallet", fmt(token.balanceOf(ALICE)));

  await sleep(DELAY_MS);

  // ─── Step 6: Refused Call ───────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Refused Call");

  try {
    vault.swapYieldSource(BOB, poolB);
    warn("Unexpected: swap by a depositor succeeded");
  } catch (err) {
    const { kind, code, message } = classifyError(err);
    ok(`Swap by bob refused: ${code} (${kind})`);
    info("message", message);
  }
  info("backend", `${vault.yieldSource.address} (unchanged)`);

  await sleep(DELAY_MS);

  // ─── Step 7: Event Log ──────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Event Log");

  const stored = events.read(vault.streamId);
  for (const se of stored) {
    const line = JSON.stringify({ v: se.version, type: se.event.type, hash: `${se.hash.slice(0, 12)}...` });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }
  const integrity = events.verifyIntegrity();
  if (integrity.valid) {
    ok("Hash chain intact");
  } else {
    warn(`Hash chain broken at ${String(integrity.errors[0]?.position)}`);
  }
  const last = stored.at(-1);
  if (last !== undefined) {
    hashLine("head", last.hash);
  }

  await sleep(DELAY_MS);

  // ─── Step 8: Summary ────────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Summary");

  const snapshot = vault.snapshot();
  console.log();
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(stored.length)));
  console.log(chalk.white("    Total shares:        ") + chalk.cyan.bold(formatUnits(BigInt(snapshot.totalShares), DECIMALS)));
  console.log(chalk.white("    Backend balance:     ") + chalk.cyan.bold(fmt(BigInt(snapshot.backendBalance))));
  console.log(chalk.white("    Holders:             ") + chalk.cyan.bold(String(snapshot.holders.length)));
  console.log(chalk.white("    Migration phase:     ") + chalk.cyan.bold(snapshot.migrationPhase));
  console.log();
  console.log(chalk.gray("    Depositors kept their shares through every swap;"));
  console.log(chalk.gray("    only the backend underneath them changed."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
