#!/usr/bin/env node
/**
 * @sharepool/demo: Interactive CLI walkthrough.
 *
 * Runs a splitter end to end in your terminal:
 * boot -> initialize -> deposit -> release -> fees -> reimburse ->
 * refused calls -> notification log -> custody journal
 *
 * Uses real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import type { Identity, Money } from "@sharepool/types";
import { CUSTODY_ACCOUNT_ID, Journal, JournalTransfer } from "@sharepool/ledger";
import { createSplitterCatalog, InMemoryEventStore } from "@sharepool/event-store";
import { PaymentSplitter, SplitterError } from "@sharepool/splitter";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;
const CURRENCY = "USDC";
const DECIMALS = 6;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function usdc(amount: string): Money {
  return { amount, currency: CURRENCY, decimals: DECIMALS };
}

function fmt(money: Money): string {
  return `${money.amount} ${money.currency}`;
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    SHAREPOOL DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Proportional payouts from one shared pool         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${String(step)}/${String(total)}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
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

function refused(label: string, fn: () => unknown): void {
  try {
    fn();
    console.log(chalk.red("    ✗ ") + chalk.white(`${label}: unexpectedly succeeded`));
  } catch (err) {
    if (!(err instanceof SplitterError)) {
      throw err;
    }
    console.log(chalk.yellow("    ! ") + chalk.white(label.padEnd(34)) + chalk.yellow(err.code));
  }
}

const TOTAL_STEPS = 8;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of one payment splitter."));
  console.log(chalk.gray("  Every step uses real domain packages, no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const custody = new JournalTransfer(new Journal(CURRENCY, DECIMALS));
  ok(`Custody journal opened (${CURRENCY}, ${String(DECIMALS)} decimals)`);

  const eventStore = new InMemoryEventStore({ catalog: createSplitterCatalog() });
  ok("Notification log ready (hash-chained, catalog-validated)");

  const owner: Identity = "studio";
  const splitter = new PaymentSplitter({
    id: "album-royalties",
    currency: CURRENCY,
    decimals: DECIMALS,
    owner,
    transfer: custody,
    eventStore,
  });
  ok(`Splitter "${splitter.id}" created (owner: ${owner})`);

  const deposit = (from: Identity, amount: Money): void => {
    splitter.denomination.positiveUnits(amount);
    custody.deposit(from, amount);
    const result = splitter.receive(from, amount);
    ok(`${from} deposited ${fmt(result.amount)}`);
    info("Pool balance", fmt(result.poolBalance));
  };

  await sleep(DELAY_MS);

  // ─── Step 2: Initialize ─────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Register payees");

  const payees = splitter.initialize(owner, ["alice", "bob"], [1, 3]);
  for (const payee of payees) {
    ok(`${payee.identity} holds ${String(payee.shares)}/${String(splitter.totalShares())} shares`);
  }

  await sleep(DELAY_MS);

  // ─── Step 3: Deposit ────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Deposit");

  deposit("label", usdc("100"));
  info("alice pending", fmt(splitter.pendingPayment("alice")));
  info("bob pending", fmt(splitter.pendingPayment("bob")));

  await sleep(DELAY_MS);

  // ─── Step 4: Release ────────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Release");

  for (const payee of ["alice", "bob"]) {
    const release = splitter.release(payee, payee);
    ok(`${release.to} withdrew ${fmt(release.amount)}`);
    info("Reference", release.reference);
  }
  info("Total released", fmt(splitter.totalReleased()));
  info("Pool balance", fmt(splitter.poolBalance()));

  await sleep(DELAY_MS);

  // ─── Step 5: Investor fees ──────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Investor fees");

  const record = splitter.addProjectFees(owner, "backer", usdc("40"));
  ok(`${record.identity} is owed ${fmt(record.feeOwed)}`);
  deposit("label", usdc("40"));

  await sleep(DELAY_MS);

  // ─── Step 6: Reimburse ──────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Reimburse");

  for (const paid of splitter.reimburseProjectFees(owner)) {
    ok(`${paid.investor} reimbursed ${fmt(paid.amount)}`);
  }
  info("Fee pool", fmt(splitter.feePoolTotal()));
  info("Pool balance", fmt(splitter.poolBalance()));

  await sleep(DELAY_MS);

  // ─── Step 7: Refused calls ──────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Refused calls");

  refused("bob releases for alice", () => splitter.release("bob", "alice"));
  refused("second initialize", () => splitter.initialize(owner, ["carol"], [1]));
  refused("alice releases with nothing due", () => splitter.release("alice", "alice"));
  refused("reimburse with no fees owed", () => splitter.reimburseProjectFees(owner));
  refused("bob adds fees", () => splitter.addProjectFees("bob", "bob", usdc("1")));

  await sleep(DELAY_MS);

  // ─── Step 8: Audit ──────────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Audit");

  const events = eventStore.read(splitter.streamId);
  ok(`${String(events.length)} notifications recorded`);
  for (const stored of events) {
    info(`v${String(stored.version)}`, stored.event.type);
  }

  const integrity = eventStore.verifyIntegrity();
  if (integrity.valid) {
    ok(`Hash chain verified through position ${String(integrity.lastVerifiedPosition)}`);
  } else {
    console.log(chalk.red("    ✗ ") + chalk.white(`${String(integrity.errors.length)} integrity errors`));
  }
  const head = events[events.length - 1];
  if (head !== undefined) {
    hashLine("Head hash", head.hash);
  }

  const custodyBalance = custody.journal.balance(CUSTODY_ACCOUNT_ID);
  info("Custody", `${String(custodyBalance.units)} base units`);
  info("Paid to alice", `${String(custody.paidTo("alice"))} base units`);
  info("Paid to bob", `${String(custody.paidTo("bob"))} base units`);
  info("Paid to backer", `${String(custody.paidTo("backer"))} base units`);

  console.log();
  console.log(chalk.green.bold("  Demo complete."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("Demo failed:"), err);
  process.exit(1);
});
