#!/usr/bin/env node
/**
 * @subledger/demo — Interactive CLI walkthrough.
 *
 * Runs one subscription through its whole life in your terminal:
 * register providers -> subscribe -> accrue -> withdraw -> change fee ->
 * top up -> cancel -> verify journal
 *
 * Uses the service layer directly (no HTTP server).
 */

import chalk from "chalk";
import { runScenario } from "./scenario.js";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    SUBLEDGER DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Hourly accrual, settled on demand                 ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
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
  banner();
  console.log(chalk.gray("  One subscriber, three providers, nine simulated hours."));
  console.log(chalk.gray("  Funds move through an in-memory transfer service.\n"));

  const result = await runScenario();

  // ─── Step 1: Providers ──────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Register Providers");
  for (const provider of result.providers) {
    info(`provider ${provider.id}`, `${provider.owner} @ ${provider.fee.toString()}/h`);
  }
  ok(`${result.providers.length} providers registered`);

  await sleep(DELAY_MS);

  // ─── Step 2: Subscriber ─────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Register Subscriber");
  info("owner", result.subscriber.owner);
  info("plan", result.subscriber.plan);
  info("deposit", result.subscriber.balance.toString());
  info("providers", result.subscriber.providers.join(", "));
  ok("Deposit pulled into custody");

  await sleep(DELAY_MS);

  // ─── Step 3: Accrual ────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Accrue (+4h)");
  info("provider 1", `${result.accruedAfterFourHours.pending.toString()} pending`);
  info("subscriber dues", result.accruedAfterFourHours.outstanding.toString());
  ok("Earnings accrue per whole hour, nothing moves yet");

  await sleep(DELAY_MS);

  // ─── Step 4: Withdrawal ─────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Withdraw Earnings");
  info("provider", result.withdrawal.providerId);
  info("owed", result.withdrawal.owed.toString());
  info("collected", result.withdrawal.collected.toString());
  if (result.withdrawal.uncollected > 0n) {
    warn(`${result.withdrawal.uncollected.toString()} could not be collected`);
  }
  ok("Paid out of custody, accrual restarts from now");

  await sleep(DELAY_MS);

  // ─── Step 5: Fee Change ─────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Change Fee (+2h)");
  info("provider", result.feeChange.id);
  info("new fee", `${result.feeChange.fee.toString()}/h`);
  info("pending", result.pendingAfterFeeChange.toString());
  ok("Hours before the change keep the old rate");

  await sleep(DELAY_MS);

  // ─── Step 6: Top Up ─────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Top Up");
  info("balance", result.toppedUp.balance.toString());
  ok("Balance raised without touching accrual");

  await sleep(DELAY_MS);

  // ─── Step 7: Cancel ─────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Cancel (+3h)");
  info("owed", result.cancellation.owed.toString());
  if (result.cancellation.shortfall > 0n) {
    warn(`Balance short by ${result.cancellation.shortfall.toString()}, pulled from the owner's wallet`);
  }
  for (const payout of result.cancellation.payouts) {
    info(`paid ${payout.owner}`, payout.amount.toString());
  }
  info("balance after", result.cancellation.balanceAfter.toString());
  info("wallet after", result.walletAfter.toString());
  info("custody after", result.custodyAfter.toString());
  ok("Every provider settled, subscriber left every roster");

  await sleep(DELAY_MS);

  // ─── Step 8: Journal ────────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Verify Journal");
  console.log();
  for (const stored of result.events) {
    const line = JSON.stringify({
      type: stored.event.type,
      stream: stored.streamId,
      hash: stored.hash.slice(0, 12) + "...",
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }
  console.log();
  info("events", String(result.integrity.lastVerifiedPosition));
  const last = result.events.at(-1);
  if (last !== undefined) {
    hashLine("chain head", last.hash);
  }
  if (result.integrity.valid) {
    ok(chalk.green.bold("CHAIN VALID") + ": every event links to the one before it");
  } else {
    for (const error of result.integrity.errors) {
      warn(`position ${String(error.position)}: ${error.reason}`);
    }
  }

  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
