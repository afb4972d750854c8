#!/usr/bin/env node
/**
 * @coffer/demo: Interactive CLI walkthrough.
 *
 * Runs one billing cycle of the Coffer ledger in your terminal:
 * open -> deposit -> reject -> limit -> concurrent transfers ->
 * monthly adjustments -> statement -> close
 *
 * Uses the ledger package directly (no server).
 */

import chalk from "chalk";
import { Ledger, displayAmount } from "@coffer/ledger";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runScenario } from "./scenario.js";
import type { ScenarioReporter } from "./scenario.js";

// =============================================================================
// Helpers
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                       COFFER DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("            Concurrent In-Memory Banking Ledger           ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function terminalReporter(delayMs: number): ScenarioReporter {
  return {
    async step(index, total, title) {
      await sleep(delayMs);
      const prefix = chalk.cyan.bold(`  Step ${String(index)}/${String(total)}`);
      const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
      console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
    },
    ok(msg) {
      console.log(chalk.green("    ✓ ") + chalk.white(msg));
    },
    info(label, value) {
      console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
    },
    warn(msg) {
      console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
    },
  };
}

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const ledger = new Ledger({ logger: logger.child({ component: "ledger" }) });

  banner();
  console.log(chalk.gray("  One billing cycle, with concurrent transfers in both directions.\n"));

  const summary = await runScenario(ledger, {
    concurrentTransfers: config.DEMO_CONCURRENT_TRANSFERS,
    reporter: terminalReporter(config.DEMO_STEP_DELAY_MS),
  });

  console.log();
  for (const line of summary.statement.trimEnd().split("\n")) {
    console.log(chalk.gray("    ") + chalk.white(line));
  }

  console.log();
  console.log(chalk.white("    Accounts:            ") + chalk.cyan.bold(`${String(summary.accountsOpened)} opened, ${summary.closedAccount} closed`));
  console.log(chalk.white("    Transactions:        ") + chalk.cyan.bold(`${String(summary.transactionsRecorded)} recorded, ${String(summary.failedTransactions)} failed`));
  console.log(chalk.white("    Transfers:           ") + chalk.cyan.bold(`${String(summary.transfersSucceeded)}/${String(summary.transfersAttempted)} settled`));
  console.log(chalk.white("    Money conserved:     ") + (summary.totalBeforeTransfers.amount === summary.totalAfterTransfers.amount ? chalk.green.bold("YES") : chalk.red.bold("NO")));
  console.log(chalk.white("    Interest / fees:     ") + chalk.cyan.bold(`$${displayAmount(summary.interestPaid)} / $${displayAmount(summary.feesCharged)}`));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
