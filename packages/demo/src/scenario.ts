/**
 * @coffer/demo: Banking walkthrough.
 *
 * Drives a Ledger through one billing cycle:
 * open accounts -> deposits -> rejected withdrawal -> savings limit ->
 * concurrent transfers -> monthly adjustments -> statement -> close
 *
 * Output goes through a ScenarioReporter so the CLI can render it and
 * tests can run it silently.
 */

import type { AccountSnapshot, Money } from "@coffer/types";
import { LedgerError, addMoney, displayAmount, zeroMoney } from "@coffer/ledger";
import type { AccountView, Ledger, TransferResult } from "@coffer/ledger";

// =============================================================================
// Types
// =============================================================================

export interface ScenarioReporter {
  /** Called at the start of each step. May pause between steps. */
  step(index: number, total: number, title: string): Promise<void> | void;
  ok(message: string): void;
  info(label: string, value: string): void;
  warn(message: string): void;
}

export interface ScenarioOptions {
  /** Transfers fired concurrently in EACH direction. */
  readonly concurrentTransfers: number;
  readonly reporter?: ScenarioReporter | undefined;
}

export interface ScenarioSummary {
  readonly accountsOpened: number;
  readonly transactionsRecorded: number;
  readonly failedTransactions: number;
  readonly transfersAttempted: number;
  readonly transfersSucceeded: number;
  /** Sum of all balances before the transfers ran */
  readonly totalBeforeTransfers: Money;
  /** Sum of all balances once every transfer settled */
  readonly totalAfterTransfers: Money;
  readonly interestPaid: Money;
  readonly feesCharged: Money;
  readonly closedAccount: string;
  readonly balances: readonly AccountSnapshot[];
  readonly statement: string;
}

const SILENT: ScenarioReporter = {
  step: () => undefined,
  ok: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

export const TOTAL_STEPS = 8;

function usd(amount: string): Money {
  return { amount, decimals: 2 };
}

function totalBalance(ledger: Ledger): Money {
  return ledger.getAllAccounts().reduce((sum, a) => addMoney(sum, a.balance), zeroMoney());
}

function dollars(m: Money): string {
  return `$${displayAmount(m)}`;
}

// =============================================================================
// Scenario
// =============================================================================

/**
 * Run the walkthrough against `ledger`, which should start empty.
 */
export async function runScenario(
  ledger: Ledger,
  options: ScenarioOptions,
): Promise<ScenarioSummary> {
  const report = options.reporter ?? SILENT;
  const n = options.concurrentTransfers;

  // ─── Step 1: Open Accounts ──────────────────────────────────────────

  await report.step(1, TOTAL_STEPS, "Open Accounts");

  const alice = ledger.openAccount("Alice Smith", "CHECKING", usd("1000.00"));
  const bob = ledger.openAccount("Bob Jones", "SAVINGS", usd("500.00"));
  const dave = ledger.openAccount("Dave Brown", "CHECKING", usd("500.00"));
  const carol = ledger.openAccount("Carol White", "CHECKING", usd("0.00"));
  for (const account of [alice, bob, dave, carol]) {
    report.ok(`${account.accountNumber} ${account.kind.padEnd(8)} ${account.ownerName} (${dollars(account.balance)})`);
  }

  try {
    ledger.openAccount("Eve Black", "SAVINGS", usd("50.00"));
  } catch (err: unknown) {
    if (!(err instanceof LedgerError)) throw err;
    report.warn(`Rejected: ${err.message}`);
  }

  // ─── Step 2: Deposits ───────────────────────────────────────────────

  await report.step(2, TOTAL_STEPS, "Deposits");

  for (let i = 0; i < 12; i++) {
    await ledger.deposit(alice.accountNumber, usd("10.00"));
  }
  report.ok(`12 deposits of $10.00 to ${alice.ownerName}`);
  report.info("Balance", dollars(alice.balance));
  report.info("This month", `${String(alice.monthlyTransactionCount)} transactions`);

  // ─── Step 3: Rejected Withdrawal ────────────────────────────────────

  await report.step(3, TOTAL_STEPS, "Rejected Withdrawal");

  const overdraft = await ledger.withdraw(alice.accountNumber, usd("5000.00"));
  report.warn(`Withdraw $5000.00: ${overdraft.outcome} (${overdraft.failureReason ?? "no reason"})`);
  report.info("Balance", `${dollars(alice.balance)} (unchanged)`);

  // ─── Step 4: Savings Withdrawal Limit ───────────────────────────────

  await report.step(4, TOTAL_STEPS, "Savings Withdrawal Limit");

  for (let i = 1; i <= 6; i++) {
    const record = await ledger.withdraw(bob.accountNumber, usd("10.00"));
    if (record.outcome === "SUCCESS") {
      report.ok(`Withdrawal ${String(i)}: ${dollars(record.balanceAfter)} left`);
    } else {
      report.warn(`Withdrawal ${String(i)}: ${record.failureReason}`);
    }
  }

  // ─── Step 5: Concurrent Transfers ───────────────────────────────────

  await report.step(5, TOTAL_STEPS, "Concurrent Transfers");

  const totalBeforeTransfers = totalBalance(ledger);
  const transfers: Promise<TransferResult>[] = [];
  for (let i = 0; i < n; i++) {
    transfers.push(ledger.transfer(alice.accountNumber, dave.accountNumber, usd("1.00")));
    transfers.push(ledger.transfer(dave.accountNumber, alice.accountNumber, usd("1.00")));
  }
  const results = await Promise.all(transfers);
  const transfersSucceeded = results.filter((r) => r.debit.outcome === "SUCCESS").length;
  const totalAfterTransfers = totalBalance(ledger);

  report.ok(`${String(transfersSucceeded)}/${String(results.length)} transfers settled, in both directions at once`);
  report.info("Total before", dollars(totalBeforeTransfers));
  report.info("Total after", dollars(totalAfterTransfers));

  // ─── Step 6: Monthly Adjustments ────────────────────────────────────

  await report.step(6, TOTAL_STEPS, "Monthly Adjustments");

  const { interest, fees } = await ledger.applyMonthlyAdjustments();
  report.ok(`Interest paid: ${dollars(interest)}`);
  report.ok(`Fees charged:  ${dollars(fees)}`);
  for (const account of ledger.getAllAccounts()) {
    report.info(account.ownerName, dollars(account.balance));
  }

  // ─── Step 7: Statement ──────────────────────────────────────────────

  await report.step(7, TOTAL_STEPS, "Monthly Statement");

  const statement = ledger.generateMonthlyStatement(bob.accountNumber);
  report.ok(`Statement for ${bob.accountNumber} (${String(bob.transactionCount)} transactions)`);

  // ─── Step 8: Close Account ──────────────────────────────────────────

  await report.step(8, TOTAL_STEPS, "Close Account");

  const remaining: readonly AccountView[] = ledger.getAllAccounts();
  const transactionsRecorded = remaining.reduce((sum, a) => sum + a.transactionCount, 0);
  const failedTransactions = remaining.reduce(
    (sum, a) => sum + ledger.getFailedTransactions(a.accountNumber).length,
    0,
  );

  await ledger.closeAccount(carol.accountNumber);
  report.ok(`${carol.accountNumber} closed (${carol.ownerName})`);

  return {
    accountsOpened: remaining.length,
    transactionsRecorded,
    failedTransactions,
    transfersAttempted: results.length,
    transfersSucceeded,
    totalBeforeTransfers,
    totalAfterTransfers,
    interestPaid: interest,
    feesCharged: fees,
    closedAccount: carol.accountNumber,
    balances: ledger.getAllAccounts().map((a) => a.snapshot()),
    statement,
  };
}
