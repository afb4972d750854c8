/**
 * @coffer/ledger: Monthly statement rendering.
 *
 * Plain-text, 70 columns wide. Amounts are shown with two decimals.
 */

import type { AccountSnapshot, Money, TransactionRecord } from "@coffer/types";
import { displayAmount } from "./money-math.js";

const WIDTH = 70;
const TITLE = "MONTHLY ACCOUNT STATEMENT";

/** Column widths; the last column is unpadded. */
const COLUMNS = [21, 12, 12, 13, 13] as const;

function dollars(m: Money): string {
  return `$${displayAmount(m)}`;
}

function row(cells: readonly string[]): string {
  return cells
    .map((cell, i) => cell.padEnd(COLUMNS[i] ?? 0))
    .join("")
    .trimEnd();
}

/** "2024-01-15T10:00:00.000Z" → "2024-01-15 10:00:00" */
function displayTimestamp(iso: string): string {
  return iso.slice(0, 19).replace("T", " ");
}

/**
 * Render an account statement from a snapshot and its history.
 */
export function formatStatement(
  account: AccountSnapshot,
  records: readonly TransactionRecord[],
): string {
  const rule = "=".repeat(WIDTH);
  const line = "-".repeat(WIDTH);
  const title = " ".repeat(Math.floor((WIDTH - TITLE.length) / 2)) + TITLE;

  const out: string[] = [
    rule,
    title,
    rule,
    "",
    `Account Number:  ${account.accountNumber}`,
    `Account Type:    ${account.kind}`,
    `Customer Name:   ${account.ownerName}`,
    `Current Balance: ${dollars(account.balance)}`,
    "",
    "Transaction History:",
    line,
    row(["Date/Time", "Type", "Amount", "Bal. Before", "Bal. After", "Status"]),
    line,
  ];

  if (records.length === 0) {
    out.push("No transactions this period.");
  }

  for (const record of records) {
    out.push(
      row([
        displayTimestamp(record.timestamp),
        record.kind,
        dollars(record.amount),
        dollars(record.balanceBefore),
        dollars(record.balanceAfter),
        record.outcome,
      ]),
    );
    if (record.memo !== undefined) {
      out.push(`  Memo: ${record.memo}`);
    }
    if (record.outcome === "FAILED") {
      out.push(`  Reason: ${record.failureReason}`);
    }
  }

  out.push(
    line,
    `Total Transactions: ${String(records.length)}`,
    `Ending Balance: ${dollars(account.balance)}`,
    rule,
  );

  return `${out.join("\n")}\n`;
}
