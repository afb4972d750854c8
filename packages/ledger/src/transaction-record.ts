/**
 * @coffer/ledger: Transaction record construction.
 *
 * The only way to build a TransactionRecord. Records are frozen on
 * construction and checked for the success/failure pairing rules:
 * - FAILED carries a non-blank reason and an unchanged balance
 * - SUCCESS carries no reason, a positive amount and a non-negative balance
 *
 * A violation is a programming error in the caller and throws INVALID_RECORD.
 */

import type {
  FailedTransaction,
  Money,
  SuccessfulTransaction,
  TransactionKind,
  TransactionOutcome,
  TransactionRecord,
} from "@coffer/types";
import { compareMoney, isNegative, isPositive } from "./money-math.js";
import { LedgerError } from "./types.js";

export interface TransactionRecordInput {
  readonly id: string;
  readonly timestamp: string;
  readonly accountNumber: string;
  readonly kind: TransactionKind;
  readonly amount: Money;
  readonly balanceBefore: Money;
  readonly balanceAfter: Money;
  readonly outcome: TransactionOutcome;
  readonly failureReason?: string | undefined;
  readonly memo?: string | undefined;
}

function invalid(message: string): never {
  throw new LedgerError("INVALID_RECORD", message);
}

/**
 * Build an immutable transaction record, enforcing construction invariants.
 */
export function createTransactionRecord(input: TransactionRecordInput): TransactionRecord {
  if (input.id.trim() === "") invalid("Transaction ID is required");
  if (input.accountNumber.trim() === "") invalid("Account number is required");
  if (Number.isNaN(Date.parse(input.timestamp))) {
    invalid(`Timestamp is not a valid ISO 8601 string: "${input.timestamp}"`);
  }

  if (input.outcome === "FAILED") {
    const reason = input.failureReason?.trim() ?? "";
    if (reason === "") {
      invalid("Failure reason is required for failed transactions");
    }
    if (compareMoney(input.balanceBefore, input.balanceAfter) !== 0) {
      invalid(
        `Failed transaction must leave the balance unchanged (${input.balanceBefore.amount} → ${input.balanceAfter.amount})`,
      );
    }
    const failed: FailedTransaction = {
      id: input.id,
      timestamp: input.timestamp,
      accountNumber: input.accountNumber,
      kind: input.kind,
      amount: input.amount,
      balanceBefore: input.balanceBefore,
      balanceAfter: input.balanceAfter,
      outcome: "FAILED",
      failureReason: reason,
      ...(input.memo === undefined ? {} : { memo: input.memo }),
    };
    return Object.freeze(failed);
  }

  if (input.failureReason !== undefined) {
    invalid("Successful transactions cannot carry a failure reason");
  }
  if (!isPositive(input.amount)) {
    invalid(`Transaction amount must be positive, got "${input.amount.amount}"`);
  }
  if (isNegative(input.balanceAfter)) {
    invalid(`Balance after cannot be negative, got "${input.balanceAfter.amount}"`);
  }

  const succeeded: SuccessfulTransaction = {
    id: input.id,
    timestamp: input.timestamp,
    accountNumber: input.accountNumber,
    kind: input.kind,
    amount: input.amount,
    balanceBefore: input.balanceBefore,
    balanceAfter: input.balanceAfter,
    outcome: "SUCCESS",
    ...(input.memo === undefined ? {} : { memo: input.memo }),
  };
  return Object.freeze(succeeded);
}

/**
 * Narrowing helper for FAILED records.
 */
export function isFailed(record: TransactionRecord): record is FailedTransaction {
  return record.outcome === "FAILED";
}
