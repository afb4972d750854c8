/**
 * @coffer/ledger: Internal types for the ledger engine.
 *
 * These extend the shared @coffer/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Stored transaction records are never mutated
 * - Caller misuse throws; business-rule rejections are returned as FAILED records
 */

import type { AccountKind, Money, TransactionRecord } from "@coffer/types";

// ─── Business Rules ──────────────────────────────────────────────────────

/**
 * Fixed banking rules. Amounts are Money literals so comparisons stay exact.
 */
export const ACCOUNT_RULES = {
  savingsMinimumBalance: { amount: "100.00", decimals: 2 },
  savingsMaxMonthlyWithdrawals: 5,
  savingsInterestRate: { amount: "0.02", decimals: 2 },
  checkingFreeTransactions: 10,
  checkingFeePerTransaction: { amount: "2.50", decimals: 2 },
} as const satisfies {
  readonly savingsMinimumBalance: Money;
  readonly savingsMaxMonthlyWithdrawals: number;
  readonly savingsInterestRate: Money;
  readonly checkingFreeTransactions: number;
  readonly checkingFeePerTransaction: Money;
};

/** The two account kinds, in display order. */
export const ACCOUNT_KINDS: readonly AccountKind[] = ["CHECKING", "SAVINGS"];

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ACCOUNT_NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "INVALID_AMOUNT"
  | "ACCOUNT_NOT_CLOSEABLE"
  | "INVALID_RECORD";

/**
 * Structured error from the ledger engine.
 * Always thrown. Never used for rejected deposits, withdrawals or transfers,
 * which come back as FAILED transaction records.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Operation Types ─────────────────────────────────────────────────────

/**
 * Both legs of a transfer. On rejection both are FAILED and nothing moved.
 */
export interface TransferResult {
  /** Source leg, recorded on the paying account */
  readonly debit: TransactionRecord;
  /** Destination leg, recorded on the receiving account */
  readonly credit: TransactionRecord;
}

/**
 * Totals from closing a billing cycle.
 */
export interface MonthlyAdjustmentResult {
  readonly interest: Money;
  readonly fees: Money;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Inclusive timestamp bounds for history queries.
 *
 * Bounds are date strings, compared with record timestamps as instants.
 * A date-only `to` ("2024-01-31", "2024-01") covers that whole UTC period.
 */
export interface HistoryFilter {
  readonly from?: string | undefined;
  readonly to?: string | undefined;
}
