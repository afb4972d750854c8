/**
 * Banking Types
 *
 * Core primitives for the in-memory banking ledger.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - A single implicit currency (no multi-currency support)
 * - Transaction records are append-only by contract
 */

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Arithmetic lives in @coffer/ledger (bigint scaled by `decimals`).
 */
export interface Money {
  /** Decimal string, e.g. "100.50", "-3", "0.005". Never exponent notation. */
  readonly amount: string;

  /** Number of fractional digits carried by `amount`. */
  readonly decimals: number;
}

/**
 * Account category. Closed set: fee, interest and withdrawal rules hang off it.
 */
export type AccountKind = "CHECKING" | "SAVINGS";

/** What an attempted operation tried to do. */
export type TransactionKind = "DEPOSIT" | "WITHDRAWAL" | "TRANSFER";

/** Whether an attempted operation changed the balance. */
export type TransactionOutcome = "SUCCESS" | "FAILED";

interface TransactionRecordFields {
  /** Unique transaction identifier */
  readonly id: string;

  /** ISO 8601 timestamp of the attempt */
  readonly timestamp: string;

  /** Account whose history holds this record */
  readonly accountNumber: string;

  readonly kind: TransactionKind;

  /** The amount the caller asked for */
  readonly amount: Money;

  readonly balanceBefore: Money;

  /** Equal to balanceBefore when the attempt failed */
  readonly balanceAfter: Money;

  /** Free-form note, e.g. "Monthly interest" or "Transfer to ACC-00000002" */
  readonly memo?: string | undefined;
}

/**
 * A record of an operation that moved money.
 */
export interface SuccessfulTransaction extends TransactionRecordFields {
  readonly outcome: "SUCCESS";
  readonly failureReason?: undefined;
}

/**
 * A record of a rejected attempt. The balance did not change.
 */
export interface FailedTransaction extends TransactionRecordFields {
  readonly outcome: "FAILED";
  readonly failureReason: string;
}

/**
 * Immutable audit entry for one attempted operation, successful or not.
 */
export type TransactionRecord = SuccessfulTransaction | FailedTransaction;

/**
 * Outcome of a business-rule check.
 */
export type Verdict =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

/**
 * Read-only view of an account at a point in time.
 */
export interface AccountSnapshot {
  readonly accountNumber: string;
  readonly kind: AccountKind;
  readonly ownerName: string;
  readonly balance: Money;
  readonly monthlyTransactionCount: number;
  readonly monthlyWithdrawalCount: number;
  readonly transactionCount: number;
}
