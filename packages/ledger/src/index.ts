/**
 * @coffer/ledger: Concurrent in-memory banking ledger.
 *
 * Checking and savings accounts, deposits, withdrawals, transfers and a
 * monthly fee/interest cycle, safe under concurrent async callers:
 * - Every attempted operation leaves a record, successful or FAILED
 * - Balances never go negative; savings never drop below the minimum
 * - Transfers hold both account locks, taken in canonical order
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All exported types are readonly
 * - Stored records are frozen and never mutated
 * - Caller misuse throws LedgerError; business rejections are FAILED records
 */

// Core engine
export { Ledger } from "./ledger.js";
export type { LedgerOptions } from "./ledger.js";

// Accounts
export { Account } from "./account.js";
export type { AccountView } from "./account.js";

// Records
export { createTransactionRecord, isFailed } from "./transaction-record.js";
export type { TransactionRecordInput } from "./transaction-record.js";

// Validation
export {
  validateDeposit,
  validateWithdrawal,
  validateTransfer,
  validateAccountClosure,
  validateInitialDeposit,
  validateCustomerName,
} from "./validator.js";

// Concurrency
export { AccountLock, LockTable, lockOrder, withAccountLocks } from "./account-lock.js";
export type { ReleaseLock } from "./account-lock.js";

// Identifiers
export { SequentialIdGenerator } from "./id-generator.js";
export type { IdGenerator, SequentialIdGeneratorOptions } from "./id-generator.js";

// Statements
export { formatStatement } from "./statement.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  money,
  zeroMoney,
  addMoney,
  subtractMoney,
  multiplyMoney,
  multiplyByInteger,
  roundHalfUp,
  compareMoney,
  isZero,
  isPositive,
  isNegative,
  minMoney,
  displayAmount,
} from "./money-math.js";

// Types
export type {
  LedgerErrorCode,
  TransferResult,
  MonthlyAdjustmentResult,
  HistoryFilter,
} from "./types.js";

export { LedgerError, ACCOUNT_RULES, ACCOUNT_KINDS } from "./types.js";
