/**
 * @coffer/types: Shared domain types for the Coffer ledger.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

export type {
  Money,
  AccountKind,
  TransactionKind,
  TransactionOutcome,
  SuccessfulTransaction,
  FailedTransaction,
  TransactionRecord,
  Verdict,
  AccountSnapshot,
} from "./banking.js";

export {
  isMoney,
  isAccountKind,
  isTransactionKind,
  isTransactionOutcome,
  isTransactionRecord,
  isVerdict,
} from "./guards.js";
