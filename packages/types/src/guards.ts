/**
 * Runtime Type Guards
 *
 * Narrowing functions for Coffer domain types.
 * These enable safe runtime validation at system boundaries
 * (untyped callers, deserialized data, demo input).
 */

import type {
  AccountKind,
  Money,
  TransactionKind,
  TransactionOutcome,
  TransactionRecord,
  Verdict,
} from "./banking.js";

const ACCOUNT_KINDS = new Set<string>(["CHECKING", "SAVINGS"]);
const TRANSACTION_KINDS = new Set<string>(["DEPOSIT", "WITHDRAWAL", "TRANSFER"]);
const OUTCOMES = new Set<string>(["SUCCESS", "FAILED"]);

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Money
// =============================================================================

export function isMoney(value: unknown): value is Money {
  if (!isRecord(value)) return false;
  return (
    typeof value.amount === "string" &&
    DECIMAL_PATTERN.test(value.amount) &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

// =============================================================================
// Enumerations
// =============================================================================

export function isAccountKind(value: unknown): value is AccountKind {
  return typeof value === "string" && ACCOUNT_KINDS.has(value);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && TRANSACTION_KINDS.has(value);
}

export function isTransactionOutcome(value: unknown): value is TransactionOutcome {
  return typeof value === "string" && OUTCOMES.has(value);
}

// =============================================================================
// Records
// =============================================================================

export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (!isRecord(value)) return false;
  if (
    typeof value.id !== "string" ||
    typeof value.timestamp !== "string" ||
    typeof value.accountNumber !== "string" ||
    !isTransactionKind(value.kind) ||
    !isMoney(value.amount) ||
    !isMoney(value.balanceBefore) ||
    !isMoney(value.balanceAfter) ||
    (value.memo !== undefined && typeof value.memo !== "string")
  ) {
    return false;
  }
  if (value.outcome === "FAILED") {
    return typeof value.failureReason === "string" && value.failureReason.trim() !== "";
  }
  return value.outcome === "SUCCESS" && value.failureReason === undefined;
}

export function isVerdict(value: unknown): value is Verdict {
  if (!isRecord(value)) return false;
  if (value.ok === true) return true;
  return value.ok === false && typeof value.reason === "string";
}
