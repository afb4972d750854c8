/**
 * @coffer/ledger: Transaction validation.
 *
 * Stateless business-rule checks shared by single-account operations
 * and both legs of a transfer. Every function returns a Verdict and
 * never mutates its arguments.
 *
 * "Absent" arguments (null / undefined from untyped callers) fail the
 * verdict rather than throwing.
 */

import type { AccountKind, Money, Verdict } from "@coffer/types";
import { isAccountKind, isMoney } from "@coffer/types";
import type { Account } from "./account.js";
import { compareMoney, isNegative, isPositive } from "./money-math.js";
import { ACCOUNT_RULES } from "./types.js";

type Maybe<T> = T | null | undefined;

const PASS: Verdict = { ok: true };

function fail(reason: string): Verdict {
  return { ok: false, reason };
}

function checkPositiveAmount(amount: Maybe<Money>, label: string): Verdict {
  if (amount === null || amount === undefined) {
    return fail(`${label} amount cannot be null`);
  }
  if (!isMoney(amount) || !isPositive(amount)) {
    return fail(`${label} amount must be positive`);
  }
  return PASS;
}

export function validateDeposit(amount: Maybe<Money>): Verdict {
  return checkPositiveAmount(amount, "Deposit");
}

export function validateWithdrawal(account: Maybe<Account>, amount: Maybe<Money>): Verdict {
  if (account === null || account === undefined) {
    return fail("Account cannot be null");
  }
  const amountCheck = checkPositiveAmount(amount, "Withdrawal");
  if (!amountCheck.ok || amount === null || amount === undefined) {
    return amountCheck;
  }
  return account.canWithdraw(amount);
}

export function validateTransfer(
  fromAccount: Maybe<Account>,
  toAccount: Maybe<Account>,
  amount: Maybe<Money>,
): Verdict {
  if (fromAccount === null || fromAccount === undefined) {
    return fail("Source account cannot be null");
  }
  if (toAccount === null || toAccount === undefined) {
    return fail("Destination account cannot be null");
  }
  if (fromAccount.accountNumber === toAccount.accountNumber) {
    return fail("Cannot transfer to the same account");
  }
  const amountCheck = checkPositiveAmount(amount, "Transfer");
  if (!amountCheck.ok || amount === null || amount === undefined) {
    return amountCheck;
  }
  return fromAccount.canWithdraw(amount);
}

export function validateAccountClosure(account: Maybe<Account>): Verdict {
  if (account === null || account === undefined) {
    return fail("Account cannot be null");
  }
  if (!account.canClose()) {
    return fail(`Account cannot be closed with non-zero balance: $${account.balance.amount}`);
  }
  return PASS;
}

export function validateInitialDeposit(kind: Maybe<AccountKind>, amount: Maybe<Money>): Verdict {
  if (kind === null || kind === undefined) {
    return fail("Account type cannot be null");
  }
  if (!isAccountKind(kind)) {
    return fail(`Unknown account type: "${String(kind)}"`);
  }
  if (amount === null || amount === undefined) {
    return fail("Initial deposit cannot be null");
  }
  if (!isMoney(amount) || isNegative(amount)) {
    return fail("Initial deposit cannot be negative");
  }
  if (kind === "SAVINGS" && compareMoney(amount, ACCOUNT_RULES.savingsMinimumBalance) < 0) {
    return fail(
      `SAVINGS account requires minimum initial deposit of $${ACCOUNT_RULES.savingsMinimumBalance.amount}`,
    );
  }
  return PASS;
}

export function validateCustomerName(name: Maybe<string>): Verdict {
  if (name === null || name === undefined) {
    return fail("Customer name cannot be null");
  }
  if (name.trim() === "") {
    return fail("Customer name cannot be empty");
  }
  if (name.trim().length < 2) {
    return fail("Customer name must be at least 2 characters");
  }
  return PASS;
}
