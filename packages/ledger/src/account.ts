/**
 * @coffer/ledger: Account entity.
 *
 * Holds the balance, the monthly counters and the append-only history
 * for one customer relationship.
 *
 * Rules:
 * - Balance is never negative
 * - A SAVINGS balance never drops below the minimum through a withdrawal
 * - History is append-only; readers get copies
 * - Mutators are NOT self-synchronizing: the Ledger calls them while
 *   holding this account's lock, after validating the operation
 */

import type { AccountKind, AccountSnapshot, Money, TransactionRecord, Verdict } from "@coffer/types";
import {
  addMoney,
  compareMoney,
  isNegative,
  isPositive,
  isZero,
  minMoney,
  multiplyByInteger,
  multiplyMoney,
  roundHalfUp,
  subtractMoney,
  zeroMoney,
} from "./money-math.js";
import { ACCOUNT_RULES, LedgerError } from "./types.js";

const PASS: Verdict = { ok: true };

function fail(reason: string): Verdict {
  return { ok: false, reason };
}

export class Account {
  readonly accountNumber: string;
  readonly kind: AccountKind;
  readonly ownerName: string;

  private _balance: Money;
  private readonly _history: TransactionRecord[] = [];
  private _monthlyTransactionCount = 0;
  private _monthlyWithdrawalCount = 0;

  /**
   * The opening balance does not count as a monthly transaction.
   */
  constructor(accountNumber: string, kind: AccountKind, ownerName: string, openingBalance: Money) {
    if (accountNumber.trim() === "") {
      throw new LedgerError("INVALID_ARGUMENT", "Account number cannot be empty");
    }
    if (ownerName.trim() === "") {
      throw new LedgerError("INVALID_ARGUMENT", "Customer name cannot be empty");
    }
    if (isNegative(openingBalance)) {
      throw new LedgerError("INVALID_ARGUMENT", "Initial balance cannot be negative");
    }
    if (kind === "SAVINGS" && compareMoney(openingBalance, ACCOUNT_RULES.savingsMinimumBalance) < 0) {
      throw new LedgerError(
        "INVALID_ARGUMENT",
        `SAVINGS account requires minimum initial balance of $${ACCOUNT_RULES.savingsMinimumBalance.amount}`,
      );
    }

    this.accountNumber = accountNumber;
    this.kind = kind;
    this.ownerName = ownerName;
    this._balance = openingBalance;
  }

  // ─── State ───────────────────────────────────────────────────────────

  get balance(): Money {
    return this._balance;
  }

  get monthlyTransactionCount(): number {
    return this._monthlyTransactionCount;
  }

  /** Only SAVINGS accounts count withdrawals. */
  get monthlyWithdrawalCount(): number {
    return this._monthlyWithdrawalCount;
  }

  /**
   * Copy of the transaction history, oldest first.
   */
  get history(): readonly TransactionRecord[] {
    return [...this._history];
  }

  get transactionCount(): number {
    return this._history.length;
  }

  // ─── Eligibility Checks (pure) ───────────────────────────────────────

  /**
   * Check whether `amount` may leave this account right now.
   *
   * For SAVINGS the monthly limit is checked before the funds checks,
   * so a withdrawal past the limit always reports the limit.
   */
  canWithdraw(amount: Money): Verdict {
    if (!isPositive(amount)) {
      return fail("Withdrawal amount must be positive");
    }

    if (
      this.kind === "SAVINGS" &&
      this._monthlyWithdrawalCount >= ACCOUNT_RULES.savingsMaxMonthlyWithdrawals
    ) {
      return fail(
        `SAVINGS account limited to ${String(ACCOUNT_RULES.savingsMaxMonthlyWithdrawals)} withdrawals per month`,
      );
    }

    const remaining = subtractMoney(this._balance, amount);
    if (isNegative(remaining)) {
      return fail("Insufficient funds");
    }

    if (
      this.kind === "SAVINGS" &&
      compareMoney(remaining, ACCOUNT_RULES.savingsMinimumBalance) < 0
    ) {
      return fail(
        `SAVINGS account must maintain minimum balance of $${ACCOUNT_RULES.savingsMinimumBalance.amount}`,
      );
    }

    return PASS;
  }

  canClose(): boolean {
    return isZero(this._balance);
  }

  // ─── Mutators (caller holds the lock) ────────────────────────────────

  /** @internal */
  deposit(amount: Money): Money {
    if (!isPositive(amount)) {
      throw new LedgerError("INVALID_ARGUMENT", "Deposit amount must be positive");
    }
    this._balance = addMoney(this._balance, amount);
    this._monthlyTransactionCount++;
    return this._balance;
  }

  /**
   * Remove funds. The caller must already have checked canWithdraw().
   * @internal
   */
  withdraw(amount: Money): Money {
    if (!isPositive(amount)) {
      throw new LedgerError("INVALID_ARGUMENT", "Withdrawal amount must be positive");
    }
    const next = subtractMoney(this._balance, amount);
    if (isNegative(next)) {
      throw new LedgerError(
        "INVALID_ARGUMENT",
        `Withdrawal of ${amount.amount} would overdraw account ${this.accountNumber}`,
      );
    }
    if (this.kind === "SAVINGS" && compareMoney(next, ACCOUNT_RULES.savingsMinimumBalance) < 0) {
      throw new LedgerError(
        "INVALID_ARGUMENT",
        `Withdrawal of ${amount.amount} would take account ${this.accountNumber} below the SAVINGS minimum`,
      );
    }
    this._balance = next;
    this._monthlyTransactionCount++;
    if (this.kind === "SAVINGS") {
      this._monthlyWithdrawalCount++;
    }
    return this._balance;
  }

  /**
   * Charge the CHECKING maintenance fee for transactions beyond the free
   * allowance. The charge is capped at the current balance.
   * @internal
   */
  applyMonthlyFee(): Money {
    if (this.kind !== "CHECKING") {
      return zeroMoney();
    }

    const chargeable = this._monthlyTransactionCount - ACCOUNT_RULES.checkingFreeTransactions;
    if (chargeable <= 0) {
      return zeroMoney();
    }

    const fee = minMoney(
      multiplyByInteger(ACCOUNT_RULES.checkingFeePerTransaction, chargeable),
      this._balance,
    );
    this._balance = subtractMoney(this._balance, fee);
    return fee;
  }

  /**
   * Credit SAVINGS interest: balance × rate, rounded half-up to cents.
   * @internal
   */
  applyMonthlyInterest(): Money {
    if (this.kind !== "SAVINGS") {
      return zeroMoney();
    }

    const interest = roundHalfUp(multiplyMoney(this._balance, ACCOUNT_RULES.savingsInterestRate), 2);
    this._balance = addMoney(this._balance, interest);
    return interest;
  }

  /** @internal */
  resetMonthlyCounters(): void {
    this._monthlyTransactionCount = 0;
    this._monthlyWithdrawalCount = 0;
  }

  /**
   * Append a record to the history. The record must belong to this account.
   * @internal
   */
  appendRecord(record: TransactionRecord): void {
    if (record.accountNumber !== this.accountNumber) {
      throw new LedgerError(
        "INVALID_ARGUMENT",
        `Record ${record.id} belongs to ${record.accountNumber}, not ${this.accountNumber}`,
      );
    }
    this._history.push(record);
  }

  // ─── Views ───────────────────────────────────────────────────────────

  snapshot(): AccountSnapshot {
    return {
      accountNumber: this.accountNumber,
      kind: this.kind,
      ownerName: this.ownerName,
      balance: this._balance,
      monthlyTransactionCount: this._monthlyTransactionCount,
      monthlyWithdrawalCount: this._monthlyWithdrawalCount,
      transactionCount: this._history.length,
    };
  }
}

/**
 * What the Ledger hands to callers: an Account without its mutators.
 */
export type AccountView = Pick<
  Account,
  | "accountNumber"
  | "kind"
  | "ownerName"
  | "balance"
  | "monthlyTransactionCount"
  | "monthlyWithdrawalCount"
  | "history"
  | "transactionCount"
  | "canWithdraw"
  | "canClose"
  | "snapshot"
>;
