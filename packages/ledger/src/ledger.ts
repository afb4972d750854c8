/**
 * @coffer/ledger: Core Ledger class.
 *
 * Coordinates every account in the process. The Ledger is the only
 * component that mutates an Account and the only one that builds
 * TransactionRecords.
 *
 * API surface:
 * - openAccount() / closeAccount(): Manage the account directory
 * - deposit() / withdraw() / transfer(): Move money, one record per attempt
 * - applyMonthlyInterest() / applyMonthlyFeesAndResetCounters(): Billing cycle
 * - getTransactionHistory() / generateMonthlyStatement(): Audit queries
 *
 * Error model:
 * - Unknown accounts and malformed arguments throw LedgerError
 * - Rejected deposits, withdrawals and transfers resolve to FAILED records
 * - Open/close rule violations throw a coded LedgerError (they leave no record)
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AccountKind, Money, TransactionKind, TransactionRecord } from "@coffer/types";
import { isMoney } from "@coffer/types";
import { Account } from "./account.js";
import type { AccountView } from "./account.js";
import { LockTable, withAccountLocks } from "./account-lock.js";
import type { IdGenerator } from "./id-generator.js";
import { SequentialIdGenerator } from "./id-generator.js";
import { addMoney, isPositive, parseAmount, zeroMoney } from "./money-math.js";
import { formatStatement } from "./statement.js";
import { createTransactionRecord } from "./transaction-record.js";
import type { HistoryFilter, MonthlyAdjustmentResult, TransferResult } from "./types.js";
import { LedgerError } from "./types.js";
import {
  validateAccountClosure,
  validateCustomerName,
  validateDeposit,
  validateInitialDeposit,
  validateTransfer,
  validateWithdrawal,
} from "./validator.js";

export interface LedgerOptions {
  /** Source of account numbers and transaction ids. Default: SequentialIdGenerator */
  readonly idGenerator?: IdGenerator | undefined;
  /** Structured logger. Default: a silent pino logger */
  readonly logger?: Logger | undefined;
  /** Clock for record timestamps. Default: `() => new Date()` */
  readonly clock?: (() => Date) | undefined;
}

interface PostingInput {
  readonly kind: TransactionKind;
  readonly amount: Money;
  readonly balanceBefore: Money;
  readonly balanceAfter: Money;
  readonly memo?: string | undefined;
}

function assertMoney(value: unknown, label: string): asserts value is Money {
  if (!isMoney(value)) {
    throw new LedgerError("INVALID_ARGUMENT", `${label} must be a Money value`);
  }
  parseAmount(value.amount, value.decimals);
}

const DATE_ONLY = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;

function parseBound(value: string, label: string): number {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new LedgerError("INVALID_ARGUMENT", `${label} is not a valid date: "${value}"`);
  }
  return ms;
}

/**
 * Last millisecond covered by an upper bound. A date-only bound
 * (YYYY, YYYY-MM or YYYY-MM-DD) covers the whole UTC period it names.
 */
function parseUpperBound(value: string, label: string): number {
  const start = parseBound(value, label);
  const match = DATE_ONLY.exec(value);
  if (match === null) {
    return start;
  }
  const [, year, month, day] = match;
  let next: number;
  if (day !== undefined) {
    next = Date.UTC(Number(year), Number(month) - 1, Number(day) + 1);
  } else if (month !== undefined) {
    next = Date.UTC(Number(year), Number(month), 1);
  } else {
    next = Date.UTC(Number(year) + 1, 0, 1);
  }
  return next - 1;
}

/**
 * In-memory banking ledger.
 *
 * The account directory is a Map read and written only from synchronous
 * code, so lookups and registrations never interleave. Each account's
 * balance, counters and history are guarded by that account's lock.
 */
export class Ledger {
  private readonly _accounts: Map<string, Account> = new Map();
  private readonly _locks: LockTable = new LockTable();
  private readonly _ids: IdGenerator;
  private readonly _log: Logger;
  private readonly _clock: () => Date;

  constructor(options: LedgerOptions = {}) {
    this._clock = options.clock ?? (() => new Date());
    this._ids = options.idGenerator ?? new SequentialIdGenerator({ clock: this._clock });
    this._log = options.logger ?? pino({ level: "silent" });
  }

  // ─── Account Management ──────────────────────────────────────────────

  /**
   * Open an account and record the initial deposit, if any.
   *
   * Throws LedgerError("INVALID_ARGUMENT") with the validation reason
   * when the name or initial deposit is rejected; nothing is registered.
   */
  openAccount(name: string, kind: AccountKind, initialDeposit: Money): AccountView {
    const nameCheck = validateCustomerName(name);
    if (!nameCheck.ok) {
      throw new LedgerError("INVALID_ARGUMENT", nameCheck.reason);
    }
    const depositCheck = validateInitialDeposit(kind, initialDeposit);
    if (!depositCheck.ok) {
      throw new LedgerError("INVALID_ARGUMENT", depositCheck.reason);
    }
    assertMoney(initialDeposit, "Initial deposit");

    const accountNumber = this._ids.nextAccountId();
    if (this._accounts.has(accountNumber)) {
      throw new LedgerError("INVALID_ARGUMENT", `Account number already in use: ${accountNumber}`);
    }

    const account = new Account(accountNumber, kind, name.trim(), initialDeposit);
    this._accounts.set(accountNumber, account);

    if (isPositive(initialDeposit)) {
      this._post(account, {
        kind: "DEPOSIT",
        amount: initialDeposit,
        balanceBefore: zeroMoney(initialDeposit.decimals),
        balanceAfter: initialDeposit,
        memo: "Initial deposit",
      });
    }

    this._log.info(
      { accountNumber, kind, initialDeposit: initialDeposit.amount },
      "Account opened",
    );
    return account;
  }

  /**
   * Close an account with a zero balance and remove it from the directory.
   *
   * Throws ACCOUNT_NOT_FOUND for an unknown account and
   * ACCOUNT_NOT_CLOSEABLE when the balance is not exactly zero.
   */
  async closeAccount(accountNumber: string): Promise<boolean> {
    const account = this._require(accountNumber);

    return withAccountLocks(this._locks, [account], () => {
      this._assertRegistered(account);
      const verdict = validateAccountClosure(account);
      if (!verdict.ok) {
        throw new LedgerError("ACCOUNT_NOT_CLOSEABLE", verdict.reason);
      }
      this._accounts.delete(accountNumber);
      this._log.info({ accountNumber }, "Account closed");
      return true;
    });
  }

  getAccount(accountNumber: string): AccountView | undefined {
    return this._accounts.get(accountNumber);
  }

  hasAccount(accountNumber: string): boolean {
    return this._accounts.has(accountNumber);
  }

  /**
   * Copy of the directory's accounts, in opening order.
   */
  getAllAccounts(): AccountView[] {
    return [...this._accounts.values()];
  }

  getAccountsByKind(kind: AccountKind): AccountView[] {
    return this.getAllAccounts().filter((a) => a.kind === kind);
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  getBalance(accountNumber: string): Money {
    return this._require(accountNumber).balance;
  }

  // ─── Money Movement ──────────────────────────────────────────────────

  /**
   * Deposit into an account. A rejected deposit resolves to a FAILED record.
   */
  async deposit(accountNumber: string, amount: Money): Promise<TransactionRecord> {
    const account = this._require(accountNumber);
    assertMoney(amount, "Deposit amount");

    return withAccountLocks(this._locks, [account], () => {
      this._assertRegistered(account);
      const verdict = validateDeposit(amount);
      if (!verdict.ok) {
        return this._reject(account, "DEPOSIT", amount, verdict.reason);
      }

      const balanceBefore = account.balance;
      const balanceAfter = account.deposit(amount);
      return this._post(account, { kind: "DEPOSIT", amount, balanceBefore, balanceAfter });
    });
  }

  /**
   * Withdraw from an account. A rejected withdrawal resolves to a FAILED record.
   */
  async withdraw(accountNumber: string, amount: Money): Promise<TransactionRecord> {
    const account = this._require(accountNumber);
    assertMoney(amount, "Withdrawal amount");

    return withAccountLocks(this._locks, [account], () => {
      this._assertRegistered(account);
      const verdict = validateWithdrawal(account, amount);
      if (!verdict.ok) {
        return this._reject(account, "WITHDRAWAL", amount, verdict.reason);
      }

      const balanceBefore = account.balance;
      const balanceAfter = account.withdraw(amount);
      return this._post(account, { kind: "WITHDRAWAL", amount, balanceBefore, balanceAfter });
    });
  }

  /**
   * Move funds between two accounts.
   *
   * Both locks are held, in canonical order, for the whole transfer, so no
   * reader sees money that has left the source but not reached the
   * destination. A rejected transfer records a FAILED leg on each side.
   */
  async transfer(
    fromAccountNumber: string,
    toAccountNumber: string,
    amount: Money,
  ): Promise<TransferResult> {
    const source = this._require(fromAccountNumber);
    const destination = this._require(toAccountNumber);
    assertMoney(amount, "Transfer amount");

    const debitMemo = `Transfer to ${toAccountNumber}`;
    const creditMemo = `Transfer from ${fromAccountNumber}`;

    return withAccountLocks(this._locks, [source, destination], () => {
      this._assertRegistered(source);
      this._assertRegistered(destination);

      const verdict = validateTransfer(source, destination, amount);
      if (!verdict.ok) {
        return {
          debit: this._reject(source, "TRANSFER", amount, verdict.reason, debitMemo),
          credit: this._reject(destination, "TRANSFER", amount, verdict.reason, creditMemo),
        };
      }

      const sourceBefore = source.balance;
      const sourceAfter = source.withdraw(amount);
      const destinationBefore = destination.balance;
      const destinationAfter = destination.deposit(amount);

      return {
        debit: this._post(source, {
          kind: "TRANSFER",
          amount,
          balanceBefore: sourceBefore,
          balanceAfter: sourceAfter,
          memo: debitMemo,
        }),
        credit: this._post(destination, {
          kind: "TRANSFER",
          amount,
          balanceBefore: destinationBefore,
          balanceAfter: destinationAfter,
          memo: creditMemo,
        }),
      };
    });
  }

  // ─── Billing Cycle ───────────────────────────────────────────────────

  /**
   * Credit interest to every SAVINGS account. Returns the total paid.
   */
  async applyMonthlyInterest(): Promise<Money> {
    let total = zeroMoney();

    for (const account of [...this._accounts.values()].filter((a) => a.kind === "SAVINGS")) {
      const interest = await withAccountLocks(this._locks, [account], () => {
        if (!this._isRegistered(account)) {
          return zeroMoney();
        }
        const balanceBefore = account.balance;
        const paid = account.applyMonthlyInterest();
        if (isPositive(paid)) {
          this._post(account, {
            kind: "DEPOSIT",
            amount: paid,
            balanceBefore,
            balanceAfter: account.balance,
            memo: "Monthly interest",
          });
        }
        return paid;
      });
      total = addMoney(total, interest);
    }

    this._log.info({ totalInterest: total.amount }, "Monthly interest applied");
    return total;
  }

  /**
   * Charge CHECKING maintenance fees, then reset every account's monthly
   * counters. Returns the total fees charged.
   */
  async applyMonthlyFeesAndResetCounters(): Promise<Money> {
    let total = zeroMoney();

    for (const account of [...this._accounts.values()]) {
      const fee = await withAccountLocks(this._locks, [account], () => {
        if (!this._isRegistered(account)) {
          return zeroMoney();
        }
        const balanceBefore = account.balance;
        const charged = account.applyMonthlyFee();
        if (isPositive(charged)) {
          this._post(account, {
            kind: "WITHDRAWAL",
            amount: charged,
            balanceBefore,
            balanceAfter: account.balance,
            memo: "Monthly maintenance fee",
          });
        }
        account.resetMonthlyCounters();
        return charged;
      });
      total = addMoney(total, fee);
    }

    this._log.info({ totalFees: total.amount }, "Monthly fees applied and counters reset");
    return total;
  }

  /**
   * Close the billing cycle: interest first, then fees and counter reset.
   */
  async applyMonthlyAdjustments(): Promise<MonthlyAdjustmentResult> {
    const interest = await this.applyMonthlyInterest();
    const fees = await this.applyMonthlyFeesAndResetCounters();
    return { interest, fees };
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Copy of an account's history, optionally limited to inclusive bounds.
   */
  getTransactionHistory(accountNumber: string, filter?: HistoryFilter): TransactionRecord[] {
    const history = this._require(accountNumber).history;
    if (filter === undefined) {
      return [...history];
    }

    const from = filter.from === undefined ? undefined : parseBound(filter.from, "History start");
    const to = filter.to === undefined ? undefined : parseUpperBound(filter.to, "History end");

    return history.filter((record) => {
      const at = Date.parse(record.timestamp);
      if (from !== undefined && at < from) {
        return false;
      }
      if (to !== undefined && at > to) {
        return false;
      }
      return true;
    });
  }

  getFailedTransactions(accountNumber: string): TransactionRecord[] {
    return this._require(accountNumber).history.filter((r) => r.outcome === "FAILED");
  }

  generateMonthlyStatement(accountNumber: string): string {
    const account = this._require(accountNumber);
    return formatStatement(account.snapshot(), account.history);
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _require(accountNumber: string): Account {
    if (typeof accountNumber !== "string" || accountNumber === "") {
      throw new LedgerError("INVALID_ARGUMENT", "Account number is required");
    }
    const account = this._accounts.get(accountNumber);
    if (account === undefined) {
      throw new LedgerError("ACCOUNT_NOT_FOUND", `Account not found: ${accountNumber}`);
    }
    return account;
  }

  private _isRegistered(account: Account): boolean {
    return this._accounts.get(account.accountNumber) === account;
  }

  /**
   * The account may have been closed while this call waited for its lock.
   */
  private _assertRegistered(account: Account): void {
    if (!this._isRegistered(account)) {
      throw new LedgerError("ACCOUNT_NOT_FOUND", `Account not found: ${account.accountNumber}`);
    }
  }

  private _post(account: Account, input: PostingInput): TransactionRecord {
    const record = createTransactionRecord({
      ...input,
      id: this._ids.nextTransactionId(),
      timestamp: this._clock().toISOString(),
      accountNumber: account.accountNumber,
      outcome: "SUCCESS",
    });
    account.appendRecord(record);

    this._log.debug(
      {
        transactionId: record.id,
        accountNumber: account.accountNumber,
        kind: record.kind,
        amount: record.amount.amount,
        balanceAfter: record.balanceAfter.amount,
      },
      "Transaction posted",
    );
    return record;
  }

  private _reject(
    account: Account,
    kind: TransactionKind,
    amount: Money,
    reason: string,
    memo?: string,
  ): TransactionRecord {
    const balance = account.balance;
    const record = createTransactionRecord({
      id: this._ids.nextTransactionId(),
      timestamp: this._clock().toISOString(),
      accountNumber: account.accountNumber,
      kind,
      amount,
      balanceBefore: balance,
      balanceAfter: balance,
      outcome: "FAILED",
      failureReason: reason,
      memo,
    });
    account.appendRecord(record);

    this._log.warn(
      { transactionId: record.id, accountNumber: account.accountNumber, kind, amount: amount.amount, reason },
      "Transaction rejected",
    );
    return record;
  }
}
