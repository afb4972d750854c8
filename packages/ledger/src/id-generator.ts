/**
 * @coffer/ledger: Identifier generation.
 *
 * The Ledger only relies on ids never repeating. SequentialIdGenerator
 * is counter-based; the event loop runs each call to completion, so
 * concurrent callers can never observe the same counter value.
 */

export interface IdGenerator {
  nextAccountId(): string;
  nextTransactionId(): string;
}

export interface SequentialIdGeneratorOptions {
  /** Prefix for account numbers. Default: "ACC" */
  readonly accountPrefix?: string | undefined;
  /** Prefix for transaction ids. Default: "TXN" */
  readonly transactionPrefix?: string | undefined;
  /** Clock used for the transaction id timestamp. Default: `() => new Date()` */
  readonly clock?: (() => Date) | undefined;
}

/** yyyyMMddHHmmss in UTC. */
function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, "").slice(0, 14);
}

/**
 * Account numbers: ACC-00000001, ACC-00000002, ...
 * Transaction ids: TXN-20240115100000-000001, ...
 */
export class SequentialIdGenerator implements IdGenerator {
  private readonly _accountPrefix: string;
  private readonly _transactionPrefix: string;
  private readonly _clock: () => Date;
  private _accountCounter = 0;
  private _transactionCounter = 0;

  constructor(options: SequentialIdGeneratorOptions = {}) {
    this._accountPrefix = options.accountPrefix ?? "ACC";
    this._transactionPrefix = options.transactionPrefix ?? "TXN";
    this._clock = options.clock ?? (() => new Date());
  }

  nextAccountId(): string {
    this._accountCounter++;
    return `${this._accountPrefix}-${String(this._accountCounter).padStart(8, "0")}`;
  }

  nextTransactionId(): string {
    this._transactionCounter++;
    const stamp = compactTimestamp(this._clock());
    return `${this._transactionPrefix}-${stamp}-${String(this._transactionCounter).padStart(6, "0")}`;
  }
}
