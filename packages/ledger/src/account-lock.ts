/**
 * @coffer/ledger: Per-account mutual exclusion.
 *
 * Each Account is its own lock domain. Locks live in a LockTable keyed
 * by the Account object, apart from the Ledger's account directory.
 *
 * Multi-account operations acquire their locks in canonical order
 * (account number, code-unit comparison). Two transfers over the same
 * pair therefore queue on the same first lock whichever direction they
 * run, and can never wait on each other in a cycle.
 */

import type { Account } from "./account.js";

export type ReleaseLock = () => void;

/**
 * FIFO async mutex. Waiters are granted the lock in request order.
 */
export class AccountLock {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Whether the lock is held or has queued waiters.
   */
  get isLocked(): boolean {
    return this._pending > 0;
  }

  /**
   * Resolve once the lock is held. Call the returned function to release;
   * extra calls are ignored.
   */
  acquire(): Promise<ReleaseLock> {
    this._pending++;

    let grant: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      grant = resolve;
    });

    const previous = this._tail;
    this._tail = previous.then(() => released);

    let done = false;
    const release: ReleaseLock = () => {
      if (done) return;
      done = true;
      this._pending--;
      grant();
    };

    return previous.then(() => release);
  }
}

/**
 * Lazily associates one AccountLock with each Account object.
 */
export class LockTable {
  private readonly _locks = new WeakMap<Account, AccountLock>();

  lockFor(account: Account): AccountLock {
    let lock = this._locks.get(account);
    if (lock === undefined) {
      lock = new AccountLock();
      this._locks.set(account, lock);
    }
    return lock;
  }
}

/**
 * Sort participants into canonical lock order, dropping duplicates.
 */
export function lockOrder(accounts: readonly Account[]): Account[] {
  const unique = [...new Set(accounts)];
  return unique.sort((a, b) => {
    if (a.accountNumber < b.accountNumber) return -1;
    if (a.accountNumber > b.accountNumber) return 1;
    return 0;
  });
}

/**
 * Run `fn` while holding the locks of every account in `accounts`.
 *
 * Locks are taken in canonical order and released in reverse order,
 * also when `fn` throws. `fn` runs synchronously, so nothing else
 * interleaves with it.
 */
export async function withAccountLocks<T>(
  table: LockTable,
  accounts: readonly Account[],
  fn: () => T,
): Promise<T> {
  const releases: ReleaseLock[] = [];
  try {
    for (const account of lockOrder(accounts)) {
      releases.push(await table.lockFor(account).acquire());
    }
    return fn();
  } finally {
    for (const release of releases.reverse()) {
      release();
    }
  }
}
