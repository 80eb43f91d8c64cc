import { dlog } from '../utils/debug.js';

/**
 * Wake-up record shared by one blocking write and the notification
 * subscriptions it registers.
 *
 * Each subscription owns a share of the record and releases it when it is
 * removed; the write call owns the last share. Notifications that arrive
 * after the final release are dropped.
 *
 * `writable` is cleared before every send attempt and set only by a
 * writability notification. `error` is recorded at most once.
 */
export class Waiter {
  private owners: number;
  private sleepers: (() => void)[] = [];
  private _writable = false;
  private _error?: Error;

  constructor(owners: number) {
    if (!Number.isInteger(owners) || owners < 1) {
      throw new RangeError(`Waiter needs at least one owner, got ${owners}`);
    }
    this.owners = owners;
  }

  public get writable(): boolean {
    return this._writable;
  }

  public get error(): Error | undefined {
    return this._error;
  }

  public get disposed(): boolean {
    return this.owners === 0;
  }

  /** Called right before a send attempt consumes any pending notification. */
  public reset(): void {
    this._writable = false;
  }

  public markWritable(): void {
    if (this.disposed) {
      dlog('stream:write', 'writability notification after waiter disposal (ignored)');
      return;
    }
    this._writable = true;
    this.broadcast();
  }

  /** Records `error` unless one is already set, and wakes every sleeper. */
  public fail(error: Error): void {
    if (this.disposed) return;
    this._error ??= error;
    this.broadcast();
  }

  /**
   * Resolves on the next notification, or at once if one is already pending.
   */
  public wait(): Promise<void> {
    if (this._writable || this._error) return Promise.resolve();
    return new Promise((resolve) => this.sleepers.push(resolve));
  }

  /**
   * Drops one ownership share.
   *
   * @returns `true` when this was the last share and the record is now disposed.
   */
  public release(): boolean {
    if (this.owners === 0) {
      throw new Error('Waiter released more times than it has owners');
    }
    this.owners--;
    if (this.owners > 0) return false;

    this.broadcast();
    this._error = undefined;
    return true;
  }

  private broadcast(): void {
    const sleepers = this.sleepers;
    this.sleepers = [];
    for (const wake of sleepers) wake();
  }
}
