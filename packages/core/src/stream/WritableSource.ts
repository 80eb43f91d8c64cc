import type { ConnectivityAgent } from '../agent/ConnectivityAgent.js';
import { ClosedError } from '../errors/errors.js';
import { TypedEventEmitter } from '../events/TypedEventEmitter.js';

export interface WritableSourceEvents {
  ready: () => void;
}

/**
 * Readiness handle returned by {@link PollableOutputStream.createSource}.
 *
 * The source becomes ready when one of its tracked signals aborts or when the
 * agent reports that the tracked component can take data again. Readiness is
 * a hint: callers re-check with `isWritable()` or `writeNonblocking()` and
 * call {@link WritableSource.rearm} before waiting again.
 *
 * A source created for a closed stream is permanently ready and never emits.
 *
 * @example
 * const source = stream.createSource(signal);
 * source.on('ready', () => {
 *   try { stream.writeNonblocking(chunk); } catch (err) { ... }
 *   source.rearm();
 * });
 */
export class WritableSource extends TypedEventEmitter<WritableSourceEvents> {
  private ready: boolean;
  private destroyed = false;
  private readonly stickySignals: AbortSignal[] = [];
  private readonly cleanups: (() => void)[] = [];
  private waiters: { resolve: () => void; reject: (err: Error) => void }[] = [];

  private constructor(private readonly permanent: boolean) {
    super();
    this.ready = permanent;
  }

  /** A live source with nothing tracked yet. */
  public static create(): WritableSource {
    return new WritableSource(false);
  }

  /** A source that is ready forever and never signals again. */
  public static closed(): WritableSource {
    return new WritableSource(true);
  }

  public get isReady(): boolean {
    return this.ready;
  }

  public get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Makes the source ready when `signal` aborts.
   *
   * @param sticky - Keep the source ready across {@link rearm} for as long as
   *   the signal stays aborted. Caller cancellation signals are sticky; the
   *   component's writable trigger is one-shot.
   */
  public trackSignal(signal: AbortSignal, sticky: boolean): this {
    if (this.permanent || this.destroyed) return this;
    if (sticky) this.stickySignals.push(signal);
    if (signal.aborted) {
      this.ready = true;
      return this;
    }

    const onAbort = () => this.trigger();
    signal.addEventListener('abort', onAbort, { once: true });
    this.cleanups.push(() => signal.removeEventListener('abort', onAbort));
    return this;
  }

  /**
   * Makes the source ready on every writability notification for the given
   * stream/component. Holds the agent weakly.
   */
  public trackWritability(agent: ConnectivityAgent, streamId: number, componentId: number): this {
    if (this.permanent || this.destroyed) return this;

    const onWritable = (sid: number, cid: number) => {
      if (sid === streamId && cid === componentId) this.trigger();
    };
    agent.on('reliable-transport-writable', onWritable);

    const agentRef = new WeakRef(agent);
    this.cleanups.push(() => {
      agentRef.deref()?.off('reliable-transport-writable', onWritable);
    });
    return this;
  }

  /**
   * Resolves once the source is ready. Rejects with a {@link ClosedError} if the
   * source is destroyed first.
   */
  public whenReady(): Promise<void> {
    if (this.ready) return Promise.resolve();
    if (this.destroyed) return Promise.reject(new ClosedError('Source was destroyed.'));
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  /** Clears readiness so the next trigger is observed. */
  public rearm(): void {
    if (this.permanent || this.destroyed) return;
    this.ready = this.stickySignals.some((signal) => signal.aborted);
  }

  /** Drops every subscription. Idempotent. */
  public destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    for (const cleanup of this.cleanups.splice(0)) cleanup();

    const waiters = this.waiters;
    this.waiters = [];
    for (const { reject } of waiters) reject(new ClosedError('Source was destroyed.'));
    this.removeAllListeners();
  }

  private trigger(): void {
    if (this.destroyed) return;
    this.ready = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const { resolve } of waiters) resolve();

    this.emit('ready');
  }
}
