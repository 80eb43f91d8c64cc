import type { AgentComponent, AgentReference, ConnectivityAgent } from '../agent/ConnectivityAgent.js';
import type { OutputStreamEvents, PollableOutputStream } from './types.js';

import {
  CancelledError,
  ClosedError,
  IncompleteWriteError,
  InvalidArgumentError,
  type OutputStreamError,
  TransportError,
  WouldBlockError,
  toTransportError,
} from '../errors/errors.js';
import { TypedEventEmitter } from '../events/TypedEventEmitter.js';
import { dlog } from '../utils/debug.js';
import { Waiter } from './Waiter.js';
import { WritableSource } from './WritableSource.js';

const AGENT_FINALISED = 'Stream is closed due to the agent being finalised.';

/**
 * AgentOutputStream turns an agent's non-blocking, event-driven send into an
 * ordinary awaitable write for a single stream/component pair.
 *
 * It manages:
 * - **Retrying writes** that park on writability notifications between attempts
 * - **Partial progress**: bytes accepted before a failure are never discarded
 * - **Cancellation** through an `AbortSignal`
 * - **Lifecycle**: the agent is held weakly, and the stream closes itself when
 *   its stream is removed from the agent
 *
 * Closing the output stream does not remove the stream from the agent.
 *
 * Only one `write()` should be in flight per instance. Concurrent writes are
 * not rejected, but their bytes may interleave.
 *
 * @example
 * const out = new AgentOutputStream(agent, streamId, 1);
 * const n = await out.write(payload, AbortSignal.timeout(5_000));
 */
export class AgentOutputStream
  extends TypedEventEmitter<OutputStreamEvents>
  implements PollableOutputStream
{
  public readonly streamId: number;
  public readonly componentId: number;

  private agentRef?: AgentReference;
  private _closed = false;
  private readonly inflight = new Set<Waiter>();

  private readonly onStreamsRemoved = (streamIds: readonly number[]) => {
    if (!streamIds.includes(this.streamId)) return;
    dlog('stream:close', `stream ${this.streamId} removed from agent`);
    this.close();
  };

  /**
   * @param agent - The agent itself, or a weak reference to it shared with
   *   another stream. A reference that no longer resolves yields a stream on
   *   which every operation fails with {@link ClosedError}.
   * @param streamId - Agent stream to write to, at least 1.
   * @param componentId - Component of that stream, at least 1.
   * @throws {InvalidArgumentError} On a missing agent or an id below 1.
   */
  constructor(agent: ConnectivityAgent | AgentReference, streamId: number, componentId: number) {
    super();
    if (!isValidId(streamId)) {
      throw new InvalidArgumentError(`stream id must be an integer >= 1, got ${streamId}`);
    }
    if (!isValidId(componentId)) {
      throw new InvalidArgumentError(`component id must be an integer >= 1, got ${componentId}`);
    }

    this.streamId = streamId;
    this.componentId = componentId;
    this.agentRef = toAgentReference(agent);
    this.agentRef.deref()?.on('streams-removed', this.onStreamsRemoved);
  }

  /** The agent, while it is still alive and the stream not destroyed. */
  public get agent(): ConnectivityAgent | undefined {
    return this.agentRef?.deref();
  }

  public get closed(): boolean {
    return this._closed;
  }

  /**
   * Writes `buffer`, waiting for send capacity as often as needed.
   *
   * Resolves with the number of bytes the agent accepted, which is the full
   * length unless a failure, a cancellation or a close came after some bytes
   * had already gone out. A call that moves no bytes rejects.
   *
   * @throws {ClosedError} The stream is closed or closes while waiting.
   * @throws {CancelledError} `signal` fired before any byte was accepted.
   * @throws {TransportError} The agent failed permanently before any byte was accepted.
   */
  public async write(buffer: Uint8Array, signal?: AbortSignal): Promise<number> {
    const agent = this.resolveAgent();
    if (buffer.byteLength === 0) return 0;

    const waiter = new Waiter(signal ? 3 : 2);
    const onAbort = () => waiter.fail(new CancelledError(signal?.reason));
    const onWritable = (streamId: number, componentId: number) => {
      if (streamId === this.streamId && componentId === this.componentId) waiter.markWritable();
    };

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
    agent.on('reliable-transport-writable', onWritable);
    this.inflight.add(waiter);

    let sent = 0;
    let failure: OutputStreamError | undefined;
    let interruption: Error | undefined;

    try {
      while (sent < buffer.byteLength && !waiter.error) {
        // Cleared before the attempt so a notification raised from inside the
        // send is still seen afterwards.
        waiter.reset();

        let accepted: number;
        try {
          accepted = agent.sendNonblocking(this.streamId, this.componentId, [buffer.subarray(sent)]);
        } catch (err) {
          if (!(err instanceof WouldBlockError)) {
            failure = toTransportError(err);
            break;
          }
          if (!waiter.writable && !waiter.error) await waiter.wait();
          continue;
        }

        // Taking nothing without a would-block is a failure.
        if (accepted <= 0) {
          failure = new TransportError('Agent accepted no bytes');
          break;
        }
        sent += accepted;
      }
    } finally {
      this.inflight.delete(waiter);
      agent.off('reliable-transport-writable', onWritable);
      waiter.release();
      if (signal) {
        signal.removeEventListener('abort', onAbort);
        waiter.release();
      }
      interruption = waiter.error;
      waiter.release();
    }

    if (sent > 0) {
      if (sent < buffer.byteLength) {
        dlog('stream:write', `partial write ${sent}/${buffer.byteLength}`, failure ?? interruption);
      }
      return sent;
    }
    if (failure) throw failure;
    if (interruption) throw interruption;
    return sent;
  }

  /**
   * Keeps calling {@link write} on the unsent tail until all of `buffer` is
   * accepted.
   *
   * @throws {IncompleteWriteError} A failure after some bytes were written;
   *   `bytesWritten` says how many, `cause` says why.
   */
  public async writeAll(buffer: Uint8Array, signal?: AbortSignal): Promise<number> {
    if (buffer.byteLength === 0) return this.write(buffer, signal);

    let written = 0;
    while (written < buffer.byteLength) {
      try {
        written += await this.write(buffer.subarray(written), signal);
      } catch (err) {
        if (written === 0) throw err;
        throw new IncompleteWriteError(written, err);
      }
    }
    return written;
  }

  public writeNonblocking(buffer: Uint8Array): number {
    const agent = this.resolveAgent();
    if (buffer.byteLength === 0) return 0;

    if (!this.isWritable()) throw new WouldBlockError();

    try {
      return agent.sendNonblocking(this.streamId, this.componentId, [buffer]);
    } catch (err) {
      throw toTransportError(err);
    }
  }

  /**
   * Whether the component's reliable transport has room, or any of its
   * sockets polls writable. Intentionally racy.
   */
  public isWritable(): boolean {
    if (this._closed) return false;
    const agent = this.agentRef?.deref();
    if (!agent) return false;

    const component = this.lookupComponent(agent);
    if (!component) return false;

    if (agent.reliable && component.reliable?.canSend()) return true;
    return component.sockets.some((socket) => socket.isWritable());
  }

  /**
   * Creates a readiness handle for this component, optionally also made ready
   * by `signal`. The caller owns it and must `destroy()` it.
   */
  public createSource(signal?: AbortSignal): WritableSource {
    if (this._closed) return WritableSource.closed();
    const agent = this.agentRef?.deref();
    if (!agent) return WritableSource.closed();

    const source = WritableSource.create();
    if (signal) source.trackSignal(signal, true);

    const component = this.lookupComponent(agent, 'source:warn');
    if (!component) return source;

    source.trackWritability(agent, this.streamId, this.componentId);
    if (component.writableTrigger) source.trackSignal(component.writableTrigger, false);
    return source;
  }

  /**
   * Marks the stream closed and wakes any parked write. Idempotent.
   */
  public close(): void {
    if (this._closed) return;
    this._closed = true;

    const error = new ClosedError();
    for (const waiter of this.inflight) waiter.fail(error);

    dlog('stream:close', `closed stream ${this.streamId}/${this.componentId}`);
    this.emit('close');
  }

  /**
   * Closes the stream, stops observing the agent and drops the reference to
   * it. Safe to call after the agent is gone.
   */
  public destroy(): void {
    this.close();
    this.agentRef?.deref()?.off('streams-removed', this.onStreamsRemoved);
    this.agentRef = undefined;
    this.removeAllListeners();
  }

  private resolveAgent(): ConnectivityAgent {
    if (this._closed) throw new ClosedError();
    const agent = this.agentRef?.deref();
    if (!agent) throw new ClosedError(AGENT_FINALISED);
    return agent;
  }

  private lookupComponent(agent: ConnectivityAgent, ns = 'stream:warn'): AgentComponent | undefined {
    const component = agent.findComponent(this.streamId, this.componentId);
    if (!component) {
      dlog(ns, `Could not find component ${this.componentId} in stream ${this.streamId}`);
    }
    return component;
  }
}

function isValidId(id: number): boolean {
  return Number.isInteger(id) && id >= 1;
}

function isConnectivityAgent(value: object): value is ConnectivityAgent {
  return 'sendNonblocking' in value && typeof value.sendNonblocking === 'function';
}

function isAgentReference(value: object): value is AgentReference {
  return 'deref' in value && typeof value.deref === 'function';
}

function toAgentReference(agent: ConnectivityAgent | AgentReference): AgentReference {
  if (typeof agent === 'object' && agent !== null) {
    if (isConnectivityAgent(agent)) return new WeakRef(agent);
    if (isAgentReference(agent)) return agent;
  }
  throw new InvalidArgumentError('agent must be a connectivity agent or a reference to one');
}
