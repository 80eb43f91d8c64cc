import type {
  AgentComponent,
  AgentEvents,
  ConnectivityAgent,
  PollableSocket,
} from '@icewrite/core';

import { type queueAsPromised, promise as fastqPromise } from 'fastq';
import {
  InvalidArgumentError,
  TransportError,
  TypedEventEmitter,
  WouldBlockError,
  dlog,
} from '@icewrite/core';
import { SendBuffer } from './SendBuffer.js';

/**
 * Configuration options for {@link LoopbackAgent}.
 */
export interface LoopbackAgentOptions {
  /**
   * Give every component a bounded reliable transport. Without it, sends are
   * datagrams that go out whole whenever a socket is writable.
   *
   * @default true
   */
  reliable?: boolean;

  /**
   * Bytes a component's reliable transport holds before sends would-block.
   *
   * @default 64 * 1024 (64KB)
   */
  sendBufferSize?: number;
}

type Notification =
  | { kind: 'writable'; streamId: number; componentId: number }
  | { kind: 'streams-removed'; streamIds: readonly number[] };

class LoopbackSocket implements PollableSocket {
  public writable = true;

  public isWritable(): boolean {
    return this.writable;
  }
}

class LoopbackComponent implements AgentComponent {
  public readonly reliable?: SendBuffer;
  public readonly sockets: LoopbackSocket[] = [new LoopbackSocket()];
  public readonly buffer: SendBuffer;
  public failure?: TransportError;
  private trigger = new AbortController();

  constructor(reliable: boolean, capacity: number) {
    this.buffer = new SendBuffer(reliable ? capacity : Number.POSITIVE_INFINITY);
    if (reliable) this.reliable = this.buffer;
    // Writable from the start.
    this.trigger.abort();
  }

  public get writableTrigger(): AbortSignal | undefined {
    return this.reliable ? this.trigger.signal : undefined;
  }

  public markFull(): void {
    if (this.trigger.signal.aborted) this.trigger = new AbortController();
  }

  public markWritable(): void {
    this.trigger.abort();
  }
}

/**
 * LoopbackAgent is an in-process {@link ConnectivityAgent}.
 *
 * Bytes sent on a component are queued in memory until the peer side takes
 * them with {@link LoopbackAgent.drain}. It manages:
 * - **Streams and components**, numbered from 1
 * - **Bounded reliable transports** that would-block when full and report
 *   writability once drained
 * - **Ordered notification delivery**: notifications go through a single
 *   worker queue, so one raised while another is being delivered waits its turn
 *
 * @example
 * const agent = new LoopbackAgent({ sendBufferSize: 4096 });
 * const streamId = agent.addStream();
 * const out = new AgentOutputStream(agent, streamId, 1);
 * const pending = out.write(payload);
 * const received = agent.drain(streamId, 1);
 */
export class LoopbackAgent extends TypedEventEmitter<AgentEvents> implements ConnectivityAgent {
  public readonly reliable: boolean;
  private readonly sendBufferSize: number;
  private readonly streams = new Map<number, LoopbackComponent[]>();
  private nextStreamId = 1;
  private readonly notifications: queueAsPromised<Notification>;

  constructor(options: LoopbackAgentOptions = {}) {
    super();
    this.reliable = options.reliable ?? true;
    this.sendBufferSize = options.sendBufferSize ?? 64 * 1024;
    if (!Number.isInteger(this.sendBufferSize) || this.sendBufferSize < 1) {
      throw new InvalidArgumentError(`sendBufferSize must be a positive integer, got ${this.sendBufferSize}`);
    }

    this.notifications = fastqPromise(this, this.deliver.bind(this), 1);
  }

  /**
   * Adds a stream with `components` components.
   *
   * @returns The new stream id.
   */
  public addStream(components = 1): number {
    if (!Number.isInteger(components) || components < 1) {
      throw new InvalidArgumentError(`a stream needs at least one component, got ${components}`);
    }
    const streamId = this.nextStreamId++;
    this.streams.set(
      streamId,
      Array.from({ length: components }, () => new LoopbackComponent(this.reliable, this.sendBufferSize)),
    );
    return streamId;
  }

  public removeStream(streamId: number): void {
    this.removeStreams([streamId]);
  }

  /** Drops the given streams and notifies `streams-removed` for those that existed. */
  public removeStreams(streamIds: readonly number[]): void {
    const removed = streamIds.filter((id) => this.streams.delete(id));
    if (removed.length > 0) this.notify({ kind: 'streams-removed', streamIds: removed });
  }

  public findComponent(streamId: number, componentId: number): AgentComponent | undefined {
    return this.lookup(streamId, componentId);
  }

  public sendNonblocking(streamId: number, componentId: number, buffers: readonly Uint8Array[]): number {
    const component = this.lookup(streamId, componentId);
    if (!component) {
      throw new TransportError(`Could not find component ${componentId} in stream ${streamId}`);
    }
    if (component.failure) throw component.failure;

    if (!this.reliable) {
      if (!component.sockets.some((socket) => socket.isWritable())) throw new WouldBlockError();
      return component.buffer.enqueue(buffers);
    }

    if (!component.buffer.canSend()) throw new WouldBlockError();
    const accepted = component.buffer.enqueue(buffers, component.buffer.free);
    if (!component.buffer.canSend()) component.markFull();
    return accepted;
  }

  /**
   * Takes up to `maxBytes` queued bytes off a component, as the remote peer
   * would. Freeing room in a full reliable transport fires its writable
   * trigger and notifies `reliable-transport-writable`.
   */
  public drain(streamId: number, componentId: number, maxBytes = Number.POSITIVE_INFINITY): Uint8Array {
    const component = this.require(streamId, componentId);
    const wasFull = !component.buffer.canSend();
    const data = component.buffer.read(maxBytes);

    if (this.reliable && wasFull && component.buffer.canSend()) {
      component.markWritable();
      this.notify({ kind: 'writable', streamId, componentId });
    }
    return data;
  }

  /** Bytes queued on a component and not yet drained. */
  public queuedBytes(streamId: number, componentId: number): number {
    return this.require(streamId, componentId).buffer.size;
  }

  /**
   * Sets whether the component's sockets poll writable. Without a reliable
   * transport the sockets gate every send, so a socket turning writable
   * notifies `reliable-transport-writable`.
   */
  public setSocketWritable(streamId: number, componentId: number, writable: boolean): void {
    const component = this.require(streamId, componentId);
    const wasWritable = component.sockets.some((socket) => socket.isWritable());
    for (const socket of component.sockets) socket.writable = writable;

    if (!this.reliable && writable && !wasWritable) {
      this.notify({ kind: 'writable', streamId, componentId });
    }
  }

  /** Makes every later send on the component fail with a {@link TransportError}. */
  public breakComponent(streamId: number, componentId: number, reason: string): void {
    this.require(streamId, componentId).failure = new TransportError(reason);
  }

  /** Resolves once every queued notification has been delivered. */
  public whenIdle(): Promise<void> {
    return this.notifications.drained();
  }

  /**
   * Drops all streams with their queued bytes, pending notifications and
   * listeners. No notification is delivered for the dropped streams.
   */
  public dispose(): void {
    this.notifications.kill();
    for (const components of this.streams.values()) {
      for (const component of components) component.buffer.clear();
    }
    this.streams.clear();
    this.removeAllListeners();
  }

  private notify(notification: Notification): void {
    void this.notifications.push(notification).catch((err: unknown) => {
      dlog('loopback:error', `listener failed during ${notification.kind} notification`, err);
    });
  }

  private async deliver(notification: Notification): Promise<void> {
    dlog('loopback:notify', notification);
    if (notification.kind === 'writable') {
      this.emit('reliable-transport-writable', notification.streamId, notification.componentId);
    } else {
      this.emit('streams-removed', notification.streamIds);
    }
  }

  private lookup(streamId: number, componentId: number): LoopbackComponent | undefined {
    return this.streams.get(streamId)?.[componentId - 1];
  }

  private require(streamId: number, componentId: number): LoopbackComponent {
    const component = this.lookup(streamId, componentId);
    if (!component) {
      throw new InvalidArgumentError(`Could not find component ${componentId} in stream ${streamId}`);
    }
    return component;
  }
}
