import type { EventName } from '../events/TypedEventEmitter.js';

/**
 * Notifications an agent delivers to its observers.
 *
 * Delivery happens from the agent's own context and may re-enter listeners
 * that are themselves running inside a call into the agent.
 */
export interface AgentEvents {
  /** Previously exhausted send capacity of a component has freed up. */
  'reliable-transport-writable': (streamId: number, componentId: number) => void;
  /** The listed streams were torn down. */
  'streams-removed': (streamIds: readonly number[]) => void;
}

/** Embedded stream-over-datagram layer of a component. */
export interface ReliableTransport {
  canSend(): boolean;
}

/** A raw socket bound to a component. */
export interface PollableSocket {
  isWritable(): boolean;
}

/**
 * Point-in-time view of one component of one stream.
 */
export interface AgentComponent {
  readonly reliable?: ReliableTransport;
  readonly sockets: readonly PollableSocket[];
  /**
   * Aborted while the reliable transport can accept data. The agent swaps in
   * a fresh, un-aborted signal each time the transport fills up.
   */
  readonly writableTrigger?: AbortSignal;
}

/**
 * The slice of a connectivity agent that output streams consume.
 */
export interface ConnectivityAgent {
  readonly reliable: boolean;

  /**
   * Queues `buffers` on the component without blocking.
   *
   * @returns Bytes accepted.
   * @throws {WouldBlockError} When there is no capacity right now.
   */
  sendNonblocking(streamId: number, componentId: number, buffers: readonly Uint8Array[]): number;

  findComponent(streamId: number, componentId: number): AgentComponent | undefined;

  on<K extends EventName<AgentEvents>>(event: K, listener: AgentEvents[K]): unknown;
  off<K extends EventName<AgentEvents>>(event: K, listener: AgentEvents[K]): unknown;
}

/** Anything that can hand back the agent, or nothing once it is gone. */
export interface AgentReference {
  deref(): ConnectivityAgent | undefined;
}
