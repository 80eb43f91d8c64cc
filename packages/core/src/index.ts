export type {
  AgentComponent,
  AgentEvents,
  AgentReference,
  ConnectivityAgent,
  PollableSocket,
  ReliableTransport,
} from './agent/ConnectivityAgent.js';
export {
  CancelledError,
  ClosedError,
  IncompleteWriteError,
  InvalidArgumentError,
  OutputStreamError,
  TransportError,
  WouldBlockError,
  isOutputStreamError,
  toTransportError,
} from './errors/errors.js';
export type { OutputStreamErrorCode } from './errors/errors.js';
export { TypedEventEmitter } from './events/TypedEventEmitter.js';
export type { EventMap, EventName } from './events/TypedEventEmitter.js';
export { AgentOutputStream } from './stream/AgentOutputStream.js';
export { Waiter } from './stream/Waiter.js';
export { WritableSource } from './stream/WritableSource.js';
export type { WritableSourceEvents } from './stream/WritableSource.js';
export { createWritable } from './stream/createWritable.js';
export type { WritableBridgeOptions } from './stream/createWritable.js';
export type { OutputStreamEvents, PollableOutputStream } from './stream/types.js';
export { dlog } from './utils/debug.js';
