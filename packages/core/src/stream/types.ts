import type { WritableSource } from './WritableSource.js';

/**
 * Output stream that can be driven without ever suspending.
 */
export interface PollableOutputStream {
  /** Point-in-time guess; a following write may still would-block. */
  isWritable(): boolean;

  /**
   * One send attempt, no waiting.
   *
   * @returns Bytes accepted.
   * @throws {WouldBlockError} When the stream cannot take data right now.
   */
  writeNonblocking(buffer: Uint8Array): number;

  createSource(signal?: AbortSignal): WritableSource;
}

export interface OutputStreamEvents {
  /** Emitted once, the first time the stream closes. */
  close: () => void;
}
