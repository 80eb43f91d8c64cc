import type { ReliableTransport } from '@icewrite/core';
import { Deque } from './Deque.js';

/**
 * Bounded byte queue standing in for the send window of a reliable
 * transport. Bytes are copied in on enqueue and handed out in order on read.
 */
export class SendBuffer implements ReliableTransport {
  private readonly segments = new Deque<Uint8Array>();
  private queued = 0;

  constructor(public readonly capacity: number) {}

  public get size(): number {
    return this.queued;
  }

  public get free(): number {
    return Math.max(0, this.capacity - this.queued);
  }

  public canSend(): boolean {
    return this.queued < this.capacity;
  }

  /**
   * Copies up to `limit` bytes from `buffers` into the queue.
   *
   * @returns Bytes taken.
   */
  public enqueue(buffers: readonly Uint8Array[], limit = Number.POSITIVE_INFINITY): number {
    let taken = 0;
    for (const buffer of buffers) {
      if (taken >= limit) break;
      const n = Math.min(buffer.byteLength, limit - taken);
      if (n === 0) continue;
      this.segments.push(buffer.slice(0, n));
      taken += n;
    }
    this.queued += taken;
    return taken;
  }

  /** Removes and returns up to `maxBytes` from the head of the queue. */
  public read(maxBytes = Number.POSITIVE_INFINITY): Uint8Array {
    const parts: Uint8Array[] = [];
    let total = 0;

    while (total < maxBytes) {
      const segment = this.segments.shift();
      if (!segment) break;

      const n = Math.min(segment.byteLength, maxBytes - total);
      if (n < segment.byteLength) this.segments.unshift(segment.subarray(n));
      parts.push(segment.subarray(0, n));
      total += n;
    }
    this.queued -= total;

    const out = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
      out.set(part, offset);
      offset += part.byteLength;
    }
    return out;
  }

  public clear(): void {
    this.segments.clear();
    this.queued = 0;
  }
}
