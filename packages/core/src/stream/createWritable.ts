import { Writable } from 'node:stream';
import type { AgentOutputStream } from './AgentOutputStream.js';

export interface WritableBridgeOptions {
  /**
   * Buffer level at which `write()` on the returned stream starts returning
   * `false`.
   *
   * @default 16 * 1024
   */
  highWaterMark?: number;
}

/**
 * Exposes an {@link AgentOutputStream} as a Node.js `Writable`.
 *
 * - Every chunk is handed to `writeAll`, so a chunk either goes out whole or
 *   errors the stream.
 * - `end()` closes the output stream once buffered chunks are written.
 * - `destroy()` aborts the chunk currently waiting for capacity; the output
 *   stream itself stays open.
 *
 * @example
 * await pipeline(fs.createReadStream(file), createWritable(out));
 */
export function createWritable(stream: AgentOutputStream, options: WritableBridgeOptions = {}): Writable {
  const controller = new AbortController();

  return new Writable({
    highWaterMark: options.highWaterMark ?? 16 * 1024,
    write(chunk: Buffer, _encoding, callback) {
      stream.writeAll(chunk, controller.signal).then(
        () => callback(),
        (err: unknown) => callback(err instanceof Error ? err : new Error(String(err))),
      );
    },
    final(callback) {
      stream.close();
      callback();
    },
    destroy(err, callback) {
      controller.abort(err ?? undefined);
      callback(err);
    },
  });
}
