export type OutputStreamErrorCode =
  | 'CLOSED'
  | 'WOULD_BLOCK'
  | 'CANCELLED'
  | 'INVALID_ARGUMENT'
  | 'TRANSPORT'
  | 'INCOMPLETE_WRITE';

/**
 * Base class of every error raised by an output stream or an agent send.
 *
 * `code` lets callers branch without `instanceof` checks across package copies.
 */
export class OutputStreamError extends Error {
  constructor(
    public readonly code: OutputStreamErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The stream was closed, its stream was removed from the agent, or the agent
 * itself has been finalised.
 */
export class ClosedError extends OutputStreamError {
  constructor(message = 'Stream is closed.') {
    super('CLOSED', message);
  }
}

/**
 * No send capacity right now. Raised by agents from a non-blocking send and
 * surfaced by {@link PollableOutputStream.writeNonblocking}; the blocking
 * write absorbs it.
 */
export class WouldBlockError extends OutputStreamError {
  constructor(message = 'Resource temporarily unavailable') {
    super('WOULD_BLOCK', message);
  }
}

export class CancelledError extends OutputStreamError {
  constructor(reason?: unknown) {
    super('CANCELLED', 'Operation was cancelled', { cause: reason });
  }
}

export class InvalidArgumentError extends OutputStreamError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/** Permanent send failure reported by the agent. */
export class TransportError extends OutputStreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
  }
}

/**
 * `writeAll` accepted some bytes and then failed. `cause` is the error that
 * stopped it.
 */
export class IncompleteWriteError extends OutputStreamError {
  constructor(
    public readonly bytesWritten: number,
    cause: unknown,
  ) {
    super('INCOMPLETE_WRITE', `Write stopped after ${bytesWritten} bytes`, { cause });
  }
}

export function isOutputStreamError(err: unknown): err is OutputStreamError {
  return err instanceof OutputStreamError;
}

/**
 * Passes stream errors through untouched and wraps anything else an agent
 * throws into a {@link TransportError}.
 */
export function toTransportError(err: unknown): OutputStreamError {
  if (isOutputStreamError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(`Agent send failed: ${message}`, { cause: err });
}
