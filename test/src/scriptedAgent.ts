import {
  type AgentComponent,
  type AgentEvents,
  type ConnectivityAgent,
  TypedEventEmitter,
  WouldBlockError,
} from '@icewrite/core';

/** Bytes accepted, a would-block, or a thrown error. */
export type SendOutcome = number | 'block' | Error;

/**
 * Agent whose sends follow a script. Once the script runs out every send
 * accepts everything it is given.
 */
export class ScriptedAgent extends TypedEventEmitter<AgentEvents> implements ConnectivityAgent {
  public reliable = true;
  public canSend = true;
  public socketWritable = false;
  public hasComponent = true;
  public writableTrigger?: AbortSignal;
  /** Runs inside every send, before the outcome is applied. */
  public onSend?: () => void;

  /** A copy of what each send attempt was given. */
  public readonly attempts: Uint8Array[] = [];
  private readonly outcomes: SendOutcome[];

  constructor(...outcomes: SendOutcome[]) {
    super();
    this.outcomes = outcomes;
  }

  public sendNonblocking(_streamId: number, _componentId: number, buffers: readonly Uint8Array[]): number {
    const payload = Buffer.concat(buffers);
    this.attempts.push(payload);
    this.onSend?.();

    const outcome = this.outcomes.shift() ?? payload.byteLength;
    if (outcome === 'block') throw new WouldBlockError();
    if (outcome instanceof Error) throw outcome;
    return Math.min(outcome, payload.byteLength);
  }

  public findComponent(_streamId: number, _componentId: number): AgentComponent | undefined {
    if (!this.hasComponent) return undefined;
    return {
      reliable: { canSend: () => this.canSend },
      sockets: [{ isWritable: () => this.socketWritable }],
      writableTrigger: this.writableTrigger,
    };
  }

  public emitWritable(streamId = 1, componentId = 1): void {
    this.emit('reliable-transport-writable', streamId, componentId);
  }

  public removeStreams(...streamIds: number[]): void {
    this.emit('streams-removed', streamIds);
  }
}

/** Lets every pending promise continuation run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function bytes(length: number, start = 0): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (start + i) & 0xff);
}
