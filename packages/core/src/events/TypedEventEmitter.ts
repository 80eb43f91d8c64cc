import { EventEmitter } from 'node:events';

/** Event names mapped to their listener signatures. */
export type EventMap<Events> = { [K in keyof Events]: (...args: any[]) => void };

/** String event names of an event map. */
export type EventName<Events> = keyof Events & string;

/**
 * EventEmitter wrapper keyed by an event map, used for agent notifications,
 * output stream `close` and source `ready` events.
 *
 * Listeners run synchronously in registration order; a listener that throws
 * propagates out of `emit`.
 *
 * @example
 * class Agent extends TypedEventEmitter<AgentEvents> {}
 * agent.on('streams-removed', (ids) => ids.forEach(forget));
 */
export class TypedEventEmitter<Events extends EventMap<Events>> {
  private readonly emitter = new EventEmitter();

  public on<K extends EventName<Events>>(event: K, listener: Events[K]): this {
    this.emitter.on(event, listener);
    return this;
  }

  public off<K extends EventName<Events>>(event: K, listener: Events[K]): this {
    this.emitter.off(event, listener);
    return this;
  }

  public emit<K extends EventName<Events>>(event: K, ...args: Parameters<Events[K]>): boolean {
    return this.emitter.emit(event, ...args);
  }

  public listenerCount(event: EventName<Events>): number {
    return this.emitter.listenerCount(event);
  }

  /** Drops the listeners of `event`, or of every event. */
  public removeAllListeners(event?: EventName<Events>): this {
    if (event === undefined) this.emitter.removeAllListeners();
    else this.emitter.removeAllListeners(event);
    return this;
  }
}
