export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

/** Typed event emitter; `Events` maps each event name to its arguments. */
export class EventEmitter<Events extends EventMap> {
  private events: {
    [K in keyof Events]?: Array<Listener<Events[K]>>;
  } = {};

  public on<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const listeners = this.events[event] ?? [];
    listeners.push(listener);
    this.events[event] = listeners;
    return this;
  }

  public off<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const listeners = this.events[event];
    if (!listeners) return this;
    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    return this;
  }

  public once<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const onceWrapper = (...args: Events[K]) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
    const listeners = this.events[event];
    if (!listeners || listeners.length === 0) return false;
    for (const listener of [...listeners]) {
      listener(...args);
    }
    return true;
  }

  public listenerCount<K extends keyof Events>(event: K): number {
    return this.events[event]?.length ?? 0;
  }
}
