/**
 * EventBus: Lightweight typed pub/sub between the engine and whatever
 * renders it (terminal, web view, tests).
 *
 * The type parameter maps each event name to its handler arguments.
 */

export type EventHandler<TArgs extends unknown[]> = (...args: TArgs) => void;

export class EventBus<TEvents extends { [K in keyof TEvents]: unknown[] }> {
  private handlers: { [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>> } =
    {};

  /** Subscribe to an event */
  on<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<TEvents[K]>>();
      this.handlers[event] = set;
    }
    set.add(handler);
  }

  /** Unsubscribe from an event */
  off<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): void {
    this.handlers[event]?.delete(handler);
  }

  /** Subscribe to an event, auto-unsubscribe after first call */
  once<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): void {
    const wrapper: EventHandler<TEvents[K]> = (...args) => {
      this.off(event, wrapper);
      handler(...args);
    };
    this.on(event, wrapper);
  }

  /** Emit an event to the handlers subscribed when the emit starts */
  emit<K extends keyof TEvents>(event: K, ...args: TEvents[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    [...set].forEach((h) => h(...args));
  }

  /** Remove all handlers for an event, or all handlers if no event specified */
  clear(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }

  /** Get count of listeners for an event */
  listenerCount(event: keyof TEvents): number {
    return this.handlers[event]?.size ?? 0;
  }
}
