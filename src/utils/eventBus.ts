import { createLogger } from "./logger";

const log = createLogger({ component: "EventBus" });

export type EventListener<D> = (detail: D) => void;

/**
 * Strongly typed in-process event bus.
 *
 * The map `M` ties every event name to its payload type:
 *
 * ```ts
 * type Events = { childrenLoaded: { pathKey: string; count: number } };
 * const bus = createEventBus<Events>();
 * const off = bus.on("childrenLoaded", ({ count }) => render(count));
 * off();
 * ```
 *
 * Delivery is synchronous and in registration order. A listener that throws
 * is logged and skipped; the emitter and the remaining listeners carry on.
 */
export interface EventBus<M extends Record<string, unknown>> {
  on<K extends keyof M & string>(type: K, listener: EventListener<M[K]>): () => void;
  once<K extends keyof M & string>(type: K, listener: EventListener<M[K]>): () => void;
  off<K extends keyof M & string>(type: K, listener: EventListener<M[K]>): void;
  emit<K extends keyof M & string>(type: K, detail: M[K]): void;
  listenerCount(type: keyof M & string): number;
  removeAllListeners(type?: keyof M & string): void;
}

export function createEventBus<M extends Record<string, unknown>>(): EventBus<M> {
  let listeners: { [K in keyof M]?: Set<EventListener<M[K]>> } = {};

  const off = <K extends keyof M & string>(type: K, listener: EventListener<M[K]>): void => {
    listeners[type]?.delete(listener);
  };

  const on = <K extends keyof M & string>(type: K, listener: EventListener<M[K]>): (() => void) => {
    let set = listeners[type];
    if (!set) {
      set = new Set<EventListener<M[K]>>();
      listeners[type] = set;
    }
    set.add(listener);
    return () => off(type, listener);
  };

  return {
    on,
    off,

    once(type, listener) {
      const wrapper: typeof listener = (detail) => {
        off(type, wrapper);
        listener(detail);
      };
      return on(type, wrapper);
    },

    emit(type, detail) {
      const set = listeners[type];
      if (!set || set.size === 0) return;
      // Snapshot so listeners may unsubscribe while being called
      for (const listener of [...set]) {
        try {
          listener(detail);
        } catch (error) {
          log.error(`Listener for "${type}" threw`, { event: type }, error);
        }
      }
    },

    listenerCount(type) {
      return listeners[type]?.size ?? 0;
    },

    removeAllListeners(type) {
      if (type !== undefined) {
        delete listeners[type];
        return;
      }
      listeners = {};
    },
  };
}
