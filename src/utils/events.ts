export type EventMap = Record<string, unknown[]>;

export type EventListener<E extends EventMap, K extends keyof E> = (
  ...args: E[K]
) => void;

export type EventEmitter<E extends EventMap> = {
  on<K extends keyof E>(event: K, listener: EventListener<E, K>): void;
  off<K extends keyof E>(event: K, listener: EventListener<E, K>): void;
  emit<K extends keyof E>(event: K, ...args: E[K]): void;
  listenerCount<K extends keyof E>(event: K): number;
};

export const createEventEmitter = <E extends EventMap>(): EventEmitter<E> => {
  const listeners = new Map<keyof E, Set<EventListener<E, keyof E>>>();

  return {
    on<K extends keyof E>(event: K, listener: EventListener<E, K>) {
      const set = listeners.get(event) ?? new Set<EventListener<E, keyof E>>();

      set.add(listener as EventListener<E, keyof E>);
      listeners.set(event, set);
    },
    off<K extends keyof E>(event: K, listener: EventListener<E, K>) {
      const set = listeners.get(event);

      if (!set) return;

      set.delete(listener as EventListener<E, keyof E>);

      if (set.size === 0) listeners.delete(event);
    },
    emit<K extends keyof E>(event: K, ...args: E[K]) {
      // Copy so a listener may unsubscribe itself mid-emit.
      for (const listener of [...(listeners.get(event) ?? [])]) {
        listener(...args);
      }
    },
    listenerCount<K extends keyof E>(event: K) {
      return listeners.get(event)?.size ?? 0;
    },
  };
};
