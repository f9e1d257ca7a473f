/**
 * Create a strongly-typed, synchronous event bus.
 *
 * Listener call signatures are derived from a generic event map `M`. If an
 * event detail type is `void`, the listener is invoked with no arguments;
 * otherwise it receives exactly one argument of the mapped detail type.
 *
 * @template M extends Record<string, unknown | void>
 * A map of event names to their payload ("detail") types. For example:
 *
 * ```ts
 * type BusEvents = {
 *   "ready": void;
 *   "log": { level: "info" | "warn"; message: string };
 * };
 *
 * const bus = eventBus<BusEvents>();
 * const off = bus.on("log", ({ level, message }) => console[level](message));
 * bus.emit("log", { level: "info", message: "hello" });
 * off();
 * ```
 *
 * ## Delivery
 * `emit(type, detail?)` calls the current listeners in registration order,
 * then every catch-all observer registered with `all(...)`. Exceptions
 * thrown by listeners propagate to the emitter.
 *
 * ## Control utilities
 * - `on` / `once`: add listeners (de-duped per identity), return an
 *   unsubscribe function.
 * - `off`.
 * - `listenerCount(type)` / `hasListener(type)`.
 * - `mute(type)` / `unmute(type)`, `suspend()` / `resume()`.
 */
export function eventBus<M extends Record<string, unknown | void>>() {
  type Key = Extract<keyof M, string>;
  type Detail<K extends Key> = M[K];
  type Args<K extends Key> = Detail<K> extends void ? [] : [Detail<K>];

  type Listener<K extends Key> = (...args: Args<K>) => void;
  type AllFn = <K extends Key>(type: K, detail: Detail<K>) => void;

  const listeners = new Map<Key, Set<unknown>>();
  const onceOnly = new WeakSet<object>();
  const muted = new Set<Key>();
  const allListeners = new Set<AllFn>();
  let suspended = false;

  const setFor = <K extends Key>(type: K) => {
    let set = listeners.get(type);
    if (!set) {
      set = new Set();
      listeners.set(type, set);
    }
    return set as unknown as Set<Listener<K>>;
  };

  const api = {
    on<K extends Key>(type: K, listener: Listener<K>) {
      setFor(type).add(listener);
      return () => api.off(type, listener);
    },

    once<K extends Key>(type: K, listener: Listener<K>) {
      onceOnly.add(listener);
      setFor(type).add(listener);
      return () => api.off(type, listener);
    },

    off<K extends Key>(type: K, listener: Listener<K>) {
      const set = setFor(type);
      set.delete(listener);
      onceOnly.delete(listener);
      if (set.size === 0) listeners.delete(type);
    },

    emit<K extends Key>(type: K, ...detail: Args<K>) {
      if (suspended || muted.has(type)) return false;
      const current = [...setFor(type)];
      for (const l of current) {
        if (onceOnly.has(l)) api.off(type, l);
        l(...detail);
      }
      if (!listeners.get(type)?.size) listeners.delete(type);
      const d = (detail.length ? detail[0] : undefined) as Detail<K>;
      for (const fn of allListeners) fn(type, d);
      return current.length > 0;
    },

    all(listener: AllFn) {
      allListeners.add(listener);
      return () => {
        allListeners.delete(listener);
      };
    },

    listenerCount<K extends Key>(type: K) {
      return listeners.get(type)?.size ?? 0;
    },

    hasListener<K extends Key>(type: K) {
      return (listeners.get(type)?.size ?? 0) > 0;
    },

    mute<K extends Key>(type: K) {
      muted.add(type);
    },
    unmute<K extends Key>(type: K) {
      muted.delete(type);
    },
    suspend() {
      suspended = true;
    },
    resume() {
      suspended = false;
    },
  } as const;

  return api;
}

export type EventBus<M extends Record<string, unknown | void>> = ReturnType<
  typeof eventBus<M>
>;
