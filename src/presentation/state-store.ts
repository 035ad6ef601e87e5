export type Unsubscribe = () => void;

export type StateListener<S> = (state: S) => void;

/** Read side of a state store, handed to renderers. */
export interface ReadonlyStateStore<S> {
  snapshot(): S;
  subscribe(listener: StateListener<S>): Unsubscribe;
}

/**
 * Single-writer state holder with whole-value replacement.
 * Readers never observe a partially applied transition.
 */
export interface StateStore<S> extends ReadonlyStateStore<S> {
  update(transition: (current: S) => S): void;
}

/**
 * In-memory StateStore.
 * Listeners run synchronously, in subscription order, after the value is replaced.
 * A transition that returns the current object is a no-op.
 */
export class InMemoryStateStore<S> implements StateStore<S> {
  private readonly listeners = new Set<StateListener<S>>();
  private current: S;

  constructor(initial: S) {
    this.current = initial;
  }

  snapshot(): S {
    return this.current;
  }

  subscribe(listener: StateListener<S>): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  update(transition: (current: S) => S): void {
    const next = transition(this.current);
    if (next === this.current) return;

    this.current = next;
    for (const listener of this.listeners) {
      listener(next);
    }
  }
}
