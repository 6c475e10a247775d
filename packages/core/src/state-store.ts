export type Listener<S> = (state: S, previous: S) => void;
export type Unsubscribe = () => void;

/**
 * Observable state container. Each manager owns one and replaces its
 * snapshot immutably; subscribers are notified synchronously after every change.
 */
export class StateStore<S extends object> {
  private state: S;
  private readonly listeners = new Set<Listener<S>>();

  constructor(initial: S) {
    this.state = initial;
  }

  getState(): S {
    return this.state;
  }

  setState(update: Partial<S> | ((current: S) => S)): void {
    const previous = this.state;
    this.state = typeof update === 'function' ? update(previous) : { ...previous, ...update };
    if (this.state === previous) return;
    for (const listener of [...this.listeners]) {
      listener(this.state, previous);
    }
  }

  subscribe(listener: Listener<S>): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
