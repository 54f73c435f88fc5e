import type { UnitStatus } from '../state-machines/unit-status/types.js';

export type StatusListener = (status: UnitStatus) => void;

/**
 * The externally visible unit status. Overwritten on every transition.
 */
export class StatusCell {
  private current: UnitStatus | null = null;
  private readonly listeners = new Set<StatusListener>();

  get(): UnitStatus | null {
    return this.current;
  }

  set(status: UnitStatus): void {
    this.current = status;
    for (const listener of this.listeners) {
      listener(status);
    }
  }

  /** Returns an unsubscribe function */
  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
