import type { Unsubscribe } from '../types.js';

export type SinkErrorHandler = (error: unknown) => void;

/**
 * Minimal synchronous fan-out used for log sinks.
 *
 * - A failing sink never reaches the emitter; its error goes to `onSinkError`
 * - Preserves emission order for each subscriber
 */
export class LogChannel<TEntry> {
  private subscribers: Set<(entry: TEntry) => void> = new Set();
  private readonly onSinkError: SinkErrorHandler;

  constructor(onSinkError: SinkErrorHandler) {
    this.onSinkError = onSinkError;
  }

  subscribe(cb: (entry: TEntry) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  emit(entry: TEntry): void {
    for (const sub of Array.from(this.subscribers)) {
      try {
        sub(entry);
      } catch (error) {
        this.onSinkError(error);
      }
    }
  }

  get size(): number {
    return this.subscribers.size;
  }
}
