import type { ListenerId, MessageHandler, Unsubscribe } from '../types.js';
import { TypedCallback } from './erasedCallback.js';
import type { EventBus } from './eventBus.js';
import { describeKind } from './messageKind.js';
import type { MessageKind } from './messageKind.js';

const noop: Unsubscribe = () => {};

/**
 * Scoped owner of bus registrations.
 *
 * A listener is active from construction until `unlistenAll()`/`dispose()`,
 * which removes every registration it made and is terminal. A listener built
 * without a bus (`new Listener(null)`) has id 0 and silently ignores every call.
 */
export class Listener {
  readonly id: ListenerId;
  readonly bus: EventBus | null;
  private disposed = false;

  constructor(bus: EventBus | null) {
    this.bus = bus;
    this.id = bus ? bus.nextListenerId() : 0;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Register `handler` for `kind`. Several handlers for the same kind run in
   * the order they were added. The returned function removes only this one.
   */
  listen<T>(kind: MessageKind<T>, handler: MessageHandler<T>): Unsubscribe {
    const bus = this.bus;
    if (!bus) return noop;
    if (this.disposed) {
      bus.logger.warn(bus.name, `ignored listen(${describeKind(kind)}) on disposed listener #${this.id}`, {
        listenerId: this.id,
        kind: describeKind(kind),
      });
      return noop;
    }

    const callback = new TypedCallback(kind, handler);
    bus.addCallback(this.id, callback);
    return () => {
      bus.removeCallback(this.id, callback);
    };
  }

  /** Remove this listener's registrations for `kind`, keeping all others. */
  unlisten<T>(kind: MessageKind<T>): void {
    if (!this.bus || this.disposed) return;
    this.bus.removeListener(kind, this.id);
  }

  /** Remove every registration of this listener. Safe to call repeatedly. */
  unlistenAll(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.bus?.removeListenerEverywhere(this.id);
  }

  dispose(): void {
    this.unlistenAll();
  }
}

/**
 * Run `fn` with a fresh listener that is disposed however `fn` exits.
 */
export function withListener<R>(bus: EventBus, fn: (listener: Listener) => R): R {
  const listener = new Listener(bus);
  try {
    return fn(listener);
  } finally {
    listener.dispose();
  }
}

export async function withListenerAsync<R>(
  bus: EventBus,
  fn: (listener: Listener) => Promise<R>
): Promise<R> {
  const listener = new Listener(bus);
  try {
    return await fn(listener);
  } finally {
    listener.dispose();
  }
}
