import { MessageTypeMismatchError, UnkeyedMessageError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { BusLogger } from '../logger.js';
import type { ListenerId, MessageTypeKey } from '../types.js';
import type { ErasedCallback } from './erasedCallback.js';
import { Listener } from './listener.js';
import { describeKey, keyOf, keyOfMessage, MessageToken } from './messageKind.js';
import type { MessageKind } from './messageKind.js';
import { RegistrationTable } from './registrationTable.js';

interface PendingMessage {
  readonly key: MessageTypeKey;
  readonly kindName: string;
  readonly payload: unknown;
}

/** Class instances only: a token passed alone is a payload-less token message. */
type ClassMessage<T> = T extends MessageToken<unknown> ? never : T;

export interface EventBusOptions {
  /** Scope used for this bus's log entries. */
  name?: string;
  /** Log every dispatch with its fan-out count at debug level. */
  traceDispatch?: boolean;
  logger?: BusLogger;
}

/**
 * Single-threaded, type-keyed message bus.
 *
 * Messages are class instances (keyed by their exact class) or token payloads
 * (`defineMessage`). `immediate` delivers on the caller's stack; `post` queues
 * and `process` drains the queue in FIFO order. Callback errors are not caught:
 * they stop the current fan-out and propagate to the caller.
 *
 * Registrations are owned by `Listener` handles, which remove all of theirs on
 * `unlistenAll()`/`dispose()`.
 */
export class EventBus {
  readonly name: string;
  readonly logger: BusLogger;
  private readonly traceDispatch: boolean;
  private readonly table = new RegistrationTable();
  private pending: PendingMessage[] = [];
  private lastListenerId: ListenerId = 0;
  private processing = false;
  // Index of the next pending entry while `process()` is draining.
  private cursor = 0;

  constructor(options: EventBusOptions = {}) {
    this.name = options.name ?? 'bus';
    this.traceDispatch = options.traceDispatch ?? false;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Deliver now to every callback registered for the message's kind. */
  immediate(token: MessageToken<void>): void;
  immediate<T>(token: MessageToken<T>, payload: T): void;
  immediate<T extends object>(message: ClassMessage<T>): void;
  immediate(first: unknown, payload?: unknown): void {
    this.dispatch(this.resolve(first, payload));
  }

  /**
   * Queue for the next `process()`. The queue holds the message itself, not a
   * copy: changes made to it before `process()` are what listeners see.
   */
  post(token: MessageToken<void>): void;
  post<T>(token: MessageToken<T>, payload: T): void;
  post<T extends object>(message: ClassMessage<T>): void;
  post(first: unknown, payload?: unknown): void {
    this.pending.push(this.resolve(first, payload));
  }

  /**
   * Deliver queued messages in FIFO order until the queue is empty, including
   * messages posted by callbacks while draining. Returns how many were
   * delivered.
   *
   * A call made from inside a running `process()` returns 0 and leaves the
   * draining to the outer call. If a callback throws, every message taken off
   * the queue so far (the failing one included) is dropped, the rest stay
   * queued, and the error propagates.
   */
  process(): number {
    if (this.processing) return 0;
    this.processing = true;
    this.cursor = 0;
    let delivered = 0;
    try {
      while (this.cursor < this.pending.length) {
        const message = this.pending[this.cursor];
        this.cursor++;
        if (message === undefined) continue;
        this.dispatch(message);
        delivered++;
      }
    } finally {
      this.pending.splice(0, this.cursor);
      this.cursor = 0;
      this.processing = false;
    }

    if (delivered > 0 && this.logger.isEnabled('debug')) {
      this.logger.debug(this.name, `processed ${delivered} queued message(s)`, { count: delivered });
    }
    return delivered;
  }

  /** Drop queued messages that have not been delivered yet. Returns how many. */
  clearPending(): number {
    const start = this.processing ? this.cursor : 0;
    const dropped = this.pending.length - start;
    this.pending.splice(start);
    return dropped;
  }

  get pendingCount(): number {
    return this.pending.length - (this.processing ? this.cursor : 0);
  }

  hasListeners<T>(kind: MessageKind<T>): boolean {
    return this.table.has(keyOf(kind));
  }

  /** Number of listeners with at least one callback for the kind. */
  listenerCount<T>(kind: MessageKind<T>): number {
    return this.table.groupCount(keyOf(kind));
  }

  callbackCount<T>(kind: MessageKind<T>): number {
    return this.table.callbackCount(keyOf(kind));
  }

  /** Number of message kinds with at least one registration. */
  get typeCount(): number {
    return this.table.typeCount;
  }

  createListener(): Listener {
    return new Listener(this);
  }

  // --- Listener plumbing ---

  /** Ids start at 1 and are never reused. */
  nextListenerId(): ListenerId {
    const id = ++this.lastListenerId;
    if (this.logger.isEnabled('debug')) {
      this.logger.debug(this.name, `listener #${id} created`, { listenerId: id });
    }
    return id;
  }

  addCallback(listenerId: ListenerId, callback: ErasedCallback): void {
    this.table.add(callback.key, listenerId, callback);
    if (this.logger.isEnabled('debug')) {
      this.logger.debug(this.name, `listener #${listenerId} subscribed to ${callback.kindName}`, {
        listenerId,
        kind: callback.kindName,
      });
    }
  }

  removeCallback(listenerId: ListenerId, callback: ErasedCallback): boolean {
    return this.table.removeCallback(callback.key, listenerId, callback);
  }

  removeListener<T>(kind: MessageKind<T>, listenerId: ListenerId): boolean {
    return this.table.removeListener(keyOf(kind), listenerId);
  }

  removeListenerEverywhere(listenerId: ListenerId): number {
    const removed = this.table.removeListenerEverywhere(listenerId);
    if (removed > 0 && this.logger.isEnabled('debug')) {
      this.logger.debug(this.name, `listener #${listenerId} removed from ${removed} message kind(s)`, {
        listenerId,
        count: removed,
      });
    }
    return removed;
  }

  private resolve(first: unknown, payload: unknown): PendingMessage {
    if (first instanceof MessageToken) {
      if (!first.accepts(payload)) {
        throw new MessageTypeMismatchError(first.name, payload);
      }
      return { key: first.key, kindName: first.name, payload };
    }
    if (typeof first !== 'object' || first === null) {
      throw new UnkeyedMessageError(first);
    }
    const key = keyOfMessage(first);
    return { key, kindName: describeKey(key), payload: first };
  }

  private dispatch(message: PendingMessage): void {
    // Snapshot: callbacks may listen/unlisten while we walk the list.
    const callbacks = this.table.snapshot(message.key);
    if (this.traceDispatch && this.logger.isEnabled('debug')) {
      this.logger.debug(this.name, `dispatch ${message.kindName} -> ${callbacks.length} callback(s)`, {
        kind: message.kindName,
        count: callbacks.length,
      });
    }
    for (const callback of callbacks) {
      callback.invoke(message.payload);
    }
  }
}
