import { MessageTypeMismatchError } from '../errors.js';
import type { MessageHandler, MessageTypeKey } from '../types.js';
import { describeKind, isMessageOf, keyOf } from './messageKind.js';
import type { MessageKind } from './messageKind.js';

/**
 * Uniform shape the registration table stores, whatever the message type.
 */
export interface ErasedCallback {
  readonly key: MessageTypeKey;
  readonly kindName: string;
  invoke(payload: unknown): void;
}

export class TypedCallback<T> implements ErasedCallback {
  readonly key: MessageTypeKey;
  readonly kindName: string;
  private readonly kind: MessageKind<T>;
  private readonly handler: MessageHandler<T>;

  constructor(kind: MessageKind<T>, handler: MessageHandler<T>) {
    this.kind = kind;
    this.handler = handler;
    this.key = keyOf(kind);
    this.kindName = describeKind(kind);
  }

  invoke(payload: unknown): void {
    if (!isMessageOf(this.kind, payload)) {
      throw new MessageTypeMismatchError(this.kindName, payload);
    }
    this.handler(payload);
  }
}
