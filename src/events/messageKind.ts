import type { ZodType, ZodTypeDef } from 'zod';
import { UnkeyedMessageError } from '../errors.js';
import type { MessageTypeKey } from '../types.js';
import { ownConstructorOf } from '../utils.js';

/**
 * Any class can serve as a message kind: its instances are the messages.
 * Matching is by exact class, so a subclass is a kind of its own.
 */
export type MessageClass<T> = abstract new (...args: never[]) => T;

export type MessageGuard<T> = (value: unknown) => value is T;

/**
 * Kind for payloads that are not class instances (primitives, plain objects,
 * arrays). Every token is distinct, even when two share a name.
 */
export class MessageToken<T> {
  readonly name: string;
  readonly key: MessageTypeKey;
  private readonly guard: MessageGuard<T> | undefined;

  constructor(name: string, guard?: MessageGuard<T>) {
    this.name = name;
    this.key = Symbol(name);
    this.guard = guard;
  }

  /**
   * Without a guard every payload is accepted: the only way in is
   * `post(token, payload)`, whose signature already ties the payload to `T`.
   */
  accepts(value: unknown): value is T {
    return this.guard === undefined || this.guard(value);
  }
}

export type MessageKind<T> = MessageClass<T> | MessageToken<T>;

/**
 * Create a token kind. An optional zod schema (or a plain type guard) limits
 * the payloads callbacks of this kind will accept.
 */
export function defineMessage<T>(
  name: string,
  validate?: ZodType<T, ZodTypeDef, T> | MessageGuard<T>
): MessageToken<T> {
  if (validate === undefined) return new MessageToken<T>(name);
  if (typeof validate === 'function') return new MessageToken<T>(name, validate);
  const schema = validate;
  return new MessageToken<T>(name, (value: unknown): value is T => schema.safeParse(value).success);
}

const classKeys = new WeakMap<Function, MessageTypeKey>();

function keyOfClass(ctor: Function): MessageTypeKey {
  let key = classKeys.get(ctor);
  if (key === undefined) {
    key = Symbol(ctor.name || 'anonymous');
    classKeys.set(ctor, key);
  }
  return key;
}

export function keyOf<T>(kind: MessageKind<T>): MessageTypeKey {
  if (kind instanceof MessageToken) return kind.key;
  return keyOfClass(kind);
}

/** Key of the class the message is an instance of. */
export function keyOfMessage(message: object): MessageTypeKey {
  if (typeof message !== 'object' || message === null) {
    throw new UnkeyedMessageError(message);
  }
  const ctor = ownConstructorOf(message);
  if (ctor === undefined || ctor === Object) {
    throw new UnkeyedMessageError(message);
  }
  return keyOfClass(ctor);
}

export function isMessageOf<T>(kind: MessageKind<T>, value: unknown): value is T {
  if (kind instanceof MessageToken) return kind.accepts(value);
  return value instanceof kind;
}

export function describeKind<T>(kind: MessageKind<T>): string {
  return kind.name || 'anonymous';
}

export function describeKey(key: MessageTypeKey): string {
  return key.description ?? 'anonymous';
}
