import { ownConstructorOf } from './utils.js';

/**
 * Raised when a payload reaches a callback registered for another message kind.
 * Lookup is always by the kind's key, so this only happens if the registration
 * table was manipulated from outside the bus.
 */
export class MessageTypeMismatchError extends Error {
  readonly expected: string;

  constructor(expected: string, received: unknown) {
    super(`Payload of type ${describeValue(received)} cannot be delivered as ${expected}`);
    this.name = 'MessageTypeMismatchError';
    this.expected = expected;
  }
}

/**
 * Raised by `immediate`/`post` for a value whose kind cannot be derived:
 * plain objects and null-prototype objects have no class of their own.
 */
export class UnkeyedMessageError extends Error {
  constructor(received: unknown) {
    super(
      `Cannot derive a message kind from ${describeValue(received)}; ` +
        'dispatch a class instance or pass a token from defineMessage()'
    );
    this.name = 'UnkeyedMessageError';
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  if (Object.getPrototypeOf(value) === Object.prototype) return 'plain object';
  const ctor = ownConstructorOf(value);
  if (ctor === undefined) return 'null-prototype object';
  return ctor.name || 'anonymous object';
}
