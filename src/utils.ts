const TRUTHY_FLAGS: ReadonlySet<string> = new Set(['1', 'true', 'yes', 'on']);

export function isTruthyFlag(raw: string | undefined): boolean {
  return TRUTHY_FLAGS.has((raw ?? '').toLowerCase().trim());
}

/**
 * The constructor found on an object's prototype, or undefined for
 * null-prototype objects.
 */
export function ownConstructorOf(value: object): Function | undefined {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null) return undefined;
  const ctor: unknown = Reflect.get(proto, 'constructor');
  return typeof ctor === 'function' ? ctor : undefined;
}
