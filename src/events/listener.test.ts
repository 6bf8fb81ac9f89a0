import test from 'node:test';
import assert from 'node:assert/strict';
import { EventBus } from './eventBus.js';
import { Listener, withListener, withListenerAsync } from './listener.js';
import { BusLogger, logger } from '../logger.js';

class A {}
class B {}

function quietBus() {
  const logger = new BusLogger({ console: false });
  return { bus: new EventBus({ name: 'test', logger }), logger };
}

test('listen: several handlers for one kind run in the order added', () => {
  const { bus } = quietBus();
  const listener = new Listener(bus);
  const calls: number[] = [];
  listener.listen(A, () => calls.push(1));
  listener.listen(A, () => calls.push(2));

  bus.immediate(new A());
  assert.deepEqual(calls, [1, 2]);
  assert.equal(bus.listenerCount(A), 1);
  assert.equal(bus.callbackCount(A), 2);
});

test('listen: the returned unsubscribe removes only that handler', () => {
  const { bus } = quietBus();
  const listener = new Listener(bus);
  const calls: number[] = [];
  const off = listener.listen(A, () => calls.push(1));
  listener.listen(A, () => calls.push(2));

  off();
  off();
  bus.immediate(new A());
  assert.deepEqual(calls, [2]);
});

test('unlisten: removes one kind and keeps the others', () => {
  const { bus } = quietBus();
  const listener = new Listener(bus);
  const calls: string[] = [];
  listener.listen(A, () => calls.push('A'));
  listener.listen(B, () => calls.push('B'));

  listener.unlisten(A);
  bus.immediate(new A());
  bus.immediate(new B());
  assert.deepEqual(calls, ['B']);
  assert.equal(listener.isDisposed, false);
});

test('unlisten: leaves other listeners of the same kind alone', () => {
  const { bus } = quietBus();
  const one = new Listener(bus);
  const two = new Listener(bus);
  const calls: string[] = [];
  one.listen(A, () => calls.push('one'));
  two.listen(A, () => calls.push('two'));

  one.unlisten(A);
  bus.immediate(new A());
  assert.deepEqual(calls, ['two']);
});

test('unlistenAll: no callback fires afterwards, for any kind', () => {
  const { bus } = quietBus();
  const listener = new Listener(bus);
  const calls: string[] = [];
  listener.listen(A, () => calls.push('A'));
  listener.listen(B, () => calls.push('B'));
  bus.post(new A());

  listener.unlistenAll();
  bus.immediate(new B());
  bus.process();
  assert.deepEqual(calls, []);
  assert.equal(bus.typeCount, 0);
  assert.equal(listener.isDisposed, true);
});

test('unlistenAll: idempotent and terminal', () => {
  const { bus, logger } = quietBus();
  const listener = new Listener(bus);
  listener.unlistenAll();
  listener.unlistenAll();
  listener.dispose();

  const calls: string[] = [];
  const off = listener.listen(A, () => calls.push('A'));
  off();
  bus.immediate(new A());
  listener.unlisten(A);

  assert.deepEqual(calls, []);
  assert.equal(bus.hasListeners(A), false);
  const warnings = logger.getEntries().filter((e) => e.level === 'warn');
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0]?.content, 'ignored listen(A) on disposed listener #1');
});

test('unbound listener: id 0 and every call is a no-op', () => {
  const listener = new Listener(null);
  assert.equal(listener.id, 0);
  assert.equal(listener.bus, null);
  assert.doesNotThrow(() => {
    listener.unlisten(A);
    listener.unlistenAll();
  });
  assert.equal(listener.isDisposed, true);
});

test('unbound listener: listen is a silent no-op', () => {
  const { bus } = quietBus();
  const listener = new Listener(null);
  const calls: string[] = [];
  const before = logger.getEntries().length;

  const off = listener.listen(A, () => calls.push('A'));
  assert.doesNotThrow(off);
  bus.immediate(new A());

  assert.deepEqual(calls, []);
  assert.equal(bus.hasListeners(A), false);
  assert.equal(listener.isDisposed, false);
  assert.equal(logger.getEntries().length, before);
});

test('withListener: disposes after a normal return', () => {
  const { bus } = quietBus();
  const result = withListener(bus, (listener) => {
    listener.listen(A, () => {});
    return bus.listenerCount(A);
  });
  assert.equal(result, 1);
  assert.equal(bus.hasListeners(A), false);
});

test('withListener: disposes when the body throws', () => {
  const { bus } = quietBus();
  assert.throws(
    () =>
      withListener(bus, (listener) => {
        listener.listen(A, () => {});
        throw new Error('early exit');
      }),
    { message: 'early exit' }
  );
  assert.equal(bus.hasListeners(A), false);
});

test('withListenerAsync: disposes after the promise settles', async () => {
  const { bus } = quietBus();
  let seen = 0;
  await assert.rejects(
    withListenerAsync(bus, async (listener) => {
      listener.listen(A, () => seen++);
      await Promise.resolve();
      bus.immediate(new A());
      throw new Error('late failure');
    }),
    { message: 'late failure' }
  );
  assert.equal(seen, 1);
  assert.equal(bus.hasListeners(A), false);
});
