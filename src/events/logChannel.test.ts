import test from 'node:test';
import assert from 'node:assert/strict';
import { LogChannel } from './logChannel.js';

test('LogChannel: emits to subscribers in subscription order', () => {
  const channel = new LogChannel<string>(() => {});
  const seen: string[] = [];
  channel.subscribe((e) => seen.push(`a:${e}`));
  channel.subscribe((e) => seen.push(`b:${e}`));
  channel.emit('x');
  assert.deepEqual(seen, ['a:x', 'b:x']);
});

test('LogChannel: unsubscribe stops delivery', () => {
  const channel = new LogChannel<string>(() => {});
  const seen: string[] = [];
  const off = channel.subscribe((e) => seen.push(e));
  off();
  channel.emit('x');
  assert.deepEqual(seen, []);
  assert.equal(channel.size, 0);
});

test('LogChannel: a failing sink is reported and the others still run', () => {
  const errors: unknown[] = [];
  const channel = new LogChannel<string>((error) => errors.push(error));
  const boom = new Error('sink down');
  const seen: string[] = [];
  channel.subscribe(() => {
    throw boom;
  });
  channel.subscribe((e) => seen.push(e));

  assert.doesNotThrow(() => channel.emit('x'));
  assert.deepEqual(seen, ['x']);
  assert.deepEqual(errors, [boom]);
});
