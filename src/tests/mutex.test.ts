import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';

import { AsyncGate, Mutex } from '../utils/mutex.js';
import { ObjectDisposedError } from '../utils/error-utils.js';

test('Mutex runs exclusive sections in arrival order', async () => {
  const mutex = new Mutex('test');
  const order: string[] = [];

  const first = mutex.runExclusive(async () => {
    order.push('first:start');
    await delay(10);
    order.push('first:end');
  });
  const second = mutex.runExclusive(async () => {
    order.push('second');
  });

  await Promise.all([first, second]);

  assert.deepEqual(order, ['first:start', 'first:end', 'second']);
  assert.equal(mutex.isLocked(), false);
});

test('Mutex releases the lock when the section throws', async () => {
  const mutex = new Mutex('test');

  await assert.rejects(
    mutex.runExclusive(async () => {
      throw new Error('boom');
    }),
    { message: 'boom' }
  );

  assert.equal(mutex.isLocked(), false);
  assert.equal(await mutex.runExclusive(async () => 'next'), 'next');
});

test('Mutex.dispose rejects queued waiters and later acquisitions', async () => {
  const mutex = new Mutex('guard');
  await mutex.acquire();
  const waiting = mutex.acquire();
  assert.equal(mutex.getQueueLength(), 1);

  mutex.dispose();

  await assert.rejects(waiting, ObjectDisposedError);
  await assert.rejects(mutex.acquire(), { message: 'guard has been disposed' });
  assert.equal(mutex.isDisposed(), true);
  assert.equal(mutex.getQueueLength(), 0);
});

test('AsyncGate lets the current holder enter again', async () => {
  const gate = new AsyncGate('context');

  const result = await gate.runExclusive(async () => {
    const inner = await gate.runExclusive(async () => 'inner');
    return `outer+${inner}`;
  });

  assert.equal(result, 'outer+inner');
  assert.equal(gate.isHeld(), false);
});

test('AsyncGate queues other callers until the holder finishes', async () => {
  const gate = new AsyncGate('context');
  const order: string[] = [];

  const first = gate.runExclusive(async () => {
    order.push('a:start');
    await delay(10);
    order.push('a:end');
  });
  const second = gate.runExclusive(async () => {
    order.push('b');
  });

  assert.equal(gate.getQueueLength(), 1);
  await Promise.all([first, second]);

  assert.deepEqual(order, ['a:start', 'a:end', 'b']);
});

test('AsyncGate does not let timers armed by a finished holder skip the queue', async () => {
  const gate = new AsyncGate('context');
  let inside = 0;
  let maxInside = 0;
  const enter = (holdMs: number) =>
    gate.runExclusive(async () => {
      inside++;
      maxInside = Math.max(maxInside, inside);
      await delay(holdMs);
      inside--;
    });

  let late: Promise<void> = Promise.resolve();
  const armed = new Promise<void>(resolve => {
    void gate.runExclusive(async () => {
      setTimeout(() => {
        late = enter(30);
        resolve();
      }, 20);
    });
  });
  const holder = enter(60);

  await armed;
  assert.equal(gate.getQueueLength(), 1);
  await Promise.all([holder, late]);

  assert.equal(maxInside, 1);
  assert.equal(gate.isHeld(), false);
});
