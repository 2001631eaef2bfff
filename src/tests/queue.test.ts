import assert from 'node:assert/strict';
import test from 'node:test';

import { ConcurrentQueue } from '../queue.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

test('never runs more tasks than the limit', async () => {
  const q = new ConcurrentQueue(2);
  let running = 0;
  let maxRunning = 0;
  const results = await Promise.all(
    [1, 2, 3, 4, 5].map((n) =>
      q.push(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((r) => setTimeout(r, 5));
        running--;
        return n * 10;
      }),
    ),
  );
  assert.deepEqual(results, [10, 20, 30, 40, 50]);
  assert.equal(maxRunning, 2);
});

test('join waits for tasks pushed by other tasks', async () => {
  const q = new ConcurrentQueue(3);
  const done: string[] = [];
  void q.push(async () => {
    await new Promise((r) => setTimeout(r, 5));
    void q.push(async () => {
      await new Promise((r) => setTimeout(r, 5));
      done.push('child');
    });
    done.push('parent');
  });
  await q.join();
  assert.deepEqual(done, ['parent', 'child']);
  assert.equal(q.size, 0);
});

test('close skips queued tasks and refuses new ones', async () => {
  const q = new ConcurrentQueue(1);
  const started = deferred();
  const gate = deferred();

  const first = q.push(async () => {
    started.resolve();
    await gate.promise;
    return 'first';
  });
  await started.promise;
  let secondRan = false;
  const second = q.push(async () => {
    secondRan = true;
    return 'second';
  });

  q.close();
  gate.resolve();
  assert.equal(await first, 'first');
  assert.equal(await second, null);
  assert.equal(secondRan, false);
  assert.equal(await q.push(async () => 'late'), null);
});

test('onEmpty fires once the queue drains', async () => {
  const q = new ConcurrentQueue(2);
  let empty = 0;
  q.onEmpty(() => empty++);
  await Promise.all([q.push(async () => 1), q.push(async () => 2)]);
  assert.equal(empty, 1);
});
