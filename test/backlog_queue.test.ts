import test from 'node:test';
import assert from 'node:assert';
import { setImmediate as nextTurn } from 'node:timers/promises';
import { performance } from 'node:perf_hooks';

import {
  BacklogQueue,
  createBacklogEntry,
  type backlog_entry_t
} from '@src/relays/tcp/backlog_queue/BacklogQueue.class';
import { DelayPolicy } from '@src/relays/tcp/delay_policy/DelayPolicy.class';

// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% Utilities %%%%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

function entry(text: string, release_at: number): backlog_entry_t {
  return { payload: Buffer.from(text), release_at: release_at };
}

// wraps a promise so the test can check whether it settled yet
function track<T>(promise: Promise<T>) {
  const tracked: { settled: boolean; value: T | undefined } = {
    settled: false,
    value: undefined
  };
  const done = promise.then((value: T) => {
    tracked.settled = true;
    tracked.value = value;
    return value;
  });
  return { tracked, done };
}

// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% Test Definitions %%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

test('Entries leave in insertion order regardless of release time.', async function () {
  const queue = new BacklogQueue();
  await queue.enqueue(entry('one', 3000));
  await queue.enqueue(entry('two', 1000));
  await queue.enqueue(entry('three', 2000));
  assert.strictEqual(queue.length, 3);

  const order: string[] = [];
  for (let idx = 0; idx < 3; idx++) {
    const next = await queue.dequeue();
    assert.ok(next);
    order.push(next.payload.toString());
    queue.completeEntry();
  }
  assert.deepStrictEqual(order, ['one', 'two', 'three']);
  assert.strictEqual(queue.isEmpty(), true);
});

test('Dequeue waits until an entry is enqueued.', async function () {
  const queue = new BacklogQueue();
  const { tracked, done } = track(queue.dequeue());

  await nextTurn();
  assert.strictEqual(tracked.settled, false);

  await queue.enqueue(entry('late', 0));
  const received = await done;
  assert.ok(received);
  assert.strictEqual(received.payload.toString(), 'late');
  assert.strictEqual(queue.in_flight, 1);
});

test('Closed queue drains, then dequeue yields null.', async function () {
  const queue = new BacklogQueue();
  await queue.enqueue(entry('last', 0));
  assert.strictEqual(queue.close(), true);
  assert.strictEqual(queue.state, 'closed');

  assert.strictEqual(await queue.enqueue(entry('rejected', 0)), false);

  const last = await queue.dequeue();
  assert.ok(last);
  assert.strictEqual(last.payload.toString(), 'last');
  assert.strictEqual(await queue.dequeue(), null);
});

test('Close wakes a consumer parked on an empty queue.', async function () {
  const queue = new BacklogQueue();
  const { done } = track(queue.dequeue());
  await nextTurn();
  queue.close();
  assert.strictEqual(await done, null);
});

test('waitUntilEmpty waits for in-flight entries to complete.', async function () {
  const queue = new BacklogQueue();
  await queue.enqueue(entry('inflight', 0));
  await queue.dequeue();

  const { tracked, done } = track(queue.waitUntilEmpty());
  await nextTurn();
  assert.strictEqual(tracked.settled, false);

  assert.strictEqual(queue.completeEntry(), true);
  await done;
  assert.strictEqual(tracked.settled, true);
  assert.strictEqual(queue.completeEntry(), false);
});

test('Destroy discards entries and releases every waiter.', async function () {
  const queue = new BacklogQueue();
  await queue.enqueue(entry('a', 0));
  await queue.enqueue(entry('b', 0));
  await queue.dequeue();

  const empty = track(queue.waitUntilEmpty());
  await nextTurn();
  assert.strictEqual(empty.tracked.settled, false);

  assert.strictEqual(queue.destroy(), true);
  assert.strictEqual(queue.destroy(), false);
  assert.strictEqual(queue.length, 0);
  await empty.done;
  assert.strictEqual(await queue.dequeue(), null);
  assert.strictEqual(await queue.enqueue(entry('c', 0)), false);
});

test('Bounded queue blocks enqueue until a slot is completed.', async function () {
  const queue = new BacklogQueue({ max_entries: 1 });
  assert.strictEqual(queue.isBounded(), true);
  assert.strictEqual(await queue.enqueue(entry('first', 0)), true);

  const second = track(queue.enqueue(entry('second', 0)));
  await nextTurn();
  assert.strictEqual(second.tracked.settled, false);
  assert.strictEqual(queue.pendingSlotTakers(), 1);

  const first = await queue.dequeue();
  assert.ok(first);
  await nextTurn();
  assert.strictEqual(second.tracked.settled, false);

  queue.completeEntry();
  assert.strictEqual(await second.done, true);
  assert.strictEqual(queue.length, 1);
  assert.strictEqual(queue.pendingSlotTakers(), 0);
});

test('Destroying a bounded queue releases a blocked producer.', async function () {
  const queue = new BacklogQueue({ max_entries: 1 });
  await queue.enqueue(entry('held', 0));

  const blocked = track(queue.enqueue(entry('blocked', 0)));
  await nextTurn();
  assert.strictEqual(blocked.tracked.settled, false);

  queue.destroy();
  assert.strictEqual(await blocked.done, false);
  assert.strictEqual(queue.length, 0);
});

test('Entries are scheduled at now plus the sampled delay.', function () {
  const now = 1_000_000;
  const immediate = createBacklogEntry(Buffer.from('x'), null, now);
  assert.strictEqual(immediate.release_at, now);

  const delayed = createBacklogEntry(
    Buffer.from('y'),
    new DelayPolicy({ min_seconds: 0.25 }),
    now
  );
  assert.strictEqual(delayed.release_at, now + 250);
  assert.strictEqual(delayed.payload.toString(), 'y');
});

test('Release times follow the monotonic clock by default.', function () {
  const before = performance.now();
  const delayed = createBacklogEntry(
    Buffer.from('z'),
    new DelayPolicy({ min_seconds: 0.25 })
  );
  const after = performance.now();

  assert.ok(delayed.release_at >= before + 250);
  assert.ok(delayed.release_at <= after + 250);
});
