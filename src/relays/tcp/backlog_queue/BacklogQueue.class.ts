/* eslint-disable @typescript-eslint/no-this-alias */

// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% BacklogQueue Class %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

/*
Strict FIFO of chunks waiting for delivery.  Entries come out in the
order they went in, regardless of their release_at values, so a chunk
with a short delay still waits behind an earlier chunk with a long one.
Byte order wins over delay accuracy.

The queue is unbounded unless max_entries is set, in which case
enqueue() waits for a free slot (one slot per entry, returned when the
consumer calls completeEntry()).
*/

import { Deferred } from '@opsimathically/deferred';
import semaphore from 'semaphore';
import { performance } from 'node:perf_hooks';

import { DelayPolicy } from '../delay_policy/DelayPolicy.class';

type backlog_entry_t = {
  readonly payload: Buffer;

  // monotonic milliseconds on the performance.now() clock, not a date
  readonly release_at: number;
};

type backlog_queue_options_t = {
  // 0 (or unset) means unbounded
  max_entries?: number;
};

type backlog_queue_state_t = 'open' | 'closed' | 'destroyed';

function createBacklogEntry(
  payload: Buffer,
  delay_policy: DelayPolicy | null,
  now: number = performance.now()
): backlog_entry_t {
  const delay_ms = delay_policy ? delay_policy.sampleMilliseconds() : 0;
  return {
    payload: payload,
    release_at: now + delay_ms
  };
}

class BacklogQueue {
  state: backlog_queue_state_t = 'open';

  // entries handed out by dequeue() but not yet completed
  in_flight: number = 0;

  private entries: backlog_entry_t[] = [];
  private dequeue_waiters: Deferred[] = [];
  private empty_waiters: Deferred[] = [];

  private slots: semaphore.Semaphore | null = null;
  private pending_slot_takers: number = 0;

  constructor(options: backlog_queue_options_t = {}) {
    if (options.max_entries && options.max_entries > 0)
      this.slots = semaphore(options.max_entries);
  }

  get length(): number {
    return this.entries.length;
  }

  isBounded(): boolean {
    return this.slots !== null;
  }

  isEmpty(): boolean {
    return this.entries.length === 0 && this.in_flight === 0;
  }

  // producers currently blocked on a full queue
  pendingSlotTakers(): number {
    return this.pending_slot_takers;
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Producer Side %%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  /**
   * Append an entry to the tail.  Resolves false when the entry was
   * discarded because the queue no longer accepts entries.
   */
  async enqueue(entry: backlog_entry_t): Promise<boolean> {
    if (!(await this.admit())) return false;
    this.append(entry);
    return true;
  }

  /**
   * Like enqueue(), but the entry (and its release time) is only created
   * once the queue has room for it.
   */
  async enqueuePayload(
    payload: Buffer,
    delay_policy: DelayPolicy | null
  ): Promise<boolean> {
    if (!(await this.admit())) return false;
    this.append(createBacklogEntry(payload, delay_policy));
    return true;
  }

  // waits for a slot when bounded
  private async admit(): Promise<boolean> {
    const queue_ref = this;
    if (queue_ref.state !== 'open') return false;
    if (!queue_ref.slots) return true;

    await queue_ref.takeSlot();
    if (queue_ref.state !== 'open') {
      queue_ref.releaseSlot();
      return false;
    }
    return true;
  }

  private append(entry: backlog_entry_t) {
    this.entries.push(entry);
    this.wakeAll(this.dequeue_waiters);
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Consumer Side %%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  /**
   * Wait for the head entry and remove it.  Resolves null once the queue
   * is closed and drained, or destroyed.
   */
  async dequeue(): Promise<backlog_entry_t | null> {
    const queue_ref = this;
    for (;;) {
      if (queue_ref.state === 'destroyed') return null;

      const entry = queue_ref.entries.shift();
      if (entry) {
        queue_ref.in_flight++;
        return entry;
      }

      if (queue_ref.state === 'closed') return null;

      const deferral: Deferred = new Deferred();
      queue_ref.dequeue_waiters.push(deferral);
      await deferral.promise;
    }
  }

  // acknowledge a dequeued entry as handled (delivered or abandoned)
  completeEntry() {
    const queue_ref = this;
    if (queue_ref.in_flight <= 0) return false;
    queue_ref.in_flight--;
    if (queue_ref.slots) queue_ref.releaseSlot();
    if (queue_ref.isEmpty()) queue_ref.wakeAll(queue_ref.empty_waiters);
    return true;
  }

  /**
   * Resolves once nothing is queued and nothing is in flight, or the
   * queue has been destroyed.
   */
  async waitUntilEmpty(): Promise<void> {
    const queue_ref = this;
    while (queue_ref.state !== 'destroyed' && !queue_ref.isEmpty()) {
      const deferral: Deferred = new Deferred();
      queue_ref.empty_waiters.push(deferral);
      await deferral.promise;
    }
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Lifecycle %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  // stop accepting entries; whatever is queued still drains
  close() {
    const queue_ref = this;
    if (queue_ref.state !== 'open') return false;
    queue_ref.state = 'closed';
    queue_ref.wakeAll(queue_ref.dequeue_waiters);
    return true;
  }

  // discard everything and wake every waiter
  destroy() {
    const queue_ref = this;
    if (queue_ref.state === 'destroyed') return false;
    queue_ref.state = 'destroyed';

    const discarded = queue_ref.entries.splice(0);
    if (queue_ref.slots) {
      for (let idx = 0; idx < discarded.length; idx++)
        queue_ref.releaseSlot();
    }

    queue_ref.wakeAll(queue_ref.dequeue_waiters);
    queue_ref.wakeAll(queue_ref.empty_waiters);
    return true;
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Internals %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  private async takeSlot(): Promise<void> {
    const queue_ref = this;
    if (!queue_ref.slots) return;

    const deferral: Deferred = new Deferred();
    queue_ref.pending_slot_takers++;
    queue_ref.slots.take(() => {
      queue_ref.pending_slot_takers--;
      deferral.resolve(true);
    });
    await deferral.promise;
  }

  private releaseSlot() {
    if (!this.slots) return;
    this.slots.leave();
  }

  private wakeAll(waiters: Deferred[]) {
    const woken = waiters.splice(0);
    for (const deferral of woken) deferral.resolve(true);
  }
}

export { BacklogQueue, createBacklogEntry };
export type { backlog_entry_t, backlog_queue_options_t, backlog_queue_state_t };
