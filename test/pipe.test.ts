import test from 'node:test';
import assert from 'node:assert';
import { once } from 'node:events';
import { Duplex, PassThrough, Writable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';

import {
  LagRelayPipe,
  type lagrelay_pipe_options_t
} from '@src/relays/tcp/pipe/LagRelayPipe.class';
import { DelayPolicy } from '@src/relays/tcp/delay_policy/DelayPolicy.class';
import { ActivePipeRegistry } from '@src/relays/tcp/registry/ActivePipeRegistry.class';
import { LagRelayLogger } from '@src/relays/tcp/logger/LagRelayLogger.class';

// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% Utilities %%%%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

type recorded_write_t = {
  at: number;
  data: Buffer;
};

function createRecordingSink() {
  const writes: recorded_write_t[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      writes.push({ at: Date.now(), data: Buffer.from(chunk) });
      callback();
    }
  });
  return { sink, writes };
}

function createPipe(
  params: Partial<lagrelay_pipe_options_t> &
    Pick<lagrelay_pipe_options_t, 'source' | 'sink'>
) {
  const registry = params.registry ?? new ActivePipeRegistry();
  const pipe = new LagRelayPipe({
    label: 'test-source -> test-sink',
    delay_policy: null,
    registry: registry,
    logger: LagRelayLogger.silent(),
    ...params
  });
  return { pipe, registry };
}

function scriptedRandom(draws: number[]): () => number {
  const remaining = draws.slice();
  return () => remaining.shift() ?? 0;
}

// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% Test Definitions %%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

test('Pipe splits reads into read units and ends the sink.', async function () {
  const source = new PassThrough();
  const { sink, writes } = createRecordingSink();
  const { pipe, registry } = createPipe({ source, sink });

  const payload = Buffer.alloc(2500);
  for (let idx = 0; idx < payload.length; idx++) payload[idx] = idx % 251;

  const run_promise = pipe.run();
  assert.strictEqual(registry.count(), 1);
  source.end(payload);
  const result = await run_promise;

  assert.deepStrictEqual(
    writes.map((write) => write.data.length),
    [1024, 1024, 452]
  );
  assert.ok(Buffer.concat(writes.map((write) => write.data)).equals(payload));
  assert.strictEqual(result.reader_result, 'source_ended');
  assert.strictEqual(result.sender_result, 'drained');
  assert.strictEqual(result.sink_ended, true);
  assert.strictEqual(result.bytes_read, 2500);
  assert.strictEqual(result.bytes_written, 2500);
  assert.strictEqual(result.entries_delivered, 3);
  assert.strictEqual(sink.writableEnded, true);
  assert.strictEqual(registry.count(), 0);
});

test('A source duplex stays writable after its read side ends.', async function () {
  const written_back: string[] = [];
  const source = new Duplex({
    allowHalfOpen: true,
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written_back.push(chunk.toString());
      callback();
    }
  });
  const { sink, writes } = createRecordingSink();
  const { pipe } = createPipe({ source, sink });

  const run_promise = pipe.run();
  source.push('request');
  source.push(null);
  const result = await run_promise;

  assert.strictEqual(result.reader_result, 'source_ended');
  assert.deepStrictEqual(
    writes.map((write) => write.data.toString()),
    ['request']
  );
  assert.strictEqual(source.destroyed, false);

  // the opposite direction still writes through the same duplex
  const written = new Promise<void>((resolve, reject) => {
    source.write('response', (err?: Error | null) => {
      if (err) reject(err);
      else resolve();
    });
  });
  await written;
  assert.deepStrictEqual(written_back, ['response']);
});

test('Later chunk with a shorter delay still waits behind an earlier one.', async function () {
  const source = new PassThrough();
  const { sink, writes } = createRecordingSink();
  const { pipe } = createPipe({
    source,
    sink,
    delay_policy: new DelayPolicy({
      min_seconds: 0.03,
      max_seconds: 0.3,
      random: scriptedRandom([1, 0])
    })
  });

  const run_promise = pipe.run();
  const started_at = Date.now();
  source.write('first');
  await delay(20);
  source.write('second');
  source.end();
  await run_promise;

  assert.deepStrictEqual(
    writes.map((write) => write.data.toString()),
    ['first', 'second']
  );
  assert.ok(writes[0].at - started_at >= 300);
  assert.ok(writes[1].at >= writes[0].at);
});

test('Fixed delay holds every chunk at least that long.', async function () {
  const source = new PassThrough();
  const { sink, writes } = createRecordingSink();
  const { pipe } = createPipe({
    source,
    sink,
    delay_policy: new DelayPolicy({ min_seconds: 0.1 })
  });

  const run_promise = pipe.run();
  const sent_at: number[] = [];
  for (const text of ['a', 'b', 'c']) {
    sent_at.push(Date.now());
    source.write(text);
    await delay(30);
  }
  source.end();
  await run_promise;

  assert.deepStrictEqual(
    writes.map((write) => write.data.toString()),
    ['a', 'b', 'c']
  );
  for (let idx = 0; idx < writes.length; idx++)
    assert.ok(
      writes[idx].at - sent_at[idx] >= 100,
      `chunk ${idx} arrived after ${writes[idx].at - sent_at[idx]}ms`
    );
});

test('Without a delay policy chunks are forwarded right away.', async function () {
  const source = new PassThrough();
  const { sink, writes } = createRecordingSink();
  const { pipe } = createPipe({ source, sink });

  const run_promise = pipe.run();
  const sent_at = Date.now();
  source.write('now');
  await delay(50);
  assert.strictEqual(writes.length, 1);
  assert.ok(writes[0].at - sent_at < 50);

  source.end();
  await run_promise;
});

test('Sink write failure is reported and discards the backlog.', async function () {
  const source = new PassThrough();
  const sink_errors: Error[] = [];
  const sink = new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback(new Error('test_sink_failure'));
    }
  });
  // the failed write also errors the stream itself
  sink.on('error', (err: Error) => {
    sink_errors.push(err);
  });
  const { pipe } = createPipe({ source, sink });

  const run_promise = pipe.run();
  const failed = once(pipe, 'sink_write_failed');
  source.write('doomed');
  const [err] = await failed;
  assert.ok(err instanceof Error);
  assert.strictEqual(err.message, 'test_sink_failure');
  assert.strictEqual(pipe.backlog.state, 'destroyed');

  source.end();
  const result = await run_promise;
  assert.strictEqual(result.sender_result, 'sink_write_failed');
  assert.strictEqual(result.sink_ended, false);
  assert.strictEqual(result.bytes_written, 0);
  assert.ok(result.write_error);
  assert.strictEqual(result.write_error.message, 'test_sink_failure');
  assert.ok(sink_errors.every((sink_err) => sink_err.message === 'test_sink_failure'));
});

test('Stop cancels a pending delay without writing.', async function () {
  const source = new PassThrough();
  const { sink, writes } = createRecordingSink();
  const { pipe, registry } = createPipe({
    source,
    sink,
    delay_policy: new DelayPolicy({ min_seconds: 5 })
  });

  const started_at = Date.now();
  const run_promise = pipe.run();
  source.write('never');
  await delay(20);

  assert.strictEqual(pipe.stop(), true);
  assert.strictEqual(pipe.stop(), false);
  source.destroy();
  const result = await run_promise;

  assert.strictEqual(result.reader_result, 'stopped');
  assert.strictEqual(result.sender_result, 'stopped');
  assert.strictEqual(result.sink_ended, false);
  assert.strictEqual(writes.length, 0);
  assert.ok(Date.now() - started_at < 1000);
  assert.strictEqual(registry.count(), 0);
});

test('Bounded backlog holds the reader back until entries are delivered.', async function () {
  const source = new PassThrough();
  const { sink, writes } = createRecordingSink();
  const { pipe } = createPipe({
    source,
    sink,
    read_chunk_size: 4,
    max_backlog_entries: 1,
    delay_policy: new DelayPolicy({ min_seconds: 0.2 })
  });

  const started_at = Date.now();
  const run_promise = pipe.run();
  source.end('aaaabbbbcccc');

  await delay(50);
  assert.strictEqual(pipe.backlog.length, 0);
  assert.strictEqual(pipe.backlog.in_flight, 1);
  assert.strictEqual(pipe.backlog.pendingSlotTakers(), 1);

  await run_promise;
  assert.deepStrictEqual(
    writes.map((write) => write.data.toString()),
    ['aaaa', 'bbbb', 'cccc']
  );
  // each entry is only scheduled once the previous one went out
  assert.ok(writes[2].at - started_at >= 600);
});

test('A pipe cannot be run twice at once.', async function () {
  const source = new PassThrough();
  const { sink } = createRecordingSink();
  const { pipe } = createPipe({ source, sink });

  const run_promise = pipe.run();
  await assert.rejects(pipe.run(), {
    message: 'lagrelay_pipe_is_already_running'
  });
  source.end();
  await run_promise;
});
