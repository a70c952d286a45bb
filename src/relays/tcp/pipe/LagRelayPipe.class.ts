/* eslint-disable @typescript-eslint/no-this-alias */

// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% LagRelayPipe Class %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

/*
One direction of a relayed connection.  The reader side pulls chunks off
the source stream and schedules each one (release_at = now + sampled
delay) into the backlog.  The sender side takes entries off the backlog
in order, waits out each release time, and writes the payload to the
sink.

Events:
  'sink_write_failed' (err: Error)  the sender could not write; the
                                    backlog has been discarded.

The pipe never destroys either stream.  When the source ends cleanly
and everything was delivered, the sink is end()ed so the half-close
reaches the peer.
*/

import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { performance } from 'node:perf_hooks';
import { Deferred } from '@opsimathically/deferred';
import { v4 as uuid } from 'uuid';

import { DelayPolicy } from '../delay_policy/DelayPolicy.class';
import { BacklogQueue } from '../backlog_queue/BacklogQueue.class';
import { ActivePipeRegistry } from '../registry/ActivePipeRegistry.class';
import { LagRelayLogger } from '../logger/LagRelayLogger.class';

const DEFAULT_READ_CHUNK_SIZE = 1024;

type lagrelay_pipe_reader_result_t =
  | 'source_ended'
  | 'source_errored'
  | 'stopped';

type lagrelay_pipe_sender_result_t = 'drained' | 'sink_write_failed' | 'stopped';

type lagrelay_pipe_options_t = {
  // human readable "<source> -> <sink>", used in log lines
  label: string;
  source: Readable;
  sink: Writable;
  delay_policy: DelayPolicy | null;
  registry: ActivePipeRegistry;
  logger: LagRelayLogger;

  // largest payload a single backlog entry may carry
  read_chunk_size?: number;

  // 0 (default) keeps the backlog unbounded
  max_backlog_entries?: number;
};

type lagrelay_pipe_result_t = {
  uuid: string;
  reader_result: lagrelay_pipe_reader_result_t;
  sender_result: lagrelay_pipe_sender_result_t;
  sink_ended: boolean;
  bytes_read: number;
  bytes_written: number;
  entries_delivered: number;
  read_error: Error | null;
  write_error: Error | null;
};

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk);
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new Error('lagrelay_pipe_unsupported_chunk_type');
}

function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err));
}

class LagRelayPipe extends EventEmitter {
  uuid: string;
  options: lagrelay_pipe_options_t;
  backlog: BacklogQueue;
  read_chunk_size: number;

  bytes_read: number = 0;
  bytes_written: number = 0;
  entries_delivered: number = 0;

  read_error: Error | null = null;
  write_error: Error | null = null;

  running: boolean = false;
  stopped: boolean = false;

  private sleep_timer: NodeJS.Timeout | null = null;
  private sleep_deferral: Deferred | null = null;

  constructor(options: lagrelay_pipe_options_t) {
    super();
    this.options = options;
    this.uuid = uuid();
    this.read_chunk_size =
      options.read_chunk_size && options.read_chunk_size > 0
        ? Math.floor(options.read_chunk_size)
        : DEFAULT_READ_CHUNK_SIZE;
    this.backlog = new BacklogQueue({
      max_entries: options.max_backlog_entries ?? 0
    });
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Run / Stop %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  /**
   * Run both halves of the pipe.  Resolves after the reader has stopped,
   * the backlog has drained (or been discarded) and the sender has
   * exited.  Only rejects when the pipe is already running.
   */
  async run(): Promise<lagrelay_pipe_result_t> {
    const pipe_ref = this;
    if (pipe_ref.running) throw new Error('lagrelay_pipe_is_already_running');
    pipe_ref.running = true;

    const { registry, logger } = pipe_ref.options;
    logger.info(`Creating new pipe ${pipe_ref.uuid} (${pipe_ref.options.label})`);
    logger.info(
      `${registry.register(pipe_ref.uuid, pipe_ref.options.label)} pipes active`
    );

    const sender_promise = pipe_ref.runSender();
    const reader_result = await pipe_ref.runReader();
    logger.info(`Pipe ${pipe_ref.uuid} terminating (${reader_result})`);

    // nothing else will be enqueued; let the sender finish what is left
    pipe_ref.backlog.close();
    await pipe_ref.backlog.waitUntilEmpty();
    const sender_result = await sender_promise;

    let sink_ended = false;
    if (
      reader_result === 'source_ended' &&
      sender_result === 'drained' &&
      !pipe_ref.stopped &&
      !pipe_ref.options.sink.writableEnded &&
      !pipe_ref.options.sink.destroyed
    ) {
      pipe_ref.options.sink.end();
      sink_ended = true;
    }

    logger.info(`${registry.unregister(pipe_ref.uuid)} pipes active`);
    pipe_ref.running = false;

    return {
      uuid: pipe_ref.uuid,
      reader_result: reader_result,
      sender_result: sender_result,
      sink_ended: sink_ended,
      bytes_read: pipe_ref.bytes_read,
      bytes_written: pipe_ref.bytes_written,
      entries_delivered: pipe_ref.entries_delivered,
      read_error: pipe_ref.read_error,
      write_error: pipe_ref.write_error
    };
  }

  /**
   * Discard the backlog and cancel any pending delay.  The reader only
   * notices once its source ends or is destroyed, which is the owner's
   * job.
   */
  stop() {
    const pipe_ref = this;
    if (pipe_ref.stopped) return false;
    pipe_ref.stopped = true;
    pipe_ref.backlog.destroy();
    pipe_ref.cancelSleep();
    return true;
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Reader %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  private async runReader(): Promise<lagrelay_pipe_reader_result_t> {
    const pipe_ref = this;
    const { source, delay_policy } = pipe_ref.options;

    try {
      // the default iterator destroys the whole duplex once the read side
      // ends, which would cut off the opposite direction's writes
      for await (const chunk of source.iterator({ destroyOnReturn: false })) {
        const buffer = toBuffer(chunk);
        if (buffer.length === 0) continue;
        pipe_ref.bytes_read += buffer.length;

        // one entry per read unit, each with its own sampled delay taken
        // when the backlog admits it
        for (
          let offset = 0;
          offset < buffer.length;
          offset += pipe_ref.read_chunk_size
        ) {
          const payload = buffer.subarray(
            offset,
            offset + pipe_ref.read_chunk_size
          );
          const accepted = await pipe_ref.backlog.enqueuePayload(
            payload,
            delay_policy
          );
          if (!accepted) return 'stopped';
        }

        if (pipe_ref.stopped) return 'stopped';
      }
    } catch (err) {
      if (pipe_ref.stopped) return 'stopped';
      pipe_ref.read_error = toError(err);
      return 'source_errored';
    }

    if (pipe_ref.stopped) return 'stopped';
    return 'source_ended';
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Sender %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  private async runSender(): Promise<lagrelay_pipe_sender_result_t> {
    const pipe_ref = this;

    for (;;) {
      const entry = await pipe_ref.backlog.dequeue();
      if (!entry) return pipe_ref.stopped ? 'stopped' : 'drained';

      try {
        await pipe_ref.sleepUntil(entry.release_at);
        if (pipe_ref.stopped) return 'stopped';

        await pipe_ref.writeToSink(entry.payload);
        pipe_ref.bytes_written += entry.payload.length;
        pipe_ref.entries_delivered++;
      } catch (err) {
        pipe_ref.write_error = toError(err);
        pipe_ref.options.logger.error(
          `Pipe ${pipe_ref.uuid} sink write failed`,
          pipe_ref.write_error
        );
        pipe_ref.backlog.destroy();
        pipe_ref.emit('sink_write_failed', pipe_ref.write_error);
        return 'sink_write_failed';
      } finally {
        pipe_ref.backlog.completeEntry();
      }
    }
  }

  private async writeToSink(payload: Buffer): Promise<void> {
    const deferral: Deferred = new Deferred();
    this.options.sink.write(payload, (err?: Error | null) => {
      if (err) {
        deferral.reject(err);
        return;
      }
      deferral.resolve(true);
    });
    await deferral.promise;
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Delay Timer %%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  // timers may wake a hair early relative to performance.now(), so re-check
  private async sleepUntil(release_at: number): Promise<void> {
    const pipe_ref = this;
    while (!pipe_ref.stopped) {
      const wait_ms = release_at - performance.now();
      if (wait_ms <= 0) return;

      const deferral: Deferred = new Deferred();
      pipe_ref.sleep_deferral = deferral;
      pipe_ref.sleep_timer = setTimeout(() => {
        pipe_ref.sleep_timer = null;
        pipe_ref.sleep_deferral = null;
        deferral.resolve(true);
      }, Math.ceil(wait_ms));
      await deferral.promise;
    }
  }

  private cancelSleep() {
    const pipe_ref = this;
    if (pipe_ref.sleep_timer) {
      clearTimeout(pipe_ref.sleep_timer);
      pipe_ref.sleep_timer = null;
    }
    if (pipe_ref.sleep_deferral) {
      const deferral = pipe_ref.sleep_deferral;
      pipe_ref.sleep_deferral = null;
      deferral.resolve(true);
    }
  }
}

export { LagRelayPipe, DEFAULT_READ_CHUNK_SIZE };
export type {
  lagrelay_pipe_options_t,
  lagrelay_pipe_result_t,
  lagrelay_pipe_reader_result_t,
  lagrelay_pipe_sender_result_t
};
