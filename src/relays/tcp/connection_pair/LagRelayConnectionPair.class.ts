/* eslint-disable @typescript-eslint/no-this-alias */

// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% LagRelayConnectionPair Class %%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

/*
Created by the relay for every accepted socket.  Dials the remote
endpoint, then runs two pipes (local -> remote, remote -> local) that
share the relay's delay policy.

A failed dial only affects this pair: the local socket is destroyed and
start() resolves false.  Once relaying, the pair is torn down (both
sockets destroyed, both pipes stopped) when a pipe fails to write to its
sink, when a pipe's source errors, or when both directions have ended.

Events:
  'failed' (err)   the dial failed or was aborted; emitted before 'closed'.
  'closed' (pair)  both sockets are gone; emitted exactly once, also for
                   pairs whose dial failed.
*/

import { EventEmitter } from 'node:events';
import net from 'node:net';
import { Deferred } from '@opsimathically/deferred';
import { v4 as uuid } from 'uuid';

import { DelayPolicy } from '../delay_policy/DelayPolicy.class';
import { ActivePipeRegistry } from '../registry/ActivePipeRegistry.class';
import { LagRelayLogger } from '../logger/LagRelayLogger.class';
import {
  LagRelayPipe,
  type lagrelay_pipe_result_t
} from '../pipe/LagRelayPipe.class';

type lagrelay_connection_pair_options_t = {
  local_socket: net.Socket;
  remote_host: string;
  remote_port: number;
  delay_policy: DelayPolicy | null;
  registry: ActivePipeRegistry;
  logger: LagRelayLogger;
  read_chunk_size?: number;
  max_backlog_entries?: number;
};

type lagrelay_connection_pair_state_t =
  | 'created'
  | 'connecting'
  | 'relaying'
  | 'failed'
  | 'closed';

function describeSocketPeer(socket: net.Socket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
}

class LagRelayConnectionPair extends EventEmitter {
  uuid: string;
  options: lagrelay_connection_pair_options_t;
  state: lagrelay_connection_pair_state_t = 'created';

  local_socket: net.Socket;
  remote_socket: net.Socket | null = null;

  pipes: LagRelayPipe[] = [];
  pipe_results: lagrelay_pipe_result_t[] = [];

  connect_error: Error | null = null;
  teardown_reason: string | null = null;

  private closed_deferral: Deferred = new Deferred();
  private closed: boolean = false;

  constructor(options: lagrelay_connection_pair_options_t) {
    super();
    this.options = options;
    this.uuid = uuid();
    this.local_socket = options.local_socket;
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Start %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  /**
   * Dial the remote endpoint and start both pipes.  Resolves true once
   * relaying has begun, false when the dial failed (or the pair was
   * destroyed while dialing).  Never rejects.
   */
  async start(): Promise<boolean> {
    const pair_ref = this;
    const { logger, remote_host, remote_port } = pair_ref.options;
    if (pair_ref.state !== 'created')
      throw new Error('lagrelay_connection_pair_already_started');

    const local_socket = pair_ref.local_socket;
    local_socket.on('error', (err: Error) => {
      logger.error(`Session ${pair_ref.uuid} local socket error`, err);
    });
    local_socket.setNoDelay(true);

    logger.info(
      `Creating new session for ${local_socket.remoteAddress ?? 'unknown'} ${
        local_socket.remotePort ?? 0
      }`
    );

    pair_ref.state = 'connecting';
    let remote_socket: net.Socket;
    try {
      remote_socket = await pair_ref.connectRemote();
    } catch (err) {
      const connect_error = err instanceof Error ? err : new Error(String(err));
      logger.error(
        `Session ${pair_ref.uuid} could not connect to ${remote_host}:${remote_port}`,
        connect_error
      );
      local_socket.destroy();
      pair_ref.markFailed(connect_error);
      return false;
    }

    if (pair_ref.teardown_reason) {
      remote_socket.destroy();
      pair_ref.markFailed(new Error('lagrelay_remote_connect_aborted'));
      return false;
    }

    remote_socket.on('error', (err: Error) => {
      logger.error(`Session ${pair_ref.uuid} remote socket error`, err);
    });
    remote_socket.setNoDelay(true);

    pair_ref.state = 'relaying';
    pair_ref.runPipes(local_socket, remote_socket).catch((err: unknown) => {
      logger.error(`Session ${pair_ref.uuid} relay failed`, err);
      pair_ref.destroy('relay_failed');
      pair_ref.markClosed();
    });
    return true;
  }

  private async connectRemote(): Promise<net.Socket> {
    const pair_ref = this;
    const { remote_host, remote_port } = pair_ref.options;

    const deferral: Deferred = new Deferred();
    const remote_socket = net.connect({
      host: remote_host,
      port: remote_port,
      allowHalfOpen: true
    });
    pair_ref.remote_socket = remote_socket;

    const onError = (err: Error) => {
      deferral.reject(
        new Error('lagrelay_remote_connect_failed', { cause: err })
      );
    };
    const onClose = () => {
      deferral.reject(new Error('lagrelay_remote_connect_aborted'));
    };
    remote_socket.once('error', onError);
    remote_socket.once('close', onClose);
    remote_socket.once('connect', () => {
      remote_socket.removeListener('error', onError);
      remote_socket.removeListener('close', onClose);
      deferral.resolve(true);
    });

    await deferral.promise;
    return remote_socket;
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Relaying %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  private async runPipes(local_socket: net.Socket, remote_socket: net.Socket) {
    const pair_ref = this;
    const { delay_policy, registry, logger, read_chunk_size, max_backlog_entries } =
      pair_ref.options;

    const local_label = describeSocketPeer(local_socket);
    const remote_label = describeSocketPeer(remote_socket);

    const upstream = new LagRelayPipe({
      label: `${local_label} -> ${remote_label}`,
      source: local_socket,
      sink: remote_socket,
      delay_policy: delay_policy,
      registry: registry,
      logger: logger,
      read_chunk_size: read_chunk_size,
      max_backlog_entries: max_backlog_entries
    });
    const downstream = new LagRelayPipe({
      label: `${remote_label} -> ${local_label}`,
      source: remote_socket,
      sink: local_socket,
      delay_policy: delay_policy,
      registry: registry,
      logger: logger,
      read_chunk_size: read_chunk_size,
      max_backlog_entries: max_backlog_entries
    });
    pair_ref.pipes = [upstream, downstream];

    for (const pipe of pair_ref.pipes) {
      pipe.once('sink_write_failed', () => {
        pair_ref.destroy('sink_write_failed');
      });
    }

    pair_ref.pipe_results = await Promise.all(
      pair_ref.pipes.map(async (pipe) => {
        const result = await pipe.run();
        if (result.reader_result === 'source_errored')
          pair_ref.destroy('source_errored');
        return result;
      })
    );

    pair_ref.destroy('both_directions_finished');
    pair_ref.markClosed();
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Teardown %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  /**
   * Stop both pipes and destroy both sockets.  Only the first call has
   * any effect; its reason is kept in teardown_reason.
   */
  destroy(reason: string) {
    const pair_ref = this;
    if (pair_ref.teardown_reason) return false;
    pair_ref.teardown_reason = reason;

    if (reason !== 'both_directions_finished')
      pair_ref.options.logger.info(
        `Session ${pair_ref.uuid} tearing down (${reason})`
      );

    for (const pipe of pair_ref.pipes) pipe.stop();
    pair_ref.local_socket.destroy();
    if (pair_ref.remote_socket) pair_ref.remote_socket.destroy();
    return true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async waitUntilClosed(): Promise<void> {
    if (this.closed) return;
    await this.closed_deferral.promise;
  }

  // 'failed' always precedes 'closed' for a pair that never relayed
  private markFailed(err: Error) {
    const pair_ref = this;
    pair_ref.connect_error = err;
    pair_ref.state = 'failed';
    pair_ref.emit('failed', err);
    pair_ref.markClosed();
  }

  private markClosed() {
    const pair_ref = this;
    if (pair_ref.closed) return;
    pair_ref.closed = true;
    if (pair_ref.state !== 'failed') pair_ref.state = 'closed';
    pair_ref.closed_deferral.resolve(true);
    pair_ref.emit('closed', pair_ref);
  }
}

export { LagRelayConnectionPair };
export type {
  lagrelay_connection_pair_options_t,
  lagrelay_connection_pair_state_t
};
