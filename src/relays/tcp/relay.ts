/* eslint-disable @typescript-eslint/no-this-alias */

import { EventEmitter } from 'node:events';
import net from 'node:net';
import type { AddressInfo } from 'node:net';
import { Deferred } from '@opsimathically/deferred';

import { DelayPolicy } from './delay_policy/DelayPolicy.class';
import { ActivePipeRegistry } from './registry/ActivePipeRegistry.class';
import { LagRelayLogger } from './logger/LagRelayLogger.class';
import { LagRelayConnectionPair } from './connection_pair/LagRelayConnectionPair.class';

type lagrelay_options_t = {
  // The hostname or local address to listen on (default: 0.0.0.0).
  host?: string;
  // The local port to listen on.  0 picks an ephemeral port.
  local_port: number;
  // Where accepted connections are forwarded to.
  remote_host: string;
  remote_port: number;
  // Latency added to every forwarded chunk, null for none.
  delay_policy: DelayPolicy | null;
  // Largest payload per backlog entry (default: 1024).
  read_chunk_size?: number;
  // Per-direction backlog bound; 0 or unset leaves it unbounded.
  max_backlog_entries?: number;
  // Defaults to an enabled console logger.
  logger?: LagRelayLogger;
};

const DEFAULT_LISTEN_HOST = '0.0.0.0';

/**
 * TCP relay that forwards every connection on a local port to a remote
 * host:port, optionally delaying each forwarded chunk.
 *
 * Events:
 *  'pair_opened' (pair)        remote dial succeeded, pipes are running
 *  'pair_failed' (pair, err)   remote dial failed; the local socket was closed
 *  'pair_closed' (pair)        a pair (opened or failed) is fully gone, always
 *                              after its 'pair_failed'
 */
class LagRelay extends EventEmitter {
  options: lagrelay_options_t;
  logger: LagRelayLogger;

  // active pipe bookkeeping (observability only)
  registry: ActivePipeRegistry = new ActivePipeRegistry();

  // every live connection pair, by uuid
  pair_map: Map<string, LagRelayConnectionPair> = new Map<
    string,
    LagRelayConnectionPair
  >();

  net_server: net.Server | null = null;
  closing: boolean = false;

  constructor(options: lagrelay_options_t) {
    super();
    this.options = options;
    this.logger = options.logger ?? new LagRelayLogger({ enabled: true });
  }

  describeDelay(): string {
    if (!this.options.delay_policy) return 'no delay';
    return this.options.delay_policy.describe();
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Start Listener %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  /**
   * Bind and start accepting.  Rejects on bind failure, which leaves the
   * relay unusable.
   */
  async listen(): Promise<AddressInfo> {
    const relay_ref = this;
    if (relay_ref.net_server)
      throw new Error('lagrelay_relay_is_already_listening');

    const host = relay_ref.options.host ?? DEFAULT_LISTEN_HOST;
    relay_ref.logger.info(
      `Redirecting: ${host}:${relay_ref.options.local_port} -> ${
        relay_ref.options.remote_host
      }:${relay_ref.options.remote_port} with ${relay_ref.describeDelay()}`
    );

    // allowHalfOpen lets each direction end on its own
    const net_server = net.createServer({ allowHalfOpen: true });
    relay_ref.net_server = net_server;
    relay_ref.closing = false;

    net_server.on('connection', (socket: net.Socket) => {
      relay_ref.handleConnection(socket).catch((err: unknown) => {
        relay_ref.logger.error('Connection dispatch failed', err);
        socket.destroy();
      });
    });

    const deferral: Deferred = new Deferred();
    const onListenError = (err: Error) => {
      deferral.reject(err);
    };
    net_server.once('error', onListenError);
    net_server.listen(
      {
        host: host,
        port: relay_ref.options.local_port,
        exclusive: true
      },
      () => {
        net_server.removeListener('error', onListenError);
        deferral.resolve(true);
      }
    );

    try {
      await deferral.promise;
    } catch (err) {
      relay_ref.net_server = null;
      throw err;
    }

    net_server.on('error', (err: Error) => {
      relay_ref.logger.error('Listener error', err);
    });

    const address = net_server.address();
    if (!address || typeof address === 'string')
      throw new Error('lagrelay_listen_address_unavailable');
    return address;
  }

  address(): AddressInfo | null {
    if (!this.net_server) return null;
    const address = this.net_server.address();
    if (!address || typeof address === 'string') return null;
    return address;
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Connection Handling %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  private async handleConnection(socket: net.Socket) {
    const relay_ref = this;
    if (relay_ref.closing) {
      socket.destroy();
      return;
    }

    const pair = new LagRelayConnectionPair({
      local_socket: socket,
      remote_host: relay_ref.options.remote_host,
      remote_port: relay_ref.options.remote_port,
      delay_policy: relay_ref.options.delay_policy,
      registry: relay_ref.registry,
      logger: relay_ref.logger,
      read_chunk_size: relay_ref.options.read_chunk_size,
      max_backlog_entries: relay_ref.options.max_backlog_entries
    });
    relay_ref.pair_map.set(pair.uuid, pair);
    // a failed dial stays inside the pair; the server keeps accepting
    pair.once('failed', (err: Error) => {
      relay_ref.emit('pair_failed', pair, err);
    });
    pair.once('closed', () => {
      relay_ref.pair_map.delete(pair.uuid);
      relay_ref.emit('pair_closed', pair);
    });

    if (await pair.start()) relay_ref.emit('pair_opened', pair);
  }

  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%% Close %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
  // %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

  /**
   * Stop accepting, tear down every live pair, and resolve once the
   * server has closed.
   */
  async close() {
    const relay_ref = this;
    const net_server = relay_ref.net_server;
    if (!net_server) return false;
    relay_ref.closing = true;

    const deferral: Deferred = new Deferred();
    net_server.close((err?: Error) => {
      if (err) {
        deferral.reject(err);
        return;
      }
      deferral.resolve(true);
    });

    // the server only reports closed once every accepted socket is gone
    const pairs = Array.from(relay_ref.pair_map.values());
    for (const pair of pairs) pair.destroy('relay_closing');
    await Promise.all([
      deferral.promise,
      ...pairs.map((pair) => pair.waitUntilClosed())
    ]);

    relay_ref.net_server = null;
    relay_ref.logger.info('Relay closed');
    return true;
  }
}

export { LagRelay, DEFAULT_LISTEN_HOST };
export type { lagrelay_options_t };
