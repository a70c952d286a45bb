// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% Relay An Echo Server With Added Latency %%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

// Run with: npx tsx examples/simple_relay/simple_relay.example.ts

import net from 'node:net';
import { once } from 'node:events';

import { LagRelay } from '@src/relays/tcp/relay';
import { DelayPolicy } from '@src/relays/tcp/delay_policy/DelayPolicy.class';
import { LagRelayLogger } from '@src/relays/tcp/logger/LagRelayLogger.class';

(async function () {
  // local echo server standing in for the remote endpoint
  const echo_server = net.createServer({ allowHalfOpen: true }, (socket) => {
    socket.pipe(socket);
  });
  echo_server.listen(0, '127.0.0.1');
  await once(echo_server, 'listening');
  const echo_address = echo_server.address();
  if (!echo_address || typeof echo_address === 'string')
    throw new Error('echo server has no address');

  const relay = new LagRelay({
    host: '127.0.0.1',
    local_port: 0,
    remote_host: '127.0.0.1',
    remote_port: echo_address.port,
    delay_policy: new DelayPolicy({ min_seconds: 0.2, max_seconds: 0.4 }),
    logger: new LagRelayLogger({ enabled: true })
  });
  const relay_address = await relay.listen();

  const client = net.connect({ host: '127.0.0.1', port: relay_address.port });
  await once(client, 'connect');

  const sent_at = Date.now();
  client.write('hello through the relay');
  const [reply] = await once(client, 'data');
  console.log(
    `echoed "${String(reply)}" after ${Date.now() - sent_at}ms (expected 400-800ms)`
  );

  client.end();
  await once(client, 'close');
  await relay.close();
  echo_server.close();
})().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
