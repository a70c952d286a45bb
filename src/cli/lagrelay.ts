#!/usr/bin/env node

import { hideBin } from 'yargs/helpers';
import { Deferred } from '@opsimathically/deferred';

import { parseCommandLineArguments, printUsage } from './arguments';
import { LagRelay } from '../relays/tcp/relay';
import { DelayPolicy } from '../relays/tcp/delay_policy/DelayPolicy.class';
import { LagRelayLogger } from '../relays/tcp/logger/LagRelayLogger.class';

type lagrelay_cli_io_t = {
  print: (text: string) => void;
  print_error: (text: string) => void;

  // resolves when the relay should shut down (SIGINT/SIGTERM by default)
  wait_for_shutdown: () => Promise<void>;
};

async function waitForShutdownSignal(): Promise<void> {
  const deferral: Deferred = new Deferred();
  const onSignal = () => {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    deferral.resolve(true);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  await deferral.promise;
}

const default_io: lagrelay_cli_io_t = {
  print: (text: string) => console.log(text),
  print_error: (text: string) => console.error(text),
  wait_for_shutdown: waitForShutdownSignal
};

/**
 * Run the relay from command line arguments.  Resolves with the process
 * exit code: 0 after a clean shutdown or when usage was printed, 1 when
 * the listener could not bind.
 */
async function main(
  argv: string[],
  io: lagrelay_cli_io_t = default_io
): Promise<number> {
  const parsed = parseCommandLineArguments(argv);
  if (!parsed.ok) {
    printUsage(io.print);
    return 0;
  }

  const { args } = parsed;
  const logger = new LagRelayLogger({ enabled: !args.quiet });
  const delay_policy =
    args.delay_min_seconds === null
      ? null
      : new DelayPolicy({
          min_seconds: args.delay_min_seconds,
          max_seconds: args.delay_max_seconds
        });

  const relay = new LagRelay({
    local_port: args.local_port,
    remote_host: args.remote_host,
    remote_port: args.remote_port,
    delay_policy: delay_policy,
    logger: logger
  });

  try {
    await relay.listen();
  } catch (err) {
    io.print_error(
      `lagrelay: could not listen on port ${args.local_port}: ${
        err instanceof Error ? err.message : String(err)
      }`
    );
    return 1;
  }

  await io.wait_for_shutdown();
  await relay.close();
  return 0;
}

if (require.main === module) {
  main(hideBin(process.argv))
    .then((exit_code: number) => {
      process.exitCode = exit_code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}

export { main, waitForShutdownSignal };
export type { lagrelay_cli_io_t };
