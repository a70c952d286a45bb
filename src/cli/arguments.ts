import yargs from 'yargs';

type lagrelay_cli_arguments_t = {
  quiet: boolean;
  local_port: number;
  remote_host: string;
  remote_port: number;
  delay_min_seconds: number | null;
  delay_max_seconds: number | null;
};

type lagrelay_cli_parse_result_t =
  | { ok: true; args: lagrelay_cli_arguments_t }
  | { ok: false; reason: string };

const USAGE = 'Usage: $0 localport remotehost remoteport [delaymin [delaymax]]';

// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% Parser %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

function createArgumentParser(argv: string[]) {
  return (
    yargs(argv)
      .scriptName('lagrelay')
      .usage(USAGE)
      .example(
        '$0 8080 www.example.com 80 0.6 1.4',
        'Browsing http://localhost:8080 then simulates a very laggy connection (600-1400ms latency) to www.example.com.'
      )
      .option('q', {
        type: 'boolean',
        default: false,
        description: 'disable log output'
      })
      // positionals stay strings; they are validated below
      .parserConfiguration({ 'parse-positional-numbers': false })
      .strictOptions()
      .help(false)
      .version(false)
      .exitProcess(false)
      .fail((message: string, err: Error | undefined) => {
        throw err ?? new Error(message);
      })
  );
}

function parsePort(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const port = parseInt(value, 10);
  if (port > 65535) return null;
  return port;
}

function parseSeconds(value: string): number | null {
  if (value.trim() === '') return null;
  const seconds = Number(value);
  if (!Number.isFinite(seconds)) return null;
  return seconds;
}

/**
 * Parse `localport remotehost remoteport [delaymin [delaymax]]` plus an
 * optional `-q` anywhere in the list.  Never throws.
 */
function parseCommandLineArguments(
  argv: string[]
): lagrelay_cli_parse_result_t {
  let positionals: string[];
  let quiet: boolean;
  try {
    const parsed = createArgumentParser(argv).parseSync();
    positionals = parsed._.map((value) => String(value));
    quiet = parsed.q;
  } catch (err) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : String(err)
    };
  }

  if (positionals.length < 3)
    return { ok: false, reason: 'missing_required_arguments' };
  if (positionals.length > 5)
    return { ok: false, reason: 'too_many_arguments' };

  const local_port = parsePort(positionals[0]);
  if (local_port === null) return { ok: false, reason: 'invalid_local_port' };

  const remote_host = positionals[1];
  if (remote_host.trim() === '')
    return { ok: false, reason: 'invalid_remote_host' };

  const remote_port = parsePort(positionals[2]);
  if (remote_port === null) return { ok: false, reason: 'invalid_remote_port' };

  let delay_min_seconds: number | null = null;
  let delay_max_seconds: number | null = null;
  if (positionals.length > 3) {
    delay_min_seconds = parseSeconds(positionals[3]);
    if (delay_min_seconds === null)
      return { ok: false, reason: 'invalid_delay_min' };
  }
  if (positionals.length > 4) {
    delay_max_seconds = parseSeconds(positionals[4]);
    if (delay_max_seconds === null)
      return { ok: false, reason: 'invalid_delay_max' };
  }

  return {
    ok: true,
    args: {
      quiet: quiet,
      local_port: local_port,
      remote_host: remote_host,
      remote_port: remote_port,
      delay_min_seconds: delay_min_seconds,
      delay_max_seconds: delay_max_seconds
    }
  };
}

function printUsage(print: (text: string) => void) {
  createArgumentParser([]).showHelp(print);
}

export { parseCommandLineArguments, createArgumentParser, printUsage, USAGE };
export type { lagrelay_cli_arguments_t, lagrelay_cli_parse_result_t };
