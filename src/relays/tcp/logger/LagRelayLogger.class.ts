// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% LagRelayLogger Class %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

type lagrelay_log_level_t = 'info' | 'error';

type lagrelay_log_sink_t = (level: lagrelay_log_level_t, line: string) => void;

type lagrelay_logger_options_t = {
  enabled: boolean;
  sink?: lagrelay_log_sink_t;
  clock?: () => Date;
};

function consoleLogSink(level: lagrelay_log_level_t, line: string) {
  if (level === 'error') {
    console.error(line);
    return;
  }
  console.log(line);
}

class LagRelayLogger {
  enabled: boolean;
  sink: lagrelay_log_sink_t;
  clock: () => Date;

  constructor(options: lagrelay_logger_options_t) {
    this.enabled = options.enabled;
    this.sink = options.sink ?? consoleLogSink;
    this.clock = options.clock ?? (() => new Date());
  }

  static silent(): LagRelayLogger {
    return new LagRelayLogger({ enabled: false });
  }

  formatLine(message: string): string {
    return `${this.clock().toISOString()}: ${message}`;
  }

  info(message: string) {
    if (!this.enabled) return false;
    this.sink('info', this.formatLine(message));
    return true;
  }

  error(message: string, err?: unknown) {
    if (!this.enabled) return false;
    let line = message;
    if (err instanceof Error) line = `${message}: ${err.message}`;
    else if (err !== undefined) line = `${message}: ${String(err)}`;
    this.sink('error', this.formatLine(line));
    return true;
  }
}

export { LagRelayLogger, consoleLogSink };
export type {
  lagrelay_logger_options_t,
  lagrelay_log_level_t,
  lagrelay_log_sink_t
};
