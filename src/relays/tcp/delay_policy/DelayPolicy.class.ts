// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%% DelayPolicy Class %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%
// %%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%%

/*
Latency distribution sampled once per forwarded chunk.  A single
instance is shared (read only) by both pipes of a connection pair.
*/

type delay_policy_random_source_t = () => number;

type delay_policy_options_t = {
  min_seconds: number;
  max_seconds?: number | null;

  // returns a value in [0, 1), defaults to Math.random
  random?: delay_policy_random_source_t;
};

class DelayPolicy {
  readonly min_seconds: number;
  readonly max_seconds: number;

  private readonly random: delay_policy_random_source_t;

  constructor(options: delay_policy_options_t) {
    // bounds are normalized here, never rejected
    const min_seconds =
      Number.isFinite(options.min_seconds) && options.min_seconds > 0
        ? options.min_seconds
        : 0;

    let max_seconds = min_seconds;
    if (
      typeof options.max_seconds === 'number' &&
      Number.isFinite(options.max_seconds) &&
      options.max_seconds >= min_seconds
    )
      max_seconds = options.max_seconds;

    this.min_seconds = min_seconds;
    this.max_seconds = max_seconds;
    this.random = options.random ?? Math.random;
  }

  isFixed(): boolean {
    return this.min_seconds === this.max_seconds;
  }

  /**
   * Draw one delay, in seconds, uniformly from [min_seconds, max_seconds].
   */
  sample(): number {
    if (this.isFixed()) return this.min_seconds;
    return (
      this.min_seconds + this.random() * (this.max_seconds - this.min_seconds)
    );
  }

  sampleMilliseconds(): number {
    return this.sample() * 1000;
  }

  describe(): string {
    return `[${this.min_seconds.toFixed(6)}-${this.max_seconds.toFixed(
      6
    )}] seconds added latency`;
  }
}

export { DelayPolicy };
export type { delay_policy_options_t, delay_policy_random_source_t };
