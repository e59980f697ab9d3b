/**
 * Oracle contracts.
 *
 * A ThoughtOracle is the external content generator. Its answers are
 * untrusted (`unknown`); GuardedOracle validates them and bounds every
 * call with a timeout before the engine sees them.
 */

export interface ThoughtOracle {
  /** Up to `n` candidate continuations of the prefix: `[{ content, prior? }]` */
  generateContinuations(prefix: string[], n: number, signal: AbortSignal): Promise<unknown>;
  /** Scalar reward for the prefix */
  evaluate(prefix: string[], signal: AbortSignal): Promise<unknown>;
}

export interface Continuation {
  content: string;
  prior: number;
}

export interface GuardedOracleOptions {
  timeoutMs: number;
  defaultPrior: number;
  rewardRange: [number, number];
}
