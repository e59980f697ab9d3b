import { z } from 'zod';
import { OracleError, toError } from '../core/errors.js';
import { componentLogger } from '../core/logger.js';
import { OperationTimeoutError, withTimeout } from '../utils/timeout.js';
import type { Continuation, GuardedOracleOptions, ThoughtOracle } from './types.js';

const ContinuationsSchema = z.array(
  z.object({
    content: z.string().trim().min(1),
    prior: z.number().min(0).max(1).optional(),
  }),
);

const RewardSchema = z.number().finite();

/**
 * Validating, time-bounded view of a ThoughtOracle. Every failure comes out
 * as an OracleError tagged `timeout`, `malformed` or `failed`.
 */
export class GuardedOracle {
  private readonly log = componentLogger('oracle');

  constructor(
    private readonly backend: ThoughtOracle,
    private readonly options: GuardedOracleOptions,
  ) {}

  get rewardRange(): [number, number] {
    return this.options.rewardRange;
  }

  async generateContinuations(prefix: string[], n: number): Promise<Continuation[]> {
    const raw = await this.call('generateContinuations', (signal) => this.backend.generateContinuations(prefix, n, signal));
    const parsed = ContinuationsSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.reject('generateContinuations', new OracleError(
        `Malformed continuations: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        'malformed',
        parsed.error,
      ));
    }
    return parsed.data.slice(0, n).map((c) => ({
      content: c.content,
      prior: c.prior ?? this.options.defaultPrior,
    }));
  }

  async evaluate(prefix: string[]): Promise<number> {
    const raw = await this.call('evaluate', (signal) => this.backend.evaluate(prefix, signal));
    const parsed = RewardSchema.safeParse(raw);
    const [lo, hi] = this.options.rewardRange;
    if (!parsed.success || parsed.data < lo || parsed.data > hi) {
      throw this.reject('evaluate', new OracleError(
        `Reward ${String(raw)} is not a number within [${lo}, ${hi}]`,
        'malformed',
      ));
    }
    return parsed.data;
  }

  private async call(op: string, fn: (signal: AbortSignal) => Promise<unknown>): Promise<unknown> {
    try {
      return await withTimeout(fn, this.options.timeoutMs, `Oracle ${op} timed out after ${this.options.timeoutMs}ms`);
    } catch (err) {
      if (err instanceof OracleError) throw this.reject(op, err);
      if (err instanceof OperationTimeoutError) {
        throw this.reject(op, new OracleError(err.message, 'timeout', err));
      }
      const error = toError(err);
      throw this.reject(op, new OracleError(`Oracle ${op} failed: ${error.message}`, 'failed', error));
    }
  }

  private reject(op: string, error: OracleError): OracleError {
    this.log.warn({ op, reason: error.reason, error: error.message }, 'Oracle call failed');
    return error;
  }
}
