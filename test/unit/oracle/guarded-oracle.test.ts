import { describe, it, expect } from 'vitest';
import { GuardedOracle } from '../../../src/oracle/guarded-oracle.js';
import { OracleError } from '../../../src/core/errors.js';
import { ScriptedOracle, hangUntilAborted } from '../../helpers/scripted-oracle.js';

function guarded(backend: ScriptedOracle, timeoutMs = 1_000): GuardedOracle {
  return new GuardedOracle(backend, { timeoutMs, defaultPrior: 0.5, rewardRange: [0, 1] });
}

async function failure(promise: Promise<unknown>): Promise<OracleError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof OracleError) return err;
    throw err;
  }
  throw new Error('expected an OracleError');
}

describe('GuardedOracle', () => {
  it('should fill in missing priors and cap the count', async () => {
    const backend = new ScriptedOracle();
    backend.continuations = () => [{ content: ' a ' }, { content: 'b', prior: 0.2 }, { content: 'c' }];

    const result = await guarded(backend).generateContinuations(['x'], 2);

    expect(result).toEqual([
      { content: 'a', prior: 0.5 },
      { content: 'b', prior: 0.2 },
    ]);
  });

  it('should reject malformed continuations', async () => {
    const backend = new ScriptedOracle();
    backend.continuations = () => [{ content: 'a', prior: 3 }];

    const err = await failure(guarded(backend).generateContinuations(['x'], 1));
    expect(err.reason).toBe('malformed');
  });

  it('should pass rewards within range', async () => {
    const backend = new ScriptedOracle();
    backend.rewards = [0.25];
    await expect(guarded(backend).evaluate(['x'])).resolves.toBe(0.25);
  });

  it('should reject rewards outside the range or not numeric', async () => {
    const backend = new ScriptedOracle();
    backend.rewards = [1.5];
    const outOfRange = await failure(guarded(backend).evaluate(['x']));
    expect(outOfRange.reason).toBe('malformed');
    expect(outOfRange.message).toBe('Reward 1.5 is not a number within [0, 1]');

    backend.reward = () => Number.NaN;
    expect((await failure(guarded(backend).evaluate(['x']))).reason).toBe('malformed');
  });

  it('should tag backend errors as failed', async () => {
    const backend = new ScriptedOracle();
    backend.reward = () => {
      throw new Error('connection reset');
    };

    const err = await failure(guarded(backend).evaluate(['x']));
    expect(err.reason).toBe('failed');
    expect(err.message).toBe('Oracle evaluate failed: connection reset');
  });

  it('should abort and tag slow calls as timeouts', async () => {
    const backend = new ScriptedOracle();
    const signals: AbortSignal[] = [];
    backend.reward = (_prefix, signal) => {
      signals.push(signal);
      return hangUntilAborted(signal);
    };

    const err = await failure(guarded(backend, 10).evaluate(['x']));
    expect(err.reason).toBe('timeout');
    expect(signals[0].aborted).toBe(true);
  });
});
