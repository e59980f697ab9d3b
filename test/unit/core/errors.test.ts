import { describe, it, expect } from 'vitest';
import {
  AnalysisIncompleteError,
  EvaluationFailedError,
  InvalidTransitionError,
  NotFoundError,
  OracleError,
  ThoughtlineError,
  ValidationError,
  toError,
} from '../../../src/core/errors.js';

describe('error hierarchy', () => {
  it('should carry codes and stages', () => {
    const err = new NotFoundError('Branch', 'br_1');
    expect(err).toBeInstanceOf(ThoughtlineError);
    expect(err.message).toBe('Branch not found: br_1');
    expect(err.code).toBe('NOT_FOUND');
    expect(err.name).toBe('NotFoundError');
  });

  it('should describe invalid transitions', () => {
    const err = new InvalidTransitionError('br_1', 'abandoned', 'active');
    expect(err.message).toBe('Branch br_1 cannot move from abandoned to active');
    expect(err.code).toBe('INVALID_TRANSITION');
  });

  it('should chain oracle failures through step and analysis errors', () => {
    const oracle = new OracleError('bad json', 'malformed');
    const step = new EvaluationFailedError('Simulation failed', 'simulation', oracle);
    const analysis = new AnalysisIncompleteError('incomplete', 'br_1', oracle);

    expect(step.stage).toBe('simulation');
    expect(step.cause).toBe(oracle);
    expect(analysis.cause).toBe(oracle);
    expect(oracle.reason).toBe('malformed');
  });

  it('should keep the offending field on validation errors', () => {
    expect(new ValidationError('bad', 'priority').field).toBe('priority');
  });

  it('should normalize thrown values', () => {
    const original = new Error('x');
    expect(toError(original)).toBe(original);
    expect(toError('plain').message).toBe('plain');
  });
});
