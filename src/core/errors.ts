export class ThoughtlineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ThoughtlineError';
  }
}

export class ConfigError extends ThoughtlineError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends ThoughtlineError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR', 'validate');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ThoughtlineError {
  constructor(public readonly entity: string, public readonly id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', 'lookup');
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends ThoughtlineError {
  constructor(
    public readonly branchId: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Branch ${branchId} cannot move from ${from} to ${to}`, 'INVALID_TRANSITION', 'transition');
    this.name = 'InvalidTransitionError';
  }
}

export class CorruptChainError extends ThoughtlineError {
  constructor(message: string, public readonly snapshotId: string, public readonly hops: number) {
    super(message, 'CORRUPT_CHAIN', 'resolve');
    this.name = 'CorruptChainError';
  }
}

export type OracleFailureReason = 'timeout' | 'malformed' | 'failed';

export class OracleError extends ThoughtlineError {
  constructor(message: string, public readonly reason: OracleFailureReason, cause?: Error) {
    super(message, 'ORACLE_ERROR', 'oracle', cause);
    this.name = 'OracleError';
  }
}

export type StepPhase = 'expansion' | 'simulation';

export class EvaluationFailedError extends ThoughtlineError {
  constructor(message: string, public readonly phase: StepPhase, cause?: Error) {
    super(message, 'EVALUATION_FAILED', phase, cause);
    this.name = 'EvaluationFailedError';
  }
}

export class AnalysisIncompleteError extends ThoughtlineError {
  constructor(message: string, public readonly branchId: string, cause?: Error) {
    super(message, 'ANALYSIS_INCOMPLETE', 'counterfactual', cause);
    this.name = 'AnalysisIncompleteError';
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
