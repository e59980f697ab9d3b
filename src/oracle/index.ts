export { GuardedOracle } from './guarded-oracle.js';
export { LLMOracle, type LLMOracleOptions } from './llm-oracle.js';
export { extractJson } from './json-extract.js';
export type { ThoughtOracle, Continuation, GuardedOracleOptions } from './types.js';
