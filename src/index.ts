/**
 * thoughtline: branching, checkpoint/snapshot and MCTS time-travel engine
 * for revisable chains of thought.
 *
 * @example
 * ```typescript
 * import { TimeMachine } from 'thoughtline';
 *
 * const tm = TimeMachine.open();
 * const session = tm.sessions.createSession('tree');
 * const { timeline } = tm.engine.createTimeline({ sessionId: session.id, name: 'plan', rootContent: 'Ship the parser' });
 * const result = await tm.engine.explore(timeline.id, { iterations: 8 });
 * console.log(result.bestPath.contents);
 * ```
 */

// Facade
export { TimeMachine, type TimeMachineOptions } from './time-machine.js';

// Core
export { ConfigManager, type ConfigOverrides } from './core/config.js';
export { createLogger, getLogger, setLogger, componentLogger, type LoggerOptions } from './core/logger.js';
export { AsyncMutex, KeyedMutex, AsyncSemaphore } from './core/mutex.js';
export {
  ThoughtlineError,
  ConfigError,
  ValidationError,
  NotFoundError,
  InvalidTransitionError,
  CorruptChainError,
  OracleError,
  EvaluationFailedError,
  AnalysisIncompleteError,
  toError,
  type OracleFailureReason,
  type StepPhase,
} from './core/errors.js';
export {
  ThoughtlineConfigSchema,
  type ThoughtlineConfig,
  type MCTSSettings,
  type HousekeepingSettings,
  type BacktrackSettings,
} from './core/types.js';

// Storage
export { openDatabase, type Db } from './storage/database.js';
export { migrate, MIGRATIONS, type Migration } from './storage/migrations.js';
export { canonicalJson, type JsonObject, type JsonValue, type JsonPrimitive } from './storage/json.js';

// Modules
export * from './branching/index.js';
export * from './time-travel/index.js';
export * from './timeline/index.js';
export * from './mcts/index.js';
export * from './counterfactual/index.js';
export * from './oracle/index.js';

// Providers
export { OpenAIProvider, type ChatCompletionsClient } from './providers/openai.js';
export { BaseLLMProvider } from './providers/base.js';
export type { LLMProvider, LLMRequest, LLMResponse, LLMMessage, ProviderConfig } from './providers/types.js';

// Utils
export { withTimeout, sleep, OperationTimeoutError } from './utils/timeout.js';
