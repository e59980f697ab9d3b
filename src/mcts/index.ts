/**
 * MCTS Module
 *
 * UCB1 search over timeline branches with virtual loss for concurrent
 * steps and advisory completion/pruning.
 */

export { MCTSEngine, type MCTSEngineDeps, type MCTSEngineOptions, type AutoBacktrackOptions } from './engine.js';
export { SearchTree, type InsertNodeInput } from './search-tree.js';
export { VirtualLossLedger, VirtualLossGuard } from './virtual-loss.js';
export { ucb1, meanValue, selectChild } from './ucb.js';
export { runHousekeeping, type HousekeepingContext } from './housekeeping.js';
export type {
  SearchNode,
  NodeStats,
  StepOutcome,
  StepSuccess,
  StepFailure,
  IterationStats,
  BestPath,
  ExploreOptions,
  ExploreResult,
  AlternativePath,
  AutoBacktrackResult,
  HousekeepingReport,
} from './types.js';
