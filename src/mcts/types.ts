/**
 * MCTS Types
 *
 * Search nodes mirror branches one-to-one; a node's parent chain follows
 * the same route as its branch's parent chain up to the search root.
 */

import type { JsonObject } from '../storage/json.js';
import type { EvaluationFailedError } from '../core/errors.js';

export interface SearchNode {
  id: string;
  sessionId: string;
  timelineId: string | null;
  branchId: string;
  parentNodeId: string | null;
  content: string;
  visitCount: number;
  totalValue: number;
  prior: number;
  /** Null until the node has been visited */
  ucbScore: number | null;
  isExpanded: boolean;
  isTerminal: boolean;
  simulationDepth: number;
  createdAt: string;
  lastVisited: string;
  metadata: JsonObject;
}

export interface NodeStats {
  visitCount: number;
  totalValue: number;
}

export interface StepSuccess {
  ok: true;
  /** Node where selection stopped */
  selectedNodeId: string;
  /** Node whose reward was backpropagated */
  simulatedNodeId: string;
  /** Children attached by this step's expansion */
  expandedNodeIds: string[];
  reward: number;
  /** Number of nodes updated on the way back to the root */
  backpropNodes: number;
}

export interface StepFailure {
  ok: false;
  selectedNodeId: string;
  error: EvaluationFailedError;
}

export type StepOutcome = StepSuccess | StepFailure;

export interface IterationStats {
  iteration: number;
  ok: boolean;
  selectedNodeId: string;
  simulatedNodeId: string | null;
  reward: number | null;
  backpropNodes: number;
  error?: string;
}

export interface BestPath {
  nodeIds: string[];
  branchIds: string[];
  contents: string[];
  /** Mean reward of the deepest node on the path */
  value: number;
}

export interface ExploreOptions {
  iterations?: number;
  concurrency?: number;
}

export interface ExploreResult {
  timelineId: string;
  rootNodeId: string;
  iterations: IterationStats[];
  succeeded: number;
  failed: number;
  nodesExplored: number;
  bestPath: BestPath;
}

export interface AlternativePath {
  fromNodeId: string;
  nodeId: string;
  direction: string;
  expectedImprovement: number;
}

export interface AutoBacktrackResult {
  backtracked: boolean;
  reason: string;
  currentNodeId: string | null;
  backtrackTo: string | null;
  alternatives: AlternativePath[];
  currentConfidence: number;
  currentReward: number;
}

export interface HousekeepingReport {
  completed: string[];
  abandoned: string[];
  /** New active branch when the old one was completed */
  promotedTo: string | null;
}
