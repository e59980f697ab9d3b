/**
 * Row shapes as better-sqlite3 returns them, and their mapping onto the
 * domain records. SQLite has no boolean or JSON type: flags come back as
 * 0/1 and JSON columns as text.
 */

import { z } from 'zod';
import { parseJsonObject } from './json.js';
import type { Branch, BranchState, CrossRef, CrossRefKind, Session, Thought } from '../branching/types.js';
import type { Checkpoint, SnapshotKind, StateSnapshot } from '../time-travel/types.js';
import type { Timeline, TimelineBranch, TimelineState } from '../timeline/types.js';
import type { SearchNode } from '../mcts/types.js';
import type { CounterfactualAnalysis, InterventionType } from '../counterfactual/types.js';

export interface SessionRow {
  id: string;
  mode: string;
  created_at: string;
  updated_at: string;
  metadata: string | null;
}

export interface ThoughtRow {
  id: string;
  session_id: string;
  branch_id: string | null;
  content: string;
  confidence: number;
  position: number;
  created_at: string;
  metadata: string | null;
}

export interface BranchRow {
  id: string;
  session_id: string;
  name: string | null;
  parent_branch_id: string | null;
  priority: number;
  confidence: number;
  state: BranchState;
  timeline_id: string | null;
  payload: string | null;
  created_at: string;
  updated_at: string;
  metadata: string | null;
}

export interface CrossRefRow {
  id: string;
  from_branch_id: string;
  to_branch_id: string;
  ref_type: CrossRefKind;
  reason: string | null;
  strength: number;
  created_at: string;
}

export interface CheckpointRow {
  id: string;
  session_id: string;
  branch_id: string | null;
  name: string;
  description: string | null;
  payload: string;
  created_at: string;
}

export interface SnapshotRow {
  id: string;
  session_id: string;
  snapshot_type: SnapshotKind;
  state_data: string;
  parent_snapshot_id: string | null;
  branch_id: string | null;
  created_at: string;
  description: string | null;
}

export interface TimelineRow {
  id: string;
  session_id: string;
  name: string;
  description: string | null;
  root_branch_id: string;
  active_branch_id: string;
  state: TimelineState;
  branch_count: number;
  max_depth: number;
  created_at: string;
  updated_at: string;
  metadata: string | null;
}

export interface TimelineBranchRow {
  branch_id: string;
  timeline_id: string;
  depth: number;
  visit_count: number;
  total_value: number;
  ucb_score: number | null;
  counterfactual_impact: number | null;
  mcts_generated: number;
  alternatives_explored: number;
  created_at: string;
  updated_at: string;
}

export interface SearchNodeRow {
  id: string;
  session_id: string;
  timeline_id: string | null;
  branch_id: string;
  parent_node_id: string | null;
  content: string;
  visit_count: number;
  total_value: number;
  prior: number;
  ucb_score: number | null;
  is_expanded: number;
  is_terminal: number;
  simulation_depth: number;
  created_at: string;
  last_visited: string;
  metadata: string | null;
}

export interface CounterfactualRow {
  id: string;
  session_id: string;
  timeline_id: string | null;
  original_branch_id: string;
  question: string | null;
  intervention_type: InterventionType;
  intervention: string;
  target_thought_id: string | null;
  counterfactual_branch_id: string;
  outcome_delta: number;
  causal_attribution: number;
  confidence: number;
  comparison: string;
  created_at: string;
}

export function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    mode: row.mode,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    metadata: parseJsonObject(row.metadata, 'sessions.metadata'),
  };
}

export function toThought(row: ThoughtRow): Thought {
  return {
    id: row.id,
    sessionId: row.session_id,
    branchId: row.branch_id,
    content: row.content,
    confidence: row.confidence,
    position: row.position,
    createdAt: row.created_at,
    metadata: parseJsonObject(row.metadata, 'thoughts.metadata'),
  };
}

export function toBranch(row: BranchRow): Branch {
  return {
    id: row.id,
    sessionId: row.session_id,
    name: row.name,
    parentBranchId: row.parent_branch_id,
    priority: row.priority,
    confidence: row.confidence,
    state: row.state,
    timelineId: row.timeline_id,
    payload: row.payload === null ? null : parseJsonObject(row.payload, 'branches.payload'),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    metadata: parseJsonObject(row.metadata, 'branches.metadata'),
  };
}

export function toCrossRef(row: CrossRefRow): CrossRef {
  return {
    id: row.id,
    fromBranchId: row.from_branch_id,
    toBranchId: row.to_branch_id,
    kind: row.ref_type,
    reason: row.reason,
    strength: row.strength,
    createdAt: row.created_at,
  };
}

export function toCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    id: row.id,
    sessionId: row.session_id,
    branchId: row.branch_id,
    name: row.name,
    description: row.description,
    payload: parseJsonObject(row.payload, 'checkpoints.payload'),
    createdAt: row.created_at,
  };
}

export function toSnapshot(row: SnapshotRow): StateSnapshot {
  return {
    id: row.id,
    sessionId: row.session_id,
    kind: row.snapshot_type,
    data: parseJsonObject(row.state_data, 'state_snapshots.state_data'),
    parentSnapshotId: row.parent_snapshot_id,
    branchId: row.branch_id,
    description: row.description,
    createdAt: row.created_at,
  };
}

export function toTimeline(row: TimelineRow): Timeline {
  return {
    id: row.id,
    sessionId: row.session_id,
    name: row.name,
    description: row.description,
    rootBranchId: row.root_branch_id,
    activeBranchId: row.active_branch_id,
    state: row.state,
    branchCount: row.branch_count,
    maxDepth: row.max_depth,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    metadata: parseJsonObject(row.metadata, 'timelines.metadata'),
  };
}

export function toTimelineBranch(row: TimelineBranchRow): TimelineBranch {
  return {
    branchId: row.branch_id,
    timelineId: row.timeline_id,
    depth: row.depth,
    visitCount: row.visit_count,
    totalValue: row.total_value,
    ucbScore: row.ucb_score,
    counterfactualImpact: row.counterfactual_impact,
    mctsGenerated: row.mcts_generated === 1,
    alternativesExplored: row.alternatives_explored,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toSearchNode(row: SearchNodeRow): SearchNode {
  return {
    id: row.id,
    sessionId: row.session_id,
    timelineId: row.timeline_id,
    branchId: row.branch_id,
    parentNodeId: row.parent_node_id,
    content: row.content,
    visitCount: row.visit_count,
    totalValue: row.total_value,
    prior: row.prior,
    ucbScore: row.ucb_score,
    isExpanded: row.is_expanded === 1,
    isTerminal: row.is_terminal === 1,
    simulationDepth: row.simulation_depth,
    createdAt: row.created_at,
    lastVisited: row.last_visited,
    metadata: parseJsonObject(row.metadata, 'mcts_nodes.metadata'),
  };
}

const ComparisonSchema = z.object({
  interventionType: z.enum(['change', 'remove', 'replace', 'inject']),
  cutIndex: z.number().int(),
  originalThoughts: z.array(z.string()),
  counterfactualThoughts: z.array(z.string()),
  originalScores: z.array(z.number()),
  counterfactualScores: z.array(z.number()),
  originalMean: z.number(),
  counterfactualMean: z.number(),
  pooledStdDev: z.number(),
  regeneratedContinuation: z.string(),
});

export function toCounterfactual(row: CounterfactualRow): CounterfactualAnalysis {
  return {
    id: row.id,
    sessionId: row.session_id,
    timelineId: row.timeline_id,
    originalBranchId: row.original_branch_id,
    question: row.question,
    targetThoughtId: row.target_thought_id,
    intervention: { type: row.intervention_type, payload: row.intervention },
    counterfactualBranchId: row.counterfactual_branch_id,
    outcomeDelta: row.outcome_delta,
    causalAttribution: row.causal_attribution,
    confidence: row.confidence,
    comparison: ComparisonSchema.parse(JSON.parse(row.comparison)),
    createdAt: row.created_at,
  };
}
