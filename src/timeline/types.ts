/**
 * Timeline Types
 *
 * A timeline is the container for one tree-mode exploration; each of its
 * branches carries a TimelineBranch overlay with depth and search stats.
 */

import type { JsonObject } from '../storage/json.js';

export type TimelineState = 'active' | 'archived' | 'merged';

export interface Timeline {
  id: string;
  sessionId: string;
  name: string;
  description: string | null;
  rootBranchId: string;
  activeBranchId: string;
  state: TimelineState;
  branchCount: number;
  maxDepth: number;
  createdAt: string;
  updatedAt: string;
  metadata: JsonObject;
}

export interface TimelineBranch {
  branchId: string;
  timelineId: string;
  depth: number;
  visitCount: number;
  totalValue: number;
  /** Null until the branch has been visited */
  ucbScore: number | null;
  counterfactualImpact: number | null;
  mctsGenerated: boolean;
  alternativesExplored: number;
  createdAt: string;
  updatedAt: string;
}

export interface CreateTimelineInput {
  sessionId: string;
  name: string;
  rootContent: string;
  description?: string;
  metadata?: JsonObject;
}

export interface BranchComparison {
  branchA: string;
  branchB: string;
  /** Number of leading branches both paths share */
  sharedPrefix: number;
  /** Branch where the two paths split, null when they share no root */
  divergesAt: string | null;
  meanValueA: number | null;
  meanValueB: number | null;
  visitsA: number;
  visitsB: number;
  /** Branch with the higher mean value; null when tied or unvisited */
  recommended: string | null;
}
