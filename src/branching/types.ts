/**
 * Branching Types
 *
 * Sessions own everything; branches form a forest inside a session and
 * carry thoughts; cross-references relate two branches.
 */

import type { JsonObject } from '../storage/json.js';

// ---------------------------------------------------------------------------
// Sessions & thoughts
// ---------------------------------------------------------------------------

export interface Session {
  id: string;
  mode: string;
  createdAt: string;
  updatedAt: string;
  metadata: JsonObject;
}

export interface Thought {
  id: string;
  sessionId: string;
  /** Null once the owning branch has been deleted */
  branchId: string | null;
  content: string;
  confidence: number;
  /** Order inside the owning branch, starting at 0 */
  position: number;
  createdAt: string;
  metadata: JsonObject;
}

// ---------------------------------------------------------------------------
// Branches
// ---------------------------------------------------------------------------

export type BranchState = 'active' | 'completed' | 'abandoned';

export interface Branch {
  id: string;
  sessionId: string;
  name: string | null;
  parentBranchId: string | null;
  priority: number;
  confidence: number;
  state: BranchState;
  timelineId: string | null;
  /** Materialized state for branches produced by a restore */
  payload: JsonObject | null;
  createdAt: string;
  updatedAt: string;
  metadata: JsonObject;
}

export interface CreateBranchInput {
  sessionId: string;
  parentBranchId?: string | null;
  /** Caller-chosen identifier; generated when omitted */
  id?: string;
  name?: string;
  priority?: number;
  confidence?: number;
  timelineId?: string | null;
  payload?: JsonObject | null;
  metadata?: JsonObject;
}

// ---------------------------------------------------------------------------
// Cross-references
// ---------------------------------------------------------------------------

export type CrossRefKind = 'supports' | 'contradicts' | 'extends' | 'alternative' | 'depends';

export const CROSS_REF_KINDS: readonly CrossRefKind[] = [
  'supports',
  'contradicts',
  'extends',
  'alternative',
  'depends',
];

export interface CrossRef {
  id: string;
  fromBranchId: string;
  toBranchId: string;
  kind: CrossRefKind;
  reason: string | null;
  strength: number;
  createdAt: string;
}
