/**
 * Time-Travel Types
 *
 * Checkpoints are named restore targets anchored to a branch. State
 * snapshots form a DAG of full payloads and incremental merge patches.
 * Restoring either one never rewrites history: it produces a new branch.
 */

import type { JsonObject } from '../storage/json.js';
import type { Branch, Thought } from '../branching/types.js';

export interface Checkpoint {
  id: string;
  sessionId: string;
  branchId: string | null;
  name: string;
  description: string | null;
  payload: JsonObject;
  createdAt: string;
}

export type SnapshotKind = 'full' | 'incremental' | 'branch';

export interface StateSnapshot {
  id: string;
  sessionId: string;
  kind: SnapshotKind;
  /** Full payload, or a merge patch against the parent for incremental snapshots */
  data: JsonObject;
  parentSnapshotId: string | null;
  branchId: string | null;
  description: string | null;
  createdAt: string;
}

export interface CreateSnapshotInput {
  sessionId: string;
  kind: SnapshotKind;
  data: JsonObject;
  parentSnapshotId?: string | null;
  branchId?: string | null;
  description?: string;
}

export type RestoreSource = { checkpointId: string } | { snapshotId: string };

export interface RestoreOptions {
  name?: string;
}

export interface RestoreResult {
  branch: Branch;
  payload: JsonObject;
  /** Thoughts re-materialized from the payload's `thoughts` array */
  thoughts: Thought[];
  /** Branch snapshot recorded when restoring from a checkpoint */
  snapshotId: string | null;
}

export interface TimeTravelConfig {
  /** Upper bound on parent hops when resolving an incremental chain */
  maxSnapshotChain: number;
}
