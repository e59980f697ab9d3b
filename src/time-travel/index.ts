/**
 * Time-Travel Module
 *
 * Checkpoints, composeable full/incremental snapshots and non-destructive
 * restore.
 *
 * @example
 * ```typescript
 * const cp = snapshots.createCheckpoint(branch.id, 'before-refactor');
 * branches.transition(branch.id, 'abandoned');
 * const { branch: revived } = await snapshots.restore({ checkpointId: cp.id });
 * ```
 */

export { SnapshotStore } from './snapshot-store.js';
export { applyMergePatch, createMergePatch } from './merge-patch.js';
export type {
  Checkpoint,
  SnapshotKind,
  StateSnapshot,
  CreateSnapshotInput,
  RestoreSource,
  RestoreOptions,
  RestoreResult,
  TimeTravelConfig,
} from './types.js';
