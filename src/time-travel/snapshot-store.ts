/**
 * SnapshotStore: checkpoints, composeable state snapshots and restore.
 *
 * Checkpoints and snapshots are written once and never updated (the schema
 * enforces it with triggers). An incremental snapshot stores a merge patch
 * against its parent; resolving walks up to the nearest full snapshot and
 * applies the patches root-to-leaf.
 *
 * Restore is non-destructive: it materializes a new active root branch
 * from the resolved payload and leaves the source records untouched.
 */

import { EventEmitter } from 'node:events';
import type { Db } from '../storage/database.js';
import { nowIso } from '../storage/database.js';
import { canonicalJson, cloneJson, isJsonObject, type JsonObject, type JsonValue } from '../storage/json.js';
import { toCheckpoint, toSnapshot, type CheckpointRow, type SnapshotRow } from '../storage/rows.js';
import { CorruptChainError, NotFoundError, ValidationError } from '../core/errors.js';
import { componentLogger } from '../core/logger.js';
import { newId } from '../utils/ids.js';
import type { BranchStore } from '../branching/branch-store.js';
import type { SessionStore } from '../branching/session-store.js';
import type { Branch } from '../branching/types.js';
import type { TimelineStore } from '../timeline/timeline-store.js';
import { applyMergePatch } from './merge-patch.js';
import type {
  Checkpoint,
  CreateSnapshotInput,
  RestoreOptions,
  RestoreResult,
  RestoreSource,
  SnapshotKind,
  StateSnapshot,
  TimeTravelConfig,
} from './types.js';

const SNAPSHOT_KINDS: readonly SnapshotKind[] = ['full', 'incremental', 'branch'];

interface ResolvedSource {
  sessionId: string;
  payload: JsonObject;
  sourceBranchId: string | null;
  checkpoint: Checkpoint | null;
  restoredFrom: JsonObject;
}

export class SnapshotStore extends EventEmitter {
  private readonly log = componentLogger('time-travel');
  private readonly config: TimeTravelConfig;

  constructor(
    private readonly db: Db,
    private readonly sessions: SessionStore,
    private readonly branches: BranchStore,
    private readonly timelines: TimelineStore,
    config: Partial<TimeTravelConfig> = {},
  ) {
    super();
    this.config = { maxSnapshotChain: 1_000, ...config };
  }

  // ---------------------------------------------------------------------------
  // Checkpoints
  // ---------------------------------------------------------------------------

  /**
   * Record a named restore point on an existing branch. Without a payload
   * the branch's thought prefix is captured.
   */
  createCheckpoint(branchId: string, name: string, payload?: JsonObject, description?: string): Checkpoint {
    if (name.trim() === '') {
      throw new ValidationError('Checkpoint name must not be empty', 'name');
    }
    const branch = this.branches.requireBranch(branchId);
    const data = payload ?? this.capture(branch);

    const id = newId('cp');
    this.db
      .prepare<[string, string, string, string, string | null, string, string]>(
        `INSERT INTO checkpoints (id, session_id, branch_id, name, description, payload, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, branch.sessionId, branch.id, name, description ?? null, canonicalJson(data), nowIso());

    const checkpoint = this.requireCheckpoint(id);
    this.log.info({ checkpointId: id, branchId }, 'Checkpoint created');
    this.emit('checkpoint:created', checkpoint);
    return checkpoint;
  }

  getCheckpoint(id: string): Checkpoint | null {
    const row = this.db.prepare<[string], CheckpointRow>('SELECT * FROM checkpoints WHERE id = ?').get(id);
    return row ? toCheckpoint(row) : null;
  }

  requireCheckpoint(id: string): Checkpoint {
    const checkpoint = this.getCheckpoint(id);
    if (!checkpoint) throw new NotFoundError('Checkpoint', id);
    return checkpoint;
  }

  listCheckpoints(sessionId: string): Checkpoint[] {
    return this.db
      .prepare<[string], CheckpointRow>('SELECT * FROM checkpoints WHERE session_id = ? ORDER BY created_at, rowid')
      .all(sessionId)
      .map(toCheckpoint);
  }

  private capture(branch: Branch): JsonObject {
    return {
      branchId: branch.id,
      thoughts: this.branches.thoughtPrefix(branch.id).map((t) => t.content),
    };
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  createSnapshot(input: CreateSnapshotInput): StateSnapshot {
    const snapshot = this.insertSnapshot(input);
    this.log.debug({ snapshotId: snapshot.id, kind: snapshot.kind, parent: snapshot.parentSnapshotId }, 'Snapshot created');
    this.emit('snapshot:created', snapshot);
    return snapshot;
  }

  private insertSnapshot(input: CreateSnapshotInput): StateSnapshot {
    if (!SNAPSHOT_KINDS.includes(input.kind)) {
      throw new ValidationError(`Unknown snapshot kind: ${input.kind}`, 'kind');
    }
    this.sessions.requireSession(input.sessionId);

    const parentId = input.parentSnapshotId ?? null;
    if (input.kind === 'incremental' && parentId === null) {
      throw new ValidationError('Incremental snapshots need a parent snapshot', 'parentSnapshotId');
    }
    if (parentId !== null) {
      const parent = this.requireSnapshot(parentId);
      if (parent.sessionId !== input.sessionId) {
        throw new ValidationError(`Parent snapshot ${parentId} belongs to another session`, 'parentSnapshotId');
      }
      if (input.kind === 'incremental' && parent.kind === 'branch') {
        throw new ValidationError('Incremental snapshots must build on a full or incremental parent', 'parentSnapshotId');
      }
    }

    const branchId = input.branchId ?? null;
    if (branchId !== null) {
      const branch = this.branches.requireBranch(branchId);
      if (branch.sessionId !== input.sessionId) {
        throw new ValidationError(`Branch ${branchId} belongs to another session`, 'branchId');
      }
    }

    const id = newId('snap');
    this.db
      .prepare<[string, string, SnapshotKind, string, string | null, string | null, string, string | null]>(
        `INSERT INTO state_snapshots
           (id, session_id, snapshot_type, state_data, parent_snapshot_id, branch_id, created_at, description)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, input.sessionId, input.kind, canonicalJson(input.data), parentId, branchId, nowIso(), input.description ?? null);

    return this.requireSnapshot(id);
  }

  getSnapshot(id: string): StateSnapshot | null {
    const row = this.db.prepare<[string], SnapshotRow>('SELECT * FROM state_snapshots WHERE id = ?').get(id);
    return row ? toSnapshot(row) : null;
  }

  requireSnapshot(id: string): StateSnapshot {
    const snapshot = this.getSnapshot(id);
    if (!snapshot) throw new NotFoundError('StateSnapshot', id);
    return snapshot;
  }

  listSnapshots(sessionId: string): StateSnapshot[] {
    return this.db
      .prepare<[string], SnapshotRow>('SELECT * FROM state_snapshots WHERE session_id = ? ORDER BY created_at, rowid')
      .all(sessionId)
      .map(toSnapshot);
  }

  /**
   * Fully materialized payload of a snapshot.
   */
  resolve(snapshotId: string): JsonObject {
    const leaf = this.requireSnapshot(snapshotId);
    const patches: JsonObject[] = [];
    const seen = new Set<string>([leaf.id]);
    let current = leaf;

    while (current.kind === 'incremental') {
      if (patches.length >= this.config.maxSnapshotChain) {
        throw new CorruptChainError(
          `Snapshot ${snapshotId} does not reach a full snapshot within ${this.config.maxSnapshotChain} hops`,
          snapshotId,
          patches.length,
        );
      }
      patches.push(current.data);
      const parentId = current.parentSnapshotId;
      if (parentId === null) {
        throw new CorruptChainError(`Incremental snapshot ${current.id} has no parent`, snapshotId, patches.length);
      }
      if (seen.has(parentId)) {
        throw new CorruptChainError(`Snapshot chain of ${snapshotId} loops at ${parentId}`, snapshotId, patches.length);
      }
      const parent = this.getSnapshot(parentId);
      if (!parent) {
        throw new CorruptChainError(`Snapshot ${parentId} is missing from the chain`, snapshotId, patches.length);
      }
      seen.add(parentId);
      current = parent;
    }

    if (patches.length > 0 && current.kind !== 'full') {
      throw new CorruptChainError(
        `Snapshot chain of ${snapshotId} ends at ${current.kind} snapshot ${current.id}`,
        snapshotId,
        patches.length,
      );
    }

    let state: JsonValue = cloneJson(current.data);
    for (const patch of patches.reverse()) {
      state = applyMergePatch(state, patch);
    }
    if (!isJsonObject(state)) {
      throw new CorruptChainError(`Snapshot ${snapshotId} does not resolve to an object`, snapshotId, patches.length);
    }
    return state;
  }

  /** Resolved payload as canonical JSON text. */
  resolveSerialized(snapshotId: string): string {
    return canonicalJson(this.resolve(snapshotId));
  }

  // ---------------------------------------------------------------------------
  // Restore
  // ---------------------------------------------------------------------------

  /**
   * Materialize a checkpoint or snapshot as a new active branch. When the
   * source branch belongs to an active timeline, the new branch joins it
   * and becomes its active branch.
   */
  async restore(source: RestoreSource, options: RestoreOptions = {}): Promise<RestoreResult> {
    const resolved = this.resolveSource(source);
    const thoughts = thoughtContents(resolved.payload);
    const sourceBranch = resolved.sourceBranchId ? this.branches.getBranch(resolved.sourceBranchId) : null;
    const timelineId = sourceBranch?.timelineId ?? null;

    // The timeline may be archived while waiting for the session writer, so
    // its state is read again inside the transaction.
    const materialize = (): { branch: Branch; snapshotId: string | null; joined: string | null } =>
      this.db.transaction(() => {
        const timeline = timelineId ? this.timelines.getTimeline(timelineId) : null;
        const joined = timeline?.state === 'active' ? timeline.id : null;
        const branch = this.branches.insertBranch({
          sessionId: resolved.sessionId,
          parentBranchId: null,
          name: options.name ?? (resolved.checkpoint ? `restore:${resolved.checkpoint.name}` : 'restore'),
          confidence: sourceBranch?.confidence,
          priority: sourceBranch?.priority,
          payload: resolved.payload,
          metadata: { restoredFrom: resolved.restoredFrom },
        });
        for (const content of thoughts) {
          this.sessions.insertThought(newId('th'), resolved.sessionId, branch.id, content, 0.8, {});
        }

        let snapshotId: string | null = null;
        if (resolved.checkpoint) {
          snapshotId = this.insertSnapshot({
            sessionId: resolved.sessionId,
            kind: 'branch',
            data: resolved.payload,
            branchId: branch.id,
            description: `Restore from checkpoint: ${resolved.checkpoint.name}`,
          }).id;
        }

        if (joined) {
          this.timelines.attachBranch(joined, branch.id, { depth: 0 });
          this.timelines.writeActiveBranch(joined, branch.id);
        }
        return { branch: this.branches.requireBranch(branch.id), snapshotId, joined };
      })();

    const { branch, snapshotId, joined } = timelineId
      ? await this.timelines.withSessionWriter(resolved.sessionId, materialize)
      : materialize();

    const result: RestoreResult = {
      branch,
      payload: resolved.payload,
      thoughts: this.sessions.listBranchThoughts(branch.id),
      snapshotId,
    };
    this.log.info({ branchId: branch.id, source, timelineId: joined }, 'Restored');
    this.emit('snapshot:restored', { source, branchId: branch.id });
    return result;
  }

  private resolveSource(source: RestoreSource): ResolvedSource {
    if ('checkpointId' in source) {
      const checkpoint = this.requireCheckpoint(source.checkpointId);
      return {
        sessionId: checkpoint.sessionId,
        payload: cloneJson(checkpoint.payload),
        sourceBranchId: checkpoint.branchId,
        checkpoint,
        restoredFrom: { kind: 'checkpoint', id: checkpoint.id, branchId: checkpoint.branchId },
      };
    }
    const snapshot = this.requireSnapshot(source.snapshotId);
    return {
      sessionId: snapshot.sessionId,
      payload: this.resolve(snapshot.id),
      sourceBranchId: snapshot.branchId,
      checkpoint: null,
      restoredFrom: { kind: 'snapshot', id: snapshot.id, branchId: snapshot.branchId },
    };
  }
}

/**
 * Thought texts carried by a payload: a `thoughts` array of strings or of
 * objects with a string `content`.
 */
function thoughtContents(payload: JsonObject): string[] {
  const thoughts = payload.thoughts;
  if (!Array.isArray(thoughts)) return [];
  const contents: string[] = [];
  for (const entry of thoughts) {
    if (typeof entry === 'string') {
      contents.push(entry);
    } else if (isJsonObject(entry) && typeof entry.content === 'string') {
      contents.push(entry.content);
    }
  }
  return contents.filter((c) => c.trim() !== '');
}
