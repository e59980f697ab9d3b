/**
 * BranchStore: the branch forest of a session.
 *
 * Branches only ever point at an existing parent in the same session, so
 * parent pointers form a forest. Every ancestry walk is bounded by
 * `maxAncestryHops`; exceeding it means the stored data is corrupt.
 *
 * State machine: active → completed → abandoned, active → abandoned.
 * Nothing returns to active.
 */

import { EventEmitter } from 'node:events';
import type { Db } from '../storage/database.js';
import { nowIso } from '../storage/database.js';
import { canonicalJson } from '../storage/json.js';
import { toBranch, toCrossRef, type BranchRow, type CrossRefRow } from '../storage/rows.js';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../core/errors.js';
import { componentLogger } from '../core/logger.js';
import { newId } from '../utils/ids.js';
import type { SessionStore } from './session-store.js';
import {
  CROSS_REF_KINDS,
  type Branch,
  type BranchState,
  type CreateBranchInput,
  type CrossRef,
  type CrossRefKind,
  type Thought,
} from './types.js';

export interface BranchStoreOptions {
  maxAncestryHops?: number;
}

export interface CrossRefOptions {
  strength?: number;
  reason?: string;
}

const ALLOWED_TRANSITIONS: Record<BranchState, readonly BranchState[]> = {
  active: ['completed', 'abandoned'],
  completed: ['abandoned'],
  abandoned: [],
};

export class BranchStore extends EventEmitter {
  private readonly log = componentLogger('branches');
  private readonly maxHops: number;

  constructor(
    private readonly db: Db,
    private readonly sessions: SessionStore,
    options: BranchStoreOptions = {},
  ) {
    super();
    this.maxHops = options.maxAncestryHops ?? 10_000;
  }

  // ---------------------------------------------------------------------------
  // Creation
  // ---------------------------------------------------------------------------

  createBranch(input: CreateBranchInput): Branch {
    const branch = this.insertBranch(input);
    this.log.debug({ branchId: branch.id, parentBranchId: branch.parentBranchId }, 'Branch created');
    this.emit('branch:created', branch);
    return branch;
  }

  /**
   * Validate and insert without emitting. Callers that batch several writes
   * in one transaction use this and announce the result after commit.
   */
  insertBranch(input: CreateBranchInput): Branch {
    const priority = input.priority ?? 1;
    const confidence = input.confidence ?? 0.8;
    if (!Number.isFinite(priority) || priority < 0) {
      throw new ValidationError(`Branch priority must be a non-negative number, got ${priority}`, 'priority');
    }
    if (!(confidence >= 0 && confidence <= 1)) {
      throw new ValidationError(`Branch confidence must be within [0, 1], got ${confidence}`, 'confidence');
    }

    this.sessions.requireSession(input.sessionId);
    const id = input.id ?? newId('br');
    const parentId = input.parentBranchId ?? null;

    if (parentId !== null) {
      const parent = this.getBranch(parentId);
      if (!parent) {
        this.log.debug({ parentId }, 'Rejected branch: parent missing');
        throw new ValidationError(`Parent branch does not exist: ${parentId}`, 'parentBranchId');
      }
      if (parent.sessionId !== input.sessionId) {
        this.log.debug({ parentId, sessionId: input.sessionId }, 'Rejected branch: cross-session parent');
        throw new ValidationError(
          `Parent branch ${parentId} belongs to session ${parent.sessionId}, not ${input.sessionId}`,
          'parentBranchId',
        );
      }
      if (this.ancestorIds(parentId).includes(id)) {
        this.log.debug({ branchId: id, parentId }, 'Rejected branch: cycle');
        throw new ValidationError(`Branch ${id} would become its own ancestor (cycle via ${parentId})`, 'parentBranchId');
      }
    }

    if (input.id !== undefined && this.getBranch(input.id)) {
      throw new ValidationError(`Branch already exists: ${input.id}`, 'id');
    }

    const timelineId = input.timelineId ?? null;
    if (timelineId !== null) {
      const timeline = this.db
        .prepare<[string], { session_id: string }>('SELECT session_id FROM timelines WHERE id = ?')
        .get(timelineId);
      if (!timeline || timeline.session_id !== input.sessionId) {
        throw new ValidationError(`Timeline ${timelineId} is not part of session ${input.sessionId}`, 'timelineId');
      }
    }

    const now = nowIso();
    this.db
      .prepare<[string, string, string | null, string | null, number, number, string | null, string | null, string, string, string]>(
        `INSERT INTO branches
           (id, session_id, name, parent_branch_id, priority, confidence, state, timeline_id, payload, created_at, updated_at, metadata)
         VALUES (?, ?, ?, ?, ?, ?, 'active', ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        input.sessionId,
        input.name ?? null,
        parentId,
        priority,
        confidence,
        timelineId,
        input.payload ? canonicalJson(input.payload) : null,
        now,
        now,
        canonicalJson(input.metadata ?? {}),
      );

    return this.requireBranch(id);
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  getBranch(id: string): Branch | null {
    const row = this.db.prepare<[string], BranchRow>('SELECT * FROM branches WHERE id = ?').get(id);
    return row ? toBranch(row) : null;
  }

  requireBranch(id: string): Branch {
    const branch = this.getBranch(id);
    if (!branch) throw new NotFoundError('Branch', id);
    return branch;
  }

  listSessionBranches(sessionId: string, state?: BranchState): Branch[] {
    const rows = state
      ? this.db
          .prepare<[string, BranchState], BranchRow>(
            'SELECT * FROM branches WHERE session_id = ? AND state = ? ORDER BY created_at, rowid',
          )
          .all(sessionId, state)
      : this.db
          .prepare<[string], BranchRow>('SELECT * FROM branches WHERE session_id = ? ORDER BY created_at, rowid')
          .all(sessionId);
    return rows.map(toBranch);
  }

  children(branchId: string): Branch[] {
    return this.db
      .prepare<[string], BranchRow>('SELECT * FROM branches WHERE parent_branch_id = ? ORDER BY created_at, rowid')
      .all(branchId)
      .map(toBranch);
  }

  /**
   * Branches from the root down to `branchId`, inclusive.
   */
  branchPath(branchId: string): Branch[] {
    this.requireBranch(branchId);
    const ids = [branchId, ...this.ancestorIds(branchId)];
    return ids.reverse().map((id) => this.requireBranch(id));
  }

  /**
   * Thoughts of every branch on the path, root first, in position order.
   */
  thoughtPrefix(branchId: string): Thought[] {
    return this.branchPath(branchId).flatMap((branch) => this.sessions.listBranchThoughts(branch.id));
  }

  /**
   * Parent chain of a branch, nearest first. Throws when the chain revisits a
   * branch or does not end within the hop limit.
   */
  private ancestorIds(branchId: string): string[] {
    const parentOf = this.db.prepare<[string], { parent_branch_id: string | null }>(
      'SELECT parent_branch_id FROM branches WHERE id = ?',
    );
    const seen = new Set<string>([branchId]);
    const ancestors: string[] = [];
    let current = parentOf.get(branchId)?.parent_branch_id ?? null;

    while (current !== null) {
      if (seen.has(current)) {
        throw new ValidationError(`Branch ancestry of ${branchId} loops at ${current}`, 'parentBranchId');
      }
      if (ancestors.length >= this.maxHops) {
        throw new ValidationError(
          `Branch ancestry of ${branchId} exceeds ${this.maxHops} hops`,
          'parentBranchId',
        );
      }
      seen.add(current);
      ancestors.push(current);
      current = parentOf.get(current)?.parent_branch_id ?? null;
    }
    return ancestors;
  }

  // ---------------------------------------------------------------------------
  // State machine
  // ---------------------------------------------------------------------------

  transition(branchId: string, to: BranchState): Branch {
    const branch = this.requireBranch(branchId);
    if (branch.state === to) return branch;

    if (!ALLOWED_TRANSITIONS[branch.state].includes(to)) {
      this.log.debug({ branchId, from: branch.state, to }, 'Rejected transition');
      throw new InvalidTransitionError(branchId, branch.state, to);
    }

    // Compare-and-set on the state we validated against
    const info = this.db
      .prepare<[BranchState, string, string, BranchState]>(
        'UPDATE branches SET state = ?, updated_at = ? WHERE id = ? AND state = ?',
      )
      .run(to, nowIso(), branchId, branch.state);
    if (info.changes === 0) {
      const current = this.requireBranch(branchId);
      throw new InvalidTransitionError(branchId, current.state, to);
    }

    const updated = this.requireBranch(branchId);
    this.log.debug({ branchId, from: branch.state, to }, 'Branch transitioned');
    this.emit('branch:transitioned', { branchId, from: branch.state, to });
    return updated;
  }

  /** @internal Attach a branch to a timeline. */
  assignTimeline(branchId: string, timelineId: string): void {
    this.db
      .prepare<[string, string, string]>('UPDATE branches SET timeline_id = ?, updated_at = ? WHERE id = ?')
      .run(timelineId, nowIso(), branchId);
  }

  // ---------------------------------------------------------------------------
  // Cross-references
  // ---------------------------------------------------------------------------

  addCrossRef(fromBranchId: string, toBranchId: string, kind: CrossRefKind, options: CrossRefOptions = {}): CrossRef {
    const ref = this.insertCrossRef(fromBranchId, toBranchId, kind, options);
    this.log.debug({ crossRefId: ref.id, fromBranchId, toBranchId, kind }, 'Cross-reference created');
    this.emit('crossref:created', ref);
    return ref;
  }

  insertCrossRef(fromBranchId: string, toBranchId: string, kind: CrossRefKind, options: CrossRefOptions = {}): CrossRef {
    if (!CROSS_REF_KINDS.includes(kind)) {
      throw new ValidationError(`Unknown cross-reference kind: ${kind}`, 'kind');
    }
    const strength = options.strength ?? 1;
    if (Number.isNaN(strength)) {
      throw new ValidationError('Cross-reference strength must be a number', 'strength');
    }
    const from = this.requireBranch(fromBranchId);
    const to = this.requireBranch(toBranchId);
    if (from.id === to.id) {
      throw new ValidationError(`Branch ${from.id} cannot reference itself`, 'toBranchId');
    }
    if (from.sessionId !== to.sessionId) {
      throw new ValidationError('Cross-references must stay within one session', 'toBranchId');
    }

    const id = newId('xref');
    this.db
      .prepare<[string, string, string, CrossRefKind, string | null, number, string]>(
        `INSERT INTO cross_refs (id, from_branch_id, to_branch_id, ref_type, reason, strength, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, from.id, to.id, kind, options.reason ?? null, Math.min(1, Math.max(0, strength)), nowIso());

    const row = this.db.prepare<[string], CrossRefRow>('SELECT * FROM cross_refs WHERE id = ?').get(id);
    if (!row) throw new NotFoundError('CrossRef', id);
    return toCrossRef(row);
  }

  /** Cross-references touching a branch in either direction. */
  listCrossRefs(branchId: string): CrossRef[] {
    return this.db
      .prepare<[string, string], CrossRefRow>(
        'SELECT * FROM cross_refs WHERE from_branch_id = ? OR to_branch_id = ? ORDER BY created_at, rowid',
      )
      .all(branchId, branchId)
      .map(toCrossRef);
  }

  // ---------------------------------------------------------------------------
  // Deletion
  // ---------------------------------------------------------------------------

  /**
   * Remove a branch. Its cross-references, checkpoints, overlay and search
   * node go with it; child branches become roots.
   */
  deleteBranch(branchId: string): void {
    const anchored = this.db
      .prepare<[string, string], { id: string }>(
        'SELECT id FROM timelines WHERE root_branch_id = ? OR active_branch_id = ? LIMIT 1',
      )
      .get(branchId, branchId);
    if (anchored) {
      throw new ValidationError(`Branch ${branchId} anchors timeline ${anchored.id}`, 'branchId');
    }

    const info = this.db.prepare<[string]>('DELETE FROM branches WHERE id = ?').run(branchId);
    if (info.changes === 0) throw new NotFoundError('Branch', branchId);
    this.log.info({ branchId }, 'Branch deleted');
  }
}
