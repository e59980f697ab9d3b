/**
 * TimelineStore: containers for tree-mode explorations and the per-branch
 * overlay that carries depth and search statistics.
 *
 * `active_branch_id` has a single logical writer per session: every change
 * goes through `withSessionWriter`, which serializes on a session-keyed mutex.
 */

import { EventEmitter } from 'node:events';
import type { Db } from '../storage/database.js';
import { nowIso } from '../storage/database.js';
import { canonicalJson } from '../storage/json.js';
import { toTimeline, toTimelineBranch, type TimelineBranchRow, type TimelineRow } from '../storage/rows.js';
import { NotFoundError, ValidationError } from '../core/errors.js';
import { componentLogger } from '../core/logger.js';
import { KeyedMutex } from '../core/mutex.js';
import { newId } from '../utils/ids.js';
import type { BranchStore } from '../branching/branch-store.js';
import type { SessionStore } from '../branching/session-store.js';
import type { BranchComparison, CreateTimelineInput, Timeline, TimelineBranch } from './types.js';

export interface AttachOptions {
  depth: number;
  mctsGenerated?: boolean;
}

export class TimelineStore extends EventEmitter {
  private readonly log = componentLogger('timelines');

  constructor(
    private readonly db: Db,
    private readonly sessions: SessionStore,
    private readonly branches: BranchStore,
    private readonly sessionLocks: KeyedMutex = new KeyedMutex(),
  ) {
    super();
  }

  /**
   * Create a timeline with its root branch and root thought.
   */
  createTimeline(input: CreateTimelineInput): Timeline {
    if (input.name.trim() === '') {
      throw new ValidationError('Timeline name must not be empty', 'name');
    }
    if (input.rootContent.trim() === '') {
      throw new ValidationError('Root content must not be empty', 'rootContent');
    }
    this.sessions.requireSession(input.sessionId);

    const id = newId('tl');
    const create = this.db.transaction((): void => {
      const root = this.branches.insertBranch({ sessionId: input.sessionId, name: input.name });
      const now = nowIso();
      this.db
        .prepare<[string, string, string, string | null, string, string, string, string, string]>(
          `INSERT INTO timelines
             (id, session_id, name, description, root_branch_id, active_branch_id, created_at, updated_at, metadata)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          input.sessionId,
          input.name,
          input.description ?? null,
          root.id,
          root.id,
          now,
          now,
          canonicalJson(input.metadata ?? {}),
        );
      this.branches.assignTimeline(root.id, id);
      this.insertOverlay(id, root.id, { depth: 0 });
      this.sessions.insertThought(newId('th'), input.sessionId, root.id, input.rootContent, 0.8, {});
    });
    create();

    const timeline = this.requireTimeline(id);
    this.log.info({ timelineId: id, sessionId: input.sessionId, rootBranchId: timeline.rootBranchId }, 'Timeline created');
    this.emit('timeline:created', timeline);
    return timeline;
  }

  getTimeline(id: string): Timeline | null {
    const row = this.db.prepare<[string], TimelineRow>('SELECT * FROM timelines WHERE id = ?').get(id);
    return row ? toTimeline(row) : null;
  }

  requireTimeline(id: string): Timeline {
    const timeline = this.getTimeline(id);
    if (!timeline) throw new NotFoundError('Timeline', id);
    return timeline;
  }

  listTimelines(sessionId: string): Timeline[] {
    return this.db
      .prepare<[string], TimelineRow>('SELECT * FROM timelines WHERE session_id = ? ORDER BY created_at, rowid')
      .all(sessionId)
      .map(toTimeline);
  }

  archive(timelineId: string): Timeline {
    const timeline = this.requireTimeline(timelineId);
    if (timeline.state === 'archived') return timeline;
    if (timeline.state === 'merged') {
      throw new ValidationError(`Timeline ${timelineId} is merged and cannot be archived`, 'state');
    }
    this.db
      .prepare<[string, string]>("UPDATE timelines SET state = 'archived', updated_at = ? WHERE id = ?")
      .run(nowIso(), timelineId);
    this.log.info({ timelineId }, 'Timeline archived');
    return this.requireTimeline(timelineId);
  }

  // ---------------------------------------------------------------------------
  // Active branch (single writer per session)
  // ---------------------------------------------------------------------------

  /**
   * Run `fn` as the only writer of active-branch pointers in a session.
   */
  withSessionWriter<T>(sessionId: string, fn: () => T | Promise<T>): Promise<T> {
    return this.sessionLocks.withLock(sessionId, fn);
  }

  async setActiveBranch(timelineId: string, branchId: string): Promise<Timeline> {
    const timeline = this.requireTimeline(timelineId);
    return this.withSessionWriter(timeline.sessionId, () => this.writeActiveBranch(timelineId, branchId));
  }

  /**
   * Pointer update for callers already holding the session writer.
   */
  writeActiveBranch(timelineId: string, branchId: string): Timeline {
    const timeline = this.requireTimeline(timelineId);
    const branch = this.branches.requireBranch(branchId);
    if (branch.sessionId !== timeline.sessionId) {
      throw new ValidationError(`Branch ${branchId} is not part of session ${timeline.sessionId}`, 'branchId');
    }
    if (branch.timelineId !== timelineId) {
      throw new ValidationError(`Branch ${branchId} is not part of timeline ${timelineId}`, 'branchId');
    }
    if (timeline.state !== 'active') {
      throw new ValidationError(`Timeline ${timelineId} is ${timeline.state}`, 'state');
    }
    if (timeline.activeBranchId === branchId) return timeline;

    this.db
      .prepare<[string, string, string]>('UPDATE timelines SET active_branch_id = ?, updated_at = ? WHERE id = ?')
      .run(branchId, nowIso(), timelineId);
    this.log.debug({ timelineId, from: timeline.activeBranchId, to: branchId }, 'Active branch changed');
    this.emit('timeline:active-changed', { timelineId, from: timeline.activeBranchId, to: branchId });
    return this.requireTimeline(timelineId);
  }

  // ---------------------------------------------------------------------------
  // Overlay
  // ---------------------------------------------------------------------------

  /**
   * Put an existing branch into a timeline: overlay row, branch pointer and
   * the timeline's counters. Runs inside the caller's transaction.
   */
  attachBranch(timelineId: string, branchId: string, options: AttachOptions): TimelineBranch {
    this.branches.assignTimeline(branchId, timelineId);
    this.insertOverlay(timelineId, branchId, options);
    this.db
      .prepare<[number, string, string]>(
        `UPDATE timelines
         SET branch_count = branch_count + 1, max_depth = MAX(max_depth, ?), updated_at = ?
         WHERE id = ?`,
      )
      .run(options.depth, nowIso(), timelineId);
    return this.requireTimelineBranch(branchId);
  }

  private insertOverlay(timelineId: string, branchId: string, options: AttachOptions): void {
    const now = nowIso();
    this.db
      .prepare<[string, string, number, number, string, string]>(
        `INSERT INTO timeline_branches (branch_id, timeline_id, depth, mcts_generated, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(branchId, timelineId, options.depth, options.mctsGenerated ? 1 : 0, now, now);
  }

  getTimelineBranch(branchId: string): TimelineBranch | null {
    const row = this.db
      .prepare<[string], TimelineBranchRow>('SELECT * FROM timeline_branches WHERE branch_id = ?')
      .get(branchId);
    return row ? toTimelineBranch(row) : null;
  }

  requireTimelineBranch(branchId: string): TimelineBranch {
    const overlay = this.getTimelineBranch(branchId);
    if (!overlay) throw new NotFoundError('TimelineBranch', branchId);
    return overlay;
  }

  listTimelineBranches(timelineId: string): TimelineBranch[] {
    return this.db
      .prepare<[string], TimelineBranchRow>(
        'SELECT * FROM timeline_branches WHERE timeline_id = ? ORDER BY depth, created_at, rowid',
      )
      .all(timelineId)
      .map(toTimelineBranch);
  }

  recordAlternatives(branchId: string, count: number): void {
    this.db
      .prepare<[number, string, string]>(
        'UPDATE timeline_branches SET alternatives_explored = alternatives_explored + ?, updated_at = ? WHERE branch_id = ?',
      )
      .run(count, nowIso(), branchId);
  }

  setCounterfactualImpact(branchId: string, impact: number): void {
    this.db
      .prepare<[number, string, string]>(
        'UPDATE timeline_branches SET counterfactual_impact = ?, updated_at = ? WHERE branch_id = ?',
      )
      .run(impact, nowIso(), branchId);
  }

  // ---------------------------------------------------------------------------
  // Comparison
  // ---------------------------------------------------------------------------

  compareBranches(branchA: string, branchB: string): BranchComparison {
    const pathA = this.branches.branchPath(branchA);
    const pathB = this.branches.branchPath(branchB);

    let shared = 0;
    while (shared < pathA.length && shared < pathB.length && pathA[shared].id === pathB[shared].id) {
      shared++;
    }

    const statsA = this.getTimelineBranch(branchA);
    const statsB = this.getTimelineBranch(branchB);
    const meanA = statsA && statsA.visitCount > 0 ? statsA.totalValue / statsA.visitCount : null;
    const meanB = statsB && statsB.visitCount > 0 ? statsB.totalValue / statsB.visitCount : null;

    let recommended: string | null = null;
    if (meanA !== null && (meanB === null || meanA > meanB)) recommended = branchA;
    else if (meanB !== null && (meanA === null || meanB > meanA)) recommended = branchB;

    return {
      branchA,
      branchB,
      sharedPrefix: shared,
      divergesAt: shared > 0 ? pathA[shared - 1].id : null,
      meanValueA: meanA,
      meanValueB: meanB,
      visitsA: statsA?.visitCount ?? 0,
      visitsB: statsB?.visitCount ?? 0,
      recommended,
    };
  }
}
