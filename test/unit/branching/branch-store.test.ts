import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../../../src/core/errors.js';
import { createSearch, createStores, type StoreContext } from '../../helpers/context.js';

describe('BranchStore', () => {
  let ctx: StoreContext;
  let sessionId: string;

  beforeEach(() => {
    ctx = createStores();
    sessionId = ctx.sessions.createSession().id;
  });

  describe('createBranch', () => {
    it('should create an active root with default scores', () => {
      const branch = ctx.branches.createBranch({ sessionId, name: 'main' });

      expect(branch.state).toBe('active');
      expect(branch.parentBranchId).toBeNull();
      expect(branch.priority).toBe(1);
      expect(branch.confidence).toBe(0.8);
      expect(branch.name).toBe('main');
      expect(branch.id).toMatch(/^br_/);
    });

    it('should emit branch:created', () => {
      const listener = vi.fn();
      ctx.branches.on('branch:created', listener);
      const branch = ctx.branches.createBranch({ sessionId });
      expect(listener).toHaveBeenCalledWith(branch);
    });

    it('should reject a missing parent without writing', () => {
      expect(() => ctx.branches.createBranch({ sessionId, parentBranchId: 'br_missing' })).toThrow(ValidationError);
      expect(ctx.branches.listSessionBranches(sessionId)).toHaveLength(0);
    });

    it('should reject a parent from another session', () => {
      const other = ctx.sessions.createSession();
      const foreign = ctx.branches.createBranch({ sessionId: other.id });

      expect(() => ctx.branches.createBranch({ sessionId, parentBranchId: foreign.id })).toThrow(
        /belongs to session/,
      );
    });

    it('should reject a branch that would become its own ancestor', () => {
      const b0 = ctx.branches.createBranch({ sessionId });
      const b1 = ctx.branches.createBranch({ sessionId, parentBranchId: b0.id });

      expect(() => ctx.branches.createBranch({ sessionId, id: b0.id, parentBranchId: b1.id })).toThrow(/cycle/);
      expect(ctx.branches.listSessionBranches(sessionId)).toHaveLength(2);
      expect(ctx.branches.requireBranch(b0.id).parentBranchId).toBeNull();
    });

    it('should reject a duplicate id', () => {
      const b0 = ctx.branches.createBranch({ sessionId });
      expect(() => ctx.branches.createBranch({ sessionId, id: b0.id })).toThrow(`Branch already exists: ${b0.id}`);
    });

    it('should reject out-of-range scores', () => {
      expect(() => ctx.branches.createBranch({ sessionId, priority: -1 })).toThrow(ValidationError);
      expect(() => ctx.branches.createBranch({ sessionId, confidence: 1.5 })).toThrow(ValidationError);
    });

    it('should reject an unknown session', () => {
      expect(() => ctx.branches.createBranch({ sessionId: 'ses_missing' })).toThrow(NotFoundError);
    });

    it('should keep every ancestry walk finite across many inserts', () => {
      // Small LCG so the forest shape is fixed
      let seed = 7;
      const next = () => {
        seed = (seed * 1103515245 + 12345) % 2147483648;
        return seed;
      };

      const ids: string[] = [];
      for (let i = 0; i < 40; i++) {
        const parent = ids.length > 0 && next() % 4 !== 0 ? ids[next() % ids.length] : null;
        ids.push(ctx.branches.createBranch({ sessionId, parentBranchId: parent }).id);
      }

      for (const id of ids) {
        const path = ctx.branches.branchPath(id);
        expect(path.length).toBeLessThanOrEqual(ids.length);
        expect(path[0].parentBranchId).toBeNull();
        expect(path[path.length - 1].id).toBe(id);
        expect(new Set(path.map((b) => b.id)).size).toBe(path.length);
      }
    });
  });

  describe('ancestry', () => {
    it('should list the path from the root down', () => {
      const root = ctx.branches.createBranch({ sessionId });
      const mid = ctx.branches.createBranch({ sessionId, parentBranchId: root.id });
      const leaf = ctx.branches.createBranch({ sessionId, parentBranchId: mid.id });

      expect(ctx.branches.branchPath(leaf.id).map((b) => b.id)).toEqual([root.id, mid.id, leaf.id]);
      expect(ctx.branches.children(root.id).map((b) => b.id)).toEqual([mid.id]);
    });

    it('should collect thoughts along the path', () => {
      const root = ctx.branches.createBranch({ sessionId });
      const child = ctx.branches.createBranch({ sessionId, parentBranchId: root.id });
      ctx.sessions.addThought(root.id, 'first');
      ctx.sessions.addThought(root.id, 'second');
      ctx.sessions.addThought(child.id, 'third');

      expect(ctx.branches.thoughtPrefix(child.id).map((t) => t.content)).toEqual(['first', 'second', 'third']);
    });

    it('should fail loudly on a corrupted parent loop', () => {
      const b0 = ctx.branches.createBranch({ sessionId });
      const b1 = ctx.branches.createBranch({ sessionId, parentBranchId: b0.id });
      ctx.db.prepare('UPDATE branches SET parent_branch_id = ? WHERE id = ?').run(b1.id, b0.id);

      expect(() => ctx.branches.branchPath(b1.id)).toThrow(/loops/);
    });

    it('should stop at the hop limit', () => {
      const limited = createStores({ maxAncestryHops: 3 });
      const sid = limited.sessions.createSession().id;
      let parent: string | null = null;
      for (let i = 0; i < 5; i++) {
        parent = limited.branches.createBranch({ sessionId: sid, parentBranchId: parent }).id;
      }

      expect(() => limited.branches.createBranch({ sessionId: sid, parentBranchId: parent })).toThrow(
        /exceeds 3 hops/,
      );
    });
  });

  describe('transition', () => {
    it('should follow active → completed → abandoned', () => {
      const branch = ctx.branches.createBranch({ sessionId });
      const listener = vi.fn();
      ctx.branches.on('branch:transitioned', listener);

      expect(ctx.branches.transition(branch.id, 'completed').state).toBe('completed');
      expect(ctx.branches.transition(branch.id, 'abandoned').state).toBe('abandoned');
      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener).toHaveBeenLastCalledWith({ branchId: branch.id, from: 'completed', to: 'abandoned' });
    });

    it('should never return to active', () => {
      const branch = ctx.branches.createBranch({ sessionId });
      ctx.branches.transition(branch.id, 'abandoned');

      expect(() => ctx.branches.transition(branch.id, 'active')).toThrow(InvalidTransitionError);
      expect(() => ctx.branches.transition(branch.id, 'completed')).toThrow(InvalidTransitionError);
      expect(ctx.branches.requireBranch(branch.id).state).toBe('abandoned');
    });

    it('should treat a same-state transition as a no-op', () => {
      const branch = ctx.branches.createBranch({ sessionId });
      const listener = vi.fn();
      ctx.branches.on('branch:transitioned', listener);

      expect(ctx.branches.transition(branch.id, 'active')).toEqual(branch);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('cross-references', () => {
    it('should clamp strength into [0, 1]', () => {
      const a = ctx.branches.createBranch({ sessionId });
      const b = ctx.branches.createBranch({ sessionId });

      expect(ctx.branches.addCrossRef(a.id, b.id, 'supports', { strength: 1.7 }).strength).toBe(1);
      expect(ctx.branches.addCrossRef(b.id, a.id, 'contradicts', { strength: -0.5 }).strength).toBe(0);
    });

    it('should reject self-references and unknown branches', () => {
      const a = ctx.branches.createBranch({ sessionId });

      expect(() => ctx.branches.addCrossRef(a.id, a.id, 'extends')).toThrow(ValidationError);
      expect(() => ctx.branches.addCrossRef(a.id, 'br_missing', 'extends')).toThrow(NotFoundError);
    });

    it('should list references in both directions', () => {
      const a = ctx.branches.createBranch({ sessionId });
      const b = ctx.branches.createBranch({ sessionId });
      const c = ctx.branches.createBranch({ sessionId });
      const ab = ctx.branches.addCrossRef(a.id, b.id, 'depends', { reason: 'needs it' });
      const cb = ctx.branches.addCrossRef(c.id, b.id, 'alternative');

      expect(ctx.branches.listCrossRefs(b.id).map((r) => r.id)).toEqual([ab.id, cb.id]);
      expect(ctx.branches.listCrossRefs(a.id)[0].reason).toBe('needs it');
    });
  });

  describe('deleteBranch', () => {
    it('should orphan children and drop dependent records', () => {
      const root = ctx.branches.createBranch({ sessionId });
      const child = ctx.branches.createBranch({ sessionId, parentBranchId: root.id });
      const other = ctx.branches.createBranch({ sessionId });
      ctx.branches.addCrossRef(root.id, other.id, 'supports');
      const checkpoint = ctx.snapshots.createCheckpoint(root.id, 'cp');

      ctx.branches.deleteBranch(root.id);

      expect(ctx.branches.getBranch(root.id)).toBeNull();
      expect(ctx.branches.requireBranch(child.id).parentBranchId).toBeNull();
      expect(ctx.branches.listCrossRefs(other.id)).toEqual([]);
      expect(ctx.snapshots.getCheckpoint(checkpoint.id)).toBeNull();
    });

    it('should drop the search node and overlay of a searched branch', async () => {
      const search = createSearch();
      const session = search.sessions.createSession();
      const { timeline } = search.engine.createTimeline({ sessionId: session.id, name: 'plan', rootContent: 'Start' });
      await search.engine.step(timeline.id);
      await search.engine.step(timeline.id);
      const nodes = search.engine.searchTree.listTimelineNodes(timeline.id);
      const middle = nodes.find((n) => n.content === 'Start / option 1');
      const below = nodes.filter((n) => n.content.startsWith('Start / option 1 / '));
      if (!middle) throw new Error('expected an expanded middle node');
      expect(below).toHaveLength(3);

      search.branches.deleteBranch(middle.branchId);

      expect(search.engine.searchTree.getNode(middle.id)).toBeNull();
      expect(search.engine.searchTree.nodeForBranch(middle.branchId)).toBeNull();
      expect(search.timelines.getTimelineBranch(middle.branchId)).toBeNull();
      for (const node of below) {
        expect(search.engine.searchTree.requireNode(node.id).parentNodeId).toBeNull();
        expect(search.branches.requireBranch(node.branchId).parentBranchId).toBeNull();
      }
    });

    it('should refuse to delete a timeline anchor', () => {
      const timeline = ctx.timelines.createTimeline({ sessionId, name: 'plan', rootContent: 'Start' });
      expect(() => ctx.branches.deleteBranch(timeline.rootBranchId)).toThrow(/anchors timeline/);
    });

    it('should report a missing branch', () => {
      expect(() => ctx.branches.deleteBranch('br_missing')).toThrow(NotFoundError);
    });
  });
});
