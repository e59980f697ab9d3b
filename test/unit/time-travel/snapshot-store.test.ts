import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CorruptChainError, NotFoundError, ValidationError } from '../../../src/core/errors.js';
import { parseJsonObject, type JsonObject } from '../../../src/storage/json.js';
import { createStores, type StoreContext } from '../../helpers/context.js';

describe('SnapshotStore', () => {
  let ctx: StoreContext;
  let sessionId: string;

  beforeEach(() => {
    ctx = createStores();
    sessionId = ctx.sessions.createSession().id;
  });

  describe('checkpoints', () => {
    it('should capture the thought prefix by default', () => {
      const root = ctx.branches.createBranch({ sessionId });
      const child = ctx.branches.createBranch({ sessionId, parentBranchId: root.id });
      ctx.sessions.addThought(root.id, 'premise');
      ctx.sessions.addThought(child.id, 'step');

      const checkpoint = ctx.snapshots.createCheckpoint(child.id, 'mid-way', undefined, 'before the risky part');

      expect(checkpoint.payload).toEqual({ branchId: child.id, thoughts: ['premise', 'step'] });
      expect(checkpoint.description).toBe('before the risky part');
      expect(ctx.snapshots.listCheckpoints(sessionId).map((c) => c.id)).toEqual([checkpoint.id]);
    });

    it('should validate the name and branch', () => {
      const branch = ctx.branches.createBranch({ sessionId });
      expect(() => ctx.snapshots.createCheckpoint(branch.id, ' ')).toThrow(ValidationError);
      expect(() => ctx.snapshots.createCheckpoint('br_missing', 'x')).toThrow(NotFoundError);
    });
  });

  describe('resolve', () => {
    it('should apply an incremental chain root-to-leaf', () => {
      const full = ctx.snapshots.createSnapshot({
        sessionId,
        kind: 'full',
        data: { count: 0, items: ['a'], meta: { x: 1 } },
      });
      const inc1 = ctx.snapshots.createSnapshot({ sessionId, kind: 'incremental', data: { count: 1 }, parentSnapshotId: full.id });
      const inc2 = ctx.snapshots.createSnapshot({
        sessionId,
        kind: 'incremental',
        data: { items: ['a', 'b'] },
        parentSnapshotId: inc1.id,
      });
      const inc3 = ctx.snapshots.createSnapshot({
        sessionId,
        kind: 'incremental',
        data: { meta: { x: null, y: 2 } },
        parentSnapshotId: inc2.id,
      });

      expect(ctx.snapshots.resolve(inc3.id)).toEqual({ count: 1, items: ['a', 'b'], meta: { y: 2 } });
      expect(ctx.snapshots.resolve(inc1.id)).toEqual({ count: 1, items: ['a'], meta: { x: 1 } });
    });

    it('should resolve to identical bytes every time', () => {
      const full = ctx.snapshots.createSnapshot({ sessionId, kind: 'full', data: { z: 1, a: { y: 2, b: 3 } } });
      const inc = ctx.snapshots.createSnapshot({ sessionId, kind: 'incremental', data: { m: true }, parentSnapshotId: full.id });

      const first = ctx.snapshots.resolveSerialized(inc.id);
      expect(first).toBe('{"a":{"b":3,"y":2},"m":true,"z":1}');
      expect(ctx.snapshots.resolveSerialized(inc.id)).toBe(first);
    });

    it('should carry a __proto__ key through a chain', () => {
      const data = parseJsonObject('{"__proto__":{"polluted":true},"n":1}', 'data');
      const full = ctx.snapshots.createSnapshot({ sessionId, kind: 'full', data });
      const inc = ctx.snapshots.createSnapshot({ sessionId, kind: 'incremental', data: { n: 2 }, parentSnapshotId: full.id });

      expect(ctx.snapshots.resolveSerialized(full.id)).toBe('{"__proto__":{"polluted":true},"n":1}');
      expect(ctx.snapshots.resolveSerialized(inc.id)).toBe('{"__proto__":{"polluted":true},"n":2}');
    });

    it('should return a full snapshot as stored', () => {
      const full = ctx.snapshots.createSnapshot({ sessionId, kind: 'full', data: { v: 1 } });
      expect(ctx.snapshots.resolve(full.id)).toEqual({ v: 1 });
    });

    it('should refuse incremental snapshots without a usable parent', () => {
      const branch = ctx.branches.createBranch({ sessionId });
      const branchSnap = ctx.snapshots.createSnapshot({ sessionId, kind: 'branch', data: { v: 1 }, branchId: branch.id });

      expect(() => ctx.snapshots.createSnapshot({ sessionId, kind: 'incremental', data: {} })).toThrow(ValidationError);
      expect(() =>
        ctx.snapshots.createSnapshot({ sessionId, kind: 'incremental', data: {}, parentSnapshotId: branchSnap.id }),
      ).toThrow(/full or incremental parent/);
    });

    it('should report a chain whose full snapshot was removed', () => {
      const full = ctx.snapshots.createSnapshot({ sessionId, kind: 'full', data: { v: 1 } });
      const inc = ctx.snapshots.createSnapshot({ sessionId, kind: 'incremental', data: { v: 2 }, parentSnapshotId: full.id });
      ctx.db.prepare('DELETE FROM state_snapshots WHERE id = ?').run(full.id);

      expect(() => ctx.snapshots.resolve(inc.id)).toThrow(CorruptChainError);
    });

    it('should stop at the chain limit', () => {
      const limited = createStores({ maxSnapshotChain: 2 });
      const sid = limited.sessions.createSession().id;
      let parent = limited.snapshots.createSnapshot({ sessionId: sid, kind: 'full', data: { n: 0 } }).id;
      for (let n = 1; n <= 3; n++) {
        parent = limited.snapshots.createSnapshot({ sessionId: sid, kind: 'incremental', data: { n }, parentSnapshotId: parent }).id;
      }

      try {
        limited.snapshots.resolve(parent);
        expect.unreachable('resolve should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(CorruptChainError);
        if (err instanceof CorruptChainError) expect(err.hops).toBe(2);
      }
    });
  });

  describe('restore', () => {
    it('should bring back an abandoned branch as a new active branch', async () => {
      const b0 = ctx.branches.createBranch({ sessionId, confidence: 0.6, priority: 2 });
      const payload: JsonObject = { thoughts: ['one', 'two'], plan: { step: 3 } };
      const checkpoint = ctx.snapshots.createCheckpoint(b0.id, 'C1', payload);
      const abandoned = ctx.branches.transition(b0.id, 'abandoned');
      const listener = vi.fn();
      ctx.snapshots.on('snapshot:restored', listener);

      const result = await ctx.snapshots.restore({ checkpointId: checkpoint.id });

      expect(result.branch.id).not.toBe(b0.id);
      expect(result.branch.state).toBe('active');
      expect(result.branch.parentBranchId).toBeNull();
      expect(result.branch.name).toBe('restore:C1');
      expect(result.branch.confidence).toBe(0.6);
      expect(result.branch.priority).toBe(2);
      expect(result.branch.payload).toEqual(payload);
      expect(result.payload).toEqual(payload);
      expect(result.branch.metadata).toEqual({ restoredFrom: { kind: 'checkpoint', id: checkpoint.id, branchId: b0.id } });
      expect(result.thoughts.map((t) => t.content)).toEqual(['one', 'two']);
      expect(listener).toHaveBeenCalledWith({ source: { checkpointId: checkpoint.id }, branchId: result.branch.id });

      // Sources stay as they were
      expect(ctx.snapshots.requireCheckpoint(checkpoint.id)).toEqual(checkpoint);
      expect(ctx.branches.requireBranch(b0.id)).toEqual(abandoned);
    });

    it('should record a branch snapshot when restoring a checkpoint', async () => {
      const b0 = ctx.branches.createBranch({ sessionId });
      const checkpoint = ctx.snapshots.createCheckpoint(b0.id, 'C1', { k: 'v' });

      const result = await ctx.snapshots.restore({ checkpointId: checkpoint.id }, { name: 'again' });

      expect(result.branch.name).toBe('again');
      expect(result.snapshotId).not.toBeNull();
      const snapshot = ctx.snapshots.requireSnapshot(result.snapshotId ?? '');
      expect(snapshot.kind).toBe('branch');
      expect(snapshot.branchId).toBe(result.branch.id);
      expect(snapshot.data).toEqual({ k: 'v' });
      expect(snapshot.description).toBe('Restore from checkpoint: C1');
    });

    it('should restore a resolved snapshot chain', async () => {
      const full = ctx.snapshots.createSnapshot({ sessionId, kind: 'full', data: { thoughts: [{ content: 'x' }, ''], v: 1 } });
      const inc = ctx.snapshots.createSnapshot({ sessionId, kind: 'incremental', data: { v: 2 }, parentSnapshotId: full.id });

      const result = await ctx.snapshots.restore({ snapshotId: inc.id });

      expect(result.payload).toEqual({ thoughts: [{ content: 'x' }, ''], v: 2 });
      expect(result.thoughts.map((t) => t.content)).toEqual(['x']);
      expect(result.snapshotId).toBeNull();
      expect(result.branch.name).toBe('restore');
    });

    it('should join the source timeline and become its active branch', async () => {
      const timeline = ctx.timelines.createTimeline({ sessionId, name: 'plan', rootContent: 'Start' });
      const checkpoint = ctx.snapshots.createCheckpoint(timeline.rootBranchId, 'C1');

      const result = await ctx.snapshots.restore({ checkpointId: checkpoint.id });

      const after = ctx.timelines.requireTimeline(timeline.id);
      expect(result.branch.timelineId).toBe(timeline.id);
      expect(after.activeBranchId).toBe(result.branch.id);
      expect(after.branchCount).toBe(2);
      expect(ctx.timelines.requireTimelineBranch(result.branch.id).depth).toBe(0);
    });

    it('should stay out of a timeline archived while waiting for the session writer', async () => {
      const timeline = ctx.timelines.createTimeline({ sessionId, name: 'plan', rootContent: 'Start' });
      const checkpoint = ctx.snapshots.createCheckpoint(timeline.rootBranchId, 'C1');
      let open = (): void => undefined;
      const gate = new Promise<void>((resolve) => {
        open = resolve;
      });
      const held = ctx.timelines.withSessionWriter(sessionId, () => gate);

      const restoring = ctx.snapshots.restore({ checkpointId: checkpoint.id });
      ctx.timelines.archive(timeline.id);
      open();
      await held;
      const result = await restoring;

      const after = ctx.timelines.requireTimeline(timeline.id);
      expect(result.branch.timelineId).toBeNull();
      expect(result.thoughts.map((t) => t.content)).toEqual(['Start']);
      expect(ctx.timelines.getTimelineBranch(result.branch.id)).toBeNull();
      expect(after).toMatchObject({ state: 'archived', activeBranchId: timeline.rootBranchId, branchCount: 1 });
    });

    it('should report an unknown source', async () => {
      await expect(ctx.snapshots.restore({ checkpointId: 'cp_missing' })).rejects.toThrow(NotFoundError);
    });
  });
});
