import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, ValidationError } from '../../../src/core/errors.js';
import { createSearch, createStores, type StoreContext } from '../../helpers/context.js';

describe('SessionStore', () => {
  let ctx: StoreContext;

  beforeEach(() => {
    ctx = createStores();
  });

  it('should create sessions with a mode and metadata', () => {
    const session = ctx.sessions.createSession('graph', { owner: 'tests' });
    expect(ctx.sessions.requireSession(session.id)).toEqual(session);
    expect(session.mode).toBe('graph');
    expect(session.metadata).toEqual({ owner: 'tests' });
  });

  it('should number thoughts per branch', () => {
    const session = ctx.sessions.createSession();
    const branch = ctx.branches.createBranch({ sessionId: session.id });

    const positions = ['a', 'b', 'c'].map((content) => ctx.sessions.addThought(branch.id, content).position);

    expect(positions).toEqual([0, 1, 2]);
    expect(ctx.sessions.listBranchThoughts(branch.id).map((t) => t.content)).toEqual(['a', 'b', 'c']);
  });

  it('should validate thoughts', () => {
    const session = ctx.sessions.createSession();
    const branch = ctx.branches.createBranch({ sessionId: session.id });

    expect(() => ctx.sessions.addThought(branch.id, '   ')).toThrow(ValidationError);
    expect(() => ctx.sessions.addThought(branch.id, 'x', { confidence: 2 })).toThrow(ValidationError);
    expect(() => ctx.sessions.addThought('br_missing', 'x')).toThrow(NotFoundError);
  });

  it('should cascade a session delete to its branches', () => {
    const session = ctx.sessions.createSession();
    const branch = ctx.branches.createBranch({ sessionId: session.id });
    ctx.sessions.addThought(branch.id, 'a');

    ctx.sessions.deleteSession(session.id);

    expect(ctx.sessions.getSession(session.id)).toBeNull();
    expect(ctx.branches.getBranch(branch.id)).toBeNull();
    expect(() => ctx.sessions.deleteSession(session.id)).toThrow(NotFoundError);
  });

  it('should cascade a session delete to every record it owns', async () => {
    const search = createSearch();
    const bystander = search.sessions.createSession();
    search.sessions.addThought(search.branches.createBranch({ sessionId: bystander.id }).id, 'kept');

    const session = search.sessions.createSession();
    const { timeline } = search.engine.createTimeline({ sessionId: session.id, name: 'plan', rootContent: 'Start' });
    await search.engine.step(timeline.id);
    const [start] = search.sessions.listBranchThoughts(timeline.rootBranchId);
    await search.analyzer.analyze(timeline.rootBranchId, start.id, { type: 'replace', payload: 'X' });
    search.snapshots.createCheckpoint(timeline.rootBranchId, 'C1');
    search.snapshots.createSnapshot({ sessionId: session.id, kind: 'full', data: { step: 1 } });

    const tables = [
      'branches',
      'thoughts',
      'cross_refs',
      'checkpoints',
      'state_snapshots',
      'timelines',
      'timeline_branches',
      'mcts_nodes',
      'counterfactual_analyses',
    ];
    const count = (table: string): number =>
      search.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? -1;
    expect(tables.every((table) => count(table) > 0)).toBe(true);

    search.sessions.deleteSession(session.id);

    expect(Object.fromEntries(tables.map((table) => [table, count(table)]))).toEqual({
      branches: 1,
      thoughts: 1,
      cross_refs: 0,
      checkpoints: 0,
      state_snapshots: 0,
      timelines: 0,
      timeline_branches: 0,
      mcts_nodes: 0,
      counterfactual_analyses: 0,
    });
  });
});
