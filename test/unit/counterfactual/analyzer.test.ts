import { describe, it, expect, vi } from 'vitest';
import { applyIntervention } from '../../../src/counterfactual/analyzer.js';
import { AnalysisIncompleteError, NotFoundError, ValidationError } from '../../../src/core/errors.js';
import type { Thought } from '../../../src/branching/types.js';
import { createSearch, type SearchContext } from '../../helpers/context.js';

function branchWithThoughts(ctx: SearchContext, contents: string[]) {
  const session = ctx.sessions.createSession();
  const branch = ctx.branches.createBranch({ sessionId: session.id, name: 'original' });
  const thoughts: Thought[] = contents.map((c) => ctx.sessions.addThought(branch.id, c));
  return { session, branch, thoughts };
}

describe('applyIntervention', () => {
  const thoughts = ['a', 'b', 'c', 'd'];

  it('should cut the prefix at the target', () => {
    expect(applyIntervention(thoughts, 2, { type: 'replace', payload: 'X' })).toEqual(['a', 'b', 'X']);
    expect(applyIntervention(thoughts, 2, { type: 'change', payload: 'X' })).toEqual(['a', 'b', 'X']);
    expect(applyIntervention(thoughts, 2, { type: 'remove', payload: '' })).toEqual(['a', 'b']);
    expect(applyIntervention(thoughts, 2, { type: 'inject', payload: 'X' })).toEqual(['a', 'b', 'c', 'X']);
  });
});

describe('CounterfactualAnalyzer', () => {
  it('should build a counterfactual branch and score the difference', async () => {
    const ctx = createSearch();
    const { session, branch, thoughts } = branchWithThoughts(ctx, ['T1', 'T2', 'T3', 'T4']);
    ctx.backend.reward = (prefix) => (prefix.includes('X') ? 0.9 : 0.4);
    const completed = vi.fn();
    ctx.analyzer.on('counterfactual:completed', completed);

    const analysis = await ctx.analyzer.analyze(branch.id, thoughts[2].id, { type: 'replace', payload: 'X' });

    expect(analysis.counterfactualBranchId).not.toBe(branch.id);
    expect(analysis.outcomeDelta).toBeCloseTo(0.5, 10);
    expect(analysis.causalAttribution).toBe(1);
    expect(analysis.confidence).toBe(0.5);
    expect(analysis.intervention).toEqual({ type: 'replace', payload: 'X' });
    expect(analysis.targetThoughtId).toBe(thoughts[2].id);
    expect(analysis.sessionId).toBe(session.id);
    expect(analysis.comparison).toMatchObject({
      interventionType: 'replace',
      cutIndex: 2,
      originalThoughts: ['T1', 'T2', 'T3', 'T4'],
      counterfactualThoughts: ['T1', 'T2', 'X', 'X / option 0'],
      originalScores: [0.4],
      counterfactualScores: [0.9],
      regeneratedContinuation: 'X / option 0',
    });
    expect(completed).toHaveBeenCalledWith(analysis);

    const cfBranch = ctx.branches.requireBranch(analysis.counterfactualBranchId);
    expect(cfBranch.name).toBe('counterfactual:replace');
    expect(cfBranch.parentBranchId).toBeNull();
    expect(cfBranch.metadata).toEqual({ counterfactualOf: branch.id, targetThoughtId: thoughts[2].id, intervention: 'replace' });
    expect(ctx.sessions.listBranchThoughts(cfBranch.id).map((t) => t.content)).toEqual([
      'T1',
      'T2',
      'X',
      'X / option 0',
    ]);

    const [ref] = ctx.branches.listCrossRefs(branch.id);
    expect(ref).toMatchObject({
      fromBranchId: cfBranch.id,
      toBranchId: branch.id,
      kind: 'contradicts',
      strength: 1,
      reason: 'replace at thought 2',
    });
  });

  it('should leave the original branch untouched', async () => {
    const ctx = createSearch();
    const { branch, thoughts } = branchWithThoughts(ctx, ['T1', 'T2']);
    const before = ctx.branches.thoughtPrefix(branch.id);

    await ctx.analyzer.analyze(branch.id, thoughts[0].id, { type: 'remove', payload: '' });

    expect(ctx.branches.thoughtPrefix(branch.id)).toEqual(before);
    expect(ctx.branches.requireBranch(branch.id)).toEqual(branch);
  });

  it('should link change and inject interventions as extensions', async () => {
    const ctx = createSearch();
    const { branch, thoughts } = branchWithThoughts(ctx, ['T1', 'T2']);

    const analysis = await ctx.analyzer.analyze(
      branch.id,
      thoughts[1].id,
      { type: 'inject', payload: 'Y' },
      { question: 'What if we add Y?' },
    );

    expect(analysis.comparison.counterfactualThoughts).toEqual(['T1', 'T2', 'Y', 'Y / option 0']);
    expect(analysis.question).toBe('What if we add Y?');
    expect(ctx.branches.listCrossRefs(branch.id)[0]).toMatchObject({ kind: 'extends', reason: 'What if we add Y?' });
  });

  it('should estimate attribution from repeated rollouts', async () => {
    const ctx = createSearch();
    const { branch, thoughts } = branchWithThoughts(ctx, ['T1', 'T2']);
    ctx.backend.rewards = [0.4, 0.8, 0.6, 0.9, 0.5, 0.7];

    const analysis = await ctx.analyzer.analyze(branch.id, thoughts[1].id, { type: 'change', payload: 'Z' }, { samples: 3 });

    expect(analysis.comparison.originalScores).toEqual([0.4, 0.6, 0.5]);
    expect(analysis.comparison.counterfactualScores).toEqual([0.8, 0.9, 0.7]);
    expect(analysis.outcomeDelta).toBeCloseTo(0.3, 10);
    expect(analysis.comparison.pooledStdDev).toBeCloseTo(0.1, 10);
    expect(analysis.causalAttribution).toBeCloseTo(0.75, 10);
    expect(analysis.confidence).toBeCloseTo(0.6, 10);
    expect(ctx.backend.count('generate')).toBe(3);
  });

  it('should record the impact on a timeline overlay', async () => {
    const ctx = createSearch();
    const session = ctx.sessions.createSession();
    const timeline = ctx.timelines.createTimeline({ sessionId: session.id, name: 'plan', rootContent: 'Start' });
    const next = ctx.sessions.addThought(timeline.rootBranchId, 'Next');
    ctx.backend.reward = (prefix) => (prefix.includes('Other') ? 0.2 : 0.6);

    const analysis = await ctx.analyzer.analyze(timeline.rootBranchId, next.id, { type: 'change', payload: 'Other' });

    expect(analysis.timelineId).toBe(timeline.id);
    expect(ctx.timelines.requireTimelineBranch(timeline.rootBranchId).counterfactualImpact).toBeCloseTo(-0.4, 10);
    expect(ctx.analyzer.listForBranch(timeline.rootBranchId).map((a) => a.id)).toEqual([analysis.id]);
  });

  it('should reject a thought that is not on the branch path', async () => {
    const ctx = createSearch();
    const { session, branch } = branchWithThoughts(ctx, ['T1']);
    const sibling = ctx.branches.createBranch({ sessionId: session.id });
    const elsewhere = ctx.sessions.addThought(sibling.id, 'other');

    await expect(
      ctx.analyzer.analyze(branch.id, elsewhere.id, { type: 'replace', payload: 'X' }),
    ).rejects.toThrow(NotFoundError);
    expect(ctx.analyzer.listAnalyses(session.id)).toEqual([]);
    expect(ctx.backend.calls).toEqual([]);
  });

  it('should validate the intervention', async () => {
    const ctx = createSearch();
    const { branch, thoughts } = branchWithThoughts(ctx, ['T1']);

    await expect(ctx.analyzer.analyze(branch.id, thoughts[0].id, { type: 'replace', payload: ' ' })).rejects.toThrow(
      ValidationError,
    );
    await expect(
      ctx.analyzer.analyze(branch.id, thoughts[0].id, { type: 'change', payload: 'X' }, { samples: 0 }),
    ).rejects.toThrow(ValidationError);
  });

  it('should persist nothing when the oracle fails', async () => {
    const ctx = createSearch();
    const { session, branch, thoughts } = branchWithThoughts(ctx, ['T1', 'T2']);
    ctx.backend.reward = (prefix) => {
      if (prefix.includes('X')) throw new Error('backend down');
      return 0.5;
    };

    const pending = ctx.analyzer.analyze(branch.id, thoughts[1].id, { type: 'replace', payload: 'X' });

    await expect(pending).rejects.toBeInstanceOf(AnalysisIncompleteError);
    expect(ctx.branches.listSessionBranches(session.id)).toHaveLength(1);
    expect(ctx.branches.listCrossRefs(branch.id)).toEqual([]);
    expect(ctx.analyzer.listAnalyses(session.id)).toEqual([]);
  });
});
