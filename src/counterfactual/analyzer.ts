/**
 * CounterfactualAnalyzer: "what if this thought had been different?"
 *
 * Clones the thought prefix of a branch up to the target thought, applies
 * an intervention there, asks the oracle for a fresh continuation and
 * scores both versions. All oracle calls finish before anything is
 * written; the new branch, its thoughts, the cross-reference and the
 * analysis record are then stored in one transaction.
 */

import { EventEmitter } from 'node:events';
import type { Db } from '../storage/database.js';
import { nowIso } from '../storage/database.js';
import { toCounterfactual, type CounterfactualRow } from '../storage/rows.js';
import { AnalysisIncompleteError, NotFoundError, OracleError, ValidationError } from '../core/errors.js';
import { componentLogger } from '../core/logger.js';
import { newId } from '../utils/ids.js';
import type { BranchStore } from '../branching/branch-store.js';
import type { SessionStore } from '../branching/session-store.js';
import type { CrossRefKind } from '../branching/types.js';
import type { TimelineStore } from '../timeline/timeline-store.js';
import type { GuardedOracle } from '../oracle/guarded-oracle.js';
import { analysisConfidence, causalAttribution, mean, pooledStdDev } from './statistics.js';
import type {
  AnalyzeOptions,
  CounterfactualAnalysis,
  CounterfactualComparison,
  Intervention,
  InterventionType,
} from './types.js';

export interface CounterfactualDeps {
  db: Db;
  sessions: SessionStore;
  branches: BranchStore;
  timelines: TimelineStore;
  oracle: GuardedOracle;
}

export interface CounterfactualSettings {
  samples: number;
}

const INTERVENTION_LINK: Record<InterventionType, CrossRefKind> = {
  change: 'extends',
  inject: 'extends',
  replace: 'contradicts',
  remove: 'contradicts',
};

interface Rollouts {
  continuation: string;
  originalScores: number[];
  counterfactualScores: number[];
}

export class CounterfactualAnalyzer extends EventEmitter {
  private readonly log = componentLogger('counterfactual');

  constructor(
    private readonly deps: CounterfactualDeps,
    private readonly settings: CounterfactualSettings = { samples: 1 },
  ) {
    super();
  }

  async analyze(
    originalBranchId: string,
    targetThoughtId: string,
    intervention: Intervention,
    options: AnalyzeOptions = {},
  ): Promise<CounterfactualAnalysis> {
    const { branches } = this.deps;
    if (!(intervention.type in INTERVENTION_LINK)) {
      throw new ValidationError(`Unknown intervention type: ${intervention.type}`, 'intervention.type');
    }
    if (intervention.type !== 'remove' && intervention.payload.trim() === '') {
      throw new ValidationError(`A ${intervention.type} intervention needs a payload`, 'intervention.payload');
    }
    const samples = options.samples ?? this.settings.samples;
    if (!Number.isInteger(samples) || samples < 1 || samples > 16) {
      throw new ValidationError(`samples must be an integer within [1, 16], got ${samples}`, 'samples');
    }

    const original = branches.requireBranch(originalBranchId);
    const prefix = branches.thoughtPrefix(original.id);
    const cutIndex = prefix.findIndex((t) => t.id === targetThoughtId);
    if (cutIndex === -1) {
      this.log.debug({ originalBranchId, targetThoughtId }, 'Rejected analysis: thought not on branch path');
      throw new NotFoundError('Thought', targetThoughtId);
    }

    const originalThoughts = prefix.map((t) => t.content);
    const alteredPrefix = applyIntervention(originalThoughts, cutIndex, intervention);
    const rollouts = await this.rollout(original.id, originalThoughts, alteredPrefix, samples);

    const counterfactualThoughts = [...alteredPrefix, rollouts.continuation];
    const originalMean = mean(rollouts.originalScores);
    const counterfactualMean = mean(rollouts.counterfactualScores);
    const outcomeDelta = counterfactualMean - originalMean;
    const stdDev = pooledStdDev(rollouts.originalScores, rollouts.counterfactualScores);
    const attribution = causalAttribution(outcomeDelta, stdDev, samples);
    const confidence = analysisConfidence(stdDev, samples);

    const comparison: CounterfactualComparison = {
      interventionType: intervention.type,
      cutIndex,
      originalThoughts,
      counterfactualThoughts,
      originalScores: rollouts.originalScores,
      counterfactualScores: rollouts.counterfactualScores,
      originalMean,
      counterfactualMean,
      pooledStdDev: stdDev,
      regeneratedContinuation: rollouts.continuation,
    };

    const id = newId('cf');
    this.deps.db.transaction(() => {
      const branch = branches.insertBranch({
        sessionId: original.sessionId,
        parentBranchId: null,
        name: `counterfactual:${intervention.type}`,
        confidence: original.confidence,
        priority: original.priority,
        metadata: { counterfactualOf: original.id, targetThoughtId, intervention: intervention.type },
      });
      for (const content of counterfactualThoughts) {
        this.deps.sessions.insertThought(newId('th'), original.sessionId, branch.id, content, original.confidence, {});
      }
      branches.insertCrossRef(branch.id, original.id, INTERVENTION_LINK[intervention.type], {
        strength: attribution,
        reason: options.question ?? `${intervention.type} at thought ${cutIndex}`,
      });

      this.deps.db
        .prepare<[string, string, string | null, string, string | null, InterventionType, string, string, string, number, number, number, string, string]>(
          `INSERT INTO counterfactual_analyses
             (id, session_id, timeline_id, original_branch_id, question, intervention_type, intervention,
              target_thought_id, counterfactual_branch_id, outcome_delta, causal_attribution, confidence, comparison, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          original.sessionId,
          original.timelineId,
          original.id,
          options.question ?? null,
          intervention.type,
          intervention.payload,
          targetThoughtId,
          branch.id,
          outcomeDelta,
          attribution,
          confidence,
          JSON.stringify(comparison),
          nowIso(),
        );

      if (this.deps.timelines.getTimelineBranch(original.id)) {
        this.deps.timelines.setCounterfactualImpact(original.id, outcomeDelta);
      }
    })();

    const analysis = this.requireAnalysis(id);
    this.log.info(
      { analysisId: id, originalBranchId, counterfactualBranchId: analysis.counterfactualBranchId, outcomeDelta },
      'Counterfactual analysis completed',
    );
    this.emit('counterfactual:completed', analysis);
    return analysis;
  }

  /**
   * Every oracle call of one analysis. Any failure aborts the whole
   * analysis before persistence.
   */
  private async rollout(
    branchId: string,
    originalThoughts: string[],
    alteredPrefix: string[],
    samples: number,
  ): Promise<Rollouts> {
    const { oracle } = this.deps;
    try {
      let continuation: string | null = null;
      const originalScores: number[] = [];
      const counterfactualScores: number[] = [];

      for (let i = 0; i < samples; i++) {
        originalScores.push(await oracle.evaluate(originalThoughts));

        const [next] = await oracle.generateContinuations(alteredPrefix, 1);
        if (!next) {
          throw new OracleError('Oracle produced no continuation', 'malformed');
        }
        continuation ??= next.content;
        counterfactualScores.push(await oracle.evaluate([...alteredPrefix, next.content]));
      }

      if (continuation === null) {
        throw new OracleError('Oracle produced no continuation', 'malformed');
      }
      return { continuation, originalScores, counterfactualScores };
    } catch (err) {
      if (!(err instanceof OracleError)) throw err;
      this.log.warn({ branchId, reason: err.reason }, 'Counterfactual analysis incomplete');
      throw new AnalysisIncompleteError(`Counterfactual analysis of ${branchId} incomplete: ${err.message}`, branchId, err);
    }
  }

  getAnalysis(id: string): CounterfactualAnalysis | null {
    const row = this.deps.db
      .prepare<[string], CounterfactualRow>('SELECT * FROM counterfactual_analyses WHERE id = ?')
      .get(id);
    return row ? toCounterfactual(row) : null;
  }

  requireAnalysis(id: string): CounterfactualAnalysis {
    const analysis = this.getAnalysis(id);
    if (!analysis) throw new NotFoundError('CounterfactualAnalysis', id);
    return analysis;
  }

  listAnalyses(sessionId: string): CounterfactualAnalysis[] {
    return this.deps.db
      .prepare<[string], CounterfactualRow>(
        'SELECT * FROM counterfactual_analyses WHERE session_id = ? ORDER BY created_at, rowid',
      )
      .all(sessionId)
      .map(toCounterfactual);
  }

  listForBranch(branchId: string): CounterfactualAnalysis[] {
    return this.deps.db
      .prepare<[string], CounterfactualRow>(
        'SELECT * FROM counterfactual_analyses WHERE original_branch_id = ? ORDER BY created_at, rowid',
      )
      .all(branchId)
      .map(toCounterfactual);
  }
}

/**
 * Altered prefix for an intervention at `cut`:
 * change/replace substitute the target, remove drops it, inject keeps it
 * and inserts the payload right after.
 */
export function applyIntervention(thoughts: readonly string[], cut: number, intervention: Intervention): string[] {
  const head = thoughts.slice(0, cut);
  switch (intervention.type) {
    case 'change':
    case 'replace':
      return [...head, intervention.payload];
    case 'remove':
      return head;
    case 'inject':
      return [...head, thoughts[cut], intervention.payload];
  }
}

