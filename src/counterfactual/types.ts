/**
 * Counterfactual Types
 *
 * One analysis is a "what if" probe: clone a branch's thought prefix,
 * intervene at one thought, regenerate the continuation and compare scores.
 */

export type InterventionType = 'change' | 'remove' | 'replace' | 'inject';

export interface Intervention {
  type: InterventionType;
  /** Replacement or injected text; ignored for `remove` */
  payload: string;
}

export interface AnalyzeOptions {
  question?: string;
  /** Repeated rollouts per side, used for the attribution estimate */
  samples?: number;
}

export interface CounterfactualComparison {
  interventionType: InterventionType;
  /** Index of the target thought inside the original prefix */
  cutIndex: number;
  originalThoughts: string[];
  counterfactualThoughts: string[];
  originalScores: number[];
  counterfactualScores: number[];
  originalMean: number;
  counterfactualMean: number;
  /** Pooled standard deviation of both score samples */
  pooledStdDev: number;
  regeneratedContinuation: string;
}

export interface CounterfactualAnalysis {
  id: string;
  sessionId: string;
  timelineId: string | null;
  originalBranchId: string;
  question: string | null;
  targetThoughtId: string | null;
  intervention: Intervention;
  counterfactualBranchId: string;
  outcomeDelta: number;
  causalAttribution: number;
  confidence: number;
  comparison: CounterfactualComparison;
  createdAt: string;
}
