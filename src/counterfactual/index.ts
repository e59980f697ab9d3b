export {
  CounterfactualAnalyzer,
  applyIntervention,
  type CounterfactualDeps,
  type CounterfactualSettings,
} from './analyzer.js';
export { mean, variance, pooledStdDev, causalAttribution, analysisConfidence } from './statistics.js';
export type {
  InterventionType,
  Intervention,
  AnalyzeOptions,
  CounterfactualComparison,
  CounterfactualAnalysis,
} from './types.js';
