import { z } from 'zod';

// ===== Configuration =====

export const ThoughtlineConfigSchema = z.object({
  storage: z.object({
    /** SQLite file path, or ':memory:' */
    path: z.string().optional(),
    /** Upper bound on parent hops when walking branch ancestry */
    maxAncestryHops: z.number().int().min(1).default(10_000),
    /** Upper bound on parent hops when resolving incremental snapshots */
    maxSnapshotChain: z.number().int().min(1).default(1_000),
  }).default({}),
  mcts: z.object({
    explorationConstant: z.number().min(0).default(Math.SQRT2),
    expansionWidth: z.number().int().min(1).max(8).default(3),
    maxDepth: z.number().int().min(1).default(8),
    defaultPrior: z.number().min(0).max(1).default(0.5),
    virtualLoss: z.number().min(0).default(1),
    rewardRange: z.tuple([z.number(), z.number()])
      .refine(([lo, hi]) => lo < hi, 'rewardRange lower bound must be below upper bound')
      .default([0, 1]),
    iterations: z.number().int().min(1).max(50).default(5),
    concurrency: z.number().int().min(1).max(16).default(1),
    housekeeping: z.object({
      enabled: z.boolean().default(true),
      completeAfterVisits: z.number().int().min(1).default(20),
      pruneAfterVisits: z.number().int().min(1).default(5),
      pruneUcbFloor: z.number().default(0.2),
    }).default({}),
  }).default({}),
  backtrack: z.object({
    confidenceThreshold: z.number().min(0).max(1).default(0.3),
    rewardThreshold: z.number().default(0.2),
  }).default({}),
  counterfactual: z.object({
    samples: z.number().int().min(1).max(16).default(1),
  }).default({}),
  oracle: z.object({
    timeoutMs: z.number().int().min(1).default(30_000),
    provider: z.enum(['openai']).default('openai'),
    model: z.string().optional(),
    apiKey: z.string().optional(),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type ThoughtlineConfig = z.infer<typeof ThoughtlineConfigSchema>;
export type MCTSSettings = ThoughtlineConfig['mcts'];
export type HousekeepingSettings = MCTSSettings['housekeeping'];
export type BacktrackSettings = ThoughtlineConfig['backtrack'];
