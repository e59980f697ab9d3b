import type { NodeStats } from './types.js';

/**
 * UCB1 = mean + c * sqrt(ln(parentVisits) / visits).
 * An unvisited node scores +Infinity so it is always tried first.
 */
export function ucb1(stats: NodeStats, parentVisits: number, explorationConstant: number): number {
  if (stats.visitCount <= 0) return Infinity;
  const mean = stats.totalValue / stats.visitCount;
  const exploration = explorationConstant * Math.sqrt(Math.log(Math.max(parentVisits, 1)) / stats.visitCount);
  return mean + exploration;
}

export function meanValue(stats: NodeStats): number | null {
  return stats.visitCount > 0 ? stats.totalValue / stats.visitCount : null;
}

/**
 * Pick the child to descend into. Unvisited children win outright, the
 * highest prior among them first; otherwise the highest UCB1. Ties keep the
 * earliest child.
 */
export function selectChild<T extends { prior: number }>(
  children: readonly T[],
  statsOf: (child: T) => NodeStats,
  parentVisits: number,
  explorationConstant: number,
): T | null {
  let best: T | null = null;
  let bestUnvisited = false;
  let bestScore = -Infinity;

  for (const child of children) {
    const stats = statsOf(child);
    const unvisited = stats.visitCount <= 0;
    const score = unvisited ? child.prior : ucb1(stats, parentVisits, explorationConstant);

    if (best === null || (unvisited && !bestUnvisited) || (unvisited === bestUnvisited && score > bestScore)) {
      best = child;
      bestUnvisited = unvisited;
      bestScore = score;
    }
  }
  return best;
}
