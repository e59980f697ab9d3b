/**
 * Advisory branch housekeeping after search steps.
 *
 * - A well-visited node with no child beating its mean is `completed`.
 * - A non-root node that stays under the UCB floor after enough visits is
 *   `abandoned`.
 * - When the timeline's active branch stops being active, the pointer
 *   moves to its best live child, or else to the nearest active ancestor.
 */

import type { BranchStore } from '../branching/branch-store.js';
import type { Branch } from '../branching/types.js';
import type { HousekeepingSettings } from '../core/types.js';
import type { TimelineStore } from '../timeline/timeline-store.js';
import type { SearchTree } from './search-tree.js';
import { meanValue } from './ucb.js';
import type { HousekeepingReport, SearchNode } from './types.js';

export interface HousekeepingContext {
  tree: SearchTree;
  branches: BranchStore;
  timelines: TimelineStore;
  settings: HousekeepingSettings;
}

export async function runHousekeeping(ctx: HousekeepingContext, timelineId: string): Promise<HousekeepingReport> {
  const report: HousekeepingReport = { completed: [], abandoned: [], promotedTo: null };
  const { tree, branches, settings } = ctx;

  for (const node of tree.listTimelineNodes(timelineId)) {
    const branch = branches.getBranch(node.branchId);
    if (!branch || branch.state !== 'active') continue;

    if (node.visitCount > settings.completeAfterVisits && !hasImprovingChild(tree, node)) {
      branches.transition(branch.id, 'completed');
      report.completed.push(branch.id);
      continue;
    }

    if (
      node.parentNodeId !== null &&
      node.visitCount >= settings.pruneAfterVisits &&
      node.ucbScore !== null &&
      node.ucbScore < settings.pruneUcbFloor
    ) {
      branches.transition(branch.id, 'abandoned');
      report.abandoned.push(branch.id);
    }
  }

  report.promotedTo = await promoteActive(ctx, timelineId);
  return report;
}

function hasImprovingChild(tree: SearchTree, node: SearchNode): boolean {
  const mean = meanValue(node);
  if (mean === null) return false;
  return tree.liveChildren(node.id).some((child) => {
    const childMean = meanValue(child);
    return childMean !== null && childMean > mean;
  });
}

async function promoteActive(ctx: HousekeepingContext, timelineId: string): Promise<string | null> {
  const { tree, branches, timelines } = ctx;
  const timeline = timelines.requireTimeline(timelineId);
  if (timeline.state !== 'active') return null;

  return timelines.withSessionWriter(timeline.sessionId, () => {
    // Re-read under the writer lock; another writer may have moved it
    const current = timelines.requireTimeline(timelineId);
    const active = branches.requireBranch(current.activeBranchId);
    if (active.state === 'active') return null;

    const next = bestActiveChild(tree, branches, active) ?? nearestActiveAncestor(branches, active);
    if (!next || next.timelineId !== timelineId) return null;
    timelines.writeActiveBranch(timelineId, next.id);
    return next.id;
  });
}

function bestActiveChild(tree: SearchTree, branches: BranchStore, branch: Branch): Branch | null {
  const node = tree.nodeForBranch(branch.id);
  if (!node) return null;

  let best: { branch: Branch; mean: number; prior: number } | null = null;
  for (const child of tree.liveChildren(node.id)) {
    const childBranch = branches.getBranch(child.branchId);
    if (!childBranch || childBranch.state !== 'active') continue;
    const mean = meanValue(child) ?? -Infinity;
    if (!best || mean > best.mean || (mean === best.mean && child.prior > best.prior)) {
      best = { branch: childBranch, mean, prior: child.prior };
    }
  }
  return best?.branch ?? null;
}

function nearestActiveAncestor(branches: BranchStore, branch: Branch): Branch | null {
  const path = branches.branchPath(branch.id);
  for (let i = path.length - 2; i >= 0; i--) {
    if (path[i].state === 'active') return path[i];
  }
  return null;
}
