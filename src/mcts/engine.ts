/**
 * MCTSEngine: Monte-Carlo Tree Search over a timeline's branches.
 *
 * One step: select (UCB1 from the active branch's node) → expand (oracle
 * continuations) → simulate (oracle reward) → backpropagate (increments up
 * to the search root). A fresh expansion is only written, together with its
 * backpropagation, once the reward is in hand.
 *
 * Steps may run concurrently. Expansion is serialized per node, the active
 * pointer per session, and in-flight paths carry a virtual loss so parallel
 * selections spread out. An oracle failure ends the step with
 * `{ ok: false }` and leaves the tree untouched.
 */

import { EventEmitter } from 'node:events';
import type { Db } from '../storage/database.js';
import { EvaluationFailedError, OracleError, ValidationError } from '../core/errors.js';
import { componentLogger } from '../core/logger.js';
import { AsyncSemaphore, KeyedMutex } from '../core/mutex.js';
import type { BacktrackSettings, MCTSSettings } from '../core/types.js';
import { newId } from '../utils/ids.js';
import type { BranchStore } from '../branching/branch-store.js';
import type { SessionStore } from '../branching/session-store.js';
import type { Branch } from '../branching/types.js';
import type { TimelineStore } from '../timeline/timeline-store.js';
import type { CreateTimelineInput, Timeline } from '../timeline/types.js';
import type { GuardedOracle } from '../oracle/guarded-oracle.js';
import type { Continuation } from '../oracle/types.js';
import { runHousekeeping } from './housekeeping.js';
import { SearchTree } from './search-tree.js';
import { meanValue, selectChild } from './ucb.js';
import { VirtualLossLedger, type VirtualLossGuard } from './virtual-loss.js';
import type {
  AlternativePath,
  AutoBacktrackResult,
  BestPath,
  ExploreOptions,
  ExploreResult,
  HousekeepingReport,
  IterationStats,
  SearchNode,
  StepFailure,
  StepOutcome,
} from './types.js';

export interface MCTSEngineDeps {
  db: Db;
  sessions: SessionStore;
  branches: BranchStore;
  timelines: TimelineStore;
  oracle: GuardedOracle;
}

export interface MCTSEngineOptions {
  settings: MCTSSettings;
  backtrack?: BacktrackSettings;
  maxAncestryHops?: number;
}

export interface AutoBacktrackOptions extends Partial<BacktrackSettings> {
  /** Move the timeline's active branch to the recommended ancestor */
  apply?: boolean;
}

export class MCTSEngine extends EventEmitter {
  private readonly log = componentLogger('mcts');
  private readonly tree: SearchTree;
  private readonly ledger: VirtualLossLedger;
  private readonly nodeLocks = new KeyedMutex();
  private readonly settings: MCTSSettings;
  private readonly backtrack: BacktrackSettings;

  constructor(
    private readonly deps: MCTSEngineDeps,
    options: MCTSEngineOptions,
  ) {
    super();
    this.settings = options.settings;
    this.backtrack = options.backtrack ?? { confidenceThreshold: 0.3, rewardThreshold: 0.2 };
    this.tree = new SearchTree(deps.db, options.maxAncestryHops);
    this.ledger = new VirtualLossLedger(this.settings.virtualLoss, this.settings.rewardRange[0]);
  }

  get searchTree(): SearchTree {
    return this.tree;
  }

  get virtualLoss(): VirtualLossLedger {
    return this.ledger;
  }

  // ---------------------------------------------------------------------------
  // Setup
  // ---------------------------------------------------------------------------

  /** Create a timeline and its search root in one go. */
  createTimeline(input: CreateTimelineInput): { timeline: Timeline; root: SearchNode } {
    const timeline = this.deps.timelines.createTimeline(input);
    return { timeline, root: this.startExploration(timeline.id) };
  }

  /** Search root of a timeline, created on first use. */
  startExploration(timelineId: string): SearchNode {
    const timeline = this.deps.timelines.requireTimeline(timelineId);
    return this.ensureNode(this.deps.branches.requireBranch(timeline.rootBranchId), timeline.id);
  }

  /**
   * Search node attached to a branch. Branches created outside the search
   * (restores, manual forks) get one lazily, hung under their parent
   * branch's node when it has one.
   */
  private ensureNode(branch: Branch, timelineId: string): SearchNode {
    const existing = this.tree.nodeForBranch(branch.id);
    if (existing) return existing;

    const parentNode = branch.parentBranchId ? this.tree.nodeForBranch(branch.parentBranchId) : null;
    const thoughts = this.deps.sessions.listBranchThoughts(branch.id);
    const overlay = this.deps.timelines.getTimelineBranch(branch.id);
    const node = this.tree.insertNode({
      sessionId: branch.sessionId,
      timelineId,
      branchId: branch.id,
      parentNodeId: parentNode?.id ?? null,
      content: thoughts.at(-1)?.content ?? branch.name ?? '',
      prior: this.settings.defaultPrior,
      depth: overlay?.depth ?? 0,
    });
    this.log.debug({ nodeId: node.id, branchId: branch.id }, 'Search node attached');
    return node;
  }

  // ---------------------------------------------------------------------------
  // One iteration
  // ---------------------------------------------------------------------------

  async step(timelineId: string): Promise<StepOutcome> {
    const timeline = this.deps.timelines.requireTimeline(timelineId);
    if (timeline.state !== 'active') {
      throw new ValidationError(`Timeline ${timelineId} is ${timeline.state}`, 'state');
    }
    this.startExploration(timelineId);

    const path = this.select(this.startNode(timeline));
    const guard = this.ledger.apply(path.map((n) => n.id));
    try {
      const leaf = path[path.length - 1];
      let outcome: StepOutcome | null = null;
      if (!leaf.isTerminal && !leaf.isExpanded) {
        outcome = await this.nodeLocks.withLock(leaf.id, () => this.expandAndSimulate(timeline, leaf.id));
      }
      outcome ??= await this.simulate(timeline, this.tree.requireNode(leaf.id), guard);

      if (outcome.ok && this.settings.housekeeping.enabled) {
        await this.housekeeping(timelineId);
      }
      return outcome;
    } finally {
      guard.release();
    }
  }

  private startNode(timeline: Timeline): SearchNode {
    const active = this.deps.branches.requireBranch(timeline.activeBranchId);
    if (active.state === 'abandoned') {
      return this.ensureNode(this.deps.branches.requireBranch(timeline.rootBranchId), timeline.id);
    }
    return this.ensureNode(active, timeline.id);
  }

  /** Descend by UCB1 until a node that is unexpanded, terminal or childless. */
  private select(start: SearchNode): SearchNode[] {
    const c = this.settings.explorationConstant;
    const path = [start];
    let node = start;

    while (!node.isTerminal && node.isExpanded) {
      const parentVisits = this.ledger.effective(node.id, node).visitCount;
      const next = selectChild(
        this.tree.liveChildren(node.id),
        (child) => this.ledger.effective(child.id, child),
        parentVisits,
        c,
      );
      if (!next) break;
      path.push(next);
      node = next;
    }
    return path;
  }

  /**
   * Expansion and simulation of a leaf nobody has expanded yet. Candidates
   * and the reward stay in memory until both oracle calls succeed; the
   * children, the terminal flag and the backpropagation are then written in
   * one transaction. Returns null when another step expanded the leaf first.
   */
  private async expandAndSimulate(timeline: Timeline, nodeId: string): Promise<StepOutcome | null> {
    const node = this.tree.requireNode(nodeId);
    if (node.isExpanded || node.isTerminal) return null;

    let candidates: Continuation[] = [];
    if (node.simulationDepth < this.settings.maxDepth) {
      try {
        candidates = await this.deps.oracle.generateContinuations(this.prefixOf(node), this.settings.expansionWidth);
      } catch (err) {
        if (!(err instanceof OracleError)) throw err;
        return this.fail(
          timeline.id,
          node.id,
          new EvaluationFailedError(`Expansion of ${node.id} failed: ${err.message}`, 'expansion', err),
        );
      }
    }

    // Highest prior, earliest on a tie
    let pick = -1;
    candidates.forEach((candidate, i) => {
      if (pick < 0 || candidate.prior > candidates[pick].prior) pick = i;
    });
    const prefix = this.prefixOf(node);
    if (pick >= 0) prefix.push(candidates[pick].content);

    let reward: number;
    try {
      reward = await this.deps.oracle.evaluate(prefix);
    } catch (err) {
      if (!(err instanceof OracleError)) throw err;
      const subject = pick >= 0 ? `candidate ${pick} under ${node.id}` : node.id;
      return this.fail(
        timeline.id,
        node.id,
        new EvaluationFailedError(`Simulation of ${subject} failed: ${err.message}`, 'simulation', err),
      );
    }

    const commit = this.deps.db.transaction(() => {
      let children: SearchNode[] = [];
      let target = node;
      if (pick < 0) {
        this.tree.markTerminal(node.id);
      } else {
        children = this.attachChildren(node, timeline, candidates);
        target = children[pick];
      }
      const backPath = this.tree.pathToRoot(target.id);
      this.tree.backpropagate(backPath, reward, this.settings.explorationConstant);
      return { children, target, backPath };
    });
    const { children, target, backPath } = commit();

    if (children.length > 0) {
      this.log.debug({ nodeId: node.id, children: children.length }, 'Node expanded');
      this.emit('mcts:expanded', { timelineId: timeline.id, nodeId: node.id, childIds: children.map((c) => c.id) });
    }
    this.announceBackprop(timeline.id, target.id, reward, backPath);

    return {
      ok: true,
      selectedNodeId: node.id,
      simulatedNodeId: target.id,
      expandedNodeIds: children.map((c) => c.id),
      reward,
      backpropNodes: backPath.length,
    };
  }

  /** Simulation from a leaf that is already expanded or terminal. */
  private async simulate(timeline: Timeline, leaf: SearchNode, guard: VirtualLossGuard): Promise<StepOutcome> {
    const target = this.simulationTarget(leaf);
    if (target.id !== leaf.id) guard.extend([target.id]);

    let reward: number;
    try {
      reward = await this.deps.oracle.evaluate(this.prefixOf(target));
    } catch (err) {
      if (!(err instanceof OracleError)) throw err;
      return this.fail(
        timeline.id,
        leaf.id,
        new EvaluationFailedError(`Simulation of ${target.id} failed: ${err.message}`, 'simulation', err),
      );
    }

    const backPath = this.tree.pathToRoot(target.id);
    this.tree.backpropagate(backPath, reward, this.settings.explorationConstant);
    this.announceBackprop(timeline.id, target.id, reward, backPath);

    return {
      ok: true,
      selectedNodeId: leaf.id,
      simulatedNodeId: target.id,
      expandedNodeIds: [],
      reward,
      backpropNodes: backPath.length,
    };
  }

  private announceBackprop(timelineId: string, nodeId: string, reward: number, path: string[]): void {
    this.log.debug({ timelineId, nodeId, reward, depth: path.length }, 'Backpropagated');
    this.emit('mcts:backpropagated', { timelineId, nodeId, reward, path });
  }

  /** Branch, thought, overlay and node for every candidate, all or nothing. */
  private attachChildren(parent: SearchNode, timeline: Timeline, candidates: Continuation[]): SearchNode[] {
    const { db, branches, sessions, timelines } = this.deps;
    const depth = parent.simulationDepth + 1;

    return db.transaction(() => {
      const children = candidates.map((candidate) => {
        const branch = branches.insertBranch({
          sessionId: parent.sessionId,
          parentBranchId: parent.branchId,
          priority: candidate.prior,
          confidence: candidate.prior,
          metadata: { mcts: true },
        });
        sessions.insertThought(newId('th'), parent.sessionId, branch.id, candidate.content, candidate.prior, {});
        timelines.attachBranch(timeline.id, branch.id, { depth, mctsGenerated: true });
        return this.tree.insertNode({
          sessionId: parent.sessionId,
          timelineId: timeline.id,
          branchId: branch.id,
          parentNodeId: parent.id,
          content: candidate.content,
          prior: candidate.prior,
          depth,
        });
      });
      this.tree.markExpanded(parent.id);
      timelines.recordAlternatives(parent.branchId, children.length);
      return children;
    })();
  }

  /**
   * Node whose reward this step measures: the highest-prior child nobody has
   * visited or claimed yet, else the UCB1 pick, else the leaf itself.
   */
  private simulationTarget(leaf: SearchNode): SearchNode {
    const children = this.tree.liveChildren(leaf.id);
    if (children.length === 0) return leaf;

    let fresh: SearchNode | null = null;
    for (const child of children) {
      if (child.visitCount > 0 || this.ledger.pending(child.id) > 0) continue;
      if (!fresh || child.prior > fresh.prior) fresh = child;
    }
    if (fresh) return fresh;

    return (
      selectChild(
        children,
        (child) => this.ledger.effective(child.id, child),
        this.ledger.effective(leaf.id, leaf).visitCount,
        this.settings.explorationConstant,
      ) ?? leaf
    );
  }

  private prefixOf(node: SearchNode): string[] {
    return this.deps.branches.thoughtPrefix(node.branchId).map((t) => t.content);
  }

  private fail(timelineId: string, nodeId: string, error: EvaluationFailedError): StepFailure {
    this.log.warn({ timelineId, nodeId, phase: error.phase, error: error.message }, 'Search step failed');
    this.emit('mcts:step-failed', { timelineId, nodeId, error });
    return { ok: false, selectedNodeId: nodeId, error };
  }

  // ---------------------------------------------------------------------------
  // Many iterations
  // ---------------------------------------------------------------------------

  async explore(timelineId: string, options: ExploreOptions = {}): Promise<ExploreResult> {
    const iterations = options.iterations ?? this.settings.iterations;
    const concurrency = options.concurrency ?? this.settings.concurrency;
    if (!Number.isInteger(iterations) || iterations < 1) {
      throw new ValidationError(`iterations must be a positive integer, got ${iterations}`, 'iterations');
    }
    const root = this.startExploration(timelineId);
    const semaphore = new AsyncSemaphore(Math.max(1, concurrency));

    const stats = await Promise.all(
      Array.from({ length: iterations }, (_, i) =>
        semaphore.withPermit(async (): Promise<IterationStats> => {
          const outcome = await this.step(timelineId);
          return outcome.ok
            ? {
                iteration: i + 1,
                ok: true,
                selectedNodeId: outcome.selectedNodeId,
                simulatedNodeId: outcome.simulatedNodeId,
                reward: outcome.reward,
                backpropNodes: outcome.backpropNodes,
              }
            : {
                iteration: i + 1,
                ok: false,
                selectedNodeId: outcome.selectedNodeId,
                simulatedNodeId: null,
                reward: null,
                backpropNodes: 0,
                error: outcome.error.message,
              };
        }),
      ),
    );

    const succeeded = stats.filter((s) => s.ok).length;
    this.log.info({ timelineId, iterations, succeeded }, 'Exploration finished');
    return {
      timelineId,
      rootNodeId: root.id,
      iterations: stats,
      succeeded,
      failed: stats.length - succeeded,
      nodesExplored: this.tree.listTimelineNodes(timelineId).length,
      bestPath: this.bestPath(timelineId),
    };
  }

  housekeeping(timelineId: string): Promise<HousekeepingReport> {
    return runHousekeeping(
      {
        tree: this.tree,
        branches: this.deps.branches,
        timelines: this.deps.timelines,
        settings: this.settings.housekeeping,
      },
      timelineId,
    );
  }

  // ---------------------------------------------------------------------------
  // Read-outs
  // ---------------------------------------------------------------------------

  /** Follow the best-mean visited child from the search root. */
  bestPath(timelineId: string): BestPath {
    const timeline = this.deps.timelines.requireTimeline(timelineId);
    const root = this.tree.nodeForBranch(timeline.rootBranchId);
    if (!root) return { nodeIds: [], branchIds: [], contents: [], value: 0 };

    const path = [root];
    let node = root;
    for (;;) {
      let best: SearchNode | null = null;
      let bestMean = -Infinity;
      for (const child of this.tree.liveChildren(node.id)) {
        const mean = meanValue(child);
        if (mean !== null && mean > bestMean) {
          best = child;
          bestMean = mean;
        }
      }
      if (!best) break;
      path.push(best);
      node = best;
    }

    return {
      nodeIds: path.map((n) => n.id),
      branchIds: path.map((n) => n.branchId),
      contents: path.map((n) => n.content),
      value: meanValue(node) ?? 0,
    };
  }

  /**
   * Check the most recently visited open node against the reward and
   * confidence thresholds and, when it falls short, recommend the
   * best-valued ancestor plus up to three of its other children.
   */
  async autoBacktrack(timelineId: string, options: AutoBacktrackOptions = {}): Promise<AutoBacktrackResult> {
    const timeline = this.deps.timelines.requireTimeline(timelineId);
    const confidenceThreshold = options.confidenceThreshold ?? this.backtrack.confidenceThreshold;
    const rewardThreshold = options.rewardThreshold ?? this.backtrack.rewardThreshold;

    const current = this.tree.latestOpenNode(timelineId);
    if (!current) {
      const none = this.tree.listTimelineNodes(timelineId).length === 0;
      return {
        backtracked: false,
        reason: none ? 'No search nodes in timeline' : 'All nodes are terminal',
        currentNodeId: null,
        backtrackTo: null,
        alternatives: [],
        currentConfidence: 0,
        currentReward: 0,
      };
    }

    const currentReward = meanValue(current) ?? 0.5;
    const currentConfidence = current.prior;
    const base = { currentNodeId: current.id, currentConfidence, currentReward };

    if (currentConfidence >= confidenceThreshold && currentReward >= rewardThreshold) {
      return {
        ...base,
        backtracked: false,
        reason:
          `No backtracking needed: reward (${currentReward.toFixed(2)}) >= ${rewardThreshold.toFixed(2)} ` +
          `and confidence (${currentConfidence.toFixed(2)}) >= ${confidenceThreshold.toFixed(2)}`,
        backtrackTo: null,
        alternatives: [],
      };
    }

    let ancestor: SearchNode | null = null;
    let ancestorValue = 0;
    for (const id of this.tree.pathToRoot(current.id).slice(1)) {
      const candidate = this.tree.requireNode(id);
      const value = meanValue(candidate) ?? 0;
      if (value > ancestorValue) {
        ancestor = candidate;
        ancestorValue = value;
      }
    }

    if (!ancestor) {
      return {
        ...base,
        backtracked: false,
        reason: 'Backtracking indicated but no better ancestor found',
        backtrackTo: null,
        alternatives: [],
      };
    }

    const from = ancestor;
    const alternatives: AlternativePath[] = this.tree
      .liveChildren(from.id)
      .filter((sibling) => sibling.id !== current.id)
      .slice(0, 3)
      .map((sibling) => ({
        fromNodeId: from.id,
        nodeId: sibling.id,
        direction: sibling.content.slice(0, 100),
        expectedImprovement: (meanValue(sibling) ?? sibling.prior) - currentReward,
      }));

    if (options.apply) {
      await this.deps.timelines.setActiveBranch(timeline.id, from.branchId);
    }

    this.log.info({ timelineId, from: current.id, to: from.id, applied: options.apply ?? false }, 'Backtrack recommended');
    return {
      ...base,
      backtracked: true,
      reason:
        `Backtracking triggered: reward (${currentReward.toFixed(2)}) vs ${rewardThreshold.toFixed(2)}, ` +
        `confidence (${currentConfidence.toFixed(2)}) vs ${confidenceThreshold.toFixed(2)}`,
      backtrackTo: from.id,
      alternatives,
    };
  }
}
