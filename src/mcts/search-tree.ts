/**
 * SearchTree: persistence of MCTS nodes.
 *
 * Visit statistics are only ever changed by SQL increments
 * (`visit_count = visit_count + 1`), so concurrent backpropagations
 * interleave without lost updates.
 */

import type { Db } from '../storage/database.js';
import { nowIso } from '../storage/database.js';
import { canonicalJson, type JsonObject } from '../storage/json.js';
import { toSearchNode, type SearchNodeRow } from '../storage/rows.js';
import { NotFoundError, ValidationError } from '../core/errors.js';
import { newId } from '../utils/ids.js';
import { meanValue, ucb1 } from './ucb.js';
import type { SearchNode } from './types.js';

export interface InsertNodeInput {
  sessionId: string;
  timelineId: string | null;
  branchId: string;
  parentNodeId: string | null;
  content: string;
  prior: number;
  depth: number;
  metadata?: JsonObject;
}

export class SearchTree {
  constructor(
    private readonly db: Db,
    private readonly maxHops: number = 10_000,
  ) {}

  insertNode(input: InsertNodeInput): SearchNode {
    const id = newId('node');
    const now = nowIso();
    this.db
      .prepare<[string, string, string | null, string, string | null, string, number, number, string, string, string]>(
        `INSERT INTO mcts_nodes
           (id, session_id, timeline_id, branch_id, parent_node_id, content, prior, simulation_depth, created_at, last_visited, metadata)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        input.sessionId,
        input.timelineId,
        input.branchId,
        input.parentNodeId,
        input.content,
        input.prior,
        input.depth,
        now,
        now,
        canonicalJson(input.metadata ?? {}),
      );
    return this.requireNode(id);
  }

  getNode(id: string): SearchNode | null {
    const row = this.db.prepare<[string], SearchNodeRow>('SELECT * FROM mcts_nodes WHERE id = ?').get(id);
    return row ? toSearchNode(row) : null;
  }

  requireNode(id: string): SearchNode {
    const node = this.getNode(id);
    if (!node) throw new NotFoundError('SearchNode', id);
    return node;
  }

  nodeForBranch(branchId: string): SearchNode | null {
    const row = this.db.prepare<[string], SearchNodeRow>('SELECT * FROM mcts_nodes WHERE branch_id = ?').get(branchId);
    return row ? toSearchNode(row) : null;
  }

  children(nodeId: string): SearchNode[] {
    return this.db
      .prepare<[string], SearchNodeRow>('SELECT * FROM mcts_nodes WHERE parent_node_id = ? ORDER BY created_at, rowid')
      .all(nodeId)
      .map(toSearchNode);
  }

  /** Children whose branch has not been abandoned. */
  liveChildren(nodeId: string): SearchNode[] {
    return this.db
      .prepare<[string], SearchNodeRow>(
        `SELECT n.* FROM mcts_nodes n
         JOIN branches b ON b.id = n.branch_id
         WHERE n.parent_node_id = ? AND b.state != 'abandoned'
         ORDER BY n.created_at, n.rowid`,
      )
      .all(nodeId)
      .map(toSearchNode);
  }

  listTimelineNodes(timelineId: string): SearchNode[] {
    return this.db
      .prepare<[string], SearchNodeRow>('SELECT * FROM mcts_nodes WHERE timeline_id = ? ORDER BY created_at, rowid')
      .all(timelineId)
      .map(toSearchNode);
  }

  /** Most recently visited non-terminal node of a timeline. */
  latestOpenNode(timelineId: string): SearchNode | null {
    const row = this.db
      .prepare<[string], SearchNodeRow>(
        `SELECT * FROM mcts_nodes WHERE timeline_id = ? AND is_terminal = 0
         ORDER BY last_visited DESC, rowid DESC LIMIT 1`,
      )
      .get(timelineId);
    return row ? toSearchNode(row) : null;
  }

  /**
   * Node ids from `nodeId` up to its search root, nearest first.
   */
  pathToRoot(nodeId: string): string[] {
    const parentOf = this.db.prepare<[string], { parent_node_id: string | null }>(
      'SELECT parent_node_id FROM mcts_nodes WHERE id = ?',
    );
    const path = [nodeId];
    const seen = new Set(path);
    let current = parentOf.get(nodeId)?.parent_node_id ?? null;
    while (current !== null) {
      if (seen.has(current) || path.length > this.maxHops) {
        throw new ValidationError(`Search node ancestry of ${nodeId} does not terminate`, 'parentNodeId');
      }
      seen.add(current);
      path.push(current);
      current = parentOf.get(current)?.parent_node_id ?? null;
    }
    return path;
  }

  markExpanded(nodeId: string): void {
    this.db.prepare<[string]>('UPDATE mcts_nodes SET is_expanded = 1 WHERE id = ?').run(nodeId);
  }

  markTerminal(nodeId: string): void {
    this.db.prepare<[string]>('UPDATE mcts_nodes SET is_terminal = 1 WHERE id = ?').run(nodeId);
  }

  /**
   * Add one visit and `reward` to every node on the path, refresh UCB1 on
   * the path and on the siblings whose parent count moved, and mirror the
   * stats onto the timeline overlay. Runs as one transaction.
   */
  backpropagate(path: readonly string[], reward: number, explorationConstant: number): void {
    const increment = this.db.prepare<[number, string, string]>(
      `UPDATE mcts_nodes
       SET visit_count = visit_count + 1, total_value = total_value + ?, last_visited = ?
       WHERE id = ?`,
    );
    const mirror = this.db.prepare<[string, string]>(
      `UPDATE timeline_branches
       SET visit_count = (SELECT visit_count FROM mcts_nodes WHERE branch_id = timeline_branches.branch_id),
           total_value = (SELECT total_value FROM mcts_nodes WHERE branch_id = timeline_branches.branch_id),
           ucb_score = (SELECT ucb_score FROM mcts_nodes WHERE branch_id = timeline_branches.branch_id),
           updated_at = ?
       WHERE branch_id = ?`,
    );

    this.db.transaction(() => {
      const now = nowIso();
      for (const id of path) increment.run(reward, now, id);

      const touched = new Set<string>(path);
      for (const id of path) {
        for (const child of this.children(id)) touched.add(child.id);
      }
      for (const id of touched) {
        const node = this.requireNode(id);
        this.refreshUcb(node, explorationConstant);
        mirror.run(now, node.branchId);
      }
    })();
  }

  private refreshUcb(node: SearchNode, explorationConstant: number): void {
    let score: number | null;
    if (node.parentNodeId === null) {
      score = meanValue(node);
    } else {
      const parent = this.requireNode(node.parentNodeId);
      const value = ucb1(node, parent.visitCount, explorationConstant);
      score = Number.isFinite(value) ? value : null;
    }
    this.db.prepare<[number | null, string]>('UPDATE mcts_nodes SET ucb_score = ? WHERE id = ?').run(score, node.id);
  }
}
