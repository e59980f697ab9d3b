/**
 * Versioned schema for the thoughtline store.
 *
 * Each migration runs once inside a transaction and is recorded in
 * schema_migrations, so opening an existing database is idempotent.
 */

import type { Db } from './database.js';

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'sessions_and_branches',
    sql: `
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY NOT NULL,
        mode TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        metadata TEXT
      );

      CREATE TABLE IF NOT EXISTS branches (
        id TEXT PRIMARY KEY NOT NULL,
        session_id TEXT NOT NULL,
        name TEXT,
        parent_branch_id TEXT,
        priority REAL NOT NULL DEFAULT 1.0,
        confidence REAL NOT NULL DEFAULT 0.8,
        state TEXT NOT NULL DEFAULT 'active' CHECK (state IN ('active', 'completed', 'abandoned')),
        timeline_id TEXT,
        payload TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        metadata TEXT,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE,
        FOREIGN KEY (parent_branch_id) REFERENCES branches(id) ON DELETE SET NULL,
        FOREIGN KEY (timeline_id) REFERENCES timelines(id) ON DELETE SET NULL
      );
      CREATE INDEX IF NOT EXISTS idx_branches_session ON branches(session_id);
      CREATE INDEX IF NOT EXISTS idx_branches_parent ON branches(parent_branch_id);
      CREATE INDEX IF NOT EXISTS idx_branches_state ON branches(state);

      CREATE TABLE IF NOT EXISTS thoughts (
        id TEXT PRIMARY KEY NOT NULL,
        session_id TEXT NOT NULL,
        branch_id TEXT,
        content TEXT NOT NULL,
        confidence REAL NOT NULL DEFAULT 0.8,
        position INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        metadata TEXT,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE,
        FOREIGN KEY (branch_id) REFERENCES branches(id) ON DELETE SET NULL
      );
      CREATE INDEX IF NOT EXISTS idx_thoughts_branch ON thoughts(branch_id, position);

      CREATE TABLE IF NOT EXISTS cross_refs (
        id TEXT PRIMARY KEY NOT NULL,
        from_branch_id TEXT NOT NULL,
        to_branch_id TEXT NOT NULL,
        ref_type TEXT NOT NULL,
        reason TEXT,
        strength REAL NOT NULL DEFAULT 1.0,
        created_at TEXT NOT NULL,
        FOREIGN KEY (from_branch_id) REFERENCES branches(id) ON DELETE CASCADE,
        FOREIGN KEY (to_branch_id) REFERENCES branches(id) ON DELETE CASCADE
      );
      CREATE INDEX IF NOT EXISTS idx_crossrefs_from ON cross_refs(from_branch_id);
      CREATE INDEX IF NOT EXISTS idx_crossrefs_to ON cross_refs(to_branch_id);

      CREATE TRIGGER IF NOT EXISTS trg_cross_refs_immutable
      BEFORE UPDATE ON cross_refs
      BEGIN
        SELECT RAISE(ABORT, 'cross_refs are immutable');
      END;
    `,
  },
  {
    version: 2,
    name: 'checkpoints_and_snapshots',
    sql: `
      CREATE TABLE IF NOT EXISTS checkpoints (
        id TEXT PRIMARY KEY NOT NULL,
        session_id TEXT NOT NULL,
        branch_id TEXT,
        name TEXT NOT NULL,
        description TEXT,
        payload TEXT NOT NULL,
        created_at TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE,
        FOREIGN KEY (branch_id) REFERENCES branches(id) ON DELETE CASCADE
      );
      CREATE INDEX IF NOT EXISTS idx_checkpoints_session ON checkpoints(session_id);
      CREATE INDEX IF NOT EXISTS idx_checkpoints_branch ON checkpoints(branch_id);

      CREATE TRIGGER IF NOT EXISTS trg_checkpoints_immutable
      BEFORE UPDATE ON checkpoints
      BEGIN
        SELECT RAISE(ABORT, 'checkpoints are immutable');
      END;

      CREATE TABLE IF NOT EXISTS state_snapshots (
        id TEXT PRIMARY KEY NOT NULL,
        session_id TEXT NOT NULL,
        snapshot_type TEXT NOT NULL CHECK (snapshot_type IN ('full', 'incremental', 'branch')),
        state_data TEXT NOT NULL,
        parent_snapshot_id TEXT,
        branch_id TEXT,
        created_at TEXT NOT NULL,
        description TEXT,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE,
        FOREIGN KEY (parent_snapshot_id) REFERENCES state_snapshots(id) ON DELETE SET NULL,
        FOREIGN KEY (branch_id) REFERENCES branches(id) ON DELETE SET NULL
      );
      CREATE INDEX IF NOT EXISTS idx_snapshots_session ON state_snapshots(session_id);
      CREATE INDEX IF NOT EXISTS idx_snapshots_parent ON state_snapshots(parent_snapshot_id);
    `,
  },
  {
    version: 3,
    name: 'timelines_and_search',
    sql: `
      CREATE TABLE IF NOT EXISTS timelines (
        id TEXT PRIMARY KEY NOT NULL,
        session_id TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        root_branch_id TEXT NOT NULL,
        active_branch_id TEXT NOT NULL,
        state TEXT NOT NULL DEFAULT 'active' CHECK (state IN ('active', 'archived', 'merged')),
        branch_count INTEGER NOT NULL DEFAULT 1,
        max_depth INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        metadata TEXT,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );
      CREATE INDEX IF NOT EXISTS idx_timelines_session ON timelines(session_id);

      CREATE TABLE IF NOT EXISTS timeline_branches (
        branch_id TEXT PRIMARY KEY NOT NULL,
        timeline_id TEXT NOT NULL,
        depth INTEGER NOT NULL DEFAULT 0,
        visit_count INTEGER NOT NULL DEFAULT 0,
        total_value REAL NOT NULL DEFAULT 0.0,
        ucb_score REAL,
        counterfactual_impact REAL,
        mcts_generated INTEGER NOT NULL DEFAULT 0,
        alternatives_explored INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        FOREIGN KEY (branch_id) REFERENCES branches(id) ON DELETE CASCADE,
        FOREIGN KEY (timeline_id) REFERENCES timelines(id) ON DELETE CASCADE
      );
      CREATE INDEX IF NOT EXISTS idx_timeline_branches_timeline ON timeline_branches(timeline_id);

      CREATE TABLE IF NOT EXISTS mcts_nodes (
        id TEXT PRIMARY KEY NOT NULL,
        session_id TEXT NOT NULL,
        timeline_id TEXT,
        branch_id TEXT NOT NULL UNIQUE,
        parent_node_id TEXT,
        content TEXT NOT NULL,
        visit_count INTEGER NOT NULL DEFAULT 0,
        total_value REAL NOT NULL DEFAULT 0.0,
        prior REAL NOT NULL DEFAULT 0.5,
        ucb_score REAL,
        is_expanded INTEGER NOT NULL DEFAULT 0,
        is_terminal INTEGER NOT NULL DEFAULT 0,
        simulation_depth INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        last_visited TEXT NOT NULL,
        metadata TEXT,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE,
        FOREIGN KEY (timeline_id) REFERENCES timelines(id) ON DELETE SET NULL,
        FOREIGN KEY (branch_id) REFERENCES branches(id) ON DELETE CASCADE,
        FOREIGN KEY (parent_node_id) REFERENCES mcts_nodes(id) ON DELETE SET NULL
      );
      CREATE INDEX IF NOT EXISTS idx_mcts_nodes_timeline ON mcts_nodes(timeline_id);
      CREATE INDEX IF NOT EXISTS idx_mcts_nodes_parent ON mcts_nodes(parent_node_id);

      CREATE TABLE IF NOT EXISTS counterfactual_analyses (
        id TEXT PRIMARY KEY NOT NULL,
        session_id TEXT NOT NULL,
        timeline_id TEXT,
        original_branch_id TEXT NOT NULL,
        question TEXT,
        intervention_type TEXT NOT NULL CHECK (intervention_type IN ('change', 'remove', 'replace', 'inject')),
        intervention TEXT NOT NULL,
        target_thought_id TEXT,
        counterfactual_branch_id TEXT NOT NULL,
        outcome_delta REAL NOT NULL,
        causal_attribution REAL NOT NULL,
        confidence REAL NOT NULL,
        comparison TEXT NOT NULL,
        created_at TEXT NOT NULL,
        metadata TEXT,
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE,
        FOREIGN KEY (timeline_id) REFERENCES timelines(id) ON DELETE SET NULL,
        FOREIGN KEY (original_branch_id) REFERENCES branches(id) ON DELETE CASCADE,
        FOREIGN KEY (target_thought_id) REFERENCES thoughts(id) ON DELETE SET NULL,
        FOREIGN KEY (counterfactual_branch_id) REFERENCES branches(id) ON DELETE CASCADE
      );
      CREATE INDEX IF NOT EXISTS idx_counterfactual_session ON counterfactual_analyses(session_id);
      CREATE INDEX IF NOT EXISTS idx_counterfactual_original ON counterfactual_analyses(original_branch_id);
    `,
  },
];

/**
 * Apply every migration newer than the recorded schema version.
 * Returns the versions applied by this call.
 */
export function migrate(db: Db, migrations: Migration[] = MIGRATIONS): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY NOT NULL,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);

  const current = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
    .get();
  const from = current?.version ?? 0;

  const record = db.prepare<[number, string, string]>(
    'INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)',
  );

  const applied: number[] = [];
  const pending = [...migrations].sort((a, b) => a.version - b.version).filter((m) => m.version > from);

  for (const migration of pending) {
    db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.version, migration.name, new Date().toISOString());
    })();
    applied.push(migration.version);
  }

  return applied;
}
