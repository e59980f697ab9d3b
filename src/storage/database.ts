import Database from 'better-sqlite3';
import { dirname } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { migrate } from './migrations.js';
import { componentLogger } from '../core/logger.js';

export type Db = Database.Database;

/**
 * Open (or create) a thoughtline database and bring its schema up to date.
 * Pass ':memory:' for a throwaway in-process store.
 */
export function openDatabase(path: string = ':memory:'): Db {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);

  if (path !== ':memory:') {
    // WAL keeps readers unblocked while a writer commits
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  db.pragma('foreign_keys = ON');

  const applied = migrate(db);
  componentLogger('storage').debug({ path, applied }, 'Database opened');

  return db;
}

export function nowIso(): string {
  return new Date().toISOString();
}
