/**
 * SessionStore: sessions and the thoughts recorded on their branches.
 */

import { EventEmitter } from 'node:events';
import type { Db } from '../storage/database.js';
import { nowIso } from '../storage/database.js';
import { canonicalJson, type JsonObject } from '../storage/json.js';
import { toSession, toThought, type SessionRow, type ThoughtRow } from '../storage/rows.js';
import { NotFoundError, ValidationError } from '../core/errors.js';
import { componentLogger } from '../core/logger.js';
import { newId } from '../utils/ids.js';
import type { Session, Thought } from './types.js';

export interface AddThoughtOptions {
  confidence?: number;
  metadata?: JsonObject;
}

export class SessionStore extends EventEmitter {
  private readonly log = componentLogger('sessions');

  constructor(private readonly db: Db) {
    super();
  }

  createSession(mode: string = 'tree', metadata: JsonObject = {}): Session {
    const now = nowIso();
    const id = newId('ses');
    this.db
      .prepare<[string, string, string, string, string]>(
        'INSERT INTO sessions (id, mode, created_at, updated_at, metadata) VALUES (?, ?, ?, ?, ?)',
      )
      .run(id, mode, now, now, canonicalJson(metadata));

    this.log.debug({ sessionId: id, mode }, 'Session created');
    this.emit('session:created', { sessionId: id });
    return this.requireSession(id);
  }

  getSession(id: string): Session | null {
    const row = this.db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(id);
    return row ? toSession(row) : null;
  }

  requireSession(id: string): Session {
    const session = this.getSession(id);
    if (!session) throw new NotFoundError('Session', id);
    return session;
  }

  /** Delete a session and everything it owns. */
  deleteSession(id: string): void {
    const info = this.db.prepare<[string]>('DELETE FROM sessions WHERE id = ?').run(id);
    if (info.changes === 0) throw new NotFoundError('Session', id);
    this.log.info({ sessionId: id }, 'Session deleted');
  }

  /**
   * Append a thought to the end of a branch.
   */
  addThought(branchId: string, content: string, options: AddThoughtOptions = {}): Thought {
    if (content.trim() === '') {
      throw new ValidationError('Thought content must not be empty', 'content');
    }
    const confidence = options.confidence ?? 0.8;
    if (!(confidence >= 0 && confidence <= 1)) {
      throw new ValidationError(`Thought confidence must be within [0, 1], got ${confidence}`, 'confidence');
    }

    const branch = this.db
      .prepare<[string], { session_id: string }>('SELECT session_id FROM branches WHERE id = ?')
      .get(branchId);
    if (!branch) throw new NotFoundError('Branch', branchId);

    const id = newId('th');
    this.insertThought(id, branch.session_id, branchId, content, confidence, options.metadata ?? {});
    this.log.debug({ thoughtId: id, branchId }, 'Thought added');
    return this.requireThought(id);
  }

  /**
   * Raw insert used inside larger transactions. Position is the next free
   * slot on the branch.
   */
  insertThought(
    id: string,
    sessionId: string,
    branchId: string,
    content: string,
    confidence: number,
    metadata: JsonObject,
  ): void {
    const next = this.db
      .prepare<[string], { next: number }>(
        'SELECT COALESCE(MAX(position) + 1, 0) AS next FROM thoughts WHERE branch_id = ?',
      )
      .get(branchId);

    this.db
      .prepare<[string, string, string, string, number, number, string, string]>(
        `INSERT INTO thoughts (id, session_id, branch_id, content, confidence, position, created_at, metadata)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, sessionId, branchId, content, confidence, next?.next ?? 0, nowIso(), canonicalJson(metadata));
  }

  getThought(id: string): Thought | null {
    const row = this.db.prepare<[string], ThoughtRow>('SELECT * FROM thoughts WHERE id = ?').get(id);
    return row ? toThought(row) : null;
  }

  requireThought(id: string): Thought {
    const thought = this.getThought(id);
    if (!thought) throw new NotFoundError('Thought', id);
    return thought;
  }

  listBranchThoughts(branchId: string): Thought[] {
    return this.db
      .prepare<[string], ThoughtRow>('SELECT * FROM thoughts WHERE branch_id = ? ORDER BY position, created_at')
      .all(branchId)
      .map(toThought);
  }
}
