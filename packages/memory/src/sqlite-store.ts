/**
 * @toolgate/memory: SQLite store
 *
 * Persistent MemoryStore on better-sqlite3. Pass ':memory:' for a
 * throwaway database.
 */

import Database from 'better-sqlite3';
import type { AssistantMemory, MemoryStore } from '@toolgate/core';
import { now } from '@toolgate/core';

interface MemoryRow {
  id: number;
  scope_id: string;
  content: string;
  created_at: number;
  updated_at: number;
}

function toMemory(row: MemoryRow): AssistantMemory {
  return {
    id: row.id,
    scopeId: row.scope_id,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// ---------------------------------------------------------------------------
// SqliteMemoryStore
// ---------------------------------------------------------------------------

export class SqliteMemoryStore implements MemoryStore {
  private db: Database.Database;

  constructor(dbPath = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.initialize();
  }

  // -------------------------------------------------------------------------
  // Schema
  // -------------------------------------------------------------------------

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        scope_id   TEXT NOT NULL,
        content    TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_memories_scope
        ON memories (scope_id, id);
    `);
  }

  // -------------------------------------------------------------------------
  // MemoryStore
  // -------------------------------------------------------------------------

  async list(scopeId: string): Promise<AssistantMemory[]> {
    return this.db
      .prepare<[string], MemoryRow>(
        'SELECT * FROM memories WHERE scope_id = ? ORDER BY id ASC',
      )
      .all(scopeId)
      .map(toMemory);
  }

  async add(scopeId: string, content: string): Promise<AssistantMemory> {
    const timestamp = now();
    const row = this.db
      .prepare<{ scopeId: string; content: string; ts: number }, MemoryRow>(`
        INSERT INTO memories (scope_id, content, created_at, updated_at)
        VALUES (@scopeId, @content, @ts, @ts)
        RETURNING *
      `)
      .get({ scopeId, content, ts: timestamp });

    if (!row) throw new Error(`Failed to insert memory for scope ${scopeId}`);
    return toMemory(row);
  }

  async updateContent(id: number, content: string): Promise<AssistantMemory | null> {
    const row = this.db
      .prepare<{ id: number; content: string; ts: number }, MemoryRow>(`
        UPDATE memories SET content = @content, updated_at = @ts
        WHERE id = @id
        RETURNING *
      `)
      .get({ id, content, ts: now() });

    return row ? toMemory(row) : null;
  }

  async delete(id: number): Promise<boolean> {
    const result = this.db.prepare<[number]>('DELETE FROM memories WHERE id = ?').run(id);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
