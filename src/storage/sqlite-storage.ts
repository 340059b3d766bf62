/**
 * SQLite-backed DataStorage using better-sqlite3.
 *
 * One row per user for the engine state, one row per interaction. The
 * driver is synchronous; every call still returns a promise so the
 * storage satisfies the async capability contract.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { DataStorage } from '../container/capabilities.js';
import type { ContainerState, InteractionEvent } from '../container/types.js';
import { createInteractionEvent } from '../container/types.js';
import { ContainerError, StorageError, toError } from '../core/errors.js';

const StateRowSchema = z.object({
  payload: z.instanceof(Uint8Array),
  version: z.number().int(),
});

const InteractionRowSchema = z.object({
  user_id: z.string(),
  type: z.string(),
  attributes: z.string(),
  timestamp: z.number().int(),
});

const AttributesSchema = z.record(z.string());

export class SqliteDataStorage implements DataStorage {
  private db: Database.Database | null = null;

  /** @param dbPath file path, or ":memory:" */
  constructor(private readonly dbPath: string = ':memory:') {}

  async initialize(): Promise<void> {
    if (this.db) return;

    this.run('initialize', () => {
      if (this.dbPath !== ':memory:') {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }

      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');

      db.exec(`
        CREATE TABLE IF NOT EXISTS container_state (
          user_id    TEXT PRIMARY KEY,
          payload    BLOB NOT NULL,
          version    INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS interactions (
          id         INTEGER PRIMARY KEY AUTOINCREMENT,
          user_id    TEXT NOT NULL,
          type       TEXT NOT NULL,
          attributes TEXT NOT NULL,
          timestamp  INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_interactions_user_ts
          ON interactions (user_id, timestamp DESC, id DESC);

        CREATE INDEX IF NOT EXISTS idx_interactions_user_type_ts
          ON interactions (user_id, type, timestamp DESC, id DESC);
      `);

      this.db = db;
    });
  }

  async saveState(userId: string, state: ContainerState): Promise<void> {
    const db = this.requireDb('saveState');
    this.run('saveState', () => {
      db.prepare(`
        INSERT INTO container_state (user_id, payload, version, updated_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT (user_id) DO UPDATE SET
          payload = excluded.payload,
          version = excluded.version,
          updated_at = excluded.updated_at
      `).run(userId, Buffer.from(state.payload), state.version, Date.now());
    });
  }

  async loadState(userId: string): Promise<ContainerState | null> {
    const db = this.requireDb('loadState');
    return this.run('loadState', () => {
      const row: unknown = db
        .prepare('SELECT payload, version FROM container_state WHERE user_id = ?')
        .get(userId);
      if (row === undefined) return null;

      const parsed = StateRowSchema.parse(row);
      return { payload: new Uint8Array(parsed.payload), version: parsed.version };
    });
  }

  async saveInteraction(event: InteractionEvent): Promise<void> {
    const db = this.requireDb('saveInteraction');
    this.run('saveInteraction', () => {
      db.prepare(`
        INSERT INTO interactions (user_id, type, attributes, timestamp)
        VALUES (?, ?, ?, ?)
      `).run(event.userId, event.type, JSON.stringify(event.attributes), event.timestamp);
    });
  }

  async loadRecent(userId: string, limit: number, type?: string): Promise<InteractionEvent[]> {
    const db = this.requireDb('loadRecent');
    return this.run('loadRecent', () => {
      const rows: unknown[] = type === undefined
        ? db.prepare(`
            SELECT user_id, type, attributes, timestamp FROM interactions
            WHERE user_id = ?
            ORDER BY timestamp DESC, id DESC
            LIMIT ?
          `).all(userId, Math.max(0, limit))
        : db.prepare(`
            SELECT user_id, type, attributes, timestamp FROM interactions
            WHERE user_id = ? AND type = ?
            ORDER BY timestamp DESC, id DESC
            LIMIT ?
          `).all(userId, type, Math.max(0, limit));

      return rows.map((raw) => {
        const row = InteractionRowSchema.parse(raw);
        return createInteractionEvent({
          type: row.type,
          attributes: AttributesSchema.parse(JSON.parse(row.attributes)),
          timestamp: row.timestamp,
          userId: row.user_id,
        });
      });
    });
  }

  async deleteUserData(userId: string): Promise<void> {
    const db = this.requireDb('deleteUserData');
    this.run('deleteUserData', () => {
      db.transaction((id: string) => {
        db.prepare('DELETE FROM interactions WHERE user_id = ?').run(id);
        db.prepare('DELETE FROM container_state WHERE user_id = ?').run(id);
      })(userId);
    });
  }

  async release(): Promise<void> {
    const db = this.db;
    this.db = null;
    if (db) {
      this.run('release', () => {
        db.close();
      });
    }
  }

  /** Stored interaction count for a user */
  async interactionCount(userId: string): Promise<number> {
    const db = this.requireDb('interactionCount');
    return this.run('interactionCount', () => {
      const row = z.object({ n: z.number() }).parse(
        db.prepare('SELECT COUNT(*) AS n FROM interactions WHERE user_id = ?').get(userId),
      );
      return row.n;
    });
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  private requireDb(operation: string): Database.Database {
    if (!this.db) {
      throw new StorageError('Storage is not initialized', operation);
    }
    return this.db;
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ContainerError) throw err;
      const cause = toError(err);
      throw new StorageError(`SQLite ${operation} failed: ${cause.message}`, operation, undefined, cause);
    }
  }
}
