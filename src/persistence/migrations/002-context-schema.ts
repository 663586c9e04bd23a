/**
 * Migration 002: Context log schema.
 *
 * Mirrors the in-memory context store per run so a run can be resumed with
 * the history it had built up.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const contextSchemaMigration: Migration = {
  version: 2,
  name: '002-context-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS context_sessions (
        run_id           TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        id               TEXT NOT NULL,
        original_request TEXT NOT NULL,
        high_level_plan  TEXT NOT NULL,
        created_at       TEXT NOT NULL,
        PRIMARY KEY (run_id, id)
      );

      CREATE TABLE IF NOT EXISTS context_activities (
        run_id           TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        id               TEXT NOT NULL,
        session_id       TEXT NOT NULL,
        description      TEXT NOT NULL,
        tags_json        TEXT NOT NULL,
        mode             TEXT NOT NULL,
        component        TEXT NOT NULL,
        planner_analysis TEXT NOT NULL,
        created_at       TEXT NOT NULL,
        PRIMARY KEY (run_id, id)
      );

      CREATE TABLE IF NOT EXISTS context_tasks (
        run_id      TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        id          TEXT NOT NULL,
        activity_id TEXT NOT NULL,
        description TEXT NOT NULL,
        tags_json   TEXT NOT NULL,
        result      TEXT,
        created_at  TEXT NOT NULL,
        PRIMARY KEY (run_id, id)
      );

      CREATE TABLE IF NOT EXISTS context_items (
        run_id     TEXT    NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        seq        INTEGER NOT NULL,
        id         TEXT    NOT NULL,
        content    TEXT    NOT NULL,
        category   TEXT    NOT NULL,
        tags_json  TEXT    NOT NULL,
        parent_id  TEXT,
        created_at TEXT    NOT NULL,
        PRIMARY KEY (run_id, seq)
      );
    `)
  },
}
