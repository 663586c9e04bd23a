/**
 * Migration 001: Run schema.
 *
 * `runs` holds one row per orchestration run; `run_items` holds the
 * checkpointed state of each planned work item.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const runSchemaMigration: Migration = {
  version: 1,
  name: '001-run-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id             TEXT PRIMARY KEY,
        request        TEXT NOT NULL,
        status         TEXT NOT NULL DEFAULT 'planning',
        plan_json      TEXT,
        batches_json   TEXT,
        cursor_json    TEXT,
        error_code     TEXT,
        error_message  TEXT,
        created_at     TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        updated_at     TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );

      CREATE INDEX IF NOT EXISTS idx_runs_created ON runs(created_at);

      CREATE TABLE IF NOT EXISTS run_items (
        run_id              TEXT    NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        item_id             TEXT    NOT NULL,
        position            INTEGER NOT NULL,
        definition_json     TEXT    NOT NULL,
        status              TEXT    NOT NULL DEFAULT 'pending',
        iteration_count     INTEGER NOT NULL DEFAULT 0,
        last_judgment_json  TEXT,
        result              TEXT,
        reason              TEXT,
        message             TEXT,
        updated_at          TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        PRIMARY KEY (run_id, item_id)
      );

      CREATE INDEX IF NOT EXISTS idx_run_items_status ON run_items(run_id, status);
    `)
  },
}
