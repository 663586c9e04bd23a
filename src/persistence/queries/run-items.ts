/**
 * Run item query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { RunItemRowSchema, type RunItemRow } from '../schemas/checkpoint.js'
import { parseRow } from './parse-row.js'

export type RunItemWrite = Omit<RunItemRow, 'updated_at'>

/**
 * Insert or replace the checkpointed state of one item.
 */
export function upsertRunItem(db: BetterSqlite3Database, item: RunItemWrite): void {
  db.prepare(
    `INSERT INTO run_items (
       run_id, item_id, position, definition_json, status, iteration_count,
       last_judgment_json, result, reason, message
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT (run_id, item_id) DO UPDATE SET
       position = excluded.position,
       definition_json = excluded.definition_json,
       status = excluded.status,
       iteration_count = excluded.iteration_count,
       last_judgment_json = excluded.last_judgment_json,
       result = excluded.result,
       reason = excluded.reason,
       message = excluded.message,
       updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`,
  ).run(
    item.run_id,
    item.item_id,
    item.position,
    item.definition_json,
    item.status,
    item.iteration_count,
    item.last_judgment_json,
    item.result,
    item.reason,
    item.message,
  )
}

/**
 * All items of a run in plan order.
 */
export function getRunItems(db: BetterSqlite3Database, runId: string): RunItemRow[] {
  return db
    .prepare('SELECT * FROM run_items WHERE run_id = ? ORDER BY position ASC')
    .all(runId)
    .map((row) => parseRow(RunItemRowSchema, row, 'run_items'))
}
