/**
 * Run query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { RunStatus, WorkItemStatus } from '../../core/types.js'
import { RunItemCountRowSchema, RunRowSchema, type RunRow } from '../schemas/checkpoint.js'
import { parseRow } from './parse-row.js'

export type RunUpdate = Partial<
  Pick<RunRow, 'status' | 'plan_json' | 'batches_json' | 'cursor_json' | 'error_code' | 'error_message'>
>

const UPDATABLE_COLUMNS = [
  'status',
  'plan_json',
  'batches_json',
  'cursor_json',
  'error_code',
  'error_message',
] as const

/**
 * Insert a new run in status 'planning'.
 */
export function insertRun(db: BetterSqlite3Database, run: { id: string; request: string }): void {
  db.prepare('INSERT INTO runs (id, request) VALUES (?, ?)').run(run.id, run.request)
}

/**
 * Update the given columns of a run and bump updated_at.
 * @returns Whether a run with that id exists
 */
export function updateRun(db: BetterSqlite3Database, runId: string, updates: RunUpdate): boolean {
  const setClauses: string[] = []
  const values: (string | null)[] = []

  for (const column of UPDATABLE_COLUMNS) {
    const value = updates[column]
    if (value !== undefined) {
      setClauses.push(`${column} = ?`)
      values.push(value)
    }
  }

  setClauses.push("updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')")
  values.push(runId)

  const info = db.prepare(`UPDATE runs SET ${setClauses.join(', ')} WHERE id = ?`).run(...values)
  return info.changes > 0
}

export function setRunStatus(db: BetterSqlite3Database, runId: string, status: RunStatus): boolean {
  return updateRun(db, runId, { status })
}

/**
 * Get a run by its exact ID, or by a unique prefix of it.
 */
export function getRun(db: BetterSqlite3Database, runId: string): RunRow | undefined {
  const exact: unknown = db.prepare('SELECT * FROM runs WHERE id = ?').get(runId)
  if (exact !== undefined) return parseRow(RunRowSchema, exact, 'runs')

  const matches = db
    .prepare("SELECT * FROM runs WHERE id LIKE ? ESCAPE '\\' LIMIT 2")
    .all(`${escapeLike(runId)}%`)
  const [only] = matches
  return matches.length === 1 ? parseRow(RunRowSchema, only, 'runs') : undefined
}

/**
 * List runs, most recent first.
 */
export function listRuns(db: BetterSqlite3Database, limit = 20): RunRow[] {
  return db
    .prepare('SELECT * FROM runs ORDER BY created_at DESC, rowid DESC LIMIT ?')
    .all(limit)
    .map((row) => parseRow(RunRowSchema, row, 'runs'))
}

/**
 * Count a run's items per status.
 */
export function countRunItemsByStatus(
  db: BetterSqlite3Database,
  runId: string,
): Partial<Record<WorkItemStatus, number>> {
  const counts: Partial<Record<WorkItemStatus, number>> = {}
  const rows = db
    .prepare('SELECT status, COUNT(*) AS count FROM run_items WHERE run_id = ? GROUP BY status')
    .all(runId)
  for (const row of rows) {
    const parsed = parseRow(RunItemCountRowSchema, row, 'run_items')
    counts[parsed.status] = parsed.count
  }
  return counts
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}
