/**
 * Context log query functions for the SQLite persistence layer.
 *
 * Hierarchy records are upserted (a task gains its result later); items are
 * append-only and inserted once per sequence number.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  ContextCategorySchema,
  type ActivityRecord,
  type ContextSnapshot,
  type SessionRecord,
  type TaskRecord,
} from '../../modules/context-store/index.js'
import {
  ContextActivityRowSchema,
  ContextItemRowSchema,
  ContextSessionRowSchema,
  ContextTaskRowSchema,
  TagsSchema,
} from '../schemas/checkpoint.js'
import { parseJsonColumn, parseRow } from './parse-row.js'

/**
 * Write every record and item of a snapshot that is not yet stored for the
 * run. Callers wrap this in a transaction together with the item state.
 */
export function saveContextRecords(
  db: BetterSqlite3Database,
  runId: string,
  snapshot: Omit<ContextSnapshot, 'cursor'>,
): void {
  const upsertSession = db.prepare(
    `INSERT INTO context_sessions (run_id, id, original_request, high_level_plan, created_at)
     VALUES (?, ?, ?, ?, ?)
     ON CONFLICT (run_id, id) DO UPDATE SET
       original_request = excluded.original_request,
       high_level_plan = excluded.high_level_plan`,
  )
  const upsertActivity = db.prepare(
    `INSERT INTO context_activities
       (run_id, id, session_id, description, tags_json, mode, component, planner_analysis, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT (run_id, id) DO NOTHING`,
  )
  const upsertTask = db.prepare(
    `INSERT INTO context_tasks (run_id, id, activity_id, description, tags_json, result, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT (run_id, id) DO UPDATE SET result = excluded.result`,
  )
  const insertItem = db.prepare(
    `INSERT INTO context_items (run_id, seq, id, content, category, tags_json, parent_id, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT (run_id, seq) DO NOTHING`,
  )

  for (const s of snapshot.sessions) {
    upsertSession.run(runId, s.id, s.originalRequest, s.highLevelPlan, s.createdAt)
  }
  for (const a of snapshot.activities) {
    upsertActivity.run(
      runId,
      a.id,
      a.sessionId,
      a.description,
      JSON.stringify(a.tags),
      a.mode,
      a.component,
      a.plannerAnalysis,
      a.createdAt,
    )
  }
  for (const t of snapshot.tasks) {
    upsertTask.run(runId, t.id, t.activityId, t.description, JSON.stringify(t.tags), t.result, t.createdAt)
  }
  for (const item of snapshot.items) {
    insertItem.run(
      runId,
      item.seq,
      item.id,
      item.content,
      item.category,
      JSON.stringify(item.tags),
      item.parentId,
      item.createdAt,
    )
  }
}

/**
 * Replace everything stored for a run with a snapshot's records.
 */
export function replaceContextRecords(
  db: BetterSqlite3Database,
  runId: string,
  snapshot: Omit<ContextSnapshot, 'cursor'>,
): void {
  for (const table of ['context_items', 'context_tasks', 'context_activities', 'context_sessions']) {
    db.prepare(`DELETE FROM ${table} WHERE run_id = ?`).run(runId)
  }
  saveContextRecords(db, runId, snapshot)
}

export function loadContextRecords(
  db: BetterSqlite3Database,
  runId: string,
): Omit<ContextSnapshot, 'cursor'> {
  const sessions: SessionRecord[] = db
    .prepare('SELECT * FROM context_sessions WHERE run_id = ? ORDER BY rowid')
    .all(runId)
    .map((raw) => {
      const row = parseRow(ContextSessionRowSchema, raw, 'context_sessions')
      return {
        id: row.id,
        originalRequest: row.original_request,
        highLevelPlan: row.high_level_plan,
        createdAt: row.created_at,
      }
    })

  const activities: ActivityRecord[] = db
    .prepare('SELECT * FROM context_activities WHERE run_id = ? ORDER BY rowid')
    .all(runId)
    .map((raw) => {
      const row = parseRow(ContextActivityRowSchema, raw, 'context_activities')
      return {
        id: row.id,
        sessionId: row.session_id,
        description: row.description,
        tags: parseJsonColumn(TagsSchema, row.tags_json, 'context_activities', 'tags_json'),
        mode: row.mode,
        component: row.component,
        plannerAnalysis: row.planner_analysis,
        createdAt: row.created_at,
      }
    })

  const tasks: TaskRecord[] = db
    .prepare('SELECT * FROM context_tasks WHERE run_id = ? ORDER BY rowid')
    .all(runId)
    .map((raw) => {
      const row = parseRow(ContextTaskRowSchema, raw, 'context_tasks')
      return {
        id: row.id,
        activityId: row.activity_id,
        description: row.description,
        tags: parseJsonColumn(TagsSchema, row.tags_json, 'context_tasks', 'tags_json'),
        result: row.result,
        createdAt: row.created_at,
      }
    })

  const items: ContextSnapshot['items'] = db
    .prepare('SELECT * FROM context_items WHERE run_id = ? ORDER BY seq')
    .all(runId)
    .map((raw) => {
      const row = parseRow(ContextItemRowSchema, raw, 'context_items')
      return {
        id: row.id,
        seq: row.seq,
        content: row.content,
        category: parseRow(ContextCategorySchema, row.category, 'context_items.category'),
        tags: parseJsonColumn(TagsSchema, row.tags_json, 'context_items', 'tags_json'),
        parentId: row.parent_id,
        createdAt: row.created_at,
      }
    })

  return { sessions, activities, tasks, items }
}
