/**
 * CheckpointStore: durable run state for resumable orchestration.
 *
 * Every item transition is written in a single transaction together with
 * the context records created since the previous checkpoint, so a crash
 * between items never leaves item state and context log out of step.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { CheckpointError, ThreadsmithError } from '../core/errors.js'
import type {
  OutcomeReason,
  Plan,
  QualityJudgment,
  RunId,
  RunStatus,
  WorkItemDefinition,
  WorkItemStatus,
} from '../core/types.js'
import { ContextCursorSchema, type ContextSnapshot } from '../modules/context-store/index.js'
import { PlanDefinitionSchema } from '../modules/dependency-scheduler/index.js'
import { createLogger } from '../utils/logger.js'
import { loadContextRecords, replaceContextRecords, saveContextRecords } from './queries/context.js'
import { parseJsonColumn } from './queries/parse-row.js'
import { getRunItems, upsertRunItem } from './queries/run-items.js'
import { countRunItemsByStatus, getRun, insertRun, listRuns, updateRun } from './queries/runs.js'
import { BatchesSchema, QualityJudgmentSchema, type RunItemRow, type RunRow } from './schemas/checkpoint.js'

const logger = createLogger('persistence:checkpoint')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunRecord {
  id: RunId
  request: string
  status: RunStatus
  plan: Plan | null
  batches: number[][] | null
  errorCode: string | null
  errorMessage: string | null
  createdAt: string
  updatedAt: string
  /** Item counts per status */
  itemCounts: Partial<Record<WorkItemStatus, number>>
}

export interface RunItemState {
  definition: WorkItemDefinition
  /** Index in the plan */
  position: number
  status: WorkItemStatus
  iterationCount: number
  lastJudgment: QualityJudgment | null
  result: string | null
  reason: OutcomeReason | null
  message: string | null
}

export interface LoadedRun {
  run: RunRecord
  items: RunItemState[]
  context: ContextSnapshot
}

export interface CheckpointStore {
  createRun(runId: RunId, request: string): void
  /** Record the validated plan and write every item as pending */
  recordPlan(runId: RunId, plan: Plan, batches: number[][], context: ContextSnapshot): void
  /** Persist one item's state together with the current context log */
  saveItem(runId: RunId, item: RunItemState, context: ContextSnapshot): void
  setRunStatus(runId: RunId, status: RunStatus, error?: ThreadsmithError): void
  /** Accepts a unique id prefix */
  loadRun(runId: string): LoadedRun | undefined
  listRuns(limit?: number): RunRecord[]
}

// ---------------------------------------------------------------------------
// SqliteCheckpointStore
// ---------------------------------------------------------------------------

export class SqliteCheckpointStore implements CheckpointStore {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  createRun(runId: RunId, request: string): void {
    this._write('create run', runId, () => {
      insertRun(this._db, { id: runId, request })
    })
  }

  recordPlan(runId: RunId, plan: Plan, batches: number[][], context: ContextSnapshot): void {
    this._write('record plan', runId, () => {
      this._requireRun(runId)
      updateRun(this._db, runId, {
        status: 'running',
        plan_json: JSON.stringify(plan),
        batches_json: JSON.stringify(batches),
        cursor_json: JSON.stringify(context.cursor),
      })
      plan.items.forEach((definition, position) => {
        upsertRunItem(this._db, toRow(runId, {
          definition,
          position,
          status: 'pending',
          iterationCount: 0,
          lastJudgment: null,
          result: null,
          reason: null,
          message: null,
        }))
      })
      replaceContextRecords(this._db, runId, context)
    })
  }

  saveItem(runId: RunId, item: RunItemState, context: ContextSnapshot): void {
    this._write('save item', runId, () => {
      this._requireRun(runId)
      upsertRunItem(this._db, toRow(runId, item))
      saveContextRecords(this._db, runId, context)
      updateRun(this._db, runId, { cursor_json: JSON.stringify(context.cursor) })
    })
    logger.debug({ runId, itemId: item.definition.id, status: item.status }, 'Item checkpointed')
  }

  setRunStatus(runId: RunId, status: RunStatus, error?: ThreadsmithError): void {
    this._write('set run status', runId, () => {
      this._requireRun(runId)
      updateRun(this._db, runId, {
        status,
        error_code: error?.code ?? null,
        error_message: error?.message ?? null,
      })
    })
  }

  loadRun(runId: string): LoadedRun | undefined {
    const row = getRun(this._db, runId)
    if (row === undefined) return undefined

    const run = this._toRecord(row)
    const items = getRunItems(this._db, row.id).map(fromRow)
    const cursor =
      row.cursor_json !== null
        ? parseJsonColumn(ContextCursorSchema, row.cursor_json, 'runs', 'cursor_json')
        : { sessionId: null, activityId: null, taskId: null }
    return { run, items, context: { ...loadContextRecords(this._db, row.id), cursor } }
  }

  listRuns(limit = 20): RunRecord[] {
    return listRuns(this._db, limit).map((row) => this._toRecord(row))
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _toRecord(row: RunRow): RunRecord {
    return {
      id: row.id,
      request: row.request,
      status: row.status,
      plan: row.plan_json !== null ? parseJsonColumn(PlanDefinitionSchema, row.plan_json, 'runs', 'plan_json') : null,
      batches:
        row.batches_json !== null ? parseJsonColumn(BatchesSchema, row.batches_json, 'runs', 'batches_json') : null,
      errorCode: row.error_code,
      errorMessage: row.error_message,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      itemCounts: countRunItemsByStatus(this._db, row.id),
    }
  }

  private _requireRun(runId: RunId): void {
    if (this._db.prepare('SELECT 1 FROM runs WHERE id = ?').get(runId) === undefined) {
      throw new CheckpointError(`Unknown run "${runId}"`, { runId })
    }
  }

  private _write(operation: string, runId: RunId, fn: () => void): void {
    try {
      this._db.transaction(fn)()
    } catch (err) {
      if (err instanceof CheckpointError) throw err
      throw new CheckpointError(`Checkpoint write failed (${operation}): ${err instanceof Error ? err.message : String(err)}`, {
        runId,
        operation,
      })
    }
  }
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toRow(runId: RunId, item: RunItemState): Omit<RunItemRow, 'updated_at'> {
  return {
    run_id: runId,
    item_id: item.definition.id,
    position: item.position,
    definition_json: JSON.stringify(item.definition),
    status: item.status,
    iteration_count: item.iterationCount,
    last_judgment_json: item.lastJudgment !== null ? JSON.stringify(item.lastJudgment) : null,
    result: item.result,
    reason: item.reason,
    message: item.message,
  }
}

const WorkItemDefinitionRowSchema = PlanDefinitionSchema.shape.items.element

function fromRow(row: RunItemRow): RunItemState {
  return {
    definition: parseJsonColumn(WorkItemDefinitionRowSchema, row.definition_json, 'run_items', 'definition_json'),
    position: row.position,
    status: row.status,
    iterationCount: row.iteration_count,
    lastJudgment:
      row.last_judgment_json !== null
        ? parseJsonColumn(QualityJudgmentSchema, row.last_judgment_json, 'run_items', 'last_judgment_json')
        : null,
    result: row.result,
    reason: row.reason,
    message: row.message,
  }
}

export function createCheckpointStore(db: BetterSqlite3Database): CheckpointStore {
  return new SqliteCheckpointStore(db)
}
