/**
 * Types for the `threadsmith status` command.
 */

import type { OutcomeReason, RunStatus, WorkItemStatus } from '../../core/types.js'

// ---------------------------------------------------------------------------
// RunStatusSnapshot
// ---------------------------------------------------------------------------

/** One work item as shown by `status` */
export type ItemStatusView = {
  id: string
  filePath: string
  mode: string
  status: WorkItemStatus
  reason: OutcomeReason | null
  iterations: number
  score: number | null
  message: string | null
}

/**
 * Status of one run, built from its checkpoint and serialised in NDJSON
 * output.
 */
export type RunStatusSnapshot = {
  runId: string
  status: RunStatus
  request: string
  createdAt: string
  updatedAt: string
  error: { code: string; message: string } | null
  itemCounts: {
    total: number
    pending: number
    inProgress: number
    done: number
    failed: number
  }
  /** In plan order */
  items: ItemStatusView[]
}
