/**
 * Human-readable status formatter for the `threadsmith status` command.
 *
 * Renders a RunStatusSnapshot as a header, an item-count table and one line
 * per work item.
 */

import type { LoadedRun } from '../../persistence/index.js'
import type { ItemStatusView, RunStatusSnapshot } from '../types/status.js'

// ---------------------------------------------------------------------------
// buildStatusSnapshot
// ---------------------------------------------------------------------------

export function buildStatusSnapshot(loaded: LoadedRun): RunStatusSnapshot {
  const { run } = loaded
  const items: ItemStatusView[] = [...loaded.items]
    .sort((a, b) => a.position - b.position)
    .map((state) => ({
      id: state.definition.id,
      filePath: state.definition.filePath,
      mode: state.definition.mode,
      status: state.status,
      reason: state.reason,
      iterations: state.iterationCount,
      score: state.lastJudgment?.score ?? null,
      message: state.message,
    }))

  const count = (status: ItemStatusView['status']): number =>
    items.filter((item) => item.status === status).length

  return {
    runId: run.id,
    status: run.status,
    request: run.request,
    createdAt: run.createdAt,
    updatedAt: run.updatedAt,
    error:
      run.errorCode !== null ? { code: run.errorCode, message: run.errorMessage ?? '' } : null,
    itemCounts: {
      total: items.length,
      pending: count('pending'),
      inProgress: count('in_progress'),
      done: count('done'),
      failed: count('failed'),
    },
    items,
  }
}

// ---------------------------------------------------------------------------
// renderStatusHuman
// ---------------------------------------------------------------------------

/**
 * Status symbols:
 *   [ ]  pending
 *   [>]  in progress
 *   [x]  done
 *   [!]  failed
 */
function statusSymbol(status: ItemStatusView['status']): string {
  switch (status) {
    case 'pending': return '[ ]'
    case 'in_progress': return '[>]'
    case 'done': return '[x]'
    case 'failed': return '[!]'
  }
}

function renderItem(item: ItemStatusView): string {
  const parts = [`  ${statusSymbol(item.status)} ${item.id}  ${item.filePath}`]
  if (item.iterations > 0) {
    parts.push(`iterations: ${String(item.iterations)}`)
  }
  if (item.score !== null) {
    parts.push(`score: ${item.score.toFixed(2)}`)
  }
  if (item.status === 'failed' && item.reason !== null) {
    parts.push(item.message !== null ? `${item.reason}: ${item.message}` : item.reason)
  }
  return parts.join('  ')
}

/**
 * Render a full human-readable status report from a snapshot.
 *
 * Output sections:
 *  - Header: Run <id>  Status: <status>
 *  - Request, timestamps and the recorded error, if any
 *  - Item counts table: Pending | In progress | Done | Failed | Total
 *  - One line per item in plan order
 */
export function renderStatusHuman(snapshot: RunStatusSnapshot): string {
  const lines: string[] = []

  lines.push(`Run ${snapshot.runId}  Status: ${snapshot.status}`)
  lines.push(`Request: ${snapshot.request}`)
  lines.push(`Created: ${snapshot.createdAt}  Updated: ${snapshot.updatedAt}`)
  if (snapshot.error !== null) {
    lines.push(`Error: [${snapshot.error.code}] ${snapshot.error.message}`)
  }
  lines.push('')

  const headers = ['Pending', 'In progress', 'Done', 'Failed', 'Total']
  const values = [
    String(snapshot.itemCounts.pending),
    String(snapshot.itemCounts.inProgress),
    String(snapshot.itemCounts.done),
    String(snapshot.itemCounts.failed),
    String(snapshot.itemCounts.total),
  ]
  const colWidths = headers.map((h, i) => Math.max(h.length, (values[i] ?? '').length))
  const row = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(colWidths[i] ?? cell.length)).join('  ').trimEnd()

  lines.push(row(headers))
  lines.push(colWidths.map((w) => '-'.repeat(w)).join('  '))
  lines.push(row(values))

  if (snapshot.items.length > 0) {
    lines.push('')
    lines.push('Items:')
    for (const item of snapshot.items) {
      lines.push(renderItem(item))
    }
  }

  return lines.join('\n')
}
