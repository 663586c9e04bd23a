/**
 * Human-readable progress and summary output for `threadsmith run` and
 * `threadsmith resume`.
 */

import type { TypedEventBus, Unsubscribe } from '../../core/event-bus.js'
import type { ItemOutcome, RunSummary } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

function plural(count: number, noun: string, nounPlural = `${noun}s`): string {
  return `${String(count)} ${count === 1 ? noun : nounPlural}`
}

function describeFailure(outcome: ItemOutcome): string {
  return outcome.message !== undefined ? `${outcome.reason}: ${outcome.message}` : outcome.reason
}

/**
 * Print one line per run event through `write`.
 * @returns a function that stops printing
 */
export function attachHumanProgress(
  eventBus: TypedEventBus,
  write: (line: string) => void = (line) => process.stdout.write(line + '\n'),
): () => void {
  const detachers: Unsubscribe[] = []
  const on: TypedEventBus['on'] = (event, handler) => {
    const detach = eventBus.on(event, handler)
    detachers.push(detach)
    return detach
  }

  on('run:started', ({ runId, resumed }) => {
    write(`${resumed ? 'Resuming' : 'Starting'} run ${runId}`)
  })
  on('run:planned', ({ batches }) => {
    const items = batches.reduce((sum, batch) => sum + batch.length, 0)
    write(`Planned ${plural(items, 'item')} in ${plural(batches.length, 'batch', 'batches')}`)
  })
  on('item:started', ({ itemId, filePath }) => {
    write(`→ ${itemId} (${filePath})`)
  })
  on('item:iteration', ({ iteration, judgment }) => {
    const verdict = judgment.passed ? 'passed' : 'below threshold'
    write(`  iteration ${String(iteration)}: score ${judgment.score.toFixed(2)} (${verdict})`)
  })
  on('item:accepted', ({ outcome }) => {
    write(`✓ ${outcome.itemId} accepted after ${plural(outcome.iterations, 'iteration')}`)
  })
  on('item:exhausted', ({ outcome }) => {
    write(`✗ ${outcome.itemId} failed (${describeFailure(outcome)})`)
  })
  on('item:skipped', ({ outcome }) => {
    write(`- ${outcome.itemId} skipped (${describeFailure(outcome)})`)
  })
  on('item:restored', ({ itemId }) => {
    write(`✓ ${itemId} already done`)
  })
  on('transport:retry', ({ itemId, operation, attempt, message }) => {
    write(`  retrying ${operation} for ${itemId ?? 'plan'} after attempt ${String(attempt)}: ${message}`)
  })

  return () => {
    for (const detach of detachers) detach()
  }
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

/**
 * Render the final report of a run.
 *
 * Output:
 *  - Header: Run <id>: <n>/<total> item(s) succeeded
 *  - One line per outcome in execution order
 */
export function renderRunSummary(summary: RunSummary): string {
  const lines: string[] = []
  const total = summary.outcomes.length
  lines.push(`Run ${summary.runId}: ${String(summary.succeeded.length)}/${String(total)} item(s) succeeded`)

  for (const outcome of summary.outcomes) {
    if (outcome.status === 'done') {
      lines.push(`  [x] ${outcome.itemId}  ${outcome.filePath}  (${plural(outcome.iterations, 'iteration')})`)
    } else {
      lines.push(`  [!] ${outcome.itemId}  ${outcome.filePath}  ${describeFailure(outcome)}`)
    }
  }

  return lines.join('\n')
}
