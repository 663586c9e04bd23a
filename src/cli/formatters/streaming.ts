/**
 * StreamingFormatter: NDJSON event emitter for the `threadsmith run`,
 * `resume` and `status` commands.
 *
 * Writes newline-delimited JSON events to stdout as the run progresses.
 * Each event follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { OrchestratorEvents } from '../../core/event-bus.types.js'

// ---------------------------------------------------------------------------
// emitEvent
// ---------------------------------------------------------------------------

/**
 * Write a single NDJSON event to stdout.
 *
 * @param event - Event name (e.g. "run:planned", "item:accepted")
 * @param data  - Event payload data
 */
export function emitEvent(event: string, data: Record<string, unknown>): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

// ---------------------------------------------------------------------------
// streamRunEvents
// ---------------------------------------------------------------------------

/** Bus events forwarded to stdout in json mode */
export const STREAMED_EVENTS = [
  'run:started',
  'run:planned',
  'item:started',
  'item:iteration',
  'item:accepted',
  'item:exhausted',
  'item:skipped',
  'item:restored',
  'transport:retry',
  'run:complete',
  'run:aborted',
] as const satisfies ReadonlyArray<keyof OrchestratorEvents>

/**
 * Forward every run event on the bus to stdout as NDJSON.
 * @returns a function that stops forwarding
 */
export function streamRunEvents(eventBus: TypedEventBus): () => void {
  const detachers = STREAMED_EVENTS.map((name) =>
    eventBus.on(name, (payload: OrchestratorEvents[typeof name]) => {
      emitEvent(name, payload)
    }),
  )
  return () => {
    for (const detach of detachers) detach()
  }
}
