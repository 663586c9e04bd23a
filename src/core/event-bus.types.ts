/**
 * OrchestratorEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {scope}:{action} (e.g. "item:accepted", "run:complete")
 */

import type {
  ItemOutcome,
  QualityJudgment,
  RunId,
  RunSummary,
  WorkItemId,
} from './types.js'

/** Capability calls retried on transport failure */
export type TransportOperation = 'plan' | 'retrieve' | 'generate' | 'review'

/**
 * Complete typed map of all events emitted on the orchestrator event bus.
 * Use `keyof OrchestratorEvents` to constrain event keys.
 */
export interface OrchestratorEvents {
  // -------------------------------------------------------------------------
  // Run lifecycle
  // -------------------------------------------------------------------------

  /** A run has been created and planning is about to start */
  'run:started': { runId: RunId; request: string; resumed: boolean }

  /** The plan was validated and scheduled into batches of item ids */
  'run:planned': { runId: RunId; batches: WorkItemId[][] }

  /** Every work item reached a terminal state */
  'run:complete': { runId: RunId; summary: RunSummary }

  /** The run was aborted by a fatal error */
  'run:aborted': { runId: RunId; code: string; message: string }

  // -------------------------------------------------------------------------
  // Work item lifecycle
  // -------------------------------------------------------------------------

  /** Iteration loop started for a work item */
  'item:started': { runId: RunId; itemId: WorkItemId; filePath: string }

  /** One generate → review round finished */
  'item:iteration': {
    runId: RunId
    itemId: WorkItemId
    iteration: number
    judgment: QualityJudgment
    promptTokens: number
  }

  /** Candidate passed review */
  'item:accepted': { runId: RunId; outcome: ItemOutcome }

  /** Iteration or transport budget exhausted */
  'item:exhausted': { runId: RunId; outcome: ItemOutcome }

  /** Item not attempted because a dependency did not complete */
  'item:skipped': { runId: RunId; outcome: ItemOutcome }

  /** Already done in a previous attempt of the same run */
  'item:restored': { runId: RunId; itemId: WorkItemId }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  /** A Planner/prompt/Generator/Reviewer call failed and will be retried */
  'transport:retry': {
    /** null for planning */
    itemId: WorkItemId | null
    operation: TransportOperation
    attempt: number
    delayMs: number
    message: string
  }
}
