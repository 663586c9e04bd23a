/**
 * Orchestrator interface.
 *
 * Drives one request from planning to a RunSummary: plan, schedule, then run
 * the iteration loop for every work item in dependency order, checkpointing
 * after each item.
 */

import type { RunSummary } from '../../core/types.js'

export interface RunOptions {
  /** Run id to use instead of a generated one */
  runId?: string
}

export interface Orchestrator {
  /**
   * Plan and execute a request.
   *
   * Item-level failures (quality, transport, failed dependencies) are
   * reported in the summary. Run-fatal errors mark the run `invalid` or
   * `aborted` and are rethrown.
   */
  run(request: string, options?: RunOptions): Promise<RunSummary>

  /**
   * Continue a checkpointed run. Items already `done` are restored; every
   * other item runs again with a fresh iteration budget.
   *
   * @throws {CheckpointError} if no run matches `runId`
   */
  resume(runId: string): Promise<RunSummary>
}
