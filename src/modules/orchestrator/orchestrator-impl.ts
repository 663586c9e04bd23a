/**
 * Orchestrator: factory and core implementation.
 *
 * One run: Planner → DependencyScheduler → for each scheduled item, skip it
 * if a dependency did not complete, otherwise hand it to the
 * IterationController. Item state and the context log are checkpointed after
 * every transition, before the next item starts.
 */

import type { Planner } from '../../adapters/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import {
  CheckpointError,
  PlanInvalidError,
  RunNotFoundError,
  ThreadsmithError,
  isRunFatal,
} from '../../core/errors.js'
import type { ItemOutcome, Plan, RunId, RunSummary, WorkItemDefinition } from '../../core/types.js'
import type { CheckpointStore, LoadedRun, RunItemState } from '../../persistence/checkpoint-store.js'
import { generateId, sleep as defaultSleep, withRetry } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ContextStore } from '../context-store/index.js'
import { schedulePlan } from '../dependency-scheduler/index.js'
import type { IterationController, TransportPolicy } from '../iteration-controller/index.js'
import { DEFAULT_TRANSPORT } from '../iteration-controller/index.js'
import type { Orchestrator, RunOptions } from './orchestrator.js'

// ---------------------------------------------------------------------------
// OrchestratorDeps
// ---------------------------------------------------------------------------

export interface OrchestratorDeps {
  planner: Planner
  /** Must be built over the same `store` */
  controller: Pick<IterationController, 'execute'>
  store: ContextStore
  checkpoints: CheckpointStore
  eventBus?: TypedEventBus
  /** Retry policy for the planning call */
  transport?: Partial<TransportPolicy>
  sleep?: (ms: number) => Promise<void>
}

// ---------------------------------------------------------------------------
// createOrchestrator
// ---------------------------------------------------------------------------

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { planner, controller, store, checkpoints, eventBus } = deps
  const transport: TransportPolicy = { ...DEFAULT_TRANSPORT, ...deps.transport }
  const wait = deps.sleep ?? defaultSleep

  const logger = createLogger('orchestrator')

  // -- helpers --

  function pendingState(definition: WorkItemDefinition, position: number): RunItemState {
    return {
      definition,
      position,
      status: 'pending',
      iterationCount: 0,
      lastJudgment: null,
      result: null,
      reason: null,
      message: null,
    }
  }

  function stateFromOutcome(base: RunItemState, outcome: ItemOutcome): RunItemState {
    return {
      ...base,
      status: outcome.status,
      iterationCount: outcome.iterations,
      lastJudgment: outcome.lastJudgment ?? null,
      result: outcome.result ?? null,
      reason: outcome.reason,
      message: outcome.message ?? null,
    }
  }

  function outcomeFromState(state: RunItemState): ItemOutcome {
    return {
      itemId: state.definition.id,
      filePath: state.definition.filePath,
      status: state.status === 'done' ? 'done' : 'failed',
      reason: state.reason ?? 'accepted',
      iterations: state.iterationCount,
      lastJudgment: state.lastJudgment ?? undefined,
      result: state.result ?? undefined,
      message: state.message ?? undefined,
    }
  }

  function checkpoint(runId: RunId, state: RunItemState): void {
    checkpoints.saveItem(runId, state, store.snapshot())
  }

  async function planRequest(runId: RunId, request: string): Promise<Plan> {
    return withRetry(() => planner.plan(request), {
      maxAttempts: transport.maxAttempts,
      baseDelayMs: transport.baseDelayMs,
      sleep: wait,
      shouldRetry: (err) => !(err instanceof PlanInvalidError) && !isRunFatal(err),
      onRetry: (err, attempt, delayMs) => {
        logger.warn({ runId, attempt, delayMs, err: err.message }, 'Planning call failed, retrying')
        eventBus?.emit('transport:retry', {
          itemId: null,
          operation: 'plan',
          attempt,
          delayMs,
          message: err.message,
        })
      },
    })
  }

  /**
   * Mark the run invalid (bad plan) or aborted (anything else), then rethrow.
   */
  async function guarded<T>(runId: RunId, body: () => Promise<T>): Promise<T> {
    try {
      return await body()
    } catch (err) {
      const error =
        err instanceof ThreadsmithError
          ? err
          : new ThreadsmithError(err instanceof Error ? err.message : String(err), 'RUN_FAILED')
      const status = err instanceof PlanInvalidError ? 'invalid' : 'aborted'
      try {
        checkpoints.setRunStatus(runId, status, error)
      } catch (statusErr) {
        logger.error({ runId, err: statusErr }, 'Could not record run failure')
      }
      logger.error({ runId, code: error.code, err: error.message }, `Run ${status}`)
      eventBus?.emit('run:aborted', { runId, code: error.code, message: error.message })
      throw err
    }
  }

  /** Plan, validate and schedule; starts the session and records pending items */
  async function planRun(runId: RunId, request: string): Promise<{ plan: Plan; states: RunItemState[] }> {
    const plan = await planRequest(runId, request)
    const schedule = schedulePlan(plan.items)

    store.clear()
    store.createSession({ id: runId, originalRequest: request, highLevelPlan: plan.summary })
    checkpoints.recordPlan(runId, plan, schedule.batches, store.snapshot())
    logger.info({ runId, items: plan.items.length, batches: schedule.batches.length }, 'Plan scheduled')

    emitPlanned(runId, plan, schedule.batches)
    return { plan, states: plan.items.map((item, position) => pendingState(item, position)) }
  }

  function restoreRun(loaded: LoadedRun): { plan: Plan; states: RunItemState[] } {
    const { run: record } = loaded
    if (record.plan === null) {
      throw new CheckpointError(`Run "${record.id}" has no recorded plan`, { runId: record.id })
    }
    const plan = record.plan
    store.restore(loaded.context)
    checkpoints.setRunStatus(record.id, 'running')
    emitPlanned(record.id, plan, record.batches ?? schedulePlan(plan.items).batches)
    const states = plan.items.map(
      (item, position) => loaded.items.find((s) => s.position === position) ?? pendingState(item, position),
    )
    return { plan, states }
  }

  function emitPlanned(runId: RunId, plan: Plan, batches: number[][]): void {
    eventBus?.emit('run:planned', {
      runId,
      batches: batches.map((batch) => batch.map((index) => plan.items[index]?.id ?? String(index))),
    })
  }

  function openTask(runId: RunId, plan: Plan, item: WorkItemDefinition): string {
    const activityId = `${runId}/${item.id}`
    if (store.getActivity(activityId) === undefined) {
      store.createActivity({
        id: activityId,
        sessionId: runId,
        description: item.description,
        tags: item.tags,
        mode: item.mode,
        component: item.filePath,
        plannerAnalysis: plan.rationale,
      })
    }
    const attempt = store.getTasksForActivity(activityId).length + 1
    const task = store.createTask({
      id: `${activityId}/task-${String(attempt)}`,
      activityId,
      description: item.description,
      tags: item.tags,
    })
    return task.id
  }

  /** Execute every item in scheduled order; `states` is indexed by plan position */
  async function executeItems(
    runId: RunId,
    request: string,
    plan: Plan,
    order: number[],
    states: RunItemState[],
  ): Promise<ItemOutcome[]> {
    const outcomes: ItemOutcome[] = []

    for (const index of order) {
      const current = states[index]
      if (current === undefined) {
        throw new CheckpointError(`No state recorded for work item at position ${String(index)}`, { runId, index })
      }
      const item = current.definition

      if (current.status === 'done') {
        logger.debug({ runId, itemId: item.id }, 'Work item restored from checkpoint')
        eventBus?.emit('item:restored', { runId, itemId: item.id })
        outcomes.push(outcomeFromState(current))
        continue
      }

      const blocking = item.dependencyIds
        .map((dep) => states[dep])
        .filter((dep): dep is RunItemState => dep !== undefined && dep.status !== 'done')
        .map((dep) => dep.definition.id)
      if (blocking.length > 0) {
        const skipped: RunItemState = {
          ...pendingState(item, current.position),
          status: 'failed',
          reason: 'dependency_failed',
          message: `Skipped: dependency ${blocking.map((id) => `"${id}"`).join(', ')} did not complete`,
        }
        states[index] = skipped
        checkpoint(runId, skipped)
        const outcome = outcomeFromState(skipped)
        logger.warn({ runId, itemId: item.id, blocking }, 'Work item skipped')
        eventBus?.emit('item:skipped', { runId, outcome })
        outcomes.push(outcome)
        continue
      }

      const taskId = openTask(runId, plan, item)
      const started: RunItemState = { ...pendingState(item, current.position), status: 'in_progress' }
      states[index] = started
      checkpoint(runId, started)
      eventBus?.emit('item:started', { runId, itemId: item.id, filePath: item.filePath })

      const outcome = await controller.execute({
        runId,
        request,
        planSummary: plan.summary,
        item,
        taskId,
      })

      const finished = stateFromOutcome(started, outcome)
      states[index] = finished
      checkpoint(runId, finished)
      if (outcome.status === 'done') {
        eventBus?.emit('item:accepted', { runId, outcome })
      } else {
        eventBus?.emit('item:exhausted', { runId, outcome })
      }
      outcomes.push(outcome)
    }

    return outcomes
  }

  function finish(runId: RunId, request: string, outcomes: ItemOutcome[]): RunSummary {
    const summary = summarize(runId, request, outcomes)
    checkpoints.setRunStatus(runId, 'completed')
    logger.info(
      {
        runId,
        succeeded: summary.succeeded.length,
        qualityFailed: summary.qualityFailed.length,
        transportFailed: summary.transportFailed.length,
        dependencyFailed: summary.dependencyFailed.length,
      },
      'Run complete',
    )
    eventBus?.emit('run:complete', { runId, summary })
    return summary
  }

  // -- public API --

  async function run(request: string, options: RunOptions = {}): Promise<RunSummary> {
    const runId = options.runId ?? generateId('run')
    checkpoints.createRun(runId, request)
    logger.info({ runId }, 'Run started')
    eventBus?.emit('run:started', { runId, request, resumed: false })

    return guarded(runId, async () => {
      const { plan, states } = await planRun(runId, request)
      const order = schedulePlan(plan.items).order
      const outcomes = await executeItems(runId, request, plan, order, states)
      return finish(runId, request, outcomes)
    })
  }

  async function resume(runId: string): Promise<RunSummary> {
    const loaded = checkpoints.loadRun(runId)
    if (loaded === undefined) {
      throw new RunNotFoundError(runId)
    }
    const { run: record } = loaded
    logger.info({ runId: record.id, status: record.status }, 'Resuming run')
    eventBus?.emit('run:started', { runId: record.id, request: record.request, resumed: true })

    return guarded(record.id, async () => {
      // A run that stopped before its plan was recorded starts over from planning
      const { plan, states } =
        record.plan === null ? await planRun(record.id, record.request) : restoreRun(loaded)
      const order = schedulePlan(plan.items).order
      const outcomes = await executeItems(record.id, record.request, plan, order, states)
      return finish(record.id, record.request, outcomes)
    })
  }

  return { run, resume }
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function summarize(runId: RunId, request: string, outcomes: ItemOutcome[]): RunSummary {
  const ids = (reason: ItemOutcome['reason']): string[] =>
    outcomes.filter((o) => o.reason === reason).map((o) => o.itemId)
  return {
    runId,
    request,
    succeeded: ids('accepted'),
    qualityFailed: ids('quality_exhausted'),
    transportFailed: ids('transport_failed'),
    dependencyFailed: ids('dependency_failed'),
    outcomes,
  }
}
