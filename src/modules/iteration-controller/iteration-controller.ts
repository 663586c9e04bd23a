/**
 * IterationController: drives one work item to `done` or `failed`.
 *
 * Each round builds a prompt, calls the Generator, then the Reviewer. A
 * failed review is recorded as a `learning` item and the loop refines until
 * the iteration budget runs out. Prompt, generate and review calls are each
 * retried with exponential backoff; running out of attempts fails the item
 * with reason `transport_failed`.
 */

import type { Generator, Reviewer } from '../../adapters/types.js'
import { ConfigError, QualityExhaustedError, isRunFatal } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { TransportOperation } from '../../core/event-bus.types.js'
import type { ItemOutcome, RunId, SamplingParams, WorkItemDefinition } from '../../core/types.js'
import { sleep as defaultSleep, withRetry } from '../../utils/helpers.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import type { ContextStore } from '../context-store/index.js'
import type { PromptBuilder } from '../prompt-builder/index.js'
import {
  INITIAL_STATE,
  isTerminal,
  normalizeJudgment,
  transition,
  type IterationLimits,
  type IterationState,
  type TerminalState,
} from './state-machine.js'

const logger = createLogger('iteration-controller')

export const DEFAULT_LIMITS: IterationLimits = { threshold: 0.7, maxIterations: 3 }
export const DEFAULT_SAMPLING: SamplingParams = { temperature: 0.2 }

export interface TransportPolicy {
  /** Attempts per call, including the first */
  maxAttempts: number
  /** Delay before the first retry; doubles for each one after */
  baseDelayMs: number
}

export const DEFAULT_TRANSPORT: TransportPolicy = { maxAttempts: 3, baseDelayMs: 500 }

export interface IterationControllerOptions {
  store: ContextStore
  promptBuilder: PromptBuilder
  generator: Generator
  reviewer: Reviewer
  limits?: IterationLimits
  /** Per-mode overrides of `limits`, keyed by WorkItem.mode */
  modeLimits?: Record<string, Partial<IterationLimits>>
  sampling?: SamplingParams
  transport?: Partial<TransportPolicy>
  sleep?: (ms: number) => Promise<void>
  eventBus?: TypedEventBus
}

export interface IterationContext {
  runId: RunId
  request: string
  planSummary: string
  item: WorkItemDefinition
  /** Task record that learnings and the result are written under */
  taskId: string
}

export class IterationController {
  private readonly _store: ContextStore
  private readonly _promptBuilder: PromptBuilder
  private readonly _generator: Generator
  private readonly _reviewer: Reviewer
  private readonly _limits: IterationLimits
  private readonly _modeLimits: Record<string, Partial<IterationLimits>>
  private readonly _sampling: SamplingParams
  private readonly _transport: TransportPolicy
  private readonly _sleep: (ms: number) => Promise<void>
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: IterationControllerOptions) {
    this._store = options.store
    this._promptBuilder = options.promptBuilder
    this._generator = options.generator
    this._reviewer = options.reviewer
    this._limits = options.limits ?? DEFAULT_LIMITS
    this._modeLimits = options.modeLimits ?? {}
    this._sampling = options.sampling ?? DEFAULT_SAMPLING
    this._transport = { ...DEFAULT_TRANSPORT, ...options.transport }
    this._sleep = options.sleep ?? defaultSleep
    this._eventBus = options.eventBus

    validateLimits(this._limits, 'default')
    for (const mode of Object.keys(this._modeLimits)) {
      validateLimits(this.limitsFor(mode), mode)
    }
  }

  /** Effective limits for a mode: the mode's overrides on top of the defaults */
  limitsFor(mode: string): IterationLimits {
    const override = Object.hasOwn(this._modeLimits, mode) ? this._modeLimits[mode] : undefined
    return {
      threshold: override?.threshold ?? this._limits.threshold,
      maxIterations: override?.maxIterations ?? this._limits.maxIterations,
    }
  }

  /**
   * Run the loop for one item. Resolves with the item's outcome; rejects
   * only with run-fatal errors (store invariants, configuration).
   */
  async execute(context: IterationContext): Promise<ItemOutcome> {
    const { item, taskId } = context
    const limits = this.limitsFor(item.mode)
    const reviewRequest = formatReviewRequest(context.request, item)
    const log = childLogger(logger, { runId: context.runId, itemId: item.id })

    let state: IterationState = transition(INITIAL_STATE, { type: 'start' }, limits)
    let promptTokens = 0

    while (!isTerminal(state)) {
      const current = state
      switch (current.kind) {
        case 'generating': {
          try {
            const built = await this._call(item.id, 'retrieve', () =>
              this._promptBuilder.build({
                request: context.request,
                planSummary: context.planSummary,
                item,
                previousFeedback: current.lastJudgment?.feedback,
              }),
            )
            promptTokens = built.tokenCount
            const candidate = await this._call(item.id, 'generate', () =>
              this._generator.generate(built.prompt, this._sampling),
            )
            state = transition(current, { type: 'generated', candidate }, limits)
          } catch (err) {
            state = transition(current, { type: 'transport_failed', message: this._failure(err) }, limits)
          }
          break
        }

        case 'reviewing': {
          try {
            const raw = await this._call(item.id, 'review', () =>
              this._reviewer.review(reviewRequest, current.candidate),
            )
            const judgment = normalizeJudgment(raw, limits.threshold)
            log.debug({ iteration: current.iteration, score: judgment.score }, 'Candidate reviewed')
            this._eventBus?.emit('item:iteration', {
              runId: context.runId,
              itemId: item.id,
              iteration: current.iteration,
              judgment,
              promptTokens,
            })
            state = transition(current, { type: 'reviewed', judgment }, limits)
          } catch (err) {
            state = transition(current, { type: 'transport_failed', message: this._failure(err) }, limits)
          }
          break
        }

        case 'refining': {
          this._store.addItem(current.lastJudgment.feedback, 'learning', item.tags, taskId)
          state = transition(current, { type: 'refine' }, limits)
          break
        }

        case 'pending':
          state = transition(current, { type: 'start' }, limits)
          break
      }
    }

    return this._finish(context, state, log)
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _finish(
    context: IterationContext,
    state: TerminalState,
    log: typeof logger,
  ): ItemOutcome {
    const { item, taskId } = context

    if (state.kind === 'accepted') {
      this._store.addItem(state.candidate, 'result', item.tags, taskId)
      this._store.completeTask(taskId, state.candidate)
      log.info({ iterations: state.iteration, score: state.lastJudgment.score }, 'Work item accepted')
      return {
        itemId: item.id,
        filePath: item.filePath,
        status: 'done',
        reason: 'accepted',
        iterations: state.iteration,
        lastJudgment: state.lastJudgment,
        result: state.candidate,
      }
    }

    if (state.reason === 'quality') {
      const message = new QualityExhaustedError(item.id, state.iteration, state.message).message
      log.warn({ iterations: state.iteration, score: state.lastJudgment?.score }, 'Iteration budget exhausted')
      return {
        itemId: item.id,
        filePath: item.filePath,
        status: 'failed',
        reason: 'quality_exhausted',
        iterations: state.iteration,
        lastJudgment: state.lastJudgment,
        message,
      }
    }

    log.warn({ iteration: state.iteration, message: state.message }, 'Transport attempts exhausted')
    return {
      itemId: item.id,
      filePath: item.filePath,
      status: 'failed',
      reason: 'transport_failed',
      iterations: state.iteration,
      lastJudgment: state.lastJudgment,
      message: state.message,
    }
  }

  private _call<T>(itemId: string, operation: TransportOperation, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this._transport.maxAttempts,
      baseDelayMs: this._transport.baseDelayMs,
      sleep: this._sleep,
      shouldRetry: (err) => !isRunFatal(err),
      onRetry: (err, attempt, delayMs) => {
        logger.warn({ itemId, operation, attempt, delayMs, err: err.message }, 'Transport call failed, retrying')
        this._eventBus?.emit('transport:retry', {
          itemId,
          operation,
          attempt,
          delayMs,
          message: err.message,
        })
      },
    })
  }

  /** Rethrows run-fatal errors; otherwise returns the failure message */
  private _failure(err: unknown): string {
    if (isRunFatal(err)) throw err
    return err instanceof Error ? err.message : String(err)
  }
}

/** The user request, then the item brief the candidate answers */
function formatReviewRequest(request: string, item: WorkItemDefinition): string {
  return `${request}\n\n${item.fileStatus === 'existing' ? 'Update' : 'Create'} ${item.filePath} (mode: ${item.mode}): ${item.description}`
}

function validateLimits(limits: IterationLimits, scope: string): void {
  if (!(limits.threshold >= 0 && limits.threshold <= 1)) {
    throw new ConfigError(`Quality threshold for ${scope} must be within [0, 1]`, {
      scope,
      threshold: limits.threshold,
    })
  }
  if (!Number.isInteger(limits.maxIterations) || limits.maxIterations < 1) {
    throw new ConfigError(`max_iterations for ${scope} must be a positive integer`, {
      scope,
      maxIterations: limits.maxIterations,
    })
  }
}

export function createIterationController(options: IterationControllerOptions): IterationController {
  return new IterationController(options)
}
