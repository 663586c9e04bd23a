/**
 * Error definitions for threadsmith
 * Provides the structured error hierarchy shared by every module
 */

/** Base error class for all threadsmith errors */
export class ThreadsmithError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'ThreadsmithError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ThreadsmithError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * Error thrown when a plan cannot be executed: a dependency cycle, an
 * out-of-range dependency index, duplicate ids, or planner output that does
 * not describe a plan. Fatal for the run; raised before any generation.
 */
export class PlanInvalidError extends ThreadsmithError {
  public readonly problems: string[]

  constructor(problems: string[], context: Record<string, unknown> = {}) {
    super(`Plan is invalid:\n${problems.map((p) => `  - ${p}`).join('\n')}`, 'PLAN_INVALID', {
      problems,
      ...context,
    })
    this.name = 'PlanInvalidError'
    this.problems = problems
  }
}

/** Error thrown when the plan's dependency graph contains a cycle */
export class PlanCycleError extends PlanInvalidError {
  public readonly cycle: number[]

  constructor(cycle: number[], labels: string[] = []) {
    const path = cycle.map((idx) => labels[idx] ?? String(idx))
    super([`Circular dependency detected: ${path.join(' -> ')}`], { cycle })
    this.name = 'PlanCycleError'
    this.cycle = cycle
  }
}

/** Error thrown when a Generator/Reviewer/Planner/embedding call fails at the transport level */
export class TransportError extends ThreadsmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TRANSPORT_ERROR', context)
    this.name = 'TransportError'
  }
}

/** Error describing a work item whose iteration budget ran out without passing review */
export class QualityExhaustedError extends ThreadsmithError {
  constructor(
    itemId: string,
    iterations: number,
    lastFeedback: string,
    context: Record<string, unknown> = {}
  ) {
    super(
      `Work item "${itemId}" did not pass review after ${String(iterations)} iteration(s): ${lastFeedback}`,
      'QUALITY_EXHAUSTED',
      { itemId, iterations, ...context }
    )
    this.name = 'QualityExhaustedError'
  }
}

/** Error thrown when a context record references a session/activity/task that does not exist */
export class StoreInvariantError extends ThreadsmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STORE_INVARIANT', context)
    this.name = 'StoreInvariantError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends ThreadsmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends ThreadsmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}

/** Error thrown when a checkpoint cannot be written or restored */
export class CheckpointError extends ThreadsmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CHECKPOINT_ERROR', context)
    this.name = 'CheckpointError'
  }
}

/** Error thrown when no recorded run matches an id or id prefix */
export class RunNotFoundError extends CheckpointError {
  constructor(runId: string) {
    super(`No run found matching "${runId}"`, { runId })
    this.name = 'RunNotFoundError'
  }
}

/** Errors that abort a whole run rather than a single work item */
export function isRunFatal(err: unknown): boolean {
  return (
    err instanceof PlanInvalidError ||
    err instanceof StoreInvariantError ||
    err instanceof ConfigError ||
    err instanceof CheckpointError
  )
}
