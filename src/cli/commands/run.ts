/**
 * `threadsmith run` command
 *
 * Plans a request, generates every work item in dependency order behind the
 * review gate and checkpoints each transition.
 *
 * Usage:
 *   threadsmith run "<request>"                       Run with the merged configuration
 *   threadsmith run "<request>" --threshold 0.8       Override the quality threshold
 *   threadsmith run "<request>" --apply               Write accepted results to disk
 *   threadsmith run "<request>" --output-format json  Stream NDJSON events
 *
 * Exit codes:
 *   0 - Every work item was accepted
 *   1 - System error (unexpected exception)
 *   2 - Usage error (invalid configuration, invalid plan, unknown run)
 *   3 - The run finished with failed work items
 */

import { InvalidArgumentError } from 'commander'
import type { Command } from 'commander'
import { ConfigError, ConfigIncompatibleFormatError, PlanInvalidError, RunNotFoundError } from '../../core/errors.js'
import type { RunSummary } from '../../core/types.js'
import type { PartialThreadsmithConfig } from '../../modules/config/index.js'
import { createLogger } from '../../utils/logger.js'
import { attachHumanProgress, renderRunSummary } from '../formatters/progress-formatter.js'
import { emitEvent, streamRunEvents } from '../formatters/streaming.js'
import { applyResults } from '../utils/apply.js'
import { maskSecrets } from '../utils/masking.js'
import { createCapabilities, loadProjectConfig, openRuntime } from '../utils/runtime.js'
import type { Capabilities, Runtime } from '../utils/runtime.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_ERROR = 1
export const RUN_EXIT_USAGE = 2
export const RUN_EXIT_FAILED_ITEMS = 3

export type OutputFormat = 'human' | 'json'

// ---------------------------------------------------------------------------
// Shared execution
// ---------------------------------------------------------------------------

/** Options shared by `run` and `resume` */
export interface ExecutionOptions {
  projectRoot: string
  outputFormat: OutputFormat
  /** Write accepted results to their file paths */
  apply: boolean
  /** Defaults to ~/.threadsmith */
  globalConfigDir?: string
  env?: Record<string, string | undefined>
  cliOverrides?: PartialThreadsmithConfig
  /** Built from the provider settings when omitted */
  capabilities?: Capabilities
  /** Overrides the checkpoint database location */
  databasePath?: string
  sleep?: (ms: number) => Promise<void>
}

function writeError(message: string): void {
  // Transport errors can echo request headers back
  process.stderr.write(`Error: ${maskSecrets(message)}\n`)
}

function exitCodeFor(err: unknown): number {
  if (
    err instanceof ConfigError ||
    err instanceof ConfigIncompatibleFormatError ||
    err instanceof PlanInvalidError ||
    err instanceof RunNotFoundError
  ) {
    return RUN_EXIT_USAGE
  }
  return RUN_EXIT_ERROR
}

/**
 * Load configuration, open the runtime, render progress while `execute`
 * drives the orchestrator, then report and optionally apply the results.
 */
export async function executeWithRuntime(
  options: ExecutionOptions,
  execute: (runtime: Runtime) => Promise<RunSummary>,
): Promise<number> {
  let runtime: Runtime | undefined
  let detach: (() => void) | undefined

  try {
    const env = options.env ?? process.env
    const config = await loadProjectConfig({
      projectRoot: options.projectRoot,
      env,
      ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
      ...(options.cliOverrides !== undefined && { cliOverrides: options.cliOverrides }),
    })
    const capabilities = options.capabilities ?? createCapabilities(config, env)

    runtime = await openRuntime({
      config,
      projectRoot: options.projectRoot,
      capabilities,
      ...(options.databasePath !== undefined && { databasePath: options.databasePath }),
      ...(options.sleep !== undefined && { sleep: options.sleep }),
    })
    detach =
      options.outputFormat === 'json'
        ? streamRunEvents(runtime.eventBus)
        : attachHumanProgress(runtime.eventBus)

    const summary = await execute(runtime)

    if (options.outputFormat === 'human') {
      process.stdout.write(renderRunSummary(summary) + '\n')
    }

    if (options.apply) {
      const report = await applyResults(options.projectRoot, summary.outcomes)
      if (options.outputFormat === 'json') {
        emitEvent('run:applied', { written: report.written, refused: report.refused })
      } else {
        for (const path of report.written) {
          process.stdout.write(`Wrote ${path}\n`)
        }
      }
      for (const path of report.refused) {
        process.stderr.write(`Refused to write outside the project root: ${path}\n`)
      }
    }

    return summary.succeeded.length === summary.outcomes.length ? RUN_EXIT_SUCCESS : RUN_EXIT_FAILED_ITEMS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    const exitCode = exitCodeFor(err)
    if (exitCode === RUN_EXIT_ERROR) {
      logger.error({ err }, 'Run failed')
    }
    writeError(message)
    return exitCode
  } finally {
    detach?.()
    if (runtime !== undefined) {
      try {
        await runtime.close()
      } catch (closeErr) {
        logger.error({ err: closeErr }, 'Failed to close the checkpoint database')
      }
    }
  }
}

// ---------------------------------------------------------------------------
// runRunAction: testable core logic
// ---------------------------------------------------------------------------

export interface RunActionOptions extends ExecutionOptions {
  request: string
  threshold?: number
  maxIterations?: number
  semantic?: boolean
  /** Fixed run id, mainly for tests */
  runId?: string
}

/** Map run flags onto the highest-priority configuration layer */
export function buildCliOverrides(options: Pick<RunActionOptions, 'threshold' | 'maxIterations' | 'semantic'>): PartialThreadsmithConfig {
  const overrides: PartialThreadsmithConfig = {}
  if (options.threshold !== undefined || options.maxIterations !== undefined) {
    overrides.quality = {
      ...(options.threshold !== undefined && { threshold: options.threshold }),
      ...(options.maxIterations !== undefined && { max_iterations: options.maxIterations }),
    }
  }
  if (options.semantic !== undefined) {
    overrides.retrieval = { semantic: options.semantic }
  }
  return overrides
}

/**
 * Core action for the run command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runRunAction(options: RunActionOptions): Promise<number> {
  const request = options.request.trim()
  if (request === '') {
    writeError('request must not be empty')
    return RUN_EXIT_USAGE
  }

  return executeWithRuntime(
    { ...options, cliOverrides: { ...buildCliOverrides(options), ...options.cliOverrides } },
    (runtime) =>
      runtime.orchestrator.run(request, options.runId !== undefined ? { runId: options.runId } : {}),
  )
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

export function parseNumber(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`)
  }
  return parsed
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value !== 'human' && value !== 'json') {
    throw new InvalidArgumentError(`Expected human or json, got "${value}".`)
  }
  return value
}

/**
 * Register the `threadsmith run` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerRunCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('run <request>')
    .description('Plan a request and generate every work item behind the review gate')
    .option('--threshold <score>', 'Quality threshold in [0, 1]', parseNumber)
    .option('--max-iterations <n>', 'Generate/review rounds per work item', parseNumber)
    .option('--semantic', 'Combine tag overlap with embedding similarity')
    .option('--apply', 'Write accepted results to their file paths', false)
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON)', parseOutputFormat, 'human')
    .option('--project-root <path>', 'Project root directory', projectRoot)
    .action(
      async (
        request: string,
        opts: {
          threshold?: number
          maxIterations?: number
          semantic?: boolean
          apply: boolean
          outputFormat: OutputFormat
          projectRoot: string
        },
      ) => {
        const exitCode = await runRunAction({
          request,
          projectRoot: opts.projectRoot,
          outputFormat: opts.outputFormat,
          apply: opts.apply,
          ...(opts.threshold !== undefined && { threshold: opts.threshold }),
          ...(opts.maxIterations !== undefined && { maxIterations: opts.maxIterations }),
          ...(opts.semantic !== undefined && { semantic: opts.semantic }),
        })
        process.exit(exitCode)
      },
    )
}
