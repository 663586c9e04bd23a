/**
 * `threadsmith status` command
 *
 * Displays the checkpointed state of a run, or lists recent runs.
 *
 * Usage:
 *   threadsmith status                              List recent runs
 *   threadsmith status <runId>                      Show one run (id or unique prefix)
 *   threadsmith status <runId> --output-format json Single NDJSON snapshot
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error (unexpected exception)
 *   2 - Usage error (run not found, invalid configuration)
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { buildStatusSnapshot, renderStatusHuman } from '../formatters/status-formatter.js'
import { emitEvent } from '../formatters/streaming.js'
import { buildRunListRows, formatRunListTable } from '../utils/formatting.js'
import { loadProjectConfig, openStateDatabase, stateDatabasePath } from '../utils/runtime.js'
import type { StateDatabase } from '../utils/runtime.js'
import { parseOutputFormat } from './run.js'
import type { OutputFormat } from './run.js'

const logger = createLogger('status-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const STATUS_EXIT_SUCCESS = 0
export const STATUS_EXIT_ERROR = 1
export const STATUS_EXIT_USAGE = 2

/** Runs shown when no run id is given */
export const RUN_LIST_LIMIT = 20

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StatusActionOptions {
  runId?: string
  outputFormat: OutputFormat
  projectRoot: string
  globalConfigDir?: string
  env?: Record<string, string | undefined>
}

// ---------------------------------------------------------------------------
// runStatusAction: testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the status command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  const { runId, outputFormat, projectRoot } = options
  let state: StateDatabase | undefined

  try {
    const config = await loadProjectConfig({
      projectRoot,
      ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
      ...(options.env !== undefined && { env: options.env }),
    })

    // Reading status never creates the state directory
    const hasDatabase = existsSync(stateDatabasePath(config, projectRoot))
    if (hasDatabase) {
      state = await openStateDatabase(config, projectRoot)
    }

    if (runId === undefined) {
      const runs = state?.checkpoints.listRuns(RUN_LIST_LIMIT) ?? []
      if (outputFormat === 'json') {
        emitEvent('status:runs', { runs: buildRunListRows(runs) })
      } else if (runs.length === 0) {
        process.stdout.write('No runs found.\n')
      } else {
        process.stdout.write(formatRunListTable(buildRunListRows(runs)) + '\n')
      }
      return STATUS_EXIT_SUCCESS
    }

    const loaded = state?.checkpoints.loadRun(runId)
    if (loaded === undefined) {
      process.stderr.write(`Error: Run not found: ${runId}\n`)
      return STATUS_EXIT_USAGE
    }

    const snapshot = buildStatusSnapshot(loaded)
    if (outputFormat === 'json') {
      emitEvent('status:snapshot', snapshot)
    } else {
      process.stdout.write(renderStatusHuman(snapshot) + '\n')
    }
    return STATUS_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    if (err instanceof ConfigError || err instanceof ConfigIncompatibleFormatError) {
      return STATUS_EXIT_USAGE
    }
    logger.error({ err }, 'runStatusAction failed')
    return STATUS_EXIT_ERROR
  } finally {
    if (state !== undefined) {
      try {
        await state.close()
      } catch (closeErr) {
        logger.warn({ err: closeErr }, 'Failed to close the checkpoint database')
      }
    }
  }
}

// ---------------------------------------------------------------------------
// registerStatusCommand
// ---------------------------------------------------------------------------

/**
 * Register the `threadsmith status` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerStatusCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('status [runId]')
    .description('Show the checkpointed state of a run, or list recent runs')
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON)', parseOutputFormat, 'human')
    .option('--project-root <path>', 'Project root directory', projectRoot)
    .action(async (runId: string | undefined, opts: { outputFormat: OutputFormat; projectRoot: string }) => {
      const exitCode = await runStatusAction({
        ...(runId !== undefined && { runId }),
        outputFormat: opts.outputFormat,
        projectRoot: opts.projectRoot,
      })
      process.exit(exitCode)
    })
}
