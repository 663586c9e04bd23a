/**
 * `threadsmith resume` command
 *
 * Continues a checkpointed run: items already accepted are kept, every other
 * item is attempted again with a fresh iteration budget.
 *
 * Usage:
 *   threadsmith resume <runId>                       Resume by id or unique id prefix
 *   threadsmith resume <runId> --apply               Write accepted results to disk
 *   threadsmith resume <runId> --output-format json  Stream NDJSON events
 *
 * Exit codes: as for `threadsmith run`.
 */

import type { Command } from 'commander'
import { executeWithRuntime, parseOutputFormat } from './run.js'
import type { ExecutionOptions, OutputFormat } from './run.js'

// ---------------------------------------------------------------------------
// runResumeAction: testable core logic
// ---------------------------------------------------------------------------

export interface ResumeActionOptions extends ExecutionOptions {
  runId: string
}

/**
 * Core action for the resume command.
 *
 * Returns exit code. Separated from Commander integration for testability.
 */
export async function runResumeAction(options: ResumeActionOptions): Promise<number> {
  return executeWithRuntime(options, (runtime) => runtime.orchestrator.resume(options.runId))
}

// ---------------------------------------------------------------------------
// registerResumeCommand
// ---------------------------------------------------------------------------

/**
 * Register the `threadsmith resume` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerResumeCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('resume <runId>')
    .description('Resume an interrupted run from its last checkpoint')
    .option('--apply', 'Write accepted results to their file paths', false)
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON)', parseOutputFormat, 'human')
    .option('--project-root <path>', 'Project root directory', projectRoot)
    .action(async (runId: string, opts: { apply: boolean; outputFormat: OutputFormat; projectRoot: string }) => {
      const exitCode = await runResumeAction({
        runId,
        projectRoot: opts.projectRoot,
        outputFormat: opts.outputFormat,
        apply: opts.apply,
      })
      process.exit(exitCode)
    })
}
