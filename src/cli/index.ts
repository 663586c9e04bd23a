#!/usr/bin/env node
/**
 * threadsmith CLI - Main entry point
 * Provides the `threadsmith` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerResumeCommand } from './commands/resume.js'
import { registerRunCommand } from './commands/run.js'
import { registerStatusCommand } from './commands/status.js'

const logger = createLogger('cli')

function readVersion(content: string): string | undefined {
  const pkg: unknown = JSON.parse(content)
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return undefined
}

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli or dist/cli
  const pkgPath = resolve(here, '../../package.json')
  try {
    return readVersion(await readFile(pkgPath, 'utf-8')) ?? '0.0.0'
  } catch (err) {
    logger.debug({ err, pkgPath }, 'Package version unavailable')
    return '0.0.0'
  }
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('threadsmith')
    .description('threadsmith - dependency-ordered, review-gated code generation with retrieved context')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program)
  registerResumeCommand(program)
  registerStatusCommand(program)
  registerConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
