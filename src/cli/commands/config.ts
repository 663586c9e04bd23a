/**
 * `threadsmith config` command group
 *
 * Subcommands:
 *   - `threadsmith config show`: display merged config (credentials masked)
 *   - `threadsmith config get <key>`: print one value by dot-notation key
 *
 * Configuration is edited in `.threadsmith/config.yaml`; API keys are never
 * stored there, only the name of the environment variable holding one.
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { join } from 'node:path'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import { createConfigSystem, DEFAULT_STATE_DIR, getByPath } from '../../modules/config/index.js'
import type { ConfigSystem } from '../../modules/config/index.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Shared loading
// ---------------------------------------------------------------------------

export interface ConfigCommandOptions {
  projectRoot?: string
  globalConfigDir?: string
  env?: Record<string, string | undefined>
}

async function loadConfigSystem(opts: ConfigCommandOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    projectConfigDir: join(opts.projectRoot ?? process.cwd(), DEFAULT_STATE_DIR),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ConfigIncompatibleFormatError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigCommandOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadConfigSystem(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  const format = opts.format ?? 'yaml'

  if (format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# threadsmith configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

/**
 * Print the value at a dot-notation key. Scalars print bare, sections as
 * YAML (or JSON with `format: 'json'`).
 */
export async function runConfigGet(key: string, opts: ConfigShowOptions = {}): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await loadConfigSystem(opts)
  if (typeof system === 'number') return system

  const value = getByPath(system.getMasked(), key)
  if (value === undefined) {
    process.stderr.write(`  Error: Unknown configuration key "${key}"\n`)
    return CONFIG_EXIT_INVALID
  }

  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(value) + '\n')
  } else if (typeof value === 'object' && value !== null) {
    process.stdout.write(yaml.dump(value))
  } else {
    process.stdout.write(`${String(value)}\n`)
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerConfigCommand
// ---------------------------------------------------------------------------

function parseFormat(value: string | undefined): 'yaml' | 'json' {
  return value === 'json' ? 'json' : 'yaml'
}

export function registerConfigCommand(program: Command, projectRoot = process.cwd()): void {
  const config = program
    .command('config')
    .description('Inspect the merged threadsmith configuration')

  config
    .command('show')
    .description('Show the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json')
    .action(async (opts: { format?: string }) => {
      const exitCode = await runConfigShow({ projectRoot, format: parseFormat(opts.format) })
      process.exit(exitCode)
    })

  config
    .command('get <key>')
    .description('Print one configuration value (e.g. quality.threshold)')
    .option('--format <format>', 'Output format: yaml (default) or json')
    .action(async (key: string, opts: { format?: string }) => {
      const exitCode = await runConfigGet(key, { projectRoot, format: parseFormat(opts.format) })
      process.exit(exitCode)
    })
}
