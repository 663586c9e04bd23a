/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { ThreadsmithConfig, PartialThreadsmithConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .threadsmith/ directory (default: <cwd>/.threadsmith) */
  projectConfigDir?: string
  /** Path to the global user-level .threadsmith/ directory (default: ~/.threadsmith) */
  globalConfigDir?: string
  /**
   * Values that override every other layer.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialThreadsmithConfig
  /** Environment to read THREADSMITH_* variables from (default: process.env) */
  env?: Record<string, string | undefined>
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated threadsmith configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): ThreadsmithConfig

  /**
   * Return a single value by dot-notation key (e.g. "quality.threshold").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Return the merged config with all credential values masked.
   * Safe to display in CLI output or logs.
   */
  getMasked(): ThreadsmithConfig

  /**
   * Whether load() has been called and succeeded.
   */
  readonly isLoaded: boolean
}
