/**
 * Built-in default values for the threadsmith configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { ThreadsmithConfig } from './config-schema.js'

/** Local Ollama server */
export const DEFAULT_BASE_URL = 'http://localhost:11434/v1'

export const DEFAULT_STATE_DIR = '.threadsmith'

export const DEFAULT_CONFIG: ThreadsmithConfig = {
  config_format_version: '1',
  global: {
    log_level: 'info',
    state_dir: DEFAULT_STATE_DIR,
  },
  provider: {
    base_url: DEFAULT_BASE_URL,
    model: 'qwen2.5-coder:7b',
    timeout_ms: 120_000,
  },
  generation: {
    temperature: 0.2,
  },
  quality: {
    threshold: 0.7,
    max_iterations: 3,
    modes: {},
  },
  retrieval: {
    max_results: 5,
    min_score: 0,
    token_budget: 2000,
    semantic: false,
    synonyms: {},
  },
  transport: {
    max_attempts: 3,
    base_delay_ms: 500,
  },
}
