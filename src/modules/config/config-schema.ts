/**
 * Zod validation schemas for the threadsmith configuration system.
 *
 * Sections:
 *  - provider: OpenAI-compatible endpoint and model names
 *  - generation / quality / retrieval / transport: orchestration tuning
 *  - global: logging and state directory
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export const ProviderSettingsSchema = z
  .object({
    /** Chat-completions base URL, e.g. http://localhost:11434/v1 */
    base_url: z.string().url(),
    /** Model used for generation */
    model: z.string().min(1),
    /** Model used for review (default: `model`) */
    review_model: z.string().min(1).optional(),
    /** Model used for planning (default: `model`) */
    planner_model: z.string().min(1).optional(),
    /** Name of the environment variable holding the API key; local servers need none */
    api_key_env: z.string().min(1).optional(),
    /** Per-request timeout */
    timeout_ms: z.number().int().positive(),
  })
  .strict()

export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

export const GenerationSettingsSchema = z
  .object({
    temperature: z.number().min(0).max(2),
    max_tokens: z.number().int().positive().optional(),
  })
  .strict()

export type GenerationSettings = z.infer<typeof GenerationSettingsSchema>

export const ModeQualitySchema = z
  .object({
    threshold: z.number().min(0).max(1).optional(),
    max_iterations: z.number().int().min(1).optional(),
  })
  .strict()

export const QualitySettingsSchema = z
  .object({
    /** A review passes when its score is at least this */
    threshold: z.number().min(0).max(1),
    max_iterations: z.number().int().min(1),
    /** Overrides keyed by work item mode */
    modes: z.record(ModeQualitySchema),
  })
  .strict()

export type QualitySettings = z.infer<typeof QualitySettingsSchema>

export const RetrievalSettingsSchema = z
  .object({
    max_results: z.number().int().positive(),
    min_score: z.number().min(0).max(1),
    /** Prompt token budget */
    token_budget: z.number().int().positive(),
    /** Combine tag overlap with embedding similarity */
    semantic: z.boolean(),
    /** Embedding model; without one, semantic scoring uses local term vectors */
    embedding_model: z.string().min(1).optional(),
    /** Extra canonical tag → synonyms entries */
    synonyms: z.record(z.array(z.string())),
  })
  .strict()

export type RetrievalSettings = z.infer<typeof RetrievalSettingsSchema>

export const TransportSettingsSchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10),
    base_delay_ms: z.number().int().min(0),
  })
  .strict()

export type TransportSettings = z.infer<typeof TransportSettingsSchema>

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory, relative to the project root, holding the checkpoint database */
    state_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this release can read */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const ThreadsmithConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    provider: ProviderSettingsSchema,
    generation: GenerationSettingsSchema,
    quality: QualitySettingsSchema,
    retrieval: RetrievalSettingsSchema,
    transport: TransportSettingsSchema,
  })
  .strict()

export type ThreadsmithConfig = z.infer<typeof ThreadsmithConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer, before merging)
// ---------------------------------------------------------------------------

export const PartialThreadsmithConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    provider: ProviderSettingsSchema.partial().optional(),
    generation: GenerationSettingsSchema.partial().optional(),
    quality: QualitySettingsSchema.partial().optional(),
    retrieval: RetrievalSettingsSchema.partial().optional(),
    transport: TransportSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialThreadsmithConfig = z.infer<typeof PartialThreadsmithConfigSchema>
