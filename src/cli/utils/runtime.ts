/**
 * Runtime composition for CLI commands.
 *
 * Builds the model-backed capabilities from the provider settings, opens the
 * checkpoint database under the project's state directory and wires the
 * orchestration modules together. Commands receive a `Runtime` and must
 * `close()` it when they are done.
 */

import { mkdir } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import {
  ChatGenerator,
  ChatPlanner,
  ChatReviewer,
  OpenAIEmbeddingProvider,
  createModelGateway,
} from '../../adapters/index.js'
import type { EmbeddingProvider, Generator, Planner, Reviewer } from '../../adapters/index.js'
import { ServiceRegistry } from '../../core/di.js'
import { ConfigError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createEventBus } from '../../core/event-bus.js'
import { createConfigSystem, DEFAULT_STATE_DIR } from '../../modules/config/index.js'
import type { PartialThreadsmithConfig, ThreadsmithConfig } from '../../modules/config/index.js'
import { createContextStore } from '../../modules/context-store/index.js'
import { IterationController } from '../../modules/iteration-controller/index.js'
import type { IterationLimits } from '../../modules/iteration-controller/index.js'
import { createOrchestrator } from '../../modules/orchestrator/index.js'
import type { Orchestrator } from '../../modules/orchestrator/index.js'
import { createPromptBuilder } from '../../modules/prompt-builder/index.js'
import { RetrieverImpl, TermVectorEmbedder } from '../../modules/retrieval/index.js'
import { createTagNormalizer } from '../../modules/tag-normalizer/index.js'
import { createCheckpointStore, createCheckpointDatabase, databasePathFor } from '../../persistence/index.js'
import type { CheckpointStore } from '../../persistence/index.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'

const logger = createLogger('cli:runtime')

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  projectRoot: string
  /** Defaults to ~/.threadsmith */
  globalConfigDir?: string
  cliOverrides?: PartialThreadsmithConfig
  env?: Record<string, string | undefined>
}

/**
 * Load the merged configuration for a project and apply its log level.
 * @throws {ConfigError} when a layer is invalid
 */
export async function loadProjectConfig(options: LoadConfigOptions): Promise<ThreadsmithConfig> {
  const system = createConfigSystem({
    projectConfigDir: join(options.projectRoot, DEFAULT_STATE_DIR),
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
    ...(options.cliOverrides !== undefined && { cliOverrides: options.cliOverrides }),
    ...(options.env !== undefined && { env: options.env }),
  })
  await system.load()
  const config = system.getConfig()
  setLogLevel(config.global.log_level)
  return config
}

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

/** The model-backed collaborators of a run */
export interface Capabilities {
  planner: Planner
  generator: Generator
  reviewer: Reviewer
  /** Present only when semantic retrieval is enabled */
  embeddings?: EmbeddingProvider
}

/**
 * Build chat-backed capabilities from the provider settings. The API key is
 * read from the environment variable named by `provider.api_key_env`.
 * @throws {ConfigError} if that variable is named but not set
 */
export function createCapabilities(
  config: ThreadsmithConfig,
  env: Record<string, string | undefined> = process.env,
): Capabilities {
  const { provider, quality, retrieval } = config

  let apiKey: string | undefined
  if (provider.api_key_env !== undefined) {
    apiKey = env[provider.api_key_env]
    if (apiKey === undefined || apiKey === '') {
      throw new ConfigError(
        `Environment variable "${provider.api_key_env}" (provider.api_key_env) is not set`,
        { variable: provider.api_key_env },
      )
    }
  }

  const gateway = createModelGateway({
    baseUrl: provider.base_url,
    timeoutMs: provider.timeout_ms,
    ...(apiKey !== undefined && { apiKey }),
  })

  let embeddings: EmbeddingProvider | undefined
  if (retrieval.semantic) {
    embeddings =
      retrieval.embedding_model !== undefined
        ? new OpenAIEmbeddingProvider(gateway, retrieval.embedding_model)
        : new TermVectorEmbedder()
  }

  logger.debug(
    { baseUrl: provider.base_url, model: provider.model, semantic: retrieval.semantic },
    'Capabilities created',
  )

  return {
    planner: new ChatPlanner({ gateway, model: provider.planner_model ?? provider.model }),
    generator: new ChatGenerator({ gateway, model: provider.model }),
    reviewer: new ChatReviewer({
      gateway,
      model: provider.review_model ?? provider.model,
      threshold: quality.threshold,
    }),
    ...(embeddings !== undefined && { embeddings }),
  }
}

// ---------------------------------------------------------------------------
// State database
// ---------------------------------------------------------------------------

/** Checkpoint database location for a project */
export function stateDatabasePath(config: ThreadsmithConfig, projectRoot: string): string {
  return databasePathFor(resolve(projectRoot, config.global.state_dir))
}

export interface StateDatabase {
  checkpoints: CheckpointStore
  close(): Promise<void>
}

/**
 * Open (creating if needed) and migrate the checkpoint database.
 * @param databasePath - overrides the location under the state directory
 */
export async function openStateDatabase(
  config: ThreadsmithConfig,
  projectRoot: string,
  databasePath?: string,
): Promise<StateDatabase> {
  const path = databasePath ?? stateDatabasePath(config, projectRoot)
  if (databasePath === undefined) {
    await mkdir(resolve(projectRoot, config.global.state_dir), { recursive: true })
  }

  const registry = new ServiceRegistry()
  const database = createCheckpointDatabase(path)
  registry.register('database', database)
  await registry.initializeAll()

  return {
    checkpoints: createCheckpointStore(database.db),
    close: () => registry.shutdownAll(),
  }
}

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

export interface RuntimeOptions {
  config: ThreadsmithConfig
  projectRoot: string
  capabilities: Capabilities
  eventBus?: TypedEventBus
  /** Overrides the checkpoint database location (e.g. ':memory:') */
  databasePath?: string
  sleep?: (ms: number) => Promise<void>
}

export interface Runtime extends StateDatabase {
  orchestrator: Orchestrator
  eventBus: TypedEventBus
}

/** Wire every module of a run from the merged configuration */
export async function openRuntime(options: RuntimeOptions): Promise<Runtime> {
  const { config, capabilities } = options
  const eventBus = options.eventBus ?? createEventBus()

  const tagNormalizer = createTagNormalizer(config.retrieval.synonyms)
  const store = createContextStore({ tagNormalizer })
  const retriever = new RetrieverImpl({
    store,
    tagNormalizer,
    maxResults: config.retrieval.max_results,
    minScore: config.retrieval.min_score,
    ...(capabilities.embeddings !== undefined && { embeddings: capabilities.embeddings }),
  })
  const promptBuilder = createPromptBuilder({
    retriever,
    tokenBudget: config.retrieval.token_budget,
    maxResults: config.retrieval.max_results,
  })

  const transport = {
    maxAttempts: config.transport.max_attempts,
    baseDelayMs: config.transport.base_delay_ms,
  }
  const controller = new IterationController({
    store,
    promptBuilder,
    generator: capabilities.generator,
    reviewer: capabilities.reviewer,
    limits: {
      threshold: config.quality.threshold,
      maxIterations: config.quality.max_iterations,
    },
    modeLimits: toModeLimits(config.quality.modes),
    sampling: {
      temperature: config.generation.temperature,
      ...(config.generation.max_tokens !== undefined && { maxTokens: config.generation.max_tokens }),
    },
    transport,
    eventBus,
    ...(options.sleep !== undefined && { sleep: options.sleep }),
  })

  const state = await openStateDatabase(config, options.projectRoot, options.databasePath)
  const orchestrator = createOrchestrator({
    planner: capabilities.planner,
    controller,
    store,
    checkpoints: state.checkpoints,
    eventBus,
    transport,
    ...(options.sleep !== undefined && { sleep: options.sleep }),
  })

  return { ...state, orchestrator, eventBus }
}

function toModeLimits(
  modes: ThreadsmithConfig['quality']['modes'],
): Record<string, Partial<IterationLimits>> {
  const limits: Record<string, Partial<IterationLimits>> = {}
  for (const [mode, settings] of Object.entries(modes)) {
    limits[mode] = {
      ...(settings.threshold !== undefined && { threshold: settings.threshold }),
      ...(settings.max_iterations !== undefined && { maxIterations: settings.max_iterations }),
    }
  }
  return limits
}
