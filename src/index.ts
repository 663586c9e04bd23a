/**
 * threadsmith - Main module exports
 * Public API surface for embedding the orchestration engine
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export { withRetry, generateId, sleep } from './utils/helpers.js'
export type { RetryOptions } from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { OrchestratorEvents, TransportOperation } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Service lifecycle
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Capabilities and model adapters
export * from './adapters/index.js'

// Orchestration modules
export * from './modules/tag-normalizer/index.js'
export * from './modules/context-store/index.js'
export * from './modules/retrieval/index.js'
export * from './modules/prompt-builder/index.js'
export * from './modules/dependency-scheduler/index.js'
export * from './modules/iteration-controller/index.js'
export * from './modules/orchestrator/index.js'
export * from './modules/config/index.js'

// Checkpoints
export * from './persistence/index.js'

// Runtime composition
export {
  createCapabilities,
  loadProjectConfig,
  openRuntime,
  openStateDatabase,
} from './cli/utils/runtime.js'
export type { Capabilities, Runtime, RuntimeOptions, StateDatabase } from './cli/utils/runtime.js'
