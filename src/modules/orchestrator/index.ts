/**
 * orchestrator module: public API re-exports
 */

export type { Orchestrator, RunOptions } from './orchestrator.js'
export { createOrchestrator, summarize } from './orchestrator-impl.js'
export type { OrchestratorDeps } from './orchestrator-impl.js'
