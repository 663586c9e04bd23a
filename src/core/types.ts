/**
 * Core types for threadsmith
 * Shared type definitions used across all modules
 */

/** Identifier of an orchestration run */
export type RunId = string

/** Identifier of a planned work item */
export type WorkItemId = string

/** Lifecycle status of a work item */
export type WorkItemStatus = 'pending' | 'in_progress' | 'done' | 'failed'

/** Whether the work item creates a file or edits one that exists */
export type FileStatus = 'new' | 'existing'

/** Why a work item reached its terminal status */
export type OutcomeReason =
  | 'accepted'
  | 'quality_exhausted'
  | 'transport_failed'
  | 'dependency_failed'

/** Status of an orchestration run */
export type RunStatus = 'planning' | 'running' | 'completed' | 'invalid' | 'aborted'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/**
 * A single file-scoped unit of generation work, as produced by the planner.
 * `dependencyIds` are indices into the plan's item list.
 */
export interface WorkItemDefinition {
  id: WorkItemId
  filePath: string
  fileStatus: FileStatus
  mode: string
  description: string
  dependencyIds: number[]
  tags: string[]
}

/** A scheduled work item with its mutable execution fields */
export interface WorkItem extends Readonly<WorkItemDefinition> {
  status: WorkItemStatus
  result?: string
}

/** Output of the planning step */
export interface Plan {
  /** High-level plan recorded on the session */
  summary: string
  /** Planner rationale recorded on each activity */
  rationale: string
  items: WorkItemDefinition[]
}

/** Reviewer verdict on a candidate output */
export interface QualityJudgment {
  /** Score in [0, 1] */
  score: number
  passed: boolean
  feedback: string
}

/** Sampling parameters forwarded to a Generator */
export interface SamplingParams {
  temperature: number
  maxTokens?: number
}

/** Terminal report for one work item */
export interface ItemOutcome {
  itemId: WorkItemId
  filePath: string
  status: Extract<WorkItemStatus, 'done' | 'failed'>
  reason: OutcomeReason
  iterations: number
  lastJudgment?: QualityJudgment
  result?: string
  message?: string
}

/** Final report of a run; each planned item appears in exactly one bucket */
export interface RunSummary {
  runId: RunId
  request: string
  succeeded: WorkItemId[]
  qualityFailed: WorkItemId[]
  transportFailed: WorkItemId[]
  dependencyFailed: WorkItemId[]
  outcomes: ItemOutcome[]
}
