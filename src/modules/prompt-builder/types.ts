/**
 * Types for the prompt-builder module.
 */

import type { WorkItemDefinition } from '../../core/types.js'
import type { RetrievalResult } from '../retrieval/index.js'

/**
 * - required: always included, never truncated
 * - important: truncated to fit what is left of the budget
 * - optional: included only while more than 30% of the budget remains
 */
export type SectionPriority = 'required' | 'important' | 'optional'

export interface SectionReport {
  name: string
  priority: SectionPriority
  tokens: number
  included: boolean
  truncated: boolean
}

export interface PromptInput {
  /** Original user request of the run */
  request: string
  /** High-level plan of the run */
  planSummary: string
  item: WorkItemDefinition
  /** Reviewer feedback from the previous iteration of this item */
  previousFeedback?: string
}

export interface BuiltPrompt {
  prompt: string
  tokenCount: number
  sections: SectionReport[]
  truncated: boolean
  /** Retrieved items that made it into the prompt, in rank order */
  included: RetrievalResult[]
}

export interface PromptBuilder {
  /**
   * Assemble the generation prompt for one work item. Rejects with
   * TransportError when semantic retrieval cannot reach its embedding model.
   */
  build(input: PromptInput): Promise<BuiltPrompt>
}
