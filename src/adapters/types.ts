/**
 * Capability interfaces consumed by the orchestration core.
 *
 * Implementations throw TransportError when the backing model cannot be
 * reached; any other rejection is treated the same way by the core.
 */

import type { Plan, QualityJudgment, SamplingParams } from '../core/types.js'

export interface Generator {
  generate(prompt: string, sampling: SamplingParams): Promise<string>
}

export interface Reviewer {
  /**
   * Judge a candidate against the request it answers. `passed` is advisory:
   * the core recomputes it against its own threshold.
   */
  review(request: string, candidate: string): Promise<QualityJudgment>
}

export interface Planner {
  /** Throws PlanInvalidError when the model's answer does not describe a plan */
  plan(request: string): Promise<Plan>
}

export type { EmbeddingProvider } from '../modules/retrieval/types.js'
