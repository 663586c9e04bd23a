/**
 * ChatReviewer: Reviewer backed by a chat-completions model.
 *
 * An answer that cannot be read as a verdict is scored 0 with feedback
 * naming the problem: a quality failure, never a transport one.
 */

import { z } from 'zod'
import type { QualityJudgment } from '../core/types.js'
import { createLogger } from '../utils/logger.js'
import type { ModelGateway } from './model-gateway.js'
import { REVIEWER_SYSTEM_PROMPT, reviewUserPrompt } from './prompts.js'
import { readStructuredOutput } from './structured-output.js'
import type { Reviewer } from './types.js'

const logger = createLogger('reviewer')

const REVIEW_TEMPERATURE = 0.1

export const VerdictSchema = z.object({
  quality_score: z.number().min(0).max(1),
  feedback: z.string().default(''),
  suggestions: z.array(z.string()).default([]),
})
export type Verdict = z.infer<typeof VerdictSchema>

export interface ChatReviewerOptions {
  gateway: ModelGateway
  model: string
  /** Threshold for the advisory `passed` flag (default: 0.7) */
  threshold?: number
  systemPrompt?: string
}

export class ChatReviewer implements Reviewer {
  private readonly _gateway: ModelGateway
  private readonly _model: string
  private readonly _threshold: number
  private readonly _systemPrompt: string

  constructor(options: ChatReviewerOptions) {
    this._gateway = options.gateway
    this._model = options.model
    this._threshold = options.threshold ?? 0.7
    this._systemPrompt = options.systemPrompt ?? REVIEWER_SYSTEM_PROMPT
  }

  async review(request: string, candidate: string): Promise<QualityJudgment> {
    const output = await this._gateway.complete({
      model: this._model,
      messages: [
        { role: 'system', content: this._systemPrompt },
        { role: 'user', content: reviewUserPrompt(request, candidate) },
      ],
      temperature: REVIEW_TEMPERATURE,
    })

    const verdict = readStructuredOutput(output, ['quality_score'], VerdictSchema)
    if (!verdict.ok) {
      logger.warn({ model: this._model, error: verdict.error }, 'Unreadable review verdict')
      return {
        score: 0,
        passed: false,
        feedback: `The review could not be read (${verdict.error}). Treating the candidate as failing.`,
      }
    }

    const { quality_score: score } = verdict.value
    return {
      score,
      passed: score >= this._threshold,
      feedback: formatFeedback(verdict.value),
    }
  }
}

function formatFeedback(verdict: Verdict): string {
  const feedback = verdict.feedback.trim()
  const suggestions = verdict.suggestions.map((s) => s.trim()).filter((s) => s !== '')
  if (suggestions.length === 0) return feedback
  const list = suggestions.map((s) => `- ${s}`).join('\n')
  return feedback === '' ? list : `${feedback}\n${list}`
}
