/**
 * Pure state machine for the generate → review → refine loop of one work item.
 *
 *   pending → generating → reviewing → accepted
 *                 ↑            ↓
 *              refining ←──────┘        (→ exhausted once the budget is spent)
 *
 * `transition` never performs I/O; the controller feeds it events.
 */

import { ThreadsmithError } from '../../core/errors.js'
import type { QualityJudgment } from '../../core/types.js'

export interface IterationLimits {
  /** Minimum score for a candidate to pass, in [0, 1] */
  threshold: number
  /** Maximum generate → review rounds, at least 1 */
  maxIterations: number
}

export type ExhaustionReason = 'quality' | 'transport'

export type IterationState =
  | { kind: 'pending' }
  | { kind: 'generating'; iteration: number; lastJudgment?: QualityJudgment }
  | { kind: 'reviewing'; iteration: number; candidate: string; lastJudgment?: QualityJudgment }
  | { kind: 'refining'; iteration: number; lastJudgment: QualityJudgment }
  | { kind: 'accepted'; iteration: number; candidate: string; lastJudgment: QualityJudgment }
  | {
      kind: 'exhausted'
      iteration: number
      reason: ExhaustionReason
      message: string
      lastJudgment?: QualityJudgment
    }

export type IterationEvent =
  | { type: 'start' }
  | { type: 'generated'; candidate: string }
  | { type: 'reviewed'; judgment: QualityJudgment }
  | { type: 'refine' }
  | { type: 'transport_failed'; message: string }

export type TerminalState = Extract<IterationState, { kind: 'accepted' | 'exhausted' }>

export class IllegalTransitionError extends ThreadsmithError {
  constructor(state: IterationState['kind'], event: IterationEvent['type']) {
    super(`Illegal transition: "${event}" in state "${state}"`, 'ILLEGAL_TRANSITION', { state, event })
    this.name = 'IllegalTransitionError'
  }
}

export const INITIAL_STATE: IterationState = { kind: 'pending' }

export function isTerminal(state: IterationState): state is TerminalState {
  return state.kind === 'accepted' || state.kind === 'exhausted'
}

/**
 * Clamp the score into [0, 1] (non-finite scores become 0) and recompute
 * `passed` against the caller's threshold.
 */
export function normalizeJudgment(judgment: QualityJudgment, threshold: number): QualityJudgment {
  const score = Number.isFinite(judgment.score) ? Math.min(1, Math.max(0, judgment.score)) : 0
  return { score, passed: score >= threshold, feedback: judgment.feedback }
}

export function transition(
  state: IterationState,
  event: IterationEvent,
  limits: IterationLimits,
): IterationState {
  switch (state.kind) {
    case 'pending':
      if (event.type === 'start') return { kind: 'generating', iteration: 1 }
      break

    case 'generating':
      if (event.type === 'generated') {
        return {
          kind: 'reviewing',
          iteration: state.iteration,
          candidate: event.candidate,
          lastJudgment: state.lastJudgment,
        }
      }
      if (event.type === 'transport_failed') return exhaustTransport(state, event.message)
      break

    case 'reviewing':
      if (event.type === 'reviewed') {
        const judgment = normalizeJudgment(event.judgment, limits.threshold)
        if (judgment.passed) {
          return {
            kind: 'accepted',
            iteration: state.iteration,
            candidate: state.candidate,
            lastJudgment: judgment,
          }
        }
        if (state.iteration >= limits.maxIterations) {
          return {
            kind: 'exhausted',
            iteration: state.iteration,
            reason: 'quality',
            message: judgment.feedback,
            lastJudgment: judgment,
          }
        }
        return { kind: 'refining', iteration: state.iteration, lastJudgment: judgment }
      }
      if (event.type === 'transport_failed') return exhaustTransport(state, event.message)
      break

    case 'refining':
      if (event.type === 'refine') {
        return { kind: 'generating', iteration: state.iteration + 1, lastJudgment: state.lastJudgment }
      }
      break

    case 'accepted':
    case 'exhausted':
      break
  }
  throw new IllegalTransitionError(state.kind, event.type)
}

function exhaustTransport(
  state: Extract<IterationState, { kind: 'generating' | 'reviewing' }>,
  message: string,
): IterationState {
  return {
    kind: 'exhausted',
    iteration: state.iteration,
    reason: 'transport',
    message,
    lastJudgment: state.lastJudgment,
  }
}
