/**
 * iteration-controller module: public API re-exports
 */

export {
  IterationController,
  createIterationController,
  DEFAULT_LIMITS,
  DEFAULT_SAMPLING,
  DEFAULT_TRANSPORT,
} from './iteration-controller.js'
export type { IterationControllerOptions, IterationContext, TransportPolicy } from './iteration-controller.js'
export {
  transition,
  isTerminal,
  normalizeJudgment,
  INITIAL_STATE,
  IllegalTransitionError,
} from './state-machine.js'
export type {
  IterationLimits,
  IterationState,
  IterationEvent,
  TerminalState,
  ExhaustionReason,
} from './state-machine.js'
