/**
 * prompt-builder module: public API re-exports
 */

export type { PromptBuilder, PromptInput, BuiltPrompt, SectionReport, SectionPriority } from './types.js'
export { PromptBuilderImpl, createPromptBuilder, DEFAULT_TOKEN_BUDGET } from './prompt-builder-impl.js'
export type { PromptBuilderOptions } from './prompt-builder-impl.js'
export { countTokens, truncateToTokens } from './token-counter.js'
