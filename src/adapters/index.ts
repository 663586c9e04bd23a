/**
 * Adapters: public API re-exports
 */

export type { Generator, Reviewer, Planner, EmbeddingProvider } from './types.js'
export { OpenAIModelGateway, createModelGateway } from './model-gateway.js'
export type { ModelGateway, ChatMessage, CompletionRequest, OpenAIGatewayOptions } from './model-gateway.js'
export { ChatGenerator, unwrapFence } from './chat-generator.js'
export type { ChatGeneratorOptions } from './chat-generator.js'
export { ChatReviewer, VerdictSchema } from './chat-reviewer.js'
export type { ChatReviewerOptions, Verdict } from './chat-reviewer.js'
export { ChatPlanner } from './chat-planner.js'
export type { ChatPlannerOptions } from './chat-planner.js'
export { OpenAIEmbeddingProvider } from './embedding-provider.js'
export { extractStructuredBlock, parseStructured, readStructuredOutput } from './structured-output.js'
export type { ParseResult } from './structured-output.js'
