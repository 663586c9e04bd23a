/**
 * retrieval module: public API re-exports
 */

export type { Retriever, RetrievalResult, EmbeddingProvider } from './types.js'
export { RetrieverImpl, createRetriever, DEFAULT_MAX_RESULTS } from './retriever-impl.js'
export type { RetrieverOptions } from './retriever-impl.js'
export { cosineSimilarity, similarityToScore } from './similarity.js'
export { TermVectorEmbedder, createTermVectorEmbedder } from './term-vector-embedder.js'
