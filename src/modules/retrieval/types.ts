/**
 * Shared types for the retrieval module.
 */

import type { ContextItem } from '../context-store/index.js'

/**
 * Turns text into a dense vector. Implementations backed by a remote model
 * throw TransportError when the model cannot be reached.
 */
export interface EmbeddingProvider {
  readonly name: string
  embed(text: string): Promise<number[]>
}

/** One ranked retrieval hit */
export interface RetrievalResult {
  item: ContextItem
  /** Combined score in [0, 1] */
  score: number
  tagScore: number
  /** Present only when semantic scoring ran */
  semanticScore?: number
  /** Normalized item tags that matched the query */
  matchedTags: string[]
}

export interface Retriever {
  /**
   * Rank stored items against a query.
   *
   * Results are ordered by descending score, ties broken by recency (most
   * recent first), and capped at `maxResults` (the retriever default when
   * omitted).
   */
  retrieve(
    queryTags: readonly string[],
    queryDescription: string,
    maxResults?: number,
  ): Promise<RetrievalResult[]>

  /** Whether an embedding provider is configured */
  readonly semantic: boolean
}
