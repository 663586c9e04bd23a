/**
 * RetrieverImpl: ranks stored context items against a query.
 *
 * Scoring:
 *  - tagScore = |matching normalized tags| / max(|query tags|, 1)
 *  - with an embedding provider: score = (tagScore + semantic) / 2, where
 *    semantic maps the cosine similarity of query description and item text
 *    onto [0, 1]; otherwise score = tagScore
 *
 * Candidates must share at least one normalized tag with the query. A query
 * without tags has no candidates unless semantic scoring is active, in which
 * case the whole log is ranked.
 */

import { createLogger } from '../../utils/logger.js'
import type { ContextItem, ContextStore } from '../context-store/index.js'
import { defaultTagNormalizer } from '../tag-normalizer/index.js'
import type { TagNormalizer } from '../tag-normalizer/index.js'
import { similarityToScore } from './similarity.js'
import type { EmbeddingProvider, RetrievalResult, Retriever } from './types.js'

const logger = createLogger('retrieval')

export const DEFAULT_MAX_RESULTS = 5
export const DEFAULT_EMBEDDING_CACHE_SIZE = 512

export interface RetrieverOptions {
  /** Store to read from; the retriever never writes to it */
  store: ContextStore
  tagNormalizer?: TagNormalizer
  /** Enables semantic scoring when set */
  embeddings?: EmbeddingProvider
  /** Default cap on results (default: 5) */
  maxResults?: number
  /** Results scoring below this are dropped (default: 0) */
  minScore?: number
  /** Item vectors kept between queries, least recently used evicted first (default: 512) */
  embeddingCacheSize?: number
}

export class RetrieverImpl implements Retriever {
  private readonly _store: ContextStore
  private readonly _normalizer: TagNormalizer
  private readonly _embeddings: EmbeddingProvider | undefined
  private readonly _maxResults: number
  private readonly _minScore: number
  /** Keyed by embedded text, so a cleared and refilled store never hits a stale vector */
  private readonly _itemEmbeddings = new Map<string, number[]>()
  private readonly _cacheSize: number

  constructor(options: RetrieverOptions) {
    this._store = options.store
    this._normalizer = options.tagNormalizer ?? defaultTagNormalizer
    this._embeddings = options.embeddings
    this._maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS
    this._minScore = options.minScore ?? 0
    this._cacheSize = options.embeddingCacheSize ?? DEFAULT_EMBEDDING_CACHE_SIZE
    if (!Number.isInteger(this._cacheSize) || this._cacheSize < 0) {
      throw new RangeError(`Embedding cache size must be a non-negative integer, got ${String(this._cacheSize)}`)
    }
  }

  get semantic(): boolean {
    return this._embeddings !== undefined
  }

  async retrieve(
    queryTags: readonly string[],
    queryDescription: string,
    maxResults: number = this._maxResults,
  ): Promise<RetrievalResult[]> {
    if (maxResults <= 0) return []

    const normalizedQuery = this._normalizer.normalizeTags(queryTags)
    const querySet = new Set(normalizedQuery)
    const embeddings = queryDescription.trim() !== '' ? this._embeddings : undefined

    let candidates: ContextItem[]
    if (normalizedQuery.length > 0) {
      candidates = this._store.getItemsByTags(normalizedQuery)
    } else if (embeddings !== undefined) {
      candidates = this._store.getAllItems()
    } else {
      candidates = []
    }
    if (candidates.length === 0) return []

    const queryVector = embeddings !== undefined ? await embeddings.embed(queryDescription) : undefined

    const scored: RetrievalResult[] = []
    for (const item of candidates) {
      const matchedTags = item.tags.filter((tag) => querySet.has(tag))
      const tagScore = matchedTags.length / Math.max(normalizedQuery.length, 1)

      let result: RetrievalResult
      if (embeddings !== undefined && queryVector !== undefined) {
        const itemVector = await this._embedItem(embeddings, item)
        const semanticScore = similarityToScore(queryVector, itemVector)
        result = { item, score: (tagScore + semanticScore) / 2, tagScore, semanticScore, matchedTags }
      } else {
        result = { item, score: tagScore, tagScore, matchedTags }
      }

      if (result.score >= this._minScore) {
        scored.push(result)
      }
    }

    scored.sort((a, b) => b.score - a.score || b.item.seq - a.item.seq)
    const results = scored.slice(0, maxResults)

    logger.debug(
      {
        queryTags: normalizedQuery,
        candidates: candidates.length,
        returned: results.length,
        semantic: embeddings !== undefined,
      },
      'Context retrieved',
    )
    return results
  }

  private async _embedItem(embeddings: EmbeddingProvider, item: ContextItem): Promise<number[]> {
    const text = `${item.content} ${item.tags.join(' ')}`
    const cached = this._itemEmbeddings.get(text)
    if (cached !== undefined) {
      // re-insert to mark as most recently used
      this._itemEmbeddings.delete(text)
      this._itemEmbeddings.set(text, cached)
      return cached
    }
    const vector = await embeddings.embed(text)
    if (this._cacheSize === 0) return vector
    if (this._itemEmbeddings.size >= this._cacheSize) {
      const oldest = this._itemEmbeddings.keys().next()
      if (oldest.done !== true) this._itemEmbeddings.delete(oldest.value)
    }
    this._itemEmbeddings.set(text, vector)
    return vector
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createRetriever(options: RetrieverOptions): Retriever {
  return new RetrieverImpl(options)
}
