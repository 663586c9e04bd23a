/**
 * Term-vector embedder: a deterministic, offline EmbeddingProvider.
 *
 * Hashes lower-cased word tokens (FNV-1a) into a fixed number of buckets and
 * counts occurrences. Texts sharing vocabulary get a positive cosine
 * similarity; texts with no words in common are orthogonal.
 */

import type { EmbeddingProvider } from './types.js'

const DEFAULT_DIMENSIONS = 512
const TOKEN_PATTERN = /[a-z0-9_]+/g

function fnv1a(token: string): number {
  let hash = 0x811c9dc5
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193)
  }
  return hash >>> 0
}

export class TermVectorEmbedder implements EmbeddingProvider {
  readonly name = 'term-vector'
  private readonly _dimensions: number

  constructor(dimensions: number = DEFAULT_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new RangeError(`TermVectorEmbedder: dimensions must be a positive integer, got ${String(dimensions)}`)
    }
    this._dimensions = dimensions
  }

  embed(text: string): Promise<number[]> {
    return Promise.resolve(this.embedSync(text))
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this._dimensions).fill(0)
    for (const token of text.toLowerCase().match(TOKEN_PATTERN) ?? []) {
      const bucket = fnv1a(token) % this._dimensions
      vector[bucket] = (vector[bucket] ?? 0) + 1
    }
    return vector
  }
}

export function createTermVectorEmbedder(dimensions?: number): TermVectorEmbedder {
  return new TermVectorEmbedder(dimensions)
}
