/**
 * Unit tests for vector similarity helpers and the term-vector embedder.
 */

import { describe, it, expect } from 'vitest'
import { cosineSimilarity, similarityToScore } from '../similarity.js'
import { TermVectorEmbedder } from '../term-vector-embedder.js'

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and -1 for opposite ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1)
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1)
  })

  it('is 0 when a vector has zero magnitude', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
  })
})

describe('similarityToScore', () => {
  it('maps [-1, 1] onto [0, 1]', () => {
    expect(similarityToScore([1, 0], [1, 0])).toBeCloseTo(1)
    expect(similarityToScore([1, 0], [0, 1])).toBeCloseTo(0.5)
    expect(similarityToScore([1, 0], [-1, 0])).toBeCloseTo(0)
  })

  it('scores a zero vector as 0', () => {
    expect(similarityToScore([0, 0], [1, 0])).toBe(0)
  })
})

describe('TermVectorEmbedder', () => {
  it('is deterministic', async () => {
    const embedder = new TermVectorEmbedder(64)
    expect(await embedder.embed('Refresh JWT tokens')).toEqual(await embedder.embed('refresh jwt TOKENS'))
  })

  it('produces a zero vector for text without word characters', () => {
    const embedder = new TermVectorEmbedder(16)
    expect(embedder.embedSync('!!! ---').every((v) => v === 0)).toBe(true)
  })

  it('scores shared vocabulary above unrelated text', () => {
    const embedder = new TermVectorEmbedder()
    const query = embedder.embedSync('refresh token rotation')
    const related = embedder.embedSync('token rotation policy')
    const unrelated = embedder.embedSync('css grid layout')
    expect(similarityToScore(query, related)).toBeGreaterThan(similarityToScore(query, unrelated))
  })

  it('rejects non-positive dimensions', () => {
    expect(() => new TermVectorEmbedder(0)).toThrow(RangeError)
  })
})
