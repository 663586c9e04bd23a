/**
 * Vector helpers for semantic scoring.
 */

function magnitude(v: readonly number[], length: number): number {
  let sum = 0
  for (let i = 0; i < length; i++) {
    const x = v[i] ?? 0
    sum += x * x
  }
  return Math.sqrt(sum)
}

/**
 * Cosine similarity of two vectors, compared over their common length.
 * Returns 0 when either vector has zero magnitude.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length)
  const normA = magnitude(a, length)
  const normB = magnitude(b, length)
  if (normA === 0 || normB === 0) return 0
  let dot = 0
  for (let i = 0; i < length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0)
  }
  return dot / (normA * normB)
}

/**
 * Map the cosine similarity of two vectors from [-1, 1] onto [0, 1].
 * A zero-magnitude vector (e.g. the embedding of blank text) scores 0.
 */
export function similarityToScore(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length)
  if (magnitude(a, length) === 0 || magnitude(b, length) === 0) return 0
  return Math.max(0, Math.min(1, (cosineSimilarity(a, b) + 1) / 2))
}
