/**
 * Approximate token counting for prompt assembly.
 *
 * chars/4, raised by 10% when the text contains a fenced code block, since
 * generated source tokenizes denser than prose.
 */

const CHARS_PER_TOKEN = 4
const CODE_BLOCK_ADJUSTMENT = 1.1
const CODE_BLOCK_MARKER = '```'

export function countTokens(text: string): number {
  if (text.length === 0) return 0

  const base = text.length / CHARS_PER_TOKEN
  const adjusted = text.includes(CODE_BLOCK_MARKER) ? base * CODE_BLOCK_ADJUSTMENT : base
  return Math.ceil(adjusted)
}

/**
 * Cut `text` down to roughly `maxTokens`, preferring a word boundary within
 * the last 50 characters, and mark the cut with `…`.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (maxTokens <= 0) return ''
  if (countTokens(text) <= maxTokens) return text

  const multiplier = text.includes(CODE_BLOCK_MARKER) ? CODE_BLOCK_ADJUSTMENT : 1
  // leave one token of room for the ellipsis
  const targetChars = Math.floor(((maxTokens - 1) * CHARS_PER_TOKEN) / multiplier)
  if (targetChars <= 0) return ''

  const rough = text.slice(0, targetChars)
  const lastSpace = rough.lastIndexOf(' ')
  const cut = lastSpace > targetChars - 50 && lastSpace > 0 ? rough.slice(0, lastSpace) : rough
  return cut + '…'
}
