/**
 * Extraction and parsing of structured blocks from model output.
 *
 * Models answer with narrative text around the object we asked for.
 * Extraction strategy:
 * 1. Fenced blocks (```json, ```yaml or bare ```) containing an anchor key;
 *    the LAST one wins
 * 2. Fall back to the span from the first `{` to the last `}`
 * 3. Fall back to unfenced lines from the last anchor key to the end
 *
 * The block is parsed with js-yaml (YAML is a superset of JSON, so both
 * answer styles parse) and validated with a Zod schema.
 */

import yaml from 'js-yaml'
import type { ZodType, ZodTypeDef } from 'zod'

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string }

// ---------------------------------------------------------------------------
// extractStructuredBlock
// ---------------------------------------------------------------------------

/**
 * @param anchorKeys - Keys the block must mention, e.g. `quality_score`
 * @returns The raw block text, or null if nothing resembling one is found
 */
export function extractStructuredBlock(output: string, anchorKeys: readonly string[]): string | null {
  if (output.trim() === '') return null

  const fenced = extractLastFenced(output, anchorKeys)
  if (fenced !== null) return fenced

  const start = output.indexOf('{')
  const end = output.lastIndexOf('}')
  if (start !== -1 && end > start) {
    const span = output.slice(start, end + 1)
    if (mentionsAnchor(span, anchorKeys)) return span
  }

  return extractUnfenced(output, anchorKeys)
}

function extractLastFenced(output: string, anchorKeys: readonly string[]): string | null {
  const fencePattern = /```(?:json|yaml|yml)?[^\S\n]*\n([\s\S]*?)```/g
  let last: string | null = null
  let match: RegExpExecArray | null

  while ((match = fencePattern.exec(output)) !== null) {
    const content = match[1]
    if (content !== undefined && content.trim() !== '' && mentionsAnchor(content, anchorKeys)) {
      last = content.trim()
    }
  }
  return last
}

function extractUnfenced(output: string, anchorKeys: readonly string[]): string | null {
  const lines = output.split('\n')
  for (let i = lines.length - 1; i >= 0; i--) {
    const trimmed = lines[i]?.trim() ?? ''
    if (anchorKeys.some((key) => trimmed.startsWith(`${key}:`))) {
      const text = lines.slice(i).join('\n').trim()
      return text !== '' ? text : null
    }
  }
  return null
}

function mentionsAnchor(text: string, anchorKeys: readonly string[]): boolean {
  return anchorKeys.some((key) => text.includes(key))
}

// ---------------------------------------------------------------------------
// parseStructured
// ---------------------------------------------------------------------------

export function parseStructured<T>(text: string, schema: ZodType<T, ZodTypeDef, unknown>): ParseResult<T> {
  let raw: unknown
  try {
    raw = yaml.load(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { ok: false, error: `Parse error: ${message}` }
  }

  if (raw === null || raw === undefined) {
    return { ok: false, error: 'Block parsed to null or undefined' }
  }

  const result = schema.safeParse(raw)
  if (result.success) {
    return { ok: true, value: result.data }
  }
  const issues = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
  return { ok: false, error: `Schema validation error: ${issues}` }
}

/**
 * Extract then parse in one step.
 */
export function readStructuredOutput<T>(
  output: string,
  anchorKeys: readonly string[],
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParseResult<T> {
  const block = extractStructuredBlock(output, anchorKeys)
  if (block === null) {
    return { ok: false, error: `No structured block mentioning ${anchorKeys.join(' or ')} found` }
  }
  return parseStructured(block, schema)
}
