/**
 * PromptBuilderImpl: assembles generation prompts under a token budget.
 *
 * Sections, in output order:
 *  1. Request  (optional)   the user request and the high-level plan
 *  2. Task     (required)   file, mode and description of the work item
 *  3. Feedback (important)  reviewer feedback on the previous iteration
 *  4. History  (important)  retrieved context items in rank order; whole
 *                           items are added until the next one no longer fits
 *
 * Sections are budgeted in priority order (required → important → optional)
 * and emitted in output order. The blank lines joining sections count
 * against the budget. Assembly is deterministic: the same store
 * contents always yield the same prompt.
 */

import { createLogger } from '../../utils/logger.js'
import type { RetrievalResult, Retriever } from '../retrieval/index.js'
import { countTokens, truncateToTokens } from './token-counter.js'
import type { BuiltPrompt, PromptBuilder, PromptInput, SectionPriority, SectionReport } from './types.js'

const logger = createLogger('prompt-builder')

export const DEFAULT_TOKEN_BUDGET = 2000

/**
 * Fraction of the token budget that must remain (after required and
 * important sections) before an optional section is included.
 */
const OPTIONAL_BUDGET_THRESHOLD = 0.3

const PRIORITY_ORDER: Record<SectionPriority, number> = {
  required: 0,
  important: 1,
  optional: 2,
}

const HISTORY_HEADER = '## Relevant history'
const SECTION_SEPARATOR = '\n\n'
const FEEDBACK_HEADER = '## Previous iteration feedback'

interface SectionDraft {
  name: string
  priority: SectionPriority
  /** Position in the final prompt */
  position: number
  render(remainingTokens: number): { text: string; truncated: boolean }
}

export interface PromptBuilderOptions {
  retriever: Retriever
  /** Total token budget for the prompt (default: 2000) */
  tokenBudget?: number
  /** Cap on retrieved items (default: the retriever's own default) */
  maxResults?: number
}

export class PromptBuilderImpl implements PromptBuilder {
  private readonly _retriever: Retriever
  private readonly _budget: number
  private readonly _maxResults: number | undefined

  constructor(options: PromptBuilderOptions) {
    this._retriever = options.retriever
    this._budget = options.tokenBudget ?? DEFAULT_TOKEN_BUDGET
    this._maxResults = options.maxResults
    if (!Number.isInteger(this._budget) || this._budget <= 0) {
      throw new RangeError(`Prompt token budget must be a positive integer, got ${String(this._budget)}`)
    }
  }

  async build(input: PromptInput): Promise<BuiltPrompt> {
    const { item } = input
    const retrieved = await this._retriever.retrieve(item.tags, item.description, this._maxResults)
    const included: RetrievalResult[] = []

    const drafts: SectionDraft[] = [
      {
        name: 'request',
        priority: 'optional',
        position: 0,
        render: () => ({ text: formatRequest(input), truncated: false }),
      },
      {
        name: 'task',
        priority: 'required',
        position: 1,
        render: () => ({ text: formatTask(input), truncated: false }),
      },
      {
        name: 'history',
        priority: 'important',
        position: 3,
        render: (remaining) => {
          if (retrieved.length === 0) return { text: '', truncated: false }
          if (countTokens(HISTORY_HEADER) > remaining) return { text: '', truncated: true }
          let text = HISTORY_HEADER
          for (const hit of retrieved) {
            // cost the joined text so newlines count against the budget
            const next = `${text}\n${formatHit(hit)}`
            if (countTokens(next) > remaining) {
              return { text: included.length > 0 ? text : '', truncated: true }
            }
            text = next
            included.push(hit)
          }
          return { text, truncated: false }
        },
      },
    ]
    const feedback = input.previousFeedback?.trim() ?? ''
    if (feedback !== '') {
      // budgeted ahead of history
      drafts.splice(2, 0, {
        name: 'feedback',
        priority: 'important',
        position: 2,
        render: () => ({ text: `${FEEDBACK_HEADER}\n${feedback}`, truncated: false }),
      })
    }

    let remaining = this._budget
    let anyTruncated = false
    const rendered: { position: number; text: string }[] = []
    const reports: SectionReport[] = []

    for (const draft of sortByPriority(drafts)) {
      const report = (tokens: number, isIncluded: boolean, truncated: boolean): void => {
        reports.push({ name: draft.name, priority: draft.priority, tokens, included: isIncluded, truncated })
      }
      // every section after the first is joined by a separator
      const separator = rendered.length > 0 ? countTokens(SECTION_SEPARATOR) : 0

      if (draft.priority === 'required') {
        const { text } = draft.render(Number.POSITIVE_INFINITY)
        const tokens = countTokens(text)
        rendered.push({ position: draft.position, text })
        remaining -= tokens + separator
        report(tokens, true, false)
      } else if (draft.priority === 'important') {
        const available = Math.max(remaining - separator, 0)
        const result = draft.render(available)
        const text = truncateToTokens(result.text, available)
        const truncated = result.truncated || text !== result.text
        const tokens = countTokens(text)
        if (truncated) {
          anyTruncated = true
          logger.debug({ section: draft.name, remaining }, 'Section trimmed to fit token budget')
        }
        if (text.length > 0) {
          rendered.push({ position: draft.position, text })
          remaining -= tokens + separator
          report(tokens, true, truncated)
        } else {
          report(0, false, truncated)
        }
      } else {
        const { text } = draft.render(remaining - separator)
        const tokens = countTokens(text)
        const fraction = remaining / this._budget
        if (fraction > OPTIONAL_BUDGET_THRESHOLD && tokens + separator <= remaining) {
          rendered.push({ position: draft.position, text })
          remaining -= tokens + separator
          report(tokens, true, false)
        } else {
          if (tokens > 0) anyTruncated = true
          report(0, false, false)
        }
      }
    }

    const prompt = rendered
      .sort((a, b) => a.position - b.position)
      .map((part) => part.text)
      .filter((text) => text.length > 0)
      .join(SECTION_SEPARATOR)

    return {
      prompt,
      tokenCount: countTokens(prompt),
      sections: reports,
      truncated: anyTruncated,
      included,
    }
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatRequest(input: PromptInput): string {
  const lines = ['## Request', input.request.trim()]
  if (input.planSummary.trim() !== '') {
    lines.push('', '## Plan', input.planSummary.trim())
  }
  return lines.join('\n')
}

function formatTask(input: PromptInput): string {
  const { item } = input
  const action = item.fileStatus === 'existing' ? 'Update the existing file' : 'Create the new file'
  return [
    '## Task',
    `${action} \`${item.filePath}\` (mode: ${item.mode}).`,
    '',
    item.description.trim(),
  ].join('\n')
}

function formatHit(hit: RetrievalResult): string {
  const tags = hit.item.tags.length > 0 ? ` (tags: ${hit.item.tags.join(', ')})` : ''
  return `- [${hit.item.category}] ${hit.item.content.trim()}${tags}`
}

function sortByPriority(drafts: SectionDraft[]): SectionDraft[] {
  return [...drafts].sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority])
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createPromptBuilder(options: PromptBuilderOptions): PromptBuilder {
  return new PromptBuilderImpl(options)
}
