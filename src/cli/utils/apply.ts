/**
 * Write accepted results to their target files under the project root.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path'
import type { ItemOutcome } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('cli:apply')

export interface ApplyReport {
  /** Paths written, relative to the project root */
  written: string[]
  /** Target paths that resolve outside the project root */
  refused: string[]
}

/** Resolve `filePath` against `root`; undefined when it escapes the root */
export function resolveWithinRoot(root: string, filePath: string): string | undefined {
  const base = resolve(root)
  const target = resolve(base, filePath)
  const rel = relative(base, target)
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return undefined
  }
  return target
}

/**
 * Write the result of every accepted outcome. Failed items and outcomes
 * without a result are left alone.
 */
export async function applyResults(projectRoot: string, outcomes: readonly ItemOutcome[]): Promise<ApplyReport> {
  const report: ApplyReport = { written: [], refused: [] }

  for (const outcome of outcomes) {
    if (outcome.status !== 'done' || outcome.result === undefined) continue

    const target = resolveWithinRoot(projectRoot, outcome.filePath)
    if (target === undefined) {
      logger.warn({ itemId: outcome.itemId, filePath: outcome.filePath }, 'Refusing to write outside the project root')
      report.refused.push(outcome.filePath)
      continue
    }

    await mkdir(dirname(target), { recursive: true })
    await writeFile(target, outcome.result, 'utf-8')
    report.written.push(relative(resolve(projectRoot), target))
    logger.debug({ itemId: outcome.itemId, target }, 'Result written')
  }

  return report
}
