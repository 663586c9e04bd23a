/**
 * CLI output formatting utilities
 *
 * Provides human-readable table formatting for run listings.
 */

import type { RunRecord } from '../../persistence/index.js'

/**
 * A row in the run list table.
 */
export interface RunListRow {
  id: string
  status: string
  items: string
  created: string
  request: string
}

const REQUEST_PREVIEW_LENGTH = 48

/**
 * Build run list rows from checkpoint records.
 * `items` reads "<done>/<total>"; long requests are cut to one short line.
 */
export function buildRunListRows(runs: readonly RunRecord[]): RunListRow[] {
  return runs.map((run) => {
    const counts = run.itemCounts
    const total =
      (counts.pending ?? 0) + (counts.in_progress ?? 0) + (counts.done ?? 0) + (counts.failed ?? 0)
    const firstLine = run.request.split('\n')[0] ?? ''
    return {
      id: run.id,
      status: run.status,
      items: `${String(counts.done ?? 0)}/${String(total)}`,
      created: run.createdAt,
      request:
        firstLine.length > REQUEST_PREVIEW_LENGTH
          ? `${firstLine.slice(0, REQUEST_PREVIEW_LENGTH - 3)}...`
          : firstLine,
    }
  })
}

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects
 * @param keys    - Object keys to read from each row (in column order)
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => Math.max(max, (row[key] ?? '').length), 0)
    return Math.max(header.length, dataMax)
  })

  const pad = (values: string[]): string =>
    values
      .map((value, i) => value.padEnd(widths[i] ?? value.length))
      .join(' | ')
      .trimEnd()

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const dataRows = rows.map((row) => pad(keys.map((key) => row[key] ?? '')))

  return [pad(headers), separator, ...dataRows].join('\n')
}

/**
 * Format run list rows as a human-readable table.
 */
export function formatRunListTable(rows: RunListRow[]): string {
  const headers = ['Run', 'Status', 'Items', 'Created', 'Request']
  const keys = ['id', 'status', 'items', 'created', 'request']
  const tableRows: Record<string, string>[] = rows.map((r) => ({
    id: r.id,
    status: r.status,
    items: r.items,
    created: r.created,
    request: r.request,
  }))
  return formatTable(headers, tableRows, keys)
}
