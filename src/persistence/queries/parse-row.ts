/**
 * Row validation shared by the query modules.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { CheckpointError } from '../../core/errors.js'

export function parseRow<T>(schema: ZodType<T, ZodTypeDef, unknown>, row: unknown, table: string): T {
  const result = schema.safeParse(row)
  if (!result.success) {
    throw new CheckpointError(`Malformed row in ${table}`, { table, issues: result.error.issues })
  }
  return result.data
}

export function parseJsonColumn<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  text: string,
  table: string,
  column: string,
): T {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new CheckpointError(`Column ${table}.${column} is not valid JSON`, {
      table,
      column,
      cause: err instanceof Error ? err.message : String(err),
    })
  }
  return parseRow(schema, raw, `${table}.${column}`)
}
