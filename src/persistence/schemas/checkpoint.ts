/**
 * Zod schemas for checkpoint rows.
 *
 * Rows come back from better-sqlite3 untyped; every query parses them with
 * these schemas before handing them out.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const RunStatusEnum = z.enum(['planning', 'running', 'completed', 'invalid', 'aborted'])

export const WorkItemStatusEnum = z.enum(['pending', 'in_progress', 'done', 'failed'])

export const OutcomeReasonEnum = z.enum([
  'accepted',
  'quality_exhausted',
  'transport_failed',
  'dependency_failed',
])

// ---------------------------------------------------------------------------
// JSON column payloads
// ---------------------------------------------------------------------------

export const QualityJudgmentSchema = z.object({
  score: z.number(),
  passed: z.boolean(),
  feedback: z.string(),
})

export const BatchesSchema = z.array(z.array(z.number().int().nonnegative()))

export const TagsSchema = z.array(z.string())

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

export const RunRowSchema = z.object({
  id: z.string(),
  request: z.string(),
  status: RunStatusEnum,
  plan_json: z.string().nullable(),
  batches_json: z.string().nullable(),
  cursor_json: z.string().nullable(),
  error_code: z.string().nullable(),
  error_message: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
})
export type RunRow = z.infer<typeof RunRowSchema>

export const RunItemRowSchema = z.object({
  run_id: z.string(),
  item_id: z.string(),
  position: z.number().int(),
  definition_json: z.string(),
  status: WorkItemStatusEnum,
  iteration_count: z.number().int(),
  last_judgment_json: z.string().nullable(),
  result: z.string().nullable(),
  reason: OutcomeReasonEnum.nullable(),
  message: z.string().nullable(),
  updated_at: z.string(),
})
export type RunItemRow = z.infer<typeof RunItemRowSchema>

export const ContextSessionRowSchema = z.object({
  id: z.string(),
  original_request: z.string(),
  high_level_plan: z.string(),
  created_at: z.string(),
})

export const ContextActivityRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  description: z.string(),
  tags_json: z.string(),
  mode: z.string(),
  component: z.string(),
  planner_analysis: z.string(),
  created_at: z.string(),
})

export const ContextTaskRowSchema = z.object({
  id: z.string(),
  activity_id: z.string(),
  description: z.string(),
  tags_json: z.string(),
  result: z.string().nullable(),
  created_at: z.string(),
})

export const ContextItemRowSchema = z.object({
  seq: z.number().int(),
  id: z.string(),
  content: z.string(),
  category: z.string(),
  tags_json: z.string(),
  parent_id: z.string().nullable(),
  created_at: z.string(),
})

export const RunItemCountRowSchema = z.object({
  status: WorkItemStatusEnum,
  count: z.number().int(),
})
