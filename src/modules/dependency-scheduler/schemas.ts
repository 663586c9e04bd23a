/**
 * Zod schemas for plans as produced by a planner.
 *
 * Planner output uses snake_case keys; parsing yields the camelCase
 * `Plan` / `WorkItemDefinition` shapes from core/types.ts.
 */

import { z } from 'zod'
import type { Plan, WorkItemDefinition } from '../../core/types.js'

export const FileStatusSchema = z.enum(['new', 'existing'])

export const RawWorkItemSchema = z.object({
  id: z.string().trim().min(1, 'id must not be empty'),
  file_path: z.string().trim().min(1, 'file_path must not be empty'),
  file_status: FileStatusSchema.default('new'),
  mode: z.string().trim().min(1).default('coder'),
  description: z.string().trim().min(1, 'description must not be empty'),
  dependency_ids: z.array(z.number()).default([]),
  tags: z.array(z.string()).default([]),
})
export type RawWorkItem = z.input<typeof RawWorkItemSchema>

export const WorkItemDefinitionSchema = RawWorkItemSchema.transform(
  (raw): WorkItemDefinition => ({
    id: raw.id,
    filePath: raw.file_path,
    fileStatus: raw.file_status,
    mode: raw.mode,
    description: raw.description,
    dependencyIds: raw.dependency_ids,
    tags: raw.tags,
  }),
)

export const PlanSchema = z
  .object({
    summary: z.string().default(''),
    rationale: z.string().default(''),
    work_items: z.array(WorkItemDefinitionSchema).min(1, 'plan must contain at least one work item'),
  })
  .transform(
    (raw): Plan => ({
      summary: raw.summary,
      rationale: raw.rationale,
      items: raw.work_items,
    }),
  )
export type RawPlan = z.input<typeof PlanSchema>

/**
 * Schema for a plan already in camelCase form (checkpoints, programmatic planners).
 */
export const PlanDefinitionSchema = z.object({
  summary: z.string(),
  rationale: z.string(),
  items: z.array(
    z.object({
      id: z.string().min(1),
      filePath: z.string().min(1),
      fileStatus: FileStatusSchema,
      mode: z.string().min(1),
      description: z.string(),
      dependencyIds: z.array(z.number()),
      tags: z.array(z.string()),
    }),
  ),
})
