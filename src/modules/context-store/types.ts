/**
 * Types and Zod schemas for the context-store module.
 *
 * Sessions, activities and tasks are flat records related through
 * back-references (`sessionId`, `activityId`); context items point at any of
 * them through `parentId`.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// ContextCategory
// ---------------------------------------------------------------------------

export const CONTEXT_CATEGORIES = [
  'session',
  'activity',
  'task',
  'action',
  'decision',
  'learning',
  'result',
] as const

export const ContextCategorySchema = z.enum(CONTEXT_CATEGORIES)
export type ContextCategory = z.infer<typeof ContextCategorySchema>

// ---------------------------------------------------------------------------
// Hierarchy records
// ---------------------------------------------------------------------------

export const SessionRecordSchema = z.object({
  id: z.string().min(1),
  originalRequest: z.string(),
  highLevelPlan: z.string(),
  createdAt: z.string(),
})
export type SessionRecord = z.infer<typeof SessionRecordSchema>

export const ActivityRecordSchema = z.object({
  id: z.string().min(1),
  sessionId: z.string().min(1),
  description: z.string(),
  tags: z.array(z.string()),
  mode: z.string(),
  component: z.string(),
  plannerAnalysis: z.string(),
  createdAt: z.string(),
})
export type ActivityRecord = z.infer<typeof ActivityRecordSchema>

export const TaskRecordSchema = z.object({
  id: z.string().min(1),
  activityId: z.string().min(1),
  description: z.string(),
  tags: z.array(z.string()),
  result: z.string().nullable(),
  createdAt: z.string(),
})
export type TaskRecord = z.infer<typeof TaskRecordSchema>

// ---------------------------------------------------------------------------
// ContextItem
// ---------------------------------------------------------------------------

export const ContextItemSchema = z.object({
  id: z.string().min(1),
  /** Position in the append-only log, starting at 1 */
  seq: z.number().int().positive(),
  content: z.string(),
  category: ContextCategorySchema,
  /** Normalized tags */
  tags: z.array(z.string()),
  parentId: z.string().nullable(),
  createdAt: z.string(),
})
export type ContextItem = Readonly<
  Omit<z.infer<typeof ContextItemSchema>, 'tags'> & { tags: readonly string[] }
>

// ---------------------------------------------------------------------------
// Cursor
// ---------------------------------------------------------------------------

export const ContextCursorSchema = z.object({
  sessionId: z.string().nullable(),
  activityId: z.string().nullable(),
  taskId: z.string().nullable(),
})
export type ContextCursor = z.infer<typeof ContextCursorSchema>

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface CreateSessionInput {
  id: string
  originalRequest: string
  highLevelPlan: string
}

export interface CreateActivityInput {
  id: string
  sessionId: string
  description: string
  tags: readonly string[]
  mode: string
  component: string
  plannerAnalysis: string
}

export interface CreateTaskInput {
  id: string
  activityId: string
  description: string
  tags: readonly string[]
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export const ContextSnapshotSchema = z.object({
  sessions: z.array(SessionRecordSchema),
  activities: z.array(ActivityRecordSchema),
  tasks: z.array(TaskRecordSchema),
  items: z.array(ContextItemSchema),
  cursor: ContextCursorSchema,
})
export type ContextSnapshot = z.infer<typeof ContextSnapshotSchema>

export interface ContextStoreStats {
  sessions: number
  activities: number
  tasks: number
  items: number
}
