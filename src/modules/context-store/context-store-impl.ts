/**
 * InMemoryContextStore: flat, append-only implementation of ContextStore.
 *
 * Sessions, activities and tasks live in independent maps keyed by id;
 * hierarchy is only ever answered by query. Items are frozen on insert.
 */

import { StoreInvariantError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { defaultTagNormalizer } from '../tag-normalizer/index.js'
import type { TagNormalizer } from '../tag-normalizer/index.js'
import type { ContextStore } from './context-store.js'
import {
  ContextSnapshotSchema,
  type ActivityRecord,
  type ContextCategory,
  type ContextCursor,
  type ContextItem,
  type ContextSnapshot,
  type ContextStoreStats,
  type CreateActivityInput,
  type CreateSessionInput,
  type CreateTaskInput,
  type SessionRecord,
  type TaskRecord,
} from './types.js'

const logger = createLogger('context-store')

export interface ContextStoreOptions {
  tagNormalizer?: TagNormalizer
  /** Clock used for `createdAt` stamps */
  now?: () => Date
}

const EMPTY_CURSOR: ContextCursor = { sessionId: null, activityId: null, taskId: null }

export class InMemoryContextStore implements ContextStore {
  private readonly _normalizer: TagNormalizer
  private readonly _now: () => Date

  private readonly _sessions = new Map<string, SessionRecord>()
  private readonly _activities = new Map<string, ActivityRecord>()
  private readonly _tasks = new Map<string, TaskRecord>()
  private _items: ContextItem[] = []
  private _seq = 0
  private _cursor: ContextCursor = { ...EMPTY_CURSOR }

  constructor(options: ContextStoreOptions = {}) {
    this._normalizer = options.tagNormalizer ?? defaultTagNormalizer
    this._now = options.now ?? (() => new Date())
  }

  // -------------------------------------------------------------------------
  // Hierarchy
  // -------------------------------------------------------------------------

  createSession(input: CreateSessionInput): SessionRecord {
    this._assertUnusedId(input.id)
    const session: SessionRecord = {
      id: input.id,
      originalRequest: input.originalRequest,
      highLevelPlan: input.highLevelPlan,
      createdAt: this._stamp(),
    }
    this._sessions.set(session.id, session)
    this._cursor = { sessionId: session.id, activityId: null, taskId: null }
    logger.debug({ sessionId: session.id }, 'Session created')
    return { ...session }
  }

  createActivity(input: CreateActivityInput): ActivityRecord {
    this._assertUnusedId(input.id)
    if (!this._sessions.has(input.sessionId)) {
      throw new StoreInvariantError(
        `Activity "${input.id}" references unknown session "${input.sessionId}"`,
        { activityId: input.id, sessionId: input.sessionId },
      )
    }
    const activity: ActivityRecord = {
      id: input.id,
      sessionId: input.sessionId,
      description: input.description,
      tags: this._normalizer.normalizeTags(input.tags),
      mode: input.mode,
      component: input.component,
      plannerAnalysis: input.plannerAnalysis,
      createdAt: this._stamp(),
    }
    this._activities.set(activity.id, activity)
    this._cursor = { sessionId: activity.sessionId, activityId: activity.id, taskId: null }
    return cloneActivity(activity)
  }

  createTask(input: CreateTaskInput): TaskRecord {
    this._assertUnusedId(input.id)
    const activity = this._activities.get(input.activityId)
    if (activity === undefined) {
      throw new StoreInvariantError(
        `Task "${input.id}" references unknown activity "${input.activityId}"`,
        { taskId: input.id, activityId: input.activityId },
      )
    }
    const task: TaskRecord = {
      id: input.id,
      activityId: input.activityId,
      description: input.description,
      tags: this._normalizer.normalizeTags(input.tags),
      result: null,
      createdAt: this._stamp(),
    }
    this._tasks.set(task.id, task)
    this._cursor = { sessionId: activity.sessionId, activityId: activity.id, taskId: task.id }
    return cloneTask(task)
  }

  completeTask(taskId: string, result: string): TaskRecord {
    const task = this._tasks.get(taskId)
    if (task === undefined) {
      throw new StoreInvariantError(`Cannot complete unknown task "${taskId}"`, { taskId })
    }
    const completed: TaskRecord = { ...task, result }
    this._tasks.set(taskId, completed)
    return cloneTask(completed)
  }

  getSession(id: string): SessionRecord | undefined {
    const session = this._sessions.get(id)
    return session !== undefined ? { ...session } : undefined
  }

  getActivity(id: string): ActivityRecord | undefined {
    const activity = this._activities.get(id)
    return activity !== undefined ? cloneActivity(activity) : undefined
  }

  getTask(id: string): TaskRecord | undefined {
    const task = this._tasks.get(id)
    return task !== undefined ? cloneTask(task) : undefined
  }

  getActivitiesForSession(sessionId: string): ActivityRecord[] {
    return [...this._activities.values()]
      .filter((a) => a.sessionId === sessionId)
      .map(cloneActivity)
  }

  getTasksForActivity(activityId: string): TaskRecord[] {
    return [...this._tasks.values()].filter((t) => t.activityId === activityId).map(cloneTask)
  }

  getCurrentSession(): SessionRecord | undefined {
    return this._cursor.sessionId !== null ? this.getSession(this._cursor.sessionId) : undefined
  }

  getCurrentActivity(): ActivityRecord | undefined {
    return this._cursor.activityId !== null ? this.getActivity(this._cursor.activityId) : undefined
  }

  getCurrentTask(): TaskRecord | undefined {
    return this._cursor.taskId !== null ? this.getTask(this._cursor.taskId) : undefined
  }

  getCursor(): ContextCursor {
    return { ...this._cursor }
  }

  // -------------------------------------------------------------------------
  // Items
  // -------------------------------------------------------------------------

  addItem(
    content: string,
    category: ContextCategory,
    tags: readonly string[],
    parentId: string | null = null,
  ): ContextItem {
    if (parentId !== null && !this._hasRecord(parentId)) {
      throw new StoreInvariantError(
        `Context item references unknown parent "${parentId}"`,
        { parentId, category },
      )
    }
    this._seq += 1
    const item: ContextItem = Object.freeze({
      id: `ctx-${String(this._seq)}`,
      seq: this._seq,
      content,
      category,
      tags: Object.freeze(this._normalizer.normalizeTags(tags)),
      parentId,
      createdAt: this._stamp(),
    })
    this._items.push(item)
    logger.trace({ id: item.id, category, tags: item.tags }, 'Context item added')
    return item
  }

  getItemsByTags(tags: readonly string[]): ContextItem[] {
    const wanted = new Set(this._normalizer.normalizeTags(tags))
    if (wanted.size === 0) return []
    return this._items.filter((item) => item.tags.some((tag) => wanted.has(tag)))
  }

  getItemsByCategory(category: ContextCategory): ContextItem[] {
    return this._items.filter((item) => item.category === category)
  }

  getItemsForParent(parentId: string): ContextItem[] {
    return this._items.filter((item) => item.parentId === parentId)
  }

  getAllItems(): ContextItem[] {
    return [...this._items]
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  getStats(): ContextStoreStats {
    return {
      sessions: this._sessions.size,
      activities: this._activities.size,
      tasks: this._tasks.size,
      items: this._items.length,
    }
  }

  snapshot(): ContextSnapshot {
    return {
      sessions: [...this._sessions.values()].map((s) => ({ ...s })),
      activities: [...this._activities.values()].map(cloneActivity),
      tasks: [...this._tasks.values()].map(cloneTask),
      items: this._items.map((item) => ({ ...item, tags: [...item.tags] })),
      cursor: { ...this._cursor },
    }
  }

  restore(snapshot: ContextSnapshot): void {
    const parsed = ContextSnapshotSchema.safeParse(snapshot)
    if (!parsed.success) {
      throw new StoreInvariantError('Context snapshot is malformed', {
        issues: parsed.error.issues,
      })
    }
    const data = parsed.data

    const sessions = new Map(data.sessions.map((s) => [s.id, s]))
    const activities = new Map(data.activities.map((a) => [a.id, a]))
    const tasks = new Map(data.tasks.map((t) => [t.id, t]))

    for (const activity of activities.values()) {
      if (!sessions.has(activity.sessionId)) {
        throw new StoreInvariantError(
          `Snapshot activity "${activity.id}" references unknown session "${activity.sessionId}"`,
          { activityId: activity.id },
        )
      }
    }
    for (const task of tasks.values()) {
      if (!activities.has(task.activityId)) {
        throw new StoreInvariantError(
          `Snapshot task "${task.id}" references unknown activity "${task.activityId}"`,
          { taskId: task.id },
        )
      }
    }
    const known = (id: string): boolean => sessions.has(id) || activities.has(id) || tasks.has(id)
    const items = [...data.items].sort((a, b) => a.seq - b.seq)
    for (const item of items) {
      if (item.parentId !== null && !known(item.parentId)) {
        throw new StoreInvariantError(
          `Snapshot item "${item.id}" references unknown parent "${item.parentId}"`,
          { itemId: item.id, parentId: item.parentId },
        )
      }
    }
    const { cursor } = data
    if (
      (cursor.sessionId !== null && !sessions.has(cursor.sessionId)) ||
      (cursor.activityId !== null && !activities.has(cursor.activityId)) ||
      (cursor.taskId !== null && !tasks.has(cursor.taskId))
    ) {
      throw new StoreInvariantError('Snapshot cursor references a nonexistent record', { cursor })
    }

    this.clear()
    for (const [id, s] of sessions) this._sessions.set(id, s)
    for (const [id, a] of activities) this._activities.set(id, a)
    for (const [id, t] of tasks) this._tasks.set(id, t)
    this._items = items.map((item) => Object.freeze({ ...item, tags: Object.freeze([...item.tags]) }))
    this._seq = items.reduce((max, item) => Math.max(max, item.seq), 0)
    this._cursor = { ...cursor }
    logger.debug({ items: this._items.length }, 'Context store restored from snapshot')
  }

  clear(): void {
    this._sessions.clear()
    this._activities.clear()
    this._tasks.clear()
    this._items = []
    this._seq = 0
    this._cursor = { ...EMPTY_CURSOR }
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _stamp(): string {
    return this._now().toISOString()
  }

  private _hasRecord(id: string): boolean {
    return this._sessions.has(id) || this._activities.has(id) || this._tasks.has(id)
  }

  /** Ids are unique across sessions, activities and tasks so that `parentId` is unambiguous */
  private _assertUnusedId(id: string): void {
    if (id.trim() === '') {
      throw new StoreInvariantError('Context record id must not be empty')
    }
    if (this._hasRecord(id)) {
      throw new StoreInvariantError(`Context record id "${id}" is already in use`, { id })
    }
  }
}

function cloneActivity(activity: ActivityRecord): ActivityRecord {
  return { ...activity, tags: [...activity.tags] }
}

function cloneTask(task: TaskRecord): TaskRecord {
  return { ...task, tags: [...task.tags] }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createContextStore(options: ContextStoreOptions = {}): ContextStore {
  return new InMemoryContextStore(options)
}
