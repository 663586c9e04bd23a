/**
 * ContextStore: public interface for the context-store module.
 *
 * The store owns every session, activity, task and context item of a process
 * and is their only mutator. Items are append-only: nothing but `clear()` or
 * `restore()` removes or changes one.
 */

import type {
  ActivityRecord,
  ContextCategory,
  ContextCursor,
  ContextItem,
  ContextSnapshot,
  ContextStoreStats,
  CreateActivityInput,
  CreateSessionInput,
  CreateTaskInput,
  SessionRecord,
  TaskRecord,
} from './types.js'

export interface ContextStore {
  // -------------------------------------------------------------------------
  // Hierarchy
  // -------------------------------------------------------------------------

  /**
   * Register a session and make it current (activity and task cursors reset).
   * @throws {StoreInvariantError} if the id is already taken
   */
  createSession(input: CreateSessionInput): SessionRecord

  /**
   * Register an activity under an existing session and make it current.
   * @throws {StoreInvariantError} on a duplicate id or unknown session
   */
  createActivity(input: CreateActivityInput): ActivityRecord

  /**
   * Register a task under an existing activity and make it current.
   * @throws {StoreInvariantError} on a duplicate id or unknown activity
   */
  createTask(input: CreateTaskInput): TaskRecord

  /** Record the final result of a task */
  completeTask(taskId: string, result: string): TaskRecord

  getSession(id: string): SessionRecord | undefined
  getActivity(id: string): ActivityRecord | undefined
  getTask(id: string): TaskRecord | undefined
  getActivitiesForSession(sessionId: string): ActivityRecord[]
  getTasksForActivity(activityId: string): TaskRecord[]

  getCurrentSession(): SessionRecord | undefined
  getCurrentActivity(): ActivityRecord | undefined
  getCurrentTask(): TaskRecord | undefined
  getCursor(): ContextCursor

  // -------------------------------------------------------------------------
  // Items
  // -------------------------------------------------------------------------

  /**
   * Append an item. Tags are normalized before storage.
   * @throws {StoreInvariantError} if `parentId` names no session, activity or task
   */
  addItem(
    content: string,
    category: ContextCategory,
    tags: readonly string[],
    parentId?: string | null,
  ): ContextItem

  /** Items sharing at least one normalized tag with `tags`, in log order */
  getItemsByTags(tags: readonly string[]): ContextItem[]
  /** Items of one category, in log order */
  getItemsByCategory(category: ContextCategory): ContextItem[]
  /** Items attached to a session, activity or task, in log order */
  getItemsForParent(parentId: string): ContextItem[]
  /** The whole log, in order */
  getAllItems(): ContextItem[]

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  getStats(): ContextStoreStats
  /** Serializable copy of everything in the store */
  snapshot(): ContextSnapshot
  /**
   * Replace the store contents with a snapshot.
   * @throws {StoreInvariantError} if the snapshot breaks a reference invariant
   */
  restore(snapshot: ContextSnapshot): void
  /** Drop everything. For test isolation and explicit teardown only. */
  clear(): void
}
