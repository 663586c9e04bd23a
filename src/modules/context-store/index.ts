/**
 * context-store module: public API re-exports
 */

export type { ContextStore } from './context-store.js'
export {
  InMemoryContextStore,
  createContextStore,
} from './context-store-impl.js'
export type { ContextStoreOptions } from './context-store-impl.js'

export type {
  ContextCategory,
  SessionRecord,
  ActivityRecord,
  TaskRecord,
  ContextItem,
  ContextCursor,
  ContextSnapshot,
  ContextStoreStats,
  CreateSessionInput,
  CreateActivityInput,
  CreateTaskInput,
} from './types.js'
export {
  CONTEXT_CATEGORIES,
  ContextCategorySchema,
  ContextCursorSchema,
  ContextItemSchema,
  ContextSnapshotSchema,
} from './types.js'
