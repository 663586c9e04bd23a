/**
 * Persistence layer: public API re-exports
 */

export {
  CheckpointDatabase,
  createCheckpointDatabase,
  databasePathFor,
  DATABASE_FILENAME,
  IN_MEMORY,
} from './database.js'
export { runMigrations, MIGRATIONS } from './migrations/index.js'
export type { Migration } from './migrations/index.js'
export { SqliteCheckpointStore, createCheckpointStore } from './checkpoint-store.js'
export type { CheckpointStore, RunRecord, RunItemState, LoadedRun } from './checkpoint-store.js'
