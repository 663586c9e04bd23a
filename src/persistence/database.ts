/**
 * The checkpoint database: one SQLite file per project state directory.
 *
 * initialize() opens the file, applies the connection PRAGMAs and brings
 * the schema up to date; shutdown() closes it. Both are idempotent, and a
 * shut-down database can be initialized again.
 */

import { join } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { CheckpointError } from '../core/errors.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const DATABASE_FILENAME = 'threadsmith.db'
export const IN_MEMORY = ':memory:'

export class CheckpointDatabase implements BaseService {
  private _db: BetterSqlite3Database | null = null

  constructor(readonly path: string) {}

  /** Connection for the query modules; only valid between initialize() and shutdown() */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new CheckpointError('Checkpoint database is not open', { path: this.path })
    }
    return this._db
  }

  async initialize(): Promise<void> {
    if (this._db !== null) return

    const db = new BetterSqlite3(this.path)
    try {
      // an in-memory database keeps journal_mode=memory
      const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true })
      if (journalMode !== 'wal' && this.path !== IN_MEMORY) {
        logger.warn({ path: this.path, journalMode }, 'WAL journal mode not available')
      }
      db.pragma('busy_timeout = 5000')
      db.pragma('synchronous = NORMAL')
      db.pragma('foreign_keys = ON')
      runMigrations(db)
    } catch (err) {
      db.close()
      throw err
    }

    this._db = db
    logger.debug({ path: this.path }, 'Checkpoint database ready')
  }

  async shutdown(): Promise<void> {
    if (this._db === null) return
    this._db.close()
    this._db = null
    logger.debug({ path: this.path }, 'Checkpoint database closed')
  }
}

export function createCheckpointDatabase(databasePath: string): CheckpointDatabase {
  return new CheckpointDatabase(databasePath)
}

/** Location of the checkpoint database inside a state directory */
export function databasePathFor(stateDir: string): string {
  return join(stateDir, DATABASE_FILENAME)
}
