/**
 * Tests for the migration runner.
 *
 * Validates:
 *  - schema_migrations table is created on first run
 *  - Run and context tables and indexes are created
 *  - Running migrations twice is idempotent (no errors)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations, MIGRATIONS } from '../../../src/persistence/migrations/index.js'

function openMemoryDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  db.pragma('foreign_keys = ON')
  return db
}

function objectNamed(db: BetterSqlite3Database, type: string, name: string): string | undefined {
  return db
    .prepare<[string, string], { name: string }>('SELECT name FROM sqlite_master WHERE type = ? AND name = ?')
    .get(type, name)?.name
}

describe('runMigrations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('creates the schema_migrations table', () => {
    runMigrations(db)
    expect(objectNamed(db, 'table', 'schema_migrations')).toBe('schema_migrations')
  })

  it('records every registered migration in version order', () => {
    runMigrations(db)
    const rows = db
      .prepare<[], { version: number; name: string }>('SELECT version, name FROM schema_migrations ORDER BY version')
      .all()
    expect(rows).toEqual([
      { version: 1, name: '001-run-schema' },
      { version: 2, name: '002-context-schema' },
    ])
    expect(rows).toHaveLength(MIGRATIONS.length)
  })

  it('creates all required tables', () => {
    runMigrations(db)
    const tables = [
      'runs',
      'run_items',
      'context_sessions',
      'context_activities',
      'context_tasks',
      'context_items',
    ]
    for (const table of tables) {
      expect(objectNamed(db, 'table', table), `Expected table "${table}" to exist`).toBe(table)
    }
  })

  it('creates the run indexes', () => {
    runMigrations(db)
    for (const idx of ['idx_runs_created', 'idx_run_items_status']) {
      expect(objectNamed(db, 'index', idx), `Expected index "${idx}" to exist`).toBe(idx)
    }
  })

  it('cascades run deletion to its items', () => {
    runMigrations(db)
    db.prepare("INSERT INTO runs (id, request) VALUES ('r1', 'build it')").run()
    db.prepare(
      "INSERT INTO run_items (run_id, item_id, position, definition_json) VALUES ('r1', 'w1', 0, '{}')",
    ).run()
    db.prepare("DELETE FROM runs WHERE id = 'r1'").run()
    const count = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM run_items').get()
    expect(count?.n).toBe(0)
  })

  it('is idempotent: re-running does not throw', () => {
    runMigrations(db)
    expect(() => runMigrations(db)).not.toThrow()
  })

  it('does not re-apply already-applied migrations', () => {
    runMigrations(db)
    runMigrations(db)

    const rows = db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations WHERE version = 1')
      .all()
    expect(rows.length).toBe(1)
  })
})
