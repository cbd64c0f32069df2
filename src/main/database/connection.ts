import Database from 'better-sqlite3'
import { mkdirSync } from 'fs'
import { dirname } from 'path'
import { getDatabasePath } from '../config'
import { trigramSimilarity } from '../utils/trigram'
import { weightedRank } from '../utils/rank'
import type { WeightedField } from '../utils/rank'
import { runMigrations } from './migrations/001-initial-schema'
import { runFtsMigration } from './migrations/002-fts5-tables'
import { runStageMetaMigration } from './migrations/003-stage-meta'
import { runDealAuditMigration } from './migrations/004-deal-audit'

let db: Database.Database | null = null

function registerFunctions(database: Database.Database): void {
  database.function('similarity', { deterministic: true }, (left: unknown, right: unknown) => {
    if (typeof left !== 'string' || typeof right !== 'string') return 0
    return trigramSimilarity(left, right)
  })

  // field_rank(terms, weight1, text1, weight2, text2, ...)
  database.function('field_rank', { deterministic: true, varargs: true }, (terms: unknown, ...pairs: unknown[]) => {
    if (typeof terms !== 'string') return 0
    const fields: WeightedField[] = []
    for (let i = 0; i + 1 < pairs.length; i += 2) {
      const weight = pairs[i]
      const text = pairs[i + 1]
      if (typeof weight !== 'number') continue
      fields.push({ weight, text: typeof text === 'string' ? text : null })
    }
    return weightedRank(terms.split(' '), fields)
  })
}

export function getDatabase(): Database.Database {
  if (!db) {
    const path = getDatabasePath()
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true })
    }
    db = new Database(path)
    db.pragma('journal_mode = WAL')
    db.pragma('foreign_keys = ON')
    registerFunctions(db)
    runMigrations(db)
    runFtsMigration(db)
    runStageMetaMigration(db)
    runDealAuditMigration(db)
  }
  return db
}

export function closeDatabase(): void {
  if (db) {
    db.close()
    db = null
  }
}

/**
 * Runs `fn` in a `BEGIN IMMEDIATE` transaction: the write lock is taken before
 * the first read, so concurrent writers on the same database serialize.
 * Throwing inside `fn` rolls everything back.
 */
export function runInWriteTransaction<T>(fn: () => T): T {
  const database = getDatabase()
  return database.transaction(fn).immediate()
}
