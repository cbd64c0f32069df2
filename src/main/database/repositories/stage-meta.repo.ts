import { getDatabase, runInWriteTransaction } from '../connection'
import type { StageMetaRow } from '../schema'
import { ValidationError } from '../../errors'
import { isDealStageKey } from '../../../shared/types/pipeline'
import type { DealStageKey, StageMeta, StageMetaPatch } from '../../../shared/types/pipeline'

function mapStage(row: StageMetaRow): StageMeta {
  if (!isDealStageKey(row.key)) {
    throw new ValidationError(`Unknown stage key in catalog: ${row.key}`)
  }
  return {
    key: row.key,
    displayName: row.display_name,
    sortOrder: row.sort_order,
    probability: row.probability,
    isWon: row.is_won === 1,
    isLost: row.is_lost === 1
  }
}

export function listStageMeta(): StageMeta[] {
  const db = getDatabase()
  const rows = db
    .prepare(`
      SELECT key, display_name, sort_order, probability, is_won, is_lost
      FROM stage_meta
      ORDER BY sort_order ASC
    `)
    .all() as StageMetaRow[]
  return rows.map(mapStage)
}

export function getStageMeta(key: DealStageKey): StageMeta | null {
  const db = getDatabase()
  const row = db
    .prepare(`
      SELECT key, display_name, sort_order, probability, is_won, is_lost
      FROM stage_meta
      WHERE key = ?
      LIMIT 1
    `)
    .get(key) as StageMetaRow | undefined
  return row ? mapStage(row) : null
}

/**
 * Edits a stage, or adds it back when its key is missing from the catalog (a
 * new row needs a display name, probability and sort order).
 */
export function upsertStageMeta(key: DealStageKey, patch: StageMetaPatch): StageMeta {
  const db = getDatabase()
  const existing = getStageMeta(key)
  if (!existing) {
    if (patch.displayName === undefined || patch.probability === undefined || patch.sortOrder === undefined) {
      throw new ValidationError(`Stage ${key} needs a display name, probability and sort order`)
    }
  }

  const displayName = (patch.displayName ?? existing?.displayName ?? '').trim()
  if (!displayName) throw new ValidationError('Stage display name is required')

  const probability = patch.probability ?? existing?.probability ?? 0
  if (!Number.isInteger(probability) || probability < 0 || probability > 100) {
    throw new ValidationError('Stage probability must be an integer between 0 and 100')
  }

  const sortOrder = patch.sortOrder ?? existing?.sortOrder ?? 0
  if (!Number.isInteger(sortOrder)) throw new ValidationError('Stage sort order must be an integer')

  const isWon = patch.isWon ?? existing?.isWon ?? false
  const isLost = patch.isLost ?? existing?.isLost ?? false
  if (isWon && isLost) throw new ValidationError('A stage cannot be both won and lost')

  const tx = db.transaction(() => {
    const sortClash = db
      .prepare('SELECT key FROM stage_meta WHERE sort_order = ? AND key <> ? LIMIT 1')
      .get(sortOrder, key) as { key: string } | undefined
    if (sortClash) {
      throw new ValidationError(`Sort order ${sortOrder} is already used by stage ${sortClash.key}`)
    }

    if (isWon) {
      const otherWon = db
        .prepare('SELECT key FROM stage_meta WHERE is_won = 1 AND key <> ? LIMIT 1')
        .get(key) as { key: string } | undefined
      if (otherWon) {
        throw new ValidationError(`Stage ${otherWon.key} is already the won stage`)
      }
    }

    db.prepare(`
      INSERT INTO stage_meta (key, display_name, sort_order, probability, is_won, is_lost)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        display_name = excluded.display_name,
        sort_order = excluded.sort_order,
        probability = excluded.probability,
        is_won = excluded.is_won,
        is_lost = excluded.is_lost
    `).run(key, displayName, sortOrder, probability, isWon ? 1 : 0, isLost ? 1 : 0)
  })
  tx()

  const updated = getStageMeta(key)
  if (!updated) {
    throw new Error('Failed to load stage after update')
  }
  console.log(`[Pipeline] Stage ${key} ${existing ? 'updated' : 'created'}`)
  return updated
}

export function deleteStageMeta(key: DealStageKey): boolean {
  const db = getDatabase()
  return runInWriteTransaction(() => {
    const inUse = db
      .prepare('SELECT 1 AS present FROM deals WHERE stage = ? LIMIT 1')
      .get(key) as { present: number } | undefined
    if (inUse) throw new ValidationError(`Stage ${key} still has deals`)
    const result = db.prepare('DELETE FROM stage_meta WHERE key = ?').run(key)
    return result.changes > 0
  })
}
