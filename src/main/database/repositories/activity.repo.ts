import { v4 as uuidv4 } from 'uuid'
import { getDatabase } from '../connection'
import type { ActivityRow } from '../schema'
import { isDealStageKey } from '../../../shared/types/pipeline'
import type { Activity, StageChangeMeta } from '../../../shared/types/pipeline'

function parseStageChangeMeta(raw: string): StageChangeMeta | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return null
  }
  if (typeof parsed !== 'object' || parsed === null) return null
  const from: unknown = Reflect.get(parsed, 'from')
  const to: unknown = Reflect.get(parsed, 'to')
  if (typeof from !== 'string' || typeof to !== 'string') return null
  if (!isDealStageKey(from) || !isDealStageKey(to)) return null
  return { from, to }
}

function mapActivity(row: ActivityRow): Activity | null {
  if (row.kind !== 'stage_change') return null
  const meta = parseStageChangeMeta(row.meta_json)
  if (!meta) return null
  return {
    id: row.id,
    entityType: row.entity_type,
    entityId: row.entity_id,
    kind: row.kind,
    subject: row.subject,
    bodyMd: row.body_md,
    meta,
    createdAt: row.created_at,
    createdBy: row.created_by
  }
}

export function insertStageChangeActivity(data: {
  entityType: string
  entityId: string
  subject: string
  bodyMd: string | null
  meta: StageChangeMeta
  createdAt: string
  createdBy: string | null
}): Activity {
  const db = getDatabase()
  const id = uuidv4()
  db.prepare(`
    INSERT INTO activities (
      id, entity_type, entity_id, kind, subject, body_md, meta_json, created_at, created_by
    ) VALUES (?, ?, ?, 'stage_change', ?, ?, ?, ?, ?)
  `).run(
    id,
    data.entityType,
    data.entityId,
    data.subject,
    data.bodyMd,
    JSON.stringify(data.meta),
    data.createdAt,
    data.createdBy
  )
  return {
    id,
    entityType: data.entityType,
    entityId: data.entityId,
    kind: 'stage_change',
    subject: data.subject,
    bodyMd: data.bodyMd,
    meta: data.meta,
    createdAt: data.createdAt,
    createdBy: data.createdBy
  }
}

/** Timeline for one entity, newest first. Rows with unreadable metadata are skipped. */
export function listActivities(entityType: string, entityId: string): Activity[] {
  const db = getDatabase()
  const rows = db
    .prepare(`
      SELECT id, entity_type, entity_id, kind, subject, body_md, meta_json, created_at, created_by
      FROM activities
      WHERE entity_type = ? AND entity_id = ?
      ORDER BY created_at DESC, rowid DESC
    `)
    .all(entityType, entityId) as ActivityRow[]
  const activities: Activity[] = []
  for (const row of rows) {
    const activity = mapActivity(row)
    if (activity) {
      activities.push(activity)
    } else {
      console.warn(`[Activity] Skipping unreadable activity ${row.id}`)
    }
  }
  return activities
}
