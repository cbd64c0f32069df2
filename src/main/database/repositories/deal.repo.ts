import { v4 as uuidv4 } from 'uuid'
import { getDatabase, runInWriteTransaction } from '../connection'
import type { DealRow, DealStageHistoryRow } from '../schema'
import { NotFoundError, ValidationError } from '../../errors'
import { isCalendarDate } from '../../utils/calendar'
import { placeholders } from '../../utils/sql'
import { getCompany } from './company.repo'
import { getStageMeta } from './stage-meta.repo'
import { isDealStageKey } from '../../../shared/types/pipeline'
import type { CreateDealInput, Deal } from '../../../shared/types/crm'
import type { DealStageHistoryEvent, DealStageKey } from '../../../shared/types/pipeline'

const DEAL_COLUMNS = `
  id, title, amount_cents, currency, stage, close_date, company_id,
  assigned_user_id, created_by, updated_by, created_at, updated_at
`

function toStageKey(value: string): DealStageKey {
  if (!isDealStageKey(value)) {
    throw new ValidationError(`Unknown stage key: ${value}`)
  }
  return value
}

function mapDeal(row: DealRow): Deal {
  return {
    id: row.id,
    title: row.title,
    amountCents: row.amount_cents,
    currency: row.currency,
    stage: toStageKey(row.stage),
    closeDate: row.close_date,
    companyId: row.company_id,
    assignedUserId: row.assigned_user_id,
    createdBy: row.created_by,
    updatedBy: row.updated_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  }
}

function mapHistory(row: DealStageHistoryRow): DealStageHistoryEvent {
  return {
    id: row.id,
    dealId: row.deal_id,
    fromStage: row.from_stage === null ? null : toStageKey(row.from_stage),
    toStage: toStageKey(row.to_stage),
    changedAt: row.changed_at,
    note: row.note,
    actorId: row.actor_id
  }
}

function firstCatalogStage(): DealStageKey | null {
  const db = getDatabase()
  const row = db
    .prepare('SELECT key FROM stage_meta ORDER BY sort_order ASC LIMIT 1')
    .get() as { key: string } | undefined
  return row ? toStageKey(row.key) : null
}

export function createDeal(data: CreateDealInput, userId: string | null = null, now: Date = new Date()): Deal {
  const title = data.title.trim()
  if (!title) throw new ValidationError('Deal title is required')

  const amountCents = data.amountCents ?? null
  if (amountCents !== null && (!Number.isInteger(amountCents) || amountCents < 0)) {
    throw new ValidationError('Deal amount must be a non-negative integer in minor units')
  }

  const closeDate = data.closeDate ?? null
  if (closeDate !== null && !isCalendarDate(closeDate)) {
    throw new ValidationError(`Invalid close date: ${closeDate}`)
  }

  if (!getCompany(data.companyId)) {
    throw new NotFoundError('Company', data.companyId)
  }

  const stage = data.stage ?? firstCatalogStage()
  if (!stage) {
    throw new ValidationError('No stages configured for pipeline')
  }

  const createdAt = data.createdAt ?? now.toISOString()
  if (Number.isNaN(Date.parse(createdAt))) {
    throw new ValidationError(`Invalid creation timestamp: ${createdAt}`)
  }

  const db = getDatabase()
  const id = uuidv4()
  return runInWriteTransaction(() => {
    if (!getStageMeta(stage)) {
      throw new ValidationError(`Unknown stage: ${stage}`)
    }
    db.prepare(`
      INSERT INTO deals (
        id, title, amount_cents, currency, stage, close_date, company_id,
        assigned_user_id, created_by, updated_by, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      title,
      amountCents,
      data.currency ?? null,
      stage,
      closeDate,
      data.companyId,
      data.assignedUserId ?? null,
      userId,
      userId,
      createdAt,
      createdAt
    )

    const deal = getDeal(id)
    if (!deal) {
      throw new Error('Failed to create deal')
    }
    return deal
  })
}

export function getDeal(id: string): Deal | null {
  const db = getDatabase()
  const row = db
    .prepare(`SELECT ${DEAL_COLUMNS} FROM deals WHERE id = ? LIMIT 1`)
    .get(id) as DealRow | undefined
  return row ? mapDeal(row) : null
}

export function getDealsByIds(ids: string[]): Deal[] {
  if (ids.length === 0) return []
  const db = getDatabase()
  const rows = db
    .prepare(`SELECT ${DEAL_COLUMNS} FROM deals WHERE id IN (${placeholders(ids.length)})`)
    .all(...ids) as DealRow[]
  return rows.map(mapDeal)
}

export function touchDeal(dealId: string, userId: string | null, timestamp: string): void {
  const db = getDatabase()
  db.prepare(`
    UPDATE deals
    SET updated_by = ?, updated_at = ?
    WHERE id = ?
  `).run(userId, timestamp, dealId)
}

export function updateDealStage(
  dealId: string,
  stage: DealStageKey,
  userId: string | null,
  timestamp: string
): void {
  const db = getDatabase()
  db.prepare(`
    UPDATE deals
    SET stage = ?, updated_by = ?, updated_at = ?
    WHERE id = ?
  `).run(stage, userId, timestamp, dealId)
}

export function insertStageHistory(data: {
  dealId: string
  fromStage: DealStageKey | null
  toStage: DealStageKey
  note: string | null
  actorId: string | null
  changedAt: string
}): DealStageHistoryEvent {
  const db = getDatabase()
  const id = uuidv4()
  db.prepare(`
    INSERT INTO deal_stage_history (
      id, deal_id, from_stage, to_stage, changed_at, note, actor_id
    ) VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(id, data.dealId, data.fromStage, data.toStage, data.changedAt, data.note, data.actorId)
  return {
    id,
    dealId: data.dealId,
    fromStage: data.fromStage,
    toStage: data.toStage,
    changedAt: data.changedAt,
    note: data.note,
    actorId: data.actorId
  }
}

export function listDealStageHistory(dealId: string): DealStageHistoryEvent[] {
  const db = getDatabase()
  const rows = db
    .prepare(`
      SELECT id, deal_id, from_stage, to_stage, changed_at, note, actor_id
      FROM deal_stage_history
      WHERE deal_id = ?
      ORDER BY changed_at DESC, rowid DESC
    `)
    .all(dealId) as DealStageHistoryRow[]
  return rows.map(mapHistory)
}
