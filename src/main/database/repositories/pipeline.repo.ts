import { getDatabase } from '../connection'
import { containsPattern, placeholders } from '../../utils/sql'
import { isDealStageKey } from '../../../shared/types/pipeline'
import type { DealStageKey, PipelineDealCard, StageTotals } from '../../../shared/types/pipeline'

export interface StageProbability {
  key: DealStageKey
  probability: number
}

export interface DealFilter {
  stageKeys: DealStageKey[]
  companyId?: string | null
  text?: string | null
}

interface SqlFragment {
  sql: string
  params: Array<string | number>
}

interface StageTotalsRow {
  stage: string
  count: number
  amount_cents: number
  expected_value_cents: number
}

interface DealCardRow {
  id: string
  title: string
  amount_cents: number | null
  currency: string | null
  stage: string
  close_date: string | null
  company_id: string
  company_name: string
  created_at: string
  updated_at: string
}

/**
 * Per-deal expected value in minor units. Integer arithmetic truncates each
 * deal before the sum; stages missing from the list weigh 0.
 */
export function expectedValueExpression(stages: StageProbability[], alias = 'd'): SqlFragment {
  if (stages.length === 0) return { sql: '0', params: [] }
  const whens = stages.map(() => 'WHEN ? THEN CAST(? AS INTEGER)').join(' ')
  return {
    sql: `(COALESCE(${alias}.amount_cents, 0) * (CASE ${alias}.stage ${whens} ELSE 0 END)) / 100`,
    params: stages.flatMap((stage) => [stage.key, stage.probability])
  }
}

function dealFilter(filter: DealFilter): SqlFragment {
  const clauses = [`d.stage IN (${placeholders(filter.stageKeys.length)})`]
  const params: Array<string | number> = [...filter.stageKeys]

  if (filter.companyId) {
    clauses.push('d.company_id = ?')
    params.push(filter.companyId)
  }

  const text = (filter.text || '').trim()
  if (text) {
    const pattern = containsPattern(text)
    clauses.push(`(lower(d.title) LIKE ? ESCAPE '\\' OR lower(c.name) LIKE ? ESCAPE '\\')`)
    params.push(pattern, pattern)
  }

  return { sql: clauses.join(' AND '), params }
}

function toStageKey(value: string): DealStageKey | null {
  return isDealStageKey(value) ? value : null
}

export function getStageTotals(
  filter: DealFilter,
  probabilities: StageProbability[]
): Map<DealStageKey, StageTotals> {
  const totals = new Map<DealStageKey, StageTotals>()
  if (filter.stageKeys.length === 0) return totals

  const db = getDatabase()
  const expected = expectedValueExpression(probabilities)
  const where = dealFilter(filter)
  const rows = db
    .prepare(`
      SELECT
        d.stage AS stage,
        COUNT(*) AS count,
        COALESCE(SUM(d.amount_cents), 0) AS amount_cents,
        COALESCE(SUM(${expected.sql}), 0) AS expected_value_cents
      FROM deals d
      JOIN companies c ON c.id = d.company_id
      WHERE ${where.sql}
      GROUP BY d.stage
    `)
    .all(...expected.params, ...where.params) as StageTotalsRow[]

  for (const row of rows) {
    const key = toStageKey(row.stage)
    if (!key) continue
    totals.set(key, {
      count: row.count,
      amountCents: row.amount_cents,
      expectedValueCents: row.expected_value_cents
    })
  }
  return totals
}

export function listStageDeals(
  stage: DealStageKey,
  filter: Omit<DealFilter, 'stageKeys'>,
  limit: number,
  orderByUpdated: boolean
): PipelineDealCard[] {
  if (limit <= 0) return []
  const db = getDatabase()
  const where = dealFilter({ ...filter, stageKeys: [stage] })
  const orderColumn = orderByUpdated ? 'd.updated_at' : 'd.created_at'
  const rows = db
    .prepare(`
      SELECT
        d.id, d.title, d.amount_cents, d.currency, d.stage, d.close_date,
        d.company_id, c.name AS company_name, d.created_at, d.updated_at
      FROM deals d
      JOIN companies c ON c.id = d.company_id
      WHERE ${where.sql}
      ORDER BY ${orderColumn} DESC, d.id ASC
      LIMIT ?
    `)
    .all(...where.params, limit) as DealCardRow[]

  return rows.map((row) => ({
    id: row.id,
    title: row.title,
    amountCents: row.amount_cents,
    currency: row.currency,
    stage,
    closeDate: row.close_date,
    companyId: row.company_id,
    companyName: row.company_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  }))
}
