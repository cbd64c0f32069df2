import { getDatabase } from '../connection'
import { placeholders } from '../../utils/sql'
import { isDealStageKey } from '../../../shared/types/pipeline'
import { expectedValueExpression } from './pipeline.repo'
import type { StageProbability } from './pipeline.repo'
import type { DateRange } from '../../../shared/types/report'
import type { DealStageKey, StageTotals } from '../../../shared/types/pipeline'

export interface ClosingDealFilter {
  range: DateRange
  excludedStages: DealStageKey[]
}

export interface MonthTotalsRow {
  period: string
  amountCents: number
  expectedCents: number
  deals: number
}

export interface WonDealSample {
  dealId: string
  createdAt: string
  wonAt: string
}

function closingFilter(filter: ClosingDealFilter): { sql: string; params: string[] } {
  const clauses = ['d.close_date IS NOT NULL', 'd.close_date BETWEEN ? AND ?']
  const params: string[] = [filter.range.from, filter.range.to]
  if (filter.excludedStages.length > 0) {
    clauses.push(`d.stage NOT IN (${placeholders(filter.excludedStages.length)})`)
    params.push(...filter.excludedStages)
  }
  return { sql: clauses.join(' AND '), params }
}

export function getClosingStageTotals(
  filter: ClosingDealFilter,
  probabilities: StageProbability[]
): Map<DealStageKey, StageTotals> {
  const db = getDatabase()
  const expected = expectedValueExpression(probabilities)
  const where = closingFilter(filter)
  const rows = db
    .prepare(`
      SELECT
        d.stage AS stage,
        COUNT(*) AS count,
        COALESCE(SUM(d.amount_cents), 0) AS amount_cents,
        COALESCE(SUM(${expected.sql}), 0) AS expected_value_cents
      FROM deals d
      WHERE ${where.sql}
      GROUP BY d.stage
    `)
    .all(...expected.params, ...where.params) as Array<{
      stage: string
      count: number
      amount_cents: number
      expected_value_cents: number
    }>

  const totals = new Map<DealStageKey, StageTotals>()
  for (const row of rows) {
    if (!isDealStageKey(row.stage)) continue
    totals.set(row.stage, {
      count: row.count,
      amountCents: row.amount_cents,
      expectedValueCents: row.expected_value_cents
    })
  }
  return totals
}

/** Sparse: months without closing deals are absent. */
export function getClosingMonthTotals(
  filter: ClosingDealFilter,
  probabilities: StageProbability[]
): MonthTotalsRow[] {
  const db = getDatabase()
  const expected = expectedValueExpression(probabilities)
  const where = closingFilter(filter)
  const rows = db
    .prepare(`
      SELECT
        substr(d.close_date, 1, 7) AS period,
        COUNT(*) AS deals,
        COALESCE(SUM(d.amount_cents), 0) AS amount_cents,
        COALESCE(SUM(${expected.sql}), 0) AS expected_cents
      FROM deals d
      WHERE ${where.sql}
      GROUP BY substr(d.close_date, 1, 7)
      ORDER BY period ASC
    `)
    .all(...expected.params, ...where.params) as Array<{
      period: string
      deals: number
      amount_cents: number
      expected_cents: number
    }>

  return rows.map((row) => ({
    period: row.period,
    amountCents: row.amount_cents,
    expectedCents: row.expected_cents,
    deals: row.deals
  }))
}

/**
 * One sample per deal: its creation time and the first time it entered the
 * won stage, kept when that first win falls inside the range.
 */
export function listFirstWins(wonStage: DealStageKey, range: DateRange): WonDealSample[] {
  const db = getDatabase()
  const rows = db
    .prepare(`
      SELECT d.id AS deal_id, d.created_at AS created_at, MIN(h.changed_at) AS won_at
      FROM deals d
      JOIN deal_stage_history h ON h.deal_id = d.id
      WHERE h.to_stage = ?
      GROUP BY d.id, d.created_at
      HAVING substr(MIN(h.changed_at), 1, 10) BETWEEN ? AND ?
      ORDER BY won_at ASC, d.id ASC
    `)
    .all(wonStage, range.from, range.to) as Array<{ deal_id: string; created_at: string; won_at: string }>

  return rows.map((row) => ({
    dealId: row.deal_id,
    createdAt: row.created_at,
    wonAt: row.won_at
  }))
}
