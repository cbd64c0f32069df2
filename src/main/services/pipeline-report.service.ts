import { asCrmError, ValidationError } from '../errors'
import {
  getClosingMonthTotals,
  getClosingStageTotals,
  listFirstWins
} from '../database/repositories/report.repo'
import { daysBetween, enumerateMonths, isCalendarDate } from '../utils/calendar'
import { mean, nearestRankPercentile } from '../utils/stats'
import type { StageCatalog } from './stage-catalog'
import type {
  DateRange,
  ForecastPoint,
  PipelineReport,
  ReportStageTotal,
  WinVelocity
} from '../../shared/types/report'

const ZERO_VELOCITY: WinVelocity = {
  dealsWon: 0,
  avgDaysToWin: 0,
  p50DaysToWin: 0,
  p90DaysToWin: 0
}

function validateRange(range: DateRange): DateRange {
  const from = range.from.trim()
  const to = range.to.trim()
  if (!isCalendarDate(from)) throw new ValidationError(`Invalid report start date: ${range.from}`)
  if (!isCalendarDate(to)) throw new ValidationError(`Invalid report end date: ${range.to}`)
  if (from > to) throw new ValidationError(`Report start ${from} is after end ${to}`)
  return { from, to }
}

/** One point per calendar month in the range; months without deals are zero. */
export function densifyForecast(range: DateRange, sparse: ForecastPoint[]): ForecastPoint[] {
  const byPeriod = new Map(sparse.map((point) => [point.period, point]))
  return enumerateMonths(range.from, range.to).map((period) =>
    byPeriod.get(period) ?? { period, amountCents: 0, expectedCents: 0, deals: 0 }
  )
}

export function summarizeVelocity(days: number[]): WinVelocity {
  if (days.length === 0) return { ...ZERO_VELOCITY }
  const sorted = [...days].sort((a, b) => a - b)
  return {
    dealsWon: sorted.length,
    avgDaysToWin: mean(sorted),
    p50DaysToWin: nearestRankPercentile(sorted, 0.5),
    p90DaysToWin: nearestRankPercentile(sorted, 0.9)
  }
}

export function getPipelineReport(
  rangeInput: DateRange,
  includeLost: boolean,
  catalog: StageCatalog
): PipelineReport {
  const range = validateRange(rangeInput)
  const filter = { range, excludedStages: includeLost ? [] : catalog.lostKeys }

  try {
    const totals = getClosingStageTotals(filter, catalog.probabilities)
    const stageTotals: ReportStageTotal[] = []
    for (const stage of catalog.stages) {
      const row = totals.get(stage.key)
      if (row) stageTotals.push({ stage, ...row })
    }

    const forecast = densifyForecast(range, getClosingMonthTotals(filter, catalog.probabilities))

    const wonStage = catalog.wonStage
    const velocity = wonStage
      ? summarizeVelocity(
          listFirstWins(wonStage.key, range).map((sample) => daysBetween(sample.createdAt, sample.wonAt))
        )
      : { ...ZERO_VELOCITY }

    return { range, stageTotals, forecast, velocity }
  } catch (error) {
    const crmError = asCrmError(error, 'Failed to build pipeline report')
    console.error(`[Report] ${crmError.message}`)
    throw crmError
  }
}
