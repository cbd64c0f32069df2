import type { StageMeta, StageTotals } from './pipeline'

/** Inclusive calendar range, both ends `YYYY-MM-DD`. */
export interface DateRange {
  from: string
  to: string
}

export interface ReportStageTotal extends StageTotals {
  stage: StageMeta
}

export interface ForecastPoint {
  /** `YYYY-MM` */
  period: string
  amountCents: number
  expectedCents: number
  deals: number
}

export interface WinVelocity {
  dealsWon: number
  avgDaysToWin: number
  p50DaysToWin: number
  p90DaysToWin: number
}

export interface PipelineReport {
  range: DateRange
  stageTotals: ReportStageTotal[]
  forecast: ForecastPoint[]
  velocity: WinVelocity
}
