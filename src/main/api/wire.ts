import { toWireStage } from '../../shared/utils/stage-mapping'
import type { WireDealStage } from '../../shared/utils/stage-mapping'
import type { Deal } from '../../shared/types/crm'
import type {
  Activity,
  DealStageHistoryEvent,
  PipelineBoard,
  PipelineDealCard,
  StageMeta,
  StageTotals
} from '../../shared/types/pipeline'
import type { PipelineReport } from '../../shared/types/report'

// API shapes: identical to the core records except that stage keys travel as the enum

export type WireStage = Omit<StageMeta, 'key'> & { key: WireDealStage }
export type WireDeal = Omit<Deal, 'stage'> & { stage: WireDealStage }
export type WireDealCard = Omit<PipelineDealCard, 'stage'> & { stage: WireDealStage }

export interface WireColumn extends StageTotals {
  stage: WireStage
  deals: WireDealCard[]
}

export interface WireBoard extends Omit<PipelineBoard, 'columns'> {
  columns: WireColumn[]
}

export interface WireReport extends Omit<PipelineReport, 'stageTotals'> {
  stageTotals: Array<StageTotals & { stage: WireStage }>
}

export type WireHistoryEvent = Omit<DealStageHistoryEvent, 'fromStage' | 'toStage'> & {
  fromStage: WireDealStage | null
  toStage: WireDealStage
}

export type WireActivity = Omit<Activity, 'meta'> & {
  meta: { from: WireDealStage; to: WireDealStage }
}

export function toWireStageMeta(stage: StageMeta): WireStage {
  return { ...stage, key: toWireStage(stage.key) }
}

export function toWireDeal(deal: Deal): WireDeal {
  return { ...deal, stage: toWireStage(deal.stage) }
}

export function toWireBoard(board: PipelineBoard): WireBoard {
  return {
    ...board,
    columns: board.columns.map((column) => ({
      ...column,
      stage: toWireStageMeta(column.stage),
      deals: column.deals.map((deal) => ({ ...deal, stage: toWireStage(deal.stage) }))
    }))
  }
}

export function toWireReport(report: PipelineReport): WireReport {
  return {
    ...report,
    stageTotals: report.stageTotals.map((row) => ({ ...row, stage: toWireStageMeta(row.stage) }))
  }
}

export function toWireHistoryEvent(event: DealStageHistoryEvent): WireHistoryEvent {
  return {
    ...event,
    fromStage: event.fromStage === null ? null : toWireStage(event.fromStage),
    toStage: toWireStage(event.toStage)
  }
}

export function toWireActivity(activity: Activity): WireActivity {
  return {
    ...activity,
    meta: { from: toWireStage(activity.meta.from), to: toWireStage(activity.meta.to) }
  }
}
