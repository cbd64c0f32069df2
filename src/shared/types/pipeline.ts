export const DEAL_STAGE_KEYS = ['new', 'qualify', 'proposal', 'negotiate', 'won', 'lost'] as const

export type DealStageKey = (typeof DEAL_STAGE_KEYS)[number]

export function isDealStageKey(value: string): value is DealStageKey {
  return (DEAL_STAGE_KEYS as readonly string[]).includes(value)
}

export interface StageMeta {
  key: DealStageKey
  displayName: string
  sortOrder: number
  probability: number
  isWon: boolean
  isLost: boolean
}

export interface StageMetaPatch {
  displayName?: string
  sortOrder?: number
  probability?: number
  isWon?: boolean
  isLost?: boolean
}

export interface DealStageHistoryEvent {
  id: string
  dealId: string
  fromStage: DealStageKey | null
  toStage: DealStageKey
  changedAt: string
  note: string | null
  actorId: string | null
}

export type ActivityKind = 'stage_change'

export interface StageChangeMeta {
  from: DealStageKey
  to: DealStageKey
}

export interface Activity {
  id: string
  entityType: string
  entityId: string
  kind: ActivityKind
  subject: string | null
  bodyMd: string | null
  meta: StageChangeMeta
  createdAt: string
  createdBy: string | null
}

export interface StageTotals {
  count: number
  amountCents: number
  expectedValueCents: number
}

export interface PipelineDealCard {
  id: string
  title: string
  amountCents: number | null
  currency: string | null
  stage: DealStageKey
  closeDate: string | null
  companyId: string
  companyName: string
  createdAt: string
  updatedAt: string
}

export interface PipelineColumn extends StageTotals {
  stage: StageMeta
  deals: PipelineDealCard[]
}

export interface PipelineBoard {
  columns: PipelineColumn[]
  totalCount: number
  totalAmountCents: number
  totalExpectedValueCents: number
}

export interface PipelineBoardOptions {
  firstPerStage: number
  stageKeys?: string[] | null
  companyId?: string | null
  text?: string | null
  orderByUpdated?: boolean
}
