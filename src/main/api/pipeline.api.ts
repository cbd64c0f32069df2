import { z } from 'zod'
import { API_CHANNELS } from '../../shared/constants/channels'
import { fromWireStage } from '../../shared/utils/stage-mapping'
import { upsertStageMeta } from '../database/repositories/stage-meta.repo'
import { listDealStageHistory, getDeal } from '../database/repositories/deal.repo'
import { listActivities } from '../database/repositories/activity.repo'
import { moveStage } from '../services/stage-transition.service'
import { getPipelineBoard } from '../services/pipeline-board.service'
import { getPipelineReport } from '../services/pipeline-report.service'
import { NotFoundError, ValidationError } from '../errors'
import {
  dealIdSchema,
  moveDealStageSchema,
  pipelineBoardSchema,
  pipelineReportSchema,
  upsertStageSchema
} from './schemas'
import {
  toWireActivity,
  toWireBoard,
  toWireDeal,
  toWireHistoryEvent,
  toWireReport,
  toWireStageMeta
} from './wire'
import type { ApiContext } from './context'
import type { ApiRouter } from './router'
import type { DealStageKey } from '../../shared/types/pipeline'

/** Wire names map to storage keys; anything else passes through so the core can name it. */
function toStageFilter(stages: string[] | null | undefined): string[] | null {
  if (stages === null || stages === undefined) return null
  return stages.map((value) => fromWireStage(value.trim().toUpperCase()) ?? value)
}

function storageStage(value: string): DealStageKey {
  const key = fromWireStage(value)
  if (!key) throw new ValidationError(`Unknown stage: ${value}`)
  return key
}

export function registerPipelineHandlers(router: ApiRouter, context: ApiContext): void {
  router.handle(API_CHANNELS.PIPELINE_STAGES, z.object({}).passthrough(), () => {
    return context.catalogCache.get().stages.map(toWireStageMeta)
  })

  router.handle(API_CHANNELS.PIPELINE_UPSERT_STAGE, upsertStageSchema, (input) => {
    const { stage, ...patch } = input
    const updated = upsertStageMeta(storageStage(stage), patch)
    context.catalogCache.invalidate()
    return toWireStageMeta(updated)
  })

  router.handle(API_CHANNELS.PIPELINE_MOVE_DEAL_STAGE, moveDealStageSchema, (input) => {
    const result = moveStage(
      {
        dealId: input.dealId,
        targetStage: storageStage(input.stage),
        note: input.note ?? null,
        actorId: input.actorId ?? null
      },
      context.catalogCache.get(),
      context.now
    )
    return toWireDeal(result.deal)
  })

  router.handle(API_CHANNELS.PIPELINE_BOARD, pipelineBoardSchema, (input) => {
    const board = getPipelineBoard(
      {
        firstPerStage: input.first,
        stageKeys: toStageFilter(input.stages),
        companyId: input.companyId ?? null,
        text: input.text ?? null,
        orderByUpdated: input.orderByUpdated
      },
      context.catalogCache.get()
    )
    return toWireBoard(board)
  })

  router.handle(API_CHANNELS.PIPELINE_REPORT, pipelineReportSchema, (input) => {
    const report = getPipelineReport(
      { from: input.from, to: input.to },
      input.includeLost,
      context.catalogCache.get()
    )
    return toWireReport(report)
  })

  router.handle(API_CHANNELS.PIPELINE_DEAL_HISTORY, dealIdSchema, (input) => {
    if (!getDeal(input.dealId)) throw new NotFoundError('Deal', input.dealId)
    return {
      history: listDealStageHistory(input.dealId).map(toWireHistoryEvent),
      activities: listActivities('deal', input.dealId).map(toWireActivity)
    }
  })
}
