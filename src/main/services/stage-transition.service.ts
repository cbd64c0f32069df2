import { runInWriteTransaction } from '../database/connection'
import {
  getDeal,
  insertStageHistory,
  touchDeal,
  updateDealStage
} from '../database/repositories/deal.repo'
import { insertStageChangeActivity } from '../database/repositories/activity.repo'
import { getStageMeta } from '../database/repositories/stage-meta.repo'
import { asCrmError, NotFoundError, ValidationError } from '../errors'
import type { StageCatalog } from './stage-catalog'
import type { Deal } from '../../shared/types/crm'
import type { DealStageKey } from '../../shared/types/pipeline'

export interface MoveStageRequest {
  dealId: string
  targetStage: string
  note?: string | null
  actorId?: string | null
}

export interface MoveStageResult {
  deal: Deal
  changed: boolean
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = (value || '').trim()
  return trimmed || null
}

/**
 * Moves a deal to `targetStage` inside one BEGIN IMMEDIATE transaction. A real
 * change writes exactly one history row and one activity row with the same
 * timestamp; moving to the current stage only touches `updatedAt`/`updatedBy`.
 */
export function moveStage(
  request: MoveStageRequest,
  catalog: StageCatalog,
  now: () => Date = () => new Date()
): MoveStageResult {
  const dealId = request.dealId.trim()
  if (!dealId) throw new ValidationError('Deal id is required')

  const targetKey = request.targetStage.trim().toLowerCase()
  if (!catalog.has(targetKey)) {
    throw new ValidationError(`Unknown stage: ${request.targetStage}`)
  }
  const targetStage: DealStageKey = targetKey
  const note = optionalText(request.note)
  const actorId = optionalText(request.actorId)

  try {
    return runInWriteTransaction(() => {
      const current = getDeal(dealId)
      if (!current) throw new NotFoundError('Deal', dealId)

      // The caller's catalog may predate a stage delete
      const target = getStageMeta(targetStage)
      if (!target) throw new ValidationError(`Unknown stage: ${request.targetStage}`)

      const timestamp = now().toISOString()

      if (current.stage === targetStage) {
        touchDeal(dealId, actorId, timestamp)
        return { deal: reload(dealId), changed: false }
      }

      const fromStage = current.stage
      updateDealStage(dealId, targetStage, actorId, timestamp)
      insertStageHistory({
        dealId,
        fromStage,
        toStage: targetStage,
        note,
        actorId,
        changedAt: timestamp
      })
      insertStageChangeActivity({
        entityType: 'deal',
        entityId: dealId,
        subject: `${catalog.displayName(fromStage)} -> ${target.displayName}`,
        bodyMd: note,
        meta: { from: fromStage, to: targetStage },
        createdAt: timestamp,
        createdBy: actorId
      })

      console.log(`[Pipeline] Deal ${dealId} moved ${fromStage} -> ${targetStage}`)
      return { deal: reload(dealId), changed: true }
    })
  } catch (error) {
    const crmError = asCrmError(error, `Failed to move deal ${dealId}`)
    if (crmError.kind === 'Persistence') {
      console.error(`[Pipeline] ${crmError.message}`)
    }
    throw crmError
  }
}

function reload(dealId: string): Deal {
  const deal = getDeal(dealId)
  if (!deal) throw new NotFoundError('Deal', dealId)
  return deal
}
