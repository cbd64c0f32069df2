import { asCrmError, LimitExceededError, ValidationError } from '../errors'
import { getStageTotals, listStageDeals } from '../database/repositories/pipeline.repo'
import type { StageCatalog } from './stage-catalog'
import type {
  PipelineBoard,
  PipelineBoardOptions,
  PipelineColumn,
  StageTotals
} from '../../shared/types/pipeline'

export const MAX_DEALS_PER_STAGE = 100

const EMPTY_TOTALS: StageTotals = { count: 0, amountCents: 0, expectedValueCents: 0 }

function emptyBoard(): PipelineBoard {
  return { columns: [], totalCount: 0, totalAmountCents: 0, totalExpectedValueCents: 0 }
}

function validateFirstPerStage(value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError('firstPerStage must be a non-negative integer')
  }
  if (value > MAX_DEALS_PER_STAGE) {
    throw new LimitExceededError('firstPerStage', value, MAX_DEALS_PER_STAGE)
  }
  return value
}

export function getPipelineBoard(options: PipelineBoardOptions, catalog: StageCatalog): PipelineBoard {
  const firstPerStage = validateFirstPerStage(options.firstPerStage)
  if (catalog.isEmpty) return emptyBoard()

  const stages = catalog.select(options.stageKeys)
  const companyId = (options.companyId || '').trim() || null
  const text = (options.text || '').trim() || null
  const orderByUpdated = options.orderByUpdated ?? true

  try {
    // Totals and cards are separate reads; a concurrent move can shift a deal between them
    const totals = getStageTotals(
      { stageKeys: stages.map((stage) => stage.key), companyId, text },
      catalog.probabilities
    )

    const columns: PipelineColumn[] = stages.map((stage) => {
      const stageTotals = totals.get(stage.key) ?? EMPTY_TOTALS
      return {
        stage,
        ...stageTotals,
        deals: firstPerStage === 0
          ? []
          : listStageDeals(stage.key, { companyId, text }, firstPerStage, orderByUpdated)
      }
    })

    return columns.reduce<PipelineBoard>((board, column) => {
      board.columns.push(column)
      board.totalCount += column.count
      board.totalAmountCents += column.amountCents
      board.totalExpectedValueCents += column.expectedValueCents
      return board
    }, emptyBoard())
  } catch (error) {
    throw asCrmError(error, 'Failed to load pipeline board')
  }
}
