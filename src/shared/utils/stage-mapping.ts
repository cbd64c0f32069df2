import type { DealStageKey } from '../types/pipeline'

export const WIRE_DEAL_STAGES = ['NEW', 'QUALIFY', 'PROPOSAL', 'NEGOTIATE', 'WON', 'LOST'] as const

export type WireDealStage = (typeof WIRE_DEAL_STAGES)[number]

const STORAGE_TO_WIRE: Record<DealStageKey, WireDealStage> = {
  new: 'NEW',
  qualify: 'QUALIFY',
  proposal: 'PROPOSAL',
  negotiate: 'NEGOTIATE',
  won: 'WON',
  lost: 'LOST'
}

const WIRE_TO_STORAGE: Record<WireDealStage, DealStageKey> = {
  NEW: 'new',
  QUALIFY: 'qualify',
  PROPOSAL: 'proposal',
  NEGOTIATE: 'negotiate',
  WON: 'won',
  LOST: 'lost'
}

function isWireDealStage(value: string): value is WireDealStage {
  return (WIRE_DEAL_STAGES as readonly string[]).includes(value)
}

export function toWireStage(stage: DealStageKey): WireDealStage {
  return STORAGE_TO_WIRE[stage]
}

/** Returns null for anything outside the API enum. */
export function fromWireStage(value: string): DealStageKey | null {
  if (!isWireDealStage(value)) return null
  return WIRE_TO_STORAGE[value]
}
