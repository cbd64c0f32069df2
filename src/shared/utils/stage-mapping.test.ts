import { describe, expect, it } from 'vitest'
import { fromWireStage, toWireStage, WIRE_DEAL_STAGES } from './stage-mapping'
import { DEAL_STAGE_KEYS } from '../types/pipeline'

describe('stage wire mapping', () => {
  it('round-trips every storage key', () => {
    for (const key of DEAL_STAGE_KEYS) {
      expect(fromWireStage(toWireStage(key))).toBe(key)
    }
  })

  it('maps each wire value to a distinct storage key', () => {
    const keys = WIRE_DEAL_STAGES.map((value) => fromWireStage(value))
    expect(new Set(keys).size).toBe(WIRE_DEAL_STAGES.length)
    expect(keys).toEqual(['new', 'qualify', 'proposal', 'negotiate', 'won', 'lost'])
  })

  it('rejects values outside the enum', () => {
    expect(fromWireStage('BOGUS')).toBeNull()
    expect(fromWireStage('won')).toBeNull()
  })
})
