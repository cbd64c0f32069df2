import { describe, expect, it } from 'vitest'
import { deleteStageMeta, getStageMeta, listStageMeta, upsertStageMeta } from './stage-meta.repo'
import { getDatabase } from '../connection'
import { runStageMetaMigration } from '../migrations/003-stage-meta'
import { ValidationError } from '../../errors'
import { seedCompany, seedDeal } from '../../../test-utils/fixtures'

describe('stage catalog storage', () => {
  it('seeds the default stages in order', () => {
    expect(listStageMeta().map((stage) => [stage.key, stage.sortOrder, stage.probability])).toEqual([
      ['new', 10, 10],
      ['qualify', 20, 25],
      ['proposal', 30, 50],
      ['negotiate', 40, 70],
      ['won', 90, 100],
      ['lost', 95, 0]
    ])
    expect(getStageMeta('won')).toMatchObject({ isWon: true, isLost: false })
    expect(getStageMeta('lost')).toMatchObject({ isWon: false, isLost: true })
  })

  it('does not reseed a deleted stage', () => {
    expect(deleteStageMeta('negotiate')).toBe(true)
    runStageMetaMigration(getDatabase())
    expect(getStageMeta('negotiate')).toBeNull()
  })

  it('updates individual fields', () => {
    const updated = upsertStageMeta('qualify', { probability: 30, displayName: ' Qualified ' })
    expect(updated).toMatchObject({ key: 'qualify', displayName: 'Qualified', probability: 30, sortOrder: 20 })
  })

  it('rejects out-of-range probabilities and clashing sort orders', () => {
    expect(() => upsertStageMeta('qualify', { probability: 101 })).toThrow(ValidationError)
    expect(() => upsertStageMeta('new', { sortOrder: 20 })).toThrow('Sort order 20 is already used by stage qualify')
  })

  it('allows only one won stage', () => {
    expect(() => upsertStageMeta('new', { isWon: true })).toThrow('Stage won is already the won stage')
    expect(() => upsertStageMeta('won', { isLost: true })).toThrow('A stage cannot be both won and lost')
  })

  it('needs every field to add a missing stage back', () => {
    deleteStageMeta('negotiate')
    expect(() => upsertStageMeta('negotiate', { displayName: 'Negotiate' })).toThrow(ValidationError)
    const created = upsertStageMeta('negotiate', { displayName: 'Negotiate', probability: 60, sortOrder: 45 })
    expect(created).toMatchObject({ sortOrder: 45, probability: 60, isWon: false, isLost: false })
  })

  it('keeps a stage that still has deals', () => {
    const company = seedCompany()
    seedDeal({ companyId: company.id })
    expect(() => deleteStageMeta('new')).toThrow('Stage new still has deals')
    expect(() => getDatabase().prepare('DELETE FROM stage_meta WHERE key = ?').run('new')).toThrow(
      'Stage still has deals'
    )
    expect(getStageMeta('new')?.displayName).toBe('New')
  })
})
