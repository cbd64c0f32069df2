import { describe, expect, it } from 'vitest'
import { StageCatalog, StageCatalogCache } from './stage-catalog'
import { ValidationError } from '../errors'
import type { StageMeta } from '../../shared/types/pipeline'

const STAGES: StageMeta[] = [
  { key: 'won', displayName: 'Won', sortOrder: 90, probability: 100, isWon: true, isLost: false },
  { key: 'new', displayName: 'New', sortOrder: 10, probability: 10, isWon: false, isLost: false },
  { key: 'lost', displayName: 'Lost', sortOrder: 95, probability: 0, isWon: false, isLost: true },
  { key: 'qualify', displayName: 'Qualify', sortOrder: 20, probability: 25, isWon: false, isLost: false }
]

describe('StageCatalog', () => {
  const catalog = new StageCatalog(STAGES)

  it('orders stages by sort order', () => {
    expect(catalog.stages.map((stage) => stage.key)).toEqual(['new', 'qualify', 'won', 'lost'])
  })

  it('exposes the won stage and lost keys', () => {
    expect(catalog.wonStage?.key).toBe('won')
    expect(catalog.lostKeys).toEqual(['lost'])
    expect(new StageCatalog([]).wonStage).toBeNull()
  })

  it('selects every stage without a filter', () => {
    expect(catalog.select(undefined)).toHaveLength(4)
    expect(catalog.select(null).map((stage) => stage.key)).toEqual(['new', 'qualify', 'won', 'lost'])
  })

  it('normalizes filter keys and keeps catalog order', () => {
    expect(catalog.select([' WON ', 'New']).map((stage) => stage.key)).toEqual(['new', 'won'])
  })

  it('rejects an empty filter', () => {
    expect(() => catalog.select([])).toThrow(ValidationError)
  })

  it('names unknown keys', () => {
    expect(() => catalog.select(['BOGUS', 'won', 'proposal'])).toThrow('Unknown stage key(s): bogus, proposal')
  })

  it('falls back to the key for a display name outside the catalog', () => {
    expect(catalog.displayName('qualify')).toBe('Qualify')
    expect(catalog.displayName('negotiate')).toBe('negotiate')
  })
})

describe('StageCatalogCache', () => {
  function setup(ttlMs: number) {
    let clock = 0
    let loads = 0
    const cache = new StageCatalogCache({
      ttlMs,
      now: () => new Date(clock),
      load: () => {
        loads++
        return new StageCatalog(STAGES)
      }
    })
    return {
      cache,
      advance: (ms: number) => {
        clock += ms
      },
      loads: () => loads
    }
  }

  it('serves the cached catalog inside the TTL', () => {
    const { cache, advance, loads } = setup(1000)
    const first = cache.get()
    advance(999)
    expect(cache.get()).toBe(first)
    expect(loads()).toBe(1)
  })

  it('reloads once the TTL has passed', () => {
    const { cache, advance, loads } = setup(1000)
    cache.get()
    advance(1000)
    cache.get()
    expect(loads()).toBe(2)
  })

  it('reloads after invalidate', () => {
    const { cache, loads } = setup(60_000)
    cache.get()
    cache.invalidate()
    cache.get()
    expect(loads()).toBe(2)
  })
})
