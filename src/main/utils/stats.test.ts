import { describe, expect, it } from 'vitest'
import { mean, nearestRankPercentile } from './stats'

describe('nearestRankPercentile', () => {
  const tenDays = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]

  it('picks the ceil(p * n)-th value', () => {
    expect(nearestRankPercentile(tenDays, 0.5)).toBe(5)
    expect(nearestRankPercentile(tenDays, 0.9)).toBe(9)
    expect(nearestRankPercentile([10, 20], 0.9)).toBe(20)
  })

  it('clamps the rank into the list', () => {
    expect(nearestRankPercentile(tenDays, 0)).toBe(1)
    expect(nearestRankPercentile(tenDays, 1)).toBe(10)
  })

  it('returns the only value for a single sample', () => {
    expect(nearestRankPercentile([7.5], 0.5)).toBe(7.5)
    expect(nearestRankPercentile([7.5], 0.9)).toBe(7.5)
  })

  it('returns 0 for no samples', () => {
    expect(nearestRankPercentile([], 0.5)).toBe(0)
  })
})

describe('mean', () => {
  it('averages the values', () => {
    expect(mean([1, 2, 6])).toBe(3)
  })

  it('is 0 for no values', () => {
    expect(mean([])).toBe(0)
  })
})
