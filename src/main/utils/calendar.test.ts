import { describe, expect, it } from 'vitest'
import { daysBetween, enumerateMonths, isCalendarDate } from './calendar'

describe('isCalendarDate', () => {
  it('accepts real dates only', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true)
    expect(isCalendarDate('2023-02-29')).toBe(false)
    expect(isCalendarDate('2024-13-01')).toBe(false)
    expect(isCalendarDate('2024-1-01')).toBe(false)
    expect(isCalendarDate('2024-01-01T00:00:00Z')).toBe(false)
  })
})

describe('enumerateMonths', () => {
  it('lists every month across a year boundary', () => {
    expect(enumerateMonths('2024-11-15', '2025-02-01')).toEqual(['2024-11', '2024-12', '2025-01', '2025-02'])
  })

  it('returns one month for a range inside a month', () => {
    expect(enumerateMonths('2024-03-01', '2024-03-31')).toEqual(['2024-03'])
  })

  it('pads years below 1000 to four digits', () => {
    expect(enumerateMonths('0999-12-01', '1000-01-31')).toEqual(['0999-12', '1000-01'])
  })
})

describe('daysBetween', () => {
  it('returns fractional days', () => {
    expect(daysBetween('2024-01-01T00:00:00.000Z', '2024-01-02T12:00:00.000Z')).toBe(1.5)
  })

  it('never goes negative', () => {
    expect(daysBetween('2024-01-02T00:00:00.000Z', '2024-01-01T00:00:00.000Z')).toBe(0)
  })
})
