const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/

const MS_PER_DAY = 1000 * 60 * 60 * 24

export function isCalendarDate(value: string): boolean {
  if (!DATE_ONLY.test(value)) return false
  const date = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value)
}

/** Every `YYYY-MM` from the month of `from` through the month of `to`, inclusive. */
export function enumerateMonths(from: string, to: string): string[] {
  let year = Number(from.slice(0, 4))
  let month = Number(from.slice(5, 7))
  const endYear = Number(to.slice(0, 4))
  const endMonth = Number(to.slice(5, 7))
  const months: string[] = []
  while (year < endYear || (year === endYear && month <= endMonth)) {
    months.push(`${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`)
    month++
    if (month > 12) {
      month = 1
      year++
    }
  }
  return months
}

export function daysBetween(startIso: string, endIso: string): number {
  const start = Date.parse(startIso)
  const end = Date.parse(endIso)
  if (Number.isNaN(start) || Number.isNaN(end)) return 0
  return Math.max(0, (end - start) / MS_PER_DAY)
}
