/** Nearest-rank percentile over an ascending list: rank = ceil(p * n), clamped to [1, n]. */
export function nearestRankPercentile(sortedAsc: number[], percentile: number): number {
  const n = sortedAsc.length
  if (n === 0) return 0
  const rank = Math.min(n, Math.max(1, Math.ceil(percentile * n)))
  return sortedAsc[rank - 1]
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, value) => sum + value, 0) / values.length
}
