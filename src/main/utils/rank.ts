/**
 * Field-weighted rank with PostgreSQL `ts_rank` semantics (no length
 * normalisation). Each query term scores its occurrences in field order, the
 * j-th occurrence counting `weight / j²` and the heaviest one in full; the
 * term scores are scaled by ζ(2) and averaged over the query terms.
 *
 * The score depends only on the row itself, so rows from different tables
 * compare directly: one weight-A hit scores the same for every kind.
 */

export const RANK_WEIGHTS = { A: 1.0, B: 0.4, C: 0.2, D: 0.1 } as const

const WORD_PATTERN = /[\p{L}\p{N}]+/gu
const ZETA_2 = 1.64493406685

export interface WeightedField {
  weight: number
  text: string | null
}

/** Lowercased letter/digit runs with diacritics removed, as the FTS tokenizer sees them. */
export function rankWords(value: string): string[] {
  return value.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase().match(WORD_PATTERN) || []
}

export function weightedRank(terms: readonly string[], fields: readonly WeightedField[]): number {
  const queryTerms = [...new Set(terms.flatMap(rankWords))]
  if (queryTerms.length === 0) return 0

  const occurrences = new Map<string, number[]>()
  for (const field of fields) {
    if (!field.text) continue
    for (const word of rankWords(field.text)) {
      const weights = occurrences.get(word)
      if (weights) {
        weights.push(field.weight)
      } else {
        occurrences.set(word, [field.weight])
      }
    }
  }

  let total = 0
  for (const term of queryTerms) {
    const weights = occurrences.get(term)
    if (!weights) continue
    let sum = 0
    let best = -1
    let bestRank = 1
    weights.forEach((weight, index) => {
      const rank = (index + 1) * (index + 1)
      sum += weight / rank
      if (weight > best) {
        best = weight
        bestRank = rank
      }
    })
    total += (best + sum - best / bestRank) / ZETA_2
  }

  return Math.min(1, total / queryTerms.length)
}
