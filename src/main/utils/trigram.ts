/**
 * Trigram similarity with pg_trgm semantics: lowercase, split on anything that
 * is not a letter or digit, pad each word with two leading blanks and one
 * trailing blank, then compare the trigram sets (shared / union).
 */

const WORD_PATTERN = /[\p{L}\p{N}]+/gu

export function trigrams(value: string): Set<string> {
  const result = new Set<string>()
  const words = value.toLowerCase().match(WORD_PATTERN) || []
  for (const word of words) {
    const padded = `  ${word} `
    for (let i = 0; i + 3 <= padded.length; i++) {
      result.add(padded.slice(i, i + 3))
    }
  }
  return result
}

export function trigramSimilarity(left: string, right: string): number {
  const a = trigrams(left)
  const b = trigrams(right)
  if (a.size === 0 || b.size === 0) return 0
  let shared = 0
  for (const gram of a) {
    if (b.has(gram)) shared++
  }
  return shared / (a.size + b.size - shared)
}
