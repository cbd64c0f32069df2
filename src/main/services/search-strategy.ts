import type { SearchStrategy } from '../../shared/types/search'

const TERM_PATTERN = /[\p{L}\p{N}]+/gu

/** Unicode letter/digit runs, lowercased. */
export function tokenize(query: string): string[] {
  return (query.toLowerCase().match(TERM_PATTERN) || []).filter((term) => term.length > 0)
}

export function chooseStrategy(query: string): SearchStrategy {
  const trimmed = query.trim()
  if (trimmed.length >= 2 && tokenize(trimmed).length > 0) return 'token'
  return 'fuzzy'
}
