import { getDatabase } from '../connection'
import { containsPattern } from '../../utils/sql'
import { SEARCH_KINDS } from '../../../shared/types/search'
import type { SearchStatement } from '../search-query'
import type { SearchKind } from '../../../shared/types/search'

export interface SearchRow {
  kind: SearchKind
  id: string
  title: string
  subtitle: string | null
  score: number
}

interface RawSearchRow {
  kind: string
  id: string
  title: string
  subtitle: string | null
  score: number | null
}

export interface SearchPage {
  limit: number
  offset: number
}

/** Quote each term and OR them, so punctuation in the query can't break MATCH syntax. */
export function buildOrQuery(terms: string[]): string {
  if (terms.length === 0) return '""'
  return terms.map((term) => `"${term.replace(/"/g, '')}"`).join(' OR ')
}

function isSearchKind(value: string): value is SearchKind {
  return (SEARCH_KINDS as readonly string[]).includes(value)
}

function mapRow(row: RawSearchRow): SearchRow | null {
  if (!isSearchKind(row.kind)) return null
  return {
    kind: row.kind,
    id: row.id,
    title: row.title,
    subtitle: row.subtitle,
    score: Math.max(0, Math.min(1, row.score ?? 0))
  }
}

function run(sql: string, params: Record<string, string | number>): SearchRow[] {
  const db = getDatabase()
  const rows = db.prepare(sql).all(params) as RawSearchRow[]
  return rows.map(mapRow).filter((row): row is SearchRow => row !== null)
}

export function runTokenSearch(statement: SearchStatement, terms: string[], page: SearchPage): SearchRow[] {
  return run(statement.sql, {
    fts: buildOrQuery(terms),
    terms: terms.join(' '),
    cap: page.limit + page.offset,
    limit: page.limit,
    offset: page.offset
  })
}

export function runFuzzySearch(
  statement: SearchStatement,
  query: string,
  threshold: number,
  page: SearchPage
): SearchRow[] {
  return run(statement.sql, {
    query,
    pattern: containsPattern(query),
    threshold,
    cap: page.limit + page.offset,
    limit: page.limit,
    offset: page.offset
  })
}
