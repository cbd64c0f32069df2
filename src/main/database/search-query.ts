import { RANK_WEIGHTS } from '../utils/rank'
import type { SearchKind, SearchStrategy } from '../../shared/types/search'

/**
 * One searchable kind. Each clause selects `kind, id, title, subtitle, score`
 * and is capped at `@cap` rows, so the composed statement never pulls more
 * than `limit + offset` rows per kind.
 */
export interface SearchSource {
  kind: SearchKind
  token: string
  fuzzy: string
}

export interface SearchStatement {
  sql: string
}

const LIKE = `LIKE @pattern ESCAPE '\\'`

function similarityScore(fields: string[]): string {
  const parts = fields.map((field) => `similarity(@query, COALESCE(${field}, ''))`)
  // Single-argument MAX() is the aggregate in SQLite
  const best = parts.length === 1 ? parts[0] : `MAX(${parts.join(', ')})`
  return `MIN(1.0, ${best})`
}

function containsAny(fields: string[]): string {
  return fields.map((field) => `lower(COALESCE(${field}, '')) ${LIKE}`).join(' OR ')
}

function fuzzyClause(select: string, from: string, fields: string[]): string {
  return `
    SELECT kind, id, title, subtitle, score FROM (
      SELECT ${select},
        ${similarityScore(fields)} AS score,
        (${containsAny(fields)}) AS substring_hit
      FROM ${from}
    )
    WHERE score >= @threshold OR substring_hit
    ORDER BY score DESC, title ASC, id ASC
    LIMIT @cap`
}

type WeightedColumn = [weight: number, column: string]

function tokenClause(select: string, fts: string, join: string, columns: WeightedColumn[]): string {
  const args = columns.map(([weight, column]) => `${weight.toFixed(1)}, ${column}`).join(', ')
  return `
    SELECT kind, id, title, subtitle, score FROM (
      SELECT ${select},
        MIN(1.0, field_rank(@terms, ${args})) AS score
      FROM ${fts}
      ${join}
      WHERE ${fts} MATCH @fts
    )
    ORDER BY score DESC, title ASC, id ASC
    LIMIT @cap`
}

const { A, B, D } = RANK_WEIGHTS

const COMPANY_SELECT = `'company' AS kind, c.id AS id, c.name AS title, c.website AS subtitle`
const CONTACT_TITLE = `COALESCE(
  NULLIF(TRIM(COALESCE(p.first_name, '') || ' ' || COALESCE(p.last_name, '')), ''),
  p.email
)`
const CONTACT_SELECT = `'contact' AS kind, p.id AS id, ${CONTACT_TITLE} AS title, p.email AS subtitle`
const DEAL_SELECT = `'deal' AS kind, d.id AS id, d.title AS title, co.name AS subtitle`

export const SEARCH_SOURCES: Record<SearchKind, SearchSource> = {
  company: {
    kind: 'company',
    token: tokenClause(COMPANY_SELECT, 'companies_fts', 'JOIN companies c ON c.id = companies_fts.company_id', [
      [A, 'c.name'],
      [D, 'c.website']
    ]),
    fuzzy: fuzzyClause(COMPANY_SELECT, 'companies c', ['c.name', 'c.website'])
  },
  contact: {
    kind: 'contact',
    token: tokenClause(CONTACT_SELECT, 'contacts_fts', 'JOIN contacts p ON p.id = contacts_fts.contact_id', [
      [A, 'p.email'],
      [B, 'p.first_name'],
      [B, 'p.last_name'],
      [D, 'p.phone']
    ]),
    fuzzy: fuzzyClause(CONTACT_SELECT, 'contacts p', [
      'p.email',
      'p.first_name',
      'p.last_name',
      `TRIM(COALESCE(p.first_name, '') || ' ' || COALESCE(p.last_name, ''))`,
      'p.phone'
    ])
  },
  deal: {
    kind: 'deal',
    token: tokenClause(
      DEAL_SELECT,
      'deals_fts',
      'JOIN deals d ON d.id = deals_fts.deal_id LEFT JOIN companies co ON co.id = d.company_id',
      [[A, 'd.title']]
    ),
    fuzzy: fuzzyClause(DEAL_SELECT, 'deals d LEFT JOIN companies co ON co.id = d.company_id', [
      'd.title'
    ])
  }
}

/**
 * Composes the enabled kinds into one UNION ALL statement ordered by score,
 * then title, with `kind` and `id` breaking the remaining ties. Returns null
 * when no kind is enabled.
 */
export function buildSearchStatement(
  kinds: readonly SearchKind[],
  strategy: SearchStrategy,
  sources: Record<SearchKind, SearchSource> = SEARCH_SOURCES
): SearchStatement | null {
  const enabled = [...new Set(kinds)].filter((kind) => kind in sources)
  if (enabled.length === 0) return null

  const clauses = enabled.map((kind) => {
    const source = sources[kind]
    return `SELECT * FROM (${strategy === 'token' ? source.token : source.fuzzy}\n    )`
  })

  const sql = `
    SELECT kind, id, title, subtitle, score FROM (
      ${clauses.join('\n      UNION ALL\n      ')}
    )
    ORDER BY score DESC, title ASC, kind ASC, id ASC
    LIMIT @limit OFFSET @offset`

  return { sql }
}
