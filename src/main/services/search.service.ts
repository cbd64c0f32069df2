import { getSimilarityThreshold } from '../config'
import { asCrmError, LimitExceededError, ValidationError } from '../errors'
import { buildSearchStatement } from '../database/search-query'
import { runFuzzySearch, runTokenSearch } from '../database/repositories/search.repo'
import { getCompaniesByIds } from '../database/repositories/company.repo'
import { getContactsByIds } from '../database/repositories/contact.repo'
import { getDealsByIds } from '../database/repositories/deal.repo'
import { chooseStrategy, tokenize } from './search-strategy'
import { SEARCH_KINDS } from '../../shared/types/search'
import type { SearchRow, SearchPage } from '../database/repositories/search.repo'
import type { Company, Contact, Deal } from '../../shared/types/crm'
import type { SearchHit, SearchKind, SearchRequest } from '../../shared/types/search'

export const MAX_SEARCH_LIMIT = 100
export const DEFAULT_SEARCH_LIMIT = 20

const LINK_PREFIX: Record<SearchKind, string> = {
  company: '/crm/companies',
  contact: '/crm/contacts',
  deal: '/crm/deals'
}

function isKnownKind(value: string): value is SearchKind {
  return (SEARCH_KINDS as readonly string[]).includes(value)
}

function toHit(row: SearchRow): SearchHit {
  return {
    kind: row.kind,
    id: row.id,
    title: row.title,
    subtitle: row.subtitle,
    score: row.score,
    link: `${LINK_PREFIX[row.kind]}/${row.id}`
  }
}

function validatePage(limit: number, offset: number): SearchPage {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('Search limit must be a positive integer')
  }
  if (limit > MAX_SEARCH_LIMIT) {
    throw new LimitExceededError('limit', limit, MAX_SEARCH_LIMIT)
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError('Search offset must be a non-negative integer')
  }
  return { limit, offset }
}

/**
 * Ranked hits across the allowed kinds. Short or term-less queries go
 * straight to trigram similarity; a token pass that matches nothing at all is
 * retried with similarity so typos still find their record.
 */
export function search(request: SearchRequest, threshold: number = getSimilarityThreshold()): SearchHit[] {
  const query = request.query.trim()
  if (!query) throw new ValidationError('Search query is required')
  const page = validatePage(request.limit ?? DEFAULT_SEARCH_LIMIT, request.offset ?? 0)

  const kinds = (request.kinds ?? [...SEARCH_KINDS]).filter(isKnownKind)
  if (kinds.length === 0) return []

  try {
    if (chooseStrategy(query) === 'token') {
      const statement = buildSearchStatement(kinds, 'token')
      if (!statement) return []
      const terms = tokenize(query)
      const rows = runTokenSearch(statement, terms, page)
      if (rows.length > 0) return rows.map(toHit)
      // An empty page past the end is not a miss
      if (page.offset > 0 && runTokenSearch(statement, terms, { limit: 1, offset: 0 }).length > 0) {
        return []
      }
      console.log(`[Search] No token matches for "${query}", retrying with similarity`)
    }

    const statement = buildSearchStatement(kinds, 'fuzzy')
    if (!statement) return []
    return runFuzzySearch(statement, query, threshold, page).map(toHit)
  } catch (error) {
    throw asCrmError(error, 'Search failed')
  }
}

function orderByRank<T extends { id: string }>(records: T[], rankedIds: string[]): T[] {
  const byId = new Map(records.map((record) => [record.id, record]))
  const ordered: T[] = []
  for (const id of rankedIds) {
    const record = byId.get(id)
    if (record) ordered.push(record)
  }
  return ordered
}

function suggest<T extends { id: string }>(
  kind: SearchKind,
  query: string,
  limit: number,
  fetch: (ids: string[]) => T[]
): T[] {
  const ids = search({ query, kinds: [kind], limit, offset: 0 }).map((hit) => hit.id)
  if (ids.length === 0) return []
  try {
    return orderByRank(fetch(ids), ids)
  } catch (error) {
    throw asCrmError(error, `Failed to load ${kind} suggestions`)
  }
}

export function suggestCompanies(query: string, limit = 10): Company[] {
  return suggest('company', query, limit, getCompaniesByIds)
}

export function suggestContacts(query: string, limit = 10): Contact[] {
  return suggest('contact', query, limit, getContactsByIds)
}

export function suggestDeals(query: string, limit = 10): Deal[] {
  return suggest('deal', query, limit, getDealsByIds)
}
