export const SEARCH_KINDS = ['company', 'contact', 'deal'] as const

export type SearchKind = (typeof SEARCH_KINDS)[number]

export type SearchStrategy = 'token' | 'fuzzy'

export interface SearchHit {
  kind: SearchKind
  id: string
  title: string
  subtitle: string | null
  score: number
  link: string | null
}

export interface SearchRequest {
  query: string
  kinds?: SearchKind[] | null
  limit?: number
  offset?: number
}
