import { join } from 'path'

const DEFAULT_DATABASE_PATH = join(process.cwd(), 'data', 'crm.sqlite')
const DEFAULT_STAGE_CACHE_TTL_MS = 60_000
const DEFAULT_SIMILARITY_THRESHOLD = 0.2

function parseNumberEnv(key: string, fallback: number): number {
  const raw = (process.env[key] || '').trim()
  if (!raw) return fallback
  const parsed = Number(raw)
  if (!Number.isFinite(parsed) || parsed < 0) return fallback
  return parsed
}

export function getDatabasePath(): string {
  return (process.env['CRM_DATABASE_PATH'] || '').trim() || DEFAULT_DATABASE_PATH
}

export function getStageCacheTtlMs(): number {
  return parseNumberEnv('CRM_STAGE_CACHE_TTL_MS', DEFAULT_STAGE_CACHE_TTL_MS)
}

export function getSimilarityThreshold(): number {
  const value = parseNumberEnv('CRM_SEARCH_SIMILARITY_THRESHOLD', DEFAULT_SIMILARITY_THRESHOLD)
  return value > 1 ? DEFAULT_SIMILARITY_THRESHOLD : value
}
