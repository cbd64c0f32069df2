import type { StageCatalogCache } from '../services/stage-catalog'

export interface ApiContext {
  catalogCache: StageCatalogCache
  now: () => Date
}
