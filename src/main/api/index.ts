import { StageCatalogCache } from '../services/stage-catalog'
import { ApiRouter } from './router'
import { registerPipelineHandlers } from './pipeline.api'
import { registerRecordHandlers } from './records.api'
import { registerSearchHandlers } from './search.api'
import type { ApiContext } from './context'

export interface CrmApiOptions {
  catalogCache?: StageCatalogCache
  now?: () => Date
}

export function createCrmApi(options: CrmApiOptions = {}): ApiRouter {
  const now = options.now ?? (() => new Date())
  const context: ApiContext = {
    catalogCache: options.catalogCache ?? new StageCatalogCache({ now }),
    now
  }
  const router = new ApiRouter()
  registerPipelineHandlers(router, context)
  registerRecordHandlers(router, context)
  registerSearchHandlers(router)
  return router
}

export { ApiRouter } from './router'
export type { ApiResult } from './router'
export { toApiError } from './errors'
export type { ApiError, ApiErrorCode } from './errors'
