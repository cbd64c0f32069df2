export { getDatabase, closeDatabase, runInWriteTransaction } from './database/connection'
export { CrmError, NotFoundError, ValidationError, LimitExceededError, PersistenceError, isCrmError } from './errors'
export type { CrmErrorKind } from './errors'

export { StageCatalog, StageCatalogCache, loadStageCatalog } from './services/stage-catalog'
export { moveStage } from './services/stage-transition.service'
export type { MoveStageRequest, MoveStageResult } from './services/stage-transition.service'
export { search, suggestCompanies, suggestContacts, suggestDeals } from './services/search.service'
export { chooseStrategy, tokenize } from './services/search-strategy'
export { getPipelineBoard } from './services/pipeline-board.service'
export { getPipelineReport } from './services/pipeline-report.service'

export { createCompany, getCompany, getCompaniesByIds } from './database/repositories/company.repo'
export { createContact, getContactsByIds } from './database/repositories/contact.repo'
export { createDeal, getDeal, getDealsByIds, listDealStageHistory } from './database/repositories/deal.repo'
export { listActivities } from './database/repositories/activity.repo'
export { listStageMeta, upsertStageMeta, deleteStageMeta } from './database/repositories/stage-meta.repo'

export { createCrmApi, toApiError } from './api'
export type { ApiResult, ApiError, ApiErrorCode, CrmApiOptions } from './api'
export { toWireStage, fromWireStage, WIRE_DEAL_STAGES } from '../shared/utils/stage-mapping'
export type { WireDealStage } from '../shared/utils/stage-mapping'

export type * from '../shared/types/crm'
export type * from '../shared/types/pipeline'
export type * from '../shared/types/report'
export type * from '../shared/types/search'
