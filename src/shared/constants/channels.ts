export const API_CHANNELS = {
  // Pipeline
  PIPELINE_STAGES: 'pipeline:stages',
  PIPELINE_UPSERT_STAGE: 'pipeline:upsert-stage',
  PIPELINE_MOVE_DEAL_STAGE: 'pipeline:move-deal-stage',
  PIPELINE_BOARD: 'pipeline:board',
  PIPELINE_REPORT: 'pipeline:report',
  PIPELINE_DEAL_HISTORY: 'pipeline:deal-history',

  // Records
  COMPANY_CREATE: 'company:create',
  CONTACT_CREATE: 'contact:create',
  DEAL_CREATE: 'deal:create',
  DEAL_GET: 'deal:get',

  // Search
  SEARCH_QUERY: 'search:query',
  SEARCH_SUGGEST_COMPANIES: 'search:suggest-companies',
  SEARCH_SUGGEST_CONTACTS: 'search:suggest-contacts',
  SEARCH_SUGGEST_DEALS: 'search:suggest-deals'
} as const

export type ApiChannel = (typeof API_CHANNELS)[keyof typeof API_CHANNELS]
