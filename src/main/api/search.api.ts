import { API_CHANNELS } from '../../shared/constants/channels'
import { search, suggestCompanies, suggestContacts, suggestDeals } from '../services/search.service'
import { searchSchema, suggestSchema } from './schemas'
import { toWireDeal } from './wire'
import type { ApiRouter } from './router'

export function registerSearchHandlers(router: ApiRouter): void {
  router.handle(API_CHANNELS.SEARCH_QUERY, searchSchema, (input) => {
    return search({
      query: input.query,
      kinds: input.kinds ?? null,
      limit: input.first,
      offset: input.offset
    })
  })

  router.handle(API_CHANNELS.SEARCH_SUGGEST_COMPANIES, suggestSchema, (input) => {
    return suggestCompanies(input.query, input.first)
  })

  router.handle(API_CHANNELS.SEARCH_SUGGEST_CONTACTS, suggestSchema, (input) => {
    return suggestContacts(input.query, input.first)
  })

  router.handle(API_CHANNELS.SEARCH_SUGGEST_DEALS, suggestSchema, (input) => {
    return suggestDeals(input.query, input.first).map(toWireDeal)
  })
}
