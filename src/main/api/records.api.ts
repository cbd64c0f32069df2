import { API_CHANNELS } from '../../shared/constants/channels'
import { fromWireStage } from '../../shared/utils/stage-mapping'
import { createCompany } from '../database/repositories/company.repo'
import { createContact } from '../database/repositories/contact.repo'
import { createDeal, getDeal } from '../database/repositories/deal.repo'
import { NotFoundError } from '../errors'
import { createCompanySchema, createContactSchema, createDealSchema, dealIdSchema } from './schemas'
import { toWireDeal } from './wire'
import type { ApiContext } from './context'
import type { ApiRouter } from './router'

export function registerRecordHandlers(router: ApiRouter, context: ApiContext): void {
  router.handle(API_CHANNELS.COMPANY_CREATE, createCompanySchema, (input) => {
    const company = createCompany(input, context.now())
    console.log(`[CRM] Company created: ${company.id}`)
    return company
  })

  router.handle(API_CHANNELS.CONTACT_CREATE, createContactSchema, (input) => {
    const contact = createContact(input, context.now())
    console.log(`[CRM] Contact created: ${contact.id}`)
    return contact
  })

  router.handle(API_CHANNELS.DEAL_CREATE, createDealSchema, (input) => {
    const { actorId, stage, ...data } = input
    const deal = createDeal(
      { ...data, stage: stage ? fromWireStage(stage) : null },
      actorId ?? null,
      context.now()
    )
    console.log(`[CRM] Deal created: ${deal.id} (${deal.stage})`)
    return toWireDeal(deal)
  })

  router.handle(API_CHANNELS.DEAL_GET, dealIdSchema, (input) => {
    const deal = getDeal(input.dealId)
    if (!deal) throw new NotFoundError('Deal', input.dealId)
    return toWireDeal(deal)
  })
}
