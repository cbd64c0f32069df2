import { z } from 'zod'
import { WIRE_DEAL_STAGES } from '../../shared/utils/stage-mapping'
import { SEARCH_KINDS } from '../../shared/types/search'

function normalizeEmpty(value: unknown): unknown {
  if (value === '' || value === null) {
    return undefined
  }
  return value
}

const optionalText = z.preprocess(normalizeEmpty, z.string().trim().optional())
const requiredId = (label: string) => z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`)
const wireStage = z.enum(WIRE_DEAL_STAGES)

export const moveDealStageSchema = z.object({
  dealId: requiredId('dealId'),
  stage: wireStage,
  note: optionalText,
  actorId: optionalText
})

export const upsertStageSchema = z.object({
  stage: wireStage,
  displayName: optionalText,
  probability: z.number().int().optional(),
  sortOrder: z.number().int().optional(),
  isWon: z.boolean().optional(),
  isLost: z.boolean().optional()
})

// Bounds on `first` and the stage names are checked by the core so the caller
// gets LIMIT_EXCEEDED and the offending keys back
export const pipelineBoardSchema = z.object({
  first: z.number().int().default(20),
  stages: z.array(z.string()).nullish(),
  companyId: optionalText,
  text: optionalText,
  orderByUpdated: z.boolean().default(true)
})

export const pipelineReportSchema = z.object({
  from: z.string().trim(),
  to: z.string().trim(),
  includeLost: z.boolean().default(false)
})

export const dealIdSchema = z.object({
  dealId: requiredId('dealId')
})

export const searchSchema = z.object({
  query: z.string(),
  kinds: z.array(z.enum(SEARCH_KINDS)).nullish(),
  first: z.number().int().default(20),
  offset: z.number().int().default(0)
})

export const suggestSchema = z.object({
  query: z.string(),
  first: z.number().int().default(10)
})

export const createCompanySchema = z.object({
  name: z.string(),
  website: optionalText,
  phone: optionalText
})

export const createContactSchema = z.object({
  email: z.string(),
  firstName: optionalText,
  lastName: optionalText,
  phone: optionalText,
  companyId: optionalText
})

export const createDealSchema = z.object({
  title: z.string(),
  companyId: requiredId('companyId'),
  amountCents: z.number().int().nonnegative().nullish(),
  currency: optionalText,
  stage: wireStage.optional(),
  closeDate: optionalText,
  assignedUserId: optionalText,
  actorId: optionalText
})
