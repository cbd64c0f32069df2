import { createCompany } from '../main/database/repositories/company.repo'
import { createDeal } from '../main/database/repositories/deal.repo'
import type { Company, CreateDealInput, Deal } from '../shared/types/crm'

/** A clock that returns `start` and moves forward one second per call. */
export function steppingClock(start: string, stepMs = 1000): () => Date {
  let current = Date.parse(start)
  return () => {
    const value = new Date(current)
    current += stepMs
    return value
  }
}

export function seedCompany(name = 'Acme Corp', website: string | null = null): Company {
  return createCompany({ name, website }, new Date('2024-01-01T00:00:00.000Z'))
}

export function seedDeal(overrides: Partial<CreateDealInput> & { companyId: string }): Deal {
  return createDeal(
    { title: 'Platform rollout', amountCents: 100_000, ...overrides },
    'user-1',
    new Date('2024-01-01T00:00:00.000Z')
  )
}
