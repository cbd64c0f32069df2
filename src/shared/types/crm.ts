import type { DealStageKey } from './pipeline'

export interface Company {
  id: string
  name: string
  website: string | null
  phone: string | null
  createdAt: string
  updatedAt: string
}

export interface Contact {
  id: string
  email: string
  firstName: string | null
  lastName: string | null
  phone: string | null
  companyId: string | null
  createdAt: string
  updatedAt: string
}

export interface Deal {
  id: string
  title: string
  amountCents: number | null
  currency: string | null
  stage: DealStageKey
  closeDate: string | null
  companyId: string
  assignedUserId: string | null
  createdBy: string | null
  updatedBy: string | null
  createdAt: string
  updatedAt: string
}

export interface CreateCompanyInput {
  name: string
  website?: string | null
  phone?: string | null
}

export interface CreateContactInput {
  email: string
  firstName?: string | null
  lastName?: string | null
  phone?: string | null
  companyId?: string | null
}

export interface CreateDealInput {
  title: string
  companyId: string
  amountCents?: number | null
  currency?: string | null
  stage?: DealStageKey | null
  closeDate?: string | null
  assignedUserId?: string | null
  /** Backfilled records keep their original creation time. */
  createdAt?: string | null
}
