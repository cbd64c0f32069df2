import { v4 as uuidv4 } from 'uuid'
import { getDatabase } from '../connection'
import type { CompanyRow } from '../schema'
import { ValidationError } from '../../errors'
import { placeholders } from '../../utils/sql'
import type { Company, CreateCompanyInput } from '../../../shared/types/crm'

function mapCompany(row: CompanyRow): Company {
  return {
    id: row.id,
    name: row.name,
    website: row.website,
    phone: row.phone,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  }
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = (value || '').trim()
  return trimmed || null
}

export function createCompany(data: CreateCompanyInput, now: Date = new Date()): Company {
  const name = data.name.trim()
  if (!name) throw new ValidationError('Company name is required')

  const db = getDatabase()
  const id = uuidv4()
  const timestamp = now.toISOString()
  db.prepare(`
    INSERT INTO companies (id, name, website, phone, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(id, name, optionalText(data.website), optionalText(data.phone), timestamp, timestamp)

  const company = getCompany(id)
  if (!company) {
    throw new Error('Failed to create company')
  }
  return company
}

export function getCompany(id: string): Company | null {
  const db = getDatabase()
  const row = db
    .prepare(`
      SELECT id, name, website, phone, created_at, updated_at
      FROM companies
      WHERE id = ?
      LIMIT 1
    `)
    .get(id) as CompanyRow | undefined
  return row ? mapCompany(row) : null
}

/** Bulk lookup; the result order is whatever the store returns. */
export function getCompaniesByIds(ids: string[]): Company[] {
  if (ids.length === 0) return []
  const db = getDatabase()
  const rows = db
    .prepare(`
      SELECT id, name, website, phone, created_at, updated_at
      FROM companies
      WHERE id IN (${placeholders(ids.length)})
    `)
    .all(...ids) as CompanyRow[]
  return rows.map(mapCompany)
}
