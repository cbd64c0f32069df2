import { v4 as uuidv4 } from 'uuid'
import { getDatabase } from '../connection'
import type { ContactRow } from '../schema'
import { NotFoundError, ValidationError } from '../../errors'
import { placeholders } from '../../utils/sql'
import { getCompany } from './company.repo'
import type { Contact, CreateContactInput } from '../../../shared/types/crm'

function mapContact(row: ContactRow): Contact {
  return {
    id: row.id,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    phone: row.phone,
    companyId: row.company_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  }
}

function normalizeEmail(value: string): string | null {
  const cleaned = value.trim().toLowerCase().replace(/^mailto:/, '')
  if (!/^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(cleaned)) return null
  return cleaned
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = (value || '').trim()
  return trimmed || null
}

export function createContact(data: CreateContactInput, now: Date = new Date()): Contact {
  const email = normalizeEmail(data.email)
  if (!email) throw new ValidationError(`Invalid contact email: ${data.email}`)

  const companyId = optionalText(data.companyId)
  if (companyId && !getCompany(companyId)) {
    throw new NotFoundError('Company', companyId)
  }

  const db = getDatabase()
  const id = uuidv4()
  const timestamp = now.toISOString()
  db.prepare(`
    INSERT INTO contacts (
      id, email, first_name, last_name, phone, company_id, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    email,
    optionalText(data.firstName),
    optionalText(data.lastName),
    optionalText(data.phone),
    companyId,
    timestamp,
    timestamp
  )

  const [contact] = getContactsByIds([id])
  if (!contact) {
    throw new Error('Failed to create contact')
  }
  return contact
}

export function getContactsByIds(ids: string[]): Contact[] {
  if (ids.length === 0) return []
  const db = getDatabase()
  const rows = db
    .prepare(`
      SELECT id, email, first_name, last_name, phone, company_id, created_at, updated_at
      FROM contacts
      WHERE id IN (${placeholders(ids.length)})
    `)
    .all(...ids) as ContactRow[]
  return rows.map(mapContact)
}
