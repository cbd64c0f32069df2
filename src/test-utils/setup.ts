import { afterEach, beforeEach, vi } from 'vitest'
import { closeDatabase } from '../main/database/connection'

beforeEach(() => {
  process.env['CRM_DATABASE_PATH'] = ':memory:'
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
})

afterEach(() => {
  closeDatabase()
  vi.restoreAllMocks()
})
