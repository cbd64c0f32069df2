import { describe, expect, it } from 'vitest'
import { asCrmError, LimitExceededError, NotFoundError, PersistenceError, ValidationError } from './errors'

describe('asCrmError', () => {
  it('passes core errors through unchanged', () => {
    const error = new ValidationError('bad input')
    expect(asCrmError(error, 'context')).toBe(error)
  })

  it('wraps store errors as persistence failures with the cause attached', () => {
    const cause = new Error('SQLITE_BUSY: database is locked')
    const wrapped = asCrmError(cause, 'Failed to move deal d1')
    expect(wrapped).toBeInstanceOf(PersistenceError)
    expect(wrapped.kind).toBe('Persistence')
    expect(wrapped.code).toBe('PERSISTENCE')
    expect(wrapped.message).toBe('Failed to move deal d1: SQLITE_BUSY: database is locked')
    expect(wrapped.cause).toBe(cause)
  })

  it('wraps thrown non-errors too', () => {
    expect(asCrmError('oops', 'Search failed').message).toBe('Search failed: oops')
  })
})

describe('error kinds', () => {
  it('carries stable codes and messages', () => {
    expect(new NotFoundError('Deal', 'd1')).toMatchObject({ kind: 'NotFound', code: 'NOT_FOUND', message: 'Deal not found: d1' })
    expect(new LimitExceededError('first', 150, 100)).toMatchObject({
      kind: 'LimitExceeded',
      code: 'LIMIT_EXCEEDED',
      message: 'first must be at most 100 (got 150)'
    })
  })
})
