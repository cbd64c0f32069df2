export type CrmErrorKind = 'NotFound' | 'Validation' | 'LimitExceeded' | 'Persistence'

const ERROR_CODES: Record<CrmErrorKind, string> = {
  NotFound: 'NOT_FOUND',
  Validation: 'VALIDATION',
  LimitExceeded: 'LIMIT_EXCEEDED',
  Persistence: 'PERSISTENCE'
}

export class CrmError extends Error {
  readonly kind: CrmErrorKind
  readonly code: string

  constructor(kind: CrmErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CrmError'
    this.kind = kind
    this.code = ERROR_CODES[kind]
  }
}

export class NotFoundError extends CrmError {
  readonly entityType: string
  readonly entityId: string

  constructor(entityType: string, entityId: string) {
    super('NotFound', `${entityType} not found: ${entityId}`)
    this.name = 'NotFoundError'
    this.entityType = entityType
    this.entityId = entityId
  }
}

export class ValidationError extends CrmError {
  constructor(message: string) {
    super('Validation', message)
    this.name = 'ValidationError'
  }
}

export class LimitExceededError extends CrmError {
  readonly requested: number
  readonly max: number

  constructor(field: string, requested: number, max: number) {
    super('LimitExceeded', `${field} must be at most ${max} (got ${requested})`)
    this.name = 'LimitExceededError'
    this.requested = requested
    this.max = max
  }
}

export class PersistenceError extends CrmError {
  constructor(message: string, cause: unknown) {
    super('Persistence', message, { cause })
    this.name = 'PersistenceError'
  }
}

export function isCrmError(error: unknown): error is CrmError {
  return error instanceof CrmError
}

/** Core errors pass through untouched; anything the store threw becomes a PersistenceError. */
export function asCrmError(error: unknown, context: string): CrmError {
  if (isCrmError(error)) return error
  const detail = error instanceof Error ? error.message : String(error)
  return new PersistenceError(`${context}: ${detail}`, error)
}
