import { ZodError } from 'zod'
import { isCrmError, ValidationError } from '../errors'
import type { CrmErrorKind } from '../errors'

export type ApiErrorCode = 'NOT_FOUND' | 'BAD_USER_INPUT' | 'LIMIT_EXCEEDED' | 'INTERNAL'

export interface ApiError {
  code: ApiErrorCode
  message: string
}

const API_CODES: Record<CrmErrorKind, ApiErrorCode> = {
  NotFound: 'NOT_FOUND',
  Validation: 'BAD_USER_INPUT',
  LimitExceeded: 'LIMIT_EXCEEDED',
  Persistence: 'INTERNAL'
}

export function fromZodError(error: ZodError): ValidationError {
  const detail = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
  return new ValidationError(detail || 'Invalid arguments')
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof ZodError) {
    return { code: 'BAD_USER_INPUT', message: fromZodError(error).message }
  }
  if (isCrmError(error)) {
    return { code: API_CODES[error.kind], message: error.message }
  }
  return { code: 'INTERNAL', message: 'Internal error' }
}
