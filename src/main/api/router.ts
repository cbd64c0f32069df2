import type { ZodType, ZodTypeDef } from 'zod'
import { fromZodError, toApiError } from './errors'
import type { ApiError } from './errors'
import type { ApiChannel } from '../../shared/constants/channels'

export type ApiResult<T> = { ok: true; data: T } | { ok: false; error: ApiError }

type Handler = (args: unknown) => unknown

/**
 * Transport-free channel registry. Each handler owns a zod schema for its raw
 * argument object; whatever sits in front (HTTP, GraphQL, a worker) calls
 * `invoke` with the decoded payload.
 */
export class ApiRouter {
  private readonly handlers = new Map<ApiChannel, Handler>()

  handle<Input, Output>(
    channel: ApiChannel,
    schema: ZodType<Input, ZodTypeDef, unknown>,
    handler: (input: Input) => Output
  ): void {
    if (this.handlers.has(channel)) {
      throw new Error(`Handler already registered for ${channel}`)
    }
    this.handlers.set(channel, (args: unknown) => {
      const parsed = schema.safeParse(args ?? {})
      if (!parsed.success) throw fromZodError(parsed.error)
      return handler(parsed.data)
    })
  }

  channels(): ApiChannel[] {
    return [...this.handlers.keys()]
  }

  invoke(channel: ApiChannel, args?: unknown): ApiResult<unknown> {
    const handler = this.handlers.get(channel)
    if (!handler) {
      return { ok: false, error: { code: 'NOT_FOUND', message: `No handler for ${channel}` } }
    }
    try {
      return { ok: true, data: handler(args) }
    } catch (error) {
      const apiError = toApiError(error)
      if (apiError.code === 'INTERNAL') {
        console.error(`[API] ${channel} failed:`, error)
      }
      return { ok: false, error: apiError }
    }
  }
}
