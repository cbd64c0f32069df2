import { describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { createCrmApi } from './index'
import { toApiError } from './errors'
import { API_CHANNELS } from '../../shared/constants/channels'
import { NotFoundError, PersistenceError, ValidationError } from '../errors'
import { StageCatalogCache } from '../services/stage-catalog'
import type { ApiResult } from './router'

const NOW = new Date('2024-06-01T12:00:00.000Z')

function data<T>(result: ApiResult<unknown>, schema: z.ZodType<T>): T {
  if (!result.ok) throw new Error(`${result.error.code}: ${result.error.message}`)
  return schema.parse(result.data)
}

function errorCode(result: ApiResult<unknown>): string | null {
  return result.ok ? null : result.error.code
}

const record = z.object({ id: z.string(), stage: z.string() })
const column = z.object({
  stage: z.object({ key: z.string() }),
  expectedValueCents: z.number(),
  deals: z.array(z.object({ stage: z.string() }))
})
const board = z.object({ columns: z.array(column) })

function setup() {
  const api = createCrmApi({ now: () => NOW, catalogCache: new StageCatalogCache({ ttlMs: 60_000, now: () => NOW }) })
  const company = data(api.invoke(API_CHANNELS.COMPANY_CREATE, { name: 'Acme Corp' }), z.object({ id: z.string() }))
  const deal = data(
    api.invoke(API_CHANNELS.DEAL_CREATE, { title: 'Rollout', companyId: company.id, amountCents: 400, stage: 'QUALIFY' }),
    record
  )
  return { api, company, deal }
}

describe('toApiError', () => {
  it('maps core error kinds to API codes', () => {
    expect(toApiError(new NotFoundError('Deal', 'd1'))).toEqual({ code: 'NOT_FOUND', message: 'Deal not found: d1' })
    expect(toApiError(new ValidationError('bad'))).toEqual({ code: 'BAD_USER_INPUT', message: 'bad' })
    expect(toApiError(new PersistenceError('write failed', new Error('disk')))).toEqual({
      code: 'INTERNAL',
      message: 'write failed'
    })
  })

  it('hides the message of anything else', () => {
    expect(toApiError(new Error('secret detail'))).toEqual({ code: 'INTERNAL', message: 'Internal error' })
  })
})

describe('CRM API', () => {
  it('creates deals with wire stages', () => {
    const { deal } = setup()
    expect(deal.stage).toBe('QUALIFY')
  })

  it('lists stages as the API enum in catalog order', () => {
    const { api } = setup()
    const stages = data(api.invoke(API_CHANNELS.PIPELINE_STAGES), z.array(z.object({ key: z.string() })))
    expect(stages.map((stage) => stage.key)).toEqual(['NEW', 'QUALIFY', 'PROPOSAL', 'NEGOTIATE', 'WON', 'LOST'])
  })

  it('moves a deal and returns its history', () => {
    const { api, deal } = setup()
    const moved = api.invoke(API_CHANNELS.PIPELINE_MOVE_DEAL_STAGE, {
      dealId: deal.id,
      stage: 'WON',
      note: 'Signed',
      actorId: 'user-9'
    })
    expect(moved).toMatchObject({ ok: true, data: { stage: 'WON', updatedAt: NOW.toISOString(), updatedBy: 'user-9' } })

    const history = api.invoke(API_CHANNELS.PIPELINE_DEAL_HISTORY, { dealId: deal.id })
    expect(history).toMatchObject({
      ok: true,
      data: {
        history: [{ fromStage: 'QUALIFY', toStage: 'WON', note: 'Signed', actorId: 'user-9' }],
        activities: [{ subject: 'Qualify -> Won', bodyMd: 'Signed', meta: { from: 'QUALIFY', to: 'WON' } }]
      }
    })
  })

  it('rejects arguments that fail the schema', () => {
    const { api } = setup()
    const result = api.invoke(API_CHANNELS.PIPELINE_MOVE_DEAL_STAGE, { stage: 'WON' })
    expect(result).toEqual({ ok: false, error: { code: 'BAD_USER_INPUT', message: 'dealId: dealId is required' } })
    const badStage = api.invoke(API_CHANNELS.PIPELINE_MOVE_DEAL_STAGE, { dealId: 'd1', stage: 'CLOSED' })
    expect(errorCode(badStage)).toBe('BAD_USER_INPUT')
  })

  it('reports a missing deal as NOT_FOUND', () => {
    const { api } = setup()
    const result = api.invoke(API_CHANNELS.PIPELINE_MOVE_DEAL_STAGE, { dealId: 'missing', stage: 'WON' })
    expect(result).toEqual({ ok: false, error: { code: 'NOT_FOUND', message: 'Deal not found: missing' } })
  })

  it('enforces page-size ceilings', () => {
    const { api } = setup()
    expect(errorCode(api.invoke(API_CHANNELS.PIPELINE_BOARD, { first: 150 }))).toBe('LIMIT_EXCEEDED')
    expect(errorCode(api.invoke(API_CHANNELS.SEARCH_QUERY, { query: 'acme', first: 200 }))).toBe('LIMIT_EXCEEDED')
  })

  it('names unknown stages in a board filter', () => {
    const { api } = setup()
    const result = api.invoke(API_CHANNELS.PIPELINE_BOARD, { first: 5, stages: ['BOGUS'] })
    expect(result).toEqual({ ok: false, error: { code: 'BAD_USER_INPUT', message: 'Unknown stage key(s): bogus' } })
  })

  it('returns a wire-shaped board', () => {
    const { api } = setup()
    const result = data(api.invoke(API_CHANNELS.PIPELINE_BOARD, { first: 5, stages: ['QUALIFY'] }), board)
    expect(result.columns).toHaveLength(1)
    expect(result.columns[0].stage.key).toBe('QUALIFY')
    expect(result.columns[0].expectedValueCents).toBe(100)
    expect(result.columns[0].deals.map((card) => card.stage)).toEqual(['QUALIFY'])
  })

  it('invalidates the catalog cache after a stage edit', () => {
    const { api } = setup()
    const updated = api.invoke(API_CHANNELS.PIPELINE_UPSERT_STAGE, { stage: 'QUALIFY', probability: 50 })
    expect(updated).toMatchObject({ ok: true, data: { key: 'QUALIFY', probability: 50 } })
    const result = data(api.invoke(API_CHANNELS.PIPELINE_BOARD, { first: 0, stages: ['QUALIFY'] }), board)
    expect(result.columns[0].expectedValueCents).toBe(200)
  })

  it('builds a report with month periods', () => {
    const { api, company } = setup()
    data(
      api.invoke(API_CHANNELS.DEAL_CREATE, { title: 'Q2 deal', companyId: company.id, amountCents: 1000, closeDate: '2024-05-20' }),
      record
    )
    const report = data(
      api.invoke(API_CHANNELS.PIPELINE_REPORT, { from: '2024-04-01', to: '2024-06-30' }),
      z.object({ forecast: z.array(z.object({ period: z.string(), deals: z.number() })) })
    )
    expect(report.forecast.map((point) => [point.period, point.deals])).toEqual([
      ['2024-04', 0],
      ['2024-05', 1],
      ['2024-06', 0]
    ])
  })

  it('searches and suggests', () => {
    const { api, deal } = setup()
    const hits = data(
      api.invoke(API_CHANNELS.SEARCH_QUERY, { query: 'rollout' }),
      z.array(z.object({ kind: z.string(), id: z.string() }))
    )
    expect(hits.map((hit) => [hit.kind, hit.id])).toEqual([['deal', deal.id]])
    const deals = data(api.invoke(API_CHANNELS.SEARCH_SUGGEST_DEALS, { query: 'rollout' }), z.array(record))
    expect(deals).toEqual([{ id: deal.id, stage: 'QUALIFY' }])
  })

  it('hides unexpected failures behind INTERNAL', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const api = createCrmApi({
      now: () => NOW,
      catalogCache: new StageCatalogCache({
        load: () => {
          throw new Error('catalog offline')
        }
      })
    })
    expect(api.invoke(API_CHANNELS.PIPELINE_STAGES)).toEqual({
      ok: false,
      error: { code: 'INTERNAL', message: 'Internal error' }
    })
  })
})
