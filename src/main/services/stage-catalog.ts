import { getStageCacheTtlMs } from '../config'
import { ValidationError } from '../errors'
import { listStageMeta } from '../database/repositories/stage-meta.repo'
import type { StageProbability } from '../database/repositories/pipeline.repo'
import type { DealStageKey, StageMeta } from '../../shared/types/pipeline'

/** Ordered, read-only view of the pipeline stages. */
export class StageCatalog {
  readonly stages: readonly StageMeta[]
  private readonly byKey: Map<DealStageKey, StageMeta>

  constructor(stages: StageMeta[]) {
    this.stages = [...stages].sort((a, b) => a.sortOrder - b.sortOrder)
    this.byKey = new Map(this.stages.map((stage) => [stage.key, stage]))
  }

  get isEmpty(): boolean {
    return this.stages.length === 0
  }

  get(key: DealStageKey): StageMeta | null {
    return this.byKey.get(key) ?? null
  }

  has(key: string): key is DealStageKey {
    for (const stage of this.stages) {
      if (stage.key === key) return true
    }
    return false
  }

  get wonStage(): StageMeta | null {
    return this.stages.find((stage) => stage.isWon) ?? null
  }

  get lostKeys(): DealStageKey[] {
    return this.stages.filter((stage) => stage.isLost).map((stage) => stage.key)
  }

  get probabilities(): StageProbability[] {
    return this.stages.map((stage) => ({ key: stage.key, probability: stage.probability }))
  }

  displayName(key: DealStageKey): string {
    return this.get(key)?.displayName ?? key
  }

  /**
   * Stages selected by a caller-supplied key filter, in catalog order. Keys are
   * trimmed and lowercased first. `undefined`/`null` selects every stage.
   */
  select(filter: readonly string[] | null | undefined): StageMeta[] {
    if (filter === null || filter === undefined) return [...this.stages]
    if (filter.length === 0) {
      throw new ValidationError('Stage filter must name at least one stage')
    }
    const wanted = new Set(filter.map((key) => key.trim().toLowerCase()))
    const unknown = [...wanted].filter((key) => !this.has(key))
    if (unknown.length > 0) {
      throw new ValidationError(`Unknown stage key(s): ${unknown.join(', ')}`)
    }
    return this.stages.filter((stage) => wanted.has(stage.key))
  }
}

export function loadStageCatalog(): StageCatalog {
  return new StageCatalog(listStageMeta())
}

export interface StageCatalogCacheOptions {
  ttlMs?: number
  now?: () => Date
  load?: () => StageCatalog
}

/**
 * Caller-owned, time-bounded cache. A stage edit becomes visible after the TTL
 * or after `invalidate()`.
 */
export class StageCatalogCache {
  private readonly ttlMs: number
  private readonly now: () => Date
  private readonly load: () => StageCatalog
  private cached: { catalog: StageCatalog; loadedAt: number } | null = null

  constructor(options: StageCatalogCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? getStageCacheTtlMs()
    this.now = options.now ?? (() => new Date())
    this.load = options.load ?? loadStageCatalog
  }

  get(): StageCatalog {
    const current = this.now().getTime()
    if (this.cached && current - this.cached.loadedAt < this.ttlMs) {
      return this.cached.catalog
    }
    const catalog = this.load()
    this.cached = { catalog, loadedAt: current }
    return catalog
  }

  invalidate(): void {
    this.cached = null
  }
}
