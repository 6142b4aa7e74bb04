import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger as requestLogger } from 'hono/logger'
import type { ZodError } from 'zod'
import { loadServiceConfig, REQUEST_LIMITS, type ServiceConfig } from './config'
import { isBlendError } from './core/errors'
import { calculateContributionRates, explainScore } from './core/explain'
import { blendTimeline, hasUsableProfile } from './core/pipeline'
import { allowsScoring, parseTrackingLevel, personalizationMode, scoringOptionsFor } from './core/privacy'
import { rankWithBreakdown } from './core/scoring'
import { resolveStrategyPreset } from './core/strategy'
import { createLogger, type Logger } from './logger'
import { blendBodySchema, blendQuerySchema, scoreBodySchema, type ProfileInput } from './schemas'
import type { InjectionStrategyInput, SignalProfile } from './types'

export * from './types'
export * from './core/errors'
export { score, scoreBreakdown, rankCandidates, rankWithBreakdown, normalizeWeights } from './core/scoring'
export { selectColdStart } from './core/cold-start'
export { personalizationMode, parseTrackingLevel, allowsScoring, redactForMode } from './core/privacy'
export { mergeTimeline, mergeTimelineWithReport, harmonizeTimestamp } from './core/merge'
export { normalizeStrategy, resolveStrategyPreset } from './core/strategy'
export { blendTimeline } from './core/pipeline'
export { loadServiceConfig } from './config'

export interface AppOptions {
  config?: ServiceConfig
  logger?: Logger
  /** 現在時刻（テスト用） */
  now?: () => number
}

function toSignalProfile(input: ProfileInput, now: () => number): SignalProfile {
  return {
    userKey: input.userKey,
    authorAffinity: input.authorAffinity,
    nowTs: input.nowTs ?? now(),
    aggregates: input.aggregates
  }
}

function invalidRequest(error: ZodError) {
  return {
    error: 'INVALID_REQUEST',
    issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
  }
}

export function createApp(options: AppOptions = {}) {
  const config = options.config ?? loadServiceConfig()
  const log = options.logger ?? createLogger(config.logLevel)
  const now = options.now ?? Date.now

  const app = new Hono()

  app.use('*', cors())
  app.use('*', requestLogger(message => log.print(message)))

  app.onError((err, c) => {
    if (isBlendError(err)) {
      log.warn('rejected request', { code: err.code, message: err.message })
      return c.json({ error: err.code, message: err.message }, 400)
    }
    log.error('unhandled error', { message: err.message })
    return c.json({ error: 'INTERNAL_ERROR' }, 500)
  })

  app.get('/', (c) => {
    return c.json({ service: 'timeline-blend', status: 'ok' })
  })

  app.get('/health', (c) => {
    return c.json({ healthy: true })
  })

  app.post('/timeline/blend', async (c) => {
    const query = blendQuerySchema.safeParse(c.req.query())
    if (!query.success) return c.json(invalidRequest(query.error), 400)

    const raw: unknown = await c.req.json().catch(() => null)
    const body = blendBodySchema.safeParse(raw)
    if (!body.success) return c.json(invalidRequest(body.error), 400)

    const { realItems, trackingLevel, weights } = body.data
    const profile = body.data.profile ? toSignalProfile(body.data.profile, now) : undefined
    const candidatePool = body.data.candidatePool.slice(0, config.maxCandidates)

    // クエリの戦略名 > ボディの戦略 > ユーザー状態からのプリセット
    let strategy: InjectionStrategyInput
    if (query.data.strategy !== undefined) {
      strategy = resolveStrategyPreset({ isAnonymous: !profile, isNewUser: false, strategyName: query.data.strategy })
    } else if (body.data.strategy) {
      strategy = body.data.strategy
    } else {
      strategy = resolveStrategyPreset({
        isAnonymous: !profile,
        isNewUser: profile !== undefined && !hasUsableProfile(profile, config.minInteractions)
      })
    }
    if (query.data.limit !== undefined) {
      strategy = { ...strategy, maxInjections: Math.min(query.data.limit, REQUEST_LIMITS.maxInjectionsPerRequest) }
    }

    const result = blendTimeline({
      realItems,
      candidatePool,
      trackingLevel: parseTrackingLevel(trackingLevel),
      profile,
      strategy,
      weights: weights ?? config.weights,
      coldStart: { enabled: config.coldStartEnabled, limit: config.coldStartLimit },
      inject: query.data.inject ?? true,
      minInteractions: config.minInteractions,
      forceColdStart: query.data.cold_start ?? false
    })

    log.debug('blended timeline', {
      mode: result.report.mode,
      source: result.report.source,
      injected: result.report.merge?.injected ?? 0,
      total: result.items.length
    })

    return c.json(result)
  })

  app.post('/score', async (c) => {
    const raw: unknown = await c.req.json().catch(() => null)
    const body = scoreBodySchema.safeParse(raw)
    if (!body.success) return c.json(invalidRequest(body.error), 400)

    const mode = personalizationMode(parseTrackingLevel(body.data.trackingLevel))
    if (!allowsScoring(mode)) {
      return c.json({ error: 'PERSONALIZATION_DISABLED', mode }, 403)
    }

    const profile = toSignalProfile(body.data.profile, now)
    const weights = body.data.weights ?? config.weights
    const ranked = rankWithBreakdown(body.data.pool, profile, weights, {
      ...scoringOptionsFor(mode),
      limit: body.data.limit
    })

    return c.json({
      mode,
      ranked: ranked.map(({ item, breakdown }) => ({
        id: item.id,
        score: breakdown.finalScore,
        explanation: explainScore(breakdown),
        contributions: calculateContributionRates(breakdown)
      }))
    })
  })

  return app
}
