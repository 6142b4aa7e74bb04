/**
 * Centralized Configuration Module
 *
 * Service-level tunables for the blend engine. Algorithm constants live in
 * core/defaults; this module owns the values that come from the environment
 * (weights, decay window, candidate pool size, cold-start switch).
 */

import { z } from 'zod'
import type { WeightConfig } from '../types'
import { COLD_START_DEFAULTS } from '../core/defaults'
import { ConfigError } from '../core/errors'

/**
 * Request-level limits
 */
export const REQUEST_LIMITS = {
  maxRealItems: 400,
  maxCandidatePool: 1000,
  maxInjectionsPerRequest: 50
} as const

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'TRUE', 'FALSE', 'True', 'False'])
  .transform(value => ['true', '1', 'yes'].includes(value.toLowerCase()))

const envSchema = z.object({
  RANKING_WEIGHT_AUTHOR: z.coerce.number().min(0).default(0.4),
  RANKING_WEIGHT_ENGAGEMENT: z.coerce.number().min(0).default(0.3),
  RANKING_WEIGHT_RECENCY: z.coerce.number().min(0).default(0.3),
  RANKING_TIME_DECAY_DAYS: z.coerce.number().min(0).default(7),
  RANKING_MIN_INTERACTIONS: z.coerce.number().int().min(0).default(0),
  RANKING_MAX_CANDIDATES: z.coerce.number().int().positive().default(100),
  RANKING_INCLUDE_SYNTHETIC: booleanFromEnv.default('false'),
  COLD_START_LIMIT: z.coerce.number().int().min(0).default(COLD_START_DEFAULTS.limit),
  PORT: z.coerce.number().int().positive().default(5002),
  LOG_LEVEL: z.string().transform(value => value.toLowerCase()).pipe(z.enum(LOG_LEVELS)).default('info')
})

export interface ServiceConfig {
  weights: WeightConfig
  /** 個人化に必要な最小インタラクション数 */
  minInteractions: number
  /** 候補プールの最大件数 */
  maxCandidates: number
  /** コールドスタート（合成コンテンツ）を有効にするか */
  coldStartEnabled: boolean
  /** コールドスタートの露出上限 */
  coldStartLimit: number
  port: number
  logLevel: LogLevel
}

/**
 * 環境変数から設定を読み込む
 *
 * @throws ConfigError 不正な値があればそのキーを列挙
 */
export function loadServiceConfig(
  env: Record<string, string | undefined> = process.env
): ServiceConfig {
  // 空文字は未設定として扱う
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )

  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))]
    throw new ConfigError(keys)
  }

  const values = parsed.data
  return {
    weights: {
      author: values.RANKING_WEIGHT_AUTHOR,
      engagement: values.RANKING_WEIGHT_ENGAGEMENT,
      recency: values.RANKING_WEIGHT_RECENCY,
      decayDays: values.RANKING_TIME_DECAY_DAYS
    },
    minInteractions: values.RANKING_MIN_INTERACTIONS,
    maxCandidates: values.RANKING_MAX_CANDIDATES,
    coldStartEnabled: values.RANKING_INCLUDE_SYNTHETIC,
    coldStartLimit: values.COLD_START_LIMIT,
    port: values.PORT,
    logLevel: values.LOG_LEVEL
  }
}
