import { z } from 'zod'
import { REQUEST_LIMITS } from './config'

/**
 * HTTP 入力のスキーマ
 *
 * createdAt は epoch ms か ISO 8601 文字列を受け付け、ms に揃える
 */

const timestampSchema = z.union([
  z.number().finite(),
  z.string().datetime({ offset: true }).transform(value => Date.parse(value))
])

const countSchema = z.number().int().min(0).default(0)

export const itemSchema = z.object({
  id: z.string().min(1),
  authorId: z.string().min(1),
  createdAt: timestampSchema,
  tags: z.array(z.string()).default([]),
  engagement: z
    .object({
      replies: countSchema,
      boosts: countSchema,
      favorites: countSchema
    })
    .default({}),
  score: z.number().finite().optional()
})

export const profileSchema = z.object({
  userKey: z.string().min(1),
  authorAffinity: z.record(z.number().finite()).default({}),
  nowTs: timestampSchema.optional(),
  aggregates: z
    .object({
      totalInteractions: z.number().int().min(0).default(0),
      populationAuthorAffinity: z.number().finite().optional(),
      engagementSaturation: z.number().finite().optional()
    })
    .default({})
})

// 負の重みはコアで InvalidWeightConfigError にするのでここでは弾かない
export const weightsSchema = z.object({
  author: z.number().finite(),
  engagement: z.number().finite(),
  recency: z.number().finite(),
  decayDays: z.number().finite()
})

export const strategySchema = z.object({
  type: z.string().min(1),
  maxInjections: z.number().int().min(0).optional(),
  n: z.number().int().positive().optional(),
  shuffleInjectable: z.boolean().optional(),
  minGapMinutes: z.number().min(0).optional(),
  seed: z.string().optional()
})

export const blendBodySchema = z.object({
  realItems: z.array(itemSchema).max(REQUEST_LIMITS.maxRealItems).default([]),
  candidatePool: z.array(itemSchema).max(REQUEST_LIMITS.maxCandidatePool).default([]),
  trackingLevel: z.string().optional(),
  profile: profileSchema.optional(),
  strategy: strategySchema.optional(),
  weights: weightsSchema.optional()
})

const queryFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1')

export const blendQuerySchema = z.object({
  strategy: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(0).optional(),
  inject: queryFlag.optional(),
  cold_start: queryFlag.optional()
})

export const scoreBodySchema = z.object({
  pool: z.array(itemSchema).max(REQUEST_LIMITS.maxCandidatePool),
  profile: profileSchema,
  trackingLevel: z.string().optional(),
  weights: weightsSchema.optional(),
  limit: z.number().int().min(0).optional()
})

export type ItemInput = z.infer<typeof itemSchema>
export type ProfileInput = z.infer<typeof profileSchema>
export type BlendBody = z.infer<typeof blendBodySchema>
export type ScoreBody = z.infer<typeof scoreBodySchema>
