import type { Item, SignalProfile, WeightConfig, ScoreBreakdown } from '../types'
import { DEFAULT_WEIGHTS } from '../types'
import { SCORING_DEFAULTS } from './defaults'
import { InvalidWeightConfigError } from './errors'
import { clamp, safeDiv, toCount } from './numeric-utils'

/**
 * スコアリング
 *
 * 3つの項を重み付きで合成:
 * - Author: ユーザーの著者親和度
 * - Engagement: 返信/ブースト/お気に入り（対数で飽和）
 * - Recency: 経過日数の指数減衰
 *
 * Score = w_author*Author + w_engagement*Engagement + w_recency*Recency  ∈ [0, 1]
 */

export interface ScoringOptions {
  /**
   * false の場合、著者親和度をユーザー個別値ではなく母集団平均で置き換える
   * デフォルト: true
   */
  useAuthorAffinity?: boolean
}

/** score() と同じシグネチャ（パイプラインで差し替え可能） */
export type ScoreFn = (
  item: Item,
  profile: SignalProfile,
  weights: WeightConfig,
  options?: ScoringOptions
) => number

/** scoreBreakdown() と同じシグネチャ */
export type BreakdownFn = (
  item: Item,
  profile: SignalProfile,
  weights: WeightConfig,
  options?: ScoringOptions
) => ScoreBreakdown

// ============================================================
// 重みの検証と正規化
// ============================================================

/**
 * 重みを検証し、3項の合計が1になるよう正規化する
 *
 * - 負の値は InvalidWeightConfigError
 * - 合計が 1 ± tolerance なら そのまま
 * - 全て 0 なら 1/3 ずつ（どの項も落とさない）
 */
export function normalizeWeights(weights: WeightConfig): WeightConfig {
  const entries: Array<[keyof WeightConfig, number]> = [
    ['author', weights.author],
    ['engagement', weights.engagement],
    ['recency', weights.recency],
    ['decayDays', weights.decayDays]
  ]
  for (const [field, value] of entries) {
    if (Number.isNaN(value) || value < 0) {
      throw new InvalidWeightConfigError(field, value)
    }
  }

  const sum = weights.author + weights.engagement + weights.recency
  if (sum === 0) {
    return { author: 1 / 3, engagement: 1 / 3, recency: 1 / 3, decayDays: weights.decayDays }
  }
  if (Math.abs(sum - 1) <= SCORING_DEFAULTS.weightSumTolerance) {
    return { ...weights }
  }
  return {
    author: weights.author / sum,
    engagement: weights.engagement / sum,
    recency: weights.recency / sum,
    decayDays: weights.decayDays
  }
}

// ============================================================
// 各項
// ============================================================

/**
 * 著者項: プロファイル内の最大親和度で正規化した値
 * 未知の著者は 0（エラーではない）
 */
export function calculateAuthorTerm(item: Item, profile: SignalProfile): number {
  const affinity = profile.authorAffinity[item.authorId]
  if (affinity === undefined || !(affinity > 0)) return 0

  let maxAffinity = 0
  for (const value of Object.values(profile.authorAffinity)) {
    if (value > maxAffinity) maxAffinity = value
  }
  return clamp(safeDiv(affinity, maxAffinity), 0, 1)
}

/**
 * 母集団平均の著者親和度（DEGRADED モード用）
 */
export function populationAuthorTerm(profile: SignalProfile): number {
  const population = profile.aggregates.populationAuthorAffinity
  return clamp(population ?? SCORING_DEFAULTS.populationAuthorAffinity, 0, 1)
}

/**
 * エンゲージメント項: ln(1 + total) / ln(1 + saturation) を [0,1] に制限
 */
export function calculateEngagementTerm(item: Item, profile?: SignalProfile): number {
  const total =
    toCount(item.engagement.replies) +
    toCount(item.engagement.boosts) +
    toCount(item.engagement.favorites)

  const configured = profile?.aggregates.engagementSaturation
  const saturation = configured !== undefined && configured > 0
    ? configured
    : SCORING_DEFAULTS.engagementSaturation

  return clamp(safeDiv(Math.log1p(total), Math.log1p(saturation)), 0, 1)
}

/**
 * 新しさ項: exp(-ageDays / decayDays)
 * 未来の日時は age = 0 として扱う（最大値 1）
 */
export function calculateRecencyTerm(createdAt: number, nowTs: number, decayDays: number): number {
  const ageDays = Math.max(0, nowTs - createdAt) / SCORING_DEFAULTS.dayMs
  if (decayDays === 0) {
    return ageDays === 0 ? 1 : 0
  }
  return clamp(Math.exp(-ageDays / decayDays), 0, 1)
}

// ============================================================
// 合成スコア
// ============================================================

/**
 * スコア内訳と最終スコアを計算
 */
export function scoreBreakdown(
  item: Item,
  profile: SignalProfile,
  weights: WeightConfig = DEFAULT_WEIGHTS,
  options: ScoringOptions = {}
): ScoreBreakdown {
  const normalized = normalizeWeights(weights)
  const useAuthorAffinity = options.useAuthorAffinity ?? true

  const author = useAuthorAffinity
    ? calculateAuthorTerm(item, profile)
    : populationAuthorTerm(profile)
  const engagement = calculateEngagementTerm(item, profile)
  const recency = calculateRecencyTerm(item.createdAt, profile.nowTs, normalized.decayDays)

  const finalScore = clamp(
    normalized.author * author +
    normalized.engagement * engagement +
    normalized.recency * recency,
    0,
    1
  )

  return { author, engagement, recency, weights: normalized, finalScore }
}

/**
 * スコアのみを返す（純粋関数）
 */
export const score: ScoreFn = (item, profile, weights, options) =>
  scoreBreakdown(item, profile, weights, options).finalScore

// ============================================================
// ランキング
// ============================================================

/** score desc, id asc */
function compareRanked(aScore: number, aId: string, bScore: number, bId: string): number {
  const scoreDelta = bScore - aScore
  if (scoreDelta !== 0) return scoreDelta
  return aId < bId ? -1 : aId > bId ? 1 : 0
}

function applyLimit<T>(items: T[], limit: number | undefined): T[] {
  if (limit === undefined) return items
  return items.slice(0, Math.max(0, Math.floor(limit)))
}

export interface RankOptions extends ScoringOptions {
  /** 上位何件を返すか（省略時は全件） */
  limit?: number
  /** スコア関数（計測用に差し替え可能） */
  scorer?: ScoreFn
}

/**
 * 候補をスコア順に並べる
 *
 * 決定性ソート: 1) score desc, 2) id asc
 * 返り値は score 注釈付きの新しいオブジェクト
 */
export function rankCandidates(
  pool: readonly Item[],
  profile: SignalProfile,
  weights: WeightConfig = DEFAULT_WEIGHTS,
  options: RankOptions = {}
): Item[] {
  const { limit, scorer = score, ...scoringOptions } = options

  // 負の重みはプールが空でもここで弾く
  normalizeWeights(weights)

  const scored = pool.map(item => ({
    ...item,
    score: scorer(item, profile, weights, scoringOptions)
  }))

  scored.sort((a, b) => compareRanked(a.score, a.id, b.score, b.id))
  return applyLimit(scored, limit)
}

export interface RankedCandidate {
  /** score 注釈付きのアイテム */
  item: Item
  breakdown: ScoreBreakdown
}

export interface BreakdownRankOptions extends ScoringOptions {
  limit?: number
  /** 内訳関数（ランキングと説明文で同じ値を使う） */
  breakdown?: BreakdownFn
}

/**
 * rankCandidates と同じ順序で、各候補の内訳も返す
 */
export function rankWithBreakdown(
  pool: readonly Item[],
  profile: SignalProfile,
  weights: WeightConfig = DEFAULT_WEIGHTS,
  options: BreakdownRankOptions = {}
): RankedCandidate[] {
  const { limit, breakdown = scoreBreakdown, ...scoringOptions } = options

  normalizeWeights(weights)

  const ranked = pool.map(item => {
    const result = breakdown(item, profile, weights, scoringOptions)
    return { item: { ...item, score: result.finalScore }, breakdown: result }
  })

  ranked.sort((a, b) => compareRanked(a.breakdown.finalScore, a.item.id, b.breakdown.finalScore, b.item.id))
  return applyLimit(ranked, limit)
}
