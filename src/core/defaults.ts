/**
 * アルゴリズム全体のデフォルトパラメータ
 *
 * - スコアリング: 著者親和度 + エンゲージメント + 新しさ
 * - マージ: 実タイムラインの時系列を壊さずに注入する
 */

// ============================================
// スコアリングパラメータ
// ============================================

export const SCORING_DEFAULTS = {
  /** 重み合計の許容誤差 */
  weightSumTolerance: 1e-6,
  /** 母集団平均の著者親和度（DEGRADED モードで使用） */
  populationAuthorAffinity: 0.1,
  /** エンゲージメント項が 1.0 に達する合計数 */
  engagementSaturation: 1000,
  /** 1日（ミリ秒） */
  dayMs: 24 * 60 * 60 * 1000
} as const

// ============================================
// マージパラメータ
// ============================================

export const MERGE_DEFAULTS = {
  /** after_n の間隔 */
  n: 3,
  /** first_only の対象となる先頭件数 */
  firstOnlyWindow: 10,
  /** ギャップ内の配置比率（0 = 古い側, 1 = 新しい側） */
  gapRatio: 0.6,
  /** 先頭/末尾の仮想ギャップに置く時のオフセット（ミリ秒） */
  edgeOffsetMs: 1000,
  /** シャッフルのデフォルトシード */
  seed: 'timeline'
} as const

// ============================================
// コールドスタートパラメータ
// ============================================

export const COLD_START_DEFAULTS = {
  /** 露出上限 */
  limit: 20,
  /** タグなしアイテムのカテゴリ */
  untaggedCategory: 'untagged'
} as const

// ============================================
// 戦略プリセット
// ============================================

export const STRATEGY_PRESETS = {
  namedMaxInjections: 5,
  firstOnlyMaxInjections: 3,
  regularMinGapMinutes: 10
} as const

// ============================================
// PRNG・ハッシュ定数
// ============================================

export const HASH_CONSTANTS = {
  fnv1aOffsetBasis: 14695981039346656037n,
  fnv1aPrime: 1099511628211n,
  fnv1aBitMask: 0xffffffffffffffffn,
  prngDivisor: 0x100000000
} as const

// ============================================
// 型定義
// ============================================

export type ScoringDefaults = typeof SCORING_DEFAULTS
export type MergeDefaults = typeof MERGE_DEFAULTS
export type ColdStartDefaults = typeof COLD_START_DEFAULTS
export type HashConstants = typeof HASH_CONSTANTS
