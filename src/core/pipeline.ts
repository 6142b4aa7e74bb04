import type {
  BlendRequest,
  BlendResponse,
  InjectableSource,
  Item,
  PersonalizationMode,
  SignalProfile
} from '../types'
import { DEFAULT_WEIGHTS } from '../types'
import { selectColdStart } from './cold-start'
import { COLD_START_DEFAULTS } from './defaults'
import { explainScore } from './explain'
import { mergeTimelineWithReport, type MergeOptions } from './merge'
import { allowsScoring, personalizationMode, redactForMode, scoringOptionsFor } from './privacy'
import { normalizeWeights, rankWithBreakdown, scoreBreakdown, type BreakdownFn } from './scoring'
import { normalizeStrategy } from './strategy'
import { sortByCreatedAtDesc } from './utils'

/**
 * ブレンドパイプライン
 *
 * 1) PrivacyGate でモード決定
 * 2) コールドスタート強制 → ColdStartSelector
 *    スコアリング可 かつ プロファイル有効 → ScoreModel で上位 k 件
 *    それ以外 → ColdStartSelector
 * 3) TimelineMerger で実タイムラインに注入
 * 4) DISABLED ならユーザー由来の値を出力から除去
 */

export interface BlendDependencies {
  /** スコア内訳関数（呼び出し回数の計測用に差し替え可能） */
  scorer?: BreakdownFn
  /** マージオプション */
  mergeOptions?: MergeOptions
}

/**
 * プロファイルが個人化に使えるか
 *
 * フォロー（著者親和度）もインタラクションも無いプロファイルは匿名と同じ扱い
 */
export function hasUsableProfile(
  profile: SignalProfile | undefined,
  minInteractions: number = 0
): profile is SignalProfile {
  if (!profile) return false
  const { totalInteractions } = profile.aggregates
  const hasSignal = totalInteractions > 0 || Object.keys(profile.authorAffinity).length > 0
  return hasSignal && totalInteractions >= minInteractions
}

interface InjectableSelection {
  source: InjectableSource
  items: Item[]
}

function rankedInjectables(
  request: BlendRequest,
  profile: SignalProfile,
  mode: PersonalizationMode,
  budget: number | undefined,
  scorer: BreakdownFn
): Item[] {
  const weights = request.weights ?? DEFAULT_WEIGHTS

  const ranked = rankWithBreakdown(request.candidatePool, profile, weights, {
    ...scoringOptionsFor(mode),
    limit: budget,
    breakdown: scorer
  })

  return ranked.map(({ item, breakdown }) => ({
    ...item,
    injectionMetadata: {
      source: 'recommendation',
      explanation: explainScore(breakdown),
      score: breakdown.finalScore
    }
  }))
}

function coldStartInjectables(request: BlendRequest, budget: number | undefined): Item[] {
  const limit = request.coldStart?.limit ?? COLD_START_DEFAULTS.limit
  // 先頭 k 件の時点でカテゴリが散っているようにする
  return selectColdStart(request.candidatePool, budget === undefined ? limit : Math.min(limit, budget))
}

function selectInjectables(
  request: BlendRequest,
  mode: PersonalizationMode,
  budget: number | undefined,
  scorer: BreakdownFn
): InjectableSelection {
  const { profile, minInteractions = 0 } = request

  // 明示的な上書きは有効/無効の設定より優先
  if (request.forceColdStart === true) {
    return { source: 'cold_start', items: coldStartInjectables(request, budget) }
  }

  if (allowsScoring(mode) && hasUsableProfile(profile, minInteractions)) {
    return { source: 'ranked', items: rankedInjectables(request, profile, mode, budget, scorer) }
  }

  if (request.coldStart?.enabled === false) {
    return { source: 'none', items: [] }
  }
  return { source: 'cold_start', items: coldStartInjectables(request, budget) }
}

/**
 * 実タイムラインに推薦を混ぜる
 *
 * @throws InvalidWeightConfigError 負の重み
 * @throws UnknownStrategyError 未知の戦略タイプ
 */
export function blendTimeline(
  request: BlendRequest,
  deps: BlendDependencies = {}
): BlendResponse {
  const { scorer = scoreBreakdown, mergeOptions } = deps
  const mode = personalizationMode(request.trackingLevel)

  // 設定エラーは注入の有無に関わらず先に検出する
  const strategy = normalizeStrategy(request.strategy, request.candidatePool.length)
  if (request.weights) normalizeWeights(request.weights)

  if (request.inject === false) {
    return {
      items: sortByCreatedAtDesc(request.realItems),
      report: { mode, source: 'none', merge: null }
    }
  }

  // tag_match はプール全体からタグ一致を探すので切り詰めない
  const budget = strategy.type === 'tag_match' ? undefined : strategy.maxInjections
  const selection = selectInjectables(request, mode, budget, scorer)
  const merged = mergeTimelineWithReport(request.realItems, selection.items, strategy, mergeOptions)

  return {
    items: redactForMode(merged.items, mode),
    report: { mode, source: selection.source, merge: merged.report }
  }
}
