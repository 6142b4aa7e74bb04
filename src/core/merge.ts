import type {
  InjectionStrategy,
  InjectionStrategyInput,
  Item,
  MergeReport,
  StrategyType
} from '../types'
import { DEFAULT_EXPLANATION, REASON_DESCRIPTIONS } from '../types'
import { MERGE_DEFAULTS } from './defaults'
import { seededShuffle } from './random'
import { normalizeStrategy } from './strategy'
import { sharesTag, sortByCreatedAtDesc } from './utils'

/**
 * タイムラインマージ
 *
 * 新しい順の実タイムラインに注入候補を差し込む。
 * 注入アイテムには前後の実アイテムの間に収まる時刻を割り当てるので、
 * 結果は再ソートなしで厳密に新しい順のまま。
 *
 * ギャップ（n = 実アイテム数）:
 *   gap 0      … 先頭の仮想ギャップ（real[0] より新しい）
 *   gap g      … real[g-1] と real[g] の間
 *   gap n      … 末尾の仮想ギャップ（real[n-1] より古い）
 * 1ギャップに置けるのは1件まで。
 */

export interface MergeOptions {
  /** ギャップ内の配置比率（0 = 古い側, 1 = 新しい側） デフォルト: 0.6 */
  gapRatio?: number
  /** 仮想ギャップに置く時のオフセット（ミリ秒） デフォルト: 1000 */
  edgeOffsetMs?: number
}

export interface MergeResult {
  items: Item[]
  report: MergeReport
}

/** 注入位置 */
export interface Gap {
  index: number
  /** 新しい側の実アイテム（先頭ギャップでは無し） */
  newer?: Item
  /** 古い側の実アイテム（末尾ギャップでは無し） */
  older?: Item
}

interface ResolvedMergeOptions {
  gapRatio: number
  edgeOffsetMs: number
}

function resolveOptions(options: MergeOptions): ResolvedMergeOptions {
  const ratio = options.gapRatio ?? MERGE_DEFAULTS.gapRatio
  const offset = options.edgeOffsetMs ?? MERGE_DEFAULTS.edgeOffsetMs
  return {
    // Guard: ratio must be strictly inside (0, 1)
    gapRatio: ratio > 0 && ratio < 1 ? ratio : 0.5,
    edgeOffsetMs: offset > 0 ? offset : MERGE_DEFAULTS.edgeOffsetMs
  }
}

// ============================================================
// ギャップ
// ============================================================

/**
 * 新しい順の実アイテムから n+1 個のギャップを作る
 */
export function buildGaps(sortedReal: readonly Item[]): Gap[] {
  const gaps: Gap[] = []
  for (let g = 0; g <= sortedReal.length; g++) {
    gaps.push({
      index: g,
      newer: g > 0 ? sortedReal[g - 1] : undefined,
      older: g < sortedReal.length ? sortedReal[g] : undefined
    })
  }
  return gaps
}

/**
 * 合成時刻を計算
 *
 * - 内側: older + (newer - older) * gapRatio（境界に一致したら中点）
 * - 先頭: newer が無い → older + edgeOffsetMs
 * - 末尾: older が無い → newer - edgeOffsetMs
 */
export function harmonizeTimestamp(gap: Gap, options: MergeOptions = {}): number {
  const { gapRatio, edgeOffsetMs } = resolveOptions(options)
  const { newer, older } = gap

  if (newer && older) {
    const span = newer.createdAt - older.createdAt
    const placed = older.createdAt + span * gapRatio
    if (placed > older.createdAt && placed < newer.createdAt) return placed
    return older.createdAt + span / 2
  }
  if (older) return older.createdAt + edgeOffsetMs
  if (newer) return newer.createdAt - edgeOffsetMs
  return 0
}

/**
 * ギャップに注入できるか
 *
 * 内側のギャップは newer - older >= minGapMinutes かつ
 * 両端の間に厳密に収まる時刻が存在すること。仮想ギャップは常に可。
 */
export function isGapEligible(gap: Gap, minGapMinutes: number, options: MergeOptions = {}): boolean {
  const { newer, older } = gap
  if (!newer || !older) return true

  const diffMs = newer.createdAt - older.createdAt
  if (diffMs < minGapMinutes * 60 * 1000) return false

  const placed = harmonizeTimestamp(gap, options)
  return placed > older.createdAt && placed < newer.createdAt
}

// ============================================================
// 戦略ごとの候補ギャップ
// ============================================================

/**
 * uniform: g_i = round(i * n / (k + 1)), i = 1..k
 * 重複した場合は次に空いているギャップへ（無ければ手前へ）ずらす
 */
export function uniformGapTargets(realCount: number, k: number): number[] {
  const targets: number[] = []
  const used = new Set<number>()
  const lastGap = realCount

  for (let i = 1; i <= k; i++) {
    let g = Math.round((i * realCount) / (k + 1))
    if (used.has(g)) {
      let probe = g + 1
      while (probe <= lastGap && used.has(probe)) probe++
      if (probe > lastGap) {
        probe = g - 1
        while (probe >= 0 && used.has(probe)) probe--
      }
      if (probe < 0) break
      g = probe
    }
    used.add(g)
    targets.push(g)
  }
  return targets.sort((a, b) => a - b)
}

/**
 * after_n: n, 2n, 3n, ... 番目の実アイテムの直後
 */
export function afterNGapTargets(realCount: number, n: number): number[] {
  const step = Math.max(1, Math.floor(n))
  const targets: number[] = []
  for (let g = step; g <= realCount; g += step) {
    targets.push(g)
  }
  return targets
}

/**
 * first_only: 先頭 firstOnlyWindow 件の各実アイテムの直後
 */
export function firstOnlyGapTargets(realCount: number): number[] {
  const window = Math.min(MERGE_DEFAULTS.firstOnlyWindow, realCount)
  return Array.from({ length: window }, (_, i) => i + 1)
}

function gapTargetsFor(type: Exclude<StrategyType, 'tag_match'>, strategy: InjectionStrategy, realCount: number, k: number): number[] {
  switch (type) {
    case 'uniform':
      return uniformGapTargets(realCount, k)
    case 'after_n':
      return afterNGapTargets(realCount, strategy.n)
    case 'first_only':
      return firstOnlyGapTargets(realCount)
  }
}

// ============================================================
// 注釈
// ============================================================

/**
 * 注入フラグとメタデータを付けた新しいアイテムを返す
 * 既存の source / explanation（例: cold_start）は保持する
 */
export function tagAsInjected(
  item: Item,
  strategy: StrategyType,
  createdAt: number,
  explanation?: string
): Item {
  const existing = item.injectionMetadata
  const score = item.score ?? existing?.score

  return {
    ...item,
    createdAt,
    injected: true,
    injectionMetadata: {
      source: existing?.source ?? 'recommendation',
      strategy,
      explanation: explanation ?? existing?.explanation ?? DEFAULT_EXPLANATION,
      ...(score !== undefined ? { score } : {})
    }
  }
}

// ============================================================
// マージ本体
// ============================================================

/**
 * 実アイテムが無い場合: 注入候補を新しい順に並べ、
 * 同時刻が続く場合は edgeOffsetMs ずつ古くして厳密な降順にする
 */
function standaloneTimeline(
  selected: readonly Item[],
  strategy: InjectionStrategy,
  options: ResolvedMergeOptions
): Item[] {
  const result: Item[] = []
  for (const item of sortByCreatedAtDesc(selected)) {
    const previous = result[result.length - 1]
    const createdAt = previous && item.createdAt >= previous.createdAt
      ? previous.createdAt - options.edgeOffsetMs
      : item.createdAt
    result.push(tagAsInjected(item, strategy.type, createdAt))
  }
  return result
}

/**
 * tag_match 用: 共通タグを持つ未使用候補のうち最高スコア
 * （スコアが無ければ先頭）の位置を返す
 */
function findTagMatch(anchor: Item, pool: readonly Item[]): number {
  let firstMatch = -1
  let bestScored = -1
  let bestScore = -Infinity

  for (let i = 0; i < pool.length; i++) {
    const candidate = pool[i]
    if (!sharesTag(anchor, candidate)) continue
    if (firstMatch === -1) firstMatch = i
    if (candidate.score !== undefined && candidate.score > bestScore) {
      bestScore = candidate.score
      bestScored = i
    }
  }
  return bestScored !== -1 ? bestScored : firstMatch
}

/**
 * マージしてレポートも返す
 */
export function mergeTimelineWithReport(
  realItems: readonly Item[],
  injectableItems: readonly Item[],
  strategyInput: InjectionStrategyInput,
  options: MergeOptions = {}
): MergeResult {
  const strategy = normalizeStrategy(strategyInput, injectableItems.length)
  const resolved = resolveOptions(options)

  const real = sortByCreatedAtDesc(realItems)
  let pool = sortByCreatedAtDesc(injectableItems)
  if (strategy.shuffleInjectable) {
    pool = seededShuffle(pool, strategy.seed ?? MERGE_DEFAULTS.seed)
  }

  const k = Math.min(strategy.maxInjections, pool.length)
  const report: MergeReport = {
    strategy: strategy.type,
    requested: k,
    injected: 0,
    skippedByGap: 0
  }

  if (k === 0) {
    return { items: real, report }
  }

  if (real.length === 0) {
    // 錨となる実アイテムが無いので tag_match は注入しない
    if (strategy.type === 'tag_match') {
      return { items: [], report }
    }
    const items = standaloneTimeline(pool.slice(0, k), strategy, resolved)
    report.injected = items.length
    return { items, report }
  }

  const gaps = buildGaps(real)
  const placements = new Map<number, Item>()

  if (strategy.type === 'tag_match') {
    // ローカルコピーからインデックスで取り除く
    const remaining = [...pool]
    for (let i = 0; i < real.length && placements.size < k; i++) {
      const matchIndex = findTagMatch(real[i], remaining)
      if (matchIndex === -1) continue

      const gap = gaps[i + 1]
      if (!isGapEligible(gap, strategy.minGapMinutes, resolved)) {
        report.skippedByGap++
        continue
      }

      const [matched] = remaining.splice(matchIndex, 1)
      placements.set(
        gap.index,
        tagAsInjected(matched, strategy.type, harmonizeTimestamp(gap, resolved), REASON_DESCRIPTIONS.TAG_MATCH)
      )
    }
  } else {
    const targets = gapTargetsFor(strategy.type, strategy, real.length, k)
    let next = 0
    for (const g of targets) {
      if (placements.size >= k) break
      const gap = gaps[g]
      if (!isGapEligible(gap, strategy.minGapMinutes, resolved)) {
        report.skippedByGap++
        continue
      }
      placements.set(g, tagAsInjected(pool[next], strategy.type, harmonizeTimestamp(gap, resolved)))
      next++
    }
  }

  const items: Item[] = []
  for (const gap of gaps) {
    const placed = placements.get(gap.index)
    if (placed) items.push(placed)
    if (gap.older) items.push(gap.older)
  }

  report.injected = placements.size
  return { items, report }
}

/**
 * マージ結果のアイテム列のみを返す
 *
 * @throws UnknownStrategyError 未知の戦略タイプ
 */
export function mergeTimeline(
  realItems: readonly Item[],
  injectableItems: readonly Item[],
  strategy: InjectionStrategyInput,
  options: MergeOptions = {}
): Item[] {
  return mergeTimelineWithReport(realItems, injectableItems, strategy, options).items
}
