import type { Item } from '../types'
import { REASON_DESCRIPTIONS } from '../types'
import { COLD_START_DEFAULTS } from './defaults'
import { seededShuffle } from './random'
import { normalizeTags } from './utils'

/**
 * コールドスタート選択
 *
 * 個人化シグナルが無い（新規・匿名・トラッキング拒否）ユーザー向けに、
 * 上限付きでカテゴリを散らした候補を返す。
 */

export interface ColdStartOptions {
  /** カテゴリ間でラウンドロビンするか デフォルト: true */
  diversify?: boolean
  /** カテゴリ内の順序をシャッフルするか デフォルト: false */
  shuffle?: boolean
  /** シャッフル用シード */
  seed?: string
}

/**
 * カテゴリ = 正規化後の先頭タグ
 */
export function categoryOf(item: Item): string {
  const [first] = normalizeTags(item.tags)
  return first ?? COLD_START_DEFAULTS.untaggedCategory
}

/**
 * カテゴリごとに分割（カテゴリは初出順、カテゴリ内は入力順）
 */
export function partitionByCategory(pool: readonly Item[]): Map<string, Item[]> {
  const partitions = new Map<string, Item[]>()
  for (const item of pool) {
    const category = categoryOf(item)
    const bucket = partitions.get(category)
    if (bucket) {
      bucket.push(item)
    } else {
      partitions.set(category, [item])
    }
  }
  return partitions
}

/**
 * 呼び出し側が付けた score は落とす（合流時の選択に個人化データを使わない）
 */
function markColdStart(item: Item): Item {
  const { score: _score, ...rest } = item
  return {
    ...rest,
    injectionMetadata: {
      source: 'cold_start',
      explanation: REASON_DESCRIPTIONS.COLD_START
    }
  }
}

/**
 * コールドスタート候補を選択
 *
 * @param pool - キュレーション済みプール
 * @param limit - 露出上限（リクエストごとの注入上限とは独立）
 * @returns 選択順のアイテム。プールが空なら空配列
 */
export function selectColdStart(
  pool: readonly Item[],
  limit: number = COLD_START_DEFAULTS.limit,
  options: ColdStartOptions = {}
): Item[] {
  const { diversify = true, shuffle = false, seed = 'cold_start' } = options
  const cap = Math.max(0, Math.floor(limit))
  if (pool.length === 0 || cap === 0) return []

  if (!diversify) {
    const ordered = shuffle ? seededShuffle(pool, seed) : [...pool]
    return ordered.slice(0, cap).map(markColdStart)
  }

  const queues = [...partitionByCategory(pool).entries()].map(([category, items]) =>
    shuffle ? seededShuffle(items, `${seed}:${category}`) : items
  )

  // ラウンドロビン: 各カテゴリから1件ずつ
  const selected: Item[] = []
  for (let round = 0; selected.length < cap; round++) {
    let pickedThisRound = false
    for (const queue of queues) {
      if (selected.length >= cap) break
      if (round < queue.length) {
        selected.push(queue[round])
        pickedThisRound = true
      }
    }
    if (!pickedThisRound) break
  }

  return selected.map(markColdStart)
}
