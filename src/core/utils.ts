/**
 * 共通ユーティリティ関数
 *
 * タグ正規化とアイテムの時系列ソートを一元化
 */

import type { Item } from '../types'

// ============================================
// タグ
// ============================================

/**
 * タグを正規化（小文字化・先頭の # 除去・重複除去）
 * 入力順は保持する
 */
export function normalizeTags(tags: readonly string[] | undefined): string[] {
  if (!tags) return []
  const seen = new Set<string>()
  const result: string[] = []
  for (const raw of tags) {
    const tag = raw.trim().replace(/^#+/, '').toLowerCase()
    if (tag.length === 0 || seen.has(tag)) continue
    seen.add(tag)
    result.push(tag)
  }
  return result
}

/**
 * 共通タグが1つ以上あるか
 */
export function sharesTag(a: Item, b: Item): boolean {
  const tagsA = new Set(normalizeTags(a.tags))
  if (tagsA.size === 0) return false
  return normalizeTags(b.tags).some(tag => tagsA.has(tag))
}

// ============================================
// 時系列ソート
// ============================================

/**
 * createdAt desc, id asc（決定性ソート）
 */
export function compareByCreatedAtDesc(a: Item, b: Item): number {
  const createdDelta = b.createdAt - a.createdAt
  if (createdDelta !== 0) return createdDelta
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/**
 * 新しい順に並べた新しい配列を返す
 */
export function sortByCreatedAtDesc<T extends Item>(items: readonly T[]): T[] {
  return [...items].sort(compareByCreatedAtDesc)
}

/**
 * 厳密に新しい順になっているか
 */
export function isStrictlyDescending(items: readonly Item[]): boolean {
  for (let i = 1; i < items.length; i++) {
    if (!(items[i - 1].createdAt > items[i].createdAt)) return false
  }
  return true
}
