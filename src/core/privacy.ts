import type { Item, PersonalizationMode, TrackingLevel } from '../types'
import type { ScoringOptions } from './scoring'

/**
 * プライバシーゲート
 *
 * トラッキング同意レベル → 個人化モード の純粋な対応表。
 * 個人化データに触れる前に必ずここを参照する。
 *
 * - full    → FULL:     全シグナルでスコアリング
 * - limited → DEGRADED: 集計値のみ（著者親和度は母集団平均）
 * - none    → DISABLED: スコアリング禁止、コールドスタートのみ
 */

const MODE_BY_LEVEL: Record<TrackingLevel, PersonalizationMode> = {
  full: 'FULL',
  limited: 'DEGRADED',
  none: 'DISABLED'
}

/** 設定が無いユーザーのデフォルト */
export const DEFAULT_TRACKING_LEVEL: TrackingLevel = 'full'

export function personalizationMode(level: TrackingLevel): PersonalizationMode {
  return MODE_BY_LEVEL[level]
}

export function isTrackingLevel(value: unknown): value is TrackingLevel {
  return value === 'full' || value === 'limited' || value === 'none'
}

/**
 * 外部入力をトラッキングレベルに変換（大文字小文字は無視）
 * 不明な値はデフォルト（full）
 */
export function parseTrackingLevel(value: unknown): TrackingLevel {
  if (typeof value !== 'string') return DEFAULT_TRACKING_LEVEL
  const normalized = value.trim().toLowerCase()
  return isTrackingLevel(normalized) ? normalized : DEFAULT_TRACKING_LEVEL
}

/**
 * ScoreModel を呼んでよいか
 */
export function allowsScoring(mode: PersonalizationMode): boolean {
  return mode !== 'DISABLED'
}

/**
 * モードに応じたスコアリングオプション
 */
export function scoringOptionsFor(mode: PersonalizationMode): ScoringOptions {
  return { useAuthorAffinity: mode === 'FULL' }
}

/**
 * DISABLED モードでは出力からユーザー由来のスコアを取り除く
 */
export function redactForMode(items: Item[], mode: PersonalizationMode): Item[] {
  if (mode !== 'DISABLED') return items

  return items.map(item => {
    if (item.score === undefined && item.injectionMetadata?.score === undefined) {
      return item
    }
    const { score: _score, injectionMetadata, ...rest } = item
    if (!injectionMetadata) return rest
    const { score: _metadataScore, ...metadata } = injectionMetadata
    return { ...rest, injectionMetadata: metadata }
  })
}
