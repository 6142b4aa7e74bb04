import type { ReasonCode, ScoreBreakdown } from '../types'
import { REASON_DESCRIPTIONS } from '../types'

/**
 * 理由コード判定
 *
 * 重み付き寄与が最大の項を主な理由とする。
 * 同点の場合の優先順位: AUTHOR_AFFINITY > POPULAR > RECENT
 */
export function determineReasonCode(breakdown: ScoreBreakdown): ReasonCode {
  const { weights } = breakdown
  const contributions: Array<[ReasonCode, number]> = [
    ['AUTHOR_AFFINITY', weights.author * breakdown.author],
    ['POPULAR', weights.engagement * breakdown.engagement],
    ['RECENT', weights.recency * breakdown.recency]
  ]

  let best = contributions[0]
  for (const entry of contributions.slice(1)) {
    if (entry[1] > best[1]) best = entry
  }
  return best[0]
}

/**
 * Convert a reason code to its label.
 */
export function describeReason(code: ReasonCode): string {
  return REASON_DESCRIPTIONS[code]
}

/**
 * Explanation text for a scored item.
 */
export function explainScore(breakdown: ScoreBreakdown): string {
  return describeReason(determineReasonCode(breakdown))
}

/**
 * Contribution rates for score factors (integer percentages).
 */
export function calculateContributionRates(
  breakdown: ScoreBreakdown
): { author: number; engagement: number; recency: number } {
  const { weights } = breakdown
  // Guard: validate inputs are finite numbers
  const author = Number.isFinite(breakdown.author) ? weights.author * breakdown.author : 0
  const engagement = Number.isFinite(breakdown.engagement) ? weights.engagement * breakdown.engagement : 0
  const recency = Number.isFinite(breakdown.recency) ? weights.recency * breakdown.recency : 0

  const total = author + engagement + recency
  if (total === 0) return { author: 0, engagement: 0, recency: 0 }

  return {
    author: Math.round((author / total) * 100),
    engagement: Math.round((engagement / total) * 100),
    recency: Math.round((recency / total) * 100)
  }
}
