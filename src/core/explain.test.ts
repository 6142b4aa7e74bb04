import { describe, expect, test } from 'vitest'
import { calculateContributionRates, describeReason, determineReasonCode, explainScore } from './explain'
import type { ScoreBreakdown } from '../types'
import { REASON_DESCRIPTIONS } from '../types'

const evenWeights = { author: 0.4, engagement: 0.3, recency: 0.3, decayDays: 7 }

const breakdown = (author: number, engagement: number, recency: number): ScoreBreakdown => ({
  author,
  engagement,
  recency,
  weights: evenWeights,
  finalScore: 0.4 * author + 0.3 * engagement + 0.3 * recency
})

describe('explain', () => {
  describe('determineReasonCode', () => {
    test('picks the largest weighted contribution', () => {
      expect(determineReasonCode(breakdown(1, 0, 0.2))).toBe('AUTHOR_AFFINITY')
      expect(determineReasonCode(breakdown(0, 0.9, 0.5))).toBe('POPULAR')
      expect(determineReasonCode(breakdown(0.1, 0.2, 1))).toBe('RECENT')
    })

    test('prefers author affinity on ties', () => {
      // 0.4 * 0.75 = 0.3 * 1
      expect(determineReasonCode(breakdown(0.75, 0, 1))).toBe('AUTHOR_AFFINITY')
    })

    test('falls back to author affinity when every term is zero', () => {
      expect(determineReasonCode(breakdown(0, 0, 0))).toBe('AUTHOR_AFFINITY')
    })
  })

  test('explainScore returns the reason label', () => {
    expect(explainScore(breakdown(0, 1, 0))).toBe('Popular with other users')
    expect(describeReason('TAG_MATCH')).toBe(REASON_DESCRIPTIONS.TAG_MATCH)
  })

  describe('calculateContributionRates', () => {
    test('returns integer percentages of the weighted terms', () => {
      // 0.4, 0.3, 0.3
      expect(calculateContributionRates(breakdown(1, 1, 1))).toEqual({ author: 40, engagement: 30, recency: 30 })
    })

    test('returns zeros when nothing contributes', () => {
      expect(calculateContributionRates(breakdown(0, 0, 0))).toEqual({ author: 0, engagement: 0, recency: 0 })
    })

    test('ignores non-finite terms', () => {
      expect(calculateContributionRates(breakdown(Number.NaN, 0, 1))).toEqual({ author: 0, engagement: 0, recency: 100 })
    })
  })
})
