import type { InjectionStrategy, InjectionStrategyInput, StrategyType } from '../types'
import { STRATEGY_TYPES } from '../types'
import { MERGE_DEFAULTS, STRATEGY_PRESETS } from './defaults'
import { UnknownStrategyError } from './errors'
import { isValidNumber } from './numeric-utils'

export function isStrategyType(value: unknown): value is StrategyType {
  return typeof value === 'string' && (STRATEGY_TYPES as readonly string[]).includes(value)
}

/**
 * 戦略を正規化
 *
 * - 未知の type は UnknownStrategyError
 * - maxInjections 省略時は注入候補数
 * - n >= 1, maxInjections >= 0, minGapMinutes >= 0
 */
export function normalizeStrategy(input: InjectionStrategyInput, poolSize: number): InjectionStrategy {
  if (!isStrategyType(input.type)) {
    throw new UnknownStrategyError(input.type)
  }

  const maxInjections = isValidNumber(input.maxInjections)
    ? Math.max(0, Math.floor(input.maxInjections))
    : Math.max(0, poolSize)
  const n = isValidNumber(input.n) ? Math.max(1, Math.floor(input.n)) : MERGE_DEFAULTS.n
  const minGapMinutes = isValidNumber(input.minGapMinutes) ? Math.max(0, input.minGapMinutes) : 0

  return {
    type: input.type,
    maxInjections,
    n,
    shuffleInjectable: input.shuffleInjectable ?? false,
    minGapMinutes,
    seed: input.seed
  }
}

// ============================================================
// プリセット
// ============================================================

export interface StrategyContext {
  /** 匿名ユーザーか */
  isAnonymous: boolean
  /** インタラクション履歴が少ない新規ユーザーか */
  isNewUser: boolean
  /** リクエストで明示された戦略名 */
  strategyName?: string
}

/**
 * ユーザー状態から戦略を決める
 *
 * 優先順位:
 * 1) 明示された戦略名
 * 2) 匿名 → uniform
 * 3) 新規 → first_only（先頭に寄せる）
 * 4) 通常 → tag_match（10分以上のギャップのみ）
 */
export function resolveStrategyPreset(context: StrategyContext): InjectionStrategyInput {
  const { namedMaxInjections, firstOnlyMaxInjections, regularMinGapMinutes } = STRATEGY_PRESETS

  if (context.strategyName !== undefined) {
    switch (context.strategyName) {
      case 'uniform':
        return { type: 'uniform', maxInjections: namedMaxInjections, shuffleInjectable: true }
      case 'after_n':
        return { type: 'after_n', n: MERGE_DEFAULTS.n, maxInjections: namedMaxInjections, shuffleInjectable: true }
      case 'first_only':
        return { type: 'first_only', maxInjections: firstOnlyMaxInjections, shuffleInjectable: true }
      case 'tag_match':
        return { type: 'tag_match', maxInjections: namedMaxInjections, shuffleInjectable: true }
      default:
        throw new UnknownStrategyError(context.strategyName)
    }
  }

  if (context.isAnonymous) {
    return { type: 'uniform', maxInjections: namedMaxInjections, shuffleInjectable: true }
  }

  if (context.isNewUser) {
    return { type: 'first_only', maxInjections: firstOnlyMaxInjections, shuffleInjectable: true }
  }

  return {
    type: 'tag_match',
    maxInjections: namedMaxInjections,
    shuffleInjectable: true,
    minGapMinutes: regularMinGapMinutes
  }
}
