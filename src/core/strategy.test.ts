import { describe, expect, test } from 'vitest'
import { isStrategyType, normalizeStrategy, resolveStrategyPreset } from './strategy'
import { UnknownStrategyError } from './errors'

describe('strategy', () => {
  test('isStrategyType accepts exactly the four strategies', () => {
    expect(isStrategyType('uniform')).toBe(true)
    expect(isStrategyType('after_n')).toBe(true)
    expect(isStrategyType('first_only')).toBe(true)
    expect(isStrategyType('tag_match')).toBe(true)
    expect(isStrategyType('random')).toBe(false)
    expect(isStrategyType(undefined)).toBe(false)
  })

  describe('normalizeStrategy', () => {
    test('fills defaults from the pool size', () => {
      expect(normalizeStrategy({ type: 'uniform' }, 4)).toEqual({
        type: 'uniform',
        maxInjections: 4,
        n: 3,
        shuffleInjectable: false,
        minGapMinutes: 0,
        seed: undefined
      })
    })

    test('clamps out-of-range values', () => {
      const strategy = normalizeStrategy(
        { type: 'after_n', n: 0, maxInjections: -2.5, minGapMinutes: -10, seed: 'abc' },
        5
      )
      expect(strategy.n).toBe(1)
      expect(strategy.maxInjections).toBe(0)
      expect(strategy.minGapMinutes).toBe(0)
      expect(strategy.seed).toBe('abc')
    })

    test('floors fractional counts', () => {
      const strategy = normalizeStrategy({ type: 'after_n', n: 2.9, maxInjections: 3.7 }, 10)
      expect(strategy.n).toBe(2)
      expect(strategy.maxInjections).toBe(3)
    })

    test('rejects an unknown type', () => {
      try {
        normalizeStrategy({ type: 'random' }, 3)
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownStrategyError)
        if (error instanceof UnknownStrategyError) {
          expect(error.code).toBe('UNKNOWN_STRATEGY')
          expect(error.strategyType).toBe('random')
        }
      }
    })
  })

  describe('resolveStrategyPreset', () => {
    test('an explicit name wins over user state', () => {
      expect(resolveStrategyPreset({ isAnonymous: true, isNewUser: true, strategyName: 'after_n' })).toEqual({
        type: 'after_n',
        n: 3,
        maxInjections: 5,
        shuffleInjectable: true
      })
      expect(resolveStrategyPreset({ isAnonymous: false, isNewUser: false, strategyName: 'first_only' })).toEqual({
        type: 'first_only',
        maxInjections: 3,
        shuffleInjectable: true
      })
    })

    test('anonymous users get uniform', () => {
      expect(resolveStrategyPreset({ isAnonymous: true, isNewUser: true }).type).toBe('uniform')
    })

    test('new users get first_only', () => {
      expect(resolveStrategyPreset({ isAnonymous: false, isNewUser: true })).toEqual({
        type: 'first_only',
        maxInjections: 3,
        shuffleInjectable: true
      })
    })

    test('regular users get tag_match with a minimum gap', () => {
      expect(resolveStrategyPreset({ isAnonymous: false, isNewUser: false })).toEqual({
        type: 'tag_match',
        maxInjections: 5,
        shuffleInjectable: true,
        minGapMinutes: 10
      })
    })

    test('an unknown name throws', () => {
      expect(() => resolveStrategyPreset({ isAnonymous: false, isNewUser: false, strategyName: 'chaos' }))
        .toThrow(UnknownStrategyError)
    })
  })
})
