import { describe, expect, test } from 'vitest'
import { loadServiceConfig } from './index'
import { ConfigError } from '../core/errors'

describe('loadServiceConfig', () => {
  test('falls back to defaults for an empty environment', () => {
    expect(loadServiceConfig({})).toEqual({
      weights: { author: 0.4, engagement: 0.3, recency: 0.3, decayDays: 7 },
      minInteractions: 0,
      maxCandidates: 100,
      coldStartEnabled: false,
      coldStartLimit: 20,
      port: 5002,
      logLevel: 'info'
    })
  })

  test('reads overrides from the environment', () => {
    const config = loadServiceConfig({
      RANKING_WEIGHT_AUTHOR: '0.5',
      RANKING_TIME_DECAY_DAYS: '14',
      RANKING_MIN_INTERACTIONS: '5',
      RANKING_INCLUDE_SYNTHETIC: 'yes',
      COLD_START_LIMIT: '8',
      PORT: '8080',
      LOG_LEVEL: 'DEBUG'
    })

    expect(config.weights).toEqual({ author: 0.5, engagement: 0.3, recency: 0.3, decayDays: 14 })
    expect(config.minInteractions).toBe(5)
    expect(config.coldStartEnabled).toBe(true)
    expect(config.coldStartLimit).toBe(8)
    expect(config.port).toBe(8080)
    expect(config.logLevel).toBe('debug')
  })

  test('treats blank values as unset', () => {
    expect(loadServiceConfig({ PORT: '  ', LOG_LEVEL: '' }).port).toBe(5002)
  })

  test('lists every invalid key', () => {
    try {
      loadServiceConfig({ PORT: 'abc', RANKING_WEIGHT_AUTHOR: '-1', RANKING_INCLUDE_SYNTHETIC: 'maybe' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      if (error instanceof ConfigError) {
        expect(error.code).toBe('INVALID_CONFIG')
        expect([...error.keys].sort()).toEqual(['PORT', 'RANKING_INCLUDE_SYNTHETIC', 'RANKING_WEIGHT_AUTHOR'])
      }
    }
  })
})
