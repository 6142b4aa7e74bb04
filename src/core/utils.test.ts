import { describe, expect, test } from 'vitest'
import {
  compareByCreatedAtDesc,
  isStrictlyDescending,
  normalizeTags,
  sharesTag,
  sortByCreatedAtDesc
} from './utils'
import { clamp, isValidNumber, safeDiv, toCount } from './numeric-utils'
import type { Item } from '../types'

const createItem = (id: string, createdAt: number, tags: string[] = []): Item => ({
  id,
  authorId: 'author',
  createdAt,
  tags,
  engagement: { replies: 0, boosts: 0, favorites: 0 }
})

describe('normalizeTags', () => {
  test('lowercases, strips # and dedupes in input order', () => {
    expect(normalizeTags(['#Tech', 'art', 'tech', ' ##ART ', ''])).toEqual(['tech', 'art'])
  })

  test('handles missing tags', () => {
    expect(normalizeTags(undefined)).toEqual([])
  })
})

describe('sharesTag', () => {
  test('matches case-insensitively', () => {
    expect(sharesTag(createItem('a', 0, ['Music']), createItem('b', 0, ['#music', 'film']))).toBe(true)
  })

  test('untagged items never match', () => {
    expect(sharesTag(createItem('a', 0), createItem('b', 0, ['music']))).toBe(false)
    expect(sharesTag(createItem('a', 0, ['music']), createItem('b', 0, ['film']))).toBe(false)
  })
})

describe('chronological ordering', () => {
  test('sorts newest first and breaks ties by id', () => {
    const items = [createItem('b', 100), createItem('c', 200), createItem('a', 100)]
    expect(sortByCreatedAtDesc(items).map(item => item.id)).toEqual(['c', 'a', 'b'])
    expect(items[0].id).toBe('b')
  })

  test('compareByCreatedAtDesc is zero only for identical keys', () => {
    expect(compareByCreatedAtDesc(createItem('a', 1), createItem('a', 1))).toBe(0)
    expect(compareByCreatedAtDesc(createItem('a', 2), createItem('b', 1))).toBeLessThan(0)
  })

  test('isStrictlyDescending rejects equal timestamps', () => {
    expect(isStrictlyDescending([createItem('a', 3), createItem('b', 2)])).toBe(true)
    expect(isStrictlyDescending([createItem('a', 3), createItem('b', 3)])).toBe(false)
    expect(isStrictlyDescending([])).toBe(true)
  })
})

describe('numeric utils', () => {
  test('safeDiv falls back on zero or non-finite input', () => {
    expect(safeDiv(10, 2)).toBe(5)
    expect(safeDiv(10, 0)).toBe(0)
    expect(safeDiv(10, 0, -1)).toBe(-1)
    expect(safeDiv(Number.NaN, 2)).toBe(0)
  })

  test('clamp bounds values and maps NaN to min', () => {
    expect(clamp(15, 0, 10)).toBe(10)
    expect(clamp(-1, 0, 10)).toBe(0)
    expect(clamp(Number.NaN, 0, 10)).toBe(0)
  })

  test('toCount floors positive numbers and zeroes everything else', () => {
    expect(toCount(3.7)).toBe(3)
    expect(toCount(-2)).toBe(0)
    expect(toCount('5')).toBe(0)
    expect(isValidNumber(Number.POSITIVE_INFINITY)).toBe(false)
  })
})
