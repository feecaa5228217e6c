import { describe, it, expect } from 'vitest'
import { stableSortBy, groupBy } from '../../../src/core/sorting'

interface Item {
  name: string
  score: number | null
}

describe('stableSortBy', () => {
  const items: Item[] = [
    { name: 'a', score: 2 },
    { name: 'b', score: null },
    { name: 'c', score: 3 },
    { name: 'd', score: 2 },
  ]

  it('should sort ascending with nulls last', () => {
    const sorted = stableSortBy(items, [{ value: (i) => i.score }])
    expect(sorted.map((i) => i.name)).toEqual(['a', 'd', 'c', 'b'])
  })

  it('should keep nulls last when sorting descending', () => {
    const sorted = stableSortBy(items, [{ value: (i) => i.score, order: 'desc' }])
    expect(sorted.map((i) => i.name)).toEqual(['c', 'a', 'd', 'b'])
  })

  it('should use later keys before falling back to input order', () => {
    const sorted = stableSortBy(items, [
      { value: (i) => i.score, order: 'desc' },
      { value: (i) => i.name, order: 'desc' },
    ])
    expect(sorted.map((i) => i.name)).toEqual(['c', 'd', 'a', 'b'])
  })

  it('should not mutate the input', () => {
    stableSortBy(items, [{ value: (i) => i.score }])
    expect(items.map((i) => i.name)).toEqual(['a', 'b', 'c', 'd'])
  })

  it('should compare strings by code unit', () => {
    const sorted = stableSortBy(['b', 'B', 'a'], [{ value: (s) => s }])
    expect(sorted).toEqual(['B', 'a', 'b'])
  })
})

describe('groupBy', () => {
  it('should preserve first-appearance order of keys and items', () => {
    const groups = groupBy(['b1', 'a1', 'b2', 'c1', 'a2'], (s) => s[0])
    expect(Array.from(groups.keys())).toEqual(['b', 'a', 'c'])
    expect(groups.get('a')).toEqual(['a1', 'a2'])
    expect(groups.get('b')).toEqual(['b1', 'b2'])
  })
})
