/**
 * Sort direction for a single key.
 */
export type SortOrder = 'asc' | 'desc'

/**
 * A value a record can be ranked by. `null` always sorts last, whatever the order.
 */
export type SortValue = number | string | null

/**
 * One component of a sort key tuple.
 */
export interface SortKey<T> {
  /** Extracts the value to compare */
  value: (item: T) => SortValue
  /** Direction (default: 'asc') */
  order?: SortOrder
}

function compareValues(a: SortValue, b: SortValue): number {
  if (a === b) return 0
  if (a === null) return 1
  if (b === null) return -1
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Sorts items by a tuple of keys, falling back to input position.
 *
 * The input array is left untouched. Strings compare by code unit so the
 * result does not depend on the host locale.
 *
 * @example
 * ```typescript
 * stableSortBy(records, [
 *   { value: (r) => r.score, order: 'desc' },
 *   { value: (r) => r.date?.getTime() ?? null, order: 'desc' },
 * ])
 * ```
 */
export function stableSortBy<T>(items: readonly T[], keys: readonly SortKey<T>[]): T[] {
  const decorated = items.map((item, originalIndex) => ({
    item,
    originalIndex,
    sortKeys: keys.map((key) => key.value(item)),
  }))

  decorated.sort((a, b) => {
    for (let i = 0; i < keys.length; i++) {
      const aKey = a.sortKeys[i]
      const bKey = b.sortKeys[i]
      const comparison = compareValues(aKey, bKey)
      if (comparison === 0) continue
      // nulls stay last in both directions
      if (aKey === null || bKey === null) return comparison
      return keys[i].order === 'desc' ? -comparison : comparison
    }
    return a.originalIndex - b.originalIndex
  })

  return decorated.map((entry) => entry.item)
}

/**
 * Groups items by key, preserving first-appearance order of keys and the
 * input order of items within each group.
 */
export function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>()
  for (const item of items) {
    const groupKey = key(item)
    const group = groups.get(groupKey)
    if (group) {
      group.push(item)
    } else {
      groups.set(groupKey, [item])
    }
  }
  return groups
}
