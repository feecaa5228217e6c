import type { CellValue, SourceRow } from '../../types/record'
import { formatIso } from './date'

/**
 * Reads a raw cell as a trimmed string.
 *
 * Missing values (`null`/`undefined`) become the empty string. Dates are
 * rendered as ISO 8601 so that a date cell and its text form compare equal.
 *
 * @example
 * ```typescript
 * cleanString('  hello  ') // 'hello'
 * cleanString(42) // '42'
 * cleanString(null) // ''
 * ```
 */
export function cleanString(value: CellValue): string {
  if (value == null) return ''
  if (value instanceof Date) return formatIso(value)
  return String(value).trim()
}

/**
 * True when the cleaned value is empty.
 */
export function isBlank(value: CellValue): boolean {
  return cleanString(value) === ''
}

/**
 * Cleans and lowercases a value.
 *
 * @example
 * ```typescript
 * lowercase('  N/A ') // 'n/a'
 * ```
 */
export function lowercase(value: CellValue): string {
  return cleanString(value).toLowerCase()
}

/**
 * Counts the fields of a row whose cleaned value is non-empty.
 *
 * @example
 * ```typescript
 * completenessScore({ id: '1', name: 'A', phone: '  ' }) // 2
 * ```
 */
export function completenessScore(row: SourceRow): number {
  let score = 0
  for (const value of Object.values(row)) {
    if (!isBlank(value)) score++
  }
  return score
}

/**
 * Removes duplicates while keeping the first occurrence of each value.
 */
export function uniqueInOrder(values: Iterable<string>): string[] {
  return Array.from(new Set(values))
}
