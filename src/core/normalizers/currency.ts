import type { CellValue } from '../../types/record'

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/

/**
 * Parses a monetary cell into a number, failing soft.
 *
 * Currency symbols, thousands separators and inner whitespace are ignored.
 *
 * @example
 * ```typescript
 * parseAmount('$1,250.50') // 1250.5
 * parseAmount(75)          // 75
 * parseAmount('pending')   // null
 * ```
 */
export function parseAmount(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value !== 'string') return null

  const cleaned = value.replace(/[$,\s]/g, '')
  if (!AMOUNT_PATTERN.test(cleaned)) return null

  return Number(cleaned)
}

/**
 * Formats an amount with two decimals and a dollar prefix.
 * Absent amounts give `''`.
 *
 * @example
 * ```typescript
 * formatCurrency(1250.5) // '$1250.50'
 * formatCurrency(null)   // ''
 * ```
 */
export function formatCurrency(amount: number | null | undefined): string {
  if (amount == null || !Number.isFinite(amount)) return ''
  return `$${amount.toFixed(2)}`
}
