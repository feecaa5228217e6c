import type { CellValue } from '../../types/record'
import { cleanString } from './basic'

/**
 * `local@domain.tld`: one `@`, no whitespace, a dot in the domain part.
 */
const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/

/**
 * Validates if a string looks like an email address.
 *
 * @example
 * ```typescript
 * isValidEmail('User@Example.com')  // true
 * isValidEmail('user@example')      // false
 * isValidEmail('user@@example.com') // false
 * ```
 */
export function isValidEmail(email: string): boolean {
  if (!email || typeof email !== 'string') {
    return false
  }
  return EMAIL_PATTERN.test(email)
}

/**
 * Cleans, lowercases and validates an email cell.
 * Invalid addresses are discarded, never corrected.
 *
 * @returns The lowercased address, or null when blank or invalid
 *
 * @example
 * ```typescript
 * normalizeEmail('  John@Example.Com ') // 'john@example.com'
 * normalizeEmail('john at example.com') // null
 * ```
 */
export function normalizeEmail(value: CellValue): string | null {
  const email = cleanString(value).toLowerCase()
  return isValidEmail(email) ? email : null
}
