/**
 * Email resolution across the declared primary email and the email table
 * @module core/email-resolver
 */

import type { EmailColumns } from '../types/config'
import type { CellValue, SourceRow } from '../types/record'
import { uniqueInOrder } from './normalizers/basic'
import { normalizeEmail } from './normalizers/email'
import { readIdentifier } from './identifiers'

/**
 * The two email slots of an output record.
 * `email2` is only ever filled when `email1` is.
 */
export interface ResolvedEmails {
  email1: string
  email2: string
}

/**
 * Valid, lowercased emails per identifier, in table order.
 */
export type EmailIndex = ReadonlyMap<string, readonly string[]>

/**
 * Builds the email index once per run.
 *
 * Invalid or blank addresses are dropped. Duplicates are kept here and
 * removed during resolution so that table order decides precedence.
 *
 * @throws MissingIdentifierError when a row has no identifier
 */
export function indexEmails(rows: readonly SourceRow[], columns: EmailColumns): EmailIndex {
  const index = new Map<string, string[]>()

  rows.forEach((row, rowIndex) => {
    const id = readIdentifier(row, columns.id, 'emails', rowIndex)
    const email = normalizeEmail(row[columns.email])
    if (!email) return

    const emails = index.get(id)
    if (emails) {
      emails.push(email)
    } else {
      index.set(id, [email])
    }
  })

  return index
}

/**
 * Resolves the two email slots of a constituent.
 *
 * The declared primary email leads when valid, followed by the discovered
 * emails; the first two distinct addresses fill the slots.
 *
 * @example
 * ```typescript
 * resolveEmails('', ['x@y.com', 'x@y.com', 'z@y.com'])
 * // { email1: 'x@y.com', email2: 'z@y.com' }
 *
 * resolveEmails('Main@Y.com', ['main@y.com'])
 * // { email1: 'main@y.com', email2: '' }
 * ```
 */
export function resolveEmails(
  primary: CellValue,
  discovered: readonly string[] = []
): ResolvedEmails {
  const declared = normalizeEmail(primary)
  const candidates = uniqueInOrder(
    declared ? [declared, ...discovered] : discovered
  )

  const email1 = candidates[0] ?? ''
  const email2 = email1 ? (candidates[1] ?? '') : ''

  return { email1, email2 }
}
