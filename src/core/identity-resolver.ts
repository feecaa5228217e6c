/**
 * Identity resolution: one canonical record per identifier
 * @module core/identity-resolver
 */

import type { ConstituentColumns } from '../types/config'
import type { CanonicalConstituent, ConstituentRecord, SourceRow } from '../types/record'
import { completenessScore } from './normalizers/basic'
import { parseDateOrNull } from './normalizers/date'
import { readIdentifier } from './identifiers'
import { groupBy, stableSortBy, type SortKey } from './sorting'

interface RankedRecord extends ConstituentRecord {
  completeness: number
  entryDate: Date | null
}

const RANKING: readonly SortKey<RankedRecord>[] = [
  { value: (r) => r.completeness, order: 'desc' },
  { value: (r) => r.entryDate?.getTime() ?? null, order: 'desc' },
  { value: (r) => r.index, order: 'asc' },
]

/**
 * Wraps raw constituent rows with their cleaned identifier and input position.
 *
 * @throws MissingIdentifierError when a row has no identifier
 */
export function toConstituentRecords(
  rows: readonly SourceRow[],
  idColumn: string
): ConstituentRecord[] {
  return rows.map((row, index) => ({
    id: readIdentifier(row, idColumn, 'constituents', index),
    index,
    row,
  }))
}

/**
 * Picks the best record from a group of records sharing one identifier.
 *
 * Ranking is completeness descending, then entry date descending (records
 * without a parseable date rank below any dated record), then input order.
 */
export function selectCanonical(
  group: readonly ConstituentRecord[],
  entryDateColumn: string
): CanonicalConstituent {
  const ranked = stableSortBy(
    group.map((record) => ({
      ...record,
      completeness: completenessScore(record.row),
      entryDate: parseDateOrNull(record.row[entryDateColumn]),
    })),
    RANKING
  )

  return { ...ranked[0], duplicateCount: group.length }
}

/**
 * Deduplicates constituent rows by identifier.
 *
 * Exactly one record survives per distinct identifier. Survivors are returned
 * in order of each identifier's first appearance in the input.
 *
 * @example
 * ```typescript
 * resolveIdentities(
 *   [
 *     { 'Patron ID': '1', 'Date Entered': '2021-01-01', 'First Name': 'A' },
 *     { 'Patron ID': '1', 'Date Entered': '2022-01-01', 'First Name': 'B', Phone: '555' },
 *   ],
 *   DEFAULT_CONSTITUENT_COLUMNS
 * )
 * // [{ id: '1', index: 1, completeness: 4, ... }]
 * ```
 */
export function resolveIdentities(
  rows: readonly SourceRow[],
  columns: Pick<ConstituentColumns, 'id' | 'entryDate'>
): CanonicalConstituent[] {
  const records = toConstituentRecords(rows, columns.id)
  const groups = groupBy(records, (record) => record.id)

  return Array.from(groups.values(), (group) =>
    selectCanonical(group, columns.entryDate)
  )
}
