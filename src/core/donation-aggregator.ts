/**
 * Donation rollups per identifier
 * @module core/donation-aggregator
 */

import type { DonationColumns } from '../types/config'
import type { SourceRow } from '../types/record'
import { cleanString } from './normalizers/basic'
import { parseAmount } from './normalizers/currency'
import { parseDateOrNull } from './normalizers/date'
import { readIdentifier } from './identifiers'
import { groupBy, stableSortBy } from './sorting'

/**
 * A settled donation with its parsed values.
 */
export interface PaidDonation {
  id: string
  /** Position in the donation table */
  index: number
  /** Null when the amount could not be parsed */
  amount: number | null
  /** Null when the date could not be parsed */
  date: Date | null
}

/**
 * Aggregates over one identifier's paid donations.
 */
export interface DonationRollup {
  /** Sum of the parseable paid amounts */
  lifetimeAmount: number
  /** Paid donation with the latest parseable date; null when none has one */
  mostRecent: PaidDonation | null
  /** Number of paid donations seen */
  donationCount: number
}

/**
 * Extracts the paid donations from the donation table.
 *
 * The status must equal `paidStatus` exactly (surrounding whitespace aside).
 * Amounts and dates fail soft to null.
 *
 * @throws MissingIdentifierError when a row has no identifier
 */
export function extractPaidDonations(
  rows: readonly SourceRow[],
  columns: DonationColumns,
  paidStatus: string
): PaidDonation[] {
  const paid: PaidDonation[] = []

  rows.forEach((row, index) => {
    const id = readIdentifier(row, columns.id, 'donations', index)
    if (cleanString(row[columns.status]) !== paidStatus) return

    paid.push({
      id,
      index,
      amount: parseAmount(row[columns.amount]),
      date: parseDateOrNull(row[columns.date]),
    })
  })

  return paid
}

/**
 * Picks the most recent donation; equal dates keep table order.
 */
export function selectMostRecent(donations: readonly PaidDonation[]): PaidDonation | null {
  const dated = donations.filter((donation) => donation.date !== null)
  if (dated.length === 0) return null

  const [latest] = stableSortBy(dated, [
    { value: (d) => d.date?.getTime() ?? null, order: 'desc' },
  ])
  return latest
}

/**
 * Computes lifetime totals and the most recent paid donation per identifier.
 *
 * Identifiers without any paid donation have no entry at all (absent, not
 * zero). An identifier whose paid donations all lack a parseable amount has
 * a lifetime amount of 0.
 *
 * @example
 * ```typescript
 * const rollups = aggregateDonations(rows, DEFAULT_DONATION_COLUMNS, 'Paid')
 * rollups.get('1001')?.lifetimeAmount // 350
 * ```
 */
export function aggregateDonations(
  rows: readonly SourceRow[],
  columns: DonationColumns,
  paidStatus: string
): ReadonlyMap<string, DonationRollup> {
  const byId = groupBy(
    extractPaidDonations(rows, columns, paidStatus),
    (donation) => donation.id
  )

  const rollups = new Map<string, DonationRollup>()
  for (const [id, donations] of byId) {
    rollups.set(id, {
      lifetimeAmount: donations.reduce(
        (sum, donation) => sum + (donation.amount ?? 0),
        0
      ),
      mostRecent: selectMostRecent(donations),
      donationCount: donations.length,
    })
  }

  return rollups
}
