import type { ServiceErrorInfo } from '../services/types'

/**
 * Classification of a constituent.
 */
export type ConstituentType = 'Person' | 'Company'

/**
 * Column headers of the constituent output table, in output order.
 */
export const OUTPUT_CONSTITUENT_COLUMNS = [
  'Constituent ID',
  'Constituent Type',
  'First Name',
  'Last Name',
  'Company Name',
  'Created At',
  'Email 1',
  'Email 2',
  'Title',
  'Tags',
  'Background Information',
  'Lifetime Donation Amount',
  'Most Recent Donation Date',
  'Most Recent Donation Amount',
] as const

/**
 * Column headers of the tag count table, in output order.
 */
export const TAG_COUNT_COLUMNS = ['Tag Name', 'Tag Count'] as const

export type OutputConstituentColumn = (typeof OUTPUT_CONSTITUENT_COLUMNS)[number]
export type TagCountColumn = (typeof TAG_COUNT_COLUMNS)[number]

/**
 * The final enriched record for one constituent. Every cell is already
 * formatted for output; absent values are empty strings.
 */
export type OutputConstituent = Readonly<Record<OutputConstituentColumn, string>>

/**
 * Number of distinct constituents carrying a mapped tag.
 */
export interface TagCountRow {
  readonly 'Tag Name': string
  readonly 'Tag Count': number
}

/**
 * Outcome of the single tag mapping lookup of a run.
 */
export interface TagMappingStats {
  /** `service` when a mapping was fetched, `identity` after a fallback */
  source: 'service' | 'identity'
  /** Number of usable mapping pairs */
  pairs: number
  /** Time spent on the lookup */
  durationMs: number
  /** Why the lookup fell back to identity */
  error?: ServiceErrorInfo
}

/**
 * Statistics collected during a reconciliation run.
 */
export interface ReconciliationStats {
  constituentRows: number
  emailRows: number
  donationRows: number
  canonicalConstituents: number
  duplicatesRemoved: number
  paidDonations: number
  constituentsWithDonations: number
  distinctTags: number
  tagMapping: TagMappingStats
  executionTimeMs: number
}

/**
 * Output of a reconciliation run.
 */
export interface ReconciliationResult {
  constituents: OutputConstituent[]
  tagCounts: TagCountRow[]
  stats: ReconciliationStats
}
