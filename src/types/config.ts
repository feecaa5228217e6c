import type { Logger, TagMappingService } from '../services/types'

/**
 * Column names read from the constituents table.
 */
export interface ConstituentColumns {
  id: string
  firstName: string
  lastName: string
  company: string
  salutation: string
  title: string
  tags: string
  primaryEmail: string
  entryDate: string
  jobTitle: string
  maritalStatus: string
}

/**
 * Column names read from the email table.
 */
export interface EmailColumns {
  id: string
  email: string
}

/**
 * Column names read from the donation table.
 */
export interface DonationColumns {
  id: string
  status: string
  amount: string
  date: string
}

/**
 * Column layout of all three source tables.
 */
export interface SourceColumns {
  constituents: ConstituentColumns
  emails: EmailColumns
  donations: DonationColumns
}

/**
 * Partial column overrides accepted from callers.
 */
export interface SourceColumnOverrides {
  constituents?: Partial<ConstituentColumns>
  emails?: Partial<EmailColumns>
  donations?: Partial<DonationColumns>
}

/**
 * Tag mapping lookup settings.
 */
export interface TagMappingConfig {
  /** Service to consult; when absent the identity mapping is used */
  service?: TagMappingService
  /** Upper bound for the single lookup attempt, in milliseconds */
  timeoutMs: number
}

/**
 * Complete configuration for a reconciliation run.
 */
export interface ReconciliationConfig {
  columns: SourceColumns
  /** Donation status that marks a settled transaction (exact match) */
  paidStatus: string
  /** Lowercase company values that count as "no company" */
  companyNullValues: readonly string[]
  /** Accepted salutation/title spellings and their canonical form */
  titleVocabulary: Readonly<Record<string, string>>
  tagMapping: TagMappingConfig
  logger: Logger
}

export const DEFAULT_CONSTITUENT_COLUMNS: ConstituentColumns = {
  id: 'Patron ID',
  firstName: 'First Name',
  lastName: 'Last Name',
  company: 'Company',
  salutation: 'Salutation',
  title: 'Title',
  tags: 'Tags',
  primaryEmail: 'Primary Email',
  entryDate: 'Date Entered',
  jobTitle: 'Job Title',
  maritalStatus: 'Marital Status',
}

export const DEFAULT_EMAIL_COLUMNS: EmailColumns = {
  id: 'Patron ID',
  email: 'Email',
}

export const DEFAULT_DONATION_COLUMNS: DonationColumns = {
  id: 'Patron ID',
  status: 'Status',
  amount: 'Donation Amount',
  date: 'Donation Date',
}

export const DEFAULT_PAID_STATUS = 'Paid'

export const DEFAULT_COMPANY_NULL_VALUES: readonly string[] = [
  'none',
  'nan',
  'n/a',
  '...',
  'null',
]

export const DEFAULT_TITLE_VOCABULARY: Readonly<Record<string, string>> = {
  Mr: 'Mr.',
  'Mr.': 'Mr.',
  Mrs: 'Mrs.',
  'Mrs.': 'Mrs.',
  Ms: 'Ms.',
  'Ms.': 'Ms.',
  Dr: 'Dr.',
  'Dr.': 'Dr.',
}

export const DEFAULT_TAG_MAPPING_TIMEOUT_MS = 5000
