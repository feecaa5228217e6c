/**
 * Derived output fields: classification, names, title and background text
 * @module core/field-deriver
 */

import type { ConstituentColumns } from '../types/config'
import type { ConstituentType } from '../types/output'
import type { CellValue, SourceRow } from '../types/record'
import { DEFAULT_COMPANY_NULL_VALUES, DEFAULT_TITLE_VOCABULARY } from '../types/config'
import { cleanString, lowercase } from './normalizers/basic'
import { normalizeTitle } from './normalizers/title'

/**
 * Name fields after classification.
 */
export interface NameFields {
  type: ConstituentType
  firstName: string
  lastName: string
  companyName: string
}

/**
 * Vocabularies consulted while deriving fields.
 */
export interface DerivationVocabulary {
  companyNullValues: readonly string[]
  titleVocabulary: Readonly<Record<string, string>>
}

export interface DerivedFields extends NameFields {
  title: string
  background: string
}

const DEFAULT_VOCABULARY: DerivationVocabulary = {
  companyNullValues: DEFAULT_COMPANY_NULL_VALUES,
  titleVocabulary: DEFAULT_TITLE_VOCABULARY,
}

/**
 * Classifies a constituent as a Company when it names a real company.
 *
 * @example
 * ```typescript
 * classifyConstituent('Acme Inc') // 'Company'
 * classifyConstituent('N/A')      // 'Person'
 * classifyConstituent(null)       // 'Person'
 * ```
 */
export function classifyConstituent(
  company: CellValue,
  companyNullValues: readonly string[] = DEFAULT_COMPANY_NULL_VALUES
): ConstituentType {
  const value = lowercase(company)
  return value !== '' && !companyNullValues.includes(value) ? 'Company' : 'Person'
}

/**
 * Keeps the name fields that belong to the constituent's type and blanks the rest.
 */
export function deriveNameFields(
  row: SourceRow,
  columns: Pick<ConstituentColumns, 'firstName' | 'lastName' | 'company'>,
  companyNullValues: readonly string[] = DEFAULT_COMPANY_NULL_VALUES
): NameFields {
  const type = classifyConstituent(row[columns.company], companyNullValues)

  if (type === 'Company') {
    return {
      type,
      firstName: '',
      lastName: '',
      companyName: cleanString(row[columns.company]),
    }
  }

  return {
    type,
    firstName: cleanString(row[columns.firstName]),
    lastName: cleanString(row[columns.lastName]),
    companyName: '',
  }
}

/**
 * Resolves the title from the salutation, falling back to the title field.
 */
export function deriveTitle(
  salutation: CellValue,
  title: CellValue,
  vocabulary: Readonly<Record<string, string>> = DEFAULT_TITLE_VOCABULARY
): string {
  return normalizeTitle(salutation, vocabulary) || normalizeTitle(title, vocabulary)
}

/**
 * Synthesizes the background information text.
 *
 * @example
 * ```typescript
 * buildBackground('Engineer', 'Married') // 'Job Title: Engineer; Marital Status: Married'
 * buildBackground('', 'Unknown')         // ''
 * ```
 */
export function buildBackground(jobTitle: CellValue, maritalStatus: CellValue): string {
  const clauses: string[] = []

  const job = cleanString(jobTitle)
  if (job) clauses.push(`Job Title: ${job}`)

  const marital = cleanString(maritalStatus)
  if (marital && marital.toLowerCase() !== 'unknown') {
    clauses.push(`Marital Status: ${marital}`)
  }

  return clauses.join('; ')
}

/**
 * Derives every computed field of a canonical constituent row.
 */
export function deriveFields(
  row: SourceRow,
  columns: ConstituentColumns,
  vocabulary: DerivationVocabulary = DEFAULT_VOCABULARY
): DerivedFields {
  return {
    ...deriveNameFields(row, columns, vocabulary.companyNullValues),
    title: deriveTitle(row[columns.salutation], row[columns.title], vocabulary.titleVocabulary),
    background: buildBackground(row[columns.jobTitle], row[columns.maritalStatus]),
  }
}
