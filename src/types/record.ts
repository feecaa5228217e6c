/**
 * A single cell value as supplied by a table reader.
 * `null` and `undefined` mean the cell was missing, which is distinct from `''`.
 */
export type CellValue = string | number | boolean | Date | null | undefined

/**
 * A raw row keyed by column name.
 */
export type SourceRow = Readonly<Record<string, CellValue>>

/**
 * The three logical source tables consumed by a reconciliation run.
 */
export interface SourceTables {
  /** Primary constituent table; identifiers may repeat */
  constituents: readonly SourceRow[]
  /** Email table, many rows per identifier */
  emails: readonly SourceRow[]
  /** Donation transaction table */
  donations: readonly SourceRow[]
}

/**
 * Names of the source tables, used in diagnostics.
 */
export type SourceTableName = keyof SourceTables

/**
 * A constituent row together with its position in the input table.
 * The index is the final tie-break when duplicates are ranked.
 */
export interface ConstituentRecord {
  /** Cleaned identifier */
  id: string
  /** Zero-based position in the constituents table */
  index: number
  /** The untouched source row */
  row: SourceRow
}

/**
 * The surviving record for an identifier after identity resolution.
 */
export interface CanonicalConstituent extends ConstituentRecord {
  /** Number of non-blank fields in the row */
  completeness: number
  /** Parsed entry date, or null when absent or unparseable */
  entryDate: Date | null
  /** How many input rows shared this identifier (including the survivor) */
  duplicateCount: number
}
