export type {
  CellValue,
  SourceRow,
  SourceTables,
  SourceTableName,
  ConstituentRecord,
  CanonicalConstituent,
} from './record'

export type {
  ConstituentColumns,
  EmailColumns,
  DonationColumns,
  SourceColumns,
  SourceColumnOverrides,
  TagMappingConfig,
  ReconciliationConfig,
} from './config'

export {
  DEFAULT_CONSTITUENT_COLUMNS,
  DEFAULT_EMAIL_COLUMNS,
  DEFAULT_DONATION_COLUMNS,
  DEFAULT_PAID_STATUS,
  DEFAULT_COMPANY_NULL_VALUES,
  DEFAULT_TITLE_VOCABULARY,
  DEFAULT_TAG_MAPPING_TIMEOUT_MS,
} from './config'

export type {
  ConstituentType,
  OutputConstituentColumn,
  TagCountColumn,
  OutputConstituent,
  TagCountRow,
  TagMappingStats,
  ReconciliationStats,
  ReconciliationResult,
} from './output'

export { OUTPUT_CONSTITUENT_COLUMNS, TAG_COUNT_COLUMNS } from './output'
