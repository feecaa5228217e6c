export * from './normalizers'
export { stableSortBy, groupBy, type SortKey, type SortOrder, type SortValue } from './sorting'
export { readIdentifier } from './identifiers'
export { toConstituentRecords, selectCanonical, resolveIdentities } from './identity-resolver'
export {
  indexEmails,
  resolveEmails,
  type EmailIndex,
  type ResolvedEmails,
} from './email-resolver'
export {
  parseTags,
  buildTagMapping,
  applyMapping,
  formatTags,
  countTags,
  fetchTagMapping,
  type TagMapping,
  type TagAssignment,
  type FetchTagMappingOptions,
} from './tag-normalizer'
export {
  extractPaidDonations,
  selectMostRecent,
  aggregateDonations,
  type PaidDonation,
  type DonationRollup,
} from './donation-aggregator'
export {
  classifyConstituent,
  deriveNameFields,
  deriveTitle,
  buildBackground,
  deriveFields,
  type NameFields,
  type DerivationVocabulary,
  type DerivedFields,
} from './field-deriver'
