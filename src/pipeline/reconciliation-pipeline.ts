/**
 * Reconciliation pipeline that turns the three source tables into the
 * constituent output table and the tag count table
 *
 * Coordinates:
 * - Identity resolution of duplicate constituent rows
 * - Email resolution against the email table
 * - A single tag mapping lookup with identity fallback
 * - Donation rollups joined by identifier
 * - Derived fields and output formatting
 *
 * @module pipeline/reconciliation-pipeline
 */

import type { ReconciliationConfig } from '../types/config'
import type { CanonicalConstituent, SourceTables } from '../types/record'
import type {
  OutputConstituent,
  ReconciliationResult,
  ReconciliationStats,
  TagMappingStats,
} from '../types/output'
import type { ServiceResult } from '../services/types'
import { resolveIdentities } from '../core/identity-resolver'
import { indexEmails, resolveEmails, type EmailIndex } from '../core/email-resolver'
import {
  applyMapping,
  countTags,
  fetchTagMapping,
  formatTags,
  parseTags,
  type TagAssignment,
  type TagMapping,
} from '../core/tag-normalizer'
import { aggregateDonations, type DonationRollup } from '../core/donation-aggregator'
import { deriveFields } from '../core/field-deriver'
import { formatCurrency } from '../core/normalizers/currency'
import { formatIso } from '../core/normalizers/date'
import { createPrefixedLogger } from '../services/logger'

/**
 * Options for a single run
 */
export interface RunOptions {
  /** Cancels the tag mapping lookup; the run then continues with identity mapping */
  signal?: AbortSignal
}

/**
 * Immutable lookups shared by every constituent of a run
 */
export interface AssemblyContext {
  config: ReconciliationConfig
  emails: EmailIndex
  tagMapping: TagMapping
  donations: ReadonlyMap<string, DonationRollup>
}

/**
 * A finished output row together with the mapped tags it carries
 */
export interface AssembledConstituent {
  record: OutputConstituent
  tags: string[]
}

/**
 * Builds the output row of one canonical constituent.
 *
 * Pure function of its arguments.
 */
export function assembleConstituent(
  canonical: CanonicalConstituent,
  context: AssemblyContext
): AssembledConstituent {
  const { config } = context
  const columns = config.columns.constituents
  const { row, id } = canonical

  const emails = resolveEmails(row[columns.primaryEmail], context.emails.get(id))
  const tags = applyMapping(parseTags(row[columns.tags]), context.tagMapping)
  const derived = deriveFields(row, columns, config)
  const rollup = context.donations.get(id)

  return {
    tags,
    record: {
      'Constituent ID': id,
      'Constituent Type': derived.type,
      'First Name': derived.firstName,
      'Last Name': derived.lastName,
      'Company Name': derived.companyName,
      'Created At': formatIso(canonical.entryDate),
      'Email 1': emails.email1,
      'Email 2': emails.email2,
      Title: derived.title,
      Tags: formatTags(tags),
      'Background Information': derived.background,
      'Lifetime Donation Amount': formatCurrency(rollup?.lifetimeAmount),
      'Most Recent Donation Date': formatIso(rollup?.mostRecent?.date),
      'Most Recent Donation Amount': formatCurrency(rollup?.mostRecent?.amount),
    },
  }
}

function toTagMappingStats(result: ServiceResult<TagMapping>): TagMappingStats {
  return {
    source: result.success ? 'service' : 'identity',
    pairs: result.data?.size ?? 0,
    durationMs: result.timing.durationMs,
    error: result.error,
  }
}

/**
 * Runs the reconciliation over in-memory source tables
 *
 * @example
 * ```typescript
 * const pipeline = new ReconciliationPipeline(createReconciliationConfig({
 *   tagMapping: { service: createHttpTagMappingService({ endpoint }) },
 * }))
 *
 * const result = await pipeline.run({ constituents, emails, donations })
 * console.log(`${result.stats.duplicatesRemoved} duplicates removed`)
 * ```
 */
export class ReconciliationPipeline {
  readonly config: ReconciliationConfig

  constructor(config: ReconciliationConfig) {
    this.config = config
  }

  /**
   * Execute the full reconciliation
   *
   * @throws MissingIdentifierError when any source row lacks an identifier
   */
  async run(tables: SourceTables, options: RunOptions = {}): Promise<ReconciliationResult> {
    const startTime = Date.now()
    const { columns, paidStatus, tagMapping } = this.config
    const logger = createPrefixedLogger('reconcile', this.config.logger)

    logger.info('Starting reconciliation', {
      constituents: tables.constituents.length,
      emails: tables.emails.length,
      donations: tables.donations.length,
    })

    const canonical = resolveIdentities(tables.constituents, columns.constituents)
    logger.debug(`Resolved ${canonical.length} canonical constituents`)
    for (const constituent of canonical) {
      if (constituent.duplicateCount > 1) {
        logger.debug('Collapsed duplicate constituent rows', {
          id: constituent.id,
          rows: constituent.duplicateCount,
          keptRow: constituent.index,
        })
      }
    }

    const emails = indexEmails(tables.emails, columns.emails)
    const donations = aggregateDonations(tables.donations, columns.donations, paidStatus)

    const mappingResult = await fetchTagMapping(tagMapping.service, {
      timeoutMs: tagMapping.timeoutMs,
      logger,
      signal: options.signal,
    })

    const context: AssemblyContext = {
      config: this.config,
      emails,
      tagMapping: mappingResult.data ?? new Map(),
      donations,
    }

    const assembled = canonical.map((constituent) =>
      assembleConstituent(constituent, context)
    )
    const assignments: TagAssignment[] = assembled.map(({ record, tags }) => ({
      id: record['Constituent ID'],
      tags,
    }))
    const tagCounts = countTags(assignments)

    let paidDonations = 0
    for (const rollup of donations.values()) {
      paidDonations += rollup.donationCount
    }

    const stats: ReconciliationStats = {
      constituentRows: tables.constituents.length,
      emailRows: tables.emails.length,
      donationRows: tables.donations.length,
      canonicalConstituents: canonical.length,
      duplicatesRemoved: tables.constituents.length - canonical.length,
      paidDonations,
      constituentsWithDonations: canonical.filter((c) => donations.has(c.id)).length,
      distinctTags: tagCounts.length,
      tagMapping: toTagMappingStats(mappingResult),
      executionTimeMs: Date.now() - startTime,
    }

    logger.info('Reconciliation complete', {
      canonicalConstituents: stats.canonicalConstituents,
      duplicatesRemoved: stats.duplicatesRemoved,
      distinctTags: stats.distinctTags,
      tagMapping: stats.tagMapping.source,
    })

    return {
      constituents: assembled.map(({ record }) => record),
      tagCounts,
      stats,
    }
  }
}
