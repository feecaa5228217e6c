/**
 * Configuration defaults and validation for reconciliation runs
 * @module pipeline/config
 */

import type {
  ReconciliationConfig,
  SourceColumnOverrides,
  TagMappingConfig,
} from '../types/config'
import type { Logger } from '../services/types'
import {
  DEFAULT_COMPANY_NULL_VALUES,
  DEFAULT_CONSTITUENT_COLUMNS,
  DEFAULT_DONATION_COLUMNS,
  DEFAULT_EMAIL_COLUMNS,
  DEFAULT_PAID_STATUS,
  DEFAULT_TAG_MAPPING_TIMEOUT_MS,
  DEFAULT_TITLE_VOCABULARY,
} from '../types/config'
import { defaultLogger } from '../services/logger'
import { ConfigurationError } from '../utils/errors'

/**
 * Caller-supplied configuration; anything omitted takes its default.
 */
export interface ReconciliationOptions {
  columns?: SourceColumnOverrides
  paidStatus?: string
  companyNullValues?: readonly string[]
  titleVocabulary?: Readonly<Record<string, string>>
  tagMapping?: Partial<TagMappingConfig>
  logger?: Logger
}

/**
 * Merges options over the defaults and validates the result.
 *
 * @throws ConfigurationError when a column name or setting is invalid
 */
export function createReconciliationConfig(
  options: ReconciliationOptions = {}
): ReconciliationConfig {
  const config: ReconciliationConfig = {
    columns: {
      constituents: { ...DEFAULT_CONSTITUENT_COLUMNS, ...options.columns?.constituents },
      emails: { ...DEFAULT_EMAIL_COLUMNS, ...options.columns?.emails },
      donations: { ...DEFAULT_DONATION_COLUMNS, ...options.columns?.donations },
    },
    paidStatus: (options.paidStatus ?? DEFAULT_PAID_STATUS).trim(),
    companyNullValues: (options.companyNullValues ?? DEFAULT_COMPANY_NULL_VALUES).map(
      (value) => value.trim().toLowerCase()
    ),
    titleVocabulary: { ...(options.titleVocabulary ?? DEFAULT_TITLE_VOCABULARY) },
    tagMapping: {
      service: options.tagMapping?.service,
      timeoutMs: options.tagMapping?.timeoutMs ?? DEFAULT_TAG_MAPPING_TIMEOUT_MS,
    },
    logger: options.logger ?? defaultLogger,
  }

  validateReconciliationConfig(config)
  return config
}

/**
 * Validates a complete configuration.
 *
 * @throws ConfigurationError on the first problem found
 */
export function validateReconciliationConfig(config: ReconciliationConfig): void {
  for (const [table, columns] of Object.entries(config.columns)) {
    for (const [field, column] of Object.entries(columns)) {
      if (typeof column !== 'string' || column.trim() === '') {
        throw new ConfigurationError(
          `Column name for '${table}.${field}' must be a non-empty string`,
          `columns.${table}.${field}`
        )
      }
    }
  }

  if (config.paidStatus.trim() === '') {
    throw new ConfigurationError('paidStatus must not be empty', 'paidStatus')
  }

  if (!Number.isFinite(config.tagMapping.timeoutMs) || config.tagMapping.timeoutMs <= 0) {
    throw new ConfigurationError(
      `tagMapping.timeoutMs must be a positive number, got ${config.tagMapping.timeoutMs}`,
      'tagMapping.timeoutMs'
    )
  }

  for (const [spelling, canonical] of Object.entries(config.titleVocabulary)) {
    if (spelling.trim() === '' || canonical.trim() === '') {
      throw new ConfigurationError(
        'titleVocabulary entries must map a non-empty spelling to a non-empty title',
        'titleVocabulary'
      )
    }
  }
}
