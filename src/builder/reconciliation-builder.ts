import type {
  ConstituentColumns,
  DonationColumns,
  EmailColumns,
  SourceColumnOverrides,
} from '../types/config'
import type { Logger, TagMappingService } from '../services/types'
import { ReconciliationPipeline } from '../pipeline/reconciliation-pipeline'
import {
  createReconciliationConfig,
  type ReconciliationOptions,
} from '../pipeline/config'
import { requireNonEmptyString, requirePositive } from '../utils/errors'

/**
 * Tag mapping settings accepted by the builder
 */
export interface TagMappingOptions {
  /** Upper bound for the lookup in milliseconds (default: 5000) */
  timeoutMs?: number
}

/**
 * Fluent builder for configuring and creating a ReconciliationPipeline.
 *
 * @example
 * ```typescript
 * const pipeline = DonorReconcile.create()
 *   .constituentColumns({ id: 'Constituent ID', entryDate: 'Created' })
 *   .tagMapping(createHttpTagMappingService({ endpoint }), { timeoutMs: 3000 })
 *   .logger(createConsoleLogger('warn'))
 *   .build()
 *
 * const result = await pipeline.run(tables)
 * ```
 */
export class ReconciliationBuilder {
  private readonly options: ReconciliationOptions = {}
  private readonly constituentOverrides: Partial<ConstituentColumns> = {}
  private readonly emailOverrides: Partial<EmailColumns> = {}
  private readonly donationOverrides: Partial<DonationColumns> = {}

  /**
   * Override column names of any of the three tables at once.
   */
  columns(overrides: SourceColumnOverrides): this {
    if (overrides.constituents) this.constituentColumns(overrides.constituents)
    if (overrides.emails) this.emailColumns(overrides.emails)
    if (overrides.donations) this.donationColumns(overrides.donations)
    return this
  }

  /**
   * Override column names of the constituents table.
   */
  constituentColumns(columns: Partial<ConstituentColumns>): this {
    Object.assign(this.constituentOverrides, columns)
    return this
  }

  /**
   * Override column names of the email table.
   */
  emailColumns(columns: Partial<EmailColumns>): this {
    Object.assign(this.emailOverrides, columns)
    return this
  }

  /**
   * Override column names of the donation table.
   */
  donationColumns(columns: Partial<DonationColumns>): this {
    Object.assign(this.donationOverrides, columns)
    return this
  }

  /**
   * Set the donation status that counts as settled (default: 'Paid').
   */
  paidStatus(status: string): this {
    this.options.paidStatus = requireNonEmptyString(status, 'status')
    return this
  }

  /**
   * Replace the company values that mean "no company".
   * Comparison is case-insensitive.
   */
  companyNullValues(values: readonly string[]): this {
    this.options.companyNullValues = [...values]
    return this
  }

  /**
   * Replace the controlled title vocabulary.
   *
   * @example
   * ```typescript
   * .titleVocabulary({ Mx: 'Mx.', 'Mx.': 'Mx.' })
   * ```
   */
  titleVocabulary(vocabulary: Readonly<Record<string, string>>): this {
    this.options.titleVocabulary = { ...vocabulary }
    return this
  }

  /**
   * Consult a tag mapping service once per run.
   */
  tagMapping(service: TagMappingService, options: TagMappingOptions = {}): this {
    this.options.tagMapping = {
      service,
      timeoutMs:
        options.timeoutMs === undefined
          ? undefined
          : requirePositive(options.timeoutMs, 'timeoutMs'),
    }
    return this
  }

  /**
   * Route pipeline diagnostics to the given logger.
   */
  logger(logger: Logger): this {
    this.options.logger = logger
    return this
  }

  /**
   * Validate the configuration and create the pipeline.
   *
   * @throws ConfigurationError when the configuration is invalid
   */
  build(): ReconciliationPipeline {
    const config = createReconciliationConfig({
      ...this.options,
      columns: {
        constituents: this.constituentOverrides,
        emails: this.emailOverrides,
        donations: this.donationOverrides,
      },
    })
    return new ReconciliationPipeline(config)
  }
}

/**
 * Entry point for the fluent API.
 */
export const DonorReconcile = {
  create(): ReconciliationBuilder {
    return new ReconciliationBuilder()
  },
}
