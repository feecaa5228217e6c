import { describe, it, expect, vi } from 'vitest'
import {
  DonorReconcile,
  MissingIdentifierError,
  OUTPUT_CONSTITUENT_COLUMNS,
  createHttpTagMappingService,
  createSilentLogger,
  createStaticTagMappingService,
  type Logger,
  type SourceTables,
} from '../../src'
import { createTables } from '../fixtures/tables'

const ENDPOINT = 'https://tags.example.test/mappings'

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

/**
 * End-to-end reconciliation over a small workbook's worth of rows
 */
describe('Reconciliation Pipeline', () => {
  describe('Output constituents', () => {
    it('should produce one row per identifier in first-appearance order', async () => {
      const pipeline = DonorReconcile.create().logger(createSilentLogger()).build()

      const result = await pipeline.run(createTables())

      expect(result.constituents.map((c) => c['Constituent ID'])).toEqual(['1001', '1002', '1003'])
    })

    it('should assemble a person from the most complete duplicate', async () => {
      const pipeline = DonorReconcile.create()
        .tagMapping(createStaticTagMappingService([{ name: 'VIP', mappedName: 'Major Donor' }]))
        .logger(createSilentLogger())
        .build()

      const [ada] = (await pipeline.run(createTables())).constituents

      expect(ada).toEqual({
        'Constituent ID': '1001',
        'Constituent Type': 'Person',
        'First Name': 'Ada',
        'Last Name': 'Lovelace',
        'Company Name': '',
        'Created At': '2022-01-01T00:00:00',
        'Email 1': 'ada@example.com',
        'Email 2': 'ada.alt@example.com',
        Title: 'Mrs.',
        Tags: 'Donor, Major Donor',
        'Background Information': 'Job Title: Engineer; Marital Status: Married',
        'Lifetime Donation Amount': '$350.50',
        'Most Recent Donation Date': '2022-07-15T00:00:00',
        'Most Recent Donation Amount': '$250.50',
      })
    })

    it('should assemble a company with a fallback title and undated donation', async () => {
      const pipeline = DonorReconcile.create().logger(createSilentLogger()).build()

      const grace = (await pipeline.run(createTables())).constituents[1]

      expect(grace).toEqual({
        'Constituent ID': '1002',
        'Constituent Type': 'Company',
        'First Name': '',
        'Last Name': '',
        'Company Name': 'Acme Inc',
        'Created At': '2020-03-04T00:00:00',
        'Email 1': 'grace@acme.test',
        'Email 2': '',
        Title: 'Dr.',
        Tags: 'Board',
        'Background Information': '',
        'Lifetime Donation Amount': '$0.00',
        'Most Recent Donation Date': '',
        'Most Recent Donation Amount': '',
      })
    })

    it('should leave every optional field blank for a sparse constituent', async () => {
      const pipeline = DonorReconcile.create().logger(createSilentLogger()).build()

      const alan = (await pipeline.run(createTables())).constituents[2]

      expect(alan).toEqual({
        'Constituent ID': '1003',
        'Constituent Type': 'Person',
        'First Name': 'Alan',
        'Last Name': 'Turing',
        'Company Name': '',
        'Created At': '',
        'Email 1': '',
        'Email 2': '',
        Title: '',
        Tags: '',
        'Background Information': '',
        'Lifetime Donation Amount': '',
        'Most Recent Donation Date': '',
        'Most Recent Donation Amount': '',
      })
    })

    it('should emit exactly the output columns in order', async () => {
      const pipeline = DonorReconcile.create().logger(createSilentLogger()).build()

      const [first] = (await pipeline.run(createTables())).constituents

      expect(Object.keys(first)).toEqual([...OUTPUT_CONSTITUENT_COLUMNS])
    })
  })

  describe('Tag counts', () => {
    it('should count mapped tags per distinct constituent', async () => {
      const pipeline = DonorReconcile.create()
        .tagMapping(createStaticTagMappingService([{ name: 'VIP', mappedName: 'Major Donor' }]))
        .logger(createSilentLogger())
        .build()

      const result = await pipeline.run(createTables())

      expect(result.tagCounts).toEqual([
        { 'Tag Name': 'Board', 'Tag Count': 1 },
        { 'Tag Name': 'Donor', 'Tag Count': 1 },
        { 'Tag Name': 'Major Donor', 'Tag Count': 1 },
      ])
    })

    it('should collapse tags mapped onto the same name', async () => {
      const tables: SourceTables = {
        constituents: [
          { 'Patron ID': '1', Tags: 'Gold, Platinum' },
          { 'Patron ID': '2', Tags: 'Gold' },
        ],
        emails: [],
        donations: [],
      }
      const pipeline = DonorReconcile.create()
        .tagMapping(
          createStaticTagMappingService([
            { name: 'Gold', mappedName: 'Major Donor' },
            { name: 'Platinum', mappedName: 'Major Donor' },
          ])
        )
        .logger(createSilentLogger())
        .build()

      const result = await pipeline.run(tables)

      expect(result.constituents.map((c) => c.Tags)).toEqual(['Major Donor', 'Major Donor'])
      expect(result.tagCounts).toEqual([{ 'Tag Name': 'Major Donor', 'Tag Count': 2 }])
    })
  })

  describe('Tag mapping fallback', () => {
    it('should use identity mapping when the service returns an HTTP error', async () => {
      const logger = createMockLogger()
      const fetch = vi.fn(
        async (_input: string, _init?: RequestInit) =>
          new Response('unavailable', { status: 503, statusText: 'Service Unavailable' })
      )
      const pipeline = DonorReconcile.create()
        .tagMapping(createHttpTagMappingService({ endpoint: ENDPOINT, fetch }))
        .logger(logger)
        .build()

      const result = await pipeline.run(createTables())

      expect(fetch).toHaveBeenCalledTimes(1)
      expect(result.constituents[0].Tags).toBe('Donor, VIP')
      expect(result.tagCounts.map((row) => row['Tag Name'])).toEqual(['Board', 'Donor', 'VIP'])
      expect(result.stats.tagMapping.source).toBe('identity')
      expect(result.stats.tagMapping.error?.code).toBe('SERVICE_SERVER_ERROR')
      expect(logger.warn).toHaveBeenCalledWith(
        '[reconcile] Tag mapping lookup failed; using identity mapping',
        expect.objectContaining({ service: 'tag-mapping-http', code: 'SERVICE_SERVER_ERROR' })
      )
    })

    it('should use identity mapping when no service is configured', async () => {
      const logger = createMockLogger()
      const pipeline = DonorReconcile.create().logger(logger).build()

      const result = await pipeline.run(createTables())

      expect(result.stats.tagMapping).toMatchObject({ source: 'identity', pairs: 0 })
      expect(logger.warn).toHaveBeenCalledWith(
        '[reconcile] No tag mapping service configured; using identity mapping',
        undefined
      )
    })

    it('should use identity mapping when the run is cancelled', async () => {
      const controller = new AbortController()
      controller.abort()
      const pipeline = DonorReconcile.create()
        .tagMapping(createStaticTagMappingService([{ name: 'VIP', mappedName: 'Major Donor' }]))
        .logger(createSilentLogger())
        .build()

      const result = await pipeline.run(createTables(), { signal: controller.signal })

      expect(result.stats.tagMapping.source).toBe('identity')
      expect(result.constituents[0].Tags).toBe('Donor, VIP')
    })
  })

  describe('Statistics', () => {
    it('should report counts for the run', async () => {
      const pipeline = DonorReconcile.create()
        .tagMapping(createStaticTagMappingService([{ name: 'VIP', mappedName: 'Major Donor' }]))
        .logger(createSilentLogger())
        .build()

      const { stats } = await pipeline.run(createTables())

      expect(stats).toMatchObject({
        constituentRows: 4,
        emailRows: 5,
        donationRows: 5,
        canonicalConstituents: 3,
        duplicatesRemoved: 1,
        paidDonations: 3,
        constituentsWithDonations: 2,
        distinctTags: 3,
      })
      expect(stats.tagMapping.source).toBe('service')
      expect(stats.tagMapping.pairs).toBe(1)
      expect(stats.executionTimeMs).toBeGreaterThanOrEqual(0)
    })
  })

  describe('Diagnostics', () => {
    it('should log which row survived for each duplicated identifier', async () => {
      const logger = createMockLogger()
      const pipeline = DonorReconcile.create().logger(logger).build()

      await pipeline.run(createTables())

      expect(logger.debug).toHaveBeenCalledWith('[reconcile] Collapsed duplicate constituent rows', {
        id: '1001',
        rows: 2,
        keptRow: 2,
      })
      expect(logger.debug).not.toHaveBeenCalledWith(
        '[reconcile] Collapsed duplicate constituent rows',
        expect.objectContaining({ id: '1002' })
      )
    })
  })

  describe('Custom configuration', () => {
    it('should read renamed columns and a custom paid status', async () => {
      const tables: SourceTables = {
        constituents: [{ Key: 'A1', Given: 'Kim', Family: 'Lee', Org: '' }],
        emails: [{ Key: 'A1', Address: 'KIM@EXAMPLE.COM' }],
        donations: [
          { Key: 'A1', State: 'Settled', Value: '40', When: '2020-02-02' },
          { Key: 'A1', State: 'Paid', Value: '60', When: '2021-02-02' },
        ],
      }
      const pipeline = DonorReconcile.create()
        .constituentColumns({ id: 'Key', firstName: 'Given', lastName: 'Family', company: 'Org' })
        .emailColumns({ id: 'Key', email: 'Address' })
        .donationColumns({ id: 'Key', status: 'State', amount: 'Value', date: 'When' })
        .paidStatus('Settled')
        .logger(createSilentLogger())
        .build()

      const [kim] = (await pipeline.run(tables)).constituents

      expect(kim['First Name']).toBe('Kim')
      expect(kim['Last Name']).toBe('Lee')
      expect(kim['Email 1']).toBe('kim@example.com')
      expect(kim['Lifetime Donation Amount']).toBe('$40.00')
      expect(kim['Most Recent Donation Date']).toBe('2020-02-02T00:00:00')
    })
  })

  describe('Missing identifiers', () => {
    it('should abort the run when a donation row has no identifier', async () => {
      const tables = createTables()
      const pipeline = DonorReconcile.create().logger(createSilentLogger()).build()

      await expect(
        pipeline.run({
          ...tables,
          donations: [...tables.donations, { 'Patron ID': null, Status: 'Paid' }],
        })
      ).rejects.toThrow("Row 5 of table 'donations' has no value in identifier column 'Patron ID'")
    })

    it('should abort the run when a constituent row has no identifier', async () => {
      const pipeline = DonorReconcile.create().logger(createSilentLogger()).build()

      await expect(
        pipeline.run({ constituents: [{ 'First Name': 'Nobody' }], emails: [], donations: [] })
      ).rejects.toBeInstanceOf(MissingIdentifierError)
    })
  })

  describe('Empty input', () => {
    it('should produce empty outputs', async () => {
      const pipeline = DonorReconcile.create().logger(createSilentLogger()).build()

      const result = await pipeline.run({ constituents: [], emails: [], donations: [] })

      expect(result.constituents).toEqual([])
      expect(result.tagCounts).toEqual([])
      expect(result.stats.canonicalConstituents).toBe(0)
    })
  })
})
