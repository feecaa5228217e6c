#!/usr/bin/env npx tsx
/**
 * Reconcile a constituent workbook into the import CSV files.
 *
 * Usage:
 *   npm run reconcile -- --input data/input.xlsx --out out
 *
 * With a tag mapping service:
 *   npm run reconcile -- --input data/input.xlsx --out out --tags-url https://example.test/tags
 */

import { DonorReconcile } from '../builder/reconciliation-builder'
import { createHttpTagMappingService } from '../services/lookups/tag-mapping-lookup'
import { createConsoleLogger } from '../services/logger'
import { readWorkbook } from '../io/workbook-reader'
import { writeOutputTables } from '../io/csv-writer'
import { isReconcileError } from '../utils/errors'
import { isServiceError } from '../services/service-error'
import { parseCliArgs, USAGE } from './args'

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2), process.env)
  const logger = createConsoleLogger(options.quiet ? 'warn' : 'info')

  const builder = DonorReconcile.create().logger(logger)
  if (options.tagsUrl) {
    builder.tagMapping(createHttpTagMappingService({ endpoint: options.tagsUrl }), {
      timeoutMs: options.timeoutMs,
    })
  }
  const pipeline = builder.build()

  const tables = await readWorkbook(options.input)
  const result = await pipeline.run(tables)
  const written = await writeOutputTables(result, options.outDir)

  logger.info(`Wrote ${result.constituents.length} constituents to ${written.constituents}`)
  logger.info(`Wrote ${result.tagCounts.length} tags to ${written.tagCounts}`)
}

main().catch((error: unknown) => {
  if (isReconcileError(error) || isServiceError(error)) {
    console.error(`${error.code}: ${error.message}`)
    if (error.code === 'CONFIGURATION_ERROR' && error.message !== USAGE) console.error(USAGE)
  } else {
    console.error(error)
  }
  process.exitCode = 1
})
