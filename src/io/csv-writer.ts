/**
 * Writes the output tables as CSV files
 * @module io/csv-writer
 */

import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import Papa from 'papaparse'
import type { OutputConstituent, ReconciliationResult, TagCountRow } from '../types/output'
import { OUTPUT_CONSTITUENT_COLUMNS, TAG_COUNT_COLUMNS } from '../types/output'

/**
 * File names of the two output tables
 */
export interface OutputFileNames {
  constituents: string
  tagCounts: string
}

export const DEFAULT_OUTPUT_FILE_NAMES: OutputFileNames = {
  constituents: 'constituents.csv',
  tagCounts: 'tags.csv',
}

/**
 * Paths written by {@link writeOutputTables}
 */
export interface WrittenOutput {
  constituents: string
  tagCounts: string
}

/**
 * Serializes constituent rows with a header row, in the given order.
 */
export function constituentsToCsv(rows: readonly OutputConstituent[]): string {
  return Papa.unparse(
    {
      fields: [...OUTPUT_CONSTITUENT_COLUMNS],
      data: rows.map((row) => OUTPUT_CONSTITUENT_COLUMNS.map((column) => row[column])),
    },
    { newline: '\n' }
  )
}

/**
 * Serializes tag count rows with a header row, in the given order.
 */
export function tagCountsToCsv(rows: readonly TagCountRow[]): string {
  return Papa.unparse(
    {
      fields: [...TAG_COUNT_COLUMNS],
      data: rows.map((row) => [row['Tag Name'], row['Tag Count']]),
    },
    { newline: '\n' }
  )
}

/**
 * Writes both output tables into a directory, creating it when needed.
 */
export async function writeOutputTables(
  result: Pick<ReconciliationResult, 'constituents' | 'tagCounts'>,
  outDir: string,
  fileNames: Partial<OutputFileNames> = {}
): Promise<WrittenOutput> {
  const names: OutputFileNames = { ...DEFAULT_OUTPUT_FILE_NAMES, ...fileNames }
  await mkdir(outDir, { recursive: true })

  const written: WrittenOutput = {
    constituents: join(outDir, names.constituents),
    tagCounts: join(outDir, names.tagCounts),
  }

  await writeFile(written.constituents, constituentsToCsv(result.constituents) + '\n', 'utf8')
  await writeFile(written.tagCounts, tagCountsToCsv(result.tagCounts) + '\n', 'utf8')

  return written
}
