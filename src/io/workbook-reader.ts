/**
 * Reads the three source tables from an Excel workbook
 * @module io/workbook-reader
 */

import { readFile } from 'fs/promises'
import * as XLSX from 'xlsx'
import type { CellValue, SourceRow, SourceTableName, SourceTables } from '../types/record'
import { SourceTableError } from '../utils/errors'

/**
 * Sheet names holding each source table
 */
export type SheetNames = Record<SourceTableName, string>

export const DEFAULT_SHEET_NAMES: SheetNames = {
  constituents: 'Input Constituents',
  emails: 'Input Emails',
  donations: 'Input Donation History',
}

/** Day 0 of the 1900 and 1904 date systems, in days before 1970-01-01 */
const EXCEL_EPOCH_OFFSET_DAYS = 25569
const EXCEL_1904_EPOCH_OFFSET_DAYS = 24107
const MS_PER_DAY = 86_400_000

/**
 * True when a number format renders a date or time.
 * Quoted literals, bracketed sections and escaped characters are ignored.
 */
export function isDateFormat(format: string | undefined): boolean {
  if (!format) return false
  const tokens = format
    .replace(/"[^"]*"/g, '')
    .replace(/\\./g, '')
    .replace(/\[[^\]]*\]/g, '')
  return /[ymdhs]/i.test(tokens) && !/^general$/i.test(tokens.trim())
}

/**
 * Converts an Excel date serial to a UTC date, rounded to the second.
 *
 * @example
 * ```typescript
 * excelSerialToDate(44566.5) // Date(2022-01-05T12:00:00.000Z)
 * ```
 */
export function excelSerialToDate(serial: number, date1904 = false): Date {
  const offset = date1904 ? EXCEL_1904_EPOCH_OFFSET_DAYS : EXCEL_EPOCH_OFFSET_DAYS
  const seconds = Math.round(((serial - offset) * MS_PER_DAY) / 1000)
  return new Date(seconds * 1000)
}

function toCellValue(cell: XLSX.CellObject | undefined, date1904: boolean): CellValue {
  if (!cell || cell.t === 'z' || cell.t === 'e') return null

  const { v } = cell
  if (v === undefined) return null
  if (typeof v === 'number' && cell.t === 'n' && isDateFormat(formatOf(cell))) {
    return excelSerialToDate(v, date1904)
  }
  return v
}

function formatOf(cell: XLSX.CellObject): string | undefined {
  return typeof cell.z === 'string' ? cell.z : undefined
}

function headerOf(cell: XLSX.CellObject | undefined): string {
  if (!cell || cell.v == null) return ''
  const text = cell.w ?? (cell.v instanceof Date ? cell.v.toISOString() : String(cell.v))
  return text.trim()
}

/**
 * Converts one worksheet to rows keyed by header.
 *
 * The first row holds the headers. Cells keep their stored value: numbers
 * stay numbers, date-formatted numbers become UTC dates and empty cells
 * become null. Rows with no value at all are skipped.
 */
export function sheetToRows(sheet: XLSX.WorkSheet, date1904 = false): SourceRow[] {
  const ref = sheet['!ref']
  if (typeof ref !== 'string') return []
  const range = XLSX.utils.decode_range(ref)

  const columns: { index: number; header: string }[] = []
  const seen = new Map<string, number>()
  for (let c = range.s.c; c <= range.e.c; c++) {
    const headerCell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r: range.s.r, c })]
    const header = headerOf(headerCell)
    if (!header) continue
    const count = seen.get(header) ?? 0
    seen.set(header, count + 1)
    columns.push({ index: c, header: count === 0 ? header : `${header}_${count}` })
  }

  const rows: SourceRow[] = []
  for (let r = range.s.r + 1; r <= range.e.r; r++) {
    const cells: Record<string, CellValue> = {}
    let empty = true
    for (const { index, header } of columns) {
      const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c: index })]
      const value = toCellValue(cell, date1904)
      if (value !== null) empty = false
      cells[header] = value
    }
    if (!empty) rows.push(cells)
  }
  return rows
}

/**
 * Parses a workbook held in memory.
 *
 * @throws SourceTableError when a required sheet is missing
 */
export function readWorkbookBuffer(
  data: Buffer | Uint8Array,
  sheetNames: Partial<SheetNames> = {}
): SourceTables {
  const names: SheetNames = { ...DEFAULT_SHEET_NAMES, ...sheetNames }
  const workbook = Buffer.isBuffer(data)
    ? XLSX.read(data, { type: 'buffer', cellNF: true })
    : XLSX.read(data, { type: 'array', cellNF: true })
  const date1904 = workbook.Workbook?.WBProps?.date1904 === true

  const load = (table: SourceTableName): SourceRow[] => {
    const sheet = workbook.Sheets[names[table]]
    if (!sheet) {
      throw new SourceTableError(table, `sheet '${names[table]}' not found`, {
        available: workbook.SheetNames,
      })
    }
    return sheetToRows(sheet, date1904)
  }

  return {
    constituents: load('constituents'),
    emails: load('emails'),
    donations: load('donations'),
  }
}

/**
 * Reads the source tables from an `.xlsx` file.
 *
 * @example
 * ```typescript
 * const tables = await readWorkbook('data/input.xlsx')
 * const result = await pipeline.run(tables)
 * ```
 */
export async function readWorkbook(
  path: string,
  sheetNames: Partial<SheetNames> = {}
): Promise<SourceTables> {
  let data: Buffer
  try {
    data = await readFile(path)
  } catch (error) {
    throw new SourceTableError(
      'constituents',
      `cannot read workbook '${path}': ${error instanceof Error ? error.message : String(error)}`,
      { path }
    )
  }
  return readWorkbookBuffer(data, sheetNames)
}
