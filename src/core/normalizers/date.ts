import type { CellValue } from '../../types/record'

/**
 * Components of a parsed date. All values are interpreted in UTC.
 */
export interface DateComponents {
  /** Year (4 digits) */
  year: number
  /** Month (1-12) */
  month: number
  /** Day (1-31) */
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
}

/**
 * Month name mappings (case-insensitive).
 */
const MONTH_NAMES: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
}

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?Z?$/

/**
 * Validates if a date is valid (checks month/day ranges and leap years).
 *
 * @example
 * ```typescript
 * isValidDate(2024, 2, 29)  // true (leap year)
 * isValidDate(2023, 2, 29)  // false (not leap year)
 * isValidDate(2024, 13, 1)  // false (month out of range)
 * ```
 */
export function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12) {
    return false
  }

  const daysInMonth = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

  const isLeapYear = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
  if (isLeapYear && month === 2) {
    daysInMonth[1] = 29
  }

  return day >= 1 && day <= daysInMonth[month - 1]
}

function isValidTime(hour: number, minute: number, second: number): boolean {
  return hour <= 23 && minute <= 59 && second <= 59
}

function pad(num: number, length: number): string {
  return String(num).padStart(length, '0')
}

/** Two-digit years below this fall in the 2000s, the rest in the 1900s */
const TWO_DIGIT_YEAR_PIVOT = 69

function expandYear(year: number): number {
  if (year >= 100) return year
  return year < TWO_DIGIT_YEAR_PIVOT ? 2000 + year : 1900 + year
}

function dateOnly(year: number, month: number, day: number): DateComponents | null {
  if (!isValidDate(year, month, day)) return null
  return { year, month, day, hour: 0, minute: 0, second: 0, millisecond: 0 }
}

/**
 * Parses a date string into components.
 *
 * Accepts ISO dates with an optional time part, `MM/DD/YYYY` (or `DD/MM/YYYY`
 * when the first part is above 12), `DD.MM.YYYY` and month-name forms.
 * Partial dates (a bare year or year-month) and impossible calendar dates
 * are rejected.
 *
 * @example
 * ```typescript
 * parseDateComponents('2024-01-30 14:05:00')
 * // { year: 2024, month: 1, day: 30, hour: 14, minute: 5, second: 0, millisecond: 0 }
 *
 * parseDateComponents('January 30, 2024')
 * // { year: 2024, month: 1, day: 30, hour: 0, ... }
 *
 * parseDateComponents('2024-01') // null
 * ```
 */
export function parseDateComponents(dateString: string): DateComponents | null {
  const str = dateString.trim()
  if (!str) return null

  const isoMatch = str.match(ISO_DATE_TIME)
  if (isoMatch) {
    const base = dateOnly(
      parseInt(isoMatch[1], 10),
      parseInt(isoMatch[2], 10),
      parseInt(isoMatch[3], 10)
    )
    if (!base) return null

    const hour = isoMatch[4] ? parseInt(isoMatch[4], 10) : 0
    const minute = isoMatch[5] ? parseInt(isoMatch[5], 10) : 0
    const second = isoMatch[6] ? parseInt(isoMatch[6], 10) : 0
    const millisecond = isoMatch[7] ? parseInt(isoMatch[7].padEnd(3, '0'), 10) : 0
    if (!isValidTime(hour, minute, second)) return null

    return { ...base, hour, minute, second, millisecond }
  }

  // "January 30, 2024" or "Jan 30 2024"
  const naturalMatch1 = str.match(/^([a-z]+)\s+(\d{1,2}),?\s+(\d{4})$/i)
  if (naturalMatch1) {
    const month = MONTH_NAMES[naturalMatch1[1].toLowerCase()]
    if (month === undefined) return null
    return dateOnly(parseInt(naturalMatch1[3], 10), month, parseInt(naturalMatch1[2], 10))
  }

  // "30 January 2024"
  const naturalMatch2 = str.match(/^(\d{1,2})\s+([a-z]+)\s+(\d{4})$/i)
  if (naturalMatch2) {
    const month = MONTH_NAMES[naturalMatch2[2].toLowerCase()]
    if (month === undefined) return null
    return dateOnly(parseInt(naturalMatch2[3], 10), month, parseInt(naturalMatch2[1], 10))
  }

  const slashMatch = str.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2,4})$/)
  if (slashMatch) {
    const part1 = parseInt(slashMatch[1], 10)
    const part2 = parseInt(slashMatch[2], 10)
    const year = expandYear(parseInt(slashMatch[3], 10))

    // US order unless the first part can only be a day
    return part1 > 12 ? dateOnly(year, part2, part1) : dateOnly(year, part1, part2)
  }

  const dotMatch = str.match(/^(\d{1,2})\.(\d{1,2})\.(\d{2,4})$/)
  if (dotMatch) {
    const year = expandYear(parseInt(dotMatch[3], 10))
    return dateOnly(year, parseInt(dotMatch[2], 10), parseInt(dotMatch[1], 10))
  }

  return null
}

/**
 * Parses a cell into a date, failing soft.
 *
 * `Date` instances pass through when valid; finite numbers are epoch
 * milliseconds; strings go through {@link parseDateComponents}. Anything
 * else, including unparseable text, yields `null`.
 *
 * @example
 * ```typescript
 * parseDateOrNull('2021-01-01')   // Date(2021-01-01T00:00:00.000Z)
 * parseDateOrNull('not a date')   // null
 * parseDateOrNull(null)           // null
 * ```
 */
export function parseDateOrNull(value: CellValue): Date | null {
  if (value == null || typeof value === 'boolean') return null

  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null
    const date = new Date(value)
    return isNaN(date.getTime()) ? null : date
  }

  const components = parseDateComponents(value)
  if (!components) return null

  return new Date(
    Date.UTC(
      components.year,
      components.month - 1,
      components.day,
      components.hour,
      components.minute,
      components.second,
      components.millisecond
    )
  )
}

/**
 * Formats a date as `YYYY-MM-DDTHH:MM:SS` in UTC; absent dates give `''`.
 *
 * @example
 * ```typescript
 * formatIso(new Date(Date.UTC(2022, 0, 1, 9, 30))) // '2022-01-01T09:30:00'
 * formatIso(null) // ''
 * ```
 */
export function formatIso(date: Date | null | undefined): string {
  if (!date || isNaN(date.getTime())) return ''

  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}` +
    `T${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}`
  )
}
