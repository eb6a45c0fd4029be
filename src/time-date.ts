/**
 * Time & Date Utilities
 *
 * Pure functions for date parsing, formatting, day and month arithmetic.
 * Uses Julian Day Number for day arithmetic to avoid month-length edge cases,
 * and a month index (year * 12 + month - 1) for calendar-month arithmetic.
 * Zero external dependencies; timezone support comes from Intl.DateTimeFormat.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localDateTime: unique symbol
declare const __yearMonth: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

/** Calendar month: YYYY-MM */
export type YearMonth = string & { readonly [__yearMonth]: true }

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseYearMonth(str: string): Result<YearMonth, ParseError> {
  const match = /^(\d{4})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid month format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month: '${str}'`))

  return Ok(makeYearMonth(year, month))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeDateTime(date: LocalDate, hour: number, minute: number, second?: number): LocalDateTime {
  return `${date}T${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalDateTime
}

export function makeYearMonth(year: number, month: number): YearMonth {
  return `${pad4(year)}-${pad2(month)}` as YearMonth
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate | YearMonth): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate | YearMonth): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

/** The calendar month a date falls in */
export function yearMonthOf(date: LocalDate): YearMonth {
  return date.substring(0, 7) as YearMonth
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

// ============================================================================
// Month Arithmetic
// ============================================================================

function monthIndex(ym: YearMonth): number {
  return yearOf(ym) * 12 + monthOf(ym) - 1
}

function fromMonthIndex(index: number): YearMonth {
  return makeYearMonth(Math.floor(index / 12), (index % 12) + 1)
}

export function addMonths(ym: YearMonth, n: number): YearMonth {
  return fromMonthIndex(monthIndex(ym) + n)
}

/** Signed number of calendar months from a to b */
export function monthsBetween(a: YearMonth, b: YearMonth): number {
  return monthIndex(b) - monthIndex(a)
}

export function firstDayOf(ym: YearMonth): LocalDate {
  return makeDate(yearOf(ym), monthOf(ym), 1)
}

export function lastDayOf(ym: YearMonth): LocalDate {
  const year = yearOf(ym)
  const month = monthOf(ym)
  return makeDate(year, month, daysInMonth(year, month))
}

/**
 * Every calendar month touched by [start, end], inclusive on both ends.
 * A range whose end precedes its start yields no months.
 */
export function monthsInRange(start: LocalDate, end: LocalDate): YearMonth[] {
  const first = yearMonthOf(start)
  const count = monthsBetween(first, yearMonthOf(end)) + 1
  const months: YearMonth[] = []
  for (let i = 0; i < count; i++) {
    months.push(addMonths(first, i))
  }
  return months
}

export function monthName(ym: YearMonth): string {
  return MONTH_NAMES[monthOf(ym) - 1] ?? ''
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function compareYearMonths(a: YearMonth, b: YearMonth): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function dateBefore(a: LocalDate, b: LocalDate): boolean {
  return a < b
}

export function dateAfter(a: LocalDate, b: LocalDate): boolean {
  return a > b
}

// ============================================================================
// Wall Clock in a Timezone
// ============================================================================

function partsIn(instant: Date, tz: string): Map<string, number> {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })
  const parts = new Map<string, number>()
  for (const part of formatter.formatToParts(instant)) {
    if (part.type !== 'literal') parts.set(part.type, parseInt(part.value, 10))
  }
  return parts
}

/** Calendar date of an instant as seen on a wall clock in timezone tz */
export function todayIn(tz: string, instant: Date): LocalDate {
  const parts = partsIn(instant, tz)
  return makeDate(parts.get('year') ?? 0, parts.get('month') ?? 1, parts.get('day') ?? 1)
}

export function nowIn(tz: string, instant: Date): LocalDateTime {
  const parts = partsIn(instant, tz)
  // Some engines report midnight as hour 24 under hour12: false
  const hour = (parts.get('hour') ?? 0) % 24
  return makeDateTime(todayIn(tz, instant), hour, parts.get('minute') ?? 0, parts.get('second') ?? 0)
}
