/**
 * Internal Helpers
 *
 * Pure utility functions shared across the domain modules.
 */

import { randomUUID } from 'node:crypto'
import type { LocalDate, YearMonth } from '../time-date'
import { parseDate, parseYearMonth, yearMonthOf, firstDayOf } from '../time-date'
import { ValidationError } from '../errors'

// ============================================================================
// ID Generation
// ============================================================================

export function uuid(): string {
  return randomUUID()
}

// ============================================================================
// Timezone Helpers
// ============================================================================

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

// ============================================================================
// Input Validation
// ============================================================================

export function validateDate(value: string, fieldName: string): LocalDate {
  const result = parseDate(value)
  if (!result.ok) {
    throw new ValidationError(`Invalid ${fieldName}: ${value}`)
  }
  return result.value
}

export function validateMonth(value: string, fieldName = 'month'): YearMonth {
  const result = parseYearMonth(value)
  if (!result.ok) {
    throw new ValidationError(`Invalid ${fieldName}: ${value}`)
  }
  return result.value
}

export function requireText(value: string | undefined, fieldName: string): string {
  const trimmed = value?.trim() ?? ''
  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} must not be empty`)
  }
  return trimmed
}

// ============================================================================
// Visit Helpers
// ============================================================================

/** Sequence number following the highest one in use, 1 for an empty month */
export function nextSequence(existing: readonly { sequence: number }[]): number {
  let max = 0
  for (const v of existing) {
    if (v.sequence > max) max = v.sequence
  }
  return max + 1
}

export function visitReference(prefix: string, month: YearMonth, sequence: number): string {
  return `${prefix}/${month}/${String(sequence).padStart(3, '0')}`
}

/** Today when it falls in month, otherwise the first day of month */
export function defaultVisitDate(month: YearMonth, today: LocalDate): LocalDate {
  return yearMonthOf(today) === month ? today : firstDayOf(month)
}

// ============================================================================
// Task Queue
// ============================================================================

/**
 * Runs tasks one at a time, in submission order. Adapter transactions join
 * whichever transaction is already open, so every write goes through one
 * queue and two transactions never overlap.
 */
export type TaskQueue = {
  run<T>(task: () => Promise<T>): Promise<T>
  /** Resolves once every submitted task, including ones queued meanwhile, has settled */
  idle(): Promise<void>
}

export function createTaskQueue(): TaskQueue {
  let tail: Promise<void> = Promise.resolve()

  function run<T>(task: () => Promise<T>): Promise<T> {
    const result = tail.then(task)
    // The caller of run receives the rejection; the tail only tracks settlement
    tail = result.then(() => undefined, () => undefined)
    return result
  }

  async function idle(): Promise<void> {
    let current = tail
    await current
    while (current !== tail) {
      current = tail
      await current
    }
  }

  return { run, idle }
}
