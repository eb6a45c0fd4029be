/**
 * fast-check generators for visit planning domain values.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import type { VisitState } from '../../src/domain-types'
import { makeDate, type LocalDate } from '../../src/time-date'

export type ExistingVisit = {
  sequence: number
  state: VisitState
}

export const visitStateGen: Arbitrary<VisitState> = fc.constantFrom('pending', 'done', 'cancelled')

/** Visits already stored for one contract month, with distinct sequences */
export const existingVisitsGen: Arbitrary<ExistingVisit[]> = fc.uniqueArray(
  fc.record({ sequence: fc.integer({ min: 1, max: 20 }), state: visitStateGen }),
  { selector: (v) => v.sequence, maxLength: 14 },
)

export const quotaGen: Arbitrary<number> = fc.integer({ min: 1, max: 12 })

/** A date in 2020..2030; days stop at 28 so every month is valid */
export const localDateGen: Arbitrary<LocalDate> = fc
  .record({
    year: fc.integer({ min: 2020, max: 2030 }),
    month: fc.integer({ min: 1, max: 12 }),
    day: fc.integer({ min: 1, max: 28 }),
  })
  .map(({ year, month, day }) => makeDate(year, month, day))
