/**
 * Internal Types
 *
 * Dependency bundles handed from the planner factory to the domain modules.
 */

import type { LocalDate, LocalDateTime } from '../time-date'
import type { Adapter } from '../adapter'
import type { Publish } from '../domain-types'

/** Console-compatible sink; the planner defaults to the global console */
export type Logger = Pick<Console, 'info' | 'warn' | 'error'>

export type Clock = {
  /** Calendar date in the planner's timezone */
  today(): LocalDate
  /** Wall-clock timestamp in the planner's timezone */
  now(): LocalDateTime
}

export type DomainDeps = {
  adapter: Adapter
  publish: Publish
  clock: Clock
}
