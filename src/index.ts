/**
 * visit-planner
 *
 * Public API exports
 */

// Error system (canonical source: base class, codes, all error classes)
export {
  VisitPlannerError, VisitPlannerErrorCode,
  DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError,
  ValidationError, InvalidStateError, OutOfRangeError, ParseError,
} from './errors'
export type { VisitPlannerErrorCode as VisitPlannerErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalDateTime, YearMonth } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseYearMonth,
  makeDate, makeDateTime, makeYearMonth,
  yearOf, monthOf, dayOf, dateOf, yearMonthOf,
  addDays, daysBetween, addMonths, monthsBetween,
  firstDayOf, lastDayOf, monthsInRange, monthName,
  compareDates, compareYearMonths, dateBefore, dateAfter,
  todayIn, nowIn,
} from './time-date'

// Domain types & events
export type {
  ContractState, VisitState, VisitKind, SignatureState,
  VisitCreatedEvent, VisitCompletedEvent, ContractEvent,
  VisitPlannerEvents, VisitPlannerEventName,
} from './domain-types'

// Adapter (persistence interface + in-memory mock)
export type {
  Adapter,
  Client, Contract, Visit, Folder, VisitDocument, SignatureRequest, VisitFilter,
} from './adapter'
export { createMockAdapter, compareVisits } from './adapter'

// SQLite adapter
export type { SqliteAdapter, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Contracts
export type {
  ContractInput, ContractUpdate, ContractSummary, ActivationResult,
} from './contracts'
export { contractMonthCount, totalContractVisits } from './contracts'

// Clients
export type { ClientInput } from './clients'

// Visit generation
export { isMonthInContract } from './visit-generator'
export type { VisitDetails, AdHocVisitInput } from './visits'

// Folders
export type { FolderTreeNode } from './folders'
export { AD_HOC_ROOT_NAME, monthFolderName } from './folders'

// Signatures
export type { SignedArtifact, SignatureCompletion } from './signatures'

// Reports
export type { ReportRenderer, RenderedReport, VisitReportInput } from './reports'
export { plainTextReportRenderer, renderReportText } from './reports'

// Daily trigger
export type {
  DailyRunResult, DailyRunFailure, Notification, ManualGenerationResult,
} from './daily-trigger'

// Public API
export type {
  VisitPlanner, VisitPlannerConfig, EventHandler, Logger,
} from './public-api'
export { createVisitPlanner } from './public-api'
