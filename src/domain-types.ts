/**
 * Canonical Domain Types
 *
 * Lifecycle unions shared by the adapter layer and the domain modules, plus
 * the outbound events the planner publishes.
 */

import type { YearMonth } from './time-date'

// ============================================================================
// Lifecycle States
// ============================================================================

export type ContractState = 'draft' | 'in_progress' | 'closed'

export type VisitState = 'pending' | 'done' | 'cancelled'

/** scheduled: created by quota reconciliation; extra: added beyond quota; adhoc: no contract */
export type VisitKind = 'scheduled' | 'extra' | 'adhoc'

export type SignatureState = 'sent' | 'signed' | 'cancelled'

// ============================================================================
// Outbound Events
// ============================================================================

export type VisitCreatedEvent = {
  visitId: string
  contractId: string | null
  month: YearMonth
  kind: VisitKind
}

export type VisitCompletedEvent = {
  visitId: string
  signatureRequestId: string | null
}

export type ContractEvent = {
  contractId: string
}

export type VisitPlannerEvents = {
  visitCreated: VisitCreatedEvent
  visitCompleted: VisitCompletedEvent
  contractActivated: ContractEvent
  contractClosed: ContractEvent
}

export type VisitPlannerEventName = keyof VisitPlannerEvents

/** Outbound event sink handed to the domain modules */
export type Publish = <E extends VisitPlannerEventName>(event: E, payload: VisitPlannerEvents[E]) => void
