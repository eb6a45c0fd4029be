/**
 * Visit Generator
 *
 * Monthly quota reconciliation for in-progress contracts. For a target month,
 * the generator counts the contract's non-cancelled visits and creates only
 * the missing ones, so repeated runs converge on the quota without
 * duplicating records. Extra visits bypass the quota entirely.
 *
 * Visits are written inside one adapter transaction; `visitCreated` events
 * are published after the transaction commits, so a report failure never
 * takes the visits with it.
 */

import { type YearMonth, yearMonthOf, compareYearMonths } from './time-date'
import type { Contract, Visit } from './adapter'
import type { VisitKind } from './domain-types'
import { InvalidStateError, OutOfRangeError, ValidationError } from './errors'
import { ensureMonthFolder } from './folders'
import type { DomainDeps } from './internal/types'
import { uuid, nextSequence, visitReference, defaultVisitDate, requireText } from './internal/helpers'

export type VisitGenerator = {
  /** Creates the visits missing from the month's quota; returns their ids */
  generate(contract: Contract, targetMonth: YearMonth): Promise<string[]>
  /** Creates count extra visits regardless of quota; returns their ids */
  addExtra(contract: Contract, month: YearMonth, count: number, reason: string): Promise<string[]>
}

/** Whether month lies within the contract's start month .. end month */
export function isMonthInContract(contract: Contract, month: YearMonth): boolean {
  return (
    compareYearMonths(month, yearMonthOf(contract.startDate)) >= 0 &&
    compareYearMonths(month, yearMonthOf(contract.endDate)) <= 0
  )
}

function requireInProgress(contract: Contract): void {
  if (contract.state !== 'in_progress') {
    throw new InvalidStateError(
      `Contract '${contract.id}' is ${contract.state}; visits are only generated for in-progress contracts`,
    )
  }
}

export function createVisitGenerator(deps: DomainDeps): VisitGenerator {
  const { adapter, publish, clock } = deps

  async function createVisits(
    contract: Contract,
    month: YearMonth,
    count: number,
    kind: VisitKind,
    reason?: string,
  ): Promise<Visit[]> {
    const existing = await adapter.getVisitsForMonth(contract.id, month)
    const needed = kind === 'scheduled' ? contract.visitsPerMonth - existing.length : count
    if (needed <= 0) return []

    const folder = await ensureMonthFolder(adapter, contract, month)
    const client = await adapter.getClient(contract.clientId)
    const first = nextSequence(existing)
    const visitDate = defaultVisitDate(month, clock.today())
    const createdAt = clock.now()

    const created: Visit[] = []
    for (let i = 0; i < needed; i++) {
      const sequence = first + i
      const visit: Visit = {
        id: uuid(),
        reference: visitReference(contract.name, month, sequence),
        contractId: contract.id,
        clientId: contract.clientId,
        folderId: folder.id,
        month,
        sequence,
        state: 'pending',
        kind,
        visitDate,
        ...(reason !== undefined ? { reason } : {}),
        ...(client?.address !== undefined ? { address: client.address } : {}),
        reportDocumentId: null,
        createdAt,
      }
      await adapter.createVisit(visit)
      created.push(visit)
    }
    return created
  }

  function announce(visits: Visit[]): string[] {
    for (const visit of visits) {
      publish('visitCreated', {
        visitId: visit.id,
        contractId: visit.contractId,
        month: visit.month,
        kind: visit.kind,
      })
    }
    return visits.map((v) => v.id)
  }

  async function generate(contract: Contract, targetMonth: YearMonth): Promise<string[]> {
    requireInProgress(contract)
    // The daily run does not pre-filter by date range, so months outside the
    // contract are a silent no-op rather than an error
    if (!isMonthInContract(contract, targetMonth)) return []

    const created = await adapter.transaction(() =>
      createVisits(contract, targetMonth, contract.visitsPerMonth, 'scheduled'),
    )
    return announce(created)
  }

  async function addExtra(contract: Contract, month: YearMonth, count: number, reason: string): Promise<string[]> {
    requireInProgress(contract)
    if (!Number.isInteger(count) || count <= 0) {
      throw new ValidationError('The number of visits must be greater than zero')
    }
    const why = requireText(reason, 'Reason for extra visits')
    if (!isMonthInContract(contract, month)) {
      throw new OutOfRangeError(
        `${month} is outside contract '${contract.id}' (${contract.startDate} to ${contract.endDate})`,
      )
    }

    const created = await adapter.transaction(() => createVisits(contract, month, count, 'extra', why))
    return announce(created)
  }

  return { generate, addExtra }
}
