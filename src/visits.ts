/**
 * Visits
 *
 * Engineer-facing visit operations and non-contracted (ad hoc) visits.
 * Visits are never deleted; cancelling frees their sequence slot.
 */

import { yearMonthOf } from './time-date'
import type { Visit, VisitFilter } from './adapter'
import { NotFoundError, InvalidStateError } from './errors'
import { ensureAdHocMonthFolder } from './folders'
import type { DomainDeps } from './internal/types'
import { uuid, nextSequence, visitReference, validateDate, requireText } from './internal/helpers'

export type VisitDetails = {
  visitDate?: string
  engineerId?: string
  reason?: string
  description?: string
  address?: string
}

export type AdHocVisitInput = VisitDetails & {
  clientId: string
}

export type VisitManager = {
  get(id: string): Promise<Visit | null>
  list(filter?: VisitFilter): Promise<Visit[]>
  updateDetails(id: string, details: VisitDetails): Promise<void>
  markDone(id: string): Promise<void>
  cancel(id: string): Promise<void>
  createAdHoc(input: AdHocVisitInput): Promise<string>
}

function detailChanges(details: VisitDetails): Partial<Visit> {
  const changes: Partial<Visit> = {}
  if (details.visitDate !== undefined) changes.visitDate = validateDate(details.visitDate, 'visitDate')
  if (details.engineerId !== undefined) changes.engineerId = details.engineerId
  if (details.reason !== undefined) changes.reason = details.reason
  if (details.description !== undefined) changes.description = details.description
  if (details.address !== undefined) changes.address = details.address
  return changes
}

export function createVisitManager(deps: DomainDeps): VisitManager {
  const { adapter, publish, clock } = deps

  async function load(id: string): Promise<Visit> {
    const visit = await adapter.getVisit(id)
    if (!visit) throw new NotFoundError(`Visit '${id}' not found`)
    return visit
  }

  async function updateDetails(id: string, details: VisitDetails): Promise<void> {
    const visit = await load(id)
    if (visit.state === 'cancelled') {
      throw new InvalidStateError(`Visit '${id}' is cancelled`)
    }
    await adapter.updateVisit(id, detailChanges(details))
  }

  async function markDone(id: string): Promise<void> {
    const visit = await load(id)
    if (visit.state === 'done') return
    if (visit.state === 'cancelled') {
      throw new InvalidStateError(`Visit '${id}' is cancelled and cannot be completed`)
    }
    await adapter.updateVisit(id, { state: 'done' })
    publish('visitCompleted', { visitId: id, signatureRequestId: null })
  }

  async function cancel(id: string): Promise<void> {
    const visit = await load(id)
    if (visit.state === 'cancelled') return
    if (visit.state === 'done') {
      throw new InvalidStateError(`Visit '${id}' is already done`)
    }
    await adapter.updateVisit(id, { state: 'cancelled' })
  }

  async function createAdHoc(input: AdHocVisitInput): Promise<string> {
    const clientId = requireText(input.clientId, 'clientId')
    const client = await adapter.getClient(clientId)
    if (!client) throw new NotFoundError(`Client '${clientId}' not found`)

    const visitDate = input.visitDate !== undefined ? validateDate(input.visitDate, 'visitDate') : clock.today()
    const month = yearMonthOf(visitDate)
    const address = input.address ?? client.address

    const visit = await adapter.transaction(async () => {
      const folder = await ensureAdHocMonthFolder(adapter, month)
      const sequence = nextSequence(await adapter.getAdHocVisitsForMonth(month))
      const created: Visit = {
        id: uuid(),
        reference: visitReference(client.name, month, sequence),
        contractId: null,
        clientId,
        folderId: folder.id,
        month,
        sequence,
        state: 'pending',
        kind: 'adhoc',
        visitDate,
        ...(input.reason !== undefined ? { reason: input.reason } : {}),
        ...(input.engineerId !== undefined ? { engineerId: input.engineerId } : {}),
        ...(input.description !== undefined ? { description: input.description } : {}),
        ...(address !== undefined ? { address } : {}),
        reportDocumentId: null,
        createdAt: clock.now(),
      }
      await adapter.createVisit(created)
      return created
    })

    publish('visitCreated', { visitId: visit.id, contractId: null, month, kind: 'adhoc' })
    return visit.id
  }

  return {
    get: (id) => adapter.getVisit(id),
    list: (filter) => adapter.getVisits(filter ?? {}),
    updateDetails,
    markDone,
    cancel,
    createAdHoc,
  }
}
