/**
 * Reports
 *
 * Reporting collaborator. Listens for created visits, renders a report through
 * a pluggable renderer and files it in the visit's month folder. Filing runs
 * in the background on the planner's task queue, after the write that created
 * the visit: a rendering failure is logged and the visit stays as it is, ready
 * for the next attempt.
 */

import type { Adapter, Client, Contract, Visit } from './adapter'
import type { VisitCreatedEvent } from './domain-types'
import type { Clock, Logger } from './internal/types'
import { NotFoundError } from './errors'
import { uuid, type TaskQueue } from './internal/helpers'

// ============================================================================
// Rendering
// ============================================================================

export type VisitReportInput = {
  visit: Visit
  client: Client
  contract: Contract | null
}

export type RenderedReport = {
  content: Uint8Array
  mimeType: string
  /** File extension without the dot */
  extension: string
}

export type ReportRenderer = (input: VisitReportInput) => Promise<RenderedReport>

const KIND_LABELS: Record<Visit['kind'], string> = {
  scheduled: 'Scheduled',
  extra: 'Extra',
  adhoc: 'Not contracted',
}

const STATE_LABELS: Record<Visit['state'], string> = {
  pending: 'Pending',
  done: 'Done',
  cancelled: 'Cancelled',
}

export function renderReportText({ visit, client, contract }: VisitReportInput): string {
  const lines = [
    'Visit Report',
    `Reference: ${visit.reference}`,
    `Client: ${client.name}`,
    `Contract: ${contract ? contract.name : 'None'}`,
    `Month: ${visit.month}`,
    `Visit date: ${visit.visitDate}`,
    `Type: ${KIND_LABELS[visit.kind]}`,
    `Status: ${STATE_LABELS[visit.state]}`,
  ]
  if (visit.address) lines.push(`Address: ${visit.address}`)
  if (visit.reason) lines.push(`Reason: ${visit.reason}`)
  return lines.join('\n') + '\n'
}

/** Placeholder renderer; hosts with a template engine plug in their own */
export const plainTextReportRenderer: ReportRenderer = async (input) => ({
  content: new TextEncoder().encode(renderReportText(input)),
  mimeType: 'text/plain',
  extension: 'txt',
})

// ============================================================================
// Filing
// ============================================================================

export type ReportFiler = {
  /** Event handler: queues the filing behind the running write */
  handleVisitCreated(event: VisitCreatedEvent): void
  /**
   * Renders and files a visit's report now; returns the document id, or null
   * when not filed. Callers outside the queue must run it through the queue.
   */
  fileReport(visitId: string): Promise<string | null>
  /** Resolves once every queued filing has settled */
  whenIdle(): Promise<void>
}

type ReportFilerDeps = {
  adapter: Adapter
  renderer: ReportRenderer
  logger: Logger
  clock: Clock
  queue: TaskQueue
}

export function createReportFiler(deps: ReportFilerDeps): ReportFiler {
  const { adapter, renderer, logger, clock, queue } = deps

  async function fileReport(visitId: string): Promise<string | null> {
    const visit = await adapter.getVisit(visitId)
    if (!visit) throw new NotFoundError(`Visit '${visitId}' not found`)
    if (visit.reportDocumentId !== null) return visit.reportDocumentId

    const folderId = visit.folderId
    if (folderId === null) {
      logger.warn(`Visit '${visit.reference}' has no month folder; report not filed`)
      return null
    }

    const client = await adapter.getClient(visit.clientId)
    if (!client) throw new NotFoundError(`Client '${visit.clientId}' not found`)
    const contract = visit.contractId !== null ? await adapter.getContract(visit.contractId) : null

    const report = await renderer({ visit, client, contract })

    const id = uuid()
    return adapter.transaction(async () => {
      // Another filing may have completed while this one was rendering
      const current = await adapter.getVisit(visit.id)
      if (current?.reportDocumentId) return current.reportDocumentId

      await adapter.createDocument({
        id,
        name: `Visit Report - ${visit.reference}.${report.extension}`,
        folderId,
        mimeType: report.mimeType,
        content: report.content,
        visitId: visit.id,
        signatureRequestId: null,
        createdAt: clock.now(),
      })
      await adapter.updateVisit(visit.id, { reportDocumentId: id })
      return id
    })
  }

  function handleVisitCreated(event: VisitCreatedEvent): void {
    queue.run(() => fileReport(event.visitId)).catch((e: unknown) => {
      logger.error(`Report for visit '${event.visitId}' failed:`, e)
    })
  }

  return { handleVisitCreated, fileReport, whenIdle: queue.idle }
}
