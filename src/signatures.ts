/**
 * Signatures
 *
 * Inbound side of the e-signature workflow. A request is opened for a pending
 * visit; when the signing party completes it, the visit is marked done and the
 * signed artifact is filed in the visit's month folder.
 */

import type { SignatureRequest } from './adapter'
import { NotFoundError, InvalidStateError } from './errors'
import type { DomainDeps, Logger } from './internal/types'
import { uuid } from './internal/helpers'

export type SignedArtifact = {
  content: Uint8Array
  mimeType?: string
  name?: string
}

export type SignatureCompletion = {
  visitId: string
  /** null when the visit has no folder to file the artifact in */
  documentId: string | null
}

export type SignatureManager = {
  request(visitId: string): Promise<string>
  complete(requestId: string, artifact: SignedArtifact): Promise<SignatureCompletion>
  cancel(requestId: string): Promise<void>
  listForVisit(visitId: string): Promise<SignatureRequest[]>
}

type SignatureManagerDeps = DomainDeps & {
  logger: Logger
}

export function createSignatureManager(deps: SignatureManagerDeps): SignatureManager {
  const { adapter, publish, clock, logger } = deps

  async function loadRequest(id: string): Promise<SignatureRequest> {
    const request = await adapter.getSignatureRequest(id)
    if (!request) throw new NotFoundError(`Signature request '${id}' not found`)
    return request
  }

  async function request(visitId: string): Promise<string> {
    const visit = await adapter.getVisit(visitId)
    if (!visit) throw new NotFoundError(`Visit '${visitId}' not found`)
    if (visit.state !== 'pending') {
      throw new InvalidStateError(`Visit '${visitId}' is ${visit.state}; only pending visits can be signed`)
    }

    const id = uuid()
    await adapter.createSignatureRequest({ id, visitId, state: 'sent', createdAt: clock.now() })
    return id
  }

  async function complete(requestId: string, artifact: SignedArtifact): Promise<SignatureCompletion> {
    const req = await loadRequest(requestId)
    if (req.state !== 'sent') {
      throw new InvalidStateError(`Signature request '${requestId}' is already ${req.state}`)
    }
    const visit = await adapter.getVisit(req.visitId)
    if (!visit) throw new NotFoundError(`Visit '${req.visitId}' not found`)
    if (visit.state === 'cancelled') {
      throw new InvalidStateError(`Visit '${visit.id}' is cancelled`)
    }

    const completedAt = clock.now()
    const documentId = await adapter.transaction(async () => {
      await adapter.updateSignatureRequest(requestId, { state: 'signed', completedAt })
      await adapter.updateVisit(visit.id, { state: 'done' })

      if (visit.folderId === null) {
        logger.warn(`Visit '${visit.reference}' has no folder; signed artifact of request '${requestId}' not filed`)
        return null
      }
      const id = uuid()
      await adapter.createDocument({
        id,
        name: artifact.name ?? `Signed Visit Report - ${visit.reference}.pdf`,
        folderId: visit.folderId,
        mimeType: artifact.mimeType ?? 'application/pdf',
        content: artifact.content,
        visitId: visit.id,
        signatureRequestId: requestId,
        createdAt: completedAt,
      })
      return id
    })

    publish('visitCompleted', { visitId: visit.id, signatureRequestId: requestId })
    return { visitId: visit.id, documentId }
  }

  async function cancel(requestId: string): Promise<void> {
    const req = await loadRequest(requestId)
    if (req.state === 'cancelled') return
    if (req.state === 'signed') {
      throw new InvalidStateError(`Signature request '${requestId}' is already signed`)
    }
    await adapter.updateSignatureRequest(requestId, { state: 'cancelled' })
  }

  return {
    request,
    complete,
    cancel,
    listForVisit: (visitId) => adapter.getSignatureRequestsByVisit(visitId),
  }
}
