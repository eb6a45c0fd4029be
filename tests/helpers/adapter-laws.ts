/**
 * Laws every Adapter implementation must satisfy. Registered by the mock
 * adapter tests and the SQLite adapter tests against their own factory.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Adapter } from '../../src/adapter'
import {
  DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError,
} from '../../src/errors'
import {
  date, datetime, month, at,
  makeClient, makeContract, makeVisit, makeFolder,
} from './fixtures'

export function describeAdapterLaws(label: string, create: () => Promise<Adapter>): void {
  describe(`${label}: adapter laws`, () => {
    let adapter: Adapter

    beforeEach(async () => {
      adapter = await create()
      await adapter.createClient(makeClient('client-1'))
      await adapter.createContract(makeContract('contract-1', 'client-1'))
    })

    afterEach(async () => {
      await adapter.close?.()
    })

    // ========================================================================
    // Transactions
    // ========================================================================

    describe('Transaction Semantics', () => {
      it('transaction commits on success', async () => {
        await adapter.transaction(async () => {
          await adapter.createClient(makeClient('client-2', { name: 'Beta Ltd' }))
        })
        expect(await adapter.getClient('client-2')).not.toBeNull()
      })

      it('transaction returns value', async () => {
        const result = await adapter.transaction(async () => 42)
        expect(result).toBe(42)
      })

      it('transaction rolls back on error', async () => {
        await expect(
          adapter.transaction(async () => {
            await adapter.createClient(makeClient('client-2', { name: 'Beta Ltd' }))
            throw new Error('abort')
          }),
        ).rejects.toThrow('abort')
        expect(await adapter.getClient('client-2')).toBeNull()
      })

      it('nested rollback reverts all', async () => {
        await expect(
          adapter.transaction(async () => {
            await adapter.createClient(makeClient('client-2', { name: 'Beta Ltd' }))
            await adapter.transaction(async () => {
              await adapter.createClient(makeClient('client-3', { name: 'Gamma SA' }))
            })
            throw new Error('abort')
          }),
        ).rejects.toThrow('abort')
        expect(await adapter.getClient('client-2')).toBeNull()
        expect(await adapter.getClient('client-3')).toBeNull()
      })

      it('rollback reverts updates', async () => {
        await expect(
          adapter.transaction(async () => {
            await adapter.updateContract('contract-1', { state: 'closed' })
            throw new Error('abort')
          }),
        ).rejects.toThrow('abort')
        expect((await adapter.getContract('contract-1'))?.state).toBe('in_progress')
      })
    })

    // ========================================================================
    // Clients
    // ========================================================================

    describe('Client Operations', () => {
      it('create and get client', async () => {
        expect(await adapter.getClient('client-1')).toEqual(makeClient('client-1'))
      })

      it('get non-existent client returns null', async () => {
        expect(await adapter.getClient('missing')).toBeNull()
      })

      it('create duplicate ID throws DuplicateKeyError', async () => {
        await expect(adapter.createClient(makeClient('client-1'))).rejects.toThrow(DuplicateKeyError)
      })

      it('lists clients by name', async () => {
        await adapter.createClient(makeClient('client-2', { name: 'Aardvark Inc' }))
        const names = (await adapter.getAllClients()).map((c) => c.name)
        expect(names).toEqual(['Aardvark Inc', 'Acme Corp'])
      })

      it('returned records are copies', async () => {
        const client = await adapter.getClient('client-1')
        if (client) client.name = 'Changed'
        expect((await adapter.getClient('client-1'))?.name).toBe('Acme Corp')
      })
    })

    // ========================================================================
    // Contracts
    // ========================================================================

    describe('Contract Operations', () => {
      it('create and get contract', async () => {
        expect(await adapter.getContract('contract-1')).toEqual(makeContract('contract-1', 'client-1'))
      })

      it('unknown client throws ForeignKeyError', async () => {
        await expect(
          adapter.createContract(makeContract('contract-2', 'missing')),
        ).rejects.toThrow(ForeignKeyError)
      })

      it('non-positive visitsPerMonth throws InvalidDataError', async () => {
        await expect(
          adapter.createContract(makeContract('contract-2', 'client-1', { visitsPerMonth: 0 })),
        ).rejects.toThrow(InvalidDataError)
      })

      it('end before start throws InvalidDataError', async () => {
        await expect(
          adapter.createContract(
            makeContract('contract-2', 'client-1', { startDate: date('2025-03-01'), endDate: date('2025-02-28') }),
          ),
        ).rejects.toThrow(InvalidDataError)
      })

      it('update preserves unspecified fields', async () => {
        await adapter.updateContract('contract-1', { state: 'closed' })
        const contract = await adapter.getContract('contract-1')
        expect(contract?.state).toBe('closed')
        expect(contract?.visitsPerMonth).toBe(8)
        expect(contract?.name).toBe('Elevator Maintenance')
      })

      it('update non-existent throws NotFoundError', async () => {
        await expect(adapter.updateContract('missing', { state: 'closed' })).rejects.toThrow(NotFoundError)
      })

      it('lists contracts by state', async () => {
        await adapter.createContract(makeContract('contract-2', 'client-1', { state: 'draft' }))
        const drafts = await adapter.getContractsByState('draft')
        expect(drafts.map((c) => c.id)).toEqual(['contract-2'])
      })

      it('active contracts are in progress and already started', async () => {
        await adapter.createContract(makeContract('contract-2', 'client-1', { startDate: date('2025-03-01') }))
        await adapter.createContract(makeContract('contract-3', 'client-1', { state: 'draft' }))
        const active = await adapter.listActiveContracts(date('2025-02-10'))
        expect(active.map((c) => c.id)).toEqual(['contract-1'])
      })
    })

    // ========================================================================
    // Visits
    // ========================================================================

    describe('Visit Operations', () => {
      it('create and get visit', async () => {
        const visit = makeVisit('visit-1')
        await adapter.createVisit(visit)
        expect(await adapter.getVisit('visit-1')).toEqual(visit)
      })

      it('optional details survive a round trip', async () => {
        const visit = makeVisit('visit-1', {
          reason: 'Client request',
          engineerId: 'eng-7',
          description: 'Annual inspection',
          address: '1 Main St',
        })
        await adapter.createVisit(visit)
        expect(await adapter.getVisit('visit-1')).toEqual(visit)
      })

      it('duplicate slot throws DuplicateKeyError', async () => {
        await adapter.createVisit(makeVisit('visit-1', { sequence: 1 }))
        await expect(adapter.createVisit(makeVisit('visit-2', { sequence: 1 }))).rejects.toThrow(DuplicateKeyError)
      })

      it('cancelled visit frees its slot', async () => {
        await adapter.createVisit(makeVisit('visit-1', { sequence: 1, state: 'cancelled' }))
        await adapter.createVisit(makeVisit('visit-2', { sequence: 1 }))
        expect(await adapter.getVisit('visit-2')).not.toBeNull()
      })

      it('sequence below 1 throws InvalidDataError', async () => {
        await expect(adapter.createVisit(makeVisit('visit-1', { sequence: 0 }))).rejects.toThrow(InvalidDataError)
      })

      it('unknown contract throws ForeignKeyError', async () => {
        await expect(
          adapter.createVisit(makeVisit('visit-1', { contractId: 'missing' })),
        ).rejects.toThrow(ForeignKeyError)
      })

      it('month visits exclude cancelled and sort by sequence', async () => {
        await adapter.createVisit(makeVisit('visit-a', { sequence: 3 }))
        await adapter.createVisit(makeVisit('visit-b', { sequence: 1 }))
        await adapter.createVisit(makeVisit('visit-c', { sequence: 2, state: 'cancelled' }))
        await adapter.createVisit(makeVisit('visit-d', { sequence: 1, month: month('2025-03') }))
        const visits = await adapter.getVisitsForMonth('contract-1', month('2025-02'))
        expect(visits.map((v) => v.id)).toEqual(['visit-b', 'visit-a'])
      })

      it('ad hoc month visits only include visits without contract', async () => {
        await adapter.createVisit(makeVisit('visit-1'))
        await adapter.createVisit(makeVisit('visit-2', { contractId: null, kind: 'adhoc' }))
        const visits = await adapter.getAdHocVisitsForMonth(month('2025-02'))
        expect(visits.map((v) => v.id)).toEqual(['visit-2'])
      })

      it('filters visits', async () => {
        await adapter.createVisit(makeVisit('visit-1', { sequence: 1 }))
        await adapter.createVisit(makeVisit('visit-2', { sequence: 2, kind: 'extra' }))
        await adapter.createVisit(makeVisit('visit-3', { sequence: 1, month: month('2025-01'), state: 'done' }))
        expect((await adapter.getVisits({ kind: 'extra' })).map((v) => v.id)).toEqual(['visit-2'])
        expect((await adapter.getVisits({ state: 'done' })).map((v) => v.id)).toEqual(['visit-3'])
        expect((await adapter.getVisits({ contractId: 'contract-1' })).map((v) => v.id))
          .toEqual(['visit-3', 'visit-1', 'visit-2'])
      })

      it('update visit', async () => {
        await adapter.createVisit(makeVisit('visit-1'))
        await adapter.updateVisit('visit-1', { state: 'done', engineerId: 'eng-1' })
        const visit = await adapter.getVisit('visit-1')
        expect(visit?.state).toBe('done')
        expect(visit?.engineerId).toBe('eng-1')
        expect(visit?.sequence).toBe(1)
      })

      it('update non-existent throws NotFoundError', async () => {
        await expect(adapter.updateVisit('missing', { state: 'done' })).rejects.toThrow(NotFoundError)
      })
    })

    // ========================================================================
    // Folders & Documents
    // ========================================================================

    describe('Folder Operations', () => {
      beforeEach(async () => {
        await adapter.createFolder(makeFolder('root', { name: 'Acme Corp', contractId: 'contract-1' }))
        await adapter.createFolder(
          makeFolder('feb', { name: '2025-02 (February)', parentId: 'root', contractId: 'contract-1', month: month('2025-02') }),
        )
      })

      it('finds a month folder under its root', async () => {
        expect((await adapter.getFolderByMonth('root', month('2025-02')))?.id).toBe('feb')
        expect(await adapter.getFolderByMonth('root', month('2025-03'))).toBeNull()
      })

      it('second folder for the same month throws DuplicateKeyError', async () => {
        await expect(
          adapter.createFolder(makeFolder('feb-2', { parentId: 'root', month: month('2025-02') })),
        ).rejects.toThrow(DuplicateKeyError)
      })

      it('unknown parent throws ForeignKeyError', async () => {
        await expect(adapter.createFolder(makeFolder('orphan', { parentId: 'missing' }))).rejects.toThrow(ForeignKeyError)
      })

      it('separates roots from children', async () => {
        expect((await adapter.getRootFolders()).map((f) => f.id)).toEqual(['root'])
        expect((await adapter.getChildFolders('root')).map((f) => f.id)).toEqual(['feb'])
      })

      it('stores document content', async () => {
        await adapter.createDocument({
          id: 'doc-1',
          name: 'report.txt',
          folderId: 'feb',
          mimeType: 'text/plain',
          content: new Uint8Array([1, 2, 3]),
          visitId: null,
          signatureRequestId: null,
          createdAt: datetime('2025-02-10T12:00:00'),
        })
        const doc = await adapter.getDocument('doc-1')
        expect(Array.from(doc?.content ?? [])).toEqual([1, 2, 3])
        expect((await adapter.getDocumentsByFolder('feb')).map((d) => d.id)).toEqual(['doc-1'])
      })

      it('document in unknown folder throws ForeignKeyError', async () => {
        await expect(
          adapter.createDocument({
            id: 'doc-1',
            name: 'report.txt',
            folderId: 'missing',
            mimeType: 'text/plain',
            content: new Uint8Array([1]),
            visitId: null,
            signatureRequestId: null,
            createdAt: datetime('2025-02-10T12:00:00'),
          }),
        ).rejects.toThrow(ForeignKeyError)
      })
    })

    // ========================================================================
    // Signature Requests
    // ========================================================================

    describe('Signature Request Operations', () => {
      beforeEach(async () => {
        await adapter.createVisit(makeVisit('visit-1'))
      })

      it('create, update and list', async () => {
        await adapter.createSignatureRequest({
          id: 'sig-1', visitId: 'visit-1', state: 'sent', createdAt: datetime('2025-02-10T12:00:00'),
        })
        await adapter.updateSignatureRequest('sig-1', { state: 'signed', completedAt: datetime('2025-02-11T09:00:00') })
        const requests = await adapter.getSignatureRequestsByVisit('visit-1')
        expect(requests).toHaveLength(1)
        expect(at(requests, 0)).toEqual({
          id: 'sig-1',
          visitId: 'visit-1',
          state: 'signed',
          createdAt: '2025-02-10T12:00:00',
          completedAt: '2025-02-11T09:00:00',
        })
      })

      it('unknown visit throws ForeignKeyError', async () => {
        await expect(
          adapter.createSignatureRequest({
            id: 'sig-1', visitId: 'missing', state: 'sent', createdAt: datetime('2025-02-10T12:00:00'),
          }),
        ).rejects.toThrow(ForeignKeyError)
      })

      it('update non-existent throws NotFoundError', async () => {
        await expect(adapter.updateSignatureRequest('missing', { state: 'cancelled' })).rejects.toThrow(NotFoundError)
      })
    })
  })
}
