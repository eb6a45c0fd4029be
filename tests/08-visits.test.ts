/**
 * Segment 08: Visits
 *
 * Engineer-facing visit operations and non-contracted (ad hoc) visits.
 *
 * Dependencies: Segments 01-07
 */
import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest'
import { createMockAdapter, type Adapter } from '../src/adapter'
import { createVisitGenerator, type VisitGenerator } from '../src/visit-generator'
import { createVisitManager, type VisitManager } from '../src/visits'
import { AD_HOC_ROOT_NAME } from '../src/folders'
import { InvalidStateError, NotFoundError, ValidationError } from '../src/errors'
import { month, at, fixedClock, seedContract } from './helpers/fixtures'
import type { Contract } from '../src/adapter'

let adapter: Adapter
let publish: Mock
let generator: VisitGenerator
let visits: VisitManager
let contract: Contract
let ids: string[]

beforeEach(async () => {
  adapter = createMockAdapter()
  publish = vi.fn()
  const deps = { adapter, publish, clock: fixedClock() }
  generator = createVisitGenerator(deps)
  visits = createVisitManager(deps)
  contract = await seedContract(adapter)
  ids = await generator.generate(contract, month('2025-02'))
  publish.mockClear()
})

describe('Segment 08: Visits', () => {
  describe('Details', () => {
    it('updates engineer-facing details', async () => {
      const id = at(ids, 0)
      await visits.updateDetails(id, {
        visitDate: '2025-02-14',
        engineerId: 'eng-1',
        description: 'Replaced door sensor',
      })
      expect(await visits.get(id)).toMatchObject({
        visitDate: '2025-02-14',
        engineerId: 'eng-1',
        description: 'Replaced door sensor',
        address: '1 Main St',
      })
    })

    it('rejects an invalid visit date', async () => {
      await expect(visits.updateDetails(at(ids, 0), { visitDate: '2025-02-30' }))
        .rejects.toThrow(ValidationError)
    })

    it('cancelled visits cannot be edited', async () => {
      await visits.cancel(at(ids, 0))
      await expect(visits.updateDetails(at(ids, 0), { engineerId: 'eng-1' }))
        .rejects.toThrow(InvalidStateError)
    })

    it('unknown visit throws NotFoundError', async () => {
      expect(await visits.get('missing')).toBeNull()
      await expect(visits.updateDetails('missing', {})).rejects.toThrow(NotFoundError)
    })
  })

  describe('Completion', () => {
    it('marks a visit done and publishes visitCompleted', async () => {
      await visits.markDone(at(ids, 0))
      expect((await visits.get(at(ids, 0)))?.state).toBe('done')
      expect(publish).toHaveBeenCalledWith('visitCompleted', { visitId: at(ids, 0), signatureRequestId: null })
    })

    it('marking a done visit again is a no-op', async () => {
      await visits.markDone(at(ids, 0))
      await visits.markDone(at(ids, 0))
      expect(publish).toHaveBeenCalledTimes(1)
    })

    it('cancelled visits cannot be completed', async () => {
      await visits.cancel(at(ids, 0))
      await expect(visits.markDone(at(ids, 0))).rejects.toThrow(InvalidStateError)
    })
  })

  describe('Cancellation', () => {
    it('cancels a pending visit', async () => {
      await visits.cancel(at(ids, 0))
      await visits.cancel(at(ids, 0))
      expect((await visits.get(at(ids, 0)))?.state).toBe('cancelled')
    })

    it('done visits cannot be cancelled', async () => {
      await visits.markDone(at(ids, 0))
      await expect(visits.cancel(at(ids, 0))).rejects.toThrow(InvalidStateError)
    })

    it('cancelling frees a slot for the next generation run', async () => {
      await visits.cancel(at(ids, 7))
      const again = await generator.generate(contract, month('2025-02'))
      expect(again).toHaveLength(1)
      expect((await visits.get(at(again, 0)))?.sequence).toBe(8)
    })

    it('lists visits by state', async () => {
      await visits.cancel(at(ids, 0))
      await visits.markDone(at(ids, 1))
      expect((await visits.list({ state: 'cancelled' })).map((v) => v.id)).toEqual([at(ids, 0)])
      expect((await visits.list({ state: 'pending' }))).toHaveLength(6)
      expect(await visits.list()).toHaveLength(8)
    })
  })

  describe('Non-contracted visits', () => {
    it('creates a visit outside any contract', async () => {
      const id = await visits.createAdHoc({
        clientId: 'client-1',
        visitDate: '2025-03-05',
        reason: 'Emergency repair',
      })
      const visit = await visits.get(id)
      expect(visit).toMatchObject({
        reference: 'Acme Corp/2025-03/001',
        contractId: null,
        clientId: 'client-1',
        month: '2025-03',
        sequence: 1,
        state: 'pending',
        kind: 'adhoc',
        visitDate: '2025-03-05',
        reason: 'Emergency repair',
        address: '1 Main St',
      })
      expect(publish).toHaveBeenCalledWith('visitCreated', {
        visitId: id,
        contractId: null,
        month: '2025-03',
        kind: 'adhoc',
      })
    })

    it('files the visit under the shared root', async () => {
      const id = await visits.createAdHoc({ clientId: 'client-1' })
      const visit = await visits.get(id)
      const folder = await adapter.getFolder(visit?.folderId ?? '')
      expect(folder?.name).toBe('2025-02 (February)')
      const root = await adapter.getFolder(folder?.parentId ?? '')
      expect(root?.name).toBe(AD_HOC_ROOT_NAME)
    })

    it('defaults to today and numbers visits per month', async () => {
      const first = await visits.createAdHoc({ clientId: 'client-1' })
      const second = await visits.createAdHoc({ clientId: 'client-1', address: '9 Side Rd' })
      expect(await visits.get(first)).toMatchObject({ visitDate: '2025-02-10', sequence: 1 })
      expect(await visits.get(second)).toMatchObject({
        reference: 'Acme Corp/2025-02/002',
        sequence: 2,
        address: '9 Side Rd',
      })
    })

    it('unknown client throws NotFoundError', async () => {
      await expect(visits.createAdHoc({ clientId: 'missing' })).rejects.toThrow(NotFoundError)
    })
  })
})
