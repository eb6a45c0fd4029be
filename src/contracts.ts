/**
 * Contracts
 *
 * Contract validation and lifecycle: draft → in progress → closed.
 * Activation lays out the folder tree and generates the visits of the
 * activation month; closing happens manually or once the end date has passed.
 */

import { type LocalDate, yearMonthOf, monthsInRange } from './time-date'
import type { Contract } from './adapter'
import { ValidationError, NotFoundError, InvalidStateError } from './errors'
import { createContractFolders } from './folders'
import type { VisitGenerator } from './visit-generator'
import type { DomainDeps } from './internal/types'
import { uuid, validateDate, requireText } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type ContractInput = {
  name: string
  clientId: string
  startDate: string
  endDate: string
  visitsPerMonth: number
}

export type ContractUpdate = Partial<ContractInput>

export type ContractSummary = {
  contract: Contract
  /** visitsPerMonth × calendar months covered by the contract */
  totalExpected: number
  generated: number
  pending: number
  done: number
  cancelled: number
  extra: number
}

export type ActivationResult = {
  contract: Contract
  createdVisitIds: string[]
}

export type ContractManager = {
  create(input: ContractInput): Promise<string>
  get(id: string): Promise<Contract | null>
  update(id: string, changes: ContractUpdate): Promise<void>
  activate(id: string): Promise<ActivationResult>
  close(id: string): Promise<void>
  closeExpired(asOf: LocalDate): Promise<string[]>
  summary(id: string): Promise<ContractSummary>
}

// ============================================================================
// Pure Helpers
// ============================================================================

export function contractMonthCount(contract: Pick<Contract, 'startDate' | 'endDate'>): number {
  return monthsInRange(contract.startDate, contract.endDate).length
}

/** No proration: partial first and last months carry the full quota */
export function totalContractVisits(contract: Pick<Contract, 'startDate' | 'endDate' | 'visitsPerMonth'>): number {
  return contract.visitsPerMonth * contractMonthCount(contract)
}

function validateContractInput(input: ContractInput): Omit<Contract, 'id' | 'state' | 'folderId' | 'createdAt' | 'updatedAt'> {
  const name = requireText(input.name, 'Contract name')
  const clientId = requireText(input.clientId, 'clientId')
  const startDate = validateDate(input.startDate, 'startDate')
  const endDate = validateDate(input.endDate, 'endDate')
  if (endDate < startDate) {
    throw new ValidationError('endDate must be >= startDate')
  }
  if (!Number.isInteger(input.visitsPerMonth) || input.visitsPerMonth <= 0) {
    throw new ValidationError('visitsPerMonth must be a positive integer')
  }
  return { name, clientId, startDate, endDate, visitsPerMonth: input.visitsPerMonth }
}

// ============================================================================
// Manager
// ============================================================================

type ContractManagerDeps = DomainDeps & {
  generator: VisitGenerator
}

export function createContractManager(deps: ContractManagerDeps): ContractManager {
  const { adapter, publish, clock, generator } = deps

  async function load(id: string): Promise<Contract> {
    const contract = await adapter.getContract(id)
    if (!contract) throw new NotFoundError(`Contract '${id}' not found`)
    return contract
  }

  async function create(input: ContractInput): Promise<string> {
    const fields = validateContractInput(input)
    const client = await adapter.getClient(fields.clientId)
    if (!client) throw new NotFoundError(`Client '${fields.clientId}' not found`)

    const id = uuid()
    const now = clock.now()
    await adapter.createContract({
      id,
      ...fields,
      state: 'draft',
      folderId: null,
      createdAt: now,
      updatedAt: now,
    })
    return id
  }

  async function update(id: string, changes: ContractUpdate): Promise<void> {
    const existing = await load(id)
    if (existing.state !== 'draft') {
      throw new InvalidStateError(`Contract '${id}' can only be edited while in draft`)
    }
    const fields = validateContractInput({ ...existing, ...changes })
    if (fields.clientId !== existing.clientId && !(await adapter.getClient(fields.clientId))) {
      throw new NotFoundError(`Client '${fields.clientId}' not found`)
    }
    await adapter.updateContract(id, { ...fields, updatedAt: clock.now() })
  }

  async function activate(id: string): Promise<ActivationResult> {
    const draft = await load(id)
    if (draft.state !== 'draft') {
      throw new InvalidStateError('The contract must be in a draft state to start it')
    }

    await adapter.transaction(async () => {
      await createContractFolders(adapter, draft)
      await adapter.updateContract(id, { state: 'in_progress', updatedAt: clock.now() })
    })
    publish('contractActivated', { contractId: id })

    const contract = await load(id)
    const createdVisitIds = await generator.generate(contract, yearMonthOf(clock.today()))
    return { contract, createdVisitIds }
  }

  async function close(id: string): Promise<void> {
    const contract = await load(id)
    if (contract.state !== 'in_progress') {
      throw new InvalidStateError(`Only in-progress contracts can be closed; '${id}' is ${contract.state}`)
    }
    await adapter.updateContract(id, { state: 'closed', updatedAt: clock.now() })
    publish('contractClosed', { contractId: id })
  }

  async function closeExpired(asOf: LocalDate): Promise<string[]> {
    const expired = (await adapter.getContractsByState('in_progress')).filter((c) => c.endDate < asOf)
    if (expired.length === 0) return []

    const now = clock.now()
    await adapter.transaction(async () => {
      for (const contract of expired) {
        await adapter.updateContract(contract.id, { state: 'closed', updatedAt: now })
      }
    })
    for (const contract of expired) {
      publish('contractClosed', { contractId: contract.id })
    }
    return expired.map((c) => c.id)
  }

  async function summary(id: string): Promise<ContractSummary> {
    const contract = await load(id)
    const visits = await adapter.getVisits({ contractId: id })
    const count = (pred: (v: (typeof visits)[number]) => boolean) => visits.filter(pred).length
    return {
      contract,
      totalExpected: totalContractVisits(contract),
      generated: count((v) => v.state !== 'cancelled'),
      pending: count((v) => v.state === 'pending'),
      done: count((v) => v.state === 'done'),
      cancelled: count((v) => v.state === 'cancelled'),
      extra: count((v) => v.kind === 'extra' && v.state !== 'cancelled'),
    }
  }

  return {
    create,
    get: (id) => adapter.getContract(id),
    update,
    activate,
    close,
    closeExpired,
    summary,
  }
}
