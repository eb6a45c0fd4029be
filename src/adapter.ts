/**
 * Adapter
 *
 * Domain-oriented persistence interface + in-memory mock implementation.
 * All methods are async so synchronous (better-sqlite3) and network-backed
 * adapters share one contract.
 */

import type { LocalDate, LocalDateTime, YearMonth } from './time-date'
import type {
  ContractState, VisitState, VisitKind, SignatureState,
} from './domain-types'
import { DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError } from './errors'

export type { LocalDate, LocalDateTime, YearMonth } from './time-date'
export type { ContractState, VisitState, VisitKind, SignatureState } from './domain-types'

// ============================================================================
// Error Classes
// ============================================================================

export { DuplicateKeyError, NotFoundError, ForeignKeyError, InvalidDataError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

export type Client = {
  id: string
  name: string
  address?: string
  createdAt: LocalDateTime
}

export type Contract = {
  id: string
  name: string
  clientId: string
  startDate: LocalDate
  endDate: LocalDate
  visitsPerMonth: number
  state: ContractState
  folderId: string | null
  createdAt: LocalDateTime
  updatedAt: LocalDateTime
}

export type Visit = {
  id: string
  reference: string
  contractId: string | null
  clientId: string
  folderId: string | null
  month: YearMonth
  sequence: number
  state: VisitState
  kind: VisitKind
  visitDate: LocalDate
  reason?: string
  engineerId?: string
  description?: string
  address?: string
  reportDocumentId: string | null
  createdAt: LocalDateTime
}

export type Folder = {
  id: string
  name: string
  parentId: string | null
  contractId: string | null
  month: YearMonth | null
}

export type VisitDocument = {
  id: string
  name: string
  folderId: string
  mimeType: string
  content: Uint8Array
  visitId: string | null
  signatureRequestId: string | null
  createdAt: LocalDateTime
}

export type SignatureRequest = {
  id: string
  visitId: string
  state: SignatureState
  createdAt: LocalDateTime
  completedAt?: LocalDateTime
}

export type VisitFilter = {
  contractId?: string
  clientId?: string
  month?: YearMonth
  state?: VisitState
  kind?: VisitKind
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  /** Runs fn all-or-nothing; nested calls join the outermost transaction */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Client
  createClient(client: Client): Promise<void>
  getClient(id: string): Promise<Client | null>
  getAllClients(): Promise<Client[]>

  // Contract
  createContract(contract: Contract): Promise<void>
  getContract(id: string): Promise<Contract | null>
  getContractsByState(state: ContractState): Promise<Contract[]>
  /** In-progress contracts that have started on or before asOf */
  listActiveContracts(asOf: LocalDate): Promise<Contract[]>
  updateContract(id: string, changes: Partial<Contract>): Promise<void>

  // Visit
  createVisit(visit: Visit): Promise<void>
  getVisit(id: string): Promise<Visit | null>
  getVisits(filter: VisitFilter): Promise<Visit[]>
  /** Non-cancelled visits of a contract month, ascending by sequence */
  getVisitsForMonth(contractId: string, month: YearMonth): Promise<Visit[]>
  /** Non-cancelled non-contracted visits of a month, ascending by sequence */
  getAdHocVisitsForMonth(month: YearMonth): Promise<Visit[]>
  updateVisit(id: string, changes: Partial<Visit>): Promise<void>

  // Folder
  createFolder(folder: Folder): Promise<void>
  getFolder(id: string): Promise<Folder | null>
  getRootFolders(): Promise<Folder[]>
  getChildFolders(parentId: string): Promise<Folder[]>
  getFolderByMonth(parentId: string, month: YearMonth): Promise<Folder | null>

  // Document
  createDocument(document: VisitDocument): Promise<void>
  getDocument(id: string): Promise<VisitDocument | null>
  getDocumentsByFolder(folderId: string): Promise<VisitDocument[]>
  getDocumentsByVisit(visitId: string): Promise<VisitDocument[]>

  // Signature Request
  createSignatureRequest(request: SignatureRequest): Promise<void>
  getSignatureRequest(id: string): Promise<SignatureRequest | null>
  getSignatureRequestsByVisit(visitId: string): Promise<SignatureRequest[]>
  updateSignatureRequest(id: string, changes: Partial<SignatureRequest>): Promise<void>

  // Lifecycle (persistent adapters implement)
  close?(): Promise<void>
}

// ============================================================================
// Shared Ordering
// ============================================================================

export function compareVisits(a: Visit, b: Visit): number {
  if (a.month !== b.month) return a.month < b.month ? -1 : 1
  if (a.sequence !== b.sequence) return a.sequence - b.sequence
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

function byNameThenId(a: { name: string; id: string }, b: { name: string; id: string }): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

function byCreationThenId(a: Contract, b: Contract): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  let state = {
    clients: new Map<string, Client>(),
    contracts: new Map<string, Contract>(),
    visits: new Map<string, Visit>(),
    folders: new Map<string, Folder>(),
    documents: new Map<string, VisitDocument>(),
    signatureRequests: new Map<string, SignatureRequest>(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: typeof state | null = null

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function requireClient(id: string) {
    if (!state.clients.has(id)) throw new ForeignKeyError(`Client '${id}' does not exist`)
  }

  function requireFolder(id: string | null) {
    if (id !== null && !state.folders.has(id)) {
      throw new ForeignKeyError(`Folder '${id}' does not exist`)
    }
  }

  function requireVisit(id: string | null) {
    if (id !== null && !state.visits.has(id)) {
      throw new ForeignKeyError(`Visit '${id}' does not exist`)
    }
  }

  function checkContract(contract: Contract) {
    if (!Number.isInteger(contract.visitsPerMonth) || contract.visitsPerMonth <= 0) {
      throw new InvalidDataError(`visitsPerMonth must be a positive integer, got ${contract.visitsPerMonth}`)
    }
    if (contract.endDate < contract.startDate) {
      throw new InvalidDataError(`Contract '${contract.id}' ends before it starts`)
    }
    requireClient(contract.clientId)
    requireFolder(contract.folderId)
  }

  function checkVisit(visit: Visit) {
    if (!Number.isInteger(visit.sequence) || visit.sequence < 1) {
      throw new InvalidDataError(`Visit sequence must be >= 1, got ${visit.sequence}`)
    }
    requireClient(visit.clientId)
    if (visit.contractId !== null && !state.contracts.has(visit.contractId)) {
      throw new ForeignKeyError(`Contract '${visit.contractId}' does not exist`)
    }
    requireFolder(visit.folderId)
    if (visit.reportDocumentId !== null && !state.documents.has(visit.reportDocumentId)) {
      throw new ForeignKeyError(`Document '${visit.reportDocumentId}' does not exist`)
    }

    // (contract, month, sequence) is unique among non-cancelled contract visits
    if (visit.contractId === null || visit.state === 'cancelled') return
    for (const other of state.visits.values()) {
      if (
        other.id !== visit.id &&
        other.contractId === visit.contractId &&
        other.month === visit.month &&
        other.sequence === visit.sequence &&
        other.state !== 'cancelled'
      ) {
        throw new DuplicateKeyError(
          `Visit ${visit.month}#${visit.sequence} already exists for contract '${visit.contractId}'`,
        )
      }
    }
  }

  function matches(visit: Visit, filter: VisitFilter): boolean {
    if (filter.contractId !== undefined && visit.contractId !== filter.contractId) return false
    if (filter.clientId !== undefined && visit.clientId !== filter.clientId) return false
    if (filter.month !== undefined && visit.month !== filter.month) return false
    if (filter.state !== undefined && visit.state !== filter.state) return false
    if (filter.kind !== undefined && visit.kind !== filter.kind) return false
    return true
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      const isOutermost = txDepth === 0
      if (isOutermost) {
        snapshot = clone(state)
      }
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          state = snapshot
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Client
    // ================================================================
    async createClient(client: Client) {
      if (state.clients.has(client.id)) {
        throw new DuplicateKeyError(`Client '${client.id}' already exists`)
      }
      state.clients.set(client.id, clone(client))
    },

    async getClient(id: string) {
      const c = state.clients.get(id)
      return c ? clone(c) : null
    },

    async getAllClients() {
      return [...state.clients.values()].sort(byNameThenId).map(clone)
    },

    // ================================================================
    // Contract
    // ================================================================
    async createContract(contract: Contract) {
      if (state.contracts.has(contract.id)) {
        throw new DuplicateKeyError(`Contract '${contract.id}' already exists`)
      }
      checkContract(contract)
      state.contracts.set(contract.id, clone(contract))
    },

    async getContract(id: string) {
      const c = state.contracts.get(id)
      return c ? clone(c) : null
    },

    async getContractsByState(contractState: ContractState) {
      return [...state.contracts.values()]
        .filter((c) => c.state === contractState)
        .sort(byCreationThenId)
        .map(clone)
    },

    async listActiveContracts(asOf: LocalDate) {
      return [...state.contracts.values()]
        .filter((c) => c.state === 'in_progress' && c.startDate <= asOf)
        .sort(byCreationThenId)
        .map(clone)
    },

    async updateContract(id: string, changes: Partial<Contract>) {
      const existing = state.contracts.get(id)
      if (!existing) throw new NotFoundError(`Contract '${id}' not found`)
      const merged = { ...existing, ...changes, id }
      checkContract(merged)
      state.contracts.set(id, clone(merged))
    },

    // ================================================================
    // Visit
    // ================================================================
    async createVisit(visit: Visit) {
      if (state.visits.has(visit.id)) {
        throw new DuplicateKeyError(`Visit '${visit.id}' already exists`)
      }
      checkVisit(visit)
      state.visits.set(visit.id, clone(visit))
    },

    async getVisit(id: string) {
      const v = state.visits.get(id)
      return v ? clone(v) : null
    },

    async getVisits(filter: VisitFilter) {
      return [...state.visits.values()]
        .filter((v) => matches(v, filter))
        .sort(compareVisits)
        .map(clone)
    },

    async getVisitsForMonth(contractId: string, month: YearMonth) {
      return [...state.visits.values()]
        .filter((v) => v.contractId === contractId && v.month === month && v.state !== 'cancelled')
        .sort(compareVisits)
        .map(clone)
    },

    async getAdHocVisitsForMonth(month: YearMonth) {
      return [...state.visits.values()]
        .filter((v) => v.contractId === null && v.month === month && v.state !== 'cancelled')
        .sort(compareVisits)
        .map(clone)
    },

    async updateVisit(id: string, changes: Partial<Visit>) {
      const existing = state.visits.get(id)
      if (!existing) throw new NotFoundError(`Visit '${id}' not found`)
      const merged = { ...existing, ...changes, id }
      checkVisit(merged)
      state.visits.set(id, clone(merged))
    },

    // ================================================================
    // Folder
    // ================================================================
    async createFolder(folder: Folder) {
      if (state.folders.has(folder.id)) {
        throw new DuplicateKeyError(`Folder '${folder.id}' already exists`)
      }
      requireFolder(folder.parentId)
      if (folder.contractId !== null && !state.contracts.has(folder.contractId)) {
        throw new ForeignKeyError(`Contract '${folder.contractId}' does not exist`)
      }
      if (folder.parentId !== null && folder.month !== null) {
        for (const other of state.folders.values()) {
          if (other.parentId === folder.parentId && other.month === folder.month) {
            throw new DuplicateKeyError(`Folder for ${folder.month} already exists under '${folder.parentId}'`)
          }
        }
      }
      state.folders.set(folder.id, clone(folder))
    },

    async getFolder(id: string) {
      const f = state.folders.get(id)
      return f ? clone(f) : null
    },

    async getRootFolders() {
      return [...state.folders.values()]
        .filter((f) => f.parentId === null)
        .sort(byNameThenId)
        .map(clone)
    },

    async getChildFolders(parentId: string) {
      return [...state.folders.values()]
        .filter((f) => f.parentId === parentId)
        .sort(byNameThenId)
        .map(clone)
    },

    async getFolderByMonth(parentId: string, month: YearMonth) {
      const f = [...state.folders.values()].find((x) => x.parentId === parentId && x.month === month)
      return f ? clone(f) : null
    },

    // ================================================================
    // Document
    // ================================================================
    async createDocument(document: VisitDocument) {
      if (state.documents.has(document.id)) {
        throw new DuplicateKeyError(`Document '${document.id}' already exists`)
      }
      requireFolder(document.folderId)
      requireVisit(document.visitId)
      if (document.signatureRequestId !== null && !state.signatureRequests.has(document.signatureRequestId)) {
        throw new ForeignKeyError(`Signature request '${document.signatureRequestId}' does not exist`)
      }
      state.documents.set(document.id, clone(document))
    },

    async getDocument(id: string) {
      const d = state.documents.get(id)
      return d ? clone(d) : null
    },

    async getDocumentsByFolder(folderId: string) {
      return [...state.documents.values()]
        .filter((d) => d.folderId === folderId)
        .sort(byNameThenId)
        .map(clone)
    },

    async getDocumentsByVisit(visitId: string) {
      return [...state.documents.values()]
        .filter((d) => d.visitId === visitId)
        .sort(byNameThenId)
        .map(clone)
    },

    // ================================================================
    // Signature Request
    // ================================================================
    async createSignatureRequest(request: SignatureRequest) {
      if (state.signatureRequests.has(request.id)) {
        throw new DuplicateKeyError(`Signature request '${request.id}' already exists`)
      }
      requireVisit(request.visitId)
      state.signatureRequests.set(request.id, clone(request))
    },

    async getSignatureRequest(id: string) {
      const r = state.signatureRequests.get(id)
      return r ? clone(r) : null
    },

    async getSignatureRequestsByVisit(visitId: string) {
      return [...state.signatureRequests.values()]
        .filter((r) => r.visitId === visitId)
        .sort((a, b) => (a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0))
        .map(clone)
    },

    async updateSignatureRequest(id: string, changes: Partial<SignatureRequest>) {
      const existing = state.signatureRequests.get(id)
      if (!existing) throw new NotFoundError(`Signature request '${id}' not found`)
      state.signatureRequests.set(id, clone({ ...existing, ...changes, id }))
    },
  }

  return adapter
}
