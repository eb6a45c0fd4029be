/**
 * Shared test fixtures: fixed clock, silent logger, entity builders.
 */
import { vi } from 'vitest'
import type { LocalDate, LocalDateTime, YearMonth } from '../../src/time-date'
import type { Adapter, Client, Contract, Visit, Folder } from '../../src/adapter'
import type { Clock } from '../../src/internal/types'

export function date(iso: string): LocalDate {
  return iso as LocalDate
}

export function datetime(iso: string): LocalDateTime {
  return iso as LocalDateTime
}

export function month(ym: string): YearMonth {
  return ym as YearMonth
}

/** Element at index, failing the test when absent */
export function at<T>(items: readonly T[], index: number): T {
  const item = items[index]
  if (item === undefined) throw new Error(`No element at index ${index} (length ${items.length})`)
  return item
}

export const TODAY = date('2025-02-10')
export const NOW = datetime('2025-02-10T12:00:00')

export function fixedClock(today: LocalDate = TODAY, now: LocalDateTime = NOW): Clock {
  return { today: () => today, now: () => now }
}

export function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

// ============================================================================
// Entity Builders
// ============================================================================

export function makeClient(id: string, overrides: Partial<Client> = {}): Client {
  return { id, name: 'Acme Corp', address: '1 Main St', createdAt: NOW, ...overrides }
}

export function makeContract(id: string, clientId: string, overrides: Partial<Contract> = {}): Contract {
  return {
    id,
    name: 'Elevator Maintenance',
    clientId,
    startDate: date('2025-01-01'),
    endDate: date('2025-03-31'),
    visitsPerMonth: 8,
    state: 'in_progress',
    folderId: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  }
}

export function makeVisit(id: string, overrides: Partial<Visit> = {}): Visit {
  return {
    id,
    reference: `REF/${id}`,
    contractId: 'contract-1',
    clientId: 'client-1',
    folderId: null,
    month: month('2025-02'),
    sequence: 1,
    state: 'pending',
    kind: 'scheduled',
    visitDate: date('2025-02-01'),
    reportDocumentId: null,
    createdAt: NOW,
    ...overrides,
  }
}

export function makeFolder(id: string, overrides: Partial<Folder> = {}): Folder {
  return { id, name: id, parentId: null, contractId: null, month: null, ...overrides }
}

/** Stores client-1 and an in-progress contract-1 (2025-01-01..2025-03-31, 8 per month) */
export async function seedContract(adapter: Adapter, overrides: Partial<Contract> = {}): Promise<Contract> {
  if (!(await adapter.getClient('client-1'))) {
    await adapter.createClient(makeClient('client-1'))
  }
  const contract = makeContract(overrides.id ?? 'contract-1', 'client-1', overrides)
  await adapter.createContract(contract)
  return contract
}
