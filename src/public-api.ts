/**
 * Public API Module
 *
 * Consumer-facing interface that ties all components together.
 * Handles initialization, input validation, event emission, and the
 * timezone that decides what "today" and "current month" mean.
 */

import type { LocalDate, YearMonth } from './time-date'
import { todayIn, nowIn } from './time-date'
import type {
  Adapter, Client, Contract, Visit, VisitFilter, Folder, VisitDocument, SignatureRequest,
} from './adapter'
import type { VisitPlannerEvents, VisitPlannerEventName } from './domain-types'
import { ValidationError, NotFoundError } from './errors'
import { createClient, getClient, getAllClients, type ClientInput } from './clients'
import {
  createContractManager,
  type ContractInput, type ContractUpdate, type ContractSummary, type ActivationResult,
} from './contracts'
import { createVisitGenerator } from './visit-generator'
import { createVisitManager, type VisitDetails, type AdHocVisitInput } from './visits'
import { createSignatureManager, type SignedArtifact, type SignatureCompletion } from './signatures'
import { createReportFiler, plainTextReportRenderer, type ReportRenderer } from './reports'
import { createDailyTrigger, type DailyRunResult, type ManualGenerationResult } from './daily-trigger'
import { findMonthFolder, getFolderTree, countDocuments, type FolderTreeNode } from './folders'
import type { Clock, Logger } from './internal/types'
import { isValidTimezone, validateDate, validateMonth, createTaskQueue } from './internal/helpers'

// ============================================================================
// Types
// ============================================================================

export type { Adapter } from './adapter'
export type { Logger } from './internal/types'

export type VisitPlannerConfig = {
  adapter: Adapter
  /** IANA timezone deciding the current date, e.g. 'Europe/Paris' */
  timezone: string
  logger?: Logger
  reportRenderer?: ReportRenderer
  /** Source of the current instant; defaults to the system clock */
  clock?: () => Date
}

export type EventHandler<E extends VisitPlannerEventName> = (payload: VisitPlannerEvents[E]) => void

export type VisitPlanner = {
  // Clients
  createClient(input: ClientInput): Promise<string>
  getClient(id: string): Promise<Client | null>
  getClients(): Promise<Client[]>

  // Contracts
  createContract(input: ContractInput): Promise<string>
  getContract(id: string): Promise<Contract | null>
  updateContract(id: string, changes: ContractUpdate): Promise<void>
  activateContract(id: string): Promise<ActivationResult>
  closeContract(id: string): Promise<void>
  getContractSummary(id: string): Promise<ContractSummary>

  // Generation
  generateVisits(contractId: string, month: string): Promise<string[]>
  addExtraVisits(contractId: string, month: string, count: number, reason: string): Promise<string[]>
  generateCurrentMonth(contractId: string): Promise<ManualGenerationResult>
  runDailyGeneration(asOf?: string): Promise<DailyRunResult>

  // Visits
  getVisit(id: string): Promise<Visit | null>
  listVisits(filter?: VisitFilter): Promise<Visit[]>
  updateVisitDetails(id: string, details: VisitDetails): Promise<void>
  markVisitDone(id: string): Promise<void>
  cancelVisit(id: string): Promise<void>
  createAdHocVisit(input: AdHocVisitInput): Promise<string>

  // Signatures
  requestSignature(visitId: string): Promise<string>
  completeSignature(requestId: string, artifact: SignedArtifact): Promise<SignatureCompletion>
  cancelSignatureRequest(requestId: string): Promise<void>
  getSignatureRequests(visitId: string): Promise<SignatureRequest[]>

  // Folders & documents
  getRootFolders(): Promise<Folder[]>
  getMonthFolder(contractId: string, month: string): Promise<Folder | null>
  getFolderTree(folderId: string): Promise<FolderTreeNode>
  countDocuments(folderId: string): Promise<number>
  getDocument(id: string): Promise<VisitDocument | null>
  fileReport(visitId: string): Promise<string | null>

  // Events
  on<E extends VisitPlannerEventName>(event: E, handler: EventHandler<E>): void
  /** Resolves once queued writes and background report filing have settled */
  whenIdle(): Promise<void>
}

// ============================================================================
// Implementation
// ============================================================================

export function createVisitPlanner(config: VisitPlannerConfig): VisitPlanner {
  if (!config.adapter || typeof config.adapter !== 'object') {
    throw new ValidationError('Adapter is required')
  }
  if (!isValidTimezone(config.timezone)) {
    throw new ValidationError(`Invalid timezone: ${config.timezone}`)
  }

  const adapter = config.adapter
  const timezone = config.timezone
  const logger = config.logger ?? console
  const instant = config.clock ?? (() => new Date())

  const clock: Clock = {
    today: () => todayIn(timezone, instant()),
    now: () => nowIn(timezone, instant()),
  }

  // Event handlers
  const eventHandlers: { [E in VisitPlannerEventName]: EventHandler<E>[] } = {
    visitCreated: [],
    visitCompleted: [],
    contractActivated: [],
    contractClosed: [],
  }

  function emit<E extends VisitPlannerEventName>(event: E, payload: VisitPlannerEvents[E]): boolean {
    const handlers: EventHandler<E>[] = eventHandlers[event]
    let hadErrors = false
    for (const handler of handlers) {
      try { handler(payload) } catch (e) { hadErrors = true; logger.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function on<E extends VisitPlannerEventName>(event: E, handler: EventHandler<E>): void {
    const handlers: EventHandler<E>[] = eventHandlers[event]
    handlers.push(handler)
  }

  // Writes run one at a time; report filing queues behind the write that created the visit
  const queue = createTaskQueue()
  function serial<A extends unknown[], R>(fn: (...args: A) => Promise<R>): (...args: A) => Promise<R> {
    return (...args) => queue.run(() => fn(...args))
  }

  // Components
  const deps = { adapter, publish: emit, clock }
  const generator = createVisitGenerator(deps)
  const contracts = createContractManager({ ...deps, generator })
  const visits = createVisitManager(deps)
  const signatures = createSignatureManager({ ...deps, logger })
  const reports = createReportFiler({
    adapter,
    renderer: config.reportRenderer ?? plainTextReportRenderer,
    logger,
    clock,
    queue,
  })
  const trigger = createDailyTrigger({ adapter, generator, contracts, logger, clock })

  on('visitCreated', reports.handleVisitCreated)

  async function loadContract(id: string): Promise<Contract> {
    const contract = await adapter.getContract(id)
    if (!contract) throw new NotFoundError(`Contract '${id}' not found`)
    return contract
  }

  async function generateVisits(contractId: string, month: string): Promise<string[]> {
    const target: YearMonth = validateMonth(month)
    return generator.generate(await loadContract(contractId), target)
  }

  async function addExtraVisits(contractId: string, month: string, count: number, reason: string): Promise<string[]> {
    const target: YearMonth = validateMonth(month)
    return generator.addExtra(await loadContract(contractId), target, count, reason)
  }

  async function runDailyGeneration(asOf?: string): Promise<DailyRunResult> {
    const date: LocalDate | undefined = asOf !== undefined ? validateDate(asOf, 'asOf') : undefined
    return trigger.run(date)
  }

  async function getMonthFolder(contractId: string, month: string): Promise<Folder | null> {
    return findMonthFolder(adapter, contractId, validateMonth(month))
  }

  return {
    createClient: serial((input: ClientInput) => createClient(adapter, input, clock.now())),
    getClient: (id) => getClient(adapter, id),
    getClients: () => getAllClients(adapter),

    createContract: serial(contracts.create),
    getContract: contracts.get,
    updateContract: serial(contracts.update),
    activateContract: serial(contracts.activate),
    closeContract: serial(contracts.close),
    getContractSummary: contracts.summary,

    generateVisits: serial(generateVisits),
    addExtraVisits: serial(addExtraVisits),
    generateCurrentMonth: serial(trigger.generateCurrentMonth),
    runDailyGeneration: serial(runDailyGeneration),

    getVisit: visits.get,
    listVisits: visits.list,
    updateVisitDetails: serial(visits.updateDetails),
    markVisitDone: serial(visits.markDone),
    cancelVisit: serial(visits.cancel),
    createAdHocVisit: serial(visits.createAdHoc),

    requestSignature: serial(signatures.request),
    completeSignature: serial(signatures.complete),
    cancelSignatureRequest: serial(signatures.cancel),
    getSignatureRequests: signatures.listForVisit,

    getRootFolders: () => adapter.getRootFolders(),
    getMonthFolder,
    getFolderTree: (folderId) => getFolderTree(adapter, folderId),
    countDocuments: (folderId) => countDocuments(adapter, folderId),
    getDocument: (id) => adapter.getDocument(id),
    fileReport: serial(reports.fileReport),

    on,
    whenIdle: queue.idle,
  }
}
