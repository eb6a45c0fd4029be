/**
 * Daily Trigger
 *
 * Entry points that drive the visit generator: the daily run over every
 * active contract and the manual "generate current month" action.
 */

import { type LocalDate, type YearMonth, yearMonthOf } from './time-date'
import { NotFoundError } from './errors'
import type { Adapter } from './adapter'
import type { ContractManager } from './contracts'
import { type VisitGenerator, isMonthInContract } from './visit-generator'
import type { Clock, Logger } from './internal/types'

export type DailyRunFailure = {
  contractId: string
  error: string
}

export type DailyRunResult = {
  asOf: LocalDate
  month: YearMonth
  closedContractIds: string[]
  /** Created visit ids per contract, for contracts that got at least one */
  created: Record<string, string[]>
  failures: DailyRunFailure[]
}

export type Notification = {
  type: 'success' | 'info'
  message: string
}

export type ManualGenerationResult = {
  createdVisitIds: string[]
  notification: Notification
}

export type DailyTrigger = {
  run(asOf?: LocalDate): Promise<DailyRunResult>
  generateCurrentMonth(contractId: string): Promise<ManualGenerationResult>
}

type DailyTriggerDeps = {
  adapter: Adapter
  generator: VisitGenerator
  contracts: ContractManager
  logger: Logger
  clock: Clock
}

export function createDailyTrigger(deps: DailyTriggerDeps): DailyTrigger {
  const { adapter, generator, contracts, logger, clock } = deps

  async function run(asOf: LocalDate = clock.today()): Promise<DailyRunResult> {
    const month = yearMonthOf(asOf)
    const closedContractIds = await contracts.closeExpired(asOf)
    const created: Record<string, string[]> = {}
    const failures: DailyRunFailure[] = []

    // One contract at a time; each generate call is its own transaction
    for (const contract of await adapter.listActiveContracts(asOf)) {
      try {
        const ids = await generator.generate(contract, month)
        if (ids.length > 0) created[contract.id] = ids
      } catch (e) {
        const error = e instanceof Error ? e.message : String(e)
        logger.error(`Visit generation failed for contract '${contract.name}' (${contract.id}):`, e)
        failures.push({ contractId: contract.id, error })
      }
    }

    const total = Object.values(created).reduce((sum, ids) => sum + ids.length, 0)
    logger.info(
      `Daily visit generation for ${month}: ${total} visits created, ` +
      `${closedContractIds.length} contracts closed, ${failures.length} failures`,
    )
    return { asOf, month, closedContractIds, created, failures }
  }

  async function generateCurrentMonth(contractId: string): Promise<ManualGenerationResult> {
    const contract = await adapter.getContract(contractId)
    if (!contract) throw new NotFoundError(`Contract '${contractId}' not found`)

    const month = yearMonthOf(clock.today())
    const inContract = isMonthInContract(contract, month)
    const createdVisitIds = await generator.generate(contract, month)
    const n = createdVisitIds.length

    let notification: Notification
    if (n > 0) {
      notification = {
        type: 'success',
        message: `${n} ${n === 1 ? 'visit has' : 'visits have'} been generated for the current month.`,
      }
    } else if (!inContract) {
      notification = { type: 'info', message: 'The current month is outside the contract period.' }
    } else {
      notification = { type: 'info', message: 'Visits for the current month have already been generated.' }
    }
    return { createdVisitIds, notification }
  }

  return { run, generateCurrentMonth }
}
