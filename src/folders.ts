/**
 * Folders
 *
 * Two-level document hierarchy: one root folder per contract (named after the
 * client) holding one sub-folder per calendar month of the contract, plus a
 * shared root for visits that belong to no contract.
 */

import { type YearMonth, monthName, monthsInRange } from './time-date'
import type { Adapter, Contract, Folder, VisitDocument } from './adapter'
import { NotFoundError } from './errors'
import { uuid } from './internal/helpers'

export const AD_HOC_ROOT_NAME = 'Not Contracted Visits'

export type FolderTreeNode = {
  folder: Folder
  documents: VisitDocument[]
  children: FolderTreeNode[]
}

/** e.g. "2025-02 (February)" */
export function monthFolderName(month: YearMonth): string {
  return `${month} (${monthName(month)})`
}

// ============================================================================
// Creation
// ============================================================================

async function ensureContractRoot(adapter: Adapter, contract: Contract): Promise<string> {
  // The caller's copy may predate activation, so read the stored link
  const stored = await adapter.getContract(contract.id)
  if (!stored) throw new NotFoundError(`Contract '${contract.id}' not found`)
  if (stored.folderId !== null) {
    const existing = await adapter.getFolder(stored.folderId)
    if (existing) return existing.id
  }

  const client = await adapter.getClient(contract.clientId)
  if (!client) throw new NotFoundError(`Client '${contract.clientId}' not found`)

  const id = uuid()
  await adapter.createFolder({ id, name: client.name, parentId: null, contractId: contract.id, month: null })
  await adapter.updateContract(contract.id, { folderId: id })
  return id
}

async function ensureChild(adapter: Adapter, parentId: string, contractId: string | null, month: YearMonth): Promise<Folder> {
  const existing = await adapter.getFolderByMonth(parentId, month)
  if (existing) return existing

  const folder: Folder = { id: uuid(), name: monthFolderName(month), parentId, contractId, month }
  await adapter.createFolder(folder)
  return folder
}

/**
 * Creates the contract's root folder and one month folder per calendar month
 * between start and end date, inclusive. Existing folders are kept.
 * Returns the root folder id.
 */
export async function createContractFolders(adapter: Adapter, contract: Contract): Promise<string> {
  return adapter.transaction(async () => {
    const rootId = await ensureContractRoot(adapter, contract)
    for (const month of monthsInRange(contract.startDate, contract.endDate)) {
      await ensureChild(adapter, rootId, contract.id, month)
    }
    return rootId
  })
}

/** Month folder of a contract, created along with the root when missing */
export async function ensureMonthFolder(adapter: Adapter, contract: Contract, month: YearMonth): Promise<Folder> {
  const rootId = await ensureContractRoot(adapter, contract)
  return ensureChild(adapter, rootId, contract.id, month)
}

export async function ensureAdHocMonthFolder(adapter: Adapter, month: YearMonth): Promise<Folder> {
  const roots = await adapter.getRootFolders()
  let root = roots.find((f) => f.contractId === null && f.name === AD_HOC_ROOT_NAME)
  if (!root) {
    root = { id: uuid(), name: AD_HOC_ROOT_NAME, parentId: null, contractId: null, month: null }
    await adapter.createFolder(root)
  }
  return ensureChild(adapter, root.id, null, month)
}

// ============================================================================
// Browsing
// ============================================================================

export async function findMonthFolder(adapter: Adapter, contractId: string, month: YearMonth): Promise<Folder | null> {
  const contract = await adapter.getContract(contractId)
  if (!contract) throw new NotFoundError(`Contract '${contractId}' not found`)
  if (contract.folderId === null) return null
  return adapter.getFolderByMonth(contract.folderId, month)
}

/** Documents in a folder and, recursively, in all of its sub-folders */
export async function countDocuments(adapter: Adapter, folderId: string): Promise<number> {
  let count = (await adapter.getDocumentsByFolder(folderId)).length
  for (const child of await adapter.getChildFolders(folderId)) {
    count += await countDocuments(adapter, child.id)
  }
  return count
}

export async function getFolderTree(adapter: Adapter, folderId: string): Promise<FolderTreeNode> {
  const folder = await adapter.getFolder(folderId)
  if (!folder) throw new NotFoundError(`Folder '${folderId}' not found`)

  const children: FolderTreeNode[] = []
  for (const child of await adapter.getChildFolders(folderId)) {
    children.push(await getFolderTree(adapter, child.id))
  }
  return { folder, documents: await adapter.getDocumentsByFolder(folderId), children }
}
