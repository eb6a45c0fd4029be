/**
 * SQLite Adapter
 *
 * Production implementation of the planner adapter using better-sqlite3.
 * Implements the canonical Adapter interface with normalized CRUD operations.
 */
import Database from 'better-sqlite3'
import type {
  Adapter, Client, Contract, Visit, Folder, VisitDocument, SignatureRequest,
  VisitFilter, ContractState, VisitState, VisitKind, SignatureState,
  LocalDate, LocalDateTime, YearMonth,
} from './adapter'
import { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError } from './adapter'

export { DuplicateKeyError, ForeignKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  listIndices(table: string): Promise<string[]>
  inTransaction(): Promise<boolean>
  getSchemaVersion(): Promise<number>
  close(): Promise<void>
}

export type SqliteAdapter = Adapter & SqliteExtras

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS client (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL CHECK (length(trim(name)) > 0),
    address TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS contract (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    client_id TEXT NOT NULL REFERENCES client(id) ON DELETE RESTRICT,
    start_date TEXT NOT NULL,
    end_date TEXT NOT NULL,
    visits_per_month INTEGER NOT NULL CHECK (visits_per_month > 0),
    state TEXT NOT NULL DEFAULT 'draft' CHECK (state IN ('draft', 'in_progress', 'closed')),
    folder_id TEXT REFERENCES folder(id) ON DELETE SET NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (end_date >= start_date)
  );
  CREATE INDEX IF NOT EXISTS idx_contract_state ON contract(state);

  CREATE TABLE IF NOT EXISTS folder (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    parent_id TEXT REFERENCES folder(id) ON DELETE CASCADE,
    contract_id TEXT REFERENCES contract(id) ON DELETE CASCADE,
    month TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_folder_parent ON folder(parent_id);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_folder_month ON folder(parent_id, month)
    WHERE parent_id IS NOT NULL AND month IS NOT NULL;

  CREATE TABLE IF NOT EXISTS visit (
    id TEXT PRIMARY KEY,
    reference TEXT NOT NULL,
    contract_id TEXT REFERENCES contract(id) ON DELETE RESTRICT,
    client_id TEXT NOT NULL REFERENCES client(id) ON DELETE RESTRICT,
    folder_id TEXT REFERENCES folder(id) ON DELETE SET NULL,
    month TEXT NOT NULL,
    sequence INTEGER NOT NULL CHECK (sequence >= 1),
    state TEXT NOT NULL DEFAULT 'pending' CHECK (state IN ('pending', 'done', 'cancelled')),
    kind TEXT NOT NULL CHECK (kind IN ('scheduled', 'extra', 'adhoc')),
    visit_date TEXT NOT NULL,
    reason TEXT,
    engineer_id TEXT,
    description TEXT,
    address TEXT,
    report_document_id TEXT REFERENCES document(id) ON DELETE SET NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_visit_contract_month ON visit(contract_id, month);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_visit_slot ON visit(contract_id, month, sequence)
    WHERE contract_id IS NOT NULL AND state <> 'cancelled';

  CREATE TABLE IF NOT EXISTS signature_request (
    id TEXT PRIMARY KEY,
    visit_id TEXT NOT NULL REFERENCES visit(id) ON DELETE CASCADE,
    state TEXT NOT NULL CHECK (state IN ('sent', 'signed', 'cancelled')),
    created_at TEXT NOT NULL,
    completed_at TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_signature_request_visit ON signature_request(visit_id);

  CREATE TABLE IF NOT EXISTS document (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    folder_id TEXT NOT NULL REFERENCES folder(id) ON DELETE CASCADE,
    mime_type TEXT NOT NULL,
    content BLOB NOT NULL,
    visit_id TEXT REFERENCES visit(id) ON DELETE SET NULL,
    signature_request_id TEXT REFERENCES signature_request(id) ON DELETE SET NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_document_folder ON document(folder_id);
  CREATE INDEX IF NOT EXISTS idx_document_visit ON document(visit_id);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/PRIMARY KEY constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type ClientRow = {
  id: string
  name: string
  address: string | null
  created_at: string
}

type ContractRow = {
  id: string
  name: string
  client_id: string
  start_date: string
  end_date: string
  visits_per_month: number
  state: ContractState
  folder_id: string | null
  created_at: string
  updated_at: string
}

type VisitRow = {
  id: string
  reference: string
  contract_id: string | null
  client_id: string
  folder_id: string | null
  month: string
  sequence: number
  state: VisitState
  kind: VisitKind
  visit_date: string
  reason: string | null
  engineer_id: string | null
  description: string | null
  address: string | null
  report_document_id: string | null
  created_at: string
}

type FolderRow = {
  id: string
  name: string
  parent_id: string | null
  contract_id: string | null
  month: string | null
}

type DocumentRow = {
  id: string
  name: string
  folder_id: string
  mime_type: string
  content: Buffer
  visit_id: string | null
  signature_request_id: string | null
  created_at: string
}

type SignatureRequestRow = {
  id: string
  visit_id: string
  state: SignatureState
  created_at: string
  completed_at: string | null
}

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toClient(row: ClientRow): Client {
  return {
    id: row.id,
    name: row.name,
    ...(row.address != null ? { address: row.address } : {}),
    createdAt: row.created_at as LocalDateTime,
  }
}

function toContract(row: ContractRow): Contract {
  return {
    id: row.id,
    name: row.name,
    clientId: row.client_id,
    startDate: row.start_date as LocalDate,
    endDate: row.end_date as LocalDate,
    visitsPerMonth: row.visits_per_month,
    state: row.state,
    folderId: row.folder_id,
    createdAt: row.created_at as LocalDateTime,
    updatedAt: row.updated_at as LocalDateTime,
  }
}

function toVisit(row: VisitRow): Visit {
  return {
    id: row.id,
    reference: row.reference,
    contractId: row.contract_id,
    clientId: row.client_id,
    folderId: row.folder_id,
    month: row.month as YearMonth,
    sequence: row.sequence,
    state: row.state,
    kind: row.kind,
    visitDate: row.visit_date as LocalDate,
    ...(row.reason != null ? { reason: row.reason } : {}),
    ...(row.engineer_id != null ? { engineerId: row.engineer_id } : {}),
    ...(row.description != null ? { description: row.description } : {}),
    ...(row.address != null ? { address: row.address } : {}),
    reportDocumentId: row.report_document_id,
    createdAt: row.created_at as LocalDateTime,
  }
}

function toFolder(row: FolderRow): Folder {
  return {
    id: row.id,
    name: row.name,
    parentId: row.parent_id,
    contractId: row.contract_id,
    month: row.month as YearMonth | null,
  }
}

function toDocument(row: DocumentRow): VisitDocument {
  return {
    id: row.id,
    name: row.name,
    folderId: row.folder_id,
    mimeType: row.mime_type,
    content: new Uint8Array(row.content),
    visitId: row.visit_id,
    signatureRequestId: row.signature_request_id,
    createdAt: row.created_at as LocalDateTime,
  }
}

function toSignatureRequest(row: SignatureRequestRow): SignatureRequest {
  return {
    id: row.id,
    visitId: row.visit_id,
    state: row.state,
    createdAt: row.created_at as LocalDateTime,
    ...(row.completed_at != null ? { completedAt: row.completed_at as LocalDateTime } : {}),
  }
}

// ============================================================================
// Visit Filter → SQL
// ============================================================================

function visitWhere(filter: VisitFilter): { sql: string; params: string[] } {
  const clauses: string[] = []
  const params: string[] = []
  if (filter.contractId !== undefined) { clauses.push('contract_id = ?'); params.push(filter.contractId) }
  if (filter.clientId !== undefined) { clauses.push('client_id = ?'); params.push(filter.clientId) }
  if (filter.month !== undefined) { clauses.push('month = ?'); params.push(filter.month) }
  if (filter.state !== undefined) { clauses.push('state = ?'); params.push(filter.state) }
  if (filter.kind !== undefined) { clauses.push('kind = ?'); params.push(filter.kind) }
  return { sql: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', params }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  // Seed initial schema version if empty
  const ver = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Client
    // ================================================================
    async createClient(client: Client) {
      safe(() =>
        db.prepare('INSERT INTO client (id, name, address, created_at) VALUES (?, ?, ?, ?)').run(
          client.id, client.name, client.address ?? null, client.createdAt,
        ),
      )
    },

    async getClient(id: string) {
      const row = db.prepare('SELECT * FROM client WHERE id = ?').get(id) as ClientRow | undefined
      return row ? toClient(row) : null
    },

    async getAllClients() {
      const rows = db.prepare('SELECT * FROM client ORDER BY name, id').all() as ClientRow[]
      return rows.map(toClient)
    },

    // ================================================================
    // Contract
    // ================================================================
    async createContract(contract: Contract) {
      safe(() =>
        db.prepare(
          'INSERT INTO contract (id, name, client_id, start_date, end_date, visits_per_month, state, folder_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)',
        ).run(
          contract.id,
          contract.name,
          contract.clientId,
          contract.startDate,
          contract.endDate,
          contract.visitsPerMonth,
          contract.state,
          contract.folderId,
          contract.createdAt,
          contract.updatedAt,
        ),
      )
    },

    async getContract(id: string) {
      const row = db.prepare('SELECT * FROM contract WHERE id = ?').get(id) as ContractRow | undefined
      return row ? toContract(row) : null
    },

    async getContractsByState(state: ContractState) {
      const rows = db.prepare(
        'SELECT * FROM contract WHERE state = ? ORDER BY created_at, id',
      ).all(state) as ContractRow[]
      return rows.map(toContract)
    },

    async listActiveContracts(asOf: LocalDate) {
      const rows = db.prepare(
        "SELECT * FROM contract WHERE state = 'in_progress' AND start_date <= ? ORDER BY created_at, id",
      ).all(asOf) as ContractRow[]
      return rows.map(toContract)
    },

    async updateContract(id: string, changes: Partial<Contract>) {
      const existing = db.prepare('SELECT * FROM contract WHERE id = ?').get(id) as ContractRow | undefined
      if (!existing) throw new NotFoundError(`Contract '${id}' not found`)
      const merged = { ...toContract(existing), ...changes }
      safe(() =>
        db.prepare(
          'UPDATE contract SET name = ?, client_id = ?, start_date = ?, end_date = ?, visits_per_month = ?, state = ?, folder_id = ?, updated_at = ? WHERE id = ?',
        ).run(
          merged.name,
          merged.clientId,
          merged.startDate,
          merged.endDate,
          merged.visitsPerMonth,
          merged.state,
          merged.folderId,
          merged.updatedAt,
          id,
        ),
      )
    },

    // ================================================================
    // Visit
    // ================================================================
    async createVisit(visit: Visit) {
      safe(() =>
        db.prepare(
          'INSERT INTO visit (id, reference, contract_id, client_id, folder_id, month, sequence, state, kind, visit_date, reason, engineer_id, description, address, report_document_id, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)',
        ).run(
          visit.id,
          visit.reference,
          visit.contractId,
          visit.clientId,
          visit.folderId,
          visit.month,
          visit.sequence,
          visit.state,
          visit.kind,
          visit.visitDate,
          visit.reason ?? null,
          visit.engineerId ?? null,
          visit.description ?? null,
          visit.address ?? null,
          visit.reportDocumentId,
          visit.createdAt,
        ),
      )
    },

    async getVisit(id: string) {
      const row = db.prepare('SELECT * FROM visit WHERE id = ?').get(id) as VisitRow | undefined
      return row ? toVisit(row) : null
    },

    async getVisits(filter: VisitFilter) {
      const where = visitWhere(filter)
      const rows = db.prepare(
        `SELECT * FROM visit ${where.sql} ORDER BY month, sequence, id`,
      ).all(...where.params) as VisitRow[]
      return rows.map(toVisit)
    },

    async getVisitsForMonth(contractId: string, month: YearMonth) {
      const rows = db.prepare(
        "SELECT * FROM visit WHERE contract_id = ? AND month = ? AND state <> 'cancelled' ORDER BY sequence, id",
      ).all(contractId, month) as VisitRow[]
      return rows.map(toVisit)
    },

    async getAdHocVisitsForMonth(month: YearMonth) {
      const rows = db.prepare(
        "SELECT * FROM visit WHERE contract_id IS NULL AND month = ? AND state <> 'cancelled' ORDER BY sequence, id",
      ).all(month) as VisitRow[]
      return rows.map(toVisit)
    },

    async updateVisit(id: string, changes: Partial<Visit>) {
      const existing = db.prepare('SELECT * FROM visit WHERE id = ?').get(id) as VisitRow | undefined
      if (!existing) throw new NotFoundError(`Visit '${id}' not found`)
      const merged = { ...toVisit(existing), ...changes }
      safe(() =>
        db.prepare(
          'UPDATE visit SET reference = ?, contract_id = ?, client_id = ?, folder_id = ?, month = ?, sequence = ?, state = ?, kind = ?, visit_date = ?, reason = ?, engineer_id = ?, description = ?, address = ?, report_document_id = ? WHERE id = ?',
        ).run(
          merged.reference,
          merged.contractId,
          merged.clientId,
          merged.folderId,
          merged.month,
          merged.sequence,
          merged.state,
          merged.kind,
          merged.visitDate,
          merged.reason ?? null,
          merged.engineerId ?? null,
          merged.description ?? null,
          merged.address ?? null,
          merged.reportDocumentId,
          id,
        ),
      )
    },

    // ================================================================
    // Folder
    // ================================================================
    async createFolder(folder: Folder) {
      safe(() =>
        db.prepare('INSERT INTO folder (id, name, parent_id, contract_id, month) VALUES (?, ?, ?, ?, ?)').run(
          folder.id, folder.name, folder.parentId, folder.contractId, folder.month,
        ),
      )
    },

    async getFolder(id: string) {
      const row = db.prepare('SELECT * FROM folder WHERE id = ?').get(id) as FolderRow | undefined
      return row ? toFolder(row) : null
    },

    async getRootFolders() {
      const rows = db.prepare('SELECT * FROM folder WHERE parent_id IS NULL ORDER BY name, id').all() as FolderRow[]
      return rows.map(toFolder)
    },

    async getChildFolders(parentId: string) {
      const rows = db.prepare('SELECT * FROM folder WHERE parent_id = ? ORDER BY name, id').all(parentId) as FolderRow[]
      return rows.map(toFolder)
    },

    async getFolderByMonth(parentId: string, month: YearMonth) {
      const row = db.prepare('SELECT * FROM folder WHERE parent_id = ? AND month = ?').get(parentId, month) as FolderRow | undefined
      return row ? toFolder(row) : null
    },

    // ================================================================
    // Document
    // ================================================================
    async createDocument(document: VisitDocument) {
      safe(() =>
        db.prepare(
          'INSERT INTO document (id, name, folder_id, mime_type, content, visit_id, signature_request_id, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?)',
        ).run(
          document.id,
          document.name,
          document.folderId,
          document.mimeType,
          Buffer.from(document.content),
          document.visitId,
          document.signatureRequestId,
          document.createdAt,
        ),
      )
    },

    async getDocument(id: string) {
      const row = db.prepare('SELECT * FROM document WHERE id = ?').get(id) as DocumentRow | undefined
      return row ? toDocument(row) : null
    },

    async getDocumentsByFolder(folderId: string) {
      const rows = db.prepare('SELECT * FROM document WHERE folder_id = ? ORDER BY name, id').all(folderId) as DocumentRow[]
      return rows.map(toDocument)
    },

    async getDocumentsByVisit(visitId: string) {
      const rows = db.prepare('SELECT * FROM document WHERE visit_id = ? ORDER BY name, id').all(visitId) as DocumentRow[]
      return rows.map(toDocument)
    },

    // ================================================================
    // Signature Request
    // ================================================================
    async createSignatureRequest(request: SignatureRequest) {
      safe(() =>
        db.prepare(
          'INSERT INTO signature_request (id, visit_id, state, created_at, completed_at) VALUES (?, ?, ?, ?, ?)',
        ).run(request.id, request.visitId, request.state, request.createdAt, request.completedAt ?? null),
      )
    },

    async getSignatureRequest(id: string) {
      const row = db.prepare('SELECT * FROM signature_request WHERE id = ?').get(id) as SignatureRequestRow | undefined
      return row ? toSignatureRequest(row) : null
    },

    async getSignatureRequestsByVisit(visitId: string) {
      const rows = db.prepare(
        'SELECT * FROM signature_request WHERE visit_id = ? ORDER BY created_at, id',
      ).all(visitId) as SignatureRequestRow[]
      return rows.map(toSignatureRequest)
    },

    async updateSignatureRequest(id: string, changes: Partial<SignatureRequest>) {
      const existing = db.prepare('SELECT * FROM signature_request WHERE id = ?').get(id) as SignatureRequestRow | undefined
      if (!existing) throw new NotFoundError(`Signature request '${id}' not found`)
      const merged = { ...toSignatureRequest(existing), ...changes }
      safe(() =>
        db.prepare('UPDATE signature_request SET state = ?, completed_at = ? WHERE id = ?').run(
          merged.state, merged.completedAt ?? null, id,
        ),
      )
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // SQLite Extras
    // ================================================================
    async listTables() {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ).all() as { name: string }[]
      return rows.map((r) => r.name)
    },

    async listIndices(table: string) {
      const rows = db.prepare(`PRAGMA index_list("${table}")`).all() as { name: string }[]
      return rows.map((r) => r.name)
    },

    async inTransaction() {
      return _inTx
    },

    async getSchemaVersion() {
      const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
      return row?.v ?? 0
    },
  }

  return adapter
}
