import Database from 'better-sqlite3'
import { existsSync } from 'node:fs'
import { join } from 'node:path'
import type { BundleRecord, MetadataKey } from '../types'

/** Current schema version */
const SCHEMA_VERSION = '1'

/** Index file name inside the bundle store */
export const INDEX_FILENAME = '.syncf.db'

/** Table creation SQL */
const CREATE_TABLES_SQL = `
-- Metadata
CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT
);

-- One row per bundle file in the store
CREATE TABLE IF NOT EXISTS bundles (
  filename TEXT PRIMARY KEY,
  label TEXT NOT NULL,
  created_at TEXT NOT NULL,
  file_count INTEGER NOT NULL,
  skipped_count INTEGER NOT NULL DEFAULT 0,
  size_bytes INTEGER NOT NULL
);

-- Indexes
CREATE INDEX IF NOT EXISTS idx_bundles_label ON bundles(label);
`

interface BundleRow {
  filename: string
  label: string
  created_at: string
  file_count: number
  skipped_count: number
  size_bytes: number
}

const toRecord = (row: BundleRow): BundleRecord => ({
  filename: row.filename,
  label: row.label,
  createdAt: row.created_at,
  fileCount: row.file_count,
  skippedCount: row.skipped_count,
  sizeBytes: row.size_bytes,
})

/**
 * SQLite index of the bundles in a store
 *
 * Bundle files stay the source of truth: the index only adds what cannot be
 * read from a file name cheaply (file and skip counts).
 */
export class BundleIndex {
  /** better-sqlite3 database instance */
  private db: Database.Database

  /**
   * Open (and create if needed) the index of a store
   * @param storeDir - Bundle store directory (must exist)
   * @param options - Open read-only; the index file must then exist
   */
  constructor(storeDir: string, options: { readonly?: boolean } = {}) {
    const dbPath = join(storeDir, INDEX_FILENAME)

    if (options.readonly) {
      this.db = new Database(dbPath, { readonly: true, fileMustExist: true })
      return
    }

    this.db = new Database(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('synchronous = NORMAL')

    this.initSchema()
  }

  /**
   * Whether a store has an index
   * @param storeDir - Bundle store directory
   */
  static exists(storeDir: string): boolean {
    return existsSync(join(storeDir, INDEX_FILENAME))
  }

  /**
   * Open an existing index without writing anything
   * @param storeDir - Bundle store directory
   * @returns Index, or null when the store has none
   */
  static openReadonly(storeDir: string): BundleIndex | null {
    if (!BundleIndex.exists(storeDir)) return null

    return new BundleIndex(storeDir, { readonly: true })
  }

  /** Initialize schema (create tables and set version) */
  private initSchema(): void {
    this.db.exec(CREATE_TABLES_SQL)

    this.setMetadata('schema_version', SCHEMA_VERSION)
  }

  /**
   * Save metadata
   * @param key - Metadata key
   * @param value - Value to save
   */
  setMetadata(key: MetadataKey, value: string): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)
    `)

    stmt.run(key, value)
  }

  /**
   * Get metadata
   * @param key - Metadata key
   * @returns Stored value or null
   */
  getMetadata(key: MetadataKey): string | null {
    const stmt = this.db.prepare(`SELECT value FROM metadata WHERE key = ?`)
    const row = stmt.get(key) as { value: string } | undefined

    return row?.value ?? null
  }

  /**
   * Record a written bundle (a same-name bundle is replaced)
   * @param record - Bundle record
   */
  recordBundle(record: BundleRecord): void {
    const stmt = this.db.prepare(`
      INSERT INTO bundles (filename, label, created_at, file_count, skipped_count, size_bytes)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(filename) DO UPDATE SET
        label = excluded.label,
        created_at = excluded.created_at,
        file_count = excluded.file_count,
        skipped_count = excluded.skipped_count,
        size_bytes = excluded.size_bytes
    `)

    stmt.run(
      record.filename,
      record.label,
      record.createdAt,
      record.fileCount,
      record.skippedCount,
      record.sizeBytes
    )

    this.setMetadata('last_written', record.filename)
  }

  /**
   * Get bundle record by file name
   * @param filename - Bundle file name
   * @returns Record or null
   */
  getBundle(filename: string): BundleRecord | null {
    const stmt = this.db.prepare(`SELECT * FROM bundles WHERE filename = ?`)
    const row = stmt.get(filename) as BundleRow | undefined

    return row ? toRecord(row) : null
  }

  /**
   * Get all bundle records
   * @returns Records keyed by file name
   */
  getAllBundles(): Map<string, BundleRecord> {
    const stmt = this.db.prepare(`SELECT * FROM bundles`)
    const rows = stmt.all() as BundleRow[]

    return new Map(rows.map((row) => [row.filename, toRecord(row)]))
  }

  /**
   * Remove a bundle record
   * @param filename - Bundle file name
   * @returns Whether a record was removed
   */
  removeBundle(filename: string): boolean {
    const stmt = this.db.prepare(`DELETE FROM bundles WHERE filename = ?`)

    return stmt.run(filename).changes > 0
  }

  /**
   * Execute work within transaction
   * @param fn - Function to execute within transaction
   * @returns Function execution result
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  /** Close database connection */
  close(): void {
    this.db.close()
  }
}
