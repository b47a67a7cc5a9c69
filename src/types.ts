/**
 * One line of a pattern file
 */
export interface Rule {
  /** Line as written, trailing whitespace removed */
  raw: string
  /** Pattern text without the leading `!`, leading `/` and trailing `/` */
  pattern: string
  /** Prefixed with `!`: excludes what it matches */
  negated: boolean
  /** Trailing `/`: matches directories only */
  directoryOnly: boolean
  /** Tied to the root instead of matching a basename at any depth */
  anchored: boolean
  /** Pattern file the rule came from */
  source: string
  /** 1-based line number in the source */
  line: number
}

/**
 * Ordered rules, later rules win
 */
export type RuleSet = readonly Rule[]

/**
 * Verdict of the last rule matching a single path
 */
export type Verdict = 'included' | 'excluded' | 'unmatched'

/**
 * Compiled rule set
 */
export interface Matcher {
  /** Whether the path ends up included, ancestors taken into account */
  matches(relativePath: string, isDirectory: boolean): boolean
  /** Verdict for the path alone, ignoring its ancestors */
  evaluate(relativePath: string, isDirectory: boolean): Verdict
}

/**
 * Why an entry was left out of an operation
 */
export type SkipReason =
  | 'permission-denied'
  | 'symlink-cycle'
  | 'path-traversal'
  | 'not-found'
  | 'not-a-file'
  | 'unsupported-entry'
  | 'read-failed'
  | 'write-failed'

/**
 * Entry left out of an operation
 */
export interface SkippedEntry {
  /** Relative path (POSIX separators) */
  path: string
  reason: SkipReason
  /** Underlying error message, when there is one */
  detail?: string
}

/**
 * File system entry information
 */
export interface FileEntry {
  /** Relative path from the selection root (POSIX separators) */
  relativePath: string
  /** Absolute path */
  absolutePath: string
  /** File permission (e.g., 0o755) */
  mode: number
  /** File size (bytes) */
  size: number
  /** Modification time (Unix timestamp ms) */
  mtime: number
}

/**
 * Files chosen from a root directory
 */
export interface SelectionResult {
  /** Absolute root the relative paths start from */
  root: string
  /** Selected files in walk order */
  files: FileEntry[]
  /** Included directories in walk order, parents first (size is 0) */
  directories: FileEntry[]
  skipped: SkippedEntry[]
}

/**
 * A persisted archive in the bundle store
 */
export interface Bundle {
  label: string
  /** Creation time, second precision */
  timestamp: Date
  /** `{label}_{YYYYMMDD_HHMMSS}.tar.gz` */
  filename: string
  /** Absolute path */
  path: string
  sizeBytes: number
  /** Number of archived files, when known */
  fileCount?: number
}

/**
 * ArchiveWriter result
 */
export interface WriteResult {
  bundle: Bundle
  /** Archived files in archive order */
  archived: FileEntry[]
  /** Directory entries written ahead of the files */
  directories: FileEntry[]
  skipped: SkippedEntry[]
}

/**
 * Header of one archive entry
 */
export interface ArchiveEntryInfo {
  name: string
  type: string
  mode: number
  size: number
  mtime?: Date
}

/**
 * Outcome of one archive entry during extraction
 */
export interface EntryOutcome {
  path: string
  status: 'extracted' | 'skipped'
  reason?: SkipReason
  size: number
}

/**
 * ArchiveReader result
 */
export interface ExtractionReport {
  bundle: Bundle
  destination: string
  entries: EntryOutcome[]
  extracted: number
  skipped: number
  /** Bytes written */
  totalSize: number
}

/**
 * BundleCatalog deletion result
 */
export interface DeletionReport {
  deleted: Bundle[]
  failed: Array<{ bundle: Bundle; reason: string }>
  freedBytes: number
}

/**
 * Bundle index record (bundles table record)
 */
export interface BundleRecord {
  filename: string
  label: string
  /** ISO timestamp */
  createdAt: string
  fileCount: number
  skippedCount: number
  sizeBytes: number
}

/**
 * Metadata keys
 */
export type MetadataKey = 'schema_version' | 'last_written'

/**
 * Pack options
 */
export interface PackOptions {
  /** Pattern file path */
  patternFile: string
  /** Bundle label */
  label: string
  /** Directory the patterns are applied to */
  root: string
  /** Bundle store directory */
  storeDir: string
  /** Compression level (1-9) */
  compressionLevel: number
  /** Detailed output */
  verbose: boolean
}

/**
 * Unpack options
 */
export interface UnpackOptions {
  /** Bundle id (filename, name without extension, or label); prompts when absent */
  bundle?: string
  /** Output directory */
  output: string
  /** Bundle store directory */
  storeDir: string
  /** Skip the confirmation prompt */
  yes: boolean
  /** Detailed output */
  verbose: boolean
}

/**
 * List options
 */
export interface ListOptions {
  storeDir: string
}

/**
 * Clean options
 */
export interface CleanOptions {
  storeDir: string
  /** Skip the confirmation prompt */
  yes: boolean
}

/**
 * Progress callback
 */
export type ProgressCallback = (
  current: number,
  total: number,
  message?: string
) => void
