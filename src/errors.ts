import type { SkipReason, SkippedEntry } from './types'

/** Exit code for mistakes the user can fix (bad pattern, unknown bundle) */
export const EXIT_USER_ERROR = 2

/** Exit code for I/O and data failures */
export const EXIT_IO_ERROR = 1

export type SyncfErrorKind =
  | 'InvalidPattern'
  | 'InvalidLabel'
  | 'EmptySelection'
  | 'CorruptArchive'
  | 'StoreUnavailable'
  | 'SourceUnavailable'
  | 'SourceChanged'
  | 'BundleNotFound'
  | 'InvalidConfig'

/**
 * Base class of every fatal syncf error
 */
export class SyncfError extends Error {
  readonly kind: SyncfErrorKind
  readonly exitCode: number

  constructor(
    kind: SyncfErrorKind,
    message: string,
    exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = `${kind}Error`
    this.kind = kind
    this.exitCode = exitCode
  }
}

/**
 * Pattern file missing or a rule that cannot be compiled
 */
export class InvalidPatternError extends SyncfError {
  readonly source: string
  /** 1-based, 0 when the whole file is at fault */
  readonly line: number
  readonly pattern: string

  constructor(
    source: string,
    line: number,
    pattern: string,
    problem: string,
    options?: { cause?: unknown }
  ) {
    const where = line > 0 ? `${source}:${line}` : source

    super(
      'InvalidPattern',
      pattern
        ? `${where}: invalid pattern "${pattern}": ${problem}`
        : `${where}: ${problem}`,
      EXIT_USER_ERROR,
      options
    )
    this.source = source
    this.line = line
    this.pattern = pattern
  }
}

export class InvalidLabelError extends SyncfError {
  readonly label: string

  constructor(label: string) {
    super(
      'InvalidLabel',
      `Invalid bundle label "${label}": nothing usable remains after removing path-unsafe characters`,
      EXIT_USER_ERROR
    )
    this.label = label
  }
}

/**
 * Nothing to archive: either no file matched, or every match was skipped
 */
export class EmptySelectionError extends SyncfError {
  readonly reason: 'no-match' | 'all-skipped'
  readonly skipped: SkippedEntry[]

  constructor(reason: 'no-match' | 'all-skipped', skipped: SkippedEntry[] = []) {
    super(
      'EmptySelection',
      reason === 'no-match'
        ? 'No files matched the pattern rules'
        : `All ${skipped.length} selected files were skipped, no bundle written`,
      EXIT_USER_ERROR
    )
    this.reason = reason
    this.skipped = skipped
  }
}

export class CorruptArchiveError extends SyncfError {
  readonly bundleName: string

  constructor(bundleName: string, options?: { cause?: unknown }) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : ''

    super(
      'CorruptArchive',
      `Bundle ${bundleName} is corrupt or unreadable${detail}`,
      EXIT_IO_ERROR,
      options
    )
    this.bundleName = bundleName
  }
}

export class StoreUnavailableError extends SyncfError {
  readonly storeDir: string

  constructor(storeDir: string, options?: { cause?: unknown }) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : ''

    super(
      'StoreUnavailable',
      `Bundle store ${storeDir} cannot be used${detail}`,
      EXIT_IO_ERROR,
      options
    )
    this.storeDir = storeDir
  }
}

export class SourceUnavailableError extends SyncfError {
  readonly root: string

  constructor(root: string, problem: string) {
    super('SourceUnavailable', `${root}: ${problem}`, EXIT_USER_ERROR)
    this.root = root
  }
}

/**
 * A file changed or failed after its tar header was written, so it can no
 * longer be skipped
 */
export class SourceChangedError extends SyncfError {
  readonly path: string

  constructor(path: string, options?: { cause?: unknown }) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : ''

    super(
      'SourceChanged',
      `${path} changed or became unreadable while being archived${detail}`,
      EXIT_IO_ERROR,
      options
    )
    this.path = path
  }
}

export class BundleNotFoundError extends SyncfError {
  readonly id: string

  constructor(id: string, storeDir: string) {
    super(
      'BundleNotFound',
      id ? `No bundle matching "${id}" in ${storeDir}` : `No bundles in ${storeDir}`,
      EXIT_USER_ERROR
    )
    this.id = id
  }
}

export class InvalidConfigError extends SyncfError {
  constructor(message: string) {
    super('InvalidConfig', message, EXIT_USER_ERROR)
  }
}

/**
 * Read the `code` of a Node.js system error
 * @param error - Caught value
 * @returns Error code (e.g., ENOENT) or undefined
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const { code } = error

    return typeof code === 'string' ? code : undefined
  }

  return undefined
}

/**
 * Map a file system error to the reason recorded for a skipped entry
 * @param error - Caught value
 * @param fallback - Reason used for codes with no specific mapping
 */
export function describeFsError(
  error: unknown,
  fallback: SkipReason = 'read-failed'
): SkipReason {
  switch (errorCode(error)) {
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied'
    case 'ENOENT':
    case 'ENOTDIR':
      return 'not-found'
    case 'ELOOP':
      return 'symlink-cycle'
    case 'EISDIR':
      return 'not-a-file'
    default:
      return fallback
  }
}

/**
 * Message of a caught value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
