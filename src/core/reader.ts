import { createReadStream } from 'node:fs'
import {
  chmod,
  lstat,
  mkdir,
  open,
  realpath,
  rm,
  utimes,
  type FileHandle,
} from 'node:fs/promises'
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path'
import type { Readable } from 'node:stream'
import { createGunzip } from 'node:zlib'
import { extract } from 'tar-stream'
import {
  CorruptArchiveError,
  describeFsError,
  errorCode,
  errorMessage,
} from '../errors'
import { logger } from '../utils/logger'
import type {
  ArchiveEntryInfo,
  Bundle,
  EntryOutcome,
  ExtractionReport,
  ProgressCallback,
} from '../types'

const log = logger.unpack

/**
 * Extraction options
 */
export interface ExtractOptions {
  onProgress?: ProgressCallback
}

type EntryHandler = (entry: ArchiveEntryInfo, stream: Readable) => Promise<void>

/**
 * Read every entry of a gzip-compressed tar file in order
 * @param archivePath - Archive file path
 * @param onEntry - Called for each entry; must read the stream to its end
 */
function readArchive(archivePath: string, onEntry: EntryHandler): Promise<void> {
  return new Promise((resolveRead, reject) => {
    const source = createReadStream(archivePath)
    const gunzip = createGunzip()
    const reader = extract()

    // @fn fail - stop reading on the first error anywhere in the chain
    const fail = (error: unknown) => {
      source.destroy()
      gunzip.destroy()
      reader.destroy()
      reject(error)
    }

    reader.on('entry', (header, stream, next) => {
      const entry: ArchiveEntryInfo = {
        name: header.name,
        type: header.type ?? 'file',
        mode: typeof header.mode === 'number' ? header.mode : 0,
        size: typeof header.size === 'number' ? header.size : 0,
        mtime: header.mtime instanceof Date ? header.mtime : undefined,
      }

      onEntry(entry, stream).then(() => next(), fail)
    })

    source.on('error', fail)
    gunzip.on('error', fail)
    reader.on('error', fail)
    reader.on('finish', () => resolveRead())

    source.pipe(gunzip).pipe(reader)
  })
}

/**
 * Read an entry stream to its end without writing it anywhere
 */
function drain(stream: Readable): Promise<void> {
  return new Promise((resolveDrain, reject) => {
    stream.on('end', () => resolveDrain())
    stream.on('error', reject)
    stream.resume()
  })
}

/**
 * Read the whole archive once without writing anything
 * @param bundle - Bundle to check
 * @returns Entry headers in archive order
 * @throws CorruptArchiveError when the container cannot be read to the end
 */
export async function validateArchive(bundle: Bundle): Promise<ArchiveEntryInfo[]> {
  const entries: ArchiveEntryInfo[] = []

  try {
    await readArchive(bundle.path, async (entry, stream) => {
      entries.push(entry)
      await drain(stream)
    })
  } catch (error) {
    throw new CorruptArchiveError(bundle.filename, { cause: error })
  }

  return entries
}

/**
 * Resolve an entry name inside the destination
 * @param destination - Absolute extraction directory
 * @param name - Entry name from the archive
 * @returns Absolute target path, or null when the entry would land outside
 */
export function resolveEntryPath(destination: string, name: string): string | null {
  const normalized = name.replace(/\\/g, '/')

  if (!normalized || normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    return null
  }

  const segments = normalized
    .split('/')
    .filter((segment) => segment && segment !== '.')

  if (segments.length === 0 || segments.includes('..')) return null

  const target = resolve(destination, ...segments)
  const fromRoot = relative(destination, target)

  if (!fromRoot || fromRoot.startsWith('..') || isAbsolute(fromRoot)) return null

  return target
}

/**
 * Real path of the deepest existing ancestor of a path (the path itself if it exists)
 */
async function nearestRealPath(path: string): Promise<string> {
  let current = path

  for (;;) {
    try {
      return await realpath(current)
    } catch (error) {
      const parent = dirname(current)

      if (errorCode(error) !== 'ENOENT' || parent === current) throw error

      current = parent
    }
  }
}

/** Whether a real path is a real directory or lies below it */
const isInside = (root: string, path: string): boolean =>
  path === root || path.startsWith(root.endsWith(sep) ? root : root + sep)

/**
 * Extract a bundle into a directory
 *
 * The archive is validated in full before anything is written. Entries with
 * absolute paths, `..` segments, or a parent that resolves through a symlink
 * to outside the destination are skipped as `path-traversal`; the rest keep
 * their relative paths, permission bits and modification times. Existing
 * files at the destination are overwritten.
 *
 * @param bundle - Bundle to extract
 * @param destination - Output directory (created if missing)
 * @param options - Extraction options
 * @returns Per-entry outcomes and totals
 */
export async function extractBundle(
  bundle: Bundle,
  destination: string,
  options: ExtractOptions = {}
): Promise<ExtractionReport> {
  const headers = await validateArchive(bundle)
  const total = headers.length
  const outputPath = resolve(destination)

  await mkdir(outputPath, { recursive: true })

  const realOutput = await realpath(outputPath)
  const entries: EntryOutcome[] = []
  // Modes and times of directories wait until their contents are written
  const directories: Array<{ target: string; entry: ArchiveEntryInfo }> = []

  let totalSize = 0

  // @fn record - store an entry outcome and report progress
  const record = (outcome: EntryOutcome) => {
    entries.push(outcome)
    options.onProgress?.(entries.length, total, outcome.path.slice(0, 40))

    if (outcome.status === 'skipped') {
      log.debug(`Skipped ${outcome.path}: ${outcome.reason}`)
    } else {
      log.debug(`Extracted ${outcome.path}`)
    }
  }

  // @fn safeParent - confirm the parent stays inside through symlinks, then create it
  const safeParent = async (target: string): Promise<boolean> => {
    const parent = dirname(target)

    if (!isInside(realOutput, await nearestRealPath(parent))) return false

    await mkdir(parent, { recursive: true })

    return true
  }

  // @fn openTarget - replace whatever is at the target with a new empty file
  const openTarget = async (target: string): Promise<FileHandle> => {
    try {
      const existing = await lstat(target)

      // The old file may be read-only or a symlink: never write through it
      if (!existing.isDirectory()) await rm(target, { force: true })
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error
    }

    return open(target, 'wx', 0o600)
  }

  // @fn copyInto - read the entry to its end, writing until the first failure
  const copyInto = async (handle: FileHandle, stream: Readable): Promise<void> => {
    let writeError: unknown = null

    for await (const chunk of stream) {
      if (writeError) continue

      try {
        await handle.write(chunk)
      } catch (error) {
        writeError = error
      }
    }

    await handle.close()

    if (writeError) throw writeError
  }

  // @fn writeEntry - extract one entry, recording failures as skips
  const writeEntry = async (entry: ArchiveEntryInfo, stream: Readable): Promise<void> => {
    const { name: path, size, type } = entry
    const target = resolveEntryPath(outputPath, path)

    if (!target) {
      await drain(stream)
      record({ path, status: 'skipped', reason: 'path-traversal', size })
      return
    }

    if (type !== 'file' && type !== 'contiguous-file' && type !== 'directory') {
      await drain(stream)
      record({ path, status: 'skipped', reason: 'unsupported-entry', size })
      return
    }

    let handle: FileHandle

    try {
      if (!(await safeParent(target))) {
        await drain(stream)
        record({ path, status: 'skipped', reason: 'path-traversal', size })
        return
      }

      if (type === 'directory') {
        await mkdir(target, { recursive: true })
        directories.push({ target, entry })
        await drain(stream)
        record({ path, status: 'extracted', size: 0 })
        return
      }

      handle = await openTarget(target)
    } catch (error) {
      log.warn(`Failed to extract ${path}: ${errorMessage(error)}`)
      await drain(stream)
      record({ path, status: 'skipped', reason: describeFsError(error, 'write-failed'), size })
      return
    }

    try {
      await copyInto(handle, stream)
      if (entry.mode) await chmod(target, entry.mode & 0o7777)

      if (entry.mtime) await utimes(target, entry.mtime, entry.mtime)
    } catch (error) {
      log.warn(`Failed to extract ${path}: ${errorMessage(error)}`)
      record({ path, status: 'skipped', reason: describeFsError(error, 'write-failed'), size })
      return
    }

    totalSize += size
    record({ path, status: 'extracted', size })
  }

  try {
    await readArchive(bundle.path, writeEntry)
  } catch (error) {
    // Validated a moment ago: the file changed underneath us
    throw new CorruptArchiveError(bundle.filename, { cause: error })
  }

  // Deepest first, so a read-only parent is closed after its children
  for (const { target, entry } of directories.reverse()) {
    try {
      if (entry.mode) await chmod(target, entry.mode & 0o7777)
      if (entry.mtime) await utimes(target, entry.mtime, entry.mtime)
    } catch (error) {
      log.warn(`Failed to restore attributes of ${entry.name}: ${errorMessage(error)}`)
    }
  }

  const extracted = entries.filter((entry) => entry.status === 'extracted').length

  return {
    bundle,
    destination: outputPath,
    entries,
    extracted,
    skipped: entries.length - extracted,
    totalSize,
  }
}
