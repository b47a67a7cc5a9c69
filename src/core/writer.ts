import archiver from 'archiver'
import { createWriteStream, type ReadStream, type Stats } from 'node:fs'
import { mkdir, open, rename, rm, stat, type FileHandle } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { once } from 'node:events'
import { finished } from 'node:stream/promises'
import { bundleFileName, sanitizeLabel } from './namer'
import { BundleIndex } from './store'
import {
  EmptySelectionError,
  SourceChangedError,
  StoreUnavailableError,
  SyncfError,
  describeFsError,
  errorMessage,
} from '../errors'
import { logger } from '../utils/logger'
import type {
  FileEntry,
  ProgressCallback,
  SelectionResult,
  SkippedEntry,
  WriteResult,
} from '../types'

const log = logger.pack

/** Default gzip level */
export const DEFAULT_COMPRESSION_LEVEL = 6

/** Temporary files written next to the bundle they will become */
export const TEMP_FILE_PATTERN = /^\..+\.tar\.gz\.\d+-\d+\.tmp$/

/**
 * Bundle write options
 */
export interface WriteOptions {
  /** Creation time (defaults to now) */
  now?: Date
  /** gzip level (1-9) */
  compressionLevel?: number
  onProgress?: ProgressCallback
}

/**
 * Name of the temporary file a bundle is written to before the rename
 * @param filename - Final bundle file name
 */
export function tempFileName(filename: string): string {
  return `.${filename}.${process.pid}-${Date.now()}.tmp`
}

/** Drop milliseconds: bundle names carry second precision */
const toSecond = (at: Date): Date =>
  new Date(Math.floor(at.getTime() / 1000) * 1000)

/**
 * Record a written bundle in the store index
 *
 * The bundle file is already in place, so a failing index only costs the
 * file count in listings.
 */
function recordInIndex(
  storeDir: string,
  result: WriteResult,
  skippedCount: number
): void {
  try {
    const index = new BundleIndex(storeDir)

    try {
      index.recordBundle({
        filename: result.bundle.filename,
        label: result.bundle.label,
        createdAt: result.bundle.timestamp.toISOString(),
        fileCount: result.archived.length,
        skippedCount,
        sizeBytes: result.bundle.sizeBytes,
      })
    } finally {
      index.close()
    }
  } catch (error) {
    log.warn(`Bundle index not updated: ${errorMessage(error)}`)
  }
}

/**
 * Stream selected files into a new bundle in the store
 *
 * Included directories are written first, then files one at a time in
 * selection order, each read straight from disk up to the size it had when
 * opened. A file that vanished or cannot be opened since it was selected is
 * skipped and reported; one that shrinks or fails mid-read aborts the write
 * with a `SourceChangedError` naming it. The archive is written to a
 * temporary file and renamed into place, so the store never shows a partial
 * bundle. A bundle with the same label and second as an existing one
 * replaces it.
 *
 * @param selection - Files to archive
 * @param storeDir - Bundle store directory (created if missing)
 * @param label - Bundle label
 * @param options - Write options
 * @returns Written bundle with archived and skipped files
 */
export async function writeBundle(
  selection: SelectionResult,
  storeDir: string,
  label: string,
  options: WriteOptions = {}
): Promise<WriteResult> {
  const timestamp = toSecond(options.now ?? new Date())
  const filename = bundleFileName(label, timestamp)
  const safeLabel = sanitizeLabel(label)

  if (selection.files.length === 0 && selection.directories.length === 0) {
    throw new EmptySelectionError('no-match')
  }

  const store = resolve(storeDir)

  try {
    await mkdir(store, { recursive: true })
  } catch (error) {
    throw new StoreUnavailableError(store, { cause: error })
  }

  const finalPath = join(store, filename)
  const tempPath = join(store, tempFileName(filename))
  const total = selection.files.length
  const archived: FileEntry[] = []
  const writtenDirectories: FileEntry[] = []
  const skipped: SkippedEntry[] = []

  const archive = archiver('tar', {
    gzip: true,
    gzipOptions: { level: options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL },
  })
  const output = createWriteStream(tempPath)

  // Rejects on the first archiver, source or destination failure; raced
  // from the first await on, so it always has a handler
  let abort: (error: unknown) => void = () => undefined
  const fatal = new Promise<never>((_, reject) => {
    abort = reject
  })

  archive.on('error', (error) => abort(error))
  archive.on('warning', (warning) => log.warn(`Archive warning: ${warning.message}`))
  output.on('error', (error) => abort(new StoreUnavailableError(store, { cause: error })))

  archive.pipe(output)

  // @fn skip - record a file that could not be archived
  const skip = (file: FileEntry, error: unknown) => {
    const reason = describeFsError(error)

    log.debug(`Skipped ${file.relativePath}: ${reason}`)
    skipped.push({ path: file.relativePath, reason, detail: errorMessage(error) })
  }

  // @fn openSource - open a selected file, or null when it must be skipped
  const openSource = async (
    file: FileEntry
  ): Promise<{ handle: FileHandle; stats: Stats } | null> => {
    let handle: FileHandle

    try {
      handle = await open(file.absolutePath, 'r')
    } catch (error) {
      skip(file, error)
      return null
    }

    try {
      const stats = await handle.stat()

      if (stats.isFile()) return { handle, stats }

      log.debug(`Skipped ${file.relativePath}: not-a-file`)
      skipped.push({ path: file.relativePath, reason: 'not-a-file' })
    } catch (error) {
      skip(file, error)
    }

    await handle.close()

    return null
  }

  // @fn waitForEntry - wait until archiver has written the entry just appended
  const waitForEntry = async (file: FileEntry, append: () => void): Promise<void> => {
    const entryWritten = new Promise<void>((resolveEntry) => {
      archive.once('entry', () => resolveEntry())
    })

    append()

    try {
      await Promise.race([entryWritten, fatal])
    } catch (error) {
      // Past the header the entry can no longer be skipped
      throw error instanceof SyncfError
        ? error
        : new SourceChangedError(file.relativePath, { cause: error })
    }
  }

  // @fn appendDirectory - write a directory entry from its selection stats
  const appendDirectory = async (directory: FileEntry): Promise<void> => {
    await waitForEntry(directory, () => {
      // archiver types a name ending in '/' as a directory entry
      archive.append(Buffer.alloc(0), {
        name: `${directory.relativePath}/`,
        mode: directory.mode & 0o7777,
        date: new Date(directory.mtime),
      })
    })

    writtenDirectories.push(directory)
    log.debug(`Added ${directory.relativePath}/`)
  }

  // @fn appendFile - stream one file into the archive and wait for its entry
  const appendFile = async (file: FileEntry): Promise<void> => {
    const source = await openSource(file)

    if (!source) return

    const { handle, stats } = source

    // Read exactly the size in the header: growth after the stat is cut off
    let content: Buffer | ReadStream

    if (stats.size === 0) {
      await handle.close()
      content = Buffer.alloc(0)
    } else {
      content = handle.createReadStream({ start: 0, end: stats.size - 1 })
      content.once('error', (error) => abort(error))
    }

    await waitForEntry(file, () => {
      archive.append(content, {
        name: file.relativePath,
        mode: stats.mode & 0o7777,
        date: stats.mtime,
        stats,
      })
    })

    archived.push({
      ...file,
      mode: stats.mode,
      size: stats.size,
      mtime: stats.mtimeMs,
    })
    log.debug(`Added ${file.relativePath}`)
  }

  // @fn discardTemp - stop writing and remove the temporary file
  const discardTemp = async () => {
    archive.abort()
    output.destroy()
    await rm(tempPath, { force: true })
  }

  try {
    await Promise.race([once(output, 'open'), fatal])

    for (const directory of selection.directories) {
      await appendDirectory(directory)
    }

    for (const [index, file] of selection.files.entries()) {
      await appendFile(file)
      options.onProgress?.(index + 1, total, file.relativePath)
    }

    if (archived.length === 0 && writtenDirectories.length === 0) {
      await discardTemp()
      throw new EmptySelectionError('all-skipped', skipped)
    }

    await Promise.race([
      Promise.all([archive.finalize(), finished(output)]),
      fatal,
    ])
  } catch (error) {
    if (!(error instanceof EmptySelectionError)) await discardTemp()
    throw error
  }

  let sizeBytes: number

  try {
    await rename(tempPath, finalPath)
    sizeBytes = (await stat(finalPath)).size
  } catch (error) {
    await rm(tempPath, { force: true })
    throw new StoreUnavailableError(store, { cause: error })
  }

  const result: WriteResult = {
    bundle: {
      label: safeLabel,
      timestamp,
      filename,
      path: finalPath,
      sizeBytes,
      fileCount: archived.length,
    },
    archived,
    directories: writtenDirectories,
    skipped,
  }

  recordInIndex(store, result, skipped.length)

  return result
}
