import { readdirSync, statSync } from 'node:fs'
import { rm, readdir, stat } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { parseBundleFileName, stripBundleExtension } from './namer'
import { BundleIndex } from './store'
import { TEMP_FILE_PATTERN } from './writer'
import {
  BundleNotFoundError,
  StoreUnavailableError,
  errorCode,
  errorMessage,
} from '../errors'
import { logger } from '../utils/logger'
import type { Bundle, BundleRecord, DeletionReport } from '../types'

const log = logger.store

/** Temporary files younger than this may still belong to a running write */
export const ORPHAN_AGE_MS = 60 * 60 * 1000

/**
 * Newest first, ties by file name
 */
export function compareBundles(a: Bundle, b: Bundle): number {
  const byTime = b.timestamp.getTime() - a.timestamp.getTime()

  if (byTime !== 0) return byTime

  return a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0
}

/**
 * Read index records, when the store has an index
 */
function readIndex(storeDir: string): Map<string, BundleRecord> {
  try {
    const index = BundleIndex.openReadonly(storeDir)

    if (!index) return new Map()

    try {
      return index.getAllBundles()
    } finally {
      index.close()
    }
  } catch (error) {
    log.debug(`Bundle index unreadable: ${errorMessage(error)}`)
    return new Map()
  }
}

/**
 * List the bundles in a store
 *
 * Reads the directory and nothing else: a missing store is an empty list and
 * no file is created or changed. Files whose names are not bundle names are
 * ignored.
 *
 * @param storeDir - Bundle store directory
 * @returns Bundles, newest first
 */
export function listBundles(storeDir: string): Bundle[] {
  const store = resolve(storeDir)

  let names: string[]

  try {
    names = readdirSync(store)
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return []

    throw new StoreUnavailableError(store, { cause: error })
  }

  const records = readIndex(store)
  const bundles: Bundle[] = []

  for (const filename of names) {
    const parsed = parseBundleFileName(filename)

    if (!parsed) continue

    const path = join(store, filename)

    let sizeBytes: number

    try {
      const stats = statSync(path)

      if (!stats.isFile()) continue

      sizeBytes = stats.size
    } catch (error) {
      // Deleted between readdir and stat
      if (errorCode(error) === 'ENOENT') continue

      throw new StoreUnavailableError(store, { cause: error })
    }

    bundles.push({
      label: parsed.label,
      timestamp: parsed.timestamp,
      filename,
      path,
      sizeBytes,
      fileCount: records.get(filename)?.fileCount,
    })
  }

  return bundles.sort(compareBundles)
}

/**
 * Find one bundle by id
 *
 * The id may be a file name, a file name without extension, or a label (the
 * newest bundle with that label wins).
 *
 * @param storeDir - Bundle store directory
 * @param id - Bundle id
 * @returns Matching bundle
 * @throws BundleNotFoundError when nothing matches
 */
export function findBundle(storeDir: string, id: string): Bundle {
  const bundles = listBundles(storeDir)
  const match =
    bundles.find((bundle) => bundle.filename === id) ??
    bundles.find((bundle) => stripBundleExtension(bundle.filename) === id) ??
    bundles.find((bundle) => bundle.label === id)

  if (!match) {
    throw new BundleNotFoundError(id, resolve(storeDir))
  }

  return match
}

/**
 * Delete bundles, continuing past individual failures
 * @param storeDir - Bundle store directory
 * @param bundles - Bundles to delete
 * @returns Deleted and failed bundles
 */
export async function deleteBundles(
  storeDir: string,
  bundles: Iterable<Bundle>
): Promise<DeletionReport> {
  const store = resolve(storeDir)
  const report: DeletionReport = { deleted: [], failed: [], freedBytes: 0 }

  for (const bundle of bundles) {
    try {
      await rm(join(store, bundle.filename))

      report.deleted.push(bundle)
      report.freedBytes += bundle.sizeBytes
      log.debug(`Deleted ${bundle.filename}`)
    } catch (error) {
      report.failed.push({ bundle, reason: errorMessage(error) })
      log.debug(`Failed to delete ${bundle.filename}: ${errorMessage(error)}`)
    }
  }

  if (report.deleted.length > 0) {
    forgetInIndex(store, report.deleted)
  }

  return report
}

/**
 * Remove deleted bundles from the index
 */
function forgetInIndex(storeDir: string, bundles: Bundle[]): void {
  try {
    if (!BundleIndex.exists(storeDir)) return

    const index = new BundleIndex(storeDir)

    try {
      index.transaction(() => {
        for (const bundle of bundles) index.removeBundle(bundle.filename)
      })
    } finally {
      index.close()
    }
  } catch (error) {
    log.warn(`Bundle index not updated: ${errorMessage(error)}`)
  }
}

/**
 * Delete temporary files left behind by interrupted writes
 * @param storeDir - Bundle store directory
 * @param olderThanMs - Minimum age; younger files may belong to a running write
 * @returns Removed file names
 */
export async function removeOrphanedTempFiles(
  storeDir: string,
  olderThanMs: number = ORPHAN_AGE_MS
): Promise<string[]> {
  const store = resolve(storeDir)

  let names: string[]

  try {
    names = await readdir(store)
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return []

    throw new StoreUnavailableError(store, { cause: error })
  }

  const removed: string[] = []
  const cutoff = Date.now() - olderThanMs

  for (const name of names) {
    if (!TEMP_FILE_PATTERN.test(name)) continue

    const path = join(store, name)

    try {
      const stats = await stat(path)

      if (stats.mtimeMs > cutoff) continue

      await rm(path, { force: true })
      removed.push(name)
      log.debug(`Removed orphaned ${name}`)
    } catch (error) {
      log.warn(`Could not remove ${name}: ${errorMessage(error)}`)
    }
  }

  return removed
}
