import { access, readdir, realpath, stat } from 'node:fs/promises'
import { constants, type Dirent, type Stats } from 'node:fs'
import { join, resolve } from 'node:path'
import {
  SourceUnavailableError,
  describeFsError,
  errorCode,
  errorMessage,
} from '../errors'
import { resolveVerdict } from './pattern'
import { logger } from '../utils/logger'
import type { FileEntry, Matcher, SelectionResult, SkippedEntry } from '../types'

const log = logger.scan

/**
 * File selection options
 */
export interface SelectOptions {
  /** Absolute paths pruned without consulting the matcher */
  exclude?: string[]
}

/** Code-unit order, independent of locale */
const byName = (a: Dirent, b: Dirent): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0

/**
 * Walk a directory tree and collect the files a matcher includes
 *
 * Entries are visited depth-first with each directory's entries sorted by
 * name, so the same tree always yields the same ordered list. A directory
 * excluded by a rule is pruned without looking inside it; an included one is
 * listed in `directories` so empty directories survive a round trip. Per-entry problems
 * are recorded in `skipped` and never stop the walk.
 *
 * @param root - Directory the relative paths start from
 * @param matcher - Compiled rules
 * @param options - Selection options
 * @returns Selected files in walk order and skipped entries
 */
export async function selectFiles(
  root: string,
  matcher: Matcher,
  options: SelectOptions = {}
): Promise<SelectionResult> {
  const rootPath = resolve(root)

  try {
    const rootStats = await stat(rootPath)

    if (!rootStats.isDirectory()) {
      throw new SourceUnavailableError(rootPath, 'not a directory')
    }
  } catch (error) {
    if (error instanceof SourceUnavailableError) throw error

    throw new SourceUnavailableError(
      rootPath,
      errorCode(error) === 'ENOENT' ? 'directory not found' : errorMessage(error)
    )
  }

  const pruned = new Set((options.exclude ?? []).map((path) => resolve(path)))
  const files: FileEntry[] = []
  const directories: FileEntry[] = []
  const skipped: SkippedEntry[] = []
  const seen = new Set<string>()

  // @fn skip - record a skipped entry
  const skip = (path: string, error: unknown, fallback?: SkippedEntry['reason']) => {
    const reason = describeFsError(error, fallback)

    log.debug(`Skipped ${path}: ${reason}`)
    skipped.push({ path, reason, detail: errorMessage(error) })
  }

  // @fn addFile - stat and record a selected file
  const addFile = async (absolutePath: string, relativePath: string) => {
    if (seen.has(relativePath)) return

    try {
      const stats = await stat(absolutePath)

      await access(absolutePath, constants.R_OK)

      seen.add(relativePath)
      files.push({
        relativePath,
        absolutePath,
        mode: stats.mode,
        size: stats.size,
        mtime: stats.mtimeMs,
      })
    } catch (error) {
      skip(relativePath, error)
    }
  }

  // @fn walk - visit one directory; ancestors holds real paths on the descent path
  const walk = async (
    dir: string,
    relativeDir: string,
    inherited: boolean,
    ancestors: string[]
  ): Promise<void> => {
    let entries: Dirent[]

    try {
      entries = await readdir(dir, { withFileTypes: true })
    } catch (error) {
      skip(relativeDir || '.', error)
      return
    }

    entries.sort(byName)

    for (const entry of entries) {
      const absolutePath = join(dir, entry.name)
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name

      if (pruned.has(absolutePath)) continue

      let isDirectory = entry.isDirectory()
      let isFile = entry.isFile()

      if (entry.isSymbolicLink()) {
        try {
          const target = await stat(absolutePath)

          isDirectory = target.isDirectory()
          isFile = target.isFile()
        } catch (error) {
          skip(relativePath, error, 'not-found')
          continue
        }
      }

      if (isDirectory) {
        const verdict = matcher.evaluate(relativePath, true)

        if (verdict === 'excluded') {
          log.debug(`Pruned ${relativePath}/`)
          continue
        }

        let real: string
        let dirStats: Stats

        try {
          real = await realpath(absolutePath)
          dirStats = await stat(absolutePath)
        } catch (error) {
          skip(relativePath, error)
          continue
        }

        if (ancestors.includes(real)) {
          log.debug(`Skipped ${relativePath}: symlink-cycle`)
          skipped.push({ path: relativePath, reason: 'symlink-cycle' })
          continue
        }

        const included = resolveVerdict(inherited, verdict)

        if (included) {
          directories.push({
            relativePath,
            absolutePath,
            mode: dirStats.mode,
            size: 0,
            mtime: dirStats.mtimeMs,
          })
        }

        await walk(absolutePath, relativePath, included, [...ancestors, real])
      } else if (isFile) {
        if (resolveVerdict(inherited, matcher.evaluate(relativePath, false))) {
          await addFile(absolutePath, relativePath)
        }
      }
      // Sockets, FIFOs and devices are never selected
    }
  }

  let rootReal: string

  try {
    rootReal = await realpath(rootPath)
  } catch (error) {
    throw new SourceUnavailableError(rootPath, errorMessage(error))
  }

  await walk(rootPath, '', false, [rootReal])

  return { root: rootPath, files, directories, skipped }
}
