import { deleteBundles, listBundles, removeOrphanedTempFiles } from '../core/catalog'
import { formatBytes } from '../utils/progress'
import { confirm } from '../utils/prompt'
import { logger } from '../utils/logger'
import type { CleanOptions, DeletionReport } from '../types'

const log = logger.clean

/**
 * Delete every bundle in the store
 * @param options - Clean command options
 * @returns Deletion report, or null when the user backed out
 */
export async function clean(options: CleanOptions): Promise<DeletionReport | null> {
  const { storeDir, yes } = options

  const bundles = listBundles(storeDir)

  if (bundles.length === 0) {
    log.info(`No bundles to clean in ${storeDir}`)
    return { deleted: [], failed: [], freedBytes: 0 }
  }

  const totalSize = bundles.reduce((sum, bundle) => sum + bundle.sizeBytes, 0)

  log.info(`Found ${bundles.length} bundles (total: ${formatBytes(totalSize)})`)

  if (!yes && !(await confirm(`Delete all ${bundles.length} bundles?`))) {
    log.info('Clean cancelled')
    return null
  }

  const report = await deleteBundles(storeDir, bundles)

  await removeOrphanedTempFiles(storeDir)

  log.success(
    `Deleted ${report.deleted.length} bundles (${formatBytes(report.freedBytes)})`
  )

  for (const { bundle, reason } of report.failed) {
    log.warn(`Failed to delete ${bundle.filename}: ${reason}`)
  }

  return report
}
