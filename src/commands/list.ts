import { listBundles } from '../core/catalog'
import { formatBytes } from '../utils/progress'
import { describeBundle } from '../utils/prompt'
import { consola, logger } from '../utils/logger'
import type { Bundle, ListOptions } from '../types'

const log = logger.list

/**
 * Print the bundles in the store, newest first
 * @param options - List command options
 * @returns Listed bundles
 */
export function list(options: ListOptions): Bundle[] {
  const bundles = listBundles(options.storeDir)

  if (bundles.length === 0) {
    log.info(`No bundles in ${options.storeDir}`)
    return bundles
  }

  const totalSize = bundles.reduce((sum, bundle) => sum + bundle.sizeBytes, 0)

  log.info(
    `${bundles.length} bundles in ${options.storeDir} (${formatBytes(totalSize)})`
  )

  bundles.forEach((bundle, index) => {
    consola.log(describeBundle(bundle, index + 1))
  })

  return bundles
}
