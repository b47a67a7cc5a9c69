import { resolve } from 'node:path'
import { findBundle, listBundles } from '../core/catalog'
import { extractBundle } from '../core/reader'
import { BundleNotFoundError } from '../errors'
import { createOptionalProgressBar, formatBytes } from '../utils/progress'
import { chooseBundle, confirm } from '../utils/prompt'
import { logger } from '../utils/logger'
import type { ExtractionReport, UnpackOptions } from '../types'

const log = logger.unpack

/**
 * Restore a bundle into a directory
 * @param options - Unpack command options
 * @returns Extraction report, or null when the user backed out
 */
export async function unpack(options: UnpackOptions): Promise<ExtractionReport | null> {
  const { storeDir, output, yes, verbose } = options

  const outputPath = resolve(output)
  const bundles = listBundles(storeDir)

  if (bundles.length === 0) {
    throw new BundleNotFoundError('', storeDir)
  }

  const bundle = options.bundle
    ? findBundle(storeDir, options.bundle)
    : await chooseBundle(bundles)

  if (!bundle) {
    log.info('No bundle selected')
    return null
  }

  if (!yes && !(await confirm(`Unpack ${bundle.filename} into ${outputPath}?`))) {
    log.info('Unpack cancelled')
    return null
  }

  log.start(`Unpacking ${bundle.path} into ${outputPath}`)

  const startTime = Date.now()
  const report = await extractBundle(bundle, outputPath, {
    onProgress: createOptionalProgressBar(verbose, bundle.fileCount ?? 0),
  })
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1)

  log.box({
    title: 'Unpack Complete',
    message: [
      `Bundle: ${bundle.filename}`,
      `Extracted: ${report.extracted} entries (${formatBytes(report.totalSize)})`,
      `Skipped: ${report.skipped}`,
      `Time: ${elapsed}s`,
    ].join('\n'),
    style: {
      borderColor: report.skipped > 0 ? 'yellow' : 'green',
    },
  })

  for (const entry of report.entries) {
    if (entry.status === 'skipped') log.warn(`  ${entry.path}: ${entry.reason}`)
  }

  return report
}
