import { resolve } from 'node:path'
import { compileRules, hasInclusionRule, loadRuleSet } from '../core/pattern'
import { selectFiles } from '../core/selector'
import { sanitizeLabel } from '../core/namer'
import { writeBundle } from '../core/writer'
import { removeOrphanedTempFiles } from '../core/catalog'
import { InvalidPatternError } from '../errors'
import { createOptionalProgressBar, formatBytes } from '../utils/progress'
import { logger } from '../utils/logger'
import type { PackOptions, SkippedEntry, WriteResult } from '../types'

const log = logger.pack

/** Skipped entries shown in the summary before "... and N more" */
const SKIPPED_PREVIEW = 5

/**
 * Warn about skipped entries, showing the first few
 * @param skipped - Skipped entries
 */
export function reportSkipped(skipped: SkippedEntry[]): void {
  if (skipped.length === 0) return

  log.warn(`Skipped ${skipped.length} items:`)

  for (const entry of skipped.slice(0, SKIPPED_PREVIEW)) {
    log.warn(`  ${entry.path}: ${entry.reason}`)
  }

  if (skipped.length > SKIPPED_PREVIEW) {
    log.warn(`  ... and ${skipped.length - SKIPPED_PREVIEW} more`)
  }
}

/**
 * Select files by pattern file and pack them into a new bundle
 * @param options - Pack command options
 * @returns Written bundle; `skipped` covers both selection and write
 */
export async function pack(options: PackOptions): Promise<WriteResult> {
  const { patternFile, label, root, storeDir, compressionLevel, verbose } = options

  const rulesPath = resolve(patternFile)
  const rootPath = resolve(root)

  // Fail on a bad label before walking the tree
  sanitizeLabel(label)

  const rules = await loadRuleSet(rulesPath)

  if (!hasInclusionRule(rules)) {
    throw new InvalidPatternError(
      rulesPath,
      0,
      '',
      'no inclusion rules (every rule starts with "!"), nothing could be selected'
    )
  }

  const matcher = compileRules(rules)

  log.start(`Selecting files in ${rootPath} (${rules.length} rules)`)

  const selection = await selectFiles(rootPath, matcher, { exclude: [storeDir] })
  const selectedSize = selection.files.reduce((sum, file) => sum + file.size, 0)

  log.success(
    `Matched ${selection.files.length} files (${formatBytes(selectedSize)})`
  )

  const orphans = await removeOrphanedTempFiles(storeDir)

  if (orphans.length > 0) {
    log.info(`Removed ${orphans.length} unfinished bundle files`)
  }

  log.start(`Packing ${selection.files.length} files into ${storeDir}`)

  const result = await writeBundle(selection, storeDir, label, {
    compressionLevel,
    onProgress: createOptionalProgressBar(verbose, selection.files.length),
  })

  const skipped = [...selection.skipped, ...result.skipped]
  const originalSize = result.archived.reduce((sum, file) => sum + file.size, 0)
  const compressionRatio =
    originalSize > 0
      ? ((1 - result.bundle.sizeBytes / originalSize) * 100).toFixed(1)
      : '0.0'

  // @fn printPackSummary - print pack result summary
  log.box({
    title: 'Pack Complete',
    message: [
      `Output: ${result.bundle.path}`,
      `Files: ${result.archived.length}`,
      `Original: ${formatBytes(originalSize)}`,
      `Bundle size: ${formatBytes(result.bundle.sizeBytes)}`,
      `Compression: ${compressionRatio}%`,
      `Skipped: ${skipped.length}`,
    ].join('\n'),
    style: {
      borderColor: 'green',
    },
  })

  reportSkipped(skipped)

  return { ...result, skipped }
}
