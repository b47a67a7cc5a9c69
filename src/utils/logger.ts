import { consola, type ConsolaInstance } from 'consola'

/** Log level that shows debug output (per-file adds and skips) */
export const VERBOSE_LEVEL = 4

/** Default logger instances */
export const logger = {
  pack: consola.withTag('pack'),
  unpack: consola.withTag('unpack'),
  list: consola.withTag('list'),
  clean: consola.withTag('clean'),
  scan: consola.withTag('scan'),
  store: consola.withTag('store'),
}

/**
 * Create a new logger with tag
 * @param tag - Tag to identify log source
 * @returns Consola instance with tag
 */
export function createLogger(tag: string): ConsolaInstance {
  return consola.withTag(tag)
}

/**
 * Raise every logger to debug level
 * @param verbose - Whether detailed output was requested
 */
export function setVerbose(verbose: boolean): void {
  if (!verbose) return

  consola.level = VERBOSE_LEVEL

  for (const instance of Object.values(logger)) {
    instance.level = VERBOSE_LEVEL
  }
}

/** Re-export consola instance */
export { consola }
