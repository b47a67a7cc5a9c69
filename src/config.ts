import { realpathSync } from 'node:fs'
import { dirname, join, resolve } from 'node:path'
import { InvalidConfigError } from './errors'
import { DEFAULT_COMPRESSION_LEVEL } from './core/writer'

/** Store directory name beside the install root */
export const STORE_DIRNAME = '.files'

/**
 * Options given on the command line
 */
export interface ConfigOptions {
  /** Explicit bundle store directory */
  store?: string
  verbose?: boolean
}

/**
 * Settings resolved once per invocation and passed to every operation
 */
export interface SyncfConfig {
  /** Absolute bundle store directory */
  storeDir: string
  /** gzip level (1-9) */
  compressionLevel: number
  verbose: boolean
}

/**
 * Install root of the running executable: the parent of the directory holding
 * the entry script (e.g. `<root>/dist/cli.js` → `<root>`)
 * @param entry - Entry script path (defaults to process.argv[1])
 */
export function installRoot(entry: string | undefined = process.argv[1]): string {
  if (!entry) return process.cwd()

  let script: string

  try {
    script = realpathSync(entry)
  } catch {
    script = resolve(entry)
  }

  return dirname(dirname(script))
}

/**
 * Parse a compression level from the environment
 */
function parseCompressionLevel(value: string | undefined): number {
  if (value === undefined || value === '') return DEFAULT_COMPRESSION_LEVEL

  const level = Number(value)

  if (!Number.isInteger(level) || level < 1 || level > 9) {
    throw new InvalidConfigError(
      `SYNCF_COMPRESSION_LEVEL must be an integer from 1 to 9, got "${value}"`
    )
  }

  return level
}

/**
 * Resolve the configuration of one invocation
 *
 * The store is `--store`, else `SYNCF_STORE`, else a `.files` directory beside
 * the install root.
 *
 * @param options - Command line options
 * @param env - Environment variables
 * @param entry - Entry script path used to find the install root
 */
export function resolveConfig(
  options: ConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  entry?: string
): SyncfConfig {
  const cwd = process.cwd()
  const storeDir = options.store
    ? resolve(cwd, options.store)
    : env.SYNCF_STORE
      ? resolve(cwd, env.SYNCF_STORE)
      : join(installRoot(entry), STORE_DIRNAME)

  return {
    storeDir,
    compressionLevel: parseCompressionLevel(env.SYNCF_COMPRESSION_LEVEL),
    verbose: options.verbose ?? false,
  }
}
