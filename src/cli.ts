#!/usr/bin/env node
import { Command } from 'commander'
import { pack } from './commands/pack'
import { unpack } from './commands/unpack'
import { list } from './commands/list'
import { clean } from './commands/clean'
import { resolveConfig, type SyncfConfig } from './config'
import { EXIT_IO_ERROR, SyncfError } from './errors'
import { consola, setVerbose } from './utils/logger'

/**
 * Log an error and exit with its code (2 for user errors, 1 otherwise)
 */
function fail(error: unknown): never {
  consola.error(error instanceof Error ? error.message : error)
  process.exit(error instanceof SyncfError ? error.exitCode : EXIT_IO_ERROR)
}

const program = new Command()

program
  .name('syncf')
  .description('Pack files selected by pattern rules into timestamped bundles')
  .version('0.1.0')
  .option('-v, --verbose', 'display the details of actions', false)
  .option('--store <dir>', 'bundle store directory')

/**
 * Resolve the configuration from the global options
 */
function loadConfig(): SyncfConfig {
  const globals = program.opts<{ verbose: boolean; store?: string }>()
  const config = resolveConfig({ store: globals.store, verbose: globals.verbose })

  setVerbose(config.verbose)

  return config
}

program
  .command('pack')
  .description('Pack the files matched by a pattern file into a new bundle')
  .argument('<pattern-file>', 'file with one pattern per line')
  .argument('<label>', 'bundle label')
  .option('-r, --root <dir>', 'directory the patterns apply to', '.')
  .action(async (patternFile: string, label: string, options: { root: string }) => {
    try {
      const config = loadConfig()

      await pack({
        patternFile,
        label,
        root: options.root,
        storeDir: config.storeDir,
        compressionLevel: config.compressionLevel,
        verbose: config.verbose,
      })
    } catch (error) {
      fail(error)
    }
  })

program
  .command('unpack')
  .description('Restore a bundle (prompts for one when no id is given)')
  .argument('[bundle]', 'bundle file name, name without extension, or label')
  .option('-o, --output <dir>', 'output directory', '.')
  .option('-y, --yes', 'do not ask for confirmation', false)
  .action(
    async (bundle: string | undefined, options: { output: string; yes: boolean }) => {
      try {
        const config = loadConfig()

        await unpack({
          bundle,
          output: options.output,
          storeDir: config.storeDir,
          yes: options.yes,
          verbose: config.verbose,
        })
      } catch (error) {
        fail(error)
      }
    }
  )

program
  .command('list')
  .description('Display the bundles in the store, newest first')
  .action(() => {
    try {
      const config = loadConfig()

      list({ storeDir: config.storeDir })
    } catch (error) {
      fail(error)
    }
  })

program
  .command('clean')
  .description('Delete all bundles in the store')
  .option('-y, --yes', 'do not ask for confirmation', false)
  .action(async (options: { yes: boolean }) => {
    try {
      const config = loadConfig()

      await clean({ storeDir: config.storeDir, yes: options.yes })
    } catch (error) {
      fail(error)
    }
  })

program.parseAsync().catch(fail)
