export {
  parseRules,
  loadRuleSet,
  ruleToRegExp,
  compileRules,
  hasInclusionRule,
  normalizeRelativePath,
} from './core/pattern'
export { selectFiles } from './core/selector'
export {
  sanitizeLabel,
  formatTimestamp,
  bundleFileName,
  parseBundleFileName,
  BUNDLE_EXTENSION,
} from './core/namer'
export { writeBundle, DEFAULT_COMPRESSION_LEVEL } from './core/writer'
export { validateArchive, extractBundle } from './core/reader'
export {
  listBundles,
  findBundle,
  deleteBundles,
  removeOrphanedTempFiles,
} from './core/catalog'
export { BundleIndex } from './core/store'

export {
  SyncfError,
  InvalidPatternError,
  InvalidLabelError,
  EmptySelectionError,
  CorruptArchiveError,
  StoreUnavailableError,
  SourceUnavailableError,
  SourceChangedError,
  BundleNotFoundError,
  InvalidConfigError,
} from './errors'
export { resolveConfig } from './config'

export { createProgressBar, formatBytes } from './utils/progress'
export { logger, createLogger, consola } from './utils/logger'

export { pack } from './commands/pack'
export { unpack } from './commands/unpack'
export { list } from './commands/list'
export { clean } from './commands/clean'

export type {
  Rule,
  RuleSet,
  Verdict,
  Matcher,
  SkipReason,
  SkippedEntry,
  FileEntry,
  SelectionResult,
  Bundle,
  WriteResult,
  ExtractionReport,
  DeletionReport,
  BundleRecord,
  PackOptions,
  UnpackOptions,
  ListOptions,
  CleanOptions,
  ProgressCallback,
} from './types'
export type { SyncfConfig, ConfigOptions } from './config'
