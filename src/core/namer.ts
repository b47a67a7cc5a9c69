import { InvalidLabelError } from '../errors'

/** Archive extension of every bundle */
export const BUNDLE_EXTENSION = '.tar.gz'

/** `{label}_{YYYYMMDD}_{HHMMSS}.tar.gz` */
const BUNDLE_NAME_PATTERN = /^(.+)_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})\.tar\.gz$/

/**
 * Make a label safe to use inside a file name
 * @param label - Label given by the user
 * @returns Sanitized label
 * @throws InvalidLabelError when nothing usable remains
 */
export function sanitizeLabel(label: string): string {
  const sanitized = label
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .replace(/[/\\:*?"<>|]/g, '-')
    .trim()
    .replace(/^[.\-\s]+/, '')
    .replace(/[-\s]+$/, '')

  if (!sanitized) {
    throw new InvalidLabelError(label)
  }

  return sanitized
}

const pad = (value: number, width: number = 2): string =>
  String(value).padStart(width, '0')

/**
 * Format a time as `YYYYMMDD_HHMMSS` in local time
 * @param at - Time to format
 * @returns Fixed-width, lexicographically sortable stamp
 */
export function formatTimestamp(at: Date): string {
  return (
    `${pad(at.getFullYear(), 4)}${pad(at.getMonth() + 1)}${pad(at.getDate())}` +
    `_${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`
  )
}

/**
 * Build the bundle file name for a label and time
 * @param label - Bundle label (sanitized here)
 * @param at - Creation time
 * @returns File name such as `docs_20240102_090000.tar.gz`
 */
export function bundleFileName(label: string, at: Date): string {
  return `${sanitizeLabel(label)}_${formatTimestamp(at)}${BUNDLE_EXTENSION}`
}

/**
 * Recover label and timestamp from a bundle file name
 * @param filename - File name inside the bundle store
 * @returns Parsed parts, or null when the name is not a bundle name
 */
export function parseBundleFileName(
  filename: string
): { label: string; timestamp: Date } | null {
  const match = BUNDLE_NAME_PATTERN.exec(filename)

  if (!match) return null

  const [, label, year, month, day, hour, minute, second] = match
  const parts = [year, month, day, hour, minute, second].map(Number)
  const timestamp = new Date(
    parts[0],
    parts[1] - 1,
    parts[2],
    parts[3],
    parts[4],
    parts[5]
  )

  // Reject dates the Date constructor silently rolled over (e.g., month 13)
  if (
    timestamp.getFullYear() !== parts[0] ||
    timestamp.getMonth() !== parts[1] - 1 ||
    timestamp.getDate() !== parts[2] ||
    timestamp.getHours() !== parts[3] ||
    timestamp.getMinutes() !== parts[4] ||
    timestamp.getSeconds() !== parts[5]
  ) {
    return null
  }

  return { label, timestamp }
}

/**
 * Strip the bundle extension from a file name
 */
export function stripBundleExtension(filename: string): string {
  return filename.endsWith(BUNDLE_EXTENSION)
    ? filename.slice(0, -BUNDLE_EXTENSION.length)
    : filename
}
