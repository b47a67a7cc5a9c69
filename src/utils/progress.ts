import type { ProgressCallback } from '../types'

/**
 * Create a progress bar callback
 * @param total - Expected total count for progress calculation
 * @returns Progress callback function
 */
export function createProgressBar(total: number): ProgressCallback {
  const startTime = Date.now()

  return (current: number, actualTotal: number, message?: string) => {
    // @fn calculateProgress - calculate progress and render bar
    const t = actualTotal || total
    const ratio = t > 0 ? Math.min(current / t, 1) : 0
    const percent = Math.round(ratio * 100)
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1)
    const barWidth = 30
    const filled = Math.max(0, Math.round(ratio * barWidth))
    const empty = Math.max(0, barWidth - filled)
    const bar = '█'.repeat(filled) + '░'.repeat(empty)

    const line = `\r[${bar}] ${percent}% (${current}/${t}) ${elapsed}s${
      message ? ` - ${message}` : ''
    }`

    process.stdout.write(line)

    if (current >= t) {
      process.stdout.write('\n')
    }
  }
}

/**
 * Format bytes to human-readable string
 * @param bytes - Number of bytes
 * @returns Formatted string (e.g., "1.5 MB")
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB']

  let size = bytes
  let unitIndex = 0

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024
    unitIndex++
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`
}

/**
 * Format a bundle time for listings
 * @param at - Time to format
 * @param now - Reference time (defaults to now)
 * @returns "today 09:30", "yesterday 18:05", "03-14 11:00" or "2023-12-31"
 */
export function formatAge(at: Date, now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  const time = `${pad(at.getHours())}:${pad(at.getMinutes())}`
  const sameDay = (a: Date, b: Date) =>
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()

  const yesterday = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1)

  if (sameDay(at, now)) return `today ${time}`
  if (sameDay(at, yesterday)) return `yesterday ${time}`
  if (at.getFullYear() === now.getFullYear()) {
    return `${pad(at.getMonth() + 1)}-${pad(at.getDate())} ${time}`
  }

  return `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`
}

/**
 * Progress callback that draws only when enabled
 * @param enabled - Whether to draw (verbose mode)
 * @param total - Expected total count
 */
export function createOptionalProgressBar(
  enabled: boolean,
  total: number
): ProgressCallback | undefined {
  return enabled ? createProgressBar(total) : undefined
}
