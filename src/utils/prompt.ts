import { consola } from 'consola'
import { formatAge, formatBytes } from './progress'
import type { Bundle } from '../types'

/**
 * One line describing a bundle in lists and menus
 * @param bundle - Bundle to describe
 * @param position - 1-based position in the list
 */
export function describeBundle(bundle: Bundle, position: number): string {
  const count =
    bundle.fileCount === undefined ? '' : `, ${bundle.fileCount} files`

  return `${String(position).padStart(3)}. ${bundle.filename} (${formatBytes(
    bundle.sizeBytes
  )}, ${formatAge(bundle.timestamp)}${count})`
}

/**
 * Questions asked on the terminal
 */
export interface Prompter {
  select(message: string, choices: string[]): Promise<unknown>
  confirm(message: string): Promise<unknown>
}

/** Prompter backed by consola */
export const consolaPrompter: Prompter = {
  select: (message, choices) =>
    consola.prompt(message, { type: 'select', options: choices }),
  confirm: (message) => consola.prompt(message, { type: 'confirm', initial: true }),
}

/**
 * Let the user pick a bundle
 * @param bundles - Choices, newest first
 * @param prompter - Where the question is asked
 * @returns Chosen bundle, or null when the user backs out
 */
export async function chooseBundle(
  bundles: Bundle[],
  prompter: Prompter = consolaPrompter
): Promise<Bundle | null> {
  const choices = bundles.map((bundle, index) => describeBundle(bundle, index + 1))

  const answer = await prompter.select(
    `Select a bundle (total: ${bundles.length})`,
    [...choices, 'exit']
  )

  if (typeof answer !== 'string') return null

  const index = choices.indexOf(answer)

  return index === -1 ? null : bundles[index]
}

/**
 * Ask a yes/no question
 * @param message - Question
 * @param prompter - Where the question is asked
 * @returns Whether the user agreed
 */
export async function confirm(
  message: string,
  prompter: Prompter = consolaPrompter
): Promise<boolean> {
  return (await prompter.confirm(message)) === true
}
