import { readFile } from 'node:fs/promises'
import picomatch from 'picomatch'
import { InvalidPatternError, errorMessage } from '../errors'
import type { Matcher, Rule, RuleSet, Verdict } from '../types'

/** Source name used for rules that did not come from a file */
const INLINE_SOURCE = '<inline>'

/**
 * Parse pattern file text into an ordered rule set
 *
 * Blank lines and `#` comments are dropped. `\#` and `\!` escape a leading
 * `#` or `!`. Trailing whitespace is trimmed unless escaped with `\`.
 *
 * @param text - Pattern file content
 * @param source - Name reported in errors (usually the file path)
 * @returns Rules in file order
 */
export function parseRules(text: string, source: string = INLINE_SOURCE): RuleSet {
  const rules: Rule[] = []
  const lines = text.split(/\r?\n/)

  lines.forEach((line, index) => {
    const raw = line.replace(/(?<!\\)\s+$/, '')

    if (!raw || raw.startsWith('#')) return

    let body = raw
    let negated = false

    if (body.startsWith('!')) {
      negated = true
      body = body.slice(1)
    } else if (body.startsWith('\\!') || body.startsWith('\\#')) {
      body = body.slice(1)
    }

    const directoryOnly = body.endsWith('/') && !body.endsWith('\\/')

    if (directoryOnly) body = body.slice(0, -1)

    let anchored = body.includes('/')

    if (body.startsWith('/')) {
      anchored = true
      body = body.slice(1)
    }

    if (!body) {
      throw new InvalidPatternError(source, index + 1, raw, 'empty pattern')
    }

    rules.push({
      raw,
      pattern: body,
      negated,
      directoryOnly,
      anchored,
      source,
      line: index + 1,
    })
  })

  return rules
}

/**
 * Read and parse a pattern file
 * @param filePath - Pattern file path
 * @returns Rules in file order
 */
export async function loadRuleSet(filePath: string): Promise<RuleSet> {
  let text: string

  try {
    text = await readFile(filePath, 'utf8')
  } catch (error) {
    throw new InvalidPatternError(
      filePath,
      0,
      '',
      `cannot read pattern file (${errorMessage(error)})`,
      { cause: error }
    )
  }

  return parseRules(text, filePath)
}

/** gitignore has no groups, braces or alternation: these stay literal */
const LITERAL_CHARS = new Set(['(', ')', '{', '}', '|'])

/** picomatch options matching gitignore wildcards */
const GLOB_OPTIONS: picomatch.PicomatchOptions = {
  dot: true,
  nobrace: true,
  noextglob: true,
  nonegate: true,
}

/**
 * Check a rule body and escape the characters picomatch would read as syntax
 *
 * Rejects an unclosed `[` class and a trailing `\` here, so a malformed rule
 * fails when the rule set is compiled.
 *
 * @param rule - Parsed rule
 * @returns Glob for picomatch
 */
function toGlob(rule: Rule): string {
  const { pattern } = rule

  let glob = ''
  let i = 0

  while (i < pattern.length) {
    const char = pattern[i]

    if (char === '\\') {
      if (i + 1 >= pattern.length) {
        throw new InvalidPatternError(
          rule.source,
          rule.line,
          rule.raw,
          'trailing "\\" escapes nothing'
        )
      }

      glob += pattern.slice(i, i + 2)
      i += 2
      continue
    }

    if (char === '[') {
      // A `]` right after `[`, `[!` or `[^` is a member, not the end
      let end = i + 1

      if (pattern[end] === '!' || pattern[end] === '^') end++
      if (pattern[end] === ']') end++

      while (end < pattern.length && pattern[end] !== ']') {
        end += pattern[end] === '\\' ? 2 : 1
      }

      if (end >= pattern.length) {
        throw new InvalidPatternError(
          rule.source,
          rule.line,
          rule.raw,
          'unbalanced "[" (character class is never closed)'
        )
      }

      glob += pattern.slice(i, end + 1)
      i = end + 1
      continue
    }

    glob += LITERAL_CHARS.has(char) ? `\\${char}` : char
    i++
  }

  return glob
}

/**
 * Compile one rule into a regular expression over a normalized relative path
 *
 * A rule without a `/` matches its name at any depth.
 *
 * @param rule - Parsed rule
 * @returns Anchored regular expression
 */
export function ruleToRegExp(rule: Rule): RegExp {
  const glob = toGlob(rule)

  try {
    return picomatch.makeRe(rule.anchored ? glob : `**/${glob}`, GLOB_OPTIONS)
  } catch (error) {
    throw new InvalidPatternError(rule.source, rule.line, rule.raw, errorMessage(error), {
      cause: error,
    })
  }
}

/**
 * Normalize a relative path to POSIX form without leading `./` or `/`
 */
export function normalizeRelativePath(relativePath: string): string {
  return relativePath
    .replace(/\\/g, '/')
    .replace(/^(?:\.\/)+/, '')
    .replace(/^\/+/, '')
    .replace(/\/+$/, '')
}

/**
 * Decide whether a path is included from its own verdict and its parent's
 * @param inherited - Whether the parent directory is included
 * @param verdict - Verdict of the path itself
 */
export function resolveVerdict(inherited: boolean, verdict: Verdict): boolean {
  return verdict === 'unmatched' ? inherited : verdict === 'included'
}

/**
 * Compile a rule set into a matcher
 *
 * Rules name what to include and `!` rules exclude from that inclusion, the
 * inverse of an ignore file. The last matching rule decides. A path no rule
 * matches takes its parent directory's outcome, and the root's outcome is
 * "excluded". A directory excluded by a rule hides its whole subtree: nothing
 * below it can be included again.
 *
 * Malformed patterns throw here, never during matching.
 *
 * @param rules - Parsed rules
 * @returns Matcher over relative paths
 */
export function compileRules(rules: RuleSet): Matcher {
  const compiled = rules.map((rule) => ({ rule, regex: ruleToRegExp(rule) }))

  // @fn evaluate - last matching rule wins, so scan from the end
  const evaluate = (relativePath: string, isDirectory: boolean): Verdict => {
    const path = normalizeRelativePath(relativePath)

    if (!path) return 'unmatched'

    for (let i = compiled.length - 1; i >= 0; i--) {
      const { rule, regex } = compiled[i]

      if (rule.directoryOnly && !isDirectory) continue

      if (regex.test(path)) {
        return rule.negated ? 'excluded' : 'included'
      }
    }

    return 'unmatched'
  }

  const matches = (relativePath: string, isDirectory: boolean): boolean => {
    const segments = normalizeRelativePath(relativePath).split('/')

    if (!segments[0]) return false

    let included = false

    for (let depth = 1; depth <= segments.length; depth++) {
      const isLast = depth === segments.length
      const verdict = evaluate(
        segments.slice(0, depth).join('/'),
        isLast ? isDirectory : true
      )

      if (!isLast && verdict === 'excluded') return false

      included = resolveVerdict(included, verdict)
    }

    return included
  }

  return { matches, evaluate }
}

/**
 * Whether any rule can include a path
 */
export function hasInclusionRule(rules: RuleSet): boolean {
  return rules.some((rule) => !rule.negated)
}
