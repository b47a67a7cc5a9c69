import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  compileRules,
  hasInclusionRule,
  loadRuleSet,
  normalizeRelativePath,
  parseRules,
  resolveVerdict,
  ruleToRegExp,
} from './pattern'
import { InvalidPatternError } from '../errors'

const matcherFor = (text: string) => compileRules(parseRules(text))

describe('parseRules', () => {
  it('drops blank lines and comments and keeps line numbers', () => {
    const rules = parseRules('# notes\n\n*.md\n  \n!draft.md\n', 'rules.txt')

    expect(rules.map((rule) => [rule.pattern, rule.negated, rule.line])).toEqual([
      ['*.md', false, 3],
      ['draft.md', true, 5],
    ])
    expect(rules[0].source).toBe('rules.txt')
  })

  it('reads escaped leading characters literally', () => {
    const rules = parseRules('\\#tag\n\\!bang')

    expect(rules.map((rule) => [rule.pattern, rule.negated])).toEqual([
      ['#tag', false],
      ['!bang', false],
    ])
  })

  it('trims trailing whitespace', () => {
    const [rule] = parseRules('notes.txt   \r\n')

    expect(rule.raw).toBe('notes.txt')
    expect(rule.pattern).toBe('notes.txt')
  })

  it('marks directory-only and anchored rules', () => {
    const [build, top, nested] = parseRules('build/\n/top.txt\ndocs/*.md')

    expect(build).toMatchObject({ pattern: 'build', directoryOnly: true, anchored: false })
    expect(top).toMatchObject({ pattern: 'top.txt', directoryOnly: false, anchored: true })
    expect(nested).toMatchObject({ pattern: 'docs/*.md', anchored: true })
  })

  it('rejects a rule with an empty body', () => {
    expect(() => parseRules('*.md\n!\n', 'rules.txt')).toThrow(
      'rules.txt:2: invalid pattern "!": empty pattern'
    )
  })
})

describe('loadRuleSet', () => {
  let dir: string

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'syncf-pattern-'))
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('parses a pattern file with its path as source', async () => {
    const file = join(dir, 'rules.txt')

    await writeFile(file, '*.py\n!test_*.py\n')

    const rules = await loadRuleSet(file)

    expect(rules).toHaveLength(2)
    expect(rules[1]).toMatchObject({ source: file, line: 2, negated: true })
  })

  it('reports a missing file as an invalid pattern file', async () => {
    const file = join(dir, 'missing.txt')

    await expect(loadRuleSet(file)).rejects.toMatchObject({
      name: 'InvalidPatternError',
      line: 0,
      exitCode: 2,
    })
  })
})

describe('ruleToRegExp', () => {
  const regexFor = (pattern: string) => ruleToRegExp(parseRules(pattern)[0])

  it('keeps * and ? inside one path segment', () => {
    const regex = regexFor('a?c*.txt')

    expect(regex.test('abc.txt')).toBe(true)
    expect(regex.test('abcdef.txt')).toBe(true)
    expect(regex.test('sub/abc.txt')).toBe(true)
    expect(regex.test('a/c.txt')).toBe(false)
    expect(regex.test('abc/d.txt')).toBe(false)
  })

  it('treats ** as any number of directories', () => {
    expect(regexFor('**/*.md').test('a.md')).toBe(true)
    expect(regexFor('**/*.md').test('x/y/a.md')).toBe(true)
    expect(regexFor('a/**/b').test('a/b')).toBe(true)
    expect(regexFor('a/**/b').test('a/x/y/b')).toBe(true)
    expect(regexFor('src/**').test('src/a/b.ts')).toBe(true)
  })

  it('translates character classes', () => {
    expect(regexFor('file[0-9].txt').test('file7.txt')).toBe(true)
    expect(regexFor('file[0-9].txt').test('filex.txt')).toBe(false)
    expect(regexFor('[!a]*.log').test('b.log')).toBe(true)
    expect(regexFor('[!a]*.log').test('a.log')).toBe(false)
  })

  it('reads groups, braces and plus signs literally', () => {
    const regex = regexFor('a+b(1).txt')

    expect(regex.test('a+b(1).txt')).toBe(true)
    expect(regex.test('aab(1)xtxt')).toBe(false)
    expect(regex.test('a+b1.txt')).toBe(false)
    expect(regexFor('{a,b}.txt').test('{a,b}.txt')).toBe(true)
    expect(regexFor('{a,b}.txt').test('a.txt')).toBe(false)
  })

  it('matches dotfiles with wildcards', () => {
    expect(regexFor('*.env').test('.env')).toBe(true)
    expect(regexFor('**/*.md').test('.github/README.md')).toBe(true)
  })

  it('accepts a closing bracket as the first class member', () => {
    expect(regexFor('[]x].txt').test('].txt')).toBe(true)
    expect(() => regexFor('[]x.txt')).toThrow('unbalanced "["')
  })

  it('reports an unbalanced bracket with its line', () => {
    const rules = parseRules('*.txt\n\nfoo[ab\n', 'rules.txt')

    let caught: unknown

    try {
      compileRules(rules)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(InvalidPatternError)
    expect(caught).toMatchObject({ source: 'rules.txt', line: 3, pattern: 'foo[ab' })
    expect(caught).toHaveProperty(
      'message',
      'rules.txt:3: invalid pattern "foo[ab": unbalanced "[" (character class is never closed)'
    )
  })

  it('rejects a trailing backslash', () => {
    expect(() => regexFor('name\\')).toThrow('trailing "\\" escapes nothing')
  })
})

describe('compileRules', () => {
  it('lets the last matching rule win', () => {
    const matcher = matcherFor('*.py\n!test_*.py')

    expect(matcher.matches('main.py', false)).toBe(true)
    expect(matcher.matches('src/util.py', false)).toBe(true)
    expect(matcher.matches('test_main.py', false)).toBe(false)
    expect(matcher.matches('src/test_util.py', false)).toBe(false)
    expect(matcher.matches('README.md', false)).toBe(false)
  })

  it('re-includes a path excluded by an earlier rule', () => {
    const matcher = matcherFor('*.log\n!*.log\nkeep.log')

    expect(matcher.evaluate('keep.log', false)).toBe('included')
    expect(matcher.evaluate('other.log', false)).toBe('excluded')
  })

  it('anchors patterns that contain a slash', () => {
    const matcher = matcherFor('/top.txt\ndocs/*.md')

    expect(matcher.matches('top.txt', false)).toBe(true)
    expect(matcher.matches('sub/top.txt', false)).toBe(false)
    expect(matcher.matches('docs/a.md', false)).toBe(true)
    expect(matcher.matches('x/docs/a.md', false)).toBe(false)
    expect(matcher.matches('docs/sub/a.md', false)).toBe(false)
  })

  it('applies directory-only rules to directories and their contents', () => {
    const matcher = matcherFor('build/')

    expect(matcher.evaluate('build', false)).toBe('unmatched')
    expect(matcher.evaluate('build', true)).toBe('included')
    expect(matcher.matches('build/out/app.o', false)).toBe(true)
    expect(matcher.matches('build', false)).toBe(false)
  })

  it('never includes anything below an excluded directory', () => {
    const matcher = matcherFor('src/\n!src/vendor/\nsrc/vendor/keep.ts')

    expect(matcher.matches('src/main.ts', false)).toBe(true)
    expect(matcher.matches('src/vendor', true)).toBe(false)
    expect(matcher.matches('src/vendor/keep.ts', false)).toBe(false)
  })

  it('returns the same answer on repeated calls', () => {
    const matcher = matcherFor('*.py\n!test_*.py')
    const first = ['a.py', 'test_a.py', 'b.txt'].map((path) => matcher.matches(path, false))
    const second = ['a.py', 'test_a.py', 'b.txt'].map((path) => matcher.matches(path, false))

    expect(first).toEqual([true, false, false])
    expect(second).toEqual(first)
  })

  it('accepts Windows separators and a leading ./', () => {
    const matcher = matcherFor('docs/*.md')

    expect(matcher.matches('docs\\a.md', false)).toBe(true)
    expect(matcher.matches('./docs/a.md', false)).toBe(true)
  })

  it('includes nothing for an empty path', () => {
    const matcher = matcherFor('**')

    expect(matcher.matches('', true)).toBe(false)
    expect(matcher.evaluate('./', true)).toBe('unmatched')
  })
})

describe('helpers', () => {
  it('normalizes relative paths', () => {
    expect(normalizeRelativePath('./a\\b/')).toBe('a/b')
    expect(normalizeRelativePath('/a/b')).toBe('a/b')
  })

  it('inherits the parent outcome for unmatched paths', () => {
    expect(resolveVerdict(true, 'unmatched')).toBe(true)
    expect(resolveVerdict(false, 'unmatched')).toBe(false)
    expect(resolveVerdict(true, 'excluded')).toBe(false)
    expect(resolveVerdict(false, 'included')).toBe(true)
  })

  it('detects rule sets with no inclusion rule', () => {
    expect(hasInclusionRule(parseRules('!*.tmp'))).toBe(false)
    expect(hasInclusionRule(parseRules('!*.tmp\n*.txt'))).toBe(true)
  })
})
