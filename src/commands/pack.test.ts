import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { pack } from './pack'
import { validateArchive } from '../core/reader'
import { EmptySelectionError, InvalidLabelError, InvalidPatternError } from '../errors'
import type { PackOptions } from '../types'

describe('pack', () => {
  let workspace: string
  let root: string
  let patternFile: string

  const options = (overrides: Partial<PackOptions> = {}): PackOptions => ({
    patternFile,
    label: 'project',
    root,
    storeDir: join(root, '.files'),
    compressionLevel: 6,
    verbose: false,
    ...overrides,
  })

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'syncf-pack-'))
    root = join(workspace, 'project')
    patternFile = join(workspace, 'rules.txt')

    const files: Record<string, string> = {
      'main.py': 'print(1)\n',
      'test_main.py': 'assert True\n',
      'lib/util.py': 'pass\n',
      'README.md': '# readme\n',
    }

    for (const [relativePath, content] of Object.entries(files)) {
      const path = join(root, relativePath)

      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, content)
    }

    await writeFile(patternFile, '# sources\n*.py\n!test_*.py\n')
  })

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true })
  })

  it('packs the files the pattern file selects', async () => {
    const result = await pack(options())

    expect(result.bundle.label).toBe('project')
    expect(result.bundle.filename).toMatch(/^project_\d{8}_\d{6}\.tar\.gz$/)
    expect(result.archived.map((file) => file.relativePath)).toEqual([
      'lib/util.py',
      'main.py',
    ])

    const entries = await validateArchive(result.bundle)

    expect(entries.map((entry) => entry.name)).toEqual(['lib/util.py', 'main.py'])
  })

  it('keeps the store out of its own bundles', async () => {
    await writeFile(patternFile, '*\n')

    const first = await pack(options())
    const second = await pack(options({ label: 'again' }))

    expect(first.archived.map((file) => file.relativePath)).toEqual([
      'README.md',
      'lib/util.py',
      'main.py',
      'test_main.py',
    ])
    expect(second.archived).toHaveLength(4)

    const names = await readdir(join(root, '.files'))

    expect(names.filter((name) => name.endsWith('.tar.gz'))).toHaveLength(2)
  })

  it('rejects a pattern file without inclusion rules', async () => {
    await writeFile(patternFile, '!*.md\n')

    await expect(pack(options())).rejects.toThrow(InvalidPatternError)
  })

  it('rejects a bad pattern with its line number', async () => {
    await writeFile(patternFile, '*.py\n[oops\n')

    await expect(pack(options())).rejects.toMatchObject({
      name: 'InvalidPatternError',
      line: 2,
    })
  })

  it('rejects a label with nothing usable before selecting', async () => {
    await expect(pack(options({ label: '///' }))).rejects.toThrow(InvalidLabelError)
  })

  it('fails when nothing matches and writes no bundle', async () => {
    await writeFile(patternFile, '*.go\n')

    await expect(pack(options())).rejects.toThrow(EmptySelectionError)
    await expect(readdir(join(root, '.files'))).rejects.toMatchObject({ code: 'ENOENT' })
  })
})
