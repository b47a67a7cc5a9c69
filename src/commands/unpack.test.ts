import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { pack } from './pack'
import { unpack } from './unpack'
import { list } from './list'
import { clean } from './clean'
import { BundleNotFoundError } from '../errors'

describe('unpack, list and clean', () => {
  let workspace: string
  let root: string
  let storeDir: string
  let patternFile: string

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'syncf-cmd-'))
    root = join(workspace, 'project')
    storeDir = join(workspace, 'store')
    patternFile = join(workspace, 'rules.txt')

    await mkdir(join(root, 'notes'), { recursive: true })
    await writeFile(join(root, 'notes', 'todo.md'), '- [ ] write tests\n')
    await writeFile(join(root, 'notes', 'draft.tmp'), 'scratch')
    await writeFile(patternFile, 'notes/\n!*.tmp\n')
  })

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true })
  })

  const packNotes = (label = 'notes') =>
    pack({
      patternFile,
      label,
      root,
      storeDir,
      compressionLevel: 6,
      verbose: false,
    })

  it('restores a bundle chosen by label', async () => {
    await packNotes()

    const output = join(workspace, 'restored')
    const report = await unpack({
      bundle: 'notes',
      output,
      storeDir,
      yes: true,
      verbose: false,
    })

    // the notes directory and its one file
    expect(report?.extracted).toBe(2)
    expect(await readFile(join(output, 'notes', 'todo.md'), 'utf8')).toBe(
      '- [ ] write tests\n'
    )
  })

  it('fails on an empty store', async () => {
    await expect(
      unpack({ output: workspace, storeDir, yes: true, verbose: false })
    ).rejects.toThrow(`No bundles in ${storeDir}`)
  })

  it('fails on an unknown bundle', async () => {
    await packNotes()

    await expect(
      unpack({ bundle: 'other', output: workspace, storeDir, yes: true, verbose: false })
    ).rejects.toThrow(BundleNotFoundError)
  })

  it('lists bundles with their file counts', async () => {
    await packNotes()

    const bundles = list({ storeDir })

    expect(bundles).toHaveLength(1)
    expect(bundles[0]).toMatchObject({ label: 'notes', fileCount: 1 })
  })

  it('cleans every bundle from the store', async () => {
    await packNotes('first')
    await packNotes('second')

    const report = await clean({ storeDir, yes: true })

    expect(report?.deleted).toHaveLength(2)
    expect(report?.failed).toEqual([])
    expect(list({ storeDir })).toEqual([])
  })

  it('cleans an empty store without asking', async () => {
    expect(await clean({ storeDir, yes: false })).toEqual({
      deleted: [],
      failed: [],
      freedBytes: 0,
    })
  })
})
