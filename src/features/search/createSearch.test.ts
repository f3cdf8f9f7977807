import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createSearch } from './createSearch'

const collect = async <T>(source: AsyncIterable<T[]>) => {
  const batches: T[][] = []
  for await (const batch of source) batches.push(batch)
  return batches
}

describe('createSearch', () => {
  let root = ''
  const search = createSearch()

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'panewalk-search-'))
    await mkdir(path.join(root, 'docs'))
    await mkdir(path.join(root, '.git'))
    await writeFile(path.join(root, 'Notes.md'), 'alpha\nBeta line\n')
    await writeFile(path.join(root, 'docs', 'notes-2.txt'), 'nothing here\r\n  beta again')
    await writeFile(path.join(root, 'docs', 'img.bin'), Buffer.from([0x62, 0x65, 0x74, 0x61, 0x00, 0x01]))
    await writeFile(path.join(root, '.git', 'notes'), 'beta')
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('matches file names case-insensitively, breadth first', async () => {
    const batches = await collect(search.filenameSearch(root, 'NOTES'))

    expect(batches).toHaveLength(1)
    expect(batches[0].map((info) => info.path)).toEqual([
      path.join(root, 'Notes.md'),
      path.join(root, 'docs', 'notes-2.txt'),
    ])
    expect(batches[0][0]).toEqual({ path: path.join(root, 'Notes.md'), name: 'Notes.md', kind: 'file', generation: 0 })
  })

  it('streams results in batches and honours the result cap', async () => {
    expect((await collect(search.filenameSearch(root, 'notes', { batchSize: 1 }))).map((batch) => batch.length)).toEqual([
      1, 1,
    ])
    expect(await collect(search.filenameSearch(root, 'notes', { maxResults: 1 }))).toEqual([
      [{ path: path.join(root, 'Notes.md'), name: 'Notes.md', kind: 'file', generation: 0 }],
    ])
  })

  it('walks hidden directories only when asked', async () => {
    const batches = await collect(search.filenameSearch(root, 'notes', { showHidden: true }))

    expect(batches.flat().map((info) => path.relative(root, info.path))).toEqual([
      'Notes.md',
      path.join('.git', 'notes'),
      path.join('docs', 'notes-2.txt'),
    ])
  })

  it('finds matching lines in text files and skips binary ones', async () => {
    const batches = await collect(search.contentSearch(root, 'beta'))

    expect(batches.flat()).toEqual([
      { path: path.join(root, 'Notes.md'), line: 2, text: 'Beta line' },
      { path: path.join(root, 'docs', 'notes-2.txt'), line: 2, text: 'beta again' },
    ])
  })

  it('yields nothing for blank queries or a cancelled run', async () => {
    const controller = new AbortController()
    controller.abort()

    expect(await collect(search.filenameSearch(root, '   '))).toEqual([])
    expect(await collect(search.contentSearch(root, ''))).toEqual([])
    expect(await collect(search.filenameSearch(root, 'notes', { signal: controller.signal }))).toEqual([])
    expect(await collect(search.contentSearch(root, 'beta', { signal: controller.signal }))).toEqual([])
  })
})
