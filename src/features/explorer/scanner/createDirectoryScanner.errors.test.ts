import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createMetadataCache } from '@/features/cache/createMetadataCache'
import type { ScanUpdate } from '../model/types'
import { createDirectoryScanner } from './createDirectoryScanner'

type FakeDirent = {
  name: string
  isDirectory(): boolean
  isFile(): boolean
  isSymbolicLink(): boolean
  isFIFO(): boolean
  isSocket(): boolean
  isBlockDevice(): boolean
  isCharacterDevice(): boolean
}

const mocks = vi.hoisted(() => ({
  opendir: vi.fn(),
  lstat: vi.fn(),
}))

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>()
  return { ...actual, opendir: mocks.opendir, lstat: mocks.lstat }
})

// Unknown dirent types fall through to lstat.
const dirent = (name: string, kind: 'file' | 'unknown'): FakeDirent => ({
  name,
  isDirectory: () => false,
  isFile: () => kind === 'file',
  isSymbolicLink: () => false,
  isFIFO: () => false,
  isSocket: () => false,
  isBlockDevice: () => false,
  isCharacterDevice: () => false,
})

const listing = (dirents: FakeDirent[]) => ({
  async *[Symbol.asyncIterator]() {
    for (const item of dirents) yield item
  },
})

const collect = async (source: AsyncIterable<ScanUpdate>) => {
  const items: ScanUpdate[] = []
  for await (const item of source) items.push(item)
  return items
}

describe('createDirectoryScanner entry failures', () => {
  beforeEach(() => {
    mocks.opendir.mockReset()
    mocks.lstat.mockReset()
  })

  it('reports an entry that cannot be read and still completes the scan', async () => {
    mocks.opendir.mockResolvedValue(
      listing([dirent('a.txt', 'file'), dirent('locked', 'unknown'), dirent('b.txt', 'file')]),
    )
    mocks.lstat.mockRejectedValue(
      Object.assign(new Error("EACCES: permission denied, lstat '/data/locked'"), { code: 'EACCES' }),
    )
    const scanner = createDirectoryScanner({ cache: createMetadataCache() })

    const updates = await collect(scanner.scanStreaming('/data', { generation: 4 }))

    expect(updates).toEqual([
      { type: 'entry', info: { path: '/data/a.txt', name: 'a.txt', kind: 'file', extension: 'txt', generation: 4 } },
      { type: 'error', path: '/data/locked', message: "EACCES: permission denied, lstat '/data/locked'" },
      { type: 'entry', info: { path: '/data/b.txt', name: 'b.txt', kind: 'file', extension: 'txt', generation: 4 } },
      { type: 'completed', count: 2 },
    ])
    expect(mocks.lstat).toHaveBeenCalledWith('/data/locked')
  })

  it('skips the failed entry when collecting a listing', async () => {
    mocks.opendir.mockResolvedValue(listing([dirent('locked', 'unknown'), dirent('notes.md', 'file')]))
    mocks.lstat.mockRejectedValue(new Error('EIO: i/o error'))
    const scanner = createDirectoryScanner({ cache: createMetadataCache() })

    const entries = await scanner.scanDir('/data')

    expect(entries.map((entry) => entry.name)).toEqual(['notes.md'])
  })
})
