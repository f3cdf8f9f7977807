import { access, mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { isAbortError } from '@/shared/lib/error'
import { createFileOps, measure, validateEntryName } from './fileOps'

const MB = 1024 * 1024

const present = async (target: string) =>
  access(target).then(
    () => true,
    () => false,
  )

describe('createFileOps', () => {
  let root = ''
  const ops = createFileOps()

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'panewalk-ops-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('copies a file in chunks and reports progress every megabyte', async () => {
    const source = path.join(root, 'big.bin')
    await writeFile(source, Buffer.alloc(2.5 * MB, 7))
    const onProgress = vi.fn()

    const result = await ops.copy(source, path.join(root, 'copy.bin'), { onProgress })

    expect(result).toEqual({ source, target: path.join(root, 'copy.bin') })
    expect(onProgress.mock.calls).toEqual([
      [1 * MB, 2.5 * MB],
      [2 * MB, 2.5 * MB],
      [2.5 * MB, 2.5 * MB],
    ])
    expect((await readFile(result.target)).length).toBe(2.5 * MB)
  })

  it('copies a directory tree into an existing directory', async () => {
    const source = path.join(root, 'src')
    await mkdir(path.join(source, 'nested'), { recursive: true })
    await writeFile(path.join(source, 'a.txt'), 'alpha')
    await writeFile(path.join(source, 'nested', 'b.txt'), 'beta')
    await mkdir(path.join(root, 'dest'))
    const onProgress = vi.fn()

    const result = await ops.copy(source, path.join(root, 'dest'), { onProgress })

    expect(result.target).toBe(path.join(root, 'dest', 'src'))
    expect(await readFile(path.join(root, 'dest', 'src', 'nested', 'b.txt'), 'utf8')).toBe('beta')
    expect(onProgress).toHaveBeenLastCalledWith(9, 9)
    expect(await measure(source)).toBe(9)
  })

  it('refuses to overwrite or to copy a directory into itself', async () => {
    const source = path.join(root, 'src')
    await mkdir(source)
    await writeFile(path.join(root, 'taken.txt'), 'x')
    await writeFile(path.join(root, 'a.txt'), 'a')

    await expect(ops.copy(path.join(root, 'a.txt'), path.join(root, 'taken.txt'))).rejects.toThrow(
      `${path.join(root, 'taken.txt')} already exists`,
    )
    await expect(ops.copy(source, path.join(source, 'inner'))).rejects.toThrow('Cannot place src inside itself')
  })

  it('stops between chunks when cancelled and removes the partial copy', async () => {
    const source = path.join(root, 'big.bin')
    const target = path.join(root, 'partial.bin')
    await writeFile(source, Buffer.alloc(3 * MB))
    const controller = new AbortController()

    const pending = ops.copy(source, target, {
      signal: controller.signal,
      onProgress: () => controller.abort(),
    })

    const failure = await pending.then(
      () => null,
      (err: unknown) => err,
    )
    expect(isAbortError(failure)).toBe(true)
    expect(await present(target)).toBe(false)
  })

  it('removes a partly copied directory when cancelled so the copy can be retried', async () => {
    const source = path.join(root, 'photos')
    const target = path.join(root, 'backup')
    await mkdir(source)
    await writeFile(path.join(source, 'one.bin'), Buffer.alloc(MB, 1))
    await writeFile(path.join(source, 'two.bin'), Buffer.alloc(MB, 2))
    const controller = new AbortController()

    const failure = await ops
      .copy(source, target, { signal: controller.signal, onProgress: () => controller.abort() })
      .then(
        () => null,
        (err: unknown) => err,
      )

    expect(isAbortError(failure)).toBe(true)
    expect(await present(target)).toBe(false)

    const retried = await ops.copy(source, target)

    expect(retried.target).toBe(target)
    expect((await readdir(target)).sort()).toEqual(['one.bin', 'two.bin'])
    expect((await readFile(path.join(target, 'two.bin'))).length).toBe(MB)
  })

  it('moves entries by renaming them', async () => {
    await writeFile(path.join(root, 'a.txt'), 'alpha')
    await mkdir(path.join(root, 'dest'))

    const result = await ops.move(path.join(root, 'a.txt'), path.join(root, 'dest'))

    expect(result.target).toBe(path.join(root, 'dest', 'a.txt'))
    expect(await present(path.join(root, 'a.txt'))).toBe(false)
    expect(await readFile(result.target, 'utf8')).toBe('alpha')
  })

  it('renames within the same directory', async () => {
    await writeFile(path.join(root, 'old.txt'), 'x')
    await writeFile(path.join(root, 'other.txt'), 'y')

    const result = await ops.rename(path.join(root, 'old.txt'), 'newname.txt')

    expect(result.target).toBe(path.join(root, 'newname.txt'))
    expect(await readdir(root)).toEqual(expect.arrayContaining(['newname.txt', 'other.txt']))
    await expect(ops.rename(result.target, 'other.txt')).rejects.toThrow(
      `${path.join(root, 'other.txt')} already exists`,
    )
    await expect(ops.rename(result.target, 'a/b')).rejects.toThrow('Invalid name "a/b"')
  })

  it('creates files and directories without clobbering', async () => {
    const file = await ops.createFile(root, 'notes.md')
    const dir = await ops.createDirectory(root, 'docs')

    expect(file.target).toBe(path.join(root, 'notes.md'))
    expect(dir.target).toBe(path.join(root, 'docs'))
    expect((await readdir(root)).sort()).toEqual(['docs', 'notes.md'])
    await expect(ops.createFile(root, 'notes.md')).rejects.toMatchObject({ code: 'EEXIST' })
    await expect(ops.createDirectory(root, 'docs')).rejects.toMatchObject({ code: 'EEXIST' })
  })
})

describe('validateEntryName', () => {
  it('trims names and rejects path-like ones', () => {
    expect(validateEntryName('  report.pdf ')).toBe('report.pdf')
    expect(() => validateEntryName('..')).toThrow('Invalid name ".."')
    expect(() => validateEntryName('   ')).toThrow('Invalid name "   "')
  })
})
