import { lstat, mkdir, open, readdir, readlink, rename, rm, stat, symlink, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { getErrorCode } from '@/shared/lib/error'
import { getLogger } from '@/shared/lib/log'

export const COPY_CHUNK_BYTES = 64 * 1024
export const PROGRESS_STEP_BYTES = 1024 * 1024

export type ProgressFn = (bytes: number, total: number) => void

export type FileOpOptions = {
  signal?: AbortSignal
  onProgress?: ProgressFn
}

export type FileOpResult = {
  source?: string
  target: string
}

export const validateEntryName = (name: string) => {
  const trimmed = name.trim()
  if (!trimmed || trimmed === '.' || trimmed === '..' || /[\\/\0]/.test(trimmed)) {
    throw new Error(`Invalid name "${name}"`)
  }
  return trimmed
}

const exists = async (target: string) => {
  try {
    await lstat(target)
    return true
  } catch (err) {
    if (getErrorCode(err) === 'ENOENT') return false
    throw err
  }
}

const isDirectory = async (target: string) => {
  try {
    return (await stat(target)).isDirectory()
  } catch (err) {
    if (getErrorCode(err) === 'ENOENT') return false
    throw err
  }
}

// A destination naming an existing directory receives the source under its own name.
export const resolveDestination = async (source: string, destination: string) => {
  const target = (await isDirectory(destination)) ? path.join(destination, path.basename(source)) : destination
  const from = path.resolve(source)
  const to = path.resolve(target)
  if (to === from || to.startsWith(`${from}${path.sep}`)) {
    throw new Error(`Cannot place ${path.basename(from)} inside itself`)
  }
  if (await exists(to)) {
    throw new Error(`${to} already exists`)
  }
  return to
}

export const measure = async (target: string, signal?: AbortSignal): Promise<number> => {
  signal?.throwIfAborted()
  const info = await lstat(target)
  if (!info.isDirectory()) return info.isFile() ? info.size : 0
  let total = 0
  for (const name of await readdir(target)) {
    total += await measure(path.join(target, name), signal)
  }
  return total
}

const createProgress = (total: number, onProgress?: ProgressFn) => {
  let bytes = 0
  let reported = 0
  return {
    add: (count: number) => {
      bytes += count
      if (bytes - reported >= PROGRESS_STEP_BYTES || bytes === total) {
        reported = bytes
        onProgress?.(bytes, total)
      }
    },
    finish: () => {
      if (reported !== bytes || bytes === 0) onProgress?.(bytes, total)
    },
  }
}

type Progress = ReturnType<typeof createProgress>

const copyFile = async (from: string, to: string, progress: Progress, signal?: AbortSignal) => {
  const source = await open(from, 'r')
  try {
    const target = await open(to, 'wx')
    try {
      const buffer = Buffer.alloc(COPY_CHUNK_BYTES)
      for (;;) {
        signal?.throwIfAborted()
        const { bytesRead } = await source.read(buffer, 0, COPY_CHUNK_BYTES, null)
        if (bytesRead === 0) break
        await target.write(buffer, 0, bytesRead)
        progress.add(bytesRead)
      }
    } catch (err) {
      await target.close()
      await rm(to, { force: true })
      throw err
    }
    await target.close()
  } finally {
    await source.close()
  }
}

const copyTree = async (from: string, to: string, progress: Progress, signal?: AbortSignal): Promise<void> => {
  signal?.throwIfAborted()
  const info = await lstat(from)
  if (info.isSymbolicLink()) {
    await symlink(await readlink(from), to)
    return
  }
  if (info.isFile()) {
    await copyFile(from, to, progress, signal)
    return
  }
  if (!info.isDirectory()) {
    getLogger('file-ops').debug({ path: from }, 'skipping special file')
    return
  }
  await mkdir(to)
  for (const name of await readdir(from)) {
    await copyTree(path.join(from, name), path.join(to, name), progress, signal)
  }
}

// Nothing is left at the target when the copy fails or is cancelled, so a retry starts clean.
const copyTreeOrRemove = async (from: string, to: string, progress: Progress, signal?: AbortSignal) => {
  try {
    await copyTree(from, to, progress, signal)
  } catch (err) {
    await rm(to, { recursive: true, force: true })
    throw err
  }
}

export const createFileOps = () => {
  const log = () => getLogger('file-ops')

  const copy = async (source: string, destination: string, options: FileOpOptions = {}): Promise<FileOpResult> => {
    const { signal, onProgress } = options
    const target = await resolveDestination(source, destination)
    const total = await measure(source, signal)
    const progress = createProgress(total, onProgress)
    await copyTreeOrRemove(source, target, progress, signal)
    progress.finish()
    log().info({ source, target, bytes: total }, 'copied')
    return { source, target }
  }

  const move = async (source: string, destination: string, options: FileOpOptions = {}): Promise<FileOpResult> => {
    const target = await resolveDestination(source, destination)
    options.signal?.throwIfAborted()
    try {
      await rename(source, target)
    } catch (err) {
      if (getErrorCode(err) !== 'EXDEV') throw err
      log().debug({ source, target }, 'cross-device move, copying instead')
      const total = await measure(source, options.signal)
      const progress = createProgress(total, options.onProgress)
      await copyTreeOrRemove(source, target, progress, options.signal)
      progress.finish()
      await rm(source, { recursive: true, force: true })
    }
    log().info({ source, target }, 'moved')
    return { source, target }
  }

  const renameEntry = async (source: string, newName: string): Promise<FileOpResult> => {
    const target = path.join(path.dirname(source), validateEntryName(newName))
    if (target === source) return { source, target }
    if (await exists(target)) throw new Error(`${target} already exists`)
    await rename(source, target)
    log().info({ source, target }, 'renamed')
    return { source, target }
  }

  const createFile = async (dir: string, name: string): Promise<FileOpResult> => {
    const target = path.join(dir, validateEntryName(name))
    await writeFile(target, '', { flag: 'wx' })
    return { target }
  }

  const createDirectory = async (dir: string, name: string): Promise<FileOpResult> => {
    const target = path.join(dir, validateEntryName(name))
    await mkdir(target)
    return { target }
  }

  return {
    copy,
    move,
    rename: renameEntry,
    createFile,
    createDirectory,
  }
}

export type FileOps = ReturnType<typeof createFileOps>
