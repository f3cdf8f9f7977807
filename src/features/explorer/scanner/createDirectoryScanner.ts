import type { Dir } from 'node:fs'
import { lstat, opendir, readdir, stat } from 'node:fs/promises'
import path from 'node:path'
import type { MetadataCache } from '@/features/cache/createMetadataCache'
import { getErrorCode, getErrorMessage } from '@/shared/lib/error'
import { getLogger } from '@/shared/lib/log'
import { isEnriched, type EntryKind, type ObjectInfo, type ScanUpdate } from '../model/types'
import { sortEntries } from '../state/entryMutations'

type Deps = {
  cache: MetadataCache
}

export type ScanOptions = {
  signal?: AbortSignal
  generation?: number
  showHidden?: boolean
}

type EnrichOptions = {
  signal?: AbortSignal
}

type KindSource = {
  isDirectory(): boolean
  isFile(): boolean
  isSymbolicLink(): boolean
  isFIFO(): boolean
  isSocket(): boolean
  isBlockDevice(): boolean
  isCharacterDevice(): boolean
}

const kindOf = (source: KindSource): EntryKind | null => {
  if (source.isSymbolicLink()) return 'symlink'
  if (source.isDirectory()) return 'dir'
  if (source.isFile()) return 'file'
  if (source.isFIFO() || source.isSocket() || source.isBlockDevice() || source.isCharacterDevice()) return 'other'
  return null
}

const extensionOf = (name: string, kind: EntryKind) => {
  if (kind !== 'file') return undefined
  const ext = path.extname(name).slice(1).toLowerCase()
  return ext || undefined
}

const listingInfo = (dir: string, name: string, kind: EntryKind, generation: number): ObjectInfo => {
  const info: ObjectInfo = { path: path.join(dir, name), name, kind, generation }
  const extension = extensionOf(name, kind)
  if (extension) info.extension = extension
  return info
}

export const createDirectoryScanner = ({ cache }: Deps) => {
  const log = () => getLogger('scanner')

  const classify = async (source: KindSource, target: string): Promise<EntryKind> =>
    kindOf(source) ?? kindOf(await lstat(target)) ?? 'other'

  async function* scanStreaming(dir: string, options: ScanOptions = {}): AsyncGenerator<ScanUpdate> {
    const { signal, generation = 0, showHidden = false } = options
    let handle: Dir
    try {
      handle = await opendir(dir)
    } catch (err) {
      if (signal?.aborted) return
      yield { type: 'error', path: dir, message: getErrorMessage(err) }
      yield { type: 'completed', count: 0 }
      return
    }

    let count = 0
    try {
      for await (const dirent of handle) {
        if (signal?.aborted) return
        if (!showHidden && dirent.name.startsWith('.')) continue
        const target = path.join(dir, dirent.name)
        let update: ScanUpdate
        try {
          const kind = await classify(dirent, target)
          const cached = cache.get(target)
          const info =
            cached && cached.kind === kind
              ? { ...cached, generation }
              : listingInfo(dir, dirent.name, kind, generation)
          count += 1
          update = { type: 'entry', info }
        } catch (err) {
          update = { type: 'error', path: target, message: getErrorMessage(err) }
        }
        if (signal?.aborted) return
        yield update
      }
    } catch (err) {
      if (signal?.aborted) return
      yield { type: 'error', path: dir, message: getErrorMessage(err) }
    }

    if (signal?.aborted) {
      log().debug({ dir, generation }, 'scan cancelled')
      return
    }
    yield { type: 'completed', count }
  }

  const scanDir = async (dir: string, options: ScanOptions = {}): Promise<ObjectInfo[]> => {
    const entries: ObjectInfo[] = []
    for await (const update of scanStreaming(dir, options)) {
      if (update.type === 'entry') {
        entries.push(update.info)
      } else if (update.type === 'error') {
        if (update.path === dir) throw new Error(update.message)
        log().warn({ path: update.path, message: update.message }, 'skipped unreadable entry')
      }
    }
    return sortEntries(entries)
  }

  // Follows symlinks, so a link to a directory opens and a link to a file does not.
  const ensureDirectory = async (dir: string) => {
    let isDirectory: boolean
    try {
      isDirectory = (await stat(dir)).isDirectory()
    } catch (err) {
      if (getErrorCode(err) === 'ENOENT') throw new Error('no such directory')
      throw err
    }
    if (!isDirectory) throw new Error('not a directory')
    return dir
  }

  const countItems = async (dir: string) => {
    try {
      return (await readdir(dir)).length
    } catch (err) {
      log().debug({ dir, message: getErrorMessage(err) }, 'cannot count directory items')
      return undefined
    }
  }

  async function* enrich(entries: ObjectInfo[], options: EnrichOptions = {}): AsyncGenerator<ObjectInfo> {
    const { signal } = options
    for (const entry of entries) {
      if (signal?.aborted) return
      if (isEnriched(entry)) continue

      const cached = cache.get(entry.path)
      if (cached && cached.kind === entry.kind && isEnriched(cached)) {
        yield { ...cached, generation: entry.generation }
        continue
      }

      let enriched: ObjectInfo
      try {
        const stats = await lstat(entry.path)
        enriched = {
          ...entry,
          size: entry.kind === 'dir' ? 0 : stats.size,
          modified: Math.trunc(stats.mtimeMs),
        }
        if (entry.kind === 'dir') {
          const items = await countItems(entry.path)
          if (items !== undefined) enriched.items = items
        }
      } catch (err) {
        log().debug({ path: entry.path, message: getErrorMessage(err) }, 'enrichment failed')
        continue
      }
      cache.insert(entry.path, enriched)
      if (signal?.aborted) return
      yield enriched
    }
  }

  return {
    scanStreaming,
    scanDir,
    enrich,
    ensureDirectory,
  }
}

export type DirectoryScanner = ReturnType<typeof createDirectoryScanner>
