import type { Dirent } from 'node:fs'
import { open, readdir } from 'node:fs/promises'
import path from 'node:path'
import { getErrorMessage } from '@/shared/lib/error'
import { getLogger } from '@/shared/lib/log'
import type { EntryKind, ObjectInfo } from '../explorer/model/types'

export const CONTENT_SEARCH_MAX_FILE_BYTES = 1024 * 1024
const MAX_LINE_PREVIEW = 200

export type ContentMatch = {
  path: string
  line: number
  text: string
}

export type SearchOptions = {
  signal?: AbortSignal
  showHidden?: boolean
  batchSize?: number
  maxResults?: number
}

type WalkedEntry = {
  path: string
  name: string
  kind: EntryKind
}

const kindOfDirent = (dirent: { isDirectory(): boolean; isFile(): boolean; isSymbolicLink(): boolean }): EntryKind => {
  if (dirent.isSymbolicLink()) return 'symlink'
  if (dirent.isDirectory()) return 'dir'
  if (dirent.isFile()) return 'file'
  return 'other'
}

async function* walk(root: string, signal?: AbortSignal, showHidden = false): AsyncGenerator<WalkedEntry> {
  const pending = [root]
  while (pending.length > 0) {
    const dir = pending.shift()
    if (dir === undefined || signal?.aborted) return
    let dirents: Dirent[]
    try {
      dirents = await readdir(dir, { withFileTypes: true })
    } catch (err) {
      getLogger('search').debug({ dir, message: getErrorMessage(err) }, 'skipping unreadable directory')
      continue
    }
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    for (const dirent of dirents) {
      if (signal?.aborted) return
      if (!showHidden && dirent.name.startsWith('.')) continue
      const entry = { path: path.join(dir, dirent.name), name: dirent.name, kind: kindOfDirent(dirent) }
      if (entry.kind === 'dir') pending.push(entry.path)
      yield entry
    }
  }
}

const createBatcher = <T>(batchSize: number) => {
  let batch: T[] = []
  return {
    push: (item: T) => {
      batch.push(item)
      if (batch.length < batchSize) return null
      const full = batch
      batch = []
      return full
    },
    flush: () => {
      const rest = batch
      batch = []
      return rest
    },
  }
}

const readSmallText = async (target: string): Promise<string | null> => {
  const handle = await open(target, 'r')
  try {
    const { size } = await handle.stat()
    if (size > CONTENT_SEARCH_MAX_FILE_BYTES) return null
    const buffer = await handle.readFile()
    if (buffer.includes(0)) return null
    return buffer.toString('utf8')
  } finally {
    await handle.close()
  }
}

export const createSearch = () => {
  async function* filenameSearch(root: string, query: string, options: SearchOptions = {}): AsyncGenerator<ObjectInfo[]> {
    const { signal, showHidden, batchSize = 64, maxResults = 1000 } = options
    const needle = query.trim().toLowerCase()
    if (!needle) return
    const batcher = createBatcher<ObjectInfo>(batchSize)
    let found = 0

    for await (const entry of walk(root, signal, showHidden)) {
      if (!entry.name.toLowerCase().includes(needle)) continue
      found += 1
      const full = batcher.push({ ...entry, generation: 0 })
      if (full) yield full
      if (found >= maxResults) break
    }
    if (signal?.aborted) return
    const rest = batcher.flush()
    if (rest.length > 0) yield rest
  }

  async function* contentSearch(root: string, query: string, options: SearchOptions = {}): AsyncGenerator<ContentMatch[]> {
    const { signal, showHidden, batchSize = 64, maxResults = 1000 } = options
    const needle = query.toLowerCase()
    if (!needle.trim()) return
    const batcher = createBatcher<ContentMatch>(batchSize)
    let found = 0

    for await (const entry of walk(root, signal, showHidden)) {
      if (entry.kind !== 'file') continue
      let text: string | null
      try {
        text = await readSmallText(entry.path)
      } catch (err) {
        getLogger('search').debug({ path: entry.path, message: getErrorMessage(err) }, 'skipping unreadable file')
        continue
      }
      if (text === null || signal?.aborted) continue

      const lines = text.split(/\r?\n/)
      for (let index = 0; index < lines.length && found < maxResults; index += 1) {
        if (!lines[index].toLowerCase().includes(needle)) continue
        found += 1
        const full = batcher.push({
          path: entry.path,
          line: index + 1,
          text: lines[index].trim().slice(0, MAX_LINE_PREVIEW),
        })
        if (full) yield full
      }
      if (found >= maxResults) break
    }
    if (signal?.aborted) return
    const rest = batcher.flush()
    if (rest.length > 0) yield rest
  }

  return {
    filenameSearch,
    contentSearch,
  }
}

export type Search = ReturnType<typeof createSearch>
