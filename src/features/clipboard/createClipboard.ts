import { get, writable } from 'svelte/store'
import { moveCaret } from '@/features/explorer/helpers/navigationController'
import type { EntryKind, ObjectInfo } from '@/features/explorer/model/types'
import { getLogger } from '@/shared/lib/log'

export type ClipboardMode = 'copy' | 'cut'

export type ClipboardItem = {
  path: string
  name: string
  kind: EntryKind
  mode: ClipboardMode
}

export type ClipboardState = {
  items: ClipboardItem[]
  selected: number
}

type Result = { ok: true; message: string } | { ok: false; error: string }
type TakeResult = { ok: true; items: ClipboardItem[] } | { ok: false; error: string }

type Options = {
  maxItems?: number
}

export const DEFAULT_CLIPBOARD_MAX_ITEMS = 1000

export const emptyClipboard = (): ClipboardState => ({ items: [], selected: 0 })

const clampSelection = (selected: number, count: number) => moveCaret({ count, current: selected }) ?? 0

export const createClipboard = ({ maxItems = DEFAULT_CLIPBOARD_MAX_ITEMS }: Options = {}) => {
  const state = writable<ClipboardState>(emptyClipboard())
  const log = () => getLogger('clipboard')

  const setItems = (items: ClipboardItem[]) => {
    state.update((current) => ({ items, selected: clampSelection(current.selected, items.length) }))
  }

  // Marking an entry again under the other mode switches it; oldest items fall off past the limit.
  const add = (mode: ClipboardMode, entry: ObjectInfo | undefined): Result => {
    if (!entry) return { ok: false, error: 'Nothing selected' }
    const { items } = get(state)
    if (items.some((item) => item.path === entry.path && item.mode === mode)) {
      return { ok: false, error: `${entry.name} is already on the clipboard` }
    }
    const next = [
      ...items.filter((item) => item.path !== entry.path),
      { path: entry.path, name: entry.name, kind: entry.kind, mode },
    ]
    const evicted = Math.max(0, next.length - maxItems)
    if (evicted > 0) log().debug({ evicted, maxItems }, 'clipboard full, dropped oldest items')
    setItems(next.slice(evicted))
    return { ok: true, message: `${mode === 'copy' ? 'Copied' : 'Cut'} ${entry.name} to clipboard` }
  }

  const copy = (entry: ObjectInfo | undefined) => add('copy', entry)
  const cut = (entry: ObjectInfo | undefined) => add('cut', entry)

  const take = (index?: number): TakeResult => {
    const { items } = get(state)
    if (items.length === 0) return { ok: false, error: 'Clipboard is empty' }
    if (index === undefined) return { ok: true, items }
    const item = items[index]
    return item ? { ok: true, items: [item] } : { ok: false, error: 'Nothing selected' }
  }

  // Cut items move away on paste, so they leave the clipboard; copied items stay for the next paste.
  const settle = (pasted: ClipboardItem[]) => {
    const moved = new Set(pasted.filter((item) => item.mode === 'cut').map((item) => item.path))
    if (moved.size === 0) return
    setItems(get(state).items.filter((item) => !moved.has(item.path)))
  }

  const remove = (index: number): Result => {
    const { items } = get(state)
    const item = items[index]
    if (!item) return { ok: false, error: items.length === 0 ? 'Clipboard is empty' : 'Nothing selected' }
    setItems(items.filter((_, i) => i !== index))
    return { ok: true, message: `Removed ${item.name} from clipboard` }
  }

  const clear = (): Result => {
    const count = get(state).items.length
    if (count === 0) return { ok: false, error: 'Clipboard was already empty' }
    state.set(emptyClipboard())
    return { ok: true, message: `Cleared ${count} item${count === 1 ? '' : 's'} from clipboard` }
  }

  const moveSelection = (delta: number) => {
    state.update((current) => ({
      ...current,
      selected: moveCaret({ count: current.items.length, current: current.selected, delta }) ?? 0,
    }))
  }

  return {
    subscribe: state.subscribe,
    copy,
    cut,
    take,
    settle,
    remove,
    clear,
    moveSelection,
  }
}

export type Clipboard = ReturnType<typeof createClipboard>
