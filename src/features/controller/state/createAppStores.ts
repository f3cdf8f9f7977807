import { derived, get, writable } from 'svelte/store'
import { createClipboard } from '@/features/clipboard/createClipboard'
import type { ObjectInfo } from '@/features/explorer/model/types'
import type { ContentMatch } from '@/features/search/createSearch'
import type { TaskHandle } from '@/features/tasks/createTaskRegistry'
import type { PromptPurpose, UIMode, UIOverlay } from '../actions'
import type { Notification } from './notifications'
import type { OperationState } from './operations'

export type Pane = {
  cwd: string
  entries: ObjectInfo[]
  selected: number | null
  selectedPath: string | null
  loading: boolean
  generation: number
  scan: TaskHandle | null
  enrich: TaskHandle | null
}

export type Prompt = {
  purpose: PromptPurpose
  target: string | null
  label: string
}

export type UIState = {
  mode: UIMode
  overlay: UIOverlay
  input: string
  prompt: Prompt | null
  activePane: number
  showHidden: boolean
  viewport: { cols: number; rows: number }
}

export type SearchState = {
  kind: 'filename' | 'content' | null
  query: string
  generation: number
  running: boolean
  results: ObjectInfo[]
  matches: ContentMatch[]
  selected: number
  handle: TaskHandle | null
}

type Options = {
  directories: string[]
  showHidden?: boolean
  viewport?: { cols: number; rows: number }
  clipboardMaxItems?: number
}

export const emptyPane = (cwd: string): Pane => ({
  cwd,
  entries: [],
  selected: null,
  selectedPath: null,
  loading: false,
  generation: 0,
  scan: null,
  enrich: null,
})

export const emptySearch = (): SearchState => ({
  kind: null,
  query: '',
  generation: 0,
  running: false,
  results: [],
  matches: [],
  selected: 0,
  handle: null,
})

export const createAppStores = ({
  directories,
  showHidden = false,
  viewport = { cols: 80, rows: 24 },
  clipboardMaxItems,
}: Options) => {
  const ui = writable<UIState>({
    mode: 'navigation',
    overlay: 'none',
    input: '',
    prompt: null,
    activePane: 0,
    showHidden,
    viewport,
  })
  const panes = writable<Pane[]>(directories.map(emptyPane))
  const notification = writable<Notification | null>(null)
  const operations = writable<OperationState[]>([])
  const search = writable<SearchState>(emptySearch())
  const clipboard = createClipboard({ maxItems: clipboardMaxItems })

  // Read-only projection handed to the renderer.
  const view = derived(
    [ui, panes, notification, operations, search, clipboard],
    ([$ui, $panes, $notification, $operations, $search, $clipboard]) => ({
      ui: $ui,
      panes: $panes,
      notification: $notification,
      operations: $operations,
      search: $search,
      clipboard: $clipboard,
    }),
  )

  return {
    ui,
    panes,
    notification,
    operations,
    search,
    clipboard,
    view,
    snapshot: () => get(view),
  }
}

export type AppStores = ReturnType<typeof createAppStores>
export type AppView = ReturnType<AppStores['snapshot']>
