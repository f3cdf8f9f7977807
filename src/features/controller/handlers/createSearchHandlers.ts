import path from 'node:path'
import { get } from 'svelte/store'
import { moveCaret } from '@/features/explorer/helpers/navigationController'
import type { ObjectInfo } from '@/features/explorer/model/types'
import type { ContentMatch, Search } from '@/features/search/createSearch'
import type { TaskRegistry } from '@/features/tasks/createTaskRegistry'
import type { TaskResultAction } from '../actions'
import type { DispatchContext } from './dispatchContext'

type Deps = {
  context: DispatchContext
  registry: TaskRegistry<TaskResultAction>
  search: Search
  navigateTo: (index: number, dir: string, selectPath?: string | null) => void
}

type ResultBatch = { kind: 'filename'; results: ObjectInfo[] } | { kind: 'content'; matches: ContentMatch[] }

export const createSearchHandlers = ({ context, registry, search, navigateTo }: Deps) => {
  const { stores, activePane, activePaneIndex, closeOverlay } = context

  const stop = () => {
    const { handle } = get(stores.search)
    if (handle) registry.cancel(handle)
    stores.search.update((state) => ({ ...state, running: false, handle: null }))
  }

  const start = (kind: 'filename' | 'content', query: string) => {
    const trimmed = query.trim()
    if (!trimmed) {
      closeOverlay()
      return
    }
    // One search at a time.
    registry.cancelKind('search')
    const root = activePane()?.cwd ?? process.cwd()
    const generation = context.takeGeneration()
    const { showHidden } = get(stores.ui)

    const handle = registry.spawn('search', `Searching for ${trimmed}`, async ({ signal, emit }) => {
      if (kind === 'filename') {
        for await (const batch of search.filenameSearch(root, trimmed, { signal, showHidden })) {
          const results = batch.map((info) => ({ ...info, generation }))
          emit({ type: 'showFilenameSearchResults', generation, results, done: false })
        }
        emit({ type: 'showFilenameSearchResults', generation, results: [], done: true })
      } else {
        for await (const matches of search.contentSearch(root, trimmed, { signal, showHidden })) {
          emit({ type: 'showContentSearchResults', generation, matches, done: false })
        }
        emit({ type: 'showContentSearchResults', generation, matches: [], done: true })
      }
    })
    stores.search.set({
      kind,
      query: trimmed,
      generation,
      running: true,
      results: [],
      matches: [],
      selected: 0,
      handle,
    })
    stores.ui.update((ui) => ({ ...ui, overlay: 'searchResults', input: '', prompt: null }))
  }

  const appendResults = (generation: number, batch: ResultBatch, done: boolean) => {
    const state = get(stores.search)
    if (state.generation !== generation) return
    stores.search.set({
      ...state,
      results: batch.kind === 'filename' ? [...state.results, ...batch.results] : state.results,
      matches: batch.kind === 'content' ? [...state.matches, ...batch.matches] : state.matches,
      running: !done,
      handle: done ? null : state.handle,
    })
  }

  const moveResult = (delta: number) => {
    stores.search.update((state) => {
      const count = state.kind === 'content' ? state.matches.length : state.results.length
      return { ...state, selected: moveCaret({ count, current: state.selected, delta }) ?? 0 }
    })
  }

  const openResult = () => {
    const state = get(stores.search)
    const target =
      state.kind === 'content'
        ? state.matches[state.selected]?.path
        : state.kind === 'filename'
          ? state.results[state.selected]
          : undefined
    if (!target) return
    stop()
    closeOverlay()
    if (typeof target === 'string') {
      navigateTo(activePaneIndex(), path.dirname(target), target)
    } else if (target.kind === 'dir') {
      navigateTo(activePaneIndex(), target.path)
    } else {
      navigateTo(activePaneIndex(), path.dirname(target.path), target.path)
    }
  }

  return {
    start,
    stop,
    appendResults,
    moveResult,
    openResult,
  }
}

export type SearchHandlers = ReturnType<typeof createSearchHandlers>
