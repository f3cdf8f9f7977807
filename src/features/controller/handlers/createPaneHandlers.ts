import path from 'node:path'
import { get } from 'svelte/store'
import { followSelection, moveCaret } from '@/features/explorer/helpers/navigationController'
import { isEnriched, type ObjectInfo, type ScanUpdate } from '@/features/explorer/model/types'
import type { DirectoryScanner } from '@/features/explorer/scanner/createDirectoryScanner'
import { insertSorted, patchEntry } from '@/features/explorer/state/entryMutations'
import type { TaskHandle, TaskRegistry } from '@/features/tasks/createTaskRegistry'
import { getErrorMessage } from '@/shared/lib/error'
import type { Action, TaskResultAction } from '../actions'
import type { Pane } from '../state/createAppStores'
import { formatSize } from '../state/operations'
import { assertNever, type DispatchContext } from './dispatchContext'

type Deps = {
  context: DispatchContext
  registry: TaskRegistry<TaskResultAction>
  scanner: DirectoryScanner
}

type DirectoryResolved = Extract<Action, { type: 'directoryResolved' }>

const PAGE_CHROME_ROWS = 4

export const createPaneHandlers = ({ context, registry, scanner }: Deps) => {
  const { stores, log, notify, activePaneIndex, activePane, paneAt, updatePane, selectedEntry } = context
  // Pending directory checks, at most one per pane.
  const navigations = new Map<number, TaskHandle>()

  const withSelection = (pane: Pane): Pane => ({
    ...pane,
    selected: followSelection(
      pane.entries.map((entry) => entry.path),
      pane.selectedPath,
      pane.selected,
    ),
  })

  const cancelNavigation = (index: number) => {
    const pending = navigations.get(index)
    if (!pending) return
    registry.cancel(pending)
    navigations.delete(index)
  }

  const spawnEnrichment = (index: number, pane: Pane) => {
    const pending = pane.entries.filter((entry) => !isEnriched(entry))
    if (pending.length === 0) return null
    const { generation } = pane
    return registry.spawn('enrich', `Reading metadata in ${pane.cwd}`, async ({ signal, emit }) => {
      for await (const info of scanner.enrich(pending, { signal })) {
        emit({ type: 'updateObjectInfo', paneIndex: index, generation, info })
      }
      emit({ type: 'enrichmentComplete', paneIndex: index, generation })
    })
  }

  // Replaces the pane listing right away; callers pass directories already known to exist.
  const loadPane = (index: number, dir: string, selectPath: string | null = null) => {
    const pane = paneAt(index)
    if (!pane) return
    cancelNavigation(index)
    if (pane.scan) registry.cancel(pane.scan)
    if (pane.enrich) registry.cancel(pane.enrich)

    const generation = context.takeGeneration()
    const { showHidden } = get(stores.ui)
    const scan = registry.spawn('scan', `Scanning ${dir}`, async ({ signal, emit }) => {
      for await (const update of scanner.scanStreaming(dir, { signal, generation, showHidden })) {
        emit({ type: 'directoryScanUpdate', paneIndex: index, generation, update })
      }
    })
    updatePane(index, () => ({
      cwd: dir,
      entries: [],
      selected: null,
      selectedPath: selectPath,
      loading: true,
      generation,
      scan,
      enrich: null,
    }))
  }

  // The pane keeps its directory, listing and caret until the target is known to be a directory.
  const navigateTo = (index: number, dir: string, selectPath: string | null = null) => {
    if (!paneAt(index)) return
    cancelNavigation(index)
    const handle = registry.spawn('scan', `Opening ${dir}`, async ({ signal, emit, handle: own }) => {
      const resolved: DirectoryResolved = {
        type: 'directoryResolved',
        paneIndex: index,
        requestId: own.id,
        path: dir,
        selectPath,
      }
      try {
        await scanner.ensureDirectory(dir)
        emit(resolved)
      } catch (err) {
        if (signal.aborted) return
        emit({ ...resolved, error: getErrorMessage(err) })
      }
    })
    navigations.set(index, handle)
  }

  const resolveNavigation = ({ paneIndex, requestId, path: dir, selectPath, error }: DirectoryResolved) => {
    if (navigations.get(paneIndex)?.id !== requestId) {
      log().debug({ pane: paneIndex, request: requestId }, 'dropped superseded navigation')
      return
    }
    navigations.delete(paneIndex)
    if (error !== undefined) {
      log().warn({ path: dir, message: error }, 'cannot open directory')
      notify(`Cannot open ${dir}: ${error}`, 'error')
      return
    }
    loadPane(paneIndex, dir, selectPath)
  }

  const applyScanUpdate = (index: number, generation: number, update: ScanUpdate) => {
    const pane = paneAt(index)
    if (!pane || pane.generation !== generation) {
      log().debug({ pane: index, generation }, 'dropped stale scan update')
      return
    }
    switch (update.type) {
      case 'entry':
        updatePane(index, (current) => withSelection({ ...current, entries: insertSorted(current.entries, update.info) }))
        return
      case 'completed': {
        const enrich = spawnEnrichment(index, pane)
        updatePane(index, (current) => ({ ...current, loading: false, scan: null, enrich }))
        return
      }
      case 'error':
        log().warn({ path: update.path, message: update.message }, 'scan error')
        notify(update.message, 'warning')
        return
      default:
        assertNever(update)
    }
  }

  const applyObjectInfo = (index: number, generation: number, info: ObjectInfo) => {
    if (paneAt(index)?.generation !== generation) return
    updatePane(index, (current) => ({ ...current, entries: patchEntry(current.entries, info) }))
  }

  const completeEnrichment = (index: number, generation: number) => {
    if (paneAt(index)?.generation !== generation) return
    updatePane(index, (current) => ({ ...current, enrich: null }))
  }

  const moveSelection = (args: { delta?: number; toStart?: boolean; toEnd?: boolean }) => {
    updatePane(activePaneIndex(), (pane) => {
      const selected = moveCaret({ count: pane.entries.length, current: pane.selected, ...args })
      return {
        ...pane,
        selected,
        selectedPath: selected === null ? null : pane.entries[selected].path,
      }
    })
  }

  const pageSize = () => Math.max(1, get(stores.ui).viewport.rows - PAGE_CHROME_ROWS)

  const enterSelected = () => {
    const entry = selectedEntry()
    if (!entry) return
    if (entry.kind === 'dir' || entry.kind === 'symlink') {
      navigateTo(activePaneIndex(), entry.path)
      return
    }
    const size = entry.size === undefined ? '' : ` (${formatSize(entry.size)})`
    notify(`${entry.name}${size}`, 'info')
  }

  const goToParent = () => {
    const pane = activePane()
    if (!pane) return
    const parent = path.dirname(pane.cwd)
    if (parent === pane.cwd) return
    loadPane(activePaneIndex(), parent, pane.cwd)
  }

  const goToPath = (input: string) => {
    navigateTo(activePaneIndex(), context.resolveInput(input))
  }

  const reloadActive = () => {
    const pane = activePane()
    if (pane) loadPane(activePaneIndex(), pane.cwd, pane.selectedPath)
  }

  const reloadAll = () => {
    get(stores.panes).forEach((pane, index) => loadPane(index, pane.cwd, pane.selectedPath))
  }

  const switchPane = () => {
    stores.ui.update((ui) => ({ ...ui, activePane: (ui.activePane + 1) % get(stores.panes).length }))
  }

  const toggleShowHidden = () => {
    stores.ui.update((ui) => ({ ...ui, showHidden: !ui.showHidden }))
    reloadAll()
  }

  // Registry tasks are cancelled by the caller; this only forgets them.
  const forgetTasks = () => {
    navigations.clear()
    stores.panes.update((panes) =>
      panes.map((pane) => (pane.loading || pane.enrich ? { ...pane, loading: false, scan: null, enrich: null } : pane)),
    )
  }

  return {
    loadPane,
    navigateTo,
    resolveNavigation,
    applyScanUpdate,
    applyObjectInfo,
    completeEnrichment,
    moveSelection,
    pageSize,
    enterSelected,
    goToParent,
    goToPath,
    reloadActive,
    reloadAll,
    switchPane,
    toggleShowHidden,
    forgetTasks,
  }
}

export type PaneHandlers = ReturnType<typeof createPaneHandlers>
