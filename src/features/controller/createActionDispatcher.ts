import { get } from 'svelte/store'
import type { MetadataCache } from '@/features/cache/createMetadataCache'
import type { DirectoryScanner } from '@/features/explorer/scanner/createDirectoryScanner'
import type { FileOps } from '@/features/file-ops/fileOps'
import type { Search } from '@/features/search/createSearch'
import type { TaskRegistry } from '@/features/tasks/createTaskRegistry'
import type { Action, DispatchOutcome, TaskResultAction } from './actions'
import { createClipboardHandlers } from './handlers/createClipboardHandlers'
import { createFileOpHandlers } from './handlers/createFileOpHandlers'
import { createPaneHandlers } from './handlers/createPaneHandlers'
import { createPromptHandlers } from './handlers/createPromptHandlers'
import { createSearchHandlers } from './handlers/createSearchHandlers'
import { assertNever, createDispatchContext, plural } from './handlers/dispatchContext'
import type { AppStores } from './state/createAppStores'
import { isNotificationExpired } from './state/notifications'

type Deps = {
  stores: AppStores
  registry: TaskRegistry<TaskResultAction>
  scanner: DirectoryScanner
  fileOps: FileOps
  search: Search
  cache: MetadataCache
  enqueue: (action: Action) => void
}

export const createActionDispatcher = (deps: Deps) => {
  const { stores, registry, scanner, fileOps, search, cache, enqueue } = deps
  const context = createDispatchContext({ stores })
  const { log, notify, activePane, closeOverlay } = context

  const panes = createPaneHandlers({ context, registry, scanner })
  const prompts = createPromptHandlers({ context, enqueue })
  const fileOpHandlers = createFileOpHandlers({ context, registry, fileOps, cache, loadPane: panes.loadPane })
  const searches = createSearchHandlers({ context, registry, search, navigateTo: panes.navigateTo })
  const clipboard = createClipboardHandlers({
    context,
    clipboard: stores.clipboard,
    copy: fileOpHandlers.copy,
    move: fileOpHandlers.move,
  })

  // Unwinds one layer per press: running work, then the notification, then overlays and modes, then quits.
  const escape = () => {
    const operations = get(stores.operations)
    if (operations.length > 0) {
      const cancelled = registry.cancelAll()
      stores.operations.set([])
      panes.forgetTasks()
      searches.stop()
      log().info({ operations: operations.length, tasks: cancelled }, 'cancelled on escape')
      notify(`Cancelled ${plural(operations.length, 'operation')}`, 'info')
      return
    }
    if (get(stores.notification)) {
      stores.notification.set(null)
      return
    }
    const ui = get(stores.ui)
    if (ui.overlay !== 'none') {
      if (ui.overlay === 'searchResults') searches.stop()
      closeOverlay()
      return
    }
    if (ui.mode === 'command') {
      prompts.exitCommandMode()
      return
    }
    enqueue({ type: 'quit' })
  }

  const dispatch = (action: Action): DispatchOutcome => {
    switch (action.type) {
      case 'noop':
        return 'continue'
      case 'quit':
        registry.cancelAll()
        return 'terminate'
      case 'tick': {
        const current = get(stores.notification)
        if (current && isNotificationExpired(current)) stores.notification.set(null)
        return 'continue'
      }
      case 'resize':
        stores.ui.update((ui) => ({ ...ui, viewport: { cols: action.cols, rows: action.rows } }))
        return 'continue'
      case 'escape':
        escape()
        return 'continue'
      case 'moveSelectionUp':
        panes.moveSelection({ delta: -1 })
        return 'continue'
      case 'moveSelectionDown':
        panes.moveSelection({ delta: 1 })
        return 'continue'
      case 'pageUp':
        panes.moveSelection({ delta: -panes.pageSize() })
        return 'continue'
      case 'pageDown':
        panes.moveSelection({ delta: panes.pageSize() })
        return 'continue'
      case 'selectFirst':
        panes.moveSelection({ toStart: true })
        return 'continue'
      case 'selectLast':
        panes.moveSelection({ toEnd: true })
        return 'continue'
      case 'enterSelected':
        panes.enterSelected()
        return 'continue'
      case 'goToParent':
        panes.goToParent()
        return 'continue'
      case 'goToPath':
        panes.goToPath(action.path)
        return 'continue'
      case 'switchPane':
        panes.switchPane()
        return 'continue'
      case 'toggleShowHidden':
        panes.toggleShowHidden()
        return 'continue'
      case 'reloadDirectory':
        panes.reloadActive()
        return 'continue'
      case 'directoryResolved':
        panes.resolveNavigation(action)
        return 'continue'
      case 'directoryScanUpdate':
        panes.applyScanUpdate(action.paneIndex, action.generation, action.update)
        return 'continue'
      case 'updateObjectInfo':
        panes.applyObjectInfo(action.paneIndex, action.generation, action.info)
        return 'continue'
      case 'enrichmentComplete':
        panes.completeEnrichment(action.paneIndex, action.generation)
        return 'continue'
      case 'enterCommandMode':
        prompts.enterCommandMode()
        return 'continue'
      case 'exitCommandMode':
        prompts.exitCommandMode()
        return 'continue'
      case 'toggleHelp':
        prompts.toggleOverlay('help')
        return 'continue'
      case 'toggleFileNameSearch':
        prompts.toggleOverlay('fileNameSearch')
        return 'continue'
      case 'toggleContentSearch':
        prompts.toggleOverlay('contentSearch')
        return 'continue'
      case 'toggleClipboard':
        prompts.toggleOverlay('clipboard')
        return 'continue'
      case 'closeOverlay':
        closeOverlay()
        return 'continue'
      case 'showInputPrompt':
        prompts.showInputPrompt(action.purpose)
        return 'continue'
      case 'updateInput':
        prompts.updateInput(action.input)
        return 'continue'
      case 'submitInputPrompt':
        prompts.submitInputPrompt(action.input)
        return 'continue'
      case 'fileNameSearch':
        searches.start('filename', action.query)
        return 'continue'
      case 'contentSearch':
        searches.start('content', action.query)
        return 'continue'
      case 'showFilenameSearchResults':
        searches.appendResults(action.generation, { kind: 'filename', results: action.results }, action.done)
        return 'continue'
      case 'showContentSearchResults':
        searches.appendResults(action.generation, { kind: 'content', matches: action.matches }, action.done)
        return 'continue'
      case 'moveResultUp':
        searches.moveResult(-1)
        return 'continue'
      case 'moveResultDown':
        searches.moveResult(1)
        return 'continue'
      case 'openSearchResult':
        searches.openResult()
        return 'continue'
      case 'copyEntry':
        fileOpHandlers.copy(action.source, action.destination)
        return 'continue'
      case 'moveEntry':
        fileOpHandlers.move(action.source, action.destination)
        return 'continue'
      case 'renameEntry':
        fileOpHandlers.rename(action.source, action.newName)
        return 'continue'
      case 'createFileWithName':
        fileOpHandlers.create('file', action.name)
        return 'continue'
      case 'createDirectoryWithName':
        fileOpHandlers.create('directory', action.name)
        return 'continue'
      case 'fileOperationProgress':
        fileOpHandlers.applyOperationProgress(action.operationId, action.bytesProcessed, action.totalBytes)
        return 'continue'
      case 'fileOperationComplete':
        fileOpHandlers.completeOperation(action.operationId, action.touched, action.error)
        return 'continue'
      case 'cancelFileOperation':
        fileOpHandlers.cancelOperation(action.operationId)
        return 'continue'
      case 'copyToClipboard':
        clipboard.copySelected()
        return 'continue'
      case 'cutToClipboard':
        clipboard.cutSelected()
        return 'continue'
      case 'pasteClipboard':
        clipboard.paste()
        return 'continue'
      case 'pasteClipboardItem':
        clipboard.pasteSelected()
        return 'continue'
      case 'removeClipboardItem':
        clipboard.removeSelected()
        return 'continue'
      case 'clearClipboard':
        clipboard.clear()
        return 'continue'
      case 'moveClipboardUp':
        clipboard.moveSelection(-1)
        return 'continue'
      case 'moveClipboardDown':
        clipboard.moveSelection(1)
        return 'continue'
      case 'showWorkingDirectory':
        notify(activePane()?.cwd ?? process.cwd(), 'info')
        return 'continue'
      default:
        return assertNever(action)
    }
  }

  return {
    dispatch,
    loadPane: panes.loadPane,
  }
}

export type ActionDispatcher = ReturnType<typeof createActionDispatcher>
