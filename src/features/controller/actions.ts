import type { ObjectInfo, ScanUpdate } from '../explorer/model/types'
import type { ContentMatch } from '../search/createSearch'

export type UIMode = 'navigation' | 'command'

export type UIOverlay = 'none' | 'prompt' | 'fileNameSearch' | 'contentSearch' | 'searchResults' | 'help' | 'clipboard'

export type PromptPurpose = 'copyDestination' | 'moveDestination' | 'rename' | 'createFile' | 'createDirectory' | 'goToPath'

export type Action =
  // lifecycle
  | { type: 'noop' }
  | { type: 'quit' }
  | { type: 'tick' }
  | { type: 'resize'; cols: number; rows: number }
  | { type: 'escape' }
  // navigation
  | { type: 'moveSelectionUp' }
  | { type: 'moveSelectionDown' }
  | { type: 'pageUp' }
  | { type: 'pageDown' }
  | { type: 'selectFirst' }
  | { type: 'selectLast' }
  | { type: 'enterSelected' }
  | { type: 'goToParent' }
  | { type: 'goToPath'; path: string }
  | { type: 'switchPane' }
  | { type: 'toggleShowHidden' }
  | { type: 'reloadDirectory' }
  // modes and overlays
  | { type: 'enterCommandMode' }
  | { type: 'exitCommandMode' }
  | { type: 'toggleHelp' }
  | { type: 'toggleFileNameSearch' }
  | { type: 'toggleContentSearch' }
  | { type: 'closeOverlay' }
  | { type: 'showInputPrompt'; purpose: PromptPurpose }
  | { type: 'updateInput'; input: string }
  | { type: 'submitInputPrompt'; input: string }
  // search
  | { type: 'fileNameSearch'; query: string }
  | { type: 'contentSearch'; query: string }
  | { type: 'showFilenameSearchResults'; generation: number; results: ObjectInfo[]; done: boolean }
  | { type: 'showContentSearchResults'; generation: number; matches: ContentMatch[]; done: boolean }
  | { type: 'moveResultUp' }
  | { type: 'moveResultDown' }
  | { type: 'openSearchResult' }
  // background scans
  | { type: 'directoryScanUpdate'; paneIndex: number; generation: number; update: ScanUpdate }
  | { type: 'updateObjectInfo'; paneIndex: number; generation: number; info: ObjectInfo }
  | { type: 'enrichmentComplete'; paneIndex: number; generation: number }
  | {
      type: 'directoryResolved'
      paneIndex: number
      requestId: number
      path: string
      selectPath: string | null
      error?: string
    }
  // file operations
  | { type: 'copyEntry'; source: string; destination: string }
  | { type: 'moveEntry'; source: string; destination: string }
  | { type: 'renameEntry'; source: string; newName: string }
  | { type: 'createFileWithName'; name: string }
  | { type: 'createDirectoryWithName'; name: string }
  | { type: 'fileOperationProgress'; operationId: number; bytesProcessed: number; totalBytes: number }
  | { type: 'fileOperationComplete'; operationId: number; error?: string; touched: string[] }
  | { type: 'cancelFileOperation'; operationId?: number }
  // clipboard
  | { type: 'copyToClipboard' }
  | { type: 'cutToClipboard' }
  | { type: 'pasteClipboard' }
  | { type: 'pasteClipboardItem' }
  | { type: 'removeClipboardItem' }
  | { type: 'clearClipboard' }
  | { type: 'toggleClipboard' }
  | { type: 'moveClipboardUp' }
  | { type: 'moveClipboardDown' }
  // command mode
  | { type: 'showWorkingDirectory' }

export type ActionType = Action['type']

export type TaskResultAction = Extract<
  Action,
  {
    type:
      | 'directoryScanUpdate'
      | 'updateObjectInfo'
      | 'enrichmentComplete'
      | 'directoryResolved'
      | 'showFilenameSearchResults'
      | 'showContentSearchResults'
      | 'fileOperationProgress'
      | 'fileOperationComplete'
  }
>

export type DispatchOutcome = 'continue' | 'terminate'
