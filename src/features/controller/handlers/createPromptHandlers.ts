import { get } from 'svelte/store'
import type { Action, PromptPurpose } from '../actions'
import { assertNever, type DispatchContext } from './dispatchContext'

type Deps = {
  context: DispatchContext
  enqueue: (action: Action) => void
}

type ToggledOverlay = 'help' | 'fileNameSearch' | 'contentSearch' | 'clipboard'

const PROMPT_LABELS: Record<PromptPurpose, string> = {
  copyDestination: 'Copy to',
  moveDestination: 'Move to',
  rename: 'Rename to',
  createFile: 'New file',
  createDirectory: 'New folder',
  goToPath: 'Go to',
}

const resolvePrompt = (purpose: PromptPurpose, target: string | null, input: string): Action | null => {
  switch (purpose) {
    case 'copyDestination':
      return target ? { type: 'copyEntry', source: target, destination: input } : null
    case 'moveDestination':
      return target ? { type: 'moveEntry', source: target, destination: input } : null
    case 'rename':
      return target ? { type: 'renameEntry', source: target, newName: input } : null
    case 'createFile':
      return { type: 'createFileWithName', name: input }
    case 'createDirectory':
      return { type: 'createDirectoryWithName', name: input }
    case 'goToPath':
      return { type: 'goToPath', path: input }
    default:
      return assertNever(purpose)
  }
}

export const createPromptHandlers = ({ context, enqueue }: Deps) => {
  const { stores, notify, activePane, activePaneIndex, selectedEntry, closeOverlay } = context

  const showInputPrompt = (purpose: PromptPurpose) => {
    const pane = activePane()
    const entry = selectedEntry()
    const needsTarget = purpose === 'copyDestination' || purpose === 'moveDestination' || purpose === 'rename'
    if (needsTarget && !entry) {
      notify('No entry selected', 'info')
      return
    }
    const panes = get(stores.panes)
    const other = panes[(activePaneIndex() + 1) % panes.length]
    const initial =
      purpose === 'rename'
        ? entry?.name ?? ''
        : purpose === 'copyDestination' || purpose === 'moveDestination'
          ? other?.cwd ?? ''
          : purpose === 'goToPath'
            ? pane?.cwd ?? ''
            : ''
    stores.ui.update((ui) => ({
      ...ui,
      mode: 'navigation',
      overlay: 'prompt',
      input: initial,
      prompt: { purpose, target: needsTarget ? entry?.path ?? null : null, label: PROMPT_LABELS[purpose] },
    }))
  }

  const parseCommand = (line: string): Action | null => {
    const trimmed = line.trim()
    const space = trimmed.search(/\s/)
    const name = space === -1 ? trimmed : trimmed.slice(0, space)
    const args = space === -1 ? '' : trimmed.slice(space + 1).trim()
    const requireArgs = (usage: string, action: Action): Action | null => {
      if (args) return action
      notify(`Usage: ${usage}`, 'warning')
      return null
    }
    switch (name) {
      case 'cd':
        return { type: 'goToPath', path: args || '~' }
      case 'mkdir':
        return requireArgs('mkdir <name>', { type: 'createDirectoryWithName', name: args })
      case 'touch':
        return requireArgs('touch <name>', { type: 'createFileWithName', name: args })
      case 'find':
        return requireArgs('find <text>', { type: 'fileNameSearch', query: args })
      case 'grep':
        return requireArgs('grep <text>', { type: 'contentSearch', query: args })
      case 'reload':
        return { type: 'reloadDirectory' }
      case 'pwd':
        return { type: 'showWorkingDirectory' }
      case 'paste':
        return { type: 'pasteClipboard' }
      case 'clear':
        return { type: 'clearClipboard' }
      case 'q':
      case 'quit':
        return { type: 'quit' }
      default:
        notify(`Unknown command: ${name}`, 'warning')
        return null
    }
  }

  const submitInputPrompt = (input: string) => {
    const ui = get(stores.ui)
    if (ui.mode === 'command') {
      stores.ui.update((current) => ({ ...current, mode: 'navigation', input: '' }))
      if (!input.trim()) return
      const action = parseCommand(input)
      if (action) enqueue(action)
      return
    }
    const { prompt } = ui
    closeOverlay()
    if (!prompt || !input.trim()) return
    const action = resolvePrompt(prompt.purpose, prompt.target, input)
    if (action) enqueue(action)
  }

  const updateInput = (input: string) => {
    stores.ui.update((ui) => ({ ...ui, input }))
  }

  const enterCommandMode = () => {
    stores.ui.update((ui) => ({ ...ui, mode: 'command', overlay: 'none', prompt: null, input: '' }))
  }

  const exitCommandMode = () => {
    stores.ui.update((ui) => ({ ...ui, mode: 'navigation', input: '' }))
  }

  const toggleOverlay = (overlay: ToggledOverlay) => {
    stores.ui.update((ui) =>
      ui.overlay === overlay
        ? { ...ui, overlay: 'none', input: '' }
        : { ...ui, mode: 'navigation', overlay, input: '', prompt: null },
    )
  }

  return {
    showInputPrompt,
    submitInputPrompt,
    updateInput,
    enterCommandMode,
    exitCommandMode,
    toggleOverlay,
  }
}

export type PromptHandlers = ReturnType<typeof createPromptHandlers>
