import type { Key } from 'node:readline'
import type { Action, UIMode, UIOverlay } from '../controller/actions'

export type KeyContext = {
  mode: UIMode
  overlay: UIOverlay
  input: string
}

export type KeyBinding = {
  label: string
  accelerators: string[]
  action: Action
}

type ParsedAccelerator = {
  ctrl: boolean
  alt: boolean
  shift: boolean
  key: string
}

export const NAVIGATION_BINDINGS: KeyBinding[] = [
  { label: 'Move up', accelerators: ['ArrowUp', 'K'], action: { type: 'moveSelectionUp' } },
  { label: 'Move down', accelerators: ['ArrowDown', 'J'], action: { type: 'moveSelectionDown' } },
  { label: 'Page up', accelerators: ['PageUp', 'Ctrl+U'], action: { type: 'pageUp' } },
  { label: 'Page down', accelerators: ['PageDown', 'Ctrl+D'], action: { type: 'pageDown' } },
  { label: 'First entry', accelerators: ['Home', 'G'], action: { type: 'selectFirst' } },
  { label: 'Last entry', accelerators: ['End', 'Shift+G'], action: { type: 'selectLast' } },
  { label: 'Open', accelerators: ['Enter', 'L', 'ArrowRight'], action: { type: 'enterSelected' } },
  { label: 'Parent directory', accelerators: ['Backspace', 'H', 'ArrowLeft'], action: { type: 'goToParent' } },
  { label: 'Switch pane', accelerators: ['Tab'], action: { type: 'switchPane' } },
  { label: 'Command mode', accelerators: [':'], action: { type: 'enterCommandMode' } },
  { label: 'Help', accelerators: ['?'], action: { type: 'toggleHelp' } },
  { label: 'Find by name', accelerators: ['/'], action: { type: 'toggleFileNameSearch' } },
  { label: 'Find in files', accelerators: ['Ctrl+F'], action: { type: 'toggleContentSearch' } },
  { label: 'Show hidden', accelerators: ['.'], action: { type: 'toggleShowHidden' } },
  { label: 'Reload', accelerators: ['Ctrl+R'], action: { type: 'reloadDirectory' } },
  { label: 'Copy to…', accelerators: ['C'], action: { type: 'showInputPrompt', purpose: 'copyDestination' } },
  { label: 'Move to…', accelerators: ['M'], action: { type: 'showInputPrompt', purpose: 'moveDestination' } },
  { label: 'Rename', accelerators: ['R', 'F2'], action: { type: 'showInputPrompt', purpose: 'rename' } },
  { label: 'New file', accelerators: ['N'], action: { type: 'showInputPrompt', purpose: 'createFile' } },
  { label: 'New folder', accelerators: ['Shift+N'], action: { type: 'showInputPrompt', purpose: 'createDirectory' } },
  { label: 'Go to path', accelerators: ['Ctrl+G'], action: { type: 'showInputPrompt', purpose: 'goToPath' } },
  { label: 'Copy to clipboard', accelerators: ['Y'], action: { type: 'copyToClipboard' } },
  { label: 'Cut to clipboard', accelerators: ['D'], action: { type: 'cutToClipboard' } },
  { label: 'Paste clipboard', accelerators: ['P'], action: { type: 'pasteClipboard' } },
  { label: 'Show clipboard', accelerators: ['Shift+P'], action: { type: 'toggleClipboard' } },
  { label: 'Cancel newest operation', accelerators: ['X'], action: { type: 'cancelFileOperation' } },
  { label: 'Quit', accelerators: ['Q'], action: { type: 'quit' } },
]

export const RESULT_BINDINGS: KeyBinding[] = [
  { label: 'Previous result', accelerators: ['ArrowUp', 'K'], action: { type: 'moveResultUp' } },
  { label: 'Next result', accelerators: ['ArrowDown', 'J'], action: { type: 'moveResultDown' } },
  { label: 'Open result', accelerators: ['Enter'], action: { type: 'openSearchResult' } },
]

export const CLIPBOARD_BINDINGS: KeyBinding[] = [
  { label: 'Previous item', accelerators: ['ArrowUp', 'K'], action: { type: 'moveClipboardUp' } },
  { label: 'Next item', accelerators: ['ArrowDown', 'J'], action: { type: 'moveClipboardDown' } },
  { label: 'Paste item', accelerators: ['Enter', 'P'], action: { type: 'pasteClipboardItem' } },
  { label: 'Remove item', accelerators: ['Delete', 'D'], action: { type: 'removeClipboardItem' } },
  { label: 'Clear clipboard', accelerators: ['C'], action: { type: 'clearClipboard' } },
  { label: 'Close clipboard', accelerators: ['Shift+P', 'Q'], action: { type: 'toggleClipboard' } },
]

const NOOP: Action = { type: 'noop' }

const isPunctuation = (token: string) => token.length === 1 && !/^[a-z0-9]$/.test(token)

const normalizeKeyToken = (token: string): string | null => {
  if (token.length === 1 && token.trim()) {
    return /^[A-Za-z]$/.test(token) ? token.toLowerCase() : token
  }
  const lowered = token.trim().toLowerCase()
  if (!lowered) return null
  if (/^f([1-9]|1[0-9]|2[0-4])$/.test(lowered)) return lowered
  switch (lowered) {
    case 'esc':
    case 'escape':
      return 'escape'
    case 'enter':
    case 'return':
      return 'enter'
    case 'tab':
      return 'tab'
    case 'space':
      return 'space'
    case 'backspace':
      return 'backspace'
    case 'delete':
    case 'del':
      return 'delete'
    case 'insert':
      return 'insert'
    case 'home':
      return 'home'
    case 'end':
      return 'end'
    case 'pageup':
    case 'pgup':
      return 'pageup'
    case 'pagedown':
    case 'pgdn':
      return 'pagedown'
    case 'arrowup':
    case 'up':
      return 'arrowup'
    case 'arrowdown':
    case 'down':
      return 'arrowdown'
    case 'arrowleft':
    case 'left':
      return 'arrowleft'
    case 'arrowright':
    case 'right':
      return 'arrowright'
    default:
      return null
  }
}

export const parseAccelerator = (accelerator: string): ParsedAccelerator | null => {
  let ctrl = false
  let alt = false
  let shift = false
  let key: string | null = null

  const parts = accelerator.length === 1 ? [accelerator] : accelerator.split('+').map((part) => part.trim())
  if (parts.some((part) => !part)) return null

  for (const part of parts) {
    const lowered = part.toLowerCase()
    if (lowered === 'ctrl' || lowered === 'control') {
      ctrl = true
      continue
    }
    if (lowered === 'alt' || lowered === 'meta') {
      alt = true
      continue
    }
    if (lowered === 'shift') {
      shift = true
      continue
    }
    if (key) return null
    key = normalizeKeyToken(part)
    if (!key) return null
  }

  if (!key) return null
  return { ctrl, alt, shift, key }
}

export const keyToken = (key: Key): string | null => {
  if (key.name) return normalizeKeyToken(key.name)
  if (key.sequence && key.sequence.length === 1) return normalizeKeyToken(key.sequence)
  return null
}

export const keyMatchesAccelerator = (key: Key, parsed: ParsedAccelerator): boolean => {
  const token = keyToken(key)
  if (!token || token !== parsed.key) return false
  if (parsed.ctrl !== Boolean(key.ctrl) || parsed.alt !== Boolean(key.meta)) return false
  // Punctuation arrives already shifted, so only letters and named keys compare shift.
  return isPunctuation(token) || parsed.shift === Boolean(key.shift)
}

const compile = (bindings: KeyBinding[]) =>
  bindings.flatMap((binding) =>
    binding.accelerators.flatMap((accelerator) => {
      const parsed = parseAccelerator(accelerator)
      return parsed ? [{ parsed, action: binding.action }] : []
    }),
  )

const NAVIGATION_KEYS = compile(NAVIGATION_BINDINGS)
const RESULT_KEYS = compile(RESULT_BINDINGS)
const CLIPBOARD_KEYS = compile(CLIPBOARD_BINDINGS)

const lookup = (table: ReturnType<typeof compile>, key: Key): Action =>
  table.find((entry) => keyMatchesAccelerator(key, entry.parsed))?.action ?? NOOP

const printable = (key: Key) => {
  if (key.ctrl || key.meta || !key.sequence) return null
  const chars = Array.from(key.sequence)
  if (chars.length !== 1) return null
  const code = chars[0].codePointAt(0) ?? 0
  return code >= 0x20 && code !== 0x7f ? chars[0] : null
}

const isTextEntry = ({ mode, overlay }: KeyContext) =>
  mode === 'command' || overlay === 'prompt' || overlay === 'fileNameSearch' || overlay === 'contentSearch'

const mapTextEntry = (context: KeyContext, key: Key, token: string | null): Action => {
  const { overlay, input } = context
  if (token === 'enter') {
    if (overlay === 'fileNameSearch') return { type: 'fileNameSearch', query: input }
    if (overlay === 'contentSearch') return { type: 'contentSearch', query: input }
    return { type: 'submitInputPrompt', input }
  }
  if (token === 'backspace') {
    return { type: 'updateInput', input: Array.from(input).slice(0, -1).join('') }
  }
  const ch = printable(key)
  return ch === null ? NOOP : { type: 'updateInput', input: input + ch }
}

// Pure translation of one keypress; every key yields an action.
export const mapKey = (context: KeyContext, key: Key): Action => {
  const token = keyToken(key)
  if (token === 'escape') return { type: 'escape' }
  if (key.ctrl && token === 'c') return { type: 'quit' }
  if (isTextEntry(context)) return mapTextEntry(context, key, token)
  if (context.overlay === 'help') return token === '?' || token === 'q' ? { type: 'toggleHelp' } : NOOP
  if (context.overlay === 'searchResults') return lookup(RESULT_KEYS, key)
  if (context.overlay === 'clipboard') return lookup(CLIPBOARD_KEYS, key)
  return lookup(NAVIGATION_KEYS, key)
}
