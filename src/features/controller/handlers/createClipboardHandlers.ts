import path from 'node:path'
import { get } from 'svelte/store'
import type { Clipboard } from '@/features/clipboard/createClipboard'
import type { DispatchContext } from './dispatchContext'

type Deps = {
  context: DispatchContext
  clipboard: Clipboard
  copy: (source: string, destination: string) => void
  move: (source: string, destination: string) => void
}

type Outcome = { ok: true; message: string } | { ok: false; error: string }

export const createClipboardHandlers = ({ context, clipboard, copy, move }: Deps) => {
  const { log, notify, activePane, selectedEntry } = context

  const report = (outcome: Outcome) => {
    if (outcome.ok) notify(outcome.message, 'success')
    else notify(outcome.error, 'info')
  }

  const copySelected = () => report(clipboard.copy(selectedEntry()))
  const cutSelected = () => report(clipboard.cut(selectedEntry()))

  // Each item becomes its own operation into the active pane's directory.
  const paste = (index?: number) => {
    const dir = activePane()?.cwd
    if (!dir) return
    const taken = clipboard.take(index)
    if (!taken.ok) {
      notify(taken.error, 'info')
      return
    }
    const pasted = taken.items.filter((item) => {
      if (item.mode === 'cut' && path.dirname(item.path) === dir) {
        notify(`${item.name} is already in ${dir}`, 'info')
        return false
      }
      return true
    })
    for (const item of pasted) {
      if (item.mode === 'copy') copy(item.path, dir)
      else move(item.path, dir)
    }
    clipboard.settle(pasted)
    log().info({ items: pasted.length, dir }, 'pasted from clipboard')
  }

  const pasteSelected = () => paste(get(clipboard).selected)
  const removeSelected = () => report(clipboard.remove(get(clipboard).selected))
  const clear = () => report(clipboard.clear())

  return {
    copySelected,
    cutSelected,
    paste: () => paste(),
    pasteSelected,
    removeSelected,
    clear,
    moveSelection: clipboard.moveSelection,
  }
}

export type ClipboardHandlers = ReturnType<typeof createClipboardHandlers>
