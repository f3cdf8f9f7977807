import os from 'node:os'
import path from 'node:path'
import { get } from 'svelte/store'
import { getLogger } from '@/shared/lib/log'
import type { AppStores, Pane } from '../state/createAppStores'
import { createNotification, type NotificationLevel } from '../state/notifications'

type Deps = {
  stores: AppStores
}

export const assertNever = (value: never): never => {
  throw new Error(`Unhandled action: ${JSON.stringify(value)}`)
}

export const expandHome = (input: string) => {
  if (input === '~') return os.homedir()
  if (input.startsWith('~/')) return path.join(os.homedir(), input.slice(2))
  return input
}

export const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? '' : 's'}`

// State helpers shared by every handler group.
export const createDispatchContext = ({ stores }: Deps) => {
  let nextGeneration = 1

  // One counter for panes and searches, so a stale result never matches a newer request.
  const takeGeneration = () => {
    const generation = nextGeneration
    nextGeneration += 1
    return generation
  }

  const log = () => getLogger('dispatcher')

  const notify = (message: string, level: NotificationLevel) => {
    stores.notification.set(createNotification(message, level))
  }

  const activePaneIndex = () => get(stores.ui).activePane
  const paneAt = (index: number): Pane | undefined => get(stores.panes)[index]
  const activePane = () => paneAt(activePaneIndex())

  const updatePane = (index: number, fn: (pane: Pane) => Pane) => {
    stores.panes.update((panes) => panes.map((pane, i) => (i === index ? fn(pane) : pane)))
  }

  const selectedEntry = () => {
    const pane = activePane()
    if (!pane || pane.selected === null) return undefined
    return pane.entries[pane.selected]
  }

  const resolveInput = (input: string) => {
    const base = activePane()?.cwd ?? process.cwd()
    return path.resolve(base, expandHome(input.trim()))
  }

  const closeOverlay = () => {
    stores.ui.update((ui) => ({ ...ui, overlay: 'none', prompt: null, input: '' }))
  }

  return {
    stores,
    takeGeneration,
    log,
    notify,
    activePaneIndex,
    paneAt,
    activePane,
    updatePane,
    selectedEntry,
    resolveInput,
    closeOverlay,
  }
}

export type DispatchContext = ReturnType<typeof createDispatchContext>
