import type { Key } from 'node:readline'
import { getLogger } from '@/shared/lib/log'
import { mapKey, type KeyContext } from '../shortcuts/keymap'
import type { Action, TaskResultAction } from './actions'

export type InputEvent = { type: 'key'; key: Key } | { type: 'resize'; cols: number; rows: number }

type Source = 'input' | 'task' | 'internal'

// Fixed service order inside a round.
const SOURCES: Source[] = ['input', 'task', 'internal']

type Deps = {
  keyContext: () => KeyContext
}

export const createEventMultiplexer = ({ keyContext }: Deps) => {
  const input: InputEvent[] = []
  const tasks: TaskResultAction[] = []
  const internal: Action[] = []
  let round: Source[] = []
  let wake: (() => void) | null = null
  let closed = false

  const sizeOf = (source: Source) => {
    switch (source) {
      case 'input':
        return input.length
      case 'task':
        return tasks.length
      case 'internal':
        return internal.length
    }
  }

  const notify = () => {
    const resolve = wake
    wake = null
    resolve?.()
  }

  // Input is translated when served so the key context reflects every earlier dispatch.
  const take = (source: Source): Action | undefined => {
    switch (source) {
      case 'input': {
        const event = input.shift()
        if (!event) return undefined
        if (event.type === 'resize') return { type: 'resize', cols: event.cols, rows: event.rows }
        return mapKey(keyContext(), event.key)
      }
      case 'task':
        return tasks.shift()
      case 'internal':
        return internal.shift()
    }
  }

  const next = async (): Promise<Action> => {
    for (;;) {
      if (closed) return { type: 'quit' }
      if (round.length === 0) round = SOURCES.filter((source) => sizeOf(source) > 0)
      const source = round.shift()
      if (source) {
        const action = take(source)
        if (action) {
          getLogger('multiplexer').trace({ source, action: action.type }, 'next action')
          return action
        }
        continue
      }
      await new Promise<void>((resolve) => {
        wake = resolve
      })
    }
  }

  const pushInput = (event: InputEvent) => {
    if (closed) return
    input.push(event)
    notify()
  }

  const pushTaskResult = (result: TaskResultAction) => {
    if (closed) return
    tasks.push(result)
    notify()
  }

  const enqueue = (action: Action) => {
    if (closed) return
    internal.push(action)
    notify()
  }

  const close = () => {
    closed = true
    notify()
  }

  return {
    next,
    pushInput,
    pushTaskResult,
    enqueue,
    close,
    pending: () => input.length + tasks.length + internal.length,
  }
}

export type EventMultiplexer = ReturnType<typeof createEventMultiplexer>
