import { getErrorMessage, isAbortError } from '@/shared/lib/error'
import { getLogger } from '@/shared/lib/log'

export type TaskKind = 'scan' | 'enrich' | 'search' | 'copy' | 'move' | 'rename' | 'create'

export type TaskHandle = {
  readonly id: number
  readonly kind: TaskKind
  readonly label: string
}

export type TaskContext<R> = {
  handle: TaskHandle
  signal: AbortSignal
  emit: (result: R) => void
}

export type TaskWork<R> = (context: TaskContext<R>) => Promise<void>

type Deps<R> = {
  onResult: (result: R) => void
}

type RunningTask = {
  handle: TaskHandle
  controller: AbortController
}

export const createTaskRegistry = <R>({ onResult }: Deps<R>) => {
  const tasks = new Map<number, RunningTask>()
  const inFlight = new Set<Promise<void>>()
  let nextId = 1

  const log = () => getLogger('tasks')

  const abort = (task: RunningTask) => {
    task.controller.abort()
    tasks.delete(task.handle.id)
  }

  const run = async (task: RunningTask, work: TaskWork<R>) => {
    const { handle, controller } = task
    const emit = (result: R) => {
      if (controller.signal.aborted || !tasks.has(handle.id)) return
      onResult(result)
    }
    try {
      await work({ handle, signal: controller.signal, emit })
    } catch (err) {
      if (controller.signal.aborted || isAbortError(err)) {
        log().debug({ task: handle.id, kind: handle.kind }, 'task stopped after cancellation')
      } else {
        log().error({ task: handle.id, kind: handle.kind, message: getErrorMessage(err) }, 'task failed')
      }
    } finally {
      tasks.delete(handle.id)
    }
  }

  const spawn = (kind: TaskKind, label: string, work: TaskWork<R>): TaskHandle => {
    const handle: TaskHandle = { id: nextId, kind, label }
    nextId += 1
    const task = { handle, controller: new AbortController() }
    tasks.set(handle.id, task)
    log().debug({ task: handle.id, kind, label }, 'task spawned')

    const settled: Promise<void> = run(task, work).then(() => {
      inFlight.delete(settled)
    })
    inFlight.add(settled)
    return handle
  }

  const cancel = (handle: TaskHandle) => {
    const task = tasks.get(handle.id)
    if (!task) return false
    abort(task)
    log().debug({ task: handle.id, kind: handle.kind }, 'task cancelled')
    return true
  }

  const cancelKind = (kind: TaskKind) => {
    let cancelled = 0
    for (const task of [...tasks.values()]) {
      if (task.handle.kind !== kind) continue
      abort(task)
      cancelled += 1
    }
    return cancelled
  }

  const cancelAll = () => {
    const cancelled = tasks.size
    for (const task of [...tasks.values()]) abort(task)
    if (cancelled > 0) log().info({ cancelled }, 'cancelled all tasks')
    return cancelled
  }

  const drain = async () => {
    while (inFlight.size > 0) {
      await Promise.all([...inFlight])
    }
  }

  return {
    spawn,
    cancel,
    cancelKind,
    cancelAll,
    drain,
    isActive: (handle: TaskHandle) => tasks.has(handle.id),
    activeCount: () => tasks.size,
    list: () => [...tasks.values()].map((task) => task.handle),
  }
}

export type TaskRegistry<R> = ReturnType<typeof createTaskRegistry<R>>
