import path from 'node:path'
import { get } from 'svelte/store'
import type { MetadataCache } from '@/features/cache/createMetadataCache'
import type { FileOpResult, FileOps } from '@/features/file-ops/fileOps'
import type { TaskContext, TaskKind, TaskRegistry } from '@/features/tasks/createTaskRegistry'
import { getErrorMessage, isAbortError } from '@/shared/lib/error'
import type { TaskResultAction } from '../actions'
import { applyProgress } from '../state/operations'
import type { DispatchContext } from './dispatchContext'

type Deps = {
  context: DispatchContext
  registry: TaskRegistry<TaskResultAction>
  fileOps: FileOps
  cache: MetadataCache
  loadPane: (index: number, dir: string, selectPath?: string | null) => void
}

export const createFileOpHandlers = ({ context, registry, fileOps, cache, loadPane }: Deps) => {
  const { stores, log, notify, activePane, resolveInput } = context

  const startOperation = (
    kind: TaskKind,
    label: string,
    doneLabel: string,
    work: (task: TaskContext<TaskResultAction>) => Promise<FileOpResult>,
  ) => {
    const handle = registry.spawn(kind, label, async (task) => {
      const { signal, emit, handle: own } = task
      try {
        const result = await work(task)
        const touched = result.source ? [result.source, result.target] : [result.target]
        emit({ type: 'fileOperationComplete', operationId: own.id, touched })
      } catch (err) {
        if (signal.aborted || isAbortError(err)) return
        emit({ type: 'fileOperationComplete', operationId: own.id, error: getErrorMessage(err), touched: [] })
      }
    })
    stores.operations.update((operations) => [
      ...operations,
      { id: handle.id, kind, label, doneLabel, detail: null, percent: null, handle },
    ])
  }

  const progressReporter =
    ({ emit, handle }: TaskContext<TaskResultAction>) =>
    (bytesProcessed: number, totalBytes: number) =>
      emit({ type: 'fileOperationProgress', operationId: handle.id, bytesProcessed, totalBytes })

  // Destinations are resolved against the active pane before the task starts.
  const copy = (source: string, destination: string) => {
    const target = resolveInput(destination)
    const name = path.basename(source)
    startOperation('copy', `Copying ${name}`, `Copied ${name}`, (task) =>
      fileOps.copy(source, target, { signal: task.signal, onProgress: progressReporter(task) }),
    )
  }

  const move = (source: string, destination: string) => {
    const target = resolveInput(destination)
    const name = path.basename(source)
    startOperation('move', `Moving ${name}`, `Moved ${name}`, (task) =>
      fileOps.move(source, target, { signal: task.signal, onProgress: progressReporter(task) }),
    )
  }

  const rename = (source: string, newName: string) => {
    startOperation('rename', `Renaming ${path.basename(source)}`, `Renamed to ${newName.trim()}`, () =>
      fileOps.rename(source, newName),
    )
  }

  const create = (kind: 'file' | 'directory', name: string) => {
    const dir = activePane()?.cwd
    if (!dir) return
    startOperation('create', `Creating ${name}`, `Created ${name.trim()}`, () =>
      kind === 'file' ? fileOps.createFile(dir, name) : fileOps.createDirectory(dir, name),
    )
  }

  const applyOperationProgress = (operationId: number, bytesProcessed: number, totalBytes: number) => {
    stores.operations.update((operations) =>
      operations.map((operation) =>
        operation.id === operationId ? applyProgress(operation, bytesProcessed, totalBytes) : operation,
      ),
    )
  }

  const refreshTouched = (touched: string[]) => {
    const dirs = new Set<string>()
    for (const target of touched) {
      cache.invalidatePrefix(target)
      cache.invalidate(path.dirname(target))
      dirs.add(path.dirname(target))
    }
    get(stores.panes).forEach((pane, index) => {
      const affected = touched.some((target) => pane.cwd === target || pane.cwd.startsWith(`${target}${path.sep}`))
      if (affected || dirs.has(pane.cwd)) loadPane(index, pane.cwd, pane.selectedPath)
    })
  }

  const completeOperation = (operationId: number, touched: string[], error?: string) => {
    const operation = get(stores.operations).find((item) => item.id === operationId)
    if (!operation) return
    stores.operations.update((operations) => operations.filter((item) => item.id !== operationId))
    if (error) {
      log().error({ operation: operation.label, message: error }, 'file operation failed')
      notify(`${operation.label} failed: ${error}`, 'error')
    } else {
      notify(operation.doneLabel, 'success')
    }
    if (touched.length > 0) refreshTouched(touched)
  }

  const cancelOperation = (operationId?: number) => {
    const operations = get(stores.operations)
    const operation =
      operationId === undefined ? operations[operations.length - 1] : operations.find((item) => item.id === operationId)
    if (!operation) {
      notify('No active operation', 'info')
      return
    }
    registry.cancel(operation.handle)
    stores.operations.update((items) => items.filter((item) => item.id !== operation.id))
    notify(`Cancelled ${operation.label}`, 'info')
  }

  return {
    copy,
    move,
    rename,
    create,
    applyOperationProgress,
    completeOperation,
    cancelOperation,
  }
}

export type FileOpHandlers = ReturnType<typeof createFileOpHandlers>
