import { constants } from 'node:fs'
import { access, stat } from 'node:fs/promises'
import path from 'node:path'
import { get } from 'svelte/store'
import { createMetadataCache } from '@/features/cache/createMetadataCache'
import { defaultLogFile, loadConfig, type EnvSource } from '@/features/config/config'
import type { TaskResultAction } from '@/features/controller/actions'
import { createActionDispatcher } from '@/features/controller/createActionDispatcher'
import { createEventMultiplexer } from '@/features/controller/createEventMultiplexer'
import { expandHome } from '@/features/controller/handlers/dispatchContext'
import { createPerformanceMonitor } from '@/features/controller/performanceMonitor'
import { createAppStores } from '@/features/controller/state/createAppStores'
import { createDirectoryScanner } from '@/features/explorer/scanner/createDirectoryScanner'
import { createFileOps } from '@/features/file-ops/fileOps'
import { createSearch } from '@/features/search/createSearch'
import { createTaskRegistry } from '@/features/tasks/createTaskRegistry'
import { createTerminal, type TerminalInput, type TerminalOutput } from '@/features/terminal/createTerminal'
import { renderFrame } from '@/features/terminal/renderFrame'
import { getErrorMessage, StartupError } from '@/shared/lib/error'
import { flushLogger, getLogger, initLogger } from '@/shared/lib/log'

type RunOptions = {
  env?: EnvSource
  startDir?: string
  input?: TerminalInput
  output?: TerminalOutput
}

const PANE_COUNT = 2

export const resolveStartDir = async (dir: string) => {
  const target = path.resolve(expandHome(dir))
  let isDirectory: boolean
  try {
    isDirectory = (await stat(target)).isDirectory()
    await access(target, constants.R_OK | constants.X_OK)
  } catch (err) {
    throw new StartupError(`Cannot open ${target}: ${getErrorMessage(err)}`)
  }
  if (!isDirectory) throw new StartupError(`${target} is not a directory`)
  return target
}

export const runApp = async ({
  env = process.env,
  startDir,
  input = process.stdin,
  output = process.stdout,
}: RunOptions = {}): Promise<number> => {
  const config = await loadConfig({ env, startDir })
  initLogger({ level: config.logLevel, file: config.logFile ?? defaultLogFile(env) })
  const log = getLogger('app')
  const root = await resolveStartDir(config.startDir ?? process.cwd())

  const cache = createMetadataCache(config.cache)
  const registry = createTaskRegistry<TaskResultAction>({
    onResult: (result) => mux.pushTaskResult(result),
  })
  const terminal = createTerminal({
    input,
    output,
    onInput: (event) => mux.pushInput(event),
  })
  const stores = createAppStores({
    directories: Array.from({ length: PANE_COUNT }, () => root),
    showHidden: config.showHidden,
    viewport: terminal.size(),
    clipboardMaxItems: config.clipboardMaxItems,
  })
  const mux = createEventMultiplexer({
    keyContext: () => get(stores.ui),
  })
  const dispatcher = createActionDispatcher({
    stores,
    registry,
    cache,
    scanner: createDirectoryScanner({ cache }),
    fileOps: createFileOps(),
    search: createSearch(),
    enqueue: mux.enqueue,
  })
  const perf = createPerformanceMonitor({ slowActionMs: config.slowActionMs })
  const dispatch = perf.wrap(dispatcher.dispatch)

  const cleanupFns: Array<() => void> = []
  const registerCleanup = (fn: () => void) => {
    cleanupFns.push(fn)
  }

  const requestQuit = () => mux.enqueue({ type: 'quit' })
  process.on('SIGTERM', requestQuit)
  process.on('SIGINT', requestQuit)
  registerCleanup(() => {
    process.off('SIGTERM', requestQuit)
    process.off('SIGINT', requestQuit)
  })

  const tickTimer = setInterval(() => mux.enqueue({ type: 'tick' }), config.tickMs)
  registerCleanup(() => clearInterval(tickTimer))
  if (config.cache.sweepMs > 0) {
    const sweepTimer = setInterval(() => cache.sweep(), config.cache.sweepMs)
    registerCleanup(() => clearInterval(sweepTimer))
  }

  terminal.attach()
  registerCleanup(() => terminal.restore())
  log.info({ root, panes: PANE_COUNT, cache: config.cache }, 'started')

  const render = () => terminal.draw(renderFrame(stores.snapshot()))

  try {
    for (let i = 0; i < PANE_COUNT; i += 1) dispatcher.loadPane(i, root)
    render()
    for (;;) {
      const action = await mux.next()
      if (dispatch(action) === 'terminate') break
      render()
    }
  } finally {
    mux.close()
    registry.cancelAll()
    for (const fn of cleanupFns.splice(0).reverse()) fn()
    await registry.drain()
    log.info({ actions: perf.stats(), cache: cache.stats() }, 'stopped')
    flushLogger()
  }
  return 0
}
