import { describe, expect, it, vi } from 'vitest'
import { createTaskRegistry } from './createTaskRegistry'

type Deferred = {
  promise: Promise<void>
  resolve: () => void
}

const deferred = (): Deferred => {
  let resolve = () => {}
  const promise = new Promise<void>((done) => {
    resolve = () => done()
  })
  return { promise, resolve }
}

const untilAborted = (signal: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) return resolve()
    signal.addEventListener('abort', () => resolve(), { once: true })
  })

describe('createTaskRegistry', () => {
  it('registers tasks before they run and releases them when they finish', async () => {
    const onResult = vi.fn()
    const registry = createTaskRegistry<string>({ onResult })
    const gate = deferred()

    const handle = registry.spawn('scan', 'Scanning /data', async ({ emit }) => {
      await gate.promise
      emit('done')
    })

    expect(registry.isActive(handle)).toBe(true)
    expect(registry.list()).toEqual([{ id: 1, kind: 'scan', label: 'Scanning /data' }])

    gate.resolve()
    await registry.drain()

    expect(onResult).toHaveBeenCalledWith('done')
    expect(registry.isActive(handle)).toBe(false)
    expect(registry.activeCount()).toBe(0)
  })

  it('cancels one task and drops its late results', async () => {
    const onResult = vi.fn()
    const registry = createTaskRegistry<string>({ onResult })
    const signals: AbortSignal[] = []

    const handle = registry.spawn('copy', 'Copying', async (context) => {
      signals.push(context.signal)
      await untilAborted(context.signal)
      context.emit('late')
    })

    expect(registry.cancel(handle)).toBe(true)
    expect(registry.isActive(handle)).toBe(false)
    expect(registry.cancel(handle)).toBe(false)
    await registry.drain()

    expect(signals.map((signal) => signal.aborted)).toEqual([true])
    expect(onResult).not.toHaveBeenCalled()
  })

  it('cancels every in-flight task at once and is idempotent', async () => {
    const registry = createTaskRegistry<string>({ onResult: vi.fn() })
    const signals: AbortSignal[] = []

    for (let i = 0; i < 5; i += 1) {
      registry.spawn('scan', `scan ${i}`, async ({ signal }) => {
        signals.push(signal)
        await untilAborted(signal)
      })
    }

    expect(registry.activeCount()).toBe(5)
    expect(registry.cancelAll()).toBe(5)
    expect(registry.activeCount()).toBe(0)
    expect(registry.cancelAll()).toBe(0)
    await registry.drain()
    expect(signals.every((signal) => signal.aborted)).toBe(true)
  })

  it('cancels only the requested kind', async () => {
    const registry = createTaskRegistry<string>({ onResult: vi.fn() })
    const search = registry.spawn('search', 'find', async ({ signal }) => untilAborted(signal))
    const copy = registry.spawn('copy', 'copy', async ({ signal }) => untilAborted(signal))

    expect(registry.cancelKind('search')).toBe(1)
    expect(registry.isActive(search)).toBe(false)
    expect(registry.isActive(copy)).toBe(true)

    registry.cancelAll()
    await registry.drain()
  })

  it('releases a task whose work throws', async () => {
    const registry = createTaskRegistry<string>({ onResult: vi.fn() })
    const handle = registry.spawn('rename', 'Renaming', async () => {
      throw new Error('disk on fire')
    })

    await registry.drain()

    expect(registry.isActive(handle)).toBe(false)
  })

  it('hands out increasing ids', () => {
    const registry = createTaskRegistry<string>({ onResult: vi.fn() })
    const first = registry.spawn('enrich', 'a', async () => {})
    const second = registry.spawn('enrich', 'b', async () => {})

    expect(second.id).toBeGreaterThan(first.id)
  })
})
