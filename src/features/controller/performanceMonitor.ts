import { performance } from 'node:perf_hooks'
import { getLogger } from '@/shared/lib/log'
import type { Action, ActionType } from './actions'

export type ActionTiming = {
  count: number
  totalMs: number
  maxMs: number
  slow: number
}

type Deps = {
  slowActionMs: number
  now?: () => number
}

export const createPerformanceMonitor = ({ slowActionMs, now = () => performance.now() }: Deps) => {
  const timings = new Map<ActionType, ActionTiming>()

  const record = (type: ActionType, elapsed: number) => {
    const timing = timings.get(type) ?? { count: 0, totalMs: 0, maxMs: 0, slow: 0 }
    timing.count += 1
    timing.totalMs += elapsed
    timing.maxMs = Math.max(timing.maxMs, elapsed)
    if (elapsed > slowActionMs) {
      timing.slow += 1
      getLogger('perf').warn({ action: type, elapsedMs: Math.round(elapsed * 10) / 10 }, 'slow action')
    }
    timings.set(type, timing)
  }

  const wrap =
    <R>(dispatch: (action: Action) => R) =>
    (action: Action): R => {
      const started = now()
      try {
        return dispatch(action)
      } finally {
        record(action.type, now() - started)
      }
    }

  const stats = () => Object.fromEntries([...timings].map(([type, timing]) => [type, { ...timing }]))

  return {
    wrap,
    stats,
    reset: () => timings.clear(),
  }
}
