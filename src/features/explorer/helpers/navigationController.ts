export type NavigateArgs = {
  count: number
  current: number | null
  delta?: number
  toStart?: boolean
  toEnd?: boolean
}

export const moveCaret = ({ count, current, delta = 0, toStart, toEnd }: NavigateArgs) => {
  if (count === 0) return null
  if (toStart) return 0
  if (toEnd) return count - 1
  const base = current ?? 0
  return Math.min(count - 1, Math.max(0, base + delta))
}

// Keeps the caret on the same path when the listing is re-sorted underneath it.
export const followSelection = (paths: string[], previous: string | null, fallback: number | null) => {
  if (previous !== null) {
    const index = paths.indexOf(previous)
    if (index >= 0) return index
  }
  return moveCaret({ count: paths.length, current: fallback })
}
