import { describe, expect, it } from 'vitest'
import { followSelection, moveCaret } from './navigationController'

describe('moveCaret', () => {
  it('returns null for an empty listing', () => {
    expect(moveCaret({ count: 0, current: 3, delta: 1 })).toBeNull()
  })

  it('clamps movement to the listing bounds', () => {
    expect(moveCaret({ count: 5, current: 4, delta: 1 })).toBe(4)
    expect(moveCaret({ count: 5, current: 0, delta: -1 })).toBe(0)
    expect(moveCaret({ count: 5, current: 1, delta: 10 })).toBe(4)
    expect(moveCaret({ count: 5, current: null, delta: 2 })).toBe(2)
  })

  it('jumps to either end', () => {
    expect(moveCaret({ count: 5, current: 2, toStart: true })).toBe(0)
    expect(moveCaret({ count: 5, current: 2, toEnd: true })).toBe(4)
  })
})

describe('followSelection', () => {
  it('tracks the selected path after it moves', () => {
    expect(followSelection(['/a/docs', '/a/b.txt', '/a/c.txt'], '/a/c.txt', 1)).toBe(2)
  })

  it('falls back to the clamped index when the path is gone', () => {
    expect(followSelection(['/a/docs', '/a/b.txt'], '/a/z.txt', 5)).toBe(1)
    expect(followSelection([], '/a/z.txt', 0)).toBeNull()
  })
})
