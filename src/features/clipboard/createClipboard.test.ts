import { get } from 'svelte/store'
import { describe, expect, it } from 'vitest'
import type { ObjectInfo } from '@/features/explorer/model/types'
import { createClipboard } from './createClipboard'

const entry = (name: string, kind: ObjectInfo['kind'] = 'file'): ObjectInfo => ({
  path: `/data/${name}`,
  name,
  kind,
  generation: 1,
})

describe('createClipboard', () => {
  it('collects copied and cut entries in order', () => {
    const clipboard = createClipboard()

    expect(clipboard.copy(entry('a.txt'))).toEqual({ ok: true, message: 'Copied a.txt to clipboard' })
    expect(clipboard.cut(entry('docs', 'dir'))).toEqual({ ok: true, message: 'Cut docs to clipboard' })

    expect(get(clipboard).items).toEqual([
      { path: '/data/a.txt', name: 'a.txt', kind: 'file', mode: 'copy' },
      { path: '/data/docs', name: 'docs', kind: 'dir', mode: 'cut' },
    ])
  })

  it('rejects a missing selection and exact duplicates', () => {
    const clipboard = createClipboard()
    clipboard.copy(entry('a.txt'))

    expect(clipboard.copy(undefined)).toEqual({ ok: false, error: 'Nothing selected' })
    expect(clipboard.copy(entry('a.txt'))).toEqual({ ok: false, error: 'a.txt is already on the clipboard' })
    expect(get(clipboard).items).toHaveLength(1)
  })

  it('switches the mode when an entry is marked again the other way', () => {
    const clipboard = createClipboard()
    clipboard.copy(entry('a.txt'))
    clipboard.copy(entry('b.txt'))

    clipboard.cut(entry('a.txt'))

    expect(get(clipboard).items.map((item) => [item.name, item.mode])).toEqual([
      ['b.txt', 'copy'],
      ['a.txt', 'cut'],
    ])
  })

  it('drops the oldest items past the limit', () => {
    const clipboard = createClipboard({ maxItems: 2 })

    clipboard.copy(entry('one'))
    clipboard.copy(entry('two'))
    clipboard.copy(entry('three'))

    expect(get(clipboard).items.map((item) => item.name)).toEqual(['two', 'three'])
  })

  it('hands out every item or only the chosen one for pasting', () => {
    const clipboard = createClipboard()
    expect(clipboard.take()).toEqual({ ok: false, error: 'Clipboard is empty' })
    clipboard.copy(entry('a.txt'))
    clipboard.cut(entry('b.txt'))

    const all = clipboard.take()
    const second = clipboard.take(1)

    expect(all.ok && all.items.map((item) => item.name)).toEqual(['a.txt', 'b.txt'])
    expect(second.ok && second.items.map((item) => item.name)).toEqual(['b.txt'])
    expect(clipboard.take(5)).toEqual({ ok: false, error: 'Nothing selected' })
  })

  it('forgets cut items once pasted and keeps copied ones', () => {
    const clipboard = createClipboard()
    clipboard.copy(entry('a.txt'))
    clipboard.cut(entry('b.txt'))
    const taken = clipboard.take()

    if (taken.ok) clipboard.settle(taken.items)

    expect(get(clipboard).items.map((item) => item.name)).toEqual(['a.txt'])
  })

  it('removes the chosen item and keeps the caret in range', () => {
    const clipboard = createClipboard()
    clipboard.copy(entry('a.txt'))
    clipboard.copy(entry('b.txt'))
    clipboard.moveSelection(1)
    expect(get(clipboard).selected).toBe(1)

    expect(clipboard.remove(1)).toEqual({ ok: true, message: 'Removed b.txt from clipboard' })

    expect(get(clipboard)).toEqual({
      items: [{ path: '/data/a.txt', name: 'a.txt', kind: 'file', mode: 'copy' }],
      selected: 0,
    })
    expect(clipboard.remove(4)).toEqual({ ok: false, error: 'Nothing selected' })
  })

  it('clears everything and reports when there was nothing to clear', () => {
    const clipboard = createClipboard()
    clipboard.copy(entry('a.txt'))
    clipboard.cut(entry('b.txt'))

    expect(clipboard.clear()).toEqual({ ok: true, message: 'Cleared 2 items from clipboard' })
    expect(clipboard.clear()).toEqual({ ok: false, error: 'Clipboard was already empty' })
    expect(clipboard.remove(0)).toEqual({ ok: false, error: 'Clipboard is empty' })
  })
})
