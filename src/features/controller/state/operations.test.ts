import { describe, expect, it } from 'vitest'
import { applyProgress, formatByteProgress, formatSize, progressPercent, type OperationState } from './operations'

const copying: OperationState = {
  id: 4,
  kind: 'copy',
  label: 'Copying photos',
  doneLabel: 'Copied photos',
  detail: null,
  percent: null,
  handle: { id: 4, kind: 'copy', label: 'Copying photos' },
}

describe('operation progress', () => {
  it('formats byte progress with adaptive precision', () => {
    expect(formatSize(512)).toBe('512 B')
    expect(formatSize(1536)).toBe('1.50 KB')
    expect(formatSize(15 * 1024 * 1024)).toBe('15.0 MB')
    expect(formatByteProgress(1536, 4096)).toBe('1.50 KB / 4.00 KB')
  })

  it('never shows zero percent once bytes have moved', () => {
    expect(progressPercent(1, 10_000)).toBe(1)
    expect(progressPercent(0, 10_000)).toBe(0)
    expect(progressPercent(5, 0)).toBeNull()
    expect(progressPercent(20, 10)).toBe(100)
  })

  it('updates percent and detail together', () => {
    expect(applyProgress(copying, 1536, 4096)).toEqual({ ...copying, percent: 38, detail: '1.50 KB / 4.00 KB' })
  })
})
