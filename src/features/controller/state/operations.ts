import type { TaskHandle, TaskKind } from '@/features/tasks/createTaskRegistry'

export type OperationState = {
  id: number
  kind: TaskKind
  label: string
  doneLabel: string
  detail: string | null
  percent: number | null
  handle: TaskHandle
}

export const formatSize = (value: number) => {
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  let size = value
  let unitIndex = 0
  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024
    unitIndex += 1
  }
  const precision = unitIndex === 0 ? 0 : size >= 100 ? 0 : size >= 10 ? 1 : 2
  return `${size.toFixed(precision)} ${units[unitIndex]}`
}

export const formatByteProgress = (bytes: number, total: number) => `${formatSize(bytes)} / ${formatSize(total)}`

export const progressPercent = (bytes: number, total: number) => {
  if (total <= 0) return null
  const pct = Math.min(100, Math.round((bytes / total) * 100))
  return pct === 0 && bytes > 0 ? 1 : pct
}

export const applyProgress = (operation: OperationState, bytes: number, total: number): OperationState => ({
  ...operation,
  percent: progressPercent(bytes, total),
  detail: total > 0 ? formatByteProgress(bytes, total) : null,
})
