import type { AppView, Pane } from '@/features/controller/state/createAppStores'
import { formatSize } from '@/features/controller/state/operations'
import type { ObjectInfo } from '@/features/explorer/model/types'
import { NAVIGATION_BINDINGS } from '@/features/shortcuts/keymap'

// Header, status, operations and input lines.
export const FRAME_CHROME_ROWS = 4

const SEPARATOR = '│'

export const fit = (text: string, width: number) => {
  if (width <= 0) return ''
  if (text.length > width) return width === 1 ? '…' : `${text.slice(0, width - 1)}…`
  return text.padEnd(width)
}

export const formatItems = (count?: number) => {
  if (count === undefined) return ''
  const suffix = count === 1 ? 'item' : 'items'
  return `${count} ${suffix}`
}

const entryLabel = (entry: ObjectInfo) => {
  switch (entry.kind) {
    case 'dir':
      return `${entry.name}/`
    case 'symlink':
      return `${entry.name}@`
    default:
      return entry.name
  }
}

const entryDetail = (entry: ObjectInfo) => {
  if (entry.kind === 'dir') return formatItems(entry.items)
  return entry.size === undefined ? '' : formatSize(entry.size)
}

export const formatEntryRow = (entry: ObjectInfo, width: number, caret: boolean) => {
  const detail = entryDetail(entry)
  const prefix = caret ? '> ' : '  '
  const nameWidth = Math.max(0, width - prefix.length - (detail ? detail.length + 1 : 0))
  const row = detail ? `${prefix}${fit(entryLabel(entry), nameWidth)} ${detail}` : `${prefix}${entryLabel(entry)}`
  return fit(row, width)
}

// First visible index keeping the caret on screen.
export const scrollOffset = (selected: number | null, rows: number) => {
  if (selected === null || selected < rows) return 0
  return selected - rows + 1
}

const paneColumn = (pane: Pane, active: boolean, width: number, rows: number) => {
  const offset = scrollOffset(pane.selected, rows)
  const lines: string[] = []
  for (let row = 0; row < rows; row += 1) {
    const index = offset + row
    const entry = pane.entries[index]
    if (entry) {
      lines.push(formatEntryRow(entry, width, active && pane.selected === index))
    } else if (row === 0 && !pane.loading) {
      lines.push(fit('  (empty)', width))
    } else {
      lines.push(fit('', width))
    }
  }
  return lines
}

const helpLines = (width: number, rows: number) =>
  NAVIGATION_BINDINGS.slice(0, rows).map(({ label, accelerators }) => fit(`${label.padEnd(24)}${accelerators.join(', ')}`, width))

const resultLines = (view: AppView, width: number, rows: number) => {
  const { search } = view
  const labels =
    search.kind === 'content'
      ? search.matches.map((match) => `${match.path}:${match.line}: ${match.text}`)
      : search.results.map((result) => result.path)
  const title = `${search.kind === 'content' ? 'Matches' : 'Results'} for "${search.query}" (${labels.length}${search.running ? ', searching…' : ''})`
  const listRows = Math.max(0, rows - 1)
  const offset = scrollOffset(labels.length > 0 ? search.selected : null, listRows)
  const lines = [fit(title, width)]
  for (let row = 0; row < listRows; row += 1) {
    const index = offset + row
    const label = labels[index]
    lines.push(fit(label === undefined ? '' : `${index === search.selected ? '> ' : '  '}${label}`, width))
  }
  return lines
}

const clipboardLines = (view: AppView, width: number, rows: number) => {
  const { items, selected } = view.clipboard
  const listRows = Math.max(0, rows - 1)
  const offset = scrollOffset(items.length > 0 ? selected : null, listRows)
  const lines = [fit(`Clipboard (${items.length})`, width)]
  for (let row = 0; row < listRows; row += 1) {
    const index = offset + row
    const item = items[index]
    if (item) {
      lines.push(fit(`${index === selected ? '> ' : '  '}${item.mode === 'cut' ? 'cut ' : 'copy'} ${item.path}`, width))
    } else {
      lines.push(fit(row === 0 ? '  (empty)' : '', width))
    }
  }
  return lines
}

const statusLine = (view: AppView) => {
  const pane = view.panes[view.ui.activePane]
  if (!pane) return ''
  const flags = [
    formatItems(pane.entries.length),
    view.ui.showHidden ? 'hidden shown' : null,
    pane.loading ? 'loading…' : null,
    view.ui.overlay !== 'none' ? view.ui.overlay : null,
  ].filter((flag): flag is string => flag !== null)
  return `${pane.cwd}  [${flags.join(', ')}]`
}

const operationsLine = (view: AppView) =>
  view.operations
    .map((operation) => {
      const percent = operation.percent === null ? '' : ` ${operation.percent}%`
      const detail = operation.detail ? ` (${operation.detail})` : ''
      return `${operation.label}${percent}${detail}`
    })
    .join(' | ')

const inputLine = (view: AppView) => {
  const { ui, notification } = view
  if (ui.mode === 'command') return `:${ui.input}`
  switch (ui.overlay) {
    case 'prompt':
      return `${ui.prompt?.label ?? 'Input'}: ${ui.input}`
    case 'fileNameSearch':
      return `Find name: ${ui.input}`
    case 'contentSearch':
      return `Find text: ${ui.input}`
    default:
      break
  }
  if (!notification) return ''
  return notification.level === 'info' ? notification.message : `${notification.level}: ${notification.message}`
}

export const renderFrame = (view: AppView): string[] => {
  const { cols, rows } = view.ui.viewport
  const bodyRows = Math.max(1, rows - FRAME_CHROME_ROWS)
  const count = Math.max(1, view.panes.length)
  const paneWidth = Math.max(1, Math.floor((cols - (count - 1)) / count))

  const header = view.panes
    .map((pane, index) => fit(`${index === view.ui.activePane ? '*' : ' '} ${pane.cwd}`, paneWidth))
    .join(SEPARATOR)

  let body: string[]
  if (view.ui.overlay === 'help') {
    body = helpLines(cols, bodyRows)
  } else if (view.ui.overlay === 'searchResults') {
    body = resultLines(view, cols, bodyRows)
  } else if (view.ui.overlay === 'clipboard') {
    body = clipboardLines(view, cols, bodyRows)
  } else {
    const columns = view.panes.map((pane, index) => paneColumn(pane, index === view.ui.activePane, paneWidth, bodyRows))
    body = Array.from({ length: bodyRows }, (_, row) => columns.map((column) => column[row] ?? '').join(SEPARATOR))
  }
  while (body.length < bodyRows) body.push('')

  return [header, ...body, statusLine(view), operationsLine(view), inputLine(view)].map((line) => fit(line, cols).trimEnd())
}
