import readline, { type Key } from 'node:readline'
import type { InputEvent } from '@/features/controller/createEventMultiplexer'
import { getLogger } from '@/shared/lib/log'

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}

export type TerminalOutput = NodeJS.WritableStream & {
  isTTY?: boolean
  columns?: number
  rows?: number
}

type Deps = {
  input: TerminalInput
  output: TerminalOutput
  onInput: (event: InputEvent) => void
}

const ESC = '\u001b['
const ENTER_ALT_SCREEN = `${ESC}?1049h`
const LEAVE_ALT_SCREEN = `${ESC}?1049l`
const HIDE_CURSOR = `${ESC}?25l`
const SHOW_CURSOR = `${ESC}?25h`
const HOME_AND_CLEAR = `${ESC}H${ESC}2J`
const CLEAR_LINE = `${ESC}K`

export const DEFAULT_SIZE = { cols: 80, rows: 24 }

export const createTerminal = ({ input, output, onInput }: Deps) => {
  let attached = false

  const size = () => ({
    cols: output.columns ?? DEFAULT_SIZE.cols,
    rows: output.rows ?? DEFAULT_SIZE.rows,
  })

  const handleKeypress = (_sequence: string | undefined, key: Key | undefined) => {
    if (!key) return
    onInput({ type: 'key', key })
  }

  const handleResize = () => {
    onInput({ type: 'resize', ...size() })
  }

  const attach = () => {
    if (attached) return
    attached = true
    readline.emitKeypressEvents(input)
    if (input.isTTY) input.setRawMode?.(true)
    input.on('keypress', handleKeypress)
    output.on('resize', handleResize)
    input.resume()
    output.write(`${ENTER_ALT_SCREEN}${HIDE_CURSOR}`)
    getLogger('terminal').debug({ tty: Boolean(input.isTTY), ...size() }, 'terminal attached')
  }

  const draw = (lines: string[]) => {
    output.write(`${HOME_AND_CLEAR}${lines.join(`${CLEAR_LINE}\r\n`)}${CLEAR_LINE}`)
  }

  const restore = () => {
    if (!attached) return
    attached = false
    input.off('keypress', handleKeypress)
    output.off('resize', handleResize)
    if (input.isTTY) input.setRawMode?.(false)
    input.pause()
    output.write(`${SHOW_CURSOR}${LEAVE_ALT_SCREEN}`)
    getLogger('terminal').debug('terminal restored')
  }

  return {
    attach,
    draw,
    restore,
    size,
  }
}

export type Terminal = ReturnType<typeof createTerminal>
