import pino, { stdTimeFunctions, type Logger } from 'pino'

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

type InitOptions = {
  level: LogLevel
  file: string
}

// The terminal belongs to the renderer, so logs only ever go to a file.
let root: Logger = pino({ level: 'silent' })
const children = new Map<string, Logger>()

export const initLogger = ({ level, file }: InitOptions): Logger => {
  children.clear()
  if (level === 'silent') {
    root = pino({ level })
    return root
  }
  root = pino(
    {
      level,
      base: undefined,
      timestamp: stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: file, mkdir: true, sync: false }),
  )
  return root
}

export const getLogger = (service: string): Logger => {
  let child = children.get(service)
  if (!child) {
    child = root.child({ service })
    children.set(service, child)
  }
  return child
}

export const flushLogger = () => {
  root.flush()
}
