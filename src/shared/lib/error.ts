export type NormalizedError = Error & {
  code?: string
  path?: string
  raw?: unknown
}

type ErrorLike = {
  code?: unknown
  message?: unknown
  path?: unknown
}

const asErrorLike = (value: unknown): ErrorLike | null => {
  if (!value || typeof value !== 'object') return null
  return {
    code: 'code' in value ? value.code : undefined,
    message: 'message' in value ? value.message : undefined,
    path: 'path' in value ? value.path : undefined,
  }
}

const describeValue = (value: unknown): string => {
  if (typeof value === 'string') return value
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

export const normalizeError = (value: unknown): NormalizedError => {
  const like = asErrorLike(value)
  const error: NormalizedError =
    value instanceof Error
      ? value
      : new Error(typeof like?.message === 'string' ? like.message : describeValue(value) || 'Unknown error')
  if (error.code === undefined && typeof like?.code === 'string') error.code = like.code
  if (error.path === undefined && typeof like?.path === 'string') error.path = like.path
  if (!(value instanceof Error)) error.raw = value
  return error
}

export const getErrorMessage = (value: unknown): string => normalizeError(value).message
export const getErrorCode = (value: unknown): string | undefined => normalizeError(value).code

export const isAbortError = (value: unknown): boolean => {
  if (value && typeof value === 'object' && 'name' in value && value.name === 'AbortError') return true
  return getErrorCode(value) === 'ABORT_ERR'
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class StartupError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StartupError'
  }
}
