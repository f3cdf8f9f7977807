export type EntryKind = 'dir' | 'file' | 'symlink' | 'other'

export type ObjectInfo = {
  path: string
  name: string
  kind: EntryKind
  size?: number
  modified?: number
  items?: number
  extension?: string
  generation: number
}

export type ScanUpdate =
  | { type: 'entry'; info: ObjectInfo }
  | { type: 'completed'; count: number }
  | { type: 'error'; path: string; message: string }

export const isEnriched = (info: ObjectInfo) => info.size !== undefined && info.modified !== undefined
