import type { ObjectInfo } from '../model/types'

const rank = (entry: ObjectInfo) => (entry.kind === 'dir' ? 0 : 1)

export const compareEntries = (a: ObjectInfo, b: ObjectInfo): number => {
  const byKind = rank(a) - rank(b)
  if (byKind !== 0) return byKind
  if (a.name < b.name) return -1
  if (a.name > b.name) return 1
  return 0
}

export const sortEntries = (list: ObjectInfo[]): ObjectInfo[] => [...list].sort(compareEntries)

const sortedIndex = (list: ObjectInfo[], entry: ObjectInfo) => {
  let low = 0
  let high = list.length
  while (low < high) {
    const mid = (low + high) >>> 1
    if (compareEntries(list[mid], entry) <= 0) {
      low = mid + 1
    } else {
      high = mid
    }
  }
  return low
}

export const insertSorted = (list: ObjectInfo[], entry: ObjectInfo): ObjectInfo[] => {
  const base = list.some((item) => item.path === entry.path) ? removeEntryByPath(list, entry.path) : list
  const index = sortedIndex(base, entry)
  return [...base.slice(0, index), entry, ...base.slice(index)]
}

export const removeEntryByPath = (list: ObjectInfo[], path: string): ObjectInfo[] =>
  list.filter((entry) => entry.path !== path)

export const patchEntry = (list: ObjectInfo[], info: ObjectInfo): ObjectInfo[] =>
  list.map((entry) => (entry.path === info.path ? { ...entry, ...info } : entry))
