import path from 'node:path'
import { resolveCacheConfig, type CacheConfig } from '@/features/config/config'
import { getLogger } from '@/shared/lib/log'
import type { ObjectInfo } from '../explorer/model/types'

type CacheEntry = {
  value: ObjectInfo
  insertedAt: number
  lastAccess: number
  bytes: number
}

// Map iteration order doubles as recency order: oldest access first.
type Shard = Map<string, CacheEntry>

export type CacheStats = {
  hits: number
  misses: number
  inserts: number
  evictions: number
  expirations: number
  entries: number
  approxBytes: number
  hitRate: number
}

type Counters = Pick<CacheStats, 'hits' | 'misses' | 'inserts' | 'evictions' | 'expirations'>

const ENTRY_OVERHEAD_BYTES = 96

export const canonicalKey = (target: string) => path.resolve(target).split(path.sep).join('/')

export const fnv1a32 = (key: string) => {
  let hash = 0x811c9dc5
  for (let i = 0; i < key.length; i += 1) {
    hash ^= key.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193) >>> 0
  }
  return hash >>> 0
}

export const estimateEntryBytes = (key: string, value: ObjectInfo) =>
  ENTRY_OVERHEAD_BYTES + 2 * (key.length + value.name.length + value.path.length)

export const createMetadataCache = (overrides: Partial<CacheConfig> = {}) => {
  const config = resolveCacheConfig(overrides)
  const shards: Shard[] = Array.from({ length: config.numShards }, () => new Map())
  const quota = Math.max(1, Math.ceil(config.maxCapacity / config.numShards))
  const memoryBudget = config.maxMemoryMb * 1024 * 1024
  const counters: Counters | null = config.enableStats
    ? { hits: 0, misses: 0, inserts: 0, evictions: 0, expirations: 0 }
    : null
  let approxBytes = 0

  const shardIndex = (key: string) => fnv1a32(key) % shards.length
  const isExpired = (entry: CacheEntry, now: number) =>
    now - entry.insertedAt >= config.ttlMs || now - entry.lastAccess >= config.ttiMs

  const drop = (shard: Shard, key: string, entry: CacheEntry) => {
    shard.delete(key)
    approxBytes -= entry.bytes
  }

  const expireShard = (shard: Shard, now: number) => {
    let removed = 0
    for (const [key, entry] of shard) {
      if (!isExpired(entry, now)) continue
      drop(shard, key, entry)
      removed += 1
    }
    if (counters) counters.expirations += removed
    return removed
  }

  const evictOldest = (shard: Shard) => {
    const oldest = shard.entries().next()
    if (oldest.done) return false
    const [key, entry] = oldest.value
    drop(shard, key, entry)
    if (counters) counters.evictions += 1
    return true
  }

  const evictGlobalOldest = () => {
    let victim: Shard | null = null
    let victimAccess = Infinity
    for (const shard of shards) {
      const head = shard.values().next()
      if (head.done) continue
      if (head.value.lastAccess < victimAccess) {
        victim = shard
        victimAccess = head.value.lastAccess
      }
    }
    return victim ? evictOldest(victim) : false
  }

  const get = (target: string): ObjectInfo | undefined => {
    const key = canonicalKey(target)
    const shard = shards[shardIndex(key)]
    const entry = shard.get(key)
    const now = Date.now()
    if (!entry) {
      if (counters) counters.misses += 1
      return undefined
    }
    if (isExpired(entry, now)) {
      drop(shard, key, entry)
      if (counters) {
        counters.expirations += 1
        counters.misses += 1
      }
      return undefined
    }
    entry.lastAccess = now
    shard.delete(key)
    shard.set(key, entry)
    if (counters) counters.hits += 1
    return entry.value
  }

  const insert = (target: string, value: ObjectInfo) => {
    const key = canonicalKey(target)
    const shard = shards[shardIndex(key)]
    const now = Date.now()
    const existing = shard.get(key)
    if (existing) drop(shard, key, existing)

    expireShard(shard, now)
    const bytes = estimateEntryBytes(key, value)
    shard.set(key, { value, insertedAt: now, lastAccess: now, bytes })
    approxBytes += bytes
    if (counters) counters.inserts += 1

    while (shard.size > quota) {
      if (!evictOldest(shard)) break
    }
    while (approxBytes > memoryBudget) {
      if (!evictGlobalOldest()) break
    }
  }

  const invalidate = (target: string) => {
    const key = canonicalKey(target)
    const shard = shards[shardIndex(key)]
    const entry = shard.get(key)
    if (!entry) return false
    drop(shard, key, entry)
    return true
  }

  const invalidatePrefix = (target: string) => {
    const prefix = canonicalKey(target)
    let removed = 0
    for (const shard of shards) {
      for (const [key, entry] of shard) {
        if (key !== prefix && !key.startsWith(`${prefix}/`)) continue
        drop(shard, key, entry)
        removed += 1
      }
    }
    return removed
  }

  const sweep = () => {
    const now = Date.now()
    const removed = shards.reduce((total, shard) => total + expireShard(shard, now), 0)
    if (removed > 0) getLogger('cache').debug({ removed }, 'swept expired metadata')
    return removed
  }

  const clear = () => {
    for (const shard of shards) shard.clear()
    approxBytes = 0
  }

  const size = () => shards.reduce((total, shard) => total + shard.size, 0)

  const stats = (): CacheStats | null => {
    if (!counters) return null
    const lookups = counters.hits + counters.misses
    return {
      ...counters,
      entries: size(),
      approxBytes,
      hitRate: lookups === 0 ? 0 : counters.hits / lookups,
    }
  }

  return {
    get,
    insert,
    invalidate,
    invalidatePrefix,
    sweep,
    clear,
    size,
    stats,
    shardSizes: () => shards.map((shard) => shard.size),
    shardFor: (target: string) => shardIndex(canonicalKey(target)),
    quota,
  }
}

export type MetadataCache = ReturnType<typeof createMetadataCache>
