import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { ObjectInfo } from '../explorer/model/types'
import { canonicalKey, createMetadataCache, estimateEntryBytes, fnv1a32 } from './createMetadataCache'

const START = new Date('2026-03-01T08:00:00Z').getTime()

const info = (target: string): ObjectInfo => ({
  path: target,
  name: target.split('/').pop() ?? target,
  kind: 'file',
  size: 1,
  modified: 0,
  generation: 1,
})

const at = (offsetMs: number) => vi.setSystemTime(START + offsetMs)

describe('createMetadataCache', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    at(0)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('evicts the least recently used entry of a full shard', () => {
    const cache = createMetadataCache({ maxCapacity: 2, numShards: 1 })

    cache.insert('/k1', info('/k1'))
    at(1)
    cache.insert('/k2', info('/k2'))
    at(2)
    expect(cache.get('/k1')?.path).toBe('/k1')
    at(3)
    cache.insert('/k3', info('/k3'))

    expect(cache.get('/k2')).toBeUndefined()
    expect(cache.get('/k1')?.path).toBe('/k1')
    expect(cache.get('/k3')?.path).toBe('/k3')
    expect(cache.stats()?.evictions).toBe(1)
  })

  it('expires entries after their time to live', () => {
    const cache = createMetadataCache({ ttlMs: 1000, ttiMs: 60_000 })
    cache.insert('/data/a', info('/data/a'))

    at(500)
    expect(cache.get('/data/a')).toBeDefined()
    at(1000)
    expect(cache.get('/data/a')).toBeUndefined()
    at(1500)
    expect(cache.get('/data/a')).toBeUndefined()
    expect(cache.size()).toBe(0)
  })

  it('expires idle entries even while their time to live holds', () => {
    const cache = createMetadataCache({ ttlMs: 60_000, ttiMs: 1000 })
    cache.insert('/data/a', info('/data/a'))

    at(900)
    expect(cache.get('/data/a')).toBeDefined()
    at(1800)
    expect(cache.get('/data/a')).toBeDefined()
    at(2800)
    expect(cache.get('/data/a')).toBeUndefined()
    expect(cache.stats()).toMatchObject({ hits: 2, misses: 1, expirations: 1 })
  })

  it('never leaves a shard above its quota', () => {
    const cache = createMetadataCache({ maxCapacity: 8, numShards: 4 })
    expect(cache.quota).toBe(2)

    for (let i = 0; i < 50; i += 1) {
      at(i)
      cache.insert(`/data/file-${i}`, info(`/data/file-${i}`))
      expect(Math.max(...cache.shardSizes())).toBeLessThanOrEqual(2)
    }
    expect(cache.size()).toBeLessThanOrEqual(8)
  })

  it('evicts the globally oldest entries when over the memory budget', () => {
    // '/kN' keys cost 96 + 2 * (3 + 2 + 3) = 112 bytes each, so four fit under 524 bytes.
    const cache = createMetadataCache({ maxCapacity: 100, numShards: 8, maxMemoryMb: 524 / (1024 * 1024) })
    expect(estimateEntryBytes('/k1', info('/k1'))).toBe(112)

    for (let i = 1; i <= 4; i += 1) {
      at(i)
      cache.insert(`/k${i}`, info(`/k${i}`))
    }
    at(5)
    cache.get('/k1')
    at(6)
    cache.insert('/k5', info('/k5'))

    expect(cache.size()).toBe(4)
    expect(cache.get('/k2')).toBeUndefined()
    expect(cache.get('/k1')).toBeDefined()
    expect(cache.stats()?.approxBytes).toBe(448)
  })

  it('replaces an existing entry without double counting its bytes', () => {
    const cache = createMetadataCache()
    cache.insert('/k1', info('/k1'))
    cache.insert('/k1', { ...info('/k1'), size: 99 })

    expect(cache.size()).toBe(1)
    expect(cache.get('/k1')?.size).toBe(99)
    expect(cache.stats()).toMatchObject({ inserts: 2, entries: 1, approxBytes: 112 })
  })

  it('canonicalizes keys so equivalent paths share an entry', () => {
    const cache = createMetadataCache()
    cache.insert('/data/./sub/../a', info('/data/a'))

    expect(canonicalKey('/data/./sub/../a')).toBe('/data/a')
    expect(cache.get('/data/a')?.name).toBe('a')
    expect(cache.invalidate('/data//a')).toBe(true)
    expect(cache.get('/data/a')).toBeUndefined()
  })

  it('invalidates a whole subtree', () => {
    const cache = createMetadataCache()
    for (const target of ['/data', '/data/a', '/data/a/b', '/database']) {
      cache.insert(target, info(target))
    }

    expect(cache.invalidatePrefix('/data')).toBe(3)
    expect(cache.get('/database')).toBeDefined()
  })

  it('sweeps expired entries in every shard', () => {
    const cache = createMetadataCache({ ttlMs: 1000, numShards: 4 })
    for (let i = 0; i < 10; i += 1) cache.insert(`/old/${i}`, info(`/old/${i}`))
    at(999)
    expect(cache.sweep()).toBe(0)
    at(1000)

    expect(cache.sweep()).toBe(10)
    expect(cache.size()).toBe(0)
    expect(cache.stats()).toMatchObject({ expirations: 10, approxBytes: 0 })
  })

  it('returns no stats and counts nothing when stats are disabled', () => {
    const cache = createMetadataCache({ enableStats: false })
    cache.insert('/k1', info('/k1'))
    cache.get('/k1')
    cache.get('/missing')

    expect(cache.stats()).toBeNull()
  })

  it('reports the hit rate', () => {
    const cache = createMetadataCache()
    cache.insert('/k1', info('/k1'))
    cache.get('/k1')
    cache.get('/k1')
    cache.get('/k1')
    cache.get('/nope')

    expect(cache.stats()?.hitRate).toBe(0.75)
  })

  it('routes keys to shards by hash', () => {
    const cache = createMetadataCache({ numShards: 16 })
    expect(fnv1a32('')).toBe(0x811c9dc5)
    expect(fnv1a32('a')).toBe(0xe40c292c)
    expect(cache.shardFor('/k1')).toBe(fnv1a32('/k1') % 16)
  })
})
