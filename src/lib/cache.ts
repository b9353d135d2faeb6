import Logger from '@/lib/logger'
import type { ResolvedStream } from '@/types'

import { Locker } from './locker'

const logger = Logger.get('cache')

export type StreamResolver = (videoId: string) => Promise<ResolvedStream>

export interface StreamCacheOptions {
  ttlMs: number
  now?: () => number
}

/**
 * In-memory map of video id to resolved stream. Freshness is decided at
 * lookup time from `resolvedAt`; `sweep` only reclaims memory.
 */
export class StreamCache {
  private entries = new Map<string, ResolvedStream>()
  private locker = new Locker<ResolvedStream>()
  private ttlMs: number
  private now: () => number

  constructor({ ttlMs, now = Date.now }: StreamCacheOptions) {
    this.ttlMs = ttlMs
    this.now = now
  }

  private isFresh(record: ResolvedStream) {
    return this.now() - record.resolvedAt < this.ttlMs
  }

  /** Fresh record and its age in seconds, or `[null, 0]` */
  get(videoId: string): [ResolvedStream | null, number] {
    const record = this.entries.get(videoId)
    if (!record || !this.isFresh(record)) return [null, 0]
    return [record, Math.floor((this.now() - record.resolvedAt) / 1000)]
  }

  peek(videoId: string): ResolvedStream | null {
    return this.get(videoId)[0]
  }

  async getOrResolve(
    videoId: string,
    resolver: StreamResolver,
  ): Promise<ResolvedStream> {
    const [cached, age] = this.get(videoId)
    if (cached) {
      logger.debug(`[HIT] ${videoId}, age:${age}s`)
      return cached
    }

    if (this.locker.isLocked(videoId)) {
      logger.debug(`[WAIT] ${videoId}`)
    }
    return this.locker.run(videoId, async () => {
      const start = this.now()
      const record = await resolver(videoId)
      this.entries.set(videoId, record)
      logger.info(`[MISS] ${videoId}, resolved in ${this.now() - start}ms`)
      return record
    })
  }

  sweep(): number {
    let removed = 0
    for (const [videoId, record] of this.entries) {
      if (!this.isFresh(record)) {
        this.entries.delete(videoId)
        removed++
      }
    }
    return removed
  }

  get size() {
    return this.entries.size
  }
}
