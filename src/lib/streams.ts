import type { Readable } from 'stream'

import { defaultContentType, forwardedHeaders } from '@/consts'
import Logger from '@/lib/logger'
import type {
  FormatSummary,
  MediaKind,
  ResolvedStream,
  StreamPayload,
  StreamRequestKind,
} from '@/types'
import {
  ExpiredTokenError,
  InvalidTokenError,
  InvalidVideoIdError,
  MissingTokenError,
  NoPlayableStreamError,
  StreamNotFoundError,
  UpstreamFetchFailedError,
} from '@/types/errors'

import { StreamCache } from './cache'
import type { Extractor } from './extractor/runner'
import { selectStreams, summarizeFormat } from './formats'
import type { StreamTokenCodec } from './token'
import type { UpstreamClient, UpstreamResponse } from './upstream'

const logger = Logger.get('stream')

export interface StreamServiceOptions {
  extractor: Extractor
  upstream: UpstreamClient
  // null runs the proxy in open mode
  tokens: StreamTokenCodec | null
  tokenTtlSeconds: number
  cacheTtlMs: number
  videoIdPattern?: RegExp
  now?: () => number
}

export interface ProxyToken {
  exp?: string
  sig?: string
}

export interface ProxyRequest {
  range?: string
  signal?: AbortSignal
}

export interface ProxiedStream {
  status: number
  headers: Record<string, string>
  body: Readable
}

export interface VideoDetailsPayload {
  video: {
    id: string
    title: string
    description: string
    thumbnailUrl: string
    duration: number
    viewCount: number
    channelId: string
    channelTitle: string
    uploadDate: string
    formats: FormatSummary[]
  }
}

const urlOf = (record: ResolvedStream, kind: MediaKind) =>
  kind === 'video' ? record.videoUrl : record.audioUrl

const kindsOf = (kind: StreamRequestKind): MediaKind[] =>
  kind === 'both' ? ['video', 'audio'] : [kind]

/**
 * Owns the resolution cache, the extractor and the token codec for the
 * lifetime of the process. Request handlers only translate HTTP to calls on
 * this service.
 */
export class StreamService {
  readonly cache: StreamCache
  private now: () => number
  private videoIdPattern: RegExp

  constructor(private options: StreamServiceOptions) {
    this.now = options.now ?? Date.now
    this.videoIdPattern = options.videoIdPattern ?? /^[A-Za-z0-9_-]{11}$/
    this.cache = new StreamCache({ ttlMs: options.cacheTtlMs, now: this.now })
  }

  private nowSeconds() {
    return Math.floor(this.now() / 1000)
  }

  private assertVideoId(videoId: string) {
    if (!this.videoIdPattern.test(videoId)) throw new InvalidVideoIdError()
  }

  private resolveFresh = async (videoId: string): Promise<ResolvedStream> => {
    const result = await this.options.extractor.extract(videoId)
    const { video, audio } = selectStreams(result.formats)
    return {
      videoId,
      videoUrl: video?.url ?? null,
      audioUrl: audio?.url ?? null,
      title: result.title,
      thumbnailUrl: result.thumbnailUrl,
      durationSeconds: result.durationSeconds,
      details: result.details,
      formats: result.formats.map(summarizeFormat),
      resolvedAt: this.now(),
    }
  }

  resolve(videoId: string): Promise<ResolvedStream> {
    this.assertVideoId(videoId)
    return this.cache.getOrResolve(videoId, this.resolveFresh)
  }

  proxyUrl(baseUrl: string, videoId: string, kind: MediaKind): string {
    const query = new URLSearchParams({ type: kind })
    const { tokens, tokenTtlSeconds } = this.options
    if (tokens) {
      const { exp, sig } = tokens.issue(
        videoId,
        kind,
        this.nowSeconds(),
        tokenTtlSeconds,
      )
      query.set('exp', `${exp}`)
      query.set('sig', sig)
    }
    return `${baseUrl}/proxy/${encodeURIComponent(videoId)}?${query}`
  }

  /** Player payload with one proxy URL per requested kind */
  async describe(
    videoId: string,
    kind: StreamRequestKind,
    baseUrl: string,
  ): Promise<StreamPayload> {
    const record = await this.resolve(videoId)
    const kinds = kindsOf(kind)
    if (!kinds.some((k) => urlOf(record, k))) throw new NoPlayableStreamError()

    const link = (k: MediaKind) =>
      urlOf(record, k) ? this.proxyUrl(baseUrl, videoId, k) : null

    return {
      title: record.title,
      duration: record.durationSeconds,
      thumbnailUrl: record.thumbnailUrl,
      ...(kinds.includes('video') ? { videoUrl: link('video') } : {}),
      ...(kinds.includes('audio') ? { audioUrl: link('audio') } : {}),
    }
  }

  authorize(videoId: string, kind: MediaKind, { exp, sig }: ProxyToken) {
    const { tokens } = this.options
    if (!tokens) return

    const verdict = tokens.check({ videoId, kind, exp, sig }, this.nowSeconds())
    switch (verdict) {
      case 'missing':
        throw new MissingTokenError()
      case 'expired':
        throw new ExpiredTokenError()
      case 'invalid':
        throw new InvalidTokenError()
    }
  }

  async open(
    videoId: string,
    kind: MediaKind,
    token: ProxyToken,
    { range, signal }: ProxyRequest = {},
  ): Promise<ProxiedStream> {
    this.assertVideoId(videoId)
    this.authorize(videoId, kind, token)

    const record = await this.resolve(videoId)
    const url = urlOf(record, kind)
    if (!url) throw new StreamNotFoundError()

    let upstream: UpstreamResponse
    try {
      upstream = await this.options.upstream.get(url, { range, signal })
    } catch (err) {
      // upstream errors carry the signed media URL, keep only the message
      const message =
        err instanceof Error ? err.message : 'Upstream request failed'
      logger.error(`Upstream fetch failed for ${videoId} (${kind}): ${message}`)
      throw new UpstreamFetchFailedError({ message })
    }

    const { status, body } = upstream
    if (status >= 300 && status !== 416) {
      body.destroy()
      logger.error(`Upstream answered ${status} for ${videoId} (${kind})`)
      throw new UpstreamFetchFailedError({ status })
    }

    const headers: Record<string, string> = {}
    for (const name of forwardedHeaders) {
      const value = upstream.headers[name]
      if (value) headers[name] = value
    }
    headers['content-type'] ??= defaultContentType[kind]
    headers['cache-control'] = 'no-cache'

    return { status, headers, body }
  }

  async details(videoId: string): Promise<VideoDetailsPayload> {
    const record = await this.resolve(videoId)
    return {
      video: {
        id: record.videoId,
        title: record.title,
        description: record.details.description,
        thumbnailUrl: record.thumbnailUrl,
        duration: record.durationSeconds,
        viewCount: record.details.viewCount,
        channelId: record.details.channelId,
        channelTitle: record.details.channelTitle,
        uploadDate: record.details.uploadDate,
        formats: record.formats,
      },
    }
  }

  sweep(): number {
    return this.cache.sweep()
  }
}
