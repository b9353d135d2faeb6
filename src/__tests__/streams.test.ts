import { Readable } from 'stream'
import { describe, expect, it, vi } from 'vitest'

import type { Extractor } from '@/lib/extractor/runner'
import { StreamService } from '@/lib/streams'
import { StreamTokenCodec } from '@/lib/token'
import type { UpstreamClient, UpstreamResponse } from '@/lib/upstream'
import type { CandidateFormat, ExtractionResult } from '@/types'
import {
  ExpiredTokenError,
  InvalidTokenError,
  InvalidVideoIdError,
  MissingTokenError,
  NoPlayableStreamError,
  StreamNotFoundError,
  UpstreamFetchFailedError,
  VideoNotFoundError,
} from '@/types/errors'

const VIDEO_ID = 'abcdefghijk'
const NOW_MS = 1_700_000_000_000
const NOW = 1_700_000_000
const BASE = 'https://relay.test'

const combined720: CandidateFormat = {
  formatId: '22',
  ext: 'mp4',
  videoCodec: 'avc1.64001F',
  audioCodec: 'mp4a.40.2',
  height: 720,
  url: 'https://cdn.test/22',
}

const videoOnly480: CandidateFormat = {
  formatId: '135',
  ext: 'mp4',
  videoCodec: 'avc1.4d401e',
  audioCodec: 'none',
  height: 480,
  url: 'https://cdn.test/135',
}

const extraction = (formats: CandidateFormat[]): ExtractionResult => ({
  videoId: VIDEO_ID,
  title: 'Demo clip',
  thumbnailUrl: 'https://img.test/thumb.jpg',
  durationSeconds: 212,
  details: {
    description: 'A short demo',
    channelId: 'channel-1',
    channelTitle: 'Demo Channel',
    uploadDate: '20240101',
    viewCount: 42,
  },
  formats,
})

const upstreamResponse = (
  overrides: Partial<UpstreamResponse> = {},
): UpstreamResponse => ({
  status: 200,
  headers: {
    'content-type': 'video/mp4',
    'content-length': '1000',
    'accept-ranges': 'bytes',
  },
  body: Readable.from(['media']),
  ...overrides,
})

const setup = ({
  formats = [combined720],
  secret = 'test-secret',
}: { formats?: CandidateFormat[]; secret?: string | null } = {}) => {
  const tokens = secret ? new StreamTokenCodec(secret, 30) : null
  const extractor = {
    extract: vi.fn<Extractor['extract']>(async () => extraction(formats)),
  }
  const upstream = {
    get: vi.fn<UpstreamClient['get']>(async () => upstreamResponse()),
  }
  const service = new StreamService({
    extractor,
    upstream,
    tokens,
    tokenTtlSeconds: 21600,
    cacheTtlMs: 5 * 60 * 60 * 1000,
    now: () => NOW_MS,
  })
  return { service, tokens, extractor, upstream }
}

describe('StreamService.describe', () => {
  it('returns signed proxy URLs for both kinds', async () => {
    const { service, tokens } = setup()
    const exp = NOW + 21600
    const videoSig = tokens?.mint(VIDEO_ID, 'video', exp)
    const audioSig = tokens?.mint(VIDEO_ID, 'audio', exp)

    await expect(service.describe(VIDEO_ID, 'both', BASE)).resolves.toEqual({
      title: 'Demo clip',
      duration: 212,
      thumbnailUrl: 'https://img.test/thumb.jpg',
      videoUrl: `${BASE}/proxy/${VIDEO_ID}?type=video&exp=${exp}&sig=${videoSig}`,
      audioUrl: `${BASE}/proxy/${VIDEO_ID}?type=audio&exp=${exp}&sig=${audioSig}`,
    })
  })

  it('only includes the requested kind', async () => {
    const { service } = setup()
    const payload = await service.describe(VIDEO_ID, 'video', BASE)
    expect(payload.videoUrl).toMatch(/^https:\/\/relay\.test\/proxy\/abcdefghijk\?type=video&exp=1700021600&sig=/)
    expect('audioUrl' in payload).toBe(false)
  })

  it('omits tokens in open mode', async () => {
    const { service } = setup({ secret: null })
    const payload = await service.describe(VIDEO_ID, 'audio', BASE)
    expect(payload.audioUrl).toBe(`${BASE}/proxy/${VIDEO_ID}?type=audio`)
  })

  it('returns null for a requested kind that is not available', async () => {
    const { service } = setup({ formats: [videoOnly480] })
    const payload = await service.describe(VIDEO_ID, 'both', BASE)
    expect(payload.audioUrl).toBeNull()
    expect(payload.videoUrl).toContain('type=video')
  })

  it('answers NoPlayableStream without minting when nothing requested exists', async () => {
    const { service } = setup({ formats: [videoOnly480] })
    const mint = vi.spyOn(StreamTokenCodec.prototype, 'mint')

    await expect(service.describe(VIDEO_ID, 'audio', BASE)).rejects.toBeInstanceOf(
      NoPlayableStreamError,
    )
    expect(mint).not.toHaveBeenCalled()
    mint.mockRestore()
  })

  it('does not mint for a video that does not exist', async () => {
    const { service, extractor } = setup()
    extractor.extract.mockRejectedValueOnce(new VideoNotFoundError('Video unavailable'))
    const mint = vi.spyOn(StreamTokenCodec.prototype, 'mint')

    await expect(service.describe(VIDEO_ID, 'both', BASE)).rejects.toMatchObject({
      status: 404,
      code: 'VIDEO_NOT_FOUND',
    })
    expect(mint).not.toHaveBeenCalled()
    mint.mockRestore()
  })

  it('rejects malformed video ids before extracting', async () => {
    const { service, extractor } = setup()
    await expect(service.describe('not a video', 'both', BASE)).rejects.toBeInstanceOf(
      InvalidVideoIdError,
    )
    expect(extractor.extract).not.toHaveBeenCalled()
  })

  it('resolves each video once while the record is fresh', async () => {
    const { service, extractor } = setup()
    await Promise.all([
      service.describe(VIDEO_ID, 'both', BASE),
      service.describe(VIDEO_ID, 'video', BASE),
    ])
    await service.describe(VIDEO_ID, 'audio', BASE)
    expect(extractor.extract).toHaveBeenCalledTimes(1)
  })
})

describe('StreamService.open', () => {
  const tokenFor = (
    tokens: StreamTokenCodec | null,
    kind: 'video' | 'audio',
    exp = NOW + 60,
  ) => ({ exp: `${exp}`, sig: tokens?.mint(VIDEO_ID, kind, exp) })

  it('forwards the Range header and the partial response', async () => {
    const { service, tokens, upstream } = setup()
    const body = Readable.from(['partial'])
    upstream.get.mockResolvedValueOnce({
      status: 206,
      headers: {
        'content-type': 'video/mp4',
        'content-length': '100',
        'content-range': 'bytes 100-199/1000',
        'accept-ranges': 'bytes',
        'set-cookie': 'upstream=1',
      },
      body,
    })

    const stream = await service.open(VIDEO_ID, 'video', tokenFor(tokens, 'video'), {
      range: 'bytes=100-199',
    })

    expect(upstream.get).toHaveBeenCalledWith('https://cdn.test/22', {
      range: 'bytes=100-199',
      signal: undefined,
    })
    expect(stream.status).toBe(206)
    expect(stream.headers).toEqual({
      'content-type': 'video/mp4',
      'content-length': '100',
      'content-range': 'bytes 100-199/1000',
      'accept-ranges': 'bytes',
      'cache-control': 'no-cache',
    })
    expect(stream.body).toBe(body)
  })

  it('defaults the content type by kind', async () => {
    const { service, tokens, upstream } = setup()
    upstream.get.mockResolvedValueOnce(upstreamResponse({ headers: {} }))

    const stream = await service.open(VIDEO_ID, 'audio', tokenFor(tokens, 'audio'))
    expect(stream.headers).toEqual({
      'content-type': 'audio/mp4',
      'cache-control': 'no-cache',
    })
  })

  it('passes a 416 through', async () => {
    const { service, tokens, upstream } = setup()
    upstream.get.mockResolvedValueOnce(upstreamResponse({ status: 416 }))

    const stream = await service.open(VIDEO_ID, 'video', tokenFor(tokens, 'video'))
    expect(stream.status).toBe(416)
  })

  it('walks the token checks in order', async () => {
    const { service, tokens, upstream } = setup()
    const valid = tokenFor(tokens, 'video')

    await expect(service.open(VIDEO_ID, 'video', {})).rejects.toBeInstanceOf(
      MissingTokenError,
    )
    await expect(
      service.open(VIDEO_ID, 'video', tokenFor(tokens, 'video', NOW - 31)),
    ).rejects.toBeInstanceOf(ExpiredTokenError)
    await expect(
      service.open(VIDEO_ID, 'video', { ...valid, sig: `${valid.sig}x` }),
    ).rejects.toBeInstanceOf(InvalidTokenError)
    await expect(service.open(VIDEO_ID, 'audio', valid)).rejects.toBeInstanceOf(
      InvalidTokenError,
    )
    expect(upstream.get).not.toHaveBeenCalled()
  })

  it('maps token failures to their statuses', async () => {
    const { service } = setup()
    await expect(service.open(VIDEO_ID, 'video', {})).rejects.toMatchObject({
      status: 401,
      message: 'Missing stream token',
    })
    await expect(
      service.open(VIDEO_ID, 'video', { exp: `${NOW + 60}`, sig: 'forged' }),
    ).rejects.toMatchObject({ status: 403, message: 'Invalid stream token' })
  })

  it('skips token checks in open mode', async () => {
    const { service, upstream } = setup({ secret: null })
    const stream = await service.open(VIDEO_ID, 'video', {})
    expect(stream.status).toBe(200)
    expect(upstream.get).toHaveBeenCalledTimes(1)
  })

  it('answers StreamNotFound when the kind has no URL', async () => {
    const { service, tokens } = setup({ formats: [videoOnly480] })
    await expect(
      service.open(VIDEO_ID, 'audio', tokenFor(tokens, 'audio')),
    ).rejects.toBeInstanceOf(StreamNotFoundError)
  })

  it('wraps upstream errors and error statuses', async () => {
    const { service, tokens, upstream } = setup()
    upstream.get.mockRejectedValueOnce(new Error('socket hang up'))
    await expect(
      service.open(VIDEO_ID, 'video', tokenFor(tokens, 'video')),
    ).rejects.toBeInstanceOf(UpstreamFetchFailedError)

    const body = Readable.from(['denied'])
    upstream.get.mockResolvedValueOnce(upstreamResponse({ status: 403, body }))
    await expect(
      service.open(VIDEO_ID, 'video', tokenFor(tokens, 'video')),
    ).rejects.toMatchObject({ status: 500, code: 'UPSTREAM_FETCH_FAILED' })
    expect(body.destroyed).toBe(true)
  })

  it('keeps the signed media URL out of the error details', async () => {
    const { service, tokens, upstream } = setup()
    upstream.get.mockRejectedValueOnce(
      Object.assign(new Error('Request failed with status code 500'), {
        config: { url: 'https://cdn.test/22?signature=test-signature' },
      }),
    )

    const error = await service
      .open(VIDEO_ID, 'video', tokenFor(tokens, 'video'))
      .then(
        () => null,
        (err: unknown) => err,
      )

    expect(error).toBeInstanceOf(UpstreamFetchFailedError)
    expect(error).toMatchObject({
      details: { message: 'Request failed with status code 500' },
    })
    expect(JSON.stringify(error)).not.toContain('test-signature')
  })

  it('keeps the cache entry when a fetch is aborted', async () => {
    const { service, tokens, upstream, extractor } = setup()
    const controller = new AbortController()
    upstream.get.mockImplementationOnce(async (_url, request) => {
      controller.abort()
      expect(request?.signal?.aborted).toBe(true)
      throw new Error('aborted')
    })

    await expect(
      service.open(VIDEO_ID, 'video', tokenFor(tokens, 'video'), {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(UpstreamFetchFailedError)
    expect(service.cache.peek(VIDEO_ID)?.videoUrl).toBe('https://cdn.test/22')

    await service.open(VIDEO_ID, 'video', tokenFor(tokens, 'video'))
    expect(extractor.extract).toHaveBeenCalledTimes(1)
  })
})

describe('StreamService.details', () => {
  it('describes the video without upstream URLs', async () => {
    const { service } = setup({ formats: [combined720, videoOnly480] })

    const { video } = await service.details(VIDEO_ID)

    expect(video).toMatchObject({
      id: VIDEO_ID,
      title: 'Demo clip',
      description: 'A short demo',
      duration: 212,
      viewCount: 42,
      channelId: 'channel-1',
      channelTitle: 'Demo Channel',
      uploadDate: '20240101',
    })
    expect(video.formats.map((f) => f.formatId)).toEqual(['22', '135'])
    expect(video.formats.every((f) => !('url' in f))).toBe(true)
  })
})
