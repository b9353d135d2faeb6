import { accessTokenAuthorizer } from '@/lib/auth'
import { config, isOpenProxyMode } from '@/lib/config'
import { createBinaryFetcher, FallbackBinary } from '@/lib/extractor/binary'
import { ExtractionRunner } from '@/lib/extractor/runner'
import { createHttp } from '@/lib/http'
import Logger from '@/lib/logger'
import { StreamService } from '@/lib/streams'
import { StreamTokenCodec } from '@/lib/token'
import { HttpUpstreamClient } from '@/lib/upstream'
import { scheduleCacheSweep } from '@/task'

import { createApp } from './app'

const logger = Logger.get('express')

const { extractor, token, proxyUrl } = config

const fallback = new FallbackBinary({
  cacheDir: extractor.cacheDir,
  downloadBaseUrl: extractor.downloadBaseUrl,
  fetcher: createBinaryFetcher({
    proxyUrl,
    timeoutMs: extractor.downloadTimeoutMs,
  }),
})

const service = new StreamService({
  extractor: new ExtractionRunner({
    binary: extractor.binary,
    fallback,
    watchUrl: extractor.watchUrl,
    timeoutMs: extractor.timeoutMs,
    socketTimeoutSeconds: extractor.socketTimeoutSeconds,
    retries: extractor.retries,
    proxyUrl,
    cookiesPath: extractor.cookiesPath,
  }),
  upstream: new HttpUpstreamClient(
    createHttp({ proxyUrl }),
    config.upstream.timeoutMs,
  ),
  tokens: token.secret
    ? new StreamTokenCodec(token.secret, token.clockSkewSeconds)
    : null,
  tokenTtlSeconds: token.ttlSeconds,
  cacheTtlMs: config.cache.ttlSeconds * 1000,
  videoIdPattern: config.videoIdPattern,
})

if (isOpenProxyMode()) {
  logger.warn(
    'STREAM_PROXY_SECRET is not set, /proxy runs in open mode without tokens',
  )
} else if (!token.accessToken) {
  logger.warn(
    'STREAM_PROXY_ACCESS_TOKEN is not set, /stream and /video expect an authenticating gateway in front',
  )
}

const app = createApp({
  service,
  authorizer:
    token.secret && token.accessToken
      ? accessTokenAuthorizer(token.accessToken)
      : null,
  publicBaseUrl: config.publicBaseUrl,
  accessLog: config.log.accessLog,
  sentry: !!config.sentryDsn,
})

scheduleCacheSweep(service, config.cache.sweepSchedule)

app.listen(config.port, () => logger.log(`Listening on port ${config.port}`))
