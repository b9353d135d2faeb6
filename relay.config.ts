import os from 'os'
import path from 'path'

const env = process.env

const intFromEnv = (value: string | undefined, fallback: number) => {
  const parsed = parseInt(value ?? '', 10)
  return Number.isFinite(parsed) ? parsed : fallback
}

const optional = (value: string | undefined) => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export default {
  port: intFromEnv(env.PORT, 3100),
  sentryDsn: optional(env.SENTRY_DSN),
  log: {
    // 'stdout' or a file path
    accessLog: optional(env.ACCESS_LOG) ?? 'stdout',
    serverLog: optional(env.SERVER_LOG) ?? 'stdout',
    level: optional(env.LOG_LEVEL) ?? 'info',
  },
  // Without a secret the proxy runs in open mode: no tokens are minted or checked.
  token: {
    secret: optional(env.STREAM_PROXY_SECRET),
    accessToken: optional(env.STREAM_PROXY_ACCESS_TOKEN),
    ttlSeconds: intFromEnv(env.STREAM_PROXY_TTL_SECONDS, 6 * 60 * 60),
    clockSkewSeconds: intFromEnv(env.STREAM_PROXY_CLOCK_SKEW_SECONDS, 30),
  },
  cache: {
    ttlSeconds: intFromEnv(env.STREAM_CACHE_TTL_SECONDS, 5 * 60 * 60),
    sweepSchedule: optional(env.STREAM_CACHE_SWEEP_SCHEDULE) ?? '0 * * * *',
  },
  publicBaseUrl: optional(env.PUBLIC_BASE_URL),
  videoIdPattern: /^[A-Za-z0-9_-]{11}$/,
  extractor: {
    binary: optional(env.YTDLP_PATH) ?? 'yt-dlp',
    downloadBaseUrl:
      optional(env.YTDLP_DOWNLOAD_BASE_URL) ??
      'https://github.com/yt-dlp/yt-dlp/releases/latest/download',
    cacheDir:
      optional(env.YTDLP_CACHE_DIR) ?? path.join(os.tmpdir(), 'stream-relay'),
    timeoutMs: intFromEnv(env.YTDLP_TIMEOUT_MS, 15_000),
    downloadTimeoutMs: 60_000,
    socketTimeoutSeconds: 15,
    retries: 2,
    cookiesPath: optional(env.YTDLP_COOKIES_PATH),
    watchUrl: 'https://www.youtube.com/watch?v=',
  },
  proxyUrl: optional(
    env.https_proxy || env.HTTPS_PROXY || env.http_proxy || env.HTTP_PROXY,
  ),
  upstream: {
    timeoutMs: intFromEnv(env.UPSTREAM_TIMEOUT_MS, 30_000),
  },
}
