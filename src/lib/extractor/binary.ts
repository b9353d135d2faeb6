import fs from 'fs/promises'
import path from 'path'

import { createHttp } from '@/lib/http'
import Logger from '@/lib/logger'
import { DownloadFailedError } from '@/types/errors'

import { Locker } from '../locker'

const logger = Logger.get('extractor')

const exists = (file: string) =>
  fs.access(file).then(
    () => true,
    () => false,
  )

export type BinaryFetcher = (url: string) => Promise<Buffer>

/** Self-contained release asset for the given host, null when there is none */
export const binaryAssetName = (
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): string | null => {
  if (platform === 'win32') return 'yt-dlp.exe'
  if (platform === 'darwin') return 'yt-dlp_macos'
  if (platform === 'linux') {
    return arch === 'arm64' ? 'yt-dlp_linux_aarch64' : 'yt-dlp_linux'
  }
  return null
}

/** Tries each fetcher in order and rethrows the last failure */
export const withFallbackFetchers =
  (...fetchers: BinaryFetcher[]): BinaryFetcher =>
  async (url) => {
    let lastError: unknown = new Error('No fetcher configured')
    for (const [i, fetcher] of fetchers.entries()) {
      try {
        return await fetcher(url)
      } catch (err) {
        lastError = err
        if (i < fetchers.length - 1) {
          logger.warn(`Binary download attempt ${i + 1} failed, retrying:`, err)
        }
      }
    }
    throw lastError
  }

/**
 * Downloads through the outbound proxy when one is configured, then retries
 * once over a direct connection.
 */
export const createBinaryFetcher = ({
  proxyUrl,
  timeoutMs,
}: {
  proxyUrl?: string
  timeoutMs: number
}): BinaryFetcher => {
  const viaClient =
    (client: ReturnType<typeof createHttp>): BinaryFetcher =>
    async (url) => {
      const { data } = await client.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
      })
      return Buffer.from(data)
    }

  const direct = viaClient(createHttp({ timeoutMs }))
  return proxyUrl
    ? withFallbackFetchers(viaClient(createHttp({ proxyUrl, timeoutMs })), direct)
    : direct
}

export interface FallbackBinaryOptions {
  cacheDir: string
  downloadBaseUrl: string
  fetcher: BinaryFetcher
  assetName?: string | null
}

/**
 * The alternate extraction binary kept in a local cache directory. `ensure`
 * is single-flighted: concurrent callers share one download and all succeed
 * or all fail together. A failed download can be retried by a later call.
 */
export class FallbackBinary {
  private locker = new Locker<string>()
  private assetName: string | null
  private installedPath: string | null = null

  constructor(private options: FallbackBinaryOptions) {
    this.assetName =
      options.assetName === undefined ? binaryAssetName() : options.assetName
  }

  get path(): string | null {
    return this.assetName
      ? path.join(this.options.cacheDir, this.assetName)
      : null
  }

  get downloadUrl(): string | null {
    if (!this.assetName) return null
    const base = this.options.downloadBaseUrl.trim().replace(/\/+$/, '')
    return `${base}/${this.assetName}`
  }

  ensure(): Promise<string> {
    if (this.installedPath) return Promise.resolve(this.installedPath)
    return this.locker.run('binary', async () => {
      const installed = await this.install()
      this.installedPath = installed
      return installed
    })
  }

  private async install(): Promise<string> {
    const target = this.path
    const url = this.downloadUrl
    if (!target || !url) {
      throw new DownloadFailedError(
        `Unsupported platform for yt-dlp binary (${process.platform})`,
      )
    }

    if (await exists(target)) {
      logger.info(`Reusing cached binary ${target}`)
      return target
    }

    logger.info(`Downloading fallback binary from ${url}`)
    const start = Date.now()
    let buffer: Buffer
    try {
      buffer = await this.options.fetcher(url)
    } catch (err) {
      throw new DownloadFailedError('Failed to download yt-dlp', err)
    }

    const partial = `${target}.${process.pid}.download`
    try {
      await fs.mkdir(path.dirname(target), { recursive: true })
      await fs.writeFile(partial, buffer)
      await fs.chmod(partial, 0o755)
      await fs.rename(partial, target)
    } catch (err) {
      await fs.rm(partial, { force: true })
      throw new DownloadFailedError('Failed to install yt-dlp', err)
    }

    logger.info(
      `Installed ${target} (${buffer.length} bytes) in ${Date.now() - start}ms`,
    )
    return target
  }
}
