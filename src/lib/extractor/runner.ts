import Logger from '@/lib/logger'
import type { ExtractionResult } from '@/types'
import {
  ExtractionFailedError,
  ExtractionTimeoutError,
  StreamRelayError,
  VideoNotFoundError,
} from '@/types/errors'

import type { FallbackBinary } from './binary'
import { classifyFailure, toolMessage } from './classify'
import { parseExtraction } from './parse'
import { type CommandExecutor, runCommand } from './process'

const logger = Logger.get('extractor')

export interface Extractor {
  extract(videoId: string): Promise<ExtractionResult>
}

export interface ExtractionRunnerOptions {
  binary: string
  fallback: Pick<FallbackBinary, 'ensure'>
  watchUrl: string
  timeoutMs: number
  socketTimeoutSeconds: number
  retries: number
  proxyUrl?: string
  cookiesPath?: string
  exec?: CommandExecutor
}

/**
 * Runs the extraction tool for one video id. When the primary binary cannot
 * run on this host the runner installs the self-contained release binary,
 * switches to it for the rest of the process lifetime and retries once.
 */
export class ExtractionRunner implements Extractor {
  private binary: string
  private switched = false
  private exec: CommandExecutor

  constructor(private options: ExtractionRunnerOptions) {
    this.binary = options.binary
    this.exec = options.exec ?? runCommand
  }

  get activeBinary() {
    return this.binary
  }

  get usingFallback() {
    return this.switched
  }

  buildArgs(videoId: string): string[] {
    const { socketTimeoutSeconds, retries, proxyUrl, cookiesPath, watchUrl } =
      this.options
    return [
      '--dump-single-json',
      '--no-check-certificates',
      '--no-warnings',
      '--prefer-free-formats',
      '--socket-timeout',
      `${socketTimeoutSeconds}`,
      '--retries',
      `${retries}`,
      ...(proxyUrl ? ['--proxy', proxyUrl] : []),
      ...(cookiesPath ? ['--cookies', cookiesPath] : []),
      `${watchUrl}${encodeURIComponent(videoId)}`,
    ]
  }

  async extract(videoId: string): Promise<ExtractionResult> {
    const stdout = await this.run(videoId)
    return parseExtraction(stdout)
  }

  private invoke(binary: string, videoId: string) {
    return this.exec(binary, this.buildArgs(videoId), {
      timeoutMs: this.options.timeoutMs,
    })
  }

  private async run(videoId: string): Promise<string> {
    const binary = this.binary
    const onPrimary = !this.switched
    try {
      return await this.invoke(binary, videoId)
    } catch (err) {
      if (!onPrimary || classifyFailure(err) !== 'environment') {
        throw this.toError(err)
      }

      logger.warn(`${binary} cannot run on this host:`, toolMessage(err))
      const fallback = await this.switchToFallback()
      try {
        return await this.invoke(fallback, videoId)
      } catch (retryError) {
        throw this.toError(retryError)
      }
    }
  }

  private async switchToFallback(): Promise<string> {
    const path = await this.options.fallback.ensure()
    if (!this.switched) {
      this.switched = true
      this.binary = path
      logger.warn(`Switched extraction binary to ${path}`)
    }
    return this.binary
  }

  private toError(err: unknown): StreamRelayError {
    if (err instanceof StreamRelayError) return err

    const kind = classifyFailure(err)
    const message = toolMessage(err)
    switch (kind) {
      case 'timeout':
        return new ExtractionTimeoutError(this.options.timeoutMs)
      case 'not-found':
        return new VideoNotFoundError(message)
      case 'environment':
        return new ExtractionFailedError('unknown', message)
      default:
        return new ExtractionFailedError(kind, message)
    }
  }
}
