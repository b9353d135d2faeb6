import type { AxiosInstance } from 'axios'
import type { Readable } from 'stream'

import { BROWSER_USER_AGENT } from '@/consts'

import { headerValue } from './http'

export interface UpstreamRequest {
  range?: string
  signal?: AbortSignal
}

export interface UpstreamResponse {
  status: number
  // lowercase header names
  headers: Record<string, string | undefined>
  body: Readable
}

export interface UpstreamClient {
  get(url: string, request?: UpstreamRequest): Promise<UpstreamResponse>
}

/**
 * Streams media from the upstream CDN. The timeout bounds the wait for
 * response headers only; once the body flows it may run as long as the
 * client keeps reading.
 */
export class HttpUpstreamClient implements UpstreamClient {
  constructor(
    private http: AxiosInstance,
    private timeoutMs: number,
  ) {}

  async get(url: string, { range, signal }: UpstreamRequest = {}) {
    const controller = new AbortController()
    const abort = () => controller.abort()
    if (signal?.aborted) abort()
    signal?.addEventListener('abort', abort, { once: true })
    const timer = setTimeout(abort, this.timeoutMs)

    try {
      const resp = await this.http.get<Readable>(url, {
        responseType: 'stream',
        decompress: false,
        timeout: 0,
        signal: controller.signal,
        headers: {
          'User-Agent': BROWSER_USER_AGENT,
          'Accept-Encoding': 'identity',
          ...(range ? { Range: range } : {}),
        },
        validateStatus: (status) => status < 300 || status === 416,
      })

      const headers: Record<string, string | undefined> = {}
      for (const [name, value] of Object.entries(resp.headers)) {
        headers[name.toLowerCase()] = headerValue(value)
      }
      resp.data.once('close', () => {
        signal?.removeEventListener('abort', abort)
      })
      return { status: resp.status, headers, body: resp.data }
    } catch (err) {
      signal?.removeEventListener('abort', abort)
      throw err
    } finally {
      clearTimeout(timer)
    }
  }
}
