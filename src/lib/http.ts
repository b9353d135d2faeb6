import axios from 'axios'
import { HttpsProxyAgent } from 'https-proxy-agent'

import pkg from '../../package.json'

export const createHttp = ({
  proxyUrl,
  timeoutMs = 10000,
}: {
  proxyUrl?: string
  timeoutMs?: number
} = {}) => {
  const agent = proxyUrl ? new HttpsProxyAgent(proxyUrl) : undefined
  return axios.create({
    headers: {
      'User-Agent': `Stream Relay/${pkg.version}`,
    },
    // the outbound proxy is applied through the agent, never read from the environment
    proxy: false,
    ...(agent ? { httpAgent: agent, httpsAgent: agent } : {}),
    timeout: timeoutMs,
  })
}

/** First string value of a response header, numbers stringified */
export const headerValue = (value: unknown): string | undefined => {
  if (Array.isArray(value)) return headerValue(value[0])
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}
