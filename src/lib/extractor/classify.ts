import type { ExtractionFailureReason } from '@/types/errors'

import { ProcessTimeoutError } from './process'

export type FailureKind =
  | 'environment'
  | 'timeout'
  | 'not-found'
  | ExtractionFailureReason

const textOf = (value: unknown) =>
  typeof value === 'string' ? value : JSON.stringify(value)

/** stderr, stdout and message of a failed invocation, joined */
export const failureText = (error: unknown): string => {
  if (typeof error === 'string') return error
  if (typeof error !== 'object' || error === null) return String(error ?? '')

  const parts = ['stderr', 'stdout', 'message']
    .map((key) => (key in error ? Reflect.get(error, key) : undefined))
    .filter(Boolean)
    .map(textOf)
  return parts.join('\n')
}

const normalize = (text: string) => text.toLowerCase().replace(/’/g, "'")

/**
 * True when the tool could not run at all on this host: no interpreter for
 * the script, no executable, or no permission to execute it.
 */
export const isEnvironmentFailure = (error: unknown): boolean => {
  const message = normalize(failureText(error))

  if (message.includes('python3') && message.includes('no such file or directory')) {
    return true
  }
  if (
    message.includes('/usr/bin/env') &&
    message.includes('python') &&
    message.includes('not found')
  ) {
    return true
  }
  if (message.includes('spawn') && message.includes('enoent')) return true
  if (message.includes('eacces')) return true

  return false
}

const notFoundPatterns = [
  'video unavailable',
  'this video does not exist',
  'this video has been removed',
  'private video',
  'incomplete youtube id',
  'is not a valid url',
  'http error 404',
]

const botCheckPatterns = [
  "confirm you're not a bot",
  'please sign in to continue',
  'cookies-from-browser',
  'use --cookies',
]

const cookiesInvalidPatterns = [
  'cookies are no longer valid',
  'likely been rotated in the browser',
]

/** The tool's own `ERROR:` line without its extractor and id prefix */
export const toolMessage = (error: unknown): string | undefined => {
  const raw = failureText(error)
  if (!raw.trim()) return undefined

  const line =
    raw
      .split('\n')
      .map((l) => l.trim())
      .find((l) => l.startsWith('ERROR:')) ?? raw.trim()

  return line
    .replace(/^ERROR:\s*(?:\[[^\]]+\]\s*)?(?:[A-Za-z0-9_-]{11}:)?\s*/i, '')
    .slice(0, 2000)
}

export const classifyFailure = (error: unknown): FailureKind => {
  if (error instanceof ProcessTimeoutError) return 'timeout'
  if (isEnvironmentFailure(error)) return 'environment'

  const message = normalize(failureText(error))
  if (cookiesInvalidPatterns.some((p) => message.includes(p))) {
    return 'cookies-invalid'
  }
  if (botCheckPatterns.some((p) => message.includes(p))) return 'bot-check'
  if (/this live event will begin in/.test(message)) return 'live-not-started'
  if (notFoundPatterns.some((p) => message.includes(p))) return 'not-found'
  return 'unknown'
}
