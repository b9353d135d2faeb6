import crypto from 'crypto'
import type { Request } from 'express'

export const ACCESS_TOKEN_HEADER = 'x-stream-access-token'

/** Decides whether a request may resolve streams and mint tokens */
export type StreamAuthorizer = (req: Request) => boolean | Promise<boolean>

const digest = (value: string) =>
  crypto.createHash('sha256').update(value).digest()

// Digests have equal length, so the comparison never leaks the token length
export const safeEqual = (actual: string | undefined, expected: string) => {
  if (!actual) return false
  return crypto.timingSafeEqual(digest(actual), digest(expected))
}

export const accessTokenAuthorizer =
  (token: string): StreamAuthorizer =>
  (req) =>
    safeEqual(req.get(ACCESS_TOKEN_HEADER), token)
