import crypto from 'crypto'
import { NumberFromString } from 'io-ts-types'
import { pipe } from 'fp-ts/lib/function'

import { O } from '@/lib/fp'
import type { MediaKind, StreamTokenParams, TokenVerdict } from '@/types'

const canonical = (videoId: string, kind: string, expiresAt: number) =>
  `${videoId}.${kind}.${expiresAt}`

/**
 * Stateless capability tokens scoped to one (video, media kind) pair. A token
 * is valid until `exp`, plus `clockSkewSeconds` of grace for drift between
 * signer and verifier. No user identity is encoded.
 */
export class StreamTokenCodec {
  constructor(
    private readonly secret: string,
    readonly clockSkewSeconds = 30,
  ) {}

  mint(videoId: string, kind: MediaKind, expiresAt: number): string {
    return crypto
      .createHmac('sha256', this.secret)
      .update(canonical(videoId, kind, expiresAt))
      .digest('base64url')
  }

  verify(
    videoId: string,
    kind: string,
    expiresAt: number,
    signature: string,
  ): boolean {
    if (typeof videoId !== 'string' || typeof kind !== 'string') return false
    if (typeof signature !== 'string' || !signature) return false
    if (typeof expiresAt !== 'number' || !Number.isFinite(expiresAt)) {
      return false
    }

    const expected = Buffer.from(
      crypto
        .createHmac('sha256', this.secret)
        .update(canonical(videoId, kind, expiresAt))
        .digest('base64url'),
    )
    const actual = Buffer.from(signature)
    // timingSafeEqual throws on length mismatch
    if (expected.length !== actual.length) return false

    return crypto.timingSafeEqual(expected, actual)
  }

  issue(videoId: string, kind: MediaKind, nowSeconds: number, ttlSeconds: number) {
    const exp = nowSeconds + ttlSeconds
    return { exp, sig: this.mint(videoId, kind, exp) }
  }

  isExpired(expiresAt: number, nowSeconds: number) {
    return (
      !Number.isFinite(expiresAt) ||
      nowSeconds - this.clockSkewSeconds > expiresAt
    )
  }

  check(
    { videoId, kind, exp, sig }: StreamTokenParams,
    nowSeconds: number,
  ): TokenVerdict {
    if (!exp || !sig) return 'missing'

    // only the decimal form the signature was computed over
    const expiresAt = /^\d+$/.test(exp)
      ? pipe(
          NumberFromString.decode(exp),
          O.fromEither,
          O.getOrElse(() => NaN),
        )
      : NaN
    if (this.isExpired(expiresAt, nowSeconds)) return 'expired'

    return this.verify(videoId, kind, expiresAt, sig) ? 'valid' : 'invalid'
  }
}
