import { Request, RequestHandler, Router } from 'express'

import { D, E } from '@/lib/fp'
import type { StreamService } from '@/lib/streams'
import { InvalidRequestError } from '@/types/errors'

import { sendError } from '../errors'

const queryDecoder = D.partial({
  type: D.union(D.literal('video'), D.literal('audio'), D.literal('both')),
})

/** Origin clients reach this server at, without a trailing slash */
export const baseUrlOf = (req: Request, publicBaseUrl?: string) => {
  if (publicBaseUrl) return publicBaseUrl.replace(/\/+$/, '')
  const forwarded = req.get('x-forwarded-proto')?.split(',')[0]?.trim()
  return `${forwarded || req.protocol}://${req.get('host') ?? 'localhost'}`
}

export const createStreamRouter = (
  service: StreamService,
  {
    authorize,
    publicBaseUrl,
  }: { authorize: RequestHandler; publicBaseUrl?: string },
) => {
  const router = Router()

  router.get('/:id', authorize, async (req, res) => {
    const query = queryDecoder.decode(req.query)
    if (E.isLeft(query)) {
      return sendError(
        res,
        new InvalidRequestError('Invalid query parameters', D.draw(query.left)),
      )
    }

    try {
      const payload = await service.describe(
        req.params.id,
        query.right.type ?? 'both',
        baseUrlOf(req, publicBaseUrl),
      )
      res.json(payload)
    } catch (err) {
      sendError(res, err)
    }
  })

  return router
}
