import { Router } from 'express'
import { pipeline } from 'stream/promises'

import { D, E } from '@/lib/fp'
import Logger from '@/lib/logger'
import type { StreamService } from '@/lib/streams'
import { InvalidRequestError } from '@/types/errors'

import { sendError } from '../errors'

const logger = Logger.get('proxy')

const queryDecoder = D.partial({
  type: D.union(D.literal('video'), D.literal('audio')),
  exp: D.string,
  sig: D.string,
})

export const createProxyRouter = (service: StreamService) => {
  const router = Router()

  router.get('/:id', async (req, res) => {
    const query = queryDecoder.decode(req.query)
    if (E.isLeft(query)) {
      return sendError(
        res,
        new InvalidRequestError('Invalid query parameters', D.draw(query.left)),
      )
    }
    const { type = 'video', exp, sig } = query.right
    const videoId = req.params.id

    // client went away before the body was fully sent
    const controller = new AbortController()
    res.on('close', () => {
      if (!res.writableFinished) controller.abort()
    })

    try {
      const upstream = await service.open(
        videoId,
        type,
        { exp, sig },
        { range: req.get('range'), signal: controller.signal },
      )
      res.status(upstream.status).set(upstream.headers)
      await pipeline(upstream.body, res)
    } catch (err) {
      if (controller.signal.aborted) {
        logger.debug(`Client disconnected from ${videoId} (${type})`)
        return
      }
      sendError(res, err)
    }
  })

  return router
}
