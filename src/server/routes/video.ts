import { RequestHandler, Router } from 'express'

import type { StreamService } from '@/lib/streams'

import { sendError } from '../errors'

export const createVideoRouter = (
  service: StreamService,
  { authorize }: { authorize: RequestHandler },
) => {
  const router = Router()

  router.get('/:id', authorize, async (req, res) => {
    try {
      res.json(await service.details(req.params.id))
    } catch (err) {
      sendError(res, err)
    }
  })

  return router
}
