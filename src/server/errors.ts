import type { NextFunction, Request, RequestHandler, Response } from 'express'

import type { StreamAuthorizer } from '@/lib/auth'
import Logger from '@/lib/logger'
import { StreamRelayError, UnauthorizedError } from '@/types/errors'

const logger = Logger.get('express')

export const sendError = (res: Response, err: unknown) => {
  if (res.headersSent) {
    logger.error('Error after response started:', err)
    res.destroy()
    return
  }

  if (err instanceof StreamRelayError) {
    if (err.status >= 500) {
      logger.error(`${err.code}: ${err.message}`, err.details ?? '')
    } else {
      logger.debug(`${err.code}: ${err.message}`)
    }
    res.status(err.status).json({ error: err.message, code: err.code })
    return
  }

  logger.error(err)
  res.status(500).json({ error: 'Internal Server Error' })
}

/** Rejects with 401 unless the authorizer accepts the request; null lets everything through */
export const requireAuthorization =
  (authorizer: StreamAuthorizer | null): RequestHandler =>
  async (req: Request, res: Response, next: NextFunction) => {
    if (!authorizer) return next()
    try {
      if (await authorizer(req)) return next()
      sendError(res, new UnauthorizedError())
    } catch (err) {
      next(err)
    }
  }
