import cors from 'cors'
import express, { ErrorRequestHandler } from 'express'
import fs from 'fs'
import helmet from 'helmet'
import morgan from 'morgan'

import { ACCESS_TOKEN_HEADER, StreamAuthorizer } from '@/lib/auth'
import type { StreamService } from '@/lib/streams'
import * as Sentry from '@sentry/node'

import { requireAuthorization, sendError } from './errors'
import { createProxyRouter } from './routes/proxy'
import { createStreamRouter } from './routes/stream'
import { createVideoRouter } from './routes/video'

export interface AppOptions {
  service: StreamService
  authorizer: StreamAuthorizer | null
  publicBaseUrl?: string
  // 'stdout', a file path, or false to disable
  accessLog?: string | false
  sentry?: boolean
}

export const createApp = ({
  service,
  authorizer,
  publicBaseUrl,
  accessLog = 'stdout',
  sentry = false,
}: AppOptions) => {
  const app = express()

  app.use(
    cors({
      origin: '*',
      optionsSuccessStatus: 200,
      allowedHeaders: ['Content-Type', 'Range', ACCESS_TOKEN_HEADER],
      exposedHeaders: ['Content-Length', 'Content-Range', 'Accept-Ranges'],
    }),
  )
  app.use(helmet({ crossOriginResourcePolicy: false }))
  if (accessLog) {
    app.use(
      morgan('dev', {
        ...(accessLog === 'stdout'
          ? {}
          : { stream: fs.createWriteStream(accessLog, { flags: 'a' }) }),
        skip: (req) => req.url === '/health',
      }),
    )
  }

  const authorize = requireAuthorization(authorizer)

  app.all('/health', (_, res) => res.send('ok'))
  app.use('/stream', createStreamRouter(service, { authorize, publicBaseUrl }))
  app.use('/proxy', createProxyRouter(service))
  app.use('/video', createVideoRouter(service, { authorize }))

  if (sentry) {
    Sentry.setupExpressErrorHandler(app)
  }
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    sendError(res, err)
  }
  app.use(onError)

  return app
}
