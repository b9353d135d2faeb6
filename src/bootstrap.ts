import 'dotenv/config'

import { config } from '@/lib/config'
import * as Sentry from '@sentry/node'

if (config.sentryDsn) {
  Sentry.init({
    dsn: config.sentryDsn,
    tracesSampleRate: 1.0,
  })
}

require('./server')
