import cron from 'node-cron'

import Logger from '@/lib/logger'
import type { StreamService } from '@/lib/streams'

const logger = Logger.get('tasks')

export const scheduleCacheSweep = (service: StreamService, schedule: string) =>
  cron.schedule(schedule, () => {
    logger.info('Start sweep stream cache...')
    const removed = service.sweep()
    logger.info(`Sweep stream cache done, removed ${removed} entries.`)
  })
