import fs from 'fs'
import Logger from 'js-logger'
import { format } from 'util'

import { config } from './config'

const levels: Record<string, typeof Logger.INFO> = {
  trace: Logger.TRACE,
  debug: Logger.DEBUG,
  info: Logger.INFO,
  warn: Logger.WARN,
  error: Logger.ERROR,
  off: Logger.OFF,
}

Logger.useDefaults({ defaultLevel: levels[config.log.level] ?? Logger.INFO })
if (config.log.serverLog !== 'stdout') {
  const stream = fs.createWriteStream(config.log.serverLog, { flags: 'a' })

  process.on('SIGTERM', () => {
    stream.end()
  })
  Logger.setHandler((messages, context) => {
    const scope = context.name ? ` ${context.name}:` : ''
    stream.write(
      `${new Date().toISOString()} [${context.level.name}]${scope} ${format(
        ...messages,
      )}\n`,
    )
  })
}
export default Logger
