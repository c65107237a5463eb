import pino from 'pino'
import type { LoggerOptions } from 'pino'
import env from '../config'

const loggerOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
  base: { service: 'transect-admin' },
}

const logger = pino(loggerOptions)

export default logger
