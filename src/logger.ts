import pino from 'pino'
import { env } from './config/env'

const isDev = env.NODE_ENV === 'development'
const level = env.LOG_LEVEL ?? (isDev ? 'debug' : 'warn')

// stderr only: stdout belongs to the CLI's own output
export const logger = isDev
  ? pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 }
      }
    })
  : pino({ level }, pino.destination(2))
