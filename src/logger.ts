import pino from 'pino'
import { env } from './config/env'

const isDev = env.NODE_ENV === 'development'

function defaultLevel(): pino.LevelWithSilent {
  if (env.NODE_ENV === 'test') return 'silent'
  return isDev ? 'debug' : 'info'
}

// Logs go to stderr; stdout belongs to the CLI output
export const logger = isDev
  ? pino({
      level: env.LOG_LEVEL ?? defaultLevel(),
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 }
      }
    })
  : pino({ level: env.LOG_LEVEL ?? defaultLevel() }, pino.destination(2))

export type { Logger } from 'pino'
