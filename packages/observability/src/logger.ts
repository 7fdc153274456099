/**
 * Structured logging via pino for the Atlas services.
 * The same options feed Fastify's request logger, so both write one format.
 */
import pino from 'pino'
import { getAtlasEnv } from './conventions'

export type Logger = pino.Logger

export type LoggerConfig = {
  service: string
  level?: string
  pretty?: boolean
}

const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'req.headers["x-hub-signature-256"]',
  'req.headers["x-gitlab-token"]',
]

export function loggerOptions(options: LoggerConfig): pino.LoggerOptions {
  const level = options.level || process.env.LOG_LEVEL || 'info'
  const pretty = options.pretty ?? (getAtlasEnv() !== 'production')

  return {
    name: options.service,
    level,
    ...(pretty ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {}),
    base: {
      service: options.service,
      env: getAtlasEnv(),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
    },
  }
}

export function createLogger(options: LoggerConfig): Logger {
  return pino(loggerOptions(options))
}

/** Logger for tests and for components constructed without one. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

export type LogLine = { level: number; msg: string; [key: string]: unknown }

/** Logger that keeps each JSON line in memory, for asserting on log output. */
export function createMemoryLogger(level = 'debug'): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = []
  const logger = pino({ level }, { write: (line: string) => { lines.push(JSON.parse(line)) } })
  return { logger, lines }
}
