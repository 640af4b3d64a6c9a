import pino, { type DestinationStream } from 'pino'
import { config } from 'dotenv'
import { z } from 'zod'
config()

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
export type LogLevelType = z.infer<typeof LogLevel>

type Level = Exclude<LogLevelType, 'silent'>
type Meta = Record<string, unknown>

export interface Logger {
  child(bindings?: Meta): Logger
  fatal(msg: string, meta?: Meta): void
  error(msg: string, meta?: Meta): void
  warn(msg: string, meta?: Meta): void
  info(msg: string, meta?: Meta): void
  debug(msg: string, meta?: Meta): void
  trace(msg: string, meta?: Meta): void
}

// The Home Assistant token travels in config objects and request headers.
const REDACTED_PATHS = ['token', '*.token', 'headers.Authorization', '*.headers.Authorization']

export interface LoggerOptions {
  level?: LogLevelType
  /** Human-readable output through pino-pretty; ignored when `destination` is set. */
  pretty?: boolean
  destination?: DestinationStream
}

/** Reads `LOG_LEVEL`, falling back to `info` when it is unset or not a pino level. */
export function resolveLogLevel(raw: string | undefined): LogLevelType {
  const parsed = LogLevel.safeParse(raw?.trim().toLowerCase())
  return parsed.success ? parsed.data : 'info'
}

function wrap(instance: pino.Logger): Logger {
  const call = (lvl: Level) => (msg: string, meta?: Meta) => instance[lvl](meta ?? {}, msg)

  return {
    child: (bindings) => wrap(instance.child(bindings ?? {})),
    fatal: call('fatal'),
    error: call('error'),
    warn: call('warn'),
    info: call('info'),
    debug: call('debug'),
    trace: call('trace'),
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const base: pino.LoggerOptions = {
    level: options.level ?? 'info',
    base: null,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  }

  if (options.destination) {
    return wrap(pino(base, options.destination))
  }

  return wrap(
    pino({
      ...base,
      transport: options.pretty
        ? {
            target: 'pino-pretty',
            options: { colorize: true, singleLine: true, translateTime: 'SYS:HH:MM:ss.l' },
          }
        : undefined,
    }),
  )
}

export const logger: Logger = createLogger({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  pretty: process.env.NODE_ENV !== 'production',
})

export function makeLogger(service: string, bindings?: Meta): Logger {
  return logger.child({ service, ...bindings })
}
