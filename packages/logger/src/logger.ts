import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Application crash
 * - error (50): Error messages
 * - warn (40): Warning messages
 * - info (30): General informational messages (default)
 * - debug (20): Debug messages
 * - trace (10): Very detailed trace messages
 */

type LogFields = Record<string, unknown>

type LogFn = (message: string, fields?: LogFields | Error | string) => void

type Logger = {
  fatal: LogFn
  error: LogFn
  warn: LogFn
  info: LogFn
  debug: LogFn
  trace: LogFn
  child: (bindings: pino.Bindings) => Logger
}

const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

function resolveLevel(raw: string | undefined): pino.LevelWithSilent {
  const normalized = raw?.trim().toLowerCase()
  const match = levels.find(level => level === normalized)
  return match ?? 'info'
}

function createBaseLogger(env: NodeJS.ProcessEnv = process.env): pino.Logger {
  const level = resolveLevel(env.LOG_LEVEL)

  // JSON lines for log shippers; pretty output for terminals
  if (env.LOG_FORMAT === 'json') {
    return pino({ level })
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '{if context}[{context}] {end}{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
        customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
      }
    }
  })
}

const baseLogger = createBaseLogger()

/**
 * Normalizes the optional second argument into pino merge fields.
 * Errors are reduced to their message so stack traces stay out of progress lines.
 */
function toFields(extra: LogFields | Error | string | undefined): LogFields | undefined {
  if (extra === undefined) {
    return undefined
  }

  if (extra instanceof Error) {
    return { err: extra.message }
  }

  if (typeof extra === 'string') {
    return { detail: extra }
  }

  return extra
}

const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: pino.Level): LogFn => {
    return (message, extra) => {
      const fields = toFields(extra)
      if (fields) {
        logger[level](fields, message)
      } else {
        logger[level](message)
      }
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Starting run');
 * log.warn('Task will be retried', { sequenceIndex: 4, classification: 'transient' });
 * log.error('Flush failed', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run ingest -- run --input=channels.csv
 * LOG_FORMAT=json npm run ingest -- run
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const poolLog = createLogger('credential-pool');
 * poolLog.warn('Credential exhausted', { credentialId: 2 });
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

export { resolveLevel, toFields }
export type { Logger, LogFields, LogFn }
