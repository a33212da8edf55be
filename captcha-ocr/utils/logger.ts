/**
 * JSON-lines logger for the captcha service.
 *
 *   {"timestamp":"2026-01-01T12:00:00.000Z","level":"info","message":"Captcha recognized","requestId":"…","captcha":"x7Kq","timeMs":41.2}
 *
 * LOG_LEVEL picks the threshold (default "info"). Error records go to stderr
 * so a supervisor can split them from the access log on stdout. Each request
 * logs through `logger.child({ requestId })`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, unknown>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value)
}

export function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').trim().toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** What components log through; tests pass their own. */
export interface LogSink {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  child(defaults: LogContext): LogSink
}

export class Logger implements LogSink {
  private readonly threshold: number

  constructor(level?: LogLevel) {
    const effective = level ?? resolveLevel(process.env.LOG_LEVEL)
    this.threshold = LEVEL_PRIORITY[effective]
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < this.threshold) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    }

    const line = JSON.stringify(entry)

    if (level === 'error') {
      process.stderr.write(line + '\n')
    } else {
      process.stdout.write(line + '\n')
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context)
  }

  child(defaults: LogContext): LogSink {
    return new ChildLogger(this, defaults)
  }
}

class ChildLogger implements LogSink {
  constructor(
    private readonly parent: LogSink,
    private readonly defaults: LogContext,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  child(defaults: LogContext): LogSink {
    return new ChildLogger(this, defaults)
  }
}

/** Log fields for a caught value; engine failures keep their stack here, never in a response. */
export function errorFields(err: unknown): LogContext {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name, stack: err.stack }
  }
  return { error: String(err) }
}

export const logger = new Logger()
