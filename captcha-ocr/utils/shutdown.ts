/**
 * GracefulShutdown: ordered teardown on SIGINT/SIGTERM.
 *
 * Handlers run in reverse registration order, so the HTTP server stops
 * accepting requests before the OCR worker it feeds is terminated. A timeout
 * bounds the whole sequence.
 *
 *   const shutdown = createShutdownManager()
 *   shutdown.register('ocr', () => service.close())
 *   shutdown.register('http', () => httpService.stop())
 *   shutdown.installSignalHandlers()
 */

import { errorFields, logger, type LogSink } from './logger.ts'

export interface ShutdownHandler {
  name: string
  fn: () => Promise<void> | void
}

export interface ShutdownOptions {
  timeoutMs?: number
  log?: LogSink
}

export class GracefulShutdown {
  private readonly handlers: ShutdownHandler[] = []
  private shutdownInProgress = false
  private readonly timeoutMs: number
  private readonly log: LogSink

  constructor(opts: ShutdownOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 10_000
    this.log = opts.log ?? logger.child({ component: 'shutdown' })
  }

  register(name: string, fn: () => Promise<void> | void): void {
    this.handlers.push({ name, fn })
  }

  get inProgress(): boolean {
    return this.shutdownInProgress
  }

  /**
   * Run the handlers newest first; main.ts registers them so the HTTP listener
   * stops before the OCR worker. A handler that throws is logged and the rest run.
   */
  async shutdown(): Promise<void> {
    if (this.shutdownInProgress) {
      this.log.warn('Shutdown already in progress, ignoring duplicate call')
      return
    }
    this.shutdownInProgress = true

    this.log.info('Graceful shutdown started', {
      handlerCount: this.handlers.length,
      timeoutMs: this.timeoutMs,
    })

    const runHandlers = async (): Promise<void> => {
      for (const handler of [...this.handlers].reverse()) {
        try {
          await handler.fn()
          this.log.info('Shutdown handler completed', { handler: handler.name })
        } catch (err) {
          this.log.error('Shutdown handler failed', { handler: handler.name, ...errorFields(err) })
        }
      }
    }

    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.log.error('Shutdown timed out, forcing exit', { timeoutMs: this.timeoutMs })
        resolve()
      }, this.timeoutMs)
    })

    try {
      await Promise.race([runHandlers(), timeout])
    } finally {
      clearTimeout(timer)
    }

    this.log.info('Graceful shutdown complete')
  }

  /**
   * SIGTERM and SIGINT exit 0 after teardown. A crash exits 1 after the same
   * teardown. Pressing Ctrl-C twice skips it.
   */
  installSignalHandlers(): void {
    let forceExitOnNextSignal = false

    const exitAfterShutdown = (code: number) => {
      this.shutdown()
        .then(() => process.exit(code))
        .catch((err: unknown) => {
          this.log.error('Shutdown error', errorFields(err))
          process.exit(1)
        })
    }

    const onSignal = (signal: NodeJS.Signals) => {
      if (forceExitOnNextSignal) {
        this.log.warn('Received second signal, forcing exit', { signal })
        process.exit(1)
      }
      forceExitOnNextSignal = true
      this.log.info('Received signal, starting shutdown', { signal })
      exitAfterShutdown(0)
    }

    process.on('SIGTERM', onSignal)
    process.on('SIGINT', onSignal)

    process.on('uncaughtException', (err) => {
      this.log.error('Uncaught exception, starting shutdown', errorFields(err))
      exitAfterShutdown(1)
    })

    process.on('unhandledRejection', (reason) => {
      this.log.error('Unhandled rejection, starting shutdown', errorFields(reason))
      exitAfterShutdown(1)
    })
  }
}

export function createShutdownManager(opts?: ShutdownOptions): GracefulShutdown {
  return new GracefulShutdown(opts)
}
