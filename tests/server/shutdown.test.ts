import { describe, it, expect, vi } from 'vitest'
import { GracefulShutdown, createShutdownManager } from '../../captcha-ocr/utils/shutdown.ts'
import type { LogSink } from '../../captcha-ocr/utils/logger.ts'

function recordingLog() {
  const errors: Array<{ message: string; context?: Record<string, unknown> }> = []
  const noop = () => {}
  const log: LogSink = {
    debug: noop,
    info: noop,
    warn: noop,
    error: (message, context) => { errors.push({ message, context }) },
    child: () => log,
  }
  return { log, errors }
}

describe('GracefulShutdown', () => {
  it('runs handlers in reverse registration order (LIFO)', async () => {
    const order: string[] = []
    const shutdown = createShutdownManager({ log: recordingLog().log })

    shutdown.register('ocr', () => { order.push('ocr') })
    shutdown.register('http', async () => { order.push('http') })

    await shutdown.shutdown()

    expect(order).toEqual(['http', 'ocr'])
  })

  it('keeps going when a handler fails, and logs the failure', async () => {
    const order: string[] = []
    const { log, errors } = recordingLog()
    const shutdown = createShutdownManager({ log })

    shutdown.register('first', () => { order.push('first') })
    shutdown.register('failing', async () => { throw new Error('worker already gone') })
    shutdown.register('third', () => { order.push('third') })

    await shutdown.shutdown()

    expect(order).toEqual(['third', 'first'])
    expect(errors).toHaveLength(1)
    expect(errors[0].message).toBe('Shutdown handler failed')
    expect(errors[0].context).toMatchObject({ handler: 'failing', error: 'worker already gone' })
  })

  it('ignores a second shutdown call', async () => {
    const handler = vi.fn()
    const shutdown = createShutdownManager({ log: recordingLog().log })
    shutdown.register('counter', handler)

    await shutdown.shutdown()
    await shutdown.shutdown()

    expect(handler).toHaveBeenCalledTimes(1)
    expect(shutdown.inProgress).toBe(true)
  })

  it('gives up on a hanging handler after the timeout', async () => {
    const { log, errors } = recordingLog()
    const shutdown = createShutdownManager({ timeoutMs: 100, log })
    shutdown.register('hanging', () => new Promise<void>(() => {}))

    const start = Date.now()
    await shutdown.shutdown()
    const elapsed = Date.now() - start

    expect(elapsed).toBeGreaterThanOrEqual(90)
    expect(elapsed).toBeLessThan(1000)
    expect(errors.map((e) => e.message)).toEqual(['Shutdown timed out, forcing exit'])
  })

  it('completes with no handlers', async () => {
    const shutdown = new GracefulShutdown({ log: recordingLog().log })
    await expect(shutdown.shutdown()).resolves.toBeUndefined()
  })
})
