import { createCaptchaApp, loadConfig, ConfigError } from '../captcha-ocr/index.ts'
import { logger } from '../captcha-ocr/utils/logger.ts'
import { createShutdownManager } from '../captcha-ocr/utils/shutdown.ts'

function readConfig() {
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Invalid configuration', { issues: err.issues })
      process.exit(1)
    }
    throw err
  }
}

const config = readConfig()
const app = createCaptchaApp(config)

const shutdown = createShutdownManager()
shutdown.register('ocr', () => app.service.close())
shutdown.register('http', () => app.httpService.stop())
shutdown.installSignalHandlers()

app.start().then(() => {
  logger.info('Server started', {
    host: config.host,
    port: app.httpService.port,
    maxContentLength: config.maxContentLength,
    ocrConcurrency: config.ocrConcurrency,
    acquireTimeoutMs: config.acquireTimeoutMs,
    allowedOrigin: config.allowedOrigin,
    prewarm: config.prewarm,
    nodeVersion: process.version,
    logLevel: process.env.LOG_LEVEL ?? 'info',
  })
}).catch((err: unknown) => {
  logger.error('Server failed to start', {
    error: err instanceof Error ? err.message : String(err),
  })
  process.exit(1)
})
