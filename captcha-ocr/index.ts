/**
 * Wires configuration, engine, pipeline and HTTP into one app.
 */

import type { ServiceConfig } from './config.ts'
import { createHttpService } from './http/httpService.ts'
import { TesseractEngine } from './ocr/tesseractEngine.ts'
import type { RecognitionEngine } from './ocr/recognizer.ts'
import { CaptchaService } from './service/CaptchaService.ts'
import { errorFields, logger } from './utils/logger.ts'

export { loadConfig, ConfigError, type ServiceConfig } from './config.ts'
export type { RecognitionEngine, RecognitionResult } from './ocr/recognizer.ts'
export type { DecodedImage } from './ocr/imageDecoder.ts'
export type { ResponseEnvelope } from './http/envelope.ts'

const log = logger.child({ component: 'app' })

export interface CaptchaAppOptions {
  /** Defaults to a tesseract.js engine in the configured language. */
  engine?: RecognitionEngine
}

export function createCaptchaApp(config: ServiceConfig, options: CaptchaAppOptions = {}) {
  const engine = options.engine ?? new TesseractEngine({ language: config.ocrLanguage })

  const service = new CaptchaService(engine, {
    concurrency: config.ocrConcurrency,
    acquireTimeoutMs: config.acquireTimeoutMs,
    maxImageBytes: config.maxContentLength,
  })

  const httpService = createHttpService(service, {
    port: config.port,
    host: config.host,
    maxContentLength: config.maxContentLength,
    allowedOrigin: config.allowedOrigin,
    docsDir: config.docsDir,
  })

  /** Start listening; warm-up runs in the background and never blocks startup. */
  async function start(): Promise<void> {
    await httpService.start()

    if (config.prewarm) {
      const startedAt = Date.now()
      service
        .warmUp()
        .then(() => log.info('OCR warm-up complete', { durationMs: Date.now() - startedAt }))
        .catch((err: unknown) => log.warn('OCR warm-up failed, continuing without it', errorFields(err)))
    }
  }

  return { service, httpService, start }
}

export type CaptchaApp = ReturnType<typeof createCaptchaApp>
