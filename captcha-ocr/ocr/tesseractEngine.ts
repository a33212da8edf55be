/**
 * Production recognition engine backed by tesseract.js.
 *
 * One worker per engine, created on first use (or by `warmUp()`); concurrent
 * first calls share the same creation promise. The worker is restricted to
 * letters and digits and reads the image as a single text line, which is how
 * CAPTCHAs are laid out.
 *
 * English language data ships with the `@tesseract.js-data/eng` package, so
 * the default engine never fetches traineddata at startup.
 */

import { createRequire } from 'node:module'
import { dirname } from 'node:path'
import { createWorker, OEM, PSM, type Worker, type WorkerOptions } from 'tesseract.js'
import { encodePng, type DecodedImage } from './imageDecoder.ts'
import type { RecognitionEngine } from './recognizer.ts'
import { logger } from '../utils/logger.ts'

const log = logger.child({ component: 'tesseract' })
const require = createRequire(import.meta.url)

const CAPTCHA_WHITELIST = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'

/** Directory of the LSTM model bundled for `language`, if one is installed. */
export function bundledLangPath(language: string): string | undefined {
  if (language !== 'eng') return undefined
  return dirname(require.resolve('@tesseract.js-data/eng/4.0.0_best_int/eng.traineddata.gz'))
}

export interface TesseractEngineOptions {
  language?: string
  /** Directory holding `<lang>.traineddata.gz`; defaults to the bundled data. */
  langPath?: string
}

export class TesseractEngine implements RecognitionEngine {
  private readonly language: string
  private readonly langPath: string | undefined
  private workerPromise: Promise<Worker> | null = null

  constructor(options: TesseractEngineOptions = {}) {
    this.language = options.language ?? 'eng'
    this.langPath = options.langPath ?? bundledLangPath(this.language)
  }

  private getWorker(): Promise<Worker> {
    if (this.workerPromise) return this.workerPromise

    const startedAt = Date.now()
    const workerOptions: Partial<WorkerOptions> = this.langPath ? { langPath: this.langPath } : {}
    const creation: Promise<Worker> = createWorker(this.language, OEM.LSTM_ONLY, workerOptions)
      .then(async (worker) => {
        await worker.setParameters({
          tessedit_char_whitelist: CAPTCHA_WHITELIST,
          tessedit_pageseg_mode: PSM.SINGLE_LINE,
        })
        log.info('OCR worker ready', {
          language: this.language,
          langPath: this.langPath ?? 'remote',
          durationMs: Date.now() - startedAt,
        })
        return worker
      })
      .catch((err: unknown) => {
        // Let the next call try again instead of caching the failure.
        if (this.workerPromise === creation) this.workerPromise = null
        throw err
      })

    this.workerPromise = creation
    return creation
  }

  async warmUp(): Promise<void> {
    await this.getWorker()
  }

  async recognize(image: DecodedImage): Promise<string> {
    const worker = await this.getWorker()
    const png = await encodePng(image)
    const { data } = await worker.recognize(png)
    return data.text
  }

  /** Stop the worker, waiting for a creation still in flight. */
  async terminate(): Promise<void> {
    const pending = this.workerPromise
    this.workerPromise = null
    if (!pending) return
    const worker = await pending
    await worker.terminate()
  }
}
