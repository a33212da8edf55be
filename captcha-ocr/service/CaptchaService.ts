/**
 * CaptchaService: the recognition pipeline behind POST /recognize.
 *
 * decode → wait for a gate permit → run the engine → filter. Decoding happens
 * before the gate so malformed uploads never occupy a permit.
 */

import { ConcurrencyGate, GateTimeoutError } from '../ocr/concurrencyGate.ts'
import { decodeImage } from '../ocr/imageDecoder.ts'
import { recognizeCaptcha, type RecognitionEngine, type RecognitionResult } from '../ocr/recognizer.ts'
import { OverloadedError } from '../errors.ts'
import { logger, type LogSink } from '../utils/logger.ts'

export interface CaptchaServiceOptions {
  /** Simultaneous engine calls. */
  concurrency: number
  /** Maximum wait for a permit; 0 or absent waits forever. */
  acquireTimeoutMs?: number
  /** Limit on the decoded image size in bytes. */
  maxImageBytes?: number
}

export class CaptchaService {
  readonly gate: ConcurrencyGate

  private readonly engine: RecognitionEngine
  private readonly acquireTimeoutMs: number
  private readonly maxImageBytes: number | undefined

  constructor(engine: RecognitionEngine, options: CaptchaServiceOptions) {
    this.engine = engine
    this.gate = new ConcurrencyGate(options.concurrency)
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 0
    this.maxImageBytes = options.maxImageBytes
  }

  async recognize(payload: string, log: LogSink = logger): Promise<RecognitionResult> {
    const image = await decodeImage(payload, { maxImageBytes: this.maxImageBytes })
    log.debug('Image decoded', { width: image.width, height: image.height })

    if (this.gate.available === 0) {
      log.debug('Waiting for recognition permit', { pending: this.gate.pending + 1 })
    }

    try {
      return await this.gate.run(
        () => recognizeCaptcha(this.engine, image),
        this.acquireTimeoutMs > 0 ? this.acquireTimeoutMs : undefined,
      )
    } catch (err) {
      if (err instanceof GateTimeoutError) {
        throw new OverloadedError(Math.max(1, Math.ceil(err.timeoutMs / 1000)), { cause: err })
      }
      throw err
    }
  }

  /** Load the engine ahead of traffic. Engines without a warm-up step are a no-op. */
  async warmUp(): Promise<void> {
    if (this.engine.warmUp) await this.engine.warmUp()
  }

  async close(): Promise<void> {
    if (this.engine.terminate) await this.engine.terminate()
  }
}
