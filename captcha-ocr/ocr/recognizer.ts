import { performance } from 'node:perf_hooks'
import { RecognitionError } from '../errors.ts'
import type { DecodedImage } from './imageDecoder.ts'

/** Anything that maps an image to candidate text. */
export interface RecognitionEngine {
  recognize(image: DecodedImage): Promise<string>
  /** Load models ahead of the first request. */
  warmUp?(): Promise<void>
  terminate?(): Promise<void>
}

export interface RecognitionResult {
  readonly captcha: string
  readonly time_ms: number
  readonly length: number
}

const NON_ALPHANUMERIC = /[^A-Za-z0-9]/g

export function filterCaptcha(raw: unknown): string {
  if (raw === null || raw === undefined) return ''
  return String(raw).replace(NON_ALPHANUMERIC, '')
}

/**
 * Run the engine once, timing only the engine call. An empty string after
 * filtering is a valid (if useless) result; only engine exceptions fail.
 */
export async function recognizeCaptcha(
  engine: RecognitionEngine,
  image: DecodedImage,
): Promise<RecognitionResult> {
  const start = performance.now()
  let raw: unknown
  try {
    raw = await engine.recognize(image)
  } catch (err) {
    throw new RecognitionError({ cause: err })
  }
  const elapsed = performance.now() - start

  const captcha = filterCaptcha(raw)
  return Object.freeze({
    captcha,
    time_ms: Math.round(elapsed * 100) / 100,
    length: captcha.length,
  })
}
