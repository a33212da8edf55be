/**
 * The uniform JSON wrapper for /recognize and every error response.
 *
 * `success: true` always comes with code 200 and a result; failures always
 * carry `data: null`. Field names are part of the public API.
 */

import type { RecognitionResult } from '../ocr/recognizer.ts'
import type { ServiceError } from '../errors.ts'

export interface SuccessEnvelope {
  success: true
  code: 200
  message: string
  request_id: string
  data: RecognitionResult
}

export interface ErrorEnvelope {
  success: false
  code: number
  message: string
  request_id: string
  data: null
}

export type ResponseEnvelope = SuccessEnvelope | ErrorEnvelope

export function successEnvelope(requestId: string, result: RecognitionResult): SuccessEnvelope {
  return {
    success: true,
    code: 200,
    message: 'recognized',
    request_id: requestId,
    data: {
      captcha: result.captcha,
      time_ms: result.time_ms,
      length: result.length,
    },
  }
}

export function errorEnvelope(requestId: string, error: ServiceError): ErrorEnvelope {
  return {
    success: false,
    code: error.status,
    message: error.message,
    request_id: requestId,
    data: null,
  }
}
