/**
 * Request body reading and JSON validation for POST /recognize.
 */

import type { IncomingMessage } from 'node:http'
import { z } from 'zod'
import { BodyTooLargeError, MalformedRequestError, RequestTimeoutError } from '../errors.ts'

/** Maximum time (ms) to wait for the full request body. */
export const BODY_TIMEOUT_MS = 30_000

/** Shorter payloads cannot hold any usable image. */
export const MIN_BASE64_LENGTH = 10

export interface ReadBodyOptions {
  maxBytes: number
  timeoutMs?: number
}

/**
 * Collect the body, failing fast on an oversized Content-Length and cutting
 * off a streamed body once it crosses `maxBytes`. The rest of an oversized
 * body is drained and discarded so the response can still be delivered.
 */
export function readBody(req: IncomingMessage, options: ReadBodyOptions): Promise<Buffer> {
  const { maxBytes } = options
  const timeoutMs = options.timeoutMs ?? BODY_TIMEOUT_MS

  const declared = req.headers['content-length']
  if (declared !== undefined && parseInt(declared, 10) > maxBytes) {
    req.resume()
    return Promise.reject(new BodyTooLargeError(maxBytes))
  }

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = []
    let size = 0
    let settled = false

    const finish = (err: Error | null, body?: Buffer) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      req.off('data', onData)
      if (err) reject(err)
      else resolve(body ?? Buffer.alloc(0))
    }

    const timer = setTimeout(() => {
      finish(new RequestTimeoutError())
      req.resume()
    }, timeoutMs)

    const onData = (chunk: Buffer) => {
      size += chunk.length
      if (size > maxBytes) {
        finish(new BodyTooLargeError(maxBytes))
        req.resume()
        return
      }
      chunks.push(chunk)
    }

    req.on('data', onData)
    req.on('end', () => finish(null, Buffer.concat(chunks, size)))
    req.on('error', (err) => finish(err))
  })
}

const recognizeBodySchema = z.object(
  {
    base64: z.string({
      required_error: 'missing base64 field',
      invalid_type_error: 'base64 field must be a string',
    }),
  },
  { invalid_type_error: 'request body must be a JSON object' },
)

export type RecognizeBody = z.infer<typeof recognizeBodySchema>

/** Parse and validate the raw body of a recognition request. */
export function parseRecognizeBody(raw: Buffer): RecognizeBody {
  const text = raw.toString('utf8')
  if (text.trim() === '') {
    throw new MalformedRequestError('request body is empty')
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    throw new MalformedRequestError('request body is not valid JSON')
  }

  const parsed = recognizeBodySchema.safeParse(json)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    throw new MalformedRequestError(first?.message ?? 'invalid request body')
  }

  if (parsed.data.base64.trim().length < MIN_BASE64_LENGTH) {
    throw new MalformedRequestError('base64 string is invalid or too short')
  }

  return parsed.data
}
