/**
 * Failure taxonomy of the recognition pipeline.
 *
 * Every error a client can see is a `ServiceError`: it carries the HTTP status
 * it maps to and a message that is safe to return verbatim. Underlying causes
 * (sharp, the OCR worker) stay on `cause` and only reach the logs.
 */

export type ServiceErrorKind =
  | 'malformed_request'
  | 'decode_failure'
  | 'unreadable_image'
  | 'body_too_large'
  | 'request_timeout'
  | 'overloaded'
  | 'engine_failure'
  | 'not_found'
  | 'method_not_allowed'
  | 'internal'

export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly kind: ServiceErrorKind,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ServiceError'
  }
}

export class MalformedRequestError extends ServiceError {
  constructor(message: string) {
    super(message, 'malformed_request', 400)
    this.name = 'MalformedRequestError'
  }
}

/** The payload is not valid base64. */
export class DecodeError extends ServiceError {
  constructor(message = 'base64 decoding failed', options?: { cause?: unknown }) {
    super(message, 'decode_failure', 400, options)
    this.name = 'DecodeError'
  }
}

/** The decoded bytes are not an image we can read. */
export class ImageError extends ServiceError {
  constructor(message = 'unrecognized image format', options?: { cause?: unknown }) {
    super(message, 'unreadable_image', 400, options)
    this.name = 'ImageError'
  }
}

export class BodyTooLargeError extends ServiceError {
  constructor(public readonly limit: number) {
    super(`request body too large (limit ${limit} bytes)`, 'body_too_large', 413)
    this.name = 'BodyTooLargeError'
  }
}

export class RequestTimeoutError extends ServiceError {
  constructor() {
    super('request body timed out', 'request_timeout', 408)
    this.name = 'RequestTimeoutError'
  }
}

export class OverloadedError extends ServiceError {
  constructor(
    public readonly retryAfterSeconds: number,
    options?: { cause?: unknown },
  ) {
    super('recognition service is busy, try again later', 'overloaded', 503, options)
    this.name = 'OverloadedError'
  }
}

/** The OCR engine raised. */
export class RecognitionError extends ServiceError {
  constructor(options?: { cause?: unknown }) {
    super('recognition failed', 'engine_failure', 500, options)
    this.name = 'RecognitionError'
  }
}

export class NotFoundError extends ServiceError {
  constructor(message = 'endpoint not found') {
    super(message, 'not_found', 404)
    this.name = 'NotFoundError'
  }
}

export class MethodNotAllowedError extends ServiceError {
  constructor(public readonly allow: readonly string[]) {
    super('method not allowed', 'method_not_allowed', 405)
    this.name = 'MethodNotAllowedError'
  }
}

/** Wrap anything thrown into a `ServiceError`, hiding unexpected details. */
export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) return err
  return new ServiceError('internal server error', 'internal', 500, { cause: err })
}
