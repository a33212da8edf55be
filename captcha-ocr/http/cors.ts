/**
 * CORS headers for a single configured origin.
 *
 * `*` opens the API to every site. Any other value is echoed verbatim and,
 * since it names one origin, credentials are allowed as well.
 */

import type { ServerResponse } from 'node:http'

export const ALLOWED_METHODS = 'GET, POST, OPTIONS'
export const ALLOWED_HEADERS = 'Content-Type, Authorization, X-Request-Id'

export function setCorsHeaders(res: ServerResponse, allowedOrigin: string): void {
  res.setHeader('Access-Control-Allow-Origin', allowedOrigin)
  res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS)
  res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS)
  res.setHeader('Access-Control-Expose-Headers', 'X-Request-Id')

  if (allowedOrigin !== '*') {
    res.setHeader('Access-Control-Allow-Credentials', 'true')
    res.setHeader('Vary', 'Origin')
  }
}
