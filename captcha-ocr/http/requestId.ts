/**
 * Request correlation IDs.
 *
 * The server always mints its own ID so two requests can never share one,
 * even when a client replays the same `x-request-id`. A client-supplied value
 * is kept separately and logged next to ours.
 */

import { randomUUID } from 'node:crypto'
import type { IncomingMessage } from 'node:http'

export function createRequestId(): string {
  return randomUUID()
}

/** The caller's own `x-request-id`, if it sent a usable one. */
export function getClientRequestId(req: IncomingMessage): string | undefined {
  const header = req.headers['x-request-id']
  if (typeof header === 'string' && header.length > 0 && header.length <= 200) {
    return header
  }
  return undefined
}
