/**
 * HTTP service: the recognition API, health check, status page and docs.
 *
 * Plain node:http with hand routing. Every response carries CORS headers and
 * an `X-Request-Id`; failures become JSON envelopes built from a
 * `ServiceError`. Stack traces stay in the log.
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'node:http'
import { readFile, stat } from 'node:fs/promises'
import { extname, resolve, sep } from 'node:path'
import type { CaptchaService } from '../service/CaptchaService.ts'
import { DEFAULT_MAX_CONTENT_LENGTH, DEFAULT_PORT } from '../config.ts'
import {
  BodyTooLargeError,
  MethodNotAllowedError,
  NotFoundError,
  OverloadedError,
  toServiceError,
} from '../errors.ts'
import { readBody, parseRecognizeBody, BODY_TIMEOUT_MS } from './body.ts'
import { setCorsHeaders } from './cors.ts'
import { errorEnvelope, successEnvelope } from './envelope.ts'
import { createRequestId, getClientRequestId } from './requestId.ts'
import { renderStatusPage } from './statusPage.ts'
import { errorFields, logger, type LogSink } from '../utils/logger.ts'

const log = logger.child({ component: 'http' })

const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.js': 'application/javascript',
  '.css': 'text/css',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.ico': 'image/x-icon',
}

export interface HttpServiceOptions {
  port?: number
  host?: string
  maxContentLength?: number
  allowedOrigin?: string
  docsDir?: string
  bodyTimeoutMs?: number
}

interface RequestContext {
  req: IncomingMessage
  res: ServerResponse
  path: string
  requestId: string
  log: LogSink
}

export function createHttpService(service: CaptchaService, options: HttpServiceOptions = {}) {
  const port = options.port ?? DEFAULT_PORT
  const host = options.host ?? '0.0.0.0'
  const maxContentLength = options.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH
  const allowedOrigin = options.allowedOrigin ?? '*'
  const docsDir = options.docsDir ? resolve(options.docsDir) : undefined
  const bodyTimeoutMs = options.bodyTimeoutMs ?? BODY_TIMEOUT_MS
  const startedAt = new Date()

  function sendJson(res: ServerResponse, data: unknown, status = 200, headers: Record<string, string> = {}) {
    res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8', ...headers })
    res.end(JSON.stringify(data))
  }

  function sendError(ctx: RequestContext, err: unknown) {
    const error = toServiceError(err)
    const cause = error.cause === undefined ? {} : errorFields(error.cause)

    if (error.status >= 500) {
      ctx.log.error('Request failed', { status: error.status, kind: error.kind, ...cause })
    } else {
      ctx.log.warn('Request rejected', { status: error.status, kind: error.kind, reason: error.message })
    }

    if (ctx.res.headersSent) {
      ctx.res.destroy()
      return
    }

    const headers: Record<string, string> = {}
    if (error instanceof OverloadedError) headers['Retry-After'] = String(error.retryAfterSeconds)
    if (error instanceof MethodNotAllowedError) headers['Allow'] = error.allow.join(', ')
    if (error instanceof BodyTooLargeError) headers['Connection'] = 'close'

    sendJson(ctx.res, errorEnvelope(ctx.requestId, error), error.status, headers)
  }

  async function serveDocs(urlPath: string, res: ServerResponse, reqLog: LogSink): Promise<boolean> {
    if (!docsDir) return false

    let relative: string
    try {
      relative = decodeURIComponent(urlPath.slice('/docs/'.length))
    } catch {
      return false
    }

    const filePath = resolve(docsDir, relative === '' ? 'index.html' : relative)
    // Ensure resolved path stays within docsDir
    if (!filePath.startsWith(docsDir + sep)) {
      reqLog.warn('Rejected docs path outside the docs directory', { path: urlPath })
      return false
    }

    try {
      const fileStat = await stat(filePath)
      if (!fileStat.isFile()) return false
    } catch (err) {
      reqLog.debug('Docs file not found', { path: urlPath, ...errorFields(err) })
      return false
    }

    const content = await readFile(filePath)
    const contentType = MIME_TYPES[extname(filePath)] ?? 'application/octet-stream'
    res.writeHead(200, { 'Content-Type': contentType })
    res.end(content)
    return true
  }

  async function handleRecognize(ctx: RequestContext): Promise<void> {
    const raw = await readBody(ctx.req, { maxBytes: maxContentLength, timeoutMs: bodyTimeoutMs })
    const { base64 } = parseRecognizeBody(raw)
    const result = await service.recognize(base64, ctx.log)

    ctx.log.info('Captcha recognized', {
      captcha: result.captcha,
      length: result.length,
      timeMs: result.time_ms,
    })
    sendJson(ctx.res, successEnvelope(ctx.requestId, result))
  }

  async function route(ctx: RequestContext): Promise<void> {
    const { req, res, path } = ctx

    // CORS preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204)
      res.end()
      return
    }

    if (path === '/recognize') {
      if (req.method !== 'POST') throw new MethodNotAllowedError(['POST', 'OPTIONS'])
      await handleRecognize(ctx)
      return
    }

    // HEAD shares the GET routes; node:http drops the body.
    if (req.method !== 'GET' && req.method !== 'HEAD') throw new NotFoundError()

    if (path === '/') {
      const baseUrl = `http://${req.headers.host ?? `localhost:${svc.port}`}`
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' })
      res.end(renderStatusPage({
        baseUrl,
        startedAt,
        maxContentLength,
        ocrConcurrency: service.gate.permits,
      }))
      return
    }

    if (path === '/health') {
      sendJson(res, {
        status: 'ok',
        service: 'captcha-ocr',
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      })
      return
    }

    if (path === '/docs') {
      res.writeHead(301, { Location: '/docs/' })
      res.end()
      return
    }

    if (path.startsWith('/docs/')) {
      const served = await serveDocs(path, res, ctx.log)
      if (!served) throw new NotFoundError('resource not found')
      return
    }

    throw new NotFoundError()
  }

  function handleRequest(req: IncomingMessage, res: ServerResponse) {
    const startTime = Date.now()
    const requestId = createRequestId()
    const clientRequestId = getClientRequestId(req)
    const reqLog = log.child(clientRequestId ? { requestId, clientRequestId } : { requestId })

    let path = '/'
    try {
      path = new URL(req.url ?? '/', 'http://localhost').pathname
    } catch {
      path = req.url ?? '/'
    }

    res.setHeader('X-Request-Id', requestId)
    setCorsHeaders(res, allowedOrigin)

    // Log response when finished
    res.on('finish', () => {
      if (path === '/health') return
      reqLog.info('request', {
        method: req.method,
        path,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      })
    })

    const ctx: RequestContext = { req, res, path, requestId, log: reqLog }
    route(ctx).catch((err: unknown) => sendError(ctx, err))
  }

  const server = createServer(handleRequest)

  const svc = {
    start() {
      return new Promise<void>((resolveStart, rejectStart) => {
        server.once('error', rejectStart)
        server.listen(port, host, () => {
          server.off('error', rejectStart)
          // After listening, capture the actual port (important when port 0 is used)
          const addr = server.address()
          if (addr && typeof addr === 'object') {
            svc.port = addr.port
          }
          resolveStart()
        })
      })
    },
    stop() {
      return new Promise<void>((resolveStop, rejectStop) => {
        server.close((err) => (err ? rejectStop(err) : resolveStop()))
        server.closeIdleConnections()
      })
    },
    server,
    port,
  }

  return svc
}

export type HttpService = ReturnType<typeof createHttpService>
