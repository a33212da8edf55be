/**
 * Service configuration, read once at startup.
 *
 * Values come from the environment, except the port which a positional launch
 * argument overrides (`tsx server/main.ts 9000`). The result is frozen and
 * handed to each component explicitly.
 */

import { resolve } from 'node:path'
import { z } from 'zod'
import { logger } from './utils/logger.ts'

export const DEFAULT_PORT = 8080
export const DEFAULT_MAX_CONTENT_LENGTH = 10 * 1024 * 1024
export const DEFAULT_OCR_CONCURRENCY = 4

export interface ServiceConfig {
  readonly port: number
  readonly host: string
  /** Maximum request body size in bytes. */
  readonly maxContentLength: number
  /** Permits of the concurrency gate. */
  readonly ocrConcurrency: number
  /** Maximum wait for a permit; 0 waits forever. */
  readonly acquireTimeoutMs: number
  readonly allowedOrigin: string
  /** Create the OCR worker at startup instead of on the first request. */
  readonly prewarm: boolean
  readonly docsDir: string
  readonly ocrLanguage: string
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

/** Blank variables count as unset. */
const unsetIfBlank = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const portSchema = z.coerce.number().int().min(1).max(65535)

const flagSchema = z
  .string()
  .transform((raw) => ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase()))

const envSchema = z.object({
  PORT: z.preprocess(unsetIfBlank, portSchema.default(DEFAULT_PORT)),
  HOST: z.preprocess(unsetIfBlank, z.string().default('0.0.0.0')),
  MAX_CONTENT_LENGTH: z.preprocess(
    unsetIfBlank,
    z.coerce.number().int().positive().default(DEFAULT_MAX_CONTENT_LENGTH),
  ),
  OCR_CONCURRENCY: z.preprocess(
    unsetIfBlank,
    z.coerce.number().int().positive().default(DEFAULT_OCR_CONCURRENCY),
  ),
  OCR_ACQUIRE_TIMEOUT_MS: z.preprocess(unsetIfBlank, z.coerce.number().int().min(0).default(0)),
  ALLOWED_ORIGIN: z.preprocess(unsetIfBlank, z.string().default('*')),
  PREWARM_OCR: z.preprocess(unsetIfBlank, flagSchema.default('true')),
  DOCS_DIR: z.preprocess(unsetIfBlank, z.string().default('./docs')),
  OCR_LANG: z.preprocess(unsetIfBlank, z.string().default('eng')),
})

/**
 * Parse the optional positional port argument. An unusable value falls back
 * to `fallback` with a warning rather than aborting startup.
 */
export function parsePortArgument(arg: string | undefined, fallback: number): number {
  if (arg === undefined) return fallback
  const parsed = portSchema.safeParse(arg)
  if (parsed.success && /^\d+$/.test(arg.trim())) return parsed.data
  logger.warn('Invalid port argument, using default', { argument: arg, port: fallback })
  return fallback
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv.slice(2),
): ServiceConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const vars = parsed.data
  const positional = argv.find((arg) => !arg.startsWith('-'))

  return Object.freeze({
    port: positional === undefined ? vars.PORT : parsePortArgument(positional, DEFAULT_PORT),
    host: vars.HOST,
    maxContentLength: vars.MAX_CONTENT_LENGTH,
    ocrConcurrency: vars.OCR_CONCURRENCY,
    acquireTimeoutMs: vars.OCR_ACQUIRE_TIMEOUT_MS,
    allowedOrigin: vars.ALLOWED_ORIGIN.trim(),
    prewarm: vars.PREWARM_OCR,
    docsDir: resolve(vars.DOCS_DIR),
    ocrLanguage: vars.OCR_LANG,
  })
}
