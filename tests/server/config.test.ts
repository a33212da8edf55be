import { describe, it, expect, vi } from 'vitest'
import { resolve } from 'node:path'
import { ConfigError, loadConfig, parsePortArgument } from '../../captcha-ocr/config.ts'

vi.mock('../../captcha-ocr/utils/logger.ts', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../captcha-ocr/utils/logger.ts')>()
  return { ...actual, logger: new actual.Logger('error') }
})

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({}, [])
    expect(config).toEqual({
      port: 8080,
      host: '0.0.0.0',
      maxContentLength: 10 * 1024 * 1024,
      ocrConcurrency: 4,
      acquireTimeoutMs: 0,
      allowedOrigin: '*',
      prewarm: true,
      docsDir: resolve('docs'),
      ocrLanguage: 'eng',
    })
  })

  it('reads every setting from the environment', () => {
    const config = loadConfig(
      {
        PORT: '9000',
        HOST: '127.0.0.1',
        MAX_CONTENT_LENGTH: '2048',
        OCR_CONCURRENCY: '2',
        OCR_ACQUIRE_TIMEOUT_MS: '1500',
        ALLOWED_ORIGIN: 'https://app.example.test',
        PREWARM_OCR: 'false',
        DOCS_DIR: '/srv/docs',
        OCR_LANG: 'deu',
      },
      [],
    )
    expect(config).toEqual({
      port: 9000,
      host: '127.0.0.1',
      maxContentLength: 2048,
      ocrConcurrency: 2,
      acquireTimeoutMs: 1500,
      allowedOrigin: 'https://app.example.test',
      prewarm: false,
      docsDir: '/srv/docs',
      ocrLanguage: 'deu',
    })
  })

  it('lets the positional argument override PORT', () => {
    expect(loadConfig({ PORT: '9000' }, ['7000']).port).toBe(7000)
  })

  it('ignores flags when looking for the positional argument', () => {
    expect(loadConfig({}, ['--inspect', '7001']).port).toBe(7001)
  })

  it('falls back to the default port on an unusable argument', () => {
    expect(loadConfig({ PORT: '9000' }, ['abc']).port).toBe(8080)
    expect(loadConfig({}, ['70000']).port).toBe(8080)
  })

  it.each([
    ['1', true],
    ['true', true],
    ['YES', true],
    ['0', false],
    ['false', false],
    ['no', false],
  ])('parses PREWARM_OCR=%s as %s', (raw, expected) => {
    expect(loadConfig({ PREWARM_OCR: raw }, []).prewarm).toBe(expected)
  })

  it('treats blank variables as unset', () => {
    const config = loadConfig({ PORT: '', OCR_CONCURRENCY: '  ', ALLOWED_ORIGIN: '' }, [])
    expect(config.port).toBe(8080)
    expect(config.ocrConcurrency).toBe(4)
    expect(config.allowedOrigin).toBe('*')
  })

  it('returns a frozen value', () => {
    expect(Object.isFrozen(loadConfig({}, []))).toBe(true)
  })

  it('rejects invalid values with every offending setting listed', () => {
    let caught: unknown
    try {
      loadConfig({ OCR_CONCURRENCY: '0', MAX_CONTENT_LENGTH: 'lots' }, [])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ConfigError)
    if (!(caught instanceof ConfigError)) return
    expect(caught.issues).toHaveLength(2)
    expect(caught.issues.some((issue) => issue.startsWith('OCR_CONCURRENCY:'))).toBe(true)
    expect(caught.issues.some((issue) => issue.startsWith('MAX_CONTENT_LENGTH:'))).toBe(true)
  })

  it('rejects an out-of-range PORT', () => {
    expect(() => loadConfig({ PORT: '0' }, [])).toThrow(ConfigError)
  })
})

describe('parsePortArgument', () => {
  it('accepts ports in range', () => {
    expect(parsePortArgument('1', 8080)).toBe(1)
    expect(parsePortArgument('65535', 8080)).toBe(65535)
  })

  it('rejects non-integers', () => {
    expect(parsePortArgument('80.5', 8080)).toBe(8080)
    expect(parsePortArgument('1e3', 8080)).toBe(8080)
  })

  it('returns the fallback when absent', () => {
    expect(parsePortArgument(undefined, 1234)).toBe(1234)
  })
})
