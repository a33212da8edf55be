/**
 * Base64 payload → raw RGB bitmap.
 *
 * Accepts bare base64 or a data URI (`data:image/png;base64,...`). Whatever
 * the source format (palette, grayscale, alpha), the output is three 8-bit
 * channels: alpha is flattened onto white and the result converted to sRGB.
 */

import sharp from 'sharp'
import { DecodeError, ImageError } from '../errors.ts'

export interface DecodedImage {
  /** Interleaved RGB pixels, row-major, `width * height * 3` bytes. */
  readonly data: Buffer
  readonly width: number
  readonly height: number
  readonly channels: 3
}

export interface DecodeOptions {
  /** Upper bound on the decoded byte size, before pixel decoding. */
  maxImageBytes?: number
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/

/** Raster formats accepted from clients. AVIF reports itself as heif. */
const RASTER_FORMATS: ReadonlySet<string> = new Set(['png', 'jpeg', 'gif', 'webp', 'tiff', 'heif'])

/** Drop a data-URI header: everything up to and including the first comma. */
export function stripDataUriHeader(payload: string): string {
  const comma = payload.indexOf(',')
  return comma === -1 ? payload : payload.slice(comma + 1)
}

/**
 * Normalize a payload to strict, padded base64, or throw `DecodeError`.
 */
export function normalizeBase64(payload: string): string {
  const body = stripDataUriHeader(payload.trim()).replace(/\s+/g, '')
  const unpadded = body.replace(/=+$/, '')

  if (unpadded.length === 0 || unpadded.length % 4 === 1) {
    throw new DecodeError()
  }

  const padded = unpadded + '='.repeat((4 - (unpadded.length % 4)) % 4)
  if (!BASE64_RE.test(padded)) {
    throw new DecodeError()
  }
  return padded
}

export function decodeBase64(payload: string): Buffer {
  const bytes = Buffer.from(normalizeBase64(payload), 'base64')
  if (bytes.length === 0) throw new DecodeError()
  return bytes
}

export async function decodeImage(payload: string, options: DecodeOptions = {}): Promise<DecodedImage> {
  const bytes = decodeBase64(payload)

  if (options.maxImageBytes !== undefined && bytes.length > options.maxImageBytes) {
    throw new ImageError('decoded image is too large')
  }

  try {
    const { format } = await sharp(bytes).metadata()
    if (format === undefined || !RASTER_FORMATS.has(format)) {
      throw new Error(`unsupported image format ${format ?? 'unknown'}`)
    }

    const { data, info } = await sharp(bytes)
      .flatten({ background: '#ffffff' })
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true })

    if (info.channels !== 3) {
      throw new Error(`unexpected channel count ${info.channels}`)
    }

    return { data, width: info.width, height: info.height, channels: 3 }
  } catch (err) {
    throw new ImageError(undefined, { cause: err })
  }
}

/** Re-encode a decoded bitmap as PNG, for engines that take encoded images. */
export function encodePng(image: DecodedImage): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })
    .png()
    .toBuffer()
}
