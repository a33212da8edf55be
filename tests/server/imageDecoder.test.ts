import { describe, it, expect } from 'vitest'
import {
  decodeBase64,
  decodeImage,
  encodePng,
  normalizeBase64,
  stripDataUriHeader,
} from '../../captcha-ocr/ocr/imageDecoder.ts'
import sharp from 'sharp'
import { DecodeError, ImageError } from '../../captcha-ocr/errors.ts'
import { grayscalePng, palettePng, solidPng, solidPngBase64, solidPngDataUri } from '../fixtures/captchas.ts'

describe('stripDataUriHeader', () => {
  it('removes everything up to the first comma', () => {
    expect(stripDataUriHeader('data:image/png;base64,QUJD')).toBe('QUJD')
  })

  it('leaves bare base64 untouched', () => {
    expect(stripDataUriHeader('QUJD')).toBe('QUJD')
  })
})

describe('normalizeBase64', () => {
  it('restores missing padding', () => {
    expect(normalizeBase64('QUI')).toBe('QUI=')
    expect(normalizeBase64('QQ')).toBe('QQ==')
  })

  it('keeps correctly padded input', () => {
    expect(normalizeBase64('QUJD')).toBe('QUJD')
    expect(normalizeBase64('QQ==')).toBe('QQ==')
  })

  it('removes surrounding and embedded whitespace', () => {
    expect(normalizeBase64('  QUJD\nREVG\r\n ')).toBe('QUJDREVG')
  })

  it('rejects characters outside the base64 alphabet', () => {
    expect(() => normalizeBase64('not-base64!!')).toThrow(DecodeError)
  })

  it('rejects padding in the middle of the payload', () => {
    expect(() => normalizeBase64('QQ==QUJD')).toThrow(DecodeError)
  })

  it('rejects a length that no base64 string can have', () => {
    expect(() => normalizeBase64('QUJDR')).toThrow(DecodeError)
  })

  it('rejects an empty payload', () => {
    expect(() => normalizeBase64('data:image/png;base64,')).toThrow(DecodeError)
  })
})

describe('decodeBase64', () => {
  it('decodes text payloads', () => {
    expect(decodeBase64('data:text/plain;base64,aGVsbG8').toString('utf8')).toBe('hello')
  })
})

describe('decodeImage', () => {
  it('decodes a bare base64 PNG into RGB pixels', async () => {
    const image = await decodeImage(await solidPngBase64({ width: 8, height: 4 }))
    expect(image.width).toBe(8)
    expect(image.height).toBe(4)
    expect(image.channels).toBe(3)
    expect(image.data.length).toBe(8 * 4 * 3)
    expect([...image.data.subarray(0, 3)]).toEqual([10, 20, 30])
  })

  it('accepts a data URI', async () => {
    const image = await decodeImage(await solidPngDataUri({ width: 3, height: 2 }))
    expect(image.width).toBe(3)
    expect(image.height).toBe(2)
  })

  it('flattens transparent pixels onto white', async () => {
    const png = await solidPng({ channels: 4, background: { r: 255, g: 0, b: 0, alpha: 0 } })
    const image = await decodeImage(png.toString('base64'))
    expect(image.channels).toBe(3)
    expect([...image.data.subarray(0, 3)]).toEqual([255, 255, 255])
  })

  it('expands grayscale sources to three channels', async () => {
    const image = await decodeImage((await grayscalePng(6, 3)).toString('base64'))
    expect(image.channels).toBe(3)
    expect(image.data.length).toBe(6 * 3 * 3)
  })

  it('expands palette sources to three channels', async () => {
    const image = await decodeImage((await palettePng(5, 5)).toString('base64'))
    expect(image.channels).toBe(3)
    expect(image.data.length).toBe(5 * 5 * 3)
  })

  it('fails with DecodeError on invalid base64', async () => {
    await expect(decodeImage('not-base64!!')).rejects.toBeInstanceOf(DecodeError)
  })

  it('fails with ImageError when the bytes are not an image', async () => {
    const payload = Buffer.from('definitely not a picture').toString('base64')
    await expect(decodeImage(payload)).rejects.toBeInstanceOf(ImageError)
    await expect(decodeImage(payload)).rejects.toThrow('unrecognized image format')
  })

  it('rejects vector images even though they could be rasterized', async () => {
    const svg =
      '<svg xmlns="http://www.w3.org/2000/svg" width="4" height="2">' +
      '<rect width="4" height="2" fill="#000"/></svg>'
    const decoding = decodeImage(Buffer.from(svg).toString('base64'))
    await expect(decoding).rejects.toBeInstanceOf(ImageError)
    await expect(decoding).rejects.toThrow('unrecognized image format')
  })

  it('accepts JPEG sources', async () => {
    const jpeg = await sharp({ create: { width: 4, height: 2, channels: 3, background: { r: 0, g: 0, b: 0 } } })
      .jpeg()
      .toBuffer()
    const image = await decodeImage(jpeg.toString('base64'))
    expect(image.width).toBe(4)
    expect(image.height).toBe(2)
  })

  it('fails with ImageError when the decoded image exceeds the limit', async () => {
    const payload = await solidPngBase64()
    const decoding = decodeImage(payload, { maxImageBytes: 10 })
    await expect(decoding).rejects.toBeInstanceOf(ImageError)
    await expect(decoding).rejects.toThrow('decoded image is too large')
  })
})

describe('encodePng', () => {
  it('re-encodes a decoded image as PNG', async () => {
    const image = await decodeImage(await solidPngBase64({ width: 4, height: 4 }))
    const png = await encodePng(image)
    expect([...png.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47])
    const again = await decodeImage(png.toString('base64'))
    expect([...again.data]).toEqual([...image.data])
  })
})
