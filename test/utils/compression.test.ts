import { describe, it, expect } from 'vitest'
import pako from 'pako'
import { CompressionError } from '../../src/errors'
import { adler32, inflateBytes, inflateStream, parseZlibEnvelope } from '../../src/utils/compression'
import { bytes, concat, storedZlib } from '../helpers/fixtures'

describe('inflateBytes', () => {
  it('inflates a complete stream', () => {
    expect(inflateBytes(pako.deflate(bytes('packed')))).toEqual(bytes('packed'))
  })

  it('raises CompressionError on garbage', () => {
    expect(() => inflateBytes(bytes('not zlib at all'))).toThrow(CompressionError)
  })
})

describe('adler32', () => {
  it('matches the reference value', () => {
    expect(adler32(bytes('Wikipedia'))).toBe(0x11e60398)
    expect(adler32(new Uint8Array(0))).toBe(1)
  })
})

describe('inflateStream', () => {
  it('reports how many bytes the stream used', () => {
    const first = pako.deflate(bytes('first'))
    const second = pako.deflate(bytes('second stream'))
    const buffer = concat(bytes('xyz'), first, second)

    const a = inflateStream(buffer, 3)
    expect(a.data).toEqual(bytes('first'))
    expect(a.consumed).toBe(first.length)

    const b = inflateStream(buffer, 3 + a.consumed)
    expect(b.data).toEqual(bytes('second stream'))
    expect(b.consumed).toBe(second.length)
  })

  it('stops at the end of a stream followed by non-zero bytes', () => {
    const stream = pako.deflate(bytes('entry'))
    const buffer = concat(stream, new Uint8Array([0x95, 0x0a, 0x78, 0x9c]))
    const result = inflateStream(buffer, 0)
    expect(result.data).toEqual(bytes('entry'))
    expect(result.consumed).toBe(stream.length)
  })

  it('rejects a bad zlib header', () => {
    expect(() => inflateStream(new Uint8Array([0x12, 0x34, 0x00, 0x00]), 0)).toThrow('incorrect header check')
  })

  it('rejects a corrupted checksum', () => {
    const stream = pako.deflate(bytes('checked'))
    stream[stream.length - 1] ^= 0xff
    expect(() => inflateStream(stream, 0)).toThrow('incorrect data check')
  })

  it('rejects a stream cut short', () => {
    const stream = pako.deflate(bytes('this stream will be truncated'))
    const error = (() => {
      try {
        inflateStream(stream.subarray(0, stream.length - 6), 0)
      } catch (e) {
        return e
      }
      return undefined
    })()
    expect(error).toBeInstanceOf(CompressionError)
  })
})

describe('parseZlibEnvelope', () => {
  it('works on streams inflateStream accepts', () => {
    expect(inflateStream(storedZlib(bytes('hello')), 0)).toEqual({ data: bytes('hello'), consumed: 16 })
  })

  it('splits a stored stream into its fields', () => {
    expect(parseZlibEnvelope(storedZlib(bytes('hello')), bytes('hello'))).toEqual({
      cmf: 0x78,
      method: 8,
      windowBits: 7,
      windowSize: 32768,
      flg: 0x01,
      level: 0,
      presetDictionary: false,
      fcheck: 1,
      headerCheckValid: true,
      firstBlock: { byte: 0x01, final: true, type: 'stored' },
      deflateSize: 10,
      storedAdler32: 0x062c0215,
      computedAdler32: 0x062c0215,
      compressedSize: 16,
      inflatedSize: 5,
    })
  })

  it('reads the level and block type pako writes by default', () => {
    const zlib = parseZlibEnvelope(pako.deflate(bytes('hello world\n')), bytes('hello world\n'))
    expect(zlib.flg).toBe(0x9c)
    expect(zlib.level).toBe(2)
    expect(zlib.headerCheckValid).toBe(true)
    expect(zlib.firstBlock?.final).toBe(true)
    expect(zlib.storedAdler32).toBe(zlib.computedAdler32)
  })

  it('compares the trailer with the inflated bytes', () => {
    const zlib = parseZlibEnvelope(storedZlib(bytes('hello')), bytes('hellp'))
    expect(zlib.storedAdler32).not.toBe(zlib.computedAdler32)
  })

  it('rejects a stream with no room for a trailer', () => {
    expect(() => parseZlibEnvelope(new Uint8Array([0x78, 0x9c, 0x03]), new Uint8Array())).toThrow(CompressionError)
  })
})
