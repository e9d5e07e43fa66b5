/**
 * @fileoverview zlib inflate helpers over pako.
 *
 * Pack entries are concatenated zlib streams with no length prefix, so
 * {@link inflateStream} reports how many input bytes the stream used.
 *
 * @module utils/compression
 */

import pako, { Inflate } from 'pako'
import { CompressionError } from '../errors'

function toBytes(result: unknown, offset: number): Uint8Array {
  if (result instanceof Uint8Array) return result
  if (result instanceof ArrayBuffer) return new Uint8Array(result)
  throw new CompressionError('Inflate produced no binary output', { offset })
}

function describeInflateFailure(error: unknown): string {
  // pako 2 throws its message strings rather than Error instances
  if (typeof error === 'string') return error
  if (error instanceof Error) return error.message
  return 'unknown zlib error'
}

/**
 * Reads `strm.avail_in` from a pako inflator. pako exposes the zlib stream
 * at run time but its type declarations do not.
 */
function unconsumedInput(inflator: Inflate): number {
  if ('strm' in inflator) {
    const strm = inflator.strm
    if (typeof strm === 'object' && strm !== null && 'avail_in' in strm && typeof strm.avail_in === 'number') {
      return strm.avail_in
    }
  }
  return 0
}

function hasEnded(inflator: Inflate): boolean {
  return 'ended' in inflator && inflator.ended === true
}

/**
 * Inflates a complete zlib stream.
 *
 * @throws {CompressionError} INFLATE_FAILED on a malformed stream
 */
export function inflateBytes(data: Uint8Array): Uint8Array {
  try {
    return pako.inflate(data)
  } catch (error) {
    throw new CompressionError(`Inflate failed: ${describeInflateFailure(error)}`, { offset: 0, cause: error })
  }
}

/**
 * Result of inflating one stream embedded in a larger buffer.
 */
export interface InflatedStream {
  data: Uint8Array
  /** Number of compressed bytes the stream occupied, header and trailer included */
  consumed: number
}

const ZLIB_HEADER_SIZE = 2
const ADLER32_SIZE = 4

export function adler32(data: Uint8Array): number {
  let a = 1
  let b = 0
  for (let i = 0; i < data.length; i++) {
    a = (a + data[i]) % 65521
    b = (b + a) % 65521
  }
  return ((b << 16) | a) >>> 0
}

function checkZlibHeader(buffer: Uint8Array, offset: number): void {
  if (offset + ZLIB_HEADER_SIZE > buffer.length) {
    throw new CompressionError('zlib header is truncated', { offset })
  }
  const cmf = buffer[offset]
  const flg = buffer[offset + 1]
  if ((cmf & 0x0f) !== 8 || (cmf >> 4) > 7 || (cmf * 256 + flg) % 31 !== 0) {
    throw new CompressionError('Inflate failed: incorrect header check', { offset })
  }
  if (flg & 0x20) {
    throw new CompressionError('Inflate failed: preset dictionaries are not supported', { offset })
  }
}

// ============================================================================
// Envelope
// ============================================================================

/** Deflate block types, indexed by BTYPE */
const BLOCK_TYPES = ['stored', 'fixed Huffman', 'dynamic Huffman', 'reserved'] as const

export type DeflateBlockType = (typeof BLOCK_TYPES)[number]

/**
 * The zlib framing around a deflate stream, split into its fields.
 */
export interface ZlibEnvelope {
  cmf: number
  /** CM, the low four bits of CMF; 8 is deflate */
  method: number
  /** CINFO, the high four bits of CMF: log2 of the window size minus 8 */
  windowBits: number
  windowSize: number
  flg: number
  /** FLEVEL: 0 fastest, 1 fast, 2 default, 3 maximum */
  level: number
  presetDictionary: boolean
  fcheck: number
  /** Whether CMF * 256 + FLG is a multiple of 31 */
  headerCheckValid: boolean
  /** Header bits of the first deflate block, absent when there is no block byte */
  firstBlock?: { byte: number; final: boolean; type: DeflateBlockType }
  /** Bytes between the header (and dictionary id) and the trailer */
  deflateSize: number
  storedAdler32: number
  computedAdler32: number
  /** Whole stream: header, deflate data and trailer */
  compressedSize: number
  inflatedSize: number
}

/**
 * Splits a complete zlib stream into its header fields and trailer, and
 * checks the trailer against `inflated`.
 *
 * @throws {CompressionError} when the stream is too short to hold a header and trailer
 */
export function parseZlibEnvelope(stream: Uint8Array, inflated: Uint8Array): ZlibEnvelope {
  if (stream.length < ZLIB_HEADER_SIZE + ADLER32_SIZE) {
    throw new CompressionError(`zlib stream of ${stream.length} bytes has no room for header and checksum`)
  }

  const cmf = stream[0]
  const flg = stream[1]
  const windowBits = cmf >> 4
  const presetDictionary = (flg & 0x20) !== 0
  const dataStart = ZLIB_HEADER_SIZE + (presetDictionary ? 4 : 0)
  const trailer = stream.length - ADLER32_SIZE
  const blockByte = dataStart < trailer ? stream[dataStart] : undefined

  return {
    cmf,
    method: cmf & 0x0f,
    windowBits,
    windowSize: 2 ** (windowBits + 8),
    flg,
    level: flg >> 6,
    presetDictionary,
    fcheck: flg & 0x1f,
    headerCheckValid: (cmf * 256 + flg) % 31 === 0,
    ...(blockByte !== undefined && {
      firstBlock: { byte: blockByte, final: (blockByte & 0x01) !== 0, type: BLOCK_TYPES[(blockByte >> 1) & 0x03] },
    }),
    deflateSize: Math.max(0, trailer - dataStart),
    storedAdler32: new DataView(stream.buffer, stream.byteOffset + trailer, ADLER32_SIZE).getUint32(0, false),
    computedAdler32: adler32(inflated),
    compressedSize: stream.length,
    inflatedSize: inflated.length,
  }
}

// ============================================================================
// Streaming
// ============================================================================

/**
 * Inflates the zlib stream starting at `offset` and stops at its end.
 *
 * The deflate body is inflated in raw mode: pako's zlib mode restarts on
 * whatever non-zero bytes follow the end of a stream, which here is the
 * next pack entry. The header and the Adler-32 trailer are checked here
 * instead.
 *
 * @throws {CompressionError} INFLATE_FAILED on a malformed or unterminated stream
 */
export function inflateStream(buffer: Uint8Array, offset: number): InflatedStream {
  checkZlibHeader(buffer, offset)
  const input = buffer.subarray(offset + ZLIB_HEADER_SIZE)
  const inflator = new Inflate({ raw: true })

  try {
    inflator.push(input, false)
  } catch (error) {
    throw new CompressionError(`Inflate failed: ${describeInflateFailure(error)}`, { offset, cause: error })
  }

  if (inflator.err) {
    throw new CompressionError(`Inflate failed: ${inflator.msg}`, { offset })
  }
  if (!hasEnded(inflator)) {
    throw new CompressionError('zlib stream did not terminate within the available data', { offset })
  }

  const data = toBytes(inflator.result, offset)
  const trailer = offset + ZLIB_HEADER_SIZE + input.length - unconsumedInput(inflator)
  if (trailer + ADLER32_SIZE > buffer.length) {
    throw new CompressionError('zlib checksum is truncated', { offset })
  }
  const stored = new DataView(buffer.buffer, buffer.byteOffset + trailer, ADLER32_SIZE).getUint32(0, false)
  if (stored !== adler32(data)) {
    throw new CompressionError('Inflate failed: incorrect data check', { offset })
  }

  return { data, consumed: trailer + ADLER32_SIZE - offset }
}
