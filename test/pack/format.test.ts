import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { DecodeError } from '../../src/errors'
import {
  PackObjectType,
  decodeOfsOffset,
  decodeTypeAndSize,
  encodeOfsOffset,
  encodeTypeAndSize,
  isDeltaKind,
  packObjectTypeToKind,
  parsePackHeader,
} from '../../src/pack/format'
import { bytes, concat } from '../helpers/fixtures'

function header(version: number, count: number): Uint8Array {
  const out = new Uint8Array(12)
  out.set(bytes('PACK'))
  const view = new DataView(out.buffer)
  view.setUint32(4, version, false)
  view.setUint32(8, count, false)
  return out
}

describe('parsePackHeader', () => {
  it('reads version and object count', () => {
    expect(parsePackHeader(header(2, 3))).toEqual({ signature: 'PACK', version: 2, objectCount: 3 })
    expect(parsePackHeader(header(3, 0)).version).toBe(3)
  })

  it('rejects short input', () => {
    expect(() => parsePackHeader(bytes('PACK'))).toThrow(DecodeError)
  })

  it('rejects a wrong signature', () => {
    const data = concat(bytes('KCAP'), header(2, 1).subarray(4))
    expect(() => parsePackHeader(data)).toThrow('Invalid pack signature')
  })

  it('rejects unsupported versions', () => {
    try {
      parsePackHeader(header(4, 1))
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError)
      if (error instanceof DecodeError) expect(error.code).toBe('UNSUPPORTED_VERSION')
    }
  })
})

describe('type and size header', () => {
  it('decodes a single byte header', () => {
    // 0 011 0101: blob, size 5
    expect(decodeTypeAndSize(new Uint8Array([0x35]), 0)).toEqual({ type: PackObjectType.OBJ_BLOB, size: 5, bytesRead: 1 })
  })

  it('decodes continuation bytes least significant first', () => {
    // 1 001 1111, 0 0000010: commit, size 15 + (2 << 4)
    expect(decodeTypeAndSize(new Uint8Array([0x9f, 0x02]), 0)).toEqual({
      type: PackObjectType.OBJ_COMMIT,
      size: 47,
      bytesRead: 2,
    })
  })

  it('encodes what it decodes', () => {
    fc.assert(
      fc.property(fc.constantFrom(1, 2, 3, 4, 6, 7), fc.integer({ min: 0, max: 2 ** 40 }), (type, size) => {
        const encoded = encodeTypeAndSize(type, size)
        const decoded = decodeTypeAndSize(encoded, 0)
        return decoded.type === type && decoded.size === size && decoded.bytesRead === encoded.length
      })
    )
  })

  it('rejects the reserved type tags', () => {
    expect(() => decodeTypeAndSize(new Uint8Array([0x05]), 0)).toThrow('Unknown object kind: 0')
    expect(() => decodeTypeAndSize(new Uint8Array([0x55]), 0)).toThrow('Unknown object kind: 5')
  })

  it('rejects a header that runs off the end', () => {
    expect(() => decodeTypeAndSize(new Uint8Array([0xb5, 0x80]), 0)).toThrow('Truncated entry header')
  })
})

describe('OFS_DELTA distance', () => {
  it('adds one per continuation byte', () => {
    expect(decodeOfsOffset(new Uint8Array([0x05]), 0)).toEqual({ distance: 5, bytesRead: 1 })
    // (0 + 1) * 128 + 0
    expect(decodeOfsOffset(new Uint8Array([0x80, 0x00]), 0)).toEqual({ distance: 128, bytesRead: 2 })
    expect(Array.from(encodeOfsOffset(128))).toEqual([0x80, 0x00])
  })

  it('encodes what it decodes', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 2 ** 40 }), (distance) => {
        const encoded = encodeOfsOffset(distance)
        const decoded = decodeOfsOffset(encoded, 0)
        return decoded.distance === distance && decoded.bytesRead === encoded.length
      })
    )
  })

  it('rejects a truncated distance', () => {
    expect(() => decodeOfsOffset(new Uint8Array([0x81]), 0)).toThrow('Truncated OFS_DELTA offset')
  })
})

describe('entry kinds', () => {
  it('names every type', () => {
    expect(packObjectTypeToKind(PackObjectType.OBJ_TAG)).toBe('tag')
    expect(packObjectTypeToKind(PackObjectType.OBJ_REF_DELTA)).toBe('ref_delta')
    expect(isDeltaKind('ofs_delta')).toBe(true)
    expect(isDeltaKind('tree')).toBe(false)
  })
})
