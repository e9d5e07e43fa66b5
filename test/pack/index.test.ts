import { describe, it, expect } from 'vitest'
import { DecodeError } from '../../src/errors'
import { parsePackIndex } from '../../src/pack/index'
import { buildPackIndex, concat } from '../helpers/fixtures'

const PACK_CHECKSUM = 'aa'.repeat(20)
const OBJECTS = [
  { objectId: 'ff' + '1'.repeat(38), offset: 300, crc32: 7 },
  { objectId: '00' + '2'.repeat(38), offset: 12, crc32: 5 },
  { objectId: '3f' + '3'.repeat(38), offset: 150, crc32: 6 },
]

function indexError(data: Uint8Array): DecodeError {
  try {
    parsePackIndex(data)
  } catch (error) {
    if (error instanceof DecodeError) return error
    throw error
  }
  throw new Error('expected a DecodeError')
}

describe('parsePackIndex', () => {
  it('reads sorted entries, fan-out and checksums', () => {
    const index = parsePackIndex(buildPackIndex(OBJECTS, PACK_CHECKSUM))

    expect(index.version).toBe(2)
    expect(index.objectCount).toBe(3)
    expect(index.entries).toEqual([
      { objectId: '00' + '2'.repeat(38), crc32: 5, offset: 12 },
      { objectId: '3f' + '3'.repeat(38), crc32: 6, offset: 150 },
      { objectId: 'ff' + '1'.repeat(38), crc32: 7, offset: 300 },
    ])
    expect(index.fanout[0x00]).toBe(1)
    expect(index.fanout[0x3e]).toBe(1)
    expect(index.fanout[0x3f]).toBe(2)
    expect(index.fanout[0xfe]).toBe(2)
    expect(index.fanout[0xff]).toBe(3)
    expect(index.packChecksum).toBe(PACK_CHECKSUM)
    expect(index.checksumValid).toBe(true)
    expect(index.largeOffsetCount).toBe(0)
  })

  it('follows the large offset table', () => {
    const index = parsePackIndex(
      buildPackIndex([{ objectId: '12'.repeat(20), offset: 0x1_0000_0010 }], PACK_CHECKSUM, { largeOffsets: true })
    )
    expect(index.entries[0].offset).toBe(0x1_0000_0010)
    expect(index.largeOffsetCount).toBe(1)
  })

  it('reports a checksum mismatch without throwing', () => {
    const index = parsePackIndex(buildPackIndex(OBJECTS, PACK_CHECKSUM, { corruptChecksum: true }))
    expect(index.checksumValid).toBe(false)
    expect(index.entries).toHaveLength(3)
  })

  it('parses an empty index', () => {
    const index = parsePackIndex(buildPackIndex([], PACK_CHECKSUM))
    expect(index.objectCount).toBe(0)
    expect(index.entries).toEqual([])
  })

  it('rejects a wrong signature', () => {
    const data = buildPackIndex(OBJECTS, PACK_CHECKSUM)
    data[0] = 0
    expect(indexError(data).code).toBe('INVALID_SIGNATURE')
  })

  it('rejects other versions', () => {
    const data = buildPackIndex(OBJECTS, PACK_CHECKSUM)
    data[7] = 1
    expect(indexError(data).code).toBe('UNSUPPORTED_VERSION')
  })

  it('rejects a decreasing fan-out table', () => {
    const data = buildPackIndex(OBJECTS, PACK_CHECKSUM)
    // fanout[0] = 9, more than fanout[1]
    data[8 + 3] = 9
    const error = indexError(data)
    expect(error.code).toBe('INVALID_HEADER')
    expect(error.offset).toBe(12)
  })

  it('rejects a truncated table', () => {
    const data = buildPackIndex(OBJECTS, PACK_CHECKSUM)
    expect(indexError(data.subarray(0, 8 + 1024 + 40)).code).toBe('TRUNCATED_HEADER')
    expect(indexError(concat(data.subarray(0, 4))).code).toBe('TRUNCATED_HEADER')
  })
})
