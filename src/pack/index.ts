/**
 * @fileoverview Pack index (.idx) decoding
 *
 * Version 2 index layout:
 *
 * | Section        | Size                          |
 * |----------------|-------------------------------|
 * | Magic          | 4 bytes: `\377tOc`            |
 * | Version        | 4 bytes: 2                    |
 * | Fanout         | 256 x 4 bytes, cumulative     |
 * | Object ids     | N x 20 bytes, sorted          |
 * | CRC32          | N x 4 bytes                   |
 * | Offsets        | N x 4 bytes                   |
 * | Large offsets  | M x 8 bytes (MSB set above)   |
 * | Pack checksum  | 20 bytes                      |
 * | Index checksum | 20 bytes, SHA-1 of the above  |
 *
 * All integers are big-endian.
 *
 * @module pack/index
 */

import { DecodeError } from '../errors'
import { sha1Hex } from '../utils/hash'
import { bytesToHex } from '../utils/hex'

/** `\377tOc` */
const PACK_INDEX_MAGIC = 0xff744f63

const PACK_INDEX_VERSION = 2

const FANOUT_ENTRIES = 256
const HEADER_SIZE = 8
const TRAILER_SIZE = 40

export interface PackIndexEntry {
  objectId: string
  crc32: number
  offset: number
}

export interface PackIndex {
  version: number
  /** Equals fanout[255] */
  objectCount: number
  /** fanout[i] = number of objects whose first id byte is <= i */
  fanout: Uint32Array
  /** Sorted by object id */
  entries: PackIndexEntry[]
  /** Entries whose offset came from the 8-byte table */
  largeOffsetCount: number
  packChecksum: string
  indexChecksum: string
  /** Whether `indexChecksum` matches the SHA-1 of the preceding bytes */
  checksumValid: boolean
}

/**
 * Parses a version 2 pack index.
 *
 * A checksum mismatch is reported through `checksumValid` rather than thrown,
 * so a damaged index can still be inspected.
 *
 * @throws {DecodeError} INVALID_SIGNATURE, UNSUPPORTED_VERSION,
 *   TRUNCATED_HEADER or INVALID_HEADER
 */
export function parsePackIndex(data: Uint8Array): PackIndex {
  if (data.length < HEADER_SIZE) {
    throw DecodeError.truncated('pack index header', data.length)
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  const magic = view.getUint32(0, false)
  if (magic !== PACK_INDEX_MAGIC) {
    throw new DecodeError('Invalid pack index signature', 'INVALID_SIGNATURE', { offset: 0 })
  }

  const version = view.getUint32(4, false)
  if (version !== PACK_INDEX_VERSION) {
    throw new DecodeError(`Unsupported pack index version: ${version}`, 'UNSUPPORTED_VERSION', { offset: 4 })
  }

  const fanoutEnd = HEADER_SIZE + FANOUT_ENTRIES * 4
  if (data.length < fanoutEnd + TRAILER_SIZE) {
    throw DecodeError.truncated('pack index fanout table', data.length)
  }

  const fanout = new Uint32Array(FANOUT_ENTRIES)
  for (let i = 0; i < FANOUT_ENTRIES; i++) {
    fanout[i] = view.getUint32(HEADER_SIZE + i * 4, false)
    if (i > 0 && fanout[i] < fanout[i - 1]) {
      throw new DecodeError('Fanout table is not monotonically non-decreasing', 'INVALID_HEADER', {
        offset: HEADER_SIZE + i * 4,
      })
    }
  }

  const objectCount = fanout[FANOUT_ENTRIES - 1]
  const idsOffset = fanoutEnd
  const crcOffset = idsOffset + objectCount * 20
  const offsetsOffset = crcOffset + objectCount * 4
  const largeOffsetsOffset = offsetsOffset + objectCount * 4

  if (data.length < largeOffsetsOffset + TRAILER_SIZE) {
    throw DecodeError.truncated(`pack index for ${objectCount} objects`, data.length)
  }

  const entries: PackIndexEntry[] = []
  let largeOffsetCount = 0

  for (let i = 0; i < objectCount; i++) {
    const objectId = bytesToHex(data.subarray(idsOffset + i * 20, idsOffset + (i + 1) * 20))
    const crc32 = view.getUint32(crcOffset + i * 4, false)
    let offset = view.getUint32(offsetsOffset + i * 4, false)

    if (offset & 0x80000000) {
      const largeIndex = offset & 0x7fffffff
      const position = largeOffsetsOffset + largeIndex * 8
      if (position + 8 > data.length - TRAILER_SIZE) {
        throw DecodeError.truncated('large offset table', position)
      }
      offset = view.getUint32(position, false) * 0x100000000 + view.getUint32(position + 4, false)
      largeOffsetCount++
    }

    entries.push({ objectId, crc32, offset })
  }

  const packChecksum = bytesToHex(data.subarray(data.length - 40, data.length - 20))
  const indexChecksum = bytesToHex(data.subarray(data.length - 20))

  return {
    version,
    objectCount,
    fanout,
    entries,
    largeOffsetCount,
    packChecksum,
    indexChecksum,
    checksumValid: sha1Hex(data.subarray(0, data.length - 20)) === indexChecksum,
  }
}
