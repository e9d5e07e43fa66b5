/**
 * Pack file format
 *
 * Format:
 * - 4 bytes: "PACK" signature
 * - 4 bytes: version number (network byte order, big-endian)
 * - 4 bytes: number of objects (network byte order)
 * - N objects: each object has header + compressed data
 * - 20 bytes: SHA-1 checksum of all preceding content
 *
 * Object header encoding:
 * - First byte: (MSB) continuation bit | 3-bit type | 4-bit size LSB
 * - Subsequent bytes: (MSB) continuation bit | 7-bit size
 *
 * Object types:
 * - 1: commit
 * - 2: tree
 * - 3: blob
 * - 4: tag
 * - 6: ofs_delta (offset delta)
 * - 7: ref_delta (reference delta)
 */

import { PACK_HEADER_SIZE, SUPPORTED_PACK_VERSIONS } from '../constants'
import { DecodeError } from '../errors'
import type { ObjectKind } from '../objects/types'

// Constants
export const PACK_SIGNATURE = 'PACK'

// Pack object types
export enum PackObjectType {
  OBJ_COMMIT = 1,
  OBJ_TREE = 2,
  OBJ_BLOB = 3,
  OBJ_TAG = 4,
  OBJ_OFS_DELTA = 6,
  OBJ_REF_DELTA = 7
}

export type PackEntryKind = ObjectKind | 'ofs_delta' | 'ref_delta'

const MAX_HEADER_BYTES = 10

export function packObjectTypeToKind(type: PackObjectType): PackEntryKind {
  switch (type) {
    case PackObjectType.OBJ_COMMIT:
      return 'commit'
    case PackObjectType.OBJ_TREE:
      return 'tree'
    case PackObjectType.OBJ_BLOB:
      return 'blob'
    case PackObjectType.OBJ_TAG:
      return 'tag'
    case PackObjectType.OBJ_OFS_DELTA:
      return 'ofs_delta'
    case PackObjectType.OBJ_REF_DELTA:
      return 'ref_delta'
  }
}

export function kindToPackObjectType(kind: PackEntryKind): PackObjectType {
  switch (kind) {
    case 'commit':
      return PackObjectType.OBJ_COMMIT
    case 'tree':
      return PackObjectType.OBJ_TREE
    case 'blob':
      return PackObjectType.OBJ_BLOB
    case 'tag':
      return PackObjectType.OBJ_TAG
    case 'ofs_delta':
      return PackObjectType.OBJ_OFS_DELTA
    case 'ref_delta':
      return PackObjectType.OBJ_REF_DELTA
  }
}

export function isDeltaKind(kind: PackEntryKind): kind is 'ofs_delta' | 'ref_delta' {
  return kind === 'ofs_delta' || kind === 'ref_delta'
}

function toPackObjectType(tag: number, offset: number): PackObjectType {
  switch (tag) {
    case PackObjectType.OBJ_COMMIT:
    case PackObjectType.OBJ_TREE:
    case PackObjectType.OBJ_BLOB:
    case PackObjectType.OBJ_TAG:
    case PackObjectType.OBJ_OFS_DELTA:
    case PackObjectType.OBJ_REF_DELTA:
      return tag
    default:
      throw DecodeError.unknownKind(tag, offset)
  }
}

/**
 * Encode object type and size into pack object header format
 *
 * First byte: MSB continuation bit | 3-bit type | 4-bit size LSB
 * Subsequent bytes: MSB continuation bit | 7-bit size continuation
 */
export function encodeTypeAndSize(type: PackObjectType, size: number): Uint8Array {
  const bytes: number[] = []

  let firstByte = (type << 4) | (size & 0x0f)
  let rest = Math.floor(size / 16)

  if (rest > 0) {
    firstByte |= 0x80
  }
  bytes.push(firstByte)

  while (rest > 0) {
    let byte = rest & 0x7f
    rest = Math.floor(rest / 128)
    if (rest > 0) {
      byte |= 0x80
    }
    bytes.push(byte)
  }

  return new Uint8Array(bytes)
}

export interface TypeAndSize {
  type: PackObjectType
  size: number
  bytesRead: number
}

/**
 * Decodes an entry's type and size header starting at `offset`.
 *
 * @throws {DecodeError} TRUNCATED_HEADER if the data ends mid-header
 * @throws {DecodeError} UNKNOWN_OBJECT_KIND for type tags 0 and 5
 */
export function decodeTypeAndSize(data: Uint8Array, offset: number): TypeAndSize {
  if (offset >= data.length) {
    throw DecodeError.truncated('entry header', offset)
  }

  let bytesRead = 0
  const firstByte = data[offset + bytesRead]
  bytesRead++

  // Extract type (bits 4-6 of first byte)
  const type = toPackObjectType((firstByte >> 4) & 0x07, offset)

  // Extract initial size (low 4 bits)
  let size = firstByte & 0x0f
  let shift = 4

  if (firstByte & 0x80) {
    while (true) {
      if (offset + bytesRead >= data.length) {
        throw DecodeError.truncated('entry header', offset + bytesRead)
      }
      if (bytesRead >= MAX_HEADER_BYTES) {
        throw new DecodeError('Entry header exceeds maximum length', 'INVALID_HEADER', { offset })
      }

      const byte = data[offset + bytesRead]
      bytesRead++
      size += (byte & 0x7f) * 2 ** shift
      shift += 7
      if ((byte & 0x80) === 0) {
        break
      }
    }
  }

  return { type, size, bytesRead }
}

/**
 * Encodes an OFS_DELTA backward distance. Inverse of {@link decodeOfsOffset}.
 */
export function encodeOfsOffset(distance: number): Uint8Array {
  const bytes: number[] = [distance & 0x7f]
  let value = Math.floor(distance / 128)
  while (value > 0) {
    value -= 1
    bytes.unshift(0x80 | (value & 0x7f))
    value = Math.floor(value / 128)
  }
  return new Uint8Array(bytes)
}

/**
 * Decodes the OFS_DELTA backward distance. Each continuation adds one before
 * shifting, so every distance has exactly one encoding.
 *
 * @throws {DecodeError} TRUNCATED_HEADER if the data ends mid-value
 */
export function decodeOfsOffset(data: Uint8Array, startOffset: number): { distance: number; bytesRead: number } {
  if (startOffset >= data.length) {
    throw DecodeError.truncated('OFS_DELTA offset', startOffset)
  }
  let byte = data[startOffset]
  let distance = byte & 0x7f
  let bytesRead = 1

  while (byte & 0x80) {
    if (startOffset + bytesRead >= data.length) {
      throw DecodeError.truncated('OFS_DELTA offset', startOffset + bytesRead)
    }
    if (bytesRead >= MAX_HEADER_BYTES) {
      throw new DecodeError('OFS_DELTA offset exceeds maximum length', 'INVALID_HEADER', { offset: startOffset })
    }
    byte = data[startOffset + bytesRead]
    distance = (distance + 1) * 128 + (byte & 0x7f)
    bytesRead++
  }

  return { distance, bytesRead }
}

// Pack header structure
export interface PackHeader {
  signature: string
  version: number
  objectCount: number
}

function readU32(data: Uint8Array, offset: number): number {
  return ((data[offset] << 24) | (data[offset + 1] << 16) | (data[offset + 2] << 8) | data[offset + 3]) >>> 0
}

/**
 * Parse pack file header
 *
 * @throws {DecodeError} TRUNCATED_HEADER, INVALID_SIGNATURE or UNSUPPORTED_VERSION
 */
export function parsePackHeader(data: Uint8Array): PackHeader {
  if (data.length < PACK_HEADER_SIZE) {
    throw DecodeError.truncated(`pack header: expected ${PACK_HEADER_SIZE} bytes, got ${data.length}`, 0)
  }

  const signature = String.fromCharCode(data[0], data[1], data[2], data[3])
  if (signature !== PACK_SIGNATURE) {
    throw new DecodeError(
      `Invalid pack signature: expected "${PACK_SIGNATURE}", got "${signature}"`,
      'INVALID_SIGNATURE',
      { offset: 0 }
    )
  }

  const version = readU32(data, 4)
  if (!SUPPORTED_PACK_VERSIONS.includes(version)) {
    throw new DecodeError(`Unsupported pack version: ${version}`, 'UNSUPPORTED_VERSION', { offset: 4 })
  }

  const objectCount = readU32(data, 8)

  return { signature, version, objectCount }
}
