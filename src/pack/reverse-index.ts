/**
 * @fileoverview Pack reverse index (.rev) decoding
 *
 * A reverse index lists, in pack order, each object's position in the
 * sorted `.idx`, so pack position, index position and offset can be mapped
 * onto each other without a sort.
 *
 * | Section         | Size                                |
 * |-----------------|-------------------------------------|
 * | Magic           | 4 bytes: `RIDX`                     |
 * | Version         | 4 bytes: 1                          |
 * | Hash function   | 4 bytes: 1 (SHA-1) or 2 (SHA-256)   |
 * | Index positions | N x 4 bytes, in pack order          |
 * | Pack checksum   | hash size                           |
 * | File checksum   | hash size, over the above           |
 *
 * The object count is not stored; it follows from the file size.
 *
 * @module pack/reverse-index
 * @see {@link https://git-scm.com/docs/gitformat-pack} Pack format documentation
 */

import { DecodeError } from '../errors'
import { sha1Hex, sha256Hex } from '../utils/hash'
import { bytesToHex } from '../utils/hex'

/** `RIDX` */
const REVERSE_INDEX_MAGIC = 0x52494458

const REVERSE_INDEX_VERSION = 1
const HEADER_SIZE = 12

export type HashFunctionName = 'SHA-1' | 'SHA-256'

interface HashFunction {
  name: HashFunctionName
  size: number
  digest: (data: Uint8Array) => string
}

const HASH_FUNCTIONS = new Map<number, HashFunction>([
  [1, { name: 'SHA-1', size: 20, digest: sha1Hex }],
  [2, { name: 'SHA-256', size: 32, digest: sha256Hex }],
])

export interface PackReverseIndex {
  version: number
  hashFunctionId: number
  hashFunction: HashFunctionName
  objectCount: number
  /** `indexPositions[packPosition]` is the object's position in the `.idx` */
  indexPositions: Uint32Array
  packChecksum: string
  fileChecksum: string
  /** Whether `fileChecksum` matches the hash of the preceding bytes */
  checksumValid: boolean
}

/**
 * Parses a version 1 reverse index.
 *
 * @throws {DecodeError} INVALID_SIGNATURE, UNSUPPORTED_VERSION,
 *   TRUNCATED_HEADER or INVALID_HEADER
 */
export function parsePackReverseIndex(data: Uint8Array): PackReverseIndex {
  if (data.length < HEADER_SIZE) {
    throw DecodeError.truncated('reverse index header', data.length)
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  if (view.getUint32(0, false) !== REVERSE_INDEX_MAGIC) {
    throw new DecodeError('Invalid reverse index signature', 'INVALID_SIGNATURE', { offset: 0 })
  }

  const version = view.getUint32(4, false)
  if (version !== REVERSE_INDEX_VERSION) {
    throw new DecodeError(`Unsupported reverse index version: ${version}`, 'UNSUPPORTED_VERSION', { offset: 4 })
  }

  const hashFunctionId = view.getUint32(8, false)
  const hash = HASH_FUNCTIONS.get(hashFunctionId)
  if (hash === undefined) {
    throw new DecodeError(`Unknown hash function id: ${hashFunctionId}`, 'INVALID_HEADER', { offset: 8 })
  }

  const tableEnd = data.length - 2 * hash.size
  if (tableEnd < HEADER_SIZE) {
    throw DecodeError.truncated('reverse index checksums', data.length)
  }
  if ((tableEnd - HEADER_SIZE) % 4 !== 0) {
    throw new DecodeError('Reverse index table is not a whole number of entries', 'INVALID_HEADER', {
      offset: HEADER_SIZE,
    })
  }

  const objectCount = (tableEnd - HEADER_SIZE) / 4
  const indexPositions = new Uint32Array(objectCount)
  for (let i = 0; i < objectCount; i++) {
    indexPositions[i] = view.getUint32(HEADER_SIZE + i * 4, false)
  }

  const fileChecksum = bytesToHex(data.subarray(data.length - hash.size))

  return {
    version,
    hashFunctionId,
    hashFunction: hash.name,
    objectCount,
    indexPositions,
    packChecksum: bytesToHex(data.subarray(tableEnd, tableEnd + hash.size)),
    fileChecksum,
    checksumValid: hash.digest(data.subarray(0, data.length - hash.size)) === fileChecksum,
  }
}
