/**
 * @fileoverview Hashing for object identification and file checksums.
 *
 * Object ids are the SHA-1 of `"{type} {size}\0"` followed by the content,
 * matching `git hash-object`.
 *
 * @module utils/hash
 */

import { createHash } from 'node:crypto'

/**
 * Hex SHA-1 of raw bytes.
 */
export function sha1Hex(data: Uint8Array): string {
  return createHash('sha1').update(data).digest('hex')
}

/**
 * Hex SHA-256 of raw bytes, for files of SHA-256 repositories.
 */
export function sha256Hex(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex')
}

/**
 * Hash an object with its type header.
 *
 * @example
 * ```typescript
 * hashObject('blob', new TextEncoder().encode('hello'))
 * // 'b6fc4c620b67d95f953a5c1c1230aaab5db5a1b0'
 * ```
 */
export function hashObject(type: string, data: Uint8Array): string {
  return createHash('sha1')
    .update(`${type} ${data.length}\0`)
    .update(data)
    .digest('hex')
}
