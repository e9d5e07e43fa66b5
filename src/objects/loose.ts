/**
 * @fileoverview Loose object decoding
 *
 * A loose object file is a zlib stream whose inflated form is
 * `"<kind> <size>\0"` followed by exactly `size` payload bytes.
 *
 * @module objects/loose
 *
 * @example
 * ```typescript
 * import { decodeLooseObjectFile } from './loose'
 *
 * const obj = decodeLooseObjectFile(readFileSync(path), { path })
 * console.log(obj.objectKind, obj.declaredSize)
 * ```
 */

import { BINARY_CHECK_BYTES, OBJECT_ID_BYTES } from '../constants'
import { DecodeError } from '../errors'
import { inflateBytes } from '../utils/compression'
import { bytesToHex } from '../utils/hex'
import type {
  BlobPayload,
  CommitPayload,
  DecodedLooseObject,
  HeaderField,
  ObjectKind,
  ObjectPayload,
  Signature,
  TagPayload,
  TreeEntry,
  TreeEntryKind,
  TreePayload,
} from './types'
import { isObjectKind } from './types'

const decoder = new TextDecoder()

// ============================================================================
// Header
// ============================================================================

export interface LooseObjectHeader {
  objectKind: ObjectKind
  declaredSize: number
  /** Bytes up to and including the NUL */
  headerLength: number
}

/**
 * Parses the `"<kind> <size>\0"` prefix of an inflated loose object.
 *
 * @throws {DecodeError} TRUNCATED_HEADER when there is no NUL
 * @throws {DecodeError} INVALID_HEADER when the prefix is not `kind size`
 * @throws {DecodeError} UNKNOWN_OBJECT_KIND for anything but the four kinds
 */
export function parseLooseHeader(data: Uint8Array): LooseObjectHeader {
  const nullIndex = data.indexOf(0)
  if (nullIndex === -1) {
    throw DecodeError.truncated('loose object header: no NUL terminator', data.length)
  }

  const header = decoder.decode(data.subarray(0, nullIndex))
  const parts = header.split(' ')
  if (parts.length !== 2 || !/^\d+$/.test(parts[1])) {
    throw new DecodeError(`Invalid loose object header "${header}"`, 'INVALID_HEADER', { offset: 0 })
  }

  const [kind, sizeText] = parts
  if (!isObjectKind(kind)) {
    throw DecodeError.unknownKind(kind, 0)
  }

  return {
    objectKind: kind,
    declaredSize: parseInt(sizeText, 10),
    headerLength: nullIndex + 1,
  }
}

// ============================================================================
// Payloads
// ============================================================================

/**
 * Maps a tree entry mode to what it references.
 */
export function treeEntryKind(mode: string): TreeEntryKind {
  switch (mode) {
    case '100644':
    case '100664':
      return 'blob'
    case '100755':
      return 'executable'
    case '120000':
      return 'symlink'
    case '160000':
      return 'submodule'
    case '40000':
    case '040000':
      return 'tree'
    default:
      return 'unknown'
  }
}

/**
 * Parses tree records `"<mode> <name>\0<20-byte id>"` until the payload is
 * exhausted.
 *
 * @param baseOffset - Added to reported offsets, so errors point into the
 *   enclosing stream
 * @throws {DecodeError} TRUNCATED_RECORD when a record is cut short
 */
export function parseTreeEntries(data: Uint8Array, baseOffset = 0): TreeEntry[] {
  const entries: TreeEntry[] = []
  let offset = 0

  while (offset < data.length) {
    const nullIndex = data.indexOf(0, offset)
    if (nullIndex === -1) {
      throw new DecodeError('Tree record has no NUL after its name', 'TRUNCATED_RECORD', { offset: baseOffset + offset })
    }

    const modeName = decoder.decode(data.subarray(offset, nullIndex))
    const spaceIndex = modeName.indexOf(' ')
    if (spaceIndex <= 0) {
      throw new DecodeError(`Tree record "${modeName}" has no mode`, 'TRUNCATED_RECORD', { offset: baseOffset + offset })
    }
    if (nullIndex + 1 + OBJECT_ID_BYTES > data.length) {
      throw new DecodeError('Tree record object id is truncated', 'TRUNCATED_RECORD', { offset: baseOffset + nullIndex + 1 })
    }

    const mode = modeName.slice(0, spaceIndex)
    entries.push({
      mode,
      name: modeName.slice(spaceIndex + 1),
      objectId: bytesToHex(data.subarray(nullIndex + 1, nullIndex + 1 + OBJECT_ID_BYTES)),
      kind: treeEntryKind(mode),
    })
    offset = nullIndex + 1 + OBJECT_ID_BYTES
  }

  return entries
}

/**
 * Parses `Name <email> 1700000000 +0100`. Returns undefined for anything
 * else, since a malformed identity should not hide the rest of the object.
 */
export function parseSignature(value: string): Signature | undefined {
  const match = value.match(/^(.*) <(.*)> (\d+) ([+-]\d{4})$/)
  if (!match) {
    return undefined
  }
  return {
    name: match[1],
    email: match[2],
    timestamp: parseInt(match[3], 10),
    timezone: match[4],
  }
}

/**
 * Splits a commit or tag into header fields and message. Continuation lines
 * (used by `gpgsig` and `mergetag`) are folded into the previous field.
 */
export function parseHeaderFields(text: string): { headers: HeaderField[]; message: string } {
  const headers: HeaderField[] = []
  const lines = text.split('\n')
  let index = 0

  for (; index < lines.length; index++) {
    const line = lines[index]
    if (line === '') {
      index++
      break
    }
    if (line.startsWith(' ') && headers.length > 0) {
      headers[headers.length - 1].value += '\n' + line.slice(1)
      continue
    }
    const spaceIndex = line.indexOf(' ')
    if (spaceIndex === -1) {
      headers.push({ key: line, value: '' })
    } else {
      headers.push({ key: line.slice(0, spaceIndex), value: line.slice(spaceIndex + 1) })
    }
  }

  return { headers, message: lines.slice(index).join('\n') }
}

function firstValue(headers: HeaderField[], key: string): string | undefined {
  return headers.find((h) => h.key === key)?.value
}

function parseCommitPayload(data: Uint8Array): CommitPayload {
  const { headers, message } = parseHeaderFields(decoder.decode(data))
  const author = firstValue(headers, 'author')
  const committer = firstValue(headers, 'committer')
  return {
    kind: 'commit',
    headers,
    message,
    tree: firstValue(headers, 'tree'),
    parents: headers.filter((h) => h.key === 'parent').map((h) => h.value),
    author: author !== undefined ? parseSignature(author) : undefined,
    committer: committer !== undefined ? parseSignature(committer) : undefined,
  }
}

function parseTagPayload(data: Uint8Array): TagPayload {
  const { headers, message } = parseHeaderFields(decoder.decode(data))
  const tagger = firstValue(headers, 'tagger')
  return {
    kind: 'tag',
    headers,
    message,
    object: firstValue(headers, 'object'),
    targetType: firstValue(headers, 'type'),
    tagName: firstValue(headers, 'tag'),
    tagger: tagger !== undefined ? parseSignature(tagger) : undefined,
  }
}

/**
 * Git's binary heuristic: a NUL byte in the first 8000 bytes.
 */
export function isBinaryContent(data: Uint8Array): boolean {
  const limit = Math.min(data.length, BINARY_CHECK_BYTES)
  for (let i = 0; i < limit; i++) {
    if (data[i] === 0) return true
  }
  return false
}

/**
 * Structures a payload according to its kind. Used for loose objects and for
 * resolved pack entries alike.
 */
export function parseObjectPayload(kind: ObjectKind, data: Uint8Array, baseOffset = 0): ObjectPayload {
  switch (kind) {
    case 'blob': {
      const blob: BlobPayload = { kind: 'blob', data, isBinary: isBinaryContent(data) }
      return blob
    }
    case 'tree': {
      const tree: TreePayload = { kind: 'tree', entries: parseTreeEntries(data, baseOffset) }
      return tree
    }
    case 'commit':
      return parseCommitPayload(data)
    case 'tag':
      return parseTagPayload(data)
  }
}

// ============================================================================
// Loose Objects
// ============================================================================

/**
 * Derives the object id from a path ending in `xx/yyyy...` (2 + 38 hex chars).
 */
export function objectIdFromPath(path: string): string | undefined {
  const match = path.match(/([0-9a-f]{2})[/\\]([0-9a-f]{38})$/)
  return match ? match[1] + match[2] : undefined
}

/**
 * Decodes an already inflated loose object.
 *
 * @throws {DecodeError} SIZE_MISMATCH when the header size differs from the
 *   payload length
 */
export function decodeLooseObject(inflated: Uint8Array): DecodedLooseObject {
  const header = parseLooseHeader(inflated)
  const raw = inflated.subarray(header.headerLength)

  if (raw.length !== header.declaredSize) {
    throw DecodeError.sizeMismatch(header.declaredSize, raw.length, header.headerLength)
  }

  return {
    objectKind: header.objectKind,
    declaredSize: header.declaredSize,
    raw,
    payload: parseObjectPayload(header.objectKind, raw, header.headerLength),
    headerLength: header.headerLength,
  }
}

/**
 * Inflates and decodes the contents of a loose object file.
 *
 * @throws {CompressionError} when the file is not a valid zlib stream
 */
export function decodeLooseObjectFile(compressed: Uint8Array, options: { path?: string } = {}): DecodedLooseObject {
  const decoded = decodeLooseObject(inflateBytes(compressed))
  const objectId = options.path !== undefined ? objectIdFromPath(options.path) : undefined
  return {
    ...decoded,
    compressedSize: compressed.length,
    ...(objectId !== undefined && { objectId }),
  }
}
