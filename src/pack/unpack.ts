/**
 * @fileoverview Pack entry decoding and delta chain resolution
 *
 * Walks a pack file entry by entry, inflating each zlib stream to find where
 * the next entry starts, and resolves delta entries against their bases on
 * demand.
 *
 * ## Process
 *
 * 1. Parse and validate the 12-byte header
 * 2. For each entry: decode type and size, read the base reference of delta
 *    entries, inflate the payload and record the compressed span
 * 3. Compare the trailing SHA-1 with the checksum of the preceding bytes
 * 4. Resolve deltas lazily through {@link PackResolver}, following the base
 *    chain iteratively and rejecting cycles and dangling bases
 *
 * @module pack/unpack
 *
 * @example
 * ```typescript
 * import { decodePack, PackResolver } from './unpack'
 *
 * const pack = decodePack(readFileSync('objects/pack/pack-1234.pack'))
 * const resolver = new PackResolver(pack.entries)
 * const { kind, content } = resolver.resolve(pack.entries[3])
 * ```
 */

import { MAX_DELTA_CHAIN_DEPTH, OBJECT_ID_BYTES, PACK_CHECKSUM_SIZE, PACK_HEADER_SIZE } from '../constants'
import { DecodeError, isPackLensError, PackLensError } from '../errors'
import type { ObjectKind } from '../objects/types'
import { inflateStream } from '../utils/compression'
import { hashObject, sha1Hex } from '../utils/hash'
import { bytesToHex } from '../utils/hex'
import { applyDelta } from './delta'
import type { PackEntryKind, PackHeader } from './format'
import { decodeOfsOffset, decodeTypeAndSize, PackObjectType, packObjectTypeToKind, parsePackHeader } from './format'

// ============================================================================
// Types
// ============================================================================

/**
 * Where a delta entry's base lives.
 */
export type BaseReference =
  | { kind: 'offset'; distance: number; baseOffset: number }
  | { kind: 'ref'; objectId: string }

/**
 * Byte range `[start, end)` within the pack.
 */
export interface ByteSpan {
  start: number
  end: number
}

/**
 * One record of a pack file.
 */
export interface DecodedPackEntry {
  /** Position in the pack, starting at 0 */
  index: number
  offset: number
  entryKind: PackEntryKind
  /** Inflated size from the entry header */
  declaredSize: number
  /** Present for delta kinds only */
  baseReference?: BaseReference
  /** The type-and-size header bytes */
  headerBytes: Uint8Array
  /** OFS_DELTA distance bytes or the REF_DELTA base id */
  baseReferenceBytes?: Uint8Array
  compressedSpan: ByteSpan
  /** The zlib stream at `compressedSpan`, a view into the pack */
  compressedBytes: Uint8Array
  /** Inflated payload: object content, or the delta instruction stream */
  data: Uint8Array
  /** Set by {@link PackResolver.resolveEntry} once the base chain resolves */
  resolvedContent?: Uint8Array
  resolvedKind?: ObjectKind
  objectId?: string
}

export interface PackChecksum {
  /** Hex SHA-1 stored in the trailer, absent when the pack is cut short */
  stored?: string
  computed: string
  valid: boolean
}

export interface DecodedPack {
  header: PackHeader
  entries: DecodedPackEntry[]
  checksum: PackChecksum
  /**
   * The error that stopped decoding, if any. Entries before it are kept.
   */
  error?: PackLensError
}

// ============================================================================
// Entry Decoding
// ============================================================================

/**
 * Decodes the entry starting at `offset`.
 *
 * @throws {DecodeError} on a malformed header or a size mismatch
 * @throws {CompressionError} when the payload is not a valid zlib stream
 */
export function readPackEntry(pack: Uint8Array, offset: number, index: number): DecodedPackEntry {
  const { type, size, bytesRead } = decodeTypeAndSize(pack, offset)
  const headerBytes = pack.subarray(offset, offset + bytesRead)
  let position = offset + bytesRead

  let baseReference: BaseReference | undefined
  let baseReferenceBytes: Uint8Array | undefined

  if (type === PackObjectType.OBJ_OFS_DELTA) {
    const { distance, bytesRead: distanceBytes } = decodeOfsOffset(pack, position)
    baseReference = { kind: 'offset', distance, baseOffset: offset - distance }
    baseReferenceBytes = pack.subarray(position, position + distanceBytes)
    position += distanceBytes
  } else if (type === PackObjectType.OBJ_REF_DELTA) {
    if (position + OBJECT_ID_BYTES > pack.length) {
      throw DecodeError.truncated('REF_DELTA base id', position)
    }
    baseReferenceBytes = pack.subarray(position, position + OBJECT_ID_BYTES)
    baseReference = { kind: 'ref', objectId: bytesToHex(baseReferenceBytes) }
    position += OBJECT_ID_BYTES
  }

  const { data, consumed } = inflateStream(pack, position)
  if (data.length !== size) {
    throw DecodeError.sizeMismatch(size, data.length, offset)
  }

  return {
    index,
    offset,
    entryKind: packObjectTypeToKind(type),
    declaredSize: size,
    headerBytes,
    compressedSpan: { start: position, end: position + consumed },
    compressedBytes: pack.subarray(position, position + consumed),
    data,
    ...(baseReference !== undefined && { baseReference }),
    ...(baseReferenceBytes !== undefined && { baseReferenceBytes }),
  }
}

/**
 * Lazily yields the entries of a pack. Each call starts a fresh walk, so the
 * sequence can be restarted.
 *
 * @throws {DecodeError} from the header, or from the first malformed entry
 */
export function* iteratePackEntries(pack: Uint8Array): Generator<DecodedPackEntry, void, undefined> {
  const header = parsePackHeader(pack)
  const dataEnd = Math.max(PACK_HEADER_SIZE, pack.length - PACK_CHECKSUM_SIZE)
  const body = pack.subarray(0, dataEnd)
  let offset = PACK_HEADER_SIZE

  for (let index = 0; index < header.objectCount; index++) {
    if (offset >= dataEnd) {
      throw DecodeError.truncated(`pack: expected ${header.objectCount} entries, found ${index}`, offset)
    }
    const entry = readPackEntry(body, offset, index)
    yield entry
    offset = entry.compressedSpan.end
  }
}

/**
 * Compares the trailing SHA-1 with the checksum of everything before it.
 */
export function verifyPackChecksum(pack: Uint8Array): PackChecksum {
  if (pack.length < PACK_HEADER_SIZE + PACK_CHECKSUM_SIZE) {
    return { computed: sha1Hex(pack), valid: false }
  }
  const stored = bytesToHex(pack.subarray(pack.length - PACK_CHECKSUM_SIZE))
  const computed = sha1Hex(pack.subarray(0, pack.length - PACK_CHECKSUM_SIZE))
  return { stored, computed, valid: stored === computed }
}

/**
 * Decodes every entry of a pack.
 *
 * Header problems throw. A malformed entry stops the walk and is returned as
 * `error` alongside the entries decoded before it.
 *
 * @throws {DecodeError} TRUNCATED_HEADER, INVALID_SIGNATURE or UNSUPPORTED_VERSION
 */
export function decodePack(pack: Uint8Array): DecodedPack {
  const header = parsePackHeader(pack)
  const entries: DecodedPackEntry[] = []
  let error: PackLensError | undefined

  try {
    for (const entry of iteratePackEntries(pack)) {
      entries.push(entry)
    }
  } catch (cause) {
    if (!isPackLensError(cause)) throw cause
    error = cause
  }

  return {
    header,
    entries,
    checksum: verifyPackChecksum(pack),
    ...(error !== undefined && { error }),
  }
}

// ============================================================================
// Delta Resolution
// ============================================================================

export interface ResolvedObject {
  kind: ObjectKind
  content: Uint8Array
  objectId: string
  /** Number of deltas applied on top of the base object */
  chainLength: number
}

export interface PackResolverOptions {
  /**
   * Object id to pack offset, usually from the pack's `.idx`. Used to find
   * REF_DELTA bases, which may themselves be deltas.
   */
  offsetsById?: ReadonlyMap<string, number>
  maxDepth?: number
}

/**
 * Resolves entries of one decoded pack, memoizing results for the lifetime
 * of the resolver.
 */
export class PackResolver {
  private readonly byOffset = new Map<number, DecodedPackEntry>()
  private readonly resolved = new Map<number, ResolvedObject>()
  private readonly offsetsById: ReadonlyMap<string, number>
  private readonly maxDepth: number
  private plainIds?: Map<string, number>

  constructor(entries: readonly DecodedPackEntry[], options: PackResolverOptions = {}) {
    for (const entry of entries) {
      this.byOffset.set(entry.offset, entry)
    }
    this.offsetsById = options.offsetsById ?? new Map()
    this.maxDepth = options.maxDepth ?? MAX_DELTA_CHAIN_DEPTH
  }

  /**
   * Reconstructs an entry's object, applying its whole delta chain.
   *
   * @throws {DecodeError} DELTA_CYCLE, DELTA_CHAIN_TOO_DEEP, DANGLING_BASE or any
   *   delta replay error
   */
  resolve(entry: DecodedPackEntry): ResolvedObject {
    const cached = this.resolved.get(entry.offset)
    if (cached) return cached

    const { chain, base } = this.walkChain(entry)

    const { kind } = base
    let { content, depth } = base
    for (let i = chain.length - 1; i >= 0; i--) {
      const delta = chain[i]
      try {
        content = applyDelta(content, delta.data)
      } catch (cause) {
        if (cause instanceof DecodeError && cause.offset === undefined) {
          throw cause.withOffset(delta.offset)
        }
        throw cause
      }
      depth++
      this.remember(delta, kind, content, depth)
    }

    const result = this.resolved.get(entry.offset)
    if (!result) {
      throw new PackLensError(`Entry at offset ${entry.offset} did not resolve`, 'INTERNAL')
    }
    return result
  }

  /**
   * Returns a copy of the entry with `resolvedContent`, `resolvedKind` and
   * `objectId` filled in.
   */
  resolveEntry(entry: DecodedPackEntry): DecodedPackEntry {
    const { kind, content, objectId } = this.resolve(entry)
    return { ...entry, resolvedContent: content, resolvedKind: kind, objectId }
  }

  /**
   * Follows base references until a non-delta entry or an already resolved
   * one. `chain` lists the deltas to apply, nearest to `entry` first.
   */
  private walkChain(entry: DecodedPackEntry): {
    chain: DecodedPackEntry[]
    base: { kind: ObjectKind; content: Uint8Array; depth: number }
  } {
    const chain: DecodedPackEntry[] = []
    const visited = new Set<number>()
    let current = entry

    for (;;) {
      const memo = this.resolved.get(current.offset)
      if (memo) {
        return { chain, base: { kind: memo.kind, content: memo.content, depth: memo.chainLength } }
      }

      const kind = current.entryKind
      if (kind !== 'ofs_delta' && kind !== 'ref_delta') {
        this.remember(current, kind, current.data, 0)
        return { chain, base: { kind, content: current.data, depth: 0 } }
      }

      if (visited.has(current.offset)) {
        throw new DecodeError(
          `Delta chain cycle: entry at offset ${current.offset} is its own ancestor`,
          'DELTA_CYCLE',
          { offset: current.offset }
        )
      }
      if (chain.length >= this.maxDepth) {
        throw new DecodeError(`Delta chain longer than ${this.maxDepth}`, 'DELTA_CHAIN_TOO_DEEP', { offset: entry.offset })
      }
      visited.add(current.offset)
      chain.push(current)
      current = this.baseOf(current)
    }
  }

  private remember(entry: DecodedPackEntry, kind: ObjectKind, content: Uint8Array, chainLength: number): void {
    this.resolved.set(entry.offset, { kind, content, objectId: hashObject(kind, content), chainLength })
  }

  private baseOf(entry: DecodedPackEntry): DecodedPackEntry {
    const ref = entry.baseReference
    if (!ref) {
      throw new DecodeError('Delta entry has no base reference', 'DANGLING_BASE', { offset: entry.offset })
    }

    if (ref.kind === 'offset') {
      const base = this.byOffset.get(ref.baseOffset)
      if (!base) {
        throw new DecodeError(
          `OFS_DELTA base at offset ${ref.baseOffset} is not an entry of this pack`,
          'DANGLING_BASE',
          { offset: entry.offset }
        )
      }
      return base
    }

    const indexed = this.offsetsById.get(ref.objectId)
    const baseOffset = indexed ?? this.plainObjectIds().get(ref.objectId)
    const base = baseOffset !== undefined ? this.byOffset.get(baseOffset) : undefined
    if (!base) {
      throw new DecodeError(`REF_DELTA base ${ref.objectId} is not in this pack`, 'DANGLING_BASE', {
        offset: entry.offset,
      })
    }
    return base
  }

  /** Ids of the non-delta entries, hashed on first use. */
  private plainObjectIds(): Map<string, number> {
    if (!this.plainIds) {
      this.plainIds = new Map()
      for (const entry of this.byOffset.values()) {
        const kind = entry.entryKind
        if (kind !== 'ofs_delta' && kind !== 'ref_delta') {
          this.plainIds.set(hashObject(kind, entry.data), entry.offset)
        }
      }
    }
    return this.plainIds
  }
}
