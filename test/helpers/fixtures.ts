/**
 * @fileoverview Byte-level fixtures for decoder and explorer tests.
 *
 * Builds loose objects, packs, version 2 pack indexes and reverse indexes
 * in memory, and a
 * small storage directory on disk under the system temp directory.
 *
 * @module test/helpers/fixtures
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import pako from 'pako'
import type { ObjectKind } from '../../src/objects/types'
import { encodeOfsOffset, encodeTypeAndSize, kindToPackObjectType } from '../../src/pack/format'
import { adler32 } from '../../src/utils/compression'
import { hashObject, sha1Hex, sha256Hex } from '../../src/utils/hash'
import { hexToBytes } from '../../src/utils/hex'

const encoder = new TextEncoder()

export function bytes(text: string): Uint8Array {
  return encoder.encode(text)
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.length
  }
  return out
}

function u32(value: number): Uint8Array {
  const out = new Uint8Array(4)
  new DataView(out.buffer).setUint32(0, value, false)
  return out
}

// ============================================================================
// Loose Objects
// ============================================================================

/** Inflated form: `"<kind> <size>\0"` and the content. */
export function rawLooseObject(kind: string, content: Uint8Array): Uint8Array {
  return concat(bytes(`${kind} ${content.length}\0`), content)
}

/** Loose object file contents (zlib-compressed). */
export function looseObjectFile(kind: string, content: Uint8Array): Uint8Array {
  return pako.deflate(rawLooseObject(kind, content))
}

/**
 * A zlib stream holding `content` (at most 65535 bytes) in a single stored
 * block, with FLEVEL 0.
 */
export function storedZlib(content: Uint8Array): Uint8Array {
  const len = content.length
  const block = new Uint8Array([0x01, len & 0xff, len >> 8, ~len & 0xff, (~len >> 8) & 0xff])
  return concat(new Uint8Array([0x78, 0x01]), block, content, u32(adler32(content)))
}

/** Tree payload from `[mode, name, objectId]` records. */
export function treePayload(records: Array<[string, string, string]>): Uint8Array {
  return concat(...records.map(([mode, name, id]) => concat(bytes(`${mode} ${name}\0`), hexToBytes(id))))
}

// ============================================================================
// Packs
// ============================================================================

export type PackEntryInput =
  | { kind: ObjectKind; content: Uint8Array }
  /** `base` is the index of an earlier entry, or the entry's own index */
  | { kind: 'ofs_delta'; base: number; delta: Uint8Array }
  | { kind: 'ref_delta'; baseId: string; delta: Uint8Array }

export interface BuiltPack {
  bytes: Uint8Array
  /** Offset of every entry */
  offsets: number[]
  checksum: string
}

export interface BuildPackOptions {
  version?: number
  /** Object count written in the header; defaults to the number of inputs */
  objectCount?: number
}

export function buildPack(inputs: PackEntryInput[], options: BuildPackOptions = {}): BuiltPack {
  const parts: Uint8Array[] = [bytes('PACK'), u32(options.version ?? 2), u32(options.objectCount ?? inputs.length)]
  const offsets: number[] = []
  let position = 12

  for (const input of inputs) {
    offsets.push(position)
    const payload = input.kind === 'ofs_delta' || input.kind === 'ref_delta' ? input.delta : input.content
    const entry: Uint8Array[] = [encodeTypeAndSize(kindToPackObjectType(input.kind), payload.length)]
    if (input.kind === 'ofs_delta') {
      entry.push(encodeOfsOffset(position - offsets[input.base]))
    } else if (input.kind === 'ref_delta') {
      entry.push(hexToBytes(input.baseId))
    }
    entry.push(pako.deflate(payload))
    const encoded = concat(...entry)
    parts.push(encoded)
    position += encoded.length
  }

  const body = concat(...parts)
  const checksum = sha1Hex(body)
  return { bytes: concat(body, hexToBytes(checksum)), offsets, checksum }
}

/**
 * A delta with single-byte size fields followed by the given instruction
 * bytes.
 */
export function delta(sourceSize: number, targetSize: number, ...instructions: number[]): Uint8Array {
  return new Uint8Array([sourceSize, targetSize, ...instructions])
}

// ============================================================================
// Pack Indexes
// ============================================================================

export interface IndexedObject {
  objectId: string
  offset: number
  crc32?: number
}

export interface BuildIndexOptions {
  /** Store every offset in the 8-byte table */
  largeOffsets?: boolean
  /** Flip a byte of the trailing checksum */
  corruptChecksum?: boolean
}

export function buildPackIndex(objects: IndexedObject[], packChecksum: string, options: BuildIndexOptions = {}): Uint8Array {
  const sorted = [...objects].sort((a, b) => (a.objectId < b.objectId ? -1 : a.objectId > b.objectId ? 1 : 0))
  const fanout = new Array<number>(256).fill(0)
  for (const object of sorted) {
    const first = parseInt(object.objectId.slice(0, 2), 16)
    for (let i = first; i < 256; i++) fanout[i]++
  }

  const large: Uint8Array[] = []
  const offsets = sorted.map((object) => {
    if (!options.largeOffsets) return u32(object.offset)
    const entry = new Uint8Array(8)
    const view = new DataView(entry.buffer)
    view.setUint32(0, Math.floor(object.offset / 0x100000000), false)
    view.setUint32(4, object.offset >>> 0, false)
    large.push(entry)
    return u32((0x80000000 | (large.length - 1)) >>> 0)
  })

  const body = concat(
    new Uint8Array([0xff, 0x74, 0x4f, 0x63]),
    u32(2),
    ...fanout.map(u32),
    ...sorted.map((o) => hexToBytes(o.objectId)),
    ...sorted.map((o) => u32(o.crc32 ?? 0)),
    ...offsets,
    ...large,
    hexToBytes(packChecksum)
  )
  const checksum = hexToBytes(sha1Hex(body))
  if (options.corruptChecksum) checksum[0] ^= 0xff
  return concat(body, checksum)
}

// ============================================================================
// Reverse Indexes
// ============================================================================

export interface BuildReverseIndexOptions {
  /** 1 for SHA-1, 2 for SHA-256 */
  hashFunctionId?: number
  version?: number
  corruptChecksum?: boolean
}

/**
 * `positions[packPosition]` is the index position written for that object.
 * `packChecksum` must be as long as the hash function's digest.
 */
export function buildReverseIndex(
  positions: number[],
  packChecksum: string,
  options: BuildReverseIndexOptions = {}
): Uint8Array {
  const hashFunctionId = options.hashFunctionId ?? 1
  const body = concat(
    bytes('RIDX'),
    u32(options.version ?? 1),
    u32(hashFunctionId),
    ...positions.map(u32),
    hexToBytes(packChecksum)
  )
  const checksum = hexToBytes(hashFunctionId === 2 ? sha256Hex(body) : sha1Hex(body))
  if (options.corruptChecksum) checksum[0] ^= 0xff
  return concat(body, checksum)
}

// ============================================================================
// Storage Directory
// ============================================================================

export const HELLO_WORLD = 'hello world\n'
export const HELLO_THERE = 'hello there\n'

/**
 * Three entries: a blob, an OFS_DELTA on it producing `hello there\n`, and
 * a REF_DELTA on it producing `hello\n`.
 */
export function samplePack(): BuiltPack {
  const baseId = hashObject('blob', bytes(HELLO_WORLD))
  return buildPack([
    { kind: 'blob', content: bytes(HELLO_WORLD) },
    { kind: 'ofs_delta', base: 0, delta: delta(12, 12, 0x90, 6, 6, ...bytes('there\n')) },
    { kind: 'ref_delta', baseId, delta: delta(12, 6, 0x90, 5, 1, 0x0a) },
  ])
}

export interface StorageFixture {
  /** Working tree holding `.git` */
  dir: string
  /** The `.git` directory */
  storage: string
  packPath: string
  indexPath: string
  loosePath: string
  looseId: string
  cleanup(): void
}

/**
 * Writes a small repository under the temp directory:
 *
 * ```
 * .git/HEAD
 * .git/config
 * .git/refs/heads/main
 * .git/refs/tags/
 * .git/objects/<loose blob "hello">
 * .git/objects/pack/pack-sample.{pack,idx}
 * ```
 */
export function createStorageFixture(): StorageFixture {
  const dir = mkdtempSync(join(tmpdir(), 'packlens-'))
  const storage = join(dir, '.git')
  const objects = join(storage, 'objects')

  mkdirSync(join(storage, 'refs', 'heads'), { recursive: true })
  mkdirSync(join(storage, 'refs', 'tags'), { recursive: true })
  mkdirSync(join(objects, 'pack'), { recursive: true })

  writeFileSync(join(storage, 'HEAD'), 'ref: refs/heads/main\n')
  writeFileSync(join(storage, 'config'), '[core]\n\tbare = false\n')

  const looseContent = bytes('hello')
  const looseId = hashObject('blob', looseContent)
  const looseDir = join(objects, looseId.slice(0, 2))
  mkdirSync(looseDir)
  const loosePath = join(looseDir, looseId.slice(2))
  writeFileSync(loosePath, looseObjectFile('blob', looseContent))
  writeFileSync(join(storage, 'refs', 'heads', 'main'), `${looseId}\n`)

  const pack = samplePack()
  const packPath = join(objects, 'pack', 'pack-sample.pack')
  const indexPath = join(objects, 'pack', 'pack-sample.idx')
  writeFileSync(packPath, pack.bytes)
  const ids = [
    hashObject('blob', bytes(HELLO_WORLD)),
    hashObject('blob', bytes(HELLO_THERE)),
    hashObject('blob', bytes('hello\n')),
  ]
  writeFileSync(
    indexPath,
    buildPackIndex(
      ids.map((objectId, i) => ({ objectId, offset: pack.offsets[i] })),
      pack.checksum
    )
  )

  return {
    dir,
    storage,
    packPath,
    indexPath,
    loosePath,
    looseId,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  }
}
