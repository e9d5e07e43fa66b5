/**
 * @fileoverview Decoded object model
 *
 * Structured forms of the objects stored in a repository's object database.
 * Loose objects and resolved pack entries share the same payload shapes.
 *
 * @module objects/types
 */

/**
 * The four object kinds that carry content.
 */
export type ObjectKind = 'blob' | 'tree' | 'commit' | 'tag'

export function isObjectKind(value: string): value is ObjectKind {
  return value === 'blob' || value === 'tree' || value === 'commit' || value === 'tag'
}

/**
 * What a tree entry points at, derived from its mode.
 */
export type TreeEntryKind = 'blob' | 'executable' | 'symlink' | 'submodule' | 'tree' | 'unknown'

export interface TreeEntry {
  /** Octal mode as written in the tree, e.g. `100644` or `40000` */
  mode: string
  name: string
  /** 40-character hex id of the referenced object */
  objectId: string
  kind: TreeEntryKind
}

/**
 * One `key value` line of a commit or tag header.
 * Continuation lines (leading space) are folded into the previous value.
 */
export interface HeaderField {
  key: string
  value: string
}

/**
 * A name, email and timestamp as written in `author`, `committer` and
 * `tagger` lines.
 */
export interface Signature {
  name: string
  email: string
  /** Seconds since the epoch */
  timestamp: number
  /** Offset as written, e.g. `+0200` */
  timezone: string
}

export interface BlobPayload {
  kind: 'blob'
  data: Uint8Array
  isBinary: boolean
}

export interface TreePayload {
  kind: 'tree'
  entries: TreeEntry[]
}

export interface CommitPayload {
  kind: 'commit'
  headers: HeaderField[]
  message: string
  tree?: string
  parents: string[]
  author?: Signature
  committer?: Signature
}

export interface TagPayload {
  kind: 'tag'
  headers: HeaderField[]
  message: string
  object?: string
  targetType?: string
  tagName?: string
  tagger?: Signature
}

export type ObjectPayload = BlobPayload | TreePayload | CommitPayload | TagPayload

/**
 * A loose object after inflation and header parsing.
 */
export interface DecodedLooseObject {
  objectKind: ObjectKind
  /** Size from the `"<kind> <size>\0"` header; always equals `raw.length` */
  declaredSize: number
  /** Bytes following the header */
  raw: Uint8Array
  payload: ObjectPayload
  /** Length of the inflated header including the NUL */
  headerLength: number
  /** Id taken from the `xx/yyyy...` path, when the path has that shape */
  objectId?: string
  /** Size of the file on disk before inflation */
  compressedSize?: number
}
