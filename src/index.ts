/**
 * packlens
 *
 * Decoders for git object storage (loose objects, pack files, pack indexes
 * and deltas) and an interactive terminal explorer built on them.
 *
 * @module packlens
 *
 * @example
 * ```typescript
 * import { createRepositoryAccess, PackResolver } from 'packlens'
 *
 * const access = createRepositoryAccess()
 * const { entries } = access.openPack('.git/objects/pack/pack-1.pack').decodeAll()
 * const resolver = new PackResolver(entries)
 * const { kind, objectId } = resolver.resolve(entries[0])
 * ```
 */

// =============================================================================
// Errors
// =============================================================================

export {
  PackLensError,
  IoError,
  DecodeError,
  CompressionError,
  isPackLensError,
  isIoError,
  isDecodeError,
  isCompressionError,
  hasErrorCode,
  describeError,
  type PackLensErrorCode,
  type IoErrorCode,
  type DecodeErrorCode,
} from './errors'

// =============================================================================
// Object Decoding
// =============================================================================

export * from './objects/types'
export {
  parseLooseHeader,
  parseTreeEntries,
  parseSignature,
  parseHeaderFields,
  parseObjectPayload,
  isBinaryContent,
  objectIdFromPath,
  decodeLooseObject,
  decodeLooseObjectFile,
  type LooseObjectHeader,
} from './objects/loose'

// =============================================================================
// Pack Files
// =============================================================================

export {
  PACK_SIGNATURE,
  PackObjectType,
  packObjectTypeToKind,
  isDeltaKind,
  encodeTypeAndSize,
  decodeTypeAndSize,
  encodeOfsOffset,
  decodeOfsOffset,
  parsePackHeader,
  type PackEntryKind,
  type PackHeader,
  type TypeAndSize,
} from './pack/format'
export { parseDeltaHeader, parseDelta, applyDelta, type DeltaInstruction, type ParsedDelta } from './pack/delta'
export { parsePackIndex, type PackIndex, type PackIndexEntry } from './pack/index'
export { parsePackReverseIndex, type PackReverseIndex, type HashFunctionName } from './pack/reverse-index'
export {
  readPackEntry,
  iteratePackEntries,
  verifyPackChecksum,
  decodePack,
  PackResolver,
  type BaseReference,
  type DecodedPack,
  type DecodedPackEntry,
  type PackChecksum,
  type ResolvedObject,
  type PackResolverOptions,
} from './pack/unpack'

// =============================================================================
// Repository
// =============================================================================

export {
  FsRepositoryAccess,
  createRepositoryAccess,
  type RepositoryAccess,
  type RepositoryAccessOptions,
  type DirectoryEntry,
  type DirectoryListing,
  type PackHandle,
  type PackFileSummary,
} from './repository/access'
export {
  buildTree,
  flattenTree,
  findNode,
  countNodes,
  classifyNode,
  naturalCompare,
  type RepositoryNode,
  type NodeKind,
  type NodeCategory,
  type VisibleRow,
} from './repository/tree-builder'

// =============================================================================
// Explorer
// =============================================================================

export { loadConfig, type PackLensConfig } from './config'
export { createLogger, noopLogger, type Logger, type LogLevel } from './utils/logger'
export { createInitialState, update } from './tui/update'
export { render, type Frame } from './tui/view'
export { ExplorerSession } from './tui/session'
export { mapKey, keyHintsFor } from './tui/key-bindings'
export { createServiceContainer, type ServiceContainer } from './tui/services/service-container'
export type { AppState, AppView, Layout } from './tui/model'
export type { Message } from './tui/message'

// =============================================================================
// CLI
// =============================================================================

export { runCLI, type CLIOptions, type CLIResult } from './cli'
