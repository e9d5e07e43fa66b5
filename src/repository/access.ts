/**
 * @fileoverview Repository access service
 *
 * Read-only access to a repository's storage directory: directory listings,
 * raw reads, and decoded views of loose objects, packs, pack indexes and
 * reverse indexes.
 * Nothing is cached between calls.
 *
 * @module repository/access
 *
 * @example
 * ```typescript
 * import { createRepositoryAccess } from './access'
 *
 * const access = createRepositoryAccess()
 * const root = access.findStorageRoot(process.cwd())
 * const pack = access.openPack(`${root}/objects/pack/pack-1234.pack`)
 * for (const entry of pack.entries()) {
 *   console.log(entry.offset, entry.entryKind)
 * }
 * ```
 */

import { closeSync, fstatSync, openSync, readdirSync, readFileSync, readSync, statSync, type Dirent, type Stats } from 'node:fs'
import * as path from 'node:path'
import { PACK_HEADER_SIZE } from '../constants'
import { IoError, isPackLensError } from '../errors'
import { decodeLooseObjectFile } from '../objects/loose'
import type { DecodedLooseObject } from '../objects/types'
import { parsePackHeader, type PackHeader } from '../pack/format'
import { parsePackIndex, type PackIndex } from '../pack/index'
import { parsePackReverseIndex, type PackReverseIndex } from '../pack/reverse-index'
import {
  decodePack,
  iteratePackEntries,
  verifyPackChecksum,
  type DecodedPack,
  type DecodedPackEntry,
  type PackChecksum,
} from '../pack/unpack'
import { inflateBytes } from '../utils/compression'
import { noopLogger, type Logger } from '../utils/logger'

// ============================================================================
// Types
// ============================================================================

export interface DirectoryEntry {
  name: string
  /** Absolute path */
  path: string
  isDir: boolean
  /** Byte size of files; absent for directories or when metadata failed */
  size?: number
}

export interface DirectoryListing {
  /** Entries in the order the filesystem returned them */
  entries: DirectoryEntry[]
  /** Entries dropped because their metadata could not be read */
  skipped: number
}

/**
 * An opened, validated pack file.
 */
export interface PackHandle {
  path: string
  header: PackHeader
  size: number
  checksum: PackChecksum
  /** Lazily decodes entries; every call starts from the first entry */
  entries(): Iterable<DecodedPackEntry>
  /** Decodes all entries, keeping the ones before a malformed entry */
  decodeAll(): DecodedPack
}

/**
 * A pack's fixed header and file size, read without the body.
 */
export interface PackFileSummary {
  header: PackHeader
  size: number
}

/**
 * Operations the tree builder and the views need from the filesystem.
 */
export interface RepositoryAccess {
  /**
   * @throws {IoError} when the directory itself cannot be listed
   */
  listDirectory(dirPath: string): DirectoryListing
  /**
   * @throws {IoError} NOT_FOUND or READ_ERROR
   */
  readRaw(filePath: string): Uint8Array
  /**
   * @throws {CompressionError} on a malformed stream
   */
  inflate(bytes: Uint8Array): Uint8Array
  /**
   * @throws {IoError} when unreadable, {@link DecodeError} on a bad signature or version
   */
  openPack(filePath: string): PackHandle
  /**
   * Reads the first 12 bytes only. Nothing is inflated or checksummed.
   *
   * @throws {IoError} when unreadable, {@link DecodeError} on a bad signature or version
   */
  readPackHeader(filePath: string): PackFileSummary
  readLooseObject(filePath: string): DecodedLooseObject
  readPackIndex(filePath: string): PackIndex
  readPackReverseIndex(filePath: string): PackReverseIndex
  /** Reads a small text file such as a ref or HEAD */
  readText(filePath: string): string
  /**
   * Returns the storage directory for `startPath`: its `.git` directory, or
   * `startPath` itself when it already is one.
   *
   * @throws {IoError} NOT_FOUND or NOT_A_REPOSITORY
   */
  findStorageRoot(startPath: string): string
}

export interface RepositoryAccessOptions {
  logger?: Logger
}

// ============================================================================
// Filesystem Implementation
// ============================================================================

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function tryStat(target: string): Stats | undefined {
  try {
    return statSync(target)
  } catch {
    return undefined
  }
}

/**
 * {@link RepositoryAccess} over `node:fs`.
 */
export class FsRepositoryAccess implements RepositoryAccess {
  private readonly logger: Logger

  constructor(options: RepositoryAccessOptions = {}) {
    this.logger = options.logger ?? noopLogger
  }

  listDirectory(dirPath: string): DirectoryListing {
    let dirents: Dirent[]
    try {
      dirents = readdirSync(dirPath, { withFileTypes: true })
    } catch (error) {
      throw isMissing(error) ? IoError.notFound(dirPath, error) : IoError.readFailed(dirPath, error)
    }

    const entries: DirectoryEntry[] = []
    let skipped = 0

    for (const dirent of dirents) {
      const entryPath = path.join(dirPath, dirent.name)
      const stats = tryStat(entryPath)

      if (stats) {
        entries.push({
          name: dirent.name,
          path: entryPath,
          isDir: stats.isDirectory(),
          ...(stats.isDirectory() ? {} : { size: stats.size }),
        })
      } else if (dirent.isDirectory() || dirent.isFile()) {
        entries.push({ name: dirent.name, path: entryPath, isDir: dirent.isDirectory() })
      } else {
        skipped++
        this.logger.debug('Skipped unreadable directory entry', { path: entryPath })
      }
    }

    return { entries, skipped }
  }

  readRaw(filePath: string): Uint8Array {
    try {
      return new Uint8Array(readFileSync(filePath))
    } catch (error) {
      throw isMissing(error) ? IoError.notFound(filePath, error) : IoError.readFailed(filePath, error)
    }
  }

  inflate(bytes: Uint8Array): Uint8Array {
    return inflateBytes(bytes)
  }

  openPack(filePath: string): PackHandle {
    const data = this.readRaw(filePath)
    const header = parsePackHeader(data)
    this.logger.debug('Opened pack', { path: filePath, version: header.version, objectCount: header.objectCount })

    return {
      path: filePath,
      header,
      size: data.length,
      checksum: verifyPackChecksum(data),
      entries: () => ({ [Symbol.iterator]: () => iteratePackEntries(data) }),
      decodeAll: () => decodePack(data),
    }
  }

  readPackHeader(filePath: string): PackFileSummary {
    let fd: number
    try {
      fd = openSync(filePath, 'r')
    } catch (error) {
      throw isMissing(error) ? IoError.notFound(filePath, error) : IoError.readFailed(filePath, error)
    }

    try {
      const head = new Uint8Array(PACK_HEADER_SIZE)
      const read = readSync(fd, head, 0, PACK_HEADER_SIZE, 0)
      const { size } = fstatSync(fd)
      return { header: parsePackHeader(head.subarray(0, read)), size }
    } catch (error) {
      if (isPackLensError(error)) throw error
      throw IoError.readFailed(filePath, error)
    } finally {
      closeSync(fd)
    }
  }

  readLooseObject(filePath: string): DecodedLooseObject {
    return decodeLooseObjectFile(this.readRaw(filePath), { path: filePath })
  }

  readPackIndex(filePath: string): PackIndex {
    return parsePackIndex(this.readRaw(filePath))
  }

  readPackReverseIndex(filePath: string): PackReverseIndex {
    return parsePackReverseIndex(this.readRaw(filePath))
  }

  readText(filePath: string): string {
    return new TextDecoder().decode(this.readRaw(filePath))
  }

  findStorageRoot(startPath: string): string {
    const resolved = path.resolve(startPath)
    const stats = tryStat(resolved)
    if (!stats) {
      throw IoError.notFound(resolved)
    }

    const dotGit = path.join(resolved, '.git')
    if (tryStat(dotGit)?.isDirectory()) {
      return dotGit
    }

    if (stats.isDirectory() && tryStat(path.join(resolved, 'objects'))?.isDirectory()) {
      return resolved
    }

    throw IoError.notARepository(resolved)
  }
}

export function createRepositoryAccess(options: RepositoryAccessOptions = {}): RepositoryAccess {
  return new FsRepositoryAccess(options)
}
