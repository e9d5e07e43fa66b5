/**
 * @fileoverview Repository tree construction
 *
 * Builds a point-in-time snapshot of the storage directory as a tree of
 * {@link RepositoryNode}s. The tree is rebuilt wholesale on refresh and never
 * patched.
 *
 * @module repository/tree-builder
 */

import * as path from 'node:path'
import { isIoError } from '../errors'
import { noopLogger, type Logger } from '../utils/logger'
import type { DirectoryListing, RepositoryAccess } from './access'
import { educationalNoteFor } from './educational'

// ============================================================================
// Types
// ============================================================================

export type NodeKind = 'directory' | 'file'

export interface RepositoryNode {
  name: string
  /** Absolute path */
  path: string
  kind: NodeKind
  /** Files only; absent when metadata could not be read */
  size?: number
  educationalNote?: string
  /** Always empty for files */
  children: RepositoryNode[]
  /** Directory entries dropped because they could not be read */
  skippedEntries?: number
}

/**
 * What a node is, for choosing its preview and what activating it does.
 */
export type NodeCategory = 'pack' | 'pack-index' | 'pack-rev' | 'loose-object' | 'ref' | 'directory' | 'other'

export interface BuildTreeOptions {
  /**
   * Order children with directories first, then by natural name order.
   * When false, children keep the filesystem's listing order.
   */
  sort?: boolean
  logger?: Logger
}

/**
 * A node as shown in the list: the node and its depth below the root.
 */
export interface VisibleRow {
  node: RepositoryNode
  depth: number
}

// ============================================================================
// Ordering
// ============================================================================

/**
 * Compares names so that digit runs compare numerically: `pack-2` sorts
 * before `pack-10`. Letters compare case-insensitively.
 */
export function naturalCompare(a: string, b: string): number {
  const partsA = a.toLowerCase().match(/\d+|\D+/g) ?? []
  const partsB = b.toLowerCase().match(/\d+|\D+/g) ?? []

  for (let i = 0; i < Math.min(partsA.length, partsB.length); i++) {
    const pa = partsA[i]
    const pb = partsB[i]
    const numA = /^\d/.test(pa)
    const numB = /^\d/.test(pb)

    if (numA && numB) {
      const diff = Number(pa) - Number(pb)
      if (diff !== 0) return diff
      if (pa.length !== pb.length) return pa.length - pb.length
    } else if (numA !== numB) {
      return numA ? 1 : -1
    } else if (pa !== pb) {
      return pa < pb ? -1 : 1
    }
  }

  return partsA.length - partsB.length
}

function compareNodes(a: RepositoryNode, b: RepositoryNode): number {
  if (a.kind !== b.kind) {
    return a.kind === 'directory' ? -1 : 1
  }
  return naturalCompare(a.name, b.name)
}

// ============================================================================
// Building
// ============================================================================

function buildDirectory(
  dirPath: string,
  rootPath: string,
  access: RepositoryAccess,
  options: Required<BuildTreeOptions>
): RepositoryNode {
  const node: RepositoryNode = {
    name: path.basename(dirPath),
    path: dirPath,
    kind: 'directory',
    children: [],
  }
  const note = educationalNoteFor(rootPath, dirPath)
  if (note !== undefined) node.educationalNote = note

  let listing: DirectoryListing
  try {
    listing = access.listDirectory(dirPath)
  } catch (error) {
    if (!isIoError(error) || dirPath === rootPath) throw error
    options.logger.warn('Could not list directory', { path: dirPath, code: error.code })
    node.skippedEntries = 1
    return node
  }

  if (listing.skipped > 0) {
    node.skippedEntries = listing.skipped
  }

  for (const entry of listing.entries) {
    if (entry.isDir) {
      node.children.push(buildDirectory(entry.path, rootPath, access, options))
      continue
    }
    const child: RepositoryNode = { name: entry.name, path: entry.path, kind: 'file', children: [] }
    if (entry.size !== undefined) child.size = entry.size
    const childNote = educationalNoteFor(rootPath, entry.path)
    if (childNote !== undefined) child.educationalNote = childNote
    node.children.push(child)
  }

  if (options.sort) {
    node.children.sort(compareNodes)
  }

  return node
}

/**
 * Walks `rootPath` recursively.
 *
 * An unreadable subdirectory becomes an empty directory node with
 * `skippedEntries` set; only a failure to list the root itself throws.
 *
 * @throws {IoError} when the root cannot be listed
 */
export function buildTree(rootPath: string, access: RepositoryAccess, options: BuildTreeOptions = {}): RepositoryNode {
  const resolved = path.resolve(rootPath)
  const logger = options.logger ?? noopLogger
  const root = buildDirectory(resolved, resolved, access, { sort: options.sort ?? true, logger })
  logger.debug('Built repository tree', { root: resolved, nodes: countNodes(root) })
  return root
}

export function countNodes(node: RepositoryNode): number {
  let count = 1
  for (const child of node.children) {
    count += countNodes(child)
  }
  return count
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Classifies a node by its location and name.
 */
export function classifyNode(node: RepositoryNode): NodeCategory {
  if (node.kind === 'directory') return 'directory'

  const parent = path.basename(path.dirname(node.path))
  const segments = node.path.split(/[/\\]/)

  if (parent === 'pack' && node.name.endsWith('.pack')) return 'pack'
  if (parent === 'pack' && node.name.endsWith('.idx')) return 'pack-index'
  if (parent === 'pack' && node.name.endsWith('.rev')) return 'pack-rev'
  if (/^[0-9a-f]{2}$/.test(parent) && /^[0-9a-f]{38}$/.test(node.name)) return 'loose-object'
  if (segments.includes('refs') || node.name === 'HEAD' || node.name === 'packed-refs' || node.name.endsWith('_HEAD')) {
    return 'ref'
  }
  return 'other'
}

/**
 * Lists the rows shown for the current expansion state: the root's children,
 * and the children of every expanded directory, depth first.
 */
export function flattenTree(root: RepositoryNode, expanded: ReadonlySet<string>): VisibleRow[] {
  const rows: VisibleRow[] = []
  const visit = (node: RepositoryNode, depth: number): void => {
    for (const child of node.children) {
      rows.push({ node: child, depth })
      if (child.kind === 'directory' && expanded.has(child.path)) {
        visit(child, depth + 1)
      }
    }
  }
  visit(root, 0)
  return rows
}

/**
 * Finds the node at `targetPath`, if it is in the tree.
 */
export function findNode(root: RepositoryNode, targetPath: string): RepositoryNode | undefined {
  if (root.path === targetPath) return root
  for (const child of root.children) {
    if (targetPath === child.path || targetPath.startsWith(child.path + path.sep)) {
      return findNode(child, targetPath)
    }
  }
  return undefined
}
