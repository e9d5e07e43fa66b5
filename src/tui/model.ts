/**
 * @fileoverview Explorer state
 *
 * The whole state is one {@link AppState} value owned by the event loop.
 * Exactly one {@link AppView} is active; the Main view's state is kept on a
 * stack while a detail view is open so that going back restores it
 * unchanged.
 *
 * @module tui/model
 */

import type { StyledLine } from '../cli/ui/styled'
import {
  CHROME_ROWS,
  DEFAULT_TERMINAL_HEIGHT,
  DEFAULT_TERMINAL_WIDTH,
  MIN_LIST_HEIGHT,
} from '../constants'
import type { DecodedLooseObject } from '../objects/types'
import type { PackHeader } from '../pack/format'
import type { DecodedPackEntry, PackChecksum, PackResolver } from '../pack/unpack'
import type { RepositoryNode, VisibleRow } from '../repository/tree-builder'

// ============================================================================
// Layout
// ============================================================================

/** Terminals at least this wide show list and content side by side */
export const WIDE_LAYOUT_COLUMNS = 100

export interface Layout {
  width: number
  height: number
  orientation: 'columns' | 'rows'
  /** Rows between the title bar and the hint strip */
  bodyHeight: number
  /** Visible rows of a list pane (tree, pack entries) */
  listHeight: number
  /** Visible rows of the content pane next to or below the list */
  contentHeight: number
  listWidth: number
  contentWidth: number
}

/**
 * Splits the terminal into panes. Wide terminals get columns (40% list),
 * narrow ones get rows (40% list on top).
 */
export function computeLayout(width = DEFAULT_TERMINAL_WIDTH, height = DEFAULT_TERMINAL_HEIGHT): Layout {
  const safeWidth = Math.max(20, Math.floor(width))
  const safeHeight = Math.max(CHROME_ROWS + MIN_LIST_HEIGHT * 2, Math.floor(height))
  const bodyHeight = safeHeight - CHROME_ROWS

  if (safeWidth >= WIDE_LAYOUT_COLUMNS) {
    const listWidth = Math.floor(safeWidth * 0.4)
    return {
      width: safeWidth,
      height: safeHeight,
      orientation: 'columns',
      bodyHeight,
      listHeight: bodyHeight,
      contentHeight: bodyHeight,
      listWidth,
      contentWidth: safeWidth - listWidth - 1,
    }
  }

  const listHeight = Math.max(MIN_LIST_HEIGHT, Math.floor(bodyHeight * 0.4))
  return {
    width: safeWidth,
    height: safeHeight,
    orientation: 'rows',
    bodyHeight,
    listHeight,
    // One row separates the panes
    contentHeight: Math.max(1, bodyHeight - listHeight - 1),
    listWidth: safeWidth,
    contentWidth: safeWidth,
  }
}

// ============================================================================
// View States
// ============================================================================

export interface MainViewState {
  root: RepositoryNode
  /** Paths of expanded directories */
  expanded: ReadonlySet<string>
  /** Flattened visible rows for `expanded` */
  rows: VisibleRow[]
  selectedIndex: number
  scrollOffset: number
  /** Preview of the selected row */
  preview: StyledLine[]
  previewScroll: number
}

export interface PackViewState {
  path: string
  header?: PackHeader
  checksum?: PackChecksum
  entries: DecodedPackEntry[]
  /** Why the pack, or part of it, could not be decoded */
  error?: unknown
  /** Memoized delta resolution for this pack */
  resolver?: PackResolver
  selectedIndex: number
  listScroll: number
  /** Rendered detail of the selected entry */
  content: StyledLine[]
  contentScroll: number
}

export interface LooseViewState {
  path: string
  object?: DecodedLooseObject
  error?: unknown
  lines: StyledLine[]
  scrollOffset: number
}

export type AppView =
  | { kind: 'main'; state: MainViewState }
  | { kind: 'pack-detail'; state: PackViewState }
  | { kind: 'loose-detail'; state: LooseViewState }

export type ViewKind = AppView['kind']

export interface AppState {
  /** Storage directory being explored */
  rootPath: string
  view: AppView
  /** Views to return to; the Main view sits here while a detail is open */
  viewStack: AppView[]
  layout: Layout
  /** One-line status, e.g. the result of the last refresh */
  status?: string
  shouldQuit: boolean
}
