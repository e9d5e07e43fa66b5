/**
 * @fileoverview Main view transitions
 *
 * Selection, expansion and preview scrolling over the repository tree.
 * `Activate` on a pack or loose object does not open the detail view here;
 * it returns the message that does, and the root dispatcher applies it.
 *
 * @module tui/main-view/update
 */

import * as path from 'node:path'
import { buildTree, classifyNode, flattenTree, type RepositoryNode, type VisibleRow } from '../../repository/tree-builder'
import type { UpdateContext } from '../context'
import { formatNodePreview } from '../formatters/node-preview'
import { openLooseDetail, openPackDetail, type MainNavigation, type Message } from '../message'
import type { Layout, MainViewState } from '../model'
import { applyScrollAction, clampScroll, clampSelection, followSelection, type ScrollAction } from '../scrolling'

export interface MainUpdate {
  state: MainViewState
  /** Follow-up message for the root dispatcher */
  next?: Message
}

// ============================================================================
// Construction
// ============================================================================

function withSelection(
  state: Omit<MainViewState, 'preview' | 'previewScroll'>,
  index: number,
  layout: Layout,
  ctx: UpdateContext
): MainViewState {
  const selectedIndex = clampSelection(index, state.rows.length)
  const row: VisibleRow | undefined = state.rows[selectedIndex]
  return {
    ...state,
    selectedIndex,
    scrollOffset: followSelection(selectedIndex, state.scrollOffset, state.rows.length, layout.listHeight),
    preview: row ? formatNodePreview(row.node, ctx.access) : [],
    previewScroll: 0,
  }
}

/**
 * Main view over a freshly built tree: everything collapsed, first row
 * selected.
 *
 * @throws {IoError} when the root cannot be listed
 */
export function createMainState(rootPath: string, layout: Layout, ctx: UpdateContext): MainViewState {
  const root = buildTree(rootPath, ctx.access, { sort: ctx.config.sortEntries, logger: ctx.logger })
  const expanded = new Set<string>()
  const rows = flattenTree(root, expanded)
  return withSelection({ root, expanded, rows, selectedIndex: 0, scrollOffset: 0 }, 0, layout, ctx)
}

function collectDirectories(node: RepositoryNode, into: Set<string>): Set<string> {
  if (node.kind === 'directory') {
    into.add(node.path)
    for (const child of node.children) collectDirectories(child, into)
  }
  return into
}

/**
 * Rebuilds the tree, keeping the expanded directories and the selected path
 * that still exist.
 *
 * @throws {IoError} when the root cannot be listed
 */
export function refreshMainState(state: MainViewState, layout: Layout, ctx: UpdateContext): MainViewState {
  const root = buildTree(state.root.path, ctx.access, { sort: ctx.config.sortEntries, logger: ctx.logger })
  const directories = collectDirectories(root, new Set())
  const expanded = new Set([...state.expanded].filter((p) => directories.has(p)))
  const rows = flattenTree(root, expanded)

  const previous: VisibleRow | undefined = state.rows[state.selectedIndex]
  const selectedPath = previous?.node.path
  const kept = rows.findIndex((row) => row.node.path === selectedPath)
  const index = kept >= 0 ? kept : state.selectedIndex

  return withSelection(
    { root, expanded, rows, selectedIndex: index, scrollOffset: state.scrollOffset },
    index,
    layout,
    ctx
  )
}

/**
 * Re-applies the clamp law to both panes after a layout change.
 */
export function resizeMainState(state: MainViewState, layout: Layout): MainViewState {
  return {
    ...state,
    scrollOffset: followSelection(state.selectedIndex, state.scrollOffset, state.rows.length, layout.listHeight),
    previewScroll: clampScroll(state.previewScroll, state.preview.length, layout.contentHeight),
  }
}

// ============================================================================
// Navigation
// ============================================================================

function setExpanded(state: MainViewState, dirPath: string, open: boolean, layout: Layout): MainViewState {
  const expanded = new Set(state.expanded)
  if (open) expanded.add(dirPath)
  else expanded.delete(dirPath)
  const rows = flattenTree(state.root, expanded)
  return {
    ...state,
    expanded,
    rows,
    scrollOffset: followSelection(state.selectedIndex, state.scrollOffset, rows.length, layout.listHeight),
  }
}

/** Index of the row holding the parent directory of row `index`, if shown. */
function parentRowIndex(state: MainViewState, index: number): number | undefined {
  const row: VisibleRow | undefined = state.rows[index]
  if (!row || row.depth === 0) return undefined
  const parentPath = path.dirname(row.node.path)
  for (let i = index - 1; i >= 0; i--) {
    if (state.rows[i].node.path === parentPath) return i
  }
  return undefined
}

export function updateMain(
  state: MainViewState,
  action: MainNavigation,
  layout: Layout,
  ctx: UpdateContext
): MainUpdate {
  const selected: VisibleRow | undefined = state.rows[state.selectedIndex]
  const select = (index: number): MainUpdate => {
    if (clampSelection(index, state.rows.length) === state.selectedIndex) return { state }
    return { state: withSelection(state, index, layout, ctx) }
  }
  const scrollPreview = (scroll: ScrollAction): MainUpdate => ({
    state: {
      ...state,
      previewScroll: applyScrollAction(scroll, state.previewScroll, state.preview.length, layout.contentHeight),
    },
  })

  switch (action) {
    case 'SelectPrevious':
      return select(state.selectedIndex - 1)
    case 'SelectNext':
      return select(state.selectedIndex + 1)
    case 'SelectFirst':
      return select(0)
    case 'SelectLast':
      return select(state.rows.length - 1)

    case 'ToggleExpand':
      if (selected?.node.kind !== 'directory') return { state }
      return { state: setExpanded(state, selected.node.path, !state.expanded.has(selected.node.path), layout) }

    case 'CollapseOrParent': {
      if (!selected) return { state }
      if (selected.node.kind === 'directory' && state.expanded.has(selected.node.path)) {
        return { state: setExpanded(state, selected.node.path, false, layout) }
      }
      const parent = parentRowIndex(state, state.selectedIndex)
      return parent === undefined ? { state } : select(parent)
    }

    case 'Activate': {
      if (!selected) return { state }
      switch (classifyNode(selected.node)) {
        case 'directory':
          return { state: setExpanded(state, selected.node.path, !state.expanded.has(selected.node.path), layout) }
        case 'pack':
          return { state, next: openPackDetail(selected.node.path) }
        case 'loose-object':
          return { state, next: openLooseDetail(selected.node.path) }
        default:
          return { state }
      }
    }

    case 'ScrollPreviewUp':
      return scrollPreview('ScrollUp')
    case 'ScrollPreviewDown':
      return scrollPreview('ScrollDown')
    case 'ScrollPreviewToTop':
      return scrollPreview('ScrollToTop')
    case 'ScrollPreviewToBottom':
      return scrollPreview('ScrollToBottom')
  }
}
