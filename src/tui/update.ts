/**
 * @fileoverview Root dispatcher
 *
 * `update(state, message, ctx)` is the only way the explorer's state
 * changes. It is total: a message that does not apply to the active view
 * returns the state unchanged.
 *
 * @module tui/update
 */

import { describeError } from '../errors'
import { countNodes } from '../repository/tree-builder'
import type { UpdateContext } from './context'
import { openLooseView, resizeLooseState, updateLoose } from './loose-details/update'
import { createMainState, refreshMainState, resizeMainState, updateMain } from './main-view/update'
import type { Message } from './message'
import { computeLayout, type AppState, type AppView, type Layout } from './model'
import { openPackView, resizePackState, updatePack } from './pack-details/update'

/**
 * Initial state: the Main view over the tree at `rootPath`.
 *
 * @throws {IoError} when the root cannot be listed
 */
export function createInitialState(rootPath: string, ctx: UpdateContext, layout: Layout = computeLayout()): AppState {
  return {
    rootPath,
    view: { kind: 'main', state: createMainState(rootPath, layout, ctx) },
    viewStack: [],
    layout,
    shouldQuit: false,
  }
}

function resizeView(view: AppView, layout: Layout): AppView {
  switch (view.kind) {
    case 'main':
      return { kind: 'main', state: resizeMainState(view.state, layout) }
    case 'pack-detail':
      return { kind: 'pack-detail', state: resizePackState(view.state, layout) }
    case 'loose-detail':
      return { kind: 'loose-detail', state: resizeLooseState(view.state, layout) }
  }
}

/**
 * Opens a detail view. Main is saved on the stack; a detail view already
 * open is replaced, so going back always lands on Main.
 */
function openDetail(state: AppState, view: AppView): AppState {
  const viewStack = state.view.kind === 'main' ? [...state.viewStack, state.view] : state.viewStack
  return { ...state, view, viewStack, status: undefined }
}

function refresh(state: AppState, ctx: UpdateContext): AppState {
  const stacked = state.viewStack.findIndex((v) => v.kind === 'main')
  const target = state.view.kind === 'main' ? state.view : state.viewStack[stacked]
  if (target?.kind !== 'main') return state

  try {
    const refreshed: AppView = { kind: 'main', state: refreshMainState(target.state, state.layout, ctx) }
    const status = `Refreshed: ${countNodes(refreshed.state.root) - 1} entries`
    if (state.view.kind === 'main') {
      return { ...state, view: refreshed, status }
    }
    const viewStack = state.viewStack.map((v, i) => (i === stacked ? refreshed : v))
    return { ...state, viewStack, status }
  } catch (error) {
    ctx.logger.warn('Refresh failed', { root: state.rootPath, reason: describeError(error) })
    return { ...state, status: `Refresh failed: ${describeError(error)}` }
  }
}

export function update(state: AppState, message: Message, ctx: UpdateContext): AppState {
  const { view, layout } = state

  switch (message.type) {
    case 'OpenMainView': {
      if (view.kind === 'main') return state
      const previous = state.viewStack[state.viewStack.length - 1]
      if (previous === undefined) return state
      return { ...state, view: previous, viewStack: state.viewStack.slice(0, -1), status: undefined }
    }

    case 'OpenPackDetail':
      ctx.logger.debug('Opening pack', { path: message.path })
      return openDetail(state, { kind: 'pack-detail', state: openPackView(message.path, layout, ctx) })

    case 'OpenLooseDetail':
      ctx.logger.debug('Opening loose object', { path: message.path })
      return openDetail(state, { kind: 'loose-detail', state: openLooseView(message.path, ctx) })

    case 'MainNavigation': {
      if (view.kind !== 'main') return state
      const { state: main, next } = updateMain(view.state, message.action, layout, ctx)
      const updated: AppState = { ...state, view: { kind: 'main', state: main } }
      return next ? update(updated, next, ctx) : updated
    }

    case 'PackNavigation':
      if (view.kind !== 'pack-detail') return state
      return { ...state, view: { kind: 'pack-detail', state: updatePack(view.state, message.action, layout, ctx) } }

    case 'LooseObjectNavigation':
      if (view.kind !== 'loose-detail') return state
      return { ...state, view: { kind: 'loose-detail', state: updateLoose(view.state, message.action, layout) } }

    case 'Refresh':
      return refresh(state, ctx)

    case 'TerminalResize': {
      const resized = computeLayout(message.width, message.height)
      return {
        ...state,
        layout: resized,
        view: resizeView(view, resized),
        viewStack: state.viewStack.map((v) => resizeView(v, resized)),
      }
    }

    case 'Quit':
      return { ...state, shouldQuit: true }
  }
}
