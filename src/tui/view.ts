/**
 * @fileoverview Frame rendering
 *
 * `render(state)` is pure: the same state always yields the same frame, and
 * nothing is read from disk while rendering.
 *
 * @module tui/view
 */

import { KeyHints, type KeyHintsElement, type RegionElement } from '../cli/ui/components'
import { keyHintsFor } from './key-bindings'
import { looseTitle, renderLoose } from './loose-details/view'
import { renderMain } from './main-view/view'
import type { AppState, Layout } from './model'
import { packStatus, packTitle, renderPack } from './pack-details/view'

export interface Frame {
  title: string
  layout: Layout
  regions: RegionElement[]
  hints: KeyHintsElement
  status?: string
}

export function render(state: AppState): Frame {
  const { view, layout } = state
  let title: string
  let regions: RegionElement[]
  let status = state.status

  switch (view.kind) {
    case 'main':
      title = `packlens ${state.rootPath}`
      regions = renderMain(view.state, layout)
      break
    case 'pack-detail':
      title = packTitle(view.state)
      regions = renderPack(view.state, layout)
      status = status ?? packStatus(view.state)
      break
    case 'loose-detail':
      title = looseTitle(view.state)
      regions = renderLoose(view.state, layout)
      break
  }

  return {
    title,
    layout,
    regions,
    hints: KeyHints(keyHintsFor(view.kind)),
    ...(status !== undefined && { status }),
  }
}
