import * as path from 'node:path'
import { ErrorDisplay, ScrollableContent, type RegionElement } from '../../cli/ui/components'
import type { Layout, LooseViewState } from '../model'

export function looseTitle(state: LooseViewState): string {
  const id = state.object?.objectId
  return id !== undefined ? `Object ${id}` : `Object ${path.basename(state.path)}`
}

export function renderLoose(state: LooseViewState, layout: Layout): RegionElement[] {
  if (state.error !== undefined) {
    return [ErrorDisplay({ title: 'Object could not be decoded', error: state.error, detail: state.path })]
  }
  return [
    ScrollableContent({
      title: state.object ? state.object.objectKind : 'Object',
      lines: state.lines,
      scrollOffset: state.scrollOffset,
      height: layout.bodyHeight,
    }),
  ]
}
