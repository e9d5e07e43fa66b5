import * as path from 'node:path'
import { ErrorDisplay, NavigationList, ScrollableContent, type RegionElement } from '../../cli/ui/components'
import { span, type StyledLine } from '../../cli/ui/styled'
import { describeError } from '../../errors'
import type { DecodedPackEntry } from '../../pack/unpack'
import type { Layout, PackViewState } from '../model'

function formatEntryRow(entry: DecodedPackEntry): StyledLine {
  return [
    span(`#${String(entry.index).padEnd(5)}`, 'muted'),
    span(entry.entryKind.padEnd(10), entry.entryKind.endsWith('delta') ? 'warning' : 'accent'),
    span(`@${entry.offset}`.padEnd(10), 'muted'),
    span(String(entry.declaredSize)),
  ]
}

export function packTitle(state: PackViewState): string {
  const name = path.basename(state.path)
  if (!state.header) return `Pack ${name}`
  const checksum = state.checksum?.valid ? 'checksum ok' : 'checksum mismatch'
  return `Pack ${name} (v${state.header.version}, ${state.header.objectCount} objects, ${checksum})`
}

export function renderPack(state: PackViewState, layout: Layout): RegionElement[] {
  if (state.entries.length === 0 && state.error !== undefined) {
    return [ErrorDisplay({ title: 'Pack could not be decoded', error: state.error, detail: state.path })]
  }

  return [
    NavigationList({
      title: `Entries (${state.entries.length})`,
      items: state.entries.map(formatEntryRow),
      selectedIndex: state.selectedIndex,
      scrollOffset: state.listScroll,
      height: layout.listHeight,
    }),
    ScrollableContent({
      title: 'Entry',
      lines: state.content,
      scrollOffset: state.contentScroll,
      height: layout.contentHeight,
    }),
  ]
}

/**
 * Notice for a pack whose decoding stopped partway through.
 */
export function packStatus(state: PackViewState): string | undefined {
  if (state.error === undefined || state.entries.length === 0) return undefined
  return `Decoding stopped after ${state.entries.length} entries: ${describeError(state.error)}`
}
