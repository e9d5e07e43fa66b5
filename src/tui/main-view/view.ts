import { NavigationList, ScrollableContent, type RegionElement } from '../../cli/ui/components'
import { span, type StyledLine } from '../../cli/ui/styled'
import type { VisibleRow } from '../../repository/tree-builder'
import type { Layout, MainViewState } from '../model'

function formatRow(row: VisibleRow, expanded: ReadonlySet<string>): StyledLine {
  const indent = '  '.repeat(row.depth)
  if (row.node.kind === 'directory') {
    const marker = expanded.has(row.node.path) ? 'v ' : '> '
    return [span(indent + marker, 'muted'), span(`${row.node.name}/`, 'accent')]
  }
  return [span(`${indent}  `), span(row.node.name)]
}

export function renderMain(state: MainViewState, layout: Layout): RegionElement[] {
  const selected: VisibleRow | undefined = state.rows[state.selectedIndex]
  return [
    NavigationList({
      title: 'Repository',
      items: state.rows.map((row) => formatRow(row, state.expanded)),
      selectedIndex: state.selectedIndex,
      scrollOffset: state.scrollOffset,
      height: layout.listHeight,
    }),
    ScrollableContent({
      title: selected ? selected.node.name : 'Preview',
      lines: state.preview,
      scrollOffset: state.previewScroll,
      height: layout.contentHeight,
    }),
  ]
}
