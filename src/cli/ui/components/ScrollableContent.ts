// Scrollable Content Component for the packlens terminal UI

import type { StyledLine } from '../styled'

export interface ScrollableContentProps {
  title: string
  lines: StyledLine[]
  scrollOffset: number
  height: number
}

export interface ScrollableContentElement {
  type: 'ScrollableContent'
  props: ScrollableContentProps
  visibleLines: StyledLine[]
  /** e.g. `12-31/140`, empty when everything fits */
  position: string
}

export function ScrollableContent(props: ScrollableContentProps): ScrollableContentElement {
  const { lines, scrollOffset, height } = props
  const visibleLines = lines.slice(scrollOffset, scrollOffset + height)
  const position =
    lines.length > height ? `${scrollOffset + 1}-${scrollOffset + visibleLines.length}/${lines.length}` : ''
  return {
    type: 'ScrollableContent',
    props,
    visibleLines,
    position,
  }
}
