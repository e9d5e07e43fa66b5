// Navigation List Component for the packlens terminal UI

import type { StyledLine } from '../styled'

export interface NavigationListProps {
  title: string
  items: StyledLine[]
  selectedIndex: number
  /** Index of the first visible item */
  scrollOffset: number
  height: number
}

export interface NavigationListElement {
  type: 'NavigationList'
  props: NavigationListProps
  /** The items inside the viewport */
  visibleItems: StyledLine[]
  /** Selection relative to `visibleItems`, or -1 when scrolled out of view */
  visibleSelectedIndex: number
}

export function NavigationList(props: NavigationListProps): NavigationListElement {
  const { items, selectedIndex, scrollOffset, height } = props
  const visibleSelected = selectedIndex - scrollOffset
  return {
    type: 'NavigationList',
    props,
    visibleItems: items.slice(scrollOffset, scrollOffset + height),
    visibleSelectedIndex: visibleSelected >= 0 && visibleSelected < height ? visibleSelected : -1,
  }
}
