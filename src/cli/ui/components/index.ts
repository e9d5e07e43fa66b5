// Component exports for the packlens terminal UI

export { ErrorDisplay, type ErrorDisplayElement, type ErrorDisplayProps } from './ErrorDisplay'
export { KeyHints, type KeyHint, type KeyHintsElement } from './KeyHints'
export { NavigationList, type NavigationListElement, type NavigationListProps } from './NavigationList'
export { ScrollableContent, type ScrollableContentElement, type ScrollableContentProps } from './ScrollableContent'

import type { ErrorDisplayElement } from './ErrorDisplay'
import type { NavigationListElement } from './NavigationList'
import type { ScrollableContentElement } from './ScrollableContent'

/**
 * One rectangular area of a frame.
 */
export type RegionElement = NavigationListElement | ScrollableContentElement | ErrorDisplayElement
