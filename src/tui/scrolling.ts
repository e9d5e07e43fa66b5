/**
 * Scroll arithmetic shared by every pane.
 *
 * Every offset obeys `0 <= offset <= max(0, contentLength - viewportHeight)`.
 */

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

export function maxScroll(contentLength: number, viewportHeight: number): number {
  return Math.max(0, contentLength - Math.max(0, viewportHeight))
}

export function clampScroll(offset: number, contentLength: number, viewportHeight: number): number {
  return clamp(offset, 0, maxScroll(contentLength, viewportHeight))
}

export function scrollBy(offset: number, delta: number, contentLength: number, viewportHeight: number): number {
  return clampScroll(offset + delta, contentLength, viewportHeight)
}

/**
 * Scroll offset that keeps `selected` inside the viewport, moving as little
 * as possible.
 */
export function followSelection(selected: number, offset: number, itemCount: number, viewportHeight: number): number {
  let next = offset
  if (selected < next) {
    next = selected
  } else if (viewportHeight > 0 && selected >= next + viewportHeight) {
    next = selected - viewportHeight + 1
  }
  return clampScroll(next, itemCount, viewportHeight)
}

export function clampSelection(index: number, itemCount: number): number {
  return itemCount === 0 ? 0 : clamp(index, 0, itemCount - 1)
}

/**
 * The four scroll actions every scrollable pane supports.
 */
export type ScrollAction = 'ScrollUp' | 'ScrollDown' | 'ScrollToTop' | 'ScrollToBottom'

export function applyScrollAction(
  action: ScrollAction,
  offset: number,
  contentLength: number,
  viewportHeight: number
): number {
  switch (action) {
    case 'ScrollUp':
      return scrollBy(offset, -1, contentLength, viewportHeight)
    case 'ScrollDown':
      return scrollBy(offset, 1, contentLength, viewportHeight)
    case 'ScrollToTop':
      return 0
    case 'ScrollToBottom':
      return maxScroll(contentLength, viewportHeight)
  }
}
