import { describeError } from '../../errors'
import type { UpdateContext } from '../context'
import { formatLooseObject } from '../formatters/loose-object'
import type { LooseObjectNavigation } from '../message'
import type { Layout, LooseViewState } from '../model'
import { applyScrollAction, clampScroll } from '../scrolling'

/**
 * Reads and decodes the object at `objectPath`. A failure becomes the
 * view's error instead of being thrown.
 */
export function openLooseView(objectPath: string, ctx: UpdateContext): LooseViewState {
  try {
    const object = ctx.access.readLooseObject(objectPath)
    return {
      path: objectPath,
      object,
      lines: formatLooseObject(object, { maxPreviewBytes: ctx.config.maxPreviewBytes }),
      scrollOffset: 0,
    }
  } catch (error) {
    ctx.logger.warn('Failed to decode loose object', { path: objectPath, reason: describeError(error) })
    return { path: objectPath, error, lines: [], scrollOffset: 0 }
  }
}

export function resizeLooseState(state: LooseViewState, layout: Layout): LooseViewState {
  return { ...state, scrollOffset: clampScroll(state.scrollOffset, state.lines.length, layout.bodyHeight) }
}

export function updateLoose(state: LooseViewState, action: LooseObjectNavigation, layout: Layout): LooseViewState {
  return {
    ...state,
    scrollOffset: applyScrollAction(action, state.scrollOffset, state.lines.length, layout.bodyHeight),
  }
}
