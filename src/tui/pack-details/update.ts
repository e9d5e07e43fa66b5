/**
 * @fileoverview Pack detail transitions
 *
 * The pack is decoded once when the view opens. Moving between entries
 * re-renders the content pane from the decoded entries; delta chains are
 * resolved through the view's {@link PackResolver}, which memoizes what it
 * has already reconstructed.
 *
 * @module tui/pack-details/update
 */

import { describeError } from '../../errors'
import { PackResolver, type DecodedPack, type DecodedPackEntry } from '../../pack/unpack'
import type { UpdateContext } from '../context'
import { formatPackEntry, type EntryResolution } from '../formatters/pack-entry'
import type { PackNavigation } from '../message'
import type { Layout, PackViewState } from '../model'
import { applyScrollAction, clampScroll, clampSelection, followSelection } from '../scrolling'

/**
 * Offsets by object id from the `.idx` next to the pack, when there is a
 * readable one.
 */
export function siblingIndexOffsets(packPath: string, ctx: UpdateContext): Map<string, number> | undefined {
  if (!packPath.endsWith('.pack')) return undefined
  const indexPath = packPath.slice(0, -'.pack'.length) + '.idx'
  try {
    const index = ctx.access.readPackIndex(indexPath)
    return new Map(index.entries.map((e) => [e.objectId, e.offset]))
  } catch (error) {
    ctx.logger.debug('No usable pack index; REF_DELTA bases resolve by hashing', {
      path: indexPath,
      reason: describeError(error),
    })
    return undefined
  }
}

function resolveEntry(
  resolver: PackResolver | undefined,
  entry: DecodedPackEntry,
  ctx: UpdateContext
): EntryResolution | undefined {
  if (!resolver) return undefined
  try {
    return { ok: true, object: resolver.resolve(entry) }
  } catch (error) {
    ctx.logger.debug('Entry did not resolve', { offset: entry.offset, reason: describeError(error) })
    return { ok: false, error }
  }
}

function selectEntry(state: PackViewState, index: number, layout: Layout, ctx: UpdateContext): PackViewState {
  const selectedIndex = clampSelection(index, state.entries.length)
  const entry: DecodedPackEntry | undefined = state.entries[selectedIndex]
  const content = entry
    ? formatPackEntry(entry, resolveEntry(state.resolver, entry, ctx), { maxPreviewBytes: ctx.config.maxPreviewBytes })
    : []
  return {
    ...state,
    selectedIndex,
    listScroll: followSelection(selectedIndex, state.listScroll, state.entries.length, layout.listHeight),
    content,
    contentScroll: 0,
  }
}

/**
 * Decodes the pack at `packPath` for the detail view. Failures, including a
 * malformed entry partway through, are kept on the state rather than thrown.
 */
export function openPackView(packPath: string, layout: Layout, ctx: UpdateContext): PackViewState {
  const empty: PackViewState = {
    path: packPath,
    entries: [],
    selectedIndex: 0,
    listScroll: 0,
    content: [],
    contentScroll: 0,
  }

  let decoded: DecodedPack
  try {
    decoded = ctx.access.openPack(packPath).decodeAll()
  } catch (error) {
    ctx.logger.warn('Failed to open pack', { path: packPath, reason: describeError(error) })
    return { ...empty, error }
  }
  if (decoded.error) {
    ctx.logger.warn('Pack decoding stopped early', {
      path: packPath,
      decoded: decoded.entries.length,
      reason: describeError(decoded.error),
    })
  }

  const offsetsById = siblingIndexOffsets(packPath, ctx)
  const resolver = new PackResolver(decoded.entries, offsetsById ? { offsetsById } : {})
  const state: PackViewState = {
    ...empty,
    header: decoded.header,
    checksum: decoded.checksum,
    entries: decoded.entries,
    resolver,
    ...(decoded.error !== undefined && { error: decoded.error }),
  }
  return selectEntry(state, 0, layout, ctx)
}

export function resizePackState(state: PackViewState, layout: Layout): PackViewState {
  return {
    ...state,
    listScroll: followSelection(state.selectedIndex, state.listScroll, state.entries.length, layout.listHeight),
    contentScroll: clampScroll(state.contentScroll, state.content.length, layout.contentHeight),
  }
}

export function updatePack(
  state: PackViewState,
  action: PackNavigation,
  layout: Layout,
  ctx: UpdateContext
): PackViewState {
  const select = (index: number): PackViewState =>
    clampSelection(index, state.entries.length) === state.selectedIndex ? state : selectEntry(state, index, layout, ctx)

  switch (action) {
    case 'SelectNextEntry':
      return select(state.selectedIndex + 1)
    case 'SelectPreviousEntry':
      return select(state.selectedIndex - 1)
    case 'SelectFirstEntry':
      return select(0)
    case 'SelectLastEntry':
      return select(state.entries.length - 1)
    default:
      return {
        ...state,
        contentScroll: applyScrollAction(action, state.contentScroll, state.content.length, layout.contentHeight),
      }
  }
}
