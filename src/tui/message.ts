/**
 * Messages: the only way the explorer's state changes.
 */

import type { ScrollAction } from './scrolling'

export type PackNavigation =
  | ScrollAction
  | 'SelectNextEntry'
  | 'SelectPreviousEntry'
  | 'SelectFirstEntry'
  | 'SelectLastEntry'

export type LooseObjectNavigation = ScrollAction

export type MainNavigation =
  | 'SelectPrevious'
  | 'SelectNext'
  | 'SelectFirst'
  | 'SelectLast'
  | 'ToggleExpand'
  | 'CollapseOrParent'
  | 'Activate'
  | 'ScrollPreviewUp'
  | 'ScrollPreviewDown'
  | 'ScrollPreviewToTop'
  | 'ScrollPreviewToBottom'

export type Message =
  | { type: 'OpenMainView' }
  | { type: 'OpenPackDetail'; path: string }
  | { type: 'OpenLooseDetail'; path: string }
  | { type: 'PackNavigation'; action: PackNavigation }
  | { type: 'LooseObjectNavigation'; action: LooseObjectNavigation }
  | { type: 'MainNavigation'; action: MainNavigation }
  | { type: 'Refresh' }
  | { type: 'TerminalResize'; width: number; height: number }
  | { type: 'Quit' }

export const openMainView: Message = { type: 'OpenMainView' }
export const refresh: Message = { type: 'Refresh' }
export const quit: Message = { type: 'Quit' }

export function openPackDetail(path: string): Message {
  return { type: 'OpenPackDetail', path }
}

export function openLooseDetail(path: string): Message {
  return { type: 'OpenLooseDetail', path }
}

export function packNavigation(action: PackNavigation): Message {
  return { type: 'PackNavigation', action }
}

export function looseNavigation(action: LooseObjectNavigation): Message {
  return { type: 'LooseObjectNavigation', action }
}

export function mainNavigation(action: MainNavigation): Message {
  return { type: 'MainNavigation', action }
}

export function terminalResize(width: number, height: number): Message {
  return { type: 'TerminalResize', width, height }
}
