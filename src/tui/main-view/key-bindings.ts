import type { KeyHint } from '../../cli/ui/components'
import { lookupKey, type KeyboardEvent } from '../keys'
import { mainNavigation, quit, refresh, type Message } from '../message'

const BINDINGS: Readonly<Record<string, Message>> = {
  q: quit,
  escape: quit,
  up: mainNavigation('SelectPrevious'),
  k: mainNavigation('SelectPrevious'),
  down: mainNavigation('SelectNext'),
  j: mainNavigation('SelectNext'),
  g: mainNavigation('SelectFirst'),
  home: mainNavigation('SelectFirst'),
  G: mainNavigation('SelectLast'),
  end: mainNavigation('SelectLast'),
  enter: mainNavigation('Activate'),
  right: mainNavigation('Activate'),
  l: mainNavigation('Activate'),
  left: mainNavigation('CollapseOrParent'),
  h: mainNavigation('CollapseOrParent'),
  t: mainNavigation('ToggleExpand'),
  space: mainNavigation('ToggleExpand'),
  K: mainNavigation('ScrollPreviewUp'),
  J: mainNavigation('ScrollPreviewDown'),
  pageup: mainNavigation('ScrollPreviewToTop'),
  pagedown: mainNavigation('ScrollPreviewToBottom'),
  r: refresh,
}

export function mapMainKey(event: KeyboardEvent): Message | undefined {
  return lookupKey(BINDINGS, event)
}

export const mainKeyHints: KeyHint[] = [
  { keys: 'j/k', description: 'move' },
  { keys: 'enter', description: 'open' },
  { keys: 'h', description: 'collapse' },
  { keys: 't', description: 'expand' },
  { keys: 'J/K', description: 'preview' },
  { keys: 'r', description: 'refresh' },
  { keys: 'q', description: 'quit' },
]
