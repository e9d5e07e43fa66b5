import type { KeyHint } from '../../cli/ui/components'
import { lookupKey, type KeyboardEvent } from '../keys'
import { openMainView, packNavigation, type Message } from '../message'

const BINDINGS: Readonly<Record<string, Message>> = {
  q: openMainView,
  escape: openMainView,
  left: openMainView,
  h: openMainView,
  up: packNavigation('ScrollUp'),
  k: packNavigation('ScrollUp'),
  down: packNavigation('ScrollDown'),
  j: packNavigation('ScrollDown'),
  pageup: packNavigation('ScrollToTop'),
  g: packNavigation('ScrollToTop'),
  pagedown: packNavigation('ScrollToBottom'),
  G: packNavigation('ScrollToBottom'),
  n: packNavigation('SelectNextEntry'),
  ']': packNavigation('SelectNextEntry'),
  tab: packNavigation('SelectNextEntry'),
  p: packNavigation('SelectPreviousEntry'),
  '[': packNavigation('SelectPreviousEntry'),
  home: packNavigation('SelectFirstEntry'),
  end: packNavigation('SelectLastEntry'),
}

export function mapPackKey(event: KeyboardEvent): Message | undefined {
  return lookupKey(BINDINGS, event)
}

export const packKeyHints: KeyHint[] = [
  { keys: 'n/p', description: 'entry' },
  { keys: 'j/k', description: 'scroll' },
  { keys: 'g/G', description: 'top/bottom' },
  { keys: 'q', description: 'back' },
]
