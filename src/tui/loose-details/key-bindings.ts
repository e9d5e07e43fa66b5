import type { KeyHint } from '../../cli/ui/components'
import { lookupKey, type KeyboardEvent } from '../keys'
import { looseNavigation, openMainView, type Message } from '../message'

const BINDINGS: Readonly<Record<string, Message>> = {
  q: openMainView,
  escape: openMainView,
  left: openMainView,
  h: openMainView,
  up: looseNavigation('ScrollUp'),
  k: looseNavigation('ScrollUp'),
  down: looseNavigation('ScrollDown'),
  j: looseNavigation('ScrollDown'),
  pageup: looseNavigation('ScrollToTop'),
  g: looseNavigation('ScrollToTop'),
  pagedown: looseNavigation('ScrollToBottom'),
  G: looseNavigation('ScrollToBottom'),
}

export function mapLooseKey(event: KeyboardEvent): Message | undefined {
  return lookupKey(BINDINGS, event)
}

export const looseKeyHints: KeyHint[] = [
  { keys: 'j/k', description: 'scroll' },
  { keys: 'g/G', description: 'top/bottom' },
  { keys: 'q', description: 'back' },
]
