import type { KeyHint } from '../cli/ui/components'
import type { KeyboardEvent } from './keys'
import { looseKeyHints, mapLooseKey } from './loose-details/key-bindings'
import { mainKeyHints, mapMainKey } from './main-view/key-bindings'
import { quit, type Message } from './message'
import type { ViewKind } from './model'
import { mapPackKey, packKeyHints } from './pack-details/key-bindings'

/**
 * Maps a key press to a message for the active view. `ctrl+c` quits from
 * anywhere; unbound keys map to `undefined`.
 */
export function mapKey(view: ViewKind, event: KeyboardEvent): Message | undefined {
  if (event.ctrlKey && event.key === 'c') return quit

  switch (view) {
    case 'main':
      return mapMainKey(event)
    case 'pack-detail':
      return mapPackKey(event)
    case 'loose-detail':
      return mapLooseKey(event)
  }
}

export function keyHintsFor(view: ViewKind): KeyHint[] {
  switch (view) {
    case 'main':
      return mainKeyHints
    case 'pack-detail':
      return packKeyHints
    case 'loose-detail':
      return looseKeyHints
  }
}
