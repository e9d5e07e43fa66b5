/**
 * A key press, abstracted from the terminal.
 *
 * `key` is a single printable character (`'g'`, `'G'`, `'['`) or one of the
 * names `up`, `down`, `left`, `right`, `enter`, `escape`, `tab`, `space`,
 * `pageup`, `pagedown`, `home`, `end`, `backspace`.
 */
export interface KeyboardEvent {
  key: string
  ctrlKey?: boolean
  metaKey?: boolean
  shiftKey?: boolean
  altKey?: boolean
}

/**
 * Looks `event.key` up in a binding table. Events with ctrl, meta or alt
 * held never match a table entry.
 */
export function lookupKey<T>(table: Readonly<Record<string, T>>, event: KeyboardEvent): T | undefined {
  if (event.ctrlKey || event.metaKey || event.altKey) return undefined
  return Object.prototype.hasOwnProperty.call(table, event.key) ? table[event.key] : undefined
}
