// Key hint strip for the packlens terminal UI

export interface KeyHint {
  keys: string
  description: string
}

export interface KeyHintsElement {
  type: 'KeyHints'
  hints: KeyHint[]
  text: string
}

export function KeyHints(hints: KeyHint[]): KeyHintsElement {
  return {
    type: 'KeyHints',
    hints,
    text: hints.map((h) => `${h.keys} ${h.description}`).join('  '),
  }
}
