// Styled text shared by the formatters, the components and the painter

/**
 * Semantic color of a span. The painter maps tones to ANSI styles.
 */
export type Tone =
  | 'plain'
  | 'heading'
  | 'label'
  | 'value'
  | 'muted'
  | 'accent'
  | 'highlight'
  | 'error'
  | 'warning'
  | 'success'

export interface StyledSpan {
  text: string
  tone: Tone
}

export type StyledLine = StyledSpan[]

export function span(text: string, tone: Tone = 'plain'): StyledSpan {
  return { text, tone }
}

/**
 * A line made of one span.
 */
export function line(text: string, tone: Tone = 'plain'): StyledLine {
  return [span(text, tone)]
}

export const blankLine: StyledLine = []

/**
 * `label: value` with the label and value in their own tones.
 */
export function field(label: string, value: string, valueTone: Tone = 'value'): StyledLine {
  return [span(`${label}: `, 'label'), span(value, valueTone)]
}

/**
 * Splits multi-line text into lines of a single tone.
 */
export function textLines(text: string, tone: Tone = 'plain'): StyledLine[] {
  return text.split('\n').map((t) => line(t, tone))
}

export function plainText(styled: StyledLine): string {
  return styled.map((s) => s.text).join('')
}
