// Terminal UI for the packlens explorer: ANSI painting and the key loop

import * as readline from 'node:readline'
import { DEFAULT_TERMINAL_HEIGHT, DEFAULT_TERMINAL_WIDTH } from '../../constants'
import type { KeyboardEvent } from '../../tui/keys'
import { terminalResize } from '../../tui/message'
import type { ExplorerSession } from '../../tui/session'
import type { Frame } from '../../tui/view'
import type { RegionElement } from './components'
import { span, type StyledLine, type Tone } from './styled'

// ============================================================================
// Types
// ============================================================================

export interface TerminalDimensions {
  width: number
  height: number
}

export interface PaintOptions {
  color: boolean
}

// ============================================================================
// Terminal Dimensions
// ============================================================================

export function getTerminalDimensions(stream: { columns?: number; rows?: number } = process.stdout): TerminalDimensions {
  const width = stream.columns ?? DEFAULT_TERMINAL_WIDTH
  const height = stream.rows ?? DEFAULT_TERMINAL_HEIGHT
  return { width, height }
}

// ============================================================================
// Painting
// ============================================================================

const RESET = '\x1b[0m'

const TONE_CODES: Record<Tone, string> = {
  plain: '',
  heading: '\x1b[1m',
  label: '\x1b[36m',
  value: '',
  muted: '\x1b[90m',
  accent: '\x1b[34m',
  highlight: '\x1b[7m',
  error: '\x1b[31m',
  warning: '\x1b[33m',
  success: '\x1b[32m',
}

const SELECTED = '\x1b[7m'

// C0 controls, DEL and C1 controls
const CONTROL_CHARS = /[\x00-\x1f\x7f-\x9f]/g

/**
 * Replaces control characters so file content cannot move the cursor or
 * start an escape sequence. Tabs become a space, anything else a dot.
 */
export function printable(text: string): string {
  return text.replace(CONTROL_CHARS, (c) => (c === '\t' ? ' ' : '.'))
}

/**
 * Cuts or pads `line` to exactly `width` characters and encodes it.
 */
export function fitLine(line: StyledLine, width: number, options: PaintOptions, prefix = ''): string {
  let remaining = width
  let out = ''
  for (const { text, tone } of line) {
    if (remaining <= 0) break
    const piece = printable(text).slice(0, remaining)
    remaining -= piece.length
    const code = options.color ? TONE_CODES[tone] : ''
    out += code ? `${code}${piece}${RESET}${prefix}` : piece
  }
  return out + ' '.repeat(Math.max(0, remaining))
}

function paintRegion(region: RegionElement, width: number, height: number, options: PaintOptions): string[] {
  const rows: string[] = []

  switch (region.type) {
    case 'NavigationList':
      region.visibleItems.forEach((item, i) => {
        const selected = i === region.visibleSelectedIndex
        const gutter = span(selected ? '> ' : '  ', selected ? 'highlight' : 'plain')
        if (selected && options.color) {
          rows.push(SELECTED + fitLine([gutter, ...item], width, options, SELECTED) + RESET)
        } else {
          rows.push(fitLine([gutter, ...item], width, options))
        }
      })
      break

    case 'ScrollableContent':
      for (const line of region.visibleLines) rows.push(fitLine(line, width, options))
      break

    case 'ErrorDisplay': {
      const lines: StyledLine[] = [[span(region.props.title, 'heading')], [], [span(region.message, 'error')]]
      if (region.props.detail !== undefined) lines.push([span(region.props.detail, 'muted')])
      for (const line of lines) rows.push(fitLine(line, width, options))
      break
    }
  }

  const blank = ' '.repeat(width)
  return Array.from({ length: height }, (_, i) => rows[i] ?? blank)
}

function regionLabel(region: RegionElement): string {
  switch (region.type) {
    case 'NavigationList':
      return region.props.title
    case 'ScrollableContent':
      return region.position ? `${region.props.title}  ${region.position}` : region.props.title
    case 'ErrorDisplay':
      return region.props.title
  }
}

/**
 * Lays a frame out into exactly `layout.height` terminal rows of
 * `layout.width` columns: title bar, body, status line, key hints.
 */
export function paintFrame(frame: Frame, options: PaintOptions): string[] {
  const { layout } = frame
  const { width, bodyHeight } = layout
  const body: string[] = []
  const [first, second] = frame.regions

  if (first !== undefined && second !== undefined && layout.orientation === 'columns') {
    const left = paintRegion(first, layout.listWidth, bodyHeight, options)
    const right = paintRegion(second, layout.contentWidth, bodyHeight, options)
    const divider = options.color ? `${TONE_CODES.muted}|${RESET}` : '|'
    for (let i = 0; i < bodyHeight; i++) body.push(left[i] + divider + right[i])
  } else if (first !== undefined && second !== undefined) {
    body.push(...paintRegion(first, width, layout.listHeight, options))
    const label = `-- ${regionLabel(second)} `
    body.push(fitLine([span(label.padEnd(width, '-'), 'muted')], width, options))
    body.push(...paintRegion(second, width, layout.contentHeight, options))
  } else if (first !== undefined) {
    body.push(...paintRegion(first, width, bodyHeight, options))
  }

  while (body.length < bodyHeight) body.push(' '.repeat(width))

  return [
    fitLine([span(` ${frame.title}`, 'highlight')], width, options),
    ...body.slice(0, bodyHeight),
    fitLine([span(frame.status ?? '', 'warning')], width, options),
    fitLine([span(frame.hints.text, 'muted')], width, options),
  ]
}

/**
 * The frame as plain text, for tests and non-interactive output.
 */
export function frameToText(frame: Frame): string {
  return paintFrame(frame, { color: false })
    .map((row) => row.trimEnd())
    .join('\n')
}

// ============================================================================
// Keyboard Input
// ============================================================================

const NAMED_KEYS: Record<string, string> = {
  return: 'enter',
  enter: 'enter',
  escape: 'escape',
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  tab: 'tab',
  space: 'space',
  pageup: 'pageup',
  pagedown: 'pagedown',
  home: 'home',
  end: 'end',
  backspace: 'backspace',
}

/**
 * Converts a `readline` keypress into a {@link KeyboardEvent}. Printable
 * keys keep their character, so shift+g arrives as `G`.
 */
export function toKeyboardEvent(str: string | undefined, key: readline.Key | undefined): KeyboardEvent | undefined {
  const name = key?.name
  if (key?.ctrl && name !== undefined) {
    return { key: name, ctrlKey: true }
  }
  if (name !== undefined && Object.prototype.hasOwnProperty.call(NAMED_KEYS, name)) {
    return { key: NAMED_KEYS[name], ...(key?.meta && { altKey: true }), ...(key?.shift && { shiftKey: true }) }
  }
  if (str !== undefined && str.length === 1) {
    return { key: str, ...(key?.meta && { altKey: true }) }
  }
  return undefined
}

// ============================================================================
// Event Loop
// ============================================================================

export interface ExplorerIO {
  input: NodeJS.ReadStream
  output: NodeJS.WriteStream
  color: boolean
}

/**
 * Runs the explorer on a terminal until the session quits. Keys and resizes
 * are turned into messages; every state change repaints the screen.
 */
export function runExplorer(session: ExplorerSession, io: ExplorerIO): Promise<void> {
  const { input, output } = io

  const draw = (frame: Frame): void => {
    output.write('\x1b[H' + paintFrame(frame, { color: io.color }).join('\r\n'))
  }

  return new Promise((resolve, reject) => {
    const cleanup = (): void => {
      input.off('keypress', onKeypress)
      output.off('resize', onResize)
      if (input.isTTY) input.setRawMode(false)
      input.pause()
      output.write('\x1b[?25h\x1b[?1049l')
    }

    const guarded = (action: () => void): void => {
      try {
        action()
        if (session.finished) {
          cleanup()
          resolve()
        }
      } catch (error) {
        cleanup()
        reject(error)
      }
    }

    const onKeypress = (str: string | undefined, key: readline.Key | undefined): void => {
      const event = toKeyboardEvent(str, key)
      if (event) guarded(() => session.handleKey(event))
    }

    const onResize = (): void => {
      const { width, height } = getTerminalDimensions(output)
      guarded(() => {
        output.write('\x1b[2J')
        session.dispatch(terminalResize(width, height))
      })
    }

    readline.emitKeypressEvents(input)
    if (input.isTTY) input.setRawMode(true)
    input.resume()
    output.write('\x1b[?1049h\x1b[?25l\x1b[2J')

    session.onFrame(draw)
    input.on('keypress', onKeypress)
    output.on('resize', onResize)

    const { width, height } = getTerminalDimensions(output)
    guarded(() => session.dispatch(terminalResize(width, height)))
  })
}
