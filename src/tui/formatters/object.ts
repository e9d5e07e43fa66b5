/**
 * Renders decoded object payloads: tree tables, commit and tag headers,
 * blob text or hex dumps. Shared by the loose object and pack entry views.
 */

import { blankLine, field, line, span, type StyledLine } from '../../cli/ui/styled'
import type { ObjectPayload, Signature, TreeEntry } from '../../objects/types'
import { hexDump } from '../../utils/hex'

const decoder = new TextDecoder()

export interface PayloadFormatOptions {
  /** Blob bytes rendered before truncating */
  maxPreviewBytes: number
}

/**
 * `Name <email>  2023-11-14 22:13:20 +0100`, with the time shown in the
 * signature's own timezone.
 */
export function formatSignature(signature: Signature): string {
  const sign = signature.timezone.startsWith('-') ? -1 : 1
  const hours = parseInt(signature.timezone.slice(1, 3), 10)
  const minutes = parseInt(signature.timezone.slice(3, 5), 10)
  const shifted = new Date((signature.timestamp + sign * (hours * 3600 + minutes * 60)) * 1000)
  const stamp = shifted.toISOString().replace('T', ' ').slice(0, 19)
  return `${signature.name} <${signature.email}>  ${stamp} ${signature.timezone}`
}

function formatTreeEntry(entry: TreeEntry): StyledLine {
  return [
    span(entry.mode.padStart(6, '0'), 'muted'),
    span(' '),
    span(entry.kind.padEnd(10), entry.kind === 'tree' ? 'accent' : 'plain'),
    span(entry.objectId, 'value'),
    span('  '),
    span(entry.name, entry.kind === 'tree' ? 'accent' : 'plain'),
  ]
}

function formatMessage(message: string): StyledLine[] {
  const lines: StyledLine[] = [line('MESSAGE', 'heading')]
  for (const text of message.replace(/\n$/, '').split('\n')) {
    lines.push(line(`    ${text}`))
  }
  return lines
}

/**
 * Splits blob text into display lines, capped at `maxBytes`.
 */
function formatBlob(data: Uint8Array, isBinary: boolean, maxBytes: number): StyledLine[] {
  if (isBinary) {
    const lines: StyledLine[] = [line(`BINARY CONTENT (${data.length} bytes)`, 'heading')]
    for (const dumpLine of hexDump(data, maxBytes)) {
      lines.push(line(dumpLine, dumpLine.startsWith('...') ? 'muted' : 'plain'))
    }
    return lines
  }

  const shown = data.subarray(0, maxBytes)
  const lines: StyledLine[] = [line(`TEXT CONTENT (${data.length} bytes)`, 'heading')]
  const text = decoder.decode(shown)
  const textLines = text.split('\n')
  if (textLines.length > 1 && textLines[textLines.length - 1] === '') textLines.pop()
  textLines.forEach((t, i) => {
    lines.push([span(`${String(i + 1).padStart(5)} `, 'muted'), span(t.replace(/\t/g, '    '))])
  })
  if (shown.length < data.length) {
    lines.push(line(`... ${data.length - shown.length} more bytes`, 'muted'))
  }
  return lines
}

export function formatPayload(payload: ObjectPayload, options: PayloadFormatOptions): StyledLine[] {
  switch (payload.kind) {
    case 'blob':
      return formatBlob(payload.data, payload.isBinary, options.maxPreviewBytes)

    case 'tree': {
      const lines: StyledLine[] = [line(`TREE ENTRIES (${payload.entries.length})`, 'heading')]
      lines.push(...payload.entries.map(formatTreeEntry))
      return lines
    }

    case 'commit': {
      const lines: StyledLine[] = [line('COMMIT', 'heading')]
      if (payload.tree) lines.push(field('tree', payload.tree))
      for (const parent of payload.parents) lines.push(field('parent', parent))
      if (payload.author) lines.push(field('author', formatSignature(payload.author)))
      if (payload.committer) lines.push(field('committer', formatSignature(payload.committer)))
      const shown = ['tree', 'parent']
      if (payload.author) shown.push('author')
      if (payload.committer) shown.push('committer')
      for (const header of payload.headers) {
        if (shown.includes(header.key)) continue
        const [first, ...rest] = header.value.split('\n')
        lines.push(field(header.key, first, 'muted'))
        for (const more of rest) lines.push(line(`  ${more}`, 'muted'))
      }
      lines.push(blankLine, ...formatMessage(payload.message))
      return lines
    }

    case 'tag': {
      const lines: StyledLine[] = [line('TAG', 'heading')]
      if (payload.object) lines.push(field('object', payload.object))
      if (payload.targetType) lines.push(field('type', payload.targetType))
      if (payload.tagName) lines.push(field('tag', payload.tagName, 'accent'))
      if (payload.tagger) lines.push(field('tagger', formatSignature(payload.tagger)))
      lines.push(blankLine, ...formatMessage(payload.message))
      return lines
    }
  }
}
