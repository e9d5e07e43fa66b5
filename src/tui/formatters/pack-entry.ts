/**
 * @fileoverview Pack entry detail
 *
 * Lays out one pack entry as the detail pane shows it: a summary, the
 * header bytes bit by bit, the zlib envelope, the base reference of deltas,
 * the delta instruction list and the resolved object.
 *
 * @module tui/formatters/pack-entry
 */

import { blankLine, field, line, span, type StyledLine, type Tone } from '../../cli/ui/styled'
import { describeError } from '../../errors'
import { parseObjectPayload } from '../../objects/loose'
import { parseDelta, type DeltaInstruction } from '../../pack/delta'
import { isDeltaKind } from '../../pack/format'
import type { DecodedPackEntry, ResolvedObject } from '../../pack/unpack'
import { parseZlibEnvelope } from '../../utils/compression'
import { formatBinary, formatByte, formatU32AsHexBytes } from '../../utils/hex'
import { formatPayload, type PayloadFormatOptions } from './object'

const decoder = new TextDecoder()

/** Insert bytes shown inline in the instruction list */
const INSERT_PREVIEW_BYTES = 24

/**
 * Outcome of resolving the entry's delta chain, when one was attempted.
 */
export type EntryResolution = { ok: true; object: ResolvedObject } | { ok: false; error: unknown }

// ============================================================================
// Header Bytes
// ============================================================================

/**
 * One line per header byte. The first byte splits into the continuation
 * bit, three type bits and four size bits; later bytes into the
 * continuation bit and seven size bits.
 */
export function formatHeaderBytes(entry: DecodedPackEntry): StyledLine[] {
  const lines: StyledLine[] = [line('HEADER BYTES', 'heading')]
  let shift = 4

  entry.headerBytes.forEach((byte, i) => {
    const bits = formatBinary(byte)
    const more = (byte & 0x80) !== 0 ? 'more' : 'last'
    if (i === 0) {
      const type = (byte >> 4) & 0x07
      lines.push([
        span(`  #${i}  `, 'muted'),
        span(`${bits[0]} ${bits.slice(1, 4)} ${bits.slice(4)}`, 'value'),
        span(`  0x${formatByte(byte)}  `, 'muted'),
        span(`${more}, type ${type} (${entry.entryKind}), size bits ${bits.slice(4)}`),
      ])
      return
    }
    lines.push([
      span(`  #${i}  `, 'muted'),
      span(`${bits[0]} ${bits.slice(1)}`, 'value'),
      span(`   0x${formatByte(byte)}  `, 'muted'),
      span(`${more}, size bits ${bits.slice(1)} << ${shift}`),
    ])
    shift += 7
  })

  lines.push(field('  declared size', String(entry.declaredSize)))
  return lines
}

// ============================================================================
// Compression
// ============================================================================

const LEVELS = ['fastest', 'fast', 'default', 'maximum']

function byteLine(index: number, groups: string, byte: number, meaning: string, tone: Tone = 'plain'): StyledLine {
  return [
    span(`  #${index}  `, 'muted'),
    span(groups, 'value'),
    span(`  0x${formatByte(byte)}  `, 'muted'),
    span(meaning, tone),
  ]
}

/**
 * The zlib framing of the entry's payload: CMF and FLG bit by bit, the
 * first deflate block header and the Adler-32 trailer.
 */
export function formatCompression(entry: DecodedPackEntry): StyledLine[] {
  const lines: StyledLine[] = [line('COMPRESSION', 'heading')]
  try {
    const zlib = parseZlibEnvelope(entry.compressedBytes, entry.data)

    const cmf = formatBinary(zlib.cmf)
    const method = zlib.method === 8 ? 'deflate' : 'unknown method'
    lines.push(
      byteLine(
        0,
        `${cmf.slice(0, 4)} ${cmf.slice(4)}`,
        zlib.cmf,
        `CMF: CINFO ${zlib.windowBits} (${zlib.windowSize} byte window), CM ${zlib.method} (${method})`,
        zlib.method === 8 ? 'plain' : 'warning'
      )
    )

    const flg = formatBinary(zlib.flg)
    const check = zlib.headerCheckValid ? 'header check ok' : 'header check failed'
    lines.push(
      byteLine(
        1,
        `${flg.slice(0, 2)} ${flg[2]} ${flg.slice(3)}`,
        zlib.flg,
        `FLG: FLEVEL ${zlib.level} (${LEVELS[zlib.level]}), FDICT ${zlib.presetDictionary ? 1 : 0}, FCHECK ${zlib.fcheck} (${check})`,
        zlib.headerCheckValid ? 'plain' : 'warning'
      )
    )

    if (zlib.firstBlock) {
      const { byte, final, type } = zlib.firstBlock
      const bits = formatBinary(byte)
      lines.push(
        byteLine(
          zlib.presetDictionary ? 6 : 2,
          `${bits.slice(0, 5)} ${bits.slice(5, 7)} ${bits[7]}`,
          byte,
          `first block: BFINAL ${final ? 1 : 0}, BTYPE ${(byte >> 1) & 0x03} (${type})`
        )
      )
    }

    const verified = zlib.storedAdler32 === zlib.computedAdler32
    const ratio = zlib.inflatedSize > 0 ? ` (${Math.round((zlib.compressedSize * 100) / zlib.inflatedSize)}%)` : ''
    lines.push(
      field('  deflate data', `${zlib.deflateSize} bytes`),
      field('  adler-32 stored', formatU32AsHexBytes(zlib.storedAdler32), verified ? 'value' : 'warning'),
      field('  adler-32 computed', formatU32AsHexBytes(zlib.computedAdler32)),
      field('  verified', verified ? 'yes' : 'no', verified ? 'success' : 'warning'),
      field('  ratio', `${zlib.compressedSize} bytes for ${zlib.inflatedSize} inflated${ratio}`)
    )
  } catch (error) {
    lines.push(line(`  ${describeError(error)}`, 'error'))
  }
  return lines
}

// ============================================================================
// Base Reference
// ============================================================================

function formatBaseReference(entry: DecodedPackEntry): StyledLine[] {
  const ref = entry.baseReference
  if (!ref) return []

  const lines: StyledLine[] = [line('BASE REFERENCE', 'heading')]
  if (ref.kind === 'offset') {
    const encoded = entry.baseReferenceBytes ? Array.from(entry.baseReferenceBytes, formatByte).join(' ') : ''
    lines.push(field('  encoding', encoded, 'muted'))
    lines.push(field('  distance', String(ref.distance)))
    lines.push(field('  base offset', String(ref.baseOffset), 'accent'))
  } else {
    lines.push(field('  base object', ref.objectId, 'accent'))
  }
  return lines
}

// ============================================================================
// Delta Instructions
// ============================================================================

function describeInstruction(instruction: DeltaInstruction): StyledLine {
  const at = span(`  @${String(instruction.position).padStart(5)}  `, 'muted')
  if (instruction.type === 'copy') {
    return [
      at,
      span('COPY  ', 'accent'),
      span(`${instruction.size} bytes from base offset ${instruction.offset}`),
    ]
  }
  const preview = decoder
    .decode(instruction.data.subarray(0, INSERT_PREVIEW_BYTES))
    .replace(/[\x00-\x1f\x7f]/g, '.')
  const ellipsis = instruction.size > INSERT_PREVIEW_BYTES ? '...' : ''
  return [at, span('INSERT', 'success'), span(` ${instruction.size} bytes `), span(`"${preview}${ellipsis}"`, 'muted')]
}

export function formatDeltaInstructions(data: Uint8Array): StyledLine[] {
  try {
    const delta = parseDelta(data)
    return [
      line(`DELTA (${delta.instructions.length} instructions)`, 'heading'),
      field('  source size', String(delta.sourceSize)),
      field('  target size', String(delta.targetSize)),
      ...delta.instructions.map(describeInstruction),
    ]
  } catch (error) {
    return [line('DELTA', 'heading'), line(`  ${describeError(error)}`, 'error')]
  }
}

// ============================================================================
// Entry
// ============================================================================

function formatSummary(entry: DecodedPackEntry): StyledLine[] {
  const compressed = entry.compressedSpan.end - entry.compressedSpan.start
  return [
    line(`ENTRY #${entry.index}`, 'heading'),
    field('  kind', entry.entryKind, 'accent'),
    field('  offset', String(entry.offset)),
    field('  declared size', String(entry.declaredSize)),
    field('  compressed', `${compressed} bytes at ${entry.compressedSpan.start}..${entry.compressedSpan.end}`),
  ]
}

function formatResolution(resolution: EntryResolution, options: PayloadFormatOptions): StyledLine[] {
  if (!resolution.ok) {
    return [line('RESOLVED OBJECT', 'heading'), line(`  ${describeError(resolution.error)}`, 'error')]
  }
  const { object } = resolution
  const lines: StyledLine[] = [
    line('RESOLVED OBJECT', 'heading'),
    field('  id', object.objectId, 'accent'),
    field('  kind', object.kind),
    field('  size', String(object.content.length)),
    field('  chain length', String(object.chainLength)),
    blankLine,
  ]
  try {
    lines.push(...formatPayload(parseObjectPayload(object.kind, object.content), options))
  } catch (error) {
    lines.push(line(describeError(error), 'error'))
  }
  return lines
}

/**
 * Detail lines for one entry. Delta entries list their instructions and,
 * when resolution was attempted, the reconstructed object or the reason it
 * could not be reconstructed.
 */
export function formatPackEntry(
  entry: DecodedPackEntry,
  resolution: EntryResolution | undefined,
  options: PayloadFormatOptions
): StyledLine[] {
  const lines: StyledLine[] = [
    ...formatSummary(entry),
    blankLine,
    ...formatHeaderBytes(entry),
    blankLine,
    ...formatCompression(entry),
  ]

  if (isDeltaKind(entry.entryKind)) {
    lines.push(blankLine, ...formatBaseReference(entry))
    lines.push(blankLine, ...formatDeltaInstructions(entry.data))
  }

  if (resolution) {
    lines.push(blankLine, ...formatResolution(resolution, options))
  }
  return lines
}
