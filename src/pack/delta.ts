/**
 * @fileoverview Pack delta decoding
 *
 * Deltas reconstruct a target object from a base object's content.
 *
 * ## Delta Format Overview
 *
 * A delta consists of:
 * 1. **Source size** - Variable-length integer specifying the base object size
 * 2. **Target size** - Variable-length integer specifying the result size
 * 3. **Instructions** - Sequence of copy or insert commands
 *
 * ## Instruction Types
 *
 * ### Copy Instruction (MSB = 1)
 *
 * | Bit    | Meaning                                   |
 * |--------|-------------------------------------------|
 * | 7      | Always 1 (copy marker)                    |
 * | 6-4    | Which size bytes follow (bit mask)        |
 * | 3-0    | Which offset bytes follow (bit mask)      |
 *
 * Following bytes encode offset (up to 4 bytes) and size (up to 3 bytes),
 * least significant first. A decoded size of 0 means 0x10000.
 *
 * ### Insert Instruction (MSB = 0)
 *
 * The low 7 bits (1-127) give the number of literal bytes that follow.
 * An opcode of 0x00 is reserved and rejected.
 *
 * @module pack/delta
 * @see {@link https://git-scm.com/docs/pack-format} Git Pack Format Documentation
 *
 * @example
 * ```typescript
 * import { applyDelta } from './delta'
 *
 * const base = new TextEncoder().encode('abcdef')
 * const delta = new Uint8Array([6, 6, 0x90, 3, 3, 0x58, 0x59, 0x5a])
 * applyDelta(base, delta) // 'abcXYZ'
 * ```
 */

import { DecodeError } from '../errors'

/**
 * Marker bit for copy instructions.
 */
export const COPY_INSTRUCTION = 0x80

/**
 * Copy size used when the encoded size is zero.
 */
export const DEFAULT_COPY_SIZE = 0x10000

const MAX_VARINT_BYTES = 10

/**
 * Result of parsing one of the two size fields at the start of a delta.
 */
export interface DeltaHeaderResult {
  size: number
  bytesRead: number
}

/**
 * A single decoded delta instruction.
 */
export type DeltaInstruction =
  | { type: 'copy'; offset: number; size: number; position: number }
  | { type: 'insert'; size: number; data: Uint8Array; position: number }

/**
 * A delta stream split into its sizes and instruction list.
 */
export interface ParsedDelta {
  sourceSize: number
  targetSize: number
  instructions: DeltaInstruction[]
}

/**
 * Parses a variable-length size value from the delta header.
 *
 * Each byte contributes its low 7 bits, least significant group first; the
 * MSB says whether another byte follows.
 *
 * @throws {DecodeError} TRUNCATED_HEADER when the data ends mid-value
 */
export function parseDeltaHeader(data: Uint8Array, offset: number): DeltaHeaderResult {
  let size = 0
  let shift = 0
  let bytesRead = 0

  while (true) {
    if (offset + bytesRead >= data.length) {
      throw DecodeError.truncated('delta size', offset + bytesRead)
    }
    if (bytesRead >= MAX_VARINT_BYTES) {
      throw new DecodeError('Delta size exceeds maximum length', 'INVALID_DELTA', { offset })
    }

    const byte = data[offset + bytesRead]
    bytesRead++
    size += (byte & 0x7f) * 2 ** shift
    shift += 7

    if ((byte & 0x80) === 0) {
      break
    }
  }

  return { size, bytesRead }
}

function readInstruction(delta: Uint8Array, start: number): { instruction: DeltaInstruction; next: number } {
  let offset = start
  const cmd = delta[offset++]

  if (cmd & COPY_INSTRUCTION) {
    let copyOffset = 0
    let copySize = 0
    const need = (bit: number): number => {
      if (!(cmd & bit)) return 0
      if (offset >= delta.length) {
        throw DecodeError.truncated('copy instruction', offset)
      }
      return delta[offset++]
    }

    copyOffset += need(0x01)
    copyOffset += need(0x02) * 0x100
    copyOffset += need(0x04) * 0x10000
    copyOffset += need(0x08) * 0x1000000

    copySize += need(0x10)
    copySize += need(0x20) * 0x100
    copySize += need(0x40) * 0x10000

    if (copySize === 0) {
      copySize = DEFAULT_COPY_SIZE
    }

    return { instruction: { type: 'copy', offset: copyOffset, size: copySize, position: start }, next: offset }
  }

  if (cmd === 0) {
    throw new DecodeError('Invalid delta instruction 0x00', 'INVALID_DELTA', { offset: start })
  }

  if (offset + cmd > delta.length) {
    throw DecodeError.truncated('insert instruction', start)
  }
  const data = delta.subarray(offset, offset + cmd)
  return { instruction: { type: 'insert', size: cmd, data, position: start }, next: offset + cmd }
}

/**
 * Splits a delta into sizes and instructions without needing the base.
 * Used to show the instruction list of an unresolved delta entry.
 */
export function parseDelta(delta: Uint8Array): ParsedDelta {
  let offset = 0
  const source = parseDeltaHeader(delta, offset)
  offset += source.bytesRead
  const target = parseDeltaHeader(delta, offset)
  offset += target.bytesRead

  const instructions: DeltaInstruction[] = []
  while (offset < delta.length) {
    const { instruction, next } = readInstruction(delta, offset)
    instructions.push(instruction)
    offset = next
  }

  return { sourceSize: source.size, targetSize: target.size, instructions }
}

/**
 * Applies a delta to a base object to reconstruct the target.
 *
 * Instruction sizes are totalled before the target buffer is allocated, so a
 * header declaring an impossible target size fails as a size mismatch.
 *
 * @throws {DecodeError} DELTA_SIZE_MISMATCH when the base or the produced
 *   length disagrees with the sizes in the delta header
 * @throws {DecodeError} DELTA_OUT_OF_BOUNDS when a copy reads outside the base
 *   or writes past the declared target size
 */
export function applyDelta(base: Uint8Array, delta: Uint8Array): Uint8Array {
  const parsed = parseDelta(delta)

  if (parsed.sourceSize !== base.length) {
    throw new DecodeError(
      `Delta source size mismatch: expected ${parsed.sourceSize}, got ${base.length}`,
      'DELTA_SIZE_MISMATCH'
    )
  }

  let produced = 0
  for (const instruction of parsed.instructions) {
    produced += instruction.size
    if (produced > parsed.targetSize) {
      throw new DecodeError(
        `Instruction would write past target size ${parsed.targetSize}`,
        'DELTA_OUT_OF_BOUNDS',
        { offset: instruction.position }
      )
    }
  }
  if (produced !== parsed.targetSize) {
    throw new DecodeError(
      `Delta result size mismatch: expected ${parsed.targetSize}, got ${produced}`,
      'DELTA_SIZE_MISMATCH'
    )
  }

  const result = new Uint8Array(parsed.targetSize)
  let resultOffset = 0

  for (const instruction of parsed.instructions) {
    if (instruction.type === 'copy') {
      if (instruction.offset + instruction.size > base.length) {
        throw new DecodeError(
          `Copy out of bounds: offset=${instruction.offset}, size=${instruction.size}, base length=${base.length}`,
          'DELTA_OUT_OF_BOUNDS',
          { offset: instruction.position }
        )
      }
      result.set(base.subarray(instruction.offset, instruction.offset + instruction.size), resultOffset)
    } else {
      result.set(instruction.data, resultOffset)
    }
    resultOffset += instruction.size
  }

  return result
}
