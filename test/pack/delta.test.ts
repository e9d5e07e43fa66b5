import { describe, it, expect } from 'vitest'
import { DecodeError } from '../../src/errors'
import { DEFAULT_COPY_SIZE, applyDelta, parseDelta, parseDeltaHeader } from '../../src/pack/delta'
import { bytes, delta } from '../helpers/fixtures'

const decoder = new TextDecoder()

function deltaError(fn: () => unknown): DecodeError {
  try {
    fn()
  } catch (error) {
    if (error instanceof DecodeError) return error
    throw error
  }
  throw new Error('expected a DecodeError')
}

describe('parseDeltaHeader', () => {
  it('parses single and multi-byte sizes', () => {
    expect(parseDeltaHeader(new Uint8Array([0x0a]), 0)).toEqual({ size: 10, bytesRead: 1 })
    // 0x80 | 0x00, 0x01 => 128
    expect(parseDeltaHeader(new Uint8Array([0x80, 0x01]), 0)).toEqual({ size: 128, bytesRead: 2 })
  })

  it('rejects a size that runs off the end', () => {
    expect(deltaError(() => parseDeltaHeader(new Uint8Array([0x80]), 0)).code).toBe('TRUNCATED_HEADER')
  })
})

describe('parseDelta', () => {
  it('lists copy and insert instructions with their positions', () => {
    const parsed = parseDelta(delta(6, 6, 0x90, 3, 3, 0x58, 0x59, 0x5a))
    expect(parsed.sourceSize).toBe(6)
    expect(parsed.targetSize).toBe(6)
    expect(parsed.instructions).toEqual([
      { type: 'copy', offset: 0, size: 3, position: 2 },
      { type: 'insert', size: 3, data: bytes('XYZ'), position: 4 },
    ])
  })

  it('reads offset and size bytes selected by the mask', () => {
    // offset bytes 0x01 and 0x02, size byte 0x10
    const parsed = parseDelta(delta(0, 0, 0x93, 0x34, 0x12, 0x05))
    expect(parsed.instructions[0]).toEqual({ type: 'copy', offset: 0x1234, size: 5, position: 2 })
  })

  it('treats a zero copy size as 0x10000', () => {
    const parsed = parseDelta(delta(0, 0, 0x80))
    expect(parsed.instructions[0]).toMatchObject({ type: 'copy', offset: 0, size: DEFAULT_COPY_SIZE })
  })

  it('rejects the reserved 0x00 opcode', () => {
    const error = deltaError(() => parseDelta(delta(1, 1, 0x00)))
    expect(error.code).toBe('INVALID_DELTA')
    expect(error.offset).toBe(2)
  })

  it('rejects an insert longer than the data', () => {
    expect(deltaError(() => parseDelta(delta(0, 4, 0x04, 0x41))).code).toBe('TRUNCATED_HEADER')
  })
})

describe('applyDelta', () => {
  it('copies from the base and inserts literals', () => {
    const result = applyDelta(bytes('abcdef'), delta(6, 6, 0x90, 3, 3, 0x58, 0x59, 0x5a))
    expect(decoder.decode(result)).toBe('abcXYZ')
  })

  it('copies from the middle of the base', () => {
    // copy 3 bytes from offset 2
    const result = applyDelta(bytes('abcdef'), delta(6, 3, 0x91, 2, 3))
    expect(decoder.decode(result)).toBe('cde')
  })

  it('rejects a base of the wrong size', () => {
    expect(deltaError(() => applyDelta(bytes('abc'), delta(6, 3, 0x90, 3))).code).toBe('DELTA_SIZE_MISMATCH')
  })

  it('rejects a copy outside the base', () => {
    const error = deltaError(() => applyDelta(bytes('abcdef'), delta(6, 4, 0x91, 4, 4)))
    expect(error.code).toBe('DELTA_OUT_OF_BOUNDS')
    expect(error.offset).toBe(2)
  })

  it('rejects output past the target size', () => {
    expect(deltaError(() => applyDelta(bytes('abcdef'), delta(6, 2, 0x90, 3))).code).toBe('DELTA_OUT_OF_BOUNDS')
  })

  it('rejects output short of the target size', () => {
    expect(deltaError(() => applyDelta(bytes('abcdef'), delta(6, 5, 0x90, 3))).code).toBe('DELTA_SIZE_MISMATCH')
  })

  it('rejects a declared target size the instructions cannot produce', () => {
    // target size 0x20 << 35, a single 3-byte copy
    const huge = new Uint8Array([3, 0x80, 0x80, 0x80, 0x80, 0x80, 0x20, 0x90, 3])
    const error = deltaError(() => applyDelta(bytes('abc'), huge))
    expect(error.code).toBe('DELTA_SIZE_MISMATCH')
    expect(error.reason).toBe(`Delta result size mismatch: expected ${2 ** 40}, got 3`)
  })
})
