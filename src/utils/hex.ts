/**
 * @fileoverview Hexadecimal helpers shared by the decoders and formatters.
 *
 * @module utils/hex
 */

/**
 * Convert bytes to a lowercase hexadecimal string.
 *
 * @example
 * ```typescript
 * bytesToHex(new Uint8Array([0x48, 0x65])) // '4865'
 * ```
 */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = ''
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, '0')
  }
  return hex
}

/**
 * Convert a hexadecimal string to bytes.
 *
 * @throws {Error} If the string has odd length or contains non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error('Hex string must have even length')
  }
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error(`Invalid hex string: ${hex}`)
  }
  const bytes = new Uint8Array(hex.length / 2)
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.substring(i, i + 2), 16)
  }
  return bytes
}

/**
 * Formats one byte as two lowercase hex digits.
 */
export function formatByte(byte: number): string {
  return (byte & 0xff).toString(16).padStart(2, '0')
}

/**
 * Formats a 32-bit unsigned value as its four big-endian bytes.
 *
 * @example
 * ```typescript
 * formatU32AsHexBytes(0x12345678) // '12 34 56 78'
 * ```
 */
export function formatU32AsHexBytes(value: number): string {
  const v = value >>> 0
  return [v >>> 24, (v >>> 16) & 0xff, (v >>> 8) & 0xff, v & 0xff].map(formatByte).join(' ')
}

/**
 * Formats a byte as eight binary digits, most significant first.
 */
export function formatBinary(byte: number): string {
  return (byte & 0xff).toString(2).padStart(8, '0')
}

/**
 * Produces `xxd`-style lines: offset, 16 hex bytes, printable ASCII column.
 *
 * @param limit - Maximum number of bytes to dump; the remainder is summarized
 */
export function hexDump(bytes: Uint8Array, limit = bytes.length): string[] {
  const lines: string[] = []
  const end = Math.min(limit, bytes.length)
  for (let row = 0; row < end; row += 16) {
    const chunk = bytes.subarray(row, Math.min(row + 16, end))
    const hex = Array.from(chunk, formatByte).join(' ').padEnd(47, ' ')
    const ascii = Array.from(chunk, (b) => (b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : '.')).join('')
    lines.push(`${row.toString(16).padStart(8, '0')}  ${hex}  ${ascii}`)
  }
  if (end < bytes.length) {
    lines.push(`... ${bytes.length - end} more bytes`)
  }
  return lines
}
