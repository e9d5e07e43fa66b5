import { blankLine, field, line, type StyledLine } from '../../cli/ui/styled'
import type { DecodedLooseObject } from '../../objects/types'
import { formatPayload, type PayloadFormatOptions } from './object'

/**
 * Header summary followed by the payload of a loose object.
 */
export function formatLooseObject(object: DecodedLooseObject, options: PayloadFormatOptions): StyledLine[] {
  const lines: StyledLine[] = [line('LOOSE OBJECT', 'heading')]
  if (object.objectId) lines.push(field('  id', object.objectId, 'accent'))
  lines.push(field('  kind', object.objectKind))
  lines.push(field('  size', String(object.declaredSize)))
  lines.push(field('  header', `${object.objectKind} ${object.declaredSize}\\0 (${object.headerLength} bytes)`, 'muted'))
  if (object.compressedSize !== undefined) {
    lines.push(field('  compressed', `${object.compressedSize} bytes`))
  }
  lines.push(blankLine, ...formatPayload(object.payload, options))
  return lines
}
