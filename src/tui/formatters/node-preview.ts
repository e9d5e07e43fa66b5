/**
 * @fileoverview Main view preview pane
 *
 * Describes the selected tree node. Files that can be decoded cheaply get a
 * summary of their structure; anything that fails to decode is shown as an
 * error line in place of the summary.
 *
 * @module tui/formatters/node-preview
 */

import { blankLine, field, line, textLines, type StyledLine } from '../../cli/ui/styled'
import { describeError } from '../../errors'
import type { RepositoryAccess } from '../../repository/access'
import { classifyNode, type RepositoryNode } from '../../repository/tree-builder'
import { formatU32AsHexBytes } from '../../utils/hex'

/** Lines of a ref file shown in the preview */
const MAX_REF_LINES = 200

/** Fan-out buckets listed in the index summary */
const FANOUT_SAMPLES = [0x00, 0x3f, 0x7f, 0xbf, 0xff]

/** Pack positions listed in the reverse index summary */
const PACK_ORDER_SAMPLES = 10

function u32Field(label: string, value: number): StyledLine {
  return field(label, `${formatU32AsHexBytes(value)}  (${value})`)
}

function formatPackPreview(node: RepositoryNode, access: RepositoryAccess): StyledLine[] {
  const { header, size } = access.readPackHeader(node.path)
  return [
    line('PACK FILE', 'heading'),
    field('  signature', '50 41 43 4b  (PACK)'),
    u32Field('  version', header.version),
    u32Field('  objects', header.objectCount),
    field('  size', `${size} bytes`),
    blankLine,
    line('Press enter to inspect the entries and verify the checksum.', 'muted'),
  ]
}

function formatIndexPreview(node: RepositoryNode, access: RepositoryAccess): StyledLine[] {
  const index = access.readPackIndex(node.path)
  const lines: StyledLine[] = [
    line('PACK INDEX', 'heading'),
    u32Field('  version', index.version),
    u32Field('  objects', index.objectCount),
    field('  large offsets', String(index.largeOffsetCount)),
    field('  pack checksum', index.packChecksum),
    field('  index checksum', index.indexChecksum, index.checksumValid ? 'value' : 'warning'),
    field('  verified', index.checksumValid ? 'yes' : 'no', index.checksumValid ? 'success' : 'warning'),
    blankLine,
    line('FAN-OUT', 'heading'),
  ]
  for (const bucket of FANOUT_SAMPLES) {
    lines.push(u32Field(`  [${bucket.toString(16).padStart(2, '0')}]`, index.fanout[bucket]))
  }
  return lines
}

function formatReverseIndexPreview(node: RepositoryNode, access: RepositoryAccess): StyledLine[] {
  const rev = access.readPackReverseIndex(node.path)
  const lines: StyledLine[] = [
    line('PACK REVERSE INDEX', 'heading'),
    u32Field('  version', rev.version),
    field('  hash function', `${rev.hashFunction} (${rev.hashFunctionId})`),
    field('  objects', String(rev.objectCount)),
    field('  pack checksum', rev.packChecksum),
    field('  file checksum', rev.fileChecksum, rev.checksumValid ? 'value' : 'warning'),
    field('  verified', rev.checksumValid ? 'yes' : 'no', rev.checksumValid ? 'success' : 'warning'),
    blankLine,
    line('PACK ORDER', 'heading'),
  ]
  const shown = rev.indexPositions.subarray(0, PACK_ORDER_SAMPLES)
  shown.forEach((indexPosition, packPosition) => {
    lines.push(field(`  pack #${packPosition}`, `index #${indexPosition}`))
  })
  if (rev.objectCount > shown.length) {
    lines.push(line(`  ... ${rev.objectCount - shown.length} more objects`, 'muted'))
  }
  return lines
}

function formatLoosePreview(node: RepositoryNode, access: RepositoryAccess): StyledLine[] {
  const object = access.readLooseObject(node.path)
  return [
    line('LOOSE OBJECT', 'heading'),
    ...(object.objectId !== undefined ? [field('  id', object.objectId, 'accent')] : []),
    field('  kind', object.objectKind),
    field('  size', String(object.declaredSize)),
    blankLine,
    line('Press enter to decode.', 'muted'),
  ]
}

function formatRefPreview(node: RepositoryNode, access: RepositoryAccess): StyledLine[] {
  const text = access.readText(node.path).replace(/\n$/, '')
  const lines = textLines(text, 'value')
  const shown = lines.slice(0, MAX_REF_LINES)
  if (lines.length > shown.length) {
    shown.push(line(`... ${lines.length - shown.length} more lines`, 'muted'))
  }
  return [line('CONTENTS', 'heading'), ...shown]
}

function formatDetails(node: RepositoryNode, access: RepositoryAccess): StyledLine[] {
  switch (classifyNode(node)) {
    case 'pack':
      return formatPackPreview(node, access)
    case 'pack-index':
      return formatIndexPreview(node, access)
    case 'pack-rev':
      return formatReverseIndexPreview(node, access)
    case 'loose-object':
      return formatLoosePreview(node, access)
    case 'ref':
      return formatRefPreview(node, access)
    case 'directory':
    case 'other':
      return []
  }
}

/**
 * Preview lines for `node`: its name, note and size, then a decoded
 * summary where the node's category has one.
 */
export function formatNodePreview(node: RepositoryNode, access: RepositoryAccess): StyledLine[] {
  const lines: StyledLine[] = [line(node.name, 'heading')]

  if (node.educationalNote) {
    lines.push(...textLines(node.educationalNote, 'muted'))
  }
  lines.push(blankLine)

  if (node.kind === 'directory') {
    lines.push(field('entries', String(node.children.length)))
    if (node.skippedEntries) {
      lines.push(field('unreadable', String(node.skippedEntries), 'warning'))
    }
  } else {
    lines.push(field('size', node.size !== undefined ? `${node.size} bytes` : 'unknown'))
  }

  let details: StyledLine[]
  try {
    details = formatDetails(node, access)
  } catch (error) {
    details = [line(describeError(error), 'error')]
  }
  if (details.length > 0) {
    lines.push(blankLine, ...details)
  }
  return lines
}
