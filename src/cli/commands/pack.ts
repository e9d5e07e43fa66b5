/**
 * @fileoverview Pack listing command
 *
 * `packlens pack <file>` prints the pack header and one line per entry,
 * with the resolved object id of every entry whose delta chain resolves.
 *
 * @module cli/commands/pack
 */

import { basename, resolve } from 'node:path'
import { describeError, PackLensError } from '../../errors'
import { PackResolver, type DecodedPackEntry } from '../../pack/unpack'
import { siblingIndexOffsets } from '../../tui/pack-details/update'
import { createCommandLogger, createServiceContainer } from '../../tui/services/service-container'
import type { CommandContext } from '../index'

export function formatEntrySummary(entry: DecodedPackEntry, resolver: PackResolver): string {
  const parts = [
    `#${entry.index}`.padEnd(6),
    entry.entryKind.padEnd(9),
    `offset ${entry.offset}`.padEnd(16),
    `size ${entry.declaredSize}`.padEnd(12),
  ]
  const ref = entry.baseReference
  if (ref?.kind === 'offset') parts.push(`base @${ref.baseOffset}`.padEnd(14))
  if (ref?.kind === 'ref') parts.push(`base ${ref.objectId.slice(0, 12)}`.padEnd(14))

  try {
    parts.push(resolver.resolve(entry).objectId)
  } catch (error) {
    parts.push(`unresolved: ${describeError(error)}`)
  }
  return parts.join(' ').trimEnd()
}

export function packCommand(ctx: CommandContext): void {
  const [target] = ctx.args
  if (target === undefined) {
    throw new PackLensError('Usage: packlens pack <file>', 'INVALID_ARGUMENT')
  }

  const services = createServiceContainer(ctx.config, { logger: createCommandLogger(ctx.config, 'pack') })
  const packPath = resolve(ctx.cwd, target)
  const pack = services.access.openPack(packPath)
  const decoded = pack.decodeAll()

  const checksum = pack.checksum.valid ? 'checksum ok' : 'checksum mismatch'
  ctx.stdout(
    `${basename(packPath)}: version ${pack.header.version}, ${pack.header.objectCount} objects, ${pack.size} bytes, ${checksum}`
  )

  const offsetsById = siblingIndexOffsets(packPath, services.context)
  const resolver = new PackResolver(decoded.entries, offsetsById ? { offsetsById } : {})
  for (const entry of decoded.entries) {
    ctx.stdout(formatEntrySummary(entry, resolver))
  }

  if (decoded.error) {
    throw decoded.error
  }
}
